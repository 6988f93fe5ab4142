import { GoogleGenAI } from '@google/genai';
import { errorMessage, ServiceError } from './errors';
import { info, warn } from './log';
import { buildNormalizePrompt } from './prompts/normalize';
import { extractTimestamps } from './timestamps';

export interface TextCompletionClient {
    /** Resolves with the completion text; rejects with ServiceError. */
    complete(prompt: string): Promise<string>;
}

export class GeminiCompletionClient implements TextCompletionClient {
    private ai: GoogleGenAI;

    constructor(apiKey: string, private model: string) {
        this.ai = new GoogleGenAI({ apiKey });
    }

    async complete(prompt: string): Promise<string> {
        let text: string | undefined;
        try {
            const response = await this.ai.models.generateContent({
                model: this.model,
                contents: prompt,
                config: { temperature: 0.1 },
            });
            text = response.text;
        } catch (e) {
            throw new ServiceError(`Gemini request failed: ${errorMessage(e)}`, { model: this.model });
        }
        if (!text || !text.trim()) {
            throw new ServiceError('Gemini response was empty or blocked', { model: this.model });
        }
        return text;
    }
}

export interface NormalizeOptions {
    apiKey?: string;
    model?: string;
    client?: TextCompletionClient;
}

export interface NormalizeResult {
    text: string;
    normalized: boolean;
    /** why the input was passed through unchanged */
    reason?: string;
}

function stripFences(s: string): string {
    return s
        .replace(/^\s*```[a-z]*\s*\n/i, '')
        .replace(/\n?```\s*$/, '')
        .trim();
}

/**
 * Asks the completion service to rewrite the description as one
 * "TIMESTAMP LABEL" entry per line. Never throws: any failure returns the
 * input unchanged with `normalized: false`.
 */
export async function normalizeDescription(
    text: string,
    opts: NormalizeOptions = {}
): Promise<NormalizeResult> {
    const skip = (reason: string): NormalizeResult => {
        warn('normalize.skip', { reason });
        return { text, normalized: false, reason };
    };

    const client =
        opts.client ??
        (opts.apiKey ? new GeminiCompletionClient(opts.apiKey, opts.model || 'gemini-2.0-flash') : undefined);
    if (!client) return skip('no credential configured');
    if (!text.trim()) return skip('description is empty');

    info('normalize.start', { chars: text.length });
    let completion: string;
    try {
        completion = await client.complete(buildNormalizePrompt(text));
    } catch (e) {
        return skip(errorMessage(e));
    }

    const cleaned = stripFences(completion);
    if (!cleaned) return skip('service returned an empty description');
    // A rewrite that lost every timestamp the raw text had is not usable
    if (extractTimestamps(cleaned).length === 0 && extractTimestamps(text).length > 0) {
        return skip('service response contained no timestamps');
    }
    info('normalize.done', { lines: cleaned.split(/\r?\n/).length });
    return { text: cleaned, normalized: true };
}
