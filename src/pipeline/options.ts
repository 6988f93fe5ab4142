import yargs from 'yargs';
import { ENV } from './env';
import { ValidationError } from './errors';
import { parseKeywords } from './filter';
import type { HighlightOptions } from './types';

export interface RawHighlightArgs {
    url: string;
    keywords: string;
    before: number;
    after: number;
    outputDir: string;
    ffmpegPath?: string;
}

function padding(name: string, v: number): number {
    if (!Number.isFinite(v) || v < 0) {
        throw new ValidationError(`--${name} must be a non-negative number of seconds, got ${v}`, { [name]: v });
    }
    return v;
}

export function validateHighlightOptions(raw: RawHighlightArgs): HighlightOptions {
    const url = raw.url.trim();
    if (!url) throw new ValidationError('--url must not be empty');
    const keywords = parseKeywords(raw.keywords);
    if (!keywords.length) {
        throw new ValidationError('--keywords must contain at least one non-empty keyword', {
            keywords: raw.keywords,
        });
    }
    const outputDir = raw.outputDir.trim();
    if (!outputDir) throw new ValidationError('--output-dir must not be empty');
    const ffmpegPath = raw.ffmpegPath?.trim() || undefined;
    return {
        url,
        keywords,
        beforeSec: padding('before', raw.before),
        afterSec: padding('after', raw.after),
        outputDir,
        ffmpegPath,
    };
}

/** Parses `highlights` CLI arguments (without the node/script prefix). */
export function parseHighlightArgs(args: string[]): HighlightOptions {
    const argv = yargs(args)
        .scriptName('highlights')
        .usage('$0 --url <video> --keywords <a,b,c> [options]')
        .option('url', { type: 'string', demandOption: true, describe: 'Video URL' })
        .option('keywords', {
            type: 'string',
            demandOption: true,
            describe: 'Comma-separated, case-insensitive label filters',
        })
        .option('before', { type: 'number', default: 5, describe: 'Seconds before each timestamp' })
        .option('after', { type: 'number', default: 10, describe: 'Seconds after each timestamp' })
        .option('output-dir', { type: 'string', default: ENV.outputDir, describe: 'Output directory' })
        .option('ffmpeg-path', { type: 'string', describe: 'Path to the ffmpeg executable' })
        .strict()
        .fail((msg, err) => {
            throw new ValidationError(msg || err?.message || 'Invalid arguments');
        })
        .help()
        .parseSync();

    if (argv._.length) {
        throw new ValidationError(`Unexpected argument(s): ${argv._.join(' ')}`);
    }
    return validateHighlightOptions({
        url: argv.url,
        keywords: argv.keywords,
        before: argv.before,
        after: argv.after,
        outputDir: argv['output-dir'],
        ffmpegPath: argv['ffmpeg-path'],
    });
}
