import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { CommandError, MediaUnavailableError, errorMessage } from './errors';
import { type CommandRunner, runCommand, runFirstAvailable } from './exec';
import { toVideoId } from './ids';
import { info } from './log';
import type { VideoInfo } from './types';

export interface MediaSource {
    /** Metadata only, no download. */
    info(url: string): Promise<VideoInfo>;
    /** Downloads the media into outputDir and resolves with the local path. */
    download(video: VideoInfo, outputDir: string): Promise<string>;
}

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function extraArgs(): string[] {
    const extra: string[] = [];
    if (ENV.ytdlpCookiesFile) {
        extra.push('--cookies', ENV.ytdlpCookiesFile);
    }
    if (ENV.ytdlpExtraArgs) {
        extra.push(
            ...ENV.ytdlpExtraArgs
                .split(' ')
                .map((s) => s.trim())
                .filter(Boolean)
        );
    }
    return extra;
}

// Configured binary first, then plain yt-dlp, then the python module
function candidates(args: string[]): Array<[string, string[]]> {
    const attempts: Array<[string, string[]]> = [];
    attempts.push([ENV.ytdlpBin, args]);
    if (ENV.ytdlpBin !== 'yt-dlp') attempts.push(['yt-dlp', args]);
    if (ENV.ytdlpPythonBin) attempts.push([ENV.ytdlpPythonBin, ['-m', 'yt_dlp', ...args]]);
    attempts.push(['python3', ['-m', 'yt_dlp', ...args]]);
    return attempts;
}

/** Reads `yt-dlp -J` output; playlists resolve to their first entry. */
export function parseVideoInfo(stdout: string, url: string): VideoInfo {
    let parsed: unknown;
    try {
        parsed = JSON.parse(stdout);
    } catch (e) {
        throw new MediaUnavailableError(`yt-dlp returned invalid metadata JSON: ${errorMessage(e)}`, url);
    }
    if (isRecord(parsed) && Array.isArray(parsed.entries) && parsed.entries.length) {
        parsed = parsed.entries[0];
    }
    if (!isRecord(parsed)) {
        throw new MediaUnavailableError('yt-dlp metadata is not an object', url);
    }
    const { id, title, description, duration, webpage_url } = parsed;
    if (typeof title !== 'string' || !title) {
        throw new MediaUnavailableError(`Could not extract a title for ${url}`, url);
    }
    return {
        id: typeof id === 'string' && id ? id : toVideoId(url),
        url: typeof webpage_url === 'string' && webpage_url ? webpage_url : url,
        title,
        description: typeof description === 'string' ? description : '',
        durationSec: typeof duration === 'number' && duration > 0 ? duration : undefined,
    };
}

export class YtdlpMediaSource implements MediaSource {
    private run: CommandRunner;

    constructor(run: CommandRunner = runCommand) {
        this.run = run;
    }

    async info(url: string): Promise<VideoInfo> {
        const args = ['-J', '--no-playlist', ...extraArgs(), url];
        let stdout: string;
        try {
            ({ stdout } = await runFirstAvailable(candidates(args), this.run));
        } catch (e) {
            throw new MediaUnavailableError(`Failed to fetch video info for ${url}`, url, {
                cause: e instanceof CommandError ? e.message : errorMessage(e),
            });
        }
        const video = parseVideoInfo(stdout, url);
        info('ytdlp.info', { id: video.id, title: video.title, durationSec: video.durationSec });
        return video;
    }

    async download(video: VideoInfo, outputDir: string): Promise<string> {
        await fs.ensureDir(outputDir);
        const template = path.join(outputDir, `${video.id}.%(ext)s`);
        const args = [
            '-f',
            'bestvideo*+bestaudio/best',
            '--merge-output-format',
            'mp4',
            '--no-playlist',
            '-o',
            template,
            '--print',
            'after_move:filepath',
            '--no-simulate',
            ...extraArgs(),
            video.url,
        ];
        let stdout: string;
        try {
            ({ stdout } = await runFirstAvailable(candidates(args), this.run));
        } catch (e) {
            throw new MediaUnavailableError(`Failed to download ${video.url}`, video.url, {
                cause: errorMessage(e),
            });
        }

        const printed = stdout
            .split(/\r?\n/)
            .map((l) => l.trim())
            .filter(Boolean)
            .pop();
        if (printed && (await fs.pathExists(printed))) {
            info('ytdlp.download', { path: printed });
            return printed;
        }
        // yt-dlp did not report the final path; look for <id>.<ext> in outputDir
        const prefix = `${video.id}.`;
        const match = (await fs.readdir(outputDir)).find(
            (f) => f.startsWith(prefix) && !f.endsWith('.part')
        );
        if (!match) {
            throw new MediaUnavailableError(
                `Download finished but no ${prefix}* file was found in ${outputDir}`,
                video.url
            );
        }
        const found = path.join(outputDir, match);
        info('ytdlp.download', { path: found, via: 'scan' });
        return found;
    }
}
