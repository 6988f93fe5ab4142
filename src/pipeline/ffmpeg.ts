import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { ENV } from './env';
import { ClipError, ConcatError, MediaUnavailableError, errorMessage } from './errors';
import { type CommandRunner, runCommand } from './exec';
import type { ClipTrimmer } from './clips';
import { debug } from './log';

const QUIET = ['-y', '-loglevel', 'error', '-hide_banner', '-nostdin'];
const ENCODE = ['-c:v', 'libx264', '-c:a', 'aac', '-movflags', '+faststart'];

/** ffprobe living next to an overridden ffmpeg, unless FFPROBE_BIN says otherwise. */
export function resolveFfprobe(ffmpegPath?: string): string {
    if (!ffmpegPath || ENV.ffprobeBin !== 'ffprobe') return ENV.ffprobeBin;
    const base = path.basename(ffmpegPath);
    if (!base.includes('ffmpeg') || path.dirname(ffmpegPath) === '.') return ENV.ffprobeBin;
    return path.join(path.dirname(ffmpegPath), base.replace('ffmpeg', 'ffprobe'));
}

function concatListLine(file: string): string {
    return `file '${path.resolve(file).replace(/'/g, "'\\''")}'`;
}

export interface FfmpegOptions {
    ffmpegBin?: string;
    ffprobeBin?: string;
    run?: CommandRunner;
}

export class FfmpegTrimmer implements ClipTrimmer {
    readonly ffmpegBin: string;
    readonly ffprobeBin: string;
    private run: CommandRunner;

    constructor(opts: FfmpegOptions = {}) {
        this.ffmpegBin = opts.ffmpegBin || ENV.ffmpegBin;
        this.ffprobeBin = opts.ffprobeBin || resolveFfprobe(opts.ffmpegBin);
        this.run = opts.run ?? runCommand;
    }

    async extractSubclip(source: string, startSec: number, endSec: number, outputPath: string): Promise<string> {
        const durSec = endSec - startSec;
        await fs.ensureDir(path.dirname(outputPath));
        // Accurate seeking: -ss after -i, then re-encode so cuts need no keyframe
        try {
            await this.run(this.ffmpegBin, [
                ...QUIET,
                '-i',
                source,
                '-ss',
                String(startSec),
                '-t',
                String(durSec),
                ...ENCODE,
                outputPath,
            ]);
        } catch (e) {
            throw new ClipError(
                `ffmpeg failed to extract ${startSec}s-${endSec}s: ${errorMessage(e)}`,
                outputPath,
                { startSec, endSec }
            );
        }
        // Sanity check produced clip
        const exists = await fs.pathExists(outputPath);
        if (!exists || (await fs.stat(outputPath)).size === 0) {
            throw new ClipError(
                `ffmpeg produced no data for ${startSec}s-${endSec}s at ${outputPath}`,
                outputPath,
                { startSec, endSec }
            );
        }
        return outputPath;
    }

    async concat(clips: string[], outputPath: string): Promise<void> {
        const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'highlight-reel-'));
        const listPath = path.join(tmpDir, 'concat.txt');
        try {
            await fs.writeFile(listPath, clips.map(concatListLine).join('\n') + '\n');
            await fs.ensureDir(path.dirname(outputPath));
            await this.run(this.ffmpegBin, [
                ...QUIET,
                '-f',
                'concat',
                '-safe',
                '0',
                '-i',
                listPath,
                ...ENCODE,
                outputPath,
            ]);
        } catch (e) {
            throw new ConcatError(`ffmpeg failed to concatenate ${clips.length} clip(s): ${errorMessage(e)}`, outputPath);
        } finally {
            await fs.remove(tmpDir);
        }
    }

    async probeDuration(file: string): Promise<number> {
        let stdout: string;
        try {
            ({ stdout } = await this.run(this.ffprobeBin, [
                '-v',
                'error',
                '-show_entries',
                'format=duration',
                '-of',
                'default=noprint_wrappers=1:nokey=1',
                file,
            ]));
        } catch (e) {
            throw new MediaUnavailableError(`ffprobe failed for ${file}: ${errorMessage(e)}`, file);
        }
        const parsed = parseFloat(stdout);
        if (!Number.isFinite(parsed) || parsed <= 0) {
            throw new MediaUnavailableError(
                `ffprobe could not determine duration for ${file}. Raw output: ${stdout}`,
                file
            );
        }
        debug('ffprobe.duration', { file, durationSec: parsed });
        return parsed;
    }
}
