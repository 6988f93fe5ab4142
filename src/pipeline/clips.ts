import { errorMessage } from './errors';
import { info, startStep, warn } from './log';
import type { ClipJob, RunCondition } from './types';

export interface ClipTrimmer {
    /** Materializes [startSec, endSec] of source at outputPath; rejects with ClipError. */
    extractSubclip(source: string, startSec: number, endSec: number, outputPath: string): Promise<string>;
    /** Joins clips in order into outputPath; rejects with ConcatError. */
    concat(clips: string[], outputPath: string): Promise<void>;
}

export type ClipExtractionFailed = Extract<RunCondition, { kind: 'ClipExtractionFailed' }>;

export interface ClipBatchResult {
    /** clip paths in processing order */
    clips: string[];
    succeeded: ClipJob[];
    failures: ClipExtractionFailed[];
}

/**
 * Runs the trimmer once per job, sequentially. A failing job is reported and
 * skipped; the rest still run.
 */
export async function extractClips(
    jobs: readonly ClipJob[],
    source: string,
    trimmer: ClipTrimmer
): Promise<ClipBatchResult> {
    const result: ClipBatchResult = { clips: [], succeeded: [], failures: [] };
    const timer = startStep('clips.extract', { total: jobs.length });
    let done = 0;
    for (const job of jobs) {
        const { range, outputPath } = job;
        try {
            const clip = await trimmer.extractSubclip(source, range.startSec, range.endSec, outputPath);
            result.clips.push(clip);
            result.succeeded.push(job);
            info('clip.done', { startSec: range.startSec, endSec: range.endSec, path: clip });
        } catch (e) {
            const failure: ClipExtractionFailed = {
                kind: 'ClipExtractionFailed',
                offsetSec: range.entry.offsetSec,
                label: range.entry.label,
                startSec: range.startSec,
                endSec: range.endSec,
                outputPath,
                error: errorMessage(e),
            };
            result.failures.push(failure);
            warn('clip.fail', { ...failure });
        }
        done += 1;
        timer.eta(done, jobs.length);
    }
    timer.end({ ok: result.clips.length, failed: result.failures.length });
    return result;
}

/** Concatenates clips into the reel; callers skip this when there are no clips. */
export async function assembleReel(clips: string[], reelPath: string, trimmer: ClipTrimmer): Promise<string> {
    const timer = startStep('clips.concat', { clips: clips.length, path: reelPath });
    await trimmer.concat(clips, reelPath);
    timer.end();
    return reelPath;
}
