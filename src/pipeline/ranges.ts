import path from 'path';
import { clipFileName, clipsDirFor, NamingRegistry, sanitizeFilename } from './naming';
import type { ClipJob, HighlightRange, RunCondition, TimestampEntry } from './types';

export interface RangeOptions {
    beforeSec: number;
    afterSec: number;
    durationSec: number;
    /** raw video title; sanitized here */
    videoTitle: string;
    outputDir: string;
}

export type DegenerateRange = Extract<RunCondition, { kind: 'DegenerateRange' }>;

export interface RangePlan {
    title: string;
    clipsDir: string;
    jobs: ClipJob[];
    dropped: DegenerateRange[];
}

export function computeRange(
    offsetSec: number,
    beforeSec: number,
    afterSec: number,
    durationSec: number
): { startSec: number; endSec: number } {
    return {
        startSec: Math.max(0, offsetSec - beforeSec),
        endSec: Math.min(durationSec, offsetSec + afterSec),
    };
}

/**
 * Maps entries to clamped [start, end] ranges and assigns each an output path.
 * Entries whose range collapses (start >= end) are dropped and reported.
 */
export function buildRanges(
    entries: readonly TimestampEntry[],
    opts: RangeOptions,
    registry: NamingRegistry
): RangePlan {
    const title = sanitizeFilename(opts.videoTitle);
    const clipsDir = clipsDirFor(opts.outputDir, title);
    const jobs: ClipJob[] = [];
    const dropped: DegenerateRange[] = [];

    for (const entry of entries) {
        const { startSec, endSec } = computeRange(
            entry.offsetSec,
            opts.beforeSec,
            opts.afterSec,
            opts.durationSec
        );
        if (startSec >= endSec) {
            dropped.push({
                kind: 'DegenerateRange',
                offsetSec: entry.offsetSec,
                label: entry.label,
                startSec,
                endSec,
            });
            continue;
        }
        const label = sanitizeFilename(entry.label, 'clip');
        const range: HighlightRange = { startSec, endSec, title, label, entry };
        const suffix = registry.assign(title, label);
        jobs.push({
            range,
            outputPath: path.join(clipsDir, clipFileName(title, entry.offsetSec, label, suffix)),
        });
    }
    return { title, clipsDir, jobs, dropped };
}
