export interface VideoInfo {
  id: string;
  url: string;
  title: string;
  description: string;
  durationSec?: number;
}

export interface TimestampEntry {
  readonly offsetSec: number;
  readonly label: string;
  /** timestamp as written in the description, e.g. "1:02:03" */
  readonly token: string;
  /** 1-based line number in the parsed text */
  readonly line: number;
}

export interface HighlightRange {
  startSec: number;
  endSec: number;
  /** sanitized video title */
  title: string;
  /** sanitized entry label */
  label: string;
  entry: TimestampEntry;
}

export interface ClipJob {
  range: HighlightRange;
  outputPath: string;
}

export type RunCondition =
  | { kind: 'NormalizationSkipped'; reason: string }
  | {
      kind: 'DegenerateRange';
      offsetSec: number;
      label: string;
      startSec: number;
      endSec: number;
    }
  | {
      kind: 'ClipExtractionFailed';
      offsetSec: number;
      label: string;
      startSec: number;
      endSec: number;
      outputPath: string;
      error: string;
    };

export type RunState =
  | 'start'
  | 'fetching'
  | 'normalizing'
  | 'extracting'
  | 'filtering'
  | 'downloading'
  | 'building-ranges'
  | 'extracting-clips'
  | 'concatenating'
  | 'done'
  | 'failed';

export interface HighlightOptions {
  url: string;
  keywords: string[];
  beforeSec: number;
  afterSec: number;
  outputDir: string;
  ffmpegPath?: string;
}

export interface RunResult {
  state: 'done';
  outcome: 'reel' | 'no-highlights';
  video: VideoInfo;
  sourcePath?: string;
  reelPath?: string;
  entries: TimestampEntry[];
  matched: TimestampEntry[];
  clips: ClipJob[];
  conditions: RunCondition[];
}
