import fs from "fs-extra";
import { ENV } from "./env";
import { assembleReel, type ClipTrimmer, extractClips } from "./clips";
import { errorMessage, NoTimestampsFoundError } from "./errors";
import { FfmpegTrimmer } from "./ffmpeg";
import { filterByKeywords } from "./filter";
import { info, warn } from "./log";
import { NamingRegistry, reelPathFor } from "./naming";
import { normalizeDescription, type TextCompletionClient } from "./normalize";
import { buildRanges } from "./ranges";
import { countNonEmptyLines, extractTimestamps } from "./timestamps";
import type {
  ClipJob,
  HighlightOptions,
  RunCondition,
  RunResult,
  RunState,
  TimestampEntry,
  VideoInfo,
} from "./types";
import { type MediaSource, YtdlpMediaSource } from "./ytdlp";

export interface DurationProbe {
  probeDuration(file: string): Promise<number>;
}

export interface RunDeps {
  media?: MediaSource;
  trimmer?: ClipTrimmer;
  /** used when the media metadata has no duration */
  probe?: DurationProbe;
  completion?: TextCompletionClient;
  apiKey?: string;
  model?: string;
}

export class RunTracker {
  private current: RunState = "start";
  readonly history: RunState[] = ["start"];

  get state(): RunState {
    return this.current;
  }

  to(next: RunState, meta?: Record<string, unknown>) {
    info("run.state", { from: this.current, to: next, ...meta });
    this.current = next;
    this.history.push(next);
  }
}

export async function runHighlights(
  opts: HighlightOptions,
  deps: RunDeps = {},
  tracker: RunTracker = new RunTracker()
): Promise<RunResult> {
  const ffmpeg = new FfmpegTrimmer({ ffmpegBin: opts.ffmpegPath });
  const media = deps.media ?? new YtdlpMediaSource();
  const trimmer = deps.trimmer ?? ffmpeg;
  const probe = deps.probe ?? ffmpeg;
  const apiKey = deps.apiKey ?? ENV.geminiApiKey;
  const conditions: RunCondition[] = [];
  const startTs = Date.now();

  let video: VideoInfo | undefined;
  let entries: TimestampEntry[] = [];
  let matched: TimestampEntry[] = [];

  const finish = (
    outcome: RunResult["outcome"],
    extra: { sourcePath?: string; reelPath?: string; clips?: ClipJob[] } = {}
  ): RunResult => {
    if (!video) throw new Error("run finished before video info was fetched");
    if (outcome === "no-highlights") {
      warn("run.no-highlights", { url: opts.url, entries: entries.length, matched: matched.length });
    }
    tracker.to("done", { outcome, durationMs: Date.now() - startTs });
    return {
      state: "done",
      outcome,
      video,
      entries,
      matched,
      clips: extra.clips ?? [],
      sourcePath: extra.sourcePath,
      reelPath: extra.reelPath,
      conditions,
    };
  };

  try {
    await fs.ensureDir(opts.outputDir);

    tracker.to("fetching", { url: opts.url });
    video = await media.info(opts.url);

    if (deps.completion || apiKey) tracker.to("normalizing");
    const normalized = await normalizeDescription(video.description, {
      apiKey,
      model: deps.model ?? ENV.geminiModel,
      client: deps.completion,
    });
    if (!normalized.normalized) {
      conditions.push({ kind: "NormalizationSkipped", reason: normalized.reason ?? "unknown" });
    }
    const description = normalized.text;

    tracker.to("extracting");
    entries = extractTimestamps(description);
    if (!entries.length && description.trim()) {
      throw new NoTimestampsFoundError(countNonEmptyLines(description));
    }
    info("timestamps.extracted", { count: entries.length });

    tracker.to("filtering", { keywords: opts.keywords });
    matched = filterByKeywords(entries, opts.keywords);
    info("timestamps.matched", { count: matched.length });
    if (!matched.length) return finish("no-highlights");

    tracker.to("downloading");
    const sourcePath = await media.download(video, opts.outputDir);
    const durationSec = video.durationSec ?? (await probe.probeDuration(sourcePath));

    tracker.to("building-ranges", { durationSec });
    const plan = buildRanges(
      matched,
      {
        beforeSec: opts.beforeSec,
        afterSec: opts.afterSec,
        durationSec,
        videoTitle: video.title,
        outputDir: opts.outputDir,
      },
      new NamingRegistry()
    );
    for (const d of plan.dropped) {
      warn("range.degenerate", { ...d });
      conditions.push(d);
    }

    tracker.to("extracting-clips", { jobs: plan.jobs.length, dir: plan.clipsDir });
    const batch = await extractClips(plan.jobs, sourcePath, trimmer);
    conditions.push(...batch.failures);
    if (!batch.clips.length) return finish("no-highlights", { sourcePath });

    tracker.to("concatenating");
    const reelPath = await assembleReel(batch.clips, reelPathFor(opts.outputDir, plan.title), trimmer);
    return finish("reel", { sourcePath, reelPath, clips: batch.succeeded });
  } catch (e) {
    tracker.to("failed", { error: errorMessage(e) });
    throw e;
  }
}
