import { describe, it, expect } from 'vitest';
import { assembleReel, extractClips } from '../src/pipeline/clips';
import { ConcatError } from '../src/pipeline/errors';
import { NamingRegistry } from '../src/pipeline/naming';
import { buildRanges } from '../src/pipeline/ranges';
import { extractTimestamps } from '../src/pipeline/timestamps';
import { FakeTrimmer } from './fakes';

const plan = buildRanges(
  extractTimestamps('0:30 Goal City\n1:15 Penalty Cardiff\n2:00 Goal City'),
  { beforeSec: 5, afterSec: 10, durationSec: 600, videoTitle: 'Final', outputDir: 'out' },
  new NamingRegistry()
);

describe('extractClips', () => {
  it('cuts every job in order', async () => {
    const trimmer = new FakeTrimmer();
    const res = await extractClips(plan.jobs, 'out/source.mp4', trimmer);
    expect(trimmer.extracted.map((c) => [c.source, c.startSec, c.endSec])).toEqual([
      ['out/source.mp4', 25, 40],
      ['out/source.mp4', 70, 85],
      ['out/source.mp4', 115, 130],
    ]);
    expect(res.clips).toEqual(plan.jobs.map((j) => j.outputPath));
    expect(res.succeeded).toEqual(plan.jobs);
    expect(res.failures).toEqual([]);
  });

  it('skips a failing range and keeps going', async () => {
    const trimmer = new FakeTrimmer();
    const failing = plan.jobs[1].outputPath;
    trimmer.failWhen = (p) => p === failing;
    const res = await extractClips(plan.jobs, 'out/source.mp4', trimmer);
    expect(res.clips).toEqual([plan.jobs[0].outputPath, plan.jobs[2].outputPath]);
    expect(res.failures).toEqual([
      {
        kind: 'ClipExtractionFailed',
        offsetSec: 75,
        label: 'Penalty Cardiff',
        startSec: 70,
        endSec: 85,
        outputPath: failing,
        error: 'cannot cut 70-85',
      },
    ]);
  });

  it('returns no clips when every range fails', async () => {
    const trimmer = new FakeTrimmer();
    trimmer.failWhen = () => true;
    const res = await extractClips(plan.jobs, 'out/source.mp4', trimmer);
    expect(res.clips).toEqual([]);
    expect(res.failures).toHaveLength(3);
  });
});

describe('assembleReel', () => {
  it('joins clips in the given order', async () => {
    const trimmer = new FakeTrimmer();
    await expect(assembleReel(['b.mp4', 'a.mp4'], 'out/Final_highlights.mp4', trimmer)).resolves.toBe(
      'out/Final_highlights.mp4'
    );
    expect(trimmer.concatenated).toEqual([{ clips: ['b.mp4', 'a.mp4'], outputPath: 'out/Final_highlights.mp4' }]);
  });

  it('propagates concat failures', async () => {
    const trimmer = new FakeTrimmer();
    trimmer.failConcat = true;
    await expect(assembleReel(['a.mp4'], 'out/r.mp4', trimmer)).rejects.toThrow(ConcatError);
  });
});
