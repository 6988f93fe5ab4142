import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { CommandError, MediaUnavailableError } from '../src/pipeline/errors';
import type { CommandRunner } from '../src/pipeline/exec';
import { parseVideoInfo, YtdlpMediaSource } from '../src/pipeline/ytdlp';

const URL = 'https://www.youtube.com/watch?v=abc123XYZ';

const META = JSON.stringify({
  id: 'abc123XYZ',
  title: 'Cup Final',
  description: '0:30 Goal City',
  duration: 600,
  webpage_url: URL,
});

function recorder(handler: (cmd: string, args: string[]) => Promise<string>) {
  const calls: Array<[string, string[]]> = [];
  const run: CommandRunner = async (cmd, args) => {
    calls.push([cmd, args]);
    return { stdout: await handler(cmd, args) };
  };
  return { run, calls };
}

describe('parseVideoInfo', () => {
  it('reads the fields it needs', () => {
    expect(parseVideoInfo(META, 'ignored')).toEqual({
      id: 'abc123XYZ',
      url: URL,
      title: 'Cup Final',
      description: '0:30 Goal City',
      durationSec: 600,
    });
  });

  it('uses the first playlist entry', () => {
    const json = JSON.stringify({ entries: [{ id: 'first1', title: 'First' }, { id: 'second', title: 'Second' }] });
    expect(parseVideoInfo(json, URL)).toMatchObject({ id: 'first1', title: 'First' });
  });

  it('fills gaps from the url', () => {
    const json = JSON.stringify({ title: 'No extras', description: null });
    expect(parseVideoInfo(json, URL)).toEqual({
      id: 'abc123XYZ',
      url: URL,
      title: 'No extras',
      description: '',
      durationSec: undefined,
    });
  });

  it('rejects metadata without a title', () => {
    expect(() => parseVideoInfo(JSON.stringify({ id: 'x' }), URL)).toThrow(MediaUnavailableError);
  });

  it('rejects invalid JSON', () => {
    expect(() => parseVideoInfo('not json', URL)).toThrow(/invalid metadata JSON/);
  });
});

describe('YtdlpMediaSource.info', () => {
  it('falls back to the python module when the binary is missing', async () => {
    const { run, calls } = recorder(async (cmd) => {
      if (cmd === 'yt-dlp') throw new CommandError('spawn yt-dlp ENOENT', cmd, { errno: 'ENOENT' });
      return META;
    });
    const video = await new YtdlpMediaSource(run).info(URL);
    expect(video.title).toBe('Cup Final');
    expect(calls).toEqual([
      ['yt-dlp', ['-J', '--no-playlist', URL]],
      ['python3', ['-m', 'yt_dlp', '-J', '--no-playlist', URL]],
    ]);
  });

  it('reports unreachable media', async () => {
    const { run } = recorder(async (cmd) => {
      throw new CommandError('exit 1', cmd, { exitCode: 1, stderr: 'ERROR: Private video' });
    });
    const err = await new YtdlpMediaSource(run).info(URL).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(MediaUnavailableError);
    expect(err).toMatchObject({ url: URL });
  });
});

describe('YtdlpMediaSource.download', () => {
  let dir: string;
  const video = { id: 'abc123XYZ', url: URL, title: 'Cup Final', description: '' };

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ytdlp-test-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('returns the path yt-dlp prints', async () => {
    const { run, calls } = recorder(async () => {
      const out = path.join(dir, 'abc123XYZ.mp4');
      await fs.writeFile(out, 'data');
      return `[download] done\n${out}\n`;
    });
    const local = await new YtdlpMediaSource(run).download(video, dir);
    expect(local).toBe(path.join(dir, 'abc123XYZ.mp4'));
    expect(calls[0][1]).toContain(path.join(dir, 'abc123XYZ.%(ext)s'));
    expect(calls[0][1].slice(-1)).toEqual([URL]);
  });

  it('finds the file by id when no path is printed', async () => {
    const { run } = recorder(async () => {
      await fs.writeFile(path.join(dir, 'abc123XYZ.webm.part'), '');
      await fs.writeFile(path.join(dir, 'abc123XYZ.webm'), 'data');
      return '';
    });
    await expect(new YtdlpMediaSource(run).download(video, dir)).resolves.toBe(path.join(dir, 'abc123XYZ.webm'));
  });

  it('fails when nothing was written', async () => {
    const { run } = recorder(async () => '');
    await expect(new YtdlpMediaSource(run).download(video, dir)).rejects.toThrow(MediaUnavailableError);
  });
});
