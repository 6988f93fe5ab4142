import path from 'path';
import { describe, it, expect } from 'vitest';
import {
  clipFileName,
  clipsDirFor,
  NamingRegistry,
  reelPathFor,
  sanitizeFilename,
  timestampSlug,
  truncateUtf8,
} from '../src/pipeline/naming';

describe('sanitizeFilename', () => {
  it.each([
    ['My Video Title', 'My_Video_Title'],
    ['Special*Chars?<>:', 'SpecialChars'],
    ['Another/Example\\Path', 'AnotherExamplePath'],
    ['  Remove trailing spaces  ', 'Remove_trailing_spaces'],
    ['Numbers123 and Hyphens-', 'Numbers123_and_Hyphens-'],
    ['Goal!!! What a shot!', 'Goal!!!_What_a_shot!'],
    ['...hidden.', 'hidden'],
    ['tab\there', 'tab_here'],
    ['already_safe_filename_123', 'already_safe_filename_123'],
  ])('%j -> %j', (input, expected) => {
    expect(sanitizeFilename(input)).toBe(expected);
  });

  it('falls back when nothing usable remains', () => {
    expect(sanitizeFilename('')).toBe('untitled');
    expect(sanitizeFilename('???', 'clip')).toBe('clip');
  });

  it('caps the length in UTF-8 bytes', () => {
    expect(sanitizeFilename('a'.repeat(300))).toBe('a'.repeat(100));
    // 3 bytes per character: 33 characters fit in 100 bytes
    expect(sanitizeFilename('決勝戦ハイライト'.repeat(19))).toBe('決勝戦ハイライト'.repeat(4) + '決');
  });

  it('does not split a surrogate pair when cutting', () => {
    expect(sanitizeFilename('a' + '😀'.repeat(30))).toBe('a' + '😀'.repeat(24));
  });

  it('drops dots left at the end by the cut', () => {
    expect(sanitizeFilename('b'.repeat(99) + '...x')).toBe('b'.repeat(99));
  });
});

describe('truncateUtf8', () => {
  it('returns short strings unchanged', () => {
    expect(truncateUtf8('héllo', 6)).toBe('héllo');
  });

  it('stops before a character that would overflow', () => {
    // é is 2 bytes: h(1) + é(2) + l(1) = 4, the next é would make 6
    expect(truncateUtf8('héléna', 5)).toBe('hél');
  });
});

describe('NamingRegistry', () => {
  it('suffixes repeats of the same pair in encounter order', () => {
    const reg = new NamingRegistry();
    expect(reg.assign('Final', 'Goal')).toBe('');
    expect(reg.assign('Final', 'Goal')).toBe('_1');
    expect(reg.assign('Final', 'Save')).toBe('');
    expect(reg.assign('Final', 'Goal')).toBe('_2');
    expect(reg.assign('Final', 'Save')).toBe('_1');
  });

  it('does not confuse pairs that concatenate to the same string', () => {
    const reg = new NamingRegistry();
    expect(reg.assign('a_b', 'c')).toBe('');
    expect(reg.assign('a', 'b_c')).toBe('');
  });

  it('starts fresh for every instance', () => {
    new NamingRegistry().assign('Final', 'Goal');
    expect(new NamingRegistry().assign('Final', 'Goal')).toBe('');
  });
});

describe('output layout', () => {
  it('names clips <title>-<timestamp>_<label>[_N].mp4', () => {
    expect(timestampSlug(30)).toBe('0-30');
    expect(timestampSlug(3725)).toBe('1-02-05');
    expect(clipFileName('Final', 30, 'Goal_City')).toBe('Final-0-30_Goal_City.mp4');
    expect(clipFileName('Final', 30, 'Goal_City', '_1')).toBe('Final-0-30_Goal_City_1.mp4');
  });

  it('keeps every path component of a long multibyte title under 255 bytes', () => {
    const title = sanitizeFilename('決勝戦ハイライト'.repeat(19));
    const label = sanitizeFilename('ゴール'.repeat(60), 'clip');
    const components = [
      clipFileName(title, 36000, label, '_12'),
      path.basename(clipsDirFor('out', title)),
      path.basename(reelPathFor('out', title)),
    ];
    for (const c of components) {
      expect(Buffer.byteLength(c, 'utf8')).toBeLessThanOrEqual(255);
    }
  });

  it('places clips and reel under the output dir', () => {
    expect(clipsDirFor('out', 'Final')).toBe(path.join('out', 'clips', 'Final-highlights'));
    expect(reelPathFor('out', 'Final')).toBe(path.join('out', 'Final_highlights.mp4'));
  });
});
