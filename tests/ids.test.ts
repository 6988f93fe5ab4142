import { describe, it, expect } from 'vitest';
import { toVideoId } from '../src/pipeline/ids';

describe('toVideoId', () => {
  it.each([
    ['https://www.youtube.com/watch?v=abc123XYZ_-&t=30', 'abc123XYZ_-'],
    ['https://youtu.be/abc123XYZ', 'abc123XYZ'],
    ['https://www.youtube.com/shorts/short12345', 'short12345'],
    ['https://www.youtube.com/embed/embed12345', 'embed12345'],
    ['https://www.youtube.com/live/live123456', 'live123456'],
    ['bareId_42', 'bareId_42'],
  ])('extracts the id from %s', (input, expected) => {
    expect(toVideoId(input)).toBe(expected);
  });

  it('slugs other URLs', () => {
    expect(toVideoId('https://example.com/v/clip 1')).toBe('example_com_v_clip_1');
  });
});
