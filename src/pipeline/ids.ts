export function toVideoId(videoOrUrl: string): string {
  // Extracts YouTube video ID from watch/short/shorts/embed URLs or returns the input if it looks like an ID
  const urlMatch = videoOrUrl.match(/[?&]v=([a-zA-Z0-9_-]{6,})/);
  if (urlMatch) return urlMatch[1];
  const short = videoOrUrl.match(/(?:youtu\.be|\/shorts|\/embed|\/live)\/([a-zA-Z0-9_-]{6,})/);
  if (short) return short[1];
  if (/^[a-zA-Z0-9_-]{6,}$/.test(videoOrUrl)) return videoOrUrl;
  // Anything else (non-YouTube URL): derive a filesystem-safe slug
  return videoOrUrl.replace(/^[a-z]+:\/\//i, '').replace(/[^a-zA-Z0-9_-]+/g, '_').slice(0, 64) || 'video';
}
