import path from 'path';
import { formatTimestamp } from './timestamps';

// Characters rejected by common filesystems, plus ASCII control characters.
// eslint-disable-next-line no-control-regex
const ILLEGAL_CHARS = /[<>:"/\\|?*\u0000-\u001f]/g;
// Byte budget for a sanitized title or label. Two of them plus timestamp,
// suffix and extension stay under the 255-byte limit on a path component.
export const MAX_NAME_BYTES = 100;

/** Longest prefix of s that fits in maxBytes of UTF-8, never splitting a code point. */
export function truncateUtf8(s: string, maxBytes: number): string {
    if (Buffer.byteLength(s, 'utf8') <= maxBytes) return s;
    let out = '';
    let bytes = 0;
    for (const ch of s) {
        const n = Buffer.byteLength(ch, 'utf8');
        if (bytes + n > maxBytes) break;
        out += ch;
        bytes += n;
    }
    return out;
}

export function sanitizeFilename(name: string, fallback = 'untitled'): string {
    const cleaned = name
        .trim()
        .replace(/\s+/g, '_')
        .replace(ILLEGAL_CHARS, '')
        .replace(/^\.+|\.+$/g, '');
    return truncateUtf8(cleaned, MAX_NAME_BYTES).replace(/\.+$/, '') || fallback;
}

/**
 * Per-run occurrence counter for (title, label) pairs. The first occurrence
 * gets no suffix, later ones `_1`, `_2`, ... in the order they are assigned.
 */
export class NamingRegistry {
    private counts = new Map<string, number>();

    assign(title: string, label: string): string {
        const key = JSON.stringify([title, label]);
        const seen = this.counts.get(key) ?? 0;
        this.counts.set(key, seen + 1);
        return seen === 0 ? '' : `_${seen}`;
    }
}

export function timestampSlug(offsetSec: number): string {
    return formatTimestamp(offsetSec).replace(/:/g, '-');
}

export function clipFileName(title: string, offsetSec: number, label: string, suffix = ''): string {
    return `${title}-${timestampSlug(offsetSec)}_${label}${suffix}.mp4`;
}

export function clipsDirFor(outputDir: string, title: string): string {
    return path.join(outputDir, 'clips', `${title}-highlights`);
}

export function reelPathFor(outputDir: string, title: string): string {
    return path.join(outputDir, `${title}_highlights.mp4`);
}
