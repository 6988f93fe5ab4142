import type { TimestampEntry } from './types';

export interface ParsedLine {
    token: string;
    offsetSec: number;
    label: string;
}

// Optional indent and opening bracket, then a digit/colon run that must end on a digit
// and be followed by end of line or separator punctuation.
const LINE_RE = /^\s*[([]?(\d(?:[\d:]*\d)?)(?=$|[\s)\]\-–—:|.,])(.*)$/;
const LABEL_LEAD_RE = /^[)\]]?[\s\-–—:|.,]*/;

/**
 * Converts `M:SS` or `H:MM:SS` to whole seconds. Returns null for anything
 * else: a single group, more than three groups, empty or non-numeric groups,
 * a non two-digit minutes/seconds group, or minutes/seconds >= 60.
 */
export function parseTimestamp(token: string): number | null {
    const groups = token.split(':');
    if (groups.length < 2 || groups.length > 3) return null;
    if (!/^\d+$/.test(groups[0])) return null;
    for (const g of groups.slice(1)) {
        if (!/^\d{2}$/.test(g)) return null;
    }
    const nums = groups.map((g) => parseInt(g, 10));
    if (nums.length === 2) {
        const [m, s] = nums;
        if (m >= 60 || s >= 60) return null;
        return m * 60 + s;
    }
    const [h, m, s] = nums;
    if (m >= 60 || s >= 60) return null;
    return h * 3600 + m * 60 + s;
}

/** Inverse of parseTimestamp for whole seconds: `M:SS` below one hour, `H:MM:SS` above. */
export function formatTimestamp(totalSec: number): string {
    if (!Number.isFinite(totalSec) || totalSec < 0) {
        throw new RangeError(`Cannot format timestamp for ${totalSec}s`);
    }
    const whole = Math.floor(totalSec);
    const h = Math.floor(whole / 3600);
    const m = Math.floor((whole % 3600) / 60);
    const s = String(whole % 60).padStart(2, '0');
    if (h === 0) return `${m}:${s}`;
    return `${h}:${String(m).padStart(2, '0')}:${s}`;
}

export function parseDescriptionLine(line: string): ParsedLine | null {
    const match = LINE_RE.exec(line);
    if (!match) return null;
    const [, token, rest] = match;
    const offsetSec = parseTimestamp(token);
    if (offsetSec === null) return null;
    const label = rest.replace(LABEL_LEAD_RE, '').trimEnd();
    return { token, offsetSec, label };
}

/**
 * Scans text line by line. Lines whose leading token is not a valid
 * timestamp are skipped; duplicates are kept in the order they appear.
 */
export function extractTimestamps(text: string): TimestampEntry[] {
    const entries: TimestampEntry[] = [];
    text.split(/\r?\n/).forEach((raw, i) => {
        const parsed = parseDescriptionLine(raw);
        if (!parsed) return;
        entries.push(Object.freeze({ ...parsed, line: i + 1 }));
    });
    return entries;
}

export function countNonEmptyLines(text: string): number {
    return text.split(/\r?\n/).filter((l) => l.trim().length > 0).length;
}
