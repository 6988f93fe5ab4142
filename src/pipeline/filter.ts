import type { TimestampEntry } from './types';

/** "Goal, City,,Cardiff " -> ["goal", "city", "cardiff"] */
export function parseKeywords(csv: string): string[] {
    return csv
        .split(',')
        .map((k) => k.trim().toLowerCase())
        .filter(Boolean);
}

/**
 * Keeps entries whose label contains any keyword, case-insensitively.
 * An empty keyword list matches nothing.
 */
export function filterByKeywords(
    entries: readonly TimestampEntry[],
    keywords: readonly string[]
): TimestampEntry[] {
    if (!keywords.length) return [];
    const folded = keywords.map((k) => k.toLowerCase());
    return entries.filter((e) => {
        const label = e.label.toLowerCase();
        return folded.some((k) => label.includes(k));
    });
}
