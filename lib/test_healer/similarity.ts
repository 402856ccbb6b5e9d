/**
 * Minimum similarity for a window to be accepted by the similarity match
 * strategy of the patch applier.
 */
export const DEFAULT_FUZZY_MATCH_THRESHOLD = 0.85;

/**
 * Edit distance between two strings, using two rolling rows.
 */
export function levenshteinDistance(a: string, b: string): number {
    if (a === b) return 0;
    if (a.length === 0) return b.length;
    if (b.length === 0) return a.length;

    let previous = Array.from({length: b.length + 1}, (_, j) => j);
    let current = new Array<number>(b.length + 1).fill(0);

    for (let i = 1; i <= a.length; i++) {
        current[0] = i;
        for (let j = 1; j <= b.length; j++) {
            const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
            current[j] = Math.min(
                previous[j] + 1,     // deletion
                current[j - 1] + 1,  // insertion
                substitution,
            );
        }
        [previous, current] = [current, previous];
    }
    return previous[b.length];
}

export const normalizeLine = (line: string): string => line.trim();

/**
 * Similarity of two line sequences in [0, 1]. Lines are compared without
 * their surrounding whitespace; 1 means identical after trimming.
 */
export function lineSimilarity(a: readonly string[], b: readonly string[]): number {
    const left = a.map(normalizeLine).join("\n");
    const right = b.map(normalizeLine).join("\n");
    const longest = Math.max(left.length, right.length);
    if (longest === 0) {
        return 1;
    }
    return 1 - levenshteinDistance(left, right) / longest;
}
