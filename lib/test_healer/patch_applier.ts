import {HealingAction, PatchStrategy} from "@lib/types";
import {DEFAULT_FUZZY_MATCH_THRESHOLD, lineSimilarity, normalizeLine} from "@lib/test_healer/similarity";

export type PatchResult =
    | {
        applied: true;
        source: string;
        strategy: PatchStrategy;
        similarity: number;
        // 1-based, inclusive, in the original source
        startLine: number;
        endLine: number;
    }
    | {
        applied: false;
        // always the untouched input
        source: string;
        reason: string;
    };

export interface PatchOptions {
    threshold?: number;
}

interface SourceLine {
    text: string;
    // offsets into the source; `end` stops before the line terminator
    start: number;
    end: number;
}

interface LineSpan {
    index: number;
    length: number;
}

const splitSourceLines = (source: string): SourceLine[] => {
    const lines: SourceLine[] = [];
    let start = 0;
    for (const raw of source.split("\n")) {
        const text = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
        lines.push({text, start, end: start + text.length});
        start += raw.length + 1;
    }
    return lines;
};

const splitBlockLines = (block: string): string[] => {
    const lines = block.split(/\r?\n/);
    while (lines.length > 0 && lines[0].trim() === "") lines.shift();
    while (lines.length > 0 && lines[lines.length - 1].trim() === "") lines.pop();
    return lines;
};

const leadingWhitespace = (line: string): string => line.slice(0, line.length - line.trimStart().length);

const findOccurrences = (haystack: string, needle: string): number[] => {
    const positions: number[] = [];
    for (let at = haystack.indexOf(needle); at !== -1; at = haystack.indexOf(needle, at + 1)) {
        positions.push(at);
    }
    return positions;
};

const lineNumberAt = (source: string, offset: number): number => {
    let line = 1;
    for (let i = 0; i < offset; i++) {
        if (source[i] === "\n") line++;
    }
    return line;
};

/**
 * Re-indents `fixedCode` onto `baseIndent`, keeping the nesting of its lines
 * relative to each other.
 */
export const reindentBlock = (fixedCode: string, baseIndent: string, eol: string): string => {
    const lines = splitBlockLines(fixedCode);
    const indents = lines
        .filter(line => line.trim() !== "")
        .map(line => leadingWhitespace(line).length);
    const commonIndent = indents.length > 0 ? Math.min(...indents) : 0;
    return lines
        .map(line => line.trim() === "" ? "" : baseIndent + line.slice(commonIndent))
        .join(eol);
};

const rejected = (source: string, reason: string): PatchResult => ({applied: false, source, reason});

const replaceLineSpan = (
    source: string,
    lines: SourceLine[],
    span: LineSpan,
    action: HealingAction,
    strategy: PatchStrategy,
    similarity: number,
): PatchResult => {
    const first = lines[span.index];
    const last = lines[span.index + span.length - 1];
    const eol = source.includes("\r\n") ? "\r\n" : "\n";
    const replacement = reindentBlock(action.fixedCode, leadingWhitespace(first.text), eol);
    const patched = source.slice(0, first.start) + replacement + source.slice(last.end);
    if (patched === source) {
        return rejected(source, "Patch would not change the file");
    }
    return {
        applied: true,
        source: patched,
        strategy,
        similarity,
        startLine: span.index + 1,
        endLine: span.index + span.length,
    };
};

const findNormalizedWindows = (lines: SourceLine[], target: string[]): number[] => {
    const normalizedTarget = target.map(normalizeLine);
    const matches: number[] = [];
    for (let i = 0; i + target.length <= lines.length; i++) {
        let equal = true;
        for (let k = 0; k < target.length && equal; k++) {
            equal = normalizeLine(lines[i + k].text) === normalizedTarget[k];
        }
        if (equal) {
            matches.push(i);
        }
    }
    return matches;
};

const scoreWindows = (lines: SourceLine[], target: string[]): number[] => {
    const texts = lines.map(line => line.text);
    const scores: number[] = [];
    for (let i = 0; i + target.length <= texts.length; i++) {
        scores.push(lineSimilarity(texts.slice(i, i + target.length), target));
    }
    return scores;
};

/**
 * Replaces the block `action.originalCode` in `source` with
 * `action.fixedCode`. Strategies are tried in order: exact substring,
 * whitespace-normalized lines, then the most similar window of the same line
 * count. Any ambiguity or a miss is a rejection, with `source` unchanged.
 */
export const applyPatch = (source: string, action: HealingAction, options: PatchOptions = {}): PatchResult => {
    const threshold = options.threshold ?? DEFAULT_FUZZY_MATCH_THRESHOLD;
    const target = splitBlockLines(action.originalCode);

    if (target.length === 0) {
        return rejected(source, "Proposed original code is empty");
    }
    if (action.originalCode === action.fixedCode) {
        return rejected(source, "Proposed fix is identical to the original code");
    }

    // 1. exact
    const positions = findOccurrences(source, action.originalCode);
    if (positions.length > 1) {
        return rejected(source, `Original code occurs ${positions.length} times; refusing an ambiguous replacement`);
    }
    if (positions.length === 1) {
        const at = positions[0];
        const startLine = lineNumberAt(source, at);
        return {
            applied: true,
            source: source.slice(0, at) + action.fixedCode + source.slice(at + action.originalCode.length),
            strategy: "exact",
            similarity: 1,
            startLine,
            endLine: startLine + (action.originalCode.match(/\n/g)?.length ?? 0),
        };
    }

    const lines = splitSourceLines(source);
    if (target.length > lines.length) {
        return rejected(source, "Original code is longer than the file");
    }

    // 2. whitespace-normalized
    const windows = findNormalizedWindows(lines, target);
    if (windows.length > 1) {
        return rejected(source, `Original code matches ${windows.length} blocks after whitespace normalization`);
    }
    if (windows.length === 1) {
        return replaceLineSpan(source, lines, {index: windows[0], length: target.length}, action, "whitespace", 1);
    }

    // 3. similarity window
    const scores = scoreWindows(lines, target);
    const best = Math.max(...scores);
    if (best < threshold) {
        return rejected(source, `Best similarity ${best.toFixed(3)} is below the acceptance threshold ${threshold}`);
    }
    const bestWindows = scores.flatMap((score, index) => score === best ? [index] : []);
    if (bestWindows.length > 1) {
        return rejected(source, `${bestWindows.length} blocks tie at similarity ${best.toFixed(3)}`);
    }
    return replaceLineSpan(source, lines, {index: bestWindows[0], length: target.length}, action, "similarity", best);
};
