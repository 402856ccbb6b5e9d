import {randomUUID} from "crypto";

export const generateTimestampString = () =>
    new Date().toISOString().replace(/:/g, '-').replace(/\..+/, '')

// Timestamp plus attempt and a random tail so two writes in the same second never collide
export const generateArtifactSuffix = (attempt: number) =>
    `${generateTimestampString()}_attempt${attempt}_${randomUUID().slice(0, 8)}`

const ANSI_ESCAPE = /\x1B(?:[@-Z\\-_]|\[[0-?]*[ -/]*[@-~])/g;

export const stripAnsiCodes = (text: string): string => text.replace(ANSI_ESCAPE, "");

export const truncateText = (text: string, maxChars: number): string => {
    if (text.length <= maxChars) {
        return text;
    }
    return `${text.slice(0, maxChars)}\n[TRUNCATED: ${text.length} chars, showing first ${maxChars}]`;
};

export const formatErrorMessage = (e: unknown): string =>
    e instanceof Error ? e.message : String(e);
