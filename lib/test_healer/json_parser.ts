import {z} from "zod";
import {FAILURE_KINDS} from "@lib/types";
import {DiagnosisResponse} from "./model_client.response.types";

const HealingActionResponseSchema = z.object({
    original_code: z.string(),
    fixed_code: z.string(),
    description: z.string(),
}).strict();

const DiagnosisResponseSchema = z.object({
    failure_type: z.enum(FAILURE_KINDS),
    failure_summary: z.string().min(1),
    hypothesis: z.string().min(1),
    confidence_score: z.number().min(0).max(1),
    reasoning_steps: z.array(z.string()),
    action_taken: HealingActionResponseSchema,
}).strict();

export type ParseResult =
    | {ok: true; response: DiagnosisResponse}
    | {ok: false; errors: string[]};

const formatZodErrors = (error: z.ZodError): string[] => {
    return error.errors.map(err => {
        const path = err.path.join(".");
        if (err.code === "unrecognized_keys") {
            return `${path ? path + ": " : ""}Unexpected field(s) [${err.keys.join(", ")}] - these may belong at a different level in the schema`;
        }
        return `${path ? path + ": " : ""}${err.message}`;
    });
};

// Tab, newline and carriage return are kept here; escapeLineBreaksInStrings handles them inside strings
const stripControlCharacters = (text: string): string =>
    text.replace(/[\x00-\x08\x0b\x0c\x0e-\x1f\x7f]/g, "");

const LINE_BREAK_ESCAPES: Record<string, string> = {"\n": "\\n", "\r": "\\r", "\t": "\\t"};

/**
 * Models often copy multi-line code into a string verbatim. JSON.parse
 * rejects raw tabs and line breaks inside strings, so they are escaped;
 * whitespace between tokens is left alone.
 */
const escapeLineBreaksInStrings = (text: string): string => {
    let result = "";
    let inString = false;
    let escapeNext = false;

    for (const char of text) {
        if (escapeNext) {
            escapeNext = false;
            result += char;
            continue;
        }
        if (char === "\\") {
            escapeNext = inString;
            result += char;
            continue;
        }
        if (char === '"') {
            inString = !inString;
            result += char;
            continue;
        }
        result += inString ? LINE_BREAK_ESCAPES[char] ?? char : char;
    }
    return result;
};

const extractJsonFromText = (text: string): string | null => {
    const firstBrace = text.indexOf("{");
    if (firstBrace === -1) {
        return null;
    }

    let depth = 0;
    let lastBrace = -1;
    let inString = false;
    let escapeNext = false;

    for (let i = firstBrace; i < text.length; i++) {
        const char = text[i];

        if (escapeNext) {
            escapeNext = false;
            continue;
        }

        if (char === "\\") {
            escapeNext = true;
            continue;
        }

        if (char === '"') {
            inString = !inString;
            continue;
        }

        if (!inString) {
            if (char === "{") {
                depth++;
            } else if (char === "}") {
                depth--;
                if (depth === 0) {
                    lastBrace = i;
                    break;
                }
            }
        }
    }

    if (lastBrace === -1) {
        return null;
    }

    return text.slice(firstBrace, lastBrace + 1);
};

// A ```json fence wins; otherwise the first fenced block that holds an object
const unwrapCodeFence = (text: string): string => {
    const labelled = /```json\s*\n([\s\S]*?)```/.exec(text);
    if (labelled) {
        return labelled[1];
    }
    for (const block of text.matchAll(/```[\w-]*[ \t]*\n([\s\S]*?)```/g)) {
        if (block[1].trim().startsWith("{")) {
            return block[1];
        }
    }
    return text;
};

/**
 * Parses the model's diagnosis. Anything that does not match the schema
 * exactly is rejected, never coerced.
 */
export const parseDiagnosisResponse = (text: string): ParseResult => {
    const jsonText = stripControlCharacters(unwrapCodeFence(text.trim())).trim();

    let parsed: unknown;
    try {
        parsed = JSON.parse(escapeLineBreaksInStrings(jsonText));
    } catch {
        const extracted = extractJsonFromText(jsonText);
        if (!extracted) {
            return {ok: false, errors: ["No JSON object found in response"]};
        }
        try {
            parsed = JSON.parse(escapeLineBreaksInStrings(extracted));
        } catch (e) {
            return {ok: false, errors: ["Failed to parse JSON: " + String(e)]};
        }
    }

    const result = DiagnosisResponseSchema.safeParse(parsed);
    if (!result.success) {
        return {ok: false, errors: formatZodErrors(result.error)};
    }
    return {ok: true, response: result.data};
};
