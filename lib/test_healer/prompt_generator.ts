import {readFileSync} from "fs";
import {join} from "path";
import {FailureClassification, FailureEvidence} from "@lib/types";
import {combinedLogs} from "@lib/test_healer/heuristic_classifier";
import {truncateText} from "@lib/test_healer/utils";

export const MAX_LOG_CHARS = 4000;

const RESPONSE_TYPES_PATH = join(__dirname, "model_client.response.types.ts");

let responseFormat: string | undefined;

// The response interfaces double as the output format shown to the model
export const getDiagnosisOutputFormat = (): string => {
    if (responseFormat === undefined) {
        responseFormat = readFileSync(RESPONSE_TYPES_PATH, "utf8");
    }
    return responseFormat;
};

export class PromptGenerator {

    getSystemPrompt(heuristicHint: FailureClassification | null): string {
        const hintPrompt = heuristicHint ? [
            "## PRIOR DIAGNOSIS",
            "",
            "A deterministic log classifier already matched a known failure signature:",
            `- Failure type: ${heuristicHint.kind}`,
            `- Confidence: ${heuristicHint.confidence}`,
            `- Reason: ${heuristicHint.reason}`,
            "",
            "Treat this as a strong prior. Confirm it, or override it if the logs, code or screenshot contradict it,",
            "and say why in your reasoning steps.",
            "",
        ] : [
            "## PRIOR DIAGNOSIS",
            "",
            "No known failure signature matched the logs. Classify the failure from the evidence alone.",
            "",
        ];
        return [
            "You are an expert Playwright test maintenance engineer.",
            "",
            "Your job is to:",
            "1. Diagnose why the end-to-end test below failed",
            "2. Decide whether a change to the TEST code can repair it",
            "3. Propose the smallest possible fix as a single contiguous code block",
            "",
            ...hintPrompt,
            "## GUIDELINES",
            "",
            "1. `original_code` must be copied VERBATIM from the test file, including indentation",
            "2. `original_code` must be one contiguous block that appears exactly once in the file",
            "3. Change as little as possible - usually a single selector, wait or assertion",
            "4. Prefer stable selectors (ids, data-testid, roles with accessible names) when replacing locators",
            "5. If the failure is caused by the application or the environment (HTTP 5xx, unreachable server,",
            "   crashed browser) do NOT edit the test: return empty strings for `original_code` and `fixed_code`",
            "",
            "## OUTPUT FORMAT",
            "",
            "Respond with ONE JSON object and nothing else. It must match the `DiagnosisResponse` interface:",
            "",
            "```typescript",
            getDiagnosisOutputFormat(),
            "```",
        ].join("\n");
    }

    buildUserPrompt(testFile: string, fileSource: string, evidence: FailureEvidence): string {
        const screenshotNote = evidence.screenshotPath
            ? ["", "A screenshot captured at the moment of failure is attached."]
            : [];
        return [
            `FILE: ${testFile}`,
            "",
            "TEST CODE:",
            "```typescript",
            fileSource,
            "```",
            "",
            `EXIT CODE: ${evidence.exitCode}${evidence.timedOut ? " (timed out)" : ""}`,
            "",
            "ERROR LOGS:",
            truncateText(combinedLogs(evidence), MAX_LOG_CHARS),
            ...screenshotNote,
        ].join("\n");
    }
}

export const promptGeneratorFactory = () => new PromptGenerator();
