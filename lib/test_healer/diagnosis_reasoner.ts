import {existsSync, readFileSync} from "fs";
import {extname} from "path";
import {FailureClassification, FailureEvidence, HealingAction, HealingErrorCode} from "@lib/types";
import {ImageMediaType, ModelBackend, ModelImage} from "@lib/test_healer/model_client.types";
import {PromptGenerator} from "@lib/test_healer/prompt_generator";
import {parseDiagnosisResponse} from "@lib/test_healer/json_parser";
import {formatErrorMessage} from "@lib/test_healer/utils";

// Model estimates stay strictly below the deterministic heuristic confidence
export const MAX_MODEL_CONFIDENCE = 0.99;

export type DiagnosisOutcome =
    | {
        status: "diagnosed";
        classification: FailureClassification;
        failureSummary: string;
        hypothesis: string;
        reasoningSteps: string[];
        // null when the model judged that no test change can fix the failure
        action: HealingAction | null;
    }
    | {
        status: "failed";
        code: Extract<HealingErrorCode, "REASONING_PARSE_FAILURE" | "REASONING_BACKEND_UNAVAILABLE">;
        message: string;
    };

const MEDIA_TYPES: Record<string, ImageMediaType> = {
    ".png": "image/png",
    ".jpg": "image/jpeg",
    ".jpeg": "image/jpeg",
};

export const loadScreenshot = (screenshotPath: string | null): ModelImage | undefined => {
    if (!screenshotPath || !existsSync(screenshotPath)) {
        return undefined;
    }
    const mediaType = MEDIA_TYPES[extname(screenshotPath).toLowerCase()];
    if (!mediaType) {
        return undefined;
    }
    try {
        return {mediaType, base64Data: readFileSync(screenshotPath).toString("base64")};
    } catch (e) {
        console.log(`   ⚠️  Could not read screenshot ${screenshotPath}: ${formatErrorMessage(e)}`);
        return undefined;
    }
};

export class DiagnosisReasoner {
    constructor(
        private modelBackend: ModelBackend,
        private promptGenerator: PromptGenerator,
    ) {
    }

    /**
     * One model call, no retries. A malformed or missing response fails the
     * diagnosis; the orchestrator decides whether another attempt follows.
     */
    diagnose = async (
        testFile: string,
        fileSource: string,
        evidence: FailureEvidence,
        heuristicHint: FailureClassification | null,
    ): Promise<DiagnosisOutcome> => {
        console.log(`\n🧠 Asking the model for a diagnosis${heuristicHint ? ` (prior: ${heuristicHint.kind})` : ""}...`);
        const text = await this.modelBackend.complete({
            systemPrompt: this.promptGenerator.getSystemPrompt(heuristicHint),
            userPrompt: this.promptGenerator.buildUserPrompt(testFile, fileSource, evidence),
            image: loadScreenshot(evidence.screenshotPath),
        });

        if (text === undefined) {
            return {
                status: "failed",
                code: "REASONING_BACKEND_UNAVAILABLE",
                message: "The model backend returned no response",
            };
        }

        const parsed = parseDiagnosisResponse(text);
        if (!parsed.ok) {
            parsed.errors.forEach(err => console.log(`   - ${err}`));
            return {
                status: "failed",
                code: "REASONING_PARSE_FAILURE",
                message: `Model response did not match the diagnosis schema: ${parsed.errors.join("; ")}`,
            };
        }

        const response = parsed.response;
        const action = response.action_taken.original_code.trim() === ""
            ? null
            : {
                originalCode: response.action_taken.original_code,
                fixedCode: response.action_taken.fixed_code,
                description: response.action_taken.description,
            };

        return {
            status: "diagnosed",
            classification: {
                kind: response.failure_type,
                confidence: Math.min(response.confidence_score, MAX_MODEL_CONFIDENCE),
                reason: response.failure_summary,
                source: "model",
            },
            failureSummary: response.failure_summary,
            hypothesis: response.hypothesis,
            reasoningSteps: response.reasoning_steps,
            action,
        };
    };
}
