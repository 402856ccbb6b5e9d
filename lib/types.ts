export const FAILURE_KINDS = [
    "LOCATOR_DRIFT",
    "TIMEOUT",
    "ASSERTION_FAILED",
    "ENVIRONMENT_ISSUE",
    "POTENTIAL_APP_DEFECT",
] as const;

export type FailureKind = typeof FAILURE_KINDS[number];

export type ClassificationSource = "heuristic" | "model";

export type HealingErrorCode =
    | "COLLECTION_TIMEOUT"
    | "RUNNER_UNAVAILABLE"
    | "CLASSIFICATION_NONE"
    | "REASONING_PARSE_FAILURE"
    | "REASONING_BACKEND_UNAVAILABLE"
    | "REASONING_NO_ACTION"
    | "PATCH_NOT_APPLICABLE"
    | "VERIFICATION_FAILED"
    | "INTERNAL_ERROR";

export type HealingState =
    | "COLLECTING"
    | "CLASSIFYING"
    | "REASONING"
    | "PATCHING"
    | "VERIFYING"
    | "SUCCEEDED"
    | "EXHAUSTED";

export type TerminalState = Extract<HealingState, "SUCCEEDED" | "EXHAUSTED">;

/**
 * Snapshot of a single test run. Logs are stored without ANSI escape codes.
 */
export interface FailureEvidence {
    readonly testFile: string;
    readonly stdout: string;
    readonly stderr: string;
    readonly exitCode: number;
    readonly timedOut: boolean;
    readonly screenshotPath: string | null;
    readonly durationMs: number;
    readonly collectedAt: string;
}

export interface FailureClassification {
    readonly kind: FailureKind;
    // 1.0 for heuristic matches, a model estimate below 1.0 otherwise
    readonly confidence: number;
    readonly reason: string;
    readonly source: ClassificationSource;
    readonly ruleId?: string;
}

export interface HealingAction {
    readonly originalCode: string;
    readonly fixedCode: string;
    readonly description: string;
}

export type PatchStrategy = "exact" | "whitespace" | "similarity";

export type PatchOutcome =
    | {
        readonly applied: true;
        readonly strategy: PatchStrategy;
        readonly similarity: number;
        readonly startLine: number;
        readonly endLine: number;
    }
    | {
        readonly applied: false;
        readonly reason: string;
    };

export interface VerificationRecord {
    readonly passed: boolean;
    readonly exitCode: number;
    readonly durationMs: number;
    readonly logExcerpt: string;
}

export interface EvidenceSummary {
    readonly exitCode: number;
    readonly timedOut: boolean;
    readonly durationMs: number;
    readonly screenshotPath: string | null;
    readonly logExcerpt: string;
}

export type AttemptOutcome = "HEALED" | "FAILED";

/**
 * Unit of record for one healing attempt. Written once, never updated.
 */
export interface HealingDecision {
    readonly id: string;
    readonly testFile: string;
    readonly attempt: number;
    readonly maxAttempts: number;
    readonly timestamp: string;
    readonly heuristicHint: FailureClassification | null;
    // null means the failure could not be classified
    readonly classification: FailureClassification | null;
    readonly failureSummary: string;
    readonly hypothesis: string;
    readonly reasoningSteps: readonly string[];
    readonly action: HealingAction | null;
    readonly patch: PatchOutcome | null;
    readonly verification: VerificationRecord | null;
    readonly evidence: EvidenceSummary;
    readonly outcome: AttemptOutcome;
    readonly error: {readonly code: HealingErrorCode; readonly message: string} | null;
}

export type StageStatus = "ok" | "error" | "skipped";

export interface TimelineStage {
    readonly name: string;
    readonly startedAt: string;
    readonly endedAt: string;
    readonly status: StageStatus;
    readonly details: string;
}

export interface ExecutionTimeline {
    readonly testFile: string;
    readonly attempt: number;
    readonly startedAt: string;
    readonly endedAt: string;
    readonly stages: readonly TimelineStage[];
}

export interface RecordedArtifacts {
    readonly decisionPath: string;
    readonly timelinePath: string;
    readonly reportPath: string;
}
