import {randomUUID} from "crypto";
import {readFileSync, writeFileSync} from "fs";
import {basename, extname, join} from "path";
import {
    EvidenceSummary,
    FailureClassification,
    FailureEvidence,
    HealingAction,
    HealingDecision,
    HealingErrorCode,
    HealingState,
    PatchOutcome,
    RecordedArtifacts,
    TerminalState,
    VerificationRecord,
} from "@lib/types";
import {
    EvidenceCollector,
    playwrightTestRunnerFactory,
    RUNNER_UNAVAILABLE_EXIT_CODE,
} from "@lib/test_healer/evidence_collector";
import {combinedLogs, HeuristicClassifier, HeuristicMatch} from "@lib/test_healer/heuristic_classifier";
import {DiagnosisReasoner} from "@lib/test_healer/diagnosis_reasoner";
import {applyPatch} from "@lib/test_healer/patch_applier";
import {Verifier} from "@lib/test_healer/verifier";
import {DecisionRecorder} from "@lib/test_healer/decision_recorder";
import {ExecutionTimelineRecorder} from "@lib/test_healer/execution_timeline";
import {HealingStageError, isHealingStageError} from "@lib/test_healer/errors";
import {loadHeuristicRules} from "@lib/test_healer/heuristic_rules";
import {anthropicModelClientFactory} from "@lib/test_healer/anthropic_model_client";
import {promptGeneratorFactory} from "@lib/test_healer/prompt_generator";
import {HealerConfig} from "@lib/test_healer/config";
import {formatErrorMessage, generateTimestampString, truncateText} from "@lib/test_healer/utils";

const LOG_EXCERPT_CHARS = 2000;

const PIPELINE_STAGES: HealingState[] = ["COLLECTING", "CLASSIFYING", "REASONING", "PATCHING", "VERIFYING"];

export interface HealingOrchestratorOptions {
    maxAttempts: number;
    fuzzyThreshold: number;
}

export interface HealingRunResult {
    testFile: string;
    finalState: TerminalState;
    attempts: number;
    // false when the first run already passed
    healingNeeded: boolean;
    // true when at least one accepted patch was written to the test file
    fileModified: boolean;
    decisions: HealingDecision[];
    artifacts: RecordedArtifacts[];
}

/**
 * Everything one attempt learns on its way through the states. Lives only
 * for that attempt; the decision is built from it once the attempt ends.
 */
interface AttemptDraft {
    evidence: FailureEvidence | null;
    heuristic: HeuristicMatch | null;
    classification: FailureClassification | null;
    failureSummary: string;
    hypothesis: string;
    reasoningSteps: string[];
    action: HealingAction | null;
    patch: PatchOutcome | null;
    verification: VerificationRecord | null;
    error: {code: HealingErrorCode; message: string} | null;
    fileModified: boolean;
    passedInitially: boolean;
}

type AttemptResult =
    | {kind: "nothing-to-heal"}
    | {kind: "recorded"; state: TerminalState; decision: HealingDecision; artifacts: RecordedArtifacts | null; fileModified: boolean};

const newDraft = (): AttemptDraft => ({
    evidence: null,
    heuristic: null,
    classification: null,
    failureSummary: "",
    hypothesis: "",
    reasoningSteps: [],
    action: null,
    patch: null,
    verification: null,
    error: null,
    fileModified: false,
    passedInitially: false,
});

const isTerminal = (state: HealingState): state is TerminalState =>
    state === "SUCCEEDED" || state === "EXHAUSTED";

const summarizeEvidence = (evidence: FailureEvidence | null): EvidenceSummary => ({
    exitCode: evidence?.exitCode ?? RUNNER_UNAVAILABLE_EXIT_CODE,
    timedOut: evidence?.timedOut ?? false,
    durationMs: evidence?.durationMs ?? 0,
    screenshotPath: evidence?.screenshotPath ?? null,
    logExcerpt: evidence ? truncateText(combinedLogs(evidence), LOG_EXCERPT_CHARS) : "",
});

const readTestFile = (testFile: string): string => {
    try {
        return readFileSync(testFile, "utf-8");
    } catch (e) {
        throw new HealingStageError("INTERNAL_ERROR", `Could not read ${testFile}: ${formatErrorMessage(e)}`);
    }
};

/**
 * Bounded healing state machine:
 * COLLECTING → CLASSIFYING → REASONING → PATCHING → VERIFYING → SUCCEEDED | EXHAUSTED.
 * Each attempt runs the states once; a failed attempt is followed by a fresh
 * one until `maxAttempts` is reached. A patch that fails verification stays
 * in the file.
 */
export class HealingOrchestrator {
    constructor(
        private evidenceCollector: EvidenceCollector,
        private classifier: HeuristicClassifier,
        private reasoner: DiagnosisReasoner,
        private verifier: Verifier,
        private recorder: DecisionRecorder,
        private options: HealingOrchestratorOptions,
    ) {
        if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
            throw new Error(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
        }
    }

    heal = async (testFile: string): Promise<HealingRunResult> => {
        console.log(`\n🩺 Healing session started for ${testFile}`);
        const decisions: HealingDecision[] = [];
        const artifacts: RecordedArtifacts[] = [];
        let fileModified = false;

        for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
            console.log(`\n🔄 Healing attempt ${attempt}/${this.options.maxAttempts}...`);
            const result = await this.runAttempt(testFile, attempt);

            if (result.kind === "nothing-to-heal") {
                console.log(`\n✅ Test passed on the first run, nothing to heal`);
                return {testFile, finalState: "SUCCEEDED", attempts: 0, healingNeeded: false, fileModified, decisions, artifacts};
            }

            decisions.push(result.decision);
            if (result.artifacts) {
                artifacts.push(result.artifacts);
            }
            fileModified = fileModified || result.fileModified;

            if (result.state === "SUCCEEDED") {
                console.log(`\n✅ Test healed after ${attempt} attempt(s). Hypothesis: ${result.decision.hypothesis}`);
                return {testFile, finalState: "SUCCEEDED", attempts: attempt, healingNeeded: true, fileModified, decisions, artifacts};
            }
            console.log(`   ❌ Attempt ${attempt} failed: ${result.decision.error?.code ?? "UNKNOWN"}`);
        }

        console.log(`\n❌ Exhausted ${this.options.maxAttempts} attempt(s) without a passing test`);
        if (fileModified) {
            console.log(`   ⚠️  ${testFile} keeps the last applied patch even though it did not verify. Review the diff.`);
        }
        return {
            testFile,
            finalState: "EXHAUSTED",
            attempts: this.options.maxAttempts,
            healingNeeded: true,
            fileModified,
            decisions,
            artifacts,
        };
    };

    private runAttempt = async (testFile: string, attempt: number): Promise<AttemptResult> => {
        const timeline = new ExecutionTimelineRecorder(testFile, attempt);
        const draft = newDraft();
        let state: HealingState = "COLLECTING";

        while (!isTerminal(state)) {
            const stage = timeline.begin(state.toLowerCase());
            let next: HealingState;
            try {
                next = await this.step(state, testFile, attempt, draft);
                stage.end(next === "EXHAUSTED" && draft.error ? "error" : "ok", this.describe(state, draft));
            } catch (e) {
                const code = isHealingStageError(e) ? e.code : "INTERNAL_ERROR";
                draft.error = {code, message: formatErrorMessage(e)};
                stage.end("error", `${code}: ${draft.error.message}`);
                next = "EXHAUSTED";
            }
            this.skipBetween(timeline, state, next, draft);
            state = next;
        }

        if (draft.passedInitially) {
            return {kind: "nothing-to-heal"};
        }

        const decision = this.buildDecision(testFile, attempt, state, draft);
        let artifacts: RecordedArtifacts | null = null;
        try {
            artifacts = this.recorder.record(decision, timeline.finish());
        } catch (e) {
            console.log(`   ⚠️  Could not write artifacts: ${formatErrorMessage(e)}`);
        }
        return {kind: "recorded", state, decision, artifacts, fileModified: draft.fileModified};
    };

    private step = async (
        state: HealingState,
        testFile: string,
        attempt: number,
        draft: AttemptDraft,
    ): Promise<HealingState> => {
        switch (state) {
            case "COLLECTING":
                draft.evidence = await this.evidenceCollector.collect(testFile);
                return "CLASSIFYING";
            case "CLASSIFYING":
                return this.classify(attempt, draft);
            case "REASONING":
                return this.reason(testFile, draft);
            case "PATCHING":
                return this.patch(testFile, draft);
            case "VERIFYING":
                return this.verify(testFile, draft);
            default:
                return state;
        }
    };

    private classify = (attempt: number, draft: AttemptDraft): HealingState => {
        const evidence = this.requireEvidence(draft);

        if (evidence.exitCode === 0) {
            if (attempt === 1) {
                draft.passedInitially = true;
                return "SUCCEEDED";
            }
            draft.hypothesis = "The previously applied patch holds: the test passed on a fresh run";
            draft.failureSummary = "Test passed";
            draft.verification = this.toVerificationRecord(evidence);
            return "SUCCEEDED";
        }

        draft.heuristic = this.classifier.match(evidence);
        draft.classification = draft.heuristic?.classification ?? null;

        if (draft.heuristic) {
            const {classification} = draft.heuristic;
            console.log(`   🔍 Heuristic: ${classification.kind} (rule ${classification.ruleId})`);
            draft.reasoningSteps.push(`Heuristic rule '${classification.ruleId}' matched: ${classification.reason}`);
        } else {
            console.log(`   🔍 Heuristic: no known failure signature`);
            draft.reasoningSteps.push("No heuristic signature matched the logs (CLASSIFICATION_NONE)");
        }

        if (evidence.exitCode === RUNNER_UNAVAILABLE_EXIT_CODE) {
            draft.failureSummary = "The test runner could not be started";
            draft.hypothesis = "Environment problem: the test runner is not installed or not on the PATH";
            draft.error = {code: "RUNNER_UNAVAILABLE", message: evidence.stderr};
            return "EXHAUSTED";
        }

        if (draft.heuristic?.action) {
            draft.failureSummary = draft.heuristic.classification.reason;
            draft.hypothesis = draft.heuristic.classification.reason;
            draft.action = draft.heuristic.action;
            draft.reasoningSteps.push(`Using the pre-validated fix of rule '${draft.heuristic.classification.ruleId}'`);
            return "PATCHING";
        }
        return "REASONING";
    };

    private reason = async (testFile: string, draft: AttemptDraft): Promise<HealingState> => {
        const evidence = this.requireEvidence(draft);
        const source = readTestFile(testFile);
        const outcome = await this.reasoner.diagnose(testFile, source, evidence, draft.classification);

        if (outcome.status === "failed") {
            draft.failureSummary = draft.classification?.reason ?? "Failure could not be diagnosed";
            draft.hypothesis = "Fallback: manual intervention needed";
            draft.error = {code: outcome.code, message: outcome.message};
            return "EXHAUSTED";
        }

        draft.classification = outcome.classification;
        draft.failureSummary = outcome.failureSummary;
        draft.hypothesis = outcome.hypothesis;
        draft.reasoningSteps.push(...outcome.reasoningSteps);
        console.log(`   🧠 Diagnosis: ${outcome.classification.kind}. Hypothesis: ${outcome.hypothesis}`);

        if (!outcome.action) {
            draft.error = {code: "REASONING_NO_ACTION", message: "The model proposed no change to the test"};
            return "EXHAUSTED";
        }
        draft.action = outcome.action;
        return "PATCHING";
    };

    private patch = (testFile: string, draft: AttemptDraft): HealingState => {
        const action = draft.action;
        if (!action) {
            throw new HealingStageError("INTERNAL_ERROR", "Reached PATCHING without an action");
        }
        const source = readTestFile(testFile);
        const result = applyPatch(source, action, {threshold: this.options.fuzzyThreshold});

        if (!result.applied) {
            console.log(`   ❌ Patch rejected: ${result.reason}`);
            draft.patch = {applied: false, reason: result.reason};
            draft.error = {code: "PATCH_NOT_APPLICABLE", message: result.reason};
            return "EXHAUSTED";
        }

        writeFileSync(testFile, result.source);
        draft.fileModified = true;
        draft.patch = {
            applied: true,
            strategy: result.strategy,
            similarity: result.similarity,
            startLine: result.startLine,
            endLine: result.endLine,
        };
        console.log(`   🛠️  Applied ${result.strategy} patch to lines ${result.startLine}-${result.endLine}: ${action.description}`);
        return "VERIFYING";
    };

    private verify = async (testFile: string, draft: AttemptDraft): Promise<HealingState> => {
        const {passed, evidence} = await this.verifier.verify(testFile);
        draft.verification = this.toVerificationRecord(evidence);
        if (passed) {
            return "SUCCEEDED";
        }
        draft.error = evidence.timedOut
            ? {code: "COLLECTION_TIMEOUT", message: "Verification run timed out"}
            : {code: "VERIFICATION_FAILED", message: `Test still fails after patching (exit code ${evidence.exitCode})`};
        return "EXHAUSTED";
    };

    private requireEvidence = (draft: AttemptDraft): FailureEvidence => {
        if (!draft.evidence) {
            throw new HealingStageError("INTERNAL_ERROR", "No evidence collected");
        }
        return draft.evidence;
    };

    private toVerificationRecord = (evidence: FailureEvidence): VerificationRecord => ({
        passed: evidence.exitCode === 0,
        exitCode: evidence.exitCode,
        durationMs: evidence.durationMs,
        logExcerpt: truncateText(combinedLogs(evidence), LOG_EXCERPT_CHARS),
    });

    private describe = (state: HealingState, draft: AttemptDraft): string => {
        switch (state) {
            case "COLLECTING":
                return `Exit code ${draft.evidence?.exitCode}${draft.evidence?.screenshotPath ? ", screenshot captured" : ""}`;
            case "CLASSIFYING":
                return draft.heuristic
                    ? `${draft.heuristic.classification.kind} via rule '${draft.heuristic.classification.ruleId}'`
                    : draft.evidence?.exitCode === 0 ? "Test passed" : "No heuristic match";
            case "REASONING":
                return draft.error ? `${draft.error.code}: ${draft.error.message}` : `Diagnosed as ${draft.classification?.kind}`;
            case "PATCHING":
                return draft.patch?.applied
                    ? `Applied ${draft.patch.strategy} match: ${draft.action?.description ?? ""}`
                    : `Rejected: ${draft.error?.message ?? ""}`;
            case "VERIFYING":
                return draft.verification?.passed ? "Test passed on re-run" : "Test failed on re-run";
            default:
                return state;
        }
    };

    // Stages jumped over on the way from one state to the next, kept in pipeline order
    private skipBetween = (
        timeline: ExecutionTimelineRecorder,
        from: HealingState,
        to: HealingState,
        draft: AttemptDraft,
    ): void => {
        const start = PIPELINE_STAGES.indexOf(from) + 1;
        const end = isTerminal(to) ? PIPELINE_STAGES.length : PIPELINE_STAGES.indexOf(to);
        for (const skipped of PIPELINE_STAGES.slice(start, end)) {
            timeline.skip(skipped.toLowerCase(), draft.error ? `Not reached (${draft.error.code})` : "Not needed");
        }
    };

    private buildDecision = (
        testFile: string,
        attempt: number,
        state: TerminalState,
        draft: AttemptDraft,
    ): HealingDecision => ({
        id: randomUUID(),
        testFile,
        attempt,
        maxAttempts: this.options.maxAttempts,
        timestamp: new Date().toISOString(),
        heuristicHint: draft.heuristic?.classification ?? null,
        classification: draft.classification,
        failureSummary: draft.failureSummary || "No summary available",
        hypothesis: draft.hypothesis || "No hypothesis",
        reasoningSteps: [...draft.reasoningSteps],
        action: draft.action,
        patch: draft.patch,
        verification: draft.verification,
        evidence: summarizeEvidence(draft.evidence),
        outcome: state === "SUCCEEDED" ? "HEALED" : "FAILED",
        error: draft.error,
    });
}

export const healingOrchestratorFactory = (config: HealerConfig, testFile: string): HealingOrchestrator => {
    const runLogDir = join(config.apiLogDir, basename(testFile, extname(testFile)), generateTimestampString());
    const evidenceCollector = new EvidenceCollector(
        playwrightTestRunnerFactory(config.projectRoot, config.testTimeoutMs),
        config.resultsDir,
    );
    const reasoner = new DiagnosisReasoner(
        anthropicModelClientFactory(runLogDir, config.model),
        promptGeneratorFactory(),
    );
    return new HealingOrchestrator(
        evidenceCollector,
        new HeuristicClassifier(loadHeuristicRules(config.rulesFile)),
        reasoner,
        new Verifier(evidenceCollector),
        new DecisionRecorder(config.artifactsDir),
        {
            maxAttempts: config.maxAttempts,
            fuzzyThreshold: config.fuzzyThreshold,
        },
    );
};
