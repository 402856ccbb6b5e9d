import {mkdirSync, writeFileSync} from "fs";
import {join} from "path";
import {ExecutionTimeline, HealingDecision, RecordedArtifacts} from "@lib/types";
import {generateArtifactSuffix} from "@lib/test_healer/utils";

const STATUS_ICONS = {ok: "🟢", error: "🔴", skipped: "⚪"} as const;

export const renderDecisionMarkdown = (decision: HealingDecision, timeline: ExecutionTimeline): string => {
    const healed = decision.outcome === "HEALED";
    const classification = decision.classification;
    const lines = [
        `# Healing Report: ${decision.timestamp}`,
        `**File:** \`${decision.testFile}\``,
        `**Attempt:** ${decision.attempt}/${decision.maxAttempts}`,
        `**Status:** ${healed ? "✅ Fixed" : "❌ Failed"}`,
        "",
        "## Diagnosis",
        classification
            ? `- **Type:** \`${classification.kind}\` (${classification.source}, confidence ${classification.confidence})`
            : "- **Type:** unknown",
        `- **Summary:** ${decision.failureSummary}`,
        "",
        "## Evidence",
        `- **Exit code:** ${decision.evidence.exitCode}${decision.evidence.timedOut ? " (timed out)" : ""}`,
        `- **Screenshot:** ${decision.evidence.screenshotPath ? `![Screenshot](${decision.evidence.screenshotPath})` : "none"}`,
        "",
        "## Resolution",
        `**Hypothesis:** ${decision.hypothesis}`,
        "",
        "**Reasoning:**",
        ...(decision.reasoningSteps.length > 0 ? decision.reasoningSteps.map(step => `- ${step}`) : ["- none recorded"]),
    ];

    if (decision.action) {
        lines.push(
            "",
            "## Code Change",
            decision.action.description,
            "```typescript",
            "// OLD",
            decision.action.originalCode,
            "",
            "// NEW",
            decision.action.fixedCode,
            "```",
        );
    }
    if (decision.patch && !decision.patch.applied) {
        lines.push("", `**Patch rejected:** ${decision.patch.reason}`);
    }
    if (decision.error) {
        lines.push("", `**Error:** \`${decision.error.code}\` ${decision.error.message}`);
    }

    lines.push("", "## Timeline");
    for (const stage of timeline.stages) {
        lines.push(`${STATUS_ICONS[stage.status]} **${stage.name}**: ${stage.details}`);
    }
    return lines.join("\n") + "\n";
};

/**
 * Persists one decision and its timeline per attempt. Files are created with
 * the `wx` flag, so an existing artifact is never overwritten.
 */
export class DecisionRecorder {
    constructor(
        private artifactsDir: string,
        private suffixFactory: (attempt: number) => string = generateArtifactSuffix,
    ) {
    }

    record = (decision: HealingDecision, timeline: ExecutionTimeline): RecordedArtifacts => {
        mkdirSync(this.artifactsDir, {recursive: true});
        const suffix = this.suffixFactory(decision.attempt);
        const artifacts: RecordedArtifacts = {
            decisionPath: join(this.artifactsDir, `healing_decision_${suffix}.json`),
            timelinePath: join(this.artifactsDir, `execution_timeline_${suffix}.json`),
            reportPath: join(this.artifactsDir, `healing_report_${suffix}.md`),
        };

        writeFileSync(artifacts.decisionPath, JSON.stringify(decision, null, 2), {flag: "wx"});
        writeFileSync(artifacts.timelinePath, JSON.stringify(timeline, null, 2), {flag: "wx"});
        writeFileSync(artifacts.reportPath, renderDecisionMarkdown(decision, timeline), {flag: "wx"});

        console.log(`   💾 Artifacts saved:\n      ${artifacts.decisionPath}\n      ${artifacts.timelinePath}`);
        return artifacts;
    };
}
