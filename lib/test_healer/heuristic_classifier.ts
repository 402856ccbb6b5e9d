import {FailureClassification, FailureEvidence, HealingAction} from "@lib/types";
import {HeuristicRule, RuleFix} from "@lib/test_healer/heuristic_rules.types";
import {formatErrorMessage} from "@lib/test_healer/utils";

export const HEURISTIC_CONFIDENCE = 1.0;

export interface HeuristicMatch {
    classification: FailureClassification;
    // present only when the matching rule carries a pre-validated fix
    action: HealingAction | null;
}

interface CompiledRule {
    rule: HeuristicRule;
    test: (logs: string) => RegExpExecArray | string[] | null;
}

const compileRule = (rule: HeuristicRule): CompiledRule => {
    const match = rule.match;
    if ("substring" in match) {
        return {
            rule,
            test: (logs) => logs.includes(match.substring) ? [match.substring] : null,
        };
    }
    let pattern: RegExp;
    try {
        pattern = new RegExp(match.regex, match.flags);
    } catch (e) {
        throw new Error(`Rule '${rule.id}' has an invalid pattern: ${formatErrorMessage(e)}`);
    }
    return {rule, test: (logs) => pattern.exec(logs)};
};

const fillTemplate = (template: string, groups: ArrayLike<string | undefined>): string =>
    template.replace(/\$([1-9])/g, (_, index: string) => groups[Number(index)] ?? "");

const buildRuleAction = (fix: RuleFix, groups: ArrayLike<string | undefined>): HealingAction => ({
    originalCode: fillTemplate(fix.originalCode, groups),
    fixedCode: fillTemplate(fix.fixedCode, groups),
    description: fillTemplate(fix.description, groups),
});

export const combinedLogs = (evidence: FailureEvidence): string =>
    [evidence.stdout, evidence.stderr].filter(text => text.length > 0).join("\n");

/**
 * Deterministic failure classification. Rules are evaluated in the order
 * given and the first match wins.
 */
export class HeuristicClassifier {
    private compiled: CompiledRule[];

    constructor(rules: HeuristicRule[]) {
        this.compiled = rules.map(compileRule);
    }

    classify = (evidence: FailureEvidence): FailureClassification | null =>
        this.match(evidence)?.classification ?? null;

    match = (evidence: FailureEvidence): HeuristicMatch | null => {
        if (evidence.exitCode === 0) {
            return null;
        }
        const logs = combinedLogs(evidence);
        for (const {rule, test} of this.compiled) {
            const groups = test(logs);
            if (groups === null) {
                continue;
            }
            return {
                classification: {
                    kind: rule.kind,
                    confidence: HEURISTIC_CONFIDENCE,
                    reason: rule.reason,
                    source: "heuristic",
                    ruleId: rule.id,
                },
                action: rule.fix ? buildRuleAction(rule.fix, groups) : null,
            };
        }
        return null;
    };
}
