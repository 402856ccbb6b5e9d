import {existsSync, readFileSync} from "fs";
import {join} from "path";
import {parse as parseYaml} from "yaml";
import {HeuristicRule, HeuristicRuleListSchema} from "@lib/test_healer/heuristic_rules.types";

export const DEFAULT_RULES_PATH = join(__dirname, "..", "..", "config", "heuristic_rules.yaml");

export const parseRulesFile = (rulesPath: string): HeuristicRule[] => {
    if (!existsSync(rulesPath)) {
        throw new Error(`Rules file does not exist: ${rulesPath}`);
    }
    const parsed = HeuristicRuleListSchema.safeParse(parseYaml(readFileSync(rulesPath, "utf-8")));
    if (!parsed.success) {
        const problems = parsed.error.errors.map(err => `${err.path.join(".")}: ${err.message}`);
        throw new Error(`Invalid rules file ${rulesPath}:\n${problems.join("\n")}`);
    }
    return parsed.data;
};

/**
 * Default rules, with any operator rules placed ahead of them so they take
 * precedence.
 */
export const loadHeuristicRules = (extraRulesPath?: string): HeuristicRule[] => {
    const defaults = parseRulesFile(DEFAULT_RULES_PATH);
    if (!extraRulesPath) {
        return defaults;
    }
    const extra = parseRulesFile(extraRulesPath);
    const overridden = new Set(extra.map(rule => rule.id));
    return [...extra, ...defaults.filter(rule => !overridden.has(rule.id))];
};
