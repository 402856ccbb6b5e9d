import {z} from "zod";
import {join, resolve} from "path";
import {ANTHROPIC_MODEL_ALIASES} from "@lib/test_healer/model_client.types";
import {DEFAULT_FUZZY_MATCH_THRESHOLD} from "@lib/test_healer/similarity";

export const DEFAULT_MAX_ATTEMPTS = 2;
export const DEFAULT_TEST_TIMEOUT_MS = 60_000;

const HealerEnvSchema = z.object({
    HEALER_MODEL: z.enum(ANTHROPIC_MODEL_ALIASES).default("claude-sonnet-4-5"),
    HEALER_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(DEFAULT_MAX_ATTEMPTS),
    HEALER_TEST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TEST_TIMEOUT_MS),
    HEALER_FUZZY_THRESHOLD: z.coerce.number().gt(0).max(1).default(DEFAULT_FUZZY_MATCH_THRESHOLD),
    HEALER_RESULTS_DIR: z.string().min(1).default("test-results"),
    HEALER_ARTIFACTS_DIR: z.string().min(1).default(join("tests", "artifacts")),
    HEALER_LOG_DIR: z.string().min(1).default(join("reports", "api_logs")),
    HEALER_RULES_FILE: z.string().min(1).optional(),
});

export type HealerConfig = {
    model: z.infer<typeof HealerEnvSchema>["HEALER_MODEL"];
    maxAttempts: number;
    testTimeoutMs: number;
    fuzzyThreshold: number;
    projectRoot: string;
    resultsDir: string;
    artifactsDir: string;
    apiLogDir: string;
    rulesFile?: string;
};

/**
 * Reads healer settings from the environment. Relative paths resolve
 * against the project root, which is the working directory by default.
 */
export const loadHealerConfig = (
    env: NodeJS.ProcessEnv = process.env,
    projectRoot: string = process.cwd(),
): HealerConfig => {
    const result = HealerEnvSchema.safeParse(env);
    if (!result.success) {
        const problems = result.error.errors.map(err => `${err.path.join(".")}: ${err.message}`);
        throw new Error(`Invalid healer configuration:\n${problems.join("\n")}`);
    }
    const parsed = result.data;
    const root = resolve(projectRoot);
    return {
        model: parsed.HEALER_MODEL,
        maxAttempts: parsed.HEALER_MAX_ATTEMPTS,
        testTimeoutMs: parsed.HEALER_TEST_TIMEOUT_MS,
        fuzzyThreshold: parsed.HEALER_FUZZY_THRESHOLD,
        projectRoot: root,
        resultsDir: resolve(root, parsed.HEALER_RESULTS_DIR),
        artifactsDir: resolve(root, parsed.HEALER_ARTIFACTS_DIR),
        apiLogDir: resolve(root, parsed.HEALER_LOG_DIR),
        rulesFile: parsed.HEALER_RULES_FILE ? resolve(root, parsed.HEALER_RULES_FILE) : undefined,
    };
};
