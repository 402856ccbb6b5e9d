/**
 * Test Healer - Diagnoses a failing Playwright test and repairs it using
 * heuristic rules and the Claude API
 */
import "dotenv/config";
import {existsSync} from "fs";
import {resolve} from "path";
import {HealerConfig, loadHealerConfig} from "@lib/test_healer/config";
import {healingOrchestratorFactory, HealingOrchestrator} from "@lib/test_healer/healing_orchestrator";
import {HealerCliOptions, ParsedArgs} from "@lib/test_healer/index.types";
import {formatErrorMessage} from "@lib/test_healer/utils";

const USAGE = [
    "Usage: npx tsx lib/test_healer/index.ts <test-file> [options]",
    "",
    "Options:",
    "  -m, --max-attempts <n>     Healing attempts before giving up (default: HEALER_MAX_ATTEMPTS or 2)",
    "  -t, --timeout <seconds>    Timeout for each test run (default: HEALER_TEST_TIMEOUT_MS / 1000)",
    "  -h, --help                 Show this message",
    "",
].join("\n");

const parsePositiveInteger = (flag: string, value: string | undefined): number => {
    const parsed = value === undefined ? NaN : Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new Error(`${flag} expects a positive integer, got '${value ?? ""}'`);
    }
    return parsed;
};

export const parseCliArgs = (args: string[]): ParsedArgs => {
    const options: HealerCliOptions = {};
    const positional: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === "-h" || arg === "--help") {
            return {kind: "help"};
        }
        if (arg === "-m" || arg === "--max-attempts") {
            options.maxAttempts = parsePositiveInteger(arg, args[++i]);
        } else if (arg === "-t" || arg === "--timeout") {
            options.timeoutSeconds = parsePositiveInteger(arg, args[++i]);
        } else if (arg.startsWith("-")) {
            throw new Error(`Unknown option '${arg}'`);
        } else {
            positional.push(arg);
        }
    }

    if (positional.length !== 1) {
        throw new Error(positional.length === 0 ? "Missing test file" : "Expected exactly one test file");
    }
    return {kind: "heal", testFile: positional[0], options};
};

export const applyCliOptions = (config: HealerConfig, options: HealerCliOptions): HealerConfig => ({
    ...config,
    maxAttempts: options.maxAttempts ?? config.maxAttempts,
    testTimeoutMs: options.timeoutSeconds !== undefined ? options.timeoutSeconds * 1000 : config.testTimeoutMs,
});

/**
 * Runs one healing session and returns the process exit code: 0 when the
 * test passes at the end (or never failed), 1 otherwise.
 */
export async function healTest(
    testFile: string,
    options: HealerCliOptions = {},
    orchestratorFactory: (config: HealerConfig, testFile: string) => HealingOrchestrator = healingOrchestratorFactory,
): Promise<number> {
    try {
        const config = applyCliOptions(loadHealerConfig(), options);
        const testPath = resolve(config.projectRoot, testFile);
        if (!existsSync(testPath)) {
            console.error(`❌ Test file not found: ${testPath}`);
            return 1;
        }

        const result = await orchestratorFactory(config, testPath).heal(testPath);

        console.log(`\n${"=".repeat(60)}`);
        console.log(`Final state: ${result.finalState} after ${result.attempts} attempt(s)`);
        for (const artifact of result.artifacts) {
            console.log(`📄 ${artifact.reportPath}`);
        }
        if (result.finalState === "EXHAUSTED" && result.fileModified) {
            console.log(`⚠️  ${testPath} was modified but still fails. Revert it with your version control if needed.`);
        }
        console.log(`${"=".repeat(60)}`);

        return result.finalState === "SUCCEEDED" ? 0 : 1;
    } catch (e) {
        console.error(`Fatal Error: ${formatErrorMessage(e)}`);
        return 1;
    }
}

// CLI entry point
async function main(): Promise<number> {
    let parsed: ParsedArgs;
    try {
        parsed = parseCliArgs(process.argv.slice(2));
    } catch (e) {
        console.error(`❌ ${formatErrorMessage(e)}\n`);
        console.error(USAGE);
        return 1;
    }
    if (parsed.kind === "help") {
        console.log(USAGE);
        return 0;
    }

    console.log(`Healing test: ${parsed.testFile}`);
    return healTest(parsed.testFile, parsed.options);
}

if (require.main === module) {
    main()
        .then((code) => {
            process.exitCode = code;
        })
        .finally(() => {
            console.log("Exiting");
        });
}
