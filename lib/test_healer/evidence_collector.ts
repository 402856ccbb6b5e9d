import {spawn} from "child_process";
import {existsSync, readdirSync, statSync} from "fs";
import {extname, join} from "path";
import {FailureEvidence} from "@lib/types";
import {formatErrorMessage, stripAnsiCodes} from "@lib/test_healer/utils";

// Real process exit codes are 0-255, so negative values are free to act as sentinels
export const TIMEOUT_EXIT_CODE = -1;
export const RUNNER_UNAVAILABLE_EXIT_CODE = -2;

const SCREENSHOT_EXTENSIONS = new Set([".png", ".jpg", ".jpeg"]);

export interface TestRunResult {
    stdout: string;
    stderr: string;
    exitCode: number;
    timedOut: boolean;
    durationMs: number;
}

/**
 * Runs one test file to completion. Implementations must resolve for every
 * outcome, including timeouts and a runner that cannot be started.
 */
export interface TestRunner {
    run(testFile: string): Promise<TestRunResult>;
}

export interface ProcessTestRunnerOptions {
    command: string;
    buildArgs: (testFile: string) => string[];
    cwd: string;
    timeoutMs: number;
    env?: NodeJS.ProcessEnv;
}

export class ProcessTestRunner implements TestRunner {
    constructor(private options: ProcessTestRunnerOptions) {
    }

    run = (testFile: string): Promise<TestRunResult> => {
        const {command, buildArgs, cwd, timeoutMs, env = process.env} = this.options;
        const startedAt = Date.now();

        return new Promise((resolve) => {
            let stdout = "";
            let stderr = "";
            let timedOut = false;
            let settled = false;

            const finish = (exitCode: number, extraStderr?: string) => {
                if (settled) {
                    return;
                }
                settled = true;
                clearTimeout(timer);
                resolve({
                    stdout,
                    stderr: extraStderr ? `${stderr}${stderr ? "\n" : ""}${extraStderr}` : stderr,
                    exitCode,
                    timedOut,
                    durationMs: Date.now() - startedAt,
                });
            };

            // Own process group, so a timeout also reaches the runner's children (npx -> playwright)
            const testProcess = spawn(command, buildArgs(testFile), {
                env,
                cwd,
                stdio: ["ignore", "pipe", "pipe"],
                detached: true,
            });

            const killProcessGroup = () => {
                if (testProcess.pid === undefined) {
                    return;
                }
                try {
                    process.kill(-testProcess.pid, "SIGKILL");
                } catch (e) {
                    console.log(`   ⚠️  Could not kill process group ${testProcess.pid}: ${formatErrorMessage(e)}`);
                    testProcess.kill("SIGKILL");
                }
            };

            // Resolves here rather than on "close": an orphaned grandchild could hold the pipes open
            const timer = setTimeout(() => {
                timedOut = true;
                killProcessGroup();
                testProcess.stdout?.destroy();
                testProcess.stderr?.destroy();
                finish(
                    TIMEOUT_EXIT_CODE,
                    `Test execution timed out after ${Math.round(timeoutMs / 1000)} seconds`,
                );
            }, timeoutMs);

            testProcess.stdout?.on("data", (data) => {
                stdout += data.toString();
            });
            testProcess.stderr?.on("data", (data) => {
                stderr += data.toString();
            });

            testProcess.on("error", (e) => {
                finish(
                    RUNNER_UNAVAILABLE_EXIT_CODE,
                    `Test runner could not be started (${command}): ${formatErrorMessage(e)}`,
                );
            });

            testProcess.on("close", (code) => {
                finish(code ?? 1);
            });
        });
    };
}

export const playwrightTestRunnerFactory = (projectRoot: string, timeoutMs: number): TestRunner =>
    new ProcessTestRunner({
        command: "npx",
        buildArgs: (testFile) => ["playwright", "test", testFile, "--reporter=line"],
        cwd: projectRoot,
        timeoutMs,
        env: {...process.env, FORCE_COLOR: "0"},
    });

const readDirectoryEntries = (dir: string) => {
    try {
        return readdirSync(dir, {withFileTypes: true});
    } catch (e) {
        console.log(`   ⚠️  Could not read ${dir}: ${formatErrorMessage(e)}`);
        return [];
    }
};

const modifiedTime = (filePath: string): number | null => {
    try {
        return statSync(filePath).mtimeMs;
    } catch {
        // removed between listing and stat
        return null;
    }
};

/**
 * Most recently modified image below `resultsDir`, or null. Unreadable
 * entries are skipped.
 */
export const findLatestScreenshot = (resultsDir: string): string | null => {
    if (!existsSync(resultsDir)) {
        return null;
    }

    let latestPath: string | null = null;
    let latestMtime = -Infinity;
    const pending = [resultsDir];

    for (let dir = pending.pop(); dir !== undefined; dir = pending.pop()) {
        for (const entry of readDirectoryEntries(dir)) {
            const fullPath = join(dir, entry.name);
            if (entry.isDirectory()) {
                pending.push(fullPath);
                continue;
            }
            if (!entry.isFile() || !SCREENSHOT_EXTENSIONS.has(extname(entry.name).toLowerCase())) {
                continue;
            }
            const mtime = modifiedTime(fullPath);
            if (mtime !== null && mtime > latestMtime) {
                latestMtime = mtime;
                latestPath = fullPath;
            }
        }
    }
    return latestPath;
};

export class EvidenceCollector {
    constructor(
        private testRunner: TestRunner,
        private resultsDir: string,
    ) {
    }

    collect = async (testFile: string): Promise<FailureEvidence> => {
        console.log(`\n🧪 Running ${testFile}...`);
        const result = await this.testRunner.run(testFile);
        const screenshotPath = findLatestScreenshot(this.resultsDir);

        if (result.timedOut) {
            console.log(`   ⏱️  Timed out after ${result.durationMs}ms`);
        } else {
            console.log(`   ${result.exitCode === 0 ? "✅" : "❌"} Exit code ${result.exitCode} (${result.durationMs}ms)`);
        }
        if (screenshotPath) {
            console.log(`   📸 Screenshot: ${screenshotPath}`);
        }

        return {
            testFile,
            stdout: stripAnsiCodes(result.stdout),
            stderr: stripAnsiCodes(result.stderr),
            exitCode: result.timedOut ? TIMEOUT_EXIT_CODE : result.exitCode,
            timedOut: result.timedOut,
            screenshotPath,
            durationMs: result.durationMs,
            collectedAt: new Date().toISOString(),
        };
    };
}
