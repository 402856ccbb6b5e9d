import {mkdirSync, mkdtempSync, rmSync, utimesSync, writeFileSync} from 'fs';
import {join} from 'path';
import {tmpdir} from 'os';
import {
    EvidenceCollector,
    findLatestScreenshot,
    ProcessTestRunner,
    RUNNER_UNAVAILABLE_EXIT_CODE,
    TestRunner,
    TestRunResult,
    TIMEOUT_EXIT_CODE,
} from '../test_healer/evidence_collector';

const nodeRunner = (script: string, timeoutMs = 10000) => new ProcessTestRunner({
    command: process.execPath,
    buildArgs: () => ['-e', script],
    cwd: process.cwd(),
    timeoutMs,
});

class ScriptedRunner implements TestRunner {
    constructor(private result: TestRunResult) {
    }

    run = async (): Promise<TestRunResult> => this.result;
}

describe('ProcessTestRunner', () => {
    it('should capture output and the exit code', async () => {
        const result = await nodeRunner("process.stdout.write('out'); process.stderr.write('err'); process.exit(3);")
            .run('tests/example.spec.ts');

        expect(result.stdout).toBe('out');
        expect(result.stderr).toBe('err');
        expect(result.exitCode).toBe(3);
        expect(result.timedOut).toBe(false);
    });

    it('should kill a run that exceeds the timeout', async () => {
        const result = await nodeRunner('setTimeout(() => {}, 30000);', 1000).run('tests/example.spec.ts');

        expect(result.exitCode).toBe(TIMEOUT_EXIT_CODE);
        expect(result.timedOut).toBe(true);
        expect(result.stderr).toBe('Test execution timed out after 1 seconds');
    }, 15000);

    it('should stop the runner and its children when the timeout expires', async () => {
        const runner = new ProcessTestRunner({
            command: 'sh',
            buildArgs: () => ['-c', 'sleep 6; echo done'],
            cwd: process.cwd(),
            timeoutMs: 500,
        });
        const startedAt = Date.now();

        const result = await runner.run('tests/example.spec.ts');

        expect(Date.now() - startedAt).toBeLessThan(2000);
        expect(result.exitCode).toBe(TIMEOUT_EXIT_CODE);
        expect(result.timedOut).toBe(true);
        expect(result.stdout).toBe('');
        expect(result.stderr).toBe('Test execution timed out after 1 seconds');
    }, 15000);

    it('should report a runner that cannot be started instead of throwing', async () => {
        const runner = new ProcessTestRunner({
            command: '/nonexistent/test-runner',
            buildArgs: (testFile) => [testFile],
            cwd: process.cwd(),
            timeoutMs: 5000,
        });

        const result = await runner.run('tests/example.spec.ts');

        expect(result.exitCode).toBe(RUNNER_UNAVAILABLE_EXIT_CODE);
        expect(result.timedOut).toBe(false);
        expect(result.stderr).toContain('Test runner could not be started (/nonexistent/test-runner): ');
    });
});

describe('findLatestScreenshot', () => {
    let tempDir: string;

    beforeEach(() => {
        tempDir = mkdtempSync(join(tmpdir(), 'screenshots-'));
    });

    afterEach(() => {
        rmSync(tempDir, {recursive: true, force: true});
    });

    it('should return the most recently modified image in any subdirectory', () => {
        mkdirSync(join(tempDir, 'a'));
        mkdirSync(join(tempDir, 'b', 'c'), {recursive: true});
        const older = join(tempDir, 'a', 'test-failed-1.png');
        const newer = join(tempDir, 'b', 'c', 'test-failed-2.jpg');
        const notes = join(tempDir, 'notes.txt');
        writeFileSync(older, 'png');
        writeFileSync(newer, 'jpg');
        writeFileSync(notes, 'not an image');
        utimesSync(older, 1000, 1000);
        utimesSync(newer, 2000, 2000);
        utimesSync(notes, 3000, 3000);

        expect(findLatestScreenshot(tempDir)).toBe(newer);
    });

    it('should return null when there are no images', () => {
        writeFileSync(join(tempDir, 'trace.zip'), 'zip');

        expect(findLatestScreenshot(tempDir)).toBeNull();
    });

    it('should return null when the results directory does not exist', () => {
        expect(findLatestScreenshot(join(tempDir, 'missing'))).toBeNull();
    });
});

describe('EvidenceCollector', () => {
    let tempDir: string;

    beforeEach(() => {
        tempDir = mkdtempSync(join(tmpdir(), 'evidence-'));
    });

    afterEach(() => {
        rmSync(tempDir, {recursive: true, force: true});
    });

    it('should strip ANSI codes and attach the screenshot', async () => {
        const screenshot = join(tempDir, 'test-failed-1.png');
        writeFileSync(screenshot, 'png');
        const collector = new EvidenceCollector(new ScriptedRunner({
            stdout: '\u001b[31m1 failed\u001b[39m',
            stderr: '\u001b[2mTimeoutError: Timeout 5000ms exceeded.\u001b[22m',
            exitCode: 1,
            timedOut: false,
            durationMs: 5100,
        }), tempDir);

        const evidence = await collector.collect('tests/example.spec.ts');

        expect(evidence.testFile).toBe('tests/example.spec.ts');
        expect(evidence.stdout).toBe('1 failed');
        expect(evidence.stderr).toBe('TimeoutError: Timeout 5000ms exceeded.');
        expect(evidence.exitCode).toBe(1);
        expect(evidence.screenshotPath).toBe(screenshot);
        expect(evidence.durationMs).toBe(5100);
    });

    it('should report a timed out run with the timeout exit code', async () => {
        const collector = new EvidenceCollector(new ScriptedRunner({
            stdout: '',
            stderr: 'Test execution timed out after 60 seconds',
            exitCode: 137,
            timedOut: true,
            durationMs: 60000,
        }), tempDir);

        const evidence = await collector.collect('tests/example.spec.ts');

        expect(evidence.exitCode).toBe(TIMEOUT_EXIT_CODE);
        expect(evidence.timedOut).toBe(true);
        expect(evidence.screenshotPath).toBeNull();
    });
});
