import {mkdtempSync, rmSync, writeFileSync} from 'fs';
import {join} from 'path';
import {tmpdir} from 'os';
import {HeuristicClassifier} from '../test_healer/heuristic_classifier';
import {loadHeuristicRules, parseRulesFile} from '../test_healer/heuristic_rules';
import {HeuristicRule} from '../test_healer/heuristic_rules.types';
import {FailureEvidence} from '../types';

const createEvidence = (overrides: Partial<FailureEvidence> = {}): FailureEvidence => ({
    testFile: 'tests/example.spec.ts',
    stdout: '',
    stderr: '',
    exitCode: 1,
    timedOut: false,
    screenshotPath: null,
    durationMs: 10,
    collectedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
});

describe('HeuristicClassifier with the default rules', () => {
    const classifier = new HeuristicClassifier(loadHeuristicRules());

    it('should classify a Playwright timeout with full confidence', () => {
        const classification = classifier.classify(createEvidence({
            stderr: "TimeoutError: locator.fill: Timeout 5000ms exceeded.\nCall log:\n  - waiting for locator('#user-input-field-wrong')",
        }));

        expect(classification).toEqual({
            kind: 'TIMEOUT',
            confidence: 1.0,
            reason: "Detected 'TimeoutError' or a wait for a selector or locator in logs",
            source: 'heuristic',
            ruleId: 'timeout',
        });
    });

    it('should return null when the test passed, whatever the logs say', () => {
        const classification = classifier.classify(createEvidence({
            exitCode: 0,
            stdout: 'TimeoutError: locator.fill: Timeout 5000ms exceeded.',
        }));

        expect(classification).toBeNull();
    });

    it('should prefer an HTTP 5xx signature over a timeout further down the log', () => {
        const classification = classifier.classify(createEvidence({
            stderr: 'Error: page.goto: HTTP 500 Internal Server Error\nTimeoutError: Timeout 5000ms exceeded.',
        }));

        expect(classification?.kind).toBe('POTENTIAL_APP_DEFECT');
        expect(classification?.ruleId).toBe('http-server-error');
    });

    it('should not mistake a timeout duration for an HTTP status', () => {
        const classification = classifier.classify(createEvidence({
            stderr: 'TimeoutError: page.click: Timeout 5000ms exceeded.',
        }));

        expect(classification?.kind).toBe('TIMEOUT');
    });

    it('should classify an unreachable server as an environment issue', () => {
        const classification = classifier.classify(createEvidence({
            stderr: 'Error: page.goto: net::ERR_CONNECTION_REFUSED at http://127.0.0.1:3000/',
        }));

        expect(classification?.kind).toBe('ENVIRONMENT_ISSUE');
        expect(classification?.ruleId).toBe('network-unreachable');
    });

    it('should classify a strict mode violation as locator drift', () => {
        const classification = classifier.classify(createEvidence({
            stderr: "Error: strict mode violation: locator('button') resolved to 2 elements",
        }));

        expect(classification?.kind).toBe('LOCATOR_DRIFT');
        expect(classification?.ruleId).toBe('strict-mode-violation');
    });

    it('should classify a failed locator assertion as an assertion failure despite its call log', () => {
        const classification = classifier.classify(createEvidence({
            stderr: [
                "  1) [chromium] › search.spec.ts:20:5 › search form echoes the query",
                '',
                '    Error: expect(locator).toHaveText(expected) failed',
                '',
                "    Locator: locator('#result')",
                '    Expected string: "Searching for healing"',
                '    Received string: ""',
                '    Timeout: 5000ms',
                '',
                '    Call log:',
                '      - Expect "toHaveText" with timeout 5000ms',
                "      - waiting for locator('#result')",
                '        9 × locator resolved to <p id="result"></p>',
                '          - unexpected value ""',
            ].join('\n'),
        }));

        expect(classification?.kind).toBe('ASSERTION_FAILED');
        expect(classification?.ruleId).toBe('assertion-failed');
    });

    it('should classify a value assertion as an assertion failure', () => {
        const classification = classifier.classify(createEvidence({
            stderr: 'Error: expect(received).toBe(expected) // Object.is equality\n\nExpected: 3\nReceived: 2',
        }));

        expect(classification?.kind).toBe('ASSERTION_FAILED');
    });

    it('should classify an assertion on a missing element as locator drift', () => {
        const classification = classifier.classify(createEvidence({
            stderr: [
                '    Error: expect(locator).toBeVisible() failed',
                '',
                "    Locator: locator('#save-button')",
                '    Expected: visible',
                '    Received: <element(s) not found>',
                '    Timeout: 5000ms',
                '',
                '    Call log:',
                '      - Expect "toBeVisible" with timeout 5000ms',
                "      - waiting for locator('#save-button')",
            ].join('\n'),
        }));

        expect(classification?.kind).toBe('LOCATOR_DRIFT');
        expect(classification?.ruleId).toBe('assertion-element-not-found');
    });

    it('should classify a runner that could not start as an environment issue', () => {
        const classification = classifier.classify(createEvidence({
            exitCode: -2,
            stderr: 'Test runner could not be started (npx): spawn npx ENOENT',
        }));

        expect(classification?.kind).toBe('ENVIRONMENT_ISSUE');
        expect(classification?.ruleId).toBe('runner-unavailable');
    });

    it('should search stdout as well as stderr', () => {
        const classification = classifier.classify(createEvidence({
            stdout: "  - waiting for locator('#save')",
            stderr: 'Test failed',
        }));

        expect(classification?.kind).toBe('TIMEOUT');
    });

    it('should return null when no signature matches', () => {
        expect(classifier.classify(createEvidence({stderr: 'Error: something unexpected'}))).toBeNull();
    });

    it('should not propose a fix for rules without one', () => {
        const match = classifier.match(createEvidence({stderr: 'TimeoutError: Timeout 5000ms exceeded.'}));

        expect(match?.action).toBeNull();
    });
});

describe('HeuristicClassifier with custom rules', () => {
    const renamedField: HeuristicRule = {
        id: 'renamed-field',
        match: {regex: "waiting for locator\\('#([\\w-]+)-wrong'\\)"},
        kind: 'LOCATOR_DRIFT',
        reason: 'Field id lost its -wrong suffix',
        fix: {
            originalCode: "'#$1-wrong'",
            fixedCode: "'#$1'",
            description: 'Point the locator at #$1',
        },
    };

    it('should fill the fix template from the capture groups', () => {
        const classifier = new HeuristicClassifier([renamedField]);

        const match = classifier.match(createEvidence({
            stderr: "  - waiting for locator('#user-input-field-wrong')",
        }));

        expect(match?.classification.ruleId).toBe('renamed-field');
        expect(match?.action).toEqual({
            originalCode: "'#user-input-field-wrong'",
            fixedCode: "'#user-input-field'",
            description: 'Point the locator at #user-input-field',
        });
    });

    it('should evaluate rules in order', () => {
        const first: HeuristicRule = {id: 'first', match: {substring: 'boom'}, kind: 'ENVIRONMENT_ISSUE', reason: 'first'};
        const second: HeuristicRule = {id: 'second', match: {substring: 'boom'}, kind: 'TIMEOUT', reason: 'second'};

        const classification = new HeuristicClassifier([first, second]).classify(createEvidence({stderr: 'boom'}));

        expect(classification?.ruleId).toBe('first');
    });

    it('should reject a rule with an invalid pattern', () => {
        const broken: HeuristicRule = {id: 'bad', match: {regex: '('}, kind: 'TIMEOUT', reason: 'broken'};

        expect(() => new HeuristicClassifier([broken])).toThrow("Rule 'bad' has an invalid pattern");
    });
});

describe('loadHeuristicRules', () => {
    let tempDir: string;

    beforeEach(() => {
        tempDir = mkdtempSync(join(tmpdir(), 'heuristic-rules-'));
    });

    afterEach(() => {
        rmSync(tempDir, {recursive: true, force: true});
    });

    it('should load the default rules in precedence order', () => {
        const ids = loadHeuristicRules().map(rule => rule.id);

        expect(ids).toEqual([
            'network-unreachable',
            'http-server-error',
            'request-aborted',
            'browser-closed',
            'runner-unavailable',
            'strict-mode-violation',
            'assertion-element-not-found',
            'assertion-failed',
            'timeout',
            'locator-resolved-to-nothing',
        ]);
    });

    it('should put extra rules first and let them override defaults by id', () => {
        const rulesPath = join(tempDir, 'extra.yaml');
        writeFileSync(rulesPath, [
            '- id: timeout',
            '  match:',
            '    substring: "Timeout"',
            '  kind: LOCATOR_DRIFT',
            '  reason: "Timeouts in this project are always stale selectors"',
        ].join('\n'));

        const rules = loadHeuristicRules(rulesPath);

        expect(rules).toHaveLength(10);
        expect(rules[0]).toEqual({
            id: 'timeout',
            match: {substring: 'Timeout'},
            kind: 'LOCATOR_DRIFT',
            reason: 'Timeouts in this project are always stale selectors',
        });
        expect(rules.filter(rule => rule.id === 'timeout')).toHaveLength(1);
    });

    it('should reject duplicate rule ids', () => {
        const rulesPath = join(tempDir, 'duplicates.yaml');
        writeFileSync(rulesPath, [
            '- id: dup',
            '  match: {substring: "a"}',
            '  kind: TIMEOUT',
            '  reason: "a"',
            '- id: dup',
            '  match: {substring: "b"}',
            '  kind: TIMEOUT',
            '  reason: "b"',
        ].join('\n'));

        expect(() => parseRulesFile(rulesPath)).toThrow("Duplicate rule id 'dup'");
    });

    it('should reject an unknown failure kind', () => {
        const rulesPath = join(tempDir, 'unknown-kind.yaml');
        writeFileSync(rulesPath, '- id: odd\n  match: {substring: "a"}\n  kind: FLAKY\n  reason: "a"\n');

        expect(() => parseRulesFile(rulesPath)).toThrow('Invalid rules file');
    });

    it('should fail on a missing rules file', () => {
        expect(() => loadHeuristicRules(join(tempDir, 'missing.yaml'))).toThrow('Rules file does not exist');
    });
});
