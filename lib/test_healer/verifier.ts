import {FailureEvidence} from "@lib/types";
import {EvidenceCollector} from "@lib/test_healer/evidence_collector";

export interface VerificationResult {
    passed: boolean;
    evidence: FailureEvidence;
}

/**
 * Re-runs the patched test. Only pass/fail matters here; the failure is not
 * classified again.
 */
export class Verifier {
    constructor(private evidenceCollector: EvidenceCollector) {
    }

    verify = async (testFile: string): Promise<VerificationResult> => {
        const evidence = await this.evidenceCollector.collect(testFile);
        return {passed: evidence.exitCode === 0, evidence};
    };
}
