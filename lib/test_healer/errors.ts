import {HealingErrorCode} from "@lib/types";

/**
 * Raised inside a pipeline stage. The orchestrator turns it into the
 * decision's error field instead of letting it escape.
 */
export class HealingStageError extends Error {
    constructor(
        public readonly code: HealingErrorCode,
        message: string,
    ) {
        super(message);
        this.name = "HealingStageError";
    }
}

export const isHealingStageError = (e: unknown): e is HealingStageError =>
    e instanceof HealingStageError;
