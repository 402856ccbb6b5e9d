import {ExecutionTimeline, StageStatus, TimelineStage} from "@lib/types";

export type Clock = () => Date;

export interface StageHandle {
    end(status: StageStatus, details: string): void;
}

/**
 * Collects the stages of one healing attempt in the order they ran.
 */
export class ExecutionTimelineRecorder {
    private stages: TimelineStage[] = [];
    private readonly startedAt: string;

    constructor(
        private testFile: string,
        private attempt: number,
        private clock: Clock = () => new Date(),
    ) {
        this.startedAt = this.now();
    }

    begin = (name: string): StageHandle => {
        const startedAt = this.now();
        let ended = false;
        return {
            end: (status, details) => {
                if (ended) {
                    throw new Error(`Stage '${name}' already ended`);
                }
                ended = true;
                this.stages.push({name, startedAt, endedAt: this.now(), status, details});
            },
        };
    };

    skip = (name: string, details: string): void => {
        const at = this.now();
        this.stages.push({name, startedAt: at, endedAt: at, status: "skipped", details});
    };

    finish = (): ExecutionTimeline => ({
        testFile: this.testFile,
        attempt: this.attempt,
        startedAt: this.startedAt,
        endedAt: this.now(),
        stages: [...this.stages],
    });

    private now = (): string => this.clock().toISOString();
}
