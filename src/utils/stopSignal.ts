/**
 * src/utils/stopSignal.ts
 *
 * Caller-owned cancellation context for one harvest run.
 *
 * Two independent flags, written by whatever controls the run (the CLI's
 * SIGINT handler) and only read by the pipeline:
 *
 *   stopScrolling → end discovery, go on to extraction
 *   stopAll       → abort the run at the next checkpoint, keep what was built
 *
 * Both are monotone within a run. The caller clears them with reset()
 * before starting the next one.
 */

export class StopSignal {
    private scrolling = false;
    private all = false;

    get stopScrolling(): boolean {
        return this.scrolling;
    }

    get stopAll(): boolean {
        return this.all;
    }

    requestStopScrolling(): void {
        this.scrolling = true;
    }

    requestStopAll(): void {
        this.all = true;
    }

    reset(): void {
        this.scrolling = false;
        this.all = false;
    }
}
