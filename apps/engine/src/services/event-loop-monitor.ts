import { monitorEventLoopDelay } from 'perf_hooks';

/** Event-loop delay at a chosen percentile, in milliseconds. */
export class EventLoopMonitor {
    private readonly histogram: ReturnType<typeof monitorEventLoopDelay>;

    constructor(resolution = 10, private readonly percentile = 99) {
        this.histogram = monitorEventLoopDelay({ resolution });
        this.histogram.enable();
    }

    get lag(): number {
        return this.histogram.percentile(this.percentile) / 1_000_000;
    }

    exceeds(thresholdMs: number): boolean {
        return this.lag >= thresholdMs;
    }

    disable(): void {
        this.histogram.disable();
    }
}
