export interface PacerClock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

export const systemClock: PacerClock = {
    now: () => Date.now(),
    sleep: (ms) => new Promise(resolve => setTimeout(resolve, ms)),
};

/**
 * Minimum-interval limiter: `wait()` resolves once at least `minIntervalMs`
 * has passed since the previous `wait()` resolved. Share one instance between
 * every call site that talks to the same remote system.
 *
 * Callers are sequential; concurrent waiters are not queued.
 */
export class RequestPacer {
    private lastReleaseAt: number | null = null;

    constructor(
        readonly minIntervalMs: number,
        private readonly clock: PacerClock = systemClock
    ) { }

    async wait(): Promise<void> {
        if (this.lastReleaseAt !== null && this.minIntervalMs > 0) {
            const remaining = this.minIntervalMs - (this.clock.now() - this.lastReleaseAt);
            if (remaining > 0) {
                await this.clock.sleep(remaining);
            }
        }
        this.lastReleaseAt = this.clock.now();
    }
}
