import { Sample } from './types';

/**
 * Time-windowed history of samples for one tracked entity.
 * Samples stay in insertion order, which is also timestamp order.
 */
export class SampleBuffer {
    private samples: Sample[] = [];

    constructor(public windowSeconds: number) {}

    /**
     * Appends at the tail. Returns false (and stores nothing) when the sample
     * is not strictly newer than the last one or carries non-finite numbers.
     */
    public append(sample: Sample): boolean {
        const { position, timestamp } = sample;
        if (!Number.isFinite(timestamp) || !Number.isFinite(position.x) || !Number.isFinite(position.y)) {
            return false;
        }
        const last = this.samples[this.samples.length - 1];
        if (last !== undefined && timestamp <= last.timestamp) {
            return false;
        }
        this.samples.push(sample);
        return true;
    }

    /** Prefix trim of every sample older than `now - windowSeconds`. */
    public evict(now: number): number {
        const cutoff = now - this.windowSeconds;
        let expired = 0;
        while (expired < this.samples.length && this.samples[expired].timestamp < cutoff) {
            expired++;
        }
        if (expired > 0) {
            this.samples.splice(0, expired);
        }
        return expired;
    }

    public clear(): void {
        this.samples = [];
    }

    public snapshot(): readonly Sample[] {
        return this.samples.slice();
    }

    public get size(): number {
        return this.samples.length;
    }
}
