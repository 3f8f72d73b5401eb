/**
 * gesture_session.ts — per-entity wiggle state machine.
 *
 *   IDLE ──startTracking(id)──► TRACKING ──stopTracking()──► IDLE
 *   TRACKING ──verdict false→true──► fire trigger, clear buffer, TRACKING
 *
 * The trigger is edge-triggered: a verdict that stays true across ticks fires
 * once. With the default `clearOnTrigger` the buffer is emptied after firing,
 * so the next trigger needs a fresh window of wiggling.
 */

import { classifyMotion } from './motion_classifier';
import { SampleBuffer } from './sample_buffer';
import { Thresholds } from './thresholds';
import { EntityId, MotionVerdict, TriggerListener, makeSample } from './types';

export type SessionState = 'IDLE' | 'TRACKING';

/**
 * idle     — no entity bound, tick dropped
 * rejected — sample not strictly newer (or not finite), tick dropped
 * quiet    — verdict false
 * holding  — verdict still true since the last fire, no re-fire
 * fired    — verdict crossed false→true, trigger emitted
 */
export type TickOutcome = 'idle' | 'rejected' | 'quiet' | 'holding' | 'fired';

export interface GestureSessionOptions {
    /** Empty the buffer after firing (cooldown). Defaults to true. */
    clearOnTrigger?: boolean;
    onTrigger: TriggerListener;
}

export class GestureSession {
    private _state: SessionState = 'IDLE';
    private _entityId: EntityId | null = null;
    private _lastVerdict = false;
    private _lastMotion: MotionVerdict | null = null;
    private thresholds: Thresholds;
    private readonly buffer: SampleBuffer;
    private readonly clearOnTrigger: boolean;
    private readonly onTrigger: TriggerListener;

    constructor(thresholds: Thresholds, options: GestureSessionOptions) {
        this.thresholds = thresholds;
        this.buffer = new SampleBuffer(thresholds.timeWindow);
        this.clearOnTrigger = options.clearOnTrigger ?? true;
        this.onTrigger = options.onTrigger;
    }

    get state(): SessionState {
        return this._state;
    }

    get entityId(): EntityId | null {
        return this._entityId;
    }

    /** True while detection runs for the bound entity. */
    get armed(): boolean {
        return this._state === 'TRACKING';
    }

    get lastVerdict(): boolean {
        return this._lastVerdict;
    }

    /** Verdict computed on the most recent accepted tick, if any. */
    get lastMotion(): MotionVerdict | null {
        return this._lastMotion;
    }

    get sampleCount(): number {
        return this.buffer.size;
    }

    /** Hot-swaps thresholds; the next tick evicts against the new window. */
    public configure(thresholds: Thresholds): void {
        this.thresholds = thresholds;
        this.buffer.windowSeconds = thresholds.timeWindow;
    }

    public startTracking(entityId: EntityId): void {
        if (this._state === 'TRACKING' && this._entityId === entityId) {
            return;
        }
        // Switching targets never carries motion history over.
        this.reset();
        this._entityId = entityId;
        this._state = 'TRACKING';
    }

    public stopTracking(): void {
        this.reset();
        this._entityId = null;
        this._state = 'IDLE';
    }

    public onTick(x: number, y: number, timestamp: number): TickOutcome {
        if (this._state !== 'TRACKING' || this._entityId === null) {
            return 'idle';
        }
        if (!this.buffer.append(makeSample(x, y, timestamp))) {
            return 'rejected';
        }
        this.buffer.evict(timestamp);

        const verdict = classifyMotion(this.buffer.snapshot(), this.thresholds);
        this._lastMotion = verdict;

        if (!verdict.isWiggling) {
            this._lastVerdict = false;
            return 'quiet';
        }
        if (this._lastVerdict) {
            return 'holding';
        }

        const entityId = this._entityId;
        if (this.clearOnTrigger) {
            this.reset();
        } else {
            this._lastVerdict = true;
        }
        this.onTrigger({ entityId, reason: 'gesture', metrics: verdict.metrics });
        return 'fired';
    }

    /** Clears the buffer and the edge-detection state. */
    public reset(): void {
        this.buffer.clear();
        this._lastVerdict = false;
        this._lastMotion = null;
    }
}
