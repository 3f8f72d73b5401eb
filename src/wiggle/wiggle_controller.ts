/**
 * wiggle_controller.ts — top-level owner of wiggle detection.
 *
 * Holds the global enable flag, the thresholds snapshot and the
 * entity → GestureSession map. The host drives it synchronously:
 *
 *   controller.startTracking('node-a');
 *   // every frame:
 *   controller.onTick('node-a', x, y, nowSeconds);
 *
 * Single-entity mode keeps one session and rebinds it on startTracking().
 * Multi-entity mode keeps one independent session per started id. In both
 * modes a tick for an id that is not tracked is dropped.
 */

import { EventBus } from '../kernel/event_bus';
import { GestureSession, TickOutcome } from './gesture_session';
import { Thresholds, createThresholds } from './thresholds';
import { EntityId, TriggerEvent, TriggerListener } from './types';

export interface WiggleControllerOptions {
    thresholds: Thresholds;
    /** Track several entities at once. Defaults to false. */
    multiEntity?: boolean;
    /** Passed to every session. Defaults to true. */
    clearOnTrigger?: boolean;
    /** Start armed. Defaults to true. */
    enabled?: boolean;
    /** WIGGLE_TRIGGERED is published here when given. */
    eventBus?: EventBus;
    onTrigger?: TriggerListener;
}

export class WiggleController {
    private readonly sessions: Map<EntityId, GestureSession> = new Map();
    private readonly multiEntity: boolean;
    private readonly clearOnTrigger: boolean;
    private readonly eventBus?: EventBus;
    private readonly listener?: TriggerListener;
    private thresholds: Thresholds;
    private enabled: boolean;
    private readonly boundEmit: TriggerListener;

    constructor(options: WiggleControllerOptions) {
        this.thresholds = createThresholds(options.thresholds);
        this.multiEntity = options.multiEntity ?? false;
        this.clearOnTrigger = options.clearOnTrigger ?? true;
        this.enabled = options.enabled ?? true;
        this.eventBus = options.eventBus;
        this.listener = options.onTrigger;
        this.boundEmit = this.emit.bind(this);
    }

    public isEnabled(): boolean {
        return this.enabled;
    }

    public isMultiEntity(): boolean {
        return this.multiEntity;
    }

    public getThresholds(): Thresholds {
        return this.thresholds;
    }

    public enable(): void {
        if (this.enabled) return;
        this.enabled = true;
        console.log('[WiggleController] Detection enabled');
    }

    /** Stops every session; ticks are ignored until enable(). */
    public disable(): void {
        if (!this.enabled) return;
        this.enabled = false;
        this.stopTracking();
        console.log('[WiggleController] Detection disabled');
    }

    /** Validates, then hot-swaps the thresholds of every live session. */
    public setThresholds(thresholds: Thresholds): void {
        this.thresholds = createThresholds(thresholds);
        for (const session of this.sessions.values()) {
            session.configure(this.thresholds);
        }
    }

    /** Returns false when detection is disabled and nothing was bound. */
    public startTracking(entityId: EntityId): boolean {
        if (!this.enabled) return false;

        if (this.multiEntity) {
            this.sessionFor(entityId);
            return true;
        }

        const [current] = this.sessions.values();
        if (current && current.entityId === entityId) {
            return true;
        }
        this.sessions.clear();
        if (current) {
            current.startTracking(entityId);
            this.sessions.set(entityId, current);
        } else {
            this.sessionFor(entityId);
        }
        return true;
    }

    /** Stops one entity, or every entity when called without an id. */
    public stopTracking(entityId?: EntityId): void {
        if (entityId === undefined) {
            for (const session of this.sessions.values()) {
                session.stopTracking();
            }
            this.sessions.clear();
            return;
        }
        const session = this.sessions.get(entityId);
        if (session) {
            session.stopTracking();
            this.sessions.delete(entityId);
        }
    }

    public isTracking(entityId: EntityId): boolean {
        return this.sessions.has(entityId);
    }

    public trackedEntities(): EntityId[] {
        return Array.from(this.sessions.keys());
    }

    public getSession(entityId: EntityId): GestureSession | undefined {
        return this.sessions.get(entityId);
    }

    public onTick(entityId: EntityId, x: number, y: number, timestamp: number): TickOutcome {
        if (!this.enabled) return 'idle';

        // Untracked ids are a benign race with host selection changes.
        const session = this.sessions.get(entityId);
        if (!session) return 'idle';
        return session.onTick(x, y, timestamp);
    }

    /** Fires the trigger without classification; works while disabled. */
    public forceTrigger(entityId: EntityId): void {
        this.sessions.get(entityId)?.reset();
        this.emit({ entityId, reason: 'manual' });
    }

    private sessionFor(entityId: EntityId): GestureSession {
        let session = this.sessions.get(entityId);
        if (!session) {
            session = new GestureSession(this.thresholds, {
                clearOnTrigger: this.clearOnTrigger,
                onTrigger: this.boundEmit,
            });
            session.startTracking(entityId);
            this.sessions.set(entityId, session);
        }
        return session;
    }

    private emit(event: TriggerEvent): void {
        if (event.metrics) {
            const { reversalCount, wiggleRatio, totalPathLength } = event.metrics;
            console.log(
                `[WiggleController] Wiggle on '${event.entityId}' ` +
                `(${reversalCount} reversals, ratio ${wiggleRatio.toFixed(2)}, path ${totalPathLength.toFixed(1)}px)`
            );
        } else {
            console.log(`[WiggleController] Manual trigger on '${event.entityId}'`);
        }
        this.listener?.(event);
        this.eventBus?.publish('WIGGLE_TRIGGERED', event);
    }
}
