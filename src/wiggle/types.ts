// Opaque handle for a tracked entity. The engine only compares ids.
export type EntityId = string;

export interface Point {
    readonly x: number;
    readonly y: number;
}

export interface Sample {
    readonly position: Point;
    /** Seconds, monotonically non-decreasing across a session. */
    readonly timestamp: number;
}

export interface MotionMetrics {
    readonly sampleCount: number;
    readonly totalPathLength: number;
    readonly netDisplacement: number;
    readonly wiggleRatio: number;
    readonly reversalCount: number;
}

export interface MotionVerdict {
    readonly isWiggling: boolean;
    readonly metrics: MotionMetrics;
}

export type TriggerReason = 'gesture' | 'manual';

export interface TriggerEvent {
    entityId: EntityId;
    reason: TriggerReason;
    /** Present for gesture triggers; manual triggers skip classification. */
    metrics?: MotionMetrics;
}

export type TriggerListener = (event: TriggerEvent) => void;

export const makeSample = (x: number, y: number, timestamp: number): Sample => ({
    position: { x, y },
    timestamp,
});
