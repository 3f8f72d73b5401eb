/**
 * motion_classifier.ts — pure wiggle classification over a sample window.
 *
 * A wiggle is motion that keeps doubling back on itself: lots of path
 * travelled, little net displacement, several direction reversals. All three
 * conditions must hold:
 *
 *   pathLength   >= minTotalDistancePx      (rejects tiny jitter)
 *   reversals    >= minDirectionChanges     (rejects smooth drags)
 *   pathLength / max(displacement, EPSILON)
 *                >= wiggleRatioThreshold    (rejects zig-zag drags that travel)
 *
 * No hidden state: the same samples and thresholds always give the same verdict.
 */

import { Thresholds } from './thresholds';
import { MotionMetrics, MotionVerdict, Point, Sample } from './types';

/** Floor for the ratio denominator; also the "no motion at all" cutoff. */
export const EPSILON = 1e-6;

interface Vector {
    dx: number;
    dy: number;
    length: number;
}

function delta(from: Point, to: Point): Vector {
    const dx = to.x - from.x;
    const dy = to.y - from.y;
    return { dx, dy, length: Math.hypot(dx, dy) };
}

function stepVectors(samples: readonly Sample[]): Vector[] {
    const steps: Vector[] = [];
    for (let i = 1; i < samples.length; i++) {
        steps.push(delta(samples[i - 1].position, samples[i].position));
    }
    return steps;
}

export function totalPathLength(samples: readonly Sample[]): number {
    let total = 0;
    for (const step of stepVectors(samples)) {
        total += step.length;
    }
    return total;
}

export function netDisplacement(samples: readonly Sample[]): number {
    if (samples.length < 2) return 0;
    return delta(samples[0].position, samples[samples.length - 1].position).length;
}

export function wiggleRatio(pathLength: number, displacement: number): number {
    if (pathLength < EPSILON) return 0;
    return pathLength / Math.max(displacement, EPSILON);
}

/**
 * Combined 2-D reversal count. Steps at or under `minMovementPx` are dropped
 * first; a reversal is a negative dot product between neighbouring survivors.
 */
export function countReversals(samples: readonly Sample[], minMovementPx: number): number {
    const moves = stepVectors(samples).filter(step => step.length > minMovementPx);
    let reversals = 0;
    for (let i = 1; i < moves.length; i++) {
        const dot = moves[i - 1].dx * moves[i].dx + moves[i - 1].dy * moves[i].dy;
        if (dot < 0) reversals++;
    }
    return reversals;
}

export function measureMotion(samples: readonly Sample[], minMovementPx: number): MotionMetrics {
    const pathLength = totalPathLength(samples);
    const displacement = netDisplacement(samples);
    return {
        sampleCount: samples.length,
        totalPathLength: pathLength,
        netDisplacement: displacement,
        wiggleRatio: wiggleRatio(pathLength, displacement),
        reversalCount: countReversals(samples, minMovementPx),
    };
}

export function classifyMotion(samples: readonly Sample[], thresholds: Thresholds): MotionVerdict {
    const metrics = measureMotion(samples, thresholds.minMovementPx);

    // Fewer than two samples carry no motion.
    if (samples.length < 2) {
        return { isWiggling: false, metrics };
    }

    const isWiggling =
        metrics.totalPathLength >= thresholds.minTotalDistancePx &&
        metrics.reversalCount >= thresholds.minDirectionChanges &&
        metrics.wiggleRatio >= thresholds.wiggleRatioThreshold;

    return { isWiggling, metrics };
}
