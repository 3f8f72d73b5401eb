import { GraphLink, NodeGraph } from '../../src/plugins/node_graph';
import { Thresholds } from '../../src/wiggle/thresholds';
import { Sample, makeSample } from '../../src/wiggle/types';

/** The reference tuning most tests use. */
export const SCENARIO_THRESHOLDS: Thresholds = {
    timeWindow: 0.5,
    minDirectionChanges: 3,
    wiggleRatioThreshold: 3.0,
    minMovementPx: 5,
    minTotalDistancePx: 40,
};

/** Alternates between (0,0) and (amplitude,0), one sample every `step` seconds. */
export function oscillation(count: number, amplitude = 20, start = 0, step = 0.05): Sample[] {
    const samples: Sample[] = [];
    for (let i = 0; i < count; i++) {
        samples.push(makeSample(i % 2 === 0 ? 0 : amplitude, 0, start + i * step));
    }
    return samples;
}

export class InMemoryNodeGraph implements NodeGraph {
    constructor(public edges: GraphLink[]) {}

    public links(): Iterable<GraphLink> {
        return this.edges;
    }

    public removeLink(link: GraphLink): void {
        this.edges = this.edges.filter(edge => edge !== link);
    }
}
