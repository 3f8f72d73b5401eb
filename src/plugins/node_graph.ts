import { EntityId } from '../wiggle/types';

export interface GraphLink {
    readonly from: EntityId;
    readonly to: EntityId;
}

/** Host graph port. Implementations wrap whatever editor owns the links. */
export interface NodeGraph {
    links(): Iterable<GraphLink>;
    removeLink(link: GraphLink): void;
}

/** Removes every link whose source or target is `entityId`; returns how many went. */
export function disconnectNode(graph: NodeGraph, entityId: EntityId): number {
    // Collect first: removing while iterating the host's live collection skips entries.
    const linksToRemove: GraphLink[] = [];
    for (const link of graph.links()) {
        if (link.from === entityId || link.to === entityId) {
            linksToRemove.push(link);
        }
    }
    for (const link of linksToRemove) {
        graph.removeLink(link);
    }
    return linksToRemove.length;
}
