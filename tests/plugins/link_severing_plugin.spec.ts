import { EventBus } from '../../src/kernel/event_bus';
import { PathAbstractionLayer } from '../../src/kernel/plugin_supervisor';
import { LinkSeveringPlugin } from '../../src/plugins/link_severing_plugin';
import { disconnectNode } from '../../src/plugins/node_graph';
import { InMemoryNodeGraph } from '../helpers/fixtures';

function makeGraph(): InMemoryNodeGraph {
    return new InMemoryNodeGraph([
        { from: 'texture', to: 'shader' },
        { from: 'shader', to: 'output' },
        { from: 'noise', to: 'texture' },
    ]);
}

describe('disconnectNode', () => {
    it('removes links on both sides of the node', () => {
        const graph = makeGraph();
        expect(disconnectNode(graph, 'shader')).toBe(2);
        expect(graph.edges).toEqual([{ from: 'noise', to: 'texture' }]);
    });

    it('returns 0 for a node without links', () => {
        const graph = makeGraph();
        expect(disconnectNode(graph, 'frame')).toBe(0);
        expect(graph.edges).toHaveLength(3);
    });
});

describe('LinkSeveringPlugin', () => {
    let log: jest.SpyInstance;

    beforeEach(() => {
        log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('refuses to initialize without a NodeGraph', () => {
        const plugin = new LinkSeveringPlugin();
        expect(() => plugin.init({ eventBus: new EventBus(), pal: new PathAbstractionLayer() }))
            .toThrow('[LinkSeveringPlugin] No NodeGraph registered in PAL');
    });

    it('severs links on WIGGLE_TRIGGERED and reports the count', () => {
        const graph = makeGraph();
        const pal = new PathAbstractionLayer();
        pal.register('NodeGraph', graph);
        const bus = new EventBus();
        const severed: Array<{ entityId: string; removed: number }> = [];
        bus.subscribe('LINKS_SEVERED', event => severed.push(event));

        const plugin = new LinkSeveringPlugin();
        plugin.init({ eventBus: bus, pal });
        plugin.start();
        bus.publish('WIGGLE_TRIGGERED', { entityId: 'texture', reason: 'manual' });

        expect(severed).toEqual([{ entityId: 'texture', removed: 2 }]);
        expect(graph.edges).toEqual([{ from: 'shader', to: 'output' }]);
        expect(log).toHaveBeenCalledWith("[LinkSeveringPlugin] Disconnected 'texture' (2 links)");
    });

    it('reports zero when the node has no links', () => {
        const pal = new PathAbstractionLayer();
        pal.register('NodeGraph', makeGraph());
        const bus = new EventBus();
        const plugin = new LinkSeveringPlugin();
        plugin.init({ eventBus: bus, pal });
        plugin.start();
        bus.publish('WIGGLE_TRIGGERED', { entityId: 'frame', reason: 'manual' });
        expect(log).toHaveBeenCalledWith("[LinkSeveringPlugin] No links to remove for 'frame'");
    });

    it('stops listening after stop()', () => {
        const graph = makeGraph();
        const pal = new PathAbstractionLayer();
        pal.register('NodeGraph', graph);
        const bus = new EventBus();
        const plugin = new LinkSeveringPlugin();
        plugin.init({ eventBus: bus, pal });
        plugin.start();
        plugin.stop();
        expect(bus.publish('WIGGLE_TRIGGERED', { entityId: 'shader', reason: 'manual' })).toBe(false);
        expect(graph.edges).toHaveLength(3);
    });
});
