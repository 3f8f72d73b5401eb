import { startWiggleDetach } from '../src/bootstrap';
import { WiggleDetectorPlugin } from '../src/plugins/wiggle_detector_plugin';
import { InMemoryNodeGraph, SCENARIO_THRESHOLDS, oscillation } from './helpers/fixtures';

function makeGraph(): InMemoryNodeGraph {
    return new InMemoryNodeGraph([
        { from: 'texture', to: 'shader' },
        { from: 'shader', to: 'output' },
        { from: 'noise', to: 'texture' },
    ]);
}

describe('startWiggleDetach', () => {
    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('brings up both plugins and detaches a wiggled selected node', async () => {
        const graph = makeGraph();
        const supervisor = await startWiggleDetach({ graph, thresholds: SCENARIO_THRESHOLDS });
        expect(supervisor.getState()).toBe('RUNNING');

        const bus = supervisor.getEventBus();
        bus.publish('ENTITY_SELECTED', { entityIds: ['shader'] });
        for (const s of oscillation(5)) {
            bus.publish('ENTITY_MOVED', { entityId: 'shader', x: s.position.x, y: s.position.y, timestamp: s.timestamp });
        }

        expect(graph.edges).toEqual([{ from: 'noise', to: 'texture' }]);
        await supervisor.stopAll();
        await supervisor.destroyAll();
    });

    it('defaults to the medium preset and passes detector options through', async () => {
        const supervisor = await startWiggleDetach({ graph: makeGraph(), multiEntity: true });
        const detector = supervisor.getPlugin('WiggleDetectorPlugin');

        expect(detector).toBeInstanceOf(WiggleDetectorPlugin);
        if (detector instanceof WiggleDetectorPlugin) {
            expect(detector.getController()?.getThresholds().minTotalDistancePx).toBe(100);
            expect(detector.getController()?.isMultiEntity()).toBe(true);
        }
        await supervisor.destroyAll();
    });

    it('a manual disconnect request severs links through the whole pipeline', async () => {
        const graph = makeGraph();
        const supervisor = await startWiggleDetach({ graph });
        const severed: number[] = [];
        supervisor.getEventBus().subscribe('LINKS_SEVERED', event => severed.push(event.removed));

        supervisor.getEventBus().publish('DISCONNECT_REQUESTED', { entityIds: ['texture'] });

        expect(severed).toEqual([2]);
        expect(graph.edges).toEqual([{ from: 'shader', to: 'output' }]);
        await supervisor.destroyAll();
    });
});
