import { PluginSupervisor } from './kernel/plugin_supervisor';
import { LinkSeveringPlugin } from './plugins/link_severing_plugin';
import { NodeGraph } from './plugins/node_graph';
import { WiggleDetectorOptions, WiggleDetectorPlugin } from './plugins/wiggle_detector_plugin';
import { Thresholds } from './wiggle/thresholds';

export interface WiggleDetachOptions extends WiggleDetectorOptions {
    graph: NodeGraph;
    /** Falls back to the medium preset. */
    thresholds?: Thresholds;
}

/**
 * Assembles the wiggle-to-detach pipeline: registers the host ports in the
 * PAL, then the detector and link-severing plugins, and brings them up.
 * The host publishes ENTITY_SELECTED / ENTITY_MOVED on the returned
 * supervisor's bus and calls stopAll() / destroyAll() on teardown.
 */
export async function startWiggleDetach(options: WiggleDetachOptions): Promise<PluginSupervisor> {
    const { graph, thresholds, ...detectorOptions } = options;
    const supervisor = new PluginSupervisor();

    supervisor.getPal().register('NodeGraph', graph);
    if (thresholds) {
        supervisor.getPal().register('Thresholds', thresholds);
    }

    supervisor.registerPlugin(new WiggleDetectorPlugin(detectorOptions));
    supervisor.registerPlugin(new LinkSeveringPlugin());

    await supervisor.initAll();
    await supervisor.startAll();
    return supervisor;
}
