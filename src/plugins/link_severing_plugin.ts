import { Plugin, PluginContext } from '../kernel/plugin_supervisor';
import { TriggerEvent } from '../wiggle/types';
import { NodeGraph, disconnectNode } from './node_graph';

/**
 * Turns WIGGLE_TRIGGERED into "remove every link touching this node" against
 * the host graph registered in the PAL under `NodeGraph`.
 */
export class LinkSeveringPlugin implements Plugin {
    public readonly name = 'LinkSeveringPlugin';
    public readonly version = '1.0.0';

    private context: PluginContext | null = null;
    private graph: NodeGraph | null = null;
    private unsubscribeTrigger: (() => void) | null = null;
    private readonly boundOnTrigger = this.onTrigger.bind(this);

    public init(context: PluginContext): void {
        this.context = context;
        const graph = context.pal.resolve('NodeGraph');
        if (!graph) {
            throw new Error('[LinkSeveringPlugin] No NodeGraph registered in PAL');
        }
        this.graph = graph;
    }

    public start(): void {
        if (!this.context || this.unsubscribeTrigger) return;
        this.unsubscribeTrigger = this.context.eventBus.subscribe('WIGGLE_TRIGGERED', this.boundOnTrigger);
        console.log('[LinkSeveringPlugin] Started');
    }

    public stop(): void {
        if (this.unsubscribeTrigger) {
            this.unsubscribeTrigger();
            this.unsubscribeTrigger = null;
        }
        console.log('[LinkSeveringPlugin] Stopped');
    }

    public destroy(): void {
        this.stop();
        this.graph = null;
        this.context = null;
    }

    private onTrigger(event: TriggerEvent): void {
        if (!this.graph || !this.context) return;

        const removed = disconnectNode(this.graph, event.entityId);
        if (removed > 0) {
            console.log(`[LinkSeveringPlugin] Disconnected '${event.entityId}' (${removed} links)`);
        } else {
            console.log(`[LinkSeveringPlugin] No links to remove for '${event.entityId}'`);
        }
        this.context.eventBus.publish('LINKS_SEVERED', { entityId: event.entityId, removed });
    }
}
