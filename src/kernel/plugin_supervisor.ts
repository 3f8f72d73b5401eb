import { EventBus } from './event_bus';
import type { Thresholds } from '../wiggle/thresholds';
import type { NodeGraph } from '../plugins/node_graph';

/** Host ports a plugin may resolve at init(). */
export interface PalRegistry {
    NodeGraph: NodeGraph;
    Thresholds: Thresholds;
}

export interface PluginContext {
    eventBus: EventBus;
    pal: PathAbstractionLayer;
}

export interface Plugin {
    name: string;
    version: string;

    init(context: PluginContext): Promise<void> | void;
    start(): Promise<void> | void;
    stop(): Promise<void> | void;
    destroy(): Promise<void> | void;
}

export class PathAbstractionLayer {
    private registry: Partial<PalRegistry> = {};

    public register<K extends keyof PalRegistry>(key: K, value: PalRegistry[K]): void {
        if (this.registry[key] !== undefined) {
            console.warn(`[PAL] Overwriting existing key: ${key}`);
        }
        this.registry[key] = value;
    }

    public resolve<K extends keyof PalRegistry>(key: K): PalRegistry[K] | undefined {
        return this.registry[key];
    }
}

type LifecyclePhase = 'init' | 'start' | 'stop' | 'destroy';

export type SupervisorState = 'REGISTERING' | 'INITIALIZED' | 'RUNNING' | 'STOPPED' | 'DESTROYED';

/**
 * Drives every plugin through init → start → stop → destroy.
 *
 * init and start run in registration order and fail closed: the first error
 * is rethrown and later plugins are not touched. stop and destroy run in
 * reverse order and keep going past a failing plugin.
 */
export class PluginSupervisor {
    private plugins: Map<string, Plugin> = new Map();
    private context: PluginContext;
    private state: SupervisorState = 'REGISTERING';

    constructor(eventBus?: EventBus, pal?: PathAbstractionLayer) {
        this.context = {
            eventBus: eventBus ?? new EventBus(),
            pal: pal ?? new PathAbstractionLayer(),
        };
    }

    public getEventBus(): EventBus {
        return this.context.eventBus;
    }

    public getPal(): PathAbstractionLayer {
        return this.context.pal;
    }

    public getState(): SupervisorState {
        return this.state;
    }

    public registerPlugin(plugin: Plugin): void {
        if (this.state !== 'REGISTERING') {
            throw new Error(`[Supervisor] Cannot register ${plugin.name} after init (state ${this.state})`);
        }
        if (this.plugins.has(plugin.name)) {
            throw new Error(`[Supervisor] Plugin already registered: ${plugin.name}`);
        }
        this.plugins.set(plugin.name, plugin);
        console.log(`[Supervisor] Registered ${plugin.name} v${plugin.version}`);
    }

    public getPlugin(name: string): Plugin | undefined {
        return this.plugins.get(name);
    }

    public async initAll(): Promise<void> {
        await this.runPhase('init', plugin => plugin.init(this.context));
        this.state = 'INITIALIZED';
    }

    public async startAll(): Promise<void> {
        await this.runPhase('start', plugin => plugin.start());
        this.state = 'RUNNING';
    }

    public async stopAll(): Promise<void> {
        await this.runPhase('stop', plugin => plugin.stop());
        this.state = 'STOPPED';
    }

    public async destroyAll(): Promise<void> {
        await this.runPhase('destroy', plugin => plugin.destroy());
        this.plugins.clear();
        this.state = 'DESTROYED';
    }

    private async runPhase(
        phase: LifecyclePhase,
        step: (plugin: Plugin) => Promise<void> | void
    ): Promise<void> {
        const failClosed = phase === 'init' || phase === 'start';
        const ordered = Array.from(this.plugins.values());
        if (!failClosed) ordered.reverse();

        console.log(`[Supervisor] ${phase} ${ordered.length} plugins`);
        for (const plugin of ordered) {
            try {
                await step(plugin);
            } catch (error) {
                console.error(`[Supervisor] ${plugin.name} failed to ${phase}`, error);
                if (failClosed) throw error;
            }
        }
    }
}
