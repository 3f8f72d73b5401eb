import { Plugin, PluginContext } from '../kernel/plugin_supervisor';
import { resolvePreset } from '../wiggle/thresholds';
import { WiggleController } from '../wiggle/wiggle_controller';
import { EntityId } from '../wiggle/types';
import {
    DetectionTogglePayload,
    DetectionToggleSchema,
    EntityMovedPayload,
    EntityMovedSchema,
    EntitySelectionPayload,
    EntitySelectionSchema,
} from './schemas';

export interface WiggleDetectorOptions {
    multiEntity?: boolean;
    clearOnTrigger?: boolean;
    /** Initial arm state. Defaults to true. */
    enabled?: boolean;
}

/**
 * Bridges host editor events to a WiggleController.
 *
 * ENTITY_SELECTED      → startTracking / stopTracking
 * ENTITY_MOVED         → onTick, selected entities only
 * DETECTION_TOGGLED    → enable / disable
 * DISCONNECT_REQUESTED → forceTrigger
 *
 * Thresholds come from the PAL key `Thresholds`, else the medium preset.
 */
export class WiggleDetectorPlugin implements Plugin {
    public readonly name = 'WiggleDetectorPlugin';
    public readonly version = '1.0.0';

    private context: PluginContext | null = null;
    private controller: WiggleController | null = null;
    private unsubscribers: Array<() => void> = [];
    private selection: EntityId[] = [];

    private readonly boundOnSelected = this.onSelected.bind(this);
    private readonly boundOnMoved = this.onMoved.bind(this);
    private readonly boundOnToggled = this.onToggled.bind(this);
    private readonly boundOnDisconnect = this.onDisconnectRequested.bind(this);

    constructor(private readonly options: WiggleDetectorOptions = {}) {}

    public init(context: PluginContext): void {
        this.context = context;
        const thresholds = context.pal.resolve('Thresholds') ?? resolvePreset('medium');
        this.controller = new WiggleController({
            thresholds,
            multiEntity: this.options.multiEntity,
            clearOnTrigger: this.options.clearOnTrigger,
            enabled: this.options.enabled,
            eventBus: context.eventBus,
        });
    }

    public start(): void {
        if (!this.context || this.unsubscribers.length > 0) return;
        const bus = this.context.eventBus;
        this.unsubscribers = [
            bus.subscribe('ENTITY_SELECTED', this.boundOnSelected),
            bus.subscribe('ENTITY_MOVED', this.boundOnMoved),
            bus.subscribe('DETECTION_TOGGLED', this.boundOnToggled),
            bus.subscribe('DISCONNECT_REQUESTED', this.boundOnDisconnect),
        ];
        // stop() dropped every session; rebind to what is still selected.
        if (this.controller) {
            this.applySelection(this.controller);
        }
        console.log('[WiggleDetectorPlugin] Started');
    }

    public stop(): void {
        for (const unsubscribe of this.unsubscribers) {
            unsubscribe();
        }
        this.unsubscribers = [];
        this.controller?.stopTracking();
        console.log('[WiggleDetectorPlugin] Stopped');
    }

    public destroy(): void {
        this.stop();
        this.controller = null;
        this.context = null;
        this.selection = [];
    }

    public getController(): WiggleController | null {
        return this.controller;
    }

    private onSelected(payload: EntitySelectionPayload): void {
        const parsed = EntitySelectionSchema.safeParse(payload);
        if (!parsed.success || !this.controller) {
            this.warnDropped('ENTITY_SELECTED', parsed.success ? undefined : parsed.error.message);
            return;
        }
        this.selection = parsed.data.entityIds;
        this.applySelection(this.controller);
    }

    private applySelection(controller: WiggleController): void {
        const selected = new Set(this.selection);
        for (const entityId of controller.trackedEntities()) {
            if (!selected.has(entityId)) {
                controller.stopTracking(entityId);
            }
        }
        if (controller.isMultiEntity()) {
            for (const entityId of selected) {
                controller.startTracking(entityId);
            }
        } else if (this.selection.length > 0) {
            // Single-entity mode follows the most recently selected entity.
            controller.startTracking(this.selection[this.selection.length - 1]);
        }
    }

    private onMoved(payload: EntityMovedPayload): void {
        const parsed = EntityMovedSchema.safeParse(payload);
        if (!parsed.success || !this.controller) {
            this.warnDropped('ENTITY_MOVED', parsed.success ? undefined : parsed.error.message);
            return;
        }
        const { entityId, x, y, timestamp } = parsed.data;
        // Only selected nodes are drag targets.
        if (!this.selection.includes(entityId)) return;
        this.controller.onTick(entityId, x, y, timestamp);
    }

    private onToggled(payload: DetectionTogglePayload): void {
        const parsed = DetectionToggleSchema.safeParse(payload);
        if (!parsed.success || !this.controller) {
            this.warnDropped('DETECTION_TOGGLED', parsed.success ? undefined : parsed.error.message);
            return;
        }
        if (parsed.data.enabled) {
            this.controller.enable();
            // Disabling dropped every session; rebind to what is still selected.
            this.applySelection(this.controller);
        } else {
            this.controller.disable();
        }
    }

    private onDisconnectRequested(payload: EntitySelectionPayload): void {
        const parsed = EntitySelectionSchema.safeParse(payload);
        if (!parsed.success || !this.controller) {
            this.warnDropped('DISCONNECT_REQUESTED', parsed.success ? undefined : parsed.error.message);
            return;
        }
        for (const entityId of parsed.data.entityIds) {
            this.controller.forceTrigger(entityId);
        }
    }

    private warnDropped(channel: string, reason = 'plugin not initialized'): void {
        console.warn(`[WiggleDetectorPlugin] Dropped ${channel}: ${reason}`);
    }
}
