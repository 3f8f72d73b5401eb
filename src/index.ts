export { EventBus } from './kernel/event_bus';
export type { Listener, WiggleChannel, WiggleEvents } from './kernel/event_bus';
export { PathAbstractionLayer, PluginSupervisor } from './kernel/plugin_supervisor';
export type { SupervisorState } from './kernel/plugin_supervisor';
export { startWiggleDetach } from './bootstrap';
export type { WiggleDetachOptions } from './bootstrap';
export type { PalRegistry, Plugin, PluginContext } from './kernel/plugin_supervisor';

export { SampleBuffer } from './wiggle/sample_buffer';
export {
    EPSILON,
    classifyMotion,
    countReversals,
    measureMotion,
    netDisplacement,
    totalPathLength,
    wiggleRatio,
} from './wiggle/motion_classifier';
export { GestureSession } from './wiggle/gesture_session';
export type { GestureSessionOptions, SessionState, TickOutcome } from './wiggle/gesture_session';
export { WiggleController } from './wiggle/wiggle_controller';
export type { WiggleControllerOptions } from './wiggle/wiggle_controller';
export {
    InvalidThresholdsError,
    PRESETS,
    SensitivityPresetSchema,
    ThresholdsSchema,
    createThresholds,
    resolvePreset,
} from './wiggle/thresholds';
export type { SensitivityPreset, Thresholds } from './wiggle/thresholds';
export { makeSample } from './wiggle/types';
export type {
    EntityId,
    MotionMetrics,
    MotionVerdict,
    Point,
    Sample,
    TriggerEvent,
    TriggerListener,
    TriggerReason,
} from './wiggle/types';

export { WiggleDetectorPlugin } from './plugins/wiggle_detector_plugin';
export type { WiggleDetectorOptions } from './plugins/wiggle_detector_plugin';
export { LinkSeveringPlugin } from './plugins/link_severing_plugin';
export { disconnectNode } from './plugins/node_graph';
export type { GraphLink, NodeGraph } from './plugins/node_graph';
export { DetectionToggleSchema, EntityMovedSchema, EntitySelectionSchema } from './plugins/schemas';
