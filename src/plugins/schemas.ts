import { z } from 'zod';

// The host editor is not type-checked against us; its payloads are parsed at
// the plugin boundary before they reach the controller.

export const EntityIdSchema = z.string().min(1);

export const EntityMovedSchema = z.object({
    entityId: EntityIdSchema,
    x: z.number().finite(),
    y: z.number().finite(),
    timestamp: z.number().finite().nonnegative(),
});

export const EntitySelectionSchema = z.object({
    entityIds: z.array(EntityIdSchema),
});

export const DetectionToggleSchema = z.object({
    enabled: z.boolean(),
});

export type EntityMovedPayload = z.infer<typeof EntityMovedSchema>;
export type EntitySelectionPayload = z.infer<typeof EntitySelectionSchema>;
export type DetectionTogglePayload = z.infer<typeof DetectionToggleSchema>;
