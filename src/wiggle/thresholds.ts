import { z } from 'zod';

// Every snapshot the engine holds has passed ThresholdsSchema.

export const ThresholdsSchema = z.object({
    timeWindow: z.number().finite().positive(),
    minDirectionChanges: z.number().int().min(1),
    wiggleRatioThreshold: z.number().finite().gt(1.0),
    minMovementPx: z.number().finite().nonnegative(),
    minTotalDistancePx: z.number().finite().nonnegative(),
}).strict();

export type Thresholds = Readonly<z.infer<typeof ThresholdsSchema>>;

export const SensitivityPresetSchema = z.enum(['low', 'medium', 'high']);
export type SensitivityPreset = z.infer<typeof SensitivityPresetSchema>;

export class InvalidThresholdsError extends Error {
    public readonly issues: z.ZodIssue[];

    constructor(issues: z.ZodIssue[]) {
        const detail = issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        super(`[Thresholds] Invalid wiggle thresholds: ${detail}`);
        this.name = 'InvalidThresholdsError';
        this.issues = issues;
    }
}

const BASE = {
    timeWindow: 0.5,
    minMovementPx: 5.0,
} as const;

export const PRESETS: Readonly<Record<SensitivityPreset, Thresholds>> = {
    // Requires very aggressive wiggling
    low: { ...BASE, minDirectionChanges: 5, wiggleRatioThreshold: 4.0, minTotalDistancePx: 150.0 },
    medium: { ...BASE, minDirectionChanges: 3, wiggleRatioThreshold: 3.0, minTotalDistancePx: 100.0 },
    // Detects gentle wiggling
    high: { ...BASE, minDirectionChanges: 2, wiggleRatioThreshold: 2.0, minTotalDistancePx: 50.0 },
};

/**
 * Validates an untrusted thresholds object and returns a frozen snapshot.
 * Throws {@link InvalidThresholdsError} listing every offending field.
 */
export function createThresholds(input: unknown): Thresholds {
    const result = ThresholdsSchema.safeParse(input);
    if (!result.success) {
        throw new InvalidThresholdsError(result.error.issues);
    }
    return Object.freeze(result.data);
}

/**
 * Maps a preset name to concrete numbers, with optional advanced overrides
 * layered on top. The engine itself never sees preset names.
 */
export function resolvePreset(
    preset: SensitivityPreset,
    overrides: Partial<Thresholds> = {}
): Thresholds {
    return createThresholds({ ...PRESETS[preset], ...overrides });
}
