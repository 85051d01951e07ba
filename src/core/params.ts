import { z } from 'zod';
import type { WaveTrayParams } from '../types';

export class InvalidParamsError extends Error {
    readonly field: string;

    constructor(field: string, reason: string) {
        super(`Invalid wave tray parameter "${field}": ${reason}`);
        this.name = 'InvalidParamsError';
        this.field = field;
    }
}

export const DEFAULT_WAVE_TRAY_PARAMS: Readonly<WaveTrayParams> = Object.freeze({
    layerCount: 120,
    layerHeightMm: 1.0,
    baseRadiusMm: 20,
    radialGrowthMm: 5,
    waveAmplitudeMm: 2.0,
    waveFrequency: 100.5,
    waveSampleCount: 403,
    holeSampleCount: 200,
    holeRadiusMm: 15.3,
    holeLayerLimit: 2,
    holeOffsetMm: 0.4,
    infillMode: 'line',
    infillDistanceMm: 0.5,
    infillAngleOffsetRad: Math.PI / 4,
    infillAngleStepRad: Math.PI / 2,
    concentricPitchMm: 0.5,
    concentricClearanceMm: 0.4
});

const finite = z.number().finite();
const positive = finite.positive('must be greater than 0');
const sampleCount = z.number().int('must be an integer').min(3, 'must be at least 3');

export const waveTrayParamsShape = z.object({
    layerCount: z.number().int('must be an integer').positive('must be greater than 0'),
    layerHeightMm: positive,
    baseRadiusMm: positive,
    radialGrowthMm: finite,
    waveAmplitudeMm: finite,
    waveFrequency: finite,
    waveSampleCount: sampleCount,
    holeSampleCount: sampleCount,
    holeRadiusMm: positive,
    holeLayerLimit: z.number().int('must be an integer').nonnegative('must not be negative'),
    holeOffsetMm: positive,
    infillMode: z.enum(['line', 'concentric']),
    infillDistanceMm: positive,
    infillAngleOffsetRad: finite,
    infillAngleStepRad: finite,
    concentricPitchMm: positive,
    concentricClearanceMm: finite.nonnegative('must not be negative')
}).strict();

export const waveTrayParamsSchema = waveTrayParamsShape.superRefine((p, ctx) => {
    if (p.holeRadiusMm >= p.baseRadiusMm) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['holeRadiusMm'],
            message: `must be smaller than baseRadiusMm (${p.baseRadiusMm})`
        });
    }
    if (p.holeLayerLimit > p.layerCount) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['holeLayerLimit'],
            message: `must not exceed layerCount (${p.layerCount})`
        });
    }
    if (p.holeOffsetMm >= p.holeRadiusMm) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['holeOffsetMm'],
            message: `must be smaller than holeRadiusMm (${p.holeRadiusMm})`
        });
    }
});

/**
 * Validates the given values merged over the defaults and returns a frozen parameter set.
 * Throws InvalidParamsError naming the first offending field.
 */
export function createWaveTrayParams(overrides: Partial<WaveTrayParams> = {}): Readonly<WaveTrayParams> {
    const result = waveTrayParamsSchema.safeParse({ ...DEFAULT_WAVE_TRAY_PARAMS, ...overrides });

    if (!result.success) {
        const issue = result.error.issues[0];
        if (issue.code === z.ZodIssueCode.unrecognized_keys) {
            throw new InvalidParamsError(issue.keys.join(', '), 'unknown field');
        }
        throw new InvalidParamsError(issue.path.join('.') || '(root)', issue.message);
    }

    return Object.freeze({ ...result.data });
}
