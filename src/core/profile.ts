import type { WaveTrayParams } from '../types';

// Shape of the radial transition: steepness and normalized midpoint
const PROFILE_STEEPNESS = 6;
const PROFILE_MIDPOINT = 0.5;

/**
 * Logistic function 1 / (1 + e^-t).
 * Split on the sign of t so the exponential only ever sees non-positive arguments.
 */
export function sigmoid(t: number): number {
    if (t >= 0) {
        return 1 / (1 + Math.exp(-t));
    }
    const e = Math.exp(t);
    return e / (1 + e);
}

type ProfileParams = Pick<WaveTrayParams, 'baseRadiusMm' | 'radialGrowthMm'>;

/**
 * Base radius of the tray at normalized height h (0 = bottom, 1 = top).
 * Values of h outside [0, 1] are accepted and follow the same curve.
 */
export function radialProfile(params: ProfileParams, h: number): number;
export function radialProfile(params: ProfileParams, h: readonly number[]): number[];
export function radialProfile(params: ProfileParams, h: number | readonly number[]): number | number[] {
    const evaluate = (value: number) =>
        params.baseRadiusMm + params.radialGrowthMm * sigmoid(PROFILE_STEEPNESS * (value - PROFILE_MIDPOINT));

    return typeof h === 'number' ? evaluate(h) : h.map(evaluate);
}
