import type { InfillMode, WaveTrayParams } from '../types';
import { Filling } from '../lib/filling';
import { Path, PathGroup } from '../lib/toolpath';
import { logger } from '../lib/logger';

/**
 * Geometry of one holed layer, handed to the infill strategy.
 */
export interface LayerContours {
    layerIndex: number;
    outerWall: Path;
    holeWall: Path;
    waveRadius: readonly number[]; // Outer wall radius per sample
    holeAngles: readonly number[];
    fillZ: number;                 // Height of constant-Z paths in this layer
}

type InfillFn = (params: Readonly<WaveTrayParams>, layer: LayerContours) => PathGroup;

/**
 * Hatch angle of a layer. Rotating it every layer keeps the stack from having
 * a weak plane along a single direction.
 */
export function infillAngleForLayer(params: Readonly<WaveTrayParams>, layerIndex: number): number {
    return params.infillAngleOffsetRad + params.infillAngleStepRad * layerIndex;
}

/**
 * Ring radii from inner upward in steps of pitch, all strictly below outer.
 * Empty when the annulus cannot hold more than a single pitch.
 */
export function concentricRingRadii(inner: number, outer: number, pitch: number): number[] {
    if (!(pitch > 0)) {
        throw new Error(`concentricRingRadii: pitch must be positive, got ${pitch}`);
    }
    if (outer - inner <= pitch) return [];

    const radii: number[] = [];
    for (let k = 0; ; k++) {
        const r = inner + k * pitch;
        if (r >= outer) break;
        radii.push(r);
    }
    return radii;
}

// ==================== STRATEGIES ====================
export const INFILL_STRATEGIES: Record<InfillMode, InfillFn> = {
    'line': (params, layer) => {
        const contour = new PathGroup([layer.outerWall, layer.holeWall]);
        const infill = Filling.lineInfill(
            contour,
            params.infillDistanceMm,
            infillAngleForLayer(params, layer.layerIndex)
        );
        infill.zHop = true;
        infill.retraction = true;
        return infill;
    },

    'concentric': (params, layer) => {
        const inner = params.holeRadiusMm + params.concentricClearanceMm;
        const outer = layer.waveRadius.reduce((min, r) => Math.min(min, r), Infinity) - params.concentricClearanceMm;
        const radii = concentricRingRadii(inner, outer, params.concentricPitchMm);

        if (radii.length === 0) {
            logger.debug(
                `Layer ${layer.layerIndex}: annulus ${inner.toFixed(3)}..${outer.toFixed(3)} too narrow for pitch ${params.concentricPitchMm}, skipping rings`,
                'Infill'
            );
        }

        // Rings follow each other at constant height, no travel break needed
        const rings = new PathGroup(radii.map(r => Path.circle(r, layer.holeAngles, layer.fillZ)));
        rings.zHop = false;
        rings.retraction = false;
        return rings;
    }
};

export function buildInfill(params: Readonly<WaveTrayParams>, layer: LayerContours): PathGroup {
    return INFILL_STRATEGIES[params.infillMode](params, layer);
}
