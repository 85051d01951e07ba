import type { WaveTrayParams } from '../types';
import { Path } from '../lib/toolpath';
import type { PathGroup, TrayPath } from '../lib/toolpath';
import { Transformer } from '../lib/transformer';
import { linspace } from '../lib/sampling';
import { logger } from '../lib/logger';
import { radialProfile } from './profile';
import { buildInfill } from './infill';

/**
 * Values shared by every layer of a run.
 */
export interface TrayContext {
    params: Readonly<WaveTrayParams>;
    waveAngles: readonly number[];
    holeAngles: readonly number[];
    totalHeightMm: number;
}

export function createTrayContext(params: Readonly<WaveTrayParams>): TrayContext {
    return {
        params,
        waveAngles: linspace(0, 2 * Math.PI, params.waveSampleCount),
        holeAngles: linspace(0, 2 * Math.PI, params.holeSampleCount),
        totalHeightMm: params.layerCount * params.layerHeightMm
    };
}

/**
 * Outer wall radius at each wave sample of a layer.
 * The ripple phase flips by half a turn every layer so crests of adjacent layers do not stack.
 */
export function waveRadiiForLayer(ctx: TrayContext, layerIndex: number, layerZ: readonly number[]): number[] {
    const { params } = ctx;
    const baseRadius = radialProfile(params, layerZ.map(z => z / ctx.totalHeightMm));
    const phase = Math.PI * layerIndex;

    return baseRadius.map((r, k) =>
        r + params.waveAmplitudeMm * Math.sin(ctx.waveAngles[k] * params.waveFrequency + phase)
    );
}

/**
 * Builds the paths of one layer in output order:
 * outer wall, then hole wall, inner hole offset and infill for layers below the hole limit.
 */
export function buildLayer(ctx: TrayContext, layerIndex: number): TrayPath[] {
    const { params } = ctx;
    const layerBottom = layerIndex * params.layerHeightMm;
    const layerTop = layerBottom + params.layerHeightMm;

    const layerZ = linspace(layerBottom, layerTop, params.waveSampleCount);
    const waveRadius = waveRadiiForLayer(ctx, layerIndex, layerZ);

    const outerWall = new Path(
        waveRadius.map((r, k) => r * Math.cos(ctx.waveAngles[k])),
        waveRadius.map((r, k) => r * Math.sin(ctx.waveAngles[k])),
        layerZ
    );
    const layerPaths: TrayPath[] = [outerWall];

    if (layerIndex >= params.holeLayerLimit) return layerPaths;

    const fillZ = params.layerHeightMm * (layerIndex + 1);
    const holeWall = Path.circle(params.holeRadiusMm, ctx.holeAngles, fillZ);
    const innerHole = Transformer.offset(holeWall, -params.holeOffsetMm);
    layerPaths.push(holeWall, innerHole);

    const infill: PathGroup = buildInfill(params, {
        layerIndex,
        outerWall,
        holeWall,
        waveRadius,
        holeAngles: ctx.holeAngles,
        fillZ
    });
    if (!infill.isEmpty()) {
        layerPaths.push(infill);
    }

    logger.debug(`Layer ${layerIndex}: ${layerPaths.length} entries, infill ${infill.length} paths`, 'WaveTray');
    return layerPaths;
}

/**
 * Generates the full toolpath of the tray, layer by layer from the bottom.
 * Layers only depend on the parameters, so each one is built into its own slot
 * and the slots are concatenated in layer order.
 * Hole offsets go through clipper, so `loadClipper()` must have resolved.
 */
export function buildWaveTray(params: Readonly<WaveTrayParams>): TrayPath[] {
    const ctx = createTrayContext(params);
    logger.info(
        `Building ${params.layerCount} layers (${params.infillMode} infill, hole on ${params.holeLayerLimit} layers)`,
        'WaveTray'
    );

    const layers = new Array<TrayPath[]>(params.layerCount);
    for (let i = 0; i < params.layerCount; i++) {
        layers[i] = buildLayer(ctx, i);
    }

    const trayPaths = layers.flat();
    logger.info(`Generated ${trayPaths.length} toolpath entries`, 'WaveTray');
    return trayPaths;
}
