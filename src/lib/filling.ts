import MakerJs from 'makerjs';
import { Path, PathGroup } from './toolpath';
import { logger } from './logger';

export interface LineInfillOptions {
    offset?: number;     // Shift of the scanline grid along its normal [mm]
    tolerance?: number;  // Distance under which two crossings are merged
}

// Extra length added to each scanline beyond the contour extents
const SCANLINE_MARGIN = 10;

/**
 * Builds a closed makerjs polyline from the XY projection of a contour.
 * A contour that does not end on its start point is closed with a straight edge.
 */
function toContourModel(path: Path): MakerJs.IModel {
    const count = path.isClosed() ? path.length - 1 : path.length;
    const points: MakerJs.IPoint[] = [];

    for (let i = 0; i < count; i++) {
        const prev = points[points.length - 1];
        if (prev && prev[0] === path.x[i] && prev[1] === path.y[i]) continue;
        points.push([path.x[i], path.y[i]]);
    }

    return new MakerJs.models.ConnectTheDots(true, points);
}

export class Filling {
    /**
     * Fills the region bounded by the given contours with parallel lines.
     * Every contour is treated as a closed ring. Crossings are paired even-odd,
     * so a contour nested inside another becomes a hole.
     * Each segment is a two-point path at the highest Z found on the contours.
     */
    static lineInfill(contours: PathGroup, spacing: number, angle: number, options: LineInfillOptions = {}): PathGroup {
        if (!(spacing > 0)) {
            throw new Error(`Filling.lineInfill: spacing must be positive, got ${spacing}`);
        }

        const offset = options.offset ?? 0;
        const tolerance = options.tolerance ?? 1e-6;
        const result = new PathGroup();

        const models: MakerJs.IModelMap = {};
        let z = -Infinity;
        contours.paths.forEach((contour, i) => {
            if (contour.length < 3) return;
            models[`contour_${i}`] = toContourModel(contour);
            for (const value of contour.z) z = Math.max(z, value);
        });

        if (Object.keys(models).length === 0) return result;
        const loop: MakerJs.IModel = { models };

        // 1. Measure bounds of the contours
        const extents = MakerJs.measure.modelExtents(loop);
        if (!extents) return result;

        // 2. Scanline direction D = (cos, sin), perpendicular P = (-sin, cos)
        const cos = Math.cos(angle);
        const sin = Math.sin(angle);

        const corners = [
            [extents.low[0], extents.low[1]],
            [extents.high[0], extents.low[1]],
            [extents.high[0], extents.high[1]],
            [extents.low[0], extents.high[1]]
        ];

        let minP = Number.MAX_VALUE;
        let maxP = -Number.MAX_VALUE;
        let minD = Number.MAX_VALUE;
        let maxD = -Number.MAX_VALUE;
        corners.forEach(p => {
            const alongP = p[0] * -sin + p[1] * cos;
            const alongD = p[0] * cos + p[1] * sin;
            minP = Math.min(minP, alongP);
            maxP = Math.max(maxP, alongP);
            minD = Math.min(minD, alongD);
            maxD = Math.max(maxD, alongD);
        });

        // Align to spacing grid + offset
        const startIdx = Math.ceil((minP - offset) / spacing);
        const endIdx = Math.floor((maxP - offset) / spacing);

        for (let i = startIdx; i <= endIdx; i++) {
            const dVal = i * spacing + offset;
            const cx = dVal * -sin;
            const cy = dVal * cos;

            const x1 = cx + (minD - SCANLINE_MARGIN) * cos;
            const y1 = cy + (minD - SCANLINE_MARGIN) * sin;
            const x2 = cx + (maxD + SCANLINE_MARGIN) * cos;
            const y2 = cy + (maxD + SCANLINE_MARGIN) * sin;

            const scanLine = new MakerJs.paths.Line([x1, y1], [x2, y2]);

            // 3. Distance along the scanline of every crossing
            const crossings: number[] = [];
            MakerJs.model.walk(loop, {
                onPath: (walkPath) => {
                    const ints = MakerJs.path.intersection(scanLine, walkPath.pathContext);
                    if (ints && ints.intersectionPoints) {
                        ints.intersectionPoints.forEach(pt => {
                            crossings.push((pt[0] - x1) * cos + (pt[1] - y1) * sin);
                        });
                    }
                }
            });

            if (crossings.length === 0) continue;

            crossings.sort((a, b) => a - b);

            // Merge crossings at shared vertices
            const unique: number[] = [crossings[0]];
            for (let k = 1; k < crossings.length; k++) {
                if (crossings[k] - unique[unique.length - 1] > tolerance) {
                    unique.push(crossings[k]);
                }
            }

            // 4. Even-odd pairing
            for (let k = 0; k < unique.length - 1; k += 2) {
                const tA = unique[k];
                const tB = unique[k + 1];
                result.paths.push(new Path(
                    [x1 + tA * cos, x1 + tB * cos],
                    [y1 + tA * sin, y1 + tB * sin],
                    [z, z]
                ));
            }
        }

        logger.debug(`Generated ${result.length} infill segments (${endIdx - startIdx + 1} scanlines)`, 'Filling');
        return result;
    }
}
