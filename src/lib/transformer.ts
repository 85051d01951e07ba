import { EndType, JoinType } from 'js-angusj-clipper';
import type { IntPoint } from 'js-angusj-clipper';
import { Path } from './toolpath';
import { getClipper } from './clipper';

// Scale factor for the integer clipper coordinates (0.1 µm resolution)
const SCALE = 10000;
// Limits how far a vertex can travel at sharp corners (multiples of |distance|)
const MITER_LIMIT = 4;

interface Ring {
    points: IntPoint[];
    z: number[];
}

/**
 * Integer ring from the XY projection of a path, repeated points and the
 * closing duplicate removed.
 */
function toRing(path: Path): Ring {
    const ring: Ring = { points: [], z: [] };
    for (let i = 0; i < path.length; i++) {
        const pt = { x: Math.round(path.x[i] * SCALE), y: Math.round(path.y[i] * SCALE) };
        const prev = ring.points[ring.points.length - 1];
        if (prev && prev.x === pt.x && prev.y === pt.y) continue;
        ring.points.push(pt);
        ring.z.push(path.z[i]);
    }

    const first = ring.points[0];
    const last = ring.points[ring.points.length - 1];
    if (ring.points.length > 1 && first.x === last.x && first.y === last.y) {
        ring.points.pop();
        ring.z.pop();
    }
    return ring;
}

function nearestIndex(points: readonly IntPoint[], target: IntPoint): number {
    let best = 0;
    let bestDist = Infinity;
    points.forEach((p, i) => {
        const d = (p.x - target.x) ** 2 + (p.y - target.y) ** 2;
        if (d < bestDist) {
            bestDist = d;
            best = i;
        }
    });
    return best;
}

export class Transformer {
    /**
     * Offsets a path in its XY plane by a signed distance using clipper's
     * mitered polygon offset. The path is treated as a ring (a path whose ends
     * do not meet is closed with a straight edge) and moves outward for positive
     * distances, inward for negative ones, whatever its winding.
     *
     * The result keeps the input winding, starts at the vertex nearest the input
     * start, is closed, and takes each vertex's Z from the nearest input vertex.
     * When an inward offset splits the ring, the largest piece is kept.
     */
    static offset(path: Path, distance: number): Path {
        const clipper = getClipper();
        const ring = toRing(path);

        if (ring.points.length < 3) {
            throw new Error(`Transformer.offset: path needs at least 3 distinct points, got ${ring.points.length}`);
        }

        const solution = clipper.offsetToPaths({
            delta: distance * SCALE,
            miterLimit: MITER_LIMIT,
            offsetInputs: [{
                data: ring.points,
                joinType: JoinType.Miter,
                endType: EndType.ClosedPolygon
            }]
        });

        if (!solution || solution.length === 0) {
            throw new Error(`Transformer.offset: offset by ${distance} leaves nothing of the path`);
        }

        let piece = solution[0];
        for (const candidate of solution) {
            if (Math.abs(clipper.area(candidate)) > Math.abs(clipper.area(piece))) piece = candidate;
        }

        // Same winding and start as the input
        const points = [...piece];
        if (clipper.orientation(points) !== clipper.orientation(ring.points)) {
            points.reverse();
        }
        const start = nearestIndex(points, ring.points[0]);
        const ordered = [...points.slice(start), ...points.slice(0, start)];

        const constantZ = ring.z.every(z => z === ring.z[0]);
        const zs = ordered.map(p => constantZ ? ring.z[0] : ring.z[nearestIndex(ring.points, p)]);

        const xs = ordered.map(p => p.x / SCALE);
        const ys = ordered.map(p => p.y / SCALE);
        xs.push(xs[0]);
        ys.push(ys[0]);
        zs.push(zs[0]);

        return new Path(xs, ys, zs);
    }
}
