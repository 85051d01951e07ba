import { isPathGroup } from '../lib/toolpath';
import type { Path, TrayPath } from '../lib/toolpath';

export interface SVGExportOptions {
    margin?: number;            // Space around the drawing [mm] (default: 5)
    strokeWidth?: number;       // Wall stroke width [mm] (default: 0.25)
    zRange?: [number, number];  // Only draw paths with a point inside this Z window
}

interface Extents {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
}

function inZRange(path: Path, zRange?: [number, number]): boolean {
    if (!zRange) return true;
    return path.z.some(z => z >= zRange[0] && z <= zRange[1]);
}

function measure(paths: Path[]): Extents {
    const extents: Extents = { minX: Infinity, minY: Infinity, maxX: -Infinity, maxY: -Infinity };
    for (const path of paths) {
        for (let i = 0; i < path.length; i++) {
            extents.minX = Math.min(extents.minX, path.x[i]);
            extents.minY = Math.min(extents.minY, path.y[i]);
            extents.maxX = Math.max(extents.maxX, path.x[i]);
            extents.maxY = Math.max(extents.maxY, path.y[i]);
        }
    }
    if (!isFinite(extents.minX)) {
        return { minX: 0, minY: 0, maxX: 0, maxY: 0 };
    }
    return extents;
}

// Projects onto XY, shifting into the viewBox and flipping Y (Cartesian -> SVG)
function pathToPolyline(path: Path, extents: Extents, margin: number): string {
    const points = path.x.map((x, i) => {
        const sx = (x - extents.minX + margin).toFixed(3);
        const sy = (extents.maxY - path.y[i] + margin).toFixed(3);
        return `${sx},${sy}`;
    });
    return `<polyline points="${points.join(' ')}"/>`;
}

/**
 * Top-down SVG preview of a toolpath sequence.
 * Standalone paths (walls, hole contours) and infill group paths are drawn in separate groups
 * so the infill can be styled lighter.
 */
export function toolpathsToSVG(entries: TrayPath[], options: SVGExportOptions = {}): string {
    const margin = options.margin ?? 5;
    const strokeWidth = options.strokeWidth ?? 0.25;
    const hatchStrokeWidth = Math.max(0.05, strokeWidth * 0.3);

    const walls: Path[] = [];
    const hatch: Path[] = [];
    for (const entry of entries) {
        if (isPathGroup(entry)) {
            hatch.push(...entry.paths.filter(p => inZRange(p, options.zRange)));
        } else if (inZRange(entry, options.zRange)) {
            walls.push(entry);
        }
    }

    const extents = measure([...walls, ...hatch]);
    const width = (extents.maxX - extents.minX + 2 * margin).toFixed(3);
    const height = (extents.maxY - extents.minY + 2 * margin).toFixed(3);

    const normal = walls.map(p => pathToPolyline(p, extents, margin));
    const fill = hatch.map(p => pathToPolyline(p, extents, margin));

    const svg = `<svg xmlns="http://www.w3.org/2000/svg"
     width="${width}mm"
     height="${height}mm"
     viewBox="0 0 ${width} ${height}"
     style="background-color: #FAF8F3;">
  <g stroke="#000" stroke-width="${strokeWidth}" fill="none" stroke-linecap="round">
    ${normal.join('\n    ')}
  </g>
  <g stroke="#888" stroke-width="${hatchStrokeWidth}" fill="none" stroke-linecap="round">
    ${fill.join('\n    ')}
  </g>
</svg>`;

    return svg;
}
