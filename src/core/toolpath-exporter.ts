import { isPathGroup } from '../lib/toolpath';
import type { Path, TrayPath } from '../lib/toolpath';

export interface SerializedPath {
    kind: 'path';
    x: number[];
    y: number[];
    z: number[];
}

export interface SerializedGroup {
    kind: 'group';
    zHop: boolean;
    retraction: boolean;
    paths: SerializedPath[];
}

export interface ToolpathDocument {
    version: 1;
    entries: (SerializedPath | SerializedGroup)[];
}

export interface ToolpathStats {
    pathCount: number;   // Every path, including those inside groups
    groupCount: number;
    pointCount: number;
    totalLength: number; // mm
}

function serializePath(path: Path): SerializedPath {
    return { kind: 'path', x: [...path.x], y: [...path.y], z: [...path.z] };
}

/**
 * Plain-data form of the output sequence, in order, for downstream consumers.
 */
export function serializeToolpaths(entries: TrayPath[]): ToolpathDocument {
    return {
        version: 1,
        entries: entries.map((entry): SerializedPath | SerializedGroup => isPathGroup(entry)
            ? {
                kind: 'group',
                zHop: entry.zHop,
                retraction: entry.retraction,
                paths: entry.paths.map(serializePath)
            }
            : serializePath(entry))
    };
}

export function getToolpathStats(entries: TrayPath[]): ToolpathStats {
    const stats: ToolpathStats = { pathCount: 0, groupCount: 0, pointCount: 0, totalLength: 0 };

    const addPath = (path: Path) => {
        stats.pathCount++;
        stats.pointCount += path.length;
        stats.totalLength += path.totalLength();
    };

    for (const entry of entries) {
        if (isPathGroup(entry)) {
            stats.groupCount++;
            entry.paths.forEach(addPath);
        } else {
            addPath(entry);
        }
    }

    return stats;
}
