export type Point3 = [number, number, number];

/**
 * Ordered 3-D point sequence. Coordinates are stored as three parallel arrays.
 */
export class Path {
    readonly x: readonly number[];
    readonly y: readonly number[];
    readonly z: readonly number[];

    constructor(x: readonly number[], y: readonly number[], z: readonly number[]) {
        if (x.length !== y.length || x.length !== z.length) {
            throw new Error(`Path: coordinate arrays differ in length (x=${x.length}, y=${y.length}, z=${z.length})`);
        }
        this.x = [...x];
        this.y = [...y];
        this.z = [...z];
    }

    /**
     * Circle around the origin sampled at the given angles, at constant height.
     */
    static circle(radius: number, angles: readonly number[], z: number): Path {
        return new Path(
            angles.map(a => radius * Math.cos(a)),
            angles.map(a => radius * Math.sin(a)),
            angles.map(() => z)
        );
    }

    get length(): number {
        return this.x.length;
    }

    point(i: number): Point3 {
        if (i < 0 || i >= this.length) {
            throw new RangeError(`Path: point index ${i} out of range [0, ${this.length})`);
        }
        return [this.x[i], this.y[i], this.z[i]];
    }

    points(): Point3[] {
        return this.x.map((x, i): Point3 => [x, this.y[i], this.z[i]]);
    }

    /**
     * True when the first and last points coincide in XY.
     */
    isClosed(tolerance: number = 1e-9): boolean {
        if (this.length < 3) return false;
        const last = this.length - 1;
        return Math.hypot(this.x[last] - this.x[0], this.y[last] - this.y[0]) <= tolerance;
    }

    totalLength(): number {
        let total = 0;
        for (let i = 1; i < this.length; i++) {
            total += Math.hypot(
                this.x[i] - this.x[i - 1],
                this.y[i] - this.y[i - 1],
                this.z[i] - this.z[i - 1]
            );
        }
        return total;
    }
}

/**
 * One infill pass: an ordered list of paths plus travel flags between them.
 */
export class PathGroup {
    readonly paths: Path[];
    zHop = false;        // Lift Z on travel between paths
    retraction = false;  // Pause feed on travel between paths

    constructor(paths: Path[] = []) {
        this.paths = [...paths];
    }

    get length(): number {
        return this.paths.length;
    }

    isEmpty(): boolean {
        return this.paths.length === 0;
    }
}

// Element of the builder's output sequence
export type TrayPath = Path | PathGroup;

export function isPathGroup(entry: TrayPath): entry is PathGroup {
    return entry instanceof PathGroup;
}
