/**
 * Evenly spaced samples over [start, stop], both ends included.
 * The last sample is exactly `stop`.
 */
export function linspace(start: number, stop: number, count: number): number[] {
    if (!Number.isInteger(count) || count < 0) {
        throw new Error(`linspace: count must be a non-negative integer, got ${count}`);
    }
    if (count === 0) return [];
    if (count === 1) return [start];

    const step = (stop - start) / (count - 1);
    const values = new Array<number>(count);
    for (let i = 0; i < count - 1; i++) {
        values[i] = start + i * step;
    }
    values[count - 1] = stop;
    return values;
}
