import { Transformer } from '../transformer';
import { loadClipper } from '../clipper';
import { Path } from '../toolpath';
import { linspace } from '../sampling';

const radiusAt = (path: Path, i: number) => Math.hypot(path.x[i], path.y[i]);

function expectCorners(path: Path, corners: number[][]) {
    expect(path.length).toBe(corners.length);
    corners.forEach(([x, y], i) => {
        expect(path.x[i]).toBeCloseTo(x, 9);
        expect(path.y[i]).toBeCloseTo(y, 9);
    });
}

describe('Transformer.offset', () => {
    beforeAll(async () => {
        await loadClipper();
    });

    it('moves a sampled circle inward for a negative distance', () => {
        const hole = Path.circle(15.3, linspace(0, 2 * Math.PI, 200), 1);
        const inner = Transformer.offset(hole, -0.4);

        expect(inner.isClosed()).toBe(true);
        for (let i = 0; i < inner.length; i++) {
            expect(radiusAt(inner, i)).toBeCloseTo(14.9, 3);
            expect(inner.z[i]).toBe(1);
        }
    });

    it('moves a circle outward for a positive distance', () => {
        const circle = Path.circle(10, linspace(0, 2 * Math.PI, 64), 0);
        const outer = Transformer.offset(circle, 1);
        expect(radiusAt(outer, 10)).toBeCloseTo(11, 2);
    });

    it('treats clockwise rings the same way', () => {
        const clockwise = Path.circle(10, linspace(2 * Math.PI, 0, 64), 0);
        const inner = Transformer.offset(clockwise, -1);
        expect(radiusAt(inner, 10)).toBeCloseTo(9, 2);
    });

    it('miters square corners', () => {
        const square = new Path([0, 10, 10, 0, 0], [0, 0, 10, 10, 0], [3, 3, 3, 3, 3]);
        const inner = Transformer.offset(square, -1);

        expectCorners(inner, [[1, 1], [9, 1], [9, 9], [1, 9], [1, 1]]);
        expect(inner.z).toEqual([3, 3, 3, 3, 3]);
    });

    it('keeps the winding and start of a clockwise ring', () => {
        const square = new Path([0, 0, 10, 10, 0], [0, 10, 10, 0, 0], [0, 0, 0, 0, 0]);
        const outer = Transformer.offset(square, 1);

        expectCorners(outer, [[-1, -1], [-1, 11], [11, 11], [11, -1], [-1, -1]]);
    });

    it('takes each vertex height from the nearest input vertex', () => {
        const square = new Path([0, 10, 10, 0, 0], [0, 0, 10, 10, 0], [0, 1, 2, 3, 0]);
        const inner = Transformer.offset(square, -1);
        expect(inner.z).toEqual([0, 1, 2, 3, 0]);
    });

    it('closes a path whose ends do not meet', () => {
        const open = new Path([0, 10, 10, 0], [0, 0, 10, 10], [3, 3, 3, 3]);
        const inner = Transformer.offset(open, -1);

        expect(inner.isClosed()).toBe(true);
        expectCorners(inner, [[1, 1], [9, 1], [9, 9], [1, 9], [1, 1]]);
    });

    it('fails when an inward offset leaves nothing', () => {
        const square = new Path([0, 10, 10, 0, 0], [0, 0, 10, 10, 0], [0, 0, 0, 0, 0]);
        expect(() => Transformer.offset(square, -6)).toThrow('Transformer.offset: offset by -6 leaves nothing of the path');
    });

    it('rejects paths without three distinct points', () => {
        const segment = new Path([1, 1, 4], [1, 1, 5], [0, 0, 0]);
        expect(() => Transformer.offset(segment, 1)).toThrow('Transformer.offset: path needs at least 3 distinct points, got 2');
    });
});
