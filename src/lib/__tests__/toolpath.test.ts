import { Path, PathGroup, isPathGroup } from '../toolpath';
import { linspace } from '../sampling';

describe('linspace', () => {
    it('includes both ends', () => {
        expect(linspace(0, 1, 5)).toEqual([0, 0.25, 0.5, 0.75, 1]);
    });

    it('handles single and empty sample counts', () => {
        expect(linspace(2, 5, 1)).toEqual([2]);
        expect(linspace(0, 1, 0)).toEqual([]);
    });

    it('ends exactly on stop', () => {
        const values = linspace(0, 2 * Math.PI, 403);
        expect(values).toHaveLength(403);
        expect(values[402]).toBe(2 * Math.PI);
    });

    it('rejects a non-integer count', () => {
        expect(() => linspace(0, 1, 2.5)).toThrow('linspace: count must be a non-negative integer, got 2.5');
    });
});

describe('Path', () => {
    it('rejects coordinate arrays of different lengths', () => {
        expect(() => new Path([0, 1], [0, 1], [0])).toThrow('Path: coordinate arrays differ in length (x=2, y=2, z=1)');
    });

    it('copies its input arrays', () => {
        const xs = [0, 1];
        const path = new Path(xs, [0, 0], [0, 0]);
        xs[0] = 42;
        expect(path.x[0]).toBe(0);
    });

    it('exposes points by index', () => {
        const path = new Path([1, 2], [3, 4], [5, 6]);
        expect(path.length).toBe(2);
        expect(path.point(1)).toEqual([2, 4, 6]);
        expect(path.points()).toEqual([[1, 3, 5], [2, 4, 6]]);
        expect(() => path.point(2)).toThrow(RangeError);
    });

    it('measures its 3-D length', () => {
        const path = new Path([0, 3], [0, 4], [0, 0]);
        expect(path.totalLength()).toBe(5);
    });

    it('detects closed rings', () => {
        const square = new Path([0, 1, 1, 0, 0], [0, 0, 1, 1, 0], [0, 0, 0, 0, 0]);
        const open = new Path([0, 1, 1], [0, 0, 1], [0, 0, 0]);
        expect(square.isClosed()).toBe(true);
        expect(open.isClosed()).toBe(false);
    });

    it('builds circles at constant height', () => {
        const circle = Path.circle(2, [0, Math.PI / 2], 1);
        expect(circle.x[0]).toBe(2);
        expect(circle.y[0]).toBe(0);
        expect(circle.x[1]).toBeCloseTo(0, 12);
        expect(circle.y[1]).toBe(2);
        expect(circle.z).toEqual([1, 1]);
    });
});

describe('PathGroup', () => {
    it('starts without z-hop or retraction', () => {
        const group = new PathGroup([new Path([0], [0], [0])]);
        expect(group.zHop).toBe(false);
        expect(group.retraction).toBe(false);
        expect(group.length).toBe(1);
        expect(group.isEmpty()).toBe(false);
        expect(new PathGroup().isEmpty()).toBe(true);
    });

    it('is told apart from a path', () => {
        expect(isPathGroup(new PathGroup())).toBe(true);
        expect(isPathGroup(new Path([], [], []))).toBe(false);
    });
});
