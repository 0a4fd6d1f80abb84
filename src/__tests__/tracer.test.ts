import { describe, expect, it } from 'vitest';
import { strokeSegments, traceStroke, TraceOptions } from '../core/tracer';
import { Layout } from '../lib/layout';
import { seededRandom } from '../lib/noise-field';
import { countingRandom } from './helpers';

const bounds = { x0: 0, y0: 0, x1: 100, y1: 100 };
const flat = { nx: 10, ny: 10, values: new Float64Array(100) };

function options(overrides: Partial<TraceOptions> = {}): TraceOptions {
    return { cellSize: 10, maxLength: 5, stepSize: 10, angleGain: 1, jitter: 0, ...overrides };
}

describe('traceStroke', () => {
    it('takes maxLength steps along a flat field', () => {
        const counter = countingRandom(seededRandom(1));
        const positions = traceStroke([0, 50], flat, bounds, options(), counter.rng);
        expect(positions).toEqual([[0, 50], [10, 50], [20, 50], [30, 50], [40, 50], [50, 50]]);
        expect(counter.calls()).toBe(5);
    });

    it('stops before the first step that would leave the bounds', () => {
        const counter = countingRandom(seededRandom(1));
        const positions = traceStroke([0, 50], flat, bounds, options({ maxLength: 100 }), counter.rng);
        expect(positions).toHaveLength(11);
        expect(positions[10]).toEqual([100, 50]);
        // The rejected step still drew its jitter value
        expect(counter.calls()).toBe(11);
    });

    it('keeps every position inside the bounds', () => {
        const grid = { nx: 10, ny: 10, values: Float64Array.from({ length: 100 }, (_, i) => i * 0.37) };
        const positions = traceStroke([50, 50], grid, bounds,
            options({ maxLength: 200, stepSize: 3, angleGain: 0.4, jitter: 0.5 }), seededRandom(3));
        for (const [x, y] of positions) {
            expect(Layout.contains(bounds, x, y)).toBe(true);
        }
    });

    it('returns only the start for a zero step budget or step size', () => {
        expect(traceStroke([5, 5], flat, bounds, options({ maxLength: 0 }), seededRandom(1))).toEqual([[5, 5]]);
        expect(traceStroke([5, 5], flat, bounds, options({ stepSize: 0 }), seededRandom(1))).toEqual([[5, 5]]);
    });

    it('holds the initial heading when angleGain is 0', () => {
        const values = new Float64Array(100);
        values[5 * 10] = Math.PI / 2;
        const grid = { nx: 10, ny: 10, values };
        const positions = traceStroke([5, 55], grid, bounds, options({ maxLength: 2, angleGain: 0 }), seededRandom(1));
        expect(positions).toHaveLength(3);
        expect(positions[1][0]).toBeCloseTo(5, 9);
        expect(positions[1][1]).toBeCloseTo(65, 9);
        expect(positions[2][0]).toBeCloseTo(5, 9);
        expect(positions[2][1]).toBeCloseTo(75, 9);
    });

    it('follows the field when angleGain is 1', () => {
        const values = new Float64Array(100);
        values[5 * 10] = Math.PI / 2;
        const grid = { nx: 10, ny: 10, values };
        const positions = traceStroke([5, 55], grid, bounds, options({ maxLength: 2 }), seededRandom(1));
        expect(positions[1][0]).toBeCloseTo(5, 9);
        expect(positions[1][1]).toBeCloseTo(65, 9);
        expect(positions[2][0]).toBeCloseTo(15, 9);
        expect(positions[2][1]).toBeCloseTo(65, 9);
    });

    it('bends the path with jitter', () => {
        const still = traceStroke([0, 50], flat, bounds, options(), seededRandom(2));
        const shaky = traceStroke([0, 50], flat, bounds, options({ jitter: 0.3 }), seededRandom(2));
        expect(shaky).not.toEqual(still);
    });
});

describe('strokeSegments', () => {
    it('runs t from 0 to 1 and interpolates the width', () => {
        const segments = strokeSegments([[0, 0], [1, 0], [2, 0]], 4, 2);
        expect(segments).toEqual([
            { from: [0, 0], to: [1, 0], t: 0, width: 4 },
            { from: [1, 0], to: [2, 0], t: 1, width: 2 }
        ]);
    });

    it('uses t = 0 for a single segment', () => {
        const segments = strokeSegments([[0, 0], [1, 0]], 4, 2);
        expect(segments).toEqual([{ from: [0, 0], to: [1, 0], t: 0, width: 4 }]);
    });

    it('yields nothing for fewer than two positions', () => {
        expect(strokeSegments([[3, 3]], 4, 2)).toEqual([]);
        expect(strokeSegments([], 4, 2)).toEqual([]);
    });
});
