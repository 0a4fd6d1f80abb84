import { describe, expect, it } from 'vitest';
import { BoundsError, ConfigurationError } from '../core/errors';
import { Layout } from '../lib/layout';

describe('Layout', () => {
    it('sizes the drawing area and grid of a 1000x1000 canvas', () => {
        expect(Layout.margin(1000, 1000, 0.1)).toBe(100);
        const bounds = Layout.getDrawArea(1000, 1000, 0.1);
        expect(bounds).toEqual({ x0: 100, y0: 100, x1: 900, y1: 900 });
        expect(Layout.gridSize(bounds, 20)).toEqual({ nx: 40, ny: 40 });
    });

    it('takes the margin from the smaller dimension', () => {
        const bounds = Layout.getDrawArea(400, 200, 0.25);
        expect(bounds).toEqual({ x0: 50, y0: 50, x1: 350, y1: 150 });
        expect(Layout.gridSize(bounds, 30)).toEqual({ nx: 10, ny: 3 });
    });

    it('rejects a margin that swallows the canvas', () => {
        expect(() => Layout.getDrawArea(100, 100, 0.6)).toThrow(BoundsError);
        expect(() => Layout.getDrawArea(100, 100, 0.5)).toThrow(BoundsError);
    });

    it('rejects a negative margin factor', () => {
        expect(() => Layout.getDrawArea(100, 100, -0.1)).toThrow(ConfigurationError);
    });

    it('rejects cells larger than the drawing area', () => {
        const bounds = Layout.getDrawArea(100, 100, 0.1);
        expect(() => Layout.gridSize(bounds, 81)).toThrow(ConfigurationError);
        expect(() => Layout.gridSize(bounds, 0)).toThrow(ConfigurationError);
    });

    it('treats the bounds as closed', () => {
        const bounds = { x0: 10, y0: 10, x1: 90, y1: 90 };
        expect(Layout.contains(bounds, 10, 90)).toBe(true);
        expect(Layout.contains(bounds, 90, 10)).toBe(true);
        expect(Layout.contains(bounds, 9.99, 50)).toBe(false);
        expect(Layout.contains(bounds, 50, 90.01)).toBe(false);
        expect(Layout.area(bounds)).toBe(6400);
    });
});
