import { RandomSource } from '../lib/noise-field';
import { SpatialBounds } from '../lib/layout';
import { PaletteAxis, Point, ResolvedConfig, RGB } from '../types';
import { AngleGrid, sampleAngle } from './angle-grid';
import { ColorLookupError } from './errors';

const TAU = Math.PI * 2;

export type StrokeColorizer = (t: number) => RGB;

export interface LutWindow {
    baseIndex: number;
    span: number;
}

function clamp(v: number, lo: number, hi: number): number {
    return Math.max(lo, Math.min(hi, v));
}

/**
 * Normalised position of a stroke along the palette axis, in [0, 1].
 * The 'random' axis consumes one draw from the render RNG.
 */
export function baseMetric(
    axis: PaletteAxis,
    start: Point,
    grid: AngleGrid,
    bounds: SpatialBounds,
    cellSize: number,
    rng: RandomSource
): number {
    const [sx, sy] = start;
    let base: number;
    switch (axis) {
        case 'y':
            base = (sy - bounds.y0) / Math.max(1, bounds.y1 - bounds.y0);
            break;
        case 'field': {
            const angle = sampleAngle(grid, bounds, cellSize, sx, sy);
            base = (((angle % TAU) + TAU) % TAU) / TAU;
            break;
        }
        case 'random':
            base = rng();
            break;
        case 'x':
        default:
            base = (sx - bounds.x0) / Math.max(1, bounds.x1 - bounds.x0);
            break;
    }
    return clamp(base, 0, 1);
}

// Sub-range of the LUT a stroke sweeps; Math.round everywhere (half rounds up)
export function lutWindow(base: number, lutLength: number, withinStroke: number): LutWindow {
    if (lutLength <= 1) {
        return { baseIndex: 0, span: 0 };
    }
    const last = lutLength - 1;
    const span = clamp(Math.round(last * withinStroke), 0, last);
    const baseIndex = Math.round(clamp(base, 0, 1) * (last - span));
    return { baseIndex, span };
}

export function lutIndex(window: LutWindow, t: number, lutLength: number): number {
    return clamp(window.baseIndex + Math.round(t * window.span), 0, Math.max(0, lutLength - 1));
}

export function createStrokeColorizer(
    start: Point,
    grid: AngleGrid,
    bounds: SpatialBounds,
    config: ResolvedConfig,
    rng: RandomSource
): StrokeColorizer {
    const lut = config.colorLut;
    if (lut.length === 0) {
        const fallback = config.fallbackColor;
        if (!fallback) {
            throw new ColorLookupError('colorLut', lut, 'is empty and no fallbackColor is set');
        }
        return () => fallback;
    }

    const base = baseMetric(config.paletteAxis, start, grid, bounds, config.cellSize, rng);
    const window = lutWindow(base, lut.length, config.paletteWithinStroke);
    return (t: number) => lut[lutIndex(window, t, lut.length)];
}
