import colormapData from '../data/colormaps.json';
import { ConfigurationError } from '../core/errors';
import { RGB } from '../types';

// [position, r, g, b], channels in 0..1, positions ascending from 0 to 1
type ColormapStop = [number, number, number, number];

export const LUT_SIZE = 256;
export const COARSE_PALETTE_SIZE = 8;

function toStops(name: string, rows: number[][]): ColormapStop[] {
    return rows.map(row => {
        if (row.length !== 4) {
            throw new ConfigurationError(`colormaps.${name}`, row, 'stops must be [position, r, g, b]');
        }
        return [row[0], row[1], row[2], row[3]];
    });
}

const COLORMAPS = new Map<string, ColormapStop[]>(
    Object.entries(colormapData).map(([name, rows]) => [name, toStops(name, rows)])
);

export function colormapNames(): string[] {
    return [...COLORMAPS.keys()];
}

function getStops(name: string): ColormapStop[] {
    const stops = COLORMAPS.get(name);
    if (!stops) {
        throw new ConfigurationError('colormap', name, `unknown colour map, expected one of ${colormapNames().join(', ')}`);
    }
    return stops;
}

// Linear interpolation between the surrounding stops; pos is clamped to [0, 1]
export function sampleColormap(name: string, pos: number): [number, number, number] {
    const stops = getStops(name);
    const p = Math.max(0, Math.min(1, pos));

    for (let i = 1; i < stops.length; i++) {
        const hi = stops[i];
        if (p <= hi[0]) {
            const lo = stops[i - 1];
            const span = hi[0] - lo[0];
            const t = span > 0 ? (p - lo[0]) / span : 0;
            return [
                lo[1] + (hi[1] - lo[1]) * t,
                lo[2] + (hi[2] - lo[2]) * t,
                lo[3] + (hi[3] - lo[3]) * t
            ];
        }
    }
    const last = stops[stops.length - 1];
    return [last[1], last[2], last[3]];
}

/**
 * `size` colours sampled evenly from `start` to `end` (both included) along the
 * colour map, channels truncated to 0..255.
 */
export function buildLut(name: string, start: number, end: number, size: number = LUT_SIZE): RGB[] {
    const lut: RGB[] = [];
    for (let i = 0; i < size; i++) {
        const pos = size > 1 ? start + (end - start) * i / (size - 1) : start;
        const [r, g, b] = sampleColormap(name, pos);
        lut.push([Math.trunc(r * 255), Math.trunc(g * 255), Math.trunc(b * 255)]);
    }
    return lut;
}

// Display-only summary of a LUT range; renders always use the full LUT
export function buildCoarsePalette(name: string, start: number, end: number): RGB[] {
    return buildLut(name, start, end, COARSE_PALETTE_SIZE);
}
