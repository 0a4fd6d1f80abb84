import { DEFAULT_SCHEME, Genre, getScheme } from '../lib/color-schemes';
import { buildCoarsePalette, buildLut } from '../lib/palettes';
import { MAX_SEED, MIN_SEED } from '../lib/noise-field';
import { FlowFieldConfig, RGB } from '../types';
import { ConfigurationError } from './errors';

export const FEATURE_DIMENSIONS = 14;
export const DEFAULT_SIZE = 3000;

export interface MappedConfig {
    config: FlowFieldConfig;
    genre: Genre;
    paletteName: string;
    coarsePalette: RGB[];   // 8 colours across the same range, for labels and previews
}

function clamp(v: number, lo: number, hi: number): number {
    return Math.max(lo, Math.min(hi, v));
}

export function validateFeatureVector(vector: unknown): number[] {
    if (!Array.isArray(vector) || vector.length !== FEATURE_DIMENSIONS) {
        throw new ConfigurationError('vector', vector, `must hold exactly ${FEATURE_DIMENSIONS} numbers`);
    }
    const values: number[] = [];
    for (const v of vector) {
        if (typeof v !== 'number' || !Number.isFinite(v)) {
            throw new ConfigurationError('vector', vector, 'entries must be finite numbers');
        }
        values.push(v);
    }
    return values;
}

// v[13] encodes the genre
export function genreFromVector(v: number[]): Genre {
    const g = v[13];
    if (g < 0.2) return 'fear';
    if (g < 0.3) return 'anger';
    if (g < 0.4) return 'sadness';
    if (g < 0.5) return 'love';
    if (g < 0.6) return 'joy';
    if (g < 0.7) return 'surprise';
    return 'default';
}

/**
 * Feature vector layout:
 *   v[0]  title length / 10         v[7]  alliteration score
 *   v[1]  title lexical complexity  v[8]  vowel dominance
 *   v[2]  verse count / 20          v[9]  vowel entropy / 3
 *   v[3]  words per verse / 10      v[10] raw rhythm (words per verse)
 *   v[4]  verse length variability  v[11] author name length / 5
 *   v[5]  rhyme diversity           v[12] author name diversity
 *   v[6]  dominant rhyme frequency  v[13] genre
 */
export function mapFeaturesToConfig(
    vector: unknown,
    schemeName: string = DEFAULT_SCHEME,
    size: number = DEFAULT_SIZE
): MappedConfig {
    const v = validateFeatureVector(vector);
    if (!Number.isInteger(size) || size < 1) {
        throw new ConfigurationError('size', size, 'must be a positive whole number of pixels');
    }

    const scheme = getScheme(schemeName);
    const genre = genreFromVector(v);
    const [paletteName, [posStart, posEnd]] = scheme.paletteMapping[genre];

    const config: FlowFieldConfig = {
        width: size,
        height: size,
        cellSize: Math.max(1, Math.trunc(4 + v[3] * 8)),
        marginFactor: 0.08,

        noiseScale: Math.max(2, v[4] * 8),
        octaves: Math.trunc(3 + v[7] * 4),
        seed: clamp(Math.trunc(v[9] * 1000), MIN_SEED, MAX_SEED),
        quantizeSteps: Math.max(0, Math.trunc(v[5] * 12)),
        swirl: v[6] * 0.3,

        seeding: 'random',
        density: clamp(v[2] * 0.002, 0.001, 0.006),
        maxLength: Math.max(0, Math.trunc(400 + v[10] * 20)),
        stepSize: 2 + v[8] * 4,
        angleGain: clamp(0.6 + v[1] * 0.3, 0, 1),
        jitter: Math.max(0, v[0] * 0.15),

        colorLut: buildLut(paletteName, posStart, posEnd),
        paletteAxis: scheme.paletteAxis,
        paletteWithinStroke: scheme.paletteWithinStroke,
        paletteName,
        widthStart: 6 + v[11] * 0.3,
        widthEnd: 0.8,
        background: [250, 250, 245]
    };

    return {
        config,
        genre,
        paletteName,
        coarsePalette: buildCoarsePalette(paletteName, posStart, posEnd)
    };
}

// Ramp from -amount on the first LUT entry to +amount on the last
function boostContrast(lut: RGB[], amount: number): RGB[] {
    const last = lut.length - 1;
    return lut.map((color, i): RGB => {
        const shift = last > 0 ? -amount + 2 * amount * i / last : 0;
        const channel = (c: number) => clamp(Math.round(c + shift), 0, 255);
        return [channel(color[0]), channel(color[1]), channel(color[2])];
    });
}

/**
 * 'sharp' and 'preferred' give crisper, more turbulent renders: stronger noise,
 * forced quantization, less jitter, a finer grid, more strokes and a
 * higher-contrast LUT. Any other style returns the config untouched.
 */
export function applyStyleBias(config: FlowFieldConfig, style?: string): FlowFieldConfig {
    if (!style) return config;

    const s = style.toLowerCase();
    if (s !== 'sharp' && s !== 'preferred') return config;

    const qs = config.quantizeSteps ?? 0;
    return {
        ...config,
        noiseScale: Math.trunc(Math.max(3, (config.noiseScale ?? 4) * 1.6)),
        octaves: (config.octaves ?? 3) + 2,
        quantizeSteps: Math.max(12, qs > 0 ? qs : 16),
        jitter: Math.max(0.001, config.jitter * 0.35),
        angleGain: Math.min(0.99, config.angleGain + 0.25),
        cellSize: Math.max(2, Math.trunc(config.cellSize * 0.6)),
        density: Math.min(0.02, config.density * 2.0),
        colorLut: boostContrast(config.colorLut, 40),
        widthStart: config.widthStart * 1.4,
        widthEnd: Math.max(0.6, config.widthEnd * 0.9)
    };
}
