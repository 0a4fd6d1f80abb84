import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../core/errors';
import { applyStyleBias, genreFromVector, mapFeaturesToConfig, validateFeatureVector } from '../core/mapper';
import { FlowFieldConfig } from '../types';
import { grayScene, JOY_VECTOR } from './helpers';

function withGenre(g: number): number[] {
    const v = [...JOY_VECTOR];
    v[13] = g;
    return v;
}

describe('mapFeaturesToConfig', () => {
    it('maps every feature to its parameter', () => {
        const { config, genre, paletteName, coarsePalette } = mapFeaturesToConfig(JOY_VECTOR);
        expect(genre).toBe('joy');
        expect(paletteName).toBe('rainbow');
        expect(config.width).toBe(3000);
        expect(config.height).toBe(3000);
        expect(config.cellSize).toBe(8);
        expect(config.noiseScale).toBe(2);
        expect(config.octaves).toBe(4);
        expect(config.seed).toBe(500);
        expect(config.quantizeSteps).toBe(6);
        expect(config.swirl).toBeCloseTo(0.15, 12);
        expect(config.seeding).toBe('random');
        expect(config.density).toBeCloseTo(0.003, 12);
        expect(config.maxLength).toBe(600);
        expect(config.stepSize).toBe(4);
        expect(config.angleGain).toBeCloseTo(0.75, 12);
        expect(config.jitter).toBeCloseTo(0.075, 12);
        expect(config.widthStart).toBeCloseTo(6.6, 12);
        expect(config.widthEnd).toBe(0.8);
        expect(config.paletteAxis).toBe('y');
        expect(config.paletteWithinStroke).toBe(0.5);
        expect(config.colorLut).toHaveLength(256);
        expect(coarsePalette).toHaveLength(8);
    });

    it('takes the axis and palette range from the scheme', () => {
        const wild = mapFeaturesToConfig(JOY_VECTOR, 'wild', 100);
        expect(wild.config.paletteAxis).toBe('field');
        expect(wild.config.paletteWithinStroke).toBe(0.7);
        expect(wild.config.width).toBe(100);

        const fear = mapFeaturesToConfig(withGenre(0.1), 'very_smooth');
        expect(fear.paletteName).toBe('bone');
        // bone at 0.2 is dark grey-blue, never pure black
        expect(fear.config.colorLut[0]).not.toEqual([0, 0, 0]);
    });

    it('clamps density into [0.001, 0.006]', () => {
        const sparse = [...JOY_VECTOR];
        sparse[2] = 0;
        const dense = [...JOY_VECTOR];
        dense[2] = 10;
        expect(mapFeaturesToConfig(sparse).config.density).toBe(0.001);
        expect(mapFeaturesToConfig(dense).config.density).toBe(0.006);
    });

    it('rejects malformed vectors and sizes', () => {
        expect(() => mapFeaturesToConfig(JOY_VECTOR.slice(1))).toThrow(ConfigurationError);
        expect(() => mapFeaturesToConfig([...JOY_VECTOR.slice(1), Number.NaN])).toThrow(ConfigurationError);
        expect(() => mapFeaturesToConfig('vector')).toThrow(ConfigurationError);
        expect(() => mapFeaturesToConfig(JOY_VECTOR, 'expressive', 0)).toThrow(ConfigurationError);
    });
});

describe('genreFromVector', () => {
    it('buckets the genre feature', () => {
        expect(genreFromVector(withGenre(0.1))).toBe('fear');
        expect(genreFromVector(withGenre(0.2))).toBe('anger');
        expect(genreFromVector(withGenre(0.35))).toBe('sadness');
        expect(genreFromVector(withGenre(0.45))).toBe('love');
        expect(genreFromVector(withGenre(0.55))).toBe('joy');
        expect(genreFromVector(withGenre(0.65))).toBe('surprise');
        expect(genreFromVector(withGenre(0.7))).toBe('default');
    });
});

describe('validateFeatureVector', () => {
    it('returns a copy of a valid vector', () => {
        const values = validateFeatureVector(JOY_VECTOR);
        expect(values).toEqual(JOY_VECTOR);
        expect(values).not.toBe(JOY_VECTOR);
    });
});

describe('applyStyleBias', () => {
    const base = mapFeaturesToConfig(JOY_VECTOR).config;

    it('sharpens the render for the sharp style', () => {
        const sharp = applyStyleBias(base, 'sharp');
        expect(sharp.noiseScale).toBe(3);
        expect(sharp.octaves).toBe(6);
        expect(sharp.quantizeSteps).toBe(12);
        expect(sharp.jitter).toBeCloseTo(0.02625, 12);
        expect(sharp.angleGain).toBe(0.99);
        expect(sharp.cellSize).toBe(4);
        expect(sharp.density).toBeCloseTo(0.006, 12);
        expect(sharp.widthStart).toBeCloseTo(9.24, 12);
        expect(sharp.widthEnd).toBeCloseTo(0.72, 12);
        expect(sharp.seed).toBe(500);
    });

    it('treats preferred like sharp, ignoring case', () => {
        expect(applyStyleBias(base, 'Preferred')).toEqual(applyStyleBias(base, 'sharp'));
    });

    it('leaves other styles untouched', () => {
        expect(applyStyleBias(base, 'regular')).toBe(base);
        expect(applyStyleBias(base)).toBe(base);
    });

    it('ramps LUT contrast from dark to light', () => {
        const config: FlowFieldConfig = grayScene({ colorLut: [[100, 100, 100], [100, 100, 100], [100, 100, 100]] });
        expect(applyStyleBias(config, 'sharp').colorLut).toEqual([[60, 60, 60], [100, 100, 100], [140, 140, 140]]);
    });

    it('forces quantization when none was set', () => {
        const config = grayScene({ quantizeSteps: 0, noiseScale: undefined, octaves: undefined });
        const biased = applyStyleBias(config, 'sharp');
        expect(biased.quantizeSteps).toBe(16);
        expect(biased.noiseScale).toBe(6);
        expect(biased.octaves).toBe(5);
    });
});
