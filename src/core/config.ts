import { clampOctaves, isValidSeed, MAX_SEED, MIN_SEED } from '../lib/noise-field';
import { PaletteAxis, ResolvedConfig, RGB, SeedingMode } from '../types';
import { ColorLookupError, ConfigurationError } from './errors';

export const DEFAULT_NOISE_SCALE = 4;
export const MIN_NOISE_SCALE = 2;

const SEEDING_MODES: readonly SeedingMode[] = ['grid', 'random'];
const PALETTE_AXES: readonly PaletteAxis[] = ['x', 'y', 'field', 'random'];

type Fields = Record<string, unknown>;

export function isRecord(value: unknown): value is Fields {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireNumber(fields: Fields, field: string): number {
    const value = fields[field];
    if (value === undefined) {
        throw new ConfigurationError(field, value, 'is required');
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ConfigurationError(field, value, 'must be a finite number');
    }
    return value;
}

function optionalNumber(fields: Fields, field: string, fallback: number): number {
    return fields[field] === undefined ? fallback : requireNumber(fields, field);
}

function positive(fields: Fields, field: string): number {
    const value = requireNumber(fields, field);
    if (value <= 0) {
        throw new ConfigurationError(field, value, 'must be positive');
    }
    return value;
}

function nonNegative(fields: Fields, field: string): number {
    const value = requireNumber(fields, field);
    if (value < 0) {
        throw new ConfigurationError(field, value, 'must not be negative');
    }
    return value;
}

function dimension(fields: Fields, field: string): number {
    const value = positive(fields, field);
    if (!Number.isInteger(value)) {
        throw new ConfigurationError(field, value, 'must be a whole number of pixels');
    }
    return value;
}

export function parseRgb(field: string, value: unknown): RGB {
    if (!Array.isArray(value) || value.length !== 3) {
        throw new ConfigurationError(field, value, 'must be an [r, g, b] triple');
    }
    const channels: number[] = [];
    for (const channel of value) {
        if (typeof channel !== 'number' || !Number.isInteger(channel) || channel < 0 || channel > 255) {
            throw new ConfigurationError(field, value, 'channels must be integers in 0..255');
        }
        channels.push(channel);
    }
    return [channels[0], channels[1], channels[2]];
}

function parseLut(value: unknown): RGB[] {
    if (!Array.isArray(value)) {
        throw new ConfigurationError('colorLut', value, 'must be an array of [r, g, b] triples');
    }
    return value.map((entry, i) => parseRgb(`colorLut[${i}]`, entry));
}

function parseChoice<T extends string>(fields: Fields, field: string, choices: readonly T[], fallback?: T): T {
    const value = fields[field];
    if (value === undefined && fallback !== undefined) {
        return fallback;
    }
    const match = choices.find(choice => choice === value);
    if (match === undefined) {
        throw new ConfigurationError(field, value, `must be one of ${choices.join(', ')}`);
    }
    return match;
}

/**
 * Validate a render configuration once, before anything is drawn, and apply
 * defaults and clamps to the optional fields. Accepts untyped input so JSON
 * files and request bodies go through the same checks as typed callers.
 */
export function resolveConfig(input: unknown): ResolvedConfig {
    if (!isRecord(input)) {
        throw new ConfigurationError('config', input, 'must be an object');
    }

    const width = dimension(input, 'width');
    const height = dimension(input, 'height');
    const cellSize = positive(input, 'cellSize');
    const marginFactor = nonNegative(input, 'marginFactor');

    const noiseScale = Math.floor(Math.max(MIN_NOISE_SCALE, optionalNumber(input, 'noiseScale', DEFAULT_NOISE_SCALE)));
    const octaves = clampOctaves(optionalNumber(input, 'octaves', 1));
    const seed = input.seed === undefined || input.seed === null ? undefined : Math.trunc(requireNumber(input, 'seed'));
    if (seed !== undefined && !isValidSeed(seed)) {
        throw new ConfigurationError('seed', input.seed, `must be an integer in ${MIN_SEED}..${MAX_SEED}`);
    }
    const swirl = optionalNumber(input, 'swirl', 0);
    const quantizeSteps = Math.max(0, Math.trunc(optionalNumber(input, 'quantizeSteps', 0)));

    const seeding = parseChoice(input, 'seeding', SEEDING_MODES);
    const density = positive(input, 'density');

    const maxLength = Math.trunc(nonNegative(input, 'maxLength'));
    const stepSize = positive(input, 'stepSize');
    const angleGain = requireNumber(input, 'angleGain');
    if (angleGain < 0 || angleGain > 1) {
        throw new ConfigurationError('angleGain', angleGain, 'must lie in [0, 1]');
    }
    const jitter = nonNegative(input, 'jitter');
    const widthStart = nonNegative(input, 'widthStart');
    const widthEnd = nonNegative(input, 'widthEnd');

    const colorLut = parseLut(input.colorLut);
    const fallbackColor = input.fallbackColor === undefined ? undefined : parseRgb('fallbackColor', input.fallbackColor);
    if (colorLut.length === 0 && fallbackColor === undefined) {
        throw new ColorLookupError('colorLut', colorLut, 'is empty and no fallbackColor is set');
    }
    const paletteAxis = parseChoice(input, 'paletteAxis', PALETTE_AXES, 'x');
    const paletteWithinStroke = Math.max(0, Math.min(1, optionalNumber(input, 'paletteWithinStroke', 0)));
    const background = parseRgb('background', input.background);

    return {
        width,
        height,
        cellSize,
        marginFactor,
        noiseScale,
        octaves,
        seed,
        swirl,
        quantizeSteps,
        seeding,
        density,
        maxLength,
        stepSize,
        angleGain,
        jitter,
        widthStart,
        widthEnd,
        colorLut,
        paletteAxis,
        paletteWithinStroke,
        fallbackColor,
        background
    };
}
