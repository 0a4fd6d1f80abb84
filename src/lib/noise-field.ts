import { ConfigurationError } from '../core/errors';

export type RandomSource = () => number;

// Seeded random number generator (mulberry32)
export function seededRandom(seed: number): RandomSource {
    let state = Number(seed) | 0;
    return function () {
        let t = state += 0x6D2B79F5;
        t = Math.imul(t ^ t >>> 15, t | 1);
        t ^= t + Math.imul(t ^ t >>> 7, t | 61);
        return ((t ^ t >>> 14) >>> 0) / 4294967296;
    };
}

export const MIN_SEED = -2147483648;
export const MAX_SEED = 2147483647;

// Stream 0 drives seeding, jitter and palette draws; noise octave o uses stream o + 1
export const STROKE_STREAM = 0;

export function octaveStream(octave: number): number {
    return octave + 1;
}

export function isValidSeed(seed: number): boolean {
    return Number.isInteger(seed) && seed >= MIN_SEED && seed <= MAX_SEED;
}

/**
 * Independent generator for one named stream of a seed. The seed and the stream
 * index are mixed through a 32-bit finalizer so neighbouring seeds and streams
 * start from unrelated states.
 */
export function streamRandom(seed: number, stream: number): RandomSource {
    let h = Math.imul(seed ^ 0x85EBCA6B, 0xC2B2AE35) ^ Math.imul(stream + 1, 0x27D4EB2F);
    h ^= h >>> 16;
    h = Math.imul(h, 0x7FEB352D);
    h ^= h >>> 15;
    h = Math.imul(h, 0x846CA68B);
    h ^= h >>> 16;
    return seededRandom(h);
}

// Generator for renders without a seed; still a private instance per call
export function unseededRandom(): RandomSource {
    return seededRandom(Math.floor(Math.random() * 4294967296));
}

export const MIN_OCTAVES = 1;
export const MAX_OCTAVES = 10;

export interface NoiseParams {
    octaves?: number;
    persistence?: number; // Amplitude decay (default 0.5)
    seed?: number;
    rng?: RandomSource;   // Used for gradients when no seed is set
}

export interface ScalarField {
    rows: number;
    cols: number;
    values: Float64Array; // rows * cols, row-major
}

export function clampOctaves(octaves: number | undefined): number {
    if (octaves === undefined || !Number.isFinite(octaves)) return MIN_OCTAVES;
    return Math.max(MIN_OCTAVES, Math.min(MAX_OCTAVES, Math.trunc(octaves)));
}

export class NoiseField {
    /**
     * Multi-octave gradient noise sampled on a rows x cols grid.
     * Octave `o` uses a lattice of (resY * 2^o) x (resX * 2^o) cells whose gradients
     * come from stream `o + 1` of the seed, so the same inputs always give the same field.
     * Values are normalised by the amplitude sum and stay within [-1, 1].
     */
    static generate(shape: [number, number], res: [number, number], params: NoiseParams = {}): ScalarField {
        const [rows, cols] = shape;
        const [resY, resX] = res;
        NoiseField.checkDimension('shape.rows', rows, true);
        NoiseField.checkDimension('shape.cols', cols, true);
        NoiseField.checkDimension('res.y', resY);
        NoiseField.checkDimension('res.x', resX);

        if (params.seed !== undefined && !isValidSeed(params.seed)) {
            throw new ConfigurationError('seed', params.seed, `must be an integer in ${MIN_SEED}..${MAX_SEED}`);
        }

        const octaves = clampOctaves(params.octaves);
        const persistence = params.persistence ?? 0.5;
        const fallback = params.rng ?? unseededRandom();

        const total = new Float64Array(rows * cols);
        let amplitude = 1;
        let maxAmp = 0;

        for (let o = 0; o < octaves; o++) {
            const freq = 2 ** o;
            const rng = params.seed === undefined ? fallback : streamRandom(params.seed, octaveStream(o));
            const octave = NoiseField.singleOctave(rows, cols, Math.trunc(resY) * freq, Math.trunc(resX) * freq, rng);
            for (let i = 0; i < total.length; i++) {
                total[i] += amplitude * octave[i];
            }
            maxAmp += amplitude;
            amplitude *= persistence;
        }

        if (maxAmp !== 0) {
            for (let i = 0; i < total.length; i++) {
                total[i] /= maxAmp;
            }
        }

        return { rows, cols, values: total };
    }

    private static singleOctave(rows: number, cols: number, resY: number, resX: number, rng: RandomSource): Float64Array {
        // Unit gradients on the (resY + 1) x (resX + 1) lattice
        const latticeW = resX + 1;
        const latticeH = resY + 1;
        const gx = new Float64Array(latticeW * latticeH);
        const gy = new Float64Array(latticeW * latticeH);
        for (let i = 0; i < gx.length; i++) {
            const a = 2 * Math.PI * rng();
            gx[i] = Math.cos(a);
            gy[i] = Math.sin(a);
        }

        const out = new Float64Array(rows * cols);
        for (let r = 0; r < rows; r++) {
            const y = r * resY / rows;
            const yi = Math.floor(y);
            const yf = y - yi;
            const v = NoiseField.fade(yf);

            for (let c = 0; c < cols; c++) {
                const x = c * resX / cols;
                const xi = Math.floor(x);
                const xf = x - xi;
                const u = NoiseField.fade(xf);

                const i00 = yi * latticeW + xi;
                const i10 = i00 + 1;
                const i01 = i00 + latticeW;
                const i11 = i01 + 1;

                const dot00 = gx[i00] * xf + gy[i00] * yf;
                const dot10 = gx[i10] * (xf - 1) + gy[i10] * yf;
                const dot01 = gx[i01] * xf + gy[i01] * (yf - 1);
                const dot11 = gx[i11] * (xf - 1) + gy[i11] * (yf - 1);

                const nx0 = NoiseField.lerp(u, dot00, dot10);
                const nx1 = NoiseField.lerp(u, dot01, dot11);
                out[r * cols + c] = NoiseField.lerp(v, nx0, nx1);
            }
        }
        return out;
    }

    // Quintic smoothstep, zero first and second derivative at the lattice points
    private static fade(t: number): number {
        return t * t * t * (t * (t * 6 - 15) + 10);
    }

    private static lerp(t: number, a: number, b: number): number {
        return a * (1 - t) + t * b;
    }

    private static checkDimension(field: string, value: number, integer = false) {
        if (!Number.isFinite(value) || value < 1) {
            throw new ConfigurationError(field, value, 'must be at least 1');
        }
        if (integer && !Number.isInteger(value)) {
            throw new ConfigurationError(field, value, 'must be an integer');
        }
    }
}
