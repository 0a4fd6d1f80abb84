import { FlowFieldConfig, RGB } from '../types';

export const WHITE: RGB = [255, 255, 255];
export const GRAY: RGB = [128, 128, 128];

// Grid-seeded grey-on-white scene; the first stroke starts at the top-left corner of the bounds
export function grayScene(overrides: Partial<FlowFieldConfig> = {}): FlowFieldConfig {
    return {
        width: 200,
        height: 200,
        cellSize: 20,
        marginFactor: 0.1,
        noiseScale: 4,
        octaves: 1,
        seed: 1,
        seeding: 'grid',
        density: 0.002,
        maxLength: 50,
        stepSize: 3,
        angleGain: 0.5,
        jitter: 0,
        colorLut: [GRAY],
        widthStart: 2,
        widthEnd: 2,
        background: WHITE,
        ...overrides
    };
}

// Denser random-seeded scene with a multi-colour LUT
export function busyScene(overrides: Partial<FlowFieldConfig> = {}): FlowFieldConfig {
    return {
        width: 160,
        height: 120,
        cellSize: 10,
        marginFactor: 0.05,
        noiseScale: 3,
        octaves: 3,
        seed: 7,
        swirl: 0.3,
        quantizeSteps: 8,
        seeding: 'random',
        density: 0.004,
        maxLength: 40,
        stepSize: 2,
        angleGain: 0.6,
        jitter: 0.1,
        colorLut: [[10, 20, 30], [60, 70, 80], [110, 120, 130], [160, 170, 180], [210, 220, 230]],
        paletteAxis: 'random',
        paletteWithinStroke: 0.5,
        widthStart: 3,
        widthEnd: 1,
        background: [250, 250, 245],
        ...overrides
    };
}

// Exactly representable feature vector, genre 'joy'
export const JOY_VECTOR = [0.5, 0.5, 1.5, 0.5, 0.25, 0.5, 0.5, 0.25, 0.5, 0.5, 10, 2, 0.5, 0.55];

export function countingRandom(source: () => number): { rng: () => number; calls: () => number } {
    let calls = 0;
    return {
        rng: () => {
            calls++;
            return source();
        },
        calls: () => calls
    };
}
