import { NoiseField, RandomSource, ScalarField } from '../lib/noise-field';
import { GridSize, SpatialBounds } from '../lib/layout';
import { ResolvedConfig } from '../types';

const TAU = Math.PI * 2;

export interface AngleGrid {
    nx: number;
    ny: number;
    values: Float64Array; // ny * nx radians, row-major, not reduced mod 2PI
}

export interface AngleDistortion {
    swirl?: number;
    quantizeSteps?: number;
}

/**
 * Noise to radians, then swirl, then quantization. Quantization runs last and
 * also snaps whatever the swirl added.
 */
export function buildAngleGrid(noise: ScalarField, distortion: AngleDistortion = {}): AngleGrid {
    const nx = noise.cols;
    const ny = noise.rows;
    const values = new Float64Array(nx * ny);
    const swirl = distortion.swirl ?? 0;
    const steps = distortion.quantizeSteps ?? 0;
    const cx = nx / 2;
    const cy = ny / 2;

    for (let y = 0; y < ny; y++) {
        for (let x = 0; x < nx; x++) {
            const i = y * nx + x;
            let angle = noise.values[i] * TAU;
            if (swirl > 0) {
                angle += Math.atan2(y - cy, x - cx) * swirl;
            }
            if (steps > 0) {
                angle = Math.round(angle / TAU * steps) * (TAU / steps);
            }
            values[i] = angle;
        }
    }

    return { nx, ny, values };
}

// Out-of-range samples read as angle 0
export function sampleAngle(grid: AngleGrid, bounds: SpatialBounds, cellSize: number, x: number, y: number): number {
    const gx = Math.trunc((x - bounds.x0) / cellSize);
    const gy = Math.trunc((y - bounds.y0) / cellSize);
    if (gy >= 0 && gy < grid.ny && gx >= 0 && gx < grid.nx) {
        return grid.values[gy * grid.nx + gx];
    }
    return 0;
}

export function fillAngleGrid(size: GridSize, config: ResolvedConfig, rng: RandomSource): AngleGrid {
    const { nx, ny } = size;
    const noise = NoiseField.generate([ny, nx], [config.noiseScale, config.noiseScale], {
        octaves: config.octaves,
        seed: config.seed,
        rng
    });
    return buildAngleGrid(noise, { swirl: config.swirl, quantizeSteps: config.quantizeSteps });
}
