import { RandomSource } from '../lib/noise-field';
import { Layout, SpatialBounds } from '../lib/layout';
import { Point } from '../types';
import { AngleGrid, sampleAngle } from './angle-grid';

export interface TraceOptions {
    cellSize: number;
    maxLength: number;
    stepSize: number;
    angleGain: number;
    jitter: number;
}

export interface StrokeSegment {
    from: Point;
    to: Point;
    t: number;      // 0 at the first segment, 1 at the last
    width: number;
}

/**
 * Follow the field from `start` until the step budget runs out or the next
 * position would leave the bounds. The out-of-bounds candidate is dropped, so
 * every returned point lies inside the bounds. Each step draws one jitter value
 * from `rng`, even when jitter is 0, which keeps the draw sequence independent
 * of the jitter setting.
 */
export function traceStroke(
    start: Point,
    grid: AngleGrid,
    bounds: SpatialBounds,
    options: TraceOptions,
    rng: RandomSource
): Point[] {
    let [x, y] = start;
    const positions: Point[] = [[x, y]];
    if (options.stepSize <= 0) {
        return positions;
    }

    const steps = Math.max(0, Math.trunc(options.maxLength));
    let heading = sampleAngle(grid, bounds, options.cellSize, x, y);

    for (let i = 0; i < steps; i++) {
        const fieldAngle = sampleAngle(grid, bounds, options.cellSize, x, y);
        heading = heading * (1 - options.angleGain) + fieldAngle * options.angleGain;
        heading += (rng() * 2 - 1) * options.jitter;

        const nx = x + Math.cos(heading) * options.stepSize;
        const ny = y + Math.sin(heading) * options.stepSize;
        if (!Layout.contains(bounds, nx, ny)) {
            break;
        }
        x = nx;
        y = ny;
        positions.push([x, y]);
    }

    return positions;
}

// Fewer than two positions yields no segments
export function strokeSegments(positions: Point[], widthStart: number, widthEnd: number): StrokeSegment[] {
    const total = positions.length - 1;
    const segments: StrokeSegment[] = [];
    for (let i = 0; i < total; i++) {
        const t = total > 1 ? i / (total - 1) : 0;
        segments.push({
            from: positions[i],
            to: positions[i + 1],
            t,
            width: widthStart + (widthEnd - widthStart) * t
        });
    }
    return segments;
}
