import { BoundsError, ConfigurationError } from '../core/errors';

export interface SpatialBounds {
    x0: number;
    y0: number;
    x1: number;
    y1: number;
}

export interface GridSize {
    nx: number;
    ny: number;
}

export class Layout {
    static margin(width: number, height: number, marginFactor: number): number {
        return Math.min(width, height) * marginFactor;
    }

    // Canvas minus the same margin on every side
    static getDrawArea(width: number, height: number, marginFactor: number): SpatialBounds {
        if (!Number.isFinite(marginFactor) || marginFactor < 0) {
            throw new ConfigurationError('marginFactor', marginFactor, 'must be a non-negative number');
        }
        const margin = Layout.margin(width, height, marginFactor);
        if (margin * 2 >= Math.min(width, height)) {
            throw new BoundsError('marginFactor', marginFactor,
                `margin of ${margin}px leaves no drawing area on a ${width}x${height} canvas`);
        }
        return {
            x0: margin,
            y0: margin,
            x1: width - margin,
            y1: height - margin
        };
    }

    static area(bounds: SpatialBounds): number {
        return (bounds.x1 - bounds.x0) * (bounds.y1 - bounds.y0);
    }

    static contains(bounds: SpatialBounds, x: number, y: number): boolean {
        return bounds.x0 <= x && x <= bounds.x1 && bounds.y0 <= y && y <= bounds.y1;
    }

    static gridSize(bounds: SpatialBounds, cellSize: number): GridSize {
        if (!Number.isFinite(cellSize) || cellSize <= 0) {
            throw new ConfigurationError('cellSize', cellSize, 'must be a positive number');
        }
        const nx = Math.floor((bounds.x1 - bounds.x0) / cellSize);
        const ny = Math.floor((bounds.y1 - bounds.y0) / cellSize);
        if (nx < 1 || ny < 1) {
            throw new ConfigurationError('cellSize', cellSize, `produces an empty ${nx}x${ny} angle grid`);
        }
        return { nx, ny };
    }
}
