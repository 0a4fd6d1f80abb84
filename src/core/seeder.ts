import { RandomSource } from '../lib/noise-field';
import { Layout, SpatialBounds } from '../lib/layout';
import { Point, SeedingMode } from '../types';
import { ConfigurationError } from './errors';

export function seedPoints(bounds: SpatialBounds, seeding: SeedingMode, density: number, rng: RandomSource): Point[] {
    if (!Number.isFinite(density) || density <= 0) {
        throw new ConfigurationError('density', density, 'must be a positive finite number');
    }

    const area = Layout.area(bounds);
    const points: Point[] = [];

    switch (seeding) {
        case 'random': {
            const count = Math.round(area * density);
            for (let i = 0; i < count; i++) {
                const x = bounds.x0 + rng() * (bounds.x1 - bounds.x0);
                const y = bounds.y0 + rng() * (bounds.y1 - bounds.y0);
                points.push([x, y]);
            }
            break;
        }
        case 'grid': {
            // Lower edge included, nothing placed on or past the upper edge
            const spacing = Math.sqrt(area / density);
            for (let row = 0; bounds.y0 + row * spacing < bounds.y1; row++) {
                const y = bounds.y0 + row * spacing;
                for (let col = 0; bounds.x0 + col * spacing < bounds.x1; col++) {
                    points.push([bounds.x0 + col * spacing, y]);
                }
            }
            break;
        }
        default:
            throw new ConfigurationError('seeding', seeding, "must be 'grid' or 'random'");
    }

    return points;
}
