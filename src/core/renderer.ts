import { RandomSource, STROKE_STREAM, streamRandom, unseededRandom } from '../lib/noise-field';
import { Layout, SpatialBounds } from '../lib/layout';
import { FlowFieldConfig, Point, Raster, ResolvedConfig } from '../types';
import { AngleGrid, fillAngleGrid } from './angle-grid';
import { createStrokeColorizer } from './colorizer';
import { resolveConfig } from './config';
import { RasterCanvas } from './raster-canvas';
import { seedPoints } from './seeder';
import { strokeSegments, traceStroke } from './tracer';

export interface RenderOptions {
    verbose?: boolean; // Log a summary line per render
}

export interface RenderStats {
    seeded: number;
    drawn: number;
    segments: number;
}

export class FlowFieldRenderer {
    /**
     * Render one configuration to an RGB raster. Every configuration error is
     * raised before the canvas is allocated. The RNG lives only for this call,
     * so concurrent renders never share random state.
     */
    static render(config: FlowFieldConfig, options: RenderOptions = {}): Raster {
        return FlowFieldRenderer.renderResolved(resolveConfig(config), options);
    }

    static renderResolved(config: ResolvedConfig, options: RenderOptions = {}): Raster {
        const bounds = Layout.getDrawArea(config.width, config.height, config.marginFactor);
        const size = Layout.gridSize(bounds, config.cellSize);

        const rng = config.seed === undefined ? unseededRandom() : streamRandom(config.seed, STROKE_STREAM);
        const grid = fillAngleGrid(size, config, rng);
        const points = seedPoints(bounds, config.seeding, config.density, rng);

        const canvas = new RasterCanvas(config.width, config.height, config.background);
        const stats: RenderStats = { seeded: points.length, drawn: 0, segments: 0 };

        for (const start of points) {
            const drawn = FlowFieldRenderer.drawStroke(canvas, start, grid, bounds, config, rng);
            if (drawn > 0) {
                stats.drawn++;
                stats.segments += drawn;
            }
        }

        if (options.verbose) {
            console.log(`Renderer: ${config.width}x${config.height}, grid ${grid.nx}x${grid.ny}, ` +
                `${stats.drawn}/${stats.seeded} strokes drawn (${stats.segments} segments)`);
        }

        return canvas.toRaster();
    }

    // Returns the number of segments drawn, 0 for a stroke that never left its seed
    static drawStroke(
        canvas: RasterCanvas,
        start: Point,
        grid: AngleGrid,
        bounds: SpatialBounds,
        config: ResolvedConfig,
        rng: RandomSource
    ): number {
        const positions = traceStroke(start, grid, bounds, config, rng);
        if (positions.length < 2) {
            return 0;
        }

        const colorAt = createStrokeColorizer(start, grid, bounds, config, rng);
        const segments = strokeSegments(positions, config.widthStart, config.widthEnd);
        for (const segment of segments) {
            canvas.drawLine(segment.from, segment.to, segment.width, colorAt(segment.t));
        }
        return segments.length;
    }
}
