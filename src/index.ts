export type * from './types';
export { RenderError, ConfigurationError, ColorLookupError, BoundsError } from './core/errors';
export { resolveConfig } from './core/config';
export { FlowFieldRenderer } from './core/renderer';
export type { RenderOptions } from './core/renderer';
export { NoiseField, seededRandom } from './lib/noise-field';
export { Layout } from './lib/layout';
export type { SpatialBounds } from './lib/layout';
export { buildAngleGrid, sampleAngle } from './core/angle-grid';
export type { AngleGrid } from './core/angle-grid';
export { seedPoints } from './core/seeder';
export { traceStroke, strokeSegments } from './core/tracer';
export { createStrokeColorizer, lutWindow, lutIndex } from './core/colorizer';
export { RasterCanvas } from './core/raster-canvas';
export { buildLut, buildCoarsePalette, sampleColormap } from './lib/palettes';
export { getScheme, SCHEMES } from './lib/color-schemes';
export { mapFeaturesToConfig, applyStyleBias, genreFromVector } from './core/mapper';
export { rasterToPng, savePng } from './core/png-exporter';
export { renderBatch, loadDataset } from './core/batch';
