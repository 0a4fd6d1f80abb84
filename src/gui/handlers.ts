import { SCHEMES } from '../lib/color-schemes';
import { colormapNames } from '../lib/palettes';
import { isRecord, resolveConfig } from '../core/config';
import { ConfigurationError, RenderError } from '../core/errors';
import { applyStyleBias, mapFeaturesToConfig } from '../core/mapper';
import { rasterToPng } from '../core/png-exporter';
import { FlowFieldRenderer } from '../core/renderer';

export const PREVIEW_SIZE = 600;
// Largest side rendered by the preview server
export const MAX_PREVIEW_DIMENSION = 4096;

function checkPreviewDimension(field: string, value: number) {
    if (value > MAX_PREVIEW_DIMENSION) {
        throw new ConfigurationError(field, value, `must not exceed ${MAX_PREVIEW_DIMENSION}px on the preview server`);
    }
}

export type HandlerResult =
    | { status: number; png: Buffer }
    | { status: number; json: Record<string, unknown> };

export function listSchemes(): HandlerResult {
    const schemes = Object.entries(SCHEMES).map(([name, scheme]) => ({
        name,
        description: scheme.description,
        paletteAxis: scheme.paletteAxis,
        paletteWithinStroke: scheme.paletteWithinStroke
    }));
    return { status: 200, json: { schemes, colormaps: colormapNames() } };
}

// Configuration problems are the client's fault; anything else is ours
export function errorResult(error: unknown): HandlerResult {
    if (error instanceof RenderError) {
        return {
            status: 400,
            json: { error: error.message, field: error.field, value: error.value }
        };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { status: 500, json: { error: message } };
}

export async function renderConfigRequest(body: unknown): Promise<HandlerResult> {
    try {
        const config = resolveConfig(body);
        checkPreviewDimension('width', config.width);
        checkPreviewDimension('height', config.height);
        const raster = FlowFieldRenderer.renderResolved(config);
        return { status: 200, png: await rasterToPng(raster) };
    } catch (error) {
        return errorResult(error);
    }
}

export async function renderVectorRequest(body: unknown): Promise<HandlerResult> {
    try {
        if (!isRecord(body)) {
            return { status: 400, json: { error: 'Request body must be a JSON object' } };
        }
        const scheme = typeof body.colorScheme === 'string' ? body.colorScheme : undefined;
        const style = typeof body.style === 'string' ? body.style : undefined;
        const size = typeof body.size === 'number' ? body.size : PREVIEW_SIZE;
        checkPreviewDimension('size', size);

        const mapped = mapFeaturesToConfig(body.vector, scheme, size);
        const raster = FlowFieldRenderer.render(applyStyleBias(mapped.config, style));
        return { status: 200, png: await rasterToPng(raster) };
    } catch (error) {
        return errorResult(error);
    }
}
