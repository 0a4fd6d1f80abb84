import fs from 'fs';
import path from 'path';
import { AppConfig, FlowFieldConfig } from '../types';
import { isRecord, resolveConfig } from './config';
import { ConfigurationError } from './errors';
import { applyStyleBias, mapFeaturesToConfig, validateFeatureVector } from './mapper';

export interface LoadedJob {
    outputBaseName: string;
    config: FlowFieldConfig;
    paletteName?: string;
}

// --- CONFIG LOADING ---
export function loadConfig(configPath: string): LoadedJob {
    const absPath = path.isAbsolute(configPath)
        ? configPath
        : path.join(process.cwd(), configPath);

    if (!fs.existsSync(absPath)) {
        throw new Error(`Config file not found: ${absPath}`);
    }

    const raw = fs.readFileSync(absPath, 'utf8');
    return toJob(parseAppConfig(JSON.parse(raw)));
}

/**
 * A config file either carries a full render configuration under `render`, or
 * a feature `vector` that is mapped through a colour scheme and style.
 */
export function parseAppConfig(value: unknown): AppConfig {
    if (!isRecord(value)) {
        throw new ConfigurationError('config', value, 'must be a JSON object');
    }
    const outputBaseName = typeof value.outputBaseName === 'string' && value.outputBaseName
        ? value.outputBaseName
        : 'flowfield';

    if (value.render !== undefined) {
        const render = value.render;
        const paletteName = isRecord(render) && typeof render.paletteName === 'string' ? render.paletteName : undefined;
        return {
            outputBaseName,
            render: { ...resolveConfig(render), paletteName }
        };
    }

    if (value.vector !== undefined) {
        return {
            outputBaseName,
            vector: validateFeatureVector(value.vector),
            colorScheme: typeof value.colorScheme === 'string' ? value.colorScheme : undefined,
            style: typeof value.style === 'string' ? value.style : undefined,
            size: typeof value.size === 'number' ? value.size : undefined
        };
    }

    throw new ConfigurationError('config', Object.keys(value), "needs either a 'render' or a 'vector' entry");
}

export function toJob(app: AppConfig): LoadedJob {
    if ('render' in app) {
        return { outputBaseName: app.outputBaseName, config: app.render, paletteName: app.render.paletteName };
    }
    const mapped = mapFeaturesToConfig(app.vector, app.colorScheme, app.size);
    return {
        outputBaseName: app.outputBaseName,
        config: applyStyleBias(mapped.config, app.style),
        paletteName: mapped.paletteName
    };
}

// --- FILE VERSIONING ---
export function getNextFilename(outputDir: string, baseName: string): string {
    let counter = 1;
    while (true) {
        const numStr = counter.toString().padStart(3, '0');
        const filename = `${baseName}_${numStr}.png`;
        if (!fs.existsSync(path.join(outputDir, filename))) {
            return filename;
        }
        counter++;
    }
}
