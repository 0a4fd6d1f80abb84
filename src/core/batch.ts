import fs from 'fs';
import path from 'path';
import { seededRandom, unseededRandom } from '../lib/noise-field';
import { DEFAULT_SCHEME } from '../lib/color-schemes';
import { DatasetItem } from '../types';
import { isRecord } from './config';
import { ConfigurationError } from './errors';
import { applyStyleBias, DEFAULT_SIZE, FEATURE_DIMENSIONS, mapFeaturesToConfig } from './mapper';
import { savePng } from './png-exporter';
import { FlowFieldRenderer } from './renderer';

export interface BatchOptions {
    outputDir: string;
    colorScheme?: string;
    style?: string;
    organizeByGenre?: boolean;
    limit?: number;
    size?: number;
    startIndex?: number;    // Defaults to the next free index in outputDir
}

export interface BatchResult {
    rendered: string[];
    failed: { title: string; error: string }[];
}

export interface OutputDirState {
    nextIndex: number;
    slugs: Set<string>;
}

const OUTPUT_NAME = /^(\d{2,})_(.+)_([A-Za-z]+)_(?:regular|sharp|preferred)\.png$/;

// Numeric CLI flag such as --limit or --size; absent stays undefined
export function parseCountOption(flag: string, value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const n = Number(value);
    if (value.trim() === '' || !Number.isInteger(n) || n < 1) {
        throw new ConfigurationError(flag, value, 'must be a positive whole number');
    }
    return n;
}

export function slugify(text: string, maxLength: number = 50): string {
    let slug = text.toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '');
    if (slug.length > maxLength) {
        slug = slug.slice(0, maxLength).replace(/_+$/, '');
    }
    return slug || 'untitled';
}

export function outputFileName(index: number, title: string, paletteName: string, style?: string): string {
    const styleTag = (style || 'regular').toLowerCase();
    return `${String(index).padStart(2, '0')}_${slugify(title)}_${paletteName}_${styleTag}.png`;
}

// Next free file index and the title slugs already rendered into `dir`
export function scanOutputDir(dir: string): OutputDirState {
    const slugs = new Set<string>();
    let maxIndex = 0;
    if (!fs.existsSync(dir)) {
        return { nextIndex: 1, slugs };
    }
    for (const file of fs.readdirSync(dir)) {
        const match = OUTPUT_NAME.exec(file);
        if (!match) continue;
        maxIndex = Math.max(maxIndex, parseInt(match[1], 10));
        slugs.add(match[2]);
    }
    return { nextIndex: maxIndex + 1, slugs };
}

/**
 * Dataset: JSON array of { title, vector }. Rows without a title or without a
 * vector of 14 numbers are skipped with a warning.
 */
export function loadDataset(datasetPath: string): DatasetItem[] {
    const absPath = path.isAbsolute(datasetPath)
        ? datasetPath
        : path.join(process.cwd(), datasetPath);

    if (!fs.existsSync(absPath)) {
        throw new Error(`Dataset not found: ${absPath}`);
    }

    const parsed: unknown = JSON.parse(fs.readFileSync(absPath, 'utf8'));
    if (!Array.isArray(parsed)) {
        throw new Error(`Dataset must be a JSON array: ${absPath}`);
    }

    const items: DatasetItem[] = [];
    parsed.forEach((row: unknown, i: number) => {
        const title = isRecord(row) && typeof row.title === 'string' ? row.title.trim() : '';
        const vector = isRecord(row) ? row.vector : undefined;
        if (!title || !Array.isArray(vector) || vector.length !== FEATURE_DIMENSIONS
            || !vector.every(v => typeof v === 'number' && Number.isFinite(v))) {
            console.warn(`Batch: Skipping dataset row ${i}: needs a title and ${FEATURE_DIMENSIONS} numbers`);
            return;
        }
        items.push({ title, vector: vector.map(Number) });
    });
    return items;
}

// Partial Fisher-Yates; the order of the returned sample depends only on the seed
export function pickRandom<T>(items: T[], n: number, seed?: number): T[] {
    if (n >= items.length) {
        return [...items];
    }
    const rng = seed === undefined ? unseededRandom() : seededRandom(seed);
    const pool = [...items];
    for (let i = 0; i < n; i++) {
        const j = i + Math.floor(rng() * (pool.length - i));
        [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, n);
}

/**
 * Render each item to its own PNG. A failing item is logged and recorded, and
 * the batch moves on to the next one.
 */
export async function renderBatch(items: DatasetItem[], options: BatchOptions): Promise<BatchResult> {
    const colorScheme = options.colorScheme ?? DEFAULT_SCHEME;
    const size = options.size ?? DEFAULT_SIZE;
    const total = options.limit === undefined ? items.length : Math.min(options.limit, items.length);
    const startIndex = options.startIndex ?? scanOutputDir(options.outputDir).nextIndex;
    const result: BatchResult = { rendered: [], failed: [] };

    console.log(`Batch: Rendering ${total} items (scheme: ${colorScheme}, style: ${options.style || 'regular'}) into ${options.outputDir}`);

    for (let i = 0; i < total; i++) {
        const item = items[i];
        try {
            const mapped = mapFeaturesToConfig(item.vector, colorScheme, size);
            const config = applyStyleBias(mapped.config, options.style);

            const fileName = outputFileName(startIndex + i, item.title, mapped.paletteName, options.style);
            const filePath = options.organizeByGenre
                ? path.join(options.outputDir, mapped.genre, fileName)
                : path.join(options.outputDir, fileName);

            console.log(`Batch: [${i + 1}/${total}] ${item.title.slice(0, 40)} (genre: ${mapped.genre}, palette: ${mapped.paletteName})`);
            const raster = FlowFieldRenderer.render(config);
            await savePng(raster, filePath);
            result.rendered.push(filePath);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`Batch: Failed to render '${item.title}': ${message}`);
            result.failed.push({ title: item.title, error: message });
        }
    }

    console.log(`Batch: Done, ${result.rendered.length} rendered, ${result.failed.length} failed`);
    return result;
}
