import fs from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import { getNextFilename, loadConfig } from './core/app-config';
import { loadDataset, parseCountOption, renderBatch } from './core/batch';
import { savePng } from './core/png-exporter';
import { FlowFieldRenderer } from './core/renderer';

function printUsage() {
    console.error('Usage: npm start <config-file>');
    console.error('       npm run batch -- --dataset <file.json> [--scheme expressive] [--style sharp]');
    console.error('                        [--output out] [--limit N] [--size 3000] [--organize-by-genre]');
    console.error('Example: npm start configs/default.json');
}

// --- SINGLE RENDER ---
async function renderConfigFile(configPath: string) {
    console.log(`Loading config from: ${configPath}`);
    const job = loadConfig(configPath);

    console.log(`Rendering ${job.config.width}x${job.config.height}` +
        (job.paletteName ? ` (palette: ${job.paletteName})` : '') + '...');
    const raster = FlowFieldRenderer.render(job.config, { verbose: true });

    const outputDir = path.join(process.cwd(), 'drawings');
    if (!fs.existsSync(outputDir)) {
        fs.mkdirSync(outputDir);
    }

    // Versioned PNG
    const filename = getNextFilename(outputDir, job.outputBaseName);
    const filePath = path.join(outputDir, filename);
    await savePng(raster, filePath);
    console.log(`Saved PNG to: ${filePath}`);
}

// --- BATCH ---
async function runBatch(args: string[]) {
    const { values } = parseArgs({
        args,
        options: {
            dataset: { type: 'string' },
            scheme: { type: 'string', default: 'expressive' },
            style: { type: 'string' },
            output: { type: 'string', default: 'out' },
            limit: { type: 'string' },
            size: { type: 'string' },
            'organize-by-genre': { type: 'boolean', default: false }
        }
    });

    if (!values.dataset) {
        printUsage();
        process.exit(1);
    }

    let limit: number | undefined;
    let size: number | undefined;
    try {
        limit = parseCountOption('--limit', values.limit);
        size = parseCountOption('--size', values.size);
    } catch (err) {
        console.error('Error:', err instanceof Error ? err.message : err);
        printUsage();
        process.exit(1);
    }

    const items = loadDataset(values.dataset);
    console.log(`Dataset loaded: ${items.length} items`);

    const result = await renderBatch(items, {
        outputDir: path.resolve(values.output ?? 'out'),
        colorScheme: values.scheme,
        style: values.style,
        organizeByGenre: values['organize-by-genre'],
        limit,
        size
    });

    if (result.rendered.length === 0 && result.failed.length > 0) {
        process.exit(1);
    }
}

// --- MAIN RUNNER ---
async function main() {
    try {
        const [command, ...rest] = process.argv.slice(2);
        if (!command) {
            printUsage();
            process.exit(1);
        }

        if (command === 'batch') {
            await runBatch(rest);
        } else {
            await renderConfigFile(command);
        }
    } catch (err) {
        console.error('Error:', err instanceof Error ? err.message : err);
        process.exit(1);
    }
}

void main();
