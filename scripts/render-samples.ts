import path from 'path';
import { parseArgs } from 'util';
import { loadDataset, parseCountOption, pickRandom, renderBatch, scanOutputDir, slugify } from '../src/core/batch';

// Render N random dataset items, preferring titles not yet present in the output directory
async function run() {
    const { values } = parseArgs({
        options: {
            dataset: { type: 'string', default: 'data/samples.json' },
            n: { type: 'string', default: '6' },
            style: { type: 'string' },
            seed: { type: 'string' },
            scheme: { type: 'string', default: 'expressive' },
            output: { type: 'string', default: 'out' },
            'start-index': { type: 'string' }
        }
    });

    const outputDir = path.resolve(values.output ?? 'out');
    const dataset = loadDataset(values.dataset ?? 'data/samples.json');
    if (dataset.length === 0) {
        console.error(`No data loaded from ${values.dataset}`);
        process.exit(1);
    }

    const n = parseCountOption('--n', values.n) ?? 6;
    const seed = values.seed === undefined ? undefined : parseInt(values.seed, 10);
    const state = scanOutputDir(outputDir);
    const startIndex = parseCountOption('--start-index', values['start-index']) ?? state.nextIndex;

    const remaining = dataset.filter(item => !state.slugs.has(slugify(item.title)));
    const source = remaining.length >= n ? remaining : dataset;
    const picks = pickRandom(source, n, seed);

    console.log(`Selected ${picks.length} items (seed=${seed}) from ${source.length} candidates ` +
        `(total=${dataset.length}). Starting at index ${String(startIndex).padStart(2, '0')}.`);

    const result = await renderBatch(picks, {
        outputDir,
        colorScheme: values.scheme,
        style: values.style,
        startIndex
    });
    for (const file of result.rendered) {
        console.log(`Saved -> ${file}`);
    }
}

run().catch(err => {
    console.error('Error:', err instanceof Error ? err.message : err);
    process.exit(1);
});
