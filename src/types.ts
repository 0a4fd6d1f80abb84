// RGB triple, each channel an integer 0..255
export type RGB = [number, number, number];

export type Point = [number, number];

export type SeedingMode = 'grid' | 'random';

// Metric used to pick a stroke's base position in the colour LUT
export type PaletteAxis =
    | 'x'       // Horizontal start position
    | 'y'       // Vertical start position
    | 'field'   // Flow angle at the stroke start
    | 'random'; // One draw from the render RNG

export type StyleBias = 'sharp' | 'preferred' | 'natural';

// Render Types

export interface FlowFieldConfig {
    width: number;
    height: number;
    cellSize: number;
    marginFactor: number;      // Fraction of min(width, height) kept as border

    // Noise
    noiseScale?: number;       // Base lattice resolution (default: 4, min 2)
    octaves?: number;          // 1..10 (default: 1)
    seed?: number;             // Omit for a non-reproducible render
    swirl?: number;            // Circular bias strength (default: 0)
    quantizeSteps?: number;    // Snap angles to N directions (default: 0 = off)

    // Seeding
    seeding: SeedingMode;
    density: number;           // Points per square pixel

    // Strokes
    maxLength: number;         // Step budget per stroke
    stepSize: number;
    angleGain: number;         // 0 = keep heading, 1 = follow field exactly
    jitter: number;            // Radians, uniform in [-jitter, jitter]
    widthStart: number;
    widthEnd: number;

    // Colour
    colorLut: RGB[];
    paletteAxis?: PaletteAxis;         // default: 'x'
    paletteWithinStroke?: number;      // 0 = flat strokes, 1 = full-ramp sweep (default: 0)
    fallbackColor?: RGB;               // Used only when colorLut is empty
    paletteName?: string;              // Label, ignored by the renderer
    background: RGB;
}

export interface ResolvedConfig {
    width: number;
    height: number;
    cellSize: number;
    marginFactor: number;
    noiseScale: number;
    octaves: number;
    seed: number | undefined;
    swirl: number;
    quantizeSteps: number;
    seeding: SeedingMode;
    density: number;
    maxLength: number;
    stepSize: number;
    angleGain: number;
    jitter: number;
    widthStart: number;
    widthEnd: number;
    colorLut: RGB[];
    paletteAxis: PaletteAxis;
    paletteWithinStroke: number;
    fallbackColor: RGB | undefined;
    background: RGB;
}

export interface Raster {
    width: number;
    height: number;
    data: Uint8Array; // width * height * 3, row-major RGB
}

// Config File Types

export interface RenderFileConfig {
    outputBaseName: string;
    render: FlowFieldConfig;
}

export interface VectorFileConfig {
    outputBaseName: string;
    vector: number[];
    colorScheme?: string;
    style?: string;
    size?: number;
}

export type AppConfig = RenderFileConfig | VectorFileConfig;

export interface DatasetItem {
    title: string;
    vector: number[];
}
