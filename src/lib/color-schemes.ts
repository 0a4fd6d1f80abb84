import { PaletteAxis } from '../types';

export type Genre = 'fear' | 'anger' | 'sadness' | 'love' | 'joy' | 'surprise' | 'default';

export const GENRES: readonly Genre[] = ['fear', 'anger', 'sadness', 'love', 'joy', 'surprise', 'default'];

// Colour map name and the [start, end] range sampled from it
export type PaletteRange = [string, [number, number]];

export interface ColorScheme {
    description: string;
    paletteMapping: Record<Genre, PaletteRange>;
    paletteAxis: PaletteAxis;
    paletteWithinStroke: number;
}

export const DEFAULT_SCHEME = 'expressive';

export const SCHEMES: Record<string, ColorScheme> = {
    'very_smooth': {
        description: 'Smooth gradients with subtle within-stroke color transitions',
        paletteMapping: {
            fear: ['bone', [0.2, 0.9]],
            anger: ['hot', [0.1, 0.95]],
            sadness: ['PuBu', [0.4, 0.95]],
            love: ['RdPu', [0.2, 0.9]],
            joy: ['rainbow', [0.0, 1.0]],
            surprise: ['cividis', [0.1, 0.9]],
            default: ['grey', [0.2, 0.9]]
        },
        paletteAxis: 'x',
        paletteWithinStroke: 0.2
    },

    'expressive': {
        description: 'Bold color shifts with vertical gradients and per-stroke variation',
        paletteMapping: {
            fear: ['bone', [0.0, 1.0]],
            anger: ['hot', [0.0, 1.0]],
            sadness: ['PuBu', [0.2, 1.0]],
            love: ['RdPu', [0.0, 1.0]],
            joy: ['rainbow', [0.0, 1.0]],
            surprise: ['cividis', [0.0, 1.0]],
            default: ['grey', [0.0, 1.0]]
        },
        paletteAxis: 'y',
        paletteWithinStroke: 0.5
    },

    'wild': {
        description: 'Flow-driven color chaos with rainbow strokes following field direction',
        paletteMapping: {
            fear: ['bone', [0.0, 1.0]],
            anger: ['hot', [0.0, 1.0]],
            sadness: ['PuBu', [0.0, 1.0]],
            love: ['RdPu', [0.0, 1.0]],
            joy: ['rainbow', [0.0, 1.0]],
            surprise: ['cividis', [0.0, 1.0]],
            default: ['grey', [0.0, 1.0]]
        },
        paletteAxis: 'field',
        paletteWithinStroke: 0.7
    }
};

// Unknown names fall back to the expressive scheme
export function getScheme(name: string = DEFAULT_SCHEME): ColorScheme {
    return Object.prototype.hasOwnProperty.call(SCHEMES, name) ? SCHEMES[name] : SCHEMES[DEFAULT_SCHEME];
}
