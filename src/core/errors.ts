/**
 * Base class for every error a render can raise before drawing.
 * `field` names the offending configuration entry, `value` is what was supplied.
 */
export class RenderError extends Error {
    readonly field: string;
    readonly value: unknown;

    constructor(field: string, value: unknown, message: string) {
        super(`${field}: ${message} (got ${formatValue(value)})`);
        this.name = new.target.name;
        this.field = field;
        this.value = value;
    }
}

export class ConfigurationError extends RenderError { }

export class ColorLookupError extends RenderError { }

// Margin leaves no usable drawing area
export class BoundsError extends RenderError { }

function formatValue(value: unknown): string {
    if (typeof value === 'number' || typeof value === 'boolean' || value === undefined || value === null) {
        return String(value);
    }
    if (typeof value === 'string') {
        return `'${value}'`;
    }
    try {
        return JSON.stringify(value);
    } catch {
        return typeof value;
    }
}
