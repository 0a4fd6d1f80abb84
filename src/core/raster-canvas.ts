import { Point, Raster, RGB } from '../types';

/**
 * RGB pixel buffer owned by a single render. Pixel (x, y) is centred on the
 * integer coordinate; anything drawn outside the canvas is clipped.
 */
export class RasterCanvas {
    readonly width: number;
    readonly height: number;
    private readonly data: Uint8Array;

    constructor(width: number, height: number, background: RGB) {
        this.width = width;
        this.height = height;
        this.data = new Uint8Array(width * height * 3);
        for (let i = 0; i < this.data.length; i += 3) {
            this.data[i] = background[0];
            this.data[i + 1] = background[1];
            this.data[i + 2] = background[2];
        }
    }

    setPixel(x: number, y: number, color: RGB) {
        if (x < 0 || y < 0 || x >= this.width || y >= this.height) return;
        const idx = (y * this.width + x) * 3;
        this.data[idx] = color[0];
        this.data[idx + 1] = color[1];
        this.data[idx + 2] = color[2];
    }

    getPixel(x: number, y: number): RGB {
        const idx = (y * this.width + x) * 3;
        return [this.data[idx], this.data[idx + 1], this.data[idx + 2]];
    }

    /**
     * Straight segment with square ends. Widths are truncated to whole pixels,
     * with a minimum of 1.
     */
    drawLine(from: Point, to: Point, width: number, color: RGB) {
        const pixelWidth = Math.max(1, Math.trunc(width));
        if (pixelWidth > 1) {
            this.fillThickSegment(from, to, pixelWidth / 2, color);
        }
        this.bresenham(Math.round(from[0]), Math.round(from[1]), Math.round(to[0]), Math.round(to[1]), color);
    }

    toRaster(): Raster {
        return { width: this.width, height: this.height, data: this.data };
    }

    private fillThickSegment(from: Point, to: Point, halfWidth: number, color: RGB) {
        const [x1, y1] = from;
        const [x2, y2] = to;
        const len = Math.hypot(x2 - x1, y2 - y1);
        if (len === 0) return;
        const ux = (x2 - x1) / len;
        const uy = (y2 - y1) / len;

        const minX = Math.max(0, Math.floor(Math.min(x1, x2) - halfWidth));
        const maxX = Math.min(this.width - 1, Math.ceil(Math.max(x1, x2) + halfWidth));
        const minY = Math.max(0, Math.floor(Math.min(y1, y2) - halfWidth));
        const maxY = Math.min(this.height - 1, Math.ceil(Math.max(y1, y2) + halfWidth));

        for (let py = minY; py <= maxY; py++) {
            for (let px = minX; px <= maxX; px++) {
                const dx = px - x1;
                const dy = py - y1;
                const along = dx * ux + dy * uy;
                if (along < 0 || along > len) continue;
                const across = Math.abs(dx * uy - dy * ux);
                if (across <= halfWidth) {
                    this.setPixel(px, py, color);
                }
            }
        }
    }

    private bresenham(x0: number, y0: number, x1: number, y1: number, color: RGB) {
        const dx = Math.abs(x1 - x0);
        const dy = -Math.abs(y1 - y0);
        const sx = x0 < x1 ? 1 : -1;
        const sy = y0 < y1 ? 1 : -1;
        let err = dx + dy;
        let x = x0;
        let y = y0;

        while (true) {
            this.setPixel(x, y, color);
            if (x === x1 && y === y1) break;
            const e2 = 2 * err;
            if (e2 >= dy) {
                err += dy;
                x += sx;
            }
            if (e2 <= dx) {
                err += dx;
                y += sy;
            }
        }
    }
}
