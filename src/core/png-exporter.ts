import fs from 'fs';
import path from 'path';
import sharp from 'sharp';
import { Raster } from '../types';

export async function rasterToPng(raster: Raster): Promise<Buffer> {
    return sharp(Buffer.from(raster.data.buffer, raster.data.byteOffset, raster.data.byteLength), {
        raw: {
            width: raster.width,
            height: raster.height,
            channels: 3
        }
    })
        .png()
        .toBuffer();
}

// Decode a PNG back into a 3-channel raster
export async function pngToRaster(png: Buffer): Promise<Raster> {
    const { data, info } = await sharp(png)
        .toColorspace('srgb')
        .removeAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });
    return { width: info.width, height: info.height, data: new Uint8Array(data) };
}

export async function savePng(raster: Raster, filePath: string): Promise<void> {
    const png = await rasterToPng(raster);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, png);
}
