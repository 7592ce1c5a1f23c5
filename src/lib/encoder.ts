import sharp from 'sharp';
import toIco from 'to-ico';
import type { RasterCanvas } from '../utils/raster';

export async function encodePng(canvas: RasterCanvas): Promise<Buffer> {
  const pixels = Buffer.from(canvas.data.buffer, canvas.data.byteOffset, canvas.data.byteLength);
  return sharp(pixels, { raw: { width: canvas.width, height: canvas.height, channels: 4 } })
    .png()
    .toBuffer();
}

/**
 * Packs `sizes` square bitmaps, each downsampled from `source`, into one
 * `.ico` container. A size equal to the source's width reuses it unchanged.
 */
export async function encodeIco(source: Buffer, sizes: readonly number[]): Promise<Buffer> {
  const { width } = await sharp(source).metadata();
  const bitmaps = await Promise.all(
    sizes.map((size) =>
      size === width
        ? source
        : sharp(source).resize(size, size, { kernel: sharp.kernel.lanczos3 }).png().toBuffer(),
    ),
  );
  return toIco(bitmaps);
}
