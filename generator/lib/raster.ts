import sharp from "sharp";
import type { Rgb } from "./color";
import { WHITE } from "./color";

/** Raw, non-premultiplied RGBA pixels, row-major. */
export interface RgbaImage {
  width: number;
  height: number;
  data: Buffer;
}

export interface Bounds {
  left: number;
  top: number;
  width: number;
  height: number;
}

const CHANNELS = 4;
const TRANSPARENT = { r: 0, g: 0, b: 0, alpha: 0 };

export async function loadRgba(input: string | Buffer): Promise<RgbaImage> {
  const { data, info } = await sharp(input)
    .toColourspace("srgb")
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });
  return { width: info.width, height: info.height, data };
}

function toSharp(image: RgbaImage): sharp.Sharp {
  return sharp(image.data, { raw: { width: image.width, height: image.height, channels: CHANNELS } });
}

export function encodePng(image: RgbaImage): Promise<Buffer> {
  return toSharp(image).png().toBuffer();
}

export async function writePng(image: RgbaImage, outputPath: string): Promise<void> {
  await toSharp(image).png().toFile(outputPath);
}

/**
 * Tight box around pixels whose alpha exceeds `alphaThreshold`.
 * Returns null when nothing qualifies.
 */
export function findContentBounds(image: RgbaImage, alphaThreshold = 0): Bounds | null {
  let minX = image.width;
  let minY = image.height;
  let maxX = -1;
  let maxY = -1;

  for (let y = 0; y < image.height; y++) {
    const rowOffset = y * image.width * CHANNELS;
    for (let x = 0; x < image.width; x++) {
      const alpha = image.data[rowOffset + x * CHANNELS + 3];
      if (alpha <= alphaThreshold) continue;
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;
    }
  }

  if (maxX < 0) {
    return null;
  }

  return { left: minX, top: minY, width: maxX - minX + 1, height: maxY - minY + 1 };
}

export function crop(image: RgbaImage, bounds: Bounds): RgbaImage {
  const rowBytes = bounds.width * CHANNELS;
  const data = Buffer.alloc(rowBytes * bounds.height);

  for (let y = 0; y < bounds.height; y++) {
    const start = ((bounds.top + y) * image.width + bounds.left) * CHANNELS;
    image.data.copy(data, y * rowBytes, start, start + rowBytes);
  }

  return { width: bounds.width, height: bounds.height, data };
}

export function cropToContent(image: RgbaImage, alphaThreshold = 0): RgbaImage {
  const bounds = findContentBounds(image, alphaThreshold);
  if (!bounds) {
    return image;
  }
  return crop(image, bounds);
}

/**
 * Scales `image` so its longer side equals `contentSize` and pastes it in the
 * middle of a transparent `canvasSize` square.
 */
export async function fitCentered(image: RgbaImage, canvasSize: number, contentSize: number): Promise<RgbaImage> {
  const ratio = contentSize / Math.max(image.width, image.height);
  const width = Math.max(1, Math.round(image.width * ratio));
  const height = Math.max(1, Math.round(image.height * ratio));

  const resized = await toSharp(image)
    .resize(width, height, { fit: "fill" })
    .png()
    .toBuffer();

  const left = Math.floor((canvasSize - width) / 2);
  const top = Math.floor((canvasSize - height) / 2);

  const { data, info } = await sharp({
    create: { width: canvasSize, height: canvasSize, channels: CHANNELS, background: TRANSPARENT },
  })
    .composite([{ input: resized, left, top }])
    .raw()
    .toBuffer({ resolveWithObject: true });

  return { width: info.width, height: info.height, data };
}

export async function resizeSquare(image: RgbaImage, size: number): Promise<RgbaImage> {
  if (image.width === size && image.height === size) {
    return image;
  }
  const { data, info } = await toSharp(image)
    .resize(size, size, { fit: "contain", background: TRANSPARENT })
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });
  return { width: info.width, height: info.height, data };
}

export function recolorPreservingAlpha(image: RgbaImage, color: Rgb): RgbaImage {
  const data = Buffer.from(image.data);
  for (let offset = 0; offset < data.length; offset += CHANNELS) {
    data[offset] = color.r;
    data[offset + 1] = color.g;
    data[offset + 2] = color.b;
  }
  return { width: image.width, height: image.height, data };
}

export function whiteOut(image: RgbaImage): RgbaImage {
  return recolorPreservingAlpha(image, WHITE);
}

export function solidSquare(size: number, color: Rgb): RgbaImage {
  const data = Buffer.alloc(size * size * CHANNELS);
  for (let offset = 0; offset < data.length; offset += CHANNELS) {
    data[offset] = color.r;
    data[offset + 1] = color.g;
    data[offset + 2] = color.b;
    data[offset + 3] = 255;
  }
  return { width: size, height: size, data };
}

export async function compositeOver(base: RgbaImage, overlay: RgbaImage): Promise<RgbaImage> {
  const { data, info } = await toSharp(base)
    .composite([{ input: await encodePng(overlay), left: 0, top: 0 }])
    .raw()
    .toBuffer({ resolveWithObject: true });
  return { width: info.width, height: info.height, data };
}
