import * as fs from "fs/promises";
import path from "path";
import { isMissingFileError } from "./errors";
import type { Rasterizer } from "./rasterizer";
import { loadRgba, resizeSquare, type RgbaImage } from "./raster";

/** Scratch directory for converter output; removed after every run. */
export class Workspace {
  private counter = 0;

  constructor(readonly tempDir: string) {}

  async setup(): Promise<void> {
    await fs.mkdir(this.tempDir, { recursive: true });
  }

  async cleanup(): Promise<void> {
    await fs.rm(this.tempDir, { recursive: true, force: true });
  }

  tempPath(label: string): string {
    this.counter += 1;
    return path.join(this.tempDir, `${String(this.counter).padStart(3, "0")}-${label}`);
  }

  async render(rasterizer: Rasterizer, svgPath: string, size: number): Promise<RgbaImage> {
    const base = path.basename(svgPath, path.extname(svgPath));
    const outputPath = this.tempPath(`${base}-${size}.png`);
    await rasterizer.rasterize(svgPath, size, outputPath);
    return loadRgba(outputPath);
  }

  /** Like render, but always yields a `size` square (aspect kept, padded). */
  async renderSquare(rasterizer: Rasterizer, svgPath: string, size: number): Promise<RgbaImage> {
    return resizeSquare(await this.render(rasterizer, svgPath, size), size);
  }
}

export async function ensureDir(dir: string): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
}
