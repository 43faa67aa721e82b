import * as fs from "fs/promises";
import path from "path";
import icongen from "icon-gen";
import {
  MACOS_MASTER_SIZE,
  macosIconFilename,
  macosPixelSizes,
} from "../../shared/icon-sets";
import type { PlatformContext } from "./context";
import { IconGenerationError, describeError } from "./errors";
import { cropToContent, fitCentered, resizeSquare, writePng, type RgbaImage } from "./raster";
import { buildAppIconContentsJson } from "./resources";
import { ensureDir } from "./workspace";

export const ICNS_NAME = "AppIcon";

/** Builds an .icns from a directory of `<size>.png` files. */
export type IcnsWriter = (pngDir: string, outputDir: string, name: string, sizes: number[]) => Promise<string[]>;

export const iconGenIcnsWriter: IcnsWriter = (pngDir, outputDir, name, sizes) =>
  icongen(pngDir, outputDir, { report: false, icns: { name, sizes } });

async function renderMacosMaster(ctx: PlatformContext): Promise<RgbaImage> {
  const image = await ctx.workspace.renderSquare(ctx.rasterizer, ctx.project.source, MACOS_MASTER_SIZE);
  const inner = Math.max(1, Math.round(MACOS_MASTER_SIZE * ctx.project.macos.contentScale));
  return fitCentered(cropToContent(image), MACOS_MASTER_SIZE, inner);
}

export async function generateMacosIcons(
  ctx: PlatformContext,
  writeIcns: IcnsWriter = iconGenIcnsWriter,
): Promise<string[]> {
  const { project, logger } = ctx;
  const { macos } = project;
  const written: string[] = [];

  logger.info("Generating macOS app icon set", { iconsetDir: macos.iconsetDir });
  await ensureDir(macos.iconsetDir);

  const master = await renderMacosMaster(ctx);
  const sizes = macosPixelSizes();
  const rendered = new Map<number, RgbaImage>();

  for (const size of sizes) {
    const image = await resizeSquare(master, size);
    rendered.set(size, image);
    const outputPath = path.join(macos.iconsetDir, macosIconFilename(size));
    await writePng(image, outputPath);
    written.push(outputPath);
  }

  const contentsPath = path.join(macos.iconsetDir, "Contents.json");
  await fs.writeFile(contentsPath, buildAppIconContentsJson(), "utf-8");
  written.push(contentsPath);

  if (macos.icns) {
    const pngDir = await ensureDir(ctx.workspace.tempPath("icns"));
    for (const [size, image] of rendered) {
      await writePng(image, path.join(pngDir, `${size}.png`));
    }

    await ensureDir(macos.icnsDir);
    try {
      const outputs = await writeIcns(pngDir, macos.icnsDir, ICNS_NAME, sizes);
      written.push(...outputs);
    } catch (error) {
      throw new IconGenerationError("ICNS_GENERATE_FAILED", `Failed to build ${ICNS_NAME}.icns: ${describeError(error)}`, {
        outputDir: macos.icnsDir,
      });
    }
  }

  logger.info("macOS icons complete", { files: written.length });
  return written;
}
