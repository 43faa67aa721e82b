import * as fs from "fs/promises";
import path from "path";
import {
  ANDROID_ADAPTIVE_DIR,
  ANDROID_ADAPTIVE_FILES,
  ANDROID_ADAPTIVE_LAYER_DP,
  ANDROID_DENSITIES,
  ANDROID_FOREGROUND_FILE,
  ANDROID_LAUNCHER_DP,
  ANDROID_LAUNCHER_FILE,
  ANDROID_MONOCHROME_FILE,
  ANDROID_NOTIFICATION_DP,
  ANDROID_NOTIFICATION_FILE,
  androidPixels,
} from "../../shared/icon-sets";
import { parseHexColor } from "./color";
import type { PlatformContext } from "./context";
import {
  compositeOver,
  cropToContent,
  fitCentered,
  solidSquare,
  whiteOut,
  writePng,
  type RgbaImage,
} from "./raster";
import { readSvgSource } from "./rasterizer";
import { buildAdaptiveIconXml, buildLauncherColorsXml } from "./resources";
import { ensureDir, readTextIfExists } from "./workspace";

// Layers are cut from one large render so every density scales down
const WORKING_SIZE = 1024;

async function renderTrimmed(ctx: PlatformContext, svgPath: string): Promise<RgbaImage> {
  const image = await ctx.workspace.renderSquare(ctx.rasterizer, svgPath, WORKING_SIZE);
  return cropToContent(image);
}

function contentSize(canvas: number, scale: number): number {
  return Math.max(1, Math.round(canvas * scale));
}

export async function generateAndroidIcons(ctx: PlatformContext): Promise<string[]> {
  const { project, logger } = ctx;
  const { android } = project;
  const written: string[] = [];

  // Fail before any output when a layer source is unusable
  await readSvgSource(project.foreground);
  if (project.monochrome !== project.foreground) {
    await readSvgSource(project.monochrome);
  }

  logger.info("Generating Android adaptive icon layers", { resDir: android.resDir });

  const foreground = await renderTrimmed(ctx, project.foreground);
  const monochromeSource =
    project.monochrome === project.foreground ? foreground : await renderTrimmed(ctx, project.monochrome);
  const monochrome = whiteOut(monochromeSource);
  const background = parseHexColor(project.backgroundColor);

  for (const density of ANDROID_DENSITIES) {
    const dir = await ensureDir(path.join(android.resDir, `mipmap-${density.name}`));
    const canvas = androidPixels(ANDROID_ADAPTIVE_LAYER_DP, density.name);
    const inner = contentSize(canvas, android.foregroundScale);

    const foregroundPath = path.join(dir, ANDROID_FOREGROUND_FILE);
    await writePng(await fitCentered(foreground, canvas, inner), foregroundPath);
    written.push(foregroundPath);

    const monochromePath = path.join(dir, ANDROID_MONOCHROME_FILE);
    await writePng(await fitCentered(monochrome, canvas, inner), monochromePath);
    written.push(monochromePath);

    if (android.legacyLauncher) {
      const size = androidPixels(ANDROID_LAUNCHER_DP, density.name);
      const layer = await fitCentered(foreground, size, contentSize(size, android.foregroundScale));
      const launcherPath = path.join(dir, ANDROID_LAUNCHER_FILE);
      await writePng(await compositeOver(solidSquare(size, background), layer), launcherPath);
      written.push(launcherPath);
    }

    logger.debug("Wrote adaptive layers", { density: density.name, canvas, inner });
  }

  const adaptiveDir = await ensureDir(path.join(android.resDir, ANDROID_ADAPTIVE_DIR));
  const adaptiveXml = buildAdaptiveIconXml();
  for (const file of ANDROID_ADAPTIVE_FILES) {
    const xmlPath = path.join(adaptiveDir, file);
    await fs.writeFile(xmlPath, adaptiveXml, "utf-8");
    written.push(xmlPath);
  }

  const valuesDir = await ensureDir(path.join(android.resDir, "values"));
  const colorsPath = path.join(valuesDir, "colors.xml");
  const colorsXml = buildLauncherColorsXml(await readTextIfExists(colorsPath), project.backgroundColor);
  await fs.writeFile(colorsPath, colorsXml, "utf-8");
  written.push(colorsPath);

  if (android.notification) {
    written.push(...(await generateNotificationIcons(ctx)));
  }

  logger.info("Android icons complete", { files: written.length });
  return written;
}

async function generateNotificationIcons(ctx: PlatformContext): Promise<string[]> {
  const { project, logger } = ctx;
  const written: string[] = [];

  logger.info("Creating notification icons");

  for (const density of ANDROID_DENSITIES) {
    const dir = await ensureDir(path.join(project.android.resDir, `drawable-${density.name}`));
    const size = androidPixels(ANDROID_NOTIFICATION_DP, density.name);
    const image = await ctx.workspace.renderSquare(ctx.rasterizer, project.foreground, size);
    const outputPath = path.join(dir, ANDROID_NOTIFICATION_FILE);
    await writePng(whiteOut(image), outputPath);
    written.push(outputPath);
  }

  return written;
}
