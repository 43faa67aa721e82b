import * as fs from "fs/promises";
import path from "path";
import type { PlatformContext } from "./context";
import { writePng } from "./raster";
import { buildDesktopEntry } from "./resources";
import { ensureDir } from "./workspace";

export async function generateLinuxIcons(ctx: PlatformContext): Promise<string[]> {
  const { project, logger } = ctx;
  const { linux, iconName, appId } = project;
  const written: string[] = [];

  logger.info("Generating Linux icons", { iconsDir: linux.iconsDir });
  await ensureDir(linux.iconsDir);

  for (const size of linux.sizes) {
    const outputPath = path.join(linux.iconsDir, `${iconName}-${size}.png`);
    const image = await ctx.workspace.renderSquare(ctx.rasterizer, project.source, size);
    await writePng(image, outputPath);
    written.push(outputPath);

    // Flatpak looks icons up by application id
    const appIdPath = path.join(linux.iconsDir, `${appId}-${size}.png`);
    await fs.copyFile(outputPath, appIdPath);
    written.push(appIdPath);
    logger.debug("Created Linux icon", { size, outputPath, appIdPath });
  }

  const defaultIcon = path.join(linux.iconsDir, `${iconName}-${linux.defaultSize}.png`);
  for (const name of [iconName, appId]) {
    const target = path.join(linux.iconsDir, `${name}.png`);
    await fs.copyFile(defaultIcon, target);
    written.push(target);
  }

  for (const name of [iconName, appId]) {
    const target = path.join(linux.iconsDir, `${name}.svg`);
    await fs.copyFile(project.source, target);
    written.push(target);
  }

  await ensureDir(path.dirname(linux.desktopFile));
  const desktopEntry = buildDesktopEntry({
    appName: project.appName,
    comment: linux.comment,
    exec: iconName,
    icon: appId,
    terminal: linux.terminal,
    categories: linux.categories,
  });
  await fs.writeFile(linux.desktopFile, desktopEntry, "utf-8");
  written.push(linux.desktopFile);

  logger.info("Linux icons complete", { files: written.length });
  return written;
}
