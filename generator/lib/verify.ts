import * as fs from "fs/promises";
import path from "path";
import sharp from "sharp";
import {
  ANDROID_ADAPTIVE_DIR,
  ANDROID_ADAPTIVE_FILES,
  ANDROID_ADAPTIVE_LAYER_DP,
  ANDROID_FOREGROUND_FILE,
  ANDROID_MONOCHROME_FILE,
  ANDROID_NOTIFICATION_DP,
  ANDROID_NOTIFICATION_FILE,
  MACOS_MASTER_SIZE,
  androidPixels,
  macosIconFilename,
} from "../../shared/icon-sets";
import type { ResolvedIconProject, VerificationCheck } from "../../shared/schema";
import { normalizeHexColor } from "./color";
import { describeError, isMissingFileError } from "./errors";
import type { Logger } from "./logger";

type CheckResult = Omit<VerificationCheck, "label" | "path">;

async function guard(label: string, filePath: string, check: () => Promise<CheckResult>): Promise<VerificationCheck> {
  try {
    return { label, path: filePath, ...(await check()) };
  } catch (error) {
    if (isMissingFileError(error)) {
      return { label, path: filePath, status: "missing" };
    }
    return { label, path: filePath, status: "error", detail: describeError(error) };
  }
}

function checkExists(label: string, filePath: string): Promise<VerificationCheck> {
  return guard(label, filePath, async () => {
    await fs.access(filePath);
    return { status: "ok" };
  });
}

function checkImageSize(label: string, filePath: string, size: number): Promise<VerificationCheck> {
  return guard(label, filePath, async () => {
    await fs.access(filePath);
    const { width, height } = await sharp(filePath).metadata();
    if (width !== size || height !== size) {
      return { status: "mismatch", detail: `expected ${size}x${size}, got ${width}x${height}` };
    }
    return { status: "ok" };
  });
}

function checkBackgroundColor(filePath: string, color: string): Promise<VerificationCheck> {
  return guard("Background color", filePath, async () => {
    const content = await fs.readFile(filePath, "utf-8");
    const expected = normalizeHexColor(color);
    if (!content.toUpperCase().includes(expected)) {
      return { status: "mismatch", detail: `${expected} not set` };
    }
    return { status: "ok", detail: expected };
  });
}

function androidChecks(project: ResolvedIconProject): Promise<VerificationCheck>[] {
  const { resDir } = project.android;
  const layerSize = androidPixels(ANDROID_ADAPTIVE_LAYER_DP, "hdpi");
  const checks = [
    checkImageSize("Foreground", path.join(resDir, "mipmap-hdpi", ANDROID_FOREGROUND_FILE), layerSize),
    checkImageSize("Monochrome", path.join(resDir, "mipmap-hdpi", ANDROID_MONOCHROME_FILE), layerSize),
    checkExists("Adaptive icon", path.join(resDir, ANDROID_ADAPTIVE_DIR, ANDROID_ADAPTIVE_FILES[0])),
    checkBackgroundColor(path.join(resDir, "values", "colors.xml"), project.backgroundColor),
  ];
  if (project.android.notification) {
    checks.push(
      checkImageSize(
        "Notification",
        path.join(resDir, "drawable-hdpi", ANDROID_NOTIFICATION_FILE),
        androidPixels(ANDROID_NOTIFICATION_DP, "hdpi"),
      ),
    );
  }
  return checks;
}

function linuxChecks(project: ResolvedIconProject): Promise<VerificationCheck>[] {
  const { iconsDir, defaultSize, desktopFile } = project.linux;
  return [
    checkImageSize("Linux icon", path.join(iconsDir, `${project.iconName}.png`), defaultSize),
    checkImageSize("Linux app id icon", path.join(iconsDir, `${project.appId}.png`), defaultSize),
    checkExists("Desktop entry", desktopFile),
  ];
}

function macosChecks(project: ResolvedIconProject): Promise<VerificationCheck>[] {
  const { iconsetDir } = project.macos;
  return [
    checkImageSize("macOS icon", path.join(iconsetDir, macosIconFilename(MACOS_MASTER_SIZE)), MACOS_MASTER_SIZE),
    checkExists("Asset catalog", path.join(iconsetDir, "Contents.json")),
  ];
}

/** Reports on the generated tree. Never throws. */
export async function verifyOutputs(project: ResolvedIconProject, logger: Logger): Promise<VerificationCheck[]> {
  const pending: Promise<VerificationCheck>[] = [];
  if (project.platforms.includes("android")) pending.push(...androidChecks(project));
  if (project.platforms.includes("linux")) pending.push(...linuxChecks(project));
  if (project.platforms.includes("macos")) pending.push(...macosChecks(project));

  const results = await Promise.all(pending);

  for (const result of results) {
    const payload = { path: result.path, ...(result.detail ? { detail: result.detail } : {}) };
    if (result.status === "ok") {
      logger.info(`${result.label}: ok`, payload);
    } else {
      logger.warn(`${result.label}: ${result.status}`, payload);
    }
  }

  return results;
}
