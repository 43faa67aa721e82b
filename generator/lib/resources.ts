import {
  ANDROID_BACKGROUND_COLOR_NAME,
  MACOS_ICON_SLOTS,
  macosIconFilename,
} from "../../shared/icon-sets";

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';
const RESOURCES_CLOSE = "</resources>";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function colorLine(name: string, color: string): string {
  return `    <color name="${name}">${color}</color>`;
}

/**
 * Sets one `<color>` entry in an Android values file, keeping everything else.
 * A missing or unreadable file yields a fresh resources document.
 */
export function upsertColorResource(existing: string | null, name: string, color: string): string {
  const fresh = [XML_DECLARATION, "<resources>", colorLine(name, color), RESOURCES_CLOSE, ""].join("\n");
  if (existing == null) {
    return fresh;
  }

  // Other attributes (tools:ignore, translatable...) stay as they are
  const entryPattern = new RegExp(`(<color\\b[^>]*\\bname="${escapeRegExp(name)}"[^>]*>)[^<]*(</color>)`, "g");
  if (entryPattern.test(existing)) {
    return existing.replace(entryPattern, (_match, open: string, close: string) => `${open}${color}${close}`);
  }

  const closeIndex = existing.lastIndexOf(RESOURCES_CLOSE);
  if (closeIndex < 0) {
    return fresh;
  }

  const head = existing.slice(0, closeIndex);
  const separator = head.endsWith("\n") ? "" : "\n";
  return `${head}${separator}${colorLine(name, color)}\n${existing.slice(closeIndex)}`;
}

export function buildLauncherColorsXml(existing: string | null, backgroundColor: string): string {
  return upsertColorResource(existing, ANDROID_BACKGROUND_COLOR_NAME, backgroundColor);
}

export function buildAdaptiveIconXml(): string {
  return [
    XML_DECLARATION,
    '<adaptive-icon xmlns:android="http://schemas.android.com/apk/res/android">',
    `    <background android:drawable="@color/${ANDROID_BACKGROUND_COLOR_NAME}"/>`,
    '    <foreground android:drawable="@mipmap/ic_launcher_foreground"/>',
    '    <monochrome android:drawable="@mipmap/ic_launcher_monochrome"/>',
    "</adaptive-icon>",
    "",
  ].join("\n");
}

export interface DesktopEntryOptions {
  appName: string;
  comment: string;
  exec: string;
  icon: string;
  terminal: boolean;
  categories: string[];
}

export function buildDesktopEntry(options: DesktopEntryOptions): string {
  const categories = options.categories.map((category) => `${category};`).join("");
  return [
    "[Desktop Entry]",
    "Version=1.0",
    "Type=Application",
    `Name=${options.appName}`,
    `Comment=${options.comment}`,
    `Exec=${options.exec}`,
    `Icon=${options.icon}`,
    `Terminal=${options.terminal ? "true" : "false"}`,
    `Categories=${categories}`,
    `StartupWMClass=${options.appName}`,
    "",
  ].join("\n");
}

interface AssetCatalogImage {
  size: string;
  idiom: "mac";
  filename: string;
  scale: string;
}

export interface AssetCatalogContents {
  images: AssetCatalogImage[];
  info: { version: number; author: string };
}

export function buildAppIconContents(): AssetCatalogContents {
  return {
    images: MACOS_ICON_SLOTS.map((slot) => ({
      size: `${slot.points}x${slot.points}`,
      idiom: "mac" as const,
      filename: macosIconFilename(slot.points * slot.scale),
      scale: `${slot.scale}x`,
    })),
    info: { version: 1, author: "xcode" },
  };
}

export function buildAppIconContentsJson(): string {
  return `${JSON.stringify(buildAppIconContents(), null, 2)}\n`;
}
