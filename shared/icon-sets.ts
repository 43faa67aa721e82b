/**
 * Platform icon size tables
 */

// Android screen densities and their dp → px multipliers
export const ANDROID_DENSITIES = [
  { name: "mdpi", scale: 1 },
  { name: "hdpi", scale: 1.5 },
  { name: "xhdpi", scale: 2 },
  { name: "xxhdpi", scale: 3 },
  { name: "xxxhdpi", scale: 4 },
] as const;

export type AndroidDensity = (typeof ANDROID_DENSITIES)[number]["name"];

// Adaptive icon layers are drawn on a 108dp canvas
export const ANDROID_ADAPTIVE_LAYER_DP = 108;
// Of which the launcher mask guarantees a 66dp circle
export const ANDROID_SAFE_ZONE_DP = 66;
export const ANDROID_LAUNCHER_DP = 48;
export const ANDROID_NOTIFICATION_DP = 24;

export const ANDROID_FOREGROUND_FILE = "ic_launcher_foreground.png";
export const ANDROID_MONOCHROME_FILE = "ic_launcher_monochrome.png";
export const ANDROID_LAUNCHER_FILE = "ic_launcher.png";
export const ANDROID_NOTIFICATION_FILE = "ic_notification.png";
export const ANDROID_BACKGROUND_COLOR_NAME = "ic_launcher_background";
export const ANDROID_ADAPTIVE_DIR = "mipmap-anydpi-v26";
export const ANDROID_ADAPTIVE_FILES = ["ic_launcher.xml", "ic_launcher_round.xml"] as const;

export function androidPixels(dp: number, density: AndroidDensity): number {
  const entry = ANDROID_DENSITIES.find((item) => item.name === density);
  return Math.round(dp * (entry?.scale ?? 1));
}

export const DEFAULT_LINUX_SIZES = [64, 128, 256, 512];
export const DEFAULT_LINUX_DEFAULT_SIZE = 256;

// macOS asset catalog: point size × scale → pixel file
export const MACOS_ICON_SLOTS = [
  { points: 16, scale: 1 },
  { points: 16, scale: 2 },
  { points: 32, scale: 1 },
  { points: 32, scale: 2 },
  { points: 128, scale: 1 },
  { points: 128, scale: 2 },
  { points: 256, scale: 1 },
  { points: 256, scale: 2 },
  { points: 512, scale: 1 },
  { points: 512, scale: 2 },
] as const;

export const MACOS_MASTER_SIZE = 1024;
// Apple's icon grid leaves a transparent margin around an 824px body
export const MACOS_DEFAULT_CONTENT_SCALE = 824 / 1024;

export function macosPixelSizes(): number[] {
  const sizes = MACOS_ICON_SLOTS.map((slot) => slot.points * slot.scale);
  return Array.from(new Set(sizes)).sort((a, b) => a - b);
}

export function macosIconFilename(pixels: number): string {
  return `app_icon_${pixels}.png`;
}
