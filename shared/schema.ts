import { z } from "zod";
import {
  ANDROID_ADAPTIVE_LAYER_DP,
  ANDROID_SAFE_ZONE_DP,
  DEFAULT_LINUX_DEFAULT_SIZE,
  DEFAULT_LINUX_SIZES,
  MACOS_DEFAULT_CONTENT_SCALE,
} from "./icon-sets";
import type { VerificationStatus } from "./error-codes";

export const PLATFORMS = ["android", "linux", "macos"] as const;
export type Platform = (typeof PLATFORMS)[number];
export const platformSchema = z.enum(PLATFORMS);

// Order matters: detection tries the external tools first, sharp last
export const CONVERTERS = ["rsvg-convert", "inkscape", "magick", "sharp"] as const;
export type Converter = (typeof CONVERTERS)[number];
export const converterSchema = z.enum(CONVERTERS);

const HEX_COLOR_PATTERN = /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/;

export const hexColorSchema = z
  .string()
  .trim()
  .regex(HEX_COLOR_PATTERN, "color must be #RGB or #RRGGBB");

// Desktop entries are line based, so values must stay on one line
const singleLineSchema = z
  .string()
  .refine((value) => !/[\r\n]/.test(value), "value must not contain line breaks");

const scaleSchema = z.number().gt(0).lte(1);

export const androidOptionsSchema = z.object({
  resDir: z.string().trim().min(1).default("android/app/src/main/res"),
  foregroundScale: scaleSchema.default(ANDROID_SAFE_ZONE_DP / ANDROID_ADAPTIVE_LAYER_DP),
  legacyLauncher: z.boolean().default(true),
  notification: z.boolean().default(true),
});

export const linuxOptionsSchema = z
  .object({
    iconsDir: z.string().trim().min(1).default("linux/icons"),
    desktopFile: z.string().trim().min(1).optional(),
    sizes: z.array(z.number().int().positive()).min(1).default(DEFAULT_LINUX_SIZES),
    defaultSize: z.number().int().positive().default(DEFAULT_LINUX_DEFAULT_SIZE),
    comment: singleLineSchema.default(""),
    categories: z.array(singleLineSchema.pipe(z.string().min(1))).default(["Utility"]),
    terminal: z.boolean().default(false),
  })
  .superRefine((data, ctx) => {
    if (!data.sizes.includes(data.defaultSize)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["defaultSize"],
        message: `defaultSize ${data.defaultSize} must be one of sizes [${data.sizes.join(", ")}]`,
      });
    }
  });

export const macosOptionsSchema = z.object({
  iconsetDir: z.string().trim().min(1).default("macos/Runner/Assets.xcassets/AppIcon.appiconset"),
  contentScale: scaleSchema.default(MACOS_DEFAULT_CONTENT_SCALE),
  icns: z.boolean().default(false),
  icnsDir: z.string().trim().min(1).default("macos/Runner"),
});

export const iconProjectConfigSchema = z.object({
  projectRoot: z.string().trim().min(1).optional(),
  source: z.string().trim().min(1).default("assets/icons/app.svg"),
  foreground: z.string().trim().min(1).default("assets/icons/foreground.svg"),
  monochrome: z.string().trim().min(1).optional(),
  appName: singleLineSchema.pipe(z.string().trim().min(1)).default("App"),
  appId: z
    .string()
    .trim()
    .regex(/^[A-Za-z][\w-]*(\.[A-Za-z][\w-]*)+$/, "appId must be a reverse-DNS identifier")
    .default("com.example.app"),
  iconName: z
    .string()
    .trim()
    .regex(/^[\w.-]+$/, "iconName must be a plain file name")
    .default("app"),
  backgroundColor: hexColorSchema.default("#FFFFFF"),
  platforms: z.array(platformSchema).min(1).default([...PLATFORMS]),
  converter: converterSchema.optional(),
  tempDir: z.string().trim().min(1).default("temp_icons"),
  android: androidOptionsSchema.default({}),
  linux: linuxOptionsSchema.default({}),
  macos: macosOptionsSchema.default({}),
});

export type IconProjectConfigInput = z.input<typeof iconProjectConfigSchema>;
export type IconProjectConfig = z.infer<typeof iconProjectConfigSchema>;
export type AndroidOptions = z.infer<typeof androidOptionsSchema>;
export type LinuxOptions = z.infer<typeof linuxOptionsSchema>;
export type MacosOptions = z.infer<typeof macosOptionsSchema>;

// Fully resolved config: absolute paths, derived defaults filled in
export interface ResolvedIconProject {
  projectRoot: string;
  source: string;
  foreground: string;
  monochrome: string;
  appName: string;
  appId: string;
  iconName: string;
  backgroundColor: string;
  platforms: Platform[];
  converter?: Converter;
  tempDir: string;
  android: AndroidOptions;
  linux: Omit<LinuxOptions, "desktopFile"> & { desktopFile: string };
  macos: MacosOptions;
}

export interface WrittenFile {
  platform: Platform;
  path: string;
}

export interface VerificationCheck {
  label: string;
  path: string;
  status: VerificationStatus;
  detail?: string;
}

export interface GenerationReport {
  converter: Converter;
  files: WrittenFile[];
  verification: VerificationCheck[];
}
