import * as fs from "fs/promises";
import path from "path";
import type { ZodError } from "zod";
import {
  iconProjectConfigSchema,
  type Converter,
  type IconProjectConfig,
  type IconProjectConfigInput,
  type ResolvedIconProject,
} from "../shared/schema";
import { normalizeHexColor } from "./lib/color";
import { IconGenerationError, isMissingFileError } from "./lib/errors";
import { isConverter } from "./lib/rasterizer";

export const CONFIG_FILE_NAME = "iconforge.config.json";

type Env = Record<string, string | undefined>;

interface LoadProjectOptions {
  projectRoot: string;
  configPath?: string;
  overrides?: IconProjectConfigInput;
  env?: Env;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function readConfigFile(filePath: string, required: boolean): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFileError(error)) {
      if (required) {
        throw new IconGenerationError("CONFIG_NOT_FOUND", `Config file not found: ${filePath}`, { path: filePath });
      }
      return {};
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new IconGenerationError(
      "INVALID_CONFIG",
      `Config file is not valid JSON: ${filePath} (${error instanceof Error ? error.message : String(error)})`,
      { path: filePath },
    );
  }

  if (!isPlainObject(parsed)) {
    throw new IconGenerationError("INVALID_CONFIG", `Config file must hold a JSON object: ${filePath}`, { path: filePath });
  }
  return parsed;
}

/** Overlays `override` on `base`; nested platform sections merge key by key. */
export function mergeConfigInput(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? { ...current, ...value } : value;
  }
  return merged;
}

export function getConverterFromEnv(env: Env = process.env): Converter | undefined {
  const raw = env.ICONFORGE_CONVERTER?.trim();
  if (!raw) {
    return undefined;
  }
  if (!isConverter(raw)) {
    throw new IconGenerationError("INVALID_CONFIG", `Unknown converter in ICONFORGE_CONVERTER: ${raw}`, {
      converter: raw,
    });
  }
  return raw;
}

export function parseProjectConfig(input: unknown): IconProjectConfig {
  const result = iconProjectConfigSchema.safeParse(input);
  if (!result.success) {
    throw new IconGenerationError("INVALID_CONFIG", `Invalid icon configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function resolveProject(config: IconProjectConfig, cwd: string): ResolvedIconProject {
  const projectRoot = path.resolve(cwd, config.projectRoot ?? ".");
  const at = (relative: string) => path.resolve(projectRoot, relative);
  const foreground = at(config.foreground);

  return {
    projectRoot,
    source: at(config.source),
    foreground,
    monochrome: config.monochrome ? at(config.monochrome) : foreground,
    appName: config.appName,
    appId: config.appId,
    iconName: config.iconName,
    backgroundColor: normalizeHexColor(config.backgroundColor),
    platforms: Array.from(new Set(config.platforms)),
    converter: config.converter,
    tempDir: at(config.tempDir),
    android: { ...config.android, resDir: at(config.android.resDir) },
    linux: {
      ...config.linux,
      iconsDir: at(config.linux.iconsDir),
      desktopFile: at(config.linux.desktopFile ?? path.join("linux", `${config.iconName}.desktop`)),
    },
    macos: {
      ...config.macos,
      iconsetDir: at(config.macos.iconsetDir),
      icnsDir: at(config.macos.icnsDir),
    },
  };
}

/**
 * Defaults < config file < environment < explicit overrides.
 * The config file is optional unless named explicitly.
 */
export async function loadProject(options: LoadProjectOptions): Promise<ResolvedIconProject> {
  const configPath = options.configPath
    ? path.resolve(options.projectRoot, options.configPath)
    : path.join(options.projectRoot, CONFIG_FILE_NAME);
  const fromFile = await readConfigFile(configPath, Boolean(options.configPath));

  let input = mergeConfigInput({ projectRoot: options.projectRoot }, fromFile);
  const envConverter = getConverterFromEnv(options.env);
  if (envConverter) {
    input = mergeConfigInput(input, { converter: envConverter });
  }
  if (options.overrides) {
    input = mergeConfigInput(input, options.overrides);
  }

  return resolveProject(parseProjectConfig(input), options.projectRoot);
}
