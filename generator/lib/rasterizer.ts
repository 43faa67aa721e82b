import * as fs from "fs/promises";
import sharp from "sharp";
import type { Converter } from "../../shared/schema";
import { CONVERTERS } from "../../shared/schema";
import type { CommandRunner } from "./command-runner";
import { IconGenerationError, describeError, isMissingFileError } from "./errors";
import type { Logger } from "./logger";

type ExternalConverter = Exclude<Converter, "sharp">;

interface ConverterCommand {
  command: string;
  args: string[];
}

const VERSION_PROBES: Record<ExternalConverter, ConverterCommand> = {
  "rsvg-convert": { command: "rsvg-convert", args: ["--version"] },
  inkscape: { command: "inkscape", args: ["--version"] },
  magick: { command: "magick", args: ["-version"] },
};

const SVG_DENSITY_BASE = 72;
const MIN_SVG_DENSITY = 1;
const MAX_SVG_DENSITY = 100000;
const TRANSPARENT = { r: 0, g: 0, b: 0, alpha: 0 };

export function isConverter(value: string): value is Converter {
  return (CONVERTERS as readonly string[]).includes(value);
}

export async function isConverterAvailable(converter: ExternalConverter, runner: CommandRunner): Promise<boolean> {
  const probe = VERSION_PROBES[converter];
  try {
    await runner.run(probe.command, probe.args);
    return true;
  } catch {
    return false;
  }
}

/** First external converter that answers its version probe, else sharp. */
export async function detectConverter(runner: CommandRunner, logger?: Logger): Promise<Converter> {
  for (const converter of CONVERTERS) {
    if (converter === "sharp") break;
    if (await isConverterAvailable(converter, runner)) {
      return converter;
    }
    logger?.debug("Converter not available", { converter });
  }
  return "sharp";
}

export async function resolveConverter(
  preferred: Converter | undefined,
  runner: CommandRunner,
  logger?: Logger,
): Promise<Converter> {
  if (preferred === "sharp") {
    return preferred;
  }
  if (preferred) {
    if (!(await isConverterAvailable(preferred, runner))) {
      throw new IconGenerationError("CONVERTER_UNAVAILABLE", `Requested converter is not installed: ${preferred}`, {
        converter: preferred,
      });
    }
    return preferred;
  }
  return detectConverter(runner, logger);
}

export async function readSvgSource(svgPath: string): Promise<string> {
  let content: string;
  try {
    content = await fs.readFile(svgPath, "utf-8");
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new IconGenerationError("SOURCE_NOT_FOUND", `SVG file not found: ${svgPath}`, { path: svgPath });
    }
    throw error;
  }

  const head = content.trim();
  if (!head.startsWith("<?xml") && !head.startsWith("<svg")) {
    throw new IconGenerationError("INVALID_SVG", `Invalid SVG content in ${svgPath}`, { path: svgPath });
  }
  return content;
}

export function buildConverterCommand(
  converter: ExternalConverter,
  svgPath: string,
  size: number,
  outputPath: string,
): ConverterCommand {
  const px = String(size);

  if (converter === "rsvg-convert") {
    return {
      command: "rsvg-convert",
      args: ["-a", "-w", px, "-h", px, svgPath, "-o", outputPath],
    };
  }

  if (converter === "inkscape") {
    return {
      command: "inkscape",
      args: [
        svgPath,
        "--export-type=png",
        `--export-filename=${outputPath}`,
        `--export-width=${px}`,
        `--export-height=${px}`,
      ],
    };
  }

  return {
    command: "magick",
    args: ["-density", "300", "-background", "none", svgPath, "-resize", `${px}x${px}`, outputPath],
  };
}

async function rasterizeWithSharp(svg: string, size: number, outputPath: string): Promise<void> {
  const buffer = Buffer.from(svg);
  const metadata = await sharp(buffer).metadata();
  const intrinsic = Math.max(metadata.width ?? size, metadata.height ?? size);
  const density = Math.min(MAX_SVG_DENSITY, Math.max(MIN_SVG_DENSITY, (SVG_DENSITY_BASE * size) / intrinsic));

  await sharp(buffer, { density })
    .resize(size, size, { fit: "inside", background: TRANSPARENT })
    .png()
    .toFile(outputPath);
}

export class Rasterizer {
  constructor(
    readonly converter: Converter,
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
  ) {}

  async rasterize(svgPath: string, size: number, outputPath: string): Promise<string> {
    const svg = await readSvgSource(svgPath);

    if (this.converter === "sharp") {
      try {
        await rasterizeWithSharp(svg, size, outputPath);
      } catch (error) {
        throw new IconGenerationError("RASTERIZE_FAILED", `sharp failed to rasterize ${svgPath}: ${describeError(error)}`, {
          converter: this.converter,
          path: svgPath,
          size,
        });
      }
      return outputPath;
    }

    const { command, args } = buildConverterCommand(this.converter, svgPath, size, outputPath);
    this.logger.debug("Running converter", { command, args });

    try {
      const result = await this.runner.run(command, args);
      if (result.stderr.trim()) {
        this.logger.warn("Converter reported warnings", { converter: this.converter, stderr: result.stderr.trim() });
      }
    } catch (error) {
      throw new IconGenerationError(
        "RASTERIZE_FAILED",
        `${this.converter} failed to rasterize ${svgPath}: ${describeError(error)}`,
        { converter: this.converter, path: svgPath, size },
      );
    }

    return outputPath;
  }
}
