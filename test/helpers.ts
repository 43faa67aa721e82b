import * as fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { CommandResult, CommandRunner } from "../generator/lib/command-runner";
import { CommandFailedError } from "../generator/lib/command-runner";
import type { Logger } from "../generator/lib/logger";
import type { PlatformContext } from "../generator/lib/context";
import type { RgbaImage } from "../generator/lib/raster";
import { Rasterizer } from "../generator/lib/rasterizer";
import { Workspace } from "../generator/lib/workspace";
import { parseProjectConfig, resolveProject } from "../generator/app-config";
import type { IconProjectConfigInput } from "../shared/schema";

export const FIXTURES_DIR = path.join(__dirname, "fixtures");

export async function createTempProject(prefix = "iconforge-test-"): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  await fs.mkdir(path.join(root, "assets", "icons"), { recursive: true });
  await fs.copyFile(path.join(FIXTURES_DIR, "app.svg"), path.join(root, "assets", "icons", "app.svg"));
  await fs.copyFile(path.join(FIXTURES_DIR, "foreground.svg"), path.join(root, "assets", "icons", "foreground.svg"));
  return root;
}

export async function removeTempProject(root: string): Promise<void> {
  await fs.rm(root, { recursive: true, force: true });
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export interface CapturedLogger extends Logger {
  lines: Array<{ level: string; message: string; payload?: Record<string, unknown> }>;
}

export function createCapturingLogger(): CapturedLogger {
  const lines: CapturedLogger["lines"] = [];
  const record = (level: string) => (message: string, payload?: Record<string, unknown>) => {
    lines.push({ level, message, payload });
  };
  return {
    lines,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}

export interface RecordedCall {
  command: string;
  args: string[];
}

/** Runner whose commands succeed only when listed in `available`. */
export function createFakeRunner(
  available: string[],
  results: Record<string, CommandResult> = {},
): CommandRunner & { calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  return {
    calls,
    async run(command, args) {
      calls.push({ command, args });
      if (!available.includes(command)) {
        throw new CommandFailedError(command, `spawn ${command} ENOENT`, "");
      }
      return results[command] ?? { stdout: "", stderr: "" };
    },
  };
}

export async function createPlatformContext(
  root: string,
  input: IconProjectConfigInput = {},
): Promise<PlatformContext & { logger: CapturedLogger }> {
  const project = resolveProject(parseProjectConfig({ converter: "sharp", ...input }), root);
  const logger = createCapturingLogger();
  const workspace = new Workspace(project.tempDir);
  await workspace.setup();
  return {
    project,
    rasterizer: new Rasterizer("sharp", createFakeRunner([]), logger),
    workspace,
    logger,
  };
}

export function pixelAt(image: RgbaImage, x: number, y: number): [number, number, number, number] {
  const offset = (y * image.width + x) * 4;
  return [image.data[offset], image.data[offset + 1], image.data[offset + 2], image.data[offset + 3]];
}
