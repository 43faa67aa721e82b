#!/usr/bin/env node
import { parseArgs } from "node:util";
import path from "path";
import { z } from "zod";
import { converterSchema, platformSchema, type IconProjectConfigInput } from "../shared/schema";
import { loadProject } from "../generator/app-config";
import { IconGenerator, type IconGeneratorDeps } from "../generator";
import { IconGenerationError, describeError } from "../generator/lib/errors";
import { createLogger } from "../generator/lib/logger";

export const USAGE = `Usage: iconforge [path/to/icon.svg] [options]

Options:
  -c, --config <file>        config file (default: iconforge.config.json)
  -p, --platform <name>      android, linux or macos; repeatable
      --converter <name>     rsvg-convert, inkscape, magick or sharp
      --background <color>   adaptive icon background, #RRGGBB
      --foreground <file>    white foreground-only SVG
      --project-root <dir>   base directory for relative paths
  -h, --help                 show this message`;

const CliOptionsSchema = z.object({
  source: z.string().trim().min(1).optional(),
  config: z.string().trim().min(1).optional(),
  platform: z.array(platformSchema).min(1).optional(),
  converter: converterSchema.optional(),
  background: z.string().trim().min(1).optional(),
  foreground: z.string().trim().min(1).optional(),
  projectRoot: z.string().trim().min(1).optional(),
  help: z.boolean().default(false),
});

export interface CliCommand {
  help: boolean;
  projectRoot: string;
  configPath?: string;
  overrides: IconProjectConfigInput;
}

export function parseCliArgs(argv: string[], cwd: string = process.cwd()): CliCommand {
  let parsed: ReturnType<typeof parseRaw>;
  try {
    parsed = parseRaw(argv);
  } catch (error) {
    throw new IconGenerationError("INVALID_CONFIG", describeError(error));
  }

  const result = CliOptionsSchema.safeParse({
    source: parsed.positionals[0],
    config: parsed.values.config,
    platform: parsed.values.platform,
    converter: parsed.values.converter,
    background: parsed.values.background,
    foreground: parsed.values.foreground,
    projectRoot: parsed.values["project-root"],
    help: parsed.values.help,
  });
  if (!result.success) {
    const message = result.error.issues.map((issue) => `--${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new IconGenerationError("INVALID_CONFIG", message);
  }

  const options = result.data;
  // Paths typed on the command line are relative to the caller, not the project
  const overrides: IconProjectConfigInput = {
    source: options.source ? path.resolve(cwd, options.source) : undefined,
    foreground: options.foreground ? path.resolve(cwd, options.foreground) : undefined,
    platforms: options.platform,
    converter: options.converter,
    backgroundColor: options.background,
  };

  return {
    help: options.help,
    projectRoot: path.resolve(cwd, options.projectRoot ?? "."),
    configPath: options.config,
    overrides,
  };
}

function parseRaw(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      config: { type: "string", short: "c" },
      platform: { type: "string", short: "p", multiple: true },
      converter: { type: "string" },
      background: { type: "string" },
      foreground: { type: "string" },
      "project-root": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
}

interface RunCliOptions extends IconGeneratorDeps {
  cwd?: string;
  env?: Record<string, string | undefined>;
  print?: (line: string) => void;
}

export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const print = options.print ?? ((line: string) => console.log(line));
  const logger = options.logger ?? createLogger("iconforge");

  try {
    const command = parseCliArgs(argv, options.cwd);
    if (command.help) {
      print(USAGE);
      return 0;
    }

    const project = await loadProject({
      projectRoot: command.projectRoot,
      configPath: command.configPath,
      overrides: command.overrides,
      env: options.env,
    });

    const generator = new IconGenerator(project, {
      runner: options.runner,
      logger,
      writeIcns: options.writeIcns,
    });
    const report = await generator.run();

    const problems = report.verification.filter((check) => check.status !== "ok").length;
    print(`Generated ${report.files.length} files with ${report.converter}`);
    if (problems > 0) {
      print(`Verification reported ${problems} problem(s)`);
    }
    return 0;
  } catch (error) {
    print(`Error: ${describeError(error)}`);
    if (error instanceof IconGenerationError && (error.code === "SOURCE_NOT_FOUND" || error.code === "INVALID_CONFIG")) {
      print("");
      print(USAGE);
    } else {
      logger.error("Icon generation failed", {
        error: error instanceof Error ? error.stack || error.message : String(error),
      });
    }
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    },
  );
}
