import type { GenerationReport, Platform, ResolvedIconProject, WrittenFile } from "../shared/schema";
import { generateAndroidIcons } from "./lib/android";
import { execFileRunner, type CommandRunner } from "./lib/command-runner";
import type { PlatformContext } from "./lib/context";
import { describeError } from "./lib/errors";
import { generateLinuxIcons } from "./lib/linux";
import { createLogger, type Logger } from "./lib/logger";
import { generateMacosIcons, iconGenIcnsWriter, type IcnsWriter } from "./lib/macos";
import { Rasterizer, resolveConverter } from "./lib/rasterizer";
import { verifyOutputs } from "./lib/verify";
import { Workspace } from "./lib/workspace";

export interface IconGeneratorDeps {
  runner?: CommandRunner;
  logger?: Logger;
  writeIcns?: IcnsWriter;
}

type PlatformGenerator = (ctx: PlatformContext) => Promise<string[]>;

const PLATFORM_ORDER: Platform[] = ["android", "linux", "macos"];

export class IconGenerator {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly generators: Record<Platform, PlatformGenerator>;

  constructor(
    private readonly project: ResolvedIconProject,
    deps: IconGeneratorDeps = {},
  ) {
    this.runner = deps.runner ?? execFileRunner;
    this.logger = deps.logger ?? createLogger("iconforge");
    const writeIcns = deps.writeIcns ?? iconGenIcnsWriter;
    this.generators = {
      android: generateAndroidIcons,
      linux: generateLinuxIcons,
      macos: (ctx) => generateMacosIcons(ctx, writeIcns),
    };
  }

  async run(): Promise<GenerationReport> {
    const workspace = new Workspace(this.project.tempDir);
    const files: WrittenFile[] = [];

    try {
      await workspace.setup();

      this.logger.info("Using SVG", { source: this.project.source, foreground: this.project.foreground });
      const converter = await resolveConverter(this.project.converter, this.runner, this.logger);
      this.logger.info("Using SVG converter", { converter });

      const ctx: PlatformContext = {
        project: this.project,
        rasterizer: new Rasterizer(converter, this.runner, this.logger),
        workspace,
        logger: this.logger,
      };

      for (const platform of PLATFORM_ORDER) {
        if (!this.project.platforms.includes(platform)) continue;
        const written = await this.generators[platform](ctx);
        files.push(...written.map((filePath) => ({ platform, path: filePath })));
      }

      const verification = await verifyOutputs(this.project, this.logger);
      this.logger.info("Icons generated", { converter, files: files.length });
      return { converter, files, verification };
    } finally {
      await workspace.cleanup().catch((error: unknown) => {
        this.logger.warn("Failed to remove temp directory", {
          tempDir: this.project.tempDir,
          error: describeError(error),
        });
      });
    }
  }
}
