import type { ResolvedIconProject } from "../../shared/schema";
import type { Logger } from "./logger";
import type { Rasterizer } from "./rasterizer";
import type { Workspace } from "./workspace";

export interface PlatformContext {
  project: ResolvedIconProject;
  rasterizer: Rasterizer;
  workspace: Workspace;
  logger: Logger;
}
