export {
  DEFAULT_PORT,
  buildSiteFromRoot,
  serveSite,
  type BuildSiteOptions,
  type RunningSite,
  type ServeSiteOptions,
} from "./api";
export { buildSite, type BuildOptions, type BuildResult } from "./build/build";
export { Stage, type ProgressCallback, type ProgressEvent } from "./build/progress";
export { loadConfig } from "./config/load";
export type { Config } from "./config/types";
export type { Page, Post } from "./content/types";
export * from "./errors";
