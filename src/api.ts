import { stat } from "node:fs/promises";
import type { Server } from "node:http";
import { resolve } from "node:path";
import { buildSite, type BuildResult } from "./build/build";
import { createProgressReporter, Stage, type ProgressCallback } from "./build/progress";
import { loadConfig } from "./config/load";
import type { Config } from "./config/types";
import { MissingDirectoryError } from "./errors";
import { startPreviewServer } from "./server";

export const DEFAULT_PORT = 8000;

export interface BuildSiteOptions {
  /** Replaces paths.output_dir; relative values resolve against the working directory */
  outputDir?: string;
  /** Forces drafts on when true */
  includeDrafts?: boolean;
  onProgress?: ProgressCallback;
}

export interface ServeSiteOptions {
  outputDir?: string;
  port?: number;
  /** Build before serving (default true) */
  build?: boolean;
  /** Log each request to the console */
  logRequests?: boolean;
  onProgress?: ProgressCallback;
}

export interface RunningSite {
  server: Server;
  url: string;
  outputDir: string;
  close(): Promise<void>;
}

async function loadWithOverrides(siteRoot: string, outputDir?: string): Promise<Config> {
  const config = await loadConfig(siteRoot);
  if (outputDir !== undefined) {
    config.paths = { ...config.paths, outputDir: resolve(outputDir) };
  }
  return config;
}

/**
 * Load site.toml from `siteRoot` and build the site
 */
export async function buildSiteFromRoot(
  siteRoot: string,
  options: BuildSiteOptions = {},
): Promise<BuildResult> {
  const report = createProgressReporter(options.onProgress);

  report(Stage.LOADING_CONFIG, 0, 1, "Loading configuration");
  const config = await loadWithOverrides(siteRoot, options.outputDir);
  if (options.includeDrafts) {
    config.build = { ...config.build, include_drafts: true };
  }
  report(Stage.LOADING_CONFIG, 1, 1, "Configuration loaded");

  return buildSite(config, { onProgress: options.onProgress });
}

/**
 * Optionally build, then serve the output directory over HTTP
 */
export async function serveSite(siteRoot: string, options: ServeSiteOptions = {}): Promise<RunningSite> {
  const config = await loadWithOverrides(siteRoot, options.outputDir);

  if (options.build ?? true) {
    await buildSite(config, { onProgress: options.onProgress });
  }

  const { outputDir } = config.paths;
  const exists = await stat(outputDir).then(
    (stats) => stats.isDirectory(),
    () => false,
  );
  if (!exists) {
    throw new MissingDirectoryError(outputDir);
  }

  const requestedPort = options.port ?? DEFAULT_PORT;
  const server = await startPreviewServer({
    outputDir,
    port: requestedPort,
    logRequests: options.logRequests,
  });
  // Port 0 picks a free port
  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : requestedPort;

  return {
    server,
    url: `http://localhost:${port}`,
    outputDir,
    close: () =>
      new Promise<void>((resolveClose, rejectClose) => {
        server.close((err) => (err ? rejectClose(err) : resolveClose()));
      }),
  };
}
