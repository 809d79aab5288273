import { mkdir, readFile, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { parse as parseToml } from "smol-toml";
import {
  ConfigFileNotFoundError,
  ConfigParseError,
  ConfigValidationError,
  MissingDirectoryError,
  SiteRootNotFoundError,
} from "../errors";
import { CONFIG_FILENAME, defaultConfig } from "./defaults";
import { isTable, mergeTables } from "./merge";
import { configSchema, type Config, type SitePaths } from "./types";

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Load site.toml from the site root, merge it over the defaults and
 * resolve every path against the root
 */
export async function loadConfig(siteRoot: string): Promise<Config> {
  const root = resolve(siteRoot);
  if (!(await isDirectory(root))) {
    throw new SiteRootNotFoundError(root);
  }

  const configPath = join(root, CONFIG_FILENAME);
  if (!(await isFile(configPath))) {
    throw new ConfigFileNotFoundError(configPath);
  }

  const raw = await readFile(configPath, "utf-8");

  let userTable: unknown;
  try {
    userTable = parseToml(raw);
  } catch (e) {
    throw new ConfigParseError(configPath, { cause: e });
  }
  if (!isTable(userTable)) {
    throw new ConfigValidationError(configPath, "top level must be a table");
  }

  const result = configSchema.safeParse(mergeTables(defaultConfig(), userTable));
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigValidationError(configPath, detail);
  }
  const { site, paths, build, author, search, sitemap, feeds } = result.data;

  const sitePaths: SitePaths = {
    siteRoot: root,
    contentDir: resolve(root, paths.content_dir),
    postsDir: resolve(root, paths.posts_dir),
    pagesDir: resolve(root, paths.pages_dir),
    templatesDir: resolve(root, paths.templates_dir),
    staticDir: resolve(root, paths.static_dir),
    outputDir: resolve(root, paths.output_dir),
  };

  for (const required of [
    sitePaths.contentDir,
    sitePaths.postsDir,
    sitePaths.pagesDir,
    sitePaths.templatesDir,
  ]) {
    if (!(await isDirectory(required))) {
      throw new MissingDirectoryError(required);
    }
  }

  await mkdir(sitePaths.staticDir, { recursive: true });
  await mkdir(sitePaths.outputDir, { recursive: true });

  return { site, build, author, paths: sitePaths, search, sitemap, feeds };
}
