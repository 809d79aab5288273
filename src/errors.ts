/**
 * Base class for every error raised by the build pipeline
 */
export class PressmarkError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Problems with the site root, site.toml or the directories it names
 */
export class ConfigError extends PressmarkError {
  readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, options);
    this.path = path;
  }
}

export class SiteRootNotFoundError extends ConfigError {
  constructor(path: string) {
    super(`Site root does not exist or is not a directory: ${path}`, path);
  }
}

export class ConfigFileNotFoundError extends ConfigError {
  constructor(path: string) {
    super(`Config file not found: ${path}`, path);
  }
}

export class ConfigParseError extends ConfigError {
  constructor(path: string, options?: ErrorOptions) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Invalid TOML in ${path}${detail}`, path, options);
  }
}

export class ConfigValidationError extends ConfigError {
  constructor(path: string, detail: string) {
    super(`Invalid configuration in ${path}: ${detail}`, path);
  }
}

export class MissingDirectoryError extends ConfigError {
  constructor(path: string) {
    super(`Required directory does not exist: ${path}`, path);
  }
}

/**
 * A content file that cannot be turned into a post or page
 */
export class ContentError extends PressmarkError {
  readonly sourcePath: string;

  constructor(message: string, sourcePath: string, options?: ErrorOptions) {
    super(message, options);
    this.sourcePath = sourcePath;
  }
}

export class TemplateError extends PressmarkError {
  readonly template: string;

  constructor(template: string, options?: ErrorOptions) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Failed to render template ${template}${detail}`, options);
    this.template = template;
  }
}

export type Feature = "search" | "sitemap" | "feeds";

/**
 * Invalid settings for an opt-in feature, raised before the feature writes anything
 */
export class FeatureConfigError extends PressmarkError {
  readonly feature: Feature;

  constructor(feature: Feature, message: string, options?: ErrorOptions) {
    super(message, options);
    this.feature = feature;
  }
}

export class SearchConfigError extends FeatureConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super("search", message, options);
  }
}

export class SitemapConfigError extends FeatureConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super("sitemap", message, options);
  }
}

export class FeedConfigError extends FeatureConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super("feeds", message, options);
  }
}
