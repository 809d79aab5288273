#!/usr/bin/env -S npx tsx

import { resolve } from "node:path";
import { parseArgs } from "node:util";
import { buildSiteFromRoot, DEFAULT_PORT, serveSite } from "./api";
import type { ProgressEvent } from "./build/progress";

const HELP = `
pressmark - Build a static blog from Markdown and TOML front matter

USAGE:
  pressmark build [root] [options]
  pressmark serve [root] [options]

ARGUMENTS:
  [root]                Site root containing site.toml (default: .)

BUILD OPTIONS:
  -o, --output <dir>    Output directory (overrides paths.output_dir)
      --drafts          Include draft posts

SERVE OPTIONS:
  -o, --output <dir>    Output directory to build into and serve
  -p, --port <port>     Port to listen on (default: ${DEFAULT_PORT})
      --no-build        Serve the existing output without building

  -h, --help            Show this help message

EXAMPLES:
  pressmark build                 # Build the site in the current directory
  pressmark build ./blog --drafts # Include drafts
  pressmark serve ./blog -p 8080  # Build, then preview on port 8080
`;

function printProgress(event: ProgressEvent): void {
  console.log(`[${event.stage}] ${event.current}/${event.total} ${event.message}`.trimEnd());
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined) {
    return DEFAULT_PORT;
  }
  const port = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
  if (isNaN(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port: ${raw}`);
  }
  return port;
}

async function main(argv: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      output: { type: "string", short: "o" },
      port: { type: "string", short: "p" },
      drafts: { type: "boolean", default: false },
      "no-build": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  const [command, root = "."] = positionals;

  if (values.help || !command) {
    console.log(HELP);
    return;
  }

  const siteRoot = resolve(root);

  switch (command) {
    case "build": {
      console.log(`Building site at: ${siteRoot}`);
      const result = await buildSiteFromRoot(siteRoot, {
        outputDir: values.output,
        includeDrafts: values.drafts,
        onProgress: printProgress,
      });
      console.log(
        `Built ${result.posts} posts, ${result.pages} pages and ${result.tags} tags (${result.renderedFiles} files)`,
      );
      return;
    }

    case "serve": {
      const port = parsePort(values.port);
      const site = await serveSite(siteRoot, {
        outputDir: values.output,
        port,
        build: !values["no-build"],
        logRequests: true,
        onProgress: printProgress,
      });

      console.log(`Serving ${site.outputDir}`);
      console.log(`  URL: ${site.url}`);
      console.log("\nPress Ctrl+C to stop\n");

      const shutdown = () => {
        console.log("\nShutting down...");
        site.close().then(
          () => process.exit(0),
          (err: unknown) => {
            console.error("Error:", err instanceof Error ? err.message : err);
            process.exit(1);
          },
        );
      };
      process.on("SIGINT", shutdown);
      process.on("SIGTERM", shutdown);
      return;
    }

    default:
      throw new Error(`Unknown command: ${command}`);
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
