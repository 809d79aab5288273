import { readFile, stat } from "node:fs/promises";
import { createServer, type Server } from "node:http";
import { basename, join, resolve, sep } from "node:path";
import { getRequestListener } from "@hono/node-server";
import { Hono, type Context } from "hono";
import { logger } from "hono/logger";
import { getMimeType } from "hono/utils/mime";

const NOT_FOUND_PAGE = "404.html";

export interface PreviewServerOptions {
  outputDir: string;
  /** Log each request to the console */
  logRequests?: boolean;
}

export function contentTypeFor(filePath: string): string {
  return getMimeType(basename(filePath).toLowerCase()) ?? "application/octet-stream";
}

async function readIfFile(filePath: string): Promise<Uint8Array<ArrayBuffer> | null> {
  try {
    if (!(await stat(filePath)).isFile()) return null;
    return new Uint8Array(await readFile(filePath));
  } catch {
    return null;
  }
}

async function notFound(c: Context, root: string): Promise<Response> {
  const page = await readIfFile(join(root, NOT_FOUND_PAGE));
  if (page) {
    return c.body(page, 404, { "Content-Type": contentTypeFor(NOT_FOUND_PAGE) });
  }
  return c.text("Not Found", 404);
}

/**
 * Serves the built site: directories answer with their index.html and
 * nothing outside the output directory is reachable
 */
export function createPreviewServer(options: PreviewServerOptions): Hono {
  const root = resolve(options.outputDir);
  const app = new Hono();

  if (options.logRequests) {
    app.use("*", logger());
  }

  app.get("*", async (c) => {
    let path: string;
    try {
      path = decodeURIComponent(c.req.path);
    } catch {
      return c.text("Bad Request", 400);
    }

    const target = resolve(root, `.${path}`);
    if (target !== root && !target.startsWith(root + sep)) {
      return c.text("Forbidden", 403);
    }

    let filePath = target;
    const info = await stat(target).catch(() => null);
    if (info?.isDirectory()) {
      // Relative links in index.html need the trailing slash
      if (!c.req.path.endsWith("/")) {
        return c.redirect(`${c.req.path}/`, 301);
      }
      filePath = join(target, "index.html");
    }

    const body = await readIfFile(filePath);
    if (!body) {
      return notFound(c, root);
    }
    return c.body(body, 200, { "Content-Type": contentTypeFor(filePath) });
  });

  return app;
}

/**
 * Listen on `port`; resolves once the socket is bound
 */
export function startPreviewServer(options: PreviewServerOptions & { port: number }): Promise<Server> {
  const app = createPreviewServer(options);
  const server = createServer(getRequestListener(app.fetch));

  return new Promise((resolveServer, rejectServer) => {
    server.once("error", rejectServer);
    server.listen(options.port, () => {
      server.off("error", rejectServer);
      resolveServer(server);
    });
  });
}
