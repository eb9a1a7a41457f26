/**
 * Stampboard — src/web/server.ts
 * WHAT: node:http front for the router: reads the body, binds a trace id, writes the response.
 * USAGE: startWebServer(app, port) from index.ts
 * DOCS:
 *  - node:http: https://nodejs.org/api/http.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import http from "node:http";
import type { Readable } from "node:stream";
import { logger } from "../lib/logger.js";
import { newTraceId, runWithCtx } from "../lib/reqctx.js";
import { route, type AppContext, type WebResponse } from "./router.js";

// Forms and the config JSON are tiny; anything bigger is not ours
export const MAX_BODY_BYTES = 64 * 1024;

export class BodyTooLargeError extends Error {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = "BodyTooLargeError";
  }
}

/**
 * Collects the body as UTF-8. Past the limit it rejects and keeps draining
 * the stream without buffering, so the socket stays open for the 413.
 */
export function readBody(req: Readable, limit = MAX_BODY_BYTES): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;
    req.on("data", (chunk: Buffer) => {
      if (tooLarge) return;
      size += chunk.length;
      if (size > limit) {
        tooLarge = true;
        chunks.length = 0;
        reject(new BodyTooLargeError(limit));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (!tooLarge) resolve(Buffer.concat(chunks).toString("utf8"));
    });
    req.on("error", reject);
  });
}

function send(res: http.ServerResponse, response: WebResponse): void {
  res.writeHead(response.status, {
    "Cache-Control": "no-store",
    ...response.headers,
  });
  res.end(response.body);
}

async function handleRequest(app: AppContext, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
  const method = req.method ?? "GET";
  const rawUrl = req.url ?? "/";
  const pathname = rawUrl.split("?")[0] ?? "/";
  const started = Date.now();

  await runWithCtx({ traceId: newTraceId(), method, route: pathname }, async () => {
    let response: WebResponse;
    try {
      const body = method === "POST" || method === "PUT" ? await readBody(req) : undefined;
      response = await route(app, { method, url: rawUrl, body });
    } catch (err) {
      if (err instanceof BodyTooLargeError) {
        response = {
          status: 413,
          headers: { "Content-Type": "text/plain; charset=utf-8", Connection: "close" },
          body: err.message,
        };
        // Drop the rest of the upload once the 413 is on the wire
        res.once("finish", () => req.destroy());
      } else {
        logger.error({ err, method, pathname }, "[web] unhandled request error");
        response = { status: 500, headers: { "Content-Type": "text/plain; charset=utf-8" }, body: "Internal error" };
      }
    }

    if (!res.headersSent && !res.destroyed) {
      send(res, response);
    }
    logger.info(
      { method, pathname, status: response.status, ms: Date.now() - started },
      "[web] request"
    );
  });
}

export function startWebServer(app: AppContext, port: number): http.Server {
  const server = http.createServer((req, res) => {
    handleRequest(app, req, res).catch((err: unknown) => {
      logger.error({ err }, "[web] failed to write response");
      if (!res.headersSent) {
        res.writeHead(500);
      }
      res.end();
    });
  });

  server.listen(port, () => {
    logger.info({ port, baseUrl: app.baseUrl }, "[web] check-in server listening");
  });

  server.on("error", (err) => {
    logger.error({ err, port }, "[web] server error");
  });

  return server;
}
