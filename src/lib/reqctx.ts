/**
 * Stampboard — src/lib/reqctx.ts
 * WHAT: Minimal async-local request context for tracing HTTP requests through
 *       the service and store logs.
 * FLOWS: newTraceId() → runWithCtx(meta, fn) → ctx() inside nested helpers
 *
 * NOTE: Only log metadata lives here. Handlers get their store/config through
 * an explicit AppContext argument, not through this module.
 *
 * DOCS:
 *  - Node AsyncLocalStorage: https://nodejs.org/api/async_context.html#class-asynclocalstorage
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

export type ReqContext = {
  traceId: string;
  method?: string;
  route?: string;
};

const storage = new AsyncLocalStorage<ReqContext>();

const BASE62 = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";

/**
 * 11-char base62 id, short enough to read in a log line.
 */
export function newTraceId(): string {
  const length = 11;
  const bytes = randomBytes(length);
  let out = "";
  for (let i = 0; i < length; i += 1) {
    out += BASE62[bytes[i] % BASE62.length];
  }
  return out;
}

/**
 * Binds a merged ReqContext for the duration of fn and all async calls it makes.
 * Nested calls inherit the parent's fields unless they override them.
 */
export function runWithCtx<T>(meta: Partial<ReqContext>, fn: () => T): T {
  const parent = storage.getStore();
  const next: ReqContext = {
    traceId: meta.traceId ?? parent?.traceId ?? newTraceId(),
    method: meta.method ?? parent?.method,
    route: meta.route ?? parent?.route,
  };
  return storage.run(next, fn);
}

/**
 * Current context, or an empty object outside of a request.
 */
export function ctx(): Partial<ReqContext> {
  return storage.getStore() ?? {};
}
