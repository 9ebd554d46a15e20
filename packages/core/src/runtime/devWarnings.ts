/**
 * packages/core/src/runtime/devWarnings.ts — Development-only diagnostics.
 *
 * Why: Some layouts are legal but almost certainly not what the author
 * meant (a grid too narrow for one item, a capped weight leaving blank
 * space). These are reported once per distinct key through console.warn
 * outside production and never change rendering.
 */

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";
const DEV_MODE = NODE_ENV !== "production";

export type DevWarningSink = (message: string) => void;

function consoleSink(message: string): void {
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

let sink: DevWarningSink = consoleSink;

export type WarnOnceContext = Readonly<{
  devMode: boolean;
  warned: Set<string>;
  warn: (message: string) => void;
}>;

const sharedContext: WarnOnceContext = {
  devMode: DEV_MODE,
  warned: new Set<string>(),
  warn: (message) => sink(message),
};

/**
 * Replace the warning sink (tests capture warnings this way).
 * Returns a function restoring the previous sink and clearing the dedupe set.
 */
export function setDevWarningSink(next: DevWarningSink): () => void {
  const prev = sink;
  sink = next;
  sharedContext.warned.clear();
  return () => {
    sink = prev;
    sharedContext.warned.clear();
  };
}

export function warnOnce(
  ctx: WarnOnceContext,
  area: "layout" | "grid" | "keys",
  key: string,
  detail: string,
): void {
  if (!ctx.devMode) return;
  if (ctx.warned.has(key)) return;
  ctx.warned.add(key);
  ctx.warn(`[loomtui][${area}] ${detail}`);
}

export function warnDev(area: "layout" | "grid" | "keys", key: string, detail: string): void {
  warnOnce(sharedContext, area, key, detail);
}
