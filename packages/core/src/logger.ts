import { config } from "./config.js";

/**
 * Write a trace line for an adapter when `debug` is enabled.
 */
export function trace(adapter: string, message: string): void {
  if (!config.has("debug")) return;
  console.debug(`[alternate:${adapter}] ${message}`);
}
