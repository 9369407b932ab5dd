import { config } from "./config.js";

/** Print a scoped diagnostic line when `config.debug` is on. */
export function debugLog(scope: string, message: string): void {
  if (!config.get("debug")) return;
  console.debug(`[strand/parser:${scope}] ${message}`);
}
