import { readEngineConfig } from "./engineConfig.ts";

const PREFIX = "[chess-engine]";

function args(scope: string, message: string, details: unknown): unknown[] {
  const line = `${PREFIX} [${scope}] ${message}`;
  return details === undefined ? [line] : [line, details];
}

export function logDebug(scope: string, message: string, details?: unknown): void {
  if (!readEngineConfig().debugLog) return;
  // eslint-disable-next-line no-console
  console.log(...args(scope, message, details));
}

export function logWarn(scope: string, message: string, details?: unknown): void {
  // eslint-disable-next-line no-console
  console.warn(...args(scope, message, details));
}
