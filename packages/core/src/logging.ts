/**
 * packages/core/src/logging.ts — Logger seam and development-mode gating.
 *
 * Why: Core code never reaches for a console directly. Every module takes an
 * injected Logger so hosts can route messages, and tests can capture them.
 *
 * Rules:
 *   - Messages carry a `[trellis][area]` prefix.
 *   - debug() is dropped unless TRELLIS_DEBUG=1.
 *   - Development-only warnings are emitted once per key.
 *   - Uses globalThis.process so core stays free of Node imports.
 */

export type LogArea = "layout" | "pool" | "diff" | "patch" | "queue" | "pipeline" | "render";

export type Logger = Readonly<{
  debug: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}>;

type ProcessEnv = Readonly<{ NODE_ENV?: string; TRELLIS_DEBUG?: string }>;

function readEnv(): ProcessEnv {
  try {
    const g = globalThis as { process?: { env?: ProcessEnv } };
    return g.process?.env ?? {};
  } catch {
    return {};
  }
}

const ENV = readEnv();

/** True unless NODE_ENV is "production". */
export const DEV_MODE: boolean = (ENV.NODE_ENV ?? "development") !== "production";

const DEBUG_ENABLED: boolean = ENV.TRELLIS_DEBUG === "1";

type ConsoleLike = Readonly<{
  debug?: (message: string) => void;
  warn?: (message: string) => void;
  error?: (message: string) => void;
}>;

function getConsole(): ConsoleLike | undefined {
  return (globalThis as { console?: ConsoleLike }).console;
}

export function formatLogMessage(area: LogArea, message: string): string {
  return `[trellis][${area}] ${message}`;
}

/** Console-backed logger. */
export function createConsoleLogger(): Logger {
  return Object.freeze({
    debug: (message: string) => {
      if (!DEBUG_ENABLED) return;
      getConsole()?.debug?.(message);
    },
    warn: (message: string) => {
      getConsole()?.warn?.(message);
    },
    error: (message: string) => {
      getConsole()?.error?.(message);
    },
  });
}

export const SILENT_LOGGER: Logger = Object.freeze({
  debug: () => {},
  warn: () => {},
  error: () => {},
});

/** Logger that records every message, for tests and diagnostics. */
export type MemoryLogger = Logger &
  Readonly<{
    entries: ReadonlyArray<Readonly<{ level: "debug" | "warn" | "error"; message: string }>>;
    clear: () => void;
  }>;

export function createMemoryLogger(): MemoryLogger {
  const entries: { level: "debug" | "warn" | "error"; message: string }[] = [];
  return {
    entries,
    debug: (message) => {
      entries.push({ level: "debug", message });
    },
    warn: (message) => {
      entries.push({ level: "warn", message });
    },
    error: (message) => {
      entries.push({ level: "error", message });
    },
    clear: () => {
      entries.length = 0;
    },
  };
}

type DevWarningContext = Readonly<{
  devMode: boolean;
  warned: Set<string>;
  logger: Logger;
}>;

export function warnDevOnce(ctx: DevWarningContext, area: LogArea, key: string, detail: string): void {
  if (!ctx.devMode) return;
  if (ctx.warned.has(key)) return;
  ctx.warned.add(key);
  ctx.logger.warn(formatLogMessage(area, detail));
}
