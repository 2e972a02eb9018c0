/**
 * Console logger with a per-call verbosity. Every message carries a `[scope]` prefix.
 */

export type LogLevel = "silent" | "minimal" | "normal" | "verbose";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
  child(scope: string): Logger;
}

const RANK: Record<LogLevel, number> = { silent: 0, minimal: 1, normal: 2, verbose: 3 };

export function createLogger(level: LogLevel, scope = "grader"): Logger {
  const allows = (needed: LogLevel) => RANK[level] >= RANK[needed];
  return {
    debug: (message) => {
      if (allows("verbose")) console.debug(`[${scope}] ${message}`);
    },
    info: (message) => {
      if (allows("normal")) console.log(`[${scope}] ${message}`);
    },
    warn: (message) => {
      if (allows("minimal")) console.warn(`[${scope}] ${message}`);
    },
    error: (message, err) => {
      if (!allows("minimal")) return;
      if (err === undefined) console.error(`[${scope}] ${message}`);
      else console.error(`[${scope}] ${message}`, err);
    },
    child: (name) => createLogger(level, `${scope}:${name}`)
  };
}

export const silentLogger: Logger = createLogger("silent");
