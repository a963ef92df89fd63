/**
 * Sink for diagnostic output. Components default to `console`; tests pass a
 * stub to keep output quiet.
 */
export type Logger = Pick<Console, "log" | "warn" | "error">;

export const consoleLogger: Logger = console;

export const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
  error: () => {},
};
