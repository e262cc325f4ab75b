/**
 * Scoped console logger. `debug` and `info` are gated on the `debug`
 * config flag; `warn` always writes.
 */

import { config } from "./config.js";

export interface Logger {
  readonly scope: string;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

export interface LoggerOptions {
  /** Custom writer (default: console) */
  writer?: Pick<Console, "debug" | "info" | "warn">;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const prefix = `[vecta:${scope}]`;
  const writer = () => options.writer ?? console;

  return {
    scope,
    debug(message, ...details) {
      if (config.has("debug")) writer().debug(prefix, message, ...details);
    },
    info(message, ...details) {
      if (config.has("debug")) writer().info(prefix, message, ...details);
    },
    warn(message, ...details) {
      writer().warn(prefix, message, ...details);
    },
  };
}
