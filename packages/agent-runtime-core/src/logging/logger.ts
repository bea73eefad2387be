/**
 * Runtime Logging
 *
 * Agents, orchestration primitives and stream sessions log through a
 * RuntimeLogger bound to their module and agent name. The process-wide
 * logger writes pino JSON lines; its level comes from `AGENTLOOM_LOG_LEVEL`
 * or `LOG_LEVEL`, and `AGENTLOOM_LOG_PRETTY=true` routes it through
 * pino-pretty.
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";
import { z } from "zod";

// ============================================================================
// Types
// ============================================================================

export const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

export type LogLevel = z.infer<typeof logLevelSchema>;

export type LogFields = Record<string, unknown>;

export interface RuntimeLogger {
  trace(msg: string, fields?: LogFields): void;
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, error?: Error | LogFields): void;
  /** Logger whose lines carry `bindings` in addition to the current ones */
  child(bindings: LogFields): RuntimeLogger;
}

export interface RuntimeLoggerOptions {
  readonly level?: LogLevel;
  readonly pretty?: boolean;
  /** Bindings on every line (default: `{ service: "agentloom" }`) */
  readonly bindings?: LogFields;
  /** Write lines here instead of stdout; disables pretty printing */
  readonly destination?: DestinationStream;
}

type Env = Readonly<Record<string, string | undefined>>;

// ============================================================================
// Settings
// ============================================================================

/**
 * Logging settings taken from the environment. Unknown levels fall back to `info`.
 */
export function readLoggerSettings(env: Env = process.env): { level: LogLevel; pretty: boolean } {
  const level = logLevelSchema.safeParse(env.AGENTLOOM_LOG_LEVEL ?? env.LOG_LEVEL);
  return {
    level: level.success ? level.data : "info",
    pretty: env.AGENTLOOM_LOG_PRETTY === "true",
  };
}

// ============================================================================
// Factory
// ============================================================================

export function createRuntimeLogger(options: RuntimeLoggerOptions = {}): RuntimeLogger {
  const settings = readLoggerSettings();
  const pinoOptions: LoggerOptions = {
    level: options.level ?? settings.level,
    base: options.bindings ?? { service: "agentloom" },
  };

  if (options.destination) {
    return new PinoRuntimeLogger(pino(pinoOptions, options.destination));
  }
  if (options.pretty ?? settings.pretty) {
    pinoOptions.transport = {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" },
    };
  }
  return new PinoRuntimeLogger(pino(pinoOptions));
}

class PinoRuntimeLogger implements RuntimeLogger {
  constructor(private readonly logger: Logger) {}

  trace(msg: string, fields?: LogFields): void {
    this.logger.trace(fields ?? {}, msg);
  }

  debug(msg: string, fields?: LogFields): void {
    this.logger.debug(fields ?? {}, msg);
  }

  info(msg: string, fields?: LogFields): void {
    this.logger.info(fields ?? {}, msg);
  }

  warn(msg: string, fields?: LogFields): void {
    this.logger.warn(fields ?? {}, msg);
  }

  error(msg: string, error?: Error | LogFields): void {
    // pino serializes Error values under `err`
    this.logger.error(error instanceof Error ? { err: error } : (error ?? {}), msg);
  }

  child(bindings: LogFields): RuntimeLogger {
    return new PinoRuntimeLogger(this.logger.child(bindings));
  }
}

// ============================================================================
// Process Default
// ============================================================================

let defaultLogger: RuntimeLogger | undefined;

/**
 * The process-wide logger, created on first use. Components take a
 * `logger` option to log elsewhere.
 */
export function getLogger(): RuntimeLogger {
  defaultLogger ??= createRuntimeLogger();
  return defaultLogger;
}
