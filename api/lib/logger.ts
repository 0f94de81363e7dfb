/**
 * Logging Abstraction
 *
 * Provides consistent logging across:
 * - GitHub Actions workflows running the CLI (uses @actions/core)
 * - The webhook app (adapts Probot's request logger)
 * - Local development (uses console)
 *
 * Every logger handed to the command pipeline is wrapped by
 * createRedactingLogger() so credentials never reach log output.
 */

import * as core from "@actions/core";
import { redactTokens } from "./redact.js";

/**
 * Check if running in GitHub Actions environment
 */
const isGitHubActions = (): boolean => {
  return process.env.GITHUB_ACTIONS === "true";
};

/**
 * Logger interface for command operations
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: Error): void;
  debug(message: string): void;
  group(name: string): void;
  groupEnd(): void;
}

/**
 * GitHub Actions logger using @actions/core
 */
class ActionsLogger implements Logger {
  info(message: string): void {
    core.info(message);
  }

  warn(message: string): void {
    core.warning(message);
  }

  error(message: string, error?: Error): void {
    if (error) {
      core.error(`${message}: ${error.message}`);
      if (error.stack) {
        core.debug(error.stack);
      }
    } else {
      core.error(message);
    }
  }

  debug(message: string): void {
    core.debug(message);
  }

  group(name: string): void {
    core.startGroup(name);
  }

  groupEnd(): void {
    core.endGroup();
  }
}

/**
 * Console logger for local development
 */
class ConsoleLogger implements Logger {
  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(`⚠️  ${message}`);
  }

  error(message: string, error?: Error): void {
    if (error) {
      console.error(`❌ ${message}: ${error.message}`);
    } else {
      console.error(`❌ ${message}`);
    }
  }

  debug(message: string): void {
    if (process.env.DEBUG) {
      console.log(`🔍 ${message}`);
    }
  }

  group(name: string): void {
    console.group(name);
  }

  groupEnd(): void {
    console.groupEnd();
  }
}

/**
 * Shape of Probot's per-request logger (pino-compatible).
 */
export interface ProbotLog {
  info(message: string): void;
  warn(message: string): void;
  error(objOrMessage: unknown, message?: string): void;
  debug?(message: string): void;
}

/**
 * Adapts Probot's context.log to the Logger interface.
 * Groups have no meaning in structured logs and are flattened.
 */
class ProbotLogger implements Logger {
  constructor(private readonly log: ProbotLog) {}

  info(message: string): void {
    this.log.info(message);
  }

  warn(message: string): void {
    this.log.warn(message);
  }

  error(message: string, error?: Error): void {
    if (error) {
      this.log.error({ err: error }, message);
    } else {
      this.log.error(message);
    }
  }

  debug(message: string): void {
    this.log.debug?.(message);
  }

  group(name: string): void {
    this.log.info(name);
  }

  groupEnd(): void {}
}

/**
 * Wraps a logger so every message, and the message of every attached
 * error, passes through redactTokens() first.
 */
class RedactingLogger implements Logger {
  constructor(private readonly inner: Logger) {}

  info(message: string): void {
    this.inner.info(redactTokens(message));
  }

  warn(message: string): void {
    this.inner.warn(redactTokens(message));
  }

  error(message: string, error?: Error): void {
    if (!error) {
      this.inner.error(redactTokens(message));
      return;
    }
    const safe = new Error(redactTokens(error.message));
    safe.name = error.name;
    if (error.stack) {
      safe.stack = redactTokens(error.stack);
    }
    this.inner.error(redactTokens(message), safe);
  }

  debug(message: string): void {
    this.inner.debug(redactTokens(message));
  }

  group(name: string): void {
    this.inner.group(redactTokens(name));
  }

  groupEnd(): void {
    this.inner.groupEnd();
  }
}

/**
 * Wrap a logger with token redaction. Already-wrapped loggers are returned as-is.
 */
export function createRedactingLogger(inner: Logger): Logger {
  return inner instanceof RedactingLogger ? inner : new RedactingLogger(inner);
}

/**
 * Create a redacting logger on top of Probot's request logger
 */
export function createProbotLogger(log: ProbotLog): Logger {
  return createRedactingLogger(new ProbotLogger(log));
}

/**
 * Create appropriate logger for current environment
 */
export function createLogger(): Logger {
  return createRedactingLogger(isGitHubActions() ? new ActionsLogger() : new ConsoleLogger());
}

/**
 * Default logger instance
 */
export const logger = createLogger();
