/**
 * Commands Module
 *
 * Public API of the comment command pipeline, used by the webhook app
 * and the pr-cli script.
 */

export { parseCommand, parseSubCommands, formatCommandDisplay } from "./parser.js";
export { CommandExecutor, dispatchComment } from "./executor.js";
export { executionConfigFor } from "./profile.js";
export type { Profile } from "./profile.js";
export { InMemoryMetrics, noopMetrics } from "./metrics.js";
export type { MetricsSink, MetricsSnapshot, CommandOutcome } from "./metrics.js";
export { formatSummary, formatSubCommandResult } from "./recorder.js";
export * from "./errors.js";
export type {
  ExecutionConfig,
  ExecutionContext,
  ExecutionResult,
  ParsedCommand,
  SubCommand,
  SubCommandResult,
} from "./types.js";
