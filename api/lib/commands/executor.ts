/**
 * Command Executor
 *
 * Orchestrates one trigger comment: parse → validate → dispatch → record
 * → report. Command outcomes never throw; they come back as an
 * ExecutionResult whose `error` is set only when the caller must surface it.
 */

import { metricsLabel, UNKNOWN_COMMAND_LABEL } from "./command-table.js";
import { CancelledError, CommandError, ExecutionError, toError } from "./errors.js";
import type { CommandOutcome } from "./metrics.js";
import { formatCommandDisplay, parseCommand, parseSubCommands } from "./parser.js";
import { ResultRecorder } from "./recorder.js";
import type { ExecutionContext, ExecutionResult, ParsedCommand, SubCommand, SubCommandResult } from "./types.js";
import { validateMulti, validateSingle } from "./validator.js";

/** Metrics label for a multi-line comment as a whole */
const MULTI_COMMAND_LABEL = "multi";

export class CommandExecutor {
  private readonly recorder: ResultRecorder;

  constructor(private readonly ctx: ExecutionContext) {
    this.recorder = new ResultRecorder(ctx);
  }

  async execute(parsed: ParsedCommand): Promise<ExecutionResult> {
    switch (parsed.kind) {
      case "single":
        return this.executeSingle({ command: parsed.command, args: parsed.args });
      case "builtin":
        return this.executeBuiltIn({ command: parsed.command, args: parsed.args });
      case "multi":
        return this.executeMulti(parsed.lines, parsed.rawLines);
    }
  }

  private async executeSingle(sub: SubCommand): Promise<ExecutionResult> {
    const startedAt = Date.now();
    const { logger } = this.ctx;
    logger.info(`Executing single command: ${sub.command}`);

    if (this.ctx.signal?.aborted) {
      return { success: false, kind: "single", error: new CancelledError(), subResults: [] };
    }

    try {
      await validateSingle(sub.command, this.ctx);
    } catch (error) {
      this.record(metricsLabel(sub.command), "validation_failed", startedAt);
      logger.warn(`Validation failed for /${sub.command}: ${toError(error).message}`);
      return { success: false, kind: "single", error: toError(error), subResults: [] };
    }

    const failure = await this.run(sub);
    if (!failure) {
      this.record(metricsLabel(sub.command), "success", startedAt);
      return { success: true, kind: "single", subResults: [] };
    }

    this.record(metricsLabel(sub.command), "failure", startedAt);
    if (this.ctx.signal?.aborted) {
      return { success: false, kind: "single", error: new CancelledError(), subResults: [] };
    }
    const surfaced = await this.recorder.handleSingleError(formatCommandDisplay(sub), failure);
    return { success: false, kind: "single", error: surfaced, subResults: [] };
  }

  private async executeBuiltIn(sub: SubCommand): Promise<ExecutionResult> {
    const startedAt = Date.now();
    this.ctx.logger.info(`Executing built-in command: ${sub.command}`);

    const failure = await this.run(sub);
    if (failure) {
      this.record(metricsLabel(sub.command), "failure", startedAt);
      this.ctx.logger.error(`Built-in command ${sub.command} failed`, failure);
      return { success: false, kind: "builtin", error: failure, subResults: [] };
    }

    this.record(metricsLabel(sub.command), "success", startedAt);
    return { success: true, kind: "builtin", subResults: [] };
  }

  private async executeMulti(lines: readonly string[], rawLines: readonly string[]): Promise<ExecutionResult> {
    const startedAt = Date.now();
    const { config, logger } = this.ctx;
    logger.info(`Executing multi-command with ${lines.length} commands`);

    let subCommands: SubCommand[];
    try {
      subCommands = parseSubCommands(lines);
    } catch (error) {
      this.record(MULTI_COMMAND_LABEL, "parse_failed", startedAt);
      return { success: false, kind: "multi", error: toError(error), subResults: [] };
    }

    try {
      await validateMulti(subCommands, rawLines, this.ctx);
    } catch (error) {
      this.record(MULTI_COMMAND_LABEL, "validation_failed", startedAt);
      logger.warn(`Multi-command validation failed: ${toError(error).message}`);
      return { success: false, kind: "multi", error: toError(error), subResults: [] };
    }

    const results: SubCommandResult[] = [];
    for (const sub of subCommands) {
      if (this.ctx.signal?.aborted) {
        logger.warn(`Dispatch cancelled after ${results.length} of ${subCommands.length} commands`);
        return { success: false, kind: "multi", error: new CancelledError(), subResults: results };
      }

      logger.info(`Executing sub-command: ${formatCommandDisplay(sub)}`);
      const subStartedAt = Date.now();
      const failure = await this.run(sub);
      this.record(metricsLabel(sub.command), failure ? "failure" : "success", subStartedAt);
      if (failure) {
        logger.error(`Sub-command '${sub.command}' failed`, failure);
      }
      results.push({ command: sub.command, args: sub.args, success: !failure, error: failure });

      if (failure && config.stopOnFirstError) {
        logger.info(`Stopping multi-command execution due to error in: ${sub.command}`);
        break;
      }
    }

    if (config.postErrorsAsComments) {
      await this.recorder.postSummary(results);
    }

    const success = results.every((result) => result.success);
    this.ctx.metrics.recordDuration(this.ctx.platformName, MULTI_COMMAND_LABEL, Date.now() - startedAt);
    return { success, kind: "multi", subResults: results };
  }

  /**
   * Run one command on the platform.
   *
   * @returns the failure, or undefined on success
   */
  private async run(sub: SubCommand): Promise<Error | undefined> {
    try {
      await this.ctx.platform.run(sub.command, sub.args, {
        signal: this.ctx.signal,
        comments: this.ctx.comments,
      });
      return undefined;
    } catch (error) {
      if (error instanceof CommandError) {
        return error;
      }
      const cause = toError(error);
      return new ExecutionError(sub.command, cause.message, { cause });
    }
  }

  private record(label: string, outcome: CommandOutcome, startedAt: number): void {
    const { metrics, platformName } = this.ctx;
    metrics.recordCommand(platformName, label, outcome);
    metrics.recordDuration(platformName, label, Date.now() - startedAt);
  }
}

/**
 * Parse the trigger comment in `ctx` and execute it.
 */
export async function dispatchComment(ctx: ExecutionContext): Promise<ExecutionResult> {
  let parsed: ParsedCommand;
  try {
    parsed = parseCommand(ctx.triggerComment);
  } catch (error) {
    ctx.metrics.recordCommand(ctx.platformName, UNKNOWN_COMMAND_LABEL, "parse_failed");
    ctx.logger.warn(`Could not parse trigger comment: ${toError(error).message}`);
    return { success: false, kind: "single", error: toError(error), subResults: [] };
  }
  return new CommandExecutor(ctx).execute(parsed);
}
