/**
 * Result Recorder
 *
 * Formats sub-command outcomes and decides what happens to a failed
 * command: posted as a PR comment, returned to the caller, or only logged.
 */

import { MESSAGES } from "../../config.js";
import { redactTokens } from "../redact.js";
import { hasTransientCause } from "../transient-error.js";
import { PostFailedError, isAlreadyReported, toError } from "./errors.js";
import { formatCommandDisplay } from "./parser.js";
import type { ExecutionContext, SubCommandResult } from "./types.js";

export const SUMMARY_HEADER = "**Multi-Command Execution Results:**";
export const SUMMARY_FAILURE_SUFFIX = " (⚠️ Some commands failed)";

/**
 * One summary line per sub-command.
 */
export function formatSubCommandResult(result: SubCommandResult): string {
  const display = formatCommandDisplay(result);
  if (result.success) {
    return `✅ Command \`${display}\` executed successfully`;
  }
  return `❌ Command \`${display}\` failed: ${redactTokens(result.error?.message ?? "unknown error")}`;
}

/**
 * Summary comment for a multi-command run. Depends only on `results`.
 */
export function formatSummary(results: readonly SubCommandResult[], header = SUMMARY_HEADER): string {
  const failed = results.some((result) => !result.success);
  const title = failed ? `${header}${SUMMARY_FAILURE_SUFFIX}` : header;
  return `${title}\n\n${results.map(formatSubCommandResult).join("\n")}`;
}

export class ResultRecorder {
  constructor(private readonly ctx: ExecutionContext) {}

  /**
   * Apply the error policy to a failed single command.
   *
   * @returns the error the caller must surface, or undefined when it was absorbed
   */
  async handleSingleError(command: string, error: Error): Promise<Error | undefined> {
    const { config, logger } = this.ctx;

    if (isAlreadyReported(error)) {
      logger.info(`Error comment already posted for command: ${command}`);
      return config.returnErrors ? error : undefined;
    }

    if (config.postErrorsAsComments) {
      const body = MESSAGES.commandFailed(command, redactTokens(error.message), hasTransientCause(error));
      try {
        await this.ctx.platform.postComment(body);
        logger.info(`Posted command error as PR comment for command: ${command}`);
      } catch (postError) {
        const cause = toError(postError);
        logger.error("Failed to post error comment", cause);
        if (config.returnErrors) {
          return new PostFailedError(
            `command failed: ${error.message} (and failed to post error comment: ${cause.message})`,
            { cause: error },
          );
        }
      }
    }

    if (config.returnErrors) {
      return error;
    }

    logger.error(`Command ${command} failed`, error);
    return undefined;
  }

  /**
   * Post the multi-command summary. Failures are logged, never thrown.
   */
  async postSummary(results: readonly SubCommandResult[]): Promise<void> {
    try {
      await this.ctx.platform.postComment(formatSummary(results));
    } catch (error) {
      this.ctx.logger.error("Failed to post multi-command summary", toError(error));
    }
  }
}
