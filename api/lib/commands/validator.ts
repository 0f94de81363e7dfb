/**
 * Pre-execution Validation
 *
 * Two preconditions guard command execution:
 * - pr-state: the pull request must be open (cherry-pick and built-ins are exempt)
 * - sender: the comment sender must have posted the command text
 */

import { requiresPRState, isBuiltInCommand } from "./command-table.js";
import { ValidationError, toError } from "./errors.js";
import { normalizeComment } from "./normalize.js";
import type { PlatformComment } from "../platform/types.js";
import type { ExecutionContext, SubCommand } from "./types.js";

async function checkOpen(ctx: ExecutionContext): Promise<void> {
  try {
    await ctx.platform.checkPRState("open");
  } catch (error) {
    throw new ValidationError("pr-state", `PR status check failed: ${toError(error).message}`, { cause: error });
  }
}

async function senderComments(ctx: ExecutionContext): Promise<PlatformComment[]> {
  let comments: readonly PlatformComment[];
  try {
    comments = await ctx.comments.get();
  } catch (error) {
    throw new ValidationError("sender", `failed to get PR comments: ${toError(error).message}`, { cause: error });
  }
  const sender = ctx.sender.toLowerCase();
  return comments.filter((comment) => comment.author.toLowerCase() === sender);
}

function senderCheckEnabled(ctx: ExecutionContext): boolean {
  return ctx.config.validateSender && !ctx.config.debug;
}

/**
 * Validate a single command. Built-ins are never validated.
 *
 * @throws ValidationError
 */
export async function validateSingle(command: string, ctx: ExecutionContext): Promise<void> {
  if (isBuiltInCommand(command)) {
    return;
  }

  if (ctx.config.validatePRState && requiresPRState(command)) {
    await checkOpen(ctx);
  }

  if (!senderCheckEnabled(ctx)) {
    return;
  }

  const trigger = normalizeComment(ctx.triggerComment);
  const posted = (await senderComments(ctx)).some((comment) =>
    normalizeComment(comment.body).includes(trigger),
  );
  if (!posted) {
    throw new ValidationError(
      "sender",
      `comment sender '${ctx.sender}' did not post a comment containing the trigger`,
    );
  }
  ctx.logger.info(`Comment sender validation passed: ${ctx.sender} posted the trigger`);
}

/**
 * Validate a multi-line command: the PR must be open when any sub-command
 * needs it, and every raw command line must appear in some comment by
 * the sender.
 *
 * @throws ValidationError
 */
export async function validateMulti(
  subCommands: readonly SubCommand[],
  rawLines: readonly string[],
  ctx: ExecutionContext,
): Promise<void> {
  const needsOpenPR = subCommands.some((sub) => requiresPRState(sub.command));
  if (ctx.config.validatePRState && needsOpenPR) {
    await checkOpen(ctx);
  }

  if (!senderCheckEnabled(ctx) || rawLines.length === 0) {
    return;
  }

  const bodies = (await senderComments(ctx)).map((comment) => normalizeComment(comment.body));
  if (bodies.length === 0) {
    throw new ValidationError("sender", `comment sender '${ctx.sender}' did not post any comment`);
  }

  const missing = rawLines.filter((line) => {
    const normalizedLine = normalizeComment(line);
    return !bodies.some((body) => body.includes(normalizedLine));
  });
  if (missing.length > 0) {
    throw new ValidationError(
      "sender",
      `comment sender '${ctx.sender}' did not post commands: ${missing.join(", ")}`,
    );
  }
  ctx.logger.info(`Multi-command validation passed for sender: ${ctx.sender}`);
}
