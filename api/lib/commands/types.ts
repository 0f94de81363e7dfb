/**
 * Command Pipeline Types
 *
 * Shared shapes for the parse → validate → dispatch → report pipeline.
 */

import type { Logger } from "../logger.js";
import type { PlatformFacade } from "../platform/types.js";
import type { CommentCache } from "../platform/comment-cache.js";
import type { MetricsSink } from "./metrics.js";

export type CommandKind = "single" | "builtin" | "multi";

/**
 * A trigger comment after parsing.
 *
 * single / builtin carry one command with its arguments; multi carries
 * the command lines of a multi-line comment, normalised (`lines`) and as
 * written (`rawLines`, used for sender matching).
 */
export type ParsedCommand =
  | { kind: "single" | "builtin"; command: string; args: string[]; lines: []; rawLines: [] }
  | { kind: "multi"; command: ""; args: []; lines: string[]; rawLines: string[] };

export interface SubCommand {
  command: string;
  args: string[];
}

export interface SubCommandResult extends SubCommand {
  success: boolean;
  error?: Error;
}

export interface ExecutionResult {
  success: boolean;
  kind: CommandKind;
  /** Error the caller must surface; undefined when it was absorbed (posted or logged) */
  error?: Error;
  subResults: SubCommandResult[];
}

/**
 * Execution behaviour switches. Built from a Profile; see profile.ts.
 */
export interface ExecutionConfig {
  readonly validateSender: boolean;
  readonly validatePRState: boolean;
  readonly debug: boolean;
  readonly postErrorsAsComments: boolean;
  readonly returnErrors: boolean;
  readonly stopOnFirstError: boolean;
}

/**
 * Everything one dispatch needs. Created per trigger comment.
 */
export interface ExecutionContext {
  platform: PlatformFacade;
  logger: Logger;
  config: ExecutionConfig;
  metrics: MetricsSink;
  /** Platform label for metrics ("github", "gitlab") */
  platformName: string;
  sender: string;
  triggerComment: string;
  /** Comments of the PR, fetched at most once per dispatch */
  comments: CommentCache;
  signal?: AbortSignal;
}
