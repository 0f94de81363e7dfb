/**
 * Command Errors
 *
 * Error taxonomy for the comment command pipeline. Every error raised by
 * the parser, validator, executor or cherry-pick worker is a CommandError
 * carrying a `kind` tag, so callers branch on the tag rather than on
 * message text.
 */

export type CommandErrorKind =
  | "InvalidFormat"
  | "NoValidCommands"
  | "ValidationFailed"
  | "ExecutionFailed"
  | "CherryPickFailed"
  | "AlreadyReported"
  | "PostFailed"
  | "Cancelled";

export class CommandError extends Error {
  readonly kind: CommandErrorKind;

  constructor(kind: CommandErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** The comment could not be interpreted as a command. */
export class InvalidFormatError extends CommandError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("InvalidFormat", message, options);
  }
}

/** A multi-line comment had no line that parses as a command. */
export class NoValidCommandsError extends CommandError {
  constructor() {
    super("NoValidCommands", "no valid commands found in multi-line comment");
  }
}

export type ValidationRule = "pr-state" | "sender";

/** A precondition (PR state or comment sender) did not hold. */
export class ValidationError extends CommandError {
  readonly rule: ValidationRule;

  constructor(rule: ValidationRule, message: string, options?: { cause?: unknown }) {
    super("ValidationFailed", message, options);
    this.rule = rule;
  }
}

/** The platform reported failure for a command. */
export class ExecutionError extends CommandError {
  readonly command: string;

  constructor(command: string, message: string, options?: { cause?: unknown }) {
    super("ExecutionFailed", message, options);
    this.command = command;
  }
}

export type CherryPickFailureReason =
  | "CloneFailed"
  | "ConfigFailed"
  | "CheckoutFailed"
  | "FetchFailed"
  | "ConflictUnresolvable"
  | "EmptyCommitSkipFailed"
  | "PushFailed"
  | "Cancelled";

/** The cherry-pick worker could not land the requested commits. */
export class CherryPickError extends CommandError {
  readonly reason: CherryPickFailureReason;
  /** The commit being processed when the failure happened, when there was one */
  readonly commit: string | undefined;

  constructor(
    reason: CherryPickFailureReason,
    message: string,
    options?: { commit?: string; cause?: unknown },
  ) {
    super("CherryPickFailed", message, { cause: options?.cause });
    this.reason = reason;
    this.commit = options?.commit;
  }
}

/**
 * Marks an error the platform has already explained to the user in a PR
 * comment. The result recorder must not post it again.
 */
export class AlreadyReportedError extends CommandError {
  constructor(inner: Error) {
    super("AlreadyReported", inner.message, { cause: inner });
  }
}

/** A summary or error comment could not be published. */
export class PostFailedError extends CommandError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PostFailed", message, options);
  }
}

/** The dispatch was cancelled by its caller. */
export class CancelledError extends CommandError {
  constructor(message = "command dispatch cancelled") {
    super("Cancelled", message);
  }
}

/**
 * True when `error`, or any error in its cause chain, is an AlreadyReportedError.
 */
export function isAlreadyReported(error: unknown): boolean {
  let current: unknown = error;
  const seen = new Set<unknown>();
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof AlreadyReportedError) {
      return true;
    }
    seen.add(current);
    current = current.cause;
  }
  return false;
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
