/**
 * Command Table
 *
 * The closed set of comment commands, with the per-command flags the
 * parser, validator and batch runner consult. Adding a command means
 * adding a row here and a handler on the platform.
 */

export interface CommandSpec {
  keyword: string;
  /** Usage shown by /help */
  usage: string;
  description: string;
  /** Whether the PR must be open for the command to run */
  requiresPRState: boolean;
  /** Whether the command may appear inside /batch */
  allowedInBatch: boolean;
}

export const COMMAND_TABLE: readonly CommandSpec[] = [
  { keyword: "help", usage: "/help", description: "Show this help message", requiresPRState: true, allowedInBatch: true },
  { keyword: "rebase", usage: "/rebase", description: "Update the PR branch with its base branch", requiresPRState: true, allowedInBatch: true },
  { keyword: "lgtm", usage: "/lgtm", description: "Approve the PR (`/lgtm cancel` withdraws)", requiresPRState: true, allowedInBatch: false },
  { keyword: "remove-lgtm", usage: "/remove-lgtm", description: "Withdraw your LGTM vote", requiresPRState: true, allowedInBatch: false },
  { keyword: "cherry-pick", usage: "/cherry-pick <branch>", description: "Cherry-pick the PR onto another branch once merged", requiresPRState: false, allowedInBatch: true },
  { keyword: "cherrypick", usage: "/cherrypick <branch>", description: "Alias for /cherry-pick", requiresPRState: false, allowedInBatch: true },
  { keyword: "assign", usage: "/assign <user> [user...]", description: "Assign users to the PR", requiresPRState: true, allowedInBatch: true },
  { keyword: "merge", usage: "/merge [merge|squash|rebase]", description: "Merge the PR once approved", requiresPRState: true, allowedInBatch: true },
  { keyword: "ready", usage: "/ready [merge|squash|rebase]", description: "Alias for /merge", requiresPRState: true, allowedInBatch: true },
  { keyword: "unassign", usage: "/unassign <user> [user...]", description: "Remove assignees from the PR", requiresPRState: true, allowedInBatch: true },
  { keyword: "label", usage: "/label <label> [label...]", description: "Add labels to the PR", requiresPRState: true, allowedInBatch: true },
  { keyword: "unlabel", usage: "/unlabel <label> [label...]", description: "Remove labels from the PR", requiresPRState: true, allowedInBatch: true },
  { keyword: "check", usage: "/check", description: "Show the status of the PR's checks", requiresPRState: true, allowedInBatch: true },
  { keyword: "retest", usage: "/retest", description: "Re-run failed checks", requiresPRState: true, allowedInBatch: true },
  { keyword: "close", usage: "/close", description: "Close the PR", requiresPRState: true, allowedInBatch: true },
  { keyword: "batch", usage: "/batch /cmd [args] /cmd2 [args]", description: "Run several commands from one line", requiresPRState: true, allowedInBatch: false },
  { keyword: "checkbox", usage: "/checkbox", description: "Tick every checkbox in the PR description", requiresPRState: true, allowedInBatch: true },
  { keyword: "checkbox-issue", usage: "/checkbox-issue <title> [author]", description: "Tick every checkbox in a matching issue", requiresPRState: true, allowedInBatch: true },
];

const COMMANDS_BY_KEYWORD = new Map(COMMAND_TABLE.map((spec) => [spec.keyword, spec]));

/**
 * Comment rewrites applied once before a command line is matched.
 * Each entry rewrites a whole normalised line.
 */
export const COMMAND_ALIASES: ReadonlyArray<{ pattern: RegExp; replacement: string }> = [
  { pattern: /^\/lgtm\s+cancel$/, replacement: "/remove-lgtm" },
];

export const BUILT_IN_PREFIX = "__";

/** Runs the cherry-picks requested on a PR once it has merged */
export const POST_MERGE_CHERRY_PICK = "__post-merge-cherry-pick";

const BUILT_IN_COMMANDS: ReadonlySet<string> = new Set([POST_MERGE_CHERRY_PICK]);

/** Metrics label for a command outside the table */
export const UNKNOWN_COMMAND_LABEL = "unknown";

export function isBuiltInCommand(command: string): boolean {
  return command.startsWith(BUILT_IN_PREFIX);
}

export function getCommandSpec(command: string): CommandSpec | undefined {
  return COMMANDS_BY_KEYWORD.get(command);
}

/**
 * Label `command` is recorded under. Names outside the table and the
 * built-in set share one label, so the label set stays bounded.
 */
export function metricsLabel(command: string): string {
  return COMMANDS_BY_KEYWORD.has(command) || BUILT_IN_COMMANDS.has(command) ? command : UNKNOWN_COMMAND_LABEL;
}

/**
 * Whether the PR must be open before `command` runs.
 * Built-ins never trigger the check; unknown commands always do.
 */
export function requiresPRState(command: string): boolean {
  if (isBuiltInCommand(command)) {
    return false;
  }
  return getCommandSpec(command)?.requiresPRState ?? true;
}

/**
 * Apply the alias table to a normalised command line. Runs once; the
 * result is not fed back through the table.
 */
export function applyCommandAliases(line: string): string {
  for (const alias of COMMAND_ALIASES) {
    if (alias.pattern.test(line)) {
      return line.replace(alias.pattern, alias.replacement);
    }
  }
  return line;
}
