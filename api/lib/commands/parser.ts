/**
 * Command Parser
 *
 * Parses slash commands from PR comment bodies.
 *
 * Examples:
 *   "/lgtm"                      → { kind: "single", command: "lgtm", args: [] }
 *   "/label bug \"needs docs\""  → { kind: "single", command: "label", args: ["bug", "needs docs"] }
 *   "/lgtm cancel"               → { kind: "single", command: "remove-lgtm", args: [] }
 *   "/__post-merge-cherry-pick"  → { kind: "builtin", command: "__post-merge-cherry-pick", args: [] }
 *   "/rebase\n/lgtm"             → { kind: "multi", lines: ["/rebase", "/lgtm"], ... }
 */

import { ArgumentSyntaxError, splitArgs } from "./args.js";
import { COMMAND_TABLE, applyCommandAliases } from "./command-table.js";
import { InvalidFormatError, NoValidCommandsError } from "./errors.js";
import { extractCommandLines, normalizeComment } from "./normalize.js";
import type { ParsedCommand, SubCommand } from "./types.js";

/**
 * Built-in commands: /__name [args...]
 */
const BUILT_IN_PATTERN = /^\/(__[a-z_-]+)(\s+[\s\S]*)?$/;

/**
 * Regular commands: /keyword [args...], keyword from the command table.
 * Longer keywords come first so "checkbox-issue" is not read as "checkbox".
 */
const COMMAND_PATTERN = new RegExp(
  `^/(${[...COMMAND_TABLE]
    .map((spec) => spec.keyword)
    .sort((a, b) => b.length - a.length)
    .join("|")})(\\s+[\\s\\S]*)?$`,
);

function parseArgs(argText: string | undefined): string[] {
  const trimmed = argText?.trim() ?? "";
  if (!trimmed) {
    return [];
  }
  try {
    return splitArgs(trimmed);
  } catch (error) {
    if (error instanceof ArgumentSyntaxError) {
      throw new InvalidFormatError(`invalid command arguments: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Parse a trigger comment.
 *
 * @throws InvalidFormatError when the comment is not a recognised command
 */
export function parseCommand(body: string): ParsedCommand {
  const normalized = normalizeComment(body);
  if (!normalized.startsWith("/")) {
    throw new InvalidFormatError("comment must start with /");
  }

  const commandLines = extractCommandLines(normalized);
  if (commandLines.length > 1) {
    return {
      kind: "multi",
      command: "",
      args: [],
      lines: commandLines.map(applyCommandAliases),
      rawLines: commandLines,
    };
  }

  const builtIn = BUILT_IN_PATTERN.exec(normalized);
  if (builtIn) {
    return { kind: "builtin", command: builtIn[1], args: parseArgs(builtIn[2]), lines: [], rawLines: [] };
  }

  if (!COMMAND_PATTERN.test(normalized)) {
    throw new InvalidFormatError("invalid command format");
  }

  // Aliases rewrite the whole comment once, then it is matched again.
  const match = COMMAND_PATTERN.exec(applyCommandAliases(normalized));
  if (!match) {
    throw new InvalidFormatError("invalid command format after transformation");
  }

  return { kind: "single", command: match[1], args: parseArgs(match[2]), lines: [], rawLines: [] };
}

/**
 * Turn the lines of a multi-line comment into sub-commands.
 * Lines that do not parse are skipped.
 *
 * @throws NoValidCommandsError when no line parses
 */
export function parseSubCommands(lines: readonly string[]): SubCommand[] {
  const subCommands: SubCommand[] = [];

  for (const line of lines) {
    let parsed: ParsedCommand;
    try {
      parsed = parseCommand(line);
    } catch {
      continue;
    }
    if (parsed.kind === "multi") {
      continue;
    }
    subCommands.push({ command: parsed.command, args: parsed.args });
  }

  if (subCommands.length === 0) {
    throw new NoValidCommandsError();
  }
  return subCommands;
}

/**
 * Display form of a command: "/command arg1 arg2".
 */
export function formatCommandDisplay(subCommand: SubCommand): string {
  return subCommand.args.length > 0
    ? `/${subCommand.command} ${subCommand.args.join(" ")}`
    : `/${subCommand.command}`;
}
