/**
 * Argument Splitting
 *
 * Shell-like word splitting for command arguments, without any shell
 * expansion:
 *   /label "needs review" bug    → ["needs review", "bug"]
 *   /checkbox-issue 'Release 1.2' → ["Release 1.2"]
 *   /assign a\ b                 → ["a b"]
 *
 * Single quotes are literal; inside double quotes a backslash escapes
 * only `"` and `\`.
 */

export class ArgumentSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArgumentSyntaxError";
  }
}

type SplitState = "plain" | "single" | "double";

/**
 * Split an argument string into words.
 *
 * @throws ArgumentSyntaxError on an unterminated quote or a trailing backslash
 */
export function splitArgs(input: string): string[] {
  const words: string[] = [];
  let current = "";
  let inWord = false;
  let state: SplitState = "plain";

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (state === "single") {
      if (ch === "'") {
        state = "plain";
      } else {
        current += ch;
      }
      continue;
    }

    if (state === "double") {
      if (ch === '"') {
        state = "plain";
      } else if (ch === "\\" && (input[i + 1] === '"' || input[i + 1] === "\\")) {
        current += input[i + 1];
        i++;
      } else {
        current += ch;
      }
      continue;
    }

    if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current);
        current = "";
        inWord = false;
      }
      continue;
    }

    inWord = true;
    if (ch === "'") {
      state = "single";
    } else if (ch === '"') {
      state = "double";
    } else if (ch === "\\") {
      if (i + 1 >= input.length) {
        throw new ArgumentSyntaxError("trailing backslash");
      }
      current += input[i + 1];
      i++;
    } else {
      current += ch;
    }
  }

  if (state !== "plain") {
    throw new ArgumentSyntaxError(`unterminated ${state === "single" ? "single" : "double"} quote`);
  }
  if (inWord) {
    words.push(current);
  }
  return words;
}
