/**
 * LGTM Vote Counting
 *
 * A user's vote is the last `/lgtm` or `/remove-lgtm` (`/lgtm cancel`)
 * line they wrote on the PR. Only users whose repository permission is in
 * the configured list count towards the threshold.
 */

import type { LgtmVoteSummary } from "../../config.js";
import type { PlatformComment } from "./types.js";

const REMOVE_PATTERNS: readonly RegExp[] = [/^\/remove-lgtm\b/, /^\/lgtm\s+cancel\b/];
const LGTM_PATTERN = /^\/lgtm\b/;

export type VoteLine = "lgtm" | "remove" | null;

/**
 * Classify one comment line. Removal wins over `/lgtm` so that
 * `/lgtm cancel` is not read as a vote.
 */
export function classifyVoteLine(line: string): VoteLine {
  const trimmed = line.trim();
  if (REMOVE_PATTERNS.some((pattern) => pattern.test(trimmed))) {
    return "remove";
  }
  return LGTM_PATTERN.test(trimmed) ? "lgtm" : null;
}

function isRemovalComment(body: string): boolean {
  return body.split("\n").some((line) => classifyVoteLine(line) === "remove");
}

export interface CollectVotesOptions {
  /** Votes by the PR author are never counted */
  prAuthor: string;
  /** Count the PR author's votes too (debug runs) */
  includeAuthor?: boolean;
  /**
   * Skip this user's most recent removal comment, giving the tally as it
   * stood before that removal.
   */
  ignoreLastRemovalBy?: string;
}

/**
 * Users with an active LGTM, keyed by lowercase login with the login as
 * first written as the value. Comments are read oldest first.
 */
export function collectLgtmVoters(
  comments: readonly PlatformComment[],
  options: CollectVotesOptions,
): Map<string, string> {
  const prAuthor = options.prAuthor.toLowerCase();
  const ignoreUser = options.ignoreLastRemovalBy?.toLowerCase();

  let skipIndex = -1;
  if (ignoreUser) {
    for (let i = comments.length - 1; i >= 0; i--) {
      const comment = comments[i];
      if (comment && comment.author.toLowerCase() === ignoreUser && isRemovalComment(comment.body)) {
        skipIndex = i;
        break;
      }
    }
  }

  const voters = new Map<string, string>();
  comments.forEach((comment, index) => {
    if (index === skipIndex) return;
    const user = comment.author.toLowerCase();
    if (user === prAuthor && !options.includeAuthor) return;

    for (const line of comment.body.split("\n")) {
      const vote = classifyVoteLine(line);
      if (vote === "lgtm") {
        if (!voters.has(user)) voters.set(user, comment.author);
      } else if (vote === "remove") {
        voters.delete(user);
      }
    }
  });

  return voters;
}

/**
 * Keep the voters whose permission is allowed.
 *
 * @param permissionOf - resolves a login to its repository permission
 */
export async function tallyLgtmVotes(
  voters: Map<string, string>,
  permissionOf: (login: string) => Promise<string>,
  allowed: readonly string[],
  threshold: number,
): Promise<LgtmVoteSummary> {
  const valid = new Map<string, string>();
  for (const login of voters.values()) {
    const permission = await permissionOf(login);
    if (allowed.includes(permission)) {
      valid.set(login, permission);
    }
  }
  return { voters: valid, threshold };
}
