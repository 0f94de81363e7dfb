/**
 * Platform Facade
 *
 * The capability set the command pipeline needs from a hosted Git
 * platform, scoped to one pull request.
 */

import type { CommentCache } from "./comment-cache.js";

export interface PlatformComment {
  author: string;
  body: string;
}

export type PRState = "open" | "closed";

export interface RunOptions {
  signal?: AbortSignal;
  /** The dispatch's comment cache; commands that read PR comments share it */
  comments?: CommentCache;
}

export interface PlatformFacade {
  /**
   * Execute a recognised command, built-ins included.
   * Rejects with an AlreadyReportedError when the platform already told
   * the user what went wrong.
   */
  run(command: string, args: readonly string[], options?: RunOptions): Promise<void>;
  postComment(body: string): Promise<void>;
  /** Rejects when the pull request is not in the expected state */
  checkPRState(expected: PRState): Promise<void>;
  listComments(): Promise<PlatformComment[]>;
}
