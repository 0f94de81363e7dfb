import type { PlatformComment } from "./types.js";

/**
 * Comments of one pull request, fetched on first use and shared by every
 * reader within a single dispatch. A failed fetch is not cached.
 */
export class CommentCache {
  private pending: Promise<readonly PlatformComment[]> | undefined;

  constructor(private readonly load: () => Promise<PlatformComment[]>) {}

  get(): Promise<readonly PlatformComment[]> {
    if (!this.pending) {
      this.pending = this.load().then(
        (comments) => Object.freeze(comments.map((comment) => Object.freeze({ ...comment }))),
        (error: unknown) => {
          this.pending = undefined;
          throw error;
        },
      );
    }
    return this.pending;
  }
}
