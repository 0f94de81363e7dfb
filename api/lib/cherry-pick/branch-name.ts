export const SHORT_SHA_LENGTH = 7;

/**
 * Name of the branch a cherry-pick lands on:
 * `cherry-pick-<pr>-to-<target>-<first 7 chars of the last commit>`.
 */
export function cherryPickBranchName(prNumber: number, targetBranch: string, commits: readonly string[]): string {
  const last = commits[commits.length - 1] ?? "";
  return `cherry-pick-${prNumber}-to-${targetBranch}-${last.slice(0, SHORT_SHA_LENGTH)}`;
}

/**
 * Target branch made safe for use in a directory name.
 */
export function sanitizeForPath(branch: string): string {
  return branch.replace(/[/\\]/g, "-");
}
