/**
 * Cherry-Pick Worker
 *
 * Lands an ordered list of commits onto a new branch cut from a target
 * branch, using the git CLI inside a throwaway clone:
 *
 *   clone → configure identity → check out target → fetch commits
 *   → apply each commit (conflict ladder) → push
 *
 * Each run gets its own temporary workspace and passes it as the `cwd` of
 * every git subprocess, so concurrent runs do not interfere. The workspace
 * is removed on every exit path.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { GIT_IDENTITY, type GitIdentity } from "../../config.js";
import { CherryPickError, type CherryPickFailureReason } from "../commands/errors.js";
import type { Logger } from "../logger.js";
import { redactSecret } from "../redact.js";
import { cherryPickBranchName, sanitizeForPath } from "./branch-name.js";
import { execaGitRunner, type GitResult, type GitRunner } from "./git-runner.js";
import { stripCredentials } from "./repository-url.js";

export interface CherryPickRequest {
  /** Token-embedded clone URL (see buildRepositoryUrl) */
  repoUrl: string;
  token: string;
  owner: string;
  repo: string;
  prNumber: number;
  targetBranch: string;
  /** Commits in the order they must land. Never empty. */
  commits: readonly string[];
}

export interface CherryPickWorkerOptions {
  logger: Logger;
  git?: GitRunner;
  identity?: GitIdentity;
  /** Parent directory for workspaces (default: the OS temp dir) */
  workspaceRoot?: string;
}

const CONFLICT_MARKERS = ["CONFLICT", "conflict", "unmerged files"];
const EMPTY_COMMIT_MARKERS = ["empty", "nothing to commit", "the previous cherry-pick is now empty"];

export function isConflictOutput(output: string): boolean {
  return CONFLICT_MARKERS.some((marker) => output.includes(marker));
}

export function isEmptyCommitOutput(output: string): boolean {
  const lower = output.toLowerCase();
  return EMPTY_COMMIT_MARKERS.some((marker) => lower.includes(marker));
}

/**
 * One worker run bound to a workspace. Formats failures with the token
 * removed from both the arguments and the output.
 */
class GitSession {
  constructor(
    readonly workspace: string,
    private readonly git: GitRunner,
    private readonly token: string,
    private readonly signal: AbortSignal | undefined,
  ) {}

  /**
   * Run git in the workspace. Throws Cancelled when the run was aborted;
   * any other failure comes back in the result.
   */
  async exec(args: readonly string[], env?: Record<string, string>): Promise<GitResult> {
    this.throwIfCancelled();
    const result = await this.git(args, { cwd: this.workspace, env, signal: this.signal });
    if (result.cancelled || this.signal?.aborted) {
      throw new CherryPickError("Cancelled", `git ${this.redact(args.join(" "))} cancelled`);
    }
    return result;
  }

  /** Run git and throw a CherryPickError with `reason` on failure. */
  async must(
    args: readonly string[],
    reason: CherryPickFailureReason,
    context: string,
    options: { env?: Record<string, string>; commit?: string } = {},
  ): Promise<void> {
    const result = await this.exec(args, options.env);
    if (result.failed) {
      throw new CherryPickError(reason, `${context}: ${this.describeFailure(args, result)}`, {
        commit: options.commit,
      });
    }
  }

  describeFailure(args: readonly string[], result: GitResult): string {
    return this.redact(`git ${args.join(" ")} failed: exit code ${result.exitCode}, output: ${result.output.trim()}`);
  }

  redact(text: string): string {
    return redactSecret(text, this.token);
  }

  throwIfCancelled(): void {
    if (this.signal?.aborted) {
      throw new CherryPickError("Cancelled", "cherry-pick cancelled");
    }
  }
}

export class CherryPickWorker {
  private readonly logger: Logger;
  private readonly git: GitRunner;
  private readonly identity: GitIdentity;
  private readonly workspaceRoot: string;

  constructor(options: CherryPickWorkerOptions) {
    this.logger = options.logger;
    this.git = options.git ?? execaGitRunner;
    this.identity = options.identity ?? GIT_IDENTITY;
    this.workspaceRoot = options.workspaceRoot ?? tmpdir();
  }

  /**
   * Cherry-pick `request.commits` onto a new branch from the target branch
   * and push it.
   *
   * @returns the name of the pushed branch
   * @throws CherryPickError
   */
  async run(request: CherryPickRequest, signal?: AbortSignal): Promise<string> {
    if (request.commits.length === 0) {
      throw new CherryPickError("FetchFailed", "cherry-pick request has no commits");
    }
    if (signal?.aborted) {
      throw new CherryPickError("Cancelled", "cherry-pick cancelled");
    }

    const branch = cherryPickBranchName(request.prNumber, request.targetBranch, request.commits);
    const prefix = `cherrypick-${request.repo}-${sanitizeForPath(request.targetBranch)}-`;
    const workspace = await mkdtemp(join(this.workspaceRoot, prefix));
    const session = new GitSession(workspace, this.git, request.token, signal);

    this.logger.info(
      `Cherry-picking ${request.commits.length} commit(s) from PR #${request.prNumber} onto ${request.targetBranch} as ${branch}`,
    );

    try {
      await this.clone(session, request);
      await this.configureIdentity(session);
      await this.checkoutTarget(session, request.targetBranch, branch);
      for (const commit of request.commits) {
        await this.fetchCommit(session, commit);
      }
      for (const commit of request.commits) {
        await this.applyCommit(session, commit);
      }
      await this.push(session, branch);
      this.logger.info(`Pushed cherry-pick branch ${branch}`);
      return branch;
    } finally {
      await this.removeWorkspace(workspace);
    }
  }

  private async clone(session: GitSession, request: CherryPickRequest): Promise<void> {
    const primaryArgs = ["clone", request.repoUrl, "."];
    const primary = await session.exec(primaryArgs, {
      GIT_ASKPASS: "echo",
      GIT_USERNAME: "token",
      GIT_PASSWORD: request.token,
    });
    if (!primary.failed) {
      return;
    }

    this.logger.warn(`Clone failed, retrying with credential helper: ${session.describeFailure(primaryArgs, primary)}`);

    const { url, host } = stripCredentials(request.repoUrl);
    const username = request.repoUrl.includes("oauth2:") ? "oauth2" : "token";
    await session.must(["clone", url, "."], "CloneFailed", "failed to clone repository", {
      env: {
        GIT_ASKPASS: "echo",
        GIT_TERMINAL_PROMPT: "0",
        GIT_CONFIG_COUNT: "2",
        GIT_CONFIG_KEY_0: `credential.https://${host}.username`,
        GIT_CONFIG_VALUE_0: username,
        GIT_CONFIG_KEY_1: `credential.https://${host}.password`,
        GIT_CONFIG_VALUE_1: request.token,
      },
    });
  }

  private async configureIdentity(session: GitSession): Promise<void> {
    await session.must(["config", "user.email", this.identity.email], "ConfigFailed", "failed to configure git user email");
    await session.must(["config", "user.name", this.identity.name], "ConfigFailed", "failed to configure git user name");
  }

  private async checkoutTarget(session: GitSession, target: string, branch: string): Promise<void> {
    await session.must(["fetch", "origin"], "FetchFailed", "failed to fetch from origin");
    await session.must(["fetch", "origin", target], "FetchFailed", `failed to fetch target branch ${target}`);
    await session.must(
      ["rev-parse", "--verify", `origin/${target}`],
      "FetchFailed",
      `target branch ${target} does not exist on remote`,
    );
    await session.must(
      ["checkout", "-b", branch, `origin/${target}`],
      "CheckoutFailed",
      `failed to checkout new branch ${branch} from ${target}`,
    );
  }

  private async fetchCommit(session: GitSession, commit: string): Promise<void> {
    const direct = await session.exec(["fetch", "origin", commit]);
    if (direct.failed) {
      await session.must(
        ["fetch", "origin", "+refs/*:refs/remotes/origin/*"],
        "FetchFailed",
        `failed to fetch commit ${commit}`,
        { commit },
      );
    }
    await session.must(["rev-parse", "--verify", commit], "FetchFailed", `commit ${commit} not found after fetch`, {
      commit,
    });
  }

  /**
   * Conflict ladder: mainline, plain, then `theirs` and `ours` strategies,
   * then skip when the commit turned out empty.
   */
  private async applyCommit(session: GitSession, commit: string): Promise<void> {
    const mainline = await session.exec(["cherry-pick", "-m", "1", commit]);
    if (!mainline.failed) {
      return;
    }

    const plainArgs = ["cherry-pick", commit];
    const plain = await session.exec(plainArgs);
    if (!plain.failed) {
      return;
    }
    if (!isConflictOutput(plain.output)) {
      throw new CherryPickError(
        "ConflictUnresolvable",
        `failed to cherry-pick commit ${commit}: ${session.describeFailure(plainArgs, plain)}`,
        { commit },
      );
    }

    this.logger.warn(`Cherry-pick conflict for commit ${commit}, attempting automatic resolution`);

    await this.abort(session);
    const theirs = await session.exec(["cherry-pick", "--strategy=recursive", "--strategy-option=theirs", commit]);
    if (!theirs.failed) {
      return;
    }

    await this.abort(session);
    const oursArgs = ["cherry-pick", "--strategy=recursive", "--strategy-option=ours", commit];
    const ours = await session.exec(oursArgs);
    if (!ours.failed) {
      return;
    }

    const failure = session.describeFailure(oursArgs, ours);
    if (!isEmptyCommitOutput(failure)) {
      throw new CherryPickError(
        "ConflictUnresolvable",
        `failed to cherry-pick commit ${commit} with automatic conflict resolution: ${failure}`,
        { commit },
      );
    }

    this.logger.warn(`Cherry-pick of ${commit} is empty, skipping it`);
    await session.must(["cherry-pick", "--skip"], "EmptyCommitSkipFailed", `failed to skip empty commit ${commit}`, {
      commit,
    });
  }

  private async abort(session: GitSession): Promise<void> {
    const args = ["cherry-pick", "--abort"];
    const result = await session.exec(args);
    if (result.failed) {
      this.logger.debug(session.describeFailure(args, result));
    }
  }

  private async push(session: GitSession, branch: string): Promise<void> {
    const pending = await session.exec(["diff-index", "--quiet", "HEAD"]);
    if (pending.failed) {
      this.logger.debug("Working tree differs from HEAD before push");
    }
    await session.must(["push", "-u", "origin", branch], "PushFailed", `failed to push branch ${branch}`);
  }

  private async removeWorkspace(workspace: string): Promise<void> {
    try {
      await rm(workspace, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(`Failed to remove cherry-pick workspace ${workspace}: ${String(error)}`);
    }
  }
}
