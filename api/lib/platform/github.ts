/**
 * GitHub Platform
 *
 * PlatformFacade for one GitHub pull request. Each comment command maps
 * to a handler that talks to the REST API through PROperations and
 * answers on the PR.
 *
 * Handlers that already explained a failure in a PR comment reject with
 * an AlreadyReportedError so the result recorder stays quiet.
 */

import { MESSAGES, isMergeMethod, type CheckRunStatus, type CommandSettings, type LgtmVoteSummary } from "../../config.js";
import { getCommandSpec, isBuiltInCommand, POST_MERGE_CHERRY_PICK } from "../commands/command-table.js";
import { AlreadyReportedError, CancelledError, CherryPickError, toError } from "../commands/errors.js";
import { formatSummary } from "../commands/recorder.js";
import type { SubCommand, SubCommandResult } from "../commands/types.js";
import { buildRepositoryUrl } from "../cherry-pick/repository-url.js";
import { CherryPickWorker } from "../cherry-pick/worker.js";
import type { Logger } from "../logger.js";
import { createPROperations, type CheckRunInfo, type PROperations, type PullRequestInfo } from "../pr-operations.js";
import { redactSecret } from "../redact.js";
import { getErrorStatus } from "../transient-error.js";
import type { PRRef } from "../types.js";
import { tickAllCheckboxes } from "./checkbox.js";
import { CommentCache } from "./comment-cache.js";
import { collectLgtmVoters, tallyLgtmVotes } from "./lgtm-votes.js";
import type { PlatformComment, PlatformFacade, PRState, RunOptions } from "./types.js";

export { POST_MERGE_CHERRY_PICK };

const SELF_APPROVAL_ERROR = "Can not approve your own pull request";
const PASSING_CONCLUSIONS = new Set(["success", "skipped", "neutral"]);
const CHERRY_PICK_LINE = /^\/(?:cherry-pick|cherrypick)\s+(\S+)/;

export interface GitHubPlatformOptions {
  owner: string;
  repo: string;
  prNumber: number;
  /** Login of the comment author the commands run for */
  sender: string;
  settings: CommandSettings;
  logger: Logger;
  /** Token for the cherry-pick clone; also redacted from failure comments */
  token: string;
  /** REST API base URL, used to find the git host */
  baseUrl?: string;
  /** Login the app posts as; its approvals are the ones /remove-lgtm dismisses */
  botLogin?: string;
  /** Count the PR author's own votes and allow self-approval */
  debug?: boolean;
  worker?: CherryPickRunner;
}

export type CherryPickRunner = Pick<CherryPickWorker, "run">;

type CommandHandler = (args: readonly string[], options: RunOptions) => Promise<void>;

// ───────────────────────────────────────────────────────────────────────────────
// Helpers
// ───────────────────────────────────────────────────────────────────────────────

export function isSelfCheck(name: string, selfCheckName: string): boolean {
  return name === selfCheckName || name.endsWith(`/ ${selfCheckName}`);
}

/**
 * Check runs that block a merge: completed without a passing conclusion,
 * or still running (this tool's own check excepted).
 */
export function findFailingChecks(runs: readonly CheckRunInfo[], selfCheckName: string): CheckRunInfo[] {
  return runs.filter((run) => {
    if (run.status === "completed") {
      return !PASSING_CONCLUSIONS.has(run.conclusion ?? "");
    }
    return !isSelfCheck(run.name, selfCheckName);
  });
}

/**
 * Split `/batch` arguments into sub-commands. Every token starting with
 * `/` opens a new command; tokens before the first one are dropped.
 */
export function splitBatchArgs(args: readonly string[]): SubCommand[] {
  const commands: SubCommand[] = [];
  for (const token of args) {
    if (token.startsWith("/")) {
      commands.push({ command: token.slice(1).toLowerCase(), args: [] });
    } else {
      commands[commands.length - 1]?.args.push(token);
    }
  }
  return commands.filter((sub) => sub.command.length > 0);
}

/**
 * Target branches named by `/cherry-pick <branch>` lines, first mention first.
 */
export function findCherryPickBranches(comments: readonly PlatformComment[]): string[] {
  const branches = new Set<string>();
  for (const comment of comments) {
    for (const line of comment.body.split("\n")) {
      const match = CHERRY_PICK_LINE.exec(line.trim());
      if (match?.[1]) {
        branches.add(match[1]);
      }
    }
  }
  return [...branches];
}

function isCancellation(error: unknown): boolean {
  return error instanceof CancelledError || (error instanceof CherryPickError && error.reason === "Cancelled");
}

const toCheckStatus = (run: CheckRunInfo): CheckRunStatus => ({
  name: run.name,
  status: run.status,
  conclusion: run.conclusion,
  url: run.url,
});

const stripMention = (user: string): string => user.replace(/^@/, "").trim();

export function createGitHubPlatform(octokit: unknown, options: GitHubPlatformOptions): GitHubPlatform {
  return new GitHubPlatform(createPROperations(octokit), options);
}

// ───────────────────────────────────────────────────────────────────────────────
// Platform
// ───────────────────────────────────────────────────────────────────────────────

export class GitHubPlatform implements PlatformFacade {
  private readonly ref: PRRef;
  private readonly logger: Logger;
  private readonly settings: CommandSettings;
  private readonly worker: CherryPickRunner;
  private readonly handlers: ReadonlyMap<string, CommandHandler>;
  private readonly permissions = new Map<string, Promise<string>>();

  constructor(
    private readonly ops: PROperations,
    private readonly options: GitHubPlatformOptions,
  ) {
    this.ref = { owner: options.owner, repo: options.repo, prNumber: options.prNumber };
    this.logger = options.logger;
    this.settings = options.settings;
    this.worker = options.worker ?? new CherryPickWorker({ logger: options.logger });

    this.handlers = new Map<string, CommandHandler>([
      ["help", () => this.postComment(MESSAGES.help(this.settings))],
      ["assign", (args) => this.assign(args)],
      ["unassign", (args) => this.unassign(args)],
      ["label", (args) => this.label(args)],
      ["unlabel", (args) => this.unlabel(args)],
      ["close", () => this.close()],
      ["rebase", () => this.rebase()],
      ["lgtm", (_args, opts) => this.lgtm(opts)],
      ["remove-lgtm", (_args, opts) => this.removeLgtm(opts)],
      ["merge", (args, opts) => this.merge(args, opts)],
      ["ready", (args, opts) => this.merge(args, opts)],
      ["check", () => this.check()],
      ["retest", () => this.retest()],
      ["batch", (args, opts) => this.batch(args, opts)],
      ["checkbox", () => this.checkbox()],
      ["checkbox-issue", (args) => this.checkboxIssue(args)],
      ["cherry-pick", (args, opts) => this.cherryPick(args, opts)],
      ["cherrypick", (args, opts) => this.cherryPick(args, opts)],
      [POST_MERGE_CHERRY_PICK, (_args, opts) => this.postMergeCherryPick(opts)],
    ]);
  }

  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<void> {
    const handler = this.handlers.get(command);
    if (!handler) {
      throw new Error(
        isBuiltInCommand(command) ? `unknown built-in command: ${command}` : `unknown command: ${command}`,
      );
    }
    this.logger.info(`Executing /${command} on ${this.describe()}`);
    await handler(args, { ...options, comments: options.comments ?? this.newCommentCache() });
  }

  async postComment(body: string): Promise<void> {
    await this.ops.comment(this.ref, body);
  }

  async checkPRState(expected: PRState): Promise<void> {
    const pr = await this.ops.get(this.ref);
    if (pr.state !== expected) {
      throw new Error(`PR #${pr.number} is ${pr.state}, expected ${expected}`);
    }
  }

  async listComments(): Promise<PlatformComment[]> {
    const comments = await this.ops.listComments(this.ref);
    return comments.map(({ author, body }) => ({ author, body }));
  }

  private describe(): string {
    return `${this.ref.owner}/${this.ref.repo}#${this.ref.prNumber}`;
  }

  private newCommentCache(): CommentCache {
    return new CommentCache(() => this.listComments());
  }

  /**
   * Post `body`, then fail without asking the recorder to post again.
   */
  private async report(body: string, message: string): Promise<never> {
    await this.postComment(body);
    throw new AlreadyReportedError(new Error(message));
  }

  private async usage(command: string): Promise<never> {
    const usage = getCommandSpec(command)?.usage ?? `/${command}`;
    return this.report(MESSAGES.usage(usage), `invalid usage of /${command}`);
  }

  // ── Permissions ──

  /**
   * Repository permission of `login`; users who are not collaborators
   * have none. Cached per platform instance.
   */
  private permissionOf(login: string): Promise<string> {
    const key = login.toLowerCase();
    let pending = this.permissions.get(key);
    if (!pending) {
      pending = this.ops.getPermission(this.ref.owner, this.ref.repo, login).catch((error: unknown) => {
        if (getErrorStatus(error) === 404) {
          return "none";
        }
        this.permissions.delete(key);
        throw error;
      });
      this.permissions.set(key, pending);
    }
    return pending;
  }

  private async senderPermission(): Promise<{ permission: string; allowed: boolean }> {
    const permission = await this.permissionOf(this.options.sender);
    return { permission, allowed: this.settings.lgtmPermissions.some((allowed) => allowed === permission) };
  }

  private isAuthor(pr: PullRequestInfo): boolean {
    return pr.author.toLowerCase() === this.options.sender.toLowerCase();
  }

  private async countVotes(
    comments: CommentCache,
    prAuthor: string,
    ignoreLastRemovalBy?: string,
  ): Promise<LgtmVoteSummary> {
    const voters = collectLgtmVoters(await comments.get(), {
      prAuthor,
      includeAuthor: this.options.debug,
      ignoreLastRemovalBy,
    });
    return tallyLgtmVotes(
      voters,
      (login) => this.permissionOf(login),
      this.settings.lgtmPermissions,
      this.settings.lgtmThreshold,
    );
  }

  private requireComments(options: RunOptions): CommentCache {
    return options.comments ?? this.newCommentCache();
  }

  // ── Assignment & labels ──

  private async assign(args: readonly string[]): Promise<void> {
    const users = args.map(stripMention).filter(Boolean);
    if (users.length === 0) return this.usage("assign");
    await this.ops.addAssignees(this.ref, users);
    await this.postComment(MESSAGES.assigned(users, this.options.sender));
  }

  private async unassign(args: readonly string[]): Promise<void> {
    const users = args.map(stripMention).filter(Boolean);
    if (users.length === 0) return this.usage("unassign");
    await this.ops.removeAssignees(this.ref, users);
    await this.postComment(MESSAGES.unassigned(users));
  }

  private async label(args: readonly string[]): Promise<void> {
    if (args.length === 0) return this.usage("label");
    await this.ops.addLabels(this.ref, [...args]);
    await this.postComment(MESSAGES.labelsAdded(args, this.options.sender));
  }

  private async unlabel(args: readonly string[]): Promise<void> {
    if (args.length === 0) return this.usage("unlabel");
    for (const label of args) {
      await this.ops.removeLabel(this.ref, label);
    }
    await this.postComment(MESSAGES.labelsRemoved(args, this.options.sender));
  }

  // ── PR lifecycle ──

  private async close(): Promise<void> {
    const pr = await this.ops.get(this.ref);
    if (pr.state === "closed") {
      return this.report(MESSAGES.alreadyClosed(pr.number), `PR #${pr.number} is already closed`);
    }
    await this.ops.close(this.ref);
    await this.postComment(MESSAGES.closeSuccess(pr.number, this.options.sender));
  }

  private async rebase(): Promise<void> {
    try {
      await this.ops.updateBranch(this.ref);
    } catch (error) {
      const cause = toError(error);
      this.logger.error(`Failed to update branch of ${this.describe()}`, cause);
      await this.postComment(MESSAGES.rebaseFailed(redactSecret(cause.message, this.options.token)));
      throw new AlreadyReportedError(cause);
    }
    await this.postComment(MESSAGES.rebaseSuccess);
  }

  // ── LGTM ──

  private async lgtm(options: RunOptions): Promise<void> {
    const { permission, allowed } = await this.senderPermission();
    if (!allowed) {
      return this.report(
        MESSAGES.lgtmPermissionDenied(this.options.sender, permission, this.settings.lgtmPermissions),
        `${this.options.sender} lacks permission to approve`,
      );
    }

    const pr = await this.ops.get(this.ref);
    if (this.isAuthor(pr) && !this.options.debug) {
      await this.postComment(MESSAGES.lgtmSelfApproval(this.options.sender));
      return;
    }

    const summary = await this.countVotes(this.requireComments(options), pr.author);
    if (summary.voters.size < summary.threshold) {
      await this.postComment(MESSAGES.lgtmPending(summary, this.settings.lgtmPermissions));
      return;
    }

    const body = MESSAGES.lgtmReady(summary);
    try {
      await this.ops.approve(this.ref, body);
      this.logger.info(`Approved ${this.describe()} with ${summary.voters.size} LGTM vote(s)`);
    } catch (error) {
      if (!toError(error).message.includes(SELF_APPROVAL_ERROR)) {
        throw error;
      }
      // GitHub refuses approvals made with the PR author's own token
      await this.postComment(body);
    }
  }

  private async removeLgtm(options: RunOptions): Promise<void> {
    const { sender } = this.options;
    const { permission, allowed } = await this.senderPermission();
    if (!allowed) {
      return this.report(
        MESSAGES.removeLgtmPermissionDenied(sender, permission, this.settings.lgtmPermissions),
        `${sender} lacks permission to dismiss approvals`,
      );
    }

    const pr = await this.ops.get(this.ref);
    const comments = this.requireComments(options);
    const before = await this.countVotes(comments, pr.author, sender);
    const hadVote = [...before.voters.keys()].some((login) => login.toLowerCase() === sender.toLowerCase());

    if (!hadVote) {
      await this.postComment(MESSAGES.removeLgtmNoApproval(sender));
      return;
    }

    if (before.voters.size >= before.threshold && before.voters.size - 1 < before.threshold) {
      await this.dismissApprovals(MESSAGES.removeLgtmDismissed(sender));
    } else {
      this.logger.info(`Removing the vote of ${sender} does not change the approval of ${this.describe()}`);
    }

    const after = await this.countVotes(comments, pr.author);
    await this.postComment(MESSAGES.removeLgtmStatus(sender, after));
  }

  private async dismissApprovals(message: string): Promise<void> {
    const botLogin = this.options.botLogin?.toLowerCase();
    const reviews = await this.ops.listReviews(this.ref);
    const approvals = reviews.filter(
      (review) =>
        review.state === "APPROVED" && (botLogin ? review.author.toLowerCase() === botLogin : review.isBot),
    );
    if (approvals.length === 0) {
      this.logger.debug(`No approval review to dismiss on ${this.describe()}`);
      return;
    }
    for (const review of approvals) {
      await this.ops.dismissReview(this.ref, review.id, message);
    }
  }

  // ── Merge ──

  private async merge(args: readonly string[], options: RunOptions): Promise<void> {
    const requested = args[0]?.toLowerCase();
    if (requested !== undefined && !isMergeMethod(requested)) {
      return this.usage("merge");
    }
    const method = requested ?? this.settings.mergeMethod;

    const pr = await this.ops.get(this.ref);
    const { permission, allowed } = await this.senderPermission();
    if (!allowed && !this.isAuthor(pr)) {
      return this.report(
        MESSAGES.mergeInsufficientPermissions(this.options.sender, permission, this.settings.lgtmPermissions, pr.author),
        `${this.options.sender} may not merge ${this.describe()}`,
      );
    }

    const runs = await this.ops.getCheckRunsForRef(this.ref.owner, this.ref.repo, pr.headSha);
    const failing = findFailingChecks(runs, this.settings.selfCheckName);
    if (failing.length > 0) {
      return this.report(
        MESSAGES.mergeChecksNotPassing(failing.map(toCheckStatus)),
        `${failing.length} check(s) not passing`,
      );
    }

    const summary = await this.countVotes(this.requireComments(options), pr.author);
    if (summary.voters.size < summary.threshold) {
      return this.report(
        MESSAGES.mergeNotEnoughLgtm(summary.voters.size, summary.threshold),
        `not enough LGTM votes (${summary.voters.size}/${summary.threshold})`,
      );
    }

    await this.ops.merge(this.ref, method);
    this.logger.info(`Merged ${this.describe()} using ${method}`);
    await this.postComment(MESSAGES.mergeSuccess(method, this.options.sender, summary));
  }

  // ── Checks ──

  private async check(): Promise<void> {
    const pr = await this.ops.get(this.ref);
    const runs = await this.ops.getCheckRunsForRef(this.ref.owner, this.ref.repo, pr.headSha);
    const failing = findFailingChecks(runs, this.settings.selfCheckName);
    await this.postComment(
      failing.length === 0 ? MESSAGES.checkRunsPassing : MESSAGES.checkRunsFailing(failing.map(toCheckStatus)),
    );
  }

  private async retest(): Promise<void> {
    const pr = await this.ops.get(this.ref);
    const runs = await this.ops.getCheckRunsForRef(this.ref.owner, this.ref.repo, pr.headSha);
    const rerun = findFailingChecks(runs, this.settings.selfCheckName).filter(
      (run) => run.status === "completed" && !isSelfCheck(run.name, this.settings.selfCheckName),
    );
    if (rerun.length === 0) {
      await this.postComment(MESSAGES.retestNothingFailed);
      return;
    }
    for (const run of rerun) {
      await this.ops.rerequestCheckRun(this.ref.owner, this.ref.repo, run.id);
    }
    await this.postComment(MESSAGES.retestTriggered(rerun.map((run) => run.name)));
  }

  // ── Batch ──

  private async batch(args: readonly string[], options: RunOptions): Promise<void> {
    const commands = splitBatchArgs(args);
    if (commands.length === 0) return this.usage("batch");

    const results: SubCommandResult[] = [];
    for (const sub of commands) {
      if (options.signal?.aborted) {
        throw new CancelledError();
      }
      if (isBuiltInCommand(sub.command) || getCommandSpec(sub.command)?.allowedInBatch === false) {
        results.push({ ...sub, success: false, error: new Error(MESSAGES.batchRejected(sub.command)) });
        continue;
      }
      try {
        await this.run(sub.command, sub.args, options);
        results.push({ ...sub, success: true });
      } catch (error) {
        if (isCancellation(error)) throw error;
        results.push({ ...sub, success: false, error: toError(error) });
      }
    }

    if (options.signal?.aborted) {
      throw new CancelledError();
    }
    await this.postComment(formatSummary(results, MESSAGES.batchHeader));
    const failed = results.filter((result) => !result.success).length;
    if (failed > 0) {
      throw new AlreadyReportedError(new Error(`${failed} of ${results.length} batch command(s) failed`));
    }
  }

  // ── Checkboxes ──

  private async checkbox(): Promise<void> {
    const pr = await this.ops.get(this.ref);
    const { text, count } = tickAllCheckboxes(pr.body);
    if (count === 0) {
      return this.report(MESSAGES.checkboxNoneFound, "no unchecked checkboxes in the PR description");
    }
    await this.ops.updateBody(this.ref, text);
    await this.postComment(MESSAGES.checkboxUpdated(count));
  }

  private async checkboxIssue(args: readonly string[]): Promise<void> {
    const [title, author] = args;
    if (!title) return this.usage("checkbox-issue");

    const issue = await this.ops.findOpenIssue(this.ref.owner, this.ref.repo, title, author);
    if (!issue) {
      return this.report(MESSAGES.checkboxIssueNotFound(title), `no open issue titled "${title}"`);
    }
    const { text, count } = tickAllCheckboxes(issue.body);
    if (count === 0) {
      return this.report(
        MESSAGES.checkboxIssueNoneFound(issue.number),
        `no unchecked checkboxes in issue #${issue.number}`,
      );
    }
    await this.ops.updateIssueBody(this.ref.owner, this.ref.repo, issue.number, text);
    await this.postComment(MESSAGES.checkboxIssueUpdated(issue.number, count));
  }

  // ── Cherry-pick ──

  private async cherryPick(args: readonly string[], options: RunOptions): Promise<void> {
    const branch = args[0];
    if (!branch) {
      return this.report(MESSAGES.cherryPickUsage, "cherry-pick needs a target branch");
    }

    const pr = await this.ops.get(this.ref);
    const { permission, allowed } = await this.senderPermission();
    if (!allowed && !this.isAuthor(pr)) {
      return this.report(
        MESSAGES.cherryPickInsufficientPermissions(
          this.options.sender,
          permission,
          this.settings.lgtmPermissions,
          pr.author,
        ),
        `${this.options.sender} may not cherry-pick ${this.describe()}`,
      );
    }

    if (pr.state === "open") {
      await this.postComment(MESSAGES.cherryPickScheduled(branch));
      return;
    }
    await this.performCherryPick(pr, branch, options.signal);
  }

  private async postMergeCherryPick(options: RunOptions): Promise<void> {
    const pr = await this.ops.get(this.ref);
    if (pr.state === "open") {
      this.logger.info(`${this.describe()} is still open, skipping post-merge cherry-picks`);
      return;
    }

    const branches = findCherryPickBranches(await this.requireComments(options).get());
    for (const branch of branches) {
      this.logger.info(`Performing cherry-pick to branch: ${branch}`);
      try {
        await this.performCherryPick(pr, branch, options.signal);
      } catch (error) {
        if (isCancellation(error)) throw error;
        this.logger.warn(`Cherry-pick to ${branch} failed: ${toError(error).message}`);
      }
    }
  }

  private async performCherryPick(pr: PullRequestInfo, branch: string, signal?: AbortSignal): Promise<void> {
    const { owner, repo, prNumber } = this.ref;
    const { sender, token } = this.options;

    let created: { number: number; url: string };
    let lastSha: string;
    try {
      const commits = await this.ops.listCommitShas(this.ref);
      lastSha = commits[commits.length - 1] ?? "";
      if (!lastSha) {
        throw new Error("No commits found in PR");
      }
      const head = await this.worker.run(
        {
          repoUrl: buildRepositoryUrl({ platform: "github", token, owner, repo, baseUrl: this.options.baseUrl }),
          token,
          owner,
          repo,
          prNumber,
          targetBranch: branch,
          commits,
        },
        signal,
      );
      created = await this.ops.createPullRequest(owner, repo, {
        title: MESSAGES.cherryPickPRTitle(pr.title),
        head,
        base: branch,
        body: MESSAGES.cherryPickPRBody(prNumber, branch, sender),
      });
    } catch (error) {
      if (isCancellation(error)) throw error;
      const cause = toError(error);
      this.logger.error(`Cherry-pick of ${this.describe()} to ${branch} failed`, cause);
      await this.postComment(MESSAGES.cherryPickFailed(prNumber, branch, sender, redactSecret(cause.message, token)));
      throw new AlreadyReportedError(cause);
    }

    this.logger.info(`Created cherry-pick PR #${created.number} for ${this.describe()}`);
    await this.postComment(
      MESSAGES.cherryPickSuccess({ prNumber, branch, newPrNumber: created.number, user: sender, sha: lastSha }),
    );
  }
}
