import { createNodeMiddleware, createProbot } from "probot";
import type { IncomingMessage, ServerResponse } from "http";
import { z } from "zod";
import { ENV_SETTINGS } from "../../config.js";
import {
  CommandExecutor,
  dispatchComment,
  executionConfigFor,
  InMemoryMetrics,
  toError,
} from "../../lib/commands/index.js";
import type { ExecutionContext, MetricsSnapshot } from "../../lib/commands/index.js";
import { validateEnv, getAppId } from "../../lib/env-validation.js";
import { createProbotLogger, logger as serviceLogger, type ProbotLog } from "../../lib/logger.js";
import { CommentCache } from "../../lib/platform/comment-cache.js";
import { createGitHubPlatform, POST_MERGE_CHERRY_PICK } from "../../lib/platform/github.js";
import { isRepoConfigClient, loadRepositoryConfig } from "../../lib/repo-config.js";
import type { Repository } from "../../lib/types.js";

/**
 * PR Chat-Ops webhook service
 *
 * Runs slash commands from pull request comments:
 * - issue_comment.created on a PR: dispatch the comment under the webhook profile
 * - pull_request.closed when merged: run the scheduled cherry-picks
 *
 * Outcomes are posted on the PR by the commands themselves; the delivery
 * never fails because a command did.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** The parts of an issue_comment payload the service reads */
export interface IssueCommentPayload {
  comment: {
    body: string;
    user: { login: string } | null;
    performed_via_github_app?: { id: number } | null;
  };
  issue: { number: number; pull_request?: object | null };
  repository: Repository;
}

export interface IssueCommentContext {
  payload: IssueCommentPayload;
  octokit: unknown;
  log: ProbotLog;
}

/** The parts of a pull_request.closed payload the service reads */
export interface PullRequestClosedPayload {
  pull_request: { number: number; merged: boolean | null };
  repository: Repository;
  sender: { login: string };
}

export interface PullRequestClosedContext {
  payload: PullRequestClosedPayload;
  octokit: unknown;
  log: ProbotLog;
}

/**
 * Event registration surface of a Probot app. Probot's own instance
 * satisfies it.
 */
export interface WebhookApp {
  on(event: "issue_comment.created", handler: (context: IssueCommentContext) => Promise<void>): void;
  on(event: "pull_request.closed", handler: (context: PullRequestClosedContext) => Promise<void>): void;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/** Commands are only read from comments that start with a slash */
export function isCommandComment(body: string): boolean {
  return body.trimStart().startsWith("/");
}

/** Login the app posts and reviews under, when its slug is configured */
export function getBotLogin(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const slug = env.APP_SLUG?.trim();
  return slug ? `${slug}[bot]` : undefined;
}

const InstallationAuthSchema = z.object({ token: z.string().min(1) });

/**
 * Installation token of Probot's octokit, used by the cherry-pick worker
 * to push. Empty when the client cannot mint one.
 */
export async function getInstallationToken(octokit: unknown): Promise<string> {
  if (typeof octokit !== "object" || octokit === null || !("auth" in octokit) || typeof octokit.auth !== "function") {
    return "";
  }
  const parsed = InstallationAuthSchema.safeParse(await octokit.auth({ type: "installation" }));
  return parsed.success ? parsed.data.token : "";
}

interface DispatchTarget {
  octokit: unknown;
  log: ProbotLog;
  repository: Repository;
  prNumber: number;
  sender: string;
  triggerComment: string;
}

/**
 * Per-delivery execution context: repository settings, installation
 * token and a GitHub platform bound to the PR.
 */
async function createExecutionContext(target: DispatchTarget): Promise<ExecutionContext> {
  const { octokit, repository, prNumber, sender } = target;
  const owner = repository.owner.login;
  const repo = repository.name;
  const logger = createProbotLogger(target.log);

  const [settings, token] = await Promise.all([
    isRepoConfigClient(octokit) ? loadRepositoryConfig(octokit, owner, repo) : Promise.resolve(ENV_SETTINGS),
    getInstallationToken(octokit),
  ]);

  const platform = createGitHubPlatform(octokit, {
    owner,
    repo,
    prNumber,
    sender,
    settings,
    logger,
    token,
    baseUrl: process.env.GITHUB_API_URL,
    botLogin: getBotLogin(),
  });

  return {
    platform,
    logger,
    config: executionConfigFor({ kind: "webhook" }),
    metrics,
    platformName: "github",
    sender,
    triggerComment: target.triggerComment,
    comments: new CommentCache(() => platform.listComments()),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Webhook Handlers
// ─────────────────────────────────────────────────────────────────────────────

/** Command counters and durations since the process started */
export const metrics = new InMemoryMetrics();

/**
 * Run the slash commands of a new PR comment.
 */
export async function handleIssueComment(context: IssueCommentContext): Promise<void> {
  const { issue, comment, repository } = context.payload;
  if (!issue.pull_request || !comment.user || !isCommandComment(comment.body)) {
    return;
  }

  if (comment.performed_via_github_app?.id === getAppId() || comment.user.login === getBotLogin()) {
    return;
  }

  const sender = comment.user.login;
  const ctx = await createExecutionContext({
    octokit: context.octokit,
    log: context.log,
    repository,
    prNumber: issue.number,
    sender,
    triggerComment: comment.body,
  });
  ctx.logger.info(`Processing command from @${sender} on ${repository.full_name}#${issue.number}`);

  const result = await dispatchComment(ctx);
  if (result.error) {
    ctx.logger.error(`Command from @${sender} on ${repository.full_name}#${issue.number} failed`, result.error);
  }
}

/**
 * Run the cherry-picks requested on a PR once it has been merged.
 */
export async function handlePullRequestClosed(context: PullRequestClosedContext): Promise<void> {
  const { pull_request: pr, repository, sender } = context.payload;
  if (!pr.merged) {
    context.log.info(`PR #${pr.number} closed without merge, no cherry-picks to run`);
    return;
  }

  const ctx = await createExecutionContext({
    octokit: context.octokit,
    log: context.log,
    repository,
    prNumber: pr.number,
    sender: sender.login,
    triggerComment: `/${POST_MERGE_CHERRY_PICK}`,
  });
  ctx.logger.info(`Processing merged PR #${pr.number} in ${repository.full_name}`);

  const result = await new CommandExecutor(ctx).execute({
    kind: "builtin",
    command: POST_MERGE_CHERRY_PICK,
    args: [],
    lines: [],
    rawLines: [],
  });
  if (result.error) {
    ctx.logger.error(`Post-merge cherry-picks for ${repository.full_name}#${pr.number} failed`, result.error);
  }
}

export function app(probotApp: WebhookApp): void {
  probotApp.on("issue_comment.created", handleIssueComment);
  probotApp.on("pull_request.closed", handlePullRequestClosed);
}

const probot = createProbot();
const middleware = createNodeMiddleware(app, {
  probot,
  webhooksPath: "/api/github/webhooks",
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Handler
// ─────────────────────────────────────────────────────────────────────────────

export interface HealthStatus {
  status: "ok" | "misconfigured";
  service: "pr-chatops";
  metrics: MetricsSnapshot;
}

/**
 * Health body and status code for the current environment.
 */
export function getHealth(valid: boolean): { statusCode: number; body: HealthStatus } {
  return {
    statusCode: valid ? 200 : 503,
    body: {
      status: valid ? "ok" : "misconfigured",
      service: "pr-chatops",
      metrics: metrics.snapshot(),
    },
  };
}

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}

/**
 * Serverless function handler.
 *
 * GET requests return health status with the command metrics.
 * POST requests are forwarded to Probot middleware for webhook processing.
 *
 * Both validate that the app credentials and WEBHOOK_SECRET are configured.
 * Probot then verifies webhook signatures - unsigned payloads are rejected.
 */
export default function handler(req: IncomingMessage, res: ServerResponse): void {
  const validation = validateEnv(true);

  if (req.method === "GET") {
    const health = getHealth(validation.valid);
    sendJson(res, health.statusCode, health.body);
    return;
  }

  if (!validation.valid) {
    sendJson(res, 503, { error: "Webhook processing unavailable" });
    return;
  }

  middleware(req, res).catch((error: unknown) => {
    serviceLogger.error("Webhook middleware failed", toError(error));
    if (!res.headersSent) {
      sendJson(res, 500, { error: "Webhook processing failed" });
    }
  });
}
