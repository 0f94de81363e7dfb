/**
 * pr-cli
 *
 * One-shot command runner for CI pipelines: takes a PR comment (the
 * trigger comment) and its author, runs the command on the pull request
 * and reports back on the PR.
 *
 * Every flag falls back to an environment variable, so a workflow can
 * pass the event payload through env alone:
 *
 *   PR_CLI_TOKEN=... PR_CLI_OWNER=octo PR_CLI_REPO=widgets PR_CLI_PR_NUM=42 \
 *   PR_CLI_COMMENT_SENDER=alice PR_CLI_TRIGGER_COMMENT="/lgtm" pr-cli
 *
 * Exit code 1 means the command failed; the reason is on stderr.
 */

import { Command, Option } from "commander";
import { Octokit } from "octokit";
import { loadSettingsFromEnv, parseBooleanFlag, type CommandSettings } from "../api/config.js";
import { dispatchComment, executionConfigFor, noopMetrics, type ExecutionResult } from "../api/lib/commands/index.js";
import { getCliTarget, type CliInputs, type CliTarget } from "../api/lib/env-validation.js";
import { createLogger, type Logger } from "../api/lib/logger.js";
import { CommentCache } from "../api/lib/platform/comment-cache.js";
import { createGitHubPlatform, type CherryPickRunner } from "../api/lib/platform/github.js";
import { redactSecret } from "../api/lib/redact.js";
import { runIfMain } from "./shared/run-main.js";

export interface CliOptions extends CliInputs {
  platform: string;
  baseUrl?: string;
  debug?: boolean;
  lgtmThreshold?: string;
  lgtmPermissions?: string;
  mergeMethod?: string;
  selfCheckName?: string;
}

/**
 * Collaborators a run needs; tests replace them.
 */
export interface CliDeps {
  createOctokit?: (token: string, baseUrl: string | undefined) => unknown;
  logger?: Logger;
  worker?: CherryPickRunner;
  writeError?: (line: string) => void;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
}

export function buildProgram(): Command {
  return new Command("pr-cli")
    .description("Run a pull request comment command (/lgtm, /merge, /cherry-pick, ...)")
    .addOption(new Option("--token <token>", "API token").env("PR_CLI_TOKEN"))
    .addOption(new Option("--owner <owner>", "repository owner").env("PR_CLI_OWNER"))
    .addOption(new Option("--repo <repo>", "repository name").env("PR_CLI_REPO"))
    .addOption(new Option("--pr-num <number>", "pull request number").env("PR_CLI_PR_NUM"))
    .addOption(new Option("--comment-sender <login>", "author of the trigger comment").env("PR_CLI_COMMENT_SENDER"))
    .addOption(new Option("--trigger-comment <body>", "the comment to run").env("PR_CLI_TRIGGER_COMMENT"))
    .addOption(
      new Option("--platform <name>", "hosting platform").choices(["github"]).default("github").env("PR_CLI_PLATFORM"),
    )
    .addOption(new Option("--base-url <url>", "REST API base URL").env("GITHUB_API_URL"))
    .addOption(new Option("--debug", "count the author's own votes (env: PR_CLI_DEBUG=true|1)"))
    .addOption(new Option("--lgtm-threshold <n>", "LGTM votes needed to approve").env("PR_CLI_LGTM_THRESHOLD"))
    .addOption(
      new Option("--lgtm-permissions <list>", "comma-separated permissions whose votes count").env(
        "PR_CLI_LGTM_PERMISSIONS",
      ),
    )
    .addOption(
      new Option("--merge-method <method>", "default merge method").choices(["merge", "squash", "rebase"]).env(
        "PR_CLI_MERGE_METHOD",
      ),
    )
    .addOption(new Option("--self-check-name <name>", "check run /retest never re-runs").env("PR_CLI_SELF_CHECK_NAME"))
    .showHelpAfterError();
}

/**
 * Command settings from the flags, with the env fallbacks already applied
 * by commander.
 */
export function settingsFromOptions(options: CliOptions): CommandSettings {
  return loadSettingsFromEnv({
    PR_CLI_LGTM_THRESHOLD: options.lgtmThreshold,
    PR_CLI_LGTM_PERMISSIONS: options.lgtmPermissions,
    PR_CLI_MERGE_METHOD: options.mergeMethod,
    PR_CLI_SELF_CHECK_NAME: options.selfCheckName,
  });
}

const defaultOctokit = (token: string, baseUrl: string | undefined): unknown =>
  new Octokit(baseUrl ? { auth: token, baseUrl } : { auth: token });

/**
 * Run one dispatch for the parsed options.
 *
 * @returns the process exit code
 */
export async function runCli(options: CliOptions, deps: CliDeps = {}): Promise<number> {
  const writeError = deps.writeError ?? ((line: string) => process.stderr.write(`${line}\n`));
  const logger = deps.logger ?? createLogger();

  let target: CliTarget;
  try {
    target = getCliTarget(options);
  } catch (error) {
    writeError(`error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  const debug = options.debug === true || parseBooleanFlag((deps.env ?? process.env).PR_CLI_DEBUG);
  const settings = settingsFromOptions(options);
  const octokit = (deps.createOctokit ?? defaultOctokit)(target.token, options.baseUrl);

  const platform = createGitHubPlatform(octokit, {
    owner: target.owner,
    repo: target.repo,
    prNumber: target.prNumber,
    sender: target.commentSender,
    settings,
    logger,
    token: target.token,
    baseUrl: options.baseUrl,
    debug,
    worker: deps.worker,
  });

  logger.group(`${target.owner}/${target.repo}#${target.prNumber}: ${target.triggerComment.split("\n")[0] ?? ""}`);
  let result: ExecutionResult;
  try {
    result = await dispatchComment({
      platform,
      logger,
      config: executionConfigFor({ kind: "cli", debug }),
      metrics: noopMetrics,
      platformName: options.platform,
      sender: target.commentSender,
      triggerComment: target.triggerComment,
      comments: new CommentCache(() => platform.listComments()),
      signal: deps.signal,
    });
  } finally {
    logger.groupEnd();
  }

  if (result.error) {
    writeError(`command failed: ${redactSecret(result.error.message, target.token)}`);
    return 1;
  }
  return 0;
}

async function main(): Promise<number> {
  const program = buildProgram();
  program.parse(process.argv);

  const controller = new AbortController();
  const abort = () => controller.abort();
  process.once("SIGINT", abort);
  process.once("SIGTERM", abort);
  try {
    return await runCli(program.opts<CliOptions>(), { signal: controller.signal });
  } finally {
    process.off("SIGINT", abort);
    process.off("SIGTERM", abort);
  }
}

runIfMain(import.meta.url, main);
