/**
 * PR Chat-Ops Configuration
 *
 * Shared configuration for the webhook service and the pr-cli script.
 */

import { COMMAND_TABLE } from "./lib/commands/command-table.js";

// ───────────────────────────────────────────────────────────────────────────────
// Configuration Boundaries
// ───────────────────────────────────────────────────────────────────────────────

/**
 * Configuration boundaries for all tunable settings.
 * Used by both env-var parsing (global defaults) and repo-config parsing (per-repo overrides).
 */
export const CONFIG_BOUNDS = {
  lgtmThreshold: {
    min: 1,
    max: 10,
    default: 1,
  },
  lgtmPermissions: {
    maxEntries: 5,
  },
  selfCheckName: {
    maxLength: 100,
  },
} as const;

export const REPO_PERMISSIONS = ["admin", "maintain", "write", "triage", "read"] as const;
export type RepoPermission = (typeof REPO_PERMISSIONS)[number];

export const MERGE_METHODS = ["merge", "squash", "rebase"] as const;
export type MergeMethod = (typeof MERGE_METHODS)[number];

export type PlatformName = "github" | "gitlab";

/**
 * Settings the command handlers read.
 */
export interface CommandSettings {
  lgtmThreshold: number;
  lgtmPermissions: RepoPermission[];
  mergeMethod: MergeMethod;
  /** Check run reported by this tool itself; never re-run by /retest */
  selfCheckName: string;
}

export const DEFAULT_SETTINGS: Readonly<CommandSettings> = Object.freeze<CommandSettings>({
  lgtmThreshold: CONFIG_BOUNDS.lgtmThreshold.default,
  lgtmPermissions: ["admin", "write"],
  mergeMethod: "rebase",
  selfCheckName: "pr-cli",
});

// ───────────────────────────────────────────────────────────────────────────────
// Environment Parsing
// ───────────────────────────────────────────────────────────────────────────────

/**
 * Parse the LGTM threshold, clamped to its bounds.
 */
export const parseLgtmThreshold = (value: string | undefined): number => {
  const parsed = parseInt(value ?? "", 10);
  if (Number.isNaN(parsed)) {
    return CONFIG_BOUNDS.lgtmThreshold.default;
  }
  return Math.max(CONFIG_BOUNDS.lgtmThreshold.min, Math.min(CONFIG_BOUNDS.lgtmThreshold.max, parsed));
};

export const isRepoPermission = (value: string): value is RepoPermission =>
  REPO_PERMISSIONS.some((permission) => permission === value);

export const isMergeMethod = (value: string): value is MergeMethod =>
  MERGE_METHODS.some((method) => method === value);

/**
 * Parse a comma-separated permission list. Unknown entries are dropped;
 * an empty result falls back to the default list.
 */
export const parseLgtmPermissions = (value: string | undefined): RepoPermission[] => {
  const permissions = (value ?? "")
    .split(",")
    .map((entry) => entry.trim().toLowerCase())
    .filter(isRepoPermission);
  const unique = [...new Set(permissions)].slice(0, CONFIG_BOUNDS.lgtmPermissions.maxEntries);
  return unique.length > 0 ? unique : [...DEFAULT_SETTINGS.lgtmPermissions];
};

export const parseMergeMethod = (value: string | undefined): MergeMethod => {
  const method = value?.trim().toLowerCase() ?? "";
  return isMergeMethod(method) ? method : DEFAULT_SETTINGS.mergeMethod;
};

const parseSelfCheckName = (value: string | undefined): string => {
  const name = value?.trim() ?? "";
  if (!name || name.length > CONFIG_BOUNDS.selfCheckName.maxLength) {
    return DEFAULT_SETTINGS.selfCheckName;
  }
  return name;
};

/**
 * Parse a boolean switch. Only "true" and "1" turn it on.
 */
export const parseBooleanFlag = (value: string | undefined): boolean => {
  const flag = value?.trim().toLowerCase() ?? "";
  return flag === "true" || flag === "1";
};

/**
 * Build command settings from environment variables.
 */
export const loadSettingsFromEnv = (env: NodeJS.ProcessEnv = process.env): CommandSettings => ({
  lgtmThreshold: parseLgtmThreshold(env.PR_CLI_LGTM_THRESHOLD),
  lgtmPermissions: parseLgtmPermissions(env.PR_CLI_LGTM_PERMISSIONS),
  mergeMethod: parseMergeMethod(env.PR_CLI_MERGE_METHOD),
  selfCheckName: parseSelfCheckName(env.PR_CLI_SELF_CHECK_NAME),
});

export const ENV_SETTINGS: Readonly<CommandSettings> = Object.freeze(loadSettingsFromEnv());

// ───────────────────────────────────────────────────────────────────────────────
// Git Identity & Repository Config
// ───────────────────────────────────────────────────────────────────────────────

export const DEFAULT_GIT_EMAIL_DOMAIN = "pr-cli.local";

export interface GitIdentity {
  name: string;
  email: string;
}

/**
 * Identity used for commits created by the cherry-pick worker.
 */
export const gitIdentityFor = (domain: string | undefined): GitIdentity => ({
  name: "PR CLI Bot",
  email: `pr-cli@${domain?.trim() || DEFAULT_GIT_EMAIL_DOMAIN}`,
});

export const GIT_IDENTITY: Readonly<GitIdentity> = Object.freeze(
  gitIdentityFor(process.env.PR_CLI_GIT_EMAIL_DOMAIN),
);

/** Repository file holding per-repo overrides */
export const REPO_CONFIG_PATH = ".github/pr-cli.yml";

// ───────────────────────────────────────────────────────────────────────────────
// Message Templates
// ───────────────────────────────────────────────────────────────────────────────

const mention = (user: string): string => (user.startsWith("@") ? user : `@${user}`);

const formatPermissions = (permissions: readonly string[]): string => permissions.join(", ");

export interface LgtmVoteSummary {
  /** Valid votes, as user → permission */
  voters: Map<string, string>;
  threshold: number;
}

const formatVoters = (voters: Map<string, string>): string => {
  if (voters.size === 0) {
    return "_No valid LGTM votes yet._";
  }
  const rows = [...voters].map(([user, permission]) => `| @${user} | \`${permission}\` | ✅ |`);
  return ["| User | Permission | Valid |", "|------|------------|-------|", ...rows].join("\n");
};

export interface CheckRunStatus {
  name: string;
  status: string;
  conclusion: string | null;
  url?: string | null;
}

const formatCheckRows = (checks: readonly CheckRunStatus[]): string =>
  checks
    .map((check) => {
      const name = check.url ? `[${check.name}](${check.url})` : check.name;
      return `| ${name} | ${check.conclusion ?? check.status} |`;
    })
    .join("\n");

export const MESSAGES = {
  help: (settings: CommandSettings) => {
    const rows = COMMAND_TABLE.map(
      (spec) => `| **${spec.keyword}** | \`${spec.usage}\` | ${spec.description} |`,
    );
    return [
      "## 🤖 PR CLI Commands",
      "",
      "Available commands for managing this Pull Request:",
      "",
      "| Command | Usage | Description |",
      "|---------|-------|-------------|",
      ...rows,
      "",
      "Several commands can be given at once, one per line. `/batch` runs several commands from one line; it does not accept `/batch`, `/lgtm` or `/remove-lgtm`.",
      "",
      "### ⚙️ Configuration",
      `- **LGTM Threshold:** ${settings.lgtmThreshold} approval(s) required`,
      `- **Required Permissions:** ${formatPermissions(settings.lgtmPermissions)}`,
      `- **Default Merge Method:** ${settings.mergeMethod}`,
    ].join("\n");
  },

  commandFailed: (command: string, error: string, transient: boolean) =>
    [
      "❌ **Command Failed**",
      "",
      `Command: \`${command}\``,
      `Error: ${error}`,
      "",
      transient
        ? "This looks like a temporary platform problem. Please retry the command shortly."
        : "Please check the command usage or contact support if the issue persists.",
    ].join("\n"),

  usage: (usage: string) => `❌ **Invalid command usage**\n\nUsage: \`${usage}\``,

  // ── LGTM ──

  lgtmPermissionDenied: (user: string, permission: string, required: readonly string[]) => `❌ **LGTM Permission Denied**

${mention(user)}, you don't have sufficient permissions to approve this PR.

**Your permission:** \`${permission}\`
**Required permissions:** ${formatPermissions(required)}

Only users with the required permissions can use the /lgtm command.`,

  lgtmSelfApproval: (user: string) => `ℹ️ **Self-approval not allowed**

${mention(user)}, as the PR author, you cannot approve your own PR.`,

  lgtmReady: (summary: LgtmVoteSummary) => `✅ **LGTM Status - Ready to Merge**

This PR has received **${summary.voters.size}/${summary.threshold}** valid LGTM approvals and meets the approval threshold.

**LGTM Summary:**
${formatVoters(summary.voters)}`,

  lgtmPending: (summary: LgtmVoteSummary, required: readonly string[]) => `⏳ **LGTM Status**

This PR currently has **${summary.voters.size}/${summary.threshold}** valid LGTM approvals. **${summary.threshold - summary.voters.size} more approval(s) needed** to meet the threshold.

**Current LGTM Votes:**
${formatVoters(summary.voters)}

**Required permissions:** ${formatPermissions(required)}

> **Tip:** Use \`/lgtm\` to approve this PR if you have the required permissions.`,

  removeLgtmPermissionDenied: (user: string, permission: string, required: readonly string[]) => `❌ **Remove LGTM Permission Denied**

${mention(user)}, you don't have sufficient permissions to dismiss approvals on this PR.

**Your permission:** \`${permission}\`
**Required permissions:** ${formatPermissions(required)}`,

  removeLgtmNoApproval: (user: string) => `ℹ️ **No Approval to Remove**

${mention(user)}, there is no active approval on this PR to dismiss.

Use \`/lgtm\` first to approve the PR before you can remove your approval.`,

  removeLgtmDismissed: (user: string) => `LGTM removed by ${mention(user)}`,

  removeLgtmStatus: (user: string, summary: LgtmVoteSummary) => `✅ **Approval Dismissed Successfully**

${mention(user)} has dismissed their approval.

**Updated LGTM Status:**
- Current valid approvals: **${summary.voters.size}/${summary.threshold}**
- Approvals needed: **${Math.max(0, summary.threshold - summary.voters.size)}**`,

  // ── Merge ──

  mergeInsufficientPermissions: (
    user: string,
    permission: string,
    required: readonly string[],
    author: string,
  ) => `❌ **Insufficient Permissions**

${mention(user)}, you don't have the required permissions to merge this PR.

**Your permission:** ${permission}
**Required permissions:** ${formatPermissions(required)}
**PR creator:** ${mention(author)}`,

  mergeNotEnoughLgtm: (current: number, threshold: number) => `❌ **Cannot merge: Not enough LGTM approvals**

This PR has **${current}/${threshold}** valid LGTM approvals. **${threshold - current} more approval(s) needed**.`,

  mergeChecksNotPassing: (checks: readonly CheckRunStatus[]) => `⚠️ **Cannot merge PR: Some checks are not passing**

| Check Name | Status |
|------------|--------|
${formatCheckRows(checks)}

Please wait for all checks to pass before merging.`,

  mergeSuccess: (method: MergeMethod, user: string, summary: LgtmVoteSummary) => `🎉 **PR Successfully Merged!**

**Merge details:**
- **Method:** ${method}
- **Merged by:** ${mention(user)}
- **LGTM votes:** ${summary.voters.size}/${summary.threshold}`,

  // ── Checks ──

  checkRunsFailing: (checks: readonly CheckRunStatus[]) => `⚠️ **Check Runs Status - Some checks are not passing**

| Check Name | Status |
|------------|--------|
${formatCheckRows(checks)}

> **Note:** All checks must pass before this PR can be merged.`,

  checkRunsPassing: `✅ **Check Runs Status - All checks are passing**`,

  retestTriggered: (names: readonly string[]) =>
    `🔄 Re-running failed checks: ${names.map((name) => `\`${name}\``).join(", ")}`,

  retestNothingFailed: `✅ No failed checks to re-run.`,

  // ── Assignment ──

  assigned: (users: readonly string[], requester: string) =>
    `${users.map(mention).join(" ")}\n\n${mention(requester)} has requested your review on this pull request. Please take a look when you have a moment. Thanks! 🙏`,

  unassigned: (users: readonly string[]) =>
    `♻️ Removed ${users.map(mention).join(" ")} from the review list. Thanks for your time!`,

  // ── Labels ──

  labelsAdded: (labels: readonly string[], user: string) =>
    `🏷️ Labels \`${labels.join(", ")}\` have been added to this PR by ${mention(user)}`,

  labelsRemoved: (labels: readonly string[], user: string) =>
    `🏷️ Labels \`${labels.join(", ")}\` have been removed from this PR by ${mention(user)}`,

  // ── PR lifecycle ──

  closeSuccess: (prNumber: number, user: string) => `🔒 PR #${prNumber} has been closed by ${mention(user)}.`,

  alreadyClosed: (prNumber: number) =>
    `❌ **PR #${prNumber} is already closed**\n\nCannot close a PR that is already in closed state.`,

  rebaseSuccess: `✅ **PR rebased successfully** on the base branch.`,

  rebaseFailed: (error: string) => `❌ **Rebase failed**: ${error}`,

  // ── Batch ──

  batchHeader: "**Batch Execution Results:**",

  batchRejected: (command: string) => `command \`/${command}\` is not allowed in batch execution`,

  // ── Checkbox ──

  checkboxNoneFound: `ℹ️ No unchecked checkboxes found in the PR description.`,

  checkboxUpdated: (count: number) => `✅ Checked ${count} checkbox(es) in the PR description.`,

  checkboxIssueNotFound: (title: string) => `❌ No open issue titled \`${title}\` was found.`,

  checkboxIssueNoneFound: (issueNumber: number) => `ℹ️ No unchecked checkboxes found in issue #${issueNumber}.`,

  checkboxIssueUpdated: (issueNumber: number, count: number) =>
    `✅ Checked ${count} checkbox(es) in issue #${issueNumber}.`,

  // ── Cherry-pick ──

  cherryPickUsage: `❌ **Invalid cherrypick command**

Usage: \`/cherrypick <target-branch>\`

Please specify the target branch for the cherrypick.`,

  cherryPickInsufficientPermissions: (
    user: string,
    permission: string,
    required: readonly string[],
    author: string,
  ) => `❌ **Insufficient Permissions**

${mention(user)}, you don't have the required permissions to create a cherrypick PR.

**Your permission:** ${permission}
**Required permissions:** ${formatPermissions(required)}
**PR creator:** ${mention(author)}`,

  cherryPickScheduled: (branch: string) =>
    `✅ We will cherry-pick this PR to the branch \`${branch}\` upon merge.`,

  cherryPickFailed: (prNumber: number, branch: string, user: string, error: string) => `❌ **Cherry Pick Failed**

Failed to cherry-pick changes from PR #${prNumber} to branch \`${branch}\`:
* Requested by: ${mention(user)}
* Error: \`${error}\`

*Possible causes:*
* **🔀 Merge conflicts** - Changes conflict with target branch
* **🔒 Branch protection rules** - Target branch has restrictions
* **❌ Invalid branch name** - Target branch doesn't exist

Please resolve any issues and try again.`,

  cherryPickSuccess: (opts: {
    prNumber: number;
    branch: string;
    newPrNumber: number;
    user: string;
    sha: string;
  }) => `✅ **Cherry Pick Successful**

Successfully cherry-picked changes from PR #${opts.prNumber} to branch \`${opts.branch}\`.

*Details:*
* Source PR: #${opts.prNumber}
* Cherry-pick PR: #${opts.newPrNumber}
* Target Branch: \`${opts.branch}\`
* Cherry-picked by: ${mention(opts.user)}
* Latest commit SHA: \`${opts.sha}\``,

  cherryPickPRTitle: (title: string) => `[Cherry-pick] ${title}`,

  cherryPickPRBody: (prNumber: number, branch: string, user: string) =>
    `Cherry-pick of PR #${prNumber} to ${branch}\n\nOriginal PR: #${prNumber}\nRequested by: ${mention(user)}`,
} as const;
