/**
 * Environment Variable Validation
 *
 * Provides consistent validation of required settings for the webhook
 * app (environment) and the pr-cli script (flags with env fallbacks).
 */

/**
 * Result of environment validation
 */
export interface EnvValidationResult {
  valid: boolean;
  missing: string[];
}

/**
 * Required environment variables for GitHub App authentication
 */
const APP_REQUIRED_VARS = ["APP_ID"] as const;

/**
 * Private key can be provided via either name (Probot default or our standardized name)
 */
const PRIVATE_KEY_VARS = ["PRIVATE_KEY", "APP_PRIVATE_KEY"] as const;

/**
 * Check if private key is available (accepts either naming convention)
 */
export function hasPrivateKey(): boolean {
  return PRIVATE_KEY_VARS.some((key) => !!process.env[key]);
}

/**
 * Validate that all required environment variables for the app are set.
 *
 * @param requireWebhookSecret - Whether WEBHOOK_SECRET is required (true for webhooks)
 */
export function validateEnv(requireWebhookSecret = false): EnvValidationResult {
  const missing: string[] = [];

  // Check required vars
  for (const varName of APP_REQUIRED_VARS) {
    if (!process.env[varName]) {
      missing.push(varName);
    }
  }

  // Check for private key (accepts either naming convention)
  if (!hasPrivateKey()) {
    missing.push("PRIVATE_KEY or APP_PRIVATE_KEY");
  }

  // Check webhook secret if required
  if (requireWebhookSecret && !process.env.WEBHOOK_SECRET) {
    missing.push("WEBHOOK_SECRET");
  }

  return {
    valid: missing.length === 0,
    missing,
  };
}

/**
 * Get the App ID from environment variables.
 * Returns the numeric ID for API operations.
 *
 * @throws Error if APP_ID is missing or invalid
 */
export function getAppId(): number {
  const appIdStr = process.env.APP_ID;
  if (!appIdStr) {
    throw new Error("APP_ID environment variable is not set");
  }

  const appId = Number(appIdStr);
  if (isNaN(appId) || appId <= 0) {
    throw new Error(`APP_ID must be a positive number, got: ${appIdStr}`);
  }

  return appId;
}

// ───────────────────────────────────────────────────────────────────────────────
// CLI Target
// ───────────────────────────────────────────────────────────────────────────────

/**
 * Raw CLI inputs, after flags have been merged over env fallbacks.
 */
export interface CliInputs {
  token?: string;
  owner?: string;
  repo?: string;
  prNum?: string;
  commentSender?: string;
  triggerComment?: string;
}

/**
 * The pull request and comment one CLI run acts on.
 */
export interface CliTarget {
  token: string;
  owner: string;
  repo: string;
  prNumber: number;
  commentSender: string;
  triggerComment: string;
}

/**
 * Flag name and env fallback for each required CLI input, in the order
 * they are reported.
 */
export const CLI_REQUIRED_INPUTS: ReadonlyArray<{ key: keyof CliInputs; flag: string; env: string }> = [
  { key: "token", flag: "--token", env: "PR_CLI_TOKEN" },
  { key: "owner", flag: "--owner", env: "PR_CLI_OWNER" },
  { key: "repo", flag: "--repo", env: "PR_CLI_REPO" },
  { key: "prNum", flag: "--pr-num", env: "PR_CLI_PR_NUM" },
  { key: "commentSender", flag: "--comment-sender", env: "PR_CLI_COMMENT_SENDER" },
  { key: "triggerComment", flag: "--trigger-comment", env: "PR_CLI_TRIGGER_COMMENT" },
];

/**
 * Check that every required CLI input is present and non-blank.
 */
export function validateCliInputs(inputs: CliInputs): EnvValidationResult {
  const missing = CLI_REQUIRED_INPUTS.filter(({ key }) => !inputs[key]?.trim()).map(
    ({ flag, env }) => `${flag} (or ${env})`,
  );
  return { valid: missing.length === 0, missing };
}

/**
 * Get the validated CLI target.
 *
 * @throws Error naming every missing input, or an invalid PR number
 */
export function getCliTarget(inputs: CliInputs): CliTarget {
  const validation = validateCliInputs(inputs);
  const { token, owner, repo, prNum, commentSender, triggerComment } = inputs;
  if (!validation.valid || !token || !owner || !repo || !prNum || !commentSender || !triggerComment) {
    throw new Error(`Missing required options: ${validation.missing.join(", ")}`);
  }

  const prNumber = Number(prNum);
  if (!Number.isInteger(prNumber) || prNumber <= 0) {
    throw new Error(`--pr-num must be a positive integer, got: ${prNum}`);
  }

  return {
    token: token.trim(),
    owner: owner.trim(),
    repo: repo.trim(),
    prNumber,
    commentSender: commentSender.trim(),
    triggerComment,
  };
}
