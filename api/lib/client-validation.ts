/**
 * Shared Client Validation Utilities
 *
 * Runtime shape checks for the Octokit-like clients handed to the platform
 * and the config loader. Probot's `context.octokit` and the `octokit`
 * package both pass.
 */

/**
 * Client validation check result
 */
export interface ValidationCheck {
  /** Dot-notation path to check (e.g., "rest.issues") */
  path: string;
  /** Required method names at this path (if any) */
  requiredMethods?: readonly string[];
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Navigate to a nested property by dot-notation path.
 * Returns null if any part of the path is invalid.
 */
function getNestedProperty(obj: Record<string, unknown>, path: string): Record<string, unknown> | null {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isObject(current)) {
      return null;
    }
    current = current[part];
  }

  return isObject(current) ? current : null;
}

/**
 * Validate that an object has methods at a specific path.
 */
function hasRequiredMethods(obj: Record<string, unknown>, path: string, methods: readonly string[]): boolean {
  const target = getNestedProperty(obj, path);
  if (!target) {
    return false;
  }

  return methods.every((method) => typeof target[method] === "function");
}

/**
 * Validate that an object satisfies all specified checks.
 *
 * @example
 * ```typescript
 * const isValid = validateClient(octokit, [
 *   { path: "rest.issues", requiredMethods: ["createComment", "listComments"] },
 *   { path: "rest.pulls", requiredMethods: ["get"] },
 * ]);
 * ```
 */
export function validateClient(obj: unknown, checks: readonly ValidationCheck[]): boolean {
  if (!isObject(obj)) {
    return false;
  }

  return checks.every((check) =>
    check.requiredMethods && check.requiredMethods.length > 0
      ? hasRequiredMethods(obj, check.path, check.requiredMethods)
      : getNestedProperty(obj, check.path) !== null,
  );
}

/**
 * Checks for the pull request client used by the GitHub platform.
 */
export const PR_CLIENT_CHECKS: readonly ValidationCheck[] = [
  {
    path: "rest.pulls",
    requiredMethods: [
      "get",
      "update",
      "listCommits",
      "listReviews",
      "createReview",
      "dismissReview",
      "merge",
      "updateBranch",
      "create",
    ],
  },
  {
    path: "rest.issues",
    requiredMethods: [
      "createComment",
      "listComments",
      "addLabels",
      "removeLabel",
      "addAssignees",
      "removeAssignees",
      "listForRepo",
      "update",
    ],
  },
  {
    path: "rest.repos",
    requiredMethods: ["getCollaboratorPermissionLevel"],
  },
  {
    path: "rest.checks",
    requiredMethods: ["listForRef", "rerequestRun"],
  },
];

/**
 * Checks for the repository config loader.
 */
export const REPO_CONFIG_CLIENT_CHECKS: readonly ValidationCheck[] = [
  {
    path: "rest.repos",
    requiredMethods: ["getContent"],
  },
];
