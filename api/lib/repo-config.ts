/**
 * Per-Repository Configuration Loader
 *
 * Loads command settings from .github/pr-cli.yml in customer repositories.
 * Provides per-repo customization while maintaining safe boundaries.
 *
 * Config hierarchy (lowest to highest priority):
 * 1. Global defaults (env-derived, clamped to CONFIG_BOUNDS)
 * 2. Per-repo .github/pr-cli.yml
 *
 * Example:
 *
 *   version: 1
 *   lgtm:
 *     threshold: 2
 *     permissions: [admin, maintain, write]
 *   merge:
 *     method: squash
 *   checks:
 *     selfCheckName: pr-cli
 */

import * as yaml from "js-yaml";
import { z } from "zod";
import {
  CONFIG_BOUNDS,
  ENV_SETTINGS,
  MERGE_METHODS,
  REPO_CONFIG_PATH,
  isRepoPermission,
  type CommandSettings,
} from "../config.js";
import { REPO_CONFIG_CLIENT_CHECKS, validateClient } from "./client-validation.js";
import { logger } from "./logger.js";
import { getErrorStatus } from "./transient-error.js";

// ───────────────────────────────────────────────────────────────────────────────
// Types
// ───────────────────────────────────────────────────────────────────────────────

/**
 * Minimal client interface for fetching the config file.
 *
 * The GitHub Contents API returns different shapes:
 * - File: { type: "file", content: string, ... }
 * - Directory: array of items
 * - Symlink/submodule: different structures
 *
 * We use `unknown` for the response data and handle the shape at runtime.
 */
export interface RepoConfigClient {
  rest: {
    repos: {
      getContent: (params: {
        owner: string;
        repo: string;
        path: string;
      }) => Promise<{
        data: unknown;
      }>;
    };
  };
}

export function isRepoConfigClient(obj: unknown): obj is RepoConfigClient {
  return validateClient(obj, REPO_CONFIG_CLIENT_CHECKS);
}

// ───────────────────────────────────────────────────────────────────────────────
// Schema
// ───────────────────────────────────────────────────────────────────────────────

/**
 * Outer shape of the file. Sections are validated field by field below so
 * one bad value does not discard the rest of the file.
 */
const RepoConfigFileSchema = z.object({
  version: z.number().int().optional(),
  lgtm: z.record(z.unknown()).optional(),
  merge: z.record(z.unknown()).optional(),
  checks: z.record(z.unknown()).optional(),
});

const ThresholdSchema = z.number().int();
const PermissionsSchema = z.array(z.string());
const MergeMethodSchema = z.enum(MERGE_METHODS);
const SelfCheckNameSchema = z.string().trim().min(1).max(CONFIG_BOUNDS.selfCheckName.maxLength);

type FileSection = Record<string, unknown> | undefined;

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Validate one field. Missing values fall back silently; invalid ones
 * fall back with a warning.
 */
function parseField<T, F = T>(
  section: FileSection,
  key: string,
  schema: z.ZodType<T>,
  fallback: F,
  path: string,
  repoFullName: string,
): T | F {
  const raw = section?.[key];
  if (raw === undefined) {
    return fallback;
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    logger.warn(`[${repoFullName}] Invalid ${path} in ${REPO_CONFIG_PATH}. Using default.`);
    return fallback;
  }
  return result.data;
}

function parseThreshold(section: FileSection, base: number, repoFullName: string): number {
  const value = parseField(section, "threshold", ThresholdSchema, base, "lgtm.threshold", repoFullName);
  const { min, max } = CONFIG_BOUNDS.lgtmThreshold;
  const clamped = clamp(value, min, max);
  if (clamped !== value) {
    logger.warn(`[${repoFullName}] lgtm.threshold ${value} out of range, clamped to ${clamped}`);
  }
  return clamped;
}

function parsePermissions(
  section: FileSection,
  base: CommandSettings["lgtmPermissions"],
  repoFullName: string,
): CommandSettings["lgtmPermissions"] {
  const entries = parseField(section, "permissions", PermissionsSchema, undefined, "lgtm.permissions", repoFullName);
  if (entries === undefined) {
    return base;
  }
  const valid = entries.map((entry) => entry.trim().toLowerCase()).filter(isRepoPermission);
  const unique = [...new Set(valid)].slice(0, CONFIG_BOUNDS.lgtmPermissions.maxEntries);
  if (unique.length === 0) {
    logger.warn(`[${repoFullName}] lgtm.permissions has no valid entries. Using default.`);
    return base;
  }
  return unique;
}

/**
 * Merge a parsed config file over `base`.
 */
export function parseRepoConfig(raw: unknown, repoFullName: string, base: CommandSettings): CommandSettings {
  const file = RepoConfigFileSchema.safeParse(raw);
  if (!file.success) {
    logger.warn(`[${repoFullName}] ${REPO_CONFIG_PATH} has an invalid structure. Using defaults.`);
    return base;
  }
  const { lgtm, merge, checks } = file.data;

  return {
    lgtmThreshold: parseThreshold(lgtm, base.lgtmThreshold, repoFullName),
    lgtmPermissions: parsePermissions(lgtm, base.lgtmPermissions, repoFullName),
    mergeMethod: parseField(merge, "method", MergeMethodSchema, base.mergeMethod, "merge.method", repoFullName),
    selfCheckName: parseField(
      checks,
      "selfCheckName",
      SelfCheckNameSchema,
      base.selfCheckName,
      "checks.selfCheckName",
      repoFullName,
    ),
  };
}

// ───────────────────────────────────────────────────────────────────────────────
// Config Loading
// ───────────────────────────────────────────────────────────────────────────────

const FileContentSchema = z.object({
  type: z.literal("file"),
  content: z.string().min(1),
});

/**
 * Load repository settings from .github/pr-cli.yml.
 *
 * Fetches the config file from the repository using GitHub Contents API,
 * parses YAML, validates values, and clamps to safe boundaries.
 *
 * @param octokit - GitHub client (Octokit or Probot context.octokit)
 * @param base - Settings the file overrides (default: env-derived)
 */
export async function loadRepositoryConfig(
  octokit: RepoConfigClient,
  owner: string,
  repo: string,
  base: CommandSettings = ENV_SETTINGS,
): Promise<CommandSettings> {
  const repoFullName = `${owner}/${repo}`;

  try {
    const response = await octokit.rest.repos.getContent({
      owner,
      repo,
      path: REPO_CONFIG_PATH,
    });

    // Directories come back as arrays; symlinks and submodules have other types
    const file = FileContentSchema.safeParse(response.data);
    if (!file.success) {
      logger.warn(`[${repoFullName}] ${REPO_CONFIG_PATH} is not a file. Using defaults.`);
      return base;
    }

    const content = Buffer.from(file.data.content, "base64").toString("utf-8");

    let parsed: unknown;
    try {
      parsed = yaml.load(content);
    } catch (yamlError) {
      const message = yamlError instanceof Error ? yamlError.message : String(yamlError);
      logger.warn(`[${repoFullName}] Invalid YAML in ${REPO_CONFIG_PATH}: ${message}. Using defaults.`);
      return base;
    }

    if (parsed === undefined || parsed === null) {
      logger.debug(`[${repoFullName}] Empty ${REPO_CONFIG_PATH}. Using defaults.`);
      return base;
    }

    logger.info(`[${repoFullName}] Loaded config from ${REPO_CONFIG_PATH}`);
    return parseRepoConfig(parsed, repoFullName, base);
  } catch (error) {
    const status = getErrorStatus(error);

    // 404 is expected when repo doesn't have a config file
    if (status === 404) {
      logger.debug(`[${repoFullName}] No ${REPO_CONFIG_PATH} found. Using defaults.`);
      return base;
    }

    // Policy: config load errors should not block processing; log and use defaults.
    const errorMessage = error instanceof Error ? error.message : String(error);
    const statusSuffix = status ? ` (status ${status})` : "";
    logger.warn(
      `[${repoFullName}] Failed to load ${REPO_CONFIG_PATH}${statusSuffix}: ${errorMessage}. Using defaults.`,
    );
    return base;
  }
}
