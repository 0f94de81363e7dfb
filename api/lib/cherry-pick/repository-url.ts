/**
 * Repository URLs for the cherry-pick clone.
 */

import type { PlatformName } from "../../config.js";

const DEFAULT_HOSTS: Readonly<Record<PlatformName, string>> = {
  github: "github.com",
  gitlab: "gitlab.com",
};

/**
 * Derive the git host from an API base URL.
 *
 *   https://api.github.com           → github.com
 *   https://ghe.example.com/api/v3   → ghe.example.com
 *   https://gitlab.example.com/api/v4 → gitlab.example.com
 */
export function inferGitHost(platform: PlatformName, baseUrl?: string): string {
  const trimmed = baseUrl?.trim();
  if (!trimmed) {
    return DEFAULT_HOSTS[platform];
  }
  const host = trimmed
    .replace(/^https?:\/\//, "")
    .replace(/^api\./, "")
    .replace(/\/api\/v[34]\/?$/, "")
    .replace(/\/+$/, "");
  return host || DEFAULT_HOSTS[platform];
}

export interface RepositoryUrlInput {
  platform: PlatformName;
  token: string;
  owner: string;
  repo: string;
  baseUrl?: string;
}

/**
 * Token-embedded HTTPS clone URL. GitLab expects the `oauth2:` user.
 */
export function buildRepositoryUrl(input: RepositoryUrlInput): string {
  const host = inferGitHost(input.platform, input.baseUrl);
  const credentials = input.platform === "gitlab" ? `oauth2:${input.token}` : input.token;
  return `https://${credentials}@${host}/${input.owner}/${input.repo}.git`;
}

/**
 * Strip the credentials from a clone URL.
 *
 * @returns the bare URL and the host it points at
 */
export function stripCredentials(url: string): { url: string; host: string } {
  const at = url.indexOf("@");
  const bare = at === -1 ? url : `https://${url.slice(at + 1)}`;
  const host = bare.replace(/^https?:\/\//, "").split("/")[0] ?? "";
  return { url: bare, host };
}
