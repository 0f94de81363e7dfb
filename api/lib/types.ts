/**
 * Shared Type Definitions
 *
 * Common types used by the webhook app and the pr-cli script.
 */

/**
 * Pull request reference for API calls
 */
export interface PRRef {
  owner: string;
  repo: string;
  prNumber: number;
}

/**
 * Repository reference carried by webhook payloads
 */
export interface Repository {
  owner: {
    login: string;
  };
  name: string;
  full_name: string;
}
