/**
 * Execution Profiles
 *
 * The CLI runs inside pipelines and needs a non-zero exit on failure;
 * the webhook has already posted the outcome on the PR and must not fail
 * the delivery. Each profile maps to one frozen ExecutionConfig.
 */

import type { ExecutionConfig } from "./types.js";

export type Profile = { kind: "cli"; debug: boolean } | { kind: "webhook" };

const CLI_CONFIG: ExecutionConfig = Object.freeze({
  validateSender: false,
  validatePRState: true,
  debug: false,
  postErrorsAsComments: true,
  returnErrors: true,
  stopOnFirstError: false,
});

const CLI_DEBUG_CONFIG: ExecutionConfig = Object.freeze({ ...CLI_CONFIG, debug: true });

const WEBHOOK_CONFIG: ExecutionConfig = Object.freeze({
  validateSender: true,
  validatePRState: true,
  debug: false,
  postErrorsAsComments: true,
  returnErrors: false,
  stopOnFirstError: false,
});

export function executionConfigFor(profile: Profile): ExecutionConfig {
  switch (profile.kind) {
    case "cli":
      return profile.debug ? CLI_DEBUG_CONFIG : CLI_CONFIG;
    case "webhook":
      return WEBHOOK_CONFIG;
  }
}
