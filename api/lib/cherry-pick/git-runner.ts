/**
 * Git Runner
 *
 * Thin subprocess wrapper around the `git` CLI. Every invocation names its
 * working directory explicitly; the process working directory is never
 * changed.
 */

import { execa } from "execa";

export interface GitResult {
  exitCode: number;
  /** Interleaved stdout and stderr */
  output: string;
  failed: boolean;
  /** True when the run was killed through its AbortSignal */
  cancelled: boolean;
}

export interface GitRunOptions {
  cwd: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

export type GitRunner = (args: readonly string[], options: GitRunOptions) => Promise<GitResult>;

/**
 * Run `git` with execa. Never rejects on a non-zero exit; the caller
 * inspects the result.
 */
export const execaGitRunner: GitRunner = async (args, options) => {
  const result = await execa("git", [...args], {
    cwd: options.cwd,
    env: options.env,
    extendEnv: true,
    reject: false,
    all: true,
    stdin: "ignore",
    cancelSignal: options.signal,
  });

  return {
    exitCode: result.exitCode ?? -1,
    output: result.all ?? "",
    failed: result.failed,
    cancelled: result.isCanceled,
  };
};
