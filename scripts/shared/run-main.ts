/**
 * Shared Script Entry Helper
 *
 * Runs a script's main() only when the file is the process entry point,
 * so tests can import the module without side effects.
 */

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import * as core from "@actions/core";

/**
 * File URL of the process entry script. npm installs `bin` entries as
 * symlinks, so the path is resolved when it exists.
 */
function entryUrl(): string {
  const entry = process.argv[1];
  if (!entry) {
    return "";
  }
  try {
    return pathToFileURL(realpathSync(entry)).href;
  } catch {
    return new URL(entry, "file://").href;
  }
}

/**
 * Run `main` when `callerUrl` (the caller's `import.meta.url`) is the entry
 * script. A resolved exit code becomes the process exit code; a rejection
 * marks the workflow failed and exits 1.
 */
export function runIfMain(callerUrl: string, main: () => Promise<number | void>): void {
  if (callerUrl !== entryUrl()) {
    return;
  }
  main().then(
    (code) => {
      if (typeof code === "number") {
        process.exitCode = code;
      }
    },
    (error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      core.setFailed(`Fatal error: ${message}`);
      process.exit(1);
    },
  );
}
