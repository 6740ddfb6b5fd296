import * as core from "@actions/core";

let verbose = false;

/**
 * Show debug output on an operator's terminal. On an Actions runner,
 * `RUNNER_DEBUG` turns it on as well.
 */
export function setVerbose(enabled: boolean) {
  verbose = enabled;
}

/**
 * Log a debug message. `core.debug` writes `::debug::` lines to stdout even
 * outside a runner, so they are only passed on when debugging is enabled.
 */
export function debug(message: string) {
  if (verbose || core.isDebug()) {
    core.debug(message);
  }
}
