import * as core from "@actions/core";
import { exec } from "@actions/exec";
import { errorMessage as describeError } from "./errors.js";
import { debug } from "./logging.js";

export type CommandLine = readonly [string, ...string[]];

export interface RunOptions {
  /**
   * Logged as an error if the command fails
   */
  errorMessage?: string;

  /**
   * Keep the command's own output off the operator's terminal
   */
  quiet?: boolean;
}

/**
 * Runs external processes one at a time. Failed commands are never retried.
 */
export interface CommandRunner {
  /**
   * Run a command to completion
   *
   * @returns Whether the command exited with status zero
   */
  run(command: CommandLine, options?: RunOptions): Promise<boolean>;

  /**
   * Run a command to completion and capture its standard output
   *
   * @returns The output, or undefined if the command failed
   */
  output(
    command: CommandLine,
    options?: Pick<RunOptions, "errorMessage">,
  ): Promise<string | undefined>;
}

/**
 * Create a runner that spawns real child processes
 *
 * @param [cwd] Working directory for every command
 */
export function createCommandRunner({
  cwd,
}: { cwd?: string } = {}): CommandRunner {
  async function execute(
    [command, ...args]: CommandLine,
    { errorMessage, quiet = false }: RunOptions,
  ) {
    let output = "";
    let errorOutput = "";
    let exitCode: number;

    debug(`Running: ${[command, ...args].join(" ")}`);

    try {
      exitCode = await exec(command, args, {
        cwd,
        silent: quiet,
        ignoreReturnCode: true,

        // Closes stdin, so a command that asks a question fails instead of
        // waiting forever
        input: Buffer.alloc(0),
        listeners: {
          stdout: (data) => (output += data.toString()),
          stderr: (data) => (errorOutput += data.toString()),
        },
      });
    } catch (cause) {
      // The executable could not be found or spawned at all
      debug(`Failed to start ${command}: ${describeError(cause)}`);
      exitCode = 127;
    }

    if (exitCode !== 0) {
      if (errorMessage) {
        core.error(errorMessage);
      }

      if (quiet && errorOutput) {
        debug(errorOutput);
      }

      debug(`${command} exited with status ${exitCode}`);

      return undefined;
    }

    return output;
  }

  return {
    async run(command, options = {}) {
      return (await execute(command, options)) !== undefined;
    },

    async output(command, options = {}) {
      return execute(command, { ...options, quiet: true });
    },
  };
}
