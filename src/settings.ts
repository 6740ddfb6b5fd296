import { debug } from "node:util";

/**
 * Runtime settings of the CLI itself, as opposed to the cluster configuration
 * it operates on.
 */
export interface Settings {
  awsBinary: string;
  configFile: string;
  packageCommand: string[];
  template?: string;
  terraformBinary: string;
  terraformDirectory: string;
  testCommand: string[];
}

export function defineSettings<T extends Settings>(settings: T) {
  return settings;
}

/**
 * Parse settings from the process environment
 */
export function parseSettings(env: NodeJS.ProcessEnv) {
  debug("Parsing settings from environment");

  return defineSettings({
    awsBinary: env.STREAMFLEET_AWS_BIN || "aws",
    configFile: env.STREAMFLEET_CONFIG || "variables.json",
    packageCommand: parseCommand(
      env.STREAMFLEET_PACKAGE_COMMAND,
      "./scripts/package.sh",
    ),
    template: env.STREAMFLEET_TEMPLATE || undefined,
    terraformBinary: env.STREAMFLEET_TERRAFORM_BIN || "terraform",
    terraformDirectory: env.STREAMFLEET_TERRAFORM_DIR || "terraform",
    testCommand: parseCommand(env.STREAMFLEET_TEST_COMMAND, "./scripts/test.sh"),
  });
}

/**
 * Split a command line into its words. Quoting is not supported; commands that
 * need it belong in a script.
 */
function parseCommand(command: string | undefined, fallback: string) {
  const words = (command || fallback)
    .split(/\s+/)
    .map((word) => word.trim())
    .filter(Boolean);

  return words.length > 0 ? words : [fallback];
}
