import {
  createFileConfigStore,
  type ConfigStore,
  type FleetConfig,
} from "./config.js";
import { createTemplateRenderer, type TemplateRenderer } from "./generate.js";
import { createPackageBuilder, type PackageBuilder } from "./package.js";
import { createConsolePrompt, type Prompt } from "./prompt.js";
import { createCommandRunner, type CommandRunner } from "./runner.js";
import type { Settings } from "./settings.js";

/**
 * Everything a command operates on. The configuration is a snapshot: steps
 * that change it return a new one, and the command saves it explicitly.
 */
export interface Context {
  readonly settings: Readonly<Settings>;
  readonly config: Readonly<FleetConfig>;
  readonly store: ConfigStore;

  /**
   * Runs Terraform, inside the Terraform directory
   */
  readonly runner: CommandRunner;

  /**
   * Runs everything else, from the project root
   */
  readonly shell: CommandRunner;
  readonly prompt: Prompt;
  readonly renderer: TemplateRenderer;
  readonly packageBuilder: PackageBuilder;
}

export type ContextFactory = (settings: Readonly<Settings>) => Promise<Context>;

export function withConfig(
  context: Context,
  config: Readonly<FleetConfig>,
): Context {
  return { ...context, config };
}

/**
 * Load the cluster configuration and wire up the default collaborators
 *
 * @param settings CLI settings
 * @param [overrides] Collaborators to use instead of the defaults
 */
export async function createContext(
  settings: Readonly<Settings>,
  overrides: Partial<Omit<Context, "settings" | "config">> = {},
): Promise<Context> {
  const store = overrides.store ?? createFileConfigStore(settings.configFile);
  const shell = overrides.shell ?? createCommandRunner();

  return {
    settings,
    config: await store.load(),
    store,
    runner:
      overrides.runner ??
      createCommandRunner({ cwd: settings.terraformDirectory }),
    shell,
    prompt: overrides.prompt ?? createConsolePrompt(),
    renderer: overrides.renderer ?? createTemplateRenderer(settings.template),
    packageBuilder:
      overrides.packageBuilder ?? createPackageBuilder(shell, settings),
  };
}
