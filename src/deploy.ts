import * as core from "@actions/core";
import type { FleetConfig, ProcessorKind } from "./config.js";
import { withConfig, type Context } from "./context.js";
import { ConfigurationError, PartialDeploymentError } from "./errors.js";
import { moduleScope, primaryModule, resolveTargets } from "./targets.js";
import { executeTerraform, type TerraformOutcome } from "./terraform.js";

export const processorSelectors = ["rule", "alert", "all"] as const;

export type ProcessorSelector = (typeof processorSelectors)[number];

/**
 * @throws {ConfigurationError} If the value is not a known selector
 */
export function parseProcessorSelector(value: string): ProcessorSelector {
  const selector = processorSelectors.find((selector) => selector === value);

  if (!selector) {
    throw new ConfigurationError(
      `Unknown processor "${value}"; expected one of: ` +
        processorSelectors.join(", "),
    );
  }

  return selector;
}

export function selectedProcessors(
  selector: ProcessorSelector,
): ProcessorKind[] {
  switch (selector) {
    case "rule":
      return ["rule_processor"];

    case "alert":
      return ["alert_processor"];

    case "all":
      return ["rule_processor", "alert_processor"];

    default:
      return unknownSelector(selector);
  }
}

function unknownSelector(selector: never): never {
  throw new ConfigurationError(`Unknown processor "${selector}"`);
}

/**
 * Deploy new versions of the selected Lambda functions
 *
 * Steps:
 *  - build, upload and publish each selected processor, saving the new
 *    artifact keys and versions after each one
 *  - apply the primary module of every cluster, so the new versions go live
 *
 * Versions that were published before a failure are saved before the error
 * is rethrown.
 *
 * @returns The outcome of the Terraform run and the saved configuration
 */
export async function deploy(
  context: Context,
  selector: ProcessorSelector,
): Promise<{ outcome: TerraformOutcome; config: FleetConfig }> {
  const { store } = context;
  let config: FleetConfig = context.config;
  let saved: Readonly<FleetConfig> = context.config;

  try {
    for (const kind of selectedProcessors(selector)) {
      config = await context.packageBuilder.build(kind, config);

      await store.save(config);
      saved = config;
      core.info(`Saved new versions to "${store.path}"`);
    }
  } catch (error) {
    if (error instanceof PartialDeploymentError) {
      config = error.config;
    }

    if (config !== saved) {
      await store.save(config);
      core.info(`Saved the versions published so far to "${store.path}"`);
    }

    throw error;
  }

  const outcome = await executeTerraform(withConfig(context, config), {
    targets: resolveTargets(moduleScope(primaryModule), config),
  });

  return { outcome, config };
}
