import * as core from "@actions/core";
import { withConfig, type Context } from "./context.js";
import {
  deploy,
  selectedProcessors,
  type ProcessorSelector,
} from "./deploy.js";
import { generateTerraformFiles } from "./generate.js";
import { rollback } from "./rollback.js";
import { disableRemoteState } from "./state.js";
import { showStatus } from "./status.js";
import {
  allModules,
  bootstrapTargets,
  moduleScope,
  primaryModule,
  resolveTargets,
} from "./targets.js";
import { executeTerraform, type TerraformOutcome } from "./terraform.js";

/**
 * `lambda deploy`
 */
export async function lambdaDeploy(
  context: Context,
  selector: ProcessorSelector,
) {
  const { outcome } = await deploy(context, selector);

  return outcome;
}

/**
 * `lambda rollback`: step every published version back by one, save, and
 * apply the primary module of every cluster.
 *
 * Terraform reads the saved file, so the rollback is written before planning.
 * Unless it is applied, the previous pointers are written back.
 */
export async function lambdaRollback(
  context: Context,
): Promise<TerraformOutcome> {
  const config = rollback(context.config);

  await context.store.save(config);

  let outcome: TerraformOutcome | undefined;

  try {
    outcome = await executeTerraform(withConfig(context, config), {
      targets: resolveTargets(moduleScope(primaryModule), config),
    });

    return outcome;
  } finally {
    if (outcome !== "applied") {
      await context.store.save(context.config);
      core.info(`Restored the previous versions in "${context.store.path}"`);
    }
  }
}

/**
 * `lambda test`: hand each selected processor to the project's test command
 *
 * @returns Whether every test run passed
 */
export async function lambdaTest(
  { settings, shell }: Context,
  selector: ProcessorSelector,
) {
  const [command, ...args] = settings.testCommand;
  let passed = true;

  for (const kind of selectedProcessors(selector)) {
    core.info(`Testing ${kind}`);

    const result = await shell.run([command, ...args, kind], {
      errorMessage: `Tests for ${kind} failed`,
    });

    if (!result) {
      passed = false;
    }
  }

  return passed;
}

/**
 * `terraform build [--target <module>]`
 */
export async function terraformBuild(context: Context, target?: string) {
  const scope = target ? moduleScope(target) : allModules();

  return executeTerraform(context, {
    targets: resolveTargets(scope, context.config),
  });
}

/**
 * `terraform generate`
 */
export async function terraformGenerate(context: Context) {
  return generateTerraformFiles(context);
}

/**
 * `terraform init`: bring up a fleet from nothing
 *
 * Steps:
 *  - generate the cluster files
 *  - build the buckets and keys that remote state and deployments need,
 *    without remote state since its bucket does not exist yet
 *  - deploy both processors, which moves state to the new bucket
 *  - build everything else
 *
 * Stops at the first step that does not apply.
 */
export async function terraformInit(
  context: Context,
): Promise<TerraformOutcome> {
  core.info("Initializing the fleet");
  core.info("Generating cluster files");
  await generateTerraformFiles(context);

  core.info("Building initial infrastructure");

  const bootstrap = await executeTerraform(context, {
    targets: bootstrapTargets,
    refreshState: false,
  });

  if (bootstrap !== "applied") {
    return bootstrap;
  }

  core.info("Deploying Lambda functions");

  const deployment = await deploy(context, "all");

  if (deployment.outcome !== "applied") {
    return deployment.outcome;
  }

  core.info("Building remainder infrastructure");

  return executeTerraform(withConfig(context, deployment.config));
}

/**
 * `terraform destroy`: pull state back from the bucket, then plan and apply
 * the destruction of everything
 */
export async function terraformDestroy(
  context: Context,
): Promise<TerraformOutcome> {
  const disabled = await disableRemoteState(
    context.runner,
    context.settings.terraformBinary,
  );

  if (!disabled) {
    return "failed";
  }

  return executeTerraform(context, { action: "destroy", refreshState: false });
}

/**
 * `terraform status`
 */
export async function terraformStatus(context: Context) {
  return showStatus(context);
}
