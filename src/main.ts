import { env } from "node:process";
import * as core from "@actions/core";
import { Command, CommanderError, Option } from "commander";
import {
  lambdaDeploy,
  lambdaRollback,
  lambdaTest,
  terraformBuild,
  terraformDestroy,
  terraformGenerate,
  terraformInit,
  terraformStatus,
} from "./commands.js";
import { createContext, type Context, type ContextFactory } from "./context.js";
import { parseProcessorSelector, processorSelectors } from "./deploy.js";
import { setVerbose } from "./logging.js";
import { parseSettings, type Settings } from "./settings.js";
import { checkTerraform, type TerraformOutcome } from "./terraform.js";

export const banner =
  "streamfleet: Terraform and Lambda deployments for stream-processing clusters";

export async function run(
  argv: readonly string[] = process.argv.slice(2),
  contextFactory: ContextFactory = createContext,
) {
  const settings = parseSettings(env);
  const program = createProgram(settings, contextFactory);

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    // Usage errors and help output have already been printed by commander
    if (error instanceof CommanderError) {
      if (error.exitCode !== 0) {
        process.exitCode = error.exitCode;
      }

      return;
    }

    if (error instanceof Error) {
      core.setFailed(error);
    } else {
      core.setFailed(`An unknown error occurred: ${error}`);
    }
  }
}

export function createProgram(
  settings: Readonly<Settings>,
  contextFactory: ContextFactory,
) {
  async function execute(
    handler: (context: Context) => Promise<void>,
    { terraform = false } = {},
  ) {
    const context = await contextFactory(settings);

    try {
      if (terraform) {
        await checkTerraform(context);
      }

      await handler(context);
    } finally {
      context.prompt.close?.();
    }
  }

  const program = new Command("streamfleet")
    .description(
      "Build, deploy and roll back the infrastructure and Lambda functions " +
        "of a fleet of stream-processing clusters",
    )
    .option("-v, --verbose", "Print debug output")
    .exitOverride()
    .hook("preAction", (command) => {
      setVerbose(command.opts<{ verbose?: boolean }>().verbose === true);
      core.info(banner);
    });
  const processorOption = () =>
    new Option("--processor <processor>", "Lambda function to act on")
      .choices(processorSelectors)
      .makeOptionMandatory();

  const lambda = program
    .command("lambda")
    .description("Deploy, roll back and test the Lambda functions");

  lambda
    .command("deploy")
    .description("Build, upload and publish new function versions, then apply")
    .addOption(processorOption())
    .action(async ({ processor }: { processor: string }) =>
      execute(async (context) =>
        reportOutcome(
          await lambdaDeploy(context, parseProcessorSelector(processor)),
        ),
      ),
    );

  lambda
    .command("rollback")
    .description("Roll every function back to its previous published version")
    .action(async () =>
      execute(async (context) => reportOutcome(await lambdaRollback(context))),
    );

  lambda
    .command("test")
    .description("Run the processor tests")
    .addOption(processorOption())
    .action(async ({ processor }: { processor: string }) =>
      execute(async (context) => {
        const passed = await lambdaTest(
          context,
          parseProcessorSelector(processor),
        );

        if (!passed) {
          core.setFailed("Processor tests failed");
        }
      }),
    );

  const terraform = program
    .command("terraform")
    .description("Plan, apply and inspect the fleet's infrastructure");

  terraform
    .command("build")
    .description("Plan and apply infrastructure changes")
    .option(
      "--target <module>",
      "Restrict the run to one module of every cluster, given by its " +
        "Terraform address without the cluster suffix (module.kinesis " +
        "targets module.kinesis_<cluster>)",
    )
    .action(async ({ target }: { target?: string }) =>
      execute(
        async (context) =>
          reportOutcome(await terraformBuild(context, target)),
        { terraform: true },
      ),
    );

  terraform
    .command("generate")
    .description("Render the Terraform file of every cluster")
    .action(async () =>
      execute(
        async (context) => {
          await terraformGenerate(context);
        },
        { terraform: true },
      ),
    );

  terraform
    .command("init")
    .description("Build the fleet's infrastructure from a blank state")
    .action(async () =>
      execute(
        async (context) => reportOutcome(await terraformInit(context)),
        { terraform: true },
      ),
    );

  terraform
    .command("destroy")
    .description("Destroy all of the fleet's infrastructure")
    .action(async () =>
      execute(
        async (context) => reportOutcome(await terraformDestroy(context)),
        { terraform: true },
      ),
    );

  terraform
    .command("status")
    .description("Summarize the cluster configuration and Terraform outputs")
    .action(async () =>
      execute(
        async (context) => {
          if (!(await terraformStatus(context))) {
            core.setFailed("Failed to read Terraform outputs");
          }
        },
        { terraform: true },
      ),
    );

  return program;
}

function reportOutcome(outcome: TerraformOutcome) {
  switch (outcome) {
    case "applied":
      core.info("Infrastructure changes applied");
      break;

    case "destroyed":
      core.info("Infrastructure destroyed");
      break;

    case "rejected":
      core.info("Aborted; no infrastructure changes were made");
      break;

    case "failed":
      core.setFailed(
        "Terraform did not complete; no further steps were taken",
      );
      break;
  }
}
