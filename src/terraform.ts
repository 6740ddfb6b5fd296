import { relative } from "node:path";
import * as core from "@actions/core";
import type { Context } from "./context.js";
import { PreconditionError } from "./errors.js";
import { debug } from "./logging.js";
import { confirm } from "./prompt.js";
import { configureRemoteState, remoteStateBackend } from "./state.js";

export type TerraformAction = "apply" | "destroy";

export type TerraformOutcome = "applied" | "destroyed" | "rejected" | "failed";

type TerraformState =
  | "idle"
  | "modules-resolved"
  | "planned"
  | "confirmed"
  | "rejected"
  | "applied"
  | "destroyed";

export interface TerraformOptions {
  /**
   * Addresses to restrict the run to; empty means the whole graph
   */
  targets?: readonly string[];
  action?: TerraformAction;

  /**
   * Configure remote state before planning. Skipped when bootstrapping the
   * state bucket, and when destroying it.
   */
  refreshState?: boolean;
}

/**
 * Verify that the Terraform binary can be run
 *
 * @throws {PreconditionError} If Terraform is not installed
 */
export async function checkTerraform({
  runner,
  settings,
}: Pick<Context, "runner" | "settings">) {
  const installed = await runner.run([settings.terraformBinary, "version"], {
    quiet: true,
  });

  if (!installed) {
    throw new PreconditionError(
      `Terraform not found! Please install it and add it to your $PATH ` +
        `(looked for "${settings.terraformBinary}")`,
    );
  }
}

/**
 * The cluster configuration doubles as Terraform's variable file. Terraform
 * runs inside its own directory, so the path is relative to that.
 */
export function varFileFlag({
  configFile,
  terraformDirectory,
}: Context["settings"]) {
  return `-var-file=${relative(terraformDirectory, configFile)}`;
}

/**
 * Plan, confirm and apply (or destroy) infrastructure
 *
 * Steps:
 *  - configure remote state, unless disabled
 *  - resolve modules with `terraform get`
 *  - plan for the given targets; a destroy is planned with `-destroy`
 *  - ask the operator to confirm, unless the plan failed
 *  - run `apply` or `destroy` with the same targets as the plan
 *
 * @throws {Error} If modules cannot be resolved
 */
export async function executeTerraform(
  { config, prompt, runner, settings }: Context,
  { targets = [], action = "apply", refreshState = true }: TerraformOptions = {},
): Promise<TerraformOutcome> {
  const terraform = settings.terraformBinary;

  // The operator has answered the only question; Terraform must not ask again
  const flags = [
    "-input=false",
    varFileFlag(settings),
    ...targets.map((target) => `-target=${target}`),
  ];
  let state: TerraformState = "idle";

  function transition(next: TerraformState) {
    debug(`Terraform: ${state} -> ${next}`);
    state = next;
  }

  if (refreshState) {
    const configured = await configureRemoteState(
      runner,
      remoteStateBackend(config),
      terraform,
    );

    if (!configured) {
      return "failed";
    }
  }

  core.info("Resolving Terraform modules");

  const resolved = await runner.run([terraform, "get"], {
    errorMessage: "Failed to resolve Terraform modules",
    quiet: true,
  });

  if (!resolved) {
    throw new Error("Failed to resolve Terraform modules");
  }

  transition("modules-resolved");
  core.info(
    action === "destroy"
      ? "Planning infrastructure destruction"
      : "Planning infrastructure",
  );

  const planned = await runner.run(
    [terraform, "plan", ...flags, ...(action === "destroy" ? ["-destroy"] : [])],
    { errorMessage: "Terraform plan failed" },
  );

  if (!planned) {
    return "failed";
  }

  transition("planned");

  if (!(await confirm(prompt))) {
    transition("rejected");

    return "rejected";
  }

  transition("confirmed");
  core.info(
    action === "destroy"
      ? "Destroying infrastructure"
      : "Creating infrastructure",
  );

  const mutated = await runner.run(
    [terraform, action, ...(action === "destroy" ? ["-force"] : []), ...flags],
    { errorMessage: `Terraform ${action} failed` },
  );

  if (!mutated) {
    return "failed";
  }

  const outcome = action === "destroy" ? "destroyed" : "applied";
  transition(outcome);

  return outcome;
}
