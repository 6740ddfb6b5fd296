import type { FleetConfig } from "./config.js";

/**
 * Raised when the environment is not fit to run a command at all, such as a
 * missing Terraform binary. Nothing has been changed when this is thrown.
 */
export class PreconditionError extends Error {
  override name = "PreconditionError";
}

/**
 * Raised when the cluster configuration or an operator-supplied value cannot
 * be used: unknown processor selectors, malformed version pointers, clusters
 * that do not exist.
 */
export class ConfigurationError extends Error {
  override name = "ConfigurationError";
}

export class InvalidClusterNameError extends ConfigurationError {
  override name = "InvalidClusterNameError";

  constructor(public readonly cluster: string) {
    super(
      `Cluster name "${cluster}" is reserved for the remote state ` +
        "namespace; rename the cluster to something else",
    );
  }
}

/**
 * Raised when a processor was published to some clusters but not all of
 * them. `config` records the versions that did go out.
 */
export class PartialDeploymentError extends Error {
  override name = "PartialDeploymentError";

  constructor(
    message: string,
    public readonly config: FleetConfig,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export function errorMessage(cause: unknown) {
  return cause instanceof Error ? cause.message : String(cause);
}
