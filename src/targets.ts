import { findCluster, type FleetConfig } from "./config.js";

/**
 * Module that holds the Lambda functions of each cluster
 */
export const primaryModule = "module.stream_fleet";

/**
 * Resources that must exist before remote state and the Lambda functions can
 * be set up: the source and state buckets and the secrets key.
 */
export const bootstrapTargets = [
  "aws_s3_bucket.lambda_source",
  "aws_s3_bucket.integration_testing",
  "aws_s3_bucket.terraform_remote_state",
  "aws_kms_key.stream_fleet_secrets",
  "aws_kms_alias.stream_fleet_secrets",
] as const;

export type Scope =
  | { kind: "all" }
  | { kind: "module"; module: string; cluster?: string };

export function allModules(): Scope {
  return { kind: "all" };
}

export function moduleScope(module: string, cluster?: string): Scope {
  return cluster === undefined
    ? { kind: "module", module }
    : { kind: "module", module, cluster };
}

/**
 * Resolve a scope to the addresses passed to Terraform as `-target` flags.
 *
 * An empty list means the whole graph. Per-cluster modules are addressed as
 * `<module>_<cluster>`, in the order the clusters are configured. The list is
 * computed from the configuration it is given every time.
 */
export function resolveTargets(
  scope: Scope,
  config: Readonly<FleetConfig>,
): string[] {
  switch (scope.kind) {
    case "all":
      return [];

    case "module":
      if (scope.cluster !== undefined) {
        return [`${scope.module}_${findCluster(config, scope.cluster).name}`];
      }

      return config.clusters.map(({ name }) => `${scope.module}_${name}`);
  }
}
