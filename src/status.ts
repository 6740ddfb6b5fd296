import * as core from "@actions/core";
import { dump } from "js-yaml";
import type { FleetConfig } from "./config.js";
import type { Context } from "./context.js";

export const statusHeading = "Cluster Info";

/**
 * Summarize the configuration of every cluster as a YAML document
 */
export function statusReport(config: Readonly<FleetConfig>) {
  const clusters = Object.fromEntries(
    config.clusters.map((cluster) => [
      cluster.name,
      {
        region: cluster.region,
        lambda: {
          timeout: cluster.lambda.timeout,
          memory: cluster.lambda.memory,
          versions: { ...cluster.versions },
        },
        kinesis: {
          shards: cluster.kinesis.shards,
          retention: cluster.kinesis.retentionHours,
        },
      },
    ]),
  );

  return `${statusHeading}\n\n${dump(clusters, { noRefs: true })}`;
}

/**
 * Print the cluster summary, followed by Terraform's outputs
 *
 * @returns Whether Terraform could report its outputs
 */
export async function showStatus({ config, runner, settings }: Context) {
  core.info(statusReport(config));
  core.info("Infrastructure outputs");

  return runner.run([settings.terraformBinary, "output"], {
    errorMessage: "Failed to read Terraform outputs",
  });
}
