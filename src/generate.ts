import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import * as core from "@actions/core";
import type { ClusterConfig, FleetConfig } from "./config.js";
import type { Context } from "./context.js";
import { ConfigurationError, InvalidClusterNameError } from "./errors.js";
import { debug } from "./logging.js";
import { findFirstExistingFile, renderTemplate } from "./utils.js";

/**
 * Cluster name Terraform uses for its own remote state namespace
 */
export const reservedClusterName = "main";

/**
 * Renders the Terraform definition of a single cluster
 */
export interface TemplateRenderer {
  render(
    cluster: Readonly<ClusterConfig>,
    config: Readonly<FleetConfig>,
  ): Promise<string>;
}

// The template ships next to the sources; compiled code runs one level deeper
const defaultTemplates = [
  fileURLToPath(new URL("../templates/cluster.tf.template", import.meta.url)),
  fileURLToPath(
    new URL("../../templates/cluster.tf.template", import.meta.url),
  ),
] as const;

/**
 * Create a renderer that fills in the cluster template
 *
 * Available placeholders: `${CLUSTER_NAME}`, `${REGION}`, `${ACCOUNT_PREFIX}`
 * and `${S3_BUCKETS}`, the latter as a Terraform list literal.
 *
 * @param [templatePath] Template to use instead of the bundled one
 */
export function createTemplateRenderer(templatePath?: string): TemplateRenderer {
  let template: Promise<string> | undefined;

  async function loadTemplate() {
    const path = templatePath ?? (await findFirstExistingFile(defaultTemplates));

    if (!path) {
      throw new ConfigurationError("Could not find the cluster template");
    }

    debug(`Using cluster template "${path}"`);

    return readFile(path, "utf-8");
  }

  return {
    async render(cluster, config) {
      template ??= loadTemplate();

      return renderTemplate(
        await template,
        new Map([
          ["CLUSTER_NAME", cluster.name],
          ["REGION", cluster.region],
          ["ACCOUNT_PREFIX", config.account.prefix],
          ["S3_BUCKETS", JSON.stringify(cluster.buckets ?? [])],
        ]),
        true,
      );
    },
  };
}

/**
 * Write one Terraform file per cluster into the Terraform directory
 *
 * All clusters are validated and rendered before the first file is written.
 *
 * @returns The paths of the written files
 * @throws {InvalidClusterNameError} If a cluster uses the reserved name
 */
export async function generateTerraformFiles({
  config,
  renderer,
  settings,
}: Pick<Context, "config" | "renderer" | "settings">) {
  const reserved = config.clusters.find(
    (cluster) => cluster.name === reservedClusterName,
  );

  if (reserved) {
    throw new InvalidClusterNameError(reserved.name);
  }

  const files: Array<[path: string, contents: string]> = [];

  for (const cluster of config.clusters) {
    files.push([
      join(settings.terraformDirectory, `${cluster.name}.tf`),
      await renderer.render(cluster, config),
    ]);
  }

  for (const [path, contents] of files) {
    await writeFile(path, contents);
    core.info(`Generated ${path}`);
  }

  return files.map(([path]) => path);
}
