import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import * as core from "@actions/core";
import type {
  ClusterConfig,
  FleetConfig,
  ProcessorArtifact,
  ProcessorKind,
} from "./config.js";
import { errorMessage, PartialDeploymentError } from "./errors.js";
import type { CommandRunner } from "./runner.js";
import type { Settings } from "./settings.js";

/**
 * Builds, uploads and publishes the deployment package of a processor
 */
export interface PackageBuilder {
  /**
   * @returns The configuration with the uploaded artifact and the newly
   *          published versions recorded
   * @throws {PartialDeploymentError} If publishing fails after at least one
   *         cluster got the new version
   * @throws {Error} If any other step fails
   */
  build(
    kind: ProcessorKind,
    config: Readonly<FleetConfig>,
  ): Promise<FleetConfig>;
}

export function sourceBucket(config: Readonly<FleetConfig>) {
  return `${config.account.prefix}.streamfleet.source`;
}

export function functionName(
  config: Readonly<FleetConfig>,
  cluster: Pick<ClusterConfig, "name">,
  kind: ProcessorKind,
) {
  return `${config.account.prefix}_${cluster.name}_streamfleet_${kind}`;
}

/**
 * Create a package builder that shells out to the packaging script and the
 * AWS CLI
 *
 * The packaging script receives the processor kind as its only argument and
 * must print the path of the finished archive as the last line of its output.
 */
export function createPackageBuilder(
  runner: CommandRunner,
  { awsBinary, packageCommand }: Pick<Settings, "awsBinary" | "packageCommand">,
): PackageBuilder {
  const [packager, ...packagerArgs] = packageCommand;

  async function buildArchive(kind: ProcessorKind) {
    core.info(`Building ${kind} package`);

    const output = await runner.output([packager, ...packagerArgs, kind], {
      errorMessage: `Failed to build the ${kind} package`,
    });
    const archive = output
      ?.trim()
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean)
      .pop();

    if (!archive) {
      throw new Error(
        `Failed to build the ${kind} package: the packaging script ` +
          "did not report an archive path",
      );
    }

    return archive;
  }

  async function uploadArchive(
    kind: ProcessorKind,
    archive: string,
    config: Readonly<FleetConfig>,
  ): Promise<Required<ProcessorArtifact>> {
    let hash: string;

    try {
      hash = createHash("sha256")
        .update(await readFile(archive))
        .digest("base64");
    } catch (cause) {
      throw new Error(
        `Failed to read the ${kind} package "${archive}": ${errorMessage(cause)}`,
        { cause },
      );
    }

    const bucket = sourceBucket(config);
    const key = `${kind}/${basename(archive)}`;

    core.info(`Uploading ${kind} package to s3://${bucket}/${key}`);

    const uploaded = await runner.run(
      [
        awsBinary,
        "s3",
        "cp",
        archive,
        `s3://${bucket}/${key}`,
        "--region",
        config.account.region,
      ],
      { errorMessage: `Failed to upload the ${kind} package`, quiet: true },
    );

    if (!uploaded) {
      throw new Error(`Failed to upload the ${kind} package to "${bucket}"`);
    }

    return { sourceBucket: bucket, sourceObjectKey: key, sourceHash: hash };
  }

  async function publishVersion(
    kind: ProcessorKind,
    cluster: Readonly<ClusterConfig>,
    artifact: Required<ProcessorArtifact>,
    config: Readonly<FleetConfig>,
  ) {
    const name = functionName(config, cluster, kind);
    const output = await runner.output(
      [
        awsBinary,
        "lambda",
        "update-function-code",
        "--function-name",
        name,
        "--s3-bucket",
        artifact.sourceBucket,
        "--s3-key",
        artifact.sourceObjectKey,
        "--publish",
        "--query",
        "Version",
        "--output",
        "text",
        "--region",
        cluster.region,
      ],
      { errorMessage: `Failed to publish a new version of ${name}` },
    );
    const version = output?.trim();

    if (!version || !/^\d+$/.test(version)) {
      throw new Error(
        `Failed to publish a new version of ${name}: ` +
          `unexpected version "${version ?? ""}"`,
      );
    }

    core.info(`Published ${name} version ${version}`);

    return Number(version);
  }

  return {
    async build(kind, config) {
      core.startGroup(`Deploying ${kind}`);

      try {
        const archive = await buildArchive(kind);
        const artifact = await uploadArchive(kind, archive, config);
        const clusters: ClusterConfig[] = [];

        const published = (): FleetConfig => ({
          ...config,
          clusters: [...clusters, ...config.clusters.slice(clusters.length)],
          processors: { ...config.processors, [kind]: artifact },
        });

        for (const cluster of config.clusters) {
          let version: number;

          try {
            version = await publishVersion(kind, cluster, artifact, config);
          } catch (cause) {
            if (clusters.length === 0) {
              throw cause;
            }

            throw new PartialDeploymentError(
              errorMessage(cause),
              published(),
              { cause },
            );
          }

          clusters.push({
            ...cluster,
            versions: { ...cluster.versions, [kind]: version },
          });
        }

        return published();
      } finally {
        core.endGroup();
      }
    },
  };
}
