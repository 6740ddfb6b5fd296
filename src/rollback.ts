import * as core from "@actions/core";
import {
  LATEST,
  processorKinds,
  type ClusterConfig,
  type FleetConfig,
  type VersionPointer,
} from "./config.js";
import { ConfigurationError } from "./errors.js";

/**
 * Step a version pointer back by one
 *
 * `$LATEST` has no previous published version and is returned as is, and so
 * is version 1.
 *
 * @throws {ConfigurationError} If the pointer is not a positive integer
 */
export function rollbackVersion(pointer: VersionPointer): VersionPointer {
  if (pointer === LATEST) {
    return pointer;
  }

  if (!Number.isInteger(pointer) || pointer < 1) {
    throw new ConfigurationError(`Invalid published version: ${pointer}`);
  }

  return pointer > 1 ? pointer - 1 : pointer;
}

/**
 * Roll every function of every cluster back to its previous published version
 *
 * @returns The updated configuration; the given one is left untouched
 */
export function rollback(config: Readonly<FleetConfig>): FleetConfig {
  const clusters = config.clusters.map<ClusterConfig>((cluster) => {
    const versions = { ...cluster.versions };

    for (const kind of processorKinds) {
      const current = cluster.versions[kind];
      const previous = rollbackVersion(current);

      if (previous === current) {
        core.info(
          `Not rolling back ${kind} in cluster "${cluster.name}" ` +
            `(version ${current})`,
        );
        continue;
      }

      core.info(
        `Rolling back ${kind} in cluster "${cluster.name}" ` +
          `from version ${current} to ${previous}`,
      );
      versions[kind] = previous;
    }

    return { ...cluster, versions };
  });

  return { ...config, clusters };
}
