import { readFile, writeFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./errors.js";
import { debug } from "./logging.js";

/**
 * Version pointer of a function that has never been published
 */
export const LATEST = "$LATEST";

export type VersionPointer = typeof LATEST | number;

export const processorKinds = ["rule_processor", "alert_processor"] as const;

export type ProcessorKind = (typeof processorKinds)[number];

export interface ClusterConfig {
  name: string;
  region: string;
  lambda: {
    timeout: number;
    memory: number;
  };
  kinesis: {
    shards: number;
    retentionHours: number;
  };
  versions: Record<ProcessorKind, VersionPointer>;
  buckets?: string[];
}

export interface ProcessorArtifact {
  sourceBucket?: string;
  sourceObjectKey?: string;
  sourceHash?: string;
}

export interface FleetConfig {
  account: {
    prefix: string;
    region: string;
    kmsKeyAlias: string;
  };
  terraform: {
    stateKey: string;
  };
  clusters: ClusterConfig[];
  processors: Record<ProcessorKind, ProcessorArtifact>;

  /**
   * The document the configuration was parsed from. Keys the CLI does not
   * model are written back unchanged.
   */
  document: Readonly<Record<string, unknown>>;
}

export interface ConfigStore {
  readonly path: string;
  load(): Promise<FleetConfig>;
  save(config: Readonly<FleetConfig>): Promise<void>;
}

const versionPointerSchema = z.union([
  z.literal(LATEST),
  z.number().int().positive(),
  z
    .string()
    .regex(/^\d+$/, "Expected a published version number or $LATEST")
    .transform(Number)
    .pipe(z.number().int().positive()),
]);

const settingsPairSchema = z.tuple([z.number(), z.number()]);

const artifactSchema = z
  .object({
    source_bucket: z.string().optional(),
    source_object_key: z.string().optional(),
    source_current_hash: z.string().optional(),
  })
  .passthrough();

const configFileSchema = z
  .object({
    account: z
      .object({
        prefix: z.string().min(1),
        region: z.string().min(1),
        kms_key_alias: z.string().min(1),
      })
      .passthrough(),
    terraform: z
      .object({
        tfstate_s3_key: z.string().min(1),
      })
      .passthrough(),
    clusters: z.record(z.string().min(1), z.string().min(1)),
    lambda_settings: z.record(z.string(), settingsPairSchema),
    kinesis_settings: z.record(z.string(), settingsPairSchema),
    rule_processor_versions: z
      .record(z.string(), versionPointerSchema)
      .optional(),
    alert_processor_versions: z
      .record(z.string(), versionPointerSchema)
      .optional(),
    rule_processor_config: artifactSchema.optional(),
    alert_processor_config: artifactSchema.optional(),
    s3_event_buckets: z.record(z.string(), z.array(z.string())).optional(),
  })
  .passthrough();

type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Parse and validate a configuration document
 *
 * @param document The decoded JSON document
 * @throws {ConfigurationError} If the document is malformed or incomplete
 */
export function parseConfig(document: unknown): FleetConfig {
  const result = configFileSchema.safeParse(document);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");

    throw new ConfigurationError(`Invalid cluster configuration: ${issues}`, {
      cause: result.error,
    });
  }

  const file = result.data;
  const clusters = Object.entries(file.clusters).map<ClusterConfig>(
    ([name, region]) => {
      const lambda = file.lambda_settings[name];
      const kinesis = file.kinesis_settings[name];

      if (!lambda) {
        throw new ConfigurationError(
          `Missing lambda_settings for cluster "${name}"`,
        );
      }

      if (!kinesis) {
        throw new ConfigurationError(
          `Missing kinesis_settings for cluster "${name}"`,
        );
      }

      const buckets = file.s3_event_buckets?.[name];

      return {
        name,
        region,
        lambda: { timeout: lambda[0], memory: lambda[1] },
        kinesis: { shards: kinesis[0], retentionHours: kinesis[1] },
        versions: {
          rule_processor: file.rule_processor_versions?.[name] ?? LATEST,
          alert_processor: file.alert_processor_versions?.[name] ?? LATEST,
        },
        ...(buckets ? { buckets } : {}),
      };
    },
  );

  return {
    account: {
      prefix: file.account.prefix,
      region: file.account.region,
      kmsKeyAlias: file.account.kms_key_alias,
    },
    terraform: { stateKey: file.terraform.tfstate_s3_key },
    clusters,
    processors: {
      rule_processor: parseArtifact(file.rule_processor_config),
      alert_processor: parseArtifact(file.alert_processor_config),
    },
    document: file,
  };
}

function parseArtifact(
  artifact: ConfigFile["rule_processor_config"],
): ProcessorArtifact {
  return {
    sourceBucket: artifact?.source_bucket,
    sourceObjectKey: artifact?.source_object_key,
    sourceHash: artifact?.source_current_hash,
  };
}

/**
 * Convert a configuration back into its on-disk document
 */
export function serializeConfig(
  config: Readonly<FleetConfig>,
): Record<string, unknown> {
  const { document } = config;
  const perCluster = <T>(select: (cluster: ClusterConfig) => T) =>
    Object.fromEntries(
      config.clusters.map((cluster) => [cluster.name, select(cluster)]),
    );
  const buckets = config.clusters.filter((cluster) => cluster.buckets);

  const serialized: Record<string, unknown> = {
    ...document,
    account: {
      ...asRecord(document.account),
      prefix: config.account.prefix,
      region: config.account.region,
      kms_key_alias: config.account.kmsKeyAlias,
    },
    terraform: {
      ...asRecord(document.terraform),
      tfstate_s3_key: config.terraform.stateKey,
    },
    clusters: perCluster((cluster) => cluster.region),
    lambda_settings: perCluster((cluster) => [
      cluster.lambda.timeout,
      cluster.lambda.memory,
    ]),
    kinesis_settings: perCluster((cluster) => [
      cluster.kinesis.shards,
      cluster.kinesis.retentionHours,
    ]),
  };

  for (const kind of processorKinds) {
    const artifact = config.processors[kind];

    serialized[`${kind}_versions`] = perCluster(
      (cluster) => cluster.versions[kind],
    );
    serialized[`${kind}_config`] = {
      ...asRecord(document[`${kind}_config`]),
      ...(artifact.sourceBucket !== undefined
        ? { source_bucket: artifact.sourceBucket }
        : {}),
      ...(artifact.sourceObjectKey !== undefined
        ? { source_object_key: artifact.sourceObjectKey }
        : {}),
      ...(artifact.sourceHash !== undefined
        ? { source_current_hash: artifact.sourceHash }
        : {}),
    };
  }

  if (buckets.length > 0 || document.s3_event_buckets !== undefined) {
    serialized.s3_event_buckets = Object.fromEntries(
      buckets.map((cluster) => [cluster.name, cluster.buckets]),
    );
  }

  return serialized;
}

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return {};
  }

  return Object.fromEntries(Object.entries(value));
}

/**
 * Look up a cluster by name
 *
 * @throws {ConfigurationError} If no cluster of that name is configured
 */
export function findCluster(config: Readonly<FleetConfig>, name: string) {
  const cluster = config.clusters.find((cluster) => cluster.name === name);

  if (!cluster) {
    throw new ConfigurationError(
      `Unknown cluster "${name}"; configured clusters: ` +
        config.clusters.map((cluster) => cluster.name).join(", "),
    );
  }

  return cluster;
}

/**
 * Create a store that keeps the configuration in a JSON file. The same file is
 * passed to Terraform as its variable file.
 *
 * @param path Path to the configuration file
 */
export function createFileConfigStore(path: string): ConfigStore {
  return {
    path,

    async load() {
      debug(`Loading cluster configuration from "${path}"`);

      let content: string;

      try {
        content = await readFile(path, "utf-8");
      } catch (cause) {
        throw new ConfigurationError(
          `Failed to read cluster configuration "${path}": ${errorMessage(cause)}`,
          { cause },
        );
      }

      let document: unknown;

      try {
        document = JSON.parse(content);
      } catch (cause) {
        throw new ConfigurationError(
          `Failed to parse cluster configuration "${path}": ${errorMessage(cause)}`,
          { cause },
        );
      }

      return parseConfig(document);
    },

    async save(config) {
      debug(`Writing cluster configuration to "${path}"`);

      const content = JSON.stringify(serializeConfig(config), null, 2);

      try {
        await writeFile(path, `${content}\n`);
      } catch (cause) {
        throw new Error(
          `Failed to write cluster configuration "${path}": ${errorMessage(cause)}`,
          { cause },
        );
      }
    },
  };
}
