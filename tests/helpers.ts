import { vi } from "vitest";
import {
  parseConfig,
  type ClusterConfig,
  type ConfigStore,
  type FleetConfig,
  type ProcessorKind,
} from "../src/config.js";
import type { Context } from "../src/context.js";
import type { TemplateRenderer } from "../src/generate.js";
import type { PackageBuilder } from "../src/package.js";
import type { Prompt } from "../src/prompt.js";
import type { CommandLine, CommandRunner } from "../src/runner.js";
import { defineSettings } from "../src/settings.js";

export const settings = defineSettings({
  awsBinary: "aws",
  configFile: "variables.json",
  packageCommand: ["./scripts/package.sh"],
  terraformBinary: "terraform",
  terraformDirectory: "terraform",
  testCommand: ["./scripts/test.sh"],
});

export function testDocument(): Record<string, unknown> {
  return {
    account: {
      prefix: "acme",
      region: "us-east-1",
      kms_key_alias: "stream_fleet",
    },
    terraform: { tfstate_s3_key: "stream_fleet/terraform.tfstate" },
    clusters: { prod: "us-east-1", staging: "us-west-2" },
    lambda_settings: { prod: [10, 128], staging: [30, 256] },
    kinesis_settings: { prod: [1, 24], staging: [2, 48] },
    rule_processor_versions: { prod: 5, staging: "$LATEST" },
    alert_processor_versions: { prod: 1, staging: 3 },
    s3_event_buckets: { prod: ["acme-logs"] },
  };
}

export function testConfig(document = testDocument()): FleetConfig {
  return parseConfig(document);
}

/**
 * Records every command instead of running it. `respond` decides the result:
 * false fails the command, a string is returned as captured output.
 */
export function createRecordingRunner(
  respond: (command: CommandLine) => boolean | string = () => true,
  log: string[][] = [],
) {
  const commands = log;
  const runner: CommandRunner = {
    run: vi.fn(async (command: CommandLine) => {
      commands.push([...command]);

      return respond(command) !== false;
    }),
    output: vi.fn(async (command: CommandLine) => {
      commands.push([...command]);

      const result = respond(command);

      if (result === false) {
        return undefined;
      }

      return result === true ? "" : result;
    }),
  };

  return { runner, commands };
}

export function createScriptedPrompt(answers: string[]) {
  const queue = [...answers];
  const prompt = {
    question: vi.fn(async () => {
      const answer = queue.shift();

      if (answer === undefined) {
        throw new Error("No scripted answers left");
      }

      return answer;
    }),
    close: vi.fn(),
  } satisfies Prompt;

  return prompt;
}

export function createMemoryStore(config: FleetConfig) {
  const saved: Readonly<FleetConfig>[] = [];
  const store: ConfigStore = {
    path: "variables.json",
    load: vi.fn(async () => config),
    save: vi.fn(async (next: Readonly<FleetConfig>) => {
      saved.push(next);
    }),
  };

  return { store, saved };
}

export function createTestContext({
  answers = ["yes"],
  config = testConfig(),
  respond,
  packageBuilder,
  renderer,
}: {
  answers?: string[];
  config?: FleetConfig;
  respond?: (command: CommandLine) => boolean | string;
  packageBuilder?: PackageBuilder;
  renderer?: TemplateRenderer;
} = {}) {
  const { runner, commands } = createRecordingRunner(respond);
  const shell = createRecordingRunner(respond);
  const prompt = createScriptedPrompt(answers);
  const { store, saved } = createMemoryStore(config);
  const context: Context = {
    settings,
    config,
    store,
    runner,
    shell: shell.runner,
    prompt,
    renderer: renderer ?? {
      render: vi.fn(
        async (cluster: Readonly<ClusterConfig>) => `cluster ${cluster.name}\n`,
      ),
    },
    packageBuilder: packageBuilder ?? {
      build: vi.fn(
        async (_kind: ProcessorKind, current: Readonly<FleetConfig>) => current,
      ),
    },
  };

  return {
    context,
    commands,
    shellCommands: shell.commands,
    prompt,
    saved,
    store,
  };
}
