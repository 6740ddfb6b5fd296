import * as core from "@actions/core";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { FleetConfig, ProcessorKind } from "../src/config.js";
import {
  deploy,
  parseProcessorSelector,
  selectedProcessors,
} from "../src/deploy.js";
import {
  ConfigurationError,
  PartialDeploymentError,
} from "../src/errors.js";
import type { PackageBuilder } from "../src/package.js";
import { createTestContext, testConfig } from "./helpers.js";

vi.mock("@actions/core");

function createVersionBumpingBuilder(events: string[]) {
  const builder: PackageBuilder = {
    build: vi.fn(async (kind: ProcessorKind, config: Readonly<FleetConfig>) => {
      events.push(`build ${kind}`);

      return {
        ...config,
        clusters: config.clusters.map((cluster) => ({
          ...cluster,
          versions: { ...cluster.versions, [kind]: 9 },
        })),
      };
    }),
  };

  return builder;
}

describe("deploy", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe("parseProcessorSelector", () => {
    it("should accept known selectors", () => {
      expect(parseProcessorSelector("rule")).toBe("rule");
      expect(parseProcessorSelector("alert")).toBe("alert");
      expect(parseProcessorSelector("all")).toBe("all");
    });

    it("should reject anything else", () => {
      expect(() => parseProcessorSelector("rules")).toThrow(
        new ConfigurationError(
          'Unknown processor "rules"; expected one of: rule, alert, all',
        ),
      );
    });
  });

  describe("selectedProcessors", () => {
    it("should map selectors to processor kinds", () => {
      expect(selectedProcessors("rule")).toEqual(["rule_processor"]);
      expect(selectedProcessors("alert")).toEqual(["alert_processor"]);
      expect(selectedProcessors("all")).toEqual([
        "rule_processor",
        "alert_processor",
      ]);
    });
  });

  describe("deploy", () => {
    it("should save after each build and then apply the primary module", async () => {
      const events: string[] = [];
      const packageBuilder = createVersionBumpingBuilder(events);
      const { context, commands, store } = createTestContext({
        packageBuilder,
      });

      vi.mocked(store.save).mockImplementation(async () => {
        events.push(`save after ${commands.length} commands`);
      });

      await expect(deploy(context, "all")).resolves.toMatchObject({
        outcome: "applied",
      });
      expect(events).toEqual([
        "build rule_processor",
        "save after 0 commands",
        "build alert_processor",
        "save after 0 commands",
      ]);
      expect(commands.map(([, verb]) => verb)).toEqual([
        "remote",
        "get",
        "plan",
        "apply",
      ]);
      expect(commands[2]).toEqual([
        "terraform",
        "plan",
        "-input=false",
        "-var-file=../variables.json",
        "-target=module.stream_fleet_prod",
        "-target=module.stream_fleet_staging",
      ]);
      expect(core.info).toHaveBeenCalledWith(
        'Saved new versions to "variables.json"',
      );
    });

    it("should only build the selected processor", async () => {
      const events: string[] = [];
      const packageBuilder = createVersionBumpingBuilder(events);
      const { context, saved } = createTestContext({ packageBuilder });

      const { config } = await deploy(context, "alert");

      expect(events).toEqual(["build alert_processor"]);
      expect(saved).toEqual([config]);
      expect(config.clusters.map(({ versions }) => versions)).toEqual([
        { rule_processor: 5, alert_processor: 9 },
        { rule_processor: "$LATEST", alert_processor: 9 },
      ]);
    });

    it("should keep the saved versions when the operator declines", async () => {
      const packageBuilder = createVersionBumpingBuilder([]);
      const { context, commands, saved } = createTestContext({
        answers: ["no"],
        packageBuilder,
      });

      const result = await deploy(context, "rule");

      expect(result.outcome).toBe("rejected");
      expect(saved).toHaveLength(1);
      expect(commands.map(([, verb]) => verb)).not.toContain("apply");
    });

    it("should keep the versions of processors published before a failure", async () => {
      const events: string[] = [];
      const bumping = createVersionBumpingBuilder(events);
      const { context, commands, saved } = createTestContext({
        packageBuilder: {
          build: vi.fn(
            async (kind: ProcessorKind, config: Readonly<FleetConfig>) => {
              if (kind === "alert_processor") {
                throw new Error("Failed to build the alert_processor package");
              }

              return bumping.build(kind, config);
            },
          ),
        },
      });

      await expect(deploy(context, "all")).rejects.toThrow(
        "Failed to build the alert_processor package",
      );
      expect(saved).toHaveLength(1);
      expect(saved[0].clusters.map(({ versions }) => versions)).toEqual([
        { rule_processor: 9, alert_processor: 1 },
        { rule_processor: 9, alert_processor: 3 },
      ]);
      expect(commands).toEqual([]);
    });

    it("should save the clusters a processor reached before publishing failed", async () => {
      const config = testConfig();
      const partial = {
        ...config,
        clusters: [
          {
            ...config.clusters[0],
            versions: { ...config.clusters[0].versions, rule_processor: 6 },
          },
          config.clusters[1],
        ],
      };
      const { context, saved } = createTestContext({
        config,
        packageBuilder: {
          build: vi.fn(async () => {
            throw new PartialDeploymentError("Failed to publish", partial);
          }),
        },
      });

      await expect(deploy(context, "rule")).rejects.toThrow(
        PartialDeploymentError,
      );
      expect(saved).toEqual([partial]);
      expect(core.info).toHaveBeenCalledWith(
        'Saved the versions published so far to "variables.json"',
      );
    });

    it("should neither save nor plan if a build fails", async () => {
      const { context, commands, saved } = createTestContext({
        packageBuilder: {
          build: vi.fn(async () => {
            throw new Error("Failed to build the rule_processor package");
          }),
        },
      });

      await expect(deploy(context, "all")).rejects.toThrow(
        "Failed to build the rule_processor package",
      );
      expect(saved).toEqual([]);
      expect(commands).toEqual([]);
    });
  });
});
