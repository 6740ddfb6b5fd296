import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import {
  exists,
  findFirstExistingFile,
  renderTemplate,
} from "../src/utils.js";

const base = fileURLToPath(new URL(".", import.meta.url));

describe("Utilities", () => {
  describe("exists", () => {
    it("should return true for existing files", async () => {
      await expect(exists(`${base}/../package.json`)).resolves.toBe(true);
    });

    it("should return false for non-existing files", async () => {
      await expect(exists("some-missing-file.json")).resolves.toBe(false);
    });
  });

  describe("findFirstExistingFile", () => {
    it("should return the first candidate that exists", async () => {
      await expect(
        findFirstExistingFile([
          "some-missing-file.json",
          `${base}/../templates/cluster.tf.template`,
          `${base}/../package.json`,
        ]),
      ).resolves.toBe(`${base}/../templates/cluster.tf.template`);
    });

    it("should return undefined if none exists", async () => {
      await expect(
        findFirstExistingFile(["some-missing-file.json"]),
      ).resolves.toBeUndefined();
    });
  });

  describe("renderTemplate", () => {
    const values = new Map([
      ["CLUSTER_NAME", "prod"],
      ["EMPTY", ""],
    ]);

    it("should replace placeholders", () => {
      expect(renderTemplate('module "kinesis_${CLUSTER_NAME}" {', values)).toBe(
        'module "kinesis_prod" {',
      );
    });

    it("should replace every occurrence", () => {
      expect(renderTemplate("${CLUSTER_NAME}-${CLUSTER_NAME}", values)).toBe(
        "prod-prod",
      );
    });

    it("should leave Terraform expressions alone", () => {
      expect(
        renderTemplate('"${var.clusters["${CLUSTER_NAME}"]}"', values),
      ).toBe('"${var.clusters["prod"]}"');
      expect(
        renderTemplate("${module.stream_fleet_${CLUSTER_NAME}.arn}", values),
      ).toBe("${module.stream_fleet_prod.arn}");
    });

    it("should leave escaped placeholders alone", () => {
      expect(renderTemplate("$${CLUSTER_NAME}", values)).toBe(
        "$${CLUSTER_NAME}",
      );
    });

    it("should use the fallback for missing or empty values", () => {
      expect(renderTemplate("${BUCKETS:-[]}", values)).toBe("[]");
      expect(renderTemplate("${EMPTY:-none}", values)).toBe("none");
      expect(renderTemplate("${CLUSTER_NAME:-none}", values)).toBe("prod");
    });

    it("should render missing values as empty strings", () => {
      expect(renderTemplate("[${MISSING}]", values)).toBe("[]");
    });

    it("should throw on missing values in strict mode", () => {
      expect(() => renderTemplate("${MISSING}", values, true)).toThrow(
        "Template placeholder MISSING has no value",
      );
    });

    it("should accept empty values in strict mode", () => {
      expect(renderTemplate("[${EMPTY}]", values, true)).toBe("[]");
    });
  });
});
