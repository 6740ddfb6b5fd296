import { access, constants } from "node:fs/promises";

/**
 * Check if a file or directory exists
 *
 * @param path The path to check
 */
export async function exists(path: string) {
  try {
    await access(path, constants.F_OK);
  } catch {
    return false;
  }

  return true;
}

/**
 * Find the first path from a list of candidates that exists on disk
 */
export async function findFirstExistingFile(candidates: readonly string[]) {
  for (const candidate of candidates) {
    if (await exists(candidate)) {
      return candidate;
    }
  }

  return undefined;
}

/**
 * Substitute template placeholders with values from a Map.
 *
 * Placeholders are upper-case names in braces, so that the Terraform
 * expressions a template contains (`${var.prefix}`, `${module.x.y}`) pass
 * through untouched:
 *
 * - `${NAME}` is replaced with the value of `NAME`.
 * - `${NAME:-fallback}` uses `fallback` if `NAME` is missing or empty.
 * - `$${NAME}` is left as is; Terraform reads `$${` as a literal `${`.
 *
 * When strict mode is enabled, a placeholder without a value and without a
 * fallback throws instead of rendering as an empty string.
 *
 * @param template The text to render
 * @param values Placeholder names mapped to their values
 * @param [strict] If true, throw on placeholders that cannot be resolved
 */
export function renderTemplate(
  template: string,
  values: Map<string, string>,
  strict = false,
): string {
  return template.replace(
    /(?<!\$)\$\{([A-Z_][A-Z0-9_]*)(?::-([^{}]*))?}/g,
    (_match, name: string, fallback: string | undefined) => {
      const value = values.get(name);

      if (value) {
        return value;
      }

      if (fallback !== undefined) {
        return fallback;
      }

      if (value === undefined && strict) {
        throw new Error(`Template placeholder ${name} has no value`);
      }

      return "";
    },
  );
}
