/**
 * Operator configuration file loader.
 */

import { readFile } from "node:fs/promises";
import * as yaml from "js-yaml";
import { ConfigurationError, formatErrorMessage } from "../errors.js";
import { formatIssues, operatorConfigSchema, type OperatorConfig } from "./schema.js";

export const DEFAULT_CONFIG_PATH = "config.yaml";

/**
 * Parse and validate operator configuration from YAML text.
 */
export function parseOperatorConfig(text: string, source = DEFAULT_CONFIG_PATH): OperatorConfig {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (err) {
    throw new ConfigurationError(`${source} is not valid YAML: ${formatErrorMessage(err)}`, "(file)", source);
  }

  const parsed = operatorConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    const field = parsed.error.issues[0]?.path.join(".") || "(root)";
    throw new ConfigurationError(`Invalid ${source}: ${issues.join("; ")}`, field, source);
  }
  return parsed.data;
}

/**
 * Read the operator configuration file.
 */
export async function loadOperatorConfig(path: string = DEFAULT_CONFIG_PATH): Promise<OperatorConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError(
      `Configuration file ${path} could not be read: ${formatErrorMessage(err)}`,
      "(file)",
      path,
    );
  }
  return parseOperatorConfig(text, path);
}
