/**
 * Shared configuration reader backed by SSM Parameter Store.
 *
 * The organization's shared settings live in one JSON-encoded parameter
 * written by the account-provisioning pipeline.
 */

import { SSMClient, GetParameterCommand } from "@aws-sdk/client-ssm";
import type { AwsCredentialIdentity } from "@smithy/types";
import type { ZodTypeAny } from "zod";
import { extractErrorCode, formatErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { createAWSRetryRunner, type RetryConfig } from "../retry.js";
import { formatIssues, sharedConfigFields, sharedConfigSchema, type SharedConfig } from "./schema.js";

export type SharedConfigResult =
  | { success: true; data: SharedConfig }
  | { success: false; error: string; notFound: boolean };

export interface SharedConfigReader {
  readSharedConfig(parameterName: string): Promise<SharedConfigResult>;
}

export interface ParameterStoreReaderConfig {
  region: string;
  credentials?: AwsCredentialIdentity;
  retry?: RetryConfig;
  logger?: Logger;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decode the parameter value. Known fields that fail validation are
 * dropped with a warning; the rest of the document is kept.
 */
export function parseSharedConfig(value: string, logger?: Logger): SharedConfigResult {
  let raw: unknown;
  try {
    raw = JSON.parse(value);
  } catch (err) {
    return { success: false, error: `Shared configuration is not valid JSON: ${formatErrorMessage(err)}`, notFound: false };
  }
  if (!isJsonObject(raw)) {
    return { success: false, error: "Invalid shared configuration: expected a JSON object", notFound: false };
  }

  const kept: Record<string, unknown> = { ...raw };
  const fields: Array<[string, ZodTypeAny]> = Object.entries(sharedConfigFields);
  for (const [field, schema] of fields) {
    const checked = schema.safeParse(kept[field]);
    if (checked.success) continue;
    delete kept[field];
    for (const issue of checked.error.issues) {
      const path = [field, ...issue.path].join(".");
      logger?.warn(`Ignoring invalid shared configuration field ${path}: ${issue.message}`);
    }
  }

  const parsed = sharedConfigSchema.safeParse(kept);
  if (!parsed.success) {
    return { success: false, error: `Invalid shared configuration: ${formatIssues(parsed.error).join("; ")}`, notFound: false };
  }
  return { success: true, data: parsed.data };
}

export function createParameterStoreReader(config: ParameterStoreReaderConfig): SharedConfigReader {
  const awsRetry = createAWSRetryRunner({ retry: config.retry, logger: config.logger });
  const client = new SSMClient({ region: config.region, credentials: config.credentials });

  async function readSharedConfig(parameterName: string): Promise<SharedConfigResult> {
    try {
      const response = await awsRetry(
        () => client.send(new GetParameterCommand({ Name: parameterName, WithDecryption: true })),
        `GetParameter ${parameterName}`,
      );
      const value = response.Parameter?.Value;
      if (!value) {
        return { success: false, error: `Parameter ${parameterName} has no value`, notFound: true };
      }
      return parseSharedConfig(value, config.logger);
    } catch (err) {
      const notFound = extractErrorCode(err) === "ParameterNotFound"
        || (err instanceof Error && err.name === "ParameterNotFound");
      return { success: false, error: formatErrorMessage(err), notFound };
    }
  }

  return { readSharedConfig };
}
