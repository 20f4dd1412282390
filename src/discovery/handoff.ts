/**
 * Hand-off files between the discovery phase and later phases.
 *
 * `discovery.json` records what discovery found; `bootstrap.auto.tfvars.json`
 * feeds Terraform and tells `sync`/`verify` which accounts to use.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import { HandoffFileError, formatErrorMessage } from "../errors.js";

export const DISCOVERY_FILE = "discovery.json";
export const BOOTSTRAP_VARS_FILE = "bootstrap.auto.tfvars.json";

const AccountIdSchema = Type.String({ pattern: "^(\\d{12})?$" });

export const DiscoveryResultSchema = Type.Object({
  management_account_id: AccountIdSchema,
  guardduty_org_exists: Type.Boolean(),
  guardduty_delegated_admin: AccountIdSchema,
  guardduty_auto_enable: Type.Union([
    Type.Literal("ALL"),
    Type.Literal("NEW"),
    Type.Literal("NONE"),
    Type.Literal(""),
  ]),
  guardduty_s3_protection: Type.Boolean(),
  guardduty_eks_protection: Type.Boolean(),
  guardduty_malware_protection: Type.Boolean(),
  discovered_at: Type.String(),
});

export type DiscoveryResult = Static<typeof DiscoveryResultSchema>;

export const BootstrapVarsSchema = Type.Object({
  primary_region: Type.String({ minLength: 1 }),
  resource_prefix: Type.String(),
  audit_account_id: AccountIdSchema,
  log_archive_account_id: AccountIdSchema,
  management_account_id: AccountIdSchema,
  organization_id: Type.String(),
  tags: Type.Record(Type.String(), Type.String()),
  guardduty_org_exists: Type.Boolean(),
  guardduty_delegated_admin: AccountIdSchema,
});

export type BootstrapVars = Static<typeof BootstrapVarsSchema>;

// =============================================================================
// Validation
// =============================================================================

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: string[] };

function validate<S extends TSchema>(schema: S, value: unknown): ValidationResult<Static<S>> {
  if (Check(schema, value)) {
    return { valid: true, value };
  }
  const errors: string[] = [];
  for (const error of Errors(schema, value)) {
    errors.push(`${error.path || "/"}: ${error.message}`);
  }
  return { valid: false, errors };
}

export function validateDiscoveryResult(value: unknown): ValidationResult<DiscoveryResult> {
  return validate(DiscoveryResultSchema, value);
}

export function validateBootstrapVars(value: unknown): ValidationResult<BootstrapVars> {
  return validate(BootstrapVarsSchema, value);
}

// =============================================================================
// File I/O
// =============================================================================

async function writeJson(filePath: string, value: unknown): Promise<string> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, "utf-8");
  return filePath;
}

async function readJson<T>(
  filePath: string,
  check: (value: unknown) => ValidationResult<T>,
  hint: string,
): Promise<T> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new HandoffFileError(`${filePath} could not be read (${hint}): ${formatErrorMessage(err)}`, filePath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new HandoffFileError(`${filePath} is not valid JSON: ${formatErrorMessage(err)}`, filePath);
  }

  const result = check(raw);
  if (!result.valid) {
    throw new HandoffFileError(`${filePath} is invalid: ${result.errors.join("; ")}`, filePath, result.errors);
  }
  return result.value;
}

export function writeDiscoveryResult(terraformDir: string, result: DiscoveryResult): Promise<string> {
  return writeJson(join(terraformDir, DISCOVERY_FILE), result);
}

export function readDiscoveryResult(terraformDir: string): Promise<DiscoveryResult> {
  return readJson(join(terraformDir, DISCOVERY_FILE), validateDiscoveryResult, "run discover first");
}

export function writeBootstrapVars(terraformDir: string, vars: BootstrapVars): Promise<string> {
  return writeJson(join(terraformDir, BOOTSTRAP_VARS_FILE), vars);
}

export function readBootstrapVars(terraformDir: string): Promise<BootstrapVars> {
  return readJson(join(terraformDir, BOOTSTRAP_VARS_FILE), validateBootstrapVars, "run discover first");
}
