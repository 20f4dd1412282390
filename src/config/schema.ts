/**
 * Configuration schemas
 *
 * Zod schemas for the operator file (config.yaml) and the JSON document
 * held in the shared parameter store.
 */

import { z } from "zod";
import { ACCOUNT_ROLES, ALL_REGIONS } from "../regions.js";

export const DEFAULT_SHARED_CONFIG_PARAMETER = "/organization/shared-config";

/**
 * 12-digit account ID. YAML turns unquoted IDs into numbers, which also
 * drops leading zeros, so numbers are padded back.
 */
export const accountIdSchema = z
  .union([z.string(), z.number().int().nonnegative()])
  .transform((value) => (typeof value === "number" ? String(value).padStart(12, "0") : value.trim()))
  .refine((value) => value === "" || /^\d{12}$/.test(value), {
    message: "Account ID must be 12 digits",
  });

export const MAX_RUN_TIMEOUT_MINUTES = 35_791;

const tagsSchema = z.record(z.string(), z.string());

/**
 * Operator configuration file schema
 */
export const operatorConfigSchema = z.object({
  primary_region: z.string().optional(),
  resource_prefix: z.string().default(""),
  audit_account_id: accountIdSchema.optional(),
  tags: tagsSchema.optional(),
  shared_config_parameter: z.string().min(1).default(DEFAULT_SHARED_CONFIG_PARAMETER),
  cross_account_role_name: z.string().min(1).default("OrganizationAccountAccessRole"),
  desired_auto_enable: z.enum(["ALL", "NEW", "NONE"]).default("ALL"),
  detector_roles: z.array(z.enum(ACCOUNT_ROLES)).min(1).default(["audit"]),
  regions: z.array(z.enum(ALL_REGIONS)).min(1).optional(),
  concurrency: z.number().int().positive().max(32).default(4),
  import_attempts: z.number().int().positive().default(2),
  import_retry_delay_ms: z.number().int().nonnegative().default(5_000),
  // AbortSignal.timeout takes at most 2^31-1 ms.
  run_timeout_minutes: z.number().positive().max(MAX_RUN_TIMEOUT_MINUTES).default(30),
});

export type OperatorConfig = z.infer<typeof operatorConfigSchema>;

/**
 * Fields of the shared parameter store document this tool reads. Each is
 * validated on its own so one bad field does not hide the others.
 */
export const sharedConfigFields = {
  primary_region: z.string().optional(),
  audit_account_id: accountIdSchema.optional(),
  log_archive_account_id: accountIdSchema.optional(),
  organization_id: z.string().optional(),
  tags: tagsSchema.optional(),
};

/**
 * Shared parameter store document schema. Unknown keys are kept; other
 * consumers of the parameter may define them.
 */
export const sharedConfigSchema = z.object(sharedConfigFields).passthrough();

export type SharedConfig = z.infer<typeof sharedConfigSchema>;

/**
 * Render zod issues as `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}
