/**
 * Configuration Merger
 *
 * Combines the operator file with the shared parameter store document.
 * Shared values win whenever they are present and non-empty.
 */

import { ConfigurationError } from "../errors.js";
import { DEFAULT_PRIMARY_REGION, isRegion, type Region } from "../regions.js";
import type { OperatorConfig, SharedConfig } from "./schema.js";
import { buildSyncSettings, type SyncSettings } from "./settings.js";

export type ConfigSource = "shared-store" | "operator" | "default";

export type Sourced<T> = {
  value: T;
  source: ConfigSource;
};

export interface EffectiveConfig {
  primaryRegion: Sourced<string>;
  auditAccountId: Sourced<string>;
  logArchiveAccountId: Sourced<string>;
  organizationId: Sourced<string>;
  tags: Sourced<Record<string, string>>;
  resourcePrefix: Sourced<string>;
  sharedConfigParameter: string;
  sharedStoreAvailable: boolean;
  settings: SyncSettings;
}

/**
 * Effective configuration with every prerequisite present.
 */
export interface ResolvedConfig {
  primaryRegion: Region;
  auditAccountId: string;
  logArchiveAccountId: string;
  organizationId: string;
  tags: Record<string, string>;
  resourcePrefix: string;
  settings: SyncSettings;
}

function isPresent<T>(value: T | undefined): value is T {
  if (value === undefined || value === null) return false;
  if (typeof value === "string") return value.trim() !== "";
  if (typeof value === "object") return Object.keys(value).length > 0;
  return true;
}

function pick<T>(shared: T | undefined, operator: T | undefined, fallback: T): Sourced<T> {
  if (isPresent(shared)) return { value: shared, source: "shared-store" };
  if (isPresent(operator)) return { value: operator, source: "operator" };
  return { value: fallback, source: "default" };
}

/**
 * Merge operator and shared configuration. `shared` is undefined when the
 * parameter could not be read.
 */
export function mergeConfig(operator: OperatorConfig, shared: SharedConfig | undefined): EffectiveConfig {
  return {
    primaryRegion: pick<string>(shared?.primary_region, operator.primary_region, DEFAULT_PRIMARY_REGION),
    auditAccountId: pick(shared?.audit_account_id, operator.audit_account_id, ""),
    logArchiveAccountId: pick(shared?.log_archive_account_id, undefined, ""),
    organizationId: pick(shared?.organization_id, undefined, ""),
    tags: pick(shared?.tags, operator.tags, {}),
    resourcePrefix: pick(undefined, operator.resource_prefix, ""),
    sharedConfigParameter: operator.shared_config_parameter,
    sharedStoreAvailable: shared !== undefined,
    settings: buildSyncSettings(operator),
  };
}

/**
 * Fail the run when a prerequisite is missing, naming the system expected
 * to supply it.
 */
export function requireEffectiveConfig(config: EffectiveConfig, configPath = "config.yaml"): ResolvedConfig {
  const sharedSource = `shared parameter ${config.sharedConfigParameter}`;

  if (!config.auditAccountId.value) {
    const detail = config.sharedStoreAvailable
      ? `${sharedSource} has no audit_account_id`
      : `${sharedSource} could not be read`;
    throw new ConfigurationError(
      `audit_account_id is not configured: ${detail} and ${configPath} does not set it`,
      "audit_account_id",
      sharedSource,
    );
  }

  if (!config.resourcePrefix.value) {
    throw new ConfigurationError(
      `resource_prefix is not configured: set resource_prefix in ${configPath}`,
      "resource_prefix",
      configPath,
    );
  }

  const primaryRegion = config.primaryRegion.value;
  if (!isRegion(primaryRegion)) {
    throw new ConfigurationError(
      `primary_region ${primaryRegion} is not a supported region`,
      "primary_region",
      config.primaryRegion.source === "shared-store" ? sharedSource : configPath,
    );
  }

  return {
    primaryRegion,
    auditAccountId: config.auditAccountId.value,
    logArchiveAccountId: config.logArchiveAccountId.value,
    organizationId: config.organizationId.value,
    tags: config.tags.value,
    resourcePrefix: config.resourcePrefix.value,
    settings: config.settings,
  };
}
