/**
 * Run settings derived from the operator configuration file.
 */

import { ALL_REGIONS, type AccountRole, type Region } from "../regions.js";
import type { AutoEnableMembers } from "../probes/types.js";
import type { OperatorConfig } from "./schema.js";

export interface SyncSettings {
  crossAccountRoleName: string;
  /** Organization auto-enable value the verifier expects. */
  desiredAutoEnable: AutoEnableMembers;
  /** Roles whose detectors are imported and verified individually. */
  detectorRoles: AccountRole[];
  regions: Region[];
  concurrency: number;
  importAttempts: number;
  importRetryDelayMs: number;
  runTimeoutMs: number;
}

export function buildSyncSettings(operator: OperatorConfig): SyncSettings {
  // Subset overrides keep the canonical sweep order.
  const regions = operator.regions
    ? ALL_REGIONS.filter((region) => operator.regions?.includes(region))
    : [...ALL_REGIONS];

  return {
    crossAccountRoleName: operator.cross_account_role_name,
    desiredAutoEnable: operator.desired_auto_enable,
    detectorRoles: [...new Set(operator.detector_roles)],
    regions,
    concurrency: operator.concurrency,
    importAttempts: operator.import_attempts,
    importRetryDelayMs: operator.import_retry_delay_ms,
    runTimeoutMs: Math.round(operator.run_timeout_minutes * 60_000),
  };
}
