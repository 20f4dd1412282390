/**
 * Discovery phase
 *
 * Reads the organization's existing GuardDuty setup before Terraform runs
 * and produces the hand-off records consumed by `sync` and `verify`.
 */

import type { ResolvedConfig } from "../config/merger.js";
import type { SessionProvider } from "../credentials/session-provider.js";
import type { Logger } from "../logging/logger.js";
import type { GuardDutyProbes, OrganizationProbes } from "../probes/types.js";
import type { BootstrapVars, DiscoveryResult } from "./handoff.js";

export interface DiscoveryDependencies {
  organizationProbes: OrganizationProbes;
  guardDutyProbes: GuardDutyProbes;
  sessions: SessionProvider;
  /** Resolves the caller's (management) account ID. */
  resolveManagementAccountId: () => Promise<string>;
  logger: Logger;
  now?: () => Date;
}

export async function discoverOrganization(
  config: ResolvedConfig,
  deps: DiscoveryDependencies,
): Promise<DiscoveryResult> {
  const log = deps.logger.child("discover");
  const managementAccountId = await deps.resolveManagementAccountId();
  log.info(`Management account: ${managementAccountId}`);

  const result: DiscoveryResult = {
    management_account_id: managementAccountId,
    guardduty_org_exists: false,
    guardduty_delegated_admin: "",
    guardduty_auto_enable: "",
    guardduty_s3_protection: false,
    guardduty_eks_protection: false,
    guardduty_malware_protection: false,
    discovered_at: (deps.now ?? (() => new Date()))().toISOString(),
  };

  const admin = await deps.organizationProbes.probeDelegatedAdministrator();
  if (admin.kind === "error") {
    log.warn(`Delegated administrator lookup failed: ${admin.cause}`);
    return result;
  }
  if (admin.kind === "not-found") {
    log.info("No GuardDuty delegated administrator registered");
    return result;
  }

  result.guardduty_org_exists = true;
  result.guardduty_delegated_admin = admin.attributes.adminAccountId;
  log.info(`GuardDuty delegated administrator: ${admin.attributes.adminAccountId}`);

  if (admin.attributes.adminAccountId !== config.auditAccountId) {
    log.warn(
      `Delegated administrator ${admin.attributes.adminAccountId} is not the audit account ${config.auditAccountId}`,
    );
    return result;
  }

  const session = await deps.sessions.acquireSession(config.auditAccountId, config.primaryRegion);
  if (!session.success) {
    log.warn(`Could not assume role in audit account: ${session.error}`);
    return result;
  }

  const orgConfig = await deps.guardDutyProbes.probeOrganizationConfiguration(
    session.data.credentials,
    config.primaryRegion,
  );
  if (orgConfig.kind === "found") {
    const attrs = orgConfig.attributes;
    result.guardduty_auto_enable = attrs.autoEnableMembers;
    result.guardduty_s3_protection = attrs.s3Logs;
    result.guardduty_eks_protection = attrs.kubernetesAuditLogs;
    result.guardduty_malware_protection = attrs.malwareProtection;
    log.info(`Organization auto-enable: ${attrs.autoEnableMembers}`);
  } else if (orgConfig.kind === "error") {
    log.warn(`Organization configuration lookup failed: ${orgConfig.cause}`);
  } else {
    log.info("No organization configuration in the audit account");
  }

  return result;
}

/**
 * Terraform variables for the bootstrap run.
 */
export function buildBootstrapVars(config: ResolvedConfig, discovery: DiscoveryResult): BootstrapVars {
  return {
    primary_region: config.primaryRegion,
    resource_prefix: config.resourcePrefix,
    audit_account_id: config.auditAccountId,
    log_archive_account_id: config.logArchiveAccountId,
    management_account_id: discovery.management_account_id,
    organization_id: config.organizationId,
    tags: config.tags,
    guardduty_org_exists: discovery.guardduty_org_exists,
    guardduty_delegated_admin: discovery.guardduty_delegated_admin,
  };
}
