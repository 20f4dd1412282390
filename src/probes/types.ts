/**
 * Discovered facts returned by resource probes.
 *
 * Every AWS response is decoded into one of these records at the probe
 * boundary; nothing past the probes inspects raw SDK shapes.
 */

import type { AwsCredentialIdentity } from "@smithy/types";
import type { Region } from "../regions.js";

export type DiscoveredFact<A> =
  | { kind: "not-found"; detail?: string }
  | { kind: "found"; naturalKey: string; attributes: A }
  | { kind: "error"; cause: string; accessDenied: boolean };

export type AutoEnableMembers = "ALL" | "NEW" | "NONE";

export type ServiceAccessAttributes = {
  servicePrincipal: string;
  enabled: boolean;
};

/** Organizations-level delegated administrator registration. */
export type DelegatedAdministratorAttributes = {
  adminAccountId: string;
};

/** GuardDuty organization admin accounts visible from one region. */
export type AdminAccountsAttributes = {
  adminAccountIds: string[];
};

export type OrganizationConfigurationAttributes = {
  detectorId: string;
  autoEnableMembers: AutoEnableMembers;
  /** Legacy boolean flag on older organizations. */
  autoEnable: boolean;
  s3Logs: boolean;
  kubernetesAuditLogs: boolean;
  malwareProtection: boolean;
};

export type DetectorAttributes = {
  detectorId: string;
  enabled: boolean;
  s3Logs: boolean;
  kubernetesAuditLogs: boolean;
  malwareProtection: boolean;
};

export type PublishingDestinationAttributes = {
  detectorId: string;
  destinationId: string;
  status: string;
  destinationArn?: string;
};

/**
 * Per-region GuardDuty probes. `credentials` undefined means the caller's
 * own identity.
 */
export interface GuardDutyProbes {
  probeAdminAccounts(
    credentials: AwsCredentialIdentity | undefined,
    region: Region,
  ): Promise<DiscoveredFact<AdminAccountsAttributes>>;
  probeOrganizationConfiguration(
    credentials: AwsCredentialIdentity | undefined,
    region: Region,
  ): Promise<DiscoveredFact<OrganizationConfigurationAttributes>>;
  probeDetector(
    credentials: AwsCredentialIdentity | undefined,
    region: Region,
  ): Promise<DiscoveredFact<DetectorAttributes>>;
  probePublishingDestination(
    credentials: AwsCredentialIdentity | undefined,
    region: Region,
  ): Promise<DiscoveredFact<PublishingDestinationAttributes>>;
}

/**
 * Organization-wide probes, always run as the management account.
 */
export interface OrganizationProbes {
  probeServiceAccess(): Promise<DiscoveredFact<ServiceAccessAttributes>>;
  probeDelegatedAdministrator(): Promise<DiscoveredFact<DelegatedAdministratorAttributes>>;
}
