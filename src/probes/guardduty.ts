/**
 * GuardDuty Resource Probes
 *
 * Read-only lookups of organization admin accounts, organization
 * auto-enable configuration, detectors and publishing destinations in one
 * (account, region) pair.
 */

import {
  GuardDutyClient,
  ListDetectorsCommand,
  GetDetectorCommand,
  DescribeOrganizationConfigurationCommand,
  ListOrganizationAdminAccountsCommand,
  ListPublishingDestinationsCommand,
  DescribePublishingDestinationCommand,
} from "@aws-sdk/client-guardduty";
import type { AwsCredentialIdentity } from "@smithy/types";
import { formatErrorMessage, isAccessDeniedError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { Region } from "../regions.js";
import { createAWSRetryRunner, type AWSRetryRunner, type RetryConfig } from "../retry.js";
import type {
  AdminAccountsAttributes,
  AutoEnableMembers,
  DetectorAttributes,
  DiscoveredFact,
  GuardDutyProbes,
  OrganizationConfigurationAttributes,
  PublishingDestinationAttributes,
} from "./types.js";

export interface GuardDutyProbesConfig {
  retry?: RetryConfig;
  logger?: Logger;
}

type DetectorLookup =
  | { kind: "resolved"; detectorId: string }
  | Exclude<DiscoveredFact<never>, { kind: "found" }>;

// =============================================================================
// Decoding Helpers
// =============================================================================

function isEnabled(status: string | undefined): boolean {
  return status === "ENABLED";
}

/**
 * Normalize the organization auto-enable setting. Organizations created
 * before AutoEnableOrganizationMembers existed only report the boolean flag.
 */
export function decodeAutoEnableMembers(value: string | undefined, legacyAutoEnable: boolean | undefined): AutoEnableMembers {
  if (value === "ALL" || value === "NEW" || value === "NONE") return value;
  return legacyAutoEnable ? "NEW" : "NONE";
}

function toError(err: unknown): Extract<DiscoveredFact<never>, { kind: "error" }> {
  return { kind: "error", cause: formatErrorMessage(err), accessDenied: isAccessDeniedError(err) };
}

// =============================================================================
// Probes
// =============================================================================

/**
 * Create the GuardDuty probe set.
 */
export function createGuardDutyProbes(config: GuardDutyProbesConfig = {}): GuardDutyProbes {
  const awsRetry: AWSRetryRunner = createAWSRetryRunner({ retry: config.retry, logger: config.logger });
  const clients = new Map<string, GuardDutyClient>();

  function clientFor(credentials: AwsCredentialIdentity | undefined, region: Region): GuardDutyClient {
    const key = `${region}:${credentials?.accessKeyId ?? "caller"}`;
    let client = clients.get(key);
    if (!client) {
      client = new GuardDutyClient({ region, credentials });
      clients.set(key, client);
    }
    return client;
  }

  /**
   * First detector in the account/region. An empty list means GuardDuty has
   * not been enabled there; a response without the list at all is treated
   * as a fault rather than as absence.
   */
  async function resolveDetector(client: GuardDutyClient, region: Region): Promise<DetectorLookup> {
    try {
      const response = await awsRetry(() => client.send(new ListDetectorsCommand({})), `ListDetectors ${region}`);
      if (!response.DetectorIds) {
        return { kind: "error", cause: "ListDetectors response did not include DetectorIds", accessDenied: false };
      }
      const detectorId = response.DetectorIds[0];
      if (!detectorId) return { kind: "not-found", detail: "No detector found" };
      return { kind: "resolved", detectorId };
    } catch (err) {
      return toError(err);
    }
  }

  async function probeAdminAccounts(
    credentials: AwsCredentialIdentity | undefined,
    region: Region,
  ): Promise<DiscoveredFact<AdminAccountsAttributes>> {
    const client = clientFor(credentials, region);
    try {
      const adminAccountIds: string[] = [];
      let nextToken: string | undefined;
      do {
        const response = await awsRetry(
          () => client.send(new ListOrganizationAdminAccountsCommand({ NextToken: nextToken })),
          `ListOrganizationAdminAccounts ${region}`,
        );
        for (const admin of response.AdminAccounts ?? []) {
          if (admin.AdminAccountId) adminAccountIds.push(admin.AdminAccountId);
        }
        nextToken = response.NextToken;
      } while (nextToken);

      const first = adminAccountIds[0];
      if (!first) return { kind: "not-found", detail: "No delegated admin configured" };
      return { kind: "found", naturalKey: first, attributes: { adminAccountIds } };
    } catch (err) {
      return toError(err);
    }
  }

  async function probeOrganizationConfiguration(
    credentials: AwsCredentialIdentity | undefined,
    region: Region,
  ): Promise<DiscoveredFact<OrganizationConfigurationAttributes>> {
    const client = clientFor(credentials, region);
    const detector = await resolveDetector(client, region);
    if (detector.kind !== "resolved") return detector;

    try {
      const response = await awsRetry(
        () => client.send(new DescribeOrganizationConfigurationCommand({ DetectorId: detector.detectorId })),
        `DescribeOrganizationConfiguration ${region}`,
      );
      const dataSources = response.DataSources;
      return {
        kind: "found",
        naturalKey: detector.detectorId,
        attributes: {
          detectorId: detector.detectorId,
          autoEnableMembers: decodeAutoEnableMembers(response.AutoEnableOrganizationMembers, response.AutoEnable),
          autoEnable: response.AutoEnable ?? false,
          s3Logs: dataSources?.S3Logs?.AutoEnable ?? false,
          kubernetesAuditLogs: dataSources?.Kubernetes?.AuditLogs?.AutoEnable ?? false,
          malwareProtection: dataSources?.MalwareProtection?.ScanEc2InstanceWithFindings?.EbsVolumes?.AutoEnable ?? false,
        },
      };
    } catch (err) {
      return toError(err);
    }
  }

  async function probeDetector(
    credentials: AwsCredentialIdentity | undefined,
    region: Region,
  ): Promise<DiscoveredFact<DetectorAttributes>> {
    const client = clientFor(credentials, region);
    const detector = await resolveDetector(client, region);
    if (detector.kind !== "resolved") return detector;

    try {
      const response = await awsRetry(
        () => client.send(new GetDetectorCommand({ DetectorId: detector.detectorId })),
        `GetDetector ${region}`,
      );
      const dataSources = response.DataSources;
      return {
        kind: "found",
        naturalKey: detector.detectorId,
        attributes: {
          detectorId: detector.detectorId,
          enabled: isEnabled(response.Status),
          s3Logs: isEnabled(dataSources?.S3Logs?.Status),
          kubernetesAuditLogs: isEnabled(dataSources?.Kubernetes?.AuditLogs?.Status),
          malwareProtection: isEnabled(dataSources?.MalwareProtection?.ScanEc2InstanceWithFindings?.EbsVolumes?.Status),
        },
      };
    } catch (err) {
      return toError(err);
    }
  }

  async function probePublishingDestination(
    credentials: AwsCredentialIdentity | undefined,
    region: Region,
  ): Promise<DiscoveredFact<PublishingDestinationAttributes>> {
    const client = clientFor(credentials, region);
    const detector = await resolveDetector(client, region);
    if (detector.kind !== "resolved") return detector;
    const detectorId = detector.detectorId;

    try {
      const listed = await awsRetry(
        () => client.send(new ListPublishingDestinationsCommand({ DetectorId: detectorId })),
        `ListPublishingDestinations ${region}`,
      );
      const destination = (listed.Destinations ?? []).find((d) => d.DestinationType === "S3" && d.DestinationId);
      const destinationId = destination?.DestinationId;
      if (!destination || !destinationId) {
        return { kind: "not-found", detail: "No S3 publishing destination" };
      }

      const detail = await awsRetry(
        () => client.send(new DescribePublishingDestinationCommand({ DetectorId: detectorId, DestinationId: destinationId })),
        `DescribePublishingDestination ${region}`,
      );
      return {
        kind: "found",
        naturalKey: `${detectorId}:${destinationId}`,
        attributes: {
          detectorId,
          destinationId,
          status: destination.Status ?? detail.Status ?? "UNKNOWN",
          destinationArn: detail.DestinationProperties?.DestinationArn,
        },
      };
    } catch (err) {
      return toError(err);
    }
  }

  return {
    probeAdminAccounts,
    probeOrganizationConfiguration,
    probeDetector,
    probePublishingDestination,
  };
}
