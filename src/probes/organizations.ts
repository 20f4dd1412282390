/**
 * Organizations Probes
 *
 * Organization-wide facts read with the management account's own identity:
 * GuardDuty trusted service access and the registered delegated
 * administrator.
 */

import {
  OrganizationsClient,
  ListAWSServiceAccessForOrganizationCommand,
  ListDelegatedAdministratorsCommand,
} from "@aws-sdk/client-organizations";
import type { AwsCredentialIdentity } from "@smithy/types";
import { formatErrorMessage, isAccessDeniedError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { createAWSRetryRunner, type RetryConfig } from "../retry.js";
import type {
  DelegatedAdministratorAttributes,
  DiscoveredFact,
  OrganizationProbes,
  ServiceAccessAttributes,
} from "./types.js";

export const GUARDDUTY_SERVICE_PRINCIPAL = "guardduty.amazonaws.com";

export interface OrganizationProbesConfig {
  credentials?: AwsCredentialIdentity;
  retry?: RetryConfig;
  logger?: Logger;
}

export function createOrganizationProbes(config: OrganizationProbesConfig = {}): OrganizationProbes {
  const awsRetry = createAWSRetryRunner({ retry: config.retry, logger: config.logger });
  const client = new OrganizationsClient({
    region: "us-east-1", // Organizations API is global, always use us-east-1
    credentials: config.credentials,
  });

  async function probeServiceAccess(): Promise<DiscoveredFact<ServiceAccessAttributes>> {
    try {
      const principals: string[] = [];
      let nextToken: string | undefined;
      do {
        const response = await awsRetry(
          () => client.send(new ListAWSServiceAccessForOrganizationCommand({ NextToken: nextToken })),
          "ListAWSServiceAccessForOrganization",
        );
        for (const service of response.EnabledServicePrincipals ?? []) {
          if (service.ServicePrincipal) principals.push(service.ServicePrincipal);
        }
        nextToken = response.NextToken;
      } while (nextToken);

      return {
        kind: "found",
        naturalKey: GUARDDUTY_SERVICE_PRINCIPAL,
        attributes: {
          servicePrincipal: GUARDDUTY_SERVICE_PRINCIPAL,
          enabled: principals.includes(GUARDDUTY_SERVICE_PRINCIPAL),
        },
      };
    } catch (err) {
      return { kind: "error", cause: formatErrorMessage(err), accessDenied: isAccessDeniedError(err) };
    }
  }

  /**
   * Access denied here is expected before the organization is set up (or
   * when run outside the management account) and reads as absence.
   */
  async function probeDelegatedAdministrator(): Promise<DiscoveredFact<DelegatedAdministratorAttributes>> {
    try {
      const response = await awsRetry(
        () => client.send(new ListDelegatedAdministratorsCommand({ ServicePrincipal: GUARDDUTY_SERVICE_PRINCIPAL })),
        "ListDelegatedAdministrators",
      );
      const adminAccountId = response.DelegatedAdministrators?.find((admin) => admin.Id)?.Id;
      if (!adminAccountId) return { kind: "not-found", detail: "No delegated admin configured" };
      return { kind: "found", naturalKey: adminAccountId, attributes: { adminAccountId } };
    } catch (err) {
      if (isAccessDeniedError(err)) {
        config.logger?.debug("Delegated administrator lookup denied; treating as not configured");
        return { kind: "not-found", detail: "Access denied" };
      }
      return { kind: "error", cause: formatErrorMessage(err), accessDenied: false };
    }
  }

  return { probeServiceAccess, probeDelegatedAdministrator };
}
