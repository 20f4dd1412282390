/**
 * Cross-Account Session Provider
 *
 * Exchanges the caller's identity for temporary credentials in a member
 * account through STS AssumeRole on the organization access role.
 */

import { STSClient, AssumeRoleCommand, GetCallerIdentityCommand } from "@aws-sdk/client-sts";
import type { AwsCredentialIdentity } from "@smithy/types";
import { formatErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { isRegion } from "../regions.js";

// =============================================================================
// Types
// =============================================================================

export const DEFAULT_CROSS_ACCOUNT_ROLE = "OrganizationAccountAccessRole";
export const DEFAULT_SESSION_NAME = "guardduty-org-sync";
const DEFAULT_SESSION_DURATION_SECONDS = 900;
/** Cached sessions are dropped this long before STS says they expire. */
const EXPIRY_MARGIN_MS = 60_000;

export interface AssumedSession {
  accountId: string;
  region: string;
  credentials: AwsCredentialIdentity;
}

export type SessionResult =
  | { success: true; data: AssumedSession }
  | { success: false; error: string };

export interface SessionProvider {
  acquireSession(accountId: string, region: string): Promise<SessionResult>;
}

export interface SessionProviderConfig {
  roleName?: string;
  sessionName?: string;
  durationSeconds?: number;
  /** Caller credentials; defaults to the SDK provider chain. */
  credentials?: AwsCredentialIdentity;
  logger?: Logger;
}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create a session provider backed by STS.
 */
export function createSessionProvider(config: SessionProviderConfig = {}): SessionProvider {
  const roleName = config.roleName ?? DEFAULT_CROSS_ACCOUNT_ROLE;
  const sessionName = config.sessionName ?? DEFAULT_SESSION_NAME;
  const durationSeconds = config.durationSeconds ?? DEFAULT_SESSION_DURATION_SECONDS;
  const cache = new Map<string, AssumedSession>();
  const clients = new Map<string, STSClient>();

  function stsClientFor(region: string): STSClient {
    let client = clients.get(region);
    if (!client) {
      client = new STSClient({ region, credentials: config.credentials });
      clients.set(region, client);
    }
    return client;
  }

  function cached(key: string): AssumedSession | undefined {
    const session = cache.get(key);
    if (!session) return undefined;
    const expiration = session.credentials.expiration;
    if (expiration && expiration.getTime() - EXPIRY_MARGIN_MS <= Date.now()) {
      cache.delete(key);
      return undefined;
    }
    return session;
  }

  async function acquireSession(accountId: string, region: string): Promise<SessionResult> {
    if (!accountId) {
      return { success: false, error: "Account ID is required to assume a cross-account role" };
    }
    if (!isRegion(region)) {
      return { success: false, error: `Unknown region: ${region}` };
    }

    const key = `${accountId}:${region}`;
    const hit = cached(key);
    if (hit) return { success: true, data: hit };

    const roleArn = `arn:aws:iam::${accountId}:role/${roleName}`;
    try {
      const response = await stsClientFor(region).send(new AssumeRoleCommand({
        RoleArn: roleArn,
        RoleSessionName: sessionName,
        DurationSeconds: durationSeconds,
      }));

      const creds = response.Credentials;
      if (!creds?.AccessKeyId || !creds.SecretAccessKey) {
        return { success: false, error: `No credentials returned for ${roleArn}` };
      }

      const session: AssumedSession = {
        accountId,
        region,
        credentials: {
          accessKeyId: creds.AccessKeyId,
          secretAccessKey: creds.SecretAccessKey,
          sessionToken: creds.SessionToken,
          expiration: creds.Expiration,
        },
      };
      cache.set(key, session);
      return { success: true, data: session };
    } catch (error) {
      const message = formatErrorMessage(error);
      config.logger?.debug(`Could not assume ${roleArn}`, { region, error: message });
      return { success: false, error: message };
    }
  }

  return { acquireSession };
}

/**
 * Account ID of the caller's own identity (the management account).
 */
export async function resolveCallerAccountId(
  region: string,
  credentials?: AwsCredentialIdentity,
): Promise<string> {
  const client = new STSClient({ region, credentials });
  const identity = await client.send(new GetCallerIdentityCommand({}));
  if (!identity.Account) {
    throw new Error("STS GetCallerIdentity returned no account");
  }
  return identity.Account;
}
