/**
 * Verifier
 *
 * Read-only check of the applied GuardDuty configuration across the
 * organization. Each check lands in one bucket of its dimension: ok,
 * degraded (warning), missing (issue) or error.
 */

import type { AwsCredentialIdentity } from "@smithy/types";
import type { SessionProvider } from "../credentials/session-provider.js";
import type { Logger } from "../logging/logger.js";
import { processPooled } from "../pool.js";
import type { AutoEnableMembers, GuardDutyProbes, OrganizationProbes } from "../probes/types.js";
import { ACCOUNT_ROLES, roleLabel, type AccountDirectory, type AccountRole, type Region } from "../regions.js";

// =============================================================================
// Types
// =============================================================================

export const VERIFICATION_DIMENSIONS = [
  "service-access",
  "delegated-admin",
  "org-configuration",
  "detector",
  "publishing-destination",
] as const;

export type VerificationDimension = (typeof VERIFICATION_DIMENSIONS)[number];

export type DimensionTally = {
  ok: number;
  degraded: number;
  missing: number;
  errors: number;
};

export type Finding = {
  dimension: VerificationDimension;
  severity: "issue" | "warning";
  region?: Region;
  role?: AccountRole;
  message: string;
};

export type Verdict = "pass" | "pass-with-warnings" | "fail";

export interface VerificationReport {
  tallies: Record<VerificationDimension, DimensionTally>;
  issues: Finding[];
  warnings: Finding[];
  verdict: Verdict;
}

export interface VerifierConfig {
  regions: readonly Region[];
  accounts: AccountDirectory;
  desiredAutoEnable: AutoEnableMembers;
  concurrency?: number;
}

export interface VerifierDependencies {
  guardDutyProbes: GuardDutyProbes;
  organizationProbes: OrganizationProbes;
  sessions: SessionProvider;
  logger: Logger;
}

/** One classified check. */
type Observation =
  | { dimension: VerificationDimension; bucket: "ok" }
  | { dimension: VerificationDimension; bucket: "degraded" | "missing"; finding: Finding }
  | { dimension: VerificationDimension; bucket: "error"; cause: string };

export const SUMMARY_LIMIT = 10;

// =============================================================================
// Helpers
// =============================================================================

function emptyTally(): DimensionTally {
  return { ok: 0, degraded: 0, missing: 0, errors: 0 };
}

export function decideVerdict(issues: readonly Finding[], warnings: readonly Finding[]): Verdict {
  if (issues.length > 0) return "fail";
  if (warnings.length > 0) return "pass-with-warnings";
  return "pass";
}

/**
 * Render findings for a summary: the first `limit` messages, then a line
 * counting the rest.
 */
export function formatFindings(findings: readonly Finding[], limit = SUMMARY_LIMIT): string[] {
  const lines = findings.slice(0, limit).map((finding) => finding.message);
  if (findings.length > limit) {
    lines.push(`... and ${findings.length - limit} more`);
  }
  return lines;
}

function missing(
  dimension: VerificationDimension,
  message: string,
  region?: Region,
  role?: AccountRole,
): Observation {
  return { dimension, bucket: "missing", finding: { dimension, severity: "issue", region, role, message } };
}

function degraded(
  dimension: VerificationDimension,
  message: string,
  region?: Region,
  role?: AccountRole,
): Observation {
  return { dimension, bucket: "degraded", finding: { dimension, severity: "warning", region, role, message } };
}

function failed(dimension: VerificationDimension, cause: string): Observation {
  return { dimension, bucket: "error", cause };
}

function missingDataSources(attrs: { s3Logs: boolean; kubernetesAuditLogs: boolean; malwareProtection: boolean }): string[] {
  const gaps: string[] = [];
  if (!attrs.s3Logs) gaps.push("S3");
  if (!attrs.kubernetesAuditLogs) gaps.push("K8s");
  if (!attrs.malwareProtection) gaps.push("Malware");
  return gaps;
}

// =============================================================================
// Verifier
// =============================================================================

export class Verifier {
  constructor(
    private readonly config: VerifierConfig,
    private readonly deps: VerifierDependencies,
  ) {}

  async verify(): Promise<VerificationReport> {
    const log = this.deps.logger.child("verify");
    const observations: Observation[] = [await this.checkServiceAccess()];

    const perRegion = await processPooled(
      this.config.regions,
      (region) => this.checkRegion(region),
      { concurrency: this.config.concurrency ?? 4, onAborted: () => [] },
    );
    for (const regionObservations of perRegion) observations.push(...regionObservations);

    const tallies: Record<VerificationDimension, DimensionTally> = {
      "service-access": emptyTally(),
      "delegated-admin": emptyTally(),
      "org-configuration": emptyTally(),
      detector: emptyTally(),
      "publishing-destination": emptyTally(),
    };
    const issues: Finding[] = [];
    const warnings: Finding[] = [];

    for (const observation of observations) {
      const tally = tallies[observation.dimension];
      switch (observation.bucket) {
        case "ok":
          tally.ok++;
          break;
        case "degraded":
          tally.degraded++;
          warnings.push(observation.finding);
          break;
        case "missing":
          tally.missing++;
          issues.push(observation.finding);
          break;
        case "error":
          tally.errors++;
          log.warn(`${observation.dimension} check failed: ${observation.cause}`);
          break;
      }
    }

    const verdict = decideVerdict(issues, warnings);
    log.info(`Verification ${verdict}: ${issues.length} issues, ${warnings.length} warnings`);
    return { tallies, issues, warnings, verdict };
  }

  private async checkServiceAccess(): Promise<Observation> {
    const fact = await this.deps.organizationProbes.probeServiceAccess();
    switch (fact.kind) {
      case "error":
        return failed("service-access", fact.cause);
      case "not-found":
        return missing("service-access", "GuardDuty service access not enabled in Organizations");
      case "found":
        return fact.attributes.enabled
          ? { dimension: "service-access", bucket: "ok" }
          : missing("service-access", "GuardDuty service access not enabled in Organizations");
    }
  }

  private async checkRegion(region: Region): Promise<Observation[]> {
    const observations: Observation[] = [
      await this.checkDelegatedAdmin(region),
      await this.checkOrganizationConfiguration(region),
    ];
    for (const role of ACCOUNT_ROLES) {
      if (!this.config.accounts[role]) continue;
      observations.push(await this.checkDetector(role, region));
    }
    observations.push(await this.checkPublishingDestination(region));
    return observations;
  }

  private async session(role: AccountRole, region: Region): Promise<
    { success: true; credentials: AwsCredentialIdentity | undefined } | { success: false; error: string }
  > {
    if (role === "management") return { success: true, credentials: undefined };
    const result = await this.deps.sessions.acquireSession(this.config.accounts[role], region);
    if (!result.success) return { success: false, error: result.error };
    return { success: true, credentials: result.data.credentials };
  }

  private async checkDelegatedAdmin(region: Region): Promise<Observation> {
    const fact = await this.deps.guardDutyProbes.probeAdminAccounts(undefined, region);
    switch (fact.kind) {
      case "error":
        return failed("delegated-admin", `${region}: ${fact.cause}`);
      case "not-found":
        return missing("delegated-admin", `${region}: No delegated admin configured`, region);
      case "found":
        if (fact.attributes.adminAccountIds.includes(this.config.accounts.audit)) {
          return { dimension: "delegated-admin", bucket: "ok" };
        }
        return missing("delegated-admin", `${region}: Wrong delegated admin (${fact.naturalKey})`, region);
    }
  }

  /**
   * Read as the audit account (the delegated admin); falls back to the
   * caller's identity when the audit session is unavailable.
   */
  private async checkOrganizationConfiguration(region: Region): Promise<Observation> {
    const session = await this.session("audit", region);
    if (!session.success) {
      this.deps.logger.debug(`Audit session unavailable in ${region}; reading organization configuration as caller`);
    }
    const credentials = session.success ? session.credentials : undefined;

    const fact = await this.deps.guardDutyProbes.probeOrganizationConfiguration(credentials, region);
    switch (fact.kind) {
      case "error":
        return failed("org-configuration", `${region}: ${fact.cause}`);
      case "not-found":
        return missing("org-configuration", `${region}: Org configuration not found`, region);
      case "found": {
        const gaps = missingDataSources(fact.attributes);
        if (fact.attributes.autoEnableMembers !== this.config.desiredAutoEnable) {
          gaps.unshift(`auto_enable=${fact.attributes.autoEnableMembers}`);
        }
        if (gaps.length === 0) return { dimension: "org-configuration", bucket: "ok" };
        return degraded("org-configuration", `${region}: Partial config - missing: ${gaps.join(", ")}`, region);
      }
    }
  }

  private async checkDetector(role: AccountRole, region: Region): Promise<Observation> {
    const label = roleLabel(role);
    const session = await this.session(role, region);
    if (!session.success) {
      return failed("detector", `${label} (${region}): ${session.error}`);
    }

    const fact = await this.deps.guardDutyProbes.probeDetector(session.credentials, region);
    switch (fact.kind) {
      case "error":
        return failed("detector", `${label} (${region}): ${fact.cause}`);
      case "not-found":
        return missing("detector", `${label} (${region}): Detector not enabled`, region, role);
      case "found": {
        if (!fact.attributes.enabled) {
          return missing("detector", `${label} (${region}): Detector not enabled`, region, role);
        }
        const gaps = missingDataSources(fact.attributes);
        if (gaps.length === 0) return { dimension: "detector", bucket: "ok" };
        return degraded("detector", `${label} (${region}): Partial data sources - missing: ${gaps.join(", ")}`, region, role);
      }
    }
  }

  private async checkPublishingDestination(region: Region): Promise<Observation> {
    const session = await this.session("audit", region);
    if (!session.success) {
      return failed("publishing-destination", `Audit (${region}): ${session.error}`);
    }

    const fact = await this.deps.guardDutyProbes.probePublishingDestination(session.credentials, region);
    switch (fact.kind) {
      case "error":
        return failed("publishing-destination", `Audit (${region}): ${fact.cause}`);
      case "not-found":
        return missing("publishing-destination", `Audit (${region}): No S3 publishing destination`, region, "audit");
      case "found":
        if (fact.attributes.status === "PUBLISHING") {
          return { dimension: "publishing-destination", bucket: "ok" };
        }
        return missing(
          "publishing-destination",
          `Audit (${region}): Publishing status is ${fact.attributes.status}`,
          region,
          "audit",
        );
    }
  }
}

export function createVerifier(config: VerifierConfig, deps: VerifierDependencies): Verifier {
  return new Verifier(config, deps);
}
