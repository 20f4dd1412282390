/**
 * Reconciliation Engine - brings Terraform state in line with the live
 * GuardDuty configuration of the organization.
 *
 * For each (category, role, region) target the engine checks the State
 * Index, acquires a session, probes the live resource and imports it when
 * Terraform does not track it yet. Categories run one after another;
 * targets inside a category run through a bounded worker pool.
 */

import type { AwsCredentialIdentity } from "@smithy/types";
import type { SessionProvider } from "../credentials/session-provider.js";
import { formatErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { processPooled } from "../pool.js";
import type { DiscoveredFact, GuardDutyProbes } from "../probes/types.js";
import { ALL_REGIONS, type AccountDirectory, type AccountRole, type Region } from "../regions.js";
import { retryFixed } from "../retry.js";
import { StateIndex } from "../terraform/state-index.js";
import type { StateStore } from "../terraform/state-store.js";
import { RESOURCE_CATEGORIES, resourceAddress, type ResourceCategory } from "./addresses.js";

// =============================================================================
// Types
// =============================================================================

export type NotApplicableReason =
  | "not-found"
  | "missing-account"
  | "session-unavailable"
  | "admin-mismatch"
  | "policy-excluded"
  | "aborted";

export type ReconciliationOutcome =
  | { kind: "already-tracked" }
  | { kind: "imported"; naturalKey: string }
  | { kind: "import-failed"; reason: string }
  | { kind: "not-applicable"; reason: NotApplicableReason; detail?: string };

export interface ReconciliationTarget {
  category: ResourceCategory;
  /** Account whose resource this is. */
  role: AccountRole;
  region: Region;
  address: string;
}

export interface TargetResult {
  target: ReconciliationTarget;
  outcome: ReconciliationOutcome;
}

export type CategoryCounters = {
  imported: number;
  alreadyTracked: number;
  failed: number;
  skipped: number;
};

export interface ReconciliationReport {
  results: TargetResult[];
  counters: Record<ResourceCategory, CategoryCounters>;
  /** Size of the state snapshot taken at the start of the pass. */
  trackedAtStart: number;
  aborted: boolean;
}

export interface ReconciliationConfig {
  regions: readonly Region[];
  accounts: AccountDirectory;
  /** Roles whose detectors are imported individually. */
  detectorRoles: readonly AccountRole[];
  concurrency: number;
  importAttempts: number;
  importRetryDelayMs: number;
}

export interface ReconciliationDependencies {
  probes: GuardDutyProbes;
  sessions: SessionProvider;
  store: StateStore;
  logger: Logger;
}

/**
 * Raised inside the import retry loop for failures worth another attempt.
 */
export class TransientImportError extends Error {
  constructor(
    message: string,
    public readonly output: string,
  ) {
    super(message);
    this.name = "TransientImportError";
  }
}

type Step<T> = { ok: true; value: T } | { ok: false; outcome: ReconciliationOutcome };

type CategoryPlan = {
  /** Identity the probe runs as. */
  identity: (target: ReconciliationTarget) => AccountRole;
  /** Probe the live resource and decide the import ID. */
  resolve: (credentials: AwsCredentialIdentity | undefined, target: ReconciliationTarget) => Promise<Step<string>>;
};

/**
 * Map a probe result onto the pipeline: absence and probe errors end the
 * target, a found resource goes through `decide`.
 */
function fromFact<A>(
  fact: DiscoveredFact<A>,
  decide: (naturalKey: string, attributes: A) => Step<string> = (naturalKey) => ({ ok: true, value: naturalKey }),
): Step<string> {
  switch (fact.kind) {
    case "not-found":
      return { ok: false, outcome: { kind: "not-applicable", reason: "not-found", detail: fact.detail } };
    case "error":
      return { ok: false, outcome: { kind: "import-failed", reason: `probe failed: ${fact.cause}` } };
    case "found":
      return decide(fact.naturalKey, fact.attributes);
  }
}

function emptyCounters(): CategoryCounters {
  return { imported: 0, alreadyTracked: 0, failed: 0, skipped: 0 };
}

function lastLine(output: string): string {
  const lines = output.split("\n").map((line) => line.trim()).filter((line) => line !== "");
  return lines[lines.length - 1] ?? "no output";
}

export function describeOutcome(outcome: ReconciliationOutcome): string {
  switch (outcome.kind) {
    case "already-tracked":
      return "already tracked";
    case "imported":
      return `imported ${outcome.naturalKey}`;
    case "import-failed":
      return `import failed: ${outcome.reason}`;
    case "not-applicable":
      return outcome.detail ? `skipped (${outcome.reason}): ${outcome.detail}` : `skipped (${outcome.reason})`;
  }
}

// =============================================================================
// Engine
// =============================================================================

export class ReconciliationEngine {
  private readonly plans: Record<ResourceCategory, CategoryPlan>;

  constructor(
    private readonly config: ReconciliationConfig,
    private readonly deps: ReconciliationDependencies,
  ) {
    const { probes } = deps;
    const auditAccountId = config.accounts.audit;

    this.plans = {
      "delegated-admin": {
        identity: () => "management",
        resolve: async (credentials, target) =>
          fromFact(await probes.probeAdminAccounts(credentials, target.region), (naturalKey, attributes) => {
            if (attributes.adminAccountIds.includes(auditAccountId)) return { ok: true, value: auditAccountId };
            return {
              ok: false,
              outcome: { kind: "not-applicable", reason: "admin-mismatch", detail: `Delegated admin is ${naturalKey}` },
            };
          }),
      },
      "org-configuration": {
        identity: () => "audit",
        resolve: async (credentials, target) =>
          fromFact(await probes.probeOrganizationConfiguration(credentials, target.region), (naturalKey, attributes) => {
            // Left for Terraform to create so the desired auto-enable policy applies.
            if (attributes.autoEnableMembers === "NONE") {
              return {
                ok: false,
                outcome: { kind: "not-applicable", reason: "policy-excluded", detail: "Auto-enable is NONE" },
              };
            }
            return { ok: true, value: naturalKey };
          }),
      },
      detector: {
        identity: (target) => target.role,
        resolve: async (credentials, target) => fromFact(await probes.probeDetector(credentials, target.region)),
      },
      "publishing-destination": {
        identity: () => "audit",
        resolve: async (credentials, target) =>
          fromFact(await probes.probePublishingDestination(credentials, target.region)),
      },
    };
  }

  /**
   * Targets of one category in sweep order.
   */
  targetsFor(category: ResourceCategory): ReconciliationTarget[] {
    const roles: readonly AccountRole[] = category === "detector"
      ? this.config.detectorRoles
      : [category === "delegated-admin" ? "management" : "audit"];
    const targets: ReconciliationTarget[] = [];
    for (const region of this.config.regions) {
      for (const role of roles) {
        targets.push({ category, role, region, address: resourceAddress(category, role, region) });
      }
    }
    return targets;
  }

  /**
   * Run one reconciliation pass.
   */
  async reconcile(signal?: AbortSignal): Promise<ReconciliationReport> {
    const log = this.deps.logger.child("reconcile");
    const index = await StateIndex.snapshot(this.deps.store, log);
    const counters: Record<ResourceCategory, CategoryCounters> = {
      "delegated-admin": emptyCounters(),
      "org-configuration": emptyCounters(),
      detector: emptyCounters(),
      "publishing-destination": emptyCounters(),
    };
    const results: TargetResult[] = [];
    let warmUp: Promise<void> | undefined;

    const ensureWarmUp = (): Promise<void> => {
      if (!index.isSnapshotEmpty()) return Promise.resolve();
      warmUp ??= this.warmUp(log);
      return warmUp;
    };

    for (const category of RESOURCE_CATEGORIES) {
      const categoryLog = log.child(category);
      const tally = counters[category];

      const targets = this.targetsFor(category);
      categoryLog.info(`Reconciling ${targets.length} targets`);

      const outcomes = await processPooled(
        targets,
        (target) => this.reconcileTarget(target, index, ensureWarmUp, categoryLog),
        {
          concurrency: this.config.concurrency,
          signal,
          onAborted: (): ReconciliationOutcome => ({ kind: "not-applicable", reason: "aborted" }),
        },
      );

      targets.forEach((target, i) => {
        const outcome = outcomes[i];
        results.push({ target, outcome });
        switch (outcome.kind) {
          case "imported":
            tally.imported++;
            break;
          case "already-tracked":
            tally.alreadyTracked++;
            break;
          case "import-failed":
            tally.failed++;
            break;
          case "not-applicable":
            tally.skipped++;
            break;
        }
      });

      categoryLog.info(
        `imported=${tally.imported} already_tracked=${tally.alreadyTracked} failed=${tally.failed} skipped=${tally.skipped}`,
      );
    }

    return {
      results,
      counters,
      trackedAtStart: index.snapshotSize,
      aborted: signal?.aborted ?? false,
    };
  }

  private async warmUp(log: Logger): Promise<void> {
    log.info("State is empty; refreshing before the first import");
    const refreshed = await this.deps.store.planRefreshOnly();
    if (!refreshed.success) {
      log.warn(`Refresh-only plan failed; continuing with imports: ${refreshed.error ?? "unknown error"}`);
    }
  }

  private async reconcileTarget(
    target: ReconciliationTarget,
    index: StateIndex,
    ensureWarmUp: () => Promise<void>,
    categoryLog: Logger,
  ): Promise<ReconciliationOutcome> {
    const log = categoryLog.withContext({ region: target.region, role: target.role, address: target.address });

    if (index.contains(target.address)) {
      log.debug("Already tracked");
      return { kind: "already-tracked" };
    }

    const plan = this.plans[target.category];

    const credentials = await this.credentialsFor(plan.identity(target), target.region);
    if (!credentials.ok) {
      log.info(describeOutcome(credentials.outcome));
      return credentials.outcome;
    }

    const naturalKey = await this.resolveNaturalKey(plan, credentials.value, target);
    if (!naturalKey.ok) {
      log.info(describeOutcome(naturalKey.outcome));
      return naturalKey.outcome;
    }

    await ensureWarmUp();
    const outcome = await this.importWithRetry(target, naturalKey.value, index, log);
    if (outcome.kind === "import-failed") {
      log.error(describeOutcome(outcome));
    } else {
      log.info(describeOutcome(outcome));
    }
    return outcome;
  }

  /**
   * Credentials for an identity. The management account is the caller's
   * own identity; other roles go through the session provider.
   */
  private async credentialsFor(
    role: AccountRole,
    region: Region,
  ): Promise<Step<AwsCredentialIdentity | undefined>> {
    if (role === "management") return { ok: true, value: undefined };

    const accountId = this.config.accounts[role];
    if (!accountId) {
      return {
        ok: false,
        outcome: { kind: "not-applicable", reason: "missing-account", detail: `No ${role} account ID` },
      };
    }

    const session = await this.deps.sessions.acquireSession(accountId, region);
    if (!session.success) {
      return {
        ok: false,
        outcome: { kind: "not-applicable", reason: "session-unavailable", detail: session.error },
      };
    }
    return { ok: true, value: session.data.credentials };
  }

  private async resolveNaturalKey(
    plan: CategoryPlan,
    credentials: AwsCredentialIdentity | undefined,
    target: ReconciliationTarget,
  ): Promise<Step<string>> {
    // The delegated admin is compared against the audit account.
    if (target.category === "delegated-admin" && !this.config.accounts.audit) {
      return {
        ok: false,
        outcome: { kind: "not-applicable", reason: "missing-account", detail: "No audit account ID" },
      };
    }

    return plan.resolve(credentials, target);
  }

  private async importWithRetry(
    target: ReconciliationTarget,
    naturalKey: string,
    index: StateIndex,
    log: Logger,
  ): Promise<ReconciliationOutcome> {
    try {
      const result = await retryFixed(
        async () => {
          const attempt = await this.deps.store.importResource(target.address, naturalKey);
          if (attempt.status === "transient-failure") {
            throw new TransientImportError(lastLine(attempt.output), attempt.output);
          }
          return attempt;
        },
        {
          attempts: this.config.importAttempts,
          delayMs: this.config.importRetryDelayMs,
          label: `import ${target.address}`,
          shouldRetry: (err) => err instanceof TransientImportError,
          onRetry: (info) => {
            log.warn(`Import attempt ${info.attempt}/${info.maxAttempts} failed, retrying in ${info.delayMs}ms`, {
              error: formatErrorMessage(info.err),
            });
          },
        },
      );

      switch (result.status) {
        case "imported":
          index.record(target.address);
          return { kind: "imported", naturalKey };
        case "already-managed":
          index.record(target.address);
          return { kind: "already-tracked" };
        default:
          return { kind: "import-failed", reason: lastLine(result.output) };
      }
    } catch (err) {
      return { kind: "import-failed", reason: formatErrorMessage(err) };
    }
  }
}

/**
 * Create a reconciliation engine instance
 */
export function createReconciliationEngine(
  config: Partial<ReconciliationConfig> & Pick<ReconciliationConfig, "accounts">,
  deps: ReconciliationDependencies,
): ReconciliationEngine {
  const defaultConfig: Omit<ReconciliationConfig, "accounts"> = {
    regions: ALL_REGIONS,
    detectorRoles: ["audit"],
    concurrency: 4,
    importAttempts: 2,
    importRetryDelayMs: 5_000,
  };

  return new ReconciliationEngine({ ...defaultConfig, ...config }, deps);
}
