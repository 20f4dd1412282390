/**
 * guardduty-org-sync: CLI Commands
 */

import { Command } from "commander";
import { loadOperatorConfig, DEFAULT_CONFIG_PATH } from "./config/loader.js";
import { mergeConfig, requireEffectiveConfig, type ResolvedConfig } from "./config/merger.js";
import { createParameterStoreReader, type SharedConfigReader } from "./config/parameter-store.js";
import type { SharedConfig } from "./config/schema.js";
import { createSessionProvider, resolveCallerAccountId, type SessionProvider } from "./credentials/session-provider.js";
import { buildBootstrapVars, discoverOrganization } from "./discovery/discover.js";
import {
  readBootstrapVars,
  writeBootstrapVars,
  writeDiscoveryResult,
  type BootstrapVars,
} from "./discovery/handoff.js";
import { ConfigurationError, HandoffFileError, formatErrorMessage } from "./errors.js";
import {
  ConsoleTransport,
  FileTransport,
  closeTransports,
  createLogger,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LogTransport,
} from "./logging/logger.js";
import { createGuardDutyProbes } from "./probes/guardduty.js";
import { createOrganizationProbes } from "./probes/organizations.js";
import type { GuardDutyProbes, OrganizationProbes } from "./probes/types.js";
import { createReconciliationEngine, type ReconciliationReport } from "./reconciliation/engine.js";
import { DEFAULT_PRIMARY_REGION, isRegion, type AccountDirectory } from "./regions.js";
import {
  tfApply,
  tfDestroy,
  tfInit,
  tfOutput,
  tfPlan,
  type TfCliOptions,
  type TfCliResult,
} from "./terraform/cli-wrapper.js";
import { TerraformStateStore, type StateStore } from "./terraform/state-store.js";
import { createVerifier, formatFindings, type VerificationReport } from "./verification/verifier.js";

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_CONFIG = 2;

export const PIPELINE_MODES = ["plan", "apply", "destroy"] as const;

export type PipelineMode = (typeof PIPELINE_MODES)[number];

/** Terraform output printed after a successful apply. */
export const SUMMARY_OUTPUT = "guardduty_summary";

/** Plan, apply and destroy run far longer than state commands. */
const LONG_RUNNING_TIMEOUT_MS = 60 * 60_000;

// =============================================================================
// Runtime
// =============================================================================

/**
 * External collaborators of the CLI. Tests swap these for in-process fakes.
 */
export interface CliRuntime {
  createOrganizationProbes(logger: Logger): OrganizationProbes;
  createGuardDutyProbes(logger: Logger): GuardDutyProbes;
  createSessionProvider(roleName: string, logger: Logger): SessionProvider;
  createSharedConfigReader(region: string, logger: Logger): SharedConfigReader;
  createStateStore(cli: TfCliOptions, logger: Logger): StateStore;
  resolveManagementAccountId(region: string): Promise<string>;
  terraform: {
    init(cli: TfCliOptions): Promise<TfCliResult>;
    plan(cli: TfCliOptions): Promise<TfCliResult>;
    apply(cli: TfCliOptions): Promise<TfCliResult>;
    destroy(cli: TfCliOptions): Promise<TfCliResult>;
    output(cli: TfCliOptions, name: string): Promise<TfCliResult>;
  };
  /** Command output (summaries, JSON). Logs go through the logger. */
  print(text: string): void;
  env: Record<string, string | undefined>;
  logTransports?: LogTransport[];
}

export const defaultRuntime: CliRuntime = {
  createOrganizationProbes: (logger) => createOrganizationProbes({ logger }),
  createGuardDutyProbes: (logger) => createGuardDutyProbes({ logger }),
  createSessionProvider: (roleName, logger) => createSessionProvider({ roleName, logger }),
  createSharedConfigReader: (region, logger) => createParameterStoreReader({ region, logger }),
  createStateStore: (cli, logger) => new TerraformStateStore(cli, logger),
  resolveManagementAccountId: (region) => resolveCallerAccountId(region),
  terraform: {
    init: (cli) => tfInit(cli),
    plan: (cli) => tfPlan({ ...cli, timeout: LONG_RUNNING_TIMEOUT_MS }, { out: "guardduty.tfplan" }),
    apply: (cli) => tfApply({ ...cli, timeout: LONG_RUNNING_TIMEOUT_MS }),
    destroy: (cli) => tfDestroy({ ...cli, timeout: LONG_RUNNING_TIMEOUT_MS }),
    output: (cli, name) => tfOutput(cli, name),
  },
  print: (text) => console.log(text),
  env: process.env,
};

type GlobalOptions = {
  config?: string;
  terraformDir?: string;
  logLevel?: string;
  logFile?: string;
  json?: boolean;
};

type CommandContext = {
  runtime: CliRuntime;
  logger: Logger;
  configPath: string;
  terraformDir: string;
  cli: TfCliOptions;
  json: boolean;
};

// =============================================================================
// Shared steps
// =============================================================================

async function loadConfig(ctx: CommandContext): Promise<ResolvedConfig> {
  const operator = await loadOperatorConfig(ctx.configPath);
  const storeRegion = operator.primary_region && isRegion(operator.primary_region)
    ? operator.primary_region
    : DEFAULT_PRIMARY_REGION;

  let shared: SharedConfig | undefined;
  const reader = ctx.runtime.createSharedConfigReader(storeRegion, ctx.logger);
  const read = await reader.readSharedConfig(operator.shared_config_parameter);
  if (read.success) {
    shared = read.data;
  } else {
    ctx.logger.warn(
      `Shared parameter ${operator.shared_config_parameter} unavailable; using ${ctx.configPath} only: ${read.error}`,
    );
  }

  const merged = mergeConfig(operator, shared);
  ctx.logger.debug("Effective configuration", {
    primaryRegion: merged.primaryRegion,
    auditAccountId: merged.auditAccountId,
    logArchiveAccountId: merged.logArchiveAccountId,
  });
  return requireEffectiveConfig(merged, ctx.configPath);
}

function accountsFromBootstrap(vars: BootstrapVars, source: string): AccountDirectory {
  if (!vars.audit_account_id) {
    throw new ConfigurationError(`audit_account_id is empty in ${source}`, "audit_account_id", source);
  }
  return {
    management: vars.management_account_id,
    audit: vars.audit_account_id,
    "log-archive": vars.log_archive_account_id,
  };
}

function printReconciliation(ctx: CommandContext, report: ReconciliationReport): void {
  if (ctx.json) {
    ctx.runtime.print(JSON.stringify(report, null, 2));
    return;
  }
  ctx.runtime.print("\nReconciliation:");
  for (const [category, c] of Object.entries(report.counters)) {
    ctx.runtime.print(
      `  ${category}: imported=${c.imported} already_tracked=${c.alreadyTracked} failed=${c.failed} skipped=${c.skipped}`,
    );
  }
  if (report.aborted) ctx.runtime.print("  Run timed out; remaining targets were skipped");
}

function printVerification(ctx: CommandContext, report: VerificationReport): void {
  if (ctx.json) {
    ctx.runtime.print(JSON.stringify(report, null, 2));
    return;
  }
  ctx.runtime.print("\nVerification:");
  for (const [dimension, t] of Object.entries(report.tallies)) {
    ctx.runtime.print(`  ${dimension}: ok=${t.ok} degraded=${t.degraded} missing=${t.missing} errors=${t.errors}`);
  }
  if (report.issues.length > 0) {
    ctx.runtime.print(`\nIssues (${report.issues.length}):`);
    for (const line of formatFindings(report.issues)) ctx.runtime.print(`  - ${line}`);
  }
  if (report.warnings.length > 0) {
    ctx.runtime.print(`\nWarnings (${report.warnings.length}):`);
    for (const line of formatFindings(report.warnings)) ctx.runtime.print(`  - ${line}`);
  }
  ctx.runtime.print(`\nVerdict: ${report.verdict}`);
}

// =============================================================================
// Commands
// =============================================================================

async function runDiscover(ctx: CommandContext): Promise<number> {
  const config = await loadConfig(ctx);
  const discovery = await discoverOrganization(config, {
    organizationProbes: ctx.runtime.createOrganizationProbes(ctx.logger),
    guardDutyProbes: ctx.runtime.createGuardDutyProbes(ctx.logger),
    sessions: ctx.runtime.createSessionProvider(config.settings.crossAccountRoleName, ctx.logger),
    resolveManagementAccountId: () => ctx.runtime.resolveManagementAccountId(config.primaryRegion),
    logger: ctx.logger,
  });

  const discoveryPath = await writeDiscoveryResult(ctx.terraformDir, discovery);
  const varsPath = await writeBootstrapVars(ctx.terraformDir, buildBootstrapVars(config, discovery));
  ctx.logger.info(`Wrote ${discoveryPath} and ${varsPath}`);

  if (ctx.json) {
    ctx.runtime.print(JSON.stringify(discovery, null, 2));
  } else {
    ctx.runtime.print(`\nGuardDuty organization exists: ${discovery.guardduty_org_exists}`);
    ctx.runtime.print(`Delegated admin: ${discovery.guardduty_delegated_admin || "(none)"}`);
    ctx.runtime.print(`Auto-enable: ${discovery.guardduty_auto_enable || "(unknown)"}`);
  }
  return EXIT_OK;
}

async function runSync(ctx: CommandContext): Promise<number> {
  const config = await loadConfig(ctx);
  const vars = await readBootstrapVars(ctx.terraformDir);
  const accounts = accountsFromBootstrap(vars, `${ctx.terraformDir}/bootstrap.auto.tfvars.json`);
  const { settings } = config;

  const engine = createReconciliationEngine(
    {
      regions: settings.regions,
      accounts,
      detectorRoles: settings.detectorRoles,
      concurrency: settings.concurrency,
      importAttempts: settings.importAttempts,
      importRetryDelayMs: settings.importRetryDelayMs,
    },
    {
      probes: ctx.runtime.createGuardDutyProbes(ctx.logger),
      sessions: ctx.runtime.createSessionProvider(settings.crossAccountRoleName, ctx.logger),
      store: ctx.runtime.createStateStore(ctx.cli, ctx.logger),
      logger: ctx.logger,
    },
  );

  const report = await engine.reconcile(AbortSignal.timeout(settings.runTimeoutMs));
  printReconciliation(ctx, report);

  const failed = Object.values(report.counters).reduce((sum, c) => sum + c.failed, 0);
  return failed > 0 || report.aborted ? EXIT_FAILED : EXIT_OK;
}

async function runVerify(ctx: CommandContext): Promise<number> {
  const config = await loadConfig(ctx);
  const vars = await readBootstrapVars(ctx.terraformDir);
  const accounts = accountsFromBootstrap(vars, `${ctx.terraformDir}/bootstrap.auto.tfvars.json`);

  const verifier = createVerifier(
    {
      regions: config.settings.regions,
      accounts,
      desiredAutoEnable: config.settings.desiredAutoEnable,
      concurrency: config.settings.concurrency,
    },
    {
      guardDutyProbes: ctx.runtime.createGuardDutyProbes(ctx.logger),
      organizationProbes: ctx.runtime.createOrganizationProbes(ctx.logger),
      sessions: ctx.runtime.createSessionProvider(config.settings.crossAccountRoleName, ctx.logger),
      logger: ctx.logger,
    },
  );

  const report = await verifier.verify();
  printVerification(ctx, report);
  return report.verdict === "fail" ? EXIT_FAILED : EXIT_OK;
}

/**
 * Verification after `plan` is a preview: its findings are printed and its
 * verdict does not change the exit code.
 */
async function previewVerification(ctx: CommandContext): Promise<void> {
  if (!ctx.json) ctx.runtime.print("\nVerification preview:");
  try {
    await runVerify(ctx);
  } catch (err) {
    ctx.logger.warn(`Verification preview failed: ${formatErrorMessage(err)}`);
  }
}

async function printSummary(ctx: CommandContext): Promise<void> {
  const result = await ctx.runtime.terraform.output(ctx.cli, SUMMARY_OUTPUT);
  if (!result.success || result.json === undefined) {
    ctx.logger.debug(`terraform output ${SUMMARY_OUTPUT} unavailable: ${result.stderr.trim()}`);
    ctx.runtime.print("\nNo summary output available");
    return;
  }
  if (!ctx.json) ctx.runtime.print("\nSummary:");
  ctx.runtime.print(JSON.stringify(result.json, null, 2));
}

async function runPipeline(ctx: CommandContext, mode: PipelineMode): Promise<number> {
  await runDiscover(ctx);

  const init = await ctx.runtime.terraform.init(ctx.cli);
  if (!init.success) {
    ctx.logger.error(`terraform init failed: ${init.stderr.trim()}`);
    return EXIT_FAILED;
  }

  const synced = await runSync(ctx);
  if (synced !== EXIT_OK) {
    ctx.logger.warn("Reconciliation reported failures; continuing");
  }

  const step = await ctx.runtime.terraform[mode](ctx.cli);
  if (!step.success) {
    ctx.logger.error(`terraform ${mode} failed: ${step.stderr.trim()}`);
    return EXIT_FAILED;
  }
  ctx.logger.info(`terraform ${mode} completed`);

  switch (mode) {
    case "destroy":
      return synced;
    case "plan":
      await previewVerification(ctx);
      return synced;
    case "apply": {
      const verified = await runVerify(ctx);
      await printSummary(ctx);
      return Math.max(synced, verified);
    }
  }
}

function isPipelineMode(value: string): value is PipelineMode {
  return PIPELINE_MODES.some((mode) => mode === value);
}

// =============================================================================
// Program
// =============================================================================

function resolveLogLevel(value: string | undefined): LogLevel {
  if (value === undefined) return "info";
  if (!isLogLevel(value)) {
    throw new ConfigurationError(`Unknown log level: ${value}`, "log-level", "--log-level");
  }
  return value;
}

/**
 * Build the commander program. `onExit` receives each command's exit code.
 */
export function createProgram(runtime: CliRuntime, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name("guardduty-org-sync")
    .description("Reconcile organization GuardDuty configuration with Terraform state")
    .option("-c, --config <path>", "Operator configuration file", runtime.env.GUARDDUTY_SYNC_CONFIG ?? DEFAULT_CONFIG_PATH)
    .option("-t, --terraform-dir <dir>", "Terraform working directory", runtime.env.GUARDDUTY_SYNC_TERRAFORM_DIR ?? ".")
    .option("--log-level <level>", "trace | debug | info | warn | error | fatal", runtime.env.GUARDDUTY_SYNC_LOG_LEVEL)
    .option("--log-file <path>", "Also write logs to this file")
    .option("--json", "Output as JSON");

  const execute = (body: (ctx: CommandContext) => Promise<number>) => async () => {
    const opts = program.opts<GlobalOptions>();
    const transports: LogTransport[] = [...(runtime.logTransports ?? [new ConsoleTransport()])];
    const fileTransport = opts.logFile ? new FileTransport({ filePath: opts.logFile }) : undefined;
    if (fileTransport) transports.push(fileTransport);

    let code: number;
    let logger: Logger | undefined;
    const fatal = (message: string) => (logger ? logger.fatal(message) : console.error(message));
    try {
      logger = createLogger({ level: resolveLogLevel(opts.logLevel), transports });
      const terraformDir = opts.terraformDir ?? ".";
      code = await body({
        runtime,
        logger,
        configPath: opts.config ?? DEFAULT_CONFIG_PATH,
        terraformDir,
        cli: { cwd: terraformDir, terraformBin: runtime.env.TERRAFORM_BIN },
        json: opts.json ?? false,
      });
    } catch (err) {
      if (err instanceof ConfigurationError) {
        fatal(`Configuration error (${err.field}, from ${err.source}): ${err.message}`);
        code = EXIT_CONFIG;
      } else if (err instanceof HandoffFileError) {
        fatal(err.message);
        code = EXIT_CONFIG;
      } else {
        fatal(`Error: ${formatErrorMessage(err)}`);
        code = EXIT_FAILED;
      }
    } finally {
      if (fileTransport) await closeTransports([fileTransport]);
    }
    onExit(code);
  };

  program
    .command("discover")
    .description("Discover existing GuardDuty organization setup and write hand-off files")
    .action(execute(runDiscover));

  program
    .command("sync")
    .description("Import existing GuardDuty resources into Terraform state")
    .action(execute(runSync));

  program
    .command("verify")
    .description("Verify GuardDuty configuration across the organization")
    .action(execute(runVerify));

  program
    .command("run")
    .description("Discover, init, sync, then plan, apply or destroy")
    .argument("<mode>", PIPELINE_MODES.join(" | "))
    .action(async (mode: string) => {
      if (!isPipelineMode(mode)) {
        console.error(`Unknown mode: ${mode} (expected ${PIPELINE_MODES.join(", ")})`);
        onExit(EXIT_CONFIG);
        return;
      }
      await execute((ctx) => runPipeline(ctx, mode))();
    });

  return program;
}

/**
 * Parse argv and run the selected command. Resolves to the exit code.
 */
export async function runCli(argv: string[], runtime: CliRuntime = defaultRuntime): Promise<number> {
  let exitCode = EXIT_OK;
  const program = createProgram(runtime, (code) => {
    exitCode = code;
  });
  await program.parseAsync(argv, { from: "user" });
  return exitCode;
}
