/**
 * guardduty-org-sync: library surface
 */

export * from "./regions.js";
export * from "./errors.js";
export { createLogger, type Logger, type LogLevel } from "./logging/logger.js";
export { createSessionProvider, resolveCallerAccountId, type SessionProvider, type SessionResult } from "./credentials/session-provider.js";
export type * from "./probes/types.js";
export { createGuardDutyProbes } from "./probes/guardduty.js";
export { createOrganizationProbes } from "./probes/organizations.js";
export { loadOperatorConfig, parseOperatorConfig } from "./config/loader.js";
export { mergeConfig, requireEffectiveConfig, type EffectiveConfig, type ResolvedConfig } from "./config/merger.js";
export { createParameterStoreReader } from "./config/parameter-store.js";
export { discoverOrganization, buildBootstrapVars } from "./discovery/discover.js";
export * from "./discovery/handoff.js";
export { TerraformStateStore, classifyImportOutput, type StateStore } from "./terraform/state-store.js";
export { StateIndex } from "./terraform/state-index.js";
export { resourceAddress, RESOURCE_CATEGORIES, type ResourceCategory } from "./reconciliation/addresses.js";
export * from "./reconciliation/engine.js";
export * from "./verification/verifier.js";
export { runCli, createProgram, defaultRuntime, type CliRuntime } from "./cli.js";
