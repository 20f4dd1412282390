/**
 * Terraform state store
 *
 * The narrow view of Terraform that reconciliation needs: list tracked
 * addresses, import one resource, refresh the state.
 */

import type { Logger } from "../logging/logger.js";
import { tfImport, tfPlan, tfStateList, type TfCliOptions, type TfCliResult } from "./cli-wrapper.js";

export type ImportStatus = "imported" | "already-managed" | "transient-failure" | "failed";

export interface ImportResult {
  status: ImportStatus;
  output: string;
}

export type ListAddressesResult =
  | { success: true; data: string[] }
  | { success: false; error: string };

export interface StateStore {
  listAddresses(): Promise<ListAddressesResult>;
  importResource(address: string, id: string): Promise<ImportResult>;
  planRefreshOnly(): Promise<{ success: boolean; error?: string }>;
}

const ALREADY_MANAGED_PATTERN = /Resource already managed by Terraform/i;

/** Failures worth another attempt: lock contention, throttling, network. */
const TRANSIENT_IMPORT_PATTERN =
  /Error acquiring the state lock|ThrottlingException|Rate exceeded|TooManyRequests|RequestLimitExceeded|connection reset|i\/o timeout|TLS handshake timeout|unexpected EOF|ServiceUnavailable|503/i;

function combinedOutput(result: TfCliResult): string {
  return [result.stdout, result.stderr].filter((part) => part.trim() !== "").join("\n").trim();
}

/**
 * Classify the outcome of `terraform import`.
 */
export function classifyImportOutput(result: TfCliResult): ImportResult {
  const output = combinedOutput(result);
  if (result.success) return { status: "imported", output };
  if (ALREADY_MANAGED_PATTERN.test(output)) return { status: "already-managed", output };
  if (TRANSIENT_IMPORT_PATTERN.test(output)) return { status: "transient-failure", output };
  return { status: "failed", output };
}

/**
 * Parse `terraform state list` output into addresses.
 */
export function parseStateList(stdout: string): string[] {
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "");
}

/**
 * State store backed by the terraform binary in a working directory.
 */
export class TerraformStateStore implements StateStore {
  constructor(
    private readonly cli: TfCliOptions,
    private readonly logger?: Logger,
  ) {}

  async listAddresses(): Promise<ListAddressesResult> {
    const result = await tfStateList(this.cli);
    if (!result.success) {
      // A fresh working directory has no state yet.
      if (/No state file was found/i.test(result.stderr)) {
        return { success: true, data: [] };
      }
      return { success: false, error: result.stderr.trim() || `terraform state list exited with ${result.exitCode}` };
    }
    return { success: true, data: parseStateList(result.stdout) };
  }

  async importResource(address: string, id: string): Promise<ImportResult> {
    this.logger?.debug(`terraform import ${address} ${id}`);
    return classifyImportOutput(await tfImport(this.cli, address, id));
  }

  async planRefreshOnly(): Promise<{ success: boolean; error?: string }> {
    const result = await tfPlan(this.cli, { refreshOnly: true });
    if (result.success) return { success: true };
    return { success: false, error: result.stderr.trim() || `terraform plan exited with ${result.exitCode}` };
  }
}
