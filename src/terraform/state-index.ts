/**
 * State Index
 *
 * Snapshot of the addresses Terraform tracks, taken once per
 * reconciliation pass, plus an overlay of addresses imported during the
 * pass. The store is never re-queried mid-pass.
 */

import type { Logger } from "../logging/logger.js";
import type { StateStore } from "./state-store.js";

export class StateIndex {
  private readonly overlay = new Set<string>();

  private constructor(
    private readonly tracked: ReadonlySet<string>,
    readonly snapshotFailed: boolean,
  ) {}

  /**
   * List the store once. A failed listing yields an empty snapshot so the
   * pass falls back to probing and importing every target.
   */
  static async snapshot(store: StateStore, logger?: Logger): Promise<StateIndex> {
    const listed = await store.listAddresses();
    if (!listed.success) {
      logger?.warn(`Could not list Terraform state; treating it as empty: ${listed.error}`);
      return new StateIndex(new Set(), true);
    }
    logger?.debug(`Terraform state tracks ${listed.data.length} resources`);
    return new StateIndex(new Set(listed.data), false);
  }

  static fromAddresses(addresses: Iterable<string>): StateIndex {
    return new StateIndex(new Set(addresses), false);
  }

  contains(address: string): boolean {
    return this.tracked.has(address) || this.overlay.has(address);
  }

  record(address: string): void {
    this.overlay.add(address);
  }

  /** Size of the snapshot taken at the start of the pass. */
  get snapshotSize(): number {
    return this.tracked.size;
  }

  get size(): number {
    let extra = 0;
    for (const address of this.overlay) {
      if (!this.tracked.has(address)) extra++;
    }
    return this.tracked.size + extra;
  }

  isSnapshotEmpty(): boolean {
    return this.tracked.size === 0;
  }
}
