import { describe, it, expect } from "vitest";
import { mergeConfig, requireEffectiveConfig } from "./merger.js";
import { parseSharedConfig } from "./parameter-store.js";
import { operatorConfigSchema, type OperatorConfig, type SharedConfig } from "./schema.js";
import { ConfigurationError } from "../errors.js";

function operator(overrides: Record<string, unknown> = {}): OperatorConfig {
  return operatorConfigSchema.parse({ resource_prefix: "acme", ...overrides });
}

describe("mergeConfig", () => {
  it("prefers shared store values over operator values", () => {
    const shared: SharedConfig = {
      primary_region: "eu-west-1",
      audit_account_id: "222222222222",
      tags: { owner: "platform" },
    };

    const merged = mergeConfig(
      operator({ primary_region: "us-west-2", audit_account_id: "999999999999", tags: { owner: "ops" } }),
      shared,
    );

    expect(merged.primaryRegion).toEqual({ value: "eu-west-1", source: "shared-store" });
    expect(merged.auditAccountId).toEqual({ value: "222222222222", source: "shared-store" });
    expect(merged.tags).toEqual({ value: { owner: "platform" }, source: "shared-store" });
  });

  it("keeps shared account IDs when another shared field is invalid", () => {
    const shared = parseSharedConfig(
      JSON.stringify({
        audit_account_id: "222222222222",
        log_archive_account_id: "333333333333",
        tags: { CostCenter: 1234 },
      }),
    );
    if (!shared.success) throw new Error(shared.error);

    const merged = mergeConfig(operator({ audit_account_id: "999999999999", tags: { owner: "ops" } }), shared.data);

    expect(merged.auditAccountId).toEqual({ value: "222222222222", source: "shared-store" });
    expect(merged.logArchiveAccountId).toEqual({ value: "333333333333", source: "shared-store" });
    expect(merged.tags).toEqual({ value: { owner: "ops" }, source: "operator" });
  });

  it("falls back to operator values when the shared value is empty", () => {
    const merged = mergeConfig(
      operator({ audit_account_id: "999999999999", tags: { owner: "ops" } }),
      { audit_account_id: "", tags: {} },
    );

    expect(merged.auditAccountId).toEqual({ value: "999999999999", source: "operator" });
    expect(merged.tags).toEqual({ value: { owner: "ops" }, source: "operator" });
  });

  it("uses defaults when neither side sets a value", () => {
    const merged = mergeConfig(operator(), undefined);

    expect(merged.primaryRegion).toEqual({ value: "us-east-1", source: "default" });
    expect(merged.auditAccountId).toEqual({ value: "", source: "default" });
    expect(merged.tags).toEqual({ value: {}, source: "default" });
    expect(merged.sharedStoreAvailable).toBe(false);
  });

  it("takes log archive and organization IDs only from the shared store", () => {
    const merged = mergeConfig(operator(), {
      log_archive_account_id: "333333333333",
      organization_id: "o-abc123",
    });

    expect(merged.logArchiveAccountId).toEqual({ value: "333333333333", source: "shared-store" });
    expect(merged.organizationId).toEqual({ value: "o-abc123", source: "shared-store" });
  });

  it("keeps the resource prefix from the operator file", () => {
    expect(mergeConfig(operator(), {}).resourcePrefix).toEqual({ value: "acme", source: "operator" });
  });

  it("derives run settings", () => {
    const merged = mergeConfig(
      operator({ regions: ["eu-west-1", "us-east-1"], run_timeout_minutes: 2, detector_roles: ["audit", "audit"] }),
      undefined,
    );

    expect(merged.settings.regions).toEqual(["us-east-1", "eu-west-1"]);
    expect(merged.settings.runTimeoutMs).toBe(120_000);
    expect(merged.settings.detectorRoles).toEqual(["audit"]);
  });
});

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}

describe("requireEffectiveConfig", () => {
  it("returns the resolved configuration", () => {
    const resolved = requireEffectiveConfig(
      mergeConfig(operator(), { audit_account_id: "222222222222", primary_region: "eu-central-1" }),
    );

    expect(resolved.auditAccountId).toBe("222222222222");
    expect(resolved.primaryRegion).toBe("eu-central-1");
    expect(resolved.resourcePrefix).toBe("acme");
  });

  it("names the shared parameter when the audit account is missing", () => {
    const merged = mergeConfig(operator(), {});

    expect(() => requireEffectiveConfig(merged)).toThrow(
      "audit_account_id is not configured: shared parameter /organization/shared-config has no audit_account_id and config.yaml does not set it",
    );
  });

  it("says when the shared parameter could not be read", () => {
    const err = thrownBy(() => requireEffectiveConfig(mergeConfig(operator(), undefined)));

    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toMatchObject({
      field: "audit_account_id",
      source: "shared parameter /organization/shared-config",
      message:
        "audit_account_id is not configured: shared parameter /organization/shared-config could not be read and config.yaml does not set it",
    });
  });

  it("requires a resource prefix", () => {
    const merged = mergeConfig(operator({ resource_prefix: "" }), { audit_account_id: "222222222222" });

    const err = thrownBy(() => requireEffectiveConfig(merged));
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toMatchObject({ field: "resource_prefix", source: "config.yaml" });
  });

  it("rejects an unsupported primary region", () => {
    const merged = mergeConfig(operator(), { audit_account_id: "222222222222", primary_region: "cn-north-1" });

    expect(thrownBy(() => requireEffectiveConfig(merged))).toMatchObject({
      field: "primary_region",
      source: "shared parameter /organization/shared-config",
    });
  });
});
