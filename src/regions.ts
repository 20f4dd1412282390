/**
 * Deployment regions and organization account roles.
 */

/**
 * Regions where the organization runs GuardDuty. Order is the sweep order
 * used by reconciliation and verification.
 */
export const ALL_REGIONS = [
  "us-east-1",
  "us-east-2",
  "us-west-1",
  "us-west-2",
  "eu-west-1",
  "eu-west-2",
  "eu-west-3",
  "eu-central-1",
  "eu-north-1",
  "ap-southeast-1",
  "ap-southeast-2",
  "ap-northeast-1",
  "ap-northeast-2",
  "ap-northeast-3",
  "ap-south-1",
  "ca-central-1",
  "sa-east-1",
] as const;

export type Region = (typeof ALL_REGIONS)[number];

export const DEFAULT_PRIMARY_REGION: Region = "us-east-1";

const REGION_SET: ReadonlySet<string> = new Set(ALL_REGIONS);

export function isRegion(value: string): value is Region {
  return REGION_SET.has(value);
}

/**
 * Terraform module suffix for a region (us-east-1 -> us_east_1).
 */
export function regionSuffix(region: Region): string {
  return region.replace(/-/g, "_");
}

// =============================================================================
// Account Roles
// =============================================================================

export const ACCOUNT_ROLES = ["management", "audit", "log-archive"] as const;

export type AccountRole = (typeof ACCOUNT_ROLES)[number];

/** Account ID per role. An empty string means the ID is not known. */
export type AccountDirectory = Record<AccountRole, string>;

const ROLE_LABELS: Record<AccountRole, string> = {
  management: "Management",
  audit: "Audit",
  "log-archive": "Log Archive",
};

export function roleLabel(role: AccountRole): string {
  return ROLE_LABELS[role];
}
