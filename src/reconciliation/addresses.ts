/**
 * Terraform resource addresses of the GuardDuty modules.
 */

import { regionSuffix, type AccountRole, type Region } from "../regions.js";

export const RESOURCE_CATEGORIES = [
  "delegated-admin",
  "org-configuration",
  "detector",
  "publishing-destination",
] as const;

export type ResourceCategory = (typeof RESOURCE_CATEGORIES)[number];

function moduleRole(role: AccountRole): string {
  return role.replace(/-/g, "_");
}

/**
 * Canonical address for a (category, role, region) target. `role` only
 * affects detector addresses.
 */
export function resourceAddress(category: ResourceCategory, role: AccountRole, region: Region): string {
  const suffix = regionSuffix(region);
  switch (category) {
    case "delegated-admin":
      return `module.guardduty_org_${suffix}[0].aws_guardduty_organization_admin_account.main`;
    case "org-configuration":
      return `module.guardduty_org_config_${suffix}[0].aws_guardduty_organization_configuration.main`;
    case "detector":
      return `module.guardduty_${moduleRole(role)}_${suffix}[0].aws_guardduty_detector.main`;
    case "publishing-destination":
      return `module.guardduty_publishing_${suffix}[0].aws_guardduty_publishing_destination.main`;
  }
}
