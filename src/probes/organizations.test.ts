/**
 * Organizations Probe Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const { mockSend } = vi.hoisted(() => ({ mockSend: vi.fn() }));

vi.mock("@aws-sdk/client-organizations", () => {
  class Command {
    constructor(readonly input: unknown) {}
  }
  return {
    OrganizationsClient: class {
      send(command: unknown) {
        return mockSend(command);
      }
    },
    ListAWSServiceAccessForOrganizationCommand: class ListAWSServiceAccessForOrganizationCommand extends Command {},
    ListDelegatedAdministratorsCommand: class ListDelegatedAdministratorsCommand extends Command {},
  };
});

import { ListDelegatedAdministratorsCommand } from "@aws-sdk/client-organizations";
import { createOrganizationProbes, GUARDDUTY_SERVICE_PRINCIPAL } from "./organizations.js";

class ServiceError extends Error {
  constructor(name: string, message: string) {
    super(message);
    this.name = name;
  }
}

describe("Organization probes", () => {
  const probes = () => createOrganizationProbes({ retry: { attempts: 1 } });

  beforeEach(() => {
    mockSend.mockReset();
  });

  describe("probeServiceAccess", () => {
    it("finds GuardDuty among enabled service principals", async () => {
      mockSend
        .mockResolvedValueOnce({
          EnabledServicePrincipals: [{ ServicePrincipal: "config.amazonaws.com" }],
          NextToken: "page-2",
        })
        .mockResolvedValueOnce({ EnabledServicePrincipals: [{ ServicePrincipal: GUARDDUTY_SERVICE_PRINCIPAL }] });

      await expect(probes().probeServiceAccess()).resolves.toEqual({
        kind: "found",
        naturalKey: GUARDDUTY_SERVICE_PRINCIPAL,
        attributes: { servicePrincipal: GUARDDUTY_SERVICE_PRINCIPAL, enabled: true },
      });
    });

    it("reports GuardDuty missing from the list as disabled", async () => {
      mockSend.mockResolvedValue({ EnabledServicePrincipals: [{ ServicePrincipal: "sso.amazonaws.com" }] });

      await expect(probes().probeServiceAccess()).resolves.toMatchObject({
        kind: "found",
        attributes: { enabled: false },
      });
    });
  });

  describe("probeDelegatedAdministrator", () => {
    it("returns the registered administrator", async () => {
      mockSend.mockImplementation(async (command: unknown) => {
        if (!(command instanceof ListDelegatedAdministratorsCommand)) throw new Error("unexpected command");
        expect(command.input).toEqual({ ServicePrincipal: GUARDDUTY_SERVICE_PRINCIPAL });
        return { DelegatedAdministrators: [{ Id: "222222222222", Status: "ACTIVE" }] };
      });

      await expect(probes().probeDelegatedAdministrator()).resolves.toEqual({
        kind: "found",
        naturalKey: "222222222222",
        attributes: { adminAccountId: "222222222222" },
      });
    });

    it("reports no administrator as not found", async () => {
      mockSend.mockResolvedValue({ DelegatedAdministrators: [] });

      await expect(probes().probeDelegatedAdministrator()).resolves.toEqual({
        kind: "not-found",
        detail: "No delegated admin configured",
      });
    });

    it("reads access denied as not configured", async () => {
      mockSend.mockRejectedValue(new ServiceError("AccessDeniedException", "You don't have permissions to access this resource."));

      await expect(probes().probeDelegatedAdministrator()).resolves.toEqual({
        kind: "not-found",
        detail: "Access denied",
      });
    });

    it("reports other failures as errors", async () => {
      mockSend.mockRejectedValue(new ServiceError("InvalidInputException", "Invalid service principal"));

      await expect(probes().probeDelegatedAdministrator()).resolves.toEqual({
        kind: "error",
        cause: "Invalid service principal",
        accessDenied: false,
      });
    });
  });
});
