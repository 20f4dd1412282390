/**
 * GuardDuty Probe Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

const { mockSend, clientConfigs } = vi.hoisted(() => {
  const clientConfigs: unknown[] = [];
  return { mockSend: vi.fn(), clientConfigs };
});

vi.mock("@aws-sdk/client-guardduty", () => {
  class Command {
    constructor(readonly input: unknown) {}
  }
  return {
    GuardDutyClient: class {
      constructor(config: unknown) {
        clientConfigs.push(config);
      }
      send(command: unknown) {
        return mockSend(command);
      }
    },
    ListDetectorsCommand: class ListDetectorsCommand extends Command {},
    GetDetectorCommand: class GetDetectorCommand extends Command {},
    DescribeOrganizationConfigurationCommand: class DescribeOrganizationConfigurationCommand extends Command {},
    ListOrganizationAdminAccountsCommand: class ListOrganizationAdminAccountsCommand extends Command {},
    ListPublishingDestinationsCommand: class ListPublishingDestinationsCommand extends Command {},
    DescribePublishingDestinationCommand: class DescribePublishingDestinationCommand extends Command {},
  };
});

import {
  DescribeOrganizationConfigurationCommand,
  DescribePublishingDestinationCommand,
  GetDetectorCommand,
  ListDetectorsCommand,
  ListOrganizationAdminAccountsCommand,
  ListPublishingDestinationsCommand,
} from "@aws-sdk/client-guardduty";
import { createGuardDutyProbes, decodeAutoEnableMembers } from "./guardduty.js";

class AccessDeniedException extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AccessDeniedException";
  }
}

const CREDS = { accessKeyId: "AKIATEST", secretAccessKey: "test-secret", sessionToken: "test-token" };

describe("GuardDuty probes", () => {
  const probes = () => createGuardDutyProbes({ retry: { attempts: 1 } });

  beforeEach(() => {
    mockSend.mockReset();
    clientConfigs.length = 0;
  });

  describe("probeDetector", () => {
    it("decodes detector status and data sources", async () => {
      mockSend.mockImplementation(async (command: unknown) => {
        if (command instanceof ListDetectorsCommand) return { DetectorIds: ["det-1"] };
        if (command instanceof GetDetectorCommand) {
          return {
            Status: "ENABLED",
            DataSources: {
              S3Logs: { Status: "ENABLED" },
              Kubernetes: { AuditLogs: { Status: "DISABLED" } },
              MalwareProtection: { ScanEc2InstanceWithFindings: { EbsVolumes: { Status: "ENABLED" } } },
            },
          };
        }
        throw new Error(`unexpected command`);
      });

      const fact = await probes().probeDetector(CREDS, "eu-west-1");

      expect(fact).toEqual({
        kind: "found",
        naturalKey: "det-1",
        attributes: {
          detectorId: "det-1",
          enabled: true,
          s3Logs: true,
          kubernetesAuditLogs: false,
          malwareProtection: true,
        },
      });
      expect(clientConfigs).toEqual([{ region: "eu-west-1", credentials: CREDS }]);
    });

    it("decodes missing data sources as disabled", async () => {
      mockSend.mockImplementation(async (command: unknown) => {
        if (command instanceof ListDetectorsCommand) return { DetectorIds: ["det-1"] };
        return { Status: "DISABLED" };
      });

      const fact = await probes().probeDetector(undefined, "us-east-1");

      expect(fact).toMatchObject({
        kind: "found",
        attributes: { enabled: false, s3Logs: false, kubernetesAuditLogs: false, malwareProtection: false },
      });
    });

    it("reports an empty detector list as not found", async () => {
      mockSend.mockResolvedValue({ DetectorIds: [] });

      await expect(probes().probeDetector(CREDS, "us-east-1")).resolves.toEqual({
        kind: "not-found",
        detail: "No detector found",
      });
    });

    it("reports a response without a detector list as an error", async () => {
      mockSend.mockResolvedValue({});

      await expect(probes().probeDetector(CREDS, "us-east-1")).resolves.toEqual({
        kind: "error",
        cause: "ListDetectors response did not include DetectorIds",
        accessDenied: false,
      });
    });

    it("flags access denied", async () => {
      mockSend.mockRejectedValue(new AccessDeniedException("User is not authorized to perform: guardduty:ListDetectors"));

      await expect(probes().probeDetector(CREDS, "ap-south-1")).resolves.toEqual({
        kind: "error",
        cause: "User is not authorized to perform: guardduty:ListDetectors",
        accessDenied: true,
      });
    });

    it("reuses one client per region and identity", async () => {
      mockSend.mockResolvedValue({ DetectorIds: [] });
      const shared = probes();

      await shared.probeDetector(CREDS, "us-east-1");
      await shared.probeDetector(CREDS, "us-east-1");
      await shared.probeDetector(undefined, "us-east-1");

      expect(clientConfigs).toHaveLength(2);
    });
  });

  describe("probeOrganizationConfiguration", () => {
    it("reads the configuration of the resolved detector", async () => {
      mockSend.mockImplementation(async (command: unknown) => {
        if (command instanceof ListDetectorsCommand) return { DetectorIds: ["det-9"] };
        if (command instanceof DescribeOrganizationConfigurationCommand) {
          expect(command.input).toEqual({ DetectorId: "det-9" });
          return {
            AutoEnable: true,
            AutoEnableOrganizationMembers: "ALL",
            DataSources: {
              S3Logs: { AutoEnable: true },
              Kubernetes: { AuditLogs: { AutoEnable: true } },
              MalwareProtection: { ScanEc2InstanceWithFindings: { EbsVolumes: { AutoEnable: false } } },
            },
          };
        }
        throw new Error(`unexpected command`);
      });

      await expect(probes().probeOrganizationConfiguration(CREDS, "us-east-1")).resolves.toEqual({
        kind: "found",
        naturalKey: "det-9",
        attributes: {
          detectorId: "det-9",
          autoEnableMembers: "ALL",
          autoEnable: true,
          s3Logs: true,
          kubernetesAuditLogs: true,
          malwareProtection: false,
        },
      });
    });
  });

  describe("probeAdminAccounts", () => {
    it("collects admin accounts across pages", async () => {
      mockSend.mockImplementation(async (command: unknown) => {
        if (!(command instanceof ListOrganizationAdminAccountsCommand)) throw new Error("unexpected command");
        if (!command.input.NextToken) {
          return { AdminAccounts: [{ AdminAccountId: "222222222222", AdminStatus: "ENABLED" }], NextToken: "page-2" };
        }
        return { AdminAccounts: [{ AdminAccountId: "444444444444", AdminStatus: "ENABLED" }] };
      });

      await expect(probes().probeAdminAccounts(undefined, "us-east-1")).resolves.toEqual({
        kind: "found",
        naturalKey: "222222222222",
        attributes: { adminAccountIds: ["222222222222", "444444444444"] },
      });
      expect(mockSend).toHaveBeenCalledTimes(2);
    });

    it("reports no admin accounts as not found", async () => {
      mockSend.mockResolvedValue({ AdminAccounts: [] });

      await expect(probes().probeAdminAccounts(undefined, "us-east-1")).resolves.toEqual({
        kind: "not-found",
        detail: "No delegated admin configured",
      });
    });
  });

  describe("probePublishingDestination", () => {
    it("keys the S3 destination by detector and destination ID", async () => {
      mockSend.mockImplementation(async (command: unknown) => {
        if (command instanceof ListDetectorsCommand) return { DetectorIds: ["det-1"] };
        if (command instanceof ListPublishingDestinationsCommand) {
          return { Destinations: [{ DestinationId: "dest-7", DestinationType: "S3", Status: "PUBLISHING" }] };
        }
        if (command instanceof DescribePublishingDestinationCommand) {
          expect(command.input).toEqual({ DetectorId: "det-1", DestinationId: "dest-7" });
          return { Status: "PUBLISHING", DestinationProperties: { DestinationArn: "arn:aws:s3:::findings-bucket" } };
        }
        throw new Error("unexpected command");
      });

      await expect(probes().probePublishingDestination(CREDS, "us-east-1")).resolves.toEqual({
        kind: "found",
        naturalKey: "det-1:dest-7",
        attributes: {
          detectorId: "det-1",
          destinationId: "dest-7",
          status: "PUBLISHING",
          destinationArn: "arn:aws:s3:::findings-bucket",
        },
      });
    });

    it("reports a detector without an S3 destination as not found", async () => {
      mockSend.mockImplementation(async (command: unknown) => {
        if (command instanceof ListDetectorsCommand) return { DetectorIds: ["det-1"] };
        return { Destinations: [] };
      });

      await expect(probes().probePublishingDestination(CREDS, "us-east-1")).resolves.toEqual({
        kind: "not-found",
        detail: "No S3 publishing destination",
      });
    });
  });
});

describe("decodeAutoEnableMembers", () => {
  it("passes through explicit values", () => {
    expect(decodeAutoEnableMembers("NEW", false)).toBe("NEW");
  });

  it("maps the legacy flag when the member setting is absent", () => {
    expect(decodeAutoEnableMembers(undefined, true)).toBe("NEW");
    expect(decodeAutoEnableMembers(undefined, false)).toBe("NONE");
    expect(decodeAutoEnableMembers(undefined, undefined)).toBe("NONE");
  });
});
