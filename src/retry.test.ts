import { describe, it, expect, vi } from "vitest";
import { createAWSRetryRunner, retryFixed, shouldRetryAWSError } from "./retry.js";

class ServiceError extends Error {
  constructor(name: string, message: string, readonly $metadata: { httpStatusCode?: number } = {}) {
    super(message);
    this.name = name;
  }
}

describe("shouldRetryAWSError", () => {
  it("retries throttling errors", () => {
    expect(shouldRetryAWSError(new ServiceError("ThrottlingException", "Rate exceeded"), 1)).toBe(true);
  });

  it("retries server errors by status code", () => {
    expect(shouldRetryAWSError(new ServiceError("InternalFailure", "internal", { httpStatusCode: 502 }), 1)).toBe(true);
  });

  it("retries the throttling codes of each client", () => {
    for (const name of ["Throttling", "TooManyRequestsException", "ServiceException", "InternalServerError"]) {
      expect(shouldRetryAWSError(new ServiceError(name, "try again"), 1)).toBe(true);
    }
  });

  it("does not retry an unreachable endpoint", () => {
    const err = Object.assign(new Error("getaddrinfo ENOTFOUND guardduty.mars-north-1.amazonaws.com"), { code: "ENOTFOUND" });
    expect(shouldRetryAWSError(err, 1)).toBe(false);
  });

  it("does not retry access denied", () => {
    expect(
      shouldRetryAWSError(new ServiceError("AccessDeniedException", "not authorized", { httpStatusCode: 403 }), 1),
    ).toBe(false);
  });

  it("does not retry missing values", () => {
    expect(shouldRetryAWSError(undefined, 1)).toBe(false);
  });
});

describe("createAWSRetryRunner", () => {
  it("retries transient failures and returns the result", async () => {
    const fn = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(new ServiceError("ThrottlingException", "Rate exceeded"))
      .mockResolvedValueOnce("ok");
    const onRetry = vi.fn();
    const run = createAWSRetryRunner({ retry: { attempts: 3, minDelayMs: 0, maxDelayMs: 0 }, onRetry });

    await expect(run(fn, "ListDetectors")).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ attempt: 1, maxAttempts: 3, label: "ListDetectors" }));
  });

  it("gives up immediately on non-retryable errors", async () => {
    const denied = new ServiceError("AccessDeniedException", "not authorized");
    const fn = vi.fn<[], Promise<string>>().mockRejectedValue(denied);
    const run = createAWSRetryRunner({ retry: { attempts: 3, minDelayMs: 0, maxDelayMs: 0 } });

    await expect(run(fn)).rejects.toBe(denied);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("retryFixed", () => {
  it("uses the same delay between every attempt", async () => {
    const delays: number[] = [];
    const fn = vi.fn<[], Promise<number>>().mockRejectedValue(new Error("lock held"));

    await expect(
      retryFixed(fn, { attempts: 3, delayMs: 1, onRetry: (info) => delays.push(info.delayMs) }),
    ).rejects.toThrow("lock held");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1, 1]);
  });

  it("stops when shouldRetry declines", async () => {
    const fn = vi.fn<[], Promise<number>>().mockRejectedValue(new Error("permanent"));

    await expect(retryFixed(fn, { attempts: 5, delayMs: 0, shouldRetry: () => false })).rejects.toThrow("permanent");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
