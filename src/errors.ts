/**
 * Error types and error inspection helpers.
 */

/**
 * A run-level configuration problem. Raised before any target is processed;
 * the CLI maps it to exit code 2.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly source: string,
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A hand-off file written by the discovery phase is missing or malformed.
 */
export class HandoffFileError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly problems: string[] = [],
  ) {
    super(message);
    this.name = "HandoffFileError";
  }
}

/**
 * Extract error code from an error object
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  const code: unknown = Reflect.get(err, "code");
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  return undefined;
}

/**
 * Format error message from any error type
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

/**
 * HTTP status code carried by an AWS SDK v3 service exception.
 */
export function extractHttpStatus(err: unknown): number | undefined {
  if (!err || typeof err !== "object") return undefined;
  const metadata: unknown = Reflect.get(err, "$metadata");
  if (!metadata || typeof metadata !== "object") return undefined;
  const status: unknown = Reflect.get(metadata, "httpStatusCode");
  return typeof status === "number" ? status : undefined;
}

const ACCESS_DENIED_CODES = new Set([
  "AccessDenied",
  "AccessDeniedException",
  "AuthorizationError",
  "UnauthorizedOperation",
  "UnrecognizedClientException",
  "AWSOrganizationsNotInUseException",
]);

/**
 * Whether an AWS error is an authorization failure rather than a fault.
 */
export function isAccessDeniedError(err: unknown): boolean {
  if (!err) return false;
  const code = extractErrorCode(err);
  if (code && ACCESS_DENIED_CODES.has(code)) return true;
  if (err instanceof Error && ACCESS_DENIED_CODES.has(err.name)) return true;
  if (extractHttpStatus(err) === 403) return true;
  return /AccessDenied|not authorized/i.test(formatErrorMessage(err));
}
