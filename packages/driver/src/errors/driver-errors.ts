/**
 * Error taxonomy for instance lifecycle operations.
 *
 * Every failure surfaced by the driver is a DriverError subclass so callers
 * can branch on `type` without string matching. None of these are retried
 * internally.
 */

export enum DriverErrorType {
  CONFIGURATION_INVALID = "CONFIGURATION_INVALID",
  ADDRESS_UNAVAILABLE = "ADDRESS_UNAVAILABLE",
  POOL_EXHAUSTED = "POOL_EXHAUSTED",
  UNREACHABLE = "UNREACHABLE",
  PROVIDER = "PROVIDER",
}

export class DriverError extends Error {
  constructor(
    message: string,
    public readonly type: DriverErrorType,
    public readonly originalError?: Error,
    public readonly suggestions: string[] = []
  ) {
    super(message);
    this.name = "DriverError";
  }
}

/**
 * Raised when the configuration cannot be used: an incomplete credential
 * group or a value of the wrong shape.
 */
export class ConfigurationInvalidError extends DriverError {
  constructor(
    message: string,
    public readonly fields: string[] = [],
    suggestions: string[] = []
  ) {
    super(message, DriverErrorType.CONFIGURATION_INVALID, undefined, suggestions);
    this.name = "ConfigurationInvalidError";
  }
}

export class AddressUnavailableError extends DriverError {
  constructor(family: 4 | 6) {
    super(
      `Could not find an IPv${family} address for the server`,
      DriverErrorType.ADDRESS_UNAVAILABLE,
      undefined,
      family === 4
        ? ["Set useIpv6 if the network only hands out IPv6 addresses"]
        : ["Unset useIpv6 if the network only hands out IPv4 addresses"]
    );
    this.name = "AddressUnavailableError";
  }
}

export class PoolExhaustedError extends DriverError {
  constructor(public readonly pool: string) {
    super(
      `No free floating IP addresses in pool "${pool}"`,
      DriverErrorType.POOL_EXHAUSTED,
      undefined,
      ["Release unused floating IPs or allocate more to the pool"]
    );
    this.name = "PoolExhaustedError";
  }
}

export class UnreachableError extends DriverError {
  constructor(host: string, port: number, timeoutMs: number) {
    super(
      `SSH on ${host}:${port} did not become reachable within ${timeoutMs}ms`,
      DriverErrorType.UNREACHABLE,
      undefined,
      [
        "Check that the security group allows inbound SSH",
        "Run destroy to clean up the instance",
      ]
    );
    this.name = "UnreachableError";
  }
}

/**
 * Failure reported by the OpenStack APIs. `status` is the HTTP status code
 * when the failure came from a response.
 */
export class ProviderError extends DriverError {
  constructor(
    message: string,
    public readonly status?: number,
    originalError?: Error
  ) {
    super(message, DriverErrorType.PROVIDER, originalError);
    this.name = "ProviderError";
  }
}

export function isDriverError(error: unknown): error is DriverError {
  return error instanceof DriverError;
}
