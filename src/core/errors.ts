/**
 * Error types for the scan pipeline
 *
 * Remote failures end up as CollectorError and are absorbed per work unit.
 * The other classes describe programming errors and abort the run.
 */

import type { UnitError, UnitErrorCode } from "../types/inventory.js";

/**
 * Typed failure raised by a collector
 */
export class CollectorError extends Error {
  readonly code: UnitErrorCode;
  readonly service: string;
  readonly region: string;

  constructor(
    service: string,
    region: string,
    code: UnitErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CollectorError";
    this.service = service;
    this.region = region;
    this.code = code;
  }
}

/**
 * A cataloged service has no registered collector
 */
export class CatalogMismatchError extends Error {
  constructor(readonly services: string[]) {
    super(`No collector registered for service(s): ${services.join(", ")}`);
    this.name = "CatalogMismatchError";
  }
}

/**
 * A work outcome carries neither records nor an error
 */
export class InvalidOutcomeError extends Error {
  constructor(service: string, region: string, detail: string) {
    super(`Invalid outcome for ${service}/${region}: ${detail}`);
    this.name = "InvalidOutcomeError";
  }
}

const THROTTLING_ERRORS = [
  "Throttling",
  "ThrottlingException",
  "ThrottledException",
  "TooManyRequestsException",
  "RequestLimitExceeded",
  "RequestThrottled",
  "RequestThrottledException",
  "SlowDown",
];

const ACCESS_DENIED_ERRORS = [
  "AccessDenied",
  "AccessDeniedException",
  "UnauthorizedOperation",
  "UnrecognizedClientException",
  "AuthorizationError",
  "AuthorizationErrorException",
  "InvalidClientTokenId",
  "ExpiredToken",
  "ExpiredTokenException",
];

const UNAVAILABLE_ERRORS = [
  "OptInRequired",
  "SubscriptionRequiredException",
  "UnsupportedOperation",
  "UnsupportedOperationException",
  "InvalidAction",
  "ENOTFOUND",
];

const NETWORK_ERRORS = [
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "TimeoutError",
  "RequestTimeout",
  "NetworkingError",
];

const NOT_FOUND_ERRORS = [
  "NotFoundException",
  "ResourceNotFoundException",
  "NoSuchEntity",
  "NoSuchEntityException",
  "NoSuchBucket",
  "NoSuchTagSet",
  "NoSuchHostedZone",
];

/**
 * Read the identifying name of an AWS SDK or Node error
 */
export function getErrorName(error: unknown): string {
  if (error instanceof Error) {
    const code = "code" in error ? error.code : undefined;
    if (typeof code === "string" && code.length > 0) {
      return code;
    }
    return error.name;
  }
  return "";
}

/**
 * Map an error name onto a unit error code
 */
export function classifyError(error: unknown): UnitErrorCode {
  if (error instanceof CollectorError) {
    return error.code;
  }

  const names = new Set<string>([getErrorName(error)]);
  if (error instanceof Error) {
    names.add(error.name);
  }

  const matches = (candidates: string[]) =>
    candidates.some((candidate) => names.has(candidate));

  if (matches(THROTTLING_ERRORS)) return "throttled";
  if (matches(ACCESS_DENIED_ERRORS)) return "access-denied";
  if (matches(UNAVAILABLE_ERRORS)) return "unavailable";
  if (matches(NETWORK_ERRORS)) return "network";
  return "provider";
}

/**
 * Whether the provider reported the resource as gone
 */
export function isNotFoundError(error: unknown): boolean {
  if (error instanceof CollectorError) {
    return false;
  }
  const names = [getErrorName(error), error instanceof Error ? error.name : ""];
  return names.some((name) => NOT_FOUND_ERRORS.includes(name));
}

/**
 * Convert anything a collector threw into a serializable unit error
 */
export function toUnitError(error: unknown): UnitError {
  return {
    code: classifyError(error),
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Wrap a provider error for a service/region pair
 */
export function toCollectorError(
  service: string,
  region: string,
  error: unknown
): CollectorError {
  if (error instanceof CollectorError) {
    return error;
  }
  const { code, message } = toUnitError(error);
  return new CollectorError(service, region, code, message, { cause: error });
}

/**
 * Error names retried inside collectors
 */
export const RETRYABLE_ERRORS = [...THROTTLING_ERRORS, ...NETWORK_ERRORS];
