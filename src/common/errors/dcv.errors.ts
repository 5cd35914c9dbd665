// src/common/errors/dcv.errors.ts
import { isAxiosError } from 'axios';

export class DcvError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Transport failure or non-success status from the CA or DNS API. */
export class ApiError extends DcvError {
  constructor(
    message: string,
    readonly status?: number,
    readonly detail?: string,
  ) {
    super(message);
  }
}

/** A response arrived but a field we depend on is missing. */
export class DataError extends DcvError {}

export class DomainNotFoundError extends DcvError {
  constructor(
    readonly domainName: string,
    message = `Domain ${domainName} not found.`,
  ) {
    super(message);
  }
}

export class RecordNotFoundError extends DcvError {}

/** Fatal for the whole run: nothing can be validated without DNS access. */
export class DnsAuthenticationError extends DcvError {}

export class ConfigurationError extends DcvError {}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

// DigiCert answers { errors: [{ code, message }] }, UltraDNS [{ errorCode, errorMessage }]
function providerMessages(body: unknown): string[] {
  const entries = Array.isArray(body)
    ? body
    : isRecord(body) && Array.isArray(body.errors)
      ? body.errors
      : [];
  return entries
    .map((e: unknown) =>
      isRecord(e) ? (e.message ?? e.errorMessage) : undefined,
    )
    .filter((m): m is string => typeof m === 'string' && m.length > 0);
}

export function describeError(err: unknown): string {
  if (isAxiosError(err)) {
    const body: unknown = err.response?.data;
    const messages = providerMessages(body);
    if (messages.length) return messages.join(' | ');
    if (typeof body === 'string' && body.trim()) return body.trim();
    if (isRecord(body) && Object.keys(body).length) {
      return JSON.stringify(body);
    }
    return err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Wraps an axios failure into an ApiError carrying the HTTP status and the
 * provider's own error text. Errors already typed by us pass through.
 */
export function toApiError(err: unknown, context: string): DcvError {
  if (err instanceof DcvError) return err;
  const status = isAxiosError(err) ? err.response?.status : undefined;
  const detail = describeError(err);
  return new ApiError(`${context}: ${detail}`, status, detail);
}
