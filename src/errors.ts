import type { DnsRecord } from './types.js';

export type BunnyErrorCode =
  /** Empty domain or invalid provider options */
  | 'InvalidArgument'
  /** No zone owns the requested domain */
  | 'NotFound'
  /** Record type has no Bunny type code, or the other way round */
  | 'UnsupportedType'
  /** SRV record name is not `_service._transport[.name]` */
  | 'MalformedName'
  /** More than one record shares the name and type being set */
  | 'AmbiguousMatch'
  /** Network, HTTP status or response decoding failure */
  | 'Transport';

export interface BunnyErrorDetails {
  /** HTTP status code of a rejected request */
  status?: number;
  /** Records completed before a multi-record operation failed */
  applied?: DnsRecord[];
  cause?: unknown;
}

export class BunnyError extends Error {
  public readonly code: BunnyErrorCode;
  public readonly status?: number;
  public readonly applied?: DnsRecord[];

  constructor(
    code: BunnyErrorCode,
    message: string,
    details: BunnyErrorDetails = {}
  ) {
    super(message, { cause: details.cause });
    this.name = 'BunnyError';
    this.code = code;
    this.status = details.status;
    this.applied = details.applied;
    Object.setPrototypeOf(this, BunnyError.prototype);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      status: this.status,
    };
  }
}

export function isBunnyError(
  err: unknown,
  code?: BunnyErrorCode
): err is BunnyError {
  return err instanceof BunnyError && (code === undefined || err.code === code);
}

/**
 * Re-throw `err` as a `BunnyError` carrying the records applied so far.
 * Errors from outside the adapter become `Transport` errors.
 */
export function withApplied(err: unknown, applied: DnsRecord[]): BunnyError {
  if (err instanceof BunnyError) {
    return new BunnyError(err.code, err.message, {
      status: err.status,
      applied,
      cause: err,
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new BunnyError('Transport', `Bunny: ${message}`, {
    applied,
    cause: err,
  });
}
