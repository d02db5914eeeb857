/**
 * Failure kinds of a send invocation
 */

export type NotifyErrorKind =
  /** stdin could not be read */
  | 'input-read'
  /** The request could not be built (bad host, unserializable payload) */
  | 'request'
  /** Connection, DNS or TLS failure, or the response body could not be read */
  | 'transport'
  /** The API answered with a status other than 200 or 204 */
  | 'post-failed'
  /** --insecure was requested */
  | 'insecure-not-implemented'
  /** Required settings missing or the config file is invalid */
  | 'config';

export interface NotifyErrorDetails {
  cause?: unknown;
  status?: number;
  statusText?: string;
  body?: string;
}

export class NotifyError extends Error {
  readonly kind: NotifyErrorKind;
  readonly status?: number;
  readonly statusText?: string;
  /** Raw response entity for post-failed errors */
  readonly body?: string;

  constructor(kind: NotifyErrorKind, message: string, details: NotifyErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'NotifyError';
    this.kind = kind;
    this.status = details.status;
    this.statusText = details.statusText;
    this.body = details.body;
  }
}

export function isNotifyError(value: unknown, kind?: NotifyErrorKind): value is NotifyError {
  return value instanceof NotifyError && (kind === undefined || value.kind === kind);
}
