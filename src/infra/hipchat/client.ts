/**
 * HipChat v2 room notification client
 *
 * Posts one notification per call. There are no retries: every failure is
 * reported to the caller as a NotifyError.
 */

import { Buffer } from 'node:buffer';
import { NotifyError } from '../../core/models/errors.js';
import { MESSAGE_FORMAT, type NotificationMessage } from '../../core/models/message.js';
import type { Logger } from '../../shared/utils/debug.js';
import { getErrorMessage } from '../../shared/utils/error.js';

export const DEFAULT_API_SERVER = 'api.hipchat.com';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface NotificationInput {
  /** Message body, already HTML */
  message: string;
  color: string;
  notify: boolean;
  /** Sender display name; omitted from the payload when unset or empty */
  from?: string;
}

export interface NotificationTarget {
  server: string;
  roomId: number;
  token: string;
}

export interface NotificationRequest {
  url: string;
  init: RequestInit & { method: 'POST'; headers: Record<string, string>; body: string };
}

export interface SendNotificationOptions {
  logger: Logger;
  /** Skip TLS validation (not implemented; always fails) */
  insecure?: boolean;
  fetch?: FetchLike;
}

export interface NotificationResult {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
}

const SUCCESS_STATUSES: ReadonlySet<number> = new Set([200, 204]);

export function buildNotificationMessage(input: NotificationInput): NotificationMessage {
  const message: NotificationMessage = {
    message: input.message,
    color: input.color,
    message_format: MESSAGE_FORMAT,
    notify: input.notify,
  };
  if (input.from) {
    message.from = input.from;
  }
  return message;
}

/**
 * @throws NotifyError (request) when the server does not form a valid URL
 */
export function buildNotificationUrl(server: string, roomId: number): string {
  const raw = `https://${server}/v2/room/${String(roomId)}/notification`;
  try {
    return new URL(raw).href;
  } catch (err) {
    throw new NotifyError('request', `Invalid notification URL ${raw}: ${getErrorMessage(err)}`, { cause: err });
  }
}

export function buildNotificationRequest(
  target: NotificationTarget,
  message: NotificationMessage,
): NotificationRequest {
  const url = buildNotificationUrl(target.server, target.roomId);
  const body = JSON.stringify(message);

  return {
    url,
    init: {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Content-Length': String(Buffer.byteLength(body, 'utf-8')),
        Authorization: `Bearer ${target.token}`,
      },
      body,
    },
  };
}

function statusLine(response: Response): string {
  return `${String(response.status)} ${response.statusText}`.trim();
}

/**
 * Issue the POST and classify the response.
 *
 * 200 and 204 are success; any other status is a post-failed NotifyError
 * carrying the raw response entity.
 */
export async function sendNotification(
  request: NotificationRequest,
  options: SendNotificationOptions,
): Promise<NotificationResult> {
  const { logger } = options;

  if (options.insecure) {
    throw new NotifyError('insecure-not-implemented', '--insecure is not yet implemented');
  }

  const doFetch = options.fetch ?? fetch;

  let response: Response;
  try {
    response = await doFetch(request.url, request.init);
  } catch (err) {
    throw new NotifyError('transport', `POST ${request.url} failed: ${getErrorMessage(err)}`, { cause: err });
  }

  let entity: string;
  try {
    entity = await response.text();
  } catch (err) {
    throw new NotifyError('transport', `Could not read response entity: ${getErrorMessage(err)}`, { cause: err });
  }

  const line = statusLine(response);

  if (!SUCCESS_STATUSES.has(response.status)) {
    logger.error(`POST failed: ${line}\n${entity}`);
    const detail = entity ? `\n${entity}` : '';
    throw new NotifyError('post-failed', `posting message failed: ${line}${detail}`, {
      status: response.status,
      statusText: response.statusText,
      body: entity,
    });
  }

  const headers: Record<string, string> = {};
  logger.debug(`Success ${line}; response headers:`);
  response.headers.forEach((value, key) => {
    headers[key] = value;
    logger.debug(`${key} := ${JSON.stringify(value)}`);
  });

  return {
    status: response.status,
    statusText: response.statusText,
    headers,
    body: entity,
  };
}
