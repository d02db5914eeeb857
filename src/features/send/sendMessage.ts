/**
 * Send command
 *
 * Reads the message, converts it to HTML unless it already is, and posts it
 * to the configured room.
 */

import { formatMessageBody } from '../../core/format/index.js';
import {
  buildNotificationMessage,
  buildNotificationRequest,
  sendNotification,
  type FetchLike,
  type NotificationResult,
} from '../../infra/hipchat/index.js';
import type { SendOptions } from '../../infra/config/index.js';
import { setLogLevel } from '../../shared/ui/index.js';
import { createLogger, type Logger } from '../../shared/utils/debug.js';
import { readMessageText } from './readMessage.js';

export interface SendDependencies {
  /** Source of the message when no --message is given */
  stdin?: NodeJS.ReadableStream;
  fetch?: FetchLike;
  logger?: Logger;
}

export async function runSend(
  options: SendOptions,
  deps: SendDependencies = {},
): Promise<NotificationResult> {
  if (options.debug) {
    setLogLevel('debug');
  }
  const logger = deps.logger ?? createLogger('send');

  const text = await readMessageText(options.message, deps.stdin);
  const body = formatMessageBody(text, { html: options.html });

  const message = buildNotificationMessage({
    message: body,
    color: options.color,
    notify: options.notify,
    from: options.from,
  });
  const request = buildNotificationRequest(
    { server: options.server, roomId: options.roomId, token: options.token },
    message,
  );
  logger.debug('Posting notification', { url: request.url, color: message.color, notify: message.notify });

  return sendNotification(request, {
    logger,
    insecure: options.insecure,
    fetch: deps.fetch,
  });
}
