/**
 * Message text input
 */

import { text } from 'node:stream/consumers';
import { NotifyError } from '../../core/models/errors.js';
import { getErrorMessage } from '../../shared/utils/error.js';

/**
 * Return the message text: the --message value when given (even if empty),
 * otherwise everything on `input` decoded as UTF-8.
 *
 * @throws NotifyError (input-read) when the stream fails
 */
export async function readMessageText(
  message: string | undefined,
  input: NodeJS.ReadableStream = process.stdin,
): Promise<string> {
  if (message !== undefined) {
    return message;
  }

  try {
    return await text(input);
  } catch (err) {
    throw new NotifyError('input-read', `Could not read message from stdin: ${getErrorMessage(err)}`, { cause: err });
  }
}
