/**
 * Notification payload for the room notification endpoint
 */

import { z } from 'zod/v4';

/** Wire format marker; message bodies are always sent as HTML */
export const MESSAGE_FORMAT = 'html';

/** Colors the service understands (not enforced locally) */
export const KNOWN_COLORS = ['yellow', 'red', 'green', 'purple', 'gray', 'random'] as const;

export const DEFAULT_COLOR = 'yellow';

export const NotificationMessageSchema = z.object({
  from: z.string().optional(),
  message: z.string(),
  color: z.string(),
  message_format: z.literal(MESSAGE_FORMAT),
  notify: z.boolean(),
});

export type NotificationMessage = z.infer<typeof NotificationMessageSchema>;
