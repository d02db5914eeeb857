/**
 * Zod schema for config.yaml
 *
 * Note: Uses zod v4 syntax.
 */

import { z } from 'zod/v4';

/** Room IDs are numeric; YAML may carry them as numbers or quoted strings */
export const RoomIdSchema = z.union([
  z.number().int().positive(),
  z.string().regex(/^\d+$/).transform((value) => Number(value)).pipe(z.number().int().positive()),
]);

export const ConfigFileSchema = z.object({
  /** API token */
  token: z.string().min(1).optional(),
  /** Default room */
  room: RoomIdSchema.optional(),
  /** Sender display name */
  from: z.string().min(1).optional(),
  color: z.string().min(1).optional(),
  notify: z.boolean().optional(),
  /** API host, for self-hosted servers */
  server: z.string().min(1).optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
