/**
 * Resolution of send settings
 *
 * Each setting is taken from the first source that provides it:
 * command-line flag, environment variable, config file, default.
 */

import { DEFAULT_COLOR } from '../../core/models/message.js';
import { NotifyError } from '../../core/models/errors.js';
import { DEFAULT_API_SERVER } from '../hipchat/client.js';
import type { ConfigFile } from './schema.js';

export const ENV_KEYS = {
  token: 'HIPCHAT_TOKEN',
  room: 'HIPCHAT_ROOM_ID',
  from: 'HIPCHAT_FROM',
  color: 'HIPCHAT_COLOR',
  server: 'HIPCHAT_SERVER',
} as const;

/** Raw flags as parsed by the CLI */
export interface SendFlags {
  token?: string;
  room?: string;
  from?: string;
  color?: string;
  message?: string;
  notify?: boolean;
  html?: boolean;
  insecure?: boolean;
  debug?: boolean;
  server?: string;
}

export interface SendOptions {
  token: string;
  roomId: number;
  from?: string;
  color: string;
  /** Message text; read from stdin when undefined */
  message?: string;
  notify: boolean;
  /** Input is already HTML */
  html: boolean;
  insecure: boolean;
  debug: boolean;
  server: string;
}

/** Empty environment variables count as unset */
function fromEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

function parseRoomId(value: string | number, source: string): number {
  const roomId = typeof value === 'number' ? value : /^\d+$/.test(value.trim()) ? Number(value.trim()) : NaN;
  if (!Number.isSafeInteger(roomId) || roomId <= 0) {
    throw new NotifyError('config', `Invalid room ID from ${source}: ${String(value)}`);
  }
  return roomId;
}

function resolveRoomId(flags: SendFlags, env: NodeJS.ProcessEnv, file: ConfigFile): number {
  if (flags.room !== undefined) {
    return parseRoomId(flags.room, '--room');
  }
  const envRoom = fromEnv(env, ENV_KEYS.room);
  if (envRoom !== undefined) {
    return parseRoomId(envRoom, ENV_KEYS.room);
  }
  if (file.room !== undefined) {
    return parseRoomId(file.room, 'config file');
  }
  throw new NotifyError('config', `Required option --room (or ${ENV_KEYS.room}) not set`);
}

export function resolveSendOptions(
  flags: SendFlags,
  env: NodeJS.ProcessEnv = process.env,
  file: ConfigFile = {},
): SendOptions {
  const token = flags.token ?? fromEnv(env, ENV_KEYS.token) ?? file.token;
  if (!token) {
    throw new NotifyError('config', `Required option --token (or ${ENV_KEYS.token}) not set`);
  }

  const roomId = resolveRoomId(flags, env, file);

  const options: SendOptions = {
    token,
    roomId,
    color: flags.color ?? fromEnv(env, ENV_KEYS.color) ?? file.color ?? DEFAULT_COLOR,
    notify: flags.notify ?? file.notify ?? false,
    html: flags.html ?? false,
    insecure: flags.insecure ?? false,
    debug: flags.debug ?? false,
    server: flags.server ?? fromEnv(env, ENV_KEYS.server) ?? file.server ?? DEFAULT_API_SERVER,
  };

  const from = flags.from ?? fromEnv(env, ENV_KEYS.from) ?? file.from;
  if (from !== undefined) {
    options.from = from;
  }
  if (flags.message !== undefined) {
    options.message = flags.message;
  }
  return options;
}
