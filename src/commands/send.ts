/**
 * `send` subcommand action
 *
 * Resolves settings, runs the send and maps the outcome to a process exit code.
 */

import { runSend, type SendDependencies } from '../features/send/index.js';
import { getConfigPath, loadConfigFile, resolveSendOptions, type SendFlags } from '../infra/config/index.js';
import { isNotifyError } from '../core/models/errors.js';
import { error } from '../shared/ui/index.js';
import { getErrorMessage } from '../shared/utils/error.js';
import { createLogger } from '../shared/utils/debug.js';

const log = createLogger('cli');

export interface SendCommandContext extends SendDependencies {
  env?: NodeJS.ProcessEnv;
  /** Config file path; defaults to the user config location */
  configPath?: string;
}

/**
 * @returns 0 on success, 1 on any failure
 */
export async function executeSendCommand(
  flags: SendFlags,
  context: SendCommandContext = {},
): Promise<number> {
  const { env = process.env, configPath, ...deps } = context;

  try {
    const options = resolveSendOptions(flags, env, loadConfigFile(configPath ?? getConfigPath(env)));
    const result = await runSend(options, deps);
    log.debug('Notification sent', { status: result.status });
    return 0;
  } catch (e) {
    // The client has already logged the status line and response entity
    if (!isNotifyError(e, 'post-failed')) {
      error(getErrorMessage(e));
    }
    return 1;
  }
}
