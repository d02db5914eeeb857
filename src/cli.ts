#!/usr/bin/env node

/**
 * hipchat-notify CLI
 *
 * Usage:
 *   hipchat-notify send -t <token> -r <room> -m "Deploy finished"
 *   echo "Build failed: http://ci.example.com/42" | hipchat-notify send -c red -n
 *   hipchat-notify send --html -m "<b>bold</b> move"
 *
 * Token, room, sender name, color and server fall back to HIPCHAT_TOKEN,
 * HIPCHAT_ROOM_ID, HIPCHAT_FROM, HIPCHAT_COLOR and HIPCHAT_SERVER, then to
 * ~/.hipchat-notify/config.yaml.
 */

import { createRequire } from 'node:module';
import { Command } from 'commander';
import { executeSendCommand } from './commands/send.js';
import { KNOWN_COLORS } from './core/models/message.js';
import type { SendFlags } from './infra/config/index.js';

const require = createRequire(import.meta.url);
const { version: cliVersion } = require('../package.json') as { version: string };

const program = new Command();

program
  .name('hipchat-notify')
  .description('Talk to the HipChat v2 API')
  .version(cliVersion);

program
  .command('send')
  .description('send a message to a room')
  .option('-d, --debug', 'enable debug messages')
  .option('-t, --token <token>', 'API token (env: HIPCHAT_TOKEN)')
  .option('-r, --room <id>', 'room ID (env: HIPCHAT_ROOM_ID)')
  .option('-f, --from <name>', 'from name (env: HIPCHAT_FROM)')
  .option('-c, --color <color>', `message color (${KNOWN_COLORS.join(', ')}; default: yellow) (env: HIPCHAT_COLOR)`)
  .option('-m, --message <text>', 'the message to send (default: from stdin)')
  .option('-n, --notify', 'trigger notification for people in the room')
  .option('-k, --insecure', "don't validate SSL credentials")
  .option('--html', "input is already in HTML format; don't transform")
  .option('-s, --server <host>', 'API server host (default: api.hipchat.com) (env: HIPCHAT_SERVER)')
  .action(async (flags: SendFlags) => {
    const exitCode = await executeSendCommand(flags);
    if (exitCode !== 0) {
      process.exit(exitCode);
    }
  });

await program.parseAsync();
