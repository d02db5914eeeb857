/**
 * hipchat-notify
 *
 * This module exports the public API for programmatic usage.
 */

// Models
export * from './core/models/index.js';

// Text formatting
export * from './core/format/index.js';

// HipChat client
export * from './infra/hipchat/index.js';

// Configuration
export * from './infra/config/index.js';

// Send command
export { readMessageText, runSend, type SendDependencies } from './features/send/index.js';
export { executeSendCommand, type SendCommandContext } from './commands/send.js';

// Logging
export { LogManager, setLogLevel, type LogLevel } from './shared/ui/index.js';
export { createLogger, type Logger, type LogData } from './shared/utils/debug.js';
export { getErrorMessage } from './shared/utils/error.js';
