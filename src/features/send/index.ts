export { readMessageText } from './readMessage.js';
export { runSend, type SendDependencies } from './sendMessage.js';
