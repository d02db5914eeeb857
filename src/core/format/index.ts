export { escapeHtml } from './escapeHtml.js';
export {
  findUrl,
  linkHtml,
  processPlainText,
  formatMessageBody,
  type UrlMatch,
  type FormatOptions,
} from './plainText.js';
