export { decodeHeaderText, decodeRawHeaderValue } from './headers.js';
export { stripHtml } from './html.js';
export { extractBody, parseMessage, splitParts, type MimePart } from './message.js';
