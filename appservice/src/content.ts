import type { FileInfo, FileMessageContent, MessageType, TextMessageContent } from './types.js';

export const HTML_FORMAT = 'org.matrix.custom.html';

/**
 * Build m.room.message content for text. With HTML the plain body falls
 * back to the HTML itself when no text is given.
 */
export function textContent(
  text: string,
  html?: string,
  msgtype: MessageType = 'm.text',
): TextMessageContent {
  if (!html) {
    return { msgtype, body: text };
  }
  return {
    msgtype,
    body: text || html,
    format: HTML_FORMAT,
    formatted_body: html,
  };
}

export function fileContent(
  url: string,
  info: FileInfo = {},
  text?: string,
  msgtype: MessageType = 'm.file',
): FileMessageContent {
  return {
    msgtype,
    url,
    body: text || 'Uploaded file',
    info,
  };
}
