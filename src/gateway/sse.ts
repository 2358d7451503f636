import type { ServerResponse } from "node:http";

export function formatSseComment(text: string): string {
  return `: ${text.replace(/\r\n|\r|\n/g, " ")}\n\n`;
}

/**
 * Writes a comment line, which event-stream clients ignore. Returns false
 * once the response can no longer be written.
 */
export function writeSseComment(res: ServerResponse, text: string): boolean {
  if (res.writableEnded || res.destroyed) {
    return false;
  }
  res.write(formatSseComment(text));
  return true;
}
