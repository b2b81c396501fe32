/**
 * Naive request head parsing: a request line and optional header lines.
 * Bodies are never read.
 */

import type { RequestRecord } from "@mockwire/shared";

export type { RequestRecord };

export interface RequestLine {
  method: string;
  /** Request target as sent, including any query string */
  target: string;
}

const HEAD_END = /\r?\n\r?\n/;

/** "GET /path?x=1 HTTP/1.1" → { method, target }; null when there are fewer than two tokens */
export function parseRequestLine(line: string): RequestLine | null {
  const parts = line.trim().split(/\s+/);
  if (parts.length < 2 || parts[0].length === 0) return null;
  return { method: parts[0], target: parts[1] };
}

/** "Name: value" → [name, trimmed value]; null for a line without ":" */
export function parseHeaderLine(line: string): [string, string] | null {
  const colon = line.indexOf(":");
  if (colon === -1) return null;
  return [line.slice(0, colon), line.slice(colon + 1).trim()];
}

/** Index of the end of the first line, or -1 while it is incomplete */
export function requestLineEnd(buffered: string): number {
  return buffered.indexOf("\n");
}

export function headBlockComplete(buffered: string): boolean {
  return HEAD_END.test(buffered);
}

/**
 * Header lines following the request line, up to the first blank line
 * (or the end of what was received). Later duplicates overwrite earlier ones.
 */
export function parseHeaders(buffered: string): Record<string, string> {
  const headers: Record<string, string> = {};
  const lines = buffered.split(/\r?\n/);

  for (const line of lines.slice(1)) {
    if (line === "") break;
    const header = parseHeaderLine(line);
    if (header) headers[header[0]] = header[1];
  }
  return headers;
}
