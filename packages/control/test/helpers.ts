/**
 * Test helpers: JSON requests against the control API and request feed clients.
 */

import WebSocket from "ws";
import { isFeedMessage, type FeedMessage } from "@mockwire/shared";
import { waitUntil } from "../../server/test/helpers.js";

export { request, open, sleep, waitUntil } from "../../server/test/helpers.js";

/** Minimal shape shared by Hono's app.request and fetch */
type Requester = (path: string, init?: RequestInit) => Response | Promise<Response>;

export function jsonRequester(baseUrl: string): Requester {
  return (path, init) => fetch(`${baseUrl}${path}`, init);
}

/** Make a JSON request and parse the response */
export async function apiRequest(
  send: Requester,
  method: string,
  path: string,
  body?: unknown,
): Promise<{ status: number; body: unknown }> {
  const init: RequestInit = {
    method,
    headers: { "Content-Type": "application/json" },
  };
  if (body !== undefined) {
    init.body = typeof body === "string" ? body : JSON.stringify(body);
  }

  const res = await send(path, init);
  const text = await res.text();
  let parsed: unknown;
  if (text.length === 0) {
    parsed = null;
  } else {
    try {
      parsed = JSON.parse(text);
    } catch {
      parsed = text;
    }
  }
  return { status: res.status, body: parsed };
}

export interface FeedClient {
  ws: WebSocket;
  messages: () => FeedMessage[];
  /** Resolves once `count` messages have arrived */
  waitForMessages: (count: number) => Promise<void>;
  close: () => Promise<void>;
}

/** Connect a client to the request feed, collecting every message */
export async function connectFeed(port: number): Promise<FeedClient> {
  const ws = new WebSocket(`ws://127.0.0.1:${port}/requests`);
  const received: FeedMessage[] = [];

  // Listen before "open": the hello can arrive with the upgrade response
  ws.on("message", (data) => {
    const parsed: unknown = JSON.parse(data.toString());
    if (isFeedMessage(parsed)) received.push(parsed);
  });

  await new Promise<void>((resolve, reject) => {
    ws.once("open", () => resolve());
    ws.once("error", reject);
  });

  return {
    ws,
    messages: () => [...received],
    waitForMessages: (count) => waitUntil(() => received.length >= count),
    close: () =>
      new Promise<void>((resolve) => {
        if (ws.readyState === WebSocket.CLOSED) {
          resolve();
          return;
        }
        ws.on("close", () => resolve());
        ws.close();
      }),
  };
}
