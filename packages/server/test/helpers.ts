/**
 * Test helpers: raw TCP clients for the mock server.
 *
 * The server writes no Content-Length, so a plain response ends when the
 * server closes the connection; streamed responses stay open.
 */

import { connect, type Socket } from "node:net";

export const HOST = "127.0.0.1";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Poll until predicate() is true; throws after timeoutMs */
export async function waitUntil(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await sleep(10);
  }
}

export function requestHead(
  target: string,
  method = "GET",
  headers: Record<string, string> = {},
): string {
  let head = `${method} ${target} HTTP/1.1\r\n`;
  for (const [name, value] of Object.entries(headers)) {
    head += `${name}: ${value}\r\n`;
  }
  return `${head}\r\n`;
}

/** Send one request and read everything until the server closes the connection */
export function request(
  port: number,
  target: string,
  method = "GET",
  headers: Record<string, string> = {},
): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = connect(port, HOST, () => {
      socket.write(requestHead(target, method, headers));
    });
    socket.setEncoding("utf-8");
    let response = "";
    socket.on("data", (chunk: Buffer | string) => {
      response += String(chunk);
    });
    socket.on("close", () => resolve(response));
    socket.on("error", reject);
  });
}

export interface OpenConnection {
  socket: Socket;
  /** Everything received so far */
  received(): string;
  /** Resolves once the received text contains `text` */
  waitFor(text: string, timeoutMs?: number): Promise<void>;
  /** Resolves when the server closed the connection */
  closed: Promise<void>;
  isClosed(): boolean;
  close(): Promise<void>;
}

/** Send one request and keep the connection open, collecting what arrives */
export async function open(
  port: number,
  target: string,
  method = "GET",
  headers: Record<string, string> = {},
): Promise<OpenConnection> {
  const socket = connect(port, HOST);
  socket.setEncoding("utf-8");

  let received = "";
  let isClosed = false;
  socket.on("data", (chunk: Buffer | string) => {
    received += String(chunk);
  });
  const closed = new Promise<void>((resolve) => {
    socket.on("close", () => {
      isClosed = true;
      resolve();
    });
  });
  socket.on("error", () => {
    // surfaced through "close"
  });

  await new Promise<void>((resolve, reject) => {
    socket.once("connect", () => resolve());
    socket.once("error", reject);
  });
  socket.write(requestHead(target, method, headers));

  return {
    socket,
    received: () => received,
    waitFor: (text, timeoutMs) => waitUntil(() => received.includes(text), timeoutMs),
    closed,
    isClosed: () => isClosed,
    close: async () => {
      socket.destroy();
      await closed;
    },
  };
}

/** Resolves with the connect error code, or null when the connection succeeded */
export function connectError(port: number): Promise<string | null> {
  return new Promise((resolve) => {
    const socket = connect(port, HOST, () => {
      socket.destroy();
      resolve(null);
    });
    socket.on("error", (err: NodeJS.ErrnoException) => {
      resolve(err.code ?? err.message);
    });
  });
}
