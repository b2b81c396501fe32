/**
 * Tracks WebSocket clients subscribed to /requests.
 *
 * Every request the mock server receives is pushed to every open client as
 * a FeedRequest; a client gets a FeedHello with the mock server's port as
 * soon as it connects.
 */

import type { WebSocket as WsWebSocket } from "ws";
import WebSocket from "ws";
import type { FeedHello, FeedMessage } from "@mockwire/shared";

export class RequestFeed {
  private clients = new Set<WsWebSocket>();

  add(ws: WsWebSocket): void {
    this.clients.add(ws);
    console.log(`[control] feed client connected (total: ${this.count()})`);
  }

  remove(ws: WsWebSocket): void {
    if (!this.clients.delete(ws)) return;
    console.log(`[control] feed client disconnected (total: ${this.count()})`);
  }

  broadcast(message: FeedMessage): void {
    if (this.clients.size === 0) return;

    const data = JSON.stringify(message);
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(data);
      }
    }
  }

  sendHello(ws: WsWebSocket, port: number): void {
    if (ws.readyState === WebSocket.OPEN) {
      const hello: FeedHello = { type: "hello", port };
      ws.send(JSON.stringify(hello));
    }
  }

  count(): number {
    return this.clients.size;
  }

  closeAll(): void {
    for (const client of this.clients) {
      client.close();
    }
    this.clients.clear();
  }
}
