import { createServer } from "node:http";
import { getRequestListener } from "@hono/node-server";
import { WebSocketServer, type WebSocket as WsWebSocket } from "ws";
import { BindError, type TestServer } from "@mockwire/server";
import { RequestFeed } from "./request-feed.js";
import { createControlApp } from "./routes.js";

export interface ControlConfig {
  /** The mock server to expose. Its request channel is taken over by the feed. */
  server: TestServer;
  /** Bind address (default 127.0.0.1) */
  host?: string;
}

export interface ControlHandle {
  server: ReturnType<typeof createServer>;
  feedWss: WebSocketServer;
  feed: RequestFeed;
  port: number;
  url: string;
  close: () => Promise<void>;
}

export function startControlServer(
  port: number,
  config: ControlConfig,
): Promise<ControlHandle> {
  return new Promise((resolve, reject) => {
    const mock = config.server;
    const host = config.host ?? "127.0.0.1";
    const feed = new RequestFeed();

    const app = createControlApp({ server: mock });
    const requestListener = getRequestListener(app.fetch);
    const server = createServer(requestListener);

    // WSS for request feed clients
    const feedWss = new WebSocketServer({ noServer: true });

    server.on("upgrade", (request, socket, head) => {
      const { pathname } = new URL(request.url ?? "/", "http://localhost");

      if (pathname !== "/requests") {
        socket.write("HTTP/1.1 404 Not Found\r\n\r\n");
        socket.destroy();
        return;
      }

      feedWss.handleUpgrade(request, socket, head, (ws: WsWebSocket) => {
        feed.add(ws);
        feed.sendHello(ws, mock.port);

        ws.on("close", () => {
          feed.remove(ws);
        });

        ws.on("error", (err) => {
          console.error("[control] feed ws error:", err);
          feed.remove(ws);
        });
      });
    });

    const onListenError = (err: NodeJS.ErrnoException) => {
      reject(new BindError(port, err));
    };
    server.once("error", onListenError);

    server.listen(port, host, () => {
      server.off("error", onListenError);
      const addr = server.address();
      const actualPort = typeof addr === "object" && addr ? addr.port : port;

      // Relay captured request metadata until the channel closes
      const channel = mock.requests();
      const relay = async () => {
        for await (const request of channel) {
          feed.broadcast({ type: "request", request });
        }
      };
      relay().catch((err) => {
        console.error("[control] request relay failed:", err);
      });

      resolve({
        server,
        feedWss,
        feed,
        port: actualPort,
        url: `http://${host}:${actualPort}`,
        close: () =>
          new Promise<void>((res) => {
            channel.close();
            feed.closeAll();
            for (const client of feedWss.clients) {
              client.terminate();
            }
            feedWss.close(() => {
              server.closeAllConnections();
              server.close(() => res());
            });
          }),
      });
    });
  });
}
