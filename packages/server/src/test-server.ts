/**
 * TestServer: listens on a TCP port and answers each connection from the
 * resource registry.
 *
 * Per connection:
 *   Accepted → head parsed → routed → (delay) → response written
 *            → socket ended, or subscribed to the resource's stream
 *
 * A connection whose first bytes are "CLOSE" is the shutdown signal: the
 * listener stops accepting and every open stream is closed. close() sends
 * that signal to its own port, so external processes and the owner share
 * one shutdown path.
 */

import { createConnection, createServer, type Server, type Socket } from "node:net";
import type { StreamSink } from "./broadcaster.js";
import { BindError } from "./errors.js";
import { log } from "./log.js";
import { renderResolution, ResourceRegistry } from "./registry.js";
import {
  headBlockComplete,
  parseHeaders,
  parseRequestLine,
  requestLineEnd,
  type RequestLine,
} from "./request.js";
import { RequestChannel } from "./request-channel.js";
import type { Resource } from "./resource.js";

export const CLOSE_SIGNAL = "CLOSE";

export interface ServerOptions {
  /** 0 (default) picks a free port */
  port?: number;
  /** Bind address (default 127.0.0.1) */
  host?: string;
}

export class TestServer {
  readonly port: number;
  readonly host: string;

  private server: Server;
  private registry = new ResourceRegistry();
  private channel: RequestChannel | null = null;
  private stopped = false;
  private onStopped: Array<() => void> = [];

  private constructor(server: Server, port: number, host: string) {
    this.server = server;
    this.port = port;
    this.host = host;
  }

  /** Bind and start accepting; rejects with BindError when the port is unavailable */
  static start(options: ServerOptions = {}): Promise<TestServer> {
    const requestedPort = options.port ?? 0;
    const host = options.host ?? "127.0.0.1";

    return new Promise((resolve, reject) => {
      let instance: TestServer | null = null;
      const server = createServer({ allowHalfOpen: true }, (socket) => {
        if (instance) {
          instance.handleConnection(socket);
        } else {
          socket.destroy();
        }
      });

      const onBindError = (err: NodeJS.ErrnoException) => {
        reject(new BindError(requestedPort, err));
      };
      server.once("error", onBindError);

      server.listen(requestedPort, host, () => {
        server.off("error", onBindError);
        server.on("error", (err) => {
          log.error("listener error:", err);
        });

        const addr = server.address();
        const port = typeof addr === "object" && addr ? addr.port : requestedPort;
        instance = new TestServer(server, port, host);
        log.debug(`listening on ${host}:${port}`);
        resolve(instance);
      });
    });
  }

  get url(): string {
    return `http://${this.host}:${this.port}`;
  }

  /** Register a resource answering GET with "200 Ok" until configured otherwise */
  createResource(uri: string): Resource {
    return this.registry.create(uri);
  }

  resources(): Resource[] {
    return this.registry.list();
  }

  resource(id: number): Resource | undefined {
    return this.registry.get(id);
  }

  /**
   * Attach the request metadata receiver. Replaces (and closes) any channel
   * attached before; without one, no metadata is captured.
   */
  requests(): RequestChannel {
    this.channel?.close();
    const channel = new RequestChannel();
    this.channel = channel;
    return channel;
  }

  isListening(): boolean {
    return !this.stopped;
  }

  /** Stop accepting connections and close every open stream. No-op once closed */
  async close(): Promise<void> {
    if (this.stopped) return;

    const stopped = new Promise<void>((resolve) => this.onStopped.push(resolve));
    const signal = createConnection({ port: this.port, host: this.host }, () => {
      signal.end(CLOSE_SIGNAL);
    });
    signal.on("error", (err) => {
      log.debug("shutdown signal could not be delivered, stopping directly:", err);
      this.shutdown();
    });
    await stopped;
  }

  // ---------------------------------------------------------------------------
  // Connection handling
  // ---------------------------------------------------------------------------

  private handleConnection(socket: Socket): void {
    socket.setEncoding("utf-8");
    let buffered = "";
    let dispatched = false;

    const tryDispatch = (ended: boolean) => {
      if (dispatched) return;

      if (buffered.startsWith(CLOSE_SIGNAL)) {
        dispatched = true;
        socket.destroy();
        this.shutdown();
        return;
      }
      // Wait until the sentinel can be told apart from a request line
      if (!ended && buffered.length < CLOSE_SIGNAL.length && CLOSE_SIGNAL.startsWith(buffered)) return;

      const lineEnd = requestLineEnd(buffered);
      if (lineEnd === -1 && !ended) return;

      // Headers are only read when someone listens for request metadata
      const channel = this.channel;
      if (channel && !headBlockComplete(buffered) && !ended) return;

      dispatched = true;
      const line = parseRequestLine(lineEnd === -1 ? buffered : buffered.slice(0, lineEnd));
      if (!line) {
        log.debug(`dropping connection with unparseable request line: ${JSON.stringify(buffered.slice(0, 80))}`);
        socket.destroy();
        return;
      }

      const headers = channel ? parseHeaders(buffered) : null;
      this.dispatch(socket, line, channel, headers).catch((err) => {
        log.error(`failed to answer ${line.method} ${line.target}:`, err);
        socket.destroy();
      });
    };

    socket.on("data", (chunk: Buffer | string) => {
      if (dispatched) return;
      buffered += typeof chunk === "string" ? chunk : chunk.toString("utf-8");
      tryDispatch(false);
    });

    socket.on("end", () => {
      if (!dispatched) {
        tryDispatch(true);
        if (!dispatched) socket.destroy();
      }
    });

    socket.on("error", (err) => {
      log.debug("connection error:", err);
      socket.destroy();
    });
  }

  private async dispatch(
    socket: Socket,
    line: RequestLine,
    channel: RequestChannel | null,
    headers: Record<string, string> | null,
  ): Promise<void> {
    const resolution = this.registry.resolve(line.method, line.target);
    const resource = resolution.kind === "routed" ? resolution.resource : null;
    log.debug(`${line.method} ${line.target} → ${resolution.kind}`);

    const delay = resource?.getDelay();
    if (delay) {
      await sleep(delay);
    }
    if (socket.destroyed) return;

    const response = renderResolution(resolution, line.target);

    // A client that half-closed during the delay gets a plain response
    if (resource?.isStream() && !socket.readableEnded) {
      socket.write(response);
      this.subscribeToStream(socket, resource);
    } else {
      socket.end(response);
    }

    if (channel && headers) {
      channel.push({ url: line.target, method: line.method, headers });
    }
  }

  private subscribeToStream(socket: Socket, resource: Resource): void {
    const sink: StreamSink = {
      write(chunk: string): boolean {
        if (socket.destroyed || !socket.writable) return false;
        socket.write(chunk);
        return true;
      },
      close(): void {
        socket.end();
      },
    };

    const subscription = resource.subscribe(sink);
    socket.once("close", () => subscription.unsubscribe());
    // Client hung up its side: stop streaming to it
    socket.once("end", () => {
      subscription.unsubscribe();
      socket.end();
    });
    log.debug(`stream opened on ${resource.uri} (open: ${resource.openConnectionsCount()})`);
  }

  private shutdown(): void {
    if (this.stopped) return;
    this.stopped = true;

    this.server.close();
    this.registry.closeAllStreams();
    this.channel?.close();
    log.debug(`stopped listening on ${this.host}:${this.port}`);

    const waiters = this.onStopped;
    this.onStopped = [];
    for (const resolve of waiters) resolve();
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
