/**
 * TestServer integration tests
 *
 * Real sockets against a server on an ephemeral port:
 *   raw TCP client → TestServer → resource registry
 *
 * Framework: node:test + node:assert
 */

import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { connect } from "node:net";
import { TestServer } from "../src/test-server.js";
import { BindError, ConfigurationError } from "../src/errors.js";
import { Status } from "../src/http.js";
import { HOST, connectError, open, request, sleep, waitUntil, type OpenConnection } from "./helpers.js";

// =============================================================================
// Routing and responses
// =============================================================================

describe("TestServer responses", () => {
  let server: TestServer;

  beforeEach(async () => {
    server = await TestServer.start();
  });

  afterEach(async () => {
    await server.close();
  });

  it("binds an ephemeral port", async () => {
    const other = await TestServer.start();
    try {
      assert.ok(server.port > 0);
      assert.notEqual(server.port, other.port);
      assert.equal(server.url, `http://127.0.0.1:${server.port}`);
    } finally {
      await other.close();
    }
  });

  it("returns 404 with an empty body for an unregistered path", async () => {
    const response = await request(server.port, "/something");
    assert.equal(response, "HTTP/1.1 404 Not Found\r\n\r\n");
  });

  it("answers a new resource with 200 Ok and nothing else", async () => {
    server.createResource("/defaults");
    const response = await request(server.port, "/defaults");
    assert.equal(response, "HTTP/1.1 200 Ok\r\n\r\n");
  });

  it("writes configured status, header and body", async () => {
    server
      .createResource("/create")
      .method("POST")
      .status(Status.Created)
      .header("Content-Type", "text")
      .body("Everything is fine!");

    const response = await request(server.port, "/create", "POST");
    assert.equal(response, "HTTP/1.1 201 Created\r\nContent-Type: text\r\n\r\nEverything is fine!");
  });

  it("returns 405 when the path exists for another method", async () => {
    server.createResource("/something-else").method("POST").body("<some body>");
    const response = await request(server.port, "/something-else", "GET");
    assert.equal(response, "HTTP/1.1 405 Method Not Allowed\r\n\r\n");
  });

  it("serves several methods on one URI from separate resources", async () => {
    server.createResource("/multi").method("GET").body("<some body GET>");
    server.createResource("/multi").method("POST").body("<some body POST>");

    const [get, post] = await Promise.all([
      request(server.port, "/multi", "GET"),
      request(server.port, "/multi", "POST"),
    ]);
    assert.equal(get, "HTTP/1.1 200 Ok\r\n\r\n<some body GET>");
    assert.equal(post, "HTTP/1.1 200 Ok\r\n\r\n<some body POST>");
  });

  it("substitutes path and query parameters", async () => {
    server
      .createResource("/user/{userId}?filter=*&version=1")
      .header("Content-Type", "application/json")
      .body('{"id": 123, "userId": "{path.userId}", "filter": "{query.filter}", "v": {query.version}}');

    const response = await request(server.port, "/user/superUser?filter=all&version=1");
    assert.equal(
      response,
      'HTTP/1.1 200 Ok\r\nContent-Type: application/json\r\n\r\n{"id": 123, "userId": "superUser", "filter": "all", "v": 1}',
    );
  });

  it("matches wildcard query constraints only when the key is present", async () => {
    server.createResource("/search?filter=*").body("found");

    assert.equal(await request(server.port, "/search?filter=anything"), "HTTP/1.1 200 Ok\r\n\r\nfound");
    assert.equal(await request(server.port, "/search"), "HTTP/1.1 404 Not Found\r\n\r\n");
  });

  it("matches regex URIs", async () => {
    server.createResource("/hello/[0-9]/[A-z]/.*").method("POST").body("<some body>");
    const response = await request(server.port, "/hello/8/b/doesntmatter-hehe", "POST");
    assert.equal(response, "HTTP/1.1 200 Ok\r\n\r\n<some body>");
  });

  it("writes a body function's output", async () => {
    server.createResource("/items/{id}").bodyFn(({ path }) => `item #${path.id}`);
    const response = await request(server.port, "/items/9");
    assert.equal(response, "HTTP/1.1 200 Ok\r\n\r\nitem #9");
  });

  it("named status set after a custom one wins on the wire", async () => {
    server.createResource("/beast").customStatus(666, "Beast").status(Status.Forbidden);
    const response = await request(server.port, "/beast");
    assert.equal(response, "HTTP/1.1 403 Forbidden\r\n\r\n");
  });

  it("surfaces malformed patterns when the resource is created", () => {
    assert.throws(() => server.createResource("/broken/["), ConfigurationError);
  });

  it("sees configuration changes made after creation", async () => {
    const resource = server.createResource("/live");
    assert.equal(await request(server.port, "/live"), "HTTP/1.1 200 Ok\r\n\r\n");

    resource.status(Status.ServiceUnavailable).body("down");
    assert.equal(await request(server.port, "/live"), "HTTP/1.1 503 Service Unavailable\r\n\r\ndown");
  });

  it("accepts requests on the loopback address", async () => {
    const resource = server.createResource("/hello");
    const response = await new Promise<string>((resolve, reject) => {
      const socket = connect(server.port, HOST, () => {
        socket.write("GET /hello HTTP/1.1\r\n\r\n");
      });
      let text = "";
      socket.on("data", (chunk: Buffer) => {
        text += chunk.toString("utf-8");
      });
      socket.on("close", () => resolve(text));
      socket.on("error", reject);
    });

    assert.equal(response, "HTTP/1.1 200 Ok\r\n\r\n");
    assert.equal(resource.requestCount(), 1);
  });

  it("drops a connection whose request line cannot be parsed", async () => {
    const response = await new Promise<string>((resolve) => {
      const socket = connect(server.port, HOST, () => {
        socket.end("NONSENSE\r\n\r\n");
      });
      let text = "";
      socket.on("data", (chunk: Buffer) => {
        text += chunk.toString("utf-8");
      });
      socket.on("close", () => resolve(text));
      // a reset is as good as a close here
      socket.on("error", () => resolve(text));
    });
    assert.equal(response, "");
  });
});

// =============================================================================
// Request counting and metadata
// =============================================================================

describe("TestServer introspection", () => {
  let server: TestServer;

  beforeEach(async () => {
    server = await TestServer.start();
  });

  afterEach(async () => {
    await server.close();
  });

  it("counts routed requests", async () => {
    const resource = server.createResource("/counted").body("<some body>");
    assert.equal(resource.requestCount(), 0);

    await request(server.port, "/counted");
    await request(server.port, "/counted");

    assert.equal(resource.requestCount(), 2);
  });

  it("does not count 404 or 405 answers", async () => {
    const resource = server.createResource("/counted").method("PUT");

    await request(server.port, "/counted", "GET");
    await request(server.port, "/missing", "PUT");

    assert.equal(resource.requestCount(), 0);
  });

  it("reports url, method and headers of each request", async () => {
    const requests = server.requests();
    server.createResource("/defaults");

    await request(server.port, "/defaults?x=1", "GET", { "Content-Type": "text" });
    const record = await requests.recv(1000);

    assert.deepEqual(record, {
      url: "/defaults?x=1",
      method: "GET",
      headers: { "Content-Type": "text" },
    });
  });

  it("reports requests that were not routed", async () => {
    const requests = server.requests();

    await request(server.port, "/something-else", "GET", { "Content-Type": "text" });
    const record = await requests.recv(1000);

    assert.deepEqual(record, {
      url: "/something-else",
      method: "GET",
      headers: { "Content-Type": "text" },
    });
  });

  it("a new receiver replaces the previous one", async () => {
    const first = server.requests();
    const second = server.requests();

    await request(server.port, "/x");
    assert.equal(first.isClosed(), true);
    assert.equal((await second.recv(1000)).url, "/x");
  });

  it("captures nothing while no receiver is attached", async () => {
    await request(server.port, "/before");
    const requests = server.requests();
    assert.equal(requests.tryRecv(), undefined);
  });
});

// =============================================================================
// Delay
// =============================================================================

describe("TestServer delay", () => {
  let server: TestServer;
  let conn: OpenConnection | null = null;

  beforeEach(async () => {
    server = await TestServer.start();
  });

  afterEach(async () => {
    await conn?.close();
    conn = null;
    await server.close();
  });

  it("writes nothing before the delay has elapsed", async () => {
    server.createResource("/slow").delay(300);

    conn = await open(server.port, "/slow");
    await sleep(150);
    assert.equal(conn.received(), "");

    await conn.waitFor("HTTP/1.1 200 Ok\r\n", 2000);
    await conn.closed;
    assert.equal(conn.received(), "HTTP/1.1 200 Ok\r\n\r\n");
  });
});

// =============================================================================
// Streaming
// =============================================================================

describe("TestServer streaming", () => {
  let server: TestServer;
  const connections: OpenConnection[] = [];

  beforeEach(async () => {
    server = await TestServer.start();
  });

  afterEach(async () => {
    for (const conn of connections.splice(0)) {
      await conn.close();
    }
    await server.close();
  });

  async function openStream(target: string): Promise<OpenConnection> {
    const conn = await open(server.port, target);
    connections.push(conn);
    return conn;
  }

  it("keeps the connection open and relays sent data", async () => {
    const resource = server
      .createResource("/stream")
      .stream()
      .header("Content-Type", "text/event-stream")
      .body(": initial data\n");

    const conn = await openStream("/stream");
    await waitUntil(() => resource.openConnectionsCount() === 1);

    resource.sendLine("Hello.");
    resource.send("Is there anybody ");
    resource.send("in there?\n");
    resource.closeOpenConnections();
    await conn.closed;

    assert.equal(
      conn.received(),
      "HTTP/1.1 200 Ok\r\nContent-Type: text/event-stream\r\n\r\n: initial data\nHello.\nIs there anybody in there?\n",
    );
  });

  it("fans out to every client and drops them all on close", async () => {
    const resource = server.createResource("/sub").stream();

    const a = await openStream("/sub");
    const b = await openStream("/sub");
    await waitUntil(() => resource.openConnectionsCount() === 2);

    resource.sendLine("x");
    await a.waitFor("x\n");
    await b.waitFor("x\n");
    assert.equal(a.received(), "HTTP/1.1 200 Ok\r\n\r\nx\n");
    assert.equal(b.received(), "HTTP/1.1 200 Ok\r\n\r\nx\n");

    resource.closeOpenConnections();
    await Promise.all([a.closed, b.closed]);
    assert.equal(resource.openConnectionsCount(), 0);
  });

  it("forgets a client that disconnects", async () => {
    const resource = server.createResource("/sub").stream();
    const conn = await openStream("/sub");
    await waitUntil(() => resource.openConnectionsCount() === 1);

    await conn.close();
    await waitUntil(() => resource.openConnectionsCount() === 0);
    resource.sendLine("nobody listening");
    assert.equal(resource.openConnectionsCount(), 0);
  });

  it("does not subscribe a client that hung up during the delay", async () => {
    const resource = server.createResource("/slow-sub").delay(200).stream();
    const response = await new Promise<string>((resolve, reject) => {
      const socket = connect(server.port, HOST, () => {
        socket.end("GET /slow-sub HTTP/1.1\r\n\r\n");
      });
      let text = "";
      socket.on("data", (chunk: Buffer) => {
        text += chunk.toString("utf-8");
      });
      socket.on("close", () => resolve(text));
      socket.on("error", reject);
    });

    assert.equal(response, "HTTP/1.1 200 Ok\r\n\r\n");
    assert.equal(resource.openConnectionsCount(), 0);
  });

  it("closing the server closes open streams", async () => {
    const resource = server.createResource("/sub").stream();
    const conn = await openStream("/sub");
    await waitUntil(() => resource.openConnectionsCount() === 1);

    await server.close();
    await conn.closed;
    assert.equal(conn.isClosed(), true);
    assert.equal(resource.openConnectionsCount(), 0);
  });
});

// =============================================================================
// Lifecycle
// =============================================================================

describe("TestServer lifecycle", () => {
  it("refuses connections after close", async () => {
    const server = await TestServer.start();
    await server.close();

    assert.equal(server.isListening(), false);
    assert.equal(await connectError(server.port), "ECONNREFUSED");
  });

  it("close is a no-op the second time", async () => {
    const server = await TestServer.start();
    await server.close();
    await server.close();
    assert.equal(server.isListening(), false);
  });

  it("stops when another client sends the CLOSE signal", async () => {
    const server = await TestServer.start();

    await new Promise<void>((resolve) => {
      const socket = connect(server.port, HOST, () => {
        socket.end("CLOSE");
      });
      socket.on("close", () => resolve());
      socket.on("error", () => resolve());
    });

    await waitUntil(() => !server.isListening());
    assert.equal(await connectError(server.port), "ECONNREFUSED");
  });

  it("binds a given port", async () => {
    const first = await TestServer.start();
    const port = first.port;
    await first.close();

    const server = await TestServer.start({ port });
    try {
      assert.equal(server.port, port);
    } finally {
      await server.close();
    }
  });

  it("rejects with BindError when the port is taken", async () => {
    const first = await TestServer.start();
    try {
      await assert.rejects(TestServer.start({ port: first.port }), (err: unknown) => {
        assert.ok(err instanceof BindError);
        assert.equal(err.code, "EADDRINUSE");
        assert.equal(err.port, first.port);
        return true;
      });
    } finally {
      await first.close();
    }
  });
});
