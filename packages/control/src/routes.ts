import { Hono, type Context } from "hono";
import { ConfigurationError, type Resource, type TestServer } from "@mockwire/server";
import {
  describeInvalidSpec,
  describeInvalidUpdate,
  isResourceSpec,
  isResourceUpdate,
  isSendRequest,
} from "@mockwire/shared";
import { createFromSpec, updateResource } from "./resource-spec.js";

// ---------------------------------------------------------------------------
// Route dependencies
// ---------------------------------------------------------------------------

export interface ControlDeps {
  /** The mock server this API configures */
  server: TestServer;
}

type JsonBody = { ok: true; value: unknown } | { ok: false };

async function readJson(c: Context): Promise<JsonBody> {
  try {
    return { ok: true, value: await c.req.json<unknown>() };
  } catch {
    return { ok: false };
  }
}

// ---------------------------------------------------------------------------
// App factory
// ---------------------------------------------------------------------------

export function createControlApp(deps: ControlDeps): Hono {
  const { server } = deps;
  const app = new Hono();

  // Resource setters throw synchronously on invalid values
  app.onError((err, c) => {
    if (err instanceof ConfigurationError) {
      return c.json({ error: err.message }, 400);
    }
    console.error("[control] request failed:", err);
    return c.json({ error: "Internal server error" }, 500);
  });

  // --- Helper: look up a resource by its :id path segment ---
  function findResource(c: Context): Resource | undefined {
    const id = Number(c.req.param("id"));
    return Number.isInteger(id) ? server.resource(id) : undefined;
  }

  app.get("/health", (c) => {
    return c.json({
      status: "ok",
      port: server.port,
      resources: server.resources().length,
    });
  });

  // --- Resources ---

  app.get("/resources", (c) => {
    return c.json(server.resources().map((r) => r.snapshot()));
  });

  app.post("/resources", async (c) => {
    const body = await readJson(c);
    if (!body.ok) {
      return c.json({ error: "Invalid JSON body" }, 400);
    }
    if (!isResourceSpec(body.value)) {
      return c.json({ error: describeInvalidSpec(body.value) ?? "Invalid resource" }, 400);
    }

    const resource = createFromSpec(server, body.value);
    console.log(`[control] created resource ${resource.id}: ${resource.getMethod()} ${resource.uri}`);
    return c.json(resource.snapshot(), 201);
  });

  app.get("/resources/:id", (c) => {
    const resource = findResource(c);
    if (!resource) {
      return c.json({ error: "Resource not found" }, 404);
    }
    return c.json(resource.snapshot());
  });

  app.patch("/resources/:id", async (c) => {
    const resource = findResource(c);
    if (!resource) {
      return c.json({ error: "Resource not found" }, 404);
    }
    const body = await readJson(c);
    if (!body.ok) {
      return c.json({ error: "Invalid JSON body" }, 400);
    }
    if (!isResourceUpdate(body.value)) {
      return c.json({ error: describeInvalidUpdate(body.value) ?? "Invalid update" }, 400);
    }

    updateResource(resource, body.value);
    return c.json(resource.snapshot());
  });

  // --- Streaming ---

  app.post("/resources/:id/send", async (c) => {
    const resource = findResource(c);
    if (!resource) {
      return c.json({ error: "Resource not found" }, 404);
    }
    const body = await readJson(c);
    if (!body.ok || !isSendRequest(body.value)) {
      return c.json({ error: "Expected { data: string, line?: boolean }" }, 400);
    }

    if (body.value.line) {
      resource.sendLine(body.value.data);
    } else {
      resource.send(body.value.data);
    }
    return c.json({ ok: true, openConnections: resource.openConnectionsCount() });
  });

  app.post("/resources/:id/close-connections", (c) => {
    const resource = findResource(c);
    if (!resource) {
      return c.json({ error: "Resource not found" }, 404);
    }
    resource.closeOpenConnections();
    return c.json({ ok: true });
  });

  return app;
}
