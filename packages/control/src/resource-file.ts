/**
 * Resource files: JSON documents listing resources to create at startup.
 *
 *   { "resources": [ { "uri": "/health", "body": "ok" }, ... ] }
 */

import { readFile } from "node:fs/promises";
import type { TestServer, Resource } from "@mockwire/server";
import { describeInvalidSpec, isResourceSpec, type ResourceSpec } from "@mockwire/shared";
import { applyResourceSpec, validateSpec } from "./resource-spec.js";

export class ResourceFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResourceFileError";
  }
}

/**
 * Read and validate a resource file.
 * Every entry is checked before anything is returned.
 */
export async function loadResourceFile(path: string): Promise<ResourceSpec[]> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new ResourceFileError(`Resources file not found: ${path}`);
    }
    throw err;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ResourceFileError(`Invalid JSON in resources file ${path}: ${reason}`);
  }

  if (typeof data !== "object" || data === null || !("resources" in data) || !Array.isArray(data.resources)) {
    throw new ResourceFileError(`Invalid resources file ${path}: missing "resources" array`);
  }

  const specs: ResourceSpec[] = [];
  data.resources.forEach((entry: unknown, index: number) => {
    if (!isResourceSpec(entry)) {
      throw new ResourceFileError(
        `Invalid resource at index ${index} in ${path}: ${describeInvalidSpec(entry) ?? "invalid entry"}`,
      );
    }
    specs.push(entry);
  });
  return specs;
}

/**
 * Create every spec on the server, in file order. All specs are validated
 * first; nothing is registered when one of them is rejected.
 */
export function createResources(server: TestServer, specs: ResourceSpec[]): Resource[] {
  for (const spec of specs) validateSpec(spec.uri, spec);
  return specs.map((spec) => applyResourceSpec(server.createResource(spec.uri), spec));
}
