import { ConfigurationError, Resource, isStatusCode, type TestServer } from "@mockwire/server";
import type { ResourceSpec, ResourceUpdate } from "@mockwire/shared";

/**
 * Apply a wire-format update through the fluent API, so every validation
 * rule of Resource holds. The body goes first: it is the only setting that
 * can conflict with state already on the resource.
 */
export function applyResourceSpec(resource: Resource, spec: ResourceUpdate): Resource {
  if (spec.body !== undefined) resource.body(spec.body);
  if (spec.method !== undefined) resource.method(spec.method);
  if (spec.status !== undefined) {
    if (!isStatusCode(spec.status)) {
      throw new ConfigurationError(
        `Unknown status code ${spec.status}; use customStatus(code, reason) for non-standard statuses`,
      );
    }
    resource.status(spec.status);
  }
  if (spec.customStatus !== undefined) {
    resource.customStatus(spec.customStatus.code, spec.customStatus.reason);
  }
  for (const [name, value] of Object.entries(spec.headers ?? {})) {
    resource.header(name, value);
  }
  if (spec.delayMs !== undefined) resource.delay(spec.delayMs);
  if (spec.stream !== undefined) resource.stream(spec.stream);
  for (const [name, value] of Object.entries(spec.query ?? {})) {
    resource.query(name, value);
  }
  return resource;
}

/** Throws the ConfigurationError that applying `spec` to `uri` would raise */
export function validateSpec(uri: string, spec: ResourceUpdate): void {
  applyResourceSpec(new Resource(uri), spec);
}

/**
 * Apply an update to a detached copy first; on success apply it for real.
 * A rejected update leaves the live resource untouched.
 */
export function updateResource(resource: Resource, update: ResourceUpdate): Resource {
  validateSpec(resource.uri, update);
  return applyResourceSpec(resource, update);
}

/** Register a resource only when the whole spec is valid */
export function createFromSpec(server: TestServer, spec: ResourceSpec): Resource {
  validateSpec(spec.uri, spec);
  return applyResourceSpec(server.createResource(spec.uri), spec);
}
