/**
 * Ordered set of resources of one server, and request routing over it.
 *
 * Routing: resources whose URI (path + query constraints) matches are the
 * candidates; the first registered candidate with the request method wins.
 * No candidate → 404, candidates but none with that method → 405.
 */

import { Status, statusDescription } from "./http.js";
import { Resource } from "./resource.js";

export type Resolution =
  | { kind: "routed"; resource: Resource }
  | { kind: "not_found" }
  | { kind: "method_not_allowed" };

export class ResourceRegistry {
  private resources: Resource[] = [];
  private nextId = 1;

  /** Compile and register a resource; throws ConfigurationError on a bad pattern */
  create(uri: string): Resource {
    const resource = new Resource(uri, this.nextId);
    this.nextId++;
    this.resources.push(resource);
    return resource;
  }

  list(): Resource[] {
    return [...this.resources];
  }

  get(id: number): Resource | undefined {
    return this.resources.find((r) => r.id === id);
  }

  get size(): number {
    return this.resources.length;
  }

  /** Resolve a request; a routed resource has its request count incremented */
  resolve(method: string, target: string): Resolution {
    const candidates = this.resources.filter((r) => r.matchesUri(target));
    if (candidates.length === 0) {
      return { kind: "not_found" };
    }

    const resource = candidates.find((r) => r.getMethod() === method);
    if (!resource) {
      return { kind: "method_not_allowed" };
    }

    resource.incrementRequestCount();
    return { kind: "routed", resource };
  }

  closeAllStreams(): void {
    for (const resource of this.resources) {
      resource.closeOpenConnections();
    }
  }
}

/** Response text for a resolution */
export function renderResolution(resolution: Resolution, target: string): string {
  switch (resolution.kind) {
    case "routed":
      return resolution.resource.render(target);
    case "not_found":
      return `HTTP/1.1 ${statusDescription(Status.NotFound)}\r\n\r\n`;
    case "method_not_allowed":
      return `HTTP/1.1 ${statusDescription(Status.MethodNotAllowed)}\r\n\r\n`;
  }
}
