/**
 * Resource: one configured (URI pattern, method) → response rule.
 *
 * Setters return the same instance, so a test can keep configuring a
 * resource after the server has handed it to live connections and every
 * holder sees the change. Defaults: GET, "200 Ok", no headers, empty body.
 */

import type { ResourceSnapshot } from "@mockwire/shared";
import { StreamBroadcaster, type StreamSink, type Subscription } from "./broadcaster.js";
import { ConfigurationError } from "./errors.js";
import { Status, statusDescription, type Method, type StatusCode } from "./http.js";
import {
  compileUriPattern,
  parseQueryString,
  queryConstraintsSatisfied,
  splitTarget,
  type UriPattern,
} from "./uri-pattern.js";

/** Parameters extracted from a request, handed to body generators. */
export interface RequestParams {
  path: Record<string, string>;
  query: Record<string, string>;
}

export type BodyFn = (params: RequestParams) => string;

type Body =
  | { kind: "literal"; text: string }
  | { kind: "generator"; fn: BodyFn };

const BODY_PLACEHOLDER = /\{(path|query)\.([^{}]+)\}/g;

export class Resource {
  readonly id: number;
  readonly uri: string;

  private pattern: UriPattern;
  /** Constraints added with query(); merged over the declared ones */
  private extraQuery = new Map<string, string>();
  private statusCode: StatusCode = Status.OK;
  private custom: { code: number; reason: string } | null = null;
  private headers = new Map<string, string>();
  private bodyContent: Body | null = null;
  private httpMethod: Method = "GET";
  private delayMs: number | null = null;
  private streaming = false;
  private count = 0;
  private broadcaster = new StreamBroadcaster();

  constructor(uri: string, id = 0) {
    this.uri = uri;
    this.id = id;
    this.pattern = compileUriPattern(uri);
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  /** Named status; clears any custom status set before */
  status(code: StatusCode): this {
    this.statusCode = code;
    this.custom = null;
    return this;
  }

  /** Arbitrary status line, e.g. customStatus(666, "Beast") */
  customStatus(code: number, reason: string): this {
    if (!Number.isInteger(code) || code < 100 || code > 999) {
      throw new ConfigurationError(`Custom status code must be an integer between 100 and 999, got ${code}`);
    }
    if (/[\r\n]/.test(reason)) {
      throw new ConfigurationError("Custom status reason must not contain line breaks");
    }
    this.custom = { code, reason };
    return this;
  }

  /** Set a response header; setting the same name again replaces the value */
  header(name: string, value: string): this {
    this.headers.set(name, value);
    return this;
  }

  /**
   * Literal body. `{path.<name>}` and `{query.<name>}` are replaced with
   * request values; unknown placeholders are written as-is.
   */
  body(text: string): this {
    if (this.bodyContent?.kind === "generator") {
      throw new ConfigurationError(`Resource "${this.uri}" already has a body function; body and bodyFn are exclusive`);
    }
    this.bodyContent = { kind: "literal", text };
    return this;
  }

  /** Generated body; the return value is written verbatim */
  bodyFn(fn: BodyFn): this {
    if (this.bodyContent?.kind === "literal") {
      throw new ConfigurationError(`Resource "${this.uri}" already has a body; body and bodyFn are exclusive`);
    }
    this.bodyContent = { kind: "generator", fn };
    return this;
  }

  method(method: Method): this {
    this.httpMethod = method;
    return this;
  }

  /** Wait this many milliseconds before writing the response */
  delay(ms: number): this {
    if (!Number.isFinite(ms) || ms < 0) {
      throw new ConfigurationError(`Delay must be a non-negative number of milliseconds, got ${ms}`);
    }
    this.delayMs = ms;
    return this;
  }

  /** Require a query parameter; "*" accepts any non-empty value */
  query(name: string, value: string): this {
    if (name.length === 0) {
      throw new ConfigurationError("Query parameter name must not be empty");
    }
    this.extraQuery.set(name, value);
    return this;
  }

  /** Keep connections open after the response and relay send()/sendLine() data */
  stream(enabled = true): this {
    this.streaming = enabled;
    return this;
  }

  // ===========================================================================
  // Introspection
  // ===========================================================================

  requestCount(): number {
    return this.count;
  }

  openConnectionsCount(): number {
    return this.broadcaster.openConnectionsCount();
  }

  getMethod(): Method {
    return this.httpMethod;
  }

  getDelay(): number | null {
    return this.delayMs;
  }

  isStream(): boolean {
    return this.streaming;
  }

  getHeaders(): Record<string, string> {
    return Object.fromEntries(this.headers);
  }

  /** "<code> <Reason>" as written after "HTTP/1.1 " */
  statusLine(): string {
    if (this.custom) return `${this.custom.code} ${this.custom.reason}`;
    return statusDescription(this.statusCode);
  }

  snapshot(): ResourceSnapshot {
    const content = this.bodyContent;
    return {
      id: this.id,
      uri: this.uri,
      method: this.httpMethod,
      status: this.statusLine(),
      headers: this.getHeaders(),
      body: content === null ? "" : content.kind === "literal" ? content.text : null,
      delayMs: this.delayMs,
      stream: this.streaming,
      requestCount: this.count,
      openConnections: this.openConnectionsCount(),
    };
  }

  // ===========================================================================
  // Streaming
  // ===========================================================================

  send(data: string): this {
    this.broadcaster.send(data);
    return this;
  }

  sendLine(data: string): this {
    this.broadcaster.sendLine(data);
    return this;
  }

  closeOpenConnections(): this {
    this.broadcaster.closeOpenConnections();
    return this;
  }

  subscribe(sink: StreamSink): Subscription {
    return this.broadcaster.subscribe(sink);
  }

  // ===========================================================================
  // Request handling
  // ===========================================================================

  /** Path pattern and query constraints, ignoring the method */
  matchesUri(target: string): boolean {
    const { path, query } = splitTarget(target);
    if (!this.pattern.matches(path)) return false;
    const actual = parseQueryString(query);
    return (
      queryConstraintsSatisfied(this.pattern.queryConstraints, actual) &&
      queryConstraintsSatisfied(this.extraQuery, actual)
    );
  }

  matchesRequest(method: string, target: string): boolean {
    return method === this.httpMethod && this.matchesUri(target);
  }

  incrementRequestCount(): void {
    this.count++;
  }

  extractParams(target: string): RequestParams {
    const { path, query } = splitTarget(target);
    return {
      path: this.pattern.extractPathParams(path),
      query: Object.fromEntries(parseQueryString(query)),
    };
  }

  /** Full response text: status line, headers, blank line, body */
  render(target: string): string {
    let head = `HTTP/1.1 ${this.statusLine()}\r\n`;
    for (const [name, value] of this.headers) {
      head += `${name}: ${value}\r\n`;
    }
    return `${head}\r\n${this.renderBody(target)}`;
  }

  private renderBody(target: string): string {
    const content = this.bodyContent;
    if (content === null) return "";

    const params = this.extractParams(target);
    if (content.kind === "generator") return content.fn(params);

    return content.text.replace(BODY_PLACEHOLDER, (placeholder, scope: string, name: string) => {
      const values = scope === "path" ? params.path : params.query;
      return Object.hasOwn(values, name) ? values[name] : placeholder;
    });
  }
}
