// mockwire control protocol types
// Shared between the mock server core, the control API and its clients:
//   Test suite (any process) --HTTP--> Control API --> TestServer
//   Test suite <--WS /requests-- Control API <-- request channel

// ===========================================================================
// HTTP vocabulary
// ===========================================================================

export const METHODS = ["GET", "POST", "PUT", "DELETE", "PATCH", "HEAD", "OPTIONS"] as const;

export type Method = (typeof METHODS)[number];

export function isMethod(value: unknown): value is Method {
  return METHODS.some((method) => method === value);
}

// ===========================================================================
// Resource configuration: Client -> Control API
// ===========================================================================

export interface CustomStatus {
  code: number;
  reason: string;
}

/** Everything a resource can be configured with, minus its URI. */
export interface ResourceUpdate {
  method?: Method;
  status?: number;
  customStatus?: CustomStatus;
  headers?: Record<string, string>;
  body?: string;
  delayMs?: number;
  stream?: boolean;
  /** Extra query constraints; "*" accepts any non-empty value */
  query?: Record<string, string>;
}

export interface ResourceSpec extends ResourceUpdate {
  uri: string;
}

export interface SendRequest {
  data: string;
  /** Append a trailing "\n" (sendLine) */
  line?: boolean;
}

// ===========================================================================
// Resource state: Control API -> Client
// ===========================================================================

export interface ResourceSnapshot {
  id: number;
  uri: string;
  method: Method;
  /** "<code> <Reason>" as written on the status line */
  status: string;
  headers: Record<string, string>;
  /** null when the body comes from a generator function */
  body: string | null;
  delayMs: number | null;
  stream: boolean;
  requestCount: number;
  openConnections: number;
}

/** Metadata captured for one request received by the mock server. */
export interface RequestRecord {
  url: string;
  method: string;
  headers: Record<string, string>;
}

// ===========================================================================
// Request feed messages: Control API -> WS client
// ===========================================================================

export interface FeedHello {
  type: "hello";
  port: number;
}

export interface FeedRequest {
  type: "request";
  request: RequestRecord;
}

export type FeedMessage = FeedHello | FeedRequest;

// ===========================================================================
// Guards
// ===========================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringMap(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === "string");
}

function isCustomStatus(value: unknown): value is CustomStatus {
  return isRecord(value) && typeof value.code === "number" && typeof value.reason === "string";
}

/**
 * Check the optional fields shared by ResourceSpec and ResourceUpdate.
 * Returns a description of the first invalid field, or null.
 */
export function describeInvalidUpdate(value: unknown): string | null {
  if (!isRecord(value)) return "expected a JSON object";
  if (value.method !== undefined && !isMethod(value.method)) {
    return `method must be one of ${METHODS.join(", ")}`;
  }
  if (value.status !== undefined && typeof value.status !== "number") return "status must be a number";
  if (value.customStatus !== undefined && !isCustomStatus(value.customStatus)) {
    return "customStatus must be { code: number, reason: string }";
  }
  if (value.headers !== undefined && !isStringMap(value.headers)) return "headers must map names to strings";
  if (value.body !== undefined && typeof value.body !== "string") return "body must be a string";
  if (value.delayMs !== undefined && typeof value.delayMs !== "number") return "delayMs must be a number";
  if (value.stream !== undefined && typeof value.stream !== "boolean") return "stream must be a boolean";
  if (value.query !== undefined && !isStringMap(value.query)) return "query must map names to strings";
  return null;
}

export function isResourceUpdate(value: unknown): value is ResourceUpdate {
  return describeInvalidUpdate(value) === null;
}

export function describeInvalidSpec(value: unknown): string | null {
  const invalid = describeInvalidUpdate(value);
  if (invalid) return invalid;
  if (!isRecord(value) || typeof value.uri !== "string" || value.uri.length === 0) {
    return "uri must be a non-empty string";
  }
  return null;
}

export function isResourceSpec(value: unknown): value is ResourceSpec {
  return describeInvalidSpec(value) === null;
}

export function isSendRequest(value: unknown): value is SendRequest {
  return (
    isRecord(value) &&
    typeof value.data === "string" &&
    (value.line === undefined || typeof value.line === "boolean")
  );
}

export function isFeedMessage(value: unknown): value is FeedMessage {
  if (!isRecord(value)) return false;
  if (value.type === "hello") return typeof value.port === "number";
  if (value.type === "request") {
    const request = value.request;
    return (
      isRecord(request) &&
      typeof request.url === "string" &&
      typeof request.method === "string" &&
      isStringMap(request.headers)
    );
  }
  return false;
}
