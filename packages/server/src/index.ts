export { TestServer, CLOSE_SIGNAL, type ServerOptions } from "./test-server.js";
export { Resource, type BodyFn, type RequestParams } from "./resource.js";
export { ResourceRegistry, renderResolution, type Resolution } from "./registry.js";
export { StreamBroadcaster, type StreamSink, type Subscription } from "./broadcaster.js";
export { RequestChannel, RequestChannelClosedError } from "./request-channel.js";
export {
  compileUriPattern,
  parseQueryString,
  queryConstraintsSatisfied,
  splitTarget,
  QUERY_WILDCARD,
  type UriPattern,
  type RequestTarget,
} from "./uri-pattern.js";
export {
  METHODS,
  Status,
  isMethod,
  isStatusCode,
  statusDescription,
  type Method,
  type StatusCode,
} from "./http.js";
export { ConfigurationError, BindError } from "./errors.js";
export type { RequestRecord } from "./request.js";
