export { startControlServer, type ControlConfig, type ControlHandle } from "./server.js";
export { createControlApp, type ControlDeps } from "./routes.js";
export { RequestFeed } from "./request-feed.js";
export { applyResourceSpec, createFromSpec, updateResource, validateSpec } from "./resource-spec.js";
export { loadResourceFile, createResources, ResourceFileError } from "./resource-file.js";
