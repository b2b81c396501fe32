/** Thrown synchronously when a resource is configured with values it cannot serve. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Thrown (as a rejection of TestServer.start) when the listening port cannot be bound. */
export class BindError extends Error {
  readonly port: number;
  readonly code: string | undefined;

  constructor(port: number, cause: NodeJS.ErrnoException) {
    super(`Could not bind port ${port}: ${cause.message}`);
    this.name = "BindError";
    this.port = port;
    this.code = cause.code;
  }
}
