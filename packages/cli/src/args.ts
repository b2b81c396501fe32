/**
 * CLI argument parsing.
 *
 * Converts process.argv (minus node + script) into a typed CliConfig
 * with Node's built-in parseArgs.
 */

import { parseArgs } from "node:util";
import { resolve } from "node:path";

export interface CliConfig {
  command: "start" | "help" | "version";
  /** Mock server port; 0 picks a free one */
  port: number;
  host: string;
  /** Control API port; 0 picks a free one */
  controlPort: number;
  /** Start the control API next to the mock server */
  control: boolean;
  /** Absolute path of a resource file to load at startup */
  resourcesFile?: string;
}

const DEFAULT_HOST = "127.0.0.1";

function parsePort(value: string | undefined): number {
  if (value === undefined) return 0;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: "${value}"`);
  }
  return port;
}

export function parseCliArgs(argv: string[]): CliConfig {
  const { values } = parseArgs({
    args: argv,
    options: {
      help: { type: "boolean", short: "h", default: false },
      version: { type: "boolean", short: "v", default: false },
      port: { type: "string" },
      host: { type: "string" },
      "control-port": { type: "string" },
      "no-control": { type: "boolean", default: false },
      resources: { type: "string" },
    },
    allowPositionals: false,
    strict: true,
  });

  const defaults = {
    port: 0,
    host: DEFAULT_HOST,
    controlPort: 0,
    control: true,
  };

  // Help / version take precedence
  if (values.help) {
    return { command: "help", ...defaults };
  }

  if (values.version) {
    return { command: "version", ...defaults };
  }

  return {
    command: "start",
    port: parsePort(values.port),
    host: values.host ?? DEFAULT_HOST,
    controlPort: parsePort(values["control-port"]),
    control: !values["no-control"],
    resourcesFile: values.resources !== undefined ? resolve(values.resources) : undefined,
  };
}
