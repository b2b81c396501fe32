/**
 * CLI runner: the startup flow behind `mockwire`.
 *
 * Everything with side effects comes in through CliDeps, so tests drive the
 * flow with fakes.
 */

import type { CliConfig } from "./args.js";

export interface StartedControl {
  url: string;
  shutdown: () => Promise<void>;
}

export interface StartedServer {
  url: string;
  /** Create the resources listed in a file; resolves with how many were created */
  loadResources: (path: string) => Promise<number>;
  /** Expose this server through the control API */
  startControl: (port: number) => Promise<StartedControl>;
  shutdown: () => Promise<void>;
}

export interface CliDeps {
  /** Print a line to stdout */
  log: (msg: string) => void;
  /** Package version for --version output */
  version: string;
  startServer: (opts: { port: number; host: string }) => Promise<StartedServer>;
}

export type CliResult =
  | { action: "help" }
  | { action: "version" }
  | { action: "started"; shutdown: () => Promise<void> };

const HELP_TEXT = `
Usage: mockwire [options]

Starts a mock HTTP server and a control API to configure it.

Options:
  --port <number>             Mock server port (default: any free port)
  --host <address>            Bind address (default: 127.0.0.1)
  --control-port <number>     Control API port (default: any free port)
  --resources <file>          JSON file with resources to create at startup
  --no-control                Do not start the control API
  -h, --help                  Show this help text
  -v, --version               Show version
`.trim();

export async function startCli(
  config: CliConfig,
  deps: CliDeps,
): Promise<CliResult> {
  // --- Help ---
  if (config.command === "help") {
    deps.log(HELP_TEXT);
    return { action: "help" };
  }

  // --- Version ---
  if (config.command === "version") {
    deps.log(`mockwire v${deps.version}`);
    return { action: "version" };
  }

  // --- Start ---
  const server = await deps.startServer({ port: config.port, host: config.host });
  deps.log(`[mockwire] Mock server listening on ${server.url}`);

  let control: StartedControl | undefined;
  try {
    if (config.resourcesFile) {
      const count = await server.loadResources(config.resourcesFile);
      deps.log(`[mockwire] Loaded ${count} resource${count === 1 ? "" : "s"} from ${config.resourcesFile}`);
    }

    if (config.control) {
      control = await server.startControl(config.controlPort);
      deps.log(`[mockwire] Control API on ${control.url}`);
    }
  } catch (err) {
    // Don't leave the mock server listening behind a failed startup
    await server.shutdown();
    throw err;
  }

  return {
    action: "started",
    shutdown: async () => {
      if (control) await control.shutdown();
      await server.shutdown();
    },
  };
}
