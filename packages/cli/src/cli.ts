#!/usr/bin/env -S node --import tsx

/**
 * CLI entry point: wires the real TestServer, control server and resource
 * file loader into startCli().
 */

import { TestServer } from "@mockwire/server";
import { createResources, loadResourceFile, startControlServer } from "@mockwire/control";
import { parseCliArgs } from "./args.js";
import { startCli } from "./runner.js";

// Make the CLI process identifiable
process.title = "mockwire";

const VERSION = "0.1.0";

async function main() {
  const config = parseCliArgs(process.argv.slice(2));

  const result = await startCli(config, {
    log: console.log,
    version: VERSION,
    startServer: async (opts) => {
      const server = await TestServer.start(opts);
      return {
        url: server.url,
        loadResources: async (path) => {
          const specs = await loadResourceFile(path);
          return createResources(server, specs).length;
        },
        startControl: async (port) => {
          const handle = await startControlServer(port, { server });
          return { url: handle.url, shutdown: handle.close };
        },
        shutdown: () => server.close(),
      };
    },
  });

  // Keep the process alive until a shutdown signal arrives
  if (result.action === "started") {
    let stopping = false;
    const shutdown = () => {
      if (stopping) return;
      stopping = true;
      console.log("\n[mockwire] Shutting down...");
      result.shutdown().then(
        () => process.exit(0),
        (err) => {
          console.error("[mockwire] Shutdown failed:", err);
          process.exit(1);
        },
      );
    };

    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  }
}

main().catch((err) => {
  console.error("[mockwire] Fatal error:", err);
  process.exit(1);
});
