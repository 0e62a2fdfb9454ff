import "dotenv/config";
import { serve } from "@hono/node-server";
import { loadServerConfig } from "./src/config/env.ts";
import { initializeAdapters } from "./src/config/adapters.ts";
import { AppDI } from "./src/config/AppDI.ts";
import { error, info, setLogLevel } from "./src/config/logger.ts";

/**
 * Main entry point for the HTTP gateway
 */
function main(): void {
  const config = loadServerConfig().match(
    (value) => value,
    (configError) => {
      error(`${configError.message}: ${configError.issues.join("; ")}`);
      process.exit(1);
    },
  );
  setLogLevel(config.logLevel);

  const adapterContainer = initializeAdapters(config.serpApiEndpoint).match(
    (container) => container,
    (adapterError) => {
      error(`Failed to initialize adapters: ${adapterError.message}`);
      process.exit(1);
    },
  );

  const di = new AppDI();
  const app = di.initialize(adapterContainer)
    .andThen((container) => container.getGatewayApp())
    .match(
      (gateway) => gateway,
      (diError) => {
        error(`Failed to build gateway: ${diError.type} - ${diError.message}`);
        process.exit(1);
      },
    );

  const server = serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (address) => {
    info(`Server running on http://${config.host}:${address.port}`);
  });

  const shutdown = (signal: string) => {
    info(`Received ${signal}, shutting down`);
    server.close((closeError) => {
      if (closeError) {
        error(`Error while closing server: ${closeError.message}`);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main();
