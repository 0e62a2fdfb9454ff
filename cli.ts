/**
 * Stdio entry point
 *
 * Launches the MCP server over standard I/O for MCP clients such as desktop
 * assistants. No HTTP request carries a key here, so SERPAPI_API_KEY is
 * required and the process exits when it is missing.
 */

import "dotenv/config";
import { err, ok, Result } from "neverthrow";
import { loadStdioConfig } from "./src/config/env.ts";
import { initializeAdapters } from "./src/config/adapters.ts";
import { AppDI, type DIError } from "./src/config/AppDI.ts";
import { error, info, setLogLevel } from "./src/config/logger.ts";

type CliError =
  | { type: "setup"; message: string }
  | { type: "server"; message: string }
  | { type: "di"; error: DIError };

function setup(): Result<{ di: AppDI; apiKey: string }, CliError> {
  const configResult = loadStdioConfig();
  if (configResult.isErr()) {
    return err({
      type: "setup",
      message: configResult.error.issues.join("; ") || configResult.error.message,
    });
  }

  const config = configResult.value;
  setLogLevel(config.logLevel);

  const adaptersResult = initializeAdapters(config.serpApiEndpoint);
  if (adaptersResult.isErr()) {
    return err({ type: "setup", message: adaptersResult.error.message });
  }

  const diResult = new AppDI().initialize(adaptersResult.value);
  if (diResult.isErr()) {
    return err({ type: "di", error: diResult.error });
  }

  return ok({ di: diResult.value, apiKey: config.apiKey });
}

function getErrorMessage(cliError: CliError): string {
  switch (cliError.type) {
    case "setup":
    case "server":
      return cliError.message;
    case "di":
      return `DI error: ${cliError.error.type} - ${cliError.error.message}`;
  }
}

async function startServer(): Promise<Result<void, CliError>> {
  const setupResult = setup();
  if (setupResult.isErr()) {
    return err(setupResult.error);
  }

  const { di, apiKey } = setupResult.value;
  info("Starting SerpApi MCP server (stdio)...");

  const started = await di.startMcpServer(apiKey);
  return started.mapErr((startError): CliError =>
    startError instanceof Error
      ? { type: "server", message: `Server error: ${startError.message}` }
      : { type: "di", error: startError }
  );
}

startServer()
  .then((result) => {
    result.match(
      () => {
        // The transport keeps the process alive until stdin closes
      },
      (cliError) => {
        error(`Fatal error: ${getErrorMessage(cliError)}`);
        process.exit(1);
      },
    );
  })
  .catch((unexpected: unknown) => {
    error(`Fatal error: ${unexpected instanceof Error ? unexpected.message : String(unexpected)}`);
    process.exit(1);
  });
