import { err, ok, Result } from "neverthrow";
import { z } from "zod";
import { SERPAPI_ENDPOINT } from "../adapters/out/search/SerpApiSearchAdapter.ts";
import { type LogLevel, parseLogLevel } from "./logger.ts";

/**
 * Settings for the HTTP gateway
 */
export interface ServerConfig {
  readonly host: string;
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly serpApiEndpoint: string;
}

/**
 * Settings for the stdio server
 */
export interface StdioConfig {
  readonly apiKey: string;
  readonly logLevel: LogLevel;
  readonly serpApiEndpoint: string;
}

export type ConfigError = {
  type: "invalid_config";
  message: string;
  issues: string[];
};

const commonEnvSchema = z.object({
  LOG_LEVEL: z.string().default("info").transform(parseLogLevel),
  SERPAPI_ENDPOINT: z.string().default(SERPAPI_ENDPOINT),
});

const serverEnvSchema = commonEnvSchema.extend({
  MCP_HOST: z.string().min(1).default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().min(1).max(65535).default(8000),
});

const stdioEnvSchema = commonEnvSchema.extend({
  SERPAPI_API_KEY: z.string({
    required_error: "Environment variable SERPAPI_API_KEY is not set",
  }).trim().min(1, "Environment variable SERPAPI_API_KEY is not set"),
});

function toIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

// Empty strings count as unset so `.env` placeholders fall back to defaults
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  return Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] =>
      typeof entry[1] === "string" && entry[1].trim() !== ""
    ),
  );
}

/**
 * Load the gateway settings from environment variables
 */
export function loadServerConfig(
  env: NodeJS.ProcessEnv = process.env,
): Result<ServerConfig, ConfigError> {
  const parsed = serverEnvSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) {
    return err({
      type: "invalid_config",
      message: "Invalid server configuration",
      issues: toIssues(parsed.error),
    });
  }

  return ok({
    host: parsed.data.MCP_HOST,
    port: parsed.data.MCP_PORT,
    logLevel: parsed.data.LOG_LEVEL,
    serpApiEndpoint: parsed.data.SERPAPI_ENDPOINT,
  });
}

/**
 * Load the stdio server settings. No request carries a key there, so
 * SERPAPI_API_KEY is required.
 */
export function loadStdioConfig(
  env: NodeJS.ProcessEnv = process.env,
): Result<StdioConfig, ConfigError> {
  const parsed = stdioEnvSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) {
    return err({
      type: "invalid_config",
      message: "Invalid stdio configuration",
      issues: toIssues(parsed.error),
    });
  }

  return ok({
    apiKey: parsed.data.SERPAPI_API_KEY,
    logLevel: parsed.data.LOG_LEVEL,
    serpApiEndpoint: parsed.data.SERPAPI_ENDPOINT,
  });
}
