import { logger } from "hono/logger";
import { info } from "../../../config/logger.ts";

const REDACTED = "[REDACTED]";

// `/{key}/mcp` as printed inside an access log line
const PATH_KEY_RE = /(^|\s)\/[^/\s]+(\/mcp(?=[/\s?]|$))/g;

/**
 * Hide API keys carried in the first path segment of `/{key}/mcp` URLs
 */
export function redactApiKeyPath(line: string): string {
  return line.replace(PATH_KEY_RE, `$1/${REDACTED}$2`);
}

/**
 * Access log middleware writing through the application logger
 */
export function createRequestLogger() {
  return logger((message: string, ...rest: string[]) => {
    info(redactApiKeyPath([message, ...rest].join(" ")));
  });
}
