import { z } from "zod";

export const DEFAULT_ENGINE = "google_light";

export const RESPONSE_MODES = ["complete", "compact"] as const;

export const responseModeSchema = z.enum(RESPONSE_MODES);

/**
 * Named shaping strategy applied to the upstream response
 */
export type ResponseMode = z.infer<typeof responseModeSchema>;

/**
 * Caller-supplied SerpApi parameters, passed through untouched
 */
export type SearchParams = Readonly<Record<string, unknown>>;

/**
 * Parameters sent upstream: the caller's map merged over the defaults
 */
export type SearchParameters = Readonly<Record<string, unknown>>;

/**
 * Raw JSON object returned by SerpApi. Only a handful of top-level metadata
 * keys are ever interpreted.
 */
export type UpstreamResponse = Record<string, unknown>;

export interface SearchRequest {
  readonly apiKey: string | undefined;
  readonly params: SearchParams;
  readonly mode: string;
  readonly signal?: AbortSignal;
}

/**
 * Search error types
 */
export type SearchError =
  | { type: "validation"; message: string }
  | { type: "missing_api_key"; message: string }
  | { type: "rateLimit"; message: string; status: number }
  | { type: "authorization"; message: string; status: number }
  | { type: "forbidden"; message: string; status: number }
  | { type: "http"; message: string; status: number }
  | { type: "network"; message: string }
  | { type: "parse"; message: string }
  | { type: "aborted"; message: string }
  | { type: "unexpected"; message: string };

export const ERROR_PREFIX = "Error: ";

/**
 * Render a search error as the text handed back to the calling agent
 */
export function formatSearchError(error: SearchError): string {
  switch (error.type) {
    case "rateLimit":
      return `${ERROR_PREFIX}Rate limit exceeded. Please try again later.`;
    case "authorization":
      return `${ERROR_PREFIX}Invalid SerpApi API key. Check your API key in the path or Authorization header.`;
    case "forbidden":
      return `${ERROR_PREFIX}SerpApi API key forbidden. Verify your subscription and key validity.`;
    case "validation":
    case "missing_api_key":
    case "http":
    case "network":
    case "parse":
    case "aborted":
    case "unexpected":
      return `${ERROR_PREFIX}${error.message}`;
  }
}

export function isUpstreamResponse(value: unknown): value is UpstreamResponse {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
