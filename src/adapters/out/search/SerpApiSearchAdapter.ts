import { err, errAsync, ok, okAsync, Result, ResultAsync } from "neverthrow";
import {
  isUpstreamResponse,
  type SearchError,
  type SearchParameters,
  type UpstreamResponse,
} from "../../../domain/models/search.ts";
import type { SearchRepository } from "../../../application/ports/out/SearchRepository.ts";
import { debug, warn } from "../../../config/logger.ts";

export const SERPAPI_ENDPOINT = "https://serpapi.com/search.json";

/**
 * Encode one parameter value for the query string. Returns undefined for
 * values that should be left out.
 */
export function toQueryValue(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  return JSON.stringify(value);
}

export function buildSearchUrl(params: SearchParameters, endpoint = SERPAPI_ENDPOINT): URL {
  const url = new URL(endpoint);
  Object.entries(params).forEach(([key, value]) => {
    const encoded = toQueryValue(value);
    if (encoded !== undefined) url.searchParams.append(key, encoded);
  });
  return url;
}

/**
 * Map a non-2xx upstream status onto the error taxonomy
 */
export function classifyHttpFailure(status: number, description: string): SearchError {
  switch (status) {
    case 429:
      return { type: "rateLimit", message: description, status };
    case 401:
      return { type: "authorization", message: description, status };
    case 403:
      return { type: "forbidden", message: description, status };
    default:
      return { type: "http", message: description, status };
  }
}

function isAbortError(e: unknown): boolean {
  return typeof e === "object" && e !== null && "name" in e &&
    (e.name === "AbortError" || e.name === "TimeoutError");
}

const CANCELLED: SearchError = { type: "aborted", message: "Search request was cancelled" };

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  () => "invalid_json" as const,
);

function extractErrorDetail(body: string): string {
  const trimmed = body.trim();
  if (trimmed === "") {
    return "";
  }

  // Non-JSON bodies are reported as they are
  return parseJson(trimmed)
    .map((parsed) =>
      isUpstreamResponse(parsed) && typeof parsed.error === "string" ? parsed.error : trimmed
    )
    .unwrapOr(trimmed);
}

export class SerpApiSearchAdapter implements SearchRepository {
  readonly id = "serpapi";
  readonly name = "SerpApi";

  constructor(private readonly endpoint: string = SERPAPI_ENDPOINT) {}

  getId(): string {
    return this.id;
  }

  getName(): string {
    return this.name;
  }

  search(params: SearchParameters, signal?: AbortSignal): ResultAsync<UpstreamResponse, SearchError> {
    const url = buildSearchUrl(params, this.endpoint);
    debug(`[SERPAPI] GET ${url.origin}${url.pathname} (engine: ${String(params.engine)})`);

    return this.fetchSearchData(url, signal)
      .andThen((response) => this.checkStatus(response))
      .andThen((response) => this.parseBody(response, signal));
  }

  private fetchSearchData(url: URL, signal?: AbortSignal): ResultAsync<Response, SearchError> {
    return ResultAsync.fromPromise(
      fetch(url, {
        method: "GET",
        headers: { "Accept": "application/json" },
        signal,
      }),
      (e): SearchError => {
        if (signal?.aborted || isAbortError(e)) {
          return CANCELLED;
        }
        return {
          type: "network",
          message: `Failed to reach SerpApi: ${e instanceof Error ? e.message : String(e)}`,
        };
      },
    );
  }

  private checkStatus(response: Response): ResultAsync<Response, SearchError> {
    if (response.ok) {
      return okAsync(response);
    }

    const prefix = `SerpApi request failed with HTTP ${response.status}`;
    return ResultAsync.fromSafePromise(
      response.text().catch((e: unknown) => {
        warn(`[SERPAPI] Could not read error body: ${e instanceof Error ? e.message : String(e)}`);
        return "";
      }),
    )
      .andThen((body) => {
        const detail = extractErrorDetail(body) || response.statusText;
        const description = detail ? `${prefix}: ${detail}` : prefix;
        return errAsync<Response, SearchError>(classifyHttpFailure(response.status, description));
      });
  }

  private parseBody(
    response: Response,
    signal?: AbortSignal,
  ): ResultAsync<UpstreamResponse, SearchError> {
    return ResultAsync.fromPromise<unknown, SearchError>(
      response.json(),
      (e): SearchError =>
        signal?.aborted || isAbortError(e) ? CANCELLED : {
          type: "parse",
          message: `Failed to parse SerpApi response: ${e instanceof Error ? e.message : String(e)}`,
        },
    )
      .andThen((data) =>
        isUpstreamResponse(data) ? ok(data) : err<UpstreamResponse, SearchError>({
          type: "parse",
          message: "Unexpected SerpApi response: expected a JSON object",
        })
      );
  }
}
