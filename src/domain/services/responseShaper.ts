import { Result } from "neverthrow";
import type { ResponseMode, SearchError, UpstreamResponse } from "../models/search.ts";

/**
 * Top-level keys carrying request metadata rather than results
 */
export const METADATA_KEYS: ReadonlyArray<string> = [
  "search_metadata",
  "search_parameters",
  "search_information",
  "pagination",
  "serpapi_pagination",
];

export interface ShapingStrategy {
  readonly mode: ResponseMode;
  shape(response: UpstreamResponse): UpstreamResponse;
  serialize(response: UpstreamResponse): string;
}

export function isMetadataKey(key: string): boolean {
  return METADATA_KEYS.includes(key) || key.includes("pagination");
}

/**
 * Copy of the response without the metadata keys. One level deep only:
 * nested objects keep whatever they contain.
 */
export function stripMetadata(response: UpstreamResponse): UpstreamResponse {
  return Object.fromEntries(
    Object.entries(response).filter(([key]) => !isMetadataKey(key)),
  );
}

const completeStrategy: ShapingStrategy = {
  mode: "complete",
  shape: (response) => response,
  serialize: (response) => JSON.stringify(response, null, 2),
};

const compactStrategy: ShapingStrategy = {
  mode: "compact",
  shape: stripMetadata,
  serialize: (response) => JSON.stringify(response),
};

export const SHAPING_STRATEGIES: Readonly<Record<ResponseMode, ShapingStrategy>> = {
  complete: completeStrategy,
  compact: compactStrategy,
};

const safeSerialize = Result.fromThrowable(
  (strategy: ShapingStrategy, response: UpstreamResponse) =>
    strategy.serialize(strategy.shape(response)),
  (e): SearchError => ({
    type: "unexpected",
    message: `Failed to serialize search response: ${e instanceof Error ? e.message : String(e)}`,
  }),
);

export function shapeResponse(
  response: UpstreamResponse,
  mode: ResponseMode,
): Result<string, SearchError> {
  return safeSerialize(SHAPING_STRATEGIES[mode], response);
}
