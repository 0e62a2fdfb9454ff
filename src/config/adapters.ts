import { Result } from "neverthrow";
import type { SearchRepository } from "../application/ports/out/SearchRepository.ts";
import {
  SERPAPI_ENDPOINT,
  SerpApiSearchAdapter,
} from "../adapters/out/search/SerpApiSearchAdapter.ts";
import { info } from "./logger.ts";

/**
 * Type definition representing the adapter container.
 */
export interface AdapterContainer {
  search: SearchRepository;
}

export type AdapterInitError = {
  type: "invalid_endpoint";
  message: string;
};

const parseEndpoint = Result.fromThrowable(
  (endpoint: string) => new URL(endpoint),
  (): AdapterInitError => ({
    type: "invalid_endpoint",
    message: "SERPAPI_ENDPOINT is not a valid URL",
  }),
);

/**
 * Initializes the outbound adapters.
 * @param endpoint SerpApi search endpoint, overridable for proxies
 */
export function initializeAdapters(
  endpoint: string = SERPAPI_ENDPOINT,
): Result<AdapterContainer, AdapterInitError> {
  return parseEndpoint(endpoint).map((url) => {
    const search = new SerpApiSearchAdapter(url.toString());
    info(`Registered ${search.getName()} search adapter (${url.origin})`);
    return { search };
  });
}
