import { errAsync, Result, ResultAsync } from "neverthrow";
import {
  DEFAULT_ENGINE,
  formatSearchError,
  responseModeSchema,
  type SearchError,
  type SearchParameters,
  type SearchParams,
  type SearchRequest,
} from "../../domain/models/search.ts";
import { shapeResponse } from "../../domain/services/responseShaper.ts";
import type { SearchUseCase } from "../ports/in/SearchUseCase.ts";
import type { SearchRepository } from "../ports/out/SearchRepository.ts";
import { debug, error } from "../../config/logger.ts";

/**
 * Merge caller parameters over the defaults. Caller keys win on collision,
 * `api_key` and `engine` included.
 */
export function buildSearchParameters(apiKey: string, params: SearchParams): SearchParameters {
  return {
    api_key: apiKey,
    engine: DEFAULT_ENGINE,
    ...params,
  };
}

function toUnexpectedError(e: unknown): SearchError {
  return {
    type: "unexpected",
    message: e instanceof Error ? e.message : String(e),
  };
}

/**
 * Implementation of the SearchUseCase port
 * Runs one upstream search per call and shapes the response for the requested mode
 */
export class SearchService implements SearchUseCase {
  constructor(private readonly searchRepository: SearchRepository) {}

  search(request: SearchRequest): ResultAsync<string, SearchError> {
    const mode = responseModeSchema.safeParse(request.mode);
    if (!mode.success) {
      return errAsync({
        type: "validation",
        message: "Invalid mode. Must be 'complete' or 'compact'",
      });
    }

    if (!request.apiKey) {
      return errAsync({
        type: "missing_api_key",
        message: "Unable to access API key from request context",
      });
    }

    const params = buildSearchParameters(request.apiKey, request.params);
    debug(
      `[SEARCH_SERVICE] Dispatching to ${this.searchRepository.getName()} (engine: ${
        String(params.engine)
      }, mode: ${mode.data})`,
    );

    return this.searchRepository.search(params, request.signal)
      .andThen((response) => shapeResponse(response, mode.data));
  }

  async searchAsText(request: SearchRequest): Promise<string> {
    // Throws from anywhere below surface as rejections of this promise
    const settle = async (): Promise<Result<string, SearchError>> => await this.search(request);

    return await ResultAsync.fromPromise(settle(), toUnexpectedError)
      .andThen((result) => result)
      .match(
        (text) => text,
        (searchError) => {
          error(`[SEARCH_SERVICE] Search failed: ${searchError.type} - ${searchError.message}`);
          return formatSearchError(searchError);
        },
      );
  }
}
