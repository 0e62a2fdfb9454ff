import type { ResultAsync } from "neverthrow";
import type { SearchError, SearchRequest } from "../../../domain/models/search.ts";

/**
 * Input port for search functionality
 * Defines the interface for search operations that can be used by controllers or other input adapters
 */
export interface SearchUseCase {
  search(request: SearchRequest): ResultAsync<string, SearchError>;

  /**
   * Same as `search`, with every failure rendered as an `Error: ...` string.
   * The returned promise never rejects.
   */
  searchAsText(request: SearchRequest): Promise<string>;
}
