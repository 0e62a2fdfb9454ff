import type { ResultAsync } from "neverthrow";
import type {
  SearchError,
  SearchParameters,
  UpstreamResponse,
} from "../../../domain/models/search.ts";

/**
 * Output port for search repository
 * Defines the interface for search operations that the application needs from external systems
 */
export interface SearchRepository {
  search(params: SearchParameters, signal?: AbortSignal): ResultAsync<UpstreamResponse, SearchError>;

  getId(): string;

  getName(): string;
}
