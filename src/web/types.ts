// pattern: Functional Core

/**
 * Shared types for web search.
 * Search adapters normalise to these shapes and raise SearchError on failure.
 */

export type SearchResult = {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
  readonly score?: number;
};

export type SearchResponse = {
  readonly results: ReadonlyArray<SearchResult>;
  readonly provider: string;
  readonly answer?: string;
};

export interface SearchProvider {
  readonly name: string;
  search(query: string, limit: number): Promise<SearchResponse>;
}

export type SearchErrorCode = 'api_error' | 'invalid_response';

export class SearchError extends Error {
  constructor(
    public code: SearchErrorCode,
    message: string = '',
  ) {
    super(message);
    this.name = 'SearchError';
  }
}
