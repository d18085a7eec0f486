// pattern: Functional Core

export type { SearchResult, SearchResponse, SearchErrorCode } from "./types.ts";
export { type SearchProvider, SearchError } from "./types.ts";
export { createTavilyAdapter } from "./providers/tavily.ts";
