// pattern: Imperative Shell

/**
 * Built-in web search tool.
 * Delegates to a search provider built per call from the currently configured
 * API key and result limit, so values set at runtime through settings take
 * effect immediately.
 */

import { z } from 'zod';
import { createToolProvider, defineTool } from '../provider.ts';
import { apiError, invalidResponse, missingApiKey } from '../errors.ts';
import { createTavilyAdapter, SearchError } from '../../web/index.ts';
import type { SearchProvider, SearchResponse } from '../../web/index.ts';
import type { ToolCategory, ToolProvider } from '../types.ts';

const SNIPPET_LIMIT = 300;

export const SEARCH_CATEGORY: ToolCategory = {
  name: 'search',
  description: 'Search the web for current information',
};

type WebToolOptions = {
  readonly apiKey: () => string | undefined;
  readonly createSearch?: (apiKey: string) => SearchProvider;
  /** Result count used when the call gives no limit. */
  readonly maxResults: () => number;
};

function truncate(text: string): string {
  return text.length > SNIPPET_LIMIT ? `${text.slice(0, SNIPPET_LIMIT)}...` : text;
}

export function formatSearchResponse(query: string, response: SearchResponse): string {
  const sections: Array<string> = [];

  if (response.answer) {
    sections.push(`## Summary\n${response.answer}`);
  }

  if (response.results.length > 0) {
    const entries = response.results.map((result, index) => {
      const lines = [`${index + 1}. **${result.title}**`];
      if (result.url) {
        lines.push(`   URL: ${result.url}`);
      }
      if (result.snippet) {
        lines.push(`   ${truncate(result.snippet)}`);
      }
      return lines.join('\n');
    });
    sections.push(`## Search Results\n\n${entries.join('\n\n')}`);
  }

  return sections.length > 0 ? sections.join('\n\n') : `No results found for: ${query}`;
}

export function createWebTools(options: WebToolOptions): ToolProvider {
  const { apiKey, maxResults } = options;
  const createSearch = options.createSearch ?? createTavilyAdapter;

  const search = defineTool({
    name: 'web.search',
    description:
      'Search the web for current information. Use this when you need up-to-date information about events, facts, or topics.',
    baseline: true,
    args: z.object({
      query: z.string().min(1).describe('The search query'),
      limit: z
        .number()
        .int()
        .positive()
        .optional()
        .describe('Maximum number of results to return (defaults to the search_max_results setting)'),
    }),
    run: async ({ query, limit }) => {
      const key = apiKey();
      if (!key) {
        throw missingApiKey('Tavily');
      }

      console.log(`[web] search: ${query}`);
      try {
        const response = await createSearch(key).search(query, limit ?? maxResults());
        return formatSearchResponse(query, response);
      } catch (error) {
        if (error instanceof SearchError && error.code === 'invalid_response') {
          throw invalidResponse(error.message);
        }
        throw apiError(error instanceof Error ? error.message : String(error));
      }
    },
  });

  return createToolProvider({
    name: 'web',
    category: SEARCH_CATEGORY,
    tools: [search],
  });
}
