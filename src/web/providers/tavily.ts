// pattern: Imperative Shell

import { z } from "zod";
import { SearchError } from "../types.ts";
import type { SearchProvider, SearchResponse } from "../types.ts";

const TavilyResponseSchema = z.object({
  answer: z.string().nullish(),
  results: z
    .array(
      z.object({
        title: z.string(),
        url: z.string(),
        content: z.string(),
        score: z.number().optional(),
      }),
    )
    .default([]),
});

export function createTavilyAdapter(apiKey: string): SearchProvider {
  return {
    name: "tavily",
    async search(query: string, limit: number): Promise<SearchResponse> {
      const response = await fetch("https://api.tavily.com/search", {
        method: "POST",
        headers: {
          "Authorization": `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          query,
          max_results: limit,
          search_depth: "basic",
          include_answer: true,
        }),
        signal: AbortSignal.timeout(30000),
      });

      if (!response.ok) {
        throw new SearchError("api_error", `tavily search failed: ${response.status} ${response.statusText}`);
      }

      let data: unknown;
      try {
        data = await response.json();
      } catch {
        throw new SearchError("invalid_response", "tavily returned invalid JSON");
      }

      const parsed = TavilyResponseSchema.safeParse(data);
      if (!parsed.success) {
        throw new SearchError("invalid_response", "tavily returned an unexpected response shape");
      }

      const results = parsed.data.results.map((r) => ({
        title: r.title,
        url: r.url,
        snippet: r.content,
        ...(r.score !== undefined && { score: r.score }),
      }));

      return {
        results,
        provider: "tavily",
        ...(parsed.data.answer ? { answer: parsed.data.answer } : {}),
      };
    },
  };
}
