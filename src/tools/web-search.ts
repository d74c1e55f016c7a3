import { tavily } from "@tavily/core";
import { z } from "zod";
import { defineTool } from "./types";

export interface SearchRequestOptions {
  maxResults: number;
  topic: "general" | "news";
  searchDepth: "basic" | "advanced";
}

export interface SearchHit {
  title: string;
  url: string;
  content: string;
}

/** The slice of the Tavily client the search tool needs. */
export interface SearchClient {
  search(query: string, options: SearchRequestOptions): Promise<{ results: SearchHit[] }>;
}

export interface WebSearchToolOptions {
  apiKey?: string;
  client?: SearchClient;
  searchDepth?: "basic" | "advanced";
}

export function formatSearchResults(query: string, hits: readonly SearchHit[]): string {
  if (!hits.length) {
    return `No search results found for: ${query}`;
  }

  const sections = hits.map((hit, index) =>
    [`--- SOURCE ${index + 1}: ${hit.title} ---`, `URL: ${hit.url}`, "", hit.content.trim()].join("\n")
  );
  return [`Search results for: ${query}`, ...sections].join("\n\n");
}

export function createWebSearchTool(options: WebSearchToolOptions) {
  const client = options.client ?? createTavilyClient(options.apiKey);
  const searchDepth = options.searchDepth ?? "basic";

  return defineTool({
    name: "tavily_search",
    description: "Search the web. Write the query as a specific, human-readable question.",
    schema: z.object({
      query: z.string().min(1).describe("A specific search query"),
      max_results: z.number().int().min(1).max(10).default(3).describe("How many results to return"),
      topic: z.enum(["general", "news"]).default("general").describe("Search vertical")
    }),
    async execute({ query, max_results, topic }) {
      const response = await client.search(query, { maxResults: max_results, topic, searchDepth });
      return formatSearchResults(query, response.results);
    }
  });
}

function createTavilyClient(apiKey: string | undefined): SearchClient {
  if (!apiKey) {
    throw new Error("TAVILY_API_KEY is required for the web search tool");
  }
  return tavily({ apiKey });
}
