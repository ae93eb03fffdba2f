/**
 * Tool implementation for news search
 */

import type { ISearchBackend, SearchResult, SearchToolArgs } from "../types/index.js";
import { toSearchQuery } from "./query.js";

export default async function searchNews(
  args: SearchToolArgs,
  backend: ISearchBackend,
): Promise<SearchResult[]> {
  return backend.news(toSearchQuery(args));
}
