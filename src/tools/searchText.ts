/**
 * Tool implementation for web text search, with optional full-page enrichment
 */

import type {
  IEnrichmentPipeline,
  ISearchBackend,
  SearchResult,
  SearchTextArgs,
} from "../types/index.js";
import { toSearchQuery } from "./query.js";

/**
 * Runs a text search. When `fetch_full_content` is set, every hit gains a `full_content`
 * field holding its page text (or the extraction-failed sentinel).
 */
export default async function searchText(
  args: SearchTextArgs,
  backend: ISearchBackend,
  enrichment: IEnrichmentPipeline,
  enrichConcurrency: number,
): Promise<SearchResult[]> {
  const results = await backend.text(toSearchQuery(args, args.backend));

  if (!args.fetch_full_content || results.length === 0) {
    return results;
  }

  return enrichment.enrich(results, {
    concurrencyLimit: enrichConcurrency,
    maxLength: args.max_content_length,
  });
}
