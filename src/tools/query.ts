import type { SearchQuery, SearchToolArgs } from "../types/index.js";

/** Maps validated tool arguments onto the backend's query shape. */
export function toSearchQuery(args: SearchToolArgs, backend?: string): SearchQuery {
  return {
    query: args.query,
    region: args.region,
    safesearch: args.safesearch,
    timelimit: args.timelimit,
    maxResults: args.max_results,
    ...(backend === undefined ? {} : { backend }),
  };
}
