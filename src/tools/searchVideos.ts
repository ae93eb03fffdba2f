import type { ISearchBackend, SearchResult, SearchToolArgs } from "../types/index.js";
import { toSearchQuery } from "./query.js";

export default async function searchVideos(
  args: SearchToolArgs,
  backend: ISearchBackend,
): Promise<SearchResult[]> {
  return backend.videos(toSearchQuery(args));
}
