import type { ISearchBackend, SearchResult, SearchToolArgs } from "../types/index.js";
import { toSearchQuery } from "./query.js";

export default async function searchImages(
  args: SearchToolArgs,
  backend: ISearchBackend,
): Promise<SearchResult[]> {
  return backend.images(toSearchQuery(args));
}
