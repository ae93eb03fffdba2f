/**
 * Tool implementation for book search
 * Needs a backend that implements `books`; ToolInvoker also gates it on the "books" capability
 */

import type { ISearchBackend, SearchBooksArgs, SearchResult } from "../types/index.js";

export class UnsupportedSearchKindError extends Error {
  constructor(kind: string, backendName: string) {
    super(`Error: '${kind}' search is not available from the ${backendName} backend.`);
    this.name = "UnsupportedSearchKindError";
  }
}

export default async function searchBooks(
  args: SearchBooksArgs,
  backend: ISearchBackend,
): Promise<SearchResult[]> {
  if (!backend.books) {
    throw new UnsupportedSearchKindError("books", backend.name);
  }
  return backend.books({ query: args.query, maxResults: args.max_results });
}
