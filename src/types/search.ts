/**
 * Search backend and result type definitions
 */

// ─── SEARCH RESULTS ───────────────────────────────────────────────────
export type SearchResultValue = string | number | boolean | null;

/** One backend hit. Keys vary by search kind; identity is the position in its list. */
export type SearchResult = Record<string, SearchResultValue>;

export type SearchKind = "text" | "news" | "images" | "videos" | "books";

export type SafeSearch = "on" | "moderate" | "off";

export type TimeLimit = "d" | "w" | "m" | "y";

export interface SearchQuery {
  query: string;
  region: string;
  safesearch: SafeSearch;
  timelimit: TimeLimit | null;
  maxResults: number;
  /** Backend selector; only text search honours it. */
  backend?: string;
}

// ─── SEARCH BACKEND INTERFACE ─────────────────────────────────────────
export interface ISearchBackend {
  readonly name: string;
  /** Kinds this backend can serve. Read once when the tool registry is built. */
  readonly capabilities: ReadonlySet<SearchKind>;
  text(query: SearchQuery): Promise<SearchResult[]>;
  news(query: SearchQuery): Promise<SearchResult[]>;
  images(query: SearchQuery): Promise<SearchResult[]>;
  videos(query: SearchQuery): Promise<SearchResult[]>;
  books?(query: Pick<SearchQuery, "query" | "maxResults">): Promise<SearchResult[]>;
}

// ─── ENRICHMENT ───────────────────────────────────────────────────────
export interface FetchOptions {
  timeoutMs?: number;
  maxLength?: number;
}

export interface IPageFetcher {
  fetch(url: string, options?: FetchOptions): Promise<string | null>;
}

export interface IContentExtractor {
  extract(html: string, url?: string): string | null;
}

export interface EnrichOptions {
  concurrencyLimit?: number;
  maxLength?: number;
}

export interface IEnrichmentPipeline {
  enrich(results: readonly SearchResult[], options?: EnrichOptions): Promise<SearchResult[]>;
}
