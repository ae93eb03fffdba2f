/**
 * Main type definitions export file
 * Centralized exports from focused type modules
 */

// ─── SEARCH & ENRICHMENT TYPES ────────────────────────────────────────
export type {
  SearchResultValue,
  SearchResult,
  SearchKind,
  SafeSearch,
  TimeLimit,
  SearchQuery,
  ISearchBackend,
  FetchOptions,
  IPageFetcher,
  IContentExtractor,
  EnrichOptions,
  IEnrichmentPipeline,
} from "./search.js";

// ─── SESSION & TRANSPORT TYPES ────────────────────────────────────────
export type {
  TransportState,
  SessionHandle,
  Session,
  EventStreamResponse,
  PostResult,
} from "./transport.js";

// ─── TOOL TYPES ───────────────────────────────────────────────────────
export type {
  ToolHandler,
  SearchToolName,
  ToolHandlersRegistry,
  ToolInvocationResult,
  SearchToolArgs,
  SearchTextArgs,
  SearchBooksArgs,
} from "./tools.js";

// ─── SERVER TYPES ─────────────────────────────────────────────────────
export type { ServerDependencies } from "./server.js";
