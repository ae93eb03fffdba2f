/**
 * Server module and dependency injection type definitions
 */
import type { IEnrichmentPipeline, IPageFetcher, ISearchBackend } from "./search.js";

// ─── SERVER DEPENDENCY INJECTION ──────────────────────────────────────
export interface ServerDependencies {
  searchBackend?: ISearchBackend;
  pageFetcher?: IPageFetcher;
  enrichmentPipeline?: IEnrichmentPipeline;
}
