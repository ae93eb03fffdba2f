/**
 * Tool handler and argument type definitions
 */
import type { SafeSearch, TimeLimit } from "./search.js";

// ─── TOOL HANDLER TYPES ───────────────────────────────────────────────
export interface ToolInvocationResult {
  text: string;
  isError: boolean;
}

/** Takes the raw `arguments` of a tools/call request; resolves to the text payload. */
export type ToolHandler = (args: unknown) => Promise<ToolInvocationResult>;

export type SearchToolName =
  | "search_text"
  | "search_news"
  | "search_images"
  | "search_videos"
  | "search_books";

export type ToolHandlersRegistry = Record<SearchToolName, ToolHandler>;

// ─── TOOL ARGUMENT TYPES ──────────────────────────────────────────────
export interface SearchToolArgs {
  query: string;
  region: string;
  safesearch: SafeSearch;
  timelimit: TimeLimit | null;
  max_results: number;
}

export interface SearchTextArgs extends SearchToolArgs {
  backend: string;
  fetch_full_content: boolean;
  max_content_length: number;
}

export interface SearchBooksArgs {
  query: string;
  max_results: number;
}
