/**
 * ToolInvoker - Dispatches a tool name plus raw arguments to the matching search tool
 *
 * Never throws: unknown tools, invalid arguments and backend faults all come back as
 * error text with `isError` set, so one bad call cannot break the protocol session.
 */
import type { z } from "zod";
import searchBooks, { UnsupportedSearchKindError } from "../tools/searchBooks.js";
import searchImages from "../tools/searchImages.js";
import searchNews from "../tools/searchNews.js";
import searchText from "../tools/searchText.js";
import searchVideos from "../tools/searchVideos.js";
import type {
  IEnrichmentPipeline,
  ISearchBackend,
  SearchResult,
  SearchToolName,
  ToolHandler,
  ToolHandlersRegistry,
  ToolInvocationResult,
} from "../types/index.js";
import { describeError } from "../utils/errors.js";
import { logError, logInfo, logWarn } from "../utils/logging.js";
import {
  SEARCH_BOOKS_SCHEMA,
  SEARCH_SCHEMA,
  SEARCH_TEXT_SCHEMA,
  formatIssues,
} from "../validation/tool-schemas.js";
import { CONFIG } from "./config.js";

export interface ToolInvokerOptions {
  enrichConcurrency?: number;
}

export function formatResults(results: readonly SearchResult[]): string {
  return JSON.stringify(results, null, 2);
}

/**
 * Wraps a tool body with argument validation and error-to-text mapping.
 */
function defineTool<TArgs>(
  name: SearchToolName,
  schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>,
  run: (args: TArgs) => Promise<SearchResult[]>,
): ToolHandler {
  return async (rawArgs) => {
    const parsed = schema.safeParse(rawArgs ?? {});
    if (!parsed.success) {
      const text = `Invalid arguments for ${name}: ${formatIssues(parsed.error)}`;
      logWarn(text);
      return { text, isError: true };
    }

    try {
      const results = await run(parsed.data);
      logInfo(`${name} returned ${results.length} results`);
      return { text: formatResults(results), isError: false };
    } catch (error) {
      if (error instanceof UnsupportedSearchKindError) {
        return { text: error.message, isError: true };
      }
      logError(`Error executing tool ${name}:`, { error: describeError(error) });
      return { text: `Error performing search: ${describeError(error)}`, isError: true };
    }
  };
}

export class ToolInvoker {
  private readonly handlers: ToolHandlersRegistry;
  private readonly booksSupported: boolean;

  constructor(
    private readonly backend: ISearchBackend,
    private readonly enrichment: IEnrichmentPipeline,
    options: ToolInvokerOptions = {},
  ) {
    const enrichConcurrency = options.enrichConcurrency ?? CONFIG.ENRICH_CONCURRENCY;
    // Capabilities are read once; a backend cannot gain or lose a kind mid-session
    this.booksSupported = backend.capabilities.has("books");

    this.handlers = {
      search_text: defineTool("search_text", SEARCH_TEXT_SCHEMA, (args) =>
        searchText(args, this.backend, this.enrichment, enrichConcurrency),
      ),
      search_news: defineTool("search_news", SEARCH_SCHEMA, (args) =>
        searchNews(args, this.backend),
      ),
      search_images: defineTool("search_images", SEARCH_SCHEMA, (args) =>
        searchImages(args, this.backend),
      ),
      search_videos: defineTool("search_videos", SEARCH_SCHEMA, (args) =>
        searchVideos(args, this.backend),
      ),
      search_books: defineTool("search_books", SEARCH_BOOKS_SCHEMA, async (args) => {
        if (!this.booksSupported) {
          throw new UnsupportedSearchKindError("books", this.backend.name);
        }
        return searchBooks(args, this.backend);
      }),
    };
  }

  /**
   * Tools to advertise in tools/list. `search_books` is left out when the backend cannot
   * serve it; a direct call still answers with the capability error.
   */
  get toolNames(): SearchToolName[] {
    return Object.keys(this.handlers).filter(
      (name): name is SearchToolName =>
        this.isKnownTool(name) && (name !== "search_books" || this.booksSupported),
    );
  }

  isKnownTool(name: string): name is SearchToolName {
    return Object.prototype.hasOwnProperty.call(this.handlers, name);
  }

  async invoke(name: string, args: unknown): Promise<ToolInvocationResult> {
    if (!this.isKnownTool(name)) {
      logWarn(`Unknown tool requested: ${name}`);
      return { text: `Unknown tool: ${name}`, isError: true };
    }
    return this.handlers[name](args);
  }
}
