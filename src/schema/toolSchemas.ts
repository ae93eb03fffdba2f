/**
 * MCP Tool Schema Definitions
 * Catalog returned by tools/list; defaults mirror the zod schemas in validation/tool-schemas.ts
 */
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { CONFIG } from "../server/config.js";

const { SEARCH_DEFAULTS } = CONFIG;

const QUERY_PROPERTY = {
  type: "string",
  description: "The search query.",
  minLength: 1,
  examples: ["typescript generics", "rust borrow checker explained"],
};

const MAX_RESULTS_PROPERTY = {
  type: "integer",
  description: "Maximum number of results to return.",
  minimum: 1,
  maximum: 100,
  default: SEARCH_DEFAULTS.maxResults,
};

const COMMON_PROPERTIES = {
  query: QUERY_PROPERTY,
  region: {
    type: "string",
    description: "Region code such as us-en, uk-en, de-de or wt-wt (no region).",
    default: SEARCH_DEFAULTS.region,
  },
  safesearch: {
    type: "string",
    enum: ["on", "moderate", "off"],
    description: "Safe search level.",
    default: SEARCH_DEFAULTS.safesearch,
  },
  timelimit: {
    type: ["string", "null"],
    enum: ["d", "w", "m", "y", null],
    description: "Restrict results to the last day (d), week (w), month (m) or year (y).",
    default: SEARCH_DEFAULTS.timelimit,
  },
  max_results: MAX_RESULTS_PROPERTY,
};

const READ_ONLY_SEARCH = { readOnlyHint: true, openWorldHint: true } as const;

export const TOOL_SCHEMAS: Tool[] = [
  {
    name: "search_text",
    description:
      "Search the web with DuckDuckGo. Returns a JSON array of results with title, href and body. Set fetch_full_content to also download every result page and attach its readable main text as full_content; pages that cannot be fetched or extracted get a placeholder instead.",
    inputSchema: {
      type: "object",
      properties: {
        ...COMMON_PROPERTIES,
        backend: {
          type: "string",
          enum: [...CONFIG.TEXT_BACKENDS],
          description:
            "Which DuckDuckGo endpoint to scrape. auto tries html first and falls back to lite.",
          default: SEARCH_DEFAULTS.backend,
        },
        fetch_full_content: {
          type: "boolean",
          description: "Attach the extracted text of each result page as full_content.",
          default: false,
        },
        max_content_length: {
          type: "integer",
          description: "Maximum characters of full_content kept per result.",
          minimum: 1,
          default: CONFIG.MAX_CONTENT_LENGTH,
        },
      },
      required: ["query"],
    },
    annotations: { title: "Web search", ...READ_ONLY_SEARCH },
  },
  {
    name: "search_news",
    description:
      "Search recent news articles. Returns a JSON array with date, title, body, url, image and source.",
    inputSchema: {
      type: "object",
      properties: COMMON_PROPERTIES,
      required: ["query"],
    },
    annotations: { title: "News search", ...READ_ONLY_SEARCH },
  },
  {
    name: "search_images",
    description:
      "Search images. Returns a JSON array with title, image, thumbnail, url, height, width and source.",
    inputSchema: {
      type: "object",
      properties: COMMON_PROPERTIES,
      required: ["query"],
    },
    annotations: { title: "Image search", ...READ_ONLY_SEARCH },
  },
  {
    name: "search_videos",
    description:
      "Search videos. Returns a JSON array with title, content, description, duration, publisher, published, uploader, provider, image and view_count.",
    inputSchema: {
      type: "object",
      properties: COMMON_PROPERTIES,
      required: ["query"],
    },
    annotations: { title: "Video search", ...READ_ONLY_SEARCH },
  },
  {
    name: "search_books",
    description:
      "Search books. Only available when the configured search backend supports book search; otherwise returns an error message.",
    inputSchema: {
      type: "object",
      properties: {
        query: QUERY_PROPERTY,
        max_results: MAX_RESULTS_PROPERTY,
      },
      required: ["query"],
    },
    annotations: { title: "Book search", ...READ_ONLY_SEARCH },
  },
];
