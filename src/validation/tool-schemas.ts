/**
 * Zod validation schemas for MCP tool arguments
 * All tool inputs must be validated against these schemas; omitted fields take their defaults here
 */

import { z } from "zod";
import { CONFIG } from "../server/config.js";
import type { SearchBooksArgs, SearchTextArgs, SearchToolArgs } from "../types/index.js";

const { SEARCH_DEFAULTS } = CONFIG;

const query = z.string().trim().min(1, "Query cannot be empty").max(2000, "Query too long");
const maxResults = z.number().int().min(1).max(100).default(SEARCH_DEFAULTS.maxResults);

const SEARCH_FIELDS = {
  query,
  region: z.string().min(1).max(20).default(SEARCH_DEFAULTS.region),
  safesearch: z.enum(["on", "moderate", "off"]).default(SEARCH_DEFAULTS.safesearch),
  timelimit: z.enum(["d", "w", "m", "y"]).nullable().default(SEARCH_DEFAULTS.timelimit),
  max_results: maxResults,
};

export const SEARCH_SCHEMA: z.ZodType<SearchToolArgs, z.ZodTypeDef, unknown> =
  z.object(SEARCH_FIELDS);

export const SEARCH_TEXT_SCHEMA: z.ZodType<SearchTextArgs, z.ZodTypeDef, unknown> = z.object({
  ...SEARCH_FIELDS,
  backend: z.enum(CONFIG.TEXT_BACKENDS).default(SEARCH_DEFAULTS.backend),
  fetch_full_content: z.boolean().default(false),
  max_content_length: z.number().int().positive().default(CONFIG.MAX_CONTENT_LENGTH),
});

export const SEARCH_BOOKS_SCHEMA: z.ZodType<SearchBooksArgs, z.ZodTypeDef, unknown> = z.object({
  query,
  max_results: maxResults,
});

/** Renders zod issues as `path: message` pairs joined by "; ". */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
