import { z } from "zod";

export const CONFIG = {
  SERVER_NAME: "ddg-search-mcp",
  SERVER_VERSION: "0.1.0",
  USER_AGENT:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ACCEPT_HTML: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  ACCEPT_LANGUAGE: "en-US,en;q=0.5",
  FETCH_TIMEOUT: 10000,
  MAX_REDIRECTS: 5,
  MAX_CONTENT_LENGTH: 50000,
  ENRICH_CONCURRENCY: 5,
  CONTENT_FAILED_SENTINEL: "[Content extraction failed or blocked]",
  SEARCH_DEFAULTS: {
    region: "us-en",
    safesearch: "moderate",
    timelimit: null,
    maxResults: 10,
    backend: "auto",
  },
  TEXT_BACKENDS: ["auto", "html", "lite"],
  PATHS: {
    sse: "/sse",
    messages: "/messages",
    health: "/health",
  },
  SLOW_TOOL_WARNING: 60000, // warn when a single tool call runs this long
} as const;

const envNumber = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const SERVER_CONFIG_SCHEMA = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  FETCH_TIMEOUT_MS: envNumber(CONFIG.FETCH_TIMEOUT),
  ENRICH_CONCURRENCY: envNumber(CONFIG.ENRICH_CONCURRENCY),
  SSE_KEEPALIVE_MS: envNumber(25000),
  SEARCH_TIMEOUT_MS: envNumber(15000),
  MAX_BODY_SIZE: z.string().min(1).default("4mb"),
});

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: "debug" | "info" | "warn" | "error";
  fetchTimeoutMs: number;
  enrichConcurrency: number;
  keepAliveMs: number;
  searchTimeoutMs: number;
  maxBodySize: string;
}

/**
 * Reads runtime settings from the environment. Throws on invalid values so startup fails loudly.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = SERVER_CONFIG_SCHEMA.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid server configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    host: values.HOST,
    logLevel: values.LOG_LEVEL,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    enrichConcurrency: values.ENRICH_CONCURRENCY,
    keepAliveMs: values.SSE_KEEPALIVE_MS,
    searchTimeoutMs: values.SEARCH_TIMEOUT_MS,
    maxBodySize: values.MAX_BODY_SIZE,
  };
}
