/**
 * DuckDuckGoBackend - Search backend over DuckDuckGo's HTML, lite and JSON endpoints
 * Text search scrapes the HTML/lite result pages; news, images and videos use the vqd-signed JSON APIs
 */
import axios from "axios";
import { JSDOM, VirtualConsole } from "jsdom";
import { z } from "zod";
import type {
  ISearchBackend,
  SafeSearch,
  SearchKind,
  SearchQuery,
  SearchResult,
} from "../../types/index.js";
import { logDebug, logInfo, logWarn } from "../../utils/logging.js";
import { CONFIG } from "../config.js";

export const TEXT_BACKENDS = CONFIG.TEXT_BACKENDS;
export type TextBackend = (typeof TEXT_BACKENDS)[number];

const ENDPOINTS = {
  html: "https://html.duckduckgo.com/html/",
  lite: "https://lite.duckduckgo.com/lite/",
  vqd: "https://duckduckgo.com/",
  news: "https://duckduckgo.com/news.js",
  images: "https://duckduckgo.com/i.js",
  videos: "https://duckduckgo.com/v.js",
} as const;

const SAFESEARCH_PARAM: Record<SafeSearch, string> = { on: "1", moderate: "-1", off: "-2" };
// Image search has no "moderate" tier distinct from "on"
const IMAGE_SAFESEARCH_PARAM: Record<SafeSearch, string> = { on: "1", moderate: "1", off: "-1" };

const JSON_RESPONSE_SCHEMA = z.object({
  results: z.array(z.record(z.unknown())).default([]),
});

const NEWS_ITEM_SCHEMA = z.object({
  date: z.number().optional(),
  title: z.string().default(""),
  excerpt: z.string().default(""),
  url: z.string().default(""),
  image: z.string().nullish(),
  source: z.string().default(""),
});

const IMAGE_ITEM_SCHEMA = z.object({
  title: z.string().default(""),
  image: z.string().default(""),
  thumbnail: z.string().default(""),
  url: z.string().default(""),
  height: z.number().default(0),
  width: z.number().default(0),
  source: z.string().default(""),
});

const VIDEO_ITEM_SCHEMA = z.object({
  title: z.string().default(""),
  content: z.string().default(""),
  description: z.string().default(""),
  duration: z.string().default(""),
  embed_url: z.string().default(""),
  published: z.string().default(""),
  publisher: z.string().default(""),
  uploader: z.string().default(""),
  provider: z.string().default(""),
  images: z.object({ large: z.string().optional(), medium: z.string().optional() }).optional(),
  statistics: z.object({ viewCount: z.number().nullish() }).optional(),
});

export class SearchBackendError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SearchBackendError";
  }
}

/** Unwraps DuckDuckGo's `/l/?uddg=` redirect links. */
export function unwrapRedirectUrl(href: string): string {
  if (href.includes("uddg=")) {
    try {
      const parsed = new URL(href, "https://duckduckgo.com");
      const target = parsed.searchParams.get("uddg");
      if (target) return target;
    } catch {
      return href;
    }
  }
  return href.startsWith("//") ? `https:${href}` : href;
}

function textOf(element: Element | null): string {
  return (element?.textContent ?? "").replace(/\s+/g, " ").trim();
}

function withDocument<T>(html: string, read: (document: Document) => T): T {
  const dom = new JSDOM(html, { virtualConsole: new VirtualConsole() });
  try {
    return read(dom.window.document);
  } finally {
    dom.window.close();
  }
}

/** Parses the result list of html.duckduckgo.com. Sponsored entries are skipped. */
export function parseHtmlResults(html: string): SearchResult[] {
  return withDocument(html, (document) => {
    const results: SearchResult[] = [];

    for (const element of Array.from(document.querySelectorAll(".result"))) {
      if (element.classList.contains("result--ad")) continue;

      const anchor = element.querySelector(".result__a");
      const rawHref = anchor?.getAttribute("href") ?? "";
      const title = textOf(anchor);
      if (!anchor || !rawHref || !title) continue;

      results.push({
        title,
        href: unwrapRedirectUrl(rawHref),
        body: textOf(element.querySelector(".result__snippet")),
      });
    }
    return results;
  });
}

/** Parses the table layout of lite.duckduckgo.com: a link row followed by a snippet row. */
export function parseLiteResults(html: string): SearchResult[] {
  return withDocument(html, (document) => {
    const results: SearchResult[] = [];
    let current: SearchResult | null = null;

    for (const row of Array.from(document.querySelectorAll("tr"))) {
      const anchor = row.querySelector("a.result-link");
      if (anchor) {
        const rawHref = anchor.getAttribute("href") ?? "";
        const title = textOf(anchor);
        current = rawHref && title ? { title, href: unwrapRedirectUrl(rawHref), body: "" } : null;
        if (current) results.push(current);
        continue;
      }

      const snippet = row.querySelector("td.result-snippet");
      if (snippet && current) {
        current["body"] = textOf(snippet);
        current = null;
      }
    }
    return results;
  });
}

/** Pulls the vqd token DuckDuckGo embeds in its landing page. */
export function extractVqd(html: string): string | null {
  const match = /vqd=["']?([\w-]+)["'&]/.exec(html);
  return match?.[1] ?? null;
}

/** Epoch seconds to ISO-8601; null when absent or outside the representable range. */
function toIsoDate(seconds: number | undefined): string | null {
  if (seconds === undefined) return null;
  const date = new Date(seconds * 1000);
  return Number.isFinite(date.getTime()) ? date.toISOString() : null;
}

function dedupeAndCap(results: SearchResult[], maxResults: number, urlField: string): SearchResult[] {
  const seen = new Set<string>();
  const unique: SearchResult[] = [];
  for (const result of results) {
    const key = result[urlField];
    if (typeof key === "string" && key) {
      if (seen.has(key)) continue;
      seen.add(key);
    }
    unique.push(result);
    if (unique.length >= maxResults) break;
  }
  return unique;
}

export class DuckDuckGoBackend implements ISearchBackend {
  readonly name = "duckduckgo";
  readonly capabilities: ReadonlySet<SearchKind> = new Set<SearchKind>([
    "text",
    "news",
    "images",
    "videos",
  ]);

  constructor(private readonly timeoutMs: number = 15000) {}

  async text(query: SearchQuery): Promise<SearchResult[]> {
    const backend = query.backend ?? CONFIG.SEARCH_DEFAULTS.backend;
    if (!this.isTextBackend(backend)) {
      throw new SearchBackendError(
        `Unsupported backend "${backend}" for ${this.name}; expected one of ${TEXT_BACKENDS.join(", ")}`,
      );
    }

    if (backend === "html") return this.htmlSearch(query);
    if (backend === "lite") return this.liteSearch(query);

    try {
      const results = await this.htmlSearch(query);
      if (results.length > 0) return results;
      logInfo("HTML endpoint returned no results, trying lite endpoint");
    } catch (error) {
      logWarn("HTML endpoint failed, trying lite endpoint", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return this.liteSearch(query);
  }

  async news(query: SearchQuery): Promise<SearchResult[]> {
    const items = await this.jsonSearch(ENDPOINTS.news, query, {
      noamp: "1",
      p: SAFESEARCH_PARAM[query.safesearch],
      df: query.timelimit ?? "",
    });

    const results = items.flatMap((raw): SearchResult[] => {
      const parsed = NEWS_ITEM_SCHEMA.safeParse(raw);
      if (!parsed.success) return [];
      const item = parsed.data;
      return [
        {
          date: toIsoDate(item.date),
          title: item.title,
          body: item.excerpt,
          url: item.url,
          image: item.image ?? null,
          source: item.source,
        },
      ];
    });
    return dedupeAndCap(results, query.maxResults, "url");
  }

  async images(query: SearchQuery): Promise<SearchResult[]> {
    const items = await this.jsonSearch(ENDPOINTS.images, query, {
      p: IMAGE_SAFESEARCH_PARAM[query.safesearch],
      f: `time:${query.timelimit ?? ""},size:,color:,type:,layout:,license:`,
    });

    const results = items.flatMap((raw): SearchResult[] => {
      const parsed = IMAGE_ITEM_SCHEMA.safeParse(raw);
      return parsed.success ? [{ ...parsed.data }] : [];
    });
    return dedupeAndCap(results, query.maxResults, "image");
  }

  async videos(query: SearchQuery): Promise<SearchResult[]> {
    const items = await this.jsonSearch(ENDPOINTS.videos, query, {
      p: SAFESEARCH_PARAM[query.safesearch],
      f: `publishedAfter:${query.timelimit ?? ""},videoDuration:,videoLicense:`,
    });

    const results = items.flatMap((raw): SearchResult[] => {
      const parsed = VIDEO_ITEM_SCHEMA.safeParse(raw);
      if (!parsed.success) return [];
      const { images, statistics, ...fields } = parsed.data;
      return [
        {
          ...fields,
          image: images?.large ?? images?.medium ?? null,
          view_count: statistics?.viewCount ?? null,
        },
      ];
    });
    return dedupeAndCap(results, query.maxResults, "content");
  }

  private isTextBackend(value: string): value is TextBackend {
    return TEXT_BACKENDS.some((backend) => backend === value);
  }

  private async htmlSearch(query: SearchQuery): Promise<SearchResult[]> {
    const html = await this.postForm(ENDPOINTS.html, query);
    return dedupeAndCap(parseHtmlResults(html), query.maxResults, "href");
  }

  private async liteSearch(query: SearchQuery): Promise<SearchResult[]> {
    const html = await this.postForm(ENDPOINTS.lite, query);
    return dedupeAndCap(parseLiteResults(html), query.maxResults, "href");
  }

  private async postForm(endpoint: string, query: SearchQuery): Promise<string> {
    const form = new URLSearchParams({
      q: query.query,
      b: "",
      kl: query.region,
      kp: SAFESEARCH_PARAM[query.safesearch],
      df: query.timelimit ?? "",
    });

    logDebug(`POST ${endpoint}`, { query: query.query });
    const response = await axios.post<unknown>(endpoint, form.toString(), {
      timeout: this.timeoutMs,
      responseType: "text",
      headers: {
        "User-Agent": CONFIG.USER_AGENT,
        "Content-Type": "application/x-www-form-urlencoded",
        Referer: "https://duckduckgo.com/",
      },
      validateStatus: () => true,
    });

    this.assertOk(response.status, endpoint);
    if (typeof response.data !== "string") {
      throw new SearchBackendError(`Unexpected response body from ${endpoint}`);
    }
    return response.data;
  }

  private async fetchVqd(query: string): Promise<string> {
    const response = await axios.get<unknown>(ENDPOINTS.vqd, {
      params: { q: query },
      timeout: this.timeoutMs,
      responseType: "text",
      headers: { "User-Agent": CONFIG.USER_AGENT },
      validateStatus: () => true,
    });

    this.assertOk(response.status, ENDPOINTS.vqd);
    const vqd = typeof response.data === "string" ? extractVqd(response.data) : null;
    if (!vqd) {
      throw new SearchBackendError(`Could not obtain a vqd token for "${query}"`);
    }
    return vqd;
  }

  private async jsonSearch(
    endpoint: string,
    query: SearchQuery,
    extraParams: Record<string, string>,
  ): Promise<Record<string, unknown>[]> {
    const vqd = await this.fetchVqd(query.query);
    const response = await axios.get<unknown>(endpoint, {
      params: { l: query.region, o: "json", q: query.query, vqd, ...extraParams },
      timeout: this.timeoutMs,
      headers: { "User-Agent": CONFIG.USER_AGENT, Referer: "https://duckduckgo.com/" },
      validateStatus: () => true,
    });

    this.assertOk(response.status, endpoint);
    const parsed = JSON_RESPONSE_SCHEMA.safeParse(response.data);
    if (!parsed.success) {
      throw new SearchBackendError(`Unexpected response shape from ${endpoint}`);
    }
    return parsed.data.results;
  }

  private assertOk(status: number, endpoint: string): void {
    if (status === 202) {
      throw new SearchBackendError(`DuckDuckGo rate limit reached (HTTP 202 from ${endpoint})`);
    }
    if (status !== 200) {
      throw new SearchBackendError(`DuckDuckGo returned HTTP ${status} from ${endpoint}`);
    }
  }
}
