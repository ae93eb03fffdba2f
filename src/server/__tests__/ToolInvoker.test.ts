/**
 * Tests for ToolInvoker
 */
import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../utils/logging.js", () => ({
  logDebug: vi.fn(),
  logInfo: vi.fn(),
  logWarn: vi.fn(),
  logError: vi.fn(),
}));

import { FakeSearchBackend } from "../../__tests__/helpers/FakeSearchBackend.js";
import type {
  EnrichOptions,
  IEnrichmentPipeline,
  SearchKind,
  SearchResult,
} from "../../types/index.js";
import { ToolInvoker } from "../ToolInvoker.js";

class RecordingEnrichment implements IEnrichmentPipeline {
  readonly calls: Array<{ results: readonly SearchResult[]; options: EnrichOptions | undefined }> = [];

  async enrich(results: readonly SearchResult[], options?: EnrichOptions): Promise<SearchResult[]> {
    this.calls.push({ results, options });
    return results.map((result) => ({ ...result, full_content: `page text for ${String(result["href"])}` }));
  }
}

const TEXT_RESULTS: SearchResult[] = [
  { title: "Rust", href: "https://rust.test/", body: "A language" },
  { title: "Cargo", href: "https://cargo.test/", body: "A build tool" },
];

describe("ToolInvoker", () => {
  let enrichment: RecordingEnrichment;

  beforeEach(() => {
    vi.clearAllMocks();
    enrichment = new RecordingEnrichment();
  });

  it("should expose the five search tools when the backend can search books", () => {
    const backend = new FakeSearchBackend({}, ["text", "news", "images", "videos", "books"]);
    const invoker = new ToolInvoker(backend, enrichment);

    expect(invoker.toolNames).toEqual([
      "search_text",
      "search_news",
      "search_images",
      "search_videos",
      "search_books",
    ]);
  });

  it("should leave search_books out of the advertised tools without the books capability", () => {
    const invoker = new ToolInvoker(new FakeSearchBackend(), enrichment);

    expect(invoker.toolNames).toEqual(["search_text", "search_news", "search_images", "search_videos"]);
    expect(invoker.isKnownTool("search_books")).toBe(true);
  });

  describe("search_text", () => {
    it("should apply defaults and return pretty-printed JSON", async () => {
      const backend = new FakeSearchBackend({ text: TEXT_RESULTS });
      const invoker = new ToolInvoker(backend, enrichment);

      const result = await invoker.invoke("search_text", { query: "rust" });

      expect(result).toEqual({ text: JSON.stringify(TEXT_RESULTS, null, 2), isError: false });
      expect(backend.queries).toEqual([
        {
          kind: "text",
          query: {
            query: "rust",
            region: "us-en",
            safesearch: "moderate",
            timelimit: null,
            maxResults: 10,
            backend: "auto",
          },
        },
      ]);
      expect(enrichment.calls).toHaveLength(0);
    });

    it("should enrich results with the configured concurrency and requested length", async () => {
      const backend = new FakeSearchBackend({ text: TEXT_RESULTS });
      const invoker = new ToolInvoker(backend, enrichment, { enrichConcurrency: 3 });

      const result = await invoker.invoke("search_text", {
        query: "rust",
        fetch_full_content: true,
        max_content_length: 2000,
        backend: "lite",
      });

      expect(enrichment.calls).toEqual([
        { results: TEXT_RESULTS, options: { concurrencyLimit: 3, maxLength: 2000 } },
      ]);
      expect(JSON.parse(result.text)).toEqual([
        { ...TEXT_RESULTS[0], full_content: "page text for https://rust.test/" },
        { ...TEXT_RESULTS[1], full_content: "page text for https://cargo.test/" },
      ]);
      expect(backend.queries[0]?.query.backend).toBe("lite");
    });

    it("should skip enrichment when there are no results", async () => {
      const invoker = new ToolInvoker(new FakeSearchBackend({ text: [] }), enrichment);

      const result = await invoker.invoke("search_text", { query: "nothing", fetch_full_content: true });

      expect(result).toEqual({ text: "[]", isError: false });
      expect(enrichment.calls).toHaveLength(0);
    });

    it("should keep non-ASCII characters unescaped", async () => {
      const backend = new FakeSearchBackend({ text: [{ title: "Café naïve" }] });
      const invoker = new ToolInvoker(backend, enrichment);

      const result = await invoker.invoke("search_text", { query: "café" });

      expect(result.text).toBe('[\n  {\n    "title": "Café naïve"\n  }\n]');
    });
  });

  describe("other kinds", () => {
    it.each([
      ["search_news", "news"],
      ["search_images", "images"],
      ["search_videos", "videos"],
    ] as const)("should route %s to the backend's %s search", async (tool, kind) => {
      const answers: Partial<Record<SearchKind, SearchResult[]>> = {};
      answers[kind] = [{ title: `${kind} hit` }];
      const backend = new FakeSearchBackend(answers);
      const invoker = new ToolInvoker(backend, enrichment);

      const result = await invoker.invoke(tool, {
        query: "tides",
        region: "uk-en",
        safesearch: "off",
        timelimit: "w",
        max_results: 3,
      });

      expect(result).toEqual({
        text: JSON.stringify([{ title: `${kind} hit` }], null, 2),
        isError: false,
      });
      expect(backend.queries).toEqual([
        {
          kind,
          query: { query: "tides", region: "uk-en", safesearch: "off", timelimit: "w", maxResults: 3 },
        },
      ]);
    });

    it("should never enrich news results", async () => {
      const backend = new FakeSearchBackend({ news: [{ title: "Story", url: "https://news.test/" }] });
      const invoker = new ToolInvoker(backend, enrichment);

      await invoker.invoke("search_news", { query: "tides", fetch_full_content: true });

      expect(enrichment.calls).toHaveLength(0);
    });
  });

  describe("search_books", () => {
    it("should report that the backend cannot search books", async () => {
      const backend = new FakeSearchBackend();
      const invoker = new ToolInvoker(backend, enrichment);

      const result = await invoker.invoke("search_books", { query: "dune" });

      expect(result).toEqual({
        text: "Error: 'books' search is not available from the fake backend.",
        isError: true,
      });
      expect(backend.queries).toHaveLength(0);
    });

    it("should search books when the backend advertises the capability", async () => {
      const backend = new FakeSearchBackend({ books: [{ title: "Dune", author: "Herbert" }] }, [
        "text",
        "books",
      ]);
      const invoker = new ToolInvoker(backend, enrichment);

      const result = await invoker.invoke("search_books", { query: "dune", max_results: 2 });

      expect(result.isError).toBe(false);
      expect(JSON.parse(result.text)).toEqual([{ title: "Dune", author: "Herbert" }]);
      expect(backend.queries[0]?.query).toMatchObject({ query: "dune", maxResults: 2 });
    });
  });

  describe("errors", () => {
    it("should answer an unknown tool with error text", async () => {
      const backend = new FakeSearchBackend();
      const invoker = new ToolInvoker(backend, enrichment);

      expect(await invoker.invoke("search_maps", { query: "x" })).toEqual({
        text: "Unknown tool: search_maps",
        isError: true,
      });
      expect(await invoker.invoke("toString", {})).toEqual({
        text: "Unknown tool: toString",
        isError: true,
      });
      expect(backend.queries).toHaveLength(0);
    });

    it("should turn backend faults into error text", async () => {
      const backend = new FakeSearchBackend({ text: new Error("DuckDuckGo returned HTTP 500 from x") });
      const invoker = new ToolInvoker(backend, enrichment);

      expect(await invoker.invoke("search_text", { query: "rust" })).toEqual({
        text: "Error performing search: DuckDuckGo returned HTTP 500 from x",
        isError: true,
      });
    });

    it("should report invalid arguments without calling the backend", async () => {
      const backend = new FakeSearchBackend();
      const invoker = new ToolInvoker(backend, enrichment);

      expect(await invoker.invoke("search_text", { query: "   " })).toEqual({
        text: "Invalid arguments for search_text: query: Query cannot be empty",
        isError: true,
      });
      expect(await invoker.invoke("search_news", { query: "x", max_results: 0 })).toEqual({
        text: "Invalid arguments for search_news: max_results: Number must be greater than or equal to 1",
        isError: true,
      });
      expect(await invoker.invoke("search_text", { query: "tides", backend: "bing" })).toEqual({
        text: "Invalid arguments for search_text: backend: Invalid enum value. Expected 'auto' | 'html' | 'lite', received 'bing'",
        isError: true,
      });
      expect(await invoker.invoke("search_images", "tides")).toEqual({
        text: "Invalid arguments for search_images: Expected object, received string",
        isError: true,
      });
      expect(backend.queries).toHaveLength(0);
    });

    it("should treat missing arguments as an empty object", async () => {
      const invoker = new ToolInvoker(new FakeSearchBackend(), enrichment);

      expect(await invoker.invoke("search_videos", undefined)).toEqual({
        text: "Invalid arguments for search_videos: query: Required",
        isError: true,
      });
    });
  });
});
