/**
 * EnrichmentPipeline - Attaches the full extracted page text to each search result
 *
 * Fetches run behind a p-limit gate created per call, so concurrent enrichments never share
 * a slot budget. Output position i always holds the enriched copy of input position i.
 */
import pLimit from "p-limit";
import type {
  EnrichOptions,
  IEnrichmentPipeline,
  IPageFetcher,
  SearchResult,
} from "../../types/index.js";
import { describeError } from "../../utils/errors.js";
import { logInfo, logWarn } from "../../utils/logging.js";
import { CONFIG } from "../config.js";

export const FULL_CONTENT_FIELD = "full_content";

const URL_FIELDS = ["href", "url"] as const;

/** Returns the first non-empty URL-like field of a result, if any. */
export function resultUrl(result: SearchResult): string | null {
  for (const field of URL_FIELDS) {
    const value = result[field];
    if (typeof value === "string" && value.trim().length > 0) {
      return value;
    }
  }
  return null;
}

function clampConcurrency(limit: number): number {
  return Number.isFinite(limit) ? Math.max(1, Math.floor(limit)) : 1;
}

export class EnrichmentPipeline implements IEnrichmentPipeline {
  constructor(
    private readonly fetcher: IPageFetcher,
    private readonly fetchTimeoutMs: number = CONFIG.FETCH_TIMEOUT,
  ) {}

  async enrich(results: readonly SearchResult[], options: EnrichOptions = {}): Promise<SearchResult[]> {
    const concurrency = clampConcurrency(options.concurrencyLimit ?? CONFIG.ENRICH_CONCURRENCY);
    const maxLength = options.maxLength ?? CONFIG.MAX_CONTENT_LENGTH;
    const limit = pLimit(concurrency);

    logInfo(`Enriching ${results.length} results (concurrency ${concurrency})`);

    const enriched = await Promise.all(
      results.map((result) => limit(() => this.enrichOne({ ...result }, maxLength))),
    );

    const failures = enriched.filter(
      (item) => item[FULL_CONTENT_FIELD] === CONFIG.CONTENT_FAILED_SENTINEL,
    ).length;
    logInfo(`Enrichment complete: ${results.length - failures}/${results.length} pages extracted`);

    return enriched;
  }

  private async enrichOne(result: SearchResult, maxLength: number): Promise<SearchResult> {
    const url = resultUrl(result);
    if (!url) {
      result[FULL_CONTENT_FIELD] = CONFIG.CONTENT_FAILED_SENTINEL;
      return result;
    }

    try {
      const content = await this.fetcher.fetch(url, { timeoutMs: this.fetchTimeoutMs, maxLength });
      result[FULL_CONTENT_FIELD] = content ? content : CONFIG.CONTENT_FAILED_SENTINEL;
    } catch (error) {
      // Fetchers are expected to resolve null; a throwing one still only costs this item
      logWarn(`Enrichment failed for ${url}: ${describeError(error)}`);
      result[FULL_CONTENT_FIELD] = CONFIG.CONTENT_FAILED_SENTINEL;
    }
    return result;
  }
}
