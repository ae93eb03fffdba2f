/**
 * PageFetcher - Downloads a result page and returns its extracted main text
 * Every failure (status, timeout, network, extraction) resolves to null so one bad URL never aborts a batch
 */
import axios from "axios";
import type { FetchOptions, IContentExtractor, IPageFetcher } from "../../types/index.js";
import { describeError } from "../../utils/errors.js";
import { logDebug, logWarn } from "../../utils/logging.js";
import { truncateText } from "../../utils/text.js";
import { CONFIG } from "../config.js";
import { ContentExtractor } from "./ContentExtractor.js";

function isTextualContentType(contentType: string): boolean {
  return (
    contentType === "" ||
    contentType.includes("html") ||
    contentType.includes("xml") ||
    contentType.includes("text/")
  );
}

export class PageFetcher implements IPageFetcher {
  constructor(
    private readonly extractor: IContentExtractor = new ContentExtractor(),
    private readonly defaultTimeoutMs: number = CONFIG.FETCH_TIMEOUT,
  ) {}

  async fetch(url: string, options: FetchOptions = {}): Promise<string | null> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const maxLength = options.maxLength ?? CONFIG.MAX_CONTENT_LENGTH;

    try {
      logDebug(`Fetching page content: ${url}`);
      const response = await axios.get<unknown>(url, {
        timeout: timeoutMs,
        signal: AbortSignal.timeout(timeoutMs),
        maxRedirects: CONFIG.MAX_REDIRECTS,
        responseType: "text",
        headers: {
          "User-Agent": CONFIG.USER_AGENT,
          Accept: CONFIG.ACCEPT_HTML,
          "Accept-Language": CONFIG.ACCEPT_LANGUAGE,
        },
        validateStatus: () => true,
      });

      if (response.status !== 200) {
        logWarn(`HTTP ${response.status} fetching ${url}`);
        return null;
      }

      const contentType = String(response.headers["content-type"] ?? "").toLowerCase();
      if (!isTextualContentType(contentType)) {
        logWarn(`Unsupported content type fetching ${url}: ${contentType}`);
        return null;
      }

      if (typeof response.data !== "string") {
        logWarn(`Response body is not text for ${url}`);
        return null;
      }

      const extracted = this.extractor.extract(response.data, url);
      if (!extracted) {
        logDebug(`No main content extracted from ${url}`);
        return null;
      }

      return truncateText(extracted, maxLength);
    } catch (error) {
      logWarn(`Failed to fetch ${url}: ${describeError(error)}`);
      return null;
    }
  }
}
