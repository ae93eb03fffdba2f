/**
 * ContentExtractor - Isolates the readable main text of an HTML document
 * Uses Mozilla's Readability on a jsdom document, tuned for precision over recall
 */
import { Readability, isProbablyReaderable } from "@mozilla/readability";
import { JSDOM, VirtualConsole } from "jsdom";
import type { IContentExtractor } from "../../types/index.js";
import { logDebug } from "../../utils/logging.js";

const BOILERPLATE_SELECTOR =
  "script, style, noscript, template, nav, aside, footer, form, iframe, svg";
const COMMENT_SECTION_PATTERN = /(^|[-_\s])(comments?|disqus|respond)([-_\s]|$)/i;
// Structural containers are never treated as comment sections, whatever their class says
const PROTECTED_TAGS = new Set(["HTML", "BODY", "MAIN", "ARTICLE"]);
const BLOCK_SELECTOR =
  "h1, h2, h3, h4, h5, h6, p, li, pre, blockquote, figcaption, dt, dd, td, th";

export interface ContentExtractorOptions {
  /** Minimum text length of a node counted by the readerability check. */
  minContentLength?: number;
  /** Minimum readerability score before extraction is attempted. */
  minScore?: number;
}

function removeBoilerplate(document: Document): void {
  for (const element of Array.from(document.querySelectorAll(BOILERPLATE_SELECTOR))) {
    element.remove();
  }

  const totalParagraphs = document.querySelectorAll("p").length;
  for (const element of Array.from(document.querySelectorAll("[id], [class]"))) {
    const marker = `${element.getAttribute("id") ?? ""} ${element.getAttribute("class") ?? ""}`;
    if (COMMENT_SECTION_PATTERN.test(marker) && !holdsMainContent(element, totalParagraphs)) {
      element.remove();
    }
  }
}

/** True for structural containers and for anything wrapping the article or most of the paragraphs. */
function holdsMainContent(element: Element, totalParagraphs: number): boolean {
  if (PROTECTED_TAGS.has(element.tagName)) return true;
  if (element.querySelector("main, article") !== null) return true;
  return element.querySelectorAll("p").length * 2 > totalParagraphs;
}

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Flattens Readability's article HTML into plain text, one paragraph per leaf block.
 */
export function articleHtmlToText(articleHtml: string): string {
  const fragment = JSDOM.fragment(articleHtml);
  const leafBlocks = Array.from(fragment.querySelectorAll(BLOCK_SELECTOR)).filter(
    (element) => element.querySelector(BLOCK_SELECTOR) === null,
  );

  if (leafBlocks.length === 0) {
    return normalizeWhitespace(fragment.textContent ?? "");
  }

  return leafBlocks
    .map((element) => normalizeWhitespace(element.textContent ?? ""))
    .filter((text) => text.length > 0)
    .join("\n\n");
}

export class ContentExtractor implements IContentExtractor {
  private readonly minContentLength: number;
  private readonly minScore: number;

  constructor(options: ContentExtractorOptions = {}) {
    this.minContentLength = options.minContentLength ?? 140;
    this.minScore = options.minScore ?? 20;
  }

  extract(html: string, url?: string): string | null {
    let dom: JSDOM;
    try {
      // A silent console keeps jsdom's CSS and script warnings out of the server log
      dom = new JSDOM(html, { url, virtualConsole: new VirtualConsole() });
    } catch (error) {
      logDebug("Could not parse document", {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    try {
      const document = dom.window.document;
      removeBoilerplate(document);

      if (
        !isProbablyReaderable(document, {
          minContentLength: this.minContentLength,
          minScore: this.minScore,
        })
      ) {
        logDebug("Document is not readerable, skipping extraction", { url });
        return null;
      }

      const article = new Readability(document).parse();
      if (!article?.content) {
        return null;
      }

      const text = articleHtmlToText(article.content);
      return text.length > 0 ? text : null;
    } catch (error) {
      logDebug("Readability extraction failed", {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    } finally {
      dom.window.close();
    }
  }
}
