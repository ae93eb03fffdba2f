/**
 * Tests for ContentExtractor module
 * Runs the real jsdom + Readability stack against synthetic pages
 */
import { describe, expect, it, vi } from "vitest";

vi.mock("../../../utils/logging.js", () => ({
  logDebug: vi.fn(),
  logInfo: vi.fn(),
  logWarn: vi.fn(),
  logError: vi.fn(),
}));

import { ContentExtractor, articleHtmlToText } from "../ContentExtractor.js";

const PARAGRAPHS = [
  "Tidal flats along the estuary shift with every storm season, and the survey team maps them twice a year. ".repeat(4).trim(),
  "Sediment cores taken near the old ferry landing show alternating bands of silt and shell fragments. ".repeat(4).trim(),
  "Volunteers recorded wading birds at dawn, counting each flock before the incoming tide pushed them inland. ".repeat(4).trim(),
];

function articlePage(extraArticleHtml = ""): string {
  return `<!DOCTYPE html>
<html>
  <head><title>Estuary field notes</title><script>window.tracker = true;</script></head>
  <body>
    <nav><a href="/">Home</a> <a href="/about">About us</a> <a href="/shop">Shop</a></nav>
    <article class="story">
      <h1>Estuary field notes</h1>
      ${PARAGRAPHS.map((text) => `<p>${text}</p>`).join("\n      ")}
      ${extraArticleHtml}
    </article>
    <div id="comments">
      <p>${"First! Great post, please check out my channel for more estuary videos. ".repeat(4)}</p>
    </div>
    <footer><p>Copyright notice and newsletter signup</p></footer>
  </body>
</html>`;
}

describe("ContentExtractor", () => {
  const extractor = new ContentExtractor();

  describe("extract", () => {
    it("should return the article paragraphs as blank-line separated blocks", () => {
      const text = extractor.extract(articlePage(), "https://example.com/notes");

      expect(text).not.toBeNull();
      const blocks = text?.split("\n\n") ?? [];
      for (const paragraph of PARAGRAPHS) {
        expect(blocks).toContain(paragraph);
      }
    });

    it("should drop navigation, comment sections, footers and scripts", () => {
      const text = extractor.extract(articlePage(), "https://example.com/notes") ?? "";

      expect(text).not.toContain("About us");
      expect(text).not.toContain("check out my channel");
      expect(text).not.toContain("newsletter signup");
      expect(text).not.toContain("window.tracker");
    });

    it("should keep articles whose containers carry comment-related classes", () => {
      const html = (bodyClass: string, articleClass: string, wrapperClass: string) => `<html>
  <body class="${bodyClass}">
    <div class="${wrapperClass}">
      <article class="${articleClass}">
        <h1>Estuary field notes</h1>
        ${PARAGRAPHS.map((text) => `<p>${text}</p>`).join("\n        ")}
      </article>
    </div>
    <div id="comments"><p>Nice write-up, thanks for sharing it with everyone.</p></div>
  </body>
</html>`;

      const pages = [
        html("post-template comments-open", "post", "wrapper"),
        html("post-template", "post has-comments", "wrapper"),
        html("post-template", "post", "comments-enabled"),
      ];

      for (const page of pages) {
        const blocks = extractor.extract(page, "https://example.com/notes")?.split("\n\n") ?? [];
        for (const paragraph of PARAGRAPHS) {
          expect(blocks).toContain(paragraph);
        }
        expect(blocks).not.toContain("Nice write-up, thanks for sharing it with everyone.");
      }
    });

    it("should keep link text but never link targets", () => {
      const text =
        extractor.extract(
          articlePage('<p>Methods follow the <a href="https://example.org/protocol-v2">shared survey protocol</a>.</p>'),
          "https://example.com/notes",
        ) ?? "";

      expect(text.split("\n\n")).toContain("Methods follow the shared survey protocol.");
      expect(text).not.toContain("example.org");
    });

    it("should return null for a login wall", () => {
      const html = `<html><body>
        <form action="/login" method="post">
          <p>Please sign in to continue reading.</p>
          <input type="email" name="email"><input type="password" name="password">
          <button type="submit">Sign in</button>
        </form>
      </body></html>`;

      expect(extractor.extract(html, "https://example.com/members")).toBeNull();
    });

    it("should return null for an empty or stub document", () => {
      expect(extractor.extract("")).toBeNull();
      expect(extractor.extract("<html><body><p>Short stub.</p></body></html>")).toBeNull();
    });

    it("should honour a lower readerability threshold", () => {
      const lenient = new ContentExtractor({ minContentLength: 10, minScore: 1 });
      const html = `<html><body><article><p>${"A compact note about tide tables. ".repeat(3)}</p></article></body></html>`;

      expect(extractor.extract(html)).toBeNull();
      expect(lenient.extract(html)).toBe("A compact note about tide tables. ".repeat(3).trim());
    });
  });

  describe("articleHtmlToText", () => {
    it("should emit one block per leaf element with normalized whitespace", () => {
      const html =
        "<div><h2>Results</h2><p>First   line\n  continues</p><ul><li>Alpha</li><li>Beta</li></ul></div>";

      expect(articleHtmlToText(html)).toBe("Results\n\nFirst line continues\n\nAlpha\n\nBeta");
    });

    it("should use the innermost block when blocks nest", () => {
      expect(articleHtmlToText("<blockquote><p>Quoted words</p></blockquote>")).toBe("Quoted words");
    });

    it("should leave images out and skip empty blocks", () => {
      expect(articleHtmlToText('<p>Caption <img src="chart.png" alt="chart"></p><p>   </p>')).toBe("Caption");
    });

    it("should fall back to the plain text when there are no blocks", () => {
      expect(articleHtmlToText("<span>just   inline\ntext</span>")).toBe("just inline text");
    });
  });
});
