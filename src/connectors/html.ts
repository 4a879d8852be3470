import * as cheerio from "cheerio";

const BLOCK_SELECTOR = [
  "p",
  "div",
  "li",
  "ul",
  "ol",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "tr",
  "table",
  "section",
  "article",
  "header",
  "footer",
  "blockquote",
  "pre",
].join(", ");

// Escaped tags and no real ones; a literal "&lt;" inside real HTML is text.
function isEntityEscaped(html: string): boolean {
  return !/<[a-z!/]/i.test(html) && /&lt;[a-z!/]/i.test(html);
}

export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Job description HTML to plain text: one line per block element, entities
 * decoded. Greenhouse sends its HTML entity-escaped (`&lt;p&gt;`), so that is
 * unwrapped first.
 */
export function htmlToText(html: string | null | undefined): string | null {
  if (!html) return null;

  const source = isEntityEscaped(html) ? cheerio.load(html).text() : html;

  const $ = cheerio.load(source);
  $("script, style, noscript").remove();
  $("br").replaceWith("\n");
  $(BLOCK_SELECTOR).each((_, el) => {
    $(el).prepend("\n");
    $(el).append("\n");
  });

  const lines = $.root()
    .text()
    .split("\n")
    .map(cleanText)
    .filter((line) => line.length > 0);

  return lines.length > 0 ? lines.join("\n") : null;
}
