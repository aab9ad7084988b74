/**
 * HTML helpers for the web tools.
 */

/**
 * Strip HTML tags and decode common entities.
 */
export function stripTags(text: string): string {
  return text
    .replace(/<script[\s\S]*?<\/script>/gi, "")
    .replace(/<style[\s\S]*?<\/style>/gi, "")
    .replace(/<[^>]+>/g, "")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&nbsp;/g, " ")
    .replace(/&amp;/g, "&")
    .trim();
}

/**
 * Collapse runs of spaces and blank lines.
 */
export function normalize(text: string): string {
  return text
    .replace(/[ \t]+/g, " ")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Check that a URL is http(s) with a host. Returns an error message, or null.
 */
export function validateUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return `Invalid URL: ${url}`;
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return `Only http/https allowed, got '${parsed.protocol}'`;
  }
  if (!parsed.hostname) {
    return "Missing domain";
  }
  return null;
}

/**
 * Convert an HTML fragment to markdown: links, headings, list items and
 * block breaks.
 */
export function toMarkdown(html: string): string {
  let text = html.replace(
    /<a\s+[^>]*href=["']([^"']+)["'][^>]*>([\s\S]*?)<\/a>/gi,
    (_, href: string, content: string) => `[${stripTags(content)}](${href})`,
  );
  text = text.replace(
    /<h([1-6])[^>]*>([\s\S]*?)<\/h\1>/gi,
    (_, level: string, content: string) => `\n${"#".repeat(Number(level))} ${stripTags(content)}\n`,
  );
  text = text.replace(/<li[^>]*>([\s\S]*?)<\/li>/gi, (_, content: string) => `\n- ${stripTags(content)}`);
  text = text.replace(/<\/(p|div|section|article)>/gi, "\n\n");
  text = text.replace(/<(br|hr)\s*\/?>/gi, "\n");
  return normalize(stripTags(text));
}
