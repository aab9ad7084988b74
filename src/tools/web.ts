/**
 * Web tools: web_search and web_fetch.
 *
 * Search uses Brave Search when an API key is configured and falls back to
 * DuckDuckGo's HTML endpoint. Fetch tries Jina Reader, then a direct
 * request run through Readability.
 */

import { z } from "zod";
import { Tool } from "./base.js";
import type { ToolContext } from "../core/types/tool.js";
import { ExecutionError, ValidationError } from "../core/errors.js";
import { stripTags, toMarkdown, validateUrl } from "../utils/html.js";
import logger from "../utils/logger.js";

const log = logger.child({ component: "web" });

const USER_AGENT = "Mozilla/5.0 (Macintosh; Intel Mac OS X 14_7_2) AppleWebKit/537.36";

interface SearchHit {
  title: string;
  url: string;
  description: string;
}

const BraveResponse = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().optional(),
            url: z.string().optional(),
            description: z.string().optional(),
          }),
        )
        .optional(),
    })
    .optional(),
});

const JinaResponse = z.object({
  data: z
    .object({
      title: z.string().optional(),
      content: z.string().optional(),
      url: z.string().optional(),
    })
    .optional(),
});

function withTimeout(signal: AbortSignal, ms: number): AbortSignal {
  return AbortSignal.any([signal, AbortSignal.timeout(ms)]);
}

/**
 * Format search hits as a numbered list.
 */
export function formatSearchResults(query: string, hits: SearchHit[]): string {
  if (hits.length === 0) {
    return `No results for: ${query}`;
  }
  const lines = [`Results for: ${query}\n`];
  hits.forEach((hit, i) => {
    lines.push(`${i + 1}. ${hit.title}\n   ${hit.url}`);
    if (hit.description) {
      lines.push(`   ${hit.description}`);
    }
  });
  return lines.join("\n");
}

/**
 * Pull result links out of DuckDuckGo's HTML results page.
 */
export function parseDuckDuckGo(html: string, count: number): SearchHit[] {
  const hits: SearchHit[] = [];

  for (const block of html.split('<div class="links_main').slice(1)) {
    if (hits.length >= count) break;

    // Result links are redirects carrying the target in "uddg"
    const urlMatch = block.match(/uddg=([^&"]+)/);
    if (!urlMatch?.[1]) continue;
    const url = decodeURIComponent(urlMatch[1]);
    if (!url.startsWith("http")) continue;

    const titleMatch = block.match(/class="result__a"[^>]*>([^<]+)</);
    const snippetMatch = block.match(/class="result__snippet"[^>]*>([^<]+)/);
    hits.push({
      title: titleMatch?.[1] ? stripTags(titleMatch[1]) : "",
      url,
      description: snippetMatch?.[1] ? stripTags(snippetMatch[1]) : "",
    });
  }

  return hits;
}

/**
 * Search the web using Brave Search API or DuckDuckGo.
 */
export class WebSearchTool extends Tool {
  readonly name = "web_search";
  readonly description = "Search the web. Returns titles, URLs, and snippets.";
  readonly parameters = z.object({
    query: z.string().min(1).describe("Search query"),
    count: z.coerce.number().int().min(1).max(10).optional().describe("Results (1-10)"),
  });

  private apiKey: string;
  private maxResults: number;

  constructor(options?: { apiKey?: string; maxResults?: number }) {
    super();
    this.apiKey = options?.apiKey || "";
    this.maxResults = options?.maxResults || 5;
  }

  async execute(params: { query: string; count?: number }, context: ToolContext): Promise<string> {
    const n = params.count ?? this.maxResults;

    if (this.apiKey) {
      try {
        return formatSearchResults(params.query, await this.searchBrave(params.query, n, context.signal));
      } catch (error) {
        log.warn({ error }, "Brave search failed, falling back to DuckDuckGo");
      }
    }

    return formatSearchResults(params.query, await this.searchDuckDuckGo(params.query, n, context.signal));
  }

  private async searchBrave(query: string, count: number, signal: AbortSignal): Promise<SearchHit[]> {
    const response = await fetch(
      `https://api.search.brave.com/res/v1/web/search?q=${encodeURIComponent(query)}&count=${count}`,
      {
        headers: {
          Accept: "application/json",
          "X-Subscription-Token": this.apiKey,
        },
        signal: withTimeout(signal, 10000),
      },
    );

    if (!response.ok) {
      throw new ExecutionError(`Brave search failed: HTTP ${response.status}`);
    }

    const parsed = BraveResponse.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExecutionError("Brave search returned an unexpected response");
    }
    const data = parsed.data;

    return (data.web?.results || []).map((item) => ({
      title: item.title || "",
      url: item.url || "",
      description: item.description || "",
    }));
  }

  private async searchDuckDuckGo(query: string, count: number, signal: AbortSignal): Promise<SearchHit[]> {
    const response = await fetch(`https://html.duckduckgo.com/html/?q=${encodeURIComponent(query)}`, {
      headers: {
        "User-Agent": USER_AGENT,
        Accept: "text/html",
      },
      signal: withTimeout(signal, 15000),
    });

    if (!response.ok) {
      throw new ExecutionError(`DuckDuckGo search failed: HTTP ${response.status}`);
    }

    return parseDuckDuckGo(await response.text(), count);
  }
}

interface FetchOutcome {
  url: string;
  finalUrl: string;
  status: number;
  extractor: string;
  truncated: boolean;
  length: number;
  text: string;
}

function finish(
  base: Omit<FetchOutcome, "truncated" | "length" | "text">,
  text: string,
  maxChars: number,
): string {
  const truncated = text.length > maxChars;
  const body = truncated ? text.slice(0, maxChars) : text;
  const outcome: FetchOutcome = { ...base, truncated, length: body.length, text: body };
  return JSON.stringify(outcome);
}

/**
 * Fetch and extract content from a URL using Readability.
 */
export class WebFetchTool extends Tool {
  readonly name = "web_fetch";
  readonly description = "Fetch URL and extract readable content (HTML to markdown/text).";
  readonly parameters = z.object({
    url: z.string().min(1).describe("URL to fetch"),
    extractMode: z.enum(["markdown", "text"]).default("markdown"),
    maxChars: z.coerce.number().int().min(100).optional(),
  });

  private defaultMaxChars: number;

  constructor(options?: { maxChars?: number }) {
    super();
    this.defaultMaxChars = options?.maxChars || 50000;
  }

  async execute(
    params: { url: string; extractMode: "markdown" | "text"; maxChars?: number },
    context: ToolContext,
  ): Promise<string> {
    const maxChars = params.maxChars ?? this.defaultMaxChars;

    const invalid = validateUrl(params.url);
    if (invalid) {
      throw new ValidationError(`URL validation failed: ${invalid}`, "url");
    }

    try {
      const result = await this.fetchJina(params.url, maxChars, context.signal);
      if (result) return result;
    } catch (error) {
      if (context.signal.aborted) throw error;
      log.debug({ error, url: params.url }, "Jina Reader failed, fetching directly");
    }

    return this.fetchDirect(params.url, params.extractMode, maxChars, context.signal);
  }

  private async fetchJina(url: string, maxChars: number, signal: AbortSignal): Promise<string | null> {
    const response = await fetch(`https://r.jina.ai/${url}`, {
      headers: {
        Accept: "application/json",
        "X-Return-Format": "json",
      },
      signal: withTimeout(signal, 30000),
    });

    if (!response.ok) {
      return null;
    }

    const parsed = JinaResponse.safeParse(await response.json());
    const page = parsed.success ? parsed.data.data : undefined;
    if (!page?.content) {
      return null;
    }

    const text = page.title ? `# ${page.title}\n\n${page.content}` : page.content;
    return finish(
      { url, finalUrl: page.url || url, status: 200, extractor: "jina" },
      text,
      maxChars,
    );
  }

  private async fetchDirect(
    url: string,
    extractMode: "markdown" | "text",
    maxChars: number,
    signal: AbortSignal,
  ): Promise<string> {
    const response = await fetch(url, {
      headers: { "User-Agent": USER_AGENT },
      redirect: "follow",
      signal: withTimeout(signal, 30000),
    });

    if (!response.ok) {
      throw new ExecutionError(`HTTP ${response.status} fetching ${url}`, "url");
    }

    const contentType = response.headers.get("content-type") || "";
    const body = await response.text();
    const head = body.slice(0, 256).toLowerCase();

    let text: string;
    let extractor: string;

    if (contentType.includes("application/json")) {
      try {
        text = JSON.stringify(JSON.parse(body), null, 2);
        extractor = "json";
      } catch {
        text = body;
        extractor = "raw";
      }
    } else if (contentType.includes("text/html") || head.startsWith("<!doctype") || head.startsWith("<html")) {
      const { Readability } = await import("@mozilla/readability");
      const { parseHTML } = await import("linkedom");

      const { document } = parseHTML(body);
      const article = new Readability(document).parse();

      if (article?.content) {
        text = extractMode === "markdown" ? toMarkdown(article.content) : stripTags(article.content);
        text = article.title ? `# ${article.title}\n\n${text}` : text;
        extractor = "readability";
      } else {
        text = stripTags(body);
        extractor = "fallback";
      }
    } else {
      text = body;
      extractor = "raw";
    }

    return finish({ url, finalUrl: response.url, status: response.status, extractor }, text, maxChars);
  }
}
