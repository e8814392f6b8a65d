import { z } from "zod";
import { LruCache } from "./cache.js";
import { errorMessage, errorName, HttpStatusError, TimeoutError, WikipediaApiError } from "./errors.js";
import { DEFAULT_LANGUAGE, resolveLocale, withVariant, type QueryParams } from "./locales.js";
import { createLogger } from "./logger.js";
import {
  fetchCategories,
  fetchLinks,
  fetchPage,
  findSection,
  type ArticleSection,
} from "./pages.js";

export const SERVER_VERSION = "0.4.0";
export const DEFAULT_USER_AGENT = `wikipedia-mcp/${SERVER_VERSION} (Model Context Protocol server for Wikipedia)`;
export const DEFAULT_TIMEOUT_MS = 15000;

const MAX_QUERY_LENGTH = 300;
const DEFAULT_SEARCH_LIMIT = 10;
const MAX_SEARCH_LIMIT = 500;
const ARTICLE_LINK_LIMIT = 100;
const RELATED_SUMMARY_LENGTH = 200;

const log = createLogger("wikipedia");

export interface WikipediaClientOptions {
  language?: string;
  /** Country code or name; overrides `language` when non-blank. */
  country?: string;
  enableCache?: boolean;
  /** Sent as a bearer token on every request. */
  accessToken?: string;
  timeoutMs?: number;
  userAgent?: string;
}

export interface SearchResult {
  title: string;
  snippet: string;
  pageid: number;
  wordcount: number;
  timestamp: string;
}

export interface SectionInfo {
  title: string;
  level: number;
  text: string;
  sections: SectionInfo[];
}

export type ArticleResult =
  | {
      title: string;
      pageid: number;
      summary: string;
      text: string;
      url: string;
      sections: SectionInfo[];
      categories: string[];
      links: string[];
      exists: true;
    }
  | { title: string; exists: false; error: string };

export type RelatedTopic =
  | { title: string; summary: string; url: string; type: "link" }
  | { title: string; type: "category" };

export type SummaryLookup =
  | { status: "found"; summary: string }
  | { status: "missing" | "error"; message: string };

export interface Coordinate {
  latitude: number;
  longitude: number;
  primary: boolean;
  globe: string;
  type: string;
  name: string;
  region: string;
  country: string;
}

export type CoordinatesResult =
  | { title: string; pageid: number; coordinates: Coordinate[]; exists: true; error: null }
  | { title: string; pageid: number; coordinates: null; exists: true; error: null; message: string }
  | { title: string; coordinates: null; exists: false; error: string };

export type ConnectivityResult =
  | {
      status: "success";
      url: string;
      language: string;
      site_name: string;
      server: string;
      response_time_ms: number;
    }
  | { status: "failed"; url: string; language: string; error: string; error_type: string };

const ApiErrorBody = z.object({
  error: z.object({
    code: z.string().default("unknown"),
    info: z.string().default("No details"),
  }),
});

const SearchResponse = z.object({
  warnings: z.record(z.unknown()).optional(),
  query: z
    .object({
      search: z
        .array(
          z.object({
            title: z.string().optional(),
            snippet: z.string().optional(),
            pageid: z.number().optional(),
            wordcount: z.number().optional(),
            timestamp: z.string().optional(),
          })
        )
        .default([]),
    })
    .optional(),
});

const CoordinatesResponse = z.object({
  query: z
    .object({
      pages: z
        .array(
          z.object({
            title: z.string().optional(),
            pageid: z.number().optional(),
            missing: z.boolean().optional(),
            invalid: z.boolean().optional(),
            coordinates: z
              .array(
                z.object({
                  lat: z.number(),
                  lon: z.number(),
                  primary: z.boolean().optional(),
                  globe: z.string().optional(),
                  type: z.string().optional(),
                  name: z.string().optional(),
                  region: z.string().optional(),
                  country: z.string().optional(),
                })
              )
              .optional(),
          })
        )
        .default([]),
    })
    .optional(),
});

const SiteInfoResponse = z.object({
  query: z
    .object({
      general: z.object({ sitename: z.string().optional(), server: z.string().optional() }).default({}),
    })
    .optional(),
});

/** The timer covers the body read as well as the response headers. */
async function fetchWithTimeout<T>(
  input: URL,
  init: RequestInit,
  timeoutMs: number,
  read: (res: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timedOut = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener("abort", () => reject(new TimeoutError(timeoutMs)), { once: true });
  });
  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await Promise.race([fetch(input, { ...init, signal: controller.signal }).then(read), timedOut]);
  } finally {
    clearTimeout(t);
  }
}

function describeSections(sections: ArticleSection[], level = 0): SectionInfo[] {
  return sections.map((section) => ({
    title: section.title,
    level,
    text: section.text,
    sections: describeSections(section.children, level + 1),
  }));
}

function notFound(title: string): string {
  return `No Wikipedia article found for '${title}'.`;
}

interface ClientCaches {
  search: LruCache<SearchResult[]>;
  article: LruCache<ArticleResult>;
  summary: LruCache<SummaryLookup>;
  sections: LruCache<SectionInfo[]>;
  links: LruCache<string[]>;
  relatedTopics: LruCache<RelatedTopic[]>;
  summaryForQuery: LruCache<string>;
  sectionSummary: LruCache<string>;
  facts: LruCache<string[]>;
  coordinates: LruCache<CoordinatesResult>;
}

/**
 * One Wikipedia project in one script variant. The locale is resolved in the
 * constructor and never changes; every request carries the variant when there
 * is one. Content methods never throw: failures come back in the result.
 */
export class WikipediaClient {
  readonly baseLanguage: string;
  readonly variant: string | null;
  /** Language tag before variant splitting, e.g. "zh-tw" for country TW. */
  readonly resolvedLanguage: string;
  readonly inputType: "country" | "language";
  readonly originalInput: string;
  readonly cacheEnabled: boolean;
  readonly apiUrl: string;

  readonly #accessToken: string | undefined;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly caches: ClientCaches | undefined;

  constructor(options: WikipediaClientOptions = {}) {
    const country = options.country?.trim() ? options.country : undefined;
    const language = options.language ?? DEFAULT_LANGUAGE;
    const locale = resolveLocale({ country, language });

    this.baseLanguage = locale.baseLanguage;
    this.variant = locale.variant;
    this.resolvedLanguage = locale.variant ?? locale.baseLanguage;
    this.inputType = country !== undefined ? "country" : "language";
    this.originalInput = country ?? language;
    this.cacheEnabled = options.enableCache ?? false;
    this.apiUrl = `https://${this.baseLanguage}.wikipedia.org/w/api.php`;
    this.#accessToken = options.accessToken || undefined;
    this.userAgent = options.userAgent || DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.caches = this.cacheEnabled
      ? {
          search: new LruCache(),
          article: new LruCache(),
          summary: new LruCache(),
          sections: new LruCache(),
          links: new LruCache(),
          relatedTopics: new LruCache(),
          summaryForQuery: new LruCache(),
          sectionSummary: new LruCache(),
          facts: new LruCache(),
          coordinates: new LruCache(),
        }
      : undefined;

    log.debug(
      `Client ready: ${this.inputType}=${this.originalInput} -> language=${this.baseLanguage} variant=${this.variant ?? "none"}`
    );
  }

  get hasAccessToken(): boolean {
    return this.#accessToken !== undefined;
  }

  toString(): string {
    return (
      `WikipediaClient(language=${this.baseLanguage}, variant=${this.variant ?? "none"}, ` +
      `cache=${this.cacheEnabled ? "on" : "off"}, authenticated=${this.hasAccessToken})`
    );
  }

  toJSON() {
    return {
      baseLanguage: this.baseLanguage,
      variant: this.variant,
      inputType: this.inputType,
      originalInput: this.originalInput,
      cacheEnabled: this.cacheEnabled,
      authenticated: this.hasAccessToken,
    };
  }

  private requestHeaders(): Record<string, string> {
    const headers: Record<string, string> = { "User-Agent": this.userAgent };
    if (this.#accessToken) headers.Authorization = `Bearer ${this.#accessToken}`;
    return headers;
  }

  private readonly request = async (params: QueryParams): Promise<unknown> => {
    const url = new URL(this.apiUrl);
    const query = withVariant({ ...params, format: "json", formatversion: 2 }, this.variant);
    for (const [key, value] of Object.entries(query)) url.searchParams.set(key, String(value));
    log.debug(`GET ${url.toString()}`);

    const body = await fetchWithTimeout(url, { headers: this.requestHeaders() }, this.timeoutMs, async (res) => {
      if (!res.ok) throw new HttpStatusError(res.status, url.toString());
      const json: unknown = await res.json();
      return json;
    });
    const apiError = ApiErrorBody.safeParse(body);
    if (apiError.success) throw new WikipediaApiError(apiError.data.error.code, apiError.data.error.info);
    return body;
  };

  private async cached<T>(cache: LruCache<T> | undefined, args: unknown[], load: () => Promise<T>): Promise<T> {
    if (!cache) return load();
    const key = JSON.stringify(args);
    // Callers own what they get back; the stored copy never leaves the cache.
    const hit = cache.get(key);
    if (hit) return structuredClone(hit.value);
    const value = await load();
    cache.set(key, structuredClone(value));
    return value;
  }

  async testConnectivity(): Promise<ConnectivityResult> {
    const url = this.apiUrl;
    const language = this.baseLanguage;
    try {
      log.info(`Testing connectivity to ${url}`);
      const started = performance.now();
      const data = SiteInfoResponse.parse(
        await this.request({ action: "query", meta: "siteinfo", siprop: "general" })
      );
      const elapsed = performance.now() - started;
      const general = data.query?.general ?? {};
      return {
        status: "success",
        url,
        language,
        site_name: general.sitename ?? "Unknown",
        server: general.server ?? "Unknown",
        response_time_ms: elapsed,
      };
    } catch (err) {
      log.error(`Connectivity test failed: ${errorMessage(err)}`);
      return { status: "failed", url, language, error: errorMessage(err), error_type: errorName(err) };
    }
  }

  search(query: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<SearchResult[]> {
    return this.cached(this.caches?.search, [query, limit], () => this.runSearch(query, limit));
  }

  private async runSearch(query: string, limit: number): Promise<SearchResult[]> {
    if (!query || !query.trim()) {
      log.warn("Empty search query provided");
      return [];
    }

    let q = query.trim();
    if (q.length > MAX_QUERY_LENGTH) {
      log.warn(`Search query too long (${q.length} chars), truncating to ${MAX_QUERY_LENGTH}`);
      q = q.slice(0, MAX_QUERY_LENGTH);
    }

    let srlimit = Math.floor(limit);
    if (!(srlimit > 0)) {
      log.warn(`Invalid limit ${limit} provided, using default ${DEFAULT_SEARCH_LIMIT}`);
      srlimit = DEFAULT_SEARCH_LIMIT;
    } else if (srlimit > MAX_SEARCH_LIMIT) {
      log.warn(`Limit ${limit} exceeds maximum, capping at ${MAX_SEARCH_LIMIT}`);
      srlimit = MAX_SEARCH_LIMIT;
    }

    try {
      const data = SearchResponse.parse(
        await this.request({ action: "query", list: "search", utf8: 1, srsearch: q, srlimit })
      );
      for (const [kind, body] of Object.entries(data.warnings ?? {})) {
        log.warn(`Wikipedia API warning (${kind}): ${JSON.stringify(body)}`);
      }

      const hits = data.query?.search ?? [];
      log.info(`Search for '${q}' returned ${hits.length} results`);
      const results: SearchResult[] = [];
      for (const hit of hits) {
        if (!hit.title) {
          log.warn(`Search result missing title: ${JSON.stringify(hit)}`);
          continue;
        }
        results.push({
          title: hit.title,
          snippet: hit.snippet ?? "",
          pageid: hit.pageid ?? 0,
          wordcount: hit.wordcount ?? 0,
          timestamp: hit.timestamp ?? "",
        });
      }
      return results;
    } catch (err) {
      log.error(`Search failed for '${q}' (${errorName(err)}): ${errorMessage(err)}`);
      return [];
    }
  }

  getArticle(title: string): Promise<ArticleResult> {
    return this.cached(this.caches?.article, [title], async () => {
      try {
        const lookup = await fetchPage(this.request, title);
        if (!lookup.exists) return { title, exists: false, error: "Page does not exist" };

        const { page } = lookup;
        const links = await fetchLinks(this.request, page.title);
        const categories = await fetchCategories(this.request, page.title);
        return {
          title: page.title,
          pageid: page.pageid,
          summary: page.summary,
          text: page.text,
          url: page.fullurl,
          sections: describeSections(page.sections),
          categories,
          links: links.slice(0, ARTICLE_LINK_LIMIT),
          exists: true,
        };
      } catch (err) {
        log.error(`Error getting Wikipedia article '${title}': ${errorMessage(err)}`);
        return { title, exists: false, error: errorMessage(err) };
      }
    });
  }

  async getSummary(title: string): Promise<string> {
    const lookup = await this.lookupSummary(title);
    return lookup.status === "found" ? lookup.summary : lookup.message;
  }

  /** getSummary with the outcome kept apart from the text. */
  lookupSummary(title: string): Promise<SummaryLookup> {
    return this.cached(this.caches?.summary, [title], async (): Promise<SummaryLookup> => {
      try {
        const lookup = await fetchPage(this.request, title, { intro: true });
        return lookup.exists
          ? { status: "found", summary: lookup.page.summary }
          : { status: "missing", message: notFound(title) };
      } catch (err) {
        log.error(`Error getting Wikipedia summary for '${title}': ${errorMessage(err)}`);
        return { status: "error", message: `Error retrieving summary for '${title}': ${errorMessage(err)}` };
      }
    });
  }

  getSections(title: string): Promise<SectionInfo[]> {
    return this.cached(this.caches?.sections, [title], async () => {
      try {
        const lookup = await fetchPage(this.request, title);
        return lookup.exists ? describeSections(lookup.page.sections) : [];
      } catch (err) {
        log.error(`Error getting Wikipedia sections for '${title}': ${errorMessage(err)}`);
        return [];
      }
    });
  }

  getLinks(title: string): Promise<string[]> {
    return this.cached(this.caches?.links, [title], async () => {
      try {
        const lookup = await fetchPage(this.request, title, { intro: true });
        return lookup.exists ? await fetchLinks(this.request, lookup.page.title) : [];
      } catch (err) {
        log.error(`Error getting Wikipedia links for '${title}': ${errorMessage(err)}`);
        return [];
      }
    });
  }

  /** Linked pages first (fetched one by one), then categories for the slots left. */
  getRelatedTopics(title: string, limit = 10): Promise<RelatedTopic[]> {
    return this.cached(this.caches?.relatedTopics, [title, limit], async () => {
      try {
        const lookup = await fetchPage(this.request, title, { intro: true });
        if (!lookup.exists) return [];

        const links = await fetchLinks(this.request, lookup.page.title);
        const related: RelatedTopic[] = [];
        for (const link of links.slice(0, Math.max(0, limit))) {
          const linked = await fetchPage(this.request, link, { intro: true });
          if (linked.exists) {
            const { summary } = linked.page;
            related.push({
              title: link,
              summary:
                summary.length > RELATED_SUMMARY_LENGTH ? `${summary.slice(0, RELATED_SUMMARY_LENGTH)}...` : summary,
              url: linked.page.fullurl,
              type: "link",
            });
          }
          if (related.length >= limit) break;
        }

        const remaining = limit - related.length;
        if (remaining > 0) {
          const categories = await fetchCategories(this.request, lookup.page.title);
          for (const category of categories.slice(0, remaining)) {
            related.push({ title: category.replace("Category:", ""), type: "category" });
          }
        }
        return related;
      } catch (err) {
        log.error(`Error getting related topics for '${title}': ${errorMessage(err)}`);
        return [];
      }
    });
  }

  /** A window of the article text centred on the first occurrence of `query`. */
  summarizeForQuery(title: string, query: string, maxLength = 250): Promise<string> {
    return this.cached(this.caches?.summaryForQuery, [title, query, maxLength], async () => {
      try {
        const lookup = await fetchPage(this.request, title);
        if (!lookup.exists) return notFound(title);

        const { text, summary } = lookup.page;
        const start = text.toLowerCase().indexOf(query.toLowerCase());
        if (start === -1) {
          const head = summary.slice(0, maxLength) || text.slice(0, maxLength);
          return head.length >= maxLength ? `${head}...` : head;
        }

        const half = Math.floor(maxLength / 2);
        const from = Math.max(0, start - half);
        const to = Math.min(text.length, start + query.length + half);
        let snippet = text.slice(from, to);
        if (snippet.length > maxLength) snippet = snippet.slice(0, maxLength);
        return snippet.length >= maxLength || to < text.length ? `${snippet}...` : snippet;
      } catch (err) {
        log.error(`Error generating query-focused summary for '${title}': ${errorMessage(err)}`);
        return `Error generating query-focused summary for '${title}': ${errorMessage(err)}`;
      }
    });
  }

  summarizeSection(title: string, sectionTitle: string, maxLength = 150): Promise<string> {
    return this.cached(this.caches?.sectionSummary, [title, sectionTitle, maxLength], async () => {
      try {
        const lookup = await fetchPage(this.request, title);
        if (!lookup.exists) return notFound(title);

        const section = findSection(lookup.page.sections, sectionTitle);
        if (!section || !section.text) {
          return `Section '${sectionTitle}' not found or is empty in article '${title}'.`;
        }
        const head = section.text.slice(0, maxLength);
        return section.text.length > maxLength ? `${head}...` : head;
      } catch (err) {
        log.error(`Error summarizing section '${sectionTitle}' for article '${title}': ${errorMessage(err)}`);
        return `Error summarizing section '${sectionTitle}': ${errorMessage(err)}`;
      }
    });
  }

  /** Leading period-delimited sentences of a section, or of the summary when no section matches. */
  extractFacts(title: string, topicWithinArticle?: string, count = 5): Promise<string[]> {
    return this.cached(this.caches?.facts, [title, topicWithinArticle ?? null, count], async () => {
      try {
        const lookup = await fetchPage(this.request, title);
        if (!lookup.exists) return [notFound(title)];

        const { page } = lookup;
        const sectionText = topicWithinArticle ? findSection(page.sections, topicWithinArticle)?.text : undefined;
        const source = sectionText || page.summary;
        if (!source) return ["No content found to extract facts from."];

        const facts = source
          .split(".")
          .map((s) => s.trim())
          .filter((s) => s.length > 0)
          .slice(0, count)
          .map((s) => `${s}.`);
        return facts.length > 0 ? facts : ["Could not extract facts from the provided text."];
      } catch (err) {
        log.error(`Error extracting key facts for '${title}': ${errorMessage(err)}`);
        return [`Error extracting key facts for '${title}': ${errorMessage(err)}`];
      }
    });
  }

  getCoordinates(title: string): Promise<CoordinatesResult> {
    return this.cached(this.caches?.coordinates, [title], async () => {
      try {
        const data = CoordinatesResponse.parse(
          await this.request({
            action: "query",
            prop: "coordinates",
            coprimary: "all",
            coprop: "type|name|dim|country|region|globe",
            titles: title,
          })
        );
        const page = data.query?.pages[0];
        if (!page) return { title, coordinates: null, exists: false, error: "No page found" };
        if (page.missing || page.invalid || page.pageid === undefined) {
          return { title, coordinates: null, exists: false, error: "Page does not exist" };
        }

        const found = page.title ?? title;
        if (!page.coordinates || page.coordinates.length === 0) {
          return {
            title: found,
            pageid: page.pageid,
            coordinates: null,
            exists: true,
            error: null,
            message: "No coordinates available for this article",
          };
        }
        return {
          title: found,
          pageid: page.pageid,
          coordinates: page.coordinates.map((c) => ({
            latitude: c.lat,
            longitude: c.lon,
            primary: c.primary ?? false,
            globe: c.globe ?? "earth",
            type: c.type ?? "",
            name: c.name ?? "",
            region: c.region ?? "",
            country: c.country ?? "",
          })),
          exists: true,
          error: null,
        };
      } catch (err) {
        log.error(`Error getting coordinates for '${title}': ${errorMessage(err)}`);
        return { title, coordinates: null, exists: false, error: errorMessage(err) };
      }
    });
  }
}
