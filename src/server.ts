import { McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Variables } from "@modelcontextprotocol/sdk/shared/uriTemplate.js";
import { z } from "zod";
import { createLogger } from "./logger.js";
import { SERVER_VERSION, WikipediaClient } from "./wikipedia.js";

const log = createLogger("server");

const asText = (payload: unknown) => ({
  content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }],
});

const asResource = (uri: URL, payload: unknown) => ({
  contents: [{ uri: uri.href, mimeType: "application/json", text: JSON.stringify(payload, null, 2) }],
});

/** Template variables arrive percent-encoded and, for `{a}` style slots, as a single string. */
function variable(vars: Variables, name: string): string {
  const raw = vars[name];
  const value = Array.isArray(raw) ? raw.join(",") : raw ?? "";
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function intVariable(vars: Variables, name: string, def: number): number {
  const n = Number(variable(vars, name));
  return Number.isFinite(n) ? Math.floor(n) : def;
}

async function summaryPayload(client: WikipediaClient, title: string) {
  const lookup = await client.lookupSummary(title);
  switch (lookup.status) {
    case "found":
      return { title, summary: lookup.summary };
    case "missing":
      return { title, summary: lookup.message };
    case "error":
      return { title, summary: null, error: lookup.message };
  }
}

async function searchPayload(client: WikipediaClient, query: string, limit: number) {
  if (!query || !query.trim()) {
    log.warn("Search tool called with empty query");
    return { query, results: [], status: "error", message: "Empty search query provided" };
  }
  const results = await client.search(query, limit);
  return {
    query,
    results,
    status: results.length > 0 ? "success" : "no_results",
    count: results.length,
    language: client.baseLanguage,
    ...(results.length === 0
      ? {
          message:
            "No search results found. This could indicate connectivity issues, API errors, or simply no matching articles.",
        }
      : {}),
  };
}

async function factsPayload(client: WikipediaClient, title: string, topic: string, count: number) {
  const facts = await client.extractFacts(title, topic.trim() ? topic : undefined, count);
  return { title, topic_within_article: topic, facts };
}

/**
 * Registers every Wikipedia tool and resource template against `client`.
 * Several servers (one per SSE session) may share the same client.
 */
export function createServer(client: WikipediaClient): McpServer {
  const server = new McpServer({ name: "wikipedia", version: SERVER_VERSION });
  const lang = client.variant ? `${client.baseLanguage}, variant ${client.variant}` : client.baseLanguage;

  server.registerTool(
    "search_wikipedia",
    {
      title: "Search Wikipedia",
      description: `Search Wikipedia (${lang}) for articles matching a query. limit is clamped to 1-500.`,
      inputSchema: {
        query: z.string().describe("Search terms"),
        limit: z.number().int().default(10).optional(),
      },
    },
    async ({ query, limit = 10 }) => {
      log.info(`Tool: searching Wikipedia for '${query}' (limit=${limit})`);
      return asText(await searchPayload(client, query, limit));
    }
  );

  server.registerTool(
    "test_wikipedia_connectivity",
    {
      title: "Wikipedia connectivity diagnostics",
      description: "Reports the API URL, language, site name and response time, or the failure.",
      inputSchema: {},
    },
    async () => {
      log.info("Tool: testing Wikipedia connectivity");
      const diagnostics = await client.testConnectivity();
      if (diagnostics.status === "success") {
        diagnostics.response_time_ms = Math.round(diagnostics.response_time_ms * 1000) / 1000;
      }
      return asText(diagnostics);
    }
  );

  server.registerTool(
    "get_article",
    {
      title: "Wikipedia: full article",
      description: "Full article: summary, text, nested sections, categories and the first 100 links.",
      inputSchema: { title: z.string() },
    },
    async ({ title }) => {
      log.info(`Tool: getting article '${title}'`);
      return asText(await client.getArticle(title));
    }
  );

  server.registerTool(
    "get_summary",
    {
      title: "Wikipedia: summary",
      description: "Lead section of an article as plain text.",
      inputSchema: { title: z.string() },
    },
    async ({ title }) => {
      log.info(`Tool: getting summary for '${title}'`);
      return asText(await summaryPayload(client, title));
    }
  );

  server.registerTool(
    "summarize_article_for_query",
    {
      title: "Wikipedia: snippet around a query",
      description: "A snippet of the article text centred on the first occurrence of the query.",
      inputSchema: {
        title: z.string(),
        query: z.string(),
        max_length: z.number().int().default(250).optional(),
      },
    },
    async ({ title, query, max_length = 250 }) => {
      log.info(`Tool: query-focused summary for '${title}', query '${query}'`);
      const summary = await client.summarizeForQuery(title, query, max_length);
      return asText({ title, query, summary });
    }
  );

  server.registerTool(
    "summarize_article_section",
    {
      title: "Wikipedia: section snippet",
      description: "The beginning of one named section of an article.",
      inputSchema: {
        title: z.string(),
        section_title: z.string(),
        max_length: z.number().int().default(150).optional(),
      },
    },
    async ({ title, section_title, max_length = 150 }) => {
      log.info(`Tool: summary of section '${section_title}' in '${title}'`);
      const summary = await client.summarizeSection(title, section_title, max_length);
      return asText({ title, section_title, summary });
    }
  );

  server.registerTool(
    "extract_key_facts",
    {
      title: "Wikipedia: key facts",
      description: "Leading sentences of the summary, or of a section when topic_within_article names one.",
      inputSchema: {
        title: z.string(),
        topic_within_article: z.string().default("").optional(),
        count: z.number().int().default(5).optional(),
      },
    },
    async ({ title, topic_within_article = "", count = 5 }) => {
      log.info(`Tool: extracting key facts for '${title}', topic '${topic_within_article}'`);
      return asText(await factsPayload(client, title, topic_within_article, count));
    }
  );

  server.registerTool(
    "get_related_topics",
    {
      title: "Wikipedia: related topics",
      description: "Linked articles (with short summaries) followed by categories.",
      inputSchema: { title: z.string(), limit: z.number().int().default(10).optional() },
    },
    async ({ title, limit = 10 }) => {
      log.info(`Tool: related topics for '${title}'`);
      return asText({ title, related_topics: await client.getRelatedTopics(title, limit) });
    }
  );

  server.registerTool(
    "get_sections",
    {
      title: "Wikipedia: sections",
      description: "Nested section tree of an article.",
      inputSchema: { title: z.string() },
    },
    async ({ title }) => {
      log.info(`Tool: sections for '${title}'`);
      return asText({ title, sections: await client.getSections(title) });
    }
  );

  server.registerTool(
    "get_links",
    {
      title: "Wikipedia: links",
      description: "Titles of all pages an article links to.",
      inputSchema: { title: z.string() },
    },
    async ({ title }) => {
      log.info(`Tool: links for '${title}'`);
      return asText({ title, links: await client.getLinks(title) });
    }
  );

  server.registerTool(
    "get_coordinates",
    {
      title: "Wikipedia: coordinates",
      description: "Geographic coordinates attached to an article, primary and secondary.",
      inputSchema: { title: z.string() },
    },
    async ({ title }) => {
      log.info(`Tool: coordinates for '${title}'`);
      return asText(await client.getCoordinates(title));
    }
  );

  const template = (uri: string) => new ResourceTemplate(uri, { list: undefined });
  const json = { mimeType: "application/json" };

  server.registerResource(
    "search",
    template("wikipedia://search/{query}"),
    { title: "Search results", ...json },
    async (uri, vars) => {
      const query = variable(vars, "query");
      return asResource(uri, { query, results: await client.search(query, 10) });
    }
  );

  server.registerResource(
    "article",
    template("wikipedia://article/{title}"),
    { title: "Full article", ...json },
    async (uri, vars) => asResource(uri, await client.getArticle(variable(vars, "title")))
  );

  server.registerResource(
    "summary",
    template("wikipedia://summary/{title}"),
    { title: "Article summary", ...json },
    async (uri, vars) => asResource(uri, await summaryPayload(client, variable(vars, "title")))
  );

  server.registerResource(
    "summary-for-query",
    template("wikipedia://summary/{title}/query/{query}/length/{max_length}"),
    { title: "Query-focused summary", ...json },
    async (uri, vars) => {
      const title = variable(vars, "title");
      const query = variable(vars, "query");
      const summary = await client.summarizeForQuery(title, query, intVariable(vars, "max_length", 250));
      return asResource(uri, { title, query, summary });
    }
  );

  server.registerResource(
    "section-summary",
    template("wikipedia://summary/{title}/section/{section_title}/length/{max_length}"),
    { title: "Section summary", ...json },
    async (uri, vars) => {
      const title = variable(vars, "title");
      const sectionTitle = variable(vars, "section_title");
      const summary = await client.summarizeSection(title, sectionTitle, intVariable(vars, "max_length", 150));
      return asResource(uri, { title, section_title: sectionTitle, summary });
    }
  );

  server.registerResource(
    "sections",
    template("wikipedia://sections/{title}"),
    { title: "Article sections", ...json },
    async (uri, vars) => {
      const title = variable(vars, "title");
      return asResource(uri, { title, sections: await client.getSections(title) });
    }
  );

  server.registerResource(
    "links",
    template("wikipedia://links/{title}"),
    { title: "Article links", ...json },
    async (uri, vars) => {
      const title = variable(vars, "title");
      return asResource(uri, { title, links: await client.getLinks(title) });
    }
  );

  server.registerResource(
    "facts",
    template("wikipedia://facts/{title}/topic/{topic_within_article}/count/{count}"),
    { title: "Key facts", ...json },
    async (uri, vars) =>
      asResource(
        uri,
        await factsPayload(
          client,
          variable(vars, "title"),
          variable(vars, "topic_within_article"),
          intVariable(vars, "count", 5)
        )
      )
  );

  server.registerResource(
    "coordinates",
    template("wikipedia://coordinates/{title}"),
    { title: "Article coordinates", ...json },
    async (uri, vars) => asResource(uri, await client.getCoordinates(variable(vars, "title")))
  );

  return server;
}
