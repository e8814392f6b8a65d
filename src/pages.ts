import { JSDOM } from "jsdom";
import { z } from "zod";
import type { QueryParams } from "./locales.js";

/** Issues one GET against the project's api.php and returns the decoded body. */
export type ApiRequest = (params: QueryParams) => Promise<unknown>;

export interface ArticleSection {
  title: string;
  text: string;
  children: ArticleSection[];
}

export interface PageContent {
  title: string;
  pageid: number;
  fullurl: string;
  summary: string;
  text: string;
  sections: ArticleSection[];
}

export type PageLookup =
  | { exists: false; title: string }
  | { exists: true; page: PageContent };

const MissingFlags = {
  missing: z.boolean().optional(),
  invalid: z.boolean().optional(),
};

const ExtractResponse = z.object({
  query: z
    .object({
      pages: z
        .array(
          z.object({
            title: z.string(),
            pageid: z.number().optional(),
            fullurl: z.string().optional(),
            extract: z.string().optional(),
            ...MissingFlags,
          })
        )
        .default([]),
    })
    .optional(),
});

const ContinueToken = z.record(z.union([z.string(), z.number()])).optional();

const LinksResponse = z.object({
  continue: ContinueToken,
  query: z
    .object({
      pages: z
        .array(z.object({ links: z.array(z.object({ title: z.string() })).optional(), ...MissingFlags }))
        .default([]),
    })
    .optional(),
});

const CategoriesResponse = z.object({
  continue: ContinueToken,
  query: z
    .object({
      pages: z
        .array(z.object({ categories: z.array(z.object({ title: z.string() })).optional(), ...MissingFlags }))
        .default([]),
    })
    .optional(),
});

const HEADING = /^h([2-6])$/;
const TEXT_BLOCKS = "p, li, dt, dd, pre, blockquote";

interface ParsedExtract {
  summary: string;
  sections: ArticleSection[];
}

/**
 * Turns TextExtracts HTML into an intro plus a heading tree. Only the
 * outermost text block is read, so a <p> inside an <li> is not counted twice.
 */
export function parseExtract(html: string): ParsedExtract {
  const { document } = new JSDOM(html).window;
  const intro: string[] = [];
  const roots: ArticleSection[] = [];
  const stack: { depth: number; node: ArticleSection; lines: string[] }[] = [];
  const lines = new Map<ArticleSection, string[]>();

  for (const el of Array.from(document.body.querySelectorAll(`h2, h3, h4, h5, h6, ${TEXT_BLOCKS}`))) {
    const heading = HEADING.exec(el.tagName.toLowerCase());
    if (heading) {
      const depth = Number(heading[1]);
      const node: ArticleSection = { title: (el.textContent ?? "").trim(), text: "", children: [] };
      while (stack.length > 0 && stack[stack.length - 1].depth >= depth) stack.pop();
      const parent = stack[stack.length - 1];
      (parent ? parent.node.children : roots).push(node);
      const own: string[] = [];
      lines.set(node, own);
      stack.push({ depth, node, lines: own });
      continue;
    }
    if (el.parentElement?.closest(TEXT_BLOCKS)) continue;
    const text = (el.textContent ?? "").trim();
    if (!text) continue;
    const current = stack[stack.length - 1];
    (current ? current.lines : intro).push(text);
  }

  for (const [node, own] of lines) node.text = own.join("\n");
  return { summary: intro.join("\n"), sections: roots };
}

/** Intro, then every section depth-first as "title\ntext", blank-line separated. */
export function flattenText(summary: string, sections: ArticleSection[]): string {
  const parts: string[] = summary ? [summary] : [];
  const visit = (nodes: ArticleSection[]) => {
    for (const node of nodes) {
      parts.push(node.text ? `${node.title}\n${node.text}` : node.title);
      visit(node.children);
    }
  };
  visit(sections);
  return parts.join("\n\n");
}

export function findSection(sections: ArticleSection[], title: string): ArticleSection | undefined {
  const wanted = title.toLowerCase();
  for (const section of sections) {
    if (section.title.toLowerCase() === wanted) return section;
    const nested = findSection(section.children, title);
    if (nested) return nested;
  }
  return undefined;
}

export async function fetchPage(api: ApiRequest, title: string, opts: { intro?: boolean } = {}): Promise<PageLookup> {
  const params: Record<string, string | number> = {
    action: "query",
    prop: "info|extracts",
    inprop: "url",
    redirects: 1,
    titles: title,
  };
  if (opts.intro) params.exintro = 1;

  const data = ExtractResponse.parse(await api(params));
  const page = data.query?.pages[0];
  if (!page || page.missing || page.invalid || page.pageid === undefined) {
    return { exists: false, title };
  }
  const { summary, sections } = parseExtract(page.extract ?? "");
  return {
    exists: true,
    page: {
      title: page.title,
      pageid: page.pageid,
      fullurl: page.fullurl ?? "",
      summary,
      text: flattenText(summary, sections),
      sections,
    },
  };
}

type Continuation = Record<string, string | number>;

async function collectContinued(
  api: ApiRequest,
  params: QueryParams,
  readPage: (body: unknown) => { titles: string[]; next: Continuation | undefined }
): Promise<string[]> {
  const out: string[] = [];
  let next: Continuation | undefined = {};
  while (next) {
    const { titles, next: following } = readPage(await api({ ...params, ...next }));
    out.push(...titles);
    next = following;
  }
  return out;
}

export function fetchLinks(api: ApiRequest, title: string): Promise<string[]> {
  return collectContinued(
    api,
    { action: "query", prop: "links", pllimit: "max", redirects: 1, titles: title },
    (body) => {
      const data = LinksResponse.parse(body);
      const links = data.query?.pages[0]?.links ?? [];
      return { titles: links.map((l) => l.title), next: data.continue };
    }
  );
}

export function fetchCategories(api: ApiRequest, title: string): Promise<string[]> {
  return collectContinued(
    api,
    { action: "query", prop: "categories", cllimit: "max", redirects: 1, titles: title },
    (body) => {
      const data = CategoriesResponse.parse(body);
      const categories = data.query?.pages[0]?.categories ?? [];
      return { titles: categories.map((c) => c.title), next: data.continue };
    }
  );
}
