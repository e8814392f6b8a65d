import { http, HttpResponse, type JsonBodyType } from "msw";
import { server } from "./setup.js";

export interface RecordedRequest {
  params: URLSearchParams;
  headers: Headers;
}

/** Routes every GET to https://<language>.wikipedia.org/w/api.php through `respond`. */
export function mockWikiApi(
  language: string,
  respond: (params: URLSearchParams) => JsonBodyType | Response
): RecordedRequest[] {
  const calls: RecordedRequest[] = [];
  server.use(
    http.get(`https://${language}.wikipedia.org/w/api.php`, ({ request }) => {
      const url = new URL(request.url);
      calls.push({ params: url.searchParams, headers: request.headers });
      const body = respond(url.searchParams);
      return body instanceof Response ? body : HttpResponse.json(body);
    })
  );
  return calls;
}

export const TOKYO_SUMMARY =
  "Tokyo is the capital of Japan. It is the most populous city. It hosts many museums. Its bay is busy.";

export const TOKYO_HTML =
  `<p>${TOKYO_SUMMARY}</p>` +
  `<h2><span id="History">History</span></h2>` +
  `<p>Edo became Tokyo in 1868. The city grew fast.</p>` +
  `<h3><span id="Modern_era">Modern era</span></h3>` +
  `<p>The Olympics were held in 1964 and 2021.</p>` +
  `<h2><span id="Geography">Geography</span></h2>` +
  `<ul><li>Kanto plain</li><li>Tokyo Bay</li></ul>`;

export const TOKYO_TEXT =
  `${TOKYO_SUMMARY}\n\n` +
  "History\nEdo became Tokyo in 1868. The city grew fast.\n\n" +
  "Modern era\nThe Olympics were held in 1964 and 2021.\n\n" +
  "Geography\nKanto plain\nTokyo Bay";

export function pageBody(title: string, pageid: number, extract: string, language = "en"): JsonBodyType {
  return {
    batchcomplete: true,
    query: {
      pages: [
        {
          pageid,
          ns: 0,
          title,
          fullurl: `https://${language}.wikipedia.org/wiki/${title.replace(/ /g, "_")}`,
          extract,
        },
      ],
    },
  };
}

export function missingBody(title: string): JsonBodyType {
  return { batchcomplete: true, query: { pages: [{ ns: 0, title, missing: true }] } };
}

export function linksBody(titles: string[], next?: string): JsonBodyType {
  return {
    ...(next ? { continue: { plcontinue: next, continue: "||" } } : {}),
    query: { pages: [{ pageid: 1, ns: 0, title: "Tokyo", links: titles.map((t) => ({ ns: 0, title: t })) }] },
  };
}

export function categoriesBody(titles: string[]): JsonBodyType {
  return {
    query: { pages: [{ pageid: 1, ns: 0, title: "Tokyo", categories: titles.map((t) => ({ ns: 14, title: t })) }] },
  };
}

/** Answers page, links and categories queries for a single "Tokyo" article. */
export function tokyoResponder(params: URLSearchParams): JsonBodyType {
  const titles = params.get("titles");
  if (titles !== "Tokyo") return missingBody(titles ?? "");
  switch (params.get("prop")) {
    case "links":
      return linksBody(["Kyoto", "Osaka"]);
    case "categories":
      return categoriesBody(["Category:Capitals in Asia"]);
    case "coordinates":
      return { query: { pages: [{ pageid: 1, ns: 0, title: "Tokyo", coordinates: [{ lat: 35.68, lon: 139.76, primary: true, globe: "earth" }] }] } };
    default:
      return pageBody("Tokyo", 1, TOKYO_HTML);
  }
}
