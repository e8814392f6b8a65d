import { readFileSync } from "node:fs";
import { z } from "zod";
import { UnsupportedLocaleError } from "./errors.js";

export const DEFAULT_LANGUAGE = "en";

/** Variant tag → Wikipedia project the variant is served from. */
export const LANGUAGE_VARIANTS: Readonly<Record<string, string>> = Object.freeze({
  "zh-hans": "zh", // Simplified
  "zh-hant": "zh", // Traditional
  "zh-tw": "zh",
  "zh-hk": "zh",
  "zh-mo": "zh",
  "zh-cn": "zh",
  "zh-sg": "zh",
  "zh-my": "zh",
  "sr-latn": "sr",
  "sr-cyrl": "sr",
  no: "nb",
  "ku-latn": "ku",
  "ku-arab": "ku",
});

const CountryTableSchema = z.record(z.string().trim().min(1), z.string().trim().min(1));

function loadCountryTable(): ReadonlyMap<string, string> {
  const file = new URL("../data/countries.json", import.meta.url);
  const parsed = CountryTableSchema.parse(JSON.parse(readFileSync(file, "utf8")));
  const table = new Map(Object.entries(parsed));
  const folded = new Map<string, string>();
  for (const key of table.keys()) {
    const previous = folded.get(key.toLowerCase());
    if (previous !== undefined) {
      throw new Error(`countries.json: '${previous}' and '${key}' collide after case folding`);
    }
    folded.set(key.toLowerCase(), key);
  }
  return table;
}

/** Country code, alias or English name → language tag (base or variant). */
export const COUNTRY_TO_LANGUAGE: ReadonlyMap<string, string> = loadCountryTable();

const FOLDED_COUNTRIES: ReadonlyMap<string, string> = new Map(
  [...COUNTRY_TO_LANGUAGE].map(([key, lang]) => [key.toLowerCase(), lang])
);

const SUGGESTION_COUNT = 10;

export interface ResolvedLocale {
  baseLanguage: string;
  variant: string | null;
}

export interface LocaleInput {
  language?: string;
  country?: string;
}

/** Upper-cases the first letter of every letter run: "new zealand" → "New Zealand". */
export function toTitleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, sep: string, letter: string) => sep + letter.toUpperCase());
}

export function supportedCountryCodes(limit = SUGGESTION_COUNT): string[] {
  return [...COUNTRY_TO_LANGUAGE.keys()].filter((key) => key.length <= 3).slice(0, limit);
}

export function resolveCountry(country: string): string {
  const trimmed = country.trim();
  for (const candidate of [trimmed, trimmed.toUpperCase(), toTitleCase(trimmed)]) {
    const lang = COUNTRY_TO_LANGUAGE.get(candidate);
    if (lang !== undefined) return lang;
  }
  // "Bosnia and Herzegovina" has a lower-case word no casing above reproduces
  const folded = FOLDED_COUNTRIES.get(trimmed.toLowerCase());
  if (folded !== undefined) return folded;
  throw new UnsupportedLocaleError(country, supportedCountryCodes());
}

export function parseVariant(language: string): ResolvedLocale {
  const base = Object.hasOwn(LANGUAGE_VARIANTS, language) ? LANGUAGE_VARIANTS[language] : undefined;
  return base !== undefined ? { baseLanguage: base, variant: language } : { baseLanguage: language, variant: null };
}

/** A non-blank country wins outright; the language is then never looked at. */
export function resolveLocale(input: LocaleInput): ResolvedLocale {
  if (input.country !== undefined && input.country.trim() !== "") {
    return parseVariant(resolveCountry(input.country));
  }
  return parseVariant(input.language ?? DEFAULT_LANGUAGE);
}

export type QueryParams = Readonly<Record<string, string | number>>;

export function withVariant(params: QueryParams, variant: string | null): Record<string, string | number> {
  return variant === null ? { ...params } : { ...params, variant };
}

/** Table keys grouped under their language tag, tags sorted, keys in table order. */
export function groupCountriesByLanguage(): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const [country, lang] of COUNTRY_TO_LANGUAGE) {
    const list = groups.get(lang) ?? [];
    list.push(country);
    groups.set(lang, list);
  }
  return new Map([...groups].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

const SHOWN_PER_LANGUAGE = 5;

/** Operator listing for --list-countries. */
export function formatCountryListing(): string {
  const lines = ["Supported Country/Locale Codes:", "=".repeat(40)];
  for (const [lang, countries] of groupCountriesByLanguage()) {
    const shown = countries.slice(0, SHOWN_PER_LANGUAGE);
    if (countries.length > SHOWN_PER_LANGUAGE) shown.push(`... (+${countries.length - SHOWN_PER_LANGUAGE} more)`);
    lines.push(`${lang.padStart(6)}: ${shown.join(", ")}`);
  }
  lines.push(
    "",
    "Examples:",
    "  wikipedia-mcp --country US    # English (United States)",
    "  wikipedia-mcp --country CN    # Chinese Simplified (China)",
    "  wikipedia-mcp --country TW    # Chinese Traditional (Taiwan)",
    "  wikipedia-mcp --country Japan # Japanese"
  );
  return lines.join("\n") + "\n";
}
