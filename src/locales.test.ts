import { describe, expect, it } from "vitest";
import { UnsupportedLocaleError } from "./errors.js";
import {
  COUNTRY_TO_LANGUAGE,
  LANGUAGE_VARIANTS,
  formatCountryListing,
  groupCountriesByLanguage,
  parseVariant,
  resolveCountry,
  resolveLocale,
  supportedCountryCodes,
  toTitleCase,
  withVariant,
} from "./locales.js";

describe("resolveCountry", () => {
  it.each([
    ["US", "en"],
    ["CN", "zh-hans"],
    ["TW", "zh-tw"],
    ["JP", "ja"],
    ["BR", "pt"],
    ["United States", "en"],
    ["Taiwan", "zh-tw"],
    ["Hong Kong", "zh-hk"],
    ["Norway", "no"],
    ["Serbia", "sr"],
  ])("maps %s to %s", (country, lang) => {
    expect(resolveCountry(country)).toBe(lang);
  });

  it("ignores case", () => {
    for (const input of ["us", "Us", "uS", "US"]) expect(resolveCountry(input)).toBe("en");
    for (const input of ["china", "CHINA", "China"]) expect(resolveCountry(input)).toBe("zh-hans");
    expect(resolveCountry("new zealand")).toBe("en");
    expect(resolveCountry("bosnia and herzegovina")).toBe("bs");
  });

  it("trims surrounding whitespace", () => {
    expect(resolveCountry("  jp\t")).toBe("ja");
  });

  it("resolves every table key in upper, title, lower case and padded", () => {
    for (const [key, lang] of COUNTRY_TO_LANGUAGE) {
      expect(resolveCountry(key.toUpperCase())).toBe(lang);
      expect(resolveCountry(toTitleCase(key))).toBe(lang);
      expect(resolveCountry(key.toLowerCase())).toBe(lang);
      expect(resolveCountry(` ${key} `)).toBe(lang);
    }
  });

  it("rejects unknown countries with example codes", () => {
    expect(() => resolveCountry("INVALID")).toThrow(UnsupportedLocaleError);
    try {
      resolveCountry("INVALID");
    } catch (err) {
      expect(err).toBeInstanceOf(UnsupportedLocaleError);
      if (!(err instanceof UnsupportedLocaleError)) return;
      expect(err.input).toBe("INVALID");
      expect(err.examples).toEqual(["US", "USA", "UK", "GB", "CA", "AU", "NZ", "IE", "ZA", "CN"]);
      expect(err.message).toBe(
        "Unsupported country/locale: 'INVALID'. Supported country codes include: " +
          "US, USA, UK, GB, CA, AU, NZ, IE, ZA, CN. Use --language parameter for direct language codes instead."
      );
    }
  });

  it("does not match inherited object keys", () => {
    expect(() => resolveCountry("constructor")).toThrow(UnsupportedLocaleError);
  });
});

describe("country table", () => {
  it("has no keys that collide after case folding", () => {
    const folded = new Set([...COUNTRY_TO_LANGUAGE.keys()].map((k) => k.toLowerCase()));
    expect(folded.size).toBe(COUNTRY_TO_LANGUAGE.size);
  });

  it("only suggests short codes", () => {
    expect(supportedCountryCodes().every((c) => c.length <= 3)).toBe(true);
    expect(supportedCountryCodes(3)).toEqual(["US", "USA", "UK"]);
  });
});

describe("toTitleCase", () => {
  it("capitalises each word", () => {
    expect(toTitleCase("united KINGDOM")).toBe("United Kingdom");
    expect(toTitleCase("usa")).toBe("Usa");
  });
});

describe("parseVariant", () => {
  it("splits every registered variant", () => {
    for (const [variant, base] of Object.entries(LANGUAGE_VARIANTS)) {
      expect(parseVariant(variant)).toEqual({ baseLanguage: base, variant });
    }
  });

  it("passes other tags through", () => {
    expect(parseVariant("en")).toEqual({ baseLanguage: "en", variant: null });
    expect(parseVariant("zh")).toEqual({ baseLanguage: "zh", variant: null });
    expect(parseVariant("xx-unknown")).toEqual({ baseLanguage: "xx-unknown", variant: null });
  });
});

describe("resolveLocale", () => {
  it("lets the country win over the language", () => {
    expect(resolveLocale({ country: "JP", language: "en" })).toEqual({ baseLanguage: "ja", variant: null });
  });

  it("does not validate the language when a country is given", () => {
    expect(resolveLocale({ country: "TW", language: "not-a-language" })).toEqual({
      baseLanguage: "zh",
      variant: "zh-tw",
    });
  });

  it("gives the same variant through country and language input", () => {
    expect(resolveLocale({ country: "Taiwan" })).toEqual(resolveLocale({ language: "zh-tw" }));
    expect(resolveLocale({ country: "Norway" })).toEqual({ baseLanguage: "nb", variant: "no" });
  });

  it("falls back to the language for a blank country", () => {
    expect(resolveLocale({ country: "  ", language: "sr-latn" })).toEqual({ baseLanguage: "sr", variant: "sr-latn" });
    expect(resolveLocale({})).toEqual({ baseLanguage: "en", variant: null });
  });

  it("throws for an unknown country even when the language is valid", () => {
    expect(() => resolveLocale({ country: "Atlantis", language: "en" })).toThrow(UnsupportedLocaleError);
  });
});

describe("withVariant", () => {
  it("adds nothing without a variant", () => {
    const params = { action: "query", titles: "Tokyo" };
    const out = withVariant(params, null);
    expect(out).toEqual(params);
    expect(out).not.toBe(params);
  });

  it("adds the variant without touching the input", () => {
    const params = { action: "query", srlimit: 10 };
    const out = withVariant(params, "zh-tw");
    expect(out).toEqual({ action: "query", srlimit: 10, variant: "zh-tw" });
    expect(params).toEqual({ action: "query", srlimit: 10 });
  });

  it("is idempotent", () => {
    const once = withVariant({ action: "query" }, "zh-tw");
    expect(withVariant(once, "zh-tw")).toEqual(once);
  });
});

describe("country listing", () => {
  it("groups countries by sorted language", () => {
    const groups = groupCountriesByLanguage();
    expect([...groups.keys()][0]).toBe("am");
    expect(groups.get("zh-tw")).toEqual(["TW", "Taiwan"]);
  });

  it("abbreviates long groups", () => {
    const lines = formatCountryListing().split("\n");
    expect(lines[0]).toBe("Supported Country/Locale Codes:");
    expect(lines[2]).toBe("    am: ET, Ethiopia");
    expect(lines).toContain("    en: US, USA, United States, UK, GB, ... (+13 more)");
    expect(lines).toContain("zh-hans: CN, China");
  });
});
