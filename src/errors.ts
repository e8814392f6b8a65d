/** Raised while building configuration; the only error class allowed out of WikipediaClient. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class UnsupportedLocaleError extends ConfigurationError {
  readonly input: string;
  readonly examples: readonly string[];

  constructor(input: string, examples: readonly string[]) {
    super(
      `Unsupported country/locale: '${input}'. ` +
        `Supported country codes include: ${examples.join(", ")}. ` +
        `Use --language parameter for direct language codes instead.`
    );
    this.name = "UnsupportedLocaleError";
    this.input = input;
    this.examples = examples;
  }
}

export class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, url: string) {
    super(`HTTP ${status} for ${url}`);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs} ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** MediaWiki answered 200 with an `error` object in the body. */
export class WikipediaApiError extends Error {
  readonly code: string;

  constructor(code: string, info: string) {
    super(`Wikipedia API error: ${code} - ${info}`);
    this.name = "WikipediaApiError";
    this.code = code;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorName(err: unknown): string {
  return err instanceof Error ? err.name : typeof err;
}
