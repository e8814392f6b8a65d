import { parseArgs } from "node:util";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_LANGUAGE } from "./locales.js";
import { parseLogLevel, type LogLevel } from "./logger.js";
import { DEFAULT_TIMEOUT_MS } from "./wikipedia.js";

export type Transport = "stdio" | "sse";

export interface ServerConfig {
  language: string;
  country?: string;
  enableCache: boolean;
  accessToken?: string;
  transport: Transport;
  host: string;
  port: number;
  logLevel: LogLevel;
  timeoutMs: number;
  userAgent?: string;
  listCountries: boolean;
  help: boolean;
}

export const USAGE = `Usage: wikipedia-mcp [options]

Options:
  -l, --language <code>    Wikipedia language, variants allowed (en, ja, zh-hans, sr-latn). Default: en
  -c, --country <country>  Country code or name (US, CN, TW, Japan). Cannot be combined with --language
      --list-countries     List supported countries grouped by language and exit
      --transport <name>   stdio (default) or sse
      --host <host>        Bind address for sse (default 127.0.0.1)
      --port <port>        Port for sse (default 8000)
      --enable-cache       Cache API results per operation (LRU, 128 entries each)
      --access-token <t>   Bearer token sent to Wikipedia (or WIKIPEDIA_ACCESS_TOKEN)
      --log-level <level>  DEBUG, INFO, WARNING, ERROR or CRITICAL (default INFO)
  -h, --help               Show this help

Environment:
  WIKIPEDIA_LANGUAGE, WIKIPEDIA_COUNTRY, WIKIPEDIA_ACCESS_TOKEN, WIKIPEDIA_ENABLE_CACHE,
  MCP_TRANSPORT, MCP_HOST, MCP_PORT, LOG_LEVEL, HTTP_TIMEOUT, USER_AGENT
`;

type Env = Record<string, string | undefined>;

/** Empty strings count as unset. */
function envValue(env: Env, name: string): string | undefined {
  const v = env[name]?.trim();
  return v ? v : undefined;
}

function envFlag(env: Env, name: string): boolean | undefined {
  const v = envValue(env, name);
  if (v === undefined) return undefined;
  return ["1", "true", "yes", "on"].includes(v.toLowerCase());
}

const LogLevelSchema = z.string().transform((value, ctx) => {
  const level = parseLogLevel(value);
  if (!level) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid log level '${value}'` });
    return z.NEVER;
  }
  return level;
});

const ConfigSchema = z.object({
  language: z.string().trim().min(1).default(DEFAULT_LANGUAGE),
  country: z.string().trim().min(1).optional(),
  enableCache: z.boolean().default(false),
  accessToken: z.string().min(1).optional(),
  transport: z.enum(["stdio", "sse"]).default("stdio"),
  host: z.string().min(1).default("127.0.0.1"),
  port: z.coerce.number().int().min(1).max(65535).default(8000),
  logLevel: LogLevelSchema.default("info"),
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  userAgent: z.string().min(1).optional(),
  listCountries: z.boolean().default(false),
  help: z.boolean().default(false),
});

export interface LocaleChoice {
  language?: string;
  country?: string;
}

/**
 * Explicit flags beat the environment as a pair: an explicit --language
 * hides WIKIPEDIA_COUNTRY. Without flags, WIKIPEDIA_COUNTRY beats
 * WIKIPEDIA_LANGUAGE. Both flags at once is an error.
 */
export function chooseLocale(cli: LocaleChoice, env: Env): LocaleChoice {
  if (cli.language !== undefined && cli.country !== undefined) {
    throw new ConfigurationError("Cannot specify both --language and --country. Use one or the other.");
  }
  if (cli.country !== undefined) return { country: cli.country };
  if (cli.language !== undefined) return { language: cli.language };

  const country = envValue(env, "WIKIPEDIA_COUNTRY");
  if (country !== undefined) return { country };
  return { language: envValue(env, "WIKIPEDIA_LANGUAGE") ?? DEFAULT_LANGUAGE };
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        language: { type: "string", short: "l" },
        country: { type: "string", short: "c" },
        "list-countries": { type: "boolean" },
        transport: { type: "string" },
        host: { type: "string" },
        port: { type: "string" },
        "enable-cache": { type: "boolean" },
        "access-token": { type: "string" },
        "log-level": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (err) {
    throw new ConfigurationError(err instanceof Error ? err.message : String(err));
  }
}

export function loadConfig(argv: string[], env: Env = process.env): ServerConfig {
  const values = readArgs(argv);

  const locale = chooseLocale({ language: values.language, country: values.country }, env);

  const parsed = ConfigSchema.safeParse({
    language: locale.language,
    country: locale.country,
    enableCache: values["enable-cache"] ?? envFlag(env, "WIKIPEDIA_ENABLE_CACHE"),
    accessToken: values["access-token"] ?? envValue(env, "WIKIPEDIA_ACCESS_TOKEN"),
    transport: values.transport ?? envValue(env, "MCP_TRANSPORT"),
    host: values.host ?? envValue(env, "MCP_HOST"),
    port: values.port ?? envValue(env, "MCP_PORT"),
    logLevel: values["log-level"] ?? envValue(env, "LOG_LEVEL"),
    timeoutMs: envValue(env, "HTTP_TIMEOUT"),
    userAgent: envValue(env, "USER_AGENT"),
    listCountries: values["list-countries"],
    help: values.help,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`);
  }
  return parsed.data;
}
