#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig, USAGE, type ServerConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { formatCountryListing } from "./locales.js";
import { createLogger, setLogLevel } from "./logger.js";
import { createServer } from "./server.js";
import { startSseServer } from "./sse.js";
import { WikipediaClient } from "./wikipedia.js";

const log = createLogger("main");

async function run(config: ServerConfig) {
  const client = new WikipediaClient({
    language: config.language,
    country: config.country,
    enableCache: config.enableCache,
    accessToken: config.accessToken,
    timeoutMs: config.timeoutMs,
    userAgent: config.userAgent,
  });

  const locale = config.country !== undefined ? `country: ${config.country}` : `language: ${config.language}`;
  log.info(`Starting Wikipedia MCP server with ${config.transport} transport for ${locale} (${client})`);

  if (config.transport === "sse") {
    await startSseServer(client, config.host, config.port);
    return;
  }
  await createServer(client).connect(new StdioServerTransport());
  log.info("wikipedia-mcp ready (stdio)");
}

async function main() {
  let config: ServerConfig;
  try {
    config = loadConfig(process.argv.slice(2), process.env);
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    console.error(`Error: ${err.message}\n\n${USAGE}`);
    process.exitCode = 1;
    return;
  }

  if (config.help) {
    process.stdout.write(USAGE);
    return;
  }
  if (config.listCountries) {
    process.stdout.write(formatCountryListing());
    return;
  }
  setLogLevel(config.logLevel);

  try {
    await run(config);
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    log.error(`Configuration error: ${err.message}`);
    console.error(`Error: ${err.message}\n\nUse --list-countries to see supported country codes.`);
    process.exitCode = 1;
  }
}

main().catch(err => { console.error(err); process.exit(1); });
