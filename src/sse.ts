import express from "express";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { createServer } from "./server.js";
import type { WikipediaClient } from "./wikipedia.js";

const log = createLogger("sse");

/** GET /sse opens a session with its own McpServer; POST /messages?sessionId= feeds it. */
export function createSseApp(client: WikipediaClient): express.Express {
  const app = express();
  const transports = new Map<string, SSEServerTransport>();

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", language: client.baseLanguage, variant: client.variant, sessions: transports.size });
  });

  app.get("/sse", async (_req, res) => {
    const transport = new SSEServerTransport("/messages", res);
    transports.set(transport.sessionId, transport);
    res.on("close", () => {
      transports.delete(transport.sessionId);
      log.debug(`Session ${transport.sessionId} closed`);
    });
    try {
      await createServer(client).connect(transport);
      log.info(`Session ${transport.sessionId} opened`);
    } catch (err) {
      transports.delete(transport.sessionId);
      log.error(`Failed to open SSE session: ${errorMessage(err)}`);
      if (!res.headersSent) res.status(500).end();
    }
  });

  app.post("/messages", express.json(), async (req, res) => {
    const sessionId = typeof req.query.sessionId === "string" ? req.query.sessionId : "";
    const transport = transports.get(sessionId);
    if (!transport) {
      res.status(400).json({ error: `Unknown session '${sessionId}'` });
      return;
    }
    try {
      await transport.handlePostMessage(req, res, req.body);
    } catch (err) {
      log.error(`Failed to handle message for session ${sessionId}: ${errorMessage(err)}`);
      if (!res.headersSent) res.status(500).json({ error: errorMessage(err) });
    }
  });

  return app;
}

export function startSseServer(client: WikipediaClient, host: string, port: number): Promise<void> {
  const app = createSseApp(client);
  return new Promise((resolve, reject) => {
    const httpServer = app.listen(port, host, () => {
      log.info(`SSE server listening on http://${host}:${port}/sse`);
      resolve();
    });
    httpServer.on("error", reject);
  });
}
