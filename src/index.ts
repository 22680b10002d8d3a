#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { resolveConfig } from "./config.js";
import { HttpEmbeddings } from "./embeddings.js";
import { JsonLogger } from "./logger.js";
import { MemoryStore } from "./memory-store.js";
import { RetrievalRanker } from "./ranker.js";
import { createServer } from "./server.js";
import { createShutdown } from "./shutdown.js";

const bootLogger = new JsonLogger();

async function main(): Promise<void> {
  const config = resolveConfig();
  const logger = new JsonLogger({ level: config.logLevel });

  const store = new MemoryStore(
    { dbPath: config.dbPath },
    {
      embedder: new HttpEmbeddings({ url: config.embeddingUrl, model: config.embeddingModel }),
      ranker: new RetrievalRanker(config.rankingWeights, logger),
      logger,
    },
  );
  await store.init();

  const server = createServer(store, { dbPath: config.dbPath });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("mcp server connected", { transport: "stdio" });

  const shutdown = createShutdown(store, logger);
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  bootLogger.error("fatal error", {
    error: error instanceof Error ? error.message : String(error),
    code: typeof error === "object" && error !== null && "code" in error ? error.code : undefined,
  });
  process.exit(1);
});
