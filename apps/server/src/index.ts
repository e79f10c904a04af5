import express from "express";
import cors from "cors";
import { createConversationsRouter } from "./api/conversations.js";
import { config } from "./config.js";
import { logger } from "./logger.js";
import { initWeave, ensureWeaveOps, isWeaveInitialized } from "./weave.js";
import { getRedis, healthCheck } from "./redis.js";
import { ConversationRegistry, stagehandSessionFactory } from "./sessions.js";

const registry = new ConversationRegistry(stagehandSessionFactory());

const app = express();
// Allow CORS from the web frontend for SSE and API calls
app.use(cors({
  origin: config.APP_ENV === "development"
    ? true  // Allow all origins in development
    : config.WEB_BASE_URL,
  credentials: true
}));
app.use(express.json());

app.use("/api/conversations", createConversationsRouter(registry));

app.get("/health", async (_req, res) => {
  const store = await healthCheck();
  res.status(store === "disconnected" ? 503 : 200).json({
    ok: store !== "disconnected",
    redis: store,
    weave: isWeaveInitialized(),
  });
});

async function shutdown(signal: string) {
  logger.info({ signal }, "shutting down");
  await registry.closeAll();
  process.exit(0);
}

async function main() {
  if (config.WANDB_API_KEY) {
    await initWeave();
    await ensureWeaveOps();
    logger.info("Weave initialized");
  }
  const redis = await getRedis();
  if (redis) {
    logger.info("Redis connected");
  } else {
    logger.warn("Redis not available - using in-memory storage");
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exit(1);
      });
    });
  }

  app.listen(config.SERVER_PORT, () => {
    logger.info("surfloop server on http://localhost:%s", config.SERVER_PORT);
  });
}

main().catch((err) => {
  logger.error(err);
  process.exit(1);
});
