import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { createAnalysisService } from "./analysis";
import { getConfig } from "./config";
import { errorMessage } from "./errors";
import {
  MemoryAnalysisStore,
  MongoAnalysisStore,
  connectDatabase,
  disconnectDatabase,
  type AnalysisStore,
} from "./storage";

async function main() {
  const config = getConfig();

  let store: AnalysisStore;
  if (config.mongoUri) {
    await connectDatabase(config.mongoUri);
    store = new MongoAnalysisStore();
  } else {
    console.warn("⚠️ MONGODB_URI not set. Analyses are kept in memory only.");
    store = new MemoryAnalysisStore();
  }

  const service = await createAnalysisService(config, store);
  const app = createApp(service, { nodeEnv: config.nodeEnv });

  console.log(`🚀 Influence IQ API starting on port ${config.port}`);
  console.log(`🎯 Available endpoints:`);
  console.log(`   GET  /health - Health check`);
  console.log(`   GET  /api/test - Test endpoint`);
  console.log(`   POST /api/analyze - Analyze a public figure`);
  console.log(`   GET  /api/recent - Recent analyses`);
  console.log(`   GET  /api/analysis/:id - Analysis by ID`);
  console.log(`   GET  /api/twitter/:handle - Twitter profile`);
  console.log(`   GET  /api/news?name= - News sentiment and credibility`);
  console.log(`   GET  /api/mappings - Known Twitter handles`);
  console.log(`   POST /api/cleanup - Cleanup old analyses`);
  console.log(
    config.nodeEnv === "production"
      ? `🔗 CORS enabled for: all origins (production mode)`
      : `🔗 CORS enabled for: http://localhost:3000, http://localhost:5173`
  );

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    console.log(`✅ Server running on http://localhost:${info.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`\n🛑 Received ${signal}, shutting down...`);
    server.close(() => {
      const done = config.mongoUri ? disconnectDatabase() : Promise.resolve();
      done
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error("❌ Error during shutdown:", errorMessage(error));
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error("❌ Failed to start server:", errorMessage(error));
  process.exit(1);
});
