import path from "path";
import fs from "fs-extra";
import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { serveStatic } from "@hono/node-server/serve-static";
import { z, ZodError } from "zod";
import type { AnalysisService } from "./analysis";
import type { NodeEnv } from "./config";
import { AppError, NotFoundError, ValidationError } from "./errors";
import { cleanupOldAnalyses } from "./storage";

const analyzeRequestSchema = z.object({
  name: z.string().trim().min(1, "Name is required").max(120),
  twitterHandle: z
    .string()
    .trim()
    .regex(/^@?\w{1,15}$/, "Twitter handle must be 1-15 letters, digits or underscores")
    .optional(),
  refresh: z.boolean().optional(),
});

const recentQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(10),
});

const cleanupRequestSchema = z.object({
  days: z.number().int().positive().default(30),
});

export interface AppOptions {
  nodeEnv?: NodeEnv;
  publicDir?: string;
  /** Disable the access log, mostly for tests. */
  quiet?: boolean;
}

const DEV_ORIGINS = [
  "http://localhost:3000",
  "http://localhost:5173",
  "http://localhost:3001",
];

async function readJsonBody(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (!text.trim()) return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError("Request body must be valid JSON");
  }
}

export function createApp(service: AnalysisService, options: AppOptions = {}) {
  const app = new Hono();
  const nodeEnv = options.nodeEnv ?? "development";
  const publicDir = options.publicDir ?? "./public";

  if (!options.quiet) {
    app.use("*", logger());
  }

  // Configure CORS based on environment
  app.use(
    "*",
    cors({
      origin: nodeEnv === "production" ? "*" : DEV_ORIGINS,
      credentials: true,
    })
  );

  app.onError((err, c) => {
    if (err instanceof ZodError) {
      return c.json(
        {
          success: false,
          error: err.issues.map((issue) => issue.message).join("; "),
        },
        400
      );
    }

    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        console.error(`❌ ${c.req.method} ${c.req.path}:`, err.message);
      }
      return c.json({ success: false, error: err.message }, err.statusCode);
    }

    console.error(`❌ Unhandled error on ${c.req.method} ${c.req.path}:`, err);
    return c.json({ success: false, error: "Internal server error" }, 500);
  });

  app.get("/health", (c) => {
    return c.json({
      status: "OK",
      timestamp: new Date().toISOString(),
      message: "Influence IQ API is running",
    });
  });

  app.get("/api/test", (c) => {
    return c.json({
      success: true,
      message: "API is working!",
      endpoints: [
        "GET /health - Health check",
        "GET /api/test - Test endpoint",
        "POST /api/analyze - Analyze a public figure",
        "GET /api/recent - Recent analyses",
        "GET /api/analysis/:id - Analysis by ID",
        "GET /api/twitter/:handle - Twitter profile",
        "GET /api/news?name= - News sentiment and credibility",
        "GET /api/mappings - Known Twitter handles",
        "POST /api/cleanup - Remove old analyses",
      ],
    });
  });

  app.post("/api/analyze", async (c) => {
    const body = analyzeRequestSchema.parse(await readJsonBody(c));
    const { analysis, cached } = await service.analyzePerson(body.name, {
      twitterHandle: body.twitterHandle,
      refresh: body.refresh,
    });

    return c.json({
      success: true,
      cached,
      data: analysis,
      message: cached
        ? `Cached analysis for "${analysis.name}"`
        : `Analysis completed for "${analysis.name}"`,
    });
  });

  app.get("/api/recent", async (c) => {
    const { limit } = recentQuerySchema.parse({ limit: c.req.query("limit") });
    const recent = await service.store.listRecent(limit);
    return c.json({ success: true, data: recent });
  });

  app.get("/api/analysis/:id", async (c) => {
    const analysis = await service.store.findById(c.req.param("id"));
    if (!analysis) {
      throw new NotFoundError("Analysis not found");
    }

    return c.json({
      success: true,
      cached: true,
      data: analysis,
      message: `Analysis for "${analysis.name}"`,
    });
  });

  app.get("/api/twitter/:handle", async (c) => {
    const profile = await service.getTwitterProfile(c.req.param("handle"));
    return c.json({ success: true, data: profile });
  });

  app.get("/api/news", async (c) => {
    const name = c.req.query("name") ?? "";
    const news = await service.getNews(name);
    if (!news) {
      throw new NotFoundError(`No relevant news articles found for "${name.trim()}"`);
    }
    return c.json({ success: true, data: news });
  });

  app.get("/api/mappings", (c) => {
    return c.json({ success: true, data: service.getMappings().influencers });
  });

  app.post("/api/cleanup", async (c) => {
    const { days } = cleanupRequestSchema.parse(await readJsonBody(c));
    const deletedCount = await cleanupOldAnalyses(service.store, days);
    return c.json({
      success: true,
      message: `Cleaned up ${deletedCount} old analyses`,
      deletedCount,
    });
  });

  // Serve static files from the public directory - must come AFTER all API routes
  app.use("/*", serveStatic({ root: publicDir }));

  // Serve index.html for all non-API routes (SPA routing)
  app.notFound(async (c) => {
    const indexFile = path.join(publicDir, "index.html");
    if (c.req.path.startsWith("/api") || !(await fs.pathExists(indexFile))) {
      return c.json({ success: false, error: "Not found" }, 404);
    }
    return c.html(await fs.readFile(indexFile, "utf8"));
  });

  return app;
}
