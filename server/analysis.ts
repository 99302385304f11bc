import { subHours } from "date-fns";
import type { AppConfig } from "./config";
import { ValidationError, errorMessage } from "./errors";
import { GeminiClient, getPersonDetails, type TextGenerator } from "./gemini";
import { calculateInfluenceScore } from "./influence";
import {
  findTwitterHandle,
  loadTwitterMappings,
  normalizeHandle,
  normalizeName,
  type TwitterMappings,
} from "./mappings";
import { NewsService } from "./news";
import { saveAnalysisToFile, type AnalysisStore } from "./storage";
import { randomInt, type RandomSource } from "./stats";
import { TwitterAnalyzer, TwitterClient } from "./twitter";
import type {
  AnalysisOutcome,
  AnalyzeOptions,
  PersonAnalysis,
} from "./types/analysis";
import type { NewsAnalysis } from "./types/news";
import type { TwitterProfile } from "./types/twitter";
import { getWikipediaImage } from "./wikipedia";

export const NO_HANDLE_WARNING =
  "No Twitter handle found for this person. Add it to twittermappings.json to enable Twitter analysis.";
export const NO_NEWS_WARNING = "No relevant news articles found.";

export interface AnalysisDependencies {
  store: AnalysisStore;
  twitter: TwitterAnalyzer;
  news: NewsService;
  generator: TextGenerator | null;
  mappings: TwitterMappings;
  imageLookup?: (name: string) => Promise<string | null>;
  /** Directory for JSON copies of each analysis; null disables them. */
  logsDir?: string | null;
  cacheTtlHours?: number;
  now?: () => Date;
  random?: RandomSource;
}

const ID_SUFFIX_SPACE = 36 ** 6;

function analysisId(normalizedName: string, createdAt: Date, random: RandomSource): string {
  const slug = normalizedName.replace(/[^a-z0-9]+/g, "-").replace(/^-|-$/g, "");
  const suffix = randomInt(random, 0, ID_SUFFIX_SPACE).toString(36).padStart(6, "0");
  return `${slug || "person"}-${createdAt.getTime()}-${suffix}`;
}

export class AnalysisService {
  private deps: AnalysisDependencies;
  private imageLookup: (name: string) => Promise<string | null>;
  private now: () => Date;
  private random: RandomSource;

  constructor(deps: AnalysisDependencies) {
    this.deps = deps;
    this.imageLookup = deps.imageLookup ?? ((name) => getWikipediaImage(name));
    this.now = deps.now ?? (() => new Date());
    this.random = deps.random ?? Math.random;
  }

  get store(): AnalysisStore {
    return this.deps.store;
  }

  getMappings(): TwitterMappings {
    return this.deps.mappings;
  }

  resolveHandle(name: string, override?: string): string | null {
    if (override) {
      return normalizeHandle(override) || null;
    }
    return findTwitterHandle(this.deps.mappings, name);
  }

  async getTwitterProfile(handle: string): Promise<TwitterProfile> {
    const username = normalizeHandle(handle);
    if (!username) {
      throw new ValidationError("A Twitter handle is required");
    }
    return this.deps.twitter.generateProfile(username);
  }

  async getNews(name: string): Promise<NewsAnalysis | null> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ValidationError("A name is required");
    }
    return this.deps.news.analyzeNews(trimmed);
  }

  async analyzePerson(
    rawName: string,
    options: AnalyzeOptions = {}
  ): Promise<AnalysisOutcome> {
    const name = rawName.trim().replace(/\s+/g, " ");
    if (!name) {
      throw new ValidationError("A name is required");
    }

    const normalizedName = normalizeName(name);
    const now = this.now();
    const twitterHandle = this.resolveHandle(name, options.twitterHandle);

    if (!options.refresh) {
      const since = subHours(now, this.deps.cacheTtlHours ?? 24);
      const cached = await this.deps.store.findLatestByName(normalizedName, since);
      // An explicit handle only reuses an analysis scored with that handle.
      if (cached && (!options.twitterHandle || cached.twitterHandle === twitterHandle)) {
        console.log(`🎯 Returning cached analysis for "${name}"`);
        return { analysis: cached, cached: true };
      }
    }

    console.log(`🔍 Starting analysis for "${name}"`);
    const warnings: string[] = [];
    const attempt = async <T>(step: string, task: () => Promise<T>): Promise<T | null> => {
      try {
        return await task();
      } catch (error) {
        console.warn(`⚠️ ${step} failed for "${name}":`, errorMessage(error));
        warnings.push(`${step}: ${errorMessage(error)}`);
        return null;
      }
    };

    if (!twitterHandle) {
      warnings.push(NO_HANDLE_WARNING);
    }

    const [imageUrl, details, twitter, news] = await Promise.all([
      attempt("Image lookup", () => this.imageLookup(name)),
      attempt("Person details", () => getPersonDetails(this.deps.generator, name)),
      twitterHandle
        ? attempt("Twitter profile", () => this.deps.twitter.generateProfile(twitterHandle))
        : Promise.resolve(null),
      attempt("News analysis", () => this.deps.news.analyzeNews(name)),
    ]);

    if (!news && !warnings.some((warning) => warning.startsWith("News analysis"))) {
      warnings.push(NO_NEWS_WARNING);
    }
    if (twitter?.source === "synthetic") {
      warnings.push(
        `Twitter data for @${twitter.username} is synthetic and was left out of the influence score.`
      );
    }

    const influence = calculateInfluenceScore(details, twitter, news);

    const analysis: PersonAnalysis = {
      id: analysisId(normalizedName, now, this.random),
      name,
      normalizedName,
      imageUrl,
      details,
      twitterHandle,
      twitter,
      news,
      influence,
      warnings,
      createdAt: now.toISOString(),
    };

    await this.deps.store.save(analysis);
    console.log(`💾 Analysis saved with ID: ${analysis.id}`);

    if (this.deps.logsDir) {
      try {
        await saveAnalysisToFile(analysis, this.deps.logsDir);
      } catch (error) {
        console.warn(`⚠️ Failed to save analysis file (continuing):`, errorMessage(error));
      }
    }

    console.log(
      `✅ Analysis completed for "${name}": ${influence.score}/100, ${influence.grade}`
    );
    return { analysis, cached: false };
  }
}

/**
 * Wire the service to the real Gemini, Twitter, news and Wikipedia clients.
 */
export async function createAnalysisService(
  config: AppConfig,
  store: AnalysisStore
): Promise<AnalysisService> {
  const mappings = await loadTwitterMappings(config.mappingsPath);
  const generator = config.geminiApiKey
    ? new GeminiClient(config.geminiApiKey, config.geminiModel)
    : null;

  if (!generator) {
    console.warn("⚠️ GEMINI_API_KEY not found. Person details will be unavailable.");
  }

  return new AnalysisService({
    store,
    generator,
    mappings,
    twitter: new TwitterAnalyzer(new TwitterClient(config.twitterBearerToken)),
    news: new NewsService({ newsApiKey: config.newsApiKey }),
    logsDir: config.logsDir,
    cacheTtlHours: config.cacheTtlHours,
  });
}
