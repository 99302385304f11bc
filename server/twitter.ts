import axios, { type AxiosInstance } from "axios";
import { differenceInDays, format, subDays } from "date-fns";
import categoryKeywords from "./data/categories.json";
import { errorMessage } from "./errors";
import { capitalize, countKeywordMatches, extractTopics } from "./preprocessing";
import { normalizeCompound, scoreText } from "./sentiment";
import { mean, pick, randomInt, roundTo, uniform, type RandomSource } from "./stats";
import type { SentimentScorer } from "./types/sentiment";
import type {
  EstimatedMetrics,
  MonthlyGrowth,
  Tweet,
  TweetAnalysis,
  TwitterProfile,
  TwitterUser,
} from "./types/twitter";

const BASE_URL = "https://api.twitter.com/2";
const USER_FIELDS = ["id", "name", "description", "public_metrics", "created_at", "verified"];
const TWEET_FIELDS = ["created_at", "public_metrics"];

// Free tier allows roughly 100 posts a month, so samples stay small
const TWEET_SAMPLE_SIZE = 10;
const GROWTH_MONTHS = 6;
const DEFAULT_CATEGORY = "Content Creator";
const SYNTHETIC_CATEGORIES = ["Content Creator", "Technology", "Business", "Entertainment"];

const CATEGORIES: Record<string, string[]> = categoryKeywords;

interface TwitterUserResponse {
  data?: TwitterUser;
}

interface TwitterTweetsResponse {
  data?: Tweet[];
  meta?: {
    result_count: number;
    next_token?: string;
  };
}

export class TwitterClient {
  private client: AxiosInstance;
  private bearerToken: string | undefined;

  constructor(bearerToken?: string, client?: AxiosInstance) {
    this.bearerToken = bearerToken;
    this.client =
      client ??
      axios.create({
        baseURL: BASE_URL,
        timeout: 15000,
        headers: bearerToken ? { Authorization: `Bearer ${bearerToken}` } : {},
      });

    if (!bearerToken) {
      console.warn("⚠️ TWITTER_BEARER_TOKEN not found. Twitter profiles will be synthetic.");
    }
  }

  isConfigured(): boolean {
    return Boolean(this.bearerToken);
  }

  async getUser(username: string): Promise<TwitterUser | null> {
    if (!this.isConfigured()) return null;

    try {
      const response = await this.client.get<TwitterUserResponse>(
        `/users/by/username/${encodeURIComponent(username)}`,
        { params: { "user.fields": USER_FIELDS.join(",") } }
      );
      return response.data.data ?? null;
    } catch (error) {
      console.error(`❌ Error fetching Twitter user @${username}:`, errorMessage(error));
      return null;
    }
  }

  async getUserTweets(userId: string, maxResults = TWEET_SAMPLE_SIZE): Promise<Tweet[]> {
    if (!this.isConfigured()) return [];

    try {
      const response = await this.client.get<TwitterTweetsResponse>(
        `/users/${encodeURIComponent(userId)}/tweets`,
        {
          params: {
            max_results: maxResults,
            "tweet.fields": TWEET_FIELDS.join(","),
            exclude: "retweets,replies",
          },
        }
      );
      return response.data.data ?? [];
    } catch (error) {
      console.error(`❌ Error fetching tweets for user ${userId}:`, errorMessage(error));
      return [];
    }
  }
}

export interface TwitterAnalyzerOptions {
  scorer?: SentimentScorer;
  random?: RandomSource;
  now?: () => Date;
}

function engagementOf(tweet: Tweet): number {
  const metrics = tweet.public_metrics;
  if (!metrics) return 0;
  return (metrics.like_count ?? 0) + (metrics.retweet_count ?? 0) + (metrics.reply_count ?? 0);
}

function describeGap(hours: number): string {
  if (hours < 24) {
    return `${hours.toFixed(1)} hours between posts`;
  }
  return `${(hours / 24).toFixed(1)} days between posts`;
}

/**
 * Builds Twitter profiles from a small sample of API data. Metrics the free
 * API tier cannot provide (content quality, follower history) are estimated
 * and listed in the profile's `estimatedFields`.
 */
export class TwitterAnalyzer {
  private client: TwitterClient;
  private scorer: SentimentScorer;
  private random: RandomSource;
  private now: () => Date;

  constructor(client: TwitterClient, options: TwitterAnalyzerOptions = {}) {
    this.client = client;
    this.scorer = options.scorer ?? scoreText;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  analyzeTweets(tweets: Tweet[]): TweetAnalysis {
    if (tweets.length === 0) {
      return {
        sentiment: 0.5,
        avgEngagement: 0,
        topics: ["No topics available"],
        postingFrequency: "Unknown",
      };
    }

    const avgSentiment = mean(tweets.map((tweet) => this.scorer(tweet.text).compound));
    const avgEngagement = mean(tweets.map(engagementOf));
    const topics = extractTopics(tweets.map((tweet) => tweet.text), 5);

    return {
      sentiment: roundTo(normalizeCompound(avgSentiment), 2),
      avgEngagement: roundTo(avgEngagement, 1),
      topics: topics.length > 0 ? topics : ["No clear topics detected"],
      postingFrequency: this.postingFrequency(tweets),
    };
  }

  private postingFrequency(tweets: Tweet[]): string {
    if (tweets.length < 2) return "Unknown";

    const times = tweets
      .map((tweet) => (tweet.created_at ? Date.parse(tweet.created_at) : Number.NaN))
      .filter((time) => !Number.isNaN(time))
      .sort((a, b) => a - b);

    if (times.length < 2) return "Irregular";

    const gapsInHours = times
      .slice(1)
      .map((time, index) => (time - (times[index] ?? time)) / 3_600_000);
    return describeGap(mean(gapsInHours));
  }

  determineCategory(bio: string, tweets: Tweet[]): string {
    let best = DEFAULT_CATEGORY;
    let bestScore = 0;

    for (const [category, keywords] of Object.entries(CATEGORIES)) {
      const bioScore = countKeywordMatches(bio, keywords) * 2;
      const tweetScore = tweets.reduce(
        (sum, tweet) => sum + countKeywordMatches(tweet.text, keywords),
        0
      );
      const score = bioScore + tweetScore;
      if (score > bestScore) {
        best = category;
        bestScore = score;
      }
    }

    return best;
  }

  private growthSeries(followers: number): MonthlyGrowth[] {
    const now = this.now();
    const series: MonthlyGrowth[] = [];

    for (let i = 0; i < GROWTH_MONTHS; i++) {
      const monthDate = subDays(now, 30 * (GROWTH_MONTHS - i - 1));
      series.push({
        month: format(monthDate, "MMM"),
        followers: Math.floor((followers * (100 - 5 * (GROWTH_MONTHS - i))) / 100),
        growthPct: roundTo(uniform(this.random, -0.05, 0.15), 3),
      });
    }

    return series;
  }

  estimateMetrics(followers: number, following: number): EstimatedMetrics {
    return {
      followers,
      following,
      engagementRate: roundTo(uniform(this.random, 0.005, 0.08), 3),
      contentQuality: roundTo(uniform(this.random, 5.0, 9.0), 1),
      monthlyGrowth: this.growthSeries(followers),
    };
  }

  private yearsActive(createdAt: string | undefined): number {
    if (!createdAt) return 2.0;
    const created = new Date(createdAt);
    if (Number.isNaN(created.getTime())) return 2.0;
    return roundTo(differenceInDays(this.now(), created) / 365, 1);
  }

  async generateProfile(username: string): Promise<TwitterProfile> {
    console.log(`🐦 Fetching data for @${username}...`);

    const user = await this.client.getUser(username);
    if (!user) {
      console.log("⚠️ Could not retrieve user data. Generating synthetic profile.");
      return this.generateSyntheticProfile(username);
    }

    const tweets = await this.client.getUserTweets(user.id, TWEET_SAMPLE_SIZE);
    console.log(
      tweets.length > 0
        ? `📝 Retrieved ${tweets.length} tweets for @${username}`
        : `⚠️ No tweets found for @${username}, using estimated engagement`
    );

    const followers = user.public_metrics?.followers_count ?? 1000;
    const following = user.public_metrics?.following_count ?? 500;
    const estimated = this.estimateMetrics(followers, following);
    const analysis = this.analyzeTweets(tweets);

    const measuredEngagement = tweets.length > 0;
    const engagementRate = measuredEngagement
      ? followers > 0
        ? roundTo(analysis.avgEngagement / followers, 4)
        : 0
      : estimated.engagementRate;

    const profile: TwitterProfile = {
      username,
      name: user.name || username,
      category: this.determineCategory(user.description ?? "", tweets),
      verified: user.verified ?? false,
      yearsActive: this.yearsActive(user.created_at),
      followers,
      following,
      engagementRate,
      contentQuality: estimated.contentQuality,
      sentiment: analysis.sentiment,
      topics: analysis.topics.slice(0, 3),
      postingFrequency: analysis.postingFrequency,
      monthlyGrowth: estimated.monthlyGrowth,
      source: "api",
      estimatedFields: measuredEngagement
        ? ["contentQuality", "monthlyGrowth"]
        : ["engagementRate", "contentQuality", "monthlyGrowth"],
    };

    console.log(`✅ Profile generation complete for @${username}`);
    return profile;
  }

  /**
   * Placeholder profile for when the API is unavailable. Every number in it
   * is random.
   */
  generateSyntheticProfile(username: string): TwitterProfile {
    const followers = randomInt(this.random, 500, 10000);

    return {
      username,
      name: capitalize(username),
      category: pick(this.random, SYNTHETIC_CATEGORIES),
      verified: false,
      yearsActive: roundTo(uniform(this.random, 1.0, 8.0), 1),
      followers,
      following: randomInt(this.random, 200, 2000),
      engagementRate: roundTo(uniform(this.random, 0.01, 0.08), 3),
      contentQuality: roundTo(uniform(this.random, 5.0, 8.5), 1),
      sentiment: roundTo(uniform(this.random, 0.3, 0.8), 2),
      topics: ["Topic 1", "Topic 2", "Topic 3"],
      postingFrequency: `${uniform(this.random, 1, 5).toFixed(1)} days between posts`,
      monthlyGrowth: this.growthSeries(followers),
      source: "synthetic",
      estimatedFields: ["engagementRate", "contentQuality", "monthlyGrowth"],
    };
  }
}
