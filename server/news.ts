import axios, { type AxiosInstance } from "axios";
import { differenceInDays } from "date-fns";
import Parser from "rss-parser";
import { errorMessage } from "./errors";
import { averageCompound, getSentimentLabel, scoreText } from "./sentiment";
import { mean } from "./stats";
import type { SentimentScorer } from "./types/sentiment";
import type {
  CredibilityLevel,
  NewsAnalysis,
  NewsArticle,
  NewsNature,
} from "./types/news";

export const RSS_FEEDS = [
  "https://www.forbes.com/real-time/feed2/",
  "https://www.bloomberg.com/feeds/podcasts/etf_report.xml",
  "https://feeds.a.dj.com/rss/RSSMarketsMain.xml",
  "https://www.businessinsider.com/rss",
  "https://www.inc.com/rss",
  "http://feeds.bbci.co.uk/news/rss.xml",
  "http://feeds.bbci.co.uk/news/business/rss.xml",
  "http://feeds.bbci.co.uk/news/technology/rss.xml",
  "http://feeds.bbci.co.uk/news/science_and_environment/rss.xml",
];

export const RELIABLE_SOURCES = [
  "forbes.com",
  "bloomberg.com",
  "wsj.com",
  "dj.com",
  "businessinsider.com",
  "inc.com",
  "bbc.co.uk",
  "bbci.co.uk",
];

const NEWS_API_URL = "https://newsapi.org/v2/everything";
const MAX_ARTICLES = 10;
const UNKNOWN_DATE = "Unknown Date";

export interface FeedItem {
  title?: string;
  link?: string;
  isoDate?: string;
  pubDate?: string;
  contentSnippet?: string;
  content?: string;
  summary?: string;
}

export interface FeedReader {
  parseURL(url: string): Promise<{ items: FeedItem[] }>;
}

interface NewsApiArticle {
  title: string | null;
  url: string;
  publishedAt: string | null;
  source?: { name?: string | null };
}

interface NewsApiResponse {
  status: string;
  articles?: NewsApiArticle[];
}

export function hostOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return url.split("//")[1]?.split("/")[0] ?? url;
  }
}

export function isReliableSource(hostOrUrl: string): boolean {
  const host = hostOrUrl.includes("/") ? hostOf(hostOrUrl) : hostOrUrl;
  return RELIABLE_SOURCES.some(
    (source) => host === source || host.endsWith(`.${source}`)
  );
}

export function getSentimentScore(
  articles: NewsArticle[],
  scorer: SentimentScorer = scoreText
): number {
  return averageCompound(
    articles.map((article) => article.title),
    scorer
  );
}

export function evaluateSourceReliability(source: string): number {
  return isReliableSource(source) ? 1.0 : 0.5;
}

export function evaluateRecency(publishedAt: string, now: Date = new Date()): number {
  const published = new Date(publishedAt);
  if (Number.isNaN(published.getTime())) return 0.5;

  const days = differenceInDays(now, published);
  if (days <= 7) return 1.0;
  if (days <= 30) return 0.7;
  return 0.3;
}

/**
 * Average of source reliability and recency per article, blended evenly
 * with the headline sentiment.
 */
export function calculateCredibilityScore(
  articles: NewsArticle[],
  sentimentScore: number,
  now: Date = new Date()
): number {
  const average = mean(
    articles.map(
      (article) =>
        (evaluateSourceReliability(article.source) +
          evaluateRecency(article.publishedAt, now)) /
        2
    )
  );
  return (average + sentimentScore) / 2;
}

export function evaluateCredibility(credibilityScore: number): {
  credibility: CredibilityLevel;
  nature: NewsNature;
} {
  if (credibilityScore > 0.7) {
    return { credibility: "High Credibility", nature: "Positive" };
  }
  if (credibilityScore >= 0.4) {
    return { credibility: "Moderate Credibility", nature: "Neutral" };
  }
  return { credibility: "Low Credibility", nature: "Negative" };
}

export interface NewsServiceOptions {
  reader?: FeedReader;
  http?: AxiosInstance;
  newsApiKey?: string;
  feeds?: string[];
  scorer?: SentimentScorer;
  now?: () => Date;
}

export class NewsService {
  private reader: FeedReader;
  private http: AxiosInstance;
  private newsApiKey: string | undefined;
  private feeds: string[];
  private scorer: SentimentScorer;
  private now: () => Date;

  constructor(options: NewsServiceOptions = {}) {
    this.reader = options.reader ?? new Parser({ timeout: 15000 });
    this.http = options.http ?? axios.create({ timeout: 15000 });
    this.newsApiKey = options.newsApiKey;
    this.feeds = options.feeds ?? RSS_FEEDS;
    this.scorer = options.scorer ?? scoreText;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Articles from the RSS feeds whose title or summary mentions the name.
   * Feeds are read concurrently; results keep feed order.
   */
  async fetchNewsFromRss(name: string): Promise<NewsArticle[]> {
    const needle = name.trim().toLowerCase();
    if (!needle) return [];

    const results = await Promise.allSettled(
      this.feeds.map((feed) => this.reader.parseURL(feed))
    );

    const articles: NewsArticle[] = [];
    results.forEach((result, index) => {
      const feed = this.feeds[index] ?? "";
      if (result.status === "rejected") {
        console.warn(`⚠️ Failed to read feed ${feed}:`, errorMessage(result.reason));
        return;
      }

      for (const item of result.value.items) {
        const title = item.title ?? "";
        const summary = item.contentSnippet ?? item.summary ?? item.content ?? "";
        if (
          !title.toLowerCase().includes(needle) &&
          !summary.toLowerCase().includes(needle)
        ) {
          continue;
        }

        articles.push({
          title,
          url: item.link ?? "",
          publishedAt: item.isoDate ?? item.pubDate ?? UNKNOWN_DATE,
          source: hostOf(feed),
        });
      }
    });

    return articles.slice(0, MAX_ARTICLES);
  }

  /**
   * Articles from NewsAPI, restricted to reliable sources. Empty when no
   * API key is configured or the request fails.
   */
  async fetchNewsMentions(name: string): Promise<NewsArticle[]> {
    if (!this.newsApiKey) return [];

    try {
      const response = await this.http.get<NewsApiResponse>(NEWS_API_URL, {
        params: {
          q: name,
          apiKey: this.newsApiKey,
          language: "en",
          sortBy: "publishedAt",
          pageSize: MAX_ARTICLES,
        },
      });

      return (response.data.articles ?? [])
        .filter((article) => isReliableSource(article.url))
        .map((article) => ({
          title: article.title ?? "",
          url: article.url,
          publishedAt: article.publishedAt ?? UNKNOWN_DATE,
          source: hostOf(article.url),
        }));
    } catch (error) {
      console.error("❌ Error fetching news from NewsAPI:", errorMessage(error));
      return [];
    }
  }

  async fetchArticles(name: string): Promise<NewsArticle[]> {
    const [rssArticles, apiArticles] = await Promise.all([
      this.fetchNewsFromRss(name),
      this.fetchNewsMentions(name),
    ]);

    const seen = new Set<string>();
    const merged: NewsArticle[] = [];
    for (const article of [...rssArticles, ...apiArticles]) {
      if (seen.has(article.url)) continue;
      seen.add(article.url);
      merged.push(article);
    }
    return merged.slice(0, MAX_ARTICLES);
  }

  async analyzeNews(name: string): Promise<NewsAnalysis | null> {
    console.log(`📰 Fetching related news for "${name}"...`);
    const articles = await this.fetchArticles(name);

    if (articles.length === 0) {
      console.log(`⚠️ No relevant news articles found for "${name}"`);
      return null;
    }

    const sentimentScore = getSentimentScore(articles, this.scorer);
    const credibilityScore = calculateCredibilityScore(
      articles,
      sentimentScore,
      this.now()
    );
    const { credibility, nature } = evaluateCredibility(credibilityScore);

    console.log(
      `✅ ${articles.length} articles for "${name}": sentiment ${sentimentScore.toFixed(2)} (${getSentimentLabel(sentimentScore)}), ${credibility}`
    );

    return { articles, sentimentScore, credibilityScore, credibility, nature };
  }
}
