import { describe, expect, it } from "vitest";
import type { InternalAxiosRequestConfig } from "axios";
import {
  NewsService,
  calculateCredibilityScore,
  evaluateCredibility,
  evaluateRecency,
  hostOf,
  isReliableSource,
} from "./news";
import { FakeFeedReader, createStubHttp, fixedScorer, httpError } from "./testing/helpers";
import type { NewsArticle } from "./types/news";

const now = new Date("2024-06-15T00:00:00Z");

const FORBES_FEED = "https://www.forbes.com/feed";
const BBC_FEED = "http://feeds.bbci.co.uk/news/rss.xml";
const BROKEN_FEED = "https://broken.example.com/rss";

const reader = new FakeFeedReader({
  [FORBES_FEED]: [
    {
      title: "Ada Lovelace honoured",
      link: "https://www.forbes.com/a",
      isoDate: "2024-06-10T00:00:00.000Z",
    },
    { title: "Markets rally", contentSnippet: "Unrelated", link: "https://www.forbes.com/b" },
  ],
  [BBC_FEED]: [
    {
      title: "Computing pioneers",
      contentSnippet: "A profile of ada lovelace",
      link: "https://www.bbc.co.uk/c",
      pubDate: "Mon, 10 Jun 2024 08:00:00 GMT",
    },
  ],
  [BROKEN_FEED]: new Error("socket hang up"),
});

const scorer = fixedScorer({
  "Ada Lovelace honoured": 0.5,
  "Computing pioneers": 0.1,
});

function createService(options: { newsApiKey?: string; handler?: (config: InternalAxiosRequestConfig) => unknown } = {}) {
  return new NewsService({
    reader,
    feeds: [FORBES_FEED, BBC_FEED, BROKEN_FEED],
    http: createStubHttp(options.handler ?? (() => ({ status: "ok", articles: [] }))),
    newsApiKey: options.newsApiKey,
    scorer,
    now: () => now,
  });
}

describe("isReliableSource", () => {
  it("matches listed domains and their subdomains", () => {
    expect(isReliableSource("forbes.com")).toBe(true);
    expect(isReliableSource("www.forbes.com")).toBe(true);
    expect(isReliableSource("feeds.bbci.co.uk")).toBe(true);
    expect(isReliableSource("https://www.wsj.com/articles/x")).toBe(true);
  });

  it("rejects look-alike hosts", () => {
    expect(isReliableSource("notforbes.com")).toBe(false);
    expect(isReliableSource("https://example.com/forbes.com")).toBe(false);
  });
});

describe("hostOf", () => {
  it("returns the host name of a URL", () => {
    expect(hostOf("http://feeds.bbci.co.uk/news/rss.xml")).toBe("feeds.bbci.co.uk");
  });
});

describe("evaluateRecency", () => {
  it("scores by article age", () => {
    expect(evaluateRecency("2024-06-10T00:00:00Z", now)).toBe(1.0);
    expect(evaluateRecency("2024-05-25T00:00:00Z", now)).toBe(0.7);
    expect(evaluateRecency("2024-01-01T00:00:00Z", now)).toBe(0.3);
  });

  it("gives unknown dates a middle score", () => {
    expect(evaluateRecency("Unknown Date", now)).toBe(0.5);
  });
});

describe("calculateCredibilityScore", () => {
  it("blends source reliability and recency with sentiment", () => {
    const articles: NewsArticle[] = [
      { title: "a", url: "https://www.forbes.com/a", source: "www.forbes.com", publishedAt: "2024-06-10T00:00:00Z" },
      { title: "b", url: "https://example.com/b", source: "example.com", publishedAt: "Unknown Date" },
    ];
    expect(calculateCredibilityScore(articles, 0.25, now)).toBeCloseTo(0.5);
  });
});

describe("evaluateCredibility", () => {
  it("maps scores to credibility levels", () => {
    expect(evaluateCredibility(0.71)).toEqual({ credibility: "High Credibility", nature: "Positive" });
    expect(evaluateCredibility(0.7)).toEqual({ credibility: "Moderate Credibility", nature: "Neutral" });
    expect(evaluateCredibility(0.4)).toEqual({ credibility: "Moderate Credibility", nature: "Neutral" });
    expect(evaluateCredibility(0.39)).toEqual({ credibility: "Low Credibility", nature: "Negative" });
  });
});

describe("NewsService", () => {
  it("keeps feed items that mention the name and skips failed feeds", async () => {
    await expect(createService().fetchNewsFromRss("Ada Lovelace")).resolves.toEqual([
      {
        title: "Ada Lovelace honoured",
        url: "https://www.forbes.com/a",
        publishedAt: "2024-06-10T00:00:00.000Z",
        source: "www.forbes.com",
      },
      {
        title: "Computing pioneers",
        url: "https://www.bbc.co.uk/c",
        publishedAt: "Mon, 10 Jun 2024 08:00:00 GMT",
        source: "feeds.bbci.co.uk",
      },
    ]);
  });

  it("reads NewsAPI mentions from reliable sources only", async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const service = createService({
      newsApiKey: "test-key",
      handler: (config) => {
        requests.push(config);
        return {
          status: "ok",
          articles: [
            { title: "Ada at Bloomberg", url: "https://www.bloomberg.com/x", publishedAt: "2024-06-14T00:00:00Z" },
            { title: "Ada on a blog", url: "https://blog.example.com/y", publishedAt: "2024-06-14T00:00:00Z" },
          ],
        };
      },
    });

    await expect(service.fetchNewsMentions("Ada Lovelace")).resolves.toEqual([
      {
        title: "Ada at Bloomberg",
        url: "https://www.bloomberg.com/x",
        publishedAt: "2024-06-14T00:00:00Z",
        source: "www.bloomberg.com",
      },
    ]);
    expect(requests[0]?.params).toMatchObject({ q: "Ada Lovelace", apiKey: "test-key", pageSize: 10 });
  });

  it("skips NewsAPI without a key or when it fails", async () => {
    await expect(createService().fetchNewsMentions("Ada Lovelace")).resolves.toEqual([]);

    const failing = createService({
      newsApiKey: "test-key",
      handler: (config) => {
        throw httpError(config, 500);
      },
    });
    await expect(failing.fetchNewsMentions("Ada Lovelace")).resolves.toEqual([]);
  });

  it("merges both sources without duplicate URLs", async () => {
    const service = createService({
      newsApiKey: "test-key",
      handler: () => ({
        status: "ok",
        articles: [
          { title: "Ada Lovelace honoured", url: "https://www.forbes.com/a", publishedAt: "2024-06-10T00:00:00Z" },
          { title: "Ada at Bloomberg", url: "https://www.bloomberg.com/x", publishedAt: "2024-06-14T00:00:00Z" },
        ],
      }),
    });

    const articles = await service.fetchArticles("Ada Lovelace");
    expect(articles.map((article) => article.url)).toEqual([
      "https://www.forbes.com/a",
      "https://www.bbc.co.uk/c",
      "https://www.bloomberg.com/x",
    ]);
  });

  it("caps articles at ten in feed order", async () => {
    const items = Array.from({ length: 12 }, (_, i) => ({
      title: `Ada Lovelace story ${i + 1}`,
      link: `https://www.forbes.com/story-${i + 1}`,
    }));
    const service = new NewsService({
      reader: new FakeFeedReader({ [FORBES_FEED]: items }),
      feeds: [FORBES_FEED],
      http: createStubHttp(() => ({
        status: "ok",
        articles: [
          { title: "Ada at Bloomberg", url: "https://www.bloomberg.com/x", publishedAt: "2024-06-14T00:00:00Z" },
        ],
      })),
      newsApiKey: "test-key",
      scorer,
      now: () => now,
    });
    const expected = items.slice(0, 10).map((item) => item.link);

    const fromRss = await service.fetchNewsFromRss("Ada Lovelace");
    const merged = await service.fetchArticles("Ada Lovelace");

    expect(fromRss.map((article) => article.url)).toEqual(expected);
    expect(merged.map((article) => article.url)).toEqual(expected);
  });

  it("analyzes headline sentiment and credibility", async () => {
    const analysis = await createService().analyzeNews("Ada Lovelace");

    expect(analysis?.articles).toHaveLength(2);
    expect(analysis?.sentimentScore).toBeCloseTo(0.3);
    expect(analysis?.credibilityScore).toBeCloseTo(0.65);
    expect(analysis?.credibility).toBe("Moderate Credibility");
    expect(analysis?.nature).toBe("Neutral");
  });

  it("returns null when nothing mentions the name", async () => {
    await expect(createService().analyzeNews("Grace Hopper")).resolves.toBeNull();
  });
});
