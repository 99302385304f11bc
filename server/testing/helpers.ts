import axios, {
  AxiosError,
  type AxiosInstance,
  type InternalAxiosRequestConfig,
} from "axios";
import type { TextGenerator } from "../gemini";
import type { FeedItem, FeedReader } from "../news";
import type { SentimentScorer } from "../types/sentiment";

export type StubHandler = (config: InternalAxiosRequestConfig) => unknown;

/**
 * Axios instance whose requests never leave the process. The handler's
 * return value becomes the response body; a thrown error rejects the request.
 */
export function createStubHttp(handler: StubHandler): AxiosInstance {
  return axios.create({
    adapter: async (config) => {
      const data = await handler(config);
      return { data, status: 200, statusText: "OK", headers: {}, config };
    },
  });
}

export function httpError(config: InternalAxiosRequestConfig, status: number): AxiosError {
  return new AxiosError(
    `Request failed with status code ${status}`,
    AxiosError.ERR_BAD_RESPONSE,
    config
  );
}

export class FakeGenerator implements TextGenerator {
  prompts: string[] = [];

  constructor(private answer: string | Error) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.answer instanceof Error) throw this.answer;
    return this.answer;
  }
}

export class FakeFeedReader implements FeedReader {
  constructor(private feeds: Record<string, FeedItem[] | Error>) {}

  async parseURL(url: string): Promise<{ items: FeedItem[] }> {
    const feed = this.feeds[url];
    if (feed instanceof Error) throw feed;
    return { items: feed ?? [] };
  }
}

/** Scorer with fixed compound scores per text; unknown texts score 0. */
export function fixedScorer(scores: Record<string, number>): SentimentScorer {
  return (text) => ({ compound: scores[text] ?? 0, pos: 0, neu: 1, neg: 0 });
}
