export interface NewsArticle {
  title: string;
  url: string;
  publishedAt: string; // ISO date or "Unknown Date"
  source: string; // host name
}

export type CredibilityLevel =
  | "High Credibility"
  | "Moderate Credibility"
  | "Low Credibility";

export type NewsNature = "Positive" | "Neutral" | "Negative";

export interface NewsAnalysis {
  articles: NewsArticle[];
  sentimentScore: number; // -1..1
  credibilityScore: number;
  credibility: CredibilityLevel;
  nature: NewsNature;
}
