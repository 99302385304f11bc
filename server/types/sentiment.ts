export interface SentimentScores {
  compound: number;
  pos: number;
  neu: number;
  neg: number;
}

export type SentimentLabel = "positive" | "negative" | "neutral";

export type SentimentScorer = (text: string) => SentimentScores;
