import vader from "vader-sentiment";
import type { SentimentLabel, SentimentScores, SentimentScorer } from "./types/sentiment";
import { mean } from "./stats";

export function getSentimentLabel(compound: number): SentimentLabel {
  if (compound >= 0.05) return "positive";
  if (compound <= -0.05) return "negative";
  return "neutral";
}

export const scoreText: SentimentScorer = (text: string): SentimentScores => {
  const { compound, pos, neu, neg } =
    vader.SentimentIntensityAnalyzer.polarity_scores(text);
  return { compound, pos, neu, neg };
};

/**
 * Mean VADER compound score of the given texts, 0 when there are none.
 */
export function averageCompound(
  texts: string[],
  scorer: SentimentScorer = scoreText
): number {
  return mean(texts.map((text) => scorer(text).compound));
}

/** Map a compound score from [-1, 1] onto [0, 1]. */
export function normalizeCompound(compound: number): number {
  return (compound + 1) / 2;
}
