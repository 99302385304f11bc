import { calculateInfluenceScore } from "../influence";
import type { PersonAnalysis } from "../types/analysis";

export function makeAnalysis(overrides: Partial<PersonAnalysis> = {}): PersonAnalysis {
  return {
    id: "ada-lovelace-1718409600000",
    name: "Ada Lovelace",
    normalizedName: "ada lovelace",
    imageUrl: null,
    details: null,
    twitterHandle: null,
    twitter: null,
    news: null,
    influence: calculateInfluenceScore(null),
    warnings: [],
    createdAt: "2024-06-15T00:00:00.000Z",
    ...overrides,
  };
}
