import { normalizeCompound } from "./sentiment";
import { clamp } from "./stats";
import type {
  ComponentScores,
  InfluenceComponent,
  InfluenceResult,
} from "./types/influence";
import type { NewsAnalysis } from "./types/news";
import { UNKNOWN, type PersonDetails } from "./types/person";
import type { TwitterProfile } from "./types/twitter";

export const COMPONENT_WEIGHTS: ComponentScores = {
  reach: 25,
  engagement: 20,
  longevity: 15,
  credibility: 25,
  impact: 10,
  consistency: 5,
};

export const INFLUENCE_COMPONENTS: InfluenceComponent[] = [
  "reach",
  "engagement",
  "longevity",
  "credibility",
  "impact",
  "consistency",
];

const GRADES: Array<[number, string]> = [
  [90, "A+ (Elite Influencer)"],
  [80, "A (Top-tier Influencer)"],
  [70, "B+ (Major Influencer)"],
  [60, "B (Established Influencer)"],
  [50, "C+ (Growing Influencer)"],
  [40, "C (Moderate Influence)"],
  [30, "D+ (Emerging Influence)"],
];

export function gradeFor(score: number): string {
  const match = GRADES.find(([threshold]) => score >= threshold);
  return match ? match[1] : "D (Limited Influence)";
}

/**
 * Points for a net worth string such as "$251 billion": the first word,
 * digits and dots only, on a log2 scale capped at 5. Values that cannot
 * be read still earn 1 point.
 */
export function netWorthPoints(netWorth: string): number {
  const value = netWorth.trim();
  if (!value || value.toLowerCase() === UNKNOWN) return 0;

  const firstWord = value.toLowerCase().split(/\s+/)[0] ?? "";
  const digits = firstWord.replace(/[^0-9.]/g, "");
  const amount = /^\d*\.?\d+$|^\d+\.$/.test(digits) ? Number(digits) : Number.NaN;

  if (Number.isNaN(amount)) return 1;
  if (amount <= 0) return 0;
  return Math.min(5, 1 + Math.log2(amount) / 2);
}

export function reachPoints(followers: number): number {
  return Math.min(20, 4 * (1 + Math.log10(Math.max(followers, 1000) / 1000)));
}

export function calculateInfluenceScore(
  person: PersonDetails | null,
  twitter: TwitterProfile | null = null,
  news: NewsAnalysis | null = null
): InfluenceResult {
  const components: ComponentScores = {
    reach: 0,
    engagement: 0,
    longevity: 0,
    credibility: 0,
    impact: 0,
    consistency: 0,
  };

  // Synthetic profiles carry random numbers only
  const profile = twitter && twitter.source === "api" ? twitter : null;

  if (profile) {
    components.reach = reachPoints(profile.followers);
    components.engagement =
      Math.min(15, profile.engagementRate * 500) + profile.contentQuality / 2;
    components.longevity = Math.min(15, profile.yearsActive * 1.5);

    const verifiedPoints = profile.verified ? 5 : 0;
    const sentimentPoints =
      profile.sentiment > 0.3 ? 5 * (profile.sentiment - 0.3) : 0;
    components.credibility += Math.min(5, verifiedPoints + sentimentPoints);
  }

  if (news) {
    components.credibility += clamp(news.credibilityScore * 20, 0, 20);
  }

  if (person) {
    components.impact += netWorthPoints(person.netWorth);
    components.impact += Math.min(5, person.companies.length);
    if (person.charity && person.charity.toLowerCase() !== UNKNOWN) {
      components.impact += 5;
    }
  }

  if (profile && news) {
    const difference = Math.abs(
      profile.sentiment - normalizeCompound(news.sentimentScore)
    );
    components.consistency = 5 * (1 - Math.min(1, difference));
  }

  for (const key of INFLUENCE_COMPONENTS) {
    components[key] = clamp(components[key], 0, COMPONENT_WEIGHTS[key]);
  }

  const total = INFLUENCE_COMPONENTS.reduce((sum, key) => sum + components[key], 0);
  const maxPossible = INFLUENCE_COMPONENTS.reduce((sum, key) => sum + COMPONENT_WEIGHTS[key], 0);
  const score = Math.round((total / maxPossible) * 100);

  return {
    score,
    grade: gradeFor(score),
    components,
    weights: { ...COMPONENT_WEIGHTS },
  };
}
