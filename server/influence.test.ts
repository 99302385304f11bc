import { describe, expect, it } from "vitest";
import {
  COMPONENT_WEIGHTS,
  calculateInfluenceScore,
  gradeFor,
  netWorthPoints,
  reachPoints,
} from "./influence";
import type { NewsAnalysis } from "./types/news";
import type { PersonDetails } from "./types/person";
import type { TwitterProfile } from "./types/twitter";

const person: PersonDetails = {
  name: "Test Person",
  dob: "unknown",
  age: "unknown",
  netWorth: "$16 billion",
  companies: ["A", "B", "C"],
  charity: "Test Foundation",
};

const twitter: TwitterProfile = {
  username: "testperson",
  name: "Test Person",
  category: "Technology",
  verified: true,
  yearsActive: 12,
  followers: 1_000_000,
  following: 100,
  engagementRate: 0.02,
  contentQuality: 8,
  sentiment: 0.8,
  topics: [],
  postingFrequency: "Unknown",
  monthlyGrowth: [],
  source: "api",
  estimatedFields: ["contentQuality", "monthlyGrowth"],
};

const news: NewsAnalysis = {
  articles: [],
  sentimentScore: 0.2,
  credibilityScore: 0.6,
  credibility: "Moderate Credibility",
  nature: "Neutral",
};

describe("gradeFor", () => {
  it("uses the lower bound of each band", () => {
    expect(gradeFor(90)).toBe("A+ (Elite Influencer)");
    expect(gradeFor(89)).toBe("A (Top-tier Influencer)");
    expect(gradeFor(30)).toBe("D+ (Emerging Influence)");
    expect(gradeFor(29)).toBe("D (Limited Influence)");
  });
});

describe("netWorthPoints", () => {
  it("scores amounts on a log scale capped at 5", () => {
    expect(netWorthPoints("$251 billion")).toBeCloseTo(4.986, 3);
    expect(netWorthPoints("$400 billion")).toBe(5);
    expect(netWorthPoints("$16 billion")).toBe(3);
  });

  it("gives unknown values nothing and unreadable values 1 point", () => {
    expect(netWorthPoints("unknown")).toBe(0);
    expect(netWorthPoints("")).toBe(0);
    expect(netWorthPoints("$0")).toBe(0);
    expect(netWorthPoints("Undisclosed")).toBe(1);
    expect(netWorthPoints("approx. $5 million")).toBe(1);
  });
});

describe("reachPoints", () => {
  it("scales with followers and caps at 20", () => {
    expect(reachPoints(500)).toBe(4);
    expect(reachPoints(1_000_000)).toBeCloseTo(16);
    expect(reachPoints(100_000_000)).toBe(20);
  });
});

describe("calculateInfluenceScore", () => {
  it("combines details, Twitter and news into a grade", () => {
    const result = calculateInfluenceScore(person, twitter, news);

    expect(result.components.reach).toBeCloseTo(16);
    expect(result.components.engagement).toBeCloseTo(14);
    expect(result.components.longevity).toBe(15);
    expect(result.components.credibility).toBeCloseTo(17);
    expect(result.components.impact).toBe(10);
    expect(result.components.consistency).toBeCloseTo(4);
    expect(result.score).toBe(76);
    expect(result.grade).toBe("B+ (Major Influencer)");
    expect(result.weights).toEqual(COMPONENT_WEIGHTS);
  });

  it("ignores synthetic Twitter profiles", () => {
    const result = calculateInfluenceScore(null, { ...twitter, source: "synthetic" }, null);

    expect(result.score).toBe(0);
    expect(result.grade).toBe("D (Limited Influence)");
  });

  it("scores news credibility without Twitter data", () => {
    const result = calculateInfluenceScore(null, null, news);

    expect(result.components.credibility).toBeCloseTo(12);
    expect(result.components.consistency).toBe(0);
    expect(result.score).toBe(12);
  });

  it("keeps every component within its weight", () => {
    // reach tops out at 20 of its 25 points
    const result = calculateInfluenceScore(
      { ...person, netWorth: "$900 billion", companies: ["A", "B", "C", "D", "E", "F"] },
      { ...twitter, followers: 500_000_000, engagementRate: 0.5, contentQuality: 10, yearsActive: 20 },
      { ...news, credibilityScore: 2, sentimentScore: 0.6 }
    );

    expect(result.components).toEqual({ ...COMPONENT_WEIGHTS, reach: 20 });
    expect(result.score).toBe(95);
  });
});
