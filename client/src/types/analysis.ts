export interface PersonDetails {
  name: string;
  dob: string;
  age: string;
  netWorth: string;
  charity: string;
  companies: string[];
}

export interface MonthlyGrowth {
  month: string;
  followers: number;
  growthPct: number;
}

export type EstimatedField = "engagementRate" | "contentQuality" | "monthlyGrowth";

export interface TwitterProfile {
  username: string;
  name: string;
  category: string;
  verified: boolean;
  yearsActive: number;
  followers: number;
  following: number;
  engagementRate: number;
  contentQuality: number;
  sentiment: number;
  topics: string[];
  postingFrequency: string;
  monthlyGrowth: MonthlyGrowth[];
  source: "api" | "synthetic";
  estimatedFields: EstimatedField[];
}

export interface NewsArticle {
  title: string;
  url: string;
  publishedAt: string;
  source: string;
}

export interface NewsAnalysis {
  articles: NewsArticle[];
  sentimentScore: number;
  credibilityScore: number;
  credibility: "High Credibility" | "Moderate Credibility" | "Low Credibility";
  nature: "Positive" | "Neutral" | "Negative";
}

export type InfluenceComponent =
  | "reach"
  | "engagement"
  | "longevity"
  | "credibility"
  | "impact"
  | "consistency";

export interface InfluenceResult {
  score: number;
  grade: string;
  components: Record<InfluenceComponent, number>;
  weights: Record<InfluenceComponent, number>;
}

export interface PersonAnalysis {
  id: string;
  name: string;
  normalizedName: string;
  imageUrl: string | null;
  details: PersonDetails | null;
  twitterHandle: string | null;
  twitter: TwitterProfile | null;
  news: NewsAnalysis | null;
  influence: InfluenceResult;
  warnings: string[];
  createdAt: string;
}

export interface AnalysisSummary {
  id: string;
  name: string;
  score: number;
  grade: string;
  twitterHandle: string | null;
  createdAt: string;
}

export interface AnalysisRequest {
  name: string;
  twitterHandle?: string;
  refresh?: boolean;
}

export interface AnalysisResponse {
  success: boolean;
  cached: boolean;
  data: PersonAnalysis;
  message?: string;
}
