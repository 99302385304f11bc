import type { PersonDetails } from "./person";
import type { TwitterProfile } from "./twitter";
import type { NewsAnalysis } from "./news";
import type { InfluenceResult } from "./influence";

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

export interface AnalyzeOptions {
  twitterHandle?: string;
  refresh?: boolean;
}

export interface AnalysisOutcome {
  analysis: PersonAnalysis;
  cached: boolean;
}
