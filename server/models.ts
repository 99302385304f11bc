import mongoose, { Schema } from "mongoose";
import type { PersonDetails } from "./types/person";
import type { TwitterProfile } from "./types/twitter";
import type { NewsAnalysis } from "./types/news";
import type { InfluenceResult } from "./types/influence";

export interface PersonAnalysisRecord {
  analysisId: string;
  name: string;
  normalizedName: string;
  imageUrl: string | null;
  details: PersonDetails | null;
  twitterHandle: string | null;
  twitter: TwitterProfile | null;
  news: NewsAnalysis | null;
  influence: InfluenceResult;
  warnings: string[];
  createdAt: Date;
}

const detailsSchema = new Schema(
  {
    name: String,
    dob: String,
    age: String,
    netWorth: String,
    charity: String,
    companies: [String],
  },
  { _id: false }
);

const monthlyGrowthSchema = new Schema(
  {
    month: String,
    followers: Number,
    growthPct: Number,
  },
  { _id: false }
);

const twitterProfileSchema = new Schema(
  {
    username: String,
    name: String,
    category: String,
    verified: Boolean,
    yearsActive: Number,
    followers: Number,
    following: Number,
    engagementRate: Number,
    contentQuality: Number,
    sentiment: Number,
    topics: [String],
    postingFrequency: String,
    monthlyGrowth: [monthlyGrowthSchema],
    source: String,
    estimatedFields: [String],
  },
  { _id: false }
);

const newsArticleSchema = new Schema(
  {
    title: String,
    url: String,
    publishedAt: String,
    source: String,
  },
  { _id: false }
);

const newsAnalysisSchema = new Schema(
  {
    articles: [newsArticleSchema],
    sentimentScore: Number,
    credibilityScore: Number,
    credibility: String,
    nature: String,
  },
  { _id: false }
);

const componentScoresSchema = new Schema(
  {
    reach: Number,
    engagement: Number,
    longevity: Number,
    credibility: Number,
    impact: Number,
    consistency: Number,
  },
  { _id: false }
);

const influenceSchema = new Schema(
  {
    score: Number,
    grade: String,
    components: componentScoresSchema,
    weights: componentScoresSchema,
  },
  { _id: false }
);

const personAnalysisSchema = new Schema<PersonAnalysisRecord>({
  analysisId: { type: String, required: true, unique: true },
  name: { type: String, required: true },
  normalizedName: { type: String, required: true, index: true },
  imageUrl: { type: String, default: null },
  details: { type: detailsSchema, default: null },
  twitterHandle: { type: String, default: null },
  twitter: { type: twitterProfileSchema, default: null },
  news: { type: newsAnalysisSchema, default: null },
  influence: { type: influenceSchema, required: true },
  warnings: { type: [String], default: [] },
  createdAt: { type: Date, default: Date.now, index: true },
});

export const PersonAnalysisModel = mongoose.model<PersonAnalysisRecord>(
  "PersonAnalysis",
  personAnalysisSchema
);
