export interface TwitterUserMetrics {
  followers_count: number;
  following_count: number;
  tweet_count?: number;
  listed_count?: number;
}

export interface TwitterUser {
  id: string;
  name: string;
  username: string;
  description?: string;
  created_at?: string;
  verified?: boolean;
  public_metrics?: TwitterUserMetrics;
}

export interface TweetMetrics {
  like_count: number;
  retweet_count: number;
  reply_count: number;
  quote_count?: number;
}

export interface Tweet {
  id: string;
  text: string;
  created_at?: string;
  public_metrics?: TweetMetrics;
}

export interface TweetAnalysis {
  sentiment: number; // 0-1, 0.5 is neutral
  avgEngagement: number;
  topics: string[];
  postingFrequency: string;
}

export interface MonthlyGrowth {
  month: string;
  followers: number;
  growthPct: number;
}

export interface EstimatedMetrics {
  followers: number;
  following: number;
  engagementRate: number;
  contentQuality: number;
  monthlyGrowth: MonthlyGrowth[];
}

export type EstimatedField = "engagementRate" | "contentQuality" | "monthlyGrowth";

export type ProfileSource = "api" | "synthetic";

export interface TwitterProfile {
  username: string;
  name: string;
  category: string;
  verified: boolean;
  yearsActive: number;
  followers: number;
  following: number;
  engagementRate: number; // fraction, 0.02 = 2%
  contentQuality: number; // 0-10
  sentiment: number; // 0-1
  topics: string[];
  postingFrequency: string;
  monthlyGrowth: MonthlyGrowth[];
  source: ProfileSource;
  estimatedFields: EstimatedField[];
}
