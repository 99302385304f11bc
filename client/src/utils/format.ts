import { format, isValid, parseISO } from "date-fns";
import type { InfluenceComponent } from "../types/analysis";

export const COMPONENT_LABELS: Record<InfluenceComponent, string> = {
  reach: "Reach",
  engagement: "Engagement",
  longevity: "Longevity",
  credibility: "Credibility",
  impact: "Impact",
  consistency: "Consistency",
};

export const COMPONENT_ORDER: InfluenceComponent[] = [
  "reach",
  "engagement",
  "longevity",
  "credibility",
  "impact",
  "consistency",
];

/** 1234567 -> "1.2M", 45300 -> "45.3K" */
export function formatCount(value: number): string {
  if (value >= 1_000_000) return `${(value / 1_000_000).toFixed(1)}M`;
  if (value >= 1_000) return `${(value / 1_000).toFixed(1)}K`;
  return String(value);
}

export function formatPercent(fraction: number, digits = 2): string {
  return `${(fraction * 100).toFixed(digits)}%`;
}

export function isUnknown(value: string | null | undefined): boolean {
  return !value || value.trim().toLowerCase() === "unknown";
}

/**
 * Feed dates are ISO strings or RFC 822 dates; anything else is shown as-is.
 */
export function formatArticleDate(publishedAt: string): string {
  const iso = parseISO(publishedAt);
  const date = isValid(iso) ? iso : new Date(publishedAt);
  return isValid(date) ? format(date, "MMM d, yyyy") : publishedAt;
}

export function scoreColor(score: number): string {
  if (score >= 70) return "text-green-600";
  if (score >= 40) return "text-yellow-600";
  return "text-red-600";
}

export function credibilityBadge(credibility: string): string {
  if (credibility.startsWith("High")) return "bg-green-100 text-green-800";
  if (credibility.startsWith("Moderate")) return "bg-yellow-100 text-yellow-800";
  return "bg-red-100 text-red-800";
}

/** Share of the component's weight, 0-100. */
export function componentPercent(points: number, weight: number): number {
  if (weight <= 0) return 0;
  return Math.round((points / weight) * 1000) / 10;
}
