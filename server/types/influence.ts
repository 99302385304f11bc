export type InfluenceComponent =
  | "reach"
  | "engagement"
  | "longevity"
  | "credibility"
  | "impact"
  | "consistency";

export type ComponentScores = Record<InfluenceComponent, number>;

export interface InfluenceResult {
  score: number; // 0-100
  grade: string;
  components: ComponentScores;
  weights: ComponentScores;
}
