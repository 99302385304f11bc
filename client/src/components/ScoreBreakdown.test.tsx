/* @vitest-environment jsdom */
import { act } from "react";
import { createRoot, type Root } from "react-dom/client";
import { afterEach, describe, expect, it } from "vitest";
import type { InfluenceResult } from "../types/analysis";
import ScoreBreakdown from "./ScoreBreakdown";

Object.assign(globalThis, { IS_REACT_ACT_ENVIRONMENT: true });

const influence: InfluenceResult = {
  score: 76,
  grade: "B+ (Major Influencer)",
  components: { reach: 16, engagement: 14, longevity: 15, credibility: 17, impact: 10, consistency: 4 },
  weights: { reach: 25, engagement: 20, longevity: 15, credibility: 25, impact: 10, consistency: 5 },
};

let root: Root | null = null;

afterEach(() => {
  act(() => root?.unmount());
  root = null;
});

async function render(result: InfluenceResult) {
  const container = document.createElement("div");
  root = createRoot(container);
  await act(async () => {
    root?.render(<ScoreBreakdown influence={result} />);
  });
  return container;
}

describe("ScoreBreakdown", () => {
  it("lists every component in order with points and share of weight", async () => {
    const container = await render(influence);
    const rows = [...container.querySelectorAll("li")];

    expect(rows.map((row) => row.dataset.component)).toEqual([
      "reach",
      "engagement",
      "longevity",
      "credibility",
      "impact",
      "consistency",
    ]);
    expect(rows[0]?.textContent).toBe("Reach16.0/25 points (64.0%)");
    expect(rows[3]?.textContent).toBe("Credibility17.0/25 points (68.0%)");
    expect(rows[5]?.textContent).toBe("Consistency4.0/5 points (80.0%)");
  });

  it("sizes each bar by its share of the weight", async () => {
    const container = await render(influence);
    const bar = container.querySelector<HTMLDivElement>('li[data-component="engagement"] .bg-primary-600');

    expect(bar?.style.width).toBe("70%");
  });
});
