import type { InfluenceResult } from "../types/analysis";
import { COMPONENT_LABELS, COMPONENT_ORDER, componentPercent } from "../utils/format";

interface ScoreBreakdownProps {
  influence: InfluenceResult;
}

export default function ScoreBreakdown({ influence }: ScoreBreakdownProps) {
  return (
    <ul className="space-y-3">
      {COMPONENT_ORDER.map((component) => {
        const points = influence.components[component];
        const weight = influence.weights[component];
        const percent = componentPercent(points, weight);

        return (
          <li key={component} data-component={component}>
            <div className="flex justify-between text-sm mb-1">
              <span className="font-medium text-gray-700">{COMPONENT_LABELS[component]}</span>
              <span className="text-gray-600">
                {points.toFixed(1)}/{weight} points ({percent.toFixed(1)}%)
              </span>
            </div>
            <div className="w-full bg-gray-200 rounded-full h-2">
              <div
                className="bg-primary-600 h-2 rounded-full"
                style={{ width: `${percent}%` }}
              ></div>
            </div>
          </li>
        );
      })}
    </ul>
  );
}
