import { Award } from "lucide-react";
import type { InfluenceResult } from "../types/analysis";
import { scoreColor } from "../utils/format";
import ScoreBreakdown from "./ScoreBreakdown";
import InfluenceChart from "./visualizations/InfluenceChart";

interface InfluencePanelProps {
  influence: InfluenceResult;
}

export default function InfluencePanel({ influence }: InfluencePanelProps) {
  return (
    <div className="card">
      <h3 className="text-lg font-semibold text-gray-900 mb-4 flex items-center">
        <Award className="h-5 w-5 mr-2 text-primary-600" />
        Influence Rating
      </h3>

      <div className="flex items-baseline space-x-3 mb-6">
        <span className={`text-5xl font-bold ${scoreColor(influence.score)}`}>
          {influence.score}
        </span>
        <span className="text-gray-500">/100</span>
        <span className="text-lg font-medium text-gray-800">{influence.grade}</span>
      </div>

      <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
        <InfluenceChart influence={influence} />
        <ScoreBreakdown influence={influence} />
      </div>
    </div>
  );
}
