import { AlertTriangle } from "lucide-react";
import type { PersonAnalysis } from "../types/analysis";
import InfluencePanel from "./InfluencePanel";
import NewsPanel from "./NewsPanel";
import PersonOverview from "./PersonOverview";
import TwitterPanel from "./TwitterPanel";

interface DashboardProps {
  analysis: PersonAnalysis;
}

export default function Dashboard({ analysis }: DashboardProps) {
  return (
    <div className="space-y-6">
      {analysis.warnings.length > 0 && (
        <div className="rounded-md bg-yellow-50 border-l-4 border-yellow-400 p-4">
          <div className="flex">
            <AlertTriangle className="h-5 w-5 text-yellow-500 flex-shrink-0" />
            <ul className="ml-3 text-sm text-yellow-800 space-y-1">
              {analysis.warnings.map((warning) => (
                <li key={warning}>{warning}</li>
              ))}
            </ul>
          </div>
        </div>
      )}

      <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
        <PersonOverview analysis={analysis} />
        <InfluencePanel influence={analysis.influence} />
      </div>

      <TwitterPanel profile={analysis.twitter} handle={analysis.twitterHandle} />
      <NewsPanel news={analysis.news} />
    </div>
  );
}
