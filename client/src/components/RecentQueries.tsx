import { useCallback, useEffect, useState } from "react";
import { Award, Clock, Search } from "lucide-react";
import { formatDistanceToNow, parseISO } from "date-fns";
import { getRecentAnalyses } from "../services/api";
import type { AnalysisSummary } from "../types/analysis";
import { scoreColor } from "../utils/format";

interface RecentQueriesProps {
  onLoadQuery: (id: string) => void;
  /** Changes whenever a new analysis finishes, to refetch the list. */
  refreshKey?: number;
}

export default function RecentQueries({ onLoadQuery, refreshKey = 0 }: RecentQueriesProps) {
  const [recentQueries, setRecentQueries] = useState<AnalysisSummary[]>([]);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  const fetchRecentQueries = useCallback(async () => {
    try {
      setLoading(true);
      setRecentQueries(await getRecentAnalyses(10));
      setError(null);
    } catch (err) {
      setError("Failed to connect to server");
      console.error("Error fetching recent queries:", err);
    } finally {
      setLoading(false);
    }
  }, []);

  useEffect(() => {
    void fetchRecentQueries();
  }, [fetchRecentQueries, refreshKey]);

  const header = (
    <h3 className="text-lg font-semibold text-gray-900 flex items-center">
      <Clock className="h-5 w-5 mr-2" />
      Recent Analyses
    </h3>
  );

  if (loading) {
    return (
      <div className="card">
        <div className="mb-4">{header}</div>
        <div className="animate-pulse space-y-3">
          {[...Array(5)].map((_, i) => (
            <div key={i} className="h-14 bg-gray-200 rounded"></div>
          ))}
        </div>
      </div>
    );
  }

  if (error) {
    return (
      <div className="card">
        <div className="mb-4">{header}</div>
        <div className="text-center py-8">
          <div className="text-red-600 mb-2">{error}</div>
          <button
            onClick={() => void fetchRecentQueries()}
            className="text-blue-600 hover:text-blue-800 text-sm"
          >
            Try again
          </button>
        </div>
      </div>
    );
  }

  return (
    <div className="card">
      <div className="flex items-center justify-between mb-4">
        {header}
        <button
          onClick={() => void fetchRecentQueries()}
          className="text-sm text-gray-500 hover:text-gray-700"
        >
          Refresh
        </button>
      </div>

      {recentQueries.length === 0 ? (
        <div className="text-center py-8 text-gray-500">
          <Search className="h-8 w-8 mx-auto mb-2 opacity-50" />
          <p>No analyses yet</p>
          <p className="text-sm">Analyze someone to see results here</p>
        </div>
      ) : (
        <div className="space-y-3">
          {recentQueries.map((query) => (
            <button
              key={query.id}
              type="button"
              className="w-full text-left border border-gray-200 rounded-lg p-4 hover:bg-gray-50 transition-colors"
              onClick={() => onLoadQuery(query.id)}
            >
              <div className="flex items-start justify-between">
                <div className="min-w-0">
                  <h4 className="font-medium text-gray-900 truncate">{query.name}</h4>
                  <p className="text-xs text-gray-500">
                    {query.twitterHandle ? `@${query.twitterHandle} · ` : ""}
                    {formatDistanceToNow(parseISO(query.createdAt), { addSuffix: true })}
                  </p>
                </div>
                <div className="text-right">
                  <div className={`flex items-center font-bold ${scoreColor(query.score)}`}>
                    <Award className="h-4 w-4 mr-1" />
                    {query.score}
                  </div>
                  <p className="text-xs text-gray-500">{query.grade.split(" ")[0]}</p>
                </div>
              </div>
            </button>
          ))}
        </div>
      )}
    </div>
  );
}
