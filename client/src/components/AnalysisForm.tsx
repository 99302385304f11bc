import { useState } from "react";
import { AtSign, RefreshCw, Search, Zap } from "lucide-react";
import type { AnalysisRequest, AnalysisResponse } from "../types/analysis";
import { analyzePerson } from "../services/api";

interface AnalysisFormProps {
  onAnalysisStart: () => void;
  onAnalysisComplete: (result: AnalysisResponse) => void;
  onAnalysisError: (message: string) => void;
  isLoading: boolean;
}

const examples = ["Elon Musk", "Bill Gates", "Oprah Winfrey", "Mark Cuban"];

export default function AnalysisForm({
  onAnalysisStart,
  onAnalysisComplete,
  onAnalysisError,
  isLoading,
}: AnalysisFormProps) {
  const [name, setName] = useState("");
  const [twitterHandle, setTwitterHandle] = useState("");
  const [refresh, setRefresh] = useState(false);

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault();

    const request: AnalysisRequest = { name: name.trim(), refresh };
    if (!request.name) return;
    if (twitterHandle.trim()) {
      request.twitterHandle = twitterHandle.trim();
    }

    onAnalysisStart();
    try {
      onAnalysisComplete(await analyzePerson(request));
    } catch (error) {
      console.error("Analysis failed:", error);
      onAnalysisError(
        error instanceof Error ? error.message : "Analysis failed. Please try again."
      );
    }
  };

  return (
    <div className="card max-w-5xl mx-auto">
      <div className="mb-6">
        <h3 className="text-lg font-semibold text-gray-900 mb-2">Analyze a Public Figure</h3>
        <p className="text-sm text-gray-600">
          Combines biographical facts, Twitter activity and news coverage into one influence
          score
        </p>
      </div>

      <form onSubmit={handleSubmit} className="space-y-6">
        <div className="grid grid-cols-1 md:grid-cols-3 gap-6">
          <div className="md:col-span-2">
            <label htmlFor="name" className="block text-sm font-medium text-gray-700 mb-2">
              <div className="flex items-center space-x-2">
                <Search className="h-4 w-4" />
                <span>Name</span>
              </div>
            </label>
            <input
              type="text"
              id="name"
              value={name}
              onChange={(e) => setName(e.target.value)}
              placeholder="e.g., Satya Nadella"
              className="input-field"
              maxLength={120}
              disabled={isLoading}
            />
            <div className="flex flex-wrap gap-2 mt-2">
              {examples.map((example) => (
                <button
                  key={example}
                  type="button"
                  onClick={() => setName(example)}
                  className="text-xs px-2 py-1 rounded-full bg-gray-100 text-gray-700 hover:bg-gray-200"
                  disabled={isLoading}
                >
                  {example}
                </button>
              ))}
            </div>
          </div>

          <div>
            <label htmlFor="twitterHandle" className="block text-sm font-medium text-gray-700 mb-2">
              <div className="flex items-center space-x-2">
                <AtSign className="h-4 w-4" />
                <span>Twitter Handle (optional)</span>
              </div>
            </label>
            <input
              type="text"
              id="twitterHandle"
              value={twitterHandle}
              onChange={(e) => setTwitterHandle(e.target.value)}
              placeholder="Looked up from known handles"
              className="input-field"
              maxLength={16}
              disabled={isLoading}
            />
          </div>
        </div>

        <label className="flex items-center space-x-3">
          <input
            type="checkbox"
            checked={refresh}
            onChange={(e) => setRefresh(e.target.checked)}
            className="h-4 w-4 text-primary-600 focus:ring-primary-500 border-gray-300 rounded"
            disabled={isLoading}
          />
          <div>
            <span className="text-sm font-medium text-gray-700 flex items-center">
              <RefreshCw className="h-3 w-3 mr-1" />
              Fetch fresh data
            </span>
            <p className="text-xs text-gray-500">Ignore analyses cached in the last 24 hours</p>
          </div>
        </label>

        <div className="flex justify-center pt-4">
          <button
            type="submit"
            disabled={isLoading || !name.trim()}
            className="btn-primary flex items-center space-x-2 px-8 py-3 text-lg disabled:opacity-50 disabled:cursor-not-allowed"
          >
            <Zap className="h-5 w-5" />
            <span>{isLoading ? "Analyzing..." : "Calculate Influence"}</span>
          </button>
        </div>
      </form>
    </div>
  );
}
