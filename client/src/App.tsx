import { useEffect, useState } from "react";
import { Award, BarChart3, CheckCircle, Search, XCircle } from "lucide-react";
import AnalysisForm from "./components/AnalysisForm";
import Dashboard from "./components/Dashboard";
import RecentQueries from "./components/RecentQueries";
import { getAnalysis, healthCheck, testAPI } from "./services/api";
import type { AnalysisResponse } from "./types/analysis";

function App() {
  const [currentAnalysis, setCurrentAnalysis] = useState<AnalysisResponse | null>(null);
  const [isLoading, setIsLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [recentKey, setRecentKey] = useState(0);
  const [apiStatus, setApiStatus] = useState({
    connected: false,
    loading: true,
    message: "Checking connection...",
  });

  // Test API connection on component mount
  useEffect(() => {
    const testConnection = async () => {
      try {
        const [healthResult, testResult] = await Promise.all([healthCheck(), testAPI()]);
        setApiStatus({
          connected: true,
          message: `Connected to API - ${healthResult.message}`,
          loading: false,
        });
        console.log("API Test Result:", testResult);
      } catch (err) {
        setApiStatus({
          connected: false,
          message: `Failed to connect to API: ${
            err instanceof Error ? err.message : "Unknown error"
          }`,
          loading: false,
        });
      }
    };

    void testConnection();
  }, []);

  const handleAnalysisStart = () => {
    setIsLoading(true);
    setError(null);
    setCurrentAnalysis(null);
  };

  const handleAnalysisComplete = (result: AnalysisResponse) => {
    setCurrentAnalysis(result);
    setIsLoading(false);
    setRecentKey((key) => key + 1);
  };

  const handleAnalysisError = (message: string) => {
    setError(message);
    setIsLoading(false);
  };

  const handleLoadCachedQuery = async (id: string) => {
    handleAnalysisStart();
    try {
      setCurrentAnalysis(await getAnalysis(id));
    } catch (err) {
      console.error("Error loading cached analysis:", err);
      setError(err instanceof Error ? err.message : "Failed to load analysis");
    } finally {
      setIsLoading(false);
    }
  };

  // Handle clicking on logo/title to return to home page
  const handleGoHome = () => {
    setCurrentAnalysis(null);
    setIsLoading(false);
    setError(null);
  };

  return (
    <div className="min-h-screen bg-gray-50">
      <header className="bg-white shadow-sm border-b border-gray-200">
        <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8">
          <div className="flex justify-between items-center py-6">
            <button
              onClick={handleGoHome}
              className="flex items-center space-x-3 hover:opacity-80 transition-opacity duration-200 cursor-pointer group"
            >
              <div className="bg-blue-600 p-2 rounded-lg group-hover:bg-blue-700 transition-colors duration-200">
                <BarChart3 className="h-6 w-6 text-white" />
              </div>
              <div className="text-left">
                <h1 className="text-2xl font-bold text-gray-900 group-hover:text-blue-600 transition-colors duration-200">
                  Influence IQ
                </h1>
                <p className="text-sm text-gray-600">
                  Influence scoring from biography, Twitter and news coverage
                </p>
              </div>
            </button>

            <div className="flex items-center space-x-2" title={apiStatus.message}>
              {apiStatus.loading ? (
                <div className="loading-spinner"></div>
              ) : apiStatus.connected ? (
                <CheckCircle className="h-5 w-5 text-green-500" />
              ) : (
                <XCircle className="h-5 w-5 text-red-500" />
              )}
              <span
                className={`text-sm ${apiStatus.connected ? "text-green-600" : "text-red-600"}`}
              >
                {apiStatus.connected ? "API Connected" : "API Disconnected"}
              </span>
            </div>

            {currentAnalysis && (
              <div className="hidden md:flex items-center space-x-2 text-sm text-gray-600">
                <Award className="h-4 w-4" />
                <span>
                  {currentAnalysis.data.influence.score}/100 ·{" "}
                  {currentAnalysis.data.influence.grade}
                </span>
              </div>
            )}
          </div>
        </div>
      </header>

      {!apiStatus.loading && !apiStatus.connected && (
        <div className="bg-red-50 border-l-4 border-red-400 p-4">
          <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8">
            <div className="flex">
              <XCircle className="h-5 w-5 text-red-400 flex-shrink-0" />
              <div className="ml-3">
                <p className="text-sm text-red-700">{apiStatus.message}</p>
                <p className="text-xs text-red-600 mt-1">
                  Make sure the backend server is running and accessible
                </p>
              </div>
            </div>
          </div>
        </div>
      )}

      <main className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-8">
        {error && (
          <div className="mb-6 rounded-md bg-red-50 border border-red-200 p-4 text-sm text-red-700">
            {error}
          </div>
        )}

        {!currentAnalysis && !isLoading && (
          <div>
            <div className="text-center py-12">
              <Search className="h-16 w-16 text-gray-400 mx-auto mb-4" />
              <h2 className="text-3xl font-bold text-gray-900 mb-2">
                How influential is someone, really?
              </h2>
              <p className="text-lg text-gray-600 mb-8 max-w-2xl mx-auto">
                Enter a public figure's name to combine their background, Twitter reach and
                news credibility into a single influence score.
              </p>
            </div>

            <div className="grid grid-cols-1 lg:grid-cols-3 gap-8">
              <div className="lg:col-span-2">
                <AnalysisForm
                  onAnalysisStart={handleAnalysisStart}
                  onAnalysisComplete={handleAnalysisComplete}
                  onAnalysisError={handleAnalysisError}
                  isLoading={isLoading}
                />
              </div>
              <div className="lg:col-span-1">
                <RecentQueries
                  onLoadQuery={(id) => void handleLoadCachedQuery(id)}
                  refreshKey={recentKey}
                />
              </div>
            </div>
          </div>
        )}

        {isLoading && (
          <div className="text-center py-12">
            <div className="loading-spinner mx-auto mb-4"></div>
            <h3 className="text-xl font-semibold text-gray-900 mb-2">Calculating influence...</h3>
            <p className="text-gray-600">
              Gathering details, Twitter activity and news coverage. This can take a minute.
            </p>
          </div>
        )}

        {currentAnalysis && !isLoading && (
          <div className="space-y-6">
            <AnalysisForm
              onAnalysisStart={handleAnalysisStart}
              onAnalysisComplete={handleAnalysisComplete}
              onAnalysisError={handleAnalysisError}
              isLoading={isLoading}
            />

            <div className="flex flex-wrap items-center gap-3 text-sm text-gray-600">
              <h2 className="text-xl font-bold text-gray-900">
                Results: "{currentAnalysis.data.name}"
              </h2>
              {currentAnalysis.cached && (
                <span className="bg-green-100 text-green-800 px-2 py-1 rounded-full text-xs font-medium">
                  Cached Result
                </span>
              )}
              {currentAnalysis.message && (
                <span className="bg-blue-100 text-blue-800 px-2 py-1 rounded-full text-xs font-medium">
                  {currentAnalysis.message}
                </span>
              )}
            </div>

            <div className="animate-fade-in">
              <Dashboard analysis={currentAnalysis.data} />
            </div>
          </div>
        )}
      </main>

      <footer className="bg-white border-t border-gray-200 mt-16">
        <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-6">
          <div className="text-center text-sm text-gray-500">
            <p>
              Details via Gemini • Sentiment via VADER • Data from Twitter, Wikipedia and news
              feeds
            </p>
          </div>
        </div>
      </footer>
    </div>
  );
}

export default App;
