import { ExternalLink, Newspaper } from "lucide-react";
import type { NewsAnalysis } from "../types/analysis";
import { credibilityBadge, formatArticleDate } from "../utils/format";

interface NewsPanelProps {
  news: NewsAnalysis | null;
}

export default function NewsPanel({ news }: NewsPanelProps) {
  return (
    <div className="card">
      <h3 className="text-lg font-semibold text-gray-900 mb-4 flex items-center">
        <Newspaper className="h-5 w-5 mr-2 text-gray-600" />
        News Coverage
      </h3>

      {!news ? (
        <p className="text-sm text-gray-500">No relevant news articles found.</p>
      ) : (
        <>
          <div className="flex flex-wrap items-center gap-3 mb-4 text-sm">
            <span className={`px-2 py-1 rounded-full text-xs font-medium ${credibilityBadge(news.credibility)}`}>
              {news.credibility}
            </span>
            <span className="text-gray-600">
              Nature: <strong>{news.nature}</strong>
            </span>
            <span className="text-gray-600">
              Sentiment: <strong>{news.sentimentScore.toFixed(2)}</strong>
            </span>
            <span className="text-gray-600">
              Credibility Score: <strong>{news.credibilityScore.toFixed(2)}</strong>
            </span>
          </div>

          <ul className="divide-y divide-gray-100">
            {news.articles.map((article) => (
              <li key={article.url} className="py-3">
                <a
                  href={article.url}
                  target="_blank"
                  rel="noopener noreferrer"
                  className="font-medium text-gray-900 hover:text-primary-600 inline-flex items-center"
                >
                  {article.title}
                  <ExternalLink className="h-3 w-3 ml-1" />
                </a>
                <p className="text-xs text-gray-500">
                  {article.source} · {formatArticleDate(article.publishedAt)}
                </p>
              </li>
            ))}
          </ul>
        </>
      )}
    </div>
  );
}
