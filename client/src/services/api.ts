import axios, { isAxiosError } from "axios";
import type {
  AnalysisRequest,
  AnalysisResponse,
  AnalysisSummary,
} from "../types/analysis";

// Empty string means same origin, which is how the server serves the built client
const API_BASE_URL = import.meta.env.VITE_API_URL ?? "http://localhost:3001";

const api = axios.create({
  baseURL: API_BASE_URL,
  timeout: 120000, // Gemini, Twitter and every news feed in one request
  headers: {
    "Content-Type": "application/json",
  },
});

api.interceptors.request.use((config) => {
  console.log(`API Request: ${config.method?.toUpperCase()} ${config.url}`);
  return config;
});

api.interceptors.response.use(
  (response) => {
    console.log(`API Response: ${response.status} ${response.config.url}`);
    return response;
  },
  (error: unknown) => {
    if (!isAxiosError(error)) throw error;
    console.error("API Response Error:", error.response?.data ?? error.message);

    const status = error.response?.status ?? 0;
    const serverMessage = apiErrorMessage(error.response?.data);
    if (status === 429) {
      throw new Error("Too many requests. Please wait a moment and try again.");
    } else if (status >= 500 && !serverMessage) {
      throw new Error("Server error. Please try again later.");
    } else if (error.code === "ECONNABORTED") {
      throw new Error("Request timeout. The analysis is taking longer than expected.");
    }

    throw new Error(serverMessage ?? error.message);
  }
);

/**
 * The `error` field of an API error body, if there is one.
 */
export function apiErrorMessage(body: unknown): string | undefined {
  if (typeof body === "object" && body !== null && "error" in body) {
    return typeof body.error === "string" ? body.error : undefined;
  }
  return undefined;
}

export async function testAPI(): Promise<{
  success: boolean;
  message: string;
  endpoints: string[];
}> {
  const response = await api.get("/api/test");
  return response.data;
}

export async function healthCheck(): Promise<{
  status: string;
  timestamp: string;
  message: string;
}> {
  const response = await api.get("/health");
  return response.data;
}

/**
 * Analyze a public figure. Resolves with the cached analysis when one from
 * the last day exists, unless `refresh` is set.
 */
export async function analyzePerson(request: AnalysisRequest): Promise<AnalysisResponse> {
  const response = await api.post<AnalysisResponse>("/api/analyze", request);
  return response.data;
}

export async function getAnalysis(id: string): Promise<AnalysisResponse> {
  const response = await api.get<AnalysisResponse>(`/api/analysis/${encodeURIComponent(id)}`);
  return response.data;
}

export async function getRecentAnalyses(limit = 10): Promise<AnalysisSummary[]> {
  const response = await api.get<{ success: boolean; data: AnalysisSummary[] }>(
    "/api/recent",
    { params: { limit } }
  );
  return response.data.data;
}

export default api;
