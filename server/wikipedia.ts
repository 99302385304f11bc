import axios, { type AxiosInstance } from "axios";
import { ExternalServiceError, errorMessage } from "./errors";

const WIKIPEDIA_API_URL = "https://en.wikipedia.org/w/api.php";

interface PageImagesResponse {
  query?: {
    redirects?: { from: string; to: string }[];
    pages?: Record<
      string,
      {
        title?: string;
        thumbnail?: { source: string; width?: number; height?: number };
      }
    >;
  };
}

const wikipedia = axios.create({
  baseURL: WIKIPEDIA_API_URL,
  timeout: 10000,
  headers: { "User-Agent": "InfluenceIQ/1.0 (influence scoring service)" },
});

/**
 * Thumbnail URL of the Wikipedia page titled after the person, or null
 * when the page has no image.
 */
export async function getWikipediaImage(
  name: string,
  http: AxiosInstance = wikipedia
): Promise<string | null> {
  let data: PageImagesResponse;
  try {
    const response = await http.get<PageImagesResponse>("", {
      params: {
        action: "query",
        titles: name,
        prop: "pageimages",
        format: "json",
        pithumbsize: 400,
        redirects: 1,
      },
    });
    data = response.data;
  } catch (error) {
    throw new ExternalServiceError("wikipedia", errorMessage(error));
  }

  const pages = data.query?.pages;
  if (!pages) return null;

  const [firstPage] = Object.values(pages);
  return firstPage?.thumbnail?.source ?? null;
}
