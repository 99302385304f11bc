import {
  GoogleGenerativeAI,
  type GenerativeModel,
} from "@google/generative-ai";
import { ExternalServiceError, errorMessage } from "./errors";
import {
  UNKNOWN,
  type DetailsParseError,
  type PersonDetails,
  type RawPersonDetails,
} from "./types/person";

export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

export class GeminiClient implements TextGenerator {
  private model: GenerativeModel;

  constructor(apiKey: string, modelName: string) {
    const genAI = new GoogleGenerativeAI(apiKey);
    this.model = genAI.getGenerativeModel({ model: modelName });
  }

  async generate(prompt: string): Promise<string> {
    const result = await this.model.generateContent(prompt);
    return result.response.text();
  }
}

export function buildPersonPrompt(name: string): string {
  return `
    Provide detailed information about ${name} in valid JSON format with double quotes.
    Ensure the response is strictly JSON, no extra text.
    The format should be:
    {
      "full_name": "value",
      "dob": "value",
      "age": "value",
      "net_worth": "value",
      "charity": "value",
      "companies": ["company1", "company2"]
    }
    If any value is unknown, use "unknown".
    `;
}

/**
 * Ask the model about a person and return its raw text answer.
 */
export async function fetchPersonDetails(
  generator: TextGenerator | null,
  name: string
): Promise<string> {
  if (!generator) {
    throw new ExternalServiceError("gemini", "GEMINI_API_KEY is not configured");
  }

  try {
    const text = await generator.generate(buildPersonPrompt(name));
    return text.trim();
  } catch (error) {
    throw new ExternalServiceError("gemini", errorMessage(error));
  }
}

export function isParseError(
  value: RawPersonDetails | DetailsParseError
): value is DetailsParseError {
  return typeof value.error === "string" && typeof value.rawResponse === "string";
}

/**
 * Extract the JSON object from a model answer. Answers wrapped in a
 * ```json fenced block are unwrapped first.
 */
export function parsePersonDetails(
  rawResponse: string
): RawPersonDetails | DetailsParseError {
  const fenced = rawResponse.match(/```json\s*([\s\S]*?)\s*```/);
  const jsonString = fenced?.[1] !== undefined ? fenced[1].trim() : rawResponse.trim();

  try {
    const parsed: unknown = JSON.parse(jsonString);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      return { error: "Failed to parse JSON", rawResponse };
    }
    return Object.fromEntries(Object.entries(parsed));
  } catch {
    return { error: "Failed to parse JSON", rawResponse };
  }
}

function textField(value: unknown): string {
  if (typeof value === "string" && value.trim() !== "") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return UNKNOWN;
}

function listField(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

export function cleanPersonDetails(data: RawPersonDetails): PersonDetails {
  return {
    name: textField(data.full_name),
    dob: textField(data.dob),
    age: textField(data.age),
    netWorth: textField(data.net_worth),
    charity: textField(data.charity),
    companies: listField(data.companies),
  };
}

export async function getPersonDetails(
  generator: TextGenerator | null,
  name: string
): Promise<PersonDetails> {
  console.log(`🤖 Asking Gemini about "${name}"...`);
  const raw = await fetchPersonDetails(generator, name);
  const parsed = parsePersonDetails(raw);

  if (isParseError(parsed)) {
    console.warn(`⚠️ Gemini answer for "${name}" was not valid JSON`);
    throw new ExternalServiceError("gemini", parsed.error);
  }

  return cleanPersonDetails(parsed);
}
