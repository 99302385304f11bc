export const UNKNOWN = "unknown";

/**
 * Biographical facts returned by the language model, cleaned so every
 * field is present. Unknown values are the literal string "unknown".
 */
export interface PersonDetails {
  name: string;
  dob: string;
  age: string;
  netWorth: string;
  charity: string;
  companies: string[];
}

export interface DetailsParseError {
  error: string;
  rawResponse: string;
}

export type RawPersonDetails = Record<string, unknown>;
