/**
 * Text preprocessing for tweet and headline analysis
 *
 * This module handles:
 * - Tokenization: Breaking text into whitespace-separated tokens
 * - Topic extraction: Most frequent content words across a set of texts
 * - Keyword matching: Counting category keywords contained in a text
 */

const LETTERS_ONLY = /^\p{L}+$/u;
const SKIPPED_PREFIXES = ["http", "@", "#"];
const MIN_TOPIC_LENGTH = 5;

export function tokenize(text: string): string[] {
  const withoutUrls = text.replace(/https?:\/\/\S+/g, "");

  return withoutUrls
    .replace(/\s+/g, " ")
    .trim()
    .split(" ")
    .filter((token) => token.length > 0);
}

export function isTopicWord(word: string): boolean {
  return (
    word.length >= MIN_TOPIC_LENGTH &&
    LETTERS_ONLY.test(word) &&
    !SKIPPED_PREFIXES.some((prefix) => word.startsWith(prefix))
  );
}

/**
 * Most frequent topic words, lower-cased. Words with equal counts keep the
 * order in which they were first seen.
 */
export function extractTopics(texts: string[], limit = 5): string[] {
  const counts = new Map<string, number>();

  for (const text of texts) {
    for (const token of tokenize(text)) {
      if (!isTopicWord(token)) continue;
      const word = token.toLowerCase();
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
  }

  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([word]) => word);
}

export function countKeywordMatches(text: string, keywords: string[]): number {
  const haystack = text.toLowerCase();
  return keywords.filter((keyword) => haystack.includes(keyword.toLowerCase()))
    .length;
}

export function capitalize(word: string): string {
  if (!word) return word;
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export default {
  tokenize,
  isTopicWord,
  extractTopics,
  countKeywordMatches,
  capitalize,
};
