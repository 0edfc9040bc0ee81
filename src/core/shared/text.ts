const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'how', 'in', 'is', 'it',
  'of', 'on', 'or', 'that', 'the', 'this', 'to', 'what', 'when', 'which', 'why', 'with', 'your',
]);

export const normalizeWhitespace = (value: string): string => value.replace(/\s+/g, ' ').trim();

export const stripTrailingPunctuation = (value: string): string => value.trim().replace(/[.!?;:]+$/, '');

/** Lower-cased words with punctuation removed and stop words dropped. */
export const significantWords = (value: string): string[] => {
  return value
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length > 0 && !STOP_WORDS.has(word));
};

export const formatPercent = (score: number): string => `${Math.round(score * 100)}%`;

export const bulletList = (items: string[]): string => items.map((item) => `- ${item}`).join('\n');
