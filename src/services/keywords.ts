import type { PromptStyle } from '../types/index.js';

export const MAX_KEYWORDS = 10;
const MIN_KEYWORD_LENGTH = 4;

const STOP_WORDS = new Set([
  'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for', 'of',
  'with', 'by', 'is', 'are', 'was', 'were', 'this', 'that', 'these', 'those',
  'from', 'have', 'has', 'been', 'which', 'their', 'there', 'they', 'also',
  'into', 'such', 'than', 'then', 'about',
]);

const EDGE_PUNCTUATION = /^[.,!?;:"()[\]{}]+|[.,!?;:"()[\]{}]+$/g;

/**
 * Words of at least four characters that appear more than once in `text`,
 * lower-cased, stripped of surrounding punctuation and stop words, in order
 * of first appearance. At most MAX_KEYWORDS are returned.
 */
export function extractKeywords(text: string): string[] {
  const counts = new Map<string, number>();
  for (const raw of text.toLowerCase().split(/\s+/)) {
    const word = raw.replace(EDGE_PUNCTUATION, '');
    if (word.length < MIN_KEYWORD_LENGTH || STOP_WORDS.has(word)) {
      continue;
    }
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }

  const keywords: string[] = [];
  for (const [word, count] of counts) {
    if (count > 1) {
      keywords.push(word);
      if (keywords.length === MAX_KEYWORDS) {
        break;
      }
    }
  }
  return keywords;
}

export function generateSuggestions(topic: string, style: PromptStyle): string[] {
  const suggestions = [`History of ${topic}`, `Modern developments in ${topic}`, `Key figures in ${topic}`];

  switch (style) {
    case 'academic':
      suggestions.push(`Research methodologies in ${topic}`, `Theoretical frameworks of ${topic}`);
      break;
    case 'casual':
      suggestions.push(`Fun facts about ${topic}`, `Everyday applications of ${topic}`);
      break;
    default:
      break;
  }
  return suggestions;
}
