import { DEFAULT_BREACH_INDICATORS, DEFAULT_SPAM_INDICATORS } from './config.js';

export interface KeywordVocabulary {
  breachIndicators: readonly string[];
  spamIndicators: readonly string[];
}

export interface Classification {
  isBreach: boolean;
  breachScore: number;
  spamScore: number;
}

export interface ContentClassifier {
  classify(content: string): Classification;
  isRelevant(content: string): boolean;
}

export const DEFAULT_VOCABULARY: KeywordVocabulary = {
  breachIndicators: DEFAULT_BREACH_INDICATORS,
  spamIndicators: DEFAULT_SPAM_INDICATORS,
};

function prepareIndicators(indicators: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const indicator of indicators) {
    const folded = indicator.toLowerCase();
    if (folded) {
      seen.add(folded);
    }
  }
  return [...seen];
}

/**
 * Number of distinct indicators occurring as substrings of already case-folded text.
 */
export function countIndicators(foldedText: string, indicators: readonly string[]): number {
  let count = 0;
  for (const indicator of indicators) {
    if (foldedText.includes(indicator)) {
      count++;
    }
  }
  return count;
}

/**
 * Keyword heuristic separating breach reports from ads. A message counts as a
 * breach only when breach indicators strictly outnumber spam indicators.
 */
export function createClassifier(vocabulary: KeywordVocabulary = DEFAULT_VOCABULARY): ContentClassifier {
  const breachIndicators = prepareIndicators(vocabulary.breachIndicators);
  const spamIndicators = prepareIndicators(vocabulary.spamIndicators);

  const classify = (content: string): Classification => {
    if (!content) {
      return { isBreach: false, breachScore: 0, spamScore: 0 };
    }

    const folded = content.toLowerCase();
    const breachScore = countIndicators(folded, breachIndicators);
    const spamScore = countIndicators(folded, spamIndicators);

    return {
      isBreach: breachScore > spamScore && breachScore > 0,
      breachScore,
      spamScore,
    };
  };

  return {
    classify,
    isRelevant: (content) => classify(content).isBreach,
  };
}
