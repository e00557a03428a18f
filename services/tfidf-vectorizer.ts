import { fail, ok, type TriageResult } from "./result.js";

export type SparseVector = ReadonlyMap<number, number>;

export type TfidfVectorizerOptions = {
  maxFeatures?: number;
};

export type FittedTfidfVectorizer = {
  readonly documentCount: number;
  readonly vocabularySize: number;
  vocabulary: () => ReadonlyMap<string, number>;
  idf: (term: string) => number | null;
  transform: (text: string) => SparseVector;
};

export const DEFAULT_MAX_FEATURES = 1000;

// Two or more word characters; single letters such as "i" or "a" never become features.
const TERM_PATTERN = /[\p{L}\p{M}\p{N}_]{2,}/gu;

export function extractTerms(text: string): string[] {
  return text.match(TERM_PATTERN) ?? [];
}

function compareTerms(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

export function smoothedIdf(documentCount: number, documentFrequency: number): number {
  return Math.log((1 + documentCount) / (1 + documentFrequency)) + 1;
}

function countDocumentFrequency(texts: readonly string[]): Map<string, number> {
  const frequency = new Map<string, number>();
  for (const text of texts) {
    for (const term of new Set(extractTerms(text))) {
      frequency.set(term, (frequency.get(term) ?? 0) + 1);
    }
  }
  return frequency;
}

function selectVocabulary(frequency: Map<string, number>, maxFeatures: number): string[] {
  const kept = [...frequency.entries()]
    .sort(([leftTerm, leftCount], [rightTerm, rightCount]) => {
      return rightCount - leftCount || compareTerms(leftTerm, rightTerm);
    })
    .slice(0, maxFeatures)
    .map(([term]) => term);
  return kept.sort(compareTerms);
}

export function fitTfidfVectorizer(
  texts: readonly string[],
  options: TfidfVectorizerOptions = {},
): TriageResult<FittedTfidfVectorizer> {
  const maxFeatures = options.maxFeatures ?? DEFAULT_MAX_FEATURES;
  if (!Number.isInteger(maxFeatures) || maxFeatures < 1) {
    return fail("invalid_options", `maxFeatures must be a positive integer, got ${maxFeatures}`);
  }
  if (texts.length === 0) {
    return fail("training_failed", "cannot fit a vectorizer on an empty corpus");
  }

  const documentFrequency = countDocumentFrequency(texts);
  const terms = selectVocabulary(documentFrequency, maxFeatures);
  const vocabulary = new Map<string, number>();
  const idfWeights = new Float64Array(terms.length);
  terms.forEach((term, index) => {
    vocabulary.set(term, index);
    idfWeights[index] = smoothedIdf(texts.length, documentFrequency.get(term) ?? 0);
  });

  return ok({
    documentCount: texts.length,
    vocabularySize: vocabulary.size,
    vocabulary: () => vocabulary,
    idf(term) {
      const index = vocabulary.get(term);
      return index === undefined ? null : idfWeights[index];
    },
    transform(text) {
      const counts = new Map<number, number>();
      for (const term of extractTerms(text)) {
        const index = vocabulary.get(term);
        if (index !== undefined) {
          counts.set(index, (counts.get(index) ?? 0) + 1);
        }
      }

      const weights = new Map<number, number>();
      let squaredNorm = 0;
      for (const [index, count] of counts) {
        const weight = count * idfWeights[index];
        weights.set(index, weight);
        squaredNorm += weight * weight;
      }
      if (squaredNorm === 0) {
        return new Map();
      }

      const norm = Math.sqrt(squaredNorm);
      for (const [index, weight] of weights) {
        weights.set(index, weight / norm);
      }
      return weights;
    },
  });
}
