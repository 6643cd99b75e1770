/**
 * Similar Cafe Recommendations
 *
 * Content-based ranking: each cafe becomes a TF-IDF vector over its
 * description and category names, and candidates are ordered by cosine
 * similarity to the target cafe.
 */

import { loadAllCafes } from "@/lib/services/cafes";
import { NotFoundError } from "@/lib/utils/errors";
import type { CafeResponse } from "@/types/cafe";

export const DEFAULT_RECOMMENDATION_LIMIT = 3;

type SparseVector = Map<string, number>;

/**
 * Lower-cased runs of two or more word characters. Letters and digits of
 * any script count, so accented words stay whole.
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}_]{2,}/gu) ?? [];
}

export function cafeDocument(cafe: Pick<CafeResponse, "description" | "bestFor" | "alsoGoodFor">): string {
  return [cafe.description, cafe.bestFor ?? "", ...cafe.alsoGoodFor].join(" ");
}

/**
 * L2-normalised TF-IDF vectors, one per document. Term frequency is the raw
 * count; IDF is smoothed as ln((1 + n) / (1 + df)) + 1.
 */
export function tfidfVectors(documents: string[]): SparseVector[] {
  const counts = documents.map((doc) => {
    const termCounts: SparseVector = new Map();
    for (const token of tokenize(doc)) {
      termCounts.set(token, (termCounts.get(token) ?? 0) + 1);
    }
    return termCounts;
  });

  const documentFrequency = new Map<string, number>();
  for (const termCounts of counts) {
    for (const term of termCounts.keys()) {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
    }
  }

  const n = documents.length;
  return counts.map((termCounts) => {
    const vector: SparseVector = new Map();
    let norm = 0;

    for (const [term, count] of termCounts) {
      const df = documentFrequency.get(term) ?? 0;
      const weight = count * (Math.log((1 + n) / (1 + df)) + 1);
      vector.set(term, weight);
      norm += weight * weight;
    }

    norm = Math.sqrt(norm);
    if (norm > 0) {
      for (const [term, weight] of vector) {
        vector.set(term, weight / norm);
      }
    }
    return vector;
  });
}

/**
 * Cosine similarity of two L2-normalised vectors
 */
export function cosineSimilarity(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [term, weight] of small) {
    dot += weight * (large.get(term) ?? 0);
  }
  return dot;
}

/**
 * Rank the other cafes by similarity to `targetId`. Equal scores keep the
 * order of the input list.
 */
export function rankSimilarCafes(
  cafes: CafeResponse[],
  targetId: number,
  limit: number = DEFAULT_RECOMMENDATION_LIMIT
): CafeResponse[] {
  const targetIndex = cafes.findIndex((cafe) => cafe.id === targetId);
  if (targetIndex === -1) {
    throw new NotFoundError("Cafe", targetId);
  }
  if (cafes.length <= 1) {
    return [];
  }

  const vectors = tfidfVectors(cafes.map(cafeDocument));
  const target = vectors[targetIndex];

  return cafes
    .map((cafe, index) => ({ cafe, index, score: cosineSimilarity(target, vectors[index]) }))
    .filter(({ index }) => index !== targetIndex)
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, limit)
    .map(({ cafe }) => cafe);
}

export async function recommendSimilarCafes(
  cafeId: number,
  limit: number = DEFAULT_RECOMMENDATION_LIMIT
): Promise<CafeResponse[]> {
  const cafes = await loadAllCafes();
  return rankSimilarCafes(cafes, cafeId, limit);
}
