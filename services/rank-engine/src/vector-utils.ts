/**
 * Vector utilities for embedding comparison.
 */

import { invalidArgumentError } from '@skillrank/common';

import type { Embedding, SimilarityMethod } from './types';

export const SIMILARITY_METHODS: readonly SimilarityMethod[] = ['cosine', 'dot', 'euclidean'];

export function isSimilarityMethod(value: string): value is SimilarityMethod {
  return SIMILARITY_METHODS.some((method) => method === value);
}

function assertSameLength(a: Embedding, b: Embedding): void {
  if (a.length !== b.length) {
    throw invalidArgumentError(`Vector length mismatch: ${a.length} vs ${b.length}`, {
      left: a.length,
      right: b.length
    });
  }
}

export function dotProduct(a: Embedding, b: Embedding): number {
  assertSameLength(a, b);

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function magnitude(v: Embedding): number {
  let sum = 0;
  for (const value of v) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

/**
 * Cosine similarity in [-1, 1]; 0 when either vector has zero magnitude.
 */
export function cosineSimilarity(a: Embedding, b: Embedding): number {
  const dot = dotProduct(a, b);
  const denominator = magnitude(a) * magnitude(b);
  if (denominator === 0) return 0;

  return dot / denominator;
}

export function euclideanDistance(a: Embedding, b: Embedding): number {
  assertSameLength(a, b);

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

/**
 * Similarity under the given method. Cosine lies in [-1, 1], dot is
 * unbounded and euclidean is mapped into (0, 1] as 1 / (1 + distance).
 */
export function computeSimilarity(a: Embedding, b: Embedding, method: SimilarityMethod): number {
  switch (method) {
    case 'cosine':
      return cosineSimilarity(a, b);
    case 'dot':
      return dotProduct(a, b);
    case 'euclidean':
      return 1 / (1 + euclideanDistance(a, b));
  }
}
