/**
 * Cosine similarity in [-1, 1]. A zero-magnitude vector has no direction, so
 * it scores 0 against anything.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Cannot compare vectors of length ${a.length} and ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;

  const sim = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  // float error can push |sim| a hair past 1
  return Math.max(-1, Math.min(1, sim));
}
