/**
 * Term-frequency vectors and cosine similarity for memory ranking.
 */

export type TermVector = ReadonlyMap<string, number>

const TOKEN_PATTERN = /[\p{L}\p{N}_]+/gu

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? []
}

export function termVector(text: string): TermVector {
  const counts = new Map<string, number>()
  for (const token of tokenize(text)) {
    counts.set(token, (counts.get(token) ?? 0) + 1)
  }
  return counts
}

function norm(vector: TermVector): number {
  let sum = 0
  for (const count of vector.values()) sum += count * count
  return Math.sqrt(sum)
}

/** 0 when either vector is empty */
export function cosineSimilarity(a: TermVector, b: TermVector): number {
  const denominator = norm(a) * norm(b)
  if (denominator === 0) return 0

  const [small, large] = a.size <= b.size ? [a, b] : [b, a]
  let dot = 0
  for (const [term, count] of small) {
    dot += count * (large.get(term) ?? 0)
  }
  return dot / denominator
}
