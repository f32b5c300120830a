export const VECTOR_SIZE = 1024;

/**
 * Deterministic pseudo-embedding from hashed character trigrams, L2
 * normalised. Stands in until an embedding endpoint is configured.
 */
export function embedText(text: string, size = VECTOR_SIZE): number[] {
  const vector = new Float32Array(size).fill(0);
  const normalized = text.toLowerCase().replace(/\s+/g, " ").trim();

  for (let i = 0; i < normalized.length - 2; i++) {
    const trigram = normalized.slice(i, i + 3);
    let hash = 0;
    for (let j = 0; j < trigram.length; j++) {
      hash = (hash * 31 + trigram.charCodeAt(j)) & 0x7fffffff;
    }
    vector[hash % size] += 1;
  }

  let norm = 0;
  for (let i = 0; i < size; i++) norm += vector[i] * vector[i];
  norm = Math.sqrt(norm) || 1;

  const result: number[] = [];
  for (let i = 0; i < size; i++) result.push(vector[i] / norm);
  return result;
}
