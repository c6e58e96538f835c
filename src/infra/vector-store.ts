/**
 * Vector index: brute-force cosine similarity over in-memory rows.
 *
 * Similarity is `1 - cosine_distance`, i.e. plain cosine similarity.
 */

export interface ScoredItem<T> {
  item: T;
  similarity: number;
}

export class VectorIndex<T> {
  private items: T[] = [];
  private vectors: Float64Array[] = [];
  private norms: number[] = [];

  load(entries: Array<{ item: T; vector: number[] }>): void {
    this.items = entries.map((e) => e.item);
    this.vectors = entries.map((e) => new Float64Array(e.vector));
    this.norms = this.vectors.map(norm);
  }

  /**
   * Rows scoring strictly above `threshold`, best first. Equal scores keep
   * load order. Rows whose dimensionality differs from the query are skipped.
   */
  search(queryVector: number[], limit: number, threshold: number): ScoredItem<T>[] {
    if (this.items.length === 0 || limit <= 0) return [];

    const qv = new Float64Array(queryVector);
    const qNorm = norm(qv);
    if (qNorm === 0) return [];

    const scored: ScoredItem<T>[] = [];

    this.items.forEach((item, i) => {
      const v = this.vectors[i];
      const vNorm = this.norms[i];
      if (!v || !vNorm || v.length !== qv.length) return;
      const similarity = dot(qv, v) / (qNorm * vNorm);
      if (similarity > threshold) {
        scored.push({ item, similarity });
      }
    });

    scored.sort((a, b) => b.similarity - a.similarity);
    return scored.slice(0, limit);
  }

  get size(): number {
    return this.items.length;
  }
}

function dot(a: Float64Array, b: Float64Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

function norm(a: Float64Array): number {
  let sum = 0;
  for (const x of a) {
    sum += x * x;
  }
  return Math.sqrt(sum);
}
