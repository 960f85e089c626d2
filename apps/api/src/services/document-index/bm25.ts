/**
 * Okapi BM25 over pre-tokenized documents.
 *
 * Terms whose idf comes out negative (present in more than half the corpus)
 * are floored to `epsilon * averageIdf`.
 */

export interface Bm25Params {
  k1: number;
  b: number;
  epsilon: number;
}

const DEFAULT_PARAMS: Bm25Params = { k1: 1.5, b: 0.75, epsilon: 0.25 };

export function tokenizeWhitespace(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

export class Bm25Index {
  private readonly params: Bm25Params;
  private readonly termFrequencies: Map<string, number>[] = [];
  private readonly documentLengths: number[] = [];
  private readonly idf = new Map<string, number>();
  private readonly averageDocumentLength: number;

  constructor(corpus: string[][], params: Partial<Bm25Params> = {}) {
    this.params = { ...DEFAULT_PARAMS, ...params };

    const documentFrequency = new Map<string, number>();
    let totalTokens = 0;
    for (const document of corpus) {
      const frequencies = new Map<string, number>();
      for (const token of document) {
        frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
      }
      for (const token of frequencies.keys()) {
        documentFrequency.set(token, (documentFrequency.get(token) ?? 0) + 1);
      }
      this.termFrequencies.push(frequencies);
      this.documentLengths.push(document.length);
      totalTokens += document.length;
    }
    this.averageDocumentLength = corpus.length > 0 ? totalTokens / corpus.length : 0;
    this.computeIdf(documentFrequency, corpus.length);
  }

  get size(): number {
    return this.documentLengths.length;
  }

  getIdf(term: string): number {
    return this.idf.get(term) ?? 0;
  }

  /**
   * One score per document, in corpus order. Repeated query terms count again.
   */
  getScores(queryTokens: string[]): number[] {
    const { k1, b } = this.params;
    const scores = new Array<number>(this.size).fill(0);
    for (const term of queryTokens) {
      const idf = this.idf.get(term);
      if (!idf) continue;
      for (let i = 0; i < this.size; i += 1) {
        const frequency = this.termFrequencies[i].get(term) ?? 0;
        if (frequency === 0) continue;
        const lengthRatio = this.averageDocumentLength > 0 ? this.documentLengths[i] / this.averageDocumentLength : 0;
        scores[i] += (idf * (frequency * (k1 + 1))) / (frequency + k1 * (1 - b + b * lengthRatio));
      }
    }
    return scores;
  }

  private computeIdf(documentFrequency: Map<string, number>, corpusSize: number): void {
    let idfSum = 0;
    const negative: string[] = [];
    for (const [term, frequency] of documentFrequency) {
      const idf = Math.log(corpusSize - frequency + 0.5) - Math.log(frequency + 0.5);
      this.idf.set(term, idf);
      idfSum += idf;
      if (idf < 0) negative.push(term);
    }
    if (this.idf.size === 0) return;
    const floor = this.params.epsilon * (idfSum / this.idf.size);
    for (const term of negative) {
      this.idf.set(term, floor);
    }
  }
}
