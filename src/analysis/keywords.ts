// ── Keyword Scoring ──────────────────────────────────────

export interface RankedTerm {
  term: string;
  score: number;
}

/**
 * Ranks every distinct term of a tokenized document, highest score first.
 * Implementations break score ties alphabetically.
 */
export interface KeywordScorer {
  score(document: readonly string[]): RankedTerm[];
}

/**
 * Smoothed TF-IDF: `tf * (ln((1 + n) / (1 + df)) + 1)`, L2-normalized.
 *
 * Built without a corpus it scores each document against a corpus of just
 * that document, so every idf is 1 and the ranking is term frequency.
 * Built from the batch's documents, terms shared by every transcript sink
 * below the ones that set a transcript apart.
 */
export class TfIdfScorer implements KeywordScorer {
  private readonly documentFrequency = new Map<string, number>();
  private readonly corpusSize: number;

  constructor(corpus: readonly (readonly string[])[] = []) {
    for (const document of corpus) {
      for (const term of new Set(document)) {
        this.documentFrequency.set(
          term,
          (this.documentFrequency.get(term) ?? 0) + 1,
        );
      }
    }
    this.corpusSize = corpus.length;
  }

  score(document: readonly string[]): RankedTerm[] {
    const counts = countTerms(document);
    if (counts.size === 0) return [];

    const standalone = this.corpusSize === 0;
    const weighted = [...counts].map(([term, tf]) => {
      const df = standalone ? 1 : (this.documentFrequency.get(term) ?? 0);
      const n = standalone ? 1 : this.corpusSize;
      return { term, score: tf * (Math.log((1 + n) / (1 + df)) + 1) };
    });

    const norm = Math.sqrt(weighted.reduce((s, t) => s + t.score * t.score, 0));
    return weighted
      .map((t) => ({ term: t.term, score: t.score / norm }))
      .sort(compareRanked);
  }
}

/** Top `topK` terms of the document by the scorer's ranking. */
export function extractKeywords(
  document: readonly string[],
  topK: number,
  scorer: KeywordScorer,
): string[] {
  if (topK <= 0) return [];
  return scorer
    .score(document)
    .slice(0, topK)
    .map((t) => t.term);
}

// ── Helpers ──────────────────────────────────────────────

function countTerms(document: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const term of document) counts.set(term, (counts.get(term) ?? 0) + 1);
  return counts;
}

function compareRanked(a: RankedTerm, b: RankedTerm): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.term === b.term) return 0;
  return a.term < b.term ? -1 : 1;
}
