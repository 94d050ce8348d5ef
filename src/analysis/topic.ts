// ── Topic Phrase — most frequent adjacent word pair ──────

/**
 * Count adjacent pairs inside each stream. The map keeps first-seen order.
 */
export function countBigrams(
  streams: readonly (readonly string[])[],
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const tokens of streams) {
    for (let i = 1; i < tokens.length; i++) {
      const phrase = `${tokens[i - 1]} ${tokens[i]}`;
      counts.set(phrase, (counts.get(phrase) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * The most frequent pair, ties going to the pair seen first.
 * Returns null when no stream holds two tokens.
 */
export function extractTopic(
  streams: readonly (readonly string[])[],
): string | null {
  let best: string | null = null;
  let bestCount = 0;
  for (const [phrase, count] of countBigrams(streams)) {
    if (count > bestCount) {
      best = phrase;
      bestCount = count;
    }
  }
  return best;
}
