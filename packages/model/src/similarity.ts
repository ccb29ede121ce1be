/**
 * Pairwise name similarity in [0, 1].
 *
 * `matrix(left, right)[i][j]` scores `left[i]` against `right[j]`.
 * Implementations must be deterministic for identical inputs.
 */
export interface Similarity {
  matrix: (left: readonly string[], right: readonly string[]) => Promise<number[][]>
}

/**
 * Canonical form used for matching feature names.
 *
 * @example
 * normalizeName('SpellCheck') // 'spell check'
 * normalizeName('  spell_check ') // 'spell check'
 */
export function normalizeName(name: string): string {
  return name
    .normalize('NFKC')
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .replace(/[_\-\s]+/g, ' ')
    .trim()
    .toLowerCase()
}

function bigrams(value: string): Map<string, number> {
  const counts = new Map<string, number>()
  for (let i = 0; i < value.length - 1; i++) {
    const gram = value.slice(i, i + 2)
    counts.set(gram, (counts.get(gram) ?? 0) + 1)
  }
  return counts
}

/**
 * Sørensen–Dice coefficient over character bigrams of the normalized,
 * space-free names
 */
export function diceSimilarity(a: string, b: string): number {
  const left = normalizeName(a).replace(/ /g, '')
  const right = normalizeName(b).replace(/ /g, '')
  if (left === right)
    return 1
  if (left.length < 2 || right.length < 2)
    return 0

  const leftGrams = bigrams(left)
  const rightGrams = bigrams(right)
  let overlap = 0
  for (const [gram, count] of leftGrams)
    overlap += Math.min(count, rightGrams.get(gram) ?? 0)
  return (2 * overlap) / (left.length - 1 + right.length - 1)
}

/**
 * Embedding-free similarity, the default for merging and coverage
 */
export class LexicalSimilarity implements Similarity {
  score(a: string, b: string): number {
    return diceSimilarity(a, b)
  }

  async matrix(left: readonly string[], right: readonly string[]): Promise<number[][]> {
    return left.map(a => right.map(b => diceSimilarity(a, b)))
  }
}
