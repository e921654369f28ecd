/**
 * Title similarity used to rank catalog candidates.
 *
 * Similarity is Levenshtein edit distance normalized by the longer string:
 * `1 - distance / maxLength`, computed over normalized titles.
 */

/**
 * Normalize a title for comparison.
 *
 * - lower case, NFD
 * - keeps Unicode letters and digits, drops punctuation
 * - drops the English articles a, an, the
 * - collapses whitespace
 *
 * "The Hobbit: There and Back Again" → "hobbit there and back again"
 */
export function normalizeTitle(title: string): string {
  if (!title) return "";

  return title
    .toLowerCase()
    .normalize("NFD")
    .replace(/[^\p{L}\p{N}\s]/gu, "")
    .replace(/\b(a|an|the)\b/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function levenshteinDistance(str1: string, str2: string): number {
  const len1 = str1.length;
  const len2 = str2.length;

  if (len1 === 0) return len2;
  if (len2 === 0) return len1;

  let prevRow = Array.from({ length: len2 + 1 }, (_, i) => i);

  for (let i = 0; i < len1; i++) {
    const currentRow = [i + 1];

    for (let j = 0; j < len2; j++) {
      const insertCost = currentRow[j] + 1;
      const deleteCost = prevRow[j + 1] + 1;
      const replaceCost = prevRow[j] + (str1[i] === str2[j] ? 0 : 1);

      currentRow.push(Math.min(insertCost, deleteCost, replaceCost));
    }

    prevRow = currentRow;
  }

  return prevRow[len2];
}

export function calculateSimilarity(str1: string, str2: string): number {
  const distance = levenshteinDistance(str1, str2);
  const maxLength = Math.max(str1.length, str2.length);
  if (maxLength === 0) return 1.0;
  return 1.0 - distance / maxLength;
}

export function titleSimilarity(title1: string, title2: string): number {
  return calculateSimilarity(normalizeTitle(title1), normalizeTitle(title2));
}
