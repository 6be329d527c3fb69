/**
 * Token matching shared by the dietary rules and the product matcher.
 *
 * Text is lowercased, stripped of accents and punctuation and split on
 * whitespace. Letters of any script are kept. Tokens are stemmed with a small
 * plural folding so "Eggs" matches "egg", "Tomatoes" matches "tomato" and both
 * "berry" and "berries" fold to "berrie", as "cookie" and "cookies" fold to
 * "cookie". Matching is whole-token: "buckwheat" never matches "wheat".
 */

const CONSONANT_Y = /[b-df-hj-np-tv-xz]y$/;

/**
 * Normalize text for comparison: lowercase, drop diacritics, strip special chars, collapse whitespace
 */
export function normalizeText(text: string): string {
  return text
    .normalize("NFD")
    .replace(/\p{M}/gu, "")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Fold common English plurals: oes → o, trailing s dropped unless ss, then a
 * consonant-y ending becomes ie so "berry" and "berries" share a stem.
 */
export function stemToken(token: string): string {
  if (token.length > 4 && token.endsWith("oes")) return token.slice(0, -2);
  if (token.length > 3 && token.endsWith("s") && !token.endsWith("ss")) return token.slice(0, -1);
  if (token.length > 2 && CONSONANT_Y.test(token)) return `${token.slice(0, -1)}ie`;
  return token;
}

/**
 * Normalized, stemmed tokens in order (duplicates kept).
 */
export function stemmedTokens(text: string): string[] {
  const normalized = normalizeText(text);
  if (!normalized) return [];
  return normalized.split(" ").map(stemToken);
}

/**
 * Remove every whole-word occurrence of the given phrases from normalized text.
 */
export function stripPhrases(text: string, phrases: readonly string[]): string {
  let padded = ` ${normalizeText(text)} `;
  for (const phrase of phrases) {
    const needle = normalizeText(phrase);
    if (!needle) continue;
    while (padded.includes(` ${needle} `)) {
      padded = padded.replace(` ${needle} `, " ");
    }
  }
  return padded.trim();
}

/**
 * True when the stemmed tokens of `term` appear contiguously in `tokens`.
 */
export function containsTerm(tokens: readonly string[], term: string): boolean {
  const termTokens = stemmedTokens(term);
  if (termTokens.length === 0 || termTokens.length > tokens.length) return false;
  for (let start = 0; start + termTokens.length <= tokens.length; start++) {
    if (termTokens.every((t, offset) => tokens[start + offset] === t)) return true;
  }
  return false;
}

/**
 * First term found in `text` after exempt phrases are removed, or null.
 */
export function findTerm(
  text: string,
  terms: readonly string[],
  exemptPhrases: readonly string[] = []
): string | null {
  const tokens = stemmedTokens(stripPhrases(text, exemptPhrases));
  if (tokens.length === 0) return null;
  for (const term of terms) {
    if (containsTerm(tokens, term)) return term;
  }
  return null;
}

/**
 * Token overlap similarity on stemmed tokens: |intersection| / |union| (Jaccard index)
 */
export function tokenSimilarity(a: string, b: string): number {
  const setA = new Set(stemmedTokens(a));
  const setB = new Set(stemmedTokens(b));
  if (setA.size === 0 && setB.size === 0) return 1;
  if (setA.size === 0 || setB.size === 0) return 0;

  let intersection = 0;
  for (const t of setA) {
    if (setB.has(t)) intersection++;
  }
  const union = new Set([...setA, ...setB]).size;
  return intersection / union;
}

/**
 * Code-point ordering, independent of the host locale.
 */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
