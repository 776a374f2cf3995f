import levenshtein from 'fast-levenshtein';

export const normalizePersonName = (name: string) => name.toLowerCase().replace(/\s+/g, ' ').trim();

/** Levenshtein ratio in [0, 1] over normalized names; blank names score 0. */
export const nameSimilarity = (a: string, b: string) => {
  const na = normalizePersonName(a);
  const nb = normalizePersonName(b);
  if (!na || !nb) return 0;
  const dist = levenshtein.get(na, nb);
  const maxLen = Math.max(na.length, nb.length) || 1;
  return 1 - dist / maxLen;
};
