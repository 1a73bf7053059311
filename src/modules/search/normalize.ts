const TURKISH_FOLDS: Record<string, string> = {
  'ı': 'i',
  'İ': 'I',
  'ğ': 'g',
  'Ğ': 'G',
  'ü': 'u',
  'Ü': 'U',
  'ş': 's',
  'Ş': 'S',
  'ö': 'o',
  'Ö': 'O',
  'ç': 'c',
  'Ç': 'C',
};

const TURKISH_LETTERS = /[ıİğĞüÜşŞöÖçÇ]/g;

/**
 * Folds Turkish letters onto their Latin base, trims and lower-cases.
 * `normalizeSearchTerm('İstanbul') === normalizeSearchTerm('istanbul') === 'istanbul'`
 */
export const normalizeSearchTerm = (text: string | null | undefined): string => {
  if (!text) return '';

  return text
    .replace(TURKISH_LETTERS, letter => TURKISH_FOLDS[letter] ?? letter)
    .trim()
    .toLowerCase();
};

/**
 * Dual raw/normalized substring test used by text search.
 * Matches when the raw or the folded token occurs in the raw or the folded field,
 * ignoring case on the raw side.
 */
export const matchesToken = (field: string | null | undefined, token: string): boolean => {
  if (!field || !token) return false;

  const rawField = field.toLowerCase();
  const foldedField = normalizeSearchTerm(field);
  const rawToken = token.toLowerCase();
  const foldedToken = normalizeSearchTerm(token);

  return [rawToken, foldedToken].some(
    candidate => candidate.length > 0 && (rawField.includes(candidate) || foldedField.includes(candidate))
  );
};

/**
 * Whitespace tokenizer for search text; blank input yields no tokens
 */
export const tokenize = (text: string | null | undefined): string[] =>
  (text ?? '').trim().split(/\s+/).filter(token => token.length > 0);
