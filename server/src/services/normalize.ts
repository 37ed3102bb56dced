// server/src/services/normalize.ts

// Letters with no canonical decomposition, so NFD leaves them untouched.
const FOLDED_LETTERS: Record<string, string> = {
  'ø': 'o',
  'ł': 'l',
  'đ': 'd',
  'ð': 'd',
  'æ': 'ae',
  'œ': 'oe',
  'ß': 'ss',
  'þ': 'th',
  'ı': 'i'
};

const FOLDED_PATTERN = new RegExp(`[${Object.keys(FOLDED_LETTERS).join('')}]`, 'g');

/**
 * Fold text to its comparison key: lowercase, accents removed,
 * whitespace trimmed and collapsed.
 *
 *   normalize('  Martin  Ødegaard ') === 'martin odegaard'
 */
export function normalize(text: string | null | undefined): string {
  if (!text) return '';

  return text
    .toLowerCase()
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .replace(FOLDED_PATTERN, (ch) => FOLDED_LETTERS[ch] ?? ch)
    .replace(/\s+/g, ' ')
    .trim();
}
