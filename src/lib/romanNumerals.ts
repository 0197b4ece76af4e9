// Canonical subtractive notation, 1..3999
const ROMAN_NUMERAL_RE = /^M{0,3}(CM|CD|D?C{0,3})(XC|XL|L?X{0,3})(IX|IV|V?I{0,3})$/i;

/**
 * Case-insensitive check for a well-formed Roman numeral ("vi", "XXIII").
 * Non-canonical forms like "iiii" or "vx" are rejected.
 */
export function isRomanNumeral(word: string): boolean {
  return word.length > 0 && ROMAN_NUMERAL_RE.test(word);
}
