import type { CapitalizeOptions, WordLists } from '../types';
import { isRomanNumeral } from './romanNumerals';
import { APOSTROPHES, isWordSection, splitSections, stripAccents } from './sections';
import { listKey } from './wordLists';

// "o'brien", "d'artagnan": letter, apostrophe, then at least two letters
const APOSTROPHE_NAME_RE = new RegExp(`^[a-z][${APOSTROPHES}][a-z]{2,}`);

function upperFirst(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

/**
 * Capitalize one word, including the letter after a name prefix:
 * "mccarthy" -> "McCarthy", "macdonald" -> "MacDonald" (listed surnames only),
 * "o'hara" -> "O'Hara".
 */
export function capitalizeWord(
  word: string,
  macSurnames: ReadonlySet<string>,
  handleMcPrefix = true,
): string {
  const lower = word.toLowerCase();
  let divide = 0;

  if (handleMcPrefix) {
    if (lower.startsWith('mc')) {
      divide = 2;
    } else if (lower.startsWith('mac') && (macSurnames.has(listKey(lower)) || macSurnames.has('mac'))) {
      divide = 3;
    }
  }

  if (APOSTROPHE_NAME_RE.test(stripAccents(lower))) {
    divide = 2;
  }

  return upperFirst(lower.slice(0, divide)) + upperFirst(lower.slice(divide));
}

/**
 * Capitalize a book title, keeping every non-word character in place.
 *
 * Words from the lowercase title list stay lowercase unless they open or
 * close the title or a subtitle (a colon starts a subtitle). Roman numerals
 * are uppercased.
 *
 *   capitalizeTitle('the hobbit: or, there and back again', lists)
 *   // 'The Hobbit: Or, There and Back Again'
 */
export function capitalizeTitle(
  title: string,
  lists: WordLists,
  options: CapitalizeOptions = {},
): string {
  const handleMcPrefix = options.handleMcPrefix ?? true;
  const { sections, wordCount } = splitSections(title);
  let wordIndex = 0;
  let first = true;

  return sections
    .map((section, i) => {
      if (!isWordSection(section)) return section;

      const lower = section.toLowerCase();
      const beforeColon = i < sections.length - 1 && sections[i + 1].includes(':');
      const last = wordIndex === wordCount - 1;
      const keepLowercase = lists.lowercaseTitleWords.has(listKey(lower)) && !first && !last && !beforeColon;

      wordIndex++;
      first = beforeColon;

      if (keepLowercase) return lower;
      if (isRomanNumeral(section)) return section.toUpperCase();
      return capitalizeWord(section, lists.macSurnames, handleMcPrefix);
    })
    .join('');
}

/**
 * Capitalize an author's name, keeping every non-word character in place.
 *
 *   capitalizeAuthor('ludwig van beethoven', lists) // 'Ludwig van Beethoven'
 *   capitalizeAuthor('pope john xxiii', lists)      // 'Pope John XXIII'
 */
export function capitalizeAuthor(
  author: string,
  lists: WordLists,
  options: CapitalizeOptions = {},
): string {
  const handleMcPrefix = options.handleMcPrefix ?? true;
  const { sections } = splitSections(author);

  return sections
    .map((section) => {
      if (!isWordSection(section)) return section;

      const lower = section.toLowerCase();
      const key = listKey(lower);
      // Honorifics get plain casing: "MM." is "Messieurs", not 2000
      if (lists.authorTitles.has(key)) return upperFirst(lower);
      if (lists.lowercaseAuthorWords.has(key)) return lower;
      if (isRomanNumeral(section)) return section.toUpperCase();
      return capitalizeWord(section, lists.macSurnames, handleMcPrefix);
    })
    .join('');
}
