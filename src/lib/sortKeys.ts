import numberToWords from 'number-to-words';
import type {
  AuthorNameParts,
  SortableAuthorOptions,
  SortableTitleOptions,
  SortOptions,
  TitleSortOptions,
  WordLists,
} from '../types';
import { capitalizeAuthor, capitalizeTitle } from './capitalize';
import { isRomanNumeral } from './romanNumerals';
import { isWordSection, splitSections } from './sections';
import { listKey } from './wordLists';

const LEADING_ARTICLES: ReadonlySet<string> = new Set(['a', 'an', 'the']);
const NAME_SUFFIXES: ReadonlySet<string> = new Set(['jr', 'sr']);

function spellOutNumbers(text: string): string {
  return text
    // "1,000" -> "1000"
    .replace(/(\d),(?=\d)/g, '$1')
    .replace(/\d+/g, (digits) => {
      const n = Number(digits);
      return Number.isSafeInteger(n) ? numberToWords.toWords(n) : digits;
    });
}

/**
 * Title as it should be filed: leading article dropped, punctuation
 * collapsed, numbers spelled out.
 *
 *   getSortableTitle('The Hobbit: or, There and Back Again', lists)
 *   // 'Hobbit or There and Back Again'
 */
export function getSortableTitle(
  title: string,
  lists: WordLists,
  options: SortableTitleOptions = {},
): string {
  const { handleMcPrefix = true, correctCase = true, smartNumbers = true } = options;
  let text = title.toLowerCase();

  if (!/[a-z0-9]/.test(text)) return '';
  if (smartNumbers) text = spellOutNumbers(text);

  const { sections } = splitSections(text);

  if (sections.length > 0 && !isWordSection(sections[0])) sections.shift();
  if (sections.length > 0 && !isWordSection(sections[sections.length - 1])) sections.pop();

  if (sections.length > 0 && LEADING_ARTICLES.has(sections[0])) {
    sections.shift();
    // Title was nothing but an article
    if (sections.length === 0) return '';
    sections.shift();
  }

  const sortable = sections
    .map((section) => {
      if (isWordSection(section)) return section;
      return section.includes(' ') ? ' ' : '';
    })
    .join('');

  return correctCase ? capitalizeTitle(sortable, lists, { handleMcPrefix }) : sortable;
}

/**
 * Split an author's name into [surname, forenames] for filing.
 *
 * Honorifics are dropped, "Jr"/"Sr" and regnal numerals stay with the
 * surname, and particles such as "van" or "de" directly before the surname
 * join it. Single letters become initials.
 */
export function splitAuthorName(
  author: string,
  lists: WordLists,
  options: SortableAuthorOptions = {},
): AuthorNameParts {
  const { handleMcPrefix = true, correctCase = true } = options;
  const words = splitSections(author.toLowerCase(), true).sections
    .filter((word) => !lists.authorTitles.has(listKey(word)));

  if (words.length === 0) return [];

  const lastIndex = words.length - 1;
  let surnameLength = 1;
  if (NAME_SUFFIXES.has(words[lastIndex])) {
    words[lastIndex] = `${words[lastIndex]}.`;
    surnameLength = 2;
  } else if (isRomanNumeral(words[lastIndex])) {
    surnameLength = 2;
  }

  const parts = words.map((word) => {
    let part = word;
    if (part.length === 1) {
      part = `${part}.`;
    } else if (part.startsWith('mc')) {
      // McCarthy files with MacCarthy
      part = `mac${part.slice(2)}`;
    }
    if (correctCase) {
      part = capitalizeAuthor(part, lists, { handleMcPrefix });
    }
    return part.replace(/'/g, '');
  });

  let surnameStart = Math.max(0, parts.length - surnameLength);
  while (surnameStart > 0 && lists.lowercaseAuthorWords.has(listKey(parts[surnameStart - 1]))) {
    surnameStart--;
  }

  const surname = parts.slice(surnameStart).join(' ');
  if (surnameStart === 0) return [surname];
  return [surname, parts.slice(0, surnameStart).join(' ')];
}

/**
 *   getSortableAuthor('J. R. R. Tolkien', lists) // 'Tolkien, J. R. R.'
 */
export function getSortableAuthor(
  author: string,
  lists: WordLists,
  options: SortableAuthorOptions = {},
): string {
  return splitAuthorName(author, lists, options).join(', ');
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// Part by part; a name without forenames files before the same surname with them
function compareNameParts(a: readonly string[], b: readonly string[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const byPart = compareStrings(a[i], b[i]);
    if (byPart !== 0) return byPart;
  }
  return a.length - b.length;
}

function sortBy<T, K>(
  items: Iterable<T>,
  toSortKey: (item: T) => K,
  compare: (a: K, b: K) => number,
  reverse: boolean,
): T[] {
  const keyed = Array.from(items, (item) => ({ item, sortKey: toSortKey(item) }));
  // Array.prototype.sort is stable; flipping the comparator keeps ties in input order
  keyed.sort((a, b) => (reverse ? compare(b.sortKey, a.sortKey) : compare(a.sortKey, b.sortKey)));
  return keyed.map((entry) => entry.item);
}

export function titleSort<T>(
  items: Iterable<T>,
  lists: WordLists,
  options: TitleSortOptions<T> = {},
): T[] {
  const key = options.key ?? ((item: T) => String(item));
  const smartNumbers = options.smartNumbers ?? true;
  return sortBy(
    items,
    (item) => getSortableTitle(key(item), lists, { correctCase: false, smartNumbers }),
    compareStrings,
    options.reverse ?? false,
  );
}

export function authorSort<T>(
  items: Iterable<T>,
  lists: WordLists,
  options: SortOptions<T> = {},
): T[] {
  const key = options.key ?? ((item: T) => String(item));
  return sortBy(
    items,
    (item) => splitAuthorName(key(item), lists, { correctCase: false }),
    compareNameParts,
    options.reverse ?? false,
  );
}
