import * as fs from 'fs';
import type { CataloguerConfig, WordListName, WordLists } from '../types';
import { stripAccents } from './sections';

const DEFAULT_WORD_LIST_FILES: Record<WordListName, string> = {
  lowercaseTitleWords: 'lowercase_title_words.txt',
  lowercaseAuthorWords: 'lowercase_author_words.txt',
  macSurnames: 'mac_surnames.txt',
  authorTitles: 'author_titles.txt',
};

/**
 * Form under which words are stored in and looked up from the lists:
 * lowercased, accents and compatibility forms folded ("ſo" -> "so").
 */
export function listKey(word: string): string {
  return stripAccents(word.trim().toLowerCase());
}

function normalizeEntries(words: Iterable<string>): Set<string> {
  const entries = new Set<string>();
  for (const word of words) {
    const entry = listKey(word);
    if (entry) entries.add(entry);
  }
  return entries;
}

/**
 * Parse a one-word-per-line list. Case and order do not matter.
 */
export function parseWordList(text: string): string[] {
  return text
    .trim()
    .toLowerCase()
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

export function loadWordListFile(path: string | URL): string[] {
  let text: string;
  try {
    text = fs.readFileSync(path, 'utf-8');
  } catch (err) {
    throw new Error(`Failed to read word list: ${String(path)}`, { cause: err });
  }
  return parseWordList(text);
}

function loadDefaultWordList(name: WordListName): ReadonlySet<string> {
  const url = new URL(`../data/${DEFAULT_WORD_LIST_FILES[name]}`, import.meta.url);
  return normalizeEntries(loadWordListFile(url));
}

function loadDefaultWordLists(): WordLists {
  return Object.freeze({
    lowercaseTitleWords: loadDefaultWordList('lowercaseTitleWords'),
    lowercaseAuthorWords: loadDefaultWordList('lowercaseAuthorWords'),
    macSurnames: loadDefaultWordList('macSurnames'),
    authorTitles: loadDefaultWordList('authorTitles'),
  });
}

export const DEFAULT_WORD_LISTS: WordLists = loadDefaultWordLists();

/**
 * Build a new snapshot where each list named in `config` replaces the one in
 * `base`. Lists carried over from `base` are copied, so later changes to the
 * caller's sets never reach the snapshot.
 */
export function createWordLists(
  config: CataloguerConfig = {},
  base: WordLists = DEFAULT_WORD_LISTS,
): WordLists {
  const pick = (name: WordListName) => normalizeEntries(config[name] ?? base[name]);
  return Object.freeze({
    lowercaseTitleWords: pick('lowercaseTitleWords'),
    lowercaseAuthorWords: pick('lowercaseAuthorWords'),
    macSurnames: pick('macSurnames'),
    authorTitles: pick('authorTitles'),
  });
}
