// The four exception lists consulted by the capitalizers and sort keys
export type WordListName =
  | 'lowercaseTitleWords'
  | 'lowercaseAuthorWords'
  | 'macSurnames'
  | 'authorTitles';

export const WORD_LIST_NAMES: readonly WordListName[] = [
  'lowercaseTitleWords',
  'lowercaseAuthorWords',
  'macSurnames',
  'authorTitles',
];

// Entries are stored lowercased; lookups lowercase the word first.
export type WordLists = Readonly<Record<WordListName, ReadonlySet<string>>>;

export type CataloguerConfig = Partial<Record<WordListName, readonly string[]>>;

export interface CapitalizeOptions {
  /** Capitalize after "Mc" and after "Mac" in listed surnames. Defaults to true. */
  handleMcPrefix?: boolean;
}

export interface SortableTitleOptions extends CapitalizeOptions {
  correctCase?: boolean;
  /** Spell out digit runs so "12 Angry Men" sorts under "twelve". */
  smartNumbers?: boolean;
}

export interface SortableAuthorOptions extends CapitalizeOptions {
  correctCase?: boolean;
}

export interface SortOptions<T> {
  key?: (item: T) => string;
  reverse?: boolean;
}

export interface TitleSortOptions<T> extends SortOptions<T> {
  smartNumbers?: boolean;
}

// [surname] or [surname, forenames]; empty when the name had no usable words
export type AuthorNameParts = [] | [string] | [string, string];
