import type {
  CapitalizeOptions,
  SortableAuthorOptions,
  SortableTitleOptions,
  SortOptions,
  TitleSortOptions,
} from './types';
import { defaultCataloguer } from './lib/cataloguer';

export type {
  AuthorNameParts,
  CapitalizeOptions,
  CataloguerConfig,
  SortableAuthorOptions,
  SortableTitleOptions,
  SortOptions,
  TitleSortOptions,
  WordListName,
  WordLists,
} from './types';
export { WORD_LIST_NAMES } from './types';
export { Cataloguer, createCataloguer, defaultCataloguer } from './lib/cataloguer';
export { loadCataloguerConfigFile, parseCataloguerConfig } from './lib/config';
export { DEFAULT_WORD_LISTS, loadWordListFile, parseWordList } from './lib/wordLists';

// Shortcuts over the bundled word lists

export function capitalizeTitle(title: string, options?: CapitalizeOptions): string {
  return defaultCataloguer.capitalizeTitle(title, options);
}

export function capitalizeAuthor(author: string, options?: CapitalizeOptions): string {
  return defaultCataloguer.capitalizeAuthor(author, options);
}

export function getSortableTitle(title: string, options?: SortableTitleOptions): string {
  return defaultCataloguer.getSortableTitle(title, options);
}

export function getSortableAuthor(author: string, options?: SortableAuthorOptions): string {
  return defaultCataloguer.getSortableAuthor(author, options);
}

export function titleSort<T>(items: Iterable<T>, options?: TitleSortOptions<T>): T[] {
  return defaultCataloguer.titleSort(items, options);
}

export function authorSort<T>(items: Iterable<T>, options?: SortOptions<T>): T[] {
  return defaultCataloguer.authorSort(items, options);
}
