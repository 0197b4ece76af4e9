import type {
  AuthorNameParts,
  CapitalizeOptions,
  CataloguerConfig,
  SortableAuthorOptions,
  SortableTitleOptions,
  SortOptions,
  TitleSortOptions,
  WordListName,
  WordLists,
} from '../types';
import { capitalizeAuthor, capitalizeTitle } from './capitalize';
import {
  authorSort,
  getSortableAuthor,
  getSortableTitle,
  splitAuthorName,
  titleSort,
} from './sortKeys';
import { DEFAULT_WORD_LISTS, createWordLists } from './wordLists';

/**
 * Formats titles and author names against one snapshot of the exception
 * lists. Setters return a new instance and leave this one untouched, so a
 * cataloguer can be shared freely.
 */
export class Cataloguer {
  private readonly lists: WordLists;

  constructor(lists: WordLists = DEFAULT_WORD_LISTS) {
    this.lists = createWordLists({}, lists);
  }

  wordList(name: WordListName): string[] {
    return Array.from(this.lists[name]);
  }

  /** Words like "the", "a" and "of" that stay lowercase inside a title. */
  setLowercaseTitleWords(words: Iterable<string>): Cataloguer {
    return this.withList('lowercaseTitleWords', words);
  }

  /** Particles like "le", "von" and "of" that stay lowercase in a name. */
  setLowercaseAuthorWords(words: Iterable<string>): Cataloguer {
    return this.withList('lowercaseAuthorWords', words);
  }

  /** Surnames like "MacDonald" whose fourth letter is capitalized. */
  setMacSurnames(names: Iterable<string>): Cataloguer {
    return this.withList('macSurnames', names);
  }

  /** Honorifics like "Lord", "Mrs" and "President". */
  setAuthorTitles(titles: Iterable<string>): Cataloguer {
    return this.withList('authorTitles', titles);
  }

  capitalizeTitle(title: string, options?: CapitalizeOptions): string {
    return capitalizeTitle(title, this.lists, options);
  }

  capitalizeAuthor(author: string, options?: CapitalizeOptions): string {
    return capitalizeAuthor(author, this.lists, options);
  }

  getSortableTitle(title: string, options?: SortableTitleOptions): string {
    return getSortableTitle(title, this.lists, options);
  }

  getSortableAuthor(author: string, options?: SortableAuthorOptions): string {
    return getSortableAuthor(author, this.lists, options);
  }

  splitAuthorName(author: string, options?: SortableAuthorOptions): AuthorNameParts {
    return splitAuthorName(author, this.lists, options);
  }

  titleSort<T>(items: Iterable<T>, options?: TitleSortOptions<T>): T[] {
    return titleSort(items, this.lists, options);
  }

  authorSort<T>(items: Iterable<T>, options?: SortOptions<T>): T[] {
    return authorSort(items, this.lists, options);
  }

  private withList(name: WordListName, words: Iterable<string>): Cataloguer {
    const config: CataloguerConfig = {};
    config[name] = Array.from(words);
    return new Cataloguer(createWordLists(config, this.lists));
  }
}

export function createCataloguer(config: CataloguerConfig = {}): Cataloguer {
  return new Cataloguer(createWordLists(config));
}

export const defaultCataloguer = new Cataloguer();
