import { describe, it, expect } from 'vitest';
import {
  authorSort,
  getSortableAuthor,
  getSortableTitle,
  splitAuthorName,
  titleSort,
} from './sortKeys';
import { DEFAULT_WORD_LISTS } from './wordLists';

const lists = DEFAULT_WORD_LISTS;

describe('getSortableTitle', () => {
  it('drops a leading article and collapses punctuation', () => {
    expect(getSortableTitle('The Hobbit: or, There and Back Again', lists))
      .toBe('Hobbit or There and Back Again');
    expect(getSortableTitle('  "The Road"  ', lists)).toBe('Road');
  });

  it('joins hyphenated words', () => {
    expect(getSortableTitle('the thirteen-gun salute', lists)).toBe('Thirteengun Salute');
  });

  it('spells out numbers', () => {
    expect(getSortableTitle('12 Angry Men', lists)).toBe('Twelve Angry Men');
    expect(getSortableTitle('A Tale of 2 Cities', lists)).toBe('Tale of Two Cities');
    expect(getSortableTitle('The 1,000 Days', lists)).toBe('One Thousand Days');
  });

  it('leaves digits alone without smart numbers', () => {
    expect(getSortableTitle('12 Angry Men', lists, { smartNumbers: false })).toBe('12 Angry Men');
  });

  it('keeps the lowercase form without case correction', () => {
    expect(getSortableTitle('A Tale of 2 Cities', lists, { correctCase: false })).toBe('tale of two cities');
  });

  it('only drops the article when it is a whole word', () => {
    expect(getSortableTitle('Anthem', lists)).toBe('Anthem');
    expect(getSortableTitle('...And Then There Were None', lists)).toBe('And Then There Were None');
  });

  it('returns an empty key for titles without words', () => {
    expect(getSortableTitle('', lists)).toBe('');
    expect(getSortableTitle('!!!', lists)).toBe('');
    expect(getSortableTitle('The', lists)).toBe('');
    expect(getSortableTitle('An!', lists)).toBe('');
  });
});

describe('splitAuthorName', () => {
  it('splits surname from forenames', () => {
    expect(splitAuthorName('J. R. R. Tolkien', lists)).toEqual(['Tolkien', 'J. R. R.']);
    expect(splitAuthorName('Plato', lists)).toEqual(['Plato']);
  });

  it('keeps suffixes and numerals with the surname', () => {
    expect(splitAuthorName('Dr. Martin Luther King Jr.', lists)).toEqual(['King Jr.', 'Martin Luther']);
    expect(splitAuthorName('Henry VIII', lists)).toEqual(['Henry VIII']);
    expect(splitAuthorName('Pope John XXIII', lists)).toEqual(['John XXIII']);
  });

  it('moves particles into the surname', () => {
    expect(splitAuthorName('Ludwig van Beethoven', lists)).toEqual(['van Beethoven', 'Ludwig']);
    expect(splitAuthorName('Antoine de Saint-Exupéry', lists)).toEqual(['de Saint-Exupéry', 'Antoine']);
  });

  it('files Mc names as Mac and drops apostrophes', () => {
    expect(splitAuthorName('Cormac McCarthy', lists)).toEqual(['Maccarthy', 'Cormac']);
    expect(splitAuthorName("Flannery O'Connor", lists)).toEqual(['OConnor', 'Flannery']);
  });

  it('skips case correction when asked', () => {
    expect(splitAuthorName('Ludwig van Beethoven', lists, { correctCase: false }))
      .toEqual(['van beethoven', 'ludwig']);
  });

  it('returns no parts when only honorifics remain', () => {
    expect(splitAuthorName('Mrs.', lists)).toEqual([]);
    expect(splitAuthorName('', lists)).toEqual([]);
  });
});

describe('getSortableAuthor', () => {
  it('joins surname and forenames with a comma', () => {
    expect(getSortableAuthor('J. R. R. Tolkien', lists)).toBe('Tolkien, J. R. R.');
    expect(getSortableAuthor('Dr. Martin Luther King Jr.', lists)).toBe('King Jr., Martin Luther');
  });

  it('returns an empty key for an empty name', () => {
    expect(getSortableAuthor('Mrs.', lists)).toBe('');
  });
});

describe('titleSort', () => {
  const titles = ['The Two Towers', 'A Game of Thrones', 'Dune', '12 Angry Men'];

  it('sorts by sortable title', () => {
    expect(titleSort(titles, lists)).toEqual(['Dune', 'A Game of Thrones', '12 Angry Men', 'The Two Towers']);
  });

  it('sorts digits first without smart numbers', () => {
    expect(titleSort(titles, lists, { smartNumbers: false }))
      .toEqual(['12 Angry Men', 'Dune', 'A Game of Thrones', 'The Two Towers']);
  });

  it('reverses the order', () => {
    expect(titleSort(titles, lists, { reverse: true }))
      .toEqual(['The Two Towers', '12 Angry Men', 'A Game of Thrones', 'Dune']);
  });

  it('keeps equal keys in input order, also when reversed', () => {
    const same = ['The Road', 'Road', 'A Road'];
    expect(titleSort(same, lists)).toEqual(same);
    expect(titleSort(same, lists, { reverse: true })).toEqual(same);
  });

  it('reads titles through a key function', () => {
    const books = [{ title: 'The Shining' }, { title: 'Carrie' }];
    expect(titleSort(books, lists, { key: (book) => book.title })).toEqual([
      { title: 'Carrie' },
      { title: 'The Shining' },
    ]);
  });

  it('does not modify its input', () => {
    const input = ['Dune', 'Anthem'];
    titleSort(input, lists);
    expect(input).toEqual(['Dune', 'Anthem']);
  });
});

describe('authorSort', () => {
  it('sorts by surname, then forenames', () => {
    expect(authorSort(['Ludwig van Beethoven', 'J. R. R. Tolkien', 'Jane Austen', 'Plato'], lists))
      .toEqual(['Jane Austen', 'Plato', 'J. R. R. Tolkien', 'Ludwig van Beethoven']);
  });

  it('files a bare surname before the same surname with forenames', () => {
    expect(authorSort(['Anne Brontë', 'Brontë'], lists)).toEqual(['Brontë', 'Anne Brontë']);
  });

  it('files Mc and Mac names together', () => {
    expect(authorSort(['Cormac McCarthy', 'Mary MacLane', 'Ian McEwan', 'Alistair MacLeod'], lists))
      .toEqual(['Cormac McCarthy', 'Ian McEwan', 'Mary MacLane', 'Alistair MacLeod']);
  });

  it('reads names through a key function and reverses', () => {
    const books = [{ author: 'Jane Austen' }, { author: 'Leo Tolstoy' }];
    expect(authorSort(books, lists, { key: (book) => book.author, reverse: true })).toEqual([
      { author: 'Leo Tolstoy' },
      { author: 'Jane Austen' },
    ]);
  });
});
