export const APOSTROPHES = "'\u0091\u0092‘’";

const WORD_CHAR_RE = new RegExp(`^[A-Za-z0-9${APOSTROPHES}]$`);

export interface SectionSplit {
  sections: string[];
  wordCount: number;
}

/**
 * Decompose accented letters and drop the combining marks: "é" -> "e".
 */
export function stripAccents(text: string): string {
  return text.normalize('NFKD').replace(/\p{M}/gu, '');
}

/**
 * Whether a single character belongs to a word: an ASCII letter or digit
 * (accents ignored) or an apostrophe, plus the hyphen when `includeHyphens`.
 */
export function isWordChar(char: string, includeHyphens = false): boolean {
  const stripped = stripAccents(char);
  // A lone combining mark stays attached to the letter before it
  if (stripped === '') return true;
  if (includeHyphens && stripped === '-') return true;
  return WORD_CHAR_RE.test(stripped);
}

export function isWordSection(section: string, includeHyphens = false): boolean {
  const [first] = section;
  return first !== undefined && isWordChar(first, includeHyphens);
}

/**
 * Split text into alternating runs of word and non-word characters.
 *
 *   splitSections('@apple + banana. ')
 *   // { sections: ['@', 'apple', ' + ', 'banana', '. '], wordCount: 2 }
 *
 * Joining the sections gives back the input. With `wordsOnly`, hyphens join
 * words ("three-word") and only the word runs are returned.
 */
export function splitSections(text: string, wordsOnly = false): SectionSplit {
  const sections: string[] = [];
  let wordCount = 0;
  let current = '';
  let currentIsWord: boolean | null = null;

  const flush = () => {
    if (current && (currentIsWord || !wordsOnly)) {
      sections.push(current);
    }
  };

  for (const char of text) {
    const charIsWord = isWordChar(char, wordsOnly);
    if (charIsWord === currentIsWord) {
      current += char;
      continue;
    }
    flush();
    current = char;
    currentIsWord = charIsWord;
    if (charIsWord) wordCount++;
  }
  flush();

  return { sections, wordCount };
}
