import * as fs from 'fs';
import * as path from 'path';
import type { CataloguerConfig, WordListName } from '../types';
import { WORD_LIST_NAMES } from '../types';
import { Cataloguer, createCataloguer } from './cataloguer';
import { loadWordListFile } from './wordLists';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isWordListName(key: string): key is WordListName {
  return WORD_LIST_NAMES.some((name) => name === key);
}

function parseWordListValue(name: WordListName, value: unknown, baseDir: string): string[] {
  if (typeof value === 'string') {
    return loadWordListFile(path.resolve(baseDir, value));
  }
  if (!Array.isArray(value)) {
    throw new Error(`Config "${name}" must be an array of words or a path to a word list`);
  }

  const words = value.filter((entry): entry is string => typeof entry === 'string');
  if (words.length !== value.length) {
    console.warn(`Ignoring ${value.length - words.length} non-string entries in config "${name}"`);
  }
  return words;
}

/**
 * Validate a config value, typically parsed JSON:
 *
 *   { "lowercaseTitleWords": ["a", "the"], "macSurnames": "./mac.txt" }
 *
 * Each list is either an array of words or a path (relative to `baseDir`)
 * to a one-word-per-line file. Lists left out keep their defaults.
 */
export function parseCataloguerConfig(raw: unknown, baseDir: string = process.cwd()): CataloguerConfig {
  if (!isRecord(raw)) {
    throw new Error('Cataloguer config must be an object');
  }

  const config: CataloguerConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isWordListName(key)) {
      console.warn(`Ignoring unknown cataloguer config key: ${key}`);
      continue;
    }
    config[key] = parseWordListValue(key, value, baseDir);
  }
  return config;
}

export function loadCataloguerConfigFile(filePath: string): Cataloguer {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new Error(`Failed to read cataloguer config: ${filePath}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`Cataloguer config is not valid JSON: ${filePath}`, { cause: err });
  }

  return createCataloguer(parseCataloguerConfig(raw, path.dirname(filePath)));
}
