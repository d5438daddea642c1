/**
 * Description Normalization
 *
 * Bank descriptions carry noise that interferes with matching: posting dates,
 * confirmation codes, masked card numbers, phone numbers, channel boilerplate
 * and the merchant's city/state. This module strips that noise by pattern,
 * never by a list of known bank or merchant names.
 *
 * Example transformations:
 * - "GROCERY STORE #659 11/07 MOBILE PURCHASE ANYTOWN TX" → "grocery store 659"
 * - "Zelle payment from John Smith Conf# AB8KL2MXC" → "zelle payment from john smith"
 * - "DEBIT CARD PURCHASE XXXX1234 COFFEE HOUSE" → "coffee house"
 */

import {
  BOILERPLATE_PHRASES,
  MAX_CITY_TOKENS,
  MIN_REFERENCE_CODE_LENGTH,
  MIN_TOKEN_LENGTH,
  US_STATE_CODES,
} from './constants';
import type { NormalizedDescription } from './types';

/**
 * Placeholder left where a noise segment was removed. Its position matters:
 * a city name is only recognised when it follows removed noise.
 */
const MARK = '\u0000';

// Applied in order on the lowercased description.
const DATE_PATTERNS: RegExp[] = [
  /\b\d{4}-\d{2}-\d{2}\b/g,
  /\b\d{1,2}\/\d{1,2}(?:\/\d{2,4})?\b/g,
];

const REFERENCE_PATTERN = /\b(?:conf|ref|id|trace)\s*(?:#|:|no\.?)\s*[a-z0-9-]+/g;

const MASKED_ACCOUNT_PATTERN = /(?<![a-z0-9])[x*]{2,}-?\d{2,}(?![a-z])/g;

const PHONE_PATTERNS: RegExp[] = [
  /(?<!\d)(?:\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}(?!\d)/g,
  /(?<!\d)\d{3}[-.]\d{4}(?!\d)/g,
  /(?<![\d#])\d{7,11}(?!\d)/g,
];

const REFERENCE_CODE_TOKEN = new RegExp(
  `^(?=[a-z0-9]*[a-z])(?=[a-z0-9]*\\d)[a-z0-9]{${MIN_REFERENCE_CODE_LENGTH},}$`
);

function markAll(text: string, patterns: RegExp[]): string {
  return patterns.reduce((acc, pattern) => acc.replace(pattern, ` ${MARK} `), text);
}

/**
 * Replaces boilerplate words and phrases with a single marker each.
 */
function markBoilerplate(tokens: string[]): string[] {
  const result: string[] = [];
  let index = 0;

  while (index < tokens.length) {
    const phrase = BOILERPLATE_PHRASES.find((words) =>
      words.every((word, offset) => tokens[index + offset] === word)
    );

    if (phrase) {
      result.push(MARK);
      index += phrase.length;
    } else {
      result.push(tokens[index]);
      index += 1;
    }
  }

  return result;
}

const isWord = (token: string): boolean => token !== MARK;

function dropTrailingMarks(tokens: string[]): void {
  while (tokens.length > 0 && tokens[tokens.length - 1] === MARK) {
    tokens.pop();
  }
}

/**
 * Removes a trailing state code, and the city in front of it when the city
 * is separated from a merchant name by removed noise. Leading noise
 * ("POS PURCHASE STARBUCKS SEATTLE WA") separates nothing, so the words
 * after it stay. A state code that is the only word left also stays.
 */
function stripTrailingLocation(tokens: string[]): void {
  dropTrailingMarks(tokens);

  const last = tokens[tokens.length - 1];
  if (last === undefined || !US_STATE_CODES.has(last)) {
    return;
  }
  if (!tokens.slice(0, -1).some(isWord)) {
    return;
  }

  tokens.pop();

  const lastMark = tokens.lastIndexOf(MARK);
  if (lastMark < 0 || tokens.length - lastMark - 1 > MAX_CITY_TOKENS) {
    return;
  }
  if (tokens.slice(0, lastMark).some(isWord)) {
    tokens.length = lastMark;
  }
}

/**
 * One normalization pass. The public function repeats passes until the
 * output stops changing.
 */
function normalizePass(input: string): string {
  let text = input.replace(new RegExp(MARK, 'g'), ' ').toLowerCase();

  text = markAll(text, DATE_PATTERNS);
  text = text.replace(REFERENCE_PATTERN, ` ${MARK} `);
  text = text.replace(MASKED_ACCOUNT_PATTERN, ` ${MARK} `);
  text = markAll(text, PHONE_PATTERNS);

  // Residual punctuation splits tokens
  const rawTokens = text
    .split(/[^a-z0-9\u0000]+/)
    .filter((token) => token.length > 0)
    .map((token) => (REFERENCE_CODE_TOKEN.test(token) ? MARK : token));

  const tokens = markBoilerplate(rawTokens);
  stripTrailingLocation(tokens);

  const words = tokens.filter(isWord);
  // A description made only of boilerplate keeps its words
  return (words.length > 0 ? words : rawTokens.filter(isWord)).join(' ');
}

/**
 * Extracts the significant tokens of an already-normalized description.
 *
 * @param normalized - Output of normalizeDescription
 * @returns Set of alphanumeric runs of at least three characters
 */
export function extractTokens(normalized: string): Set<string> {
  return new Set(
    normalized.split(' ').filter((token) => token.length >= MIN_TOKEN_LENGTH)
  );
}

/**
 * Normalizes a bank description for comparison.
 *
 * Removal rules, in order:
 * 1. Date-like substrings (MM/DD/YYYY, MM/DD, M/D, YYYY-MM-DD)
 * 2. Confirmation/reference codes ("conf#", "id:", letter+digit codes of 6+ chars)
 * 3. Masked account numbers (XXXX1234, ****1234)
 * 4. Phone numbers (7–11 digits with optional separators)
 * 5. Boilerplate keywords, and a trailing state code with its city
 * 6. Residual punctuation collapsed to single spaces
 *
 * Boilerplate is kept when nothing else is left.
 *
 * Pure and idempotent: normalizing the output again returns it unchanged.
 * Non-string input normalizes to the empty description.
 *
 * @example
 * normalizeDescription('GROCERY STORE #659 11/07 MOBILE PURCHASE ANYTOWN TX').normalized
 * // Returns: "grocery store 659"
 */
export function normalizeDescription(raw: unknown): NormalizedDescription {
  let current = typeof raw === 'string' ? raw : '';

  for (;;) {
    const next = normalizePass(current);
    if (next === current) {
      break;
    }
    current = next;
  }

  return {
    normalized: current,
    tokens: extractTokens(current),
  };
}

export default normalizeDescription;
