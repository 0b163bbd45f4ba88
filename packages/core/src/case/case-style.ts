import { ConfigurationError } from '../errors.js';

export const CASE_STYLES = [
  'camel',
  'pascal',
  'snake',
  'screaming-snake',
  'kebab',
  'screaming-kebab',
] as const;

/**
 * Identifier case dialects that can be recognized in text and re-assembled.
 *
 * - camel: `firstName`
 * - pascal: `FirstName`
 * - snake: `first_name`
 * - screaming-snake: `FIRST_NAME`
 * - kebab: `first-name`
 * - screaming-kebab: `FIRST-NAME`
 */
export type CaseStyle = (typeof CASE_STYLES)[number];

const STYLE_ALIASES: Readonly<Record<string, CaseStyle>> = {
  camel: 'camel',
  camelcase: 'camel',
  pascal: 'pascal',
  pascalcase: 'pascal',
  snake: 'snake',
  snakecase: 'snake',
  screamingsnake: 'screaming-snake',
  screamingsnakecase: 'screaming-snake',
  constant: 'screaming-snake',
  kebab: 'kebab',
  kebabcase: 'kebab',
  screamingkebab: 'screaming-kebab',
  screamingkebabcase: 'screaming-kebab',
  cobol: 'screaming-kebab',
};

const UPPERCASE = /^\p{Uppercase}$/u;

export function isCaseStyle(value: string): value is CaseStyle {
  return CASE_STYLES.some((style) => style === value);
}

/**
 * Accepts the canonical tag or a common spelling of it.
 *
 * @example
 * parseCaseStyle('snake_case')           // 'snake'
 * parseCaseStyle('SCREAMING-KEBAB-CASE') // 'screaming-kebab'
 */
export function parseCaseStyle(value: string): CaseStyle {
  if (isCaseStyle(value)) {
    return value;
  }
  const key = value.toLowerCase().replace(/[-_\s]/g, '');
  const style = STYLE_ALIASES[key];
  if (!style) {
    throw new ConfigurationError(
      `Unknown case style '${value}'. Expected one of: ${CASE_STYLES.join(', ')}`,
    );
  }
  return style;
}

export function caseStyleLabel(style: CaseStyle): string {
  switch (style) {
    case 'camel':
      return 'camelCase';
    case 'pascal':
      return 'PascalCase';
    case 'snake':
      return 'snake_case';
    case 'screaming-snake':
      return 'SCREAMING_SNAKE_CASE';
    case 'kebab':
      return 'kebab-case';
    case 'screaming-kebab':
      return 'SCREAMING-KEBAB-CASE';
  }
}

// Letters, marks, digits and connector punctuation in any script.
const IDENTIFIER_CHAR = String.raw`[\p{L}\p{M}\p{N}\p{Pc}]`;

function bounded(body: string): string {
  return `(?<!${IDENTIFIER_CHAR})${body}(?!${IDENTIFIER_CHAR})`;
}

/**
 * Pattern source for a token of this style in running text. A token never
 * touches another identifier character, so `éfooBar` holds no camel token.
 * Every shape needs at least two words, so plain `word` or `Word` never matches.
 * The source uses `\p{...}` classes and must be compiled with the `u` flag.
 */
export function casePattern(style: CaseStyle): string {
  switch (style) {
    case 'camel':
      return bounded(String.raw`[a-z]+(?:[A-Z][a-z0-9]*)+`);
    case 'pascal':
      return bounded(String.raw`[A-Z][a-z0-9]+(?:[A-Z][a-z0-9]*)+`);
    case 'snake':
      return bounded(String.raw`[a-z]+(?:_[a-z0-9]+)+`);
    case 'screaming-snake':
      return bounded(String.raw`[A-Z]+(?:_[A-Z0-9]+)+`);
    case 'kebab':
      return bounded(String.raw`[a-z]+(?:-[a-z0-9]+)+`);
    case 'screaming-kebab':
      return bounded(String.raw`[A-Z]+(?:-[A-Z0-9]+)+`);
  }
}

export function compileCasePattern(style: CaseStyle): RegExp {
  return new RegExp(casePattern(style), 'gu');
}

/**
 * Splits a token into lowercase words.
 *
 * @example
 * splitWords('camel', 'userIDValue') // ['user', 'i', 'd', 'value']
 * splitWords('snake', '__a__b')      // ['a', 'b']
 */
export function splitWords(style: CaseStyle, text: string): string[] {
  switch (style) {
    case 'camel':
    case 'pascal':
      return splitOnHumps(text);
    case 'snake':
    case 'screaming-snake':
      return splitOnSeparator(text, '_');
    case 'kebab':
    case 'screaming-kebab':
      return splitOnSeparator(text, '-');
  }
}

/**
 * Assembles words into a token of this style wrapped in `prefix` and `suffix`.
 * An empty word list yields an empty string without the affixes.
 */
export function joinWords(
  style: CaseStyle,
  words: readonly string[],
  prefix = '',
  suffix = '',
): string {
  if (words.length === 0) {
    return '';
  }

  return `${prefix}${assembleBody(style, words)}${suffix}`;
}

function assembleBody(style: CaseStyle, words: readonly string[]): string {
  switch (style) {
    case 'camel':
      return words[0].toLowerCase() + words.slice(1).map(capitalize).join('');
    case 'pascal':
      return words.map(capitalize).join('');
    case 'snake':
      return words.map((word) => word.toLowerCase()).join('_');
    case 'screaming-snake':
      return words.map((word) => word.toUpperCase()).join('_');
    case 'kebab':
      return words.map((word) => word.toLowerCase()).join('-');
    case 'screaming-kebab':
      return words.map((word) => word.toUpperCase()).join('-');
  }
}

function splitOnHumps(text: string): string[] {
  const words: string[] = [];
  let current = '';

  for (const char of text) {
    if (current !== '' && UPPERCASE.test(char)) {
      words.push(current.toLowerCase());
      current = '';
    }
    current += char;
  }

  if (current !== '') {
    words.push(current.toLowerCase());
  }

  return words;
}

function splitOnSeparator(text: string, separator: '_' | '-'): string[] {
  return text
    .split(separator)
    .filter((segment) => segment !== '')
    .map((segment) => segment.toLowerCase());
}

// Uppercases the first code point only; the rest is left as-is.
function capitalize(word: string): string {
  const [first = '', ...rest] = Array.from(word);
  return first.toUpperCase() + rest.join('');
}
