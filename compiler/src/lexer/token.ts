/**
 * Token types for the scrawl reader.
 *
 * @module token
 */

/** Byte-offset range within source text (half-open: `[start, end)`). */
export interface Span {
  start: number;
  end: number;
}

/** Discriminator for every token the lexer can produce. */
export enum TokenKind {
  // Special tokens
  Eof = "EOF",
  Error = "Error",

  // Literals
  NumberLiteral = "NumberLiteral",
  StringLiteral = "StringLiteral",
  True = "true",
  False = "false",

  // Names
  Symbol = "Symbol",

  // Punctuation
  LeftParen = "(",
  RightParen = ")",
}

/**
 * A single lexical token produced by the {@link Lexer}.
 *
 * Every token carries its raw source text (`lexeme`), location information,
 * and an optional pre-parsed `value` for literals.
 */
export interface Token {
  kind: TokenKind;
  /** Raw source text that was consumed to produce this token. */
  lexeme: string;
  /** Byte-offset span within the source file. */
  span: Span;
  /** 1-based line number where the token starts. */
  line: number;
  /** 1-based column number where the token starts. */
  column: number;
  /** Pre-parsed literal value (numbers, strings, booleans). */
  value?: number | string | boolean;
}

/** Punctuation, besides letters, that may start a symbol. */
export const SYMBOL_PUNCTUATION: ReadonlySet<string> = new Set("!$%&*+-./:<=>?@^_~[]");

const BOOLEAN_LITERALS: ReadonlyMap<string, TokenKind> = new Map([
  ["true", TokenKind.True],
  ["false", TokenKind.False],
]);

/** Returns the boolean {@link TokenKind} for `word`, or `undefined` if it is an ordinary symbol. */
export function lookupBoolean(word: string): TokenKind | undefined {
  return BOOLEAN_LITERALS.get(word);
}
