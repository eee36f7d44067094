export { Lexer } from "./lexer.ts";
export { lookupBoolean, type Span, type Token, TokenKind } from "./token.ts";
