// Core token model shared by the parser, formatter and query helpers

export type TokenKind =
	| 'eof'
	| 'identifier'
	| 'text'
	| 'newline'
	| 'space'
	| 'lparen'
	| 'rparen'
	| 'lbracket'
	| 'rbracket'
	| 'quote'
	| 'comment_mark';

export interface Token<K extends TokenKind = TokenKind> {
	readonly kind: K;
	readonly start: number;
	readonly text: string;
}

export function makeToken<K extends TokenKind>(kind: K, start: number, text: string): Token<K> {
	return Object.freeze({ kind, start, text });
}

export function tokenEnd(t: Token): number {
	return t.start + t.text.length;
}
