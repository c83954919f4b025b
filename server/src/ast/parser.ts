/*
	Recursive-descent parser for the CMake language.
	Every production tries to match at the current offset and returns null when
	it does not apply; alternatives are tried in order and the first match wins.
	Whitespace and newlines are kept as tokens so the tree reproduces the source
	exactly. A required terminal that is missing raises CMakeSyntaxError.
*/
import type {
	ArgumentChild, Arguments, BracketArgument, BracketComment, Comment, CommandInvocation,
	File, FileChild, GroupedArguments, LineComment, NonEmptyTokens, QuotedArgument, UnquotedArgument,
} from './index';
import { makeToken, type Token, type TokenKind } from '../core/tokens';
import { Matcher, sticky } from '../core/matcher';
import { formatTextPos, rowcol, type TextPos } from '../core/position';

/**
 * How the closing bracket of `[=*[ ... ]=*]` is found.
 * - `strict`: the close must carry the same number of `=` as the open; any other `]` is content.
 * - `loose`: content is any text without `]`, and the first `]=*]` closes regardless of its `=` count.
 */
export type BracketMatching = 'strict' | 'loose';

export interface ParseOptions {
	bracketMatching?: BracketMatching;
}

export class CMakeSyntaxError extends Error {
	readonly offset: number;
	readonly row: number;
	readonly col: number;

	constructor(message: string, offset: number, pos: TextPos) {
		super(`${message} (line ${pos.row}, column ${pos.col})`);
		this.name = 'CMakeSyntaxError';
		this.offset = offset;
		this.row = pos.row;
		this.col = pos.col;
	}
}

const PATTERNS = {
	eof: sticky('$'),
	identifier: sticky('[A-Za-z_][A-Za-z0-9_]*'),
	space: sticky('[ \\t]+'),
	newline: sticky('\\r\\n|\\n'),
	lparen: sticky('\\('),
	rparen: sticky('\\)'),
	bracketOpen: sticky('\\[(=*)\\['),
	bracketClose: sticky('\\]=*\\]'),
	looseBracketText: sticky('[^\\]]+'),
	quote: sticky('"'),
	quotedText: sticky('(?:\\\\[\\s\\S]|[^"\\\\])+'),
	unquoted: sticky('(?:[^()#"\\\\\\s]|\\\\[^A-Za-z0-9;]|\\\\[trn;])+'),
	commentMark: sticky('#'),
	// a lone CR belongs to the comment, the CR of a CRLF does not
	lineCommentText: sticky('(?:[^\\r\\n]|\\r(?!\\n))*'),
} as const;

function escapeRegExp(s: string): string {
	return s.replace(/[.*+?^${}()|[\]\\]/g, r => `\\${r}`);
}

export class CMakeParser {
	private readonly m: Matcher;
	private readonly bracketMatching: BracketMatching;
	// strict bracket content/close patterns, one pair per `=` count
	private readonly bracketPatterns = new Map<number, { text: RegExp; close: RegExp }>();

	constructor(source: string, opts?: ParseOptions) {
		this.m = new Matcher(source);
		this.bracketMatching = opts?.bracketMatching ?? 'strict';
	}

	get source(): string { return this.m.source; }

	parse(): File {
		this.m.reset(0);
		const children: FileChild[] = [];
		for (;;) {
			const child = this.fileElement();
			children.push(child);
			if (child.kind === 'eof') break;
		}
		return { kind: 'file', children: Object.freeze(children) };
	}

	private fail(message: string, offset = this.m.offset): never {
		throw new CMakeSyntaxError(message, offset, rowcol(this.m.source, offset));
	}

	private nextDescription(): string {
		if (this.m.atEnd()) return 'end of input';
		const ch = this.m.rest().charAt(0);
		return ch === '\r' || ch === '\n' ? 'line break' : `'${ch}'`;
	}

	private token<K extends TokenKind>(kind: K, pattern: RegExp): Token<K> | null {
		const hit = this.m.eat(pattern);
		return hit ? makeToken(kind, hit.start, hit.text) : null;
	}

	private fileElement(): FileChild {
		const child = this.commandInvocation()
			?? this.comment()
			?? this.token('newline', PATTERNS.newline)
			?? this.token('space', PATTERNS.space)
			?? this.token('eof', PATTERNS.eof);
		if (!child) this.fail(`unexpected ${this.nextDescription()}`);
		return child;
	}

	private commandInvocation(): CommandInvocation | null {
		const ident = this.token('identifier', PATTERNS.identifier);
		if (!ident) return null;
		const space = this.token('space', PATTERNS.space);
		const args = this.parenthesized();
		if (!args) this.fail(`requires '(' after identifier '${ident.text}', found ${this.nextDescription()}`);
		const list: Arguments = { kind: 'arguments', children: args };
		return {
			kind: 'command_invocation',
			children: Object.freeze(space ? [ident, space, list] as const : [ident, list] as const),
		};
	}

	private parenthesized(): readonly ArgumentChild[] | null {
		const lparen = this.token('lparen', PATTERNS.lparen);
		if (!lparen) return null;
		const children: ArgumentChild[] = [lparen];
		for (let arg = this.argument(); arg; arg = this.argument()) children.push(arg);
		const rparen = this.token('rparen', PATTERNS.rparen);
		if (!rparen) this.fail(`require ')' to close '(' opened at ${formatTextPos(rowcol(this.m.source, lparen.start))}`);
		children.push(rparen);
		return Object.freeze(children);
	}

	private argument(): ArgumentChild | null {
		return this.groupedArguments()
			?? this.bracketArgument()
			?? this.quotedArgument()
			?? this.unquotedArgument()
			?? this.token('space', PATTERNS.space)
			?? this.token('newline', PATTERNS.newline)
			?? this.comment();
	}

	private groupedArguments(): GroupedArguments | null {
		const children = this.parenthesized();
		return children ? { kind: 'grouped_arguments', children } : null;
	}

	private bracket(): NonEmptyTokens | null {
		const open = this.m.eat(PATTERNS.bracketOpen);
		if (!open) return null;
		const tokens: [Token, ...Token[]] = [makeToken('lbracket', open.start, open.text)];
		const eqCount = (open.groups[0] ?? '').length;
		const { text, close } = this.bracketPatternsFor(eqCount);
		const body = this.token('text', text);
		if (body) tokens.push(body);
		const closing = this.token('rbracket', close);
		if (!closing) {
			const expected = this.bracketMatching === 'strict' ? `']${'='.repeat(eqCount)}]'` : `']=*]'`;
			this.fail(`require ${expected} to close '${open.text}'`);
		}
		tokens.push(closing);
		return Object.freeze(tokens);
	}

	private bracketPatternsFor(eqCount: number): { text: RegExp; close: RegExp } {
		if (this.bracketMatching === 'loose') return { text: PATTERNS.looseBracketText, close: PATTERNS.bracketClose };
		let hit = this.bracketPatterns.get(eqCount);
		if (!hit) {
			const closeSrc = escapeRegExp(`]${'='.repeat(eqCount)}]`);
			hit = { text: sticky(`(?:(?!${closeSrc})[\\s\\S])+`), close: sticky(closeSrc) };
			this.bracketPatterns.set(eqCount, hit);
		}
		return hit;
	}

	private bracketArgument(): BracketArgument | null {
		const tokens = this.bracket();
		return tokens ? { kind: 'bracket_argument', tokens } : null;
	}

	private quotedArgument(): QuotedArgument | null {
		const open = this.token('quote', PATTERNS.quote);
		if (!open) return null;
		const tokens: [Token, ...Token[]] = [open];
		const body = this.token('text', PATTERNS.quotedText);
		if (body) tokens.push(body);
		const close = this.token('quote', PATTERNS.quote);
		if (!close) this.fail(`require '"' to close the quoted argument opened at ${formatTextPos(rowcol(this.m.source, open.start))}`);
		tokens.push(close);
		return { kind: 'quoted_argument', tokens: Object.freeze(tokens) };
	}

	private unquotedArgument(): UnquotedArgument | null {
		const text = this.token('text', PATTERNS.unquoted);
		return text ? { kind: 'unquoted_argument', tokens: Object.freeze([text] as const) } : null;
	}

	private comment(): Comment | null {
		const mark = this.token('comment_mark', PATTERNS.commentMark);
		if (!mark) return null;
		const bracket = this.bracket();
		if (bracket) {
			const tokens: NonEmptyTokens = Object.freeze([mark, ...bracket] as const);
			const out: BracketComment = { kind: 'bracket_comment', tokens };
			return out;
		}
		// `.*` style: always matches, possibly empty
		const hit = this.m.eat(PATTERNS.lineCommentText);
		const body = makeToken('text', hit ? hit.start : this.m.offset, hit ? hit.text : '');
		const out: LineComment = { kind: 'line_comment', tokens: Object.freeze([mark, body] as const) };
		return out;
	}
}

export function parseCMake(source: string, opts?: ParseOptions): File {
	return new CMakeParser(source, opts).parse();
}
