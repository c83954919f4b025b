import type { Token } from '../core/tokens';
import { tokenEnd } from '../core/tokens';
import { AssertNever } from '../utils';

export type { Token, TokenKind } from '../core/tokens';

// Leaves: a fixed, non-empty run of tokens with no exposed substructure.
export type NonEmptyTokens = readonly [Token, ...Token[]];

export type BracketArgument = { readonly kind: 'bracket_argument'; readonly tokens: NonEmptyTokens };
export type QuotedArgument = { readonly kind: 'quoted_argument'; readonly tokens: NonEmptyTokens };
export type UnquotedArgument = { readonly kind: 'unquoted_argument'; readonly tokens: NonEmptyTokens };
export type BracketComment = { readonly kind: 'bracket_comment'; readonly tokens: NonEmptyTokens };
export type LineComment = { readonly kind: 'line_comment'; readonly tokens: NonEmptyTokens };

export type Argument = BracketArgument | QuotedArgument | UnquotedArgument;
export type Comment = BracketComment | LineComment;
export type Leaf = Argument | Comment;

// Children of a parenthesized list: '(' and ')' tokens, separators, leaves and nested groups.
export type ArgumentChild =
	| Token<'lparen' | 'rparen' | 'space' | 'newline'>
	| Argument
	| Comment
	| GroupedArguments;

export type Arguments = { readonly kind: 'arguments'; readonly children: readonly ArgumentChild[] };
export type GroupedArguments = { readonly kind: 'grouped_arguments'; readonly children: readonly ArgumentChild[] };
export type ArgumentList = Arguments | GroupedArguments;

export type CommandInvocation = {
	readonly kind: 'command_invocation';
	readonly children:
		| readonly [Token<'identifier'>, Arguments]
		| readonly [Token<'identifier'>, Token<'space'>, Arguments];
};

export type FileChild = CommandInvocation | Comment | Token<'newline' | 'space' | 'eof'>;

export type File = { readonly kind: 'file'; readonly children: readonly FileChild[] };

export type Node = File | CommandInvocation | ArgumentList;
export type Syntax = Token | Leaf | Node;

export function isArgument(s: Syntax): s is Argument {
	return s.kind === 'bracket_argument' || s.kind === 'quoted_argument' || s.kind === 'unquoted_argument';
}

export function isToken(s: Syntax): s is Token {
	return 'text' in s && 'start' in s;
}

function firstChild(s: Leaf | Node): Syntax | undefined {
	return 'tokens' in s ? s.tokens[0] : s.children[0];
}

function lastChild(s: Leaf | Node): Syntax | undefined {
	return 'tokens' in s ? s.tokens[s.tokens.length - 1] : s.children[s.children.length - 1];
}

/** Start offset, or -1 for a node without children. */
export function syntaxStart(s: Syntax): number {
	if (isToken(s)) return s.start;
	const first = firstChild(s);
	return first ? syntaxStart(first) : -1;
}

/** End offset (exclusive), or -1 for a node without children. */
export function syntaxEnd(s: Syntax): number {
	if (isToken(s)) return tokenEnd(s);
	const last = lastChild(s);
	return last ? syntaxEnd(last) : -1;
}

export function syntaxText(s: Syntax): string {
	if (isToken(s)) return s.text;
	switch (s.kind) {
		case 'bracket_argument':
		case 'quoted_argument':
		case 'unquoted_argument':
		case 'bracket_comment':
		case 'line_comment':
			return s.tokens.map(t => t.text).join('');
		case 'file':
		case 'command_invocation':
		case 'arguments':
		case 'grouped_arguments': {
			let out = '';
			for (const child of s.children) out += syntaxText(child);
			return out;
		}
		default:
			return AssertNever(s, `syntaxText: unsupported syntax kind`);
	}
}

export function commandName(cmd: CommandInvocation): Token<'identifier'> {
	return cmd.children[0];
}

export function commandArguments(cmd: CommandInvocation): Arguments {
	const c = cmd.children;
	return c.length === 3 ? c[2] : c[1];
}

/** Top-level arguments of a list: leaves and nested groups, separators and comments dropped. */
export function argumentValues(list: ArgumentList): (Argument | GroupedArguments)[] {
	const out: (Argument | GroupedArguments)[] = [];
	for (const child of list.children) {
		if (child.kind === 'grouped_arguments' || isArgument(child)) out.push(child);
	}
	return out;
}

/**
 * Text between the delimiters of a leaf: bracket/quoted content, the comment
 * body after `#`, or the whole text of an unquoted argument. Escapes are not decoded.
 */
export function leafContent(leaf: Leaf): string {
	switch (leaf.kind) {
		case 'unquoted_argument':
			return leaf.tokens.map(t => t.text).join('');
		case 'bracket_argument':
		case 'quoted_argument':
		case 'bracket_comment':
		case 'line_comment':
			return leaf.tokens.filter(t => t.kind === 'text').map(t => t.text).join('');
		default:
			return AssertNever(leaf, 'leafContent: unsupported leaf kind');
	}
}

export function commands(file: File): CommandInvocation[] {
	const out: CommandInvocation[] = [];
	for (const child of file.children) if (child.kind === 'command_invocation') out.push(child);
	return out;
}
