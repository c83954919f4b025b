/*
	Cursor-context helpers for editor services. Word lookup and scope
	classification work on raw text, so they keep answering while the buffer
	does not parse; tree lookups take an already parsed File.
*/
import type { Argument, ArgumentList, CommandInvocation, File } from './ast';
import { argumentValues, commandArguments, commandName, commands, syntaxEnd, syntaxStart } from './ast';
import type { CMakeName, NameKind, NameRegistry } from './names';
import { AssertNever } from './utils';

export interface WordAt {
	name: string;
	start: number;
	end: number; // exclusive
}

const LINE_BREAK = /\r\n|\r|\n/;

/** The `\w+` run on the offset's line whose span contains the offset (inclusive of its end). */
export function wordAt(source: string, offset: number): WordAt | null {
	if (offset < 0 || offset > source.length) return null;
	const lineStart = Math.max(source.lastIndexOf('\n', offset - 1), source.lastIndexOf('\r', offset - 1)) + 1;
	let lineEnd = offset;
	while (lineEnd < source.length && source[lineEnd] !== '\n' && source[lineEnd] !== '\r') lineEnd++;
	const line = source.slice(lineStart, lineEnd);
	const col = offset - lineStart;
	const re = /\w+/g;
	let m: RegExpExecArray | null;
	while ((m = re.exec(line))) {
		const start = m.index;
		const end = start + m[0].length;
		if (start <= col && col <= end) return { name: m[0], start: lineStart + start, end: lineStart + end };
		if (start > col) break;
	}
	return null;
}

/** Same as wordAt, keyed by a 0-based line and character. */
export function wordAtPosition(source: string, line: number, character: number): WordAt | null {
	const lines = source.split(LINE_BREAK);
	const text = lines[line];
	if (text === undefined || character < 0 || character > text.length) return null;
	return wordAt(source, lineOffset(source, line) + character);
}

function lineOffset(source: string, line: number): number {
	let offset = 0;
	for (let l = 0; l < line; l++) {
		const m = LINE_BREAK.exec(source.slice(offset));
		if (!m) return source.length;
		offset += m.index + m[0].length;
	}
	return offset;
}

export type Scope = 'command' | 'setter' | 'access' | 'include' | 'params' | 'value' | 'unknown';

export interface ScopeMatch {
	scope: Scope;
	// identifier text typed so far at the cursor
	prefix: string;
}

// Ordered: the first pattern matching the text before the cursor decides.
const SCOPE_PATTERNS: readonly (readonly [Exclude<Scope, 'unknown'>, RegExp])[] = [
	['command', /^\s*(\w*)$/i],
	['setter', /set\((\w*)$/i],
	['access', /\$\{(\w*)$/i],
	['include', /include\((\w*)$/i],
	['params', /\w+\((\w*)$/i],
	['value', /\w+\(\w+ (?:\w+ )*(\w*)$/i],
];

export function classifyScope(textBeforeCursor: string): ScopeMatch {
	for (const [scope, pattern] of SCOPE_PATTERNS) {
		const m = pattern.exec(textBeforeCursor);
		if (m) return { scope, prefix: m[1] ?? '' };
	}
	return { scope: 'unknown', prefix: '' };
}

/** Classify the cursor at a 0-based line and character. */
export function getScope(source: string, line: number, character: number): ScopeMatch {
	const text = source.split(LINE_BREAK)[line];
	if (text === undefined) return { scope: 'unknown', prefix: '' };
	return classifyScope(text.slice(0, Math.max(0, character)));
}

export function candidateKinds(scope: Scope): readonly NameKind[] {
	switch (scope) {
		case 'command': return ['command'];
		case 'setter':
		case 'access':
		case 'value':
			return ['variable', 'property'];
		case 'include': return ['module'];
		case 'params': return ['module', 'variable', 'property'];
		case 'unknown': return [];
		default: return AssertNever(scope, 'candidateKinds: unsupported scope');
	}
}

/** Candidate names for the cursor's scope whose name starts with the typed prefix (case-insensitive). */
export function complete(source: string, line: number, character: number, registry: NameRegistry): { scope: ScopeMatch; names: CMakeName[] } {
	const scope = getScope(source, line, character);
	const prefix = scope.prefix.toLowerCase();
	const names = registry.list(candidateKinds(scope.scope)).filter(n => n.name.toLowerCase().startsWith(prefix));
	return { scope, names };
}

/**
 * The registry entry named by the word under the cursor, or null. With a
 * parsed tree, a word on a command identifier resolves to a command first.
 */
export function describe(source: string, line: number, character: number, registry: NameRegistry, tree?: File): CMakeName | null {
	const word = wordAtPosition(source, line, character);
	if (!word) return null;
	const cmd = tree ? commandAt(tree, word.start) : null;
	const ident = cmd ? commandName(cmd) : null;
	const onCommandName = !!ident && ident.start === word.start && ident.text === word.name;
	const scope = getScope(source, line, character);
	const preferred: NameKind[] = onCommandName ? ['command'] : [...candidateKinds(scope.scope)];
	return registry.find(word.name, preferred);
}

/**
 * A tree parsed from earlier text, when lookups at `offset` can still use it:
 * the current text must be unchanged up to the offset.
 */
export function treeForOffset(tree: File, treeText: string, text: string, offset: number): File | undefined {
	const limit = Math.min(treeText.length, text.length);
	let same = 0;
	while (same < limit && treeText.charCodeAt(same) === text.charCodeAt(same)) same++;
	return offset < same ? tree : undefined;
}

function contains(start: number, end: number, offset: number): boolean {
	return start >= 0 && start <= offset && offset <= end;
}

export function commandAt(file: File, offset: number): CommandInvocation | null {
	for (const cmd of commands(file)) {
		if (contains(syntaxStart(cmd), syntaxEnd(cmd), offset)) return cmd;
	}
	return null;
}

function argumentIn(list: ArgumentList, offset: number): Argument | null {
	for (const arg of argumentValues(list)) {
		if (!contains(syntaxStart(arg), syntaxEnd(arg), offset)) continue;
		return arg.kind === 'grouped_arguments' ? argumentIn(arg, offset) : arg;
	}
	return null;
}

/** The innermost argument leaf spanning the offset, looking through nested groups. */
export function argumentAt(file: File, offset: number): Argument | null {
	const cmd = commandAt(file, offset);
	return cmd ? argumentIn(commandArguments(cmd), offset) : null;
}
