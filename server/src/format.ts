import { TextDocument } from 'vscode-languageserver-textdocument';
import { TextEdit, Range } from 'vscode-languageserver/node';
import type { ArgumentChild, CommandInvocation, File } from './ast';
import { commandArguments, commandName, isToken, syntaxText } from './ast';
import { parseCMake, type ParseOptions } from './ast/parser';
import { AssertNever } from './utils';

export interface FormatSettings {
	enabled: boolean;
	// blank lines kept in a row between top-level elements
	maxBlankLines: number;
	// blank lines kept in a row inside an argument list
	maxArgumentBlankLines: number;
}

export const DEFAULT_FORMAT_SETTINGS: FormatSettings = Object.freeze({
	enabled: true,
	maxBlankLines: 3,
	maxArgumentBlankLines: 1,
});

// Output fragment. Verbatim pieces (quoted, bracket and unquoted arguments, bracket comments)
// are never stripped or clamped, their newlines included.
type Piece = { text: string; verbatim: boolean };

const plain = (text: string): Piece => ({ text, verbatim: false });
const verbatim = (text: string): Piece => ({ text, verbatim: true });
const joinPieces = (pieces: readonly Piece[]) => pieces.map(p => p.text).join('');

export interface NormalizeOptions {
	maxNewline: number;
	// end the text with exactly one newline (file scope only)
	normalizeEof: boolean;
}

type Line = { segments: Piece[]; terminator: Piece | null };

function splitLines(pieces: readonly Piece[]): Line[] {
	const lines: Line[] = [];
	let current: Piece[] = [];
	for (const p of pieces) {
		// same line breaks as the parser: a lone CR is line content
		const parts = p.text.split(/(\r\n|\n)/);
		for (let i = 0; i < parts.length; i++) {
			const part = parts[i] ?? '';
			if (i % 2 === 1) {
				lines.push({ segments: current, terminator: p.verbatim ? verbatim(part) : plain('\n') });
				current = [];
				continue;
			}
			// keep empty verbatim segments: they mark a line that starts inside a string or bracket.
			// A piece ending on its line break (an escaped newline in an unquoted argument) leaves no such line.
			const endsOnBreak = i === parts.length - 1 && i > 0;
			if (part || (p.verbatim && !endsOnBreak)) current.push({ text: part, verbatim: p.verbatim });
		}
	}
	lines.push({ segments: current, terminator: null });
	// a trailing line break does not open a new line
	if (lines.length > 1 && lines[lines.length - 1]?.segments.length === 0) lines.pop();
	return lines;
}

function stripTrailing(segments: readonly Piece[]): Piece[] {
	const out = segments.slice();
	while (out.length > 0) {
		const last = out[out.length - 1];
		if (!last || last.verbatim) break;
		const text = last.text.replace(/\s+$/, '');
		if (text) { out[out.length - 1] = plain(text); break; }
		out.pop();
	}
	return out;
}

function normalizePieces(pieces: readonly Piece[], opts: NormalizeOptions): Piece[] {
	const kept: Line[] = [];
	let blankRun = 0;
	for (const line of splitLines(pieces)) {
		const segments = stripTrailing(line.segments);
		if (segments.length === 0) {
			blankRun++;
			if (blankRun > opts.maxNewline) continue;
		} else {
			blankRun = 0;
		}
		kept.push({ segments, terminator: line.terminator });
	}
	if (opts.normalizeEof) {
		while (kept.length > 0 && kept[kept.length - 1]?.segments.length === 0) kept.pop();
	}
	const out: Piece[] = [];
	kept.forEach((line, i) => {
		out.push(...line.segments);
		if (i < kept.length - 1) out.push(line.terminator ?? plain('\n'));
	});
	if (opts.normalizeEof && kept.length > 0) out.push(plain('\n'));
	return out;
}

/** Strip trailing whitespace per line and clamp runs of blank lines. */
export function normalizeNewline(text: string, opts: NormalizeOptions): string {
	return joinPieces(normalizePieces([plain(text)], opts));
}

function formatArgumentList(children: readonly ArgumentChild[], settings: FormatSettings): Piece[] {
	const out: Piece[] = [];
	for (let i = 0; i < children.length; i++) {
		const child = children[i];
		if (!child) continue;
		if (isToken(child)) {
			const kind = child.kind;
			switch (kind) {
				case 'lparen':
				case 'rparen':
				case 'newline':
					out.push(plain(child.text));
					break;
				case 'space': {
					const prev = children[i - 1];
					const next = children[i + 1];
					// indentation after a line break is intentional
					if (prev?.kind === 'newline') { out.push(plain(child.text)); break; }
					if (!prev || prev.kind === 'lparen' || prev.kind === 'space') break;
					if (!next || next.kind === 'rparen') break;
					out.push(plain(' '));
					break;
				}
				default:
					AssertNever(kind, 'format: unsupported token in argument list');
			}
			continue;
		}
		switch (child.kind) {
			case 'grouped_arguments':
				out.push(...formatArgumentList(child.children, settings));
				break;
			case 'bracket_argument':
			case 'quoted_argument':
			case 'unquoted_argument':
			case 'bracket_comment':
				out.push(verbatim(syntaxText(child)));
				break;
			case 'line_comment':
				out.push(plain(syntaxText(child)));
				break;
			default:
				AssertNever(child, 'format: unsupported argument');
		}
	}
	return normalizePieces(out, { maxNewline: settings.maxArgumentBlankLines, normalizeEof: false });
}

function formatCommand(cmd: CommandInvocation, settings: FormatSettings): Piece[] {
	const out: Piece[] = [plain(commandName(cmd).text)];
	// identifier [space] arguments: any run of spaces becomes one
	if (cmd.children.length === 3) out.push(plain(' '));
	out.push(...formatArgumentList(commandArguments(cmd).children, settings));
	return out;
}

export function formatFile(file: File, settings: FormatSettings = DEFAULT_FORMAT_SETTINGS): string {
	const out: Piece[] = [];
	const children = file.children;
	for (let i = 0; i < children.length; i++) {
		const child = children[i];
		if (!child) continue;
		if (isToken(child)) {
			const kind = child.kind;
			switch (kind) {
				case 'eof':
					break;
				case 'newline':
					out.push(plain(child.text));
					break;
				case 'space': {
					// trailing whitespace before a line break or the end of input is dropped
					const next = children[i + 1];
					if (!next || next.kind === 'newline' || next.kind === 'eof') break;
					out.push(plain(child.text));
					break;
				}
				default:
					AssertNever(kind, 'format: unsupported token at file scope');
			}
			continue;
		}
		switch (child.kind) {
			case 'command_invocation':
				out.push(...formatCommand(child, settings));
				break;
			case 'bracket_comment':
				out.push(verbatim(syntaxText(child)));
				break;
			case 'line_comment':
				out.push(plain(syntaxText(child)));
				break;
			default:
				AssertNever(child, 'format: unsupported file element');
		}
	}
	return joinPieces(normalizePieces(out, { maxNewline: settings.maxBlankLines, normalizeEof: true }));
}

/** Parse and format in one go; throws CMakeSyntaxError on invalid input. */
export function formatSource(text: string, settings: FormatSettings = DEFAULT_FORMAT_SETTINGS, opts?: ParseOptions): string {
	return formatFile(parseCMake(text, opts), settings);
}

export function formatDocumentEdits(doc: TextDocument, file: File, settings: FormatSettings): TextEdit[] {
	const text = doc.getText();
	const out = formatFile(file, settings);
	if (out === text) return [];
	const full: Range = { start: doc.positionAt(0), end: doc.positionAt(text.length) };
	return [{ range: full, newText: out }];
}
