import { describe, it, expect } from 'vitest';
import { parseCMake } from '../src/ast/parser';
import { DEFAULT_FORMAT_SETTINGS, formatDocumentEdits, formatSource, normalizeNewline, type FormatSettings } from '../src/format';
import { docFrom } from './testUtils';

function fmt(input: string, settings?: Partial<FormatSettings>) {
	return formatSource(input, { ...DEFAULT_FORMAT_SETTINGS, ...settings });
}

describe('formatter basics', () => {
	it('collapses whitespace inside argument lists', () => {
		expect(fmt('command(   a    b )\n')).toBe('command(a b)\n');
	});

	it('keeps one space between a command name and (', () => {
		expect(fmt('set    (X 1)\n')).toBe('set (X 1)\n');
		expect(fmt('set(X 1)\n')).toBe('set(X 1)\n');
	});

	it('formats nested groups', () => {
		expect(fmt('if( (A  AND B) OR C )\n')).toBe('if((A AND B) OR C)\n');
	});

	it('drops a space before a line break inside arguments', () => {
		expect(fmt('foo(a \n  b)\n')).toBe('foo(a\n  b)\n');
	});

	it('keeps indentation after a line break', () => {
		const src = 'set(X\n    a\n    b)\n';
		expect(fmt(src)).toBe(src);
	});

	it('keeps a lone carriage return in a comment on its line', () => {
		expect(fmt('# a\rb\nx()\n')).toBe('# a\rb\nx()\n');
	});

	it('strips trailing whitespace after comments', () => {
		expect(fmt('a() # note   \n')).toBe('a() # note\n');
		expect(fmt('   \nb()\n')).toBe('\nb()\n');
	});

	it('ends the output with exactly one newline', () => {
		expect(fmt('a()')).toBe('a()\n');
		expect(fmt('a()\n\n\n')).toBe('a()\n');
		expect(fmt('')).toBe('');
		expect(fmt('\n\n')).toBe('');
	});
});

describe('formatter blank lines', () => {
	it('clamps blank lines between commands', () => {
		const src = 'a()' + '\n'.repeat(10) + 'b()\n';
		expect(fmt(src)).toBe('a()\n\n\n\nb()\n');
		expect(fmt('a()\n\nb()\n', { maxBlankLines: 0 })).toBe('a()\nb()\n');
	});

	it('clamps blank lines inside argument lists', () => {
		expect(fmt('foo(a\n\n\n\nb)\n')).toBe('foo(a\n\nb)\n');
		expect(fmt('foo(a\n\n\n\nb)\n', { maxArgumentBlankLines: 0 })).toBe('foo(a\nb)\n');
		// an unquoted argument ending in an escaped line break
		expect(fmt('foo(a\\\n\n\n\n\nb)\n')).toBe('foo(a\\\n\nb)\n');
	});

	it('normalizes free text', () => {
		expect(normalizeNewline('a  \n\n\n\nb', { maxNewline: 1, normalizeEof: false })).toBe('a\n\nb');
		expect(normalizeNewline('a\n\n', { maxNewline: 3, normalizeEof: true })).toBe('a\n');
	});
});

describe('formatter keeps literal text', () => {
	it('leaves quoted arguments untouched, line breaks included', () => {
		const src = 'message("a   \n\n\n\n   b")\n';
		expect(fmt(src)).toBe(src);
	});

	it('leaves bracket arguments and comments untouched', () => {
		const src = 'set(X [=[ keep   \n  this ]=])\n#[[ block   \n]]\n';
		expect(fmt(src)).toBe(src);
	});

	it('is idempotent', () => {
		const inputs = [
			'command(   a    b )\n',
			'  if( (A  AND B) OR C )   \n\n\n\n\n\nendif( )',
			'set(X # c  \n\n\n   "q  \n"  [[ b ]] )\n',
		];
		for (const src of inputs) {
			const once = fmt(src);
			expect(fmt(once)).toBe(once);
		}
	});
});

describe('formatDocumentEdits', () => {
	it('returns no edits for formatted text', () => {
		const doc = docFrom('a()\n');
		expect(formatDocumentEdits(doc, parseCMake(doc.getText()), DEFAULT_FORMAT_SETTINGS)).toEqual([]);
	});

	it('replaces the whole document', () => {
		const doc = docFrom('a(  )');
		const edits = formatDocumentEdits(doc, parseCMake(doc.getText()), DEFAULT_FORMAT_SETTINGS);
		expect(edits).toEqual([{ range: { start: { line: 0, character: 0 }, end: { line: 0, character: 5 } }, newText: 'a()\n' }]);
	});
});
