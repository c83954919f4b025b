import { describe, it, expect } from 'vitest';
import { MarkupKind } from 'vscode-languageserver/node';
import { cmakeHover } from '../src/hover';
import { parseCMake } from '../src/ast/parser';
import { docFrom, fakeDocs, hoverText, loadTestNames } from './testUtils';

describe('hover', async () => {
	const names = await loadTestNames();

	it('shows registry help for a variable', async () => {
		const doc = docFrom('set(CMAKE_CXX_STANDARD 17)');
		const hv = await cmakeHover(doc, { position: { line: 0, character: 8 } }, names);
		expect(hv?.contents).toEqual({
			kind: MarkupKind.Markdown,
			value: '**CMAKE_CXX_STANDARD** _(variable)_\n\n```text\nDefault value for CXX_STANDARD target property if set when a target is created.\n```',
		});
		expect(hv?.range).toEqual({ start: { line: 0, character: 4 }, end: { line: 0, character: 22 } });
	});

	it('falls back to the documentation source', async () => {
		const doc = docFrom('include(CTest)');
		const docs = fakeDocs({ CTest: 'CTest module docs\n' });
		const hv = await cmakeHover(doc, { position: { line: 0, character: 10 } }, names, { docs });
		expect(hoverText(hv)).toBe('**CTest** _(module)_\n\n```text\nCTest module docs\n```');
	});

	it('shows only the heading when there is no documentation', async () => {
		const doc = docFrom('include(CTest)');
		const hv = await cmakeHover(doc, { position: { line: 0, character: 10 } }, names, { docs: fakeDocs({}) });
		expect(hoverText(hv)).toBe('**CTest** _(module)_');
	});

	it('resolves a command name through the parsed tree', async () => {
		const src = 'add_library(core STATIC a.c)\n';
		const hv = await cmakeHover(docFrom(src), { position: { line: 0, character: 3 } }, names, { tree: parseCMake(src) });
		expect(hoverText(hv).startsWith('**add_library** _(command)_')).toBe(true);
	});

	it('returns null off words and for unknown names', async () => {
		expect(await cmakeHover(docFrom('foo( )'), { position: { line: 0, character: 4 } }, names)).toBeNull();
		expect(await cmakeHover(docFrom('set(UNKNOWN_THING)'), { position: { line: 0, character: 8 } }, names)).toBeNull();
	});
});
