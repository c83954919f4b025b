import { describe, it, expect } from 'vitest';
import { CompletionItemKind, MarkupKind } from 'vscode-languageserver/node';
import { cmakeCompletions, completionKind, resolveCompletion } from '../src/completions';
import { docFrom, fakeDocs, loadTestNames } from './testUtils';

describe('completions', async () => {
	const names = await loadTestNames();

	it('offers commands at the start of a line', () => {
		const doc = docFrom('project(demo)\nadd_');
		const items = cmakeCompletions(doc, { position: { line: 1, character: 4 } }, names);
		expect(items).toEqual([
			{ label: 'add_executable', kind: CompletionItemKind.Function, detail: 'command', sortText: '000000', data: { name: 'add_executable', kind: 'command' } },
			{ label: 'add_library', kind: CompletionItemKind.Function, detail: 'command', sortText: '000001', data: { name: 'add_library', kind: 'command' } },
		]);
	});

	it('offers variables before properties after set(', () => {
		const doc = docFrom('set(C');
		const items = cmakeCompletions(doc, { position: { line: 0, character: 5 } }, names);
		expect(items.map(i => [i.label, i.kind])).toEqual([
			['CMAKE_CXX_STANDARD', CompletionItemKind.Variable],
			['CXX_STANDARD', CompletionItemKind.Property],
		]);
	});

	it('offers nothing inside a quoted string', () => {
		const doc = docFrom('message("C');
		expect(cmakeCompletions(doc, { position: { line: 0, character: 10 } }, names)).toEqual([]);
	});

	it('maps every name kind to an item kind', () => {
		expect(completionKind('command')).toBe(CompletionItemKind.Function);
		expect(completionKind('module')).toBe(CompletionItemKind.Module);
		expect(completionKind('policy')).toBe(CompletionItemKind.Constant);
		expect(completionKind('property')).toBe(CompletionItemKind.Property);
		expect(completionKind('variable')).toBe(CompletionItemKind.Variable);
	});
});

describe('completion resolve', async () => {
	const names = await loadTestNames();

	it('adds registry help as documentation', async () => {
		const item = { label: 'set', data: { name: 'set', kind: 'command' } };
		const resolved = await resolveCompletion(item, names);
		expect(resolved.documentation).toEqual({
			kind: MarkupKind.PlainText,
			value: 'Set a normal, cache, or environment variable to a given value.',
		});
	});

	it('asks the documentation source when the registry has no help', async () => {
		const docs = fakeDocs({ CTest: 'Configure a project for testing with CTest.\n\n' });
		const resolved = await resolveCompletion({ label: 'CTest', data: { name: 'CTest', kind: 'module' } }, names, docs);
		expect(resolved.documentation).toEqual({ kind: MarkupKind.PlainText, value: 'Configure a project for testing with CTest.' });
		expect(docs.asked).toEqual(['module:CTest']);
	});

	it('leaves items it cannot resolve unchanged', async () => {
		const unknown = { label: 'x', data: { name: 'x', kind: 'target' } };
		expect(await resolveCompletion(unknown, names)).toBe(unknown);
		const noDocs = { label: 'CTest', data: { name: 'CTest', kind: 'module' } };
		expect(await resolveCompletion(noDocs, names)).toBe(noDocs);
	});
});
