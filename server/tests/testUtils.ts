import path from 'node:path';
import { TextDocument } from 'vscode-languageserver-textdocument';
import type { Hover } from 'vscode-languageserver/node';
import { loadNames, type CMakeName, type DocumentationSource, type NameRegistry } from '../src/names';

export function docFrom(code: string, uri = 'file:///CMakeLists.txt') {
	return TextDocument.create(uri, 'cmake', 1, code);
}

export function fixturePath(rel: string) {
	return path.join(__dirname, 'fixtures', rel);
}

export function loadTestNames(): Promise<NameRegistry> {
	return loadNames(fixturePath('names.yaml'));
}

// Documentation source that answers from a table and records what was asked.
export function fakeDocs(table: Record<string, string>): DocumentationSource & { asked: string[] } {
	const asked: string[] = [];
	return {
		asked,
		async documentation(name: CMakeName) {
			asked.push(`${name.kind}:${name.name}`);
			return table[name.name] ?? '';
		},
	};
}

export function hoverText(h: Hover | null): string {
	if (!h) return '';
	const c = h.contents;
	if (typeof c === 'string') return c;
	if (Array.isArray(c)) return c.map(x => (typeof x === 'string' ? x : x.value)).join('\n');
	return c.value;
}
