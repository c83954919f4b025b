import { Hover, MarkupKind, Position } from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';
import type { File } from './ast';
import type { DocumentationSource, NameRegistry } from './names';
import { describe, wordAtPosition } from './script';

export interface HoverOptions {
	// last parse of the document that succeeded; lets command names win over variables of the same name
	tree?: File;
	docs?: DocumentationSource;
}

export async function cmakeHover(doc: TextDocument, params: { position: Position }, registry: NameRegistry, opts?: HoverOptions): Promise<Hover | null> {
	const text = doc.getText();
	const { line, character } = params.position;
	const word = wordAtPosition(text, line, character);
	if (!word) return null;
	const name = describe(text, line, character, registry, opts?.tree);
	if (!name) return null;

	let body = name.help ?? '';
	if (!body && opts?.docs) body = await opts.docs.documentation(name);

	const parts = [`**${name.name}** _(${name.kind})_`];
	if (body.trim()) parts.push('', '```text', body.trimEnd(), '```');
	return {
		contents: { kind: MarkupKind.Markdown, value: parts.join('\n') },
		range: { start: doc.positionAt(word.start), end: doc.positionAt(word.end) },
	};
}
