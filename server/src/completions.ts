import { CompletionItem, CompletionItemKind, CompletionParams, MarkupKind } from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { isNameKind, type DocumentationSource, type NameKind, type NameRegistry } from './names';
import { complete } from './script';
import { AssertNever } from './utils';

export function completionKind(kind: NameKind): CompletionItemKind {
	switch (kind) {
		case 'command': return CompletionItemKind.Function;
		case 'module': return CompletionItemKind.Module;
		case 'policy': return CompletionItemKind.Constant;
		case 'property': return CompletionItemKind.Property;
		case 'variable': return CompletionItemKind.Variable;
		default: return AssertNever(kind, 'completionKind: unsupported name kind');
	}
}

export function cmakeCompletions(doc: TextDocument, params: Pick<CompletionParams, 'position'>, registry: NameRegistry): CompletionItem[] {
	const { line, character } = params.position;
	const { names } = complete(doc.getText(), line, character, registry);
	return names.map((n, i) => ({
		label: n.name,
		kind: completionKind(n.kind),
		detail: n.kind,
		// keep the registry order: kinds of the scope first, then by name
		sortText: String(i).padStart(6, '0'),
		data: { name: n.name, kind: n.kind },
	}));
}

function completionData(data: unknown): { name: string; kind: NameKind } | null {
	if (typeof data !== 'object' || data === null) return null;
	if (!('name' in data) || !('kind' in data)) return null;
	const { name, kind } = data;
	return typeof name === 'string' && isNameKind(kind) ? { name, kind } : null;
}

export async function resolveCompletion(item: CompletionItem, registry: NameRegistry, docs?: DocumentationSource): Promise<CompletionItem> {
	const data = completionData(item.data);
	if (!data) return item;
	const name = registry.get(data.kind, data.name);
	if (!name) return item;
	const text = name.help ?? (docs ? await docs.documentation(name) : '');
	if (!text.trim()) return item;
	return { ...item, documentation: { kind: MarkupKind.PlainText, value: text.trimEnd() } };
}
