import {
	createConnection,
	TextDocuments,
	ProposedFeatures,
	InitializeParams,
	DidChangeConfigurationNotification,
	CompletionItem,
	TextDocumentSyncKind,
	InitializeResult,
	type Connection,
	CompletionParams,
	HoverParams,
	Hover,
	Diagnostic,
	DocumentFormattingParams,
	TextEdit,
} from 'vscode-languageserver/node';
import 'source-map-support/register.js';
import fs from 'node:fs';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { URI } from 'vscode-uri';
import type { File } from './ast';
import { cmakeCompletions, resolveCompletion } from './completions';
import { cmakeHover } from './hover';
import { syntaxDiagnostics } from './diagnostics';
import { formatDocumentEdits } from './format';
import { HelpCli, loadOrFetchRegistry } from './cmakeHelp';
import { NameRegistry } from './names';
import { treeForOffset } from './script';
import { applySettings, configSection, defaultSettings } from './settings';
import { djb2Hash, stableStringify } from './utils';

const connection: Connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

const settings = defaultSettings();
// Directory cmake runs in; the first workspace folder when there is one
let workspaceRoot: string | undefined;

function writeLogFile(line: string) {
	if (!settings.logFile) return;
	try {
		fs.appendFileSync(settings.logFile, `${new Date().toISOString()} ${line}\n`);
	} catch (e) {
		if (settings.debug) console.warn('[cmake-lsp] failed to append log file', e);
	}
}

function log(message: string) {
	connection.console.log(`[cmake-lsp] ${message}`);
	writeLogFile(message);
}

function logError(message: string, e?: unknown) {
	const detail = e === undefined ? message : `${message}: ${e instanceof Error ? e.message : String(e)}`;
	connection.console.error(`[cmake-lsp] ${detail}`);
	writeLogFile(detail);
}

function debug(message: string) {
	if (settings.debug) log(message);
}

// -------------------------------------------------
// Per-document parse cache
// -------------------------------------------------
type PipelineCache = {
	version: number;
	textHash: number;
	// hash of the settings the parse depends on
	configHash: number;
	// null when the current text does not parse
	file: File | null;
	diagnostics: Diagnostic[];
	// last tree that parsed and its text, kept for hover while the text is broken
	lastGood: { file: File; text: string } | null;
};
const pipelineCache = new Map<string, PipelineCache>(); // key: doc.uri

function computeConfigHash(): number {
	return djb2Hash(stableStringify(settings.parser));
}

function getPipeline(doc: TextDocument): PipelineCache {
	const key = doc.uri;
	const text = doc.getText();
	const textHash = djb2Hash(text);
	const configHash = computeConfigHash();
	const hit = pipelineCache.get(key);
	if (hit && hit.version === doc.version && hit.textHash === textHash && hit.configHash === configHash) return hit;

	const { file, diagnostics } = syntaxDiagnostics(doc, { bracketMatching: settings.parser.bracketMatching });
	const entry: PipelineCache = {
		version: doc.version,
		textHash,
		configHash,
		file,
		diagnostics,
		lastGood: file ? { file, text } : hit?.lastGood ?? null,
	};
	pipelineCache.set(key, entry);
	return entry;
}

// -------------------------------------------------
// Name registry, shared by every request
// -------------------------------------------------
let helpCli: HelpCli | null = null;
let registryPromise: Promise<NameRegistry> | null = null;

function getHelpCli(): HelpCli {
	if (!helpCli || helpCli.cmakePath !== settings.cmakePath || helpCli.cwd !== workspaceRoot) {
		helpCli = new HelpCli(settings.cmakePath, workspaceRoot);
	}
	return helpCli;
}

async function loadRegistry(): Promise<NameRegistry> {
	try {
		const res = await loadOrFetchRegistry(settings.namesCachePath, getHelpCli());
		if (res.cacheError) debug(`names cache not used: ${res.cacheError}`);
		log(`loaded ${res.registry.size} names ${res.fromCache ? `from ${settings.namesCachePath}` : `from ${settings.cmakePath}`}`);
		return res.registry;
	} catch (e) {
		// keep serving with no names until the configuration changes or caches are cleared
		logError('failed to load CMake names', e);
		return new NameRegistry();
	}
}

// one load in flight at a time; every request awaits the same promise
function getRegistry(): Promise<NameRegistry> {
	if (!registryPromise) registryPromise = loadRegistry();
	return registryPromise;
}

function resetCaches() {
	pipelineCache.clear();
	registryPromise = null;
	helpCli = null;
}

async function validateTextDocument(doc: TextDocument) {
	try {
		const entry = getPipeline(doc);
		await connection.sendDiagnostics({ uri: doc.uri, diagnostics: entry.diagnostics });
	} catch (e) {
		logError(`diagnostics failed for ${doc.uri}`, e);
	}
}

async function revalidateAllOpenDocs() {
	for (const d of documents.all()) await validateTextDocument(d);
}

connection.onInitialize((params: InitializeParams): InitializeResult => {
	applySettings(settings, params.initializationOptions);
	const root = params.workspaceFolders?.[0]?.uri ?? params.rootUri;
	if (root) {
		const u = URI.parse(root);
		if (u.scheme === 'file') workspaceRoot = u.fsPath;
	}
	writeLogFile('initialized');

	return {
		capabilities: {
			textDocumentSync: TextDocumentSyncKind.Incremental,
			completionProvider: { resolveProvider: true, triggerCharacters: ['(', '{', ' '] },
			hoverProvider: true,
			documentFormattingProvider: true,
		},
	};
});

connection.onInitialized(async () => {
	try {
		await connection.client.register(DidChangeConfigurationNotification.type, undefined);
	} catch (e) {
		debug(`client does not accept configuration registration: ${String(e)}`);
	}
	// warm the registry so the first completion does not wait on cmake
	await getRegistry();
});

// Manual cache clear request (invoked by client command)
connection.onRequest('cmake/clearCaches', async () => {
	log('clearCaches request: flushing caches');
	resetCaches();
	await revalidateAllOpenDocs();
	return { ok: true };
});

connection.onDidChangeConfiguration(async change => {
	const prevCmake = settings.cmakePath;
	const prevCache = settings.namesCachePath;
	const changed = applySettings(settings, configSection(change.settings, 'cmake'));
	if (!changed) return;
	if (settings.cmakePath !== prevCmake || settings.namesCachePath !== prevCache) {
		registryPromise = null;
		helpCli = null;
	}
	// parse settings are part of the cache key; revalidating picks up bracketMatching changes
	await revalidateAllOpenDocs();
});

documents.onDidChangeContent(change => {
	void validateTextDocument(change.document);
});

documents.onDidClose(e => {
	pipelineCache.delete(e.document.uri);
});

connection.onCompletion(async (params: CompletionParams, token): Promise<CompletionItem[]> => {
	if (token?.isCancellationRequested) return [];
	const doc = documents.get(params.textDocument.uri); if (!doc) return [];
	const registry = await getRegistry();
	if (token?.isCancellationRequested) return [];
	return cmakeCompletions(doc, params, registry);
});

connection.onCompletionResolve(async (item: CompletionItem): Promise<CompletionItem> => {
	try {
		return await resolveCompletion(item, await getRegistry(), getHelpCli());
	} catch (e) {
		debug(`completion resolve failed: ${String(e)}`);
		return item;
	}
});

connection.onHover(async (params: HoverParams, token): Promise<Hover | null> => {
	if (token?.isCancellationRequested) return null;
	const doc = documents.get(params.textDocument.uri); if (!doc) return null;
	const entry = getPipeline(doc);
	try {
		const registry = await getRegistry();
		if (token?.isCancellationRequested) return null;
		let tree = entry.file ?? undefined;
		if (!tree && entry.lastGood) {
			tree = treeForOffset(entry.lastGood.file, entry.lastGood.text, doc.getText(), doc.offsetAt(params.position));
		}
		return await cmakeHover(doc, params, registry, { tree, docs: getHelpCli() });
	} catch (e) {
		logError('hover failed', e);
		return null;
	}
});

connection.onDocumentFormatting((params: DocumentFormattingParams, token): TextEdit[] => {
	const doc = documents.get(params.textDocument.uri);
	if (!doc || !settings.format.enabled) return [];
	if (token?.isCancellationRequested) return [];
	const entry = getPipeline(doc);
	// no edits while the document has a syntax error
	if (!entry.file) return [];
	return formatDocumentEdits(doc, entry.file, settings.format);
});

documents.listen(connection);
connection.listen();

// -----------------
// Lifecycle hooks
// -----------------
connection.onShutdown(() => {
	log('onShutdown: clearing caches');
	resetCaches();
});

connection.onExit(() => {
	writeLogFile('onExit: terminating process');
	process.exit(0);
});
