import { Diagnostic, DiagnosticSeverity } from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';
import type { File } from './ast';
import { CMakeSyntaxError, parseCMake, type ParseOptions } from './ast/parser';
import { toPosition } from './core/position';

export const CMAKE_DIAGCODES = {
	SYNTAX: 'CMAKE000',
} as const;

export const DIAG_SOURCE = 'cmake-lsp';

export type ParseOutcome =
	| { ok: true; file: File }
	| { ok: false; error: CMakeSyntaxError };

/** Parse once; syntax errors become a value, anything else propagates. */
export function tryParse(text: string, opts?: ParseOptions): ParseOutcome {
	try {
		return { ok: true, file: parseCMake(text, opts) };
	} catch (e) {
		if (e instanceof CMakeSyntaxError) return { ok: false, error: e };
		throw e;
	}
}

export function syntaxErrorDiagnostic(doc: TextDocument, error: CMakeSyntaxError): Diagnostic {
	const start = toPosition({ row: error.row, col: error.col });
	// highlight one character, or nothing at end of input
	const end = error.offset < doc.getText().length ? doc.positionAt(error.offset + 1) : start;
	return {
		range: { start, end },
		severity: DiagnosticSeverity.Error,
		message: error.message,
		source: DIAG_SOURCE,
		code: CMAKE_DIAGCODES.SYNTAX,
	};
}

export function syntaxDiagnostics(doc: TextDocument, opts?: ParseOptions): { file: File | null; diagnostics: Diagnostic[] } {
	const outcome = tryParse(doc.getText(), opts);
	if (outcome.ok) return { file: outcome.file, diagnostics: [] };
	return { file: null, diagnostics: [syntaxErrorDiagnostic(doc, outcome.error)] };
}
