import type { BracketMatching } from './ast/parser';
import { DEFAULT_FORMAT_SETTINGS, type FormatSettings } from './format';
import { stableStringify } from './utils';

export interface ServerSettings {
	cmakePath: string;
	// name registry cache file; empty means always ask cmake
	namesCachePath: string;
	logFile: string;
	debug: boolean;
	format: FormatSettings;
	parser: { bracketMatching: BracketMatching };
}

export function defaultSettings(): ServerSettings {
	return {
		cmakePath: 'cmake',
		namesCachePath: '',
		logFile: '',
		debug: false,
		format: { ...DEFAULT_FORMAT_SETTINGS },
		parser: { bracketMatching: 'strict' },
	};
}

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function str(v: unknown, fallback: string): string {
	return typeof v === 'string' ? v : fallback;
}

function bool(v: unknown, fallback: boolean): boolean {
	return typeof v === 'boolean' ? v : fallback;
}

function count(v: unknown, fallback: number): number {
	return typeof v === 'number' && Number.isInteger(v) && v >= 0 ? v : fallback;
}

function bracketMatching(v: unknown, fallback: BracketMatching): BracketMatching {
	return v === 'strict' || v === 'loose' ? v : fallback;
}

/**
 * Merge user-provided settings (initializationOptions or the `cmake` configuration section)
 * into `target`. Unknown keys and values of the wrong type are ignored. Returns whether
 * anything changed.
 */
export function applySettings(target: ServerSettings, raw: unknown): boolean {
	if (!isRecord(raw)) return false;
	const before = stableStringify(target);
	target.cmakePath = str(raw.cmakePath, target.cmakePath) || 'cmake';
	target.namesCachePath = str(raw.namesCachePath, target.namesCachePath);
	target.logFile = str(raw.logFile, target.logFile);
	target.debug = bool(raw.debug, target.debug);
	const format = raw.format;
	if (isRecord(format)) {
		target.format.enabled = bool(format.enabled, target.format.enabled);
		target.format.maxBlankLines = count(format.maxBlankLines, target.format.maxBlankLines);
		target.format.maxArgumentBlankLines = count(format.maxArgumentBlankLines, target.format.maxArgumentBlankLines);
	}
	const parser = raw.parser;
	if (isRecord(parser)) {
		target.parser.bracketMatching = bracketMatching(parser.bracketMatching, target.parser.bracketMatching);
	}
	return stableStringify(target) !== before;
}

/** The named section of a `workspace/didChangeConfiguration` payload, if there is one. */
export function configSection(raw: unknown, name: string): unknown {
	return isRecord(raw) ? raw[name] : undefined;
}
