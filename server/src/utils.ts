// Small shared utilities

/**
 * Compile-time exhaustiveness helper. Reaching it at runtime means the parser
 * produced a node kind its consumers do not know about, so it always throws.
 */
export function AssertNever(x: never, message?: string): never {
	throw new Error(message ? `${message}: ${describe(x)}` : `Unexpected value in AssertNever: ${describe(x)}`);
}

function describe(x: unknown): string {
	if (x && typeof x === 'object' && 'kind' in x) return `kind=${String(x.kind)}`;
	return String(x);
}

// Stable stringify for objects by sorting keys; handles primitives and arrays
export function stableStringify(value: unknown): string {
	if (value === null || typeof value !== 'object') return JSON.stringify(value);
	if (Array.isArray(value)) return '[' + value.map(v => stableStringify(v)).join(',') + ']';
	const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
	return '{' + entries.map(([k, v]) => JSON.stringify(k) + ':' + stableStringify(v)).join(',') + '}';
}

// Simple djb2 hash for short strings
export function djb2Hash(str: string): number {
	let h = 5381 >>> 0;
	for (let i = 0; i < str.length; i++) h = (((h << 5) + h) ^ str.charCodeAt(i)) >>> 0;
	return h >>> 0;
}
