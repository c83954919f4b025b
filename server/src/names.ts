import fs from 'node:fs/promises';
import path from 'node:path';
import yaml from 'js-yaml';
import Ajv2020 from 'ajv/dist/2020';
import schema from '../schema/names.schema.json';

export const NAME_KINDS = ['command', 'module', 'policy', 'property', 'variable'] as const;
export type NameKind = typeof NAME_KINDS[number];

export interface CMakeName { name: string; kind: NameKind; help?: string }

/** Where long-form documentation for a name comes from (the cmake executable in the server). */
export interface DocumentationSource {
	documentation(name: CMakeName): Promise<string>;
}

export function isNameKind(v: unknown): v is NameKind {
	return NAME_KINDS.some(k => k === v);
}

export interface NameFile {
	version: 1;
	names: CMakeName[];
}

/** Names known to the editor services, one table per kind. */
export class NameRegistry {
	private readonly byKind = new Map<NameKind, Map<string, CMakeName>>();

	constructor(names: Iterable<CMakeName> = []) {
		for (const kind of NAME_KINDS) this.byKind.set(kind, new Map());
		for (const n of names) this.add(n);
	}

	add(n: CMakeName): void {
		this.table(n.kind).set(n.name, n);
	}

	get size(): number {
		let total = 0;
		for (const t of this.byKind.values()) total += t.size;
		return total;
	}

	get(kind: NameKind, name: string): CMakeName | null {
		const table = this.table(kind);
		const hit = table.get(name);
		if (hit) return hit;
		// command names are case-insensitive in CMake
		if (kind === 'command') return table.get(name.toLowerCase()) ?? null;
		return null;
	}

	/** Names of the given kinds, kinds in the given order and names sorted within each kind. */
	list(kinds: readonly NameKind[] = NAME_KINDS): CMakeName[] {
		const out: CMakeName[] = [];
		for (const kind of kinds) {
			const names = [...this.table(kind).values()].sort((a, b) => a.name.localeCompare(b.name));
			out.push(...names);
		}
		return out;
	}

	/** Look a name up in the preferred kinds first, then in every other kind. */
	find(name: string, preferred: readonly NameKind[] = []): CMakeName | null {
		const order = [...preferred, ...NAME_KINDS.filter(k => !preferred.includes(k))];
		for (const kind of order) {
			const hit = this.get(kind, name);
			if (hit) return hit;
		}
		return null;
	}

	toFile(): NameFile {
		return { version: 1, names: this.list() };
	}

	private table(kind: NameKind): Map<string, CMakeName> {
		let t = this.byKind.get(kind);
		if (!t) { t = new Map(); this.byKind.set(kind, t); }
		return t;
	}
}

export function validateNames(obj: unknown, source = '<memory>'): NameRegistry {
	const ajv = new Ajv2020({ allErrors: true, strict: false });
	const validate = ajv.compile<NameFile>(schema);
	if (!validate(obj)) {
		const msg = (validate.errors || []).map(e => `${e.instancePath || '/'} ${e.message}`).join('\n');
		throw new Error(`Name registry "${source}" failed schema validation:\n${msg}`);
	}
	return new NameRegistry(obj.names);
}

/** Load a YAML or JSON registry file; throws when it is unreadable, empty or invalid. */
export async function loadNames(filePath: string): Promise<NameRegistry> {
	const resolved = path.resolve(filePath);
	const raw = await fs.readFile(resolved, 'utf8');
	const obj = yaml.load(raw, { json: true });
	if (!obj) {
		throw new Error(`Name registry "${resolved}" appears to be empty or could not be parsed`);
	}
	return validateNames(obj, resolved);
}

export async function saveNames(filePath: string, registry: NameRegistry): Promise<void> {
	const resolved = path.resolve(filePath);
	await fs.mkdir(path.dirname(resolved), { recursive: true });
	await fs.writeFile(resolved, JSON.stringify(registry.toFile(), null, 2) + '\n', 'utf8');
}
