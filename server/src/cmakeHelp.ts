/*
	Name lists and documentation from the `cmake` executable
	(`cmake --help-<kind>-list`, `cmake --help-<kind> <name>`).
*/
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { loadNames, NAME_KINDS, NameRegistry, saveNames, type CMakeName, type NameKind } from './names';

const execFileAsync = promisify(execFile);

export interface RunResult { stdout: string; stderr: string; code: number }

export type CommandRunner = (command: string, args: readonly string[], cwd?: string) => Promise<RunResult>;

function isExecError(e: unknown): e is { code?: unknown; stdout?: unknown; stderr?: unknown } {
	return typeof e === 'object' && e !== null;
}

// Resolves with the exit code instead of rejecting on a non-zero exit.
// A missing executable (ENOENT) still rejects.
export const execRunner: CommandRunner = async (command, args, cwd) => {
	try {
		const { stdout, stderr } = await execFileAsync(command, [...args], { cwd, maxBuffer: 16 * 1024 * 1024, windowsHide: true });
		return { stdout, stderr, code: 0 };
	} catch (e) {
		if (isExecError(e) && typeof e.code === 'number') {
			return { stdout: String(e.stdout ?? ''), stderr: String(e.stderr ?? ''), code: e.code };
		}
		if (isExecError(e) && e.code === 'ENOENT') {
			throw new Error(`'${command}' not found in PATH`);
		}
		throw e;
	}
};

const normalizeNewlines = (s: string) => s.replace(/\r\n/g, '\n');

export class HelpCli {
	private readonly docs = new Map<string, Promise<string>>();

	constructor(
		readonly cmakePath = 'cmake',
		readonly cwd?: string,
		private readonly run: CommandRunner = execRunner,
	) {}

	async listNames(kind: NameKind): Promise<CMakeName[]> {
		const res = await this.run(this.cmakePath, [`--help-${kind}-list`], this.cwd);
		if (res.code !== 0) return [];
		return normalizeNewlines(res.stdout)
			.split('\n')
			.map(l => l.trim())
			.filter(l => l.length > 0)
			.map(name => ({ name, kind }));
	}

	async listAll(): Promise<CMakeName[]> {
		const out: CMakeName[] = [];
		for (const kind of NAME_KINDS) out.push(...await this.listNames(kind));
		return out;
	}

	/** Documentation text for a name; empty when cmake has none. Fetched once per name. */
	documentation(name: CMakeName): Promise<string> {
		const key = `${name.kind}:${name.name}`;
		let pending = this.docs.get(key);
		if (!pending) {
			pending = this.run(this.cmakePath, [`--help-${name.kind}`, name.name], this.cwd).then(
				res => (res.code === 0 ? normalizeNewlines(res.stdout) : ''),
				(e: unknown) => {
					// a failed fetch is retried on the next request
					this.docs.delete(key);
					throw e;
				},
			);
			this.docs.set(key, pending);
		}
		return pending;
	}
}

export async function fetchRegistry(cli: HelpCli): Promise<NameRegistry> {
	return new NameRegistry(await cli.listAll());
}

export interface RegistryLoad {
	registry: NameRegistry;
	fromCache: boolean;
	// why the cache file was not used, when there was one to try
	cacheError?: string;
}

/** Registry from the cache file when it loads, otherwise from cmake, then written back to the cache. */
export async function loadOrFetchRegistry(cachePath: string, cli: HelpCli): Promise<RegistryLoad> {
	let cacheError: string | undefined;
	if (cachePath) {
		try {
			return { registry: await loadNames(cachePath), fromCache: true };
		} catch (e) {
			cacheError = e instanceof Error ? e.message : String(e);
		}
	}
	const registry = await fetchRegistry(cli);
	if (cachePath && registry.size > 0) await saveNames(cachePath, registry);
	return { registry, fromCache: false, cacheError };
}
