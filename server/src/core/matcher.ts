/*
	Position-anchored matcher over a source string. Every terminal of the
	grammar goes through `eat`, which only ever matches at the current offset.
*/

export interface MatchResult {
	start: number;
	text: string;
	groups: readonly (string | undefined)[];
}

// Patterns handed to the matcher must be sticky so `lastIndex` pins the match.
export function sticky(source: string): RegExp {
	return new RegExp(source, 'y');
}

export class Matcher {
	readonly source: string;
	private pos = 0;

	constructor(source: string) {
		this.source = source;
	}

	get offset(): number { return this.pos; }

	reset(offset = 0): void {
		this.pos = Math.max(0, Math.min(offset, this.source.length));
	}

	atEnd(): boolean { return this.pos >= this.source.length; }

	rest(): string { return this.source.slice(this.pos); }

	eat(pattern: RegExp): MatchResult | null {
		if (!pattern.sticky) {
			throw new Error(`Matcher.eat requires a sticky pattern, got /${pattern.source}/${pattern.flags}`);
		}
		pattern.lastIndex = this.pos;
		const m = pattern.exec(this.source);
		if (!m || m.index !== this.pos) return null;
		const start = this.pos;
		this.pos = start + m[0].length;
		return { start, text: m[0], groups: m.slice(1) };
	}
}
