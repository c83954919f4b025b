import type { Position } from 'vscode-languageserver/node';

/** 1-based row and column of a source offset. */
export interface TextPos {
	row: number;
	col: number;
}

const LINE_BREAK = /\r\n|\r|\n/;

// O(offset): only used on error paths and single cursor queries.
export function rowcol(text: string, offset: number): TextPos {
	const clamped = Math.max(0, Math.min(offset, text.length));
	const lines = text.slice(0, clamped).split(LINE_BREAK);
	const last = lines[lines.length - 1] ?? '';
	return { row: lines.length, col: last.length + 1 };
}

export function toPosition(pos: TextPos): Position {
	return { line: pos.row - 1, character: pos.col - 1 };
}

export function formatTextPos(pos: TextPos): string {
	return `${pos.row}:${pos.col}`;
}
