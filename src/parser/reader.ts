// SPDX-License-Identifier: MIT
// mil S-expression Reader
// Source text -> nested lists of atoms, with source positions

import { MilError } from "../errors.js";

export interface Position {
	line: number;
	column: number;
}

export type SExpr =
	| { kind: "atom"; text: string; pos: Position }
	| { kind: "string"; text: string; pos: Position }
	| { kind: "list"; items: SExpr[]; pos: Position };

class Cursor {
	private index = 0;
	private line = 1;
	private column = 1;

	constructor(private readonly source: string) {}

	get pos(): Position {
		return { line: this.line, column: this.column };
	}

	peek(): string | undefined {
		return this.source[this.index];
	}

	next(): string | undefined {
		const ch = this.source[this.index];
		if (ch === undefined) return undefined;
		this.index++;
		if (ch === "\n") {
			this.line++;
			this.column = 1;
		} else {
			this.column++;
		}
		return ch;
	}

	error(message: string, pos: Position = this.pos): MilError {
		return MilError.parse(message, pos.line, pos.column);
	}
}

const DELIMITERS = new Set(["(", ")", "\"", ";"]);

/** Deepest list nesting the reader accepts. */
export const MAX_NESTING = 1000;

function isSpace(ch: string): boolean {
	return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

function skipTrivia(cur: Cursor): void {
	for (let ch = cur.peek(); ch !== undefined; ch = cur.peek()) {
		if (ch === ";") {
			while (cur.peek() !== undefined && cur.peek() !== "\n") cur.next();
		} else if (isSpace(ch)) {
			cur.next();
		} else {
			return;
		}
	}
}

function readString(cur: Cursor): SExpr {
	const pos = cur.pos;
	cur.next();
	let text = "";
	for (;;) {
		const ch = cur.next();
		if (ch === undefined) throw cur.error("unterminated string", pos);
		if (ch === "\"") return { kind: "string", text, pos };
		if (ch === "\\") {
			const escaped = cur.next();
			if (escaped === undefined) throw cur.error("unterminated string", pos);
			text += escaped === "n" ? "\n" : escaped;
		} else {
			text += ch;
		}
	}
}

function readAtom(cur: Cursor): SExpr {
	const pos = cur.pos;
	let text = "";
	for (let ch = cur.peek(); ch !== undefined && !isSpace(ch) && !DELIMITERS.has(ch); ch = cur.peek()) {
		text += ch;
		cur.next();
	}
	return { kind: "atom", text, pos };
}

function readList(cur: Cursor, depth: number): SExpr {
	const pos = cur.pos;
	if (depth > MAX_NESTING) throw cur.error(`lists nest deeper than ${MAX_NESTING} levels`);
	cur.next();
	const items: SExpr[] = [];
	for (;;) {
		skipTrivia(cur);
		const ch = cur.peek();
		if (ch === undefined) throw cur.error("unclosed '('", pos);
		if (ch === ")") {
			cur.next();
			return { kind: "list", items, pos };
		}
		items.push(readForm(cur, depth));
	}
}

function readForm(cur: Cursor, depth: number): SExpr {
	const ch = cur.peek();
	if (ch === "(") return readList(cur, depth + 1);
	if (ch === ")") throw cur.error("unexpected ')'");
	if (ch === "\"") return readString(cur);
	return readAtom(cur);
}

/**
 * Read every top-level form in `source`. Throws MilError (ParseError) with
 * the line and column of the offending character.
 */
export function readAll(source: string): SExpr[] {
	const cur = new Cursor(source);
	const forms: SExpr[] = [];
	skipTrivia(cur);
	while (cur.peek() !== undefined) {
		forms.push(readForm(cur, 0));
		skipTrivia(cur);
	}
	return forms;
}
