// SPDX-License-Identifier: MIT
// mil Surface Syntax
// Reader forms -> surface program (function definitions + one expression)

import { arityOf, builtInFromToken, makeBuiltIn } from "../builtins.js";
import { U16_MAX } from "../bytecode/opcodes.js";
import { MilError, exhaustive } from "../errors.js";
import type { Expr, FnDef, Program } from "../types.js";
import { U256_MAX, bytesVal, intVal } from "../types.js";
import { type Position, type SExpr, readAll } from "./reader.js";

const DECIMAL = /^[0-9]+$/;
const HEX_BYTES = /^0x(?:[0-9a-fA-F]{2})*$/;
const SYMBOL = /^[^0-9][^\s()";]*$/;

const KEYWORDS = new Set(["fn", "let", "set!", "set", "if", "loop", "hash", "sigeok"]);

function fail(message: string, pos: Position): MilError {
	return MilError.parse(message, pos.line, pos.column);
}

function symbolOf(s: SExpr, what: string): string {
	if (s.kind !== "atom" || !SYMBOL.test(s.text) || KEYWORDS.has(s.text)) {
		throw fail(`expected ${what}`, s.pos);
	}
	return s.text;
}

function listOf(s: SExpr, what: string): SExpr[] {
	if (s.kind !== "list") throw fail(`expected ${what}`, s.pos);
	return s.items;
}

function u16Of(s: SExpr, what: string): number {
	if (s.kind !== "atom" || !DECIMAL.test(s.text)) throw fail(`expected ${what}`, s.pos);
	const n = Number(s.text);
	if (n > U16_MAX) throw fail(`${what} must be at most ${U16_MAX}`, s.pos);
	return n;
}

function expectArgs(items: SExpr[], count: number, form: string, pos: Position): void {
	if (items.length !== count) {
		throw fail(`${form} expects ${count} arguments, got ${items.length}`, pos);
	}
}

//==============================================================================
// Expressions
//==============================================================================

function parseAtom(text: string, pos: Position): Expr {
	if (DECIMAL.test(text)) {
		const n = BigInt(text);
		if (n > U256_MAX) throw fail("integer literal exceeds 256 bits", pos);
		return { kind: "value", value: intVal(n) };
	}
	if (HEX_BYTES.test(text)) {
		return { kind: "value", value: bytesVal(Buffer.from(text.slice(2), "hex")) };
	}
	if (text.startsWith("0x")) throw fail("malformed byte literal " + text, pos);
	if (!SYMBOL.test(text) || KEYWORDS.has(text)) throw fail("unexpected " + text, pos);
	return { kind: "var", name: text };
}

function parseLet(args: SExpr[], pos: Position): Expr {
	const [bindingList, ...body] = args;
	if (bindingList === undefined || body.length === 0) {
		throw fail("let expects a binding list and at least one body expression", pos);
	}
	const bindings = listOf(bindingList, "binding list").map((b): [string, Expr] => {
		const pair = listOf(b, "(name value) binding");
		const [name, value] = pair;
		if (name === undefined || value === undefined || pair.length !== 2) {
			throw fail("expected (name value) binding", b.pos);
		}
		return [symbolOf(name, "binding name"), parseExpr(value)];
	});
	return { kind: "let", bindings, body: body.map(parseExpr) };
}

function parseSpecial(head: string, args: SExpr[], pos: Position): Expr | undefined {
	const [a, b, c, d] = args;
	switch (head) {
	case "let":
		return parseLet(args, pos);
	case "set!":
	case "set":
		expectArgs(args, 2, head, pos);
		if (a === undefined || b === undefined) return undefined;
		return { kind: "set", name: symbolOf(a, "variable name"), value: parseExpr(b) };
	case "if":
		expectArgs(args, 3, head, pos);
		if (a === undefined || b === undefined || c === undefined) return undefined;
		return { kind: "if", cond: parseExpr(a), then: parseExpr(b), else: parseExpr(c) };
	case "loop":
		expectArgs(args, 2, head, pos);
		if (a === undefined || b === undefined) return undefined;
		return { kind: "loop", count: u16Of(a, "loop count"), body: parseExpr(b) };
	case "hash":
		expectArgs(args, 2, head, pos);
		if (a === undefined || b === undefined) return undefined;
		return { kind: "hash", param: u16Of(a, "hash length"), body: parseExpr(b) };
	case "sigeok":
		expectArgs(args, 4, head, pos);
		if (a === undefined || b === undefined || c === undefined || d === undefined) return undefined;
		return {
			kind: "sigeok",
			param: u16Of(a, "signature scheme"),
			message: parseExpr(b),
			key: parseExpr(c),
			signature: parseExpr(d),
		};
	case "fn":
		throw fail("function definitions are only allowed at the top level", pos);
	default:
		return undefined;
	}
}

function parseList(items: SExpr[], pos: Position): Expr {
	const [headForm, ...args] = items;
	if (headForm === undefined) throw fail("empty application", pos);
	if (headForm.kind !== "atom") throw fail("expected an operator or function name", headForm.pos);
	const head = headForm.text;

	const special = parseSpecial(head, args, pos);
	if (special !== undefined) return special;

	const op = builtInFromToken(head);
	if (op !== undefined) {
		const builtin = makeBuiltIn(op, args.map(parseExpr));
		if (builtin === undefined) {
			throw fail(`${head} expects ${arityOf(op)} arguments, got ${args.length}`, pos);
		}
		return { kind: "builtin", builtin };
	}

	return { kind: "app", name: symbolOf(headForm, "function name"), args: args.map(parseExpr) };
}

export function parseExpr(s: SExpr): Expr {
	switch (s.kind) {
	case "atom":
		return parseAtom(s.text, s.pos);
	case "string":
		return { kind: "value", value: bytesVal(new TextEncoder().encode(s.text)) };
	case "list":
		return parseList(s.items, s.pos);
	default:
		return exhaustive(s);
	}
}

//==============================================================================
// Programs
//==============================================================================

function isDefinition(s: SExpr): boolean {
	const head = s.kind === "list" ? s.items[0] : undefined;
	return head?.kind === "atom" && head.text === "fn";
}

function parseDefinition(s: SExpr): FnDef {
	const items = listOf(s, "definition");
	const [, name, params, body, ...rest] = items;
	if (name === undefined || params === undefined || body === undefined || rest.length > 0) {
		throw fail("expected (fn name (params...) body)", s.pos);
	}
	return {
		name: symbolOf(name, "function name"),
		params: listOf(params, "parameter list").map((p) => symbolOf(p, "parameter name")),
		body: parseExpr(body),
	};
}

/**
 * Parse a complete source file: any number of `(fn ...)` definitions and
 * exactly one expression.
 */
export function parseProgram(source: string): Program {
	const forms = readAll(source);
	const defs: FnDef[] = [];
	const exprs: SExpr[] = [];
	for (const form of forms) {
		if (isDefinition(form)) {
			defs.push(parseDefinition(form));
		} else {
			exprs.push(form);
		}
	}
	const [main, extra] = exprs;
	if (main === undefined) throw MilError.parse("program has no expression", 1, 1);
	if (extra !== undefined) throw fail("program has more than one top-level expression", extra.pos);
	return { defs, expr: parseExpr(main) };
}
