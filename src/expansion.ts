// SPDX-License-Identifier: MIT
// mil Function Expansion
// Inlines every user-defined function call and replaces names with globally
// unique variable identifiers.

import { mapBuiltIn } from "./builtins.js";
import { MilError, exhaustive } from "./errors.js";
import { FIRST_FREE_ID, RESERVED_BINDINGS } from "./reserved.js";
import type { Expr, FnDef, Program, UnrolledExpr, VarId } from "./types.js";

//==============================================================================
// Expansion Context
//==============================================================================

export interface ExpandOptions {
	/** Maximum nesting of inlined calls before expansion gives up (default 64). */
	maxInlineDepth?: number;
}

export const DEFAULT_MAX_INLINE_DEPTH = 64;

interface ExpansionContext {
	defs: ReadonlyMap<string, FnDef>;
	nextId: VarId;
	maxDepth: number;
}

/** Lexical scope: surface name -> identifier of the binding it refers to. */
type Scope = ReadonlyMap<string, VarId>;

const rootScope: Scope = new Map(RESERVED_BINDINGS.map((b) => [b.name, b.id]));

/**
 * Mint an identifier no earlier binding has used. The counter only moves
 * forward, so two bindings never share an identifier.
 */
function freshId(ctx: ExpansionContext): VarId {
	const id = ctx.nextId;
	ctx.nextId++;
	return id;
}

function bind(scope: Scope, name: string, id: VarId): Scope {
	const next = new Map(scope);
	next.set(name, id);
	return next;
}

function lookup(scope: Scope, name: string): VarId {
	const id = scope.get(name);
	if (id === undefined) throw MilError.unboundSymbol(name);
	return id;
}

function buildDefMap(defs: readonly FnDef[]): Map<string, FnDef> {
	const map = new Map<string, FnDef>();
	for (const def of defs) {
		if (map.has(def.name)) throw MilError.duplicateFunction(def.name);
		map.set(def.name, def);
	}
	return map;
}

//==============================================================================
// Main Expansion Function
//==============================================================================

/**
 * Expand a program into a function-free tree.
 *
 * Throws MilError: UndefinedFunction, ArityMismatch, UnboundSymbol,
 * DuplicateFunction or RecursionLimit.
 */
export function expandProgram(program: Program, options?: ExpandOptions): UnrolledExpr {
	const ctx: ExpansionContext = {
		defs: buildDefMap(program.defs),
		nextId: FIRST_FREE_ID,
		maxDepth: options?.maxInlineDepth ?? DEFAULT_MAX_INLINE_DEPTH,
	};
	return expand(program.expr, rootScope, ctx, 0);
}

function expand(expr: Expr, scope: Scope, ctx: ExpansionContext, depth: number): UnrolledExpr {
	const recur = (e: Expr): UnrolledExpr => expand(e, scope, ctx, depth);

	switch (expr.kind) {
	case "value":
		return expr;
	case "builtin":
		return { kind: "builtin", builtin: mapBuiltIn(expr.builtin, recur) };
	case "var":
		return { kind: "var", id: lookup(scope, expr.name) };
	case "set":
		return { kind: "set", id: lookup(scope, expr.name), value: recur(expr.value) };
	case "let":
		return expandLet(expr.bindings, expr.body, { scope, ctx, depth });
	case "app":
		return expandApp(expr.name, expr.args, { scope, ctx, depth });
	case "if":
		return {
			kind: "if",
			cond: recur(expr.cond),
			then: recur(expr.then),
			else: recur(expr.else),
		};
	case "loop":
		return { kind: "loop", count: expr.count, body: recur(expr.body) };
	case "hash":
		return { kind: "hash", param: expr.param, body: recur(expr.body) };
	case "sigeok":
		return {
			kind: "sigeok",
			param: expr.param,
			message: recur(expr.message),
			key: recur(expr.key),
			signature: recur(expr.signature),
		};
	default:
		return exhaustive(expr);
	}
}

interface Site {
	scope: Scope;
	ctx: ExpansionContext;
	depth: number;
}

/**
 * Bindings are sequential: each binding expression sees the names bound
 * before it, and the body sees all of them.
 */
function expandLet(
	bindings: readonly [string, Expr][],
	body: readonly Expr[],
	site: Site,
): UnrolledExpr {
	let scope = site.scope;
	const out: [VarId, UnrolledExpr][] = [];
	for (const [name, value] of bindings) {
		const expanded = expand(value, scope, site.ctx, site.depth);
		const id = freshId(site.ctx);
		out.push([id, expanded]);
		scope = bind(scope, name, id);
	}
	return {
		kind: "let",
		bindings: out,
		body: body.map((e) => expand(e, scope, site.ctx, site.depth)),
	};
}

/**
 * Inline a call. Arguments are expanded in the caller's scope; each parameter
 * gets a fresh identifier bound by a let around the inlined body, and the body
 * is expanded in a scope holding only its parameters and the reserved names.
 */
function expandApp(name: string, args: readonly Expr[], site: Site): UnrolledExpr {
	const def = site.ctx.defs.get(name);
	if (def === undefined) throw MilError.undefinedFunction(name);
	if (def.params.length !== args.length) {
		throw MilError.arityMismatch(name, def.params.length, args.length);
	}
	if (site.depth >= site.ctx.maxDepth) {
		throw MilError.recursionLimit(name, site.ctx.maxDepth);
	}

	const bindings: [VarId, UnrolledExpr][] = [];
	let bodyScope = rootScope;
	def.params.forEach((param, i) => {
		const arg = args[i];
		if (arg === undefined) throw MilError.arityMismatch(name, def.params.length, args.length);
		const value = expand(arg, site.scope, site.ctx, site.depth);
		const id = freshId(site.ctx);
		bindings.push([id, value]);
		bodyScope = bind(bodyScope, param, id);
	});

	const body = expand(def.body, bodyScope, site.ctx, site.depth + 1);
	return { kind: "let", bindings, body: [body] };
}
