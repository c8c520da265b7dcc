// SPDX-License-Identifier: MIT
// mil Built-in Operator Table
// Arity, surface tokens and structure-preserving maps over BuiltIn<E>

import type { BinaryOp, BuiltIn, BuiltInOp, TernaryOp, UnaryOp } from "./types.js";

export const BINARY_OPS: readonly BinaryOp[] = [
	"add", "sub", "mul", "div", "rem",
	"and", "or", "xor",
	"vref", "vpush", "vappend",
];
export const UNARY_OPS: readonly UnaryOp[] = ["not", "vlen"];
export const TERNARY_OPS: readonly TernaryOp[] = ["vslice"];

const binarySet = new Set<string>(BINARY_OPS);
const unarySet = new Set<string>(UNARY_OPS);
const ternarySet = new Set<string>(TERNARY_OPS);

export const isBinaryOp = (op: string): op is BinaryOp => binarySet.has(op);
export const isUnaryOp = (op: string): op is UnaryOp => unarySet.has(op);
export const isTernaryOp = (op: string): op is TernaryOp => ternarySet.has(op);

/** Surface spelling of each operator. */
const TOKENS = new Map<string, BuiltInOp>([
	["+", "add"],
	["-", "sub"],
	["*", "mul"],
	["/", "div"],
	["%", "rem"],
	["and", "and"],
	["or", "or"],
	["xor", "xor"],
	["not", "not"],
	["vempty", "vempty"],
	["vlen", "vlen"],
	["vref", "vref"],
	["vpush", "vpush"],
	["vappend", "vappend"],
	["vslice", "vslice"],
]);

export function builtInFromToken(token: string): BuiltInOp | undefined {
	return TOKENS.get(token);
}

export function arityOf(op: BuiltInOp): number {
	if (op === "vempty") return 0;
	if (isUnaryOp(op)) return 1;
	if (isTernaryOp(op)) return 3;
	return 2;
}

/**
 * Build a BuiltIn from an operator and an argument list, or undefined when the
 * argument count does not match the operator's arity.
 */
export function makeBuiltIn<E>(op: BuiltInOp, args: E[]): BuiltIn<E> | undefined {
	if (args.length !== arityOf(op)) return undefined;
	const [a, b, c] = args;
	if (op === "vempty") return { op, args: [] };
	if (a === undefined) return undefined;
	if (isUnaryOp(op)) return { op, args: [a] };
	if (b === undefined) return undefined;
	if (isBinaryOp(op)) return { op, args: [a, b] };
	if (c === undefined) return undefined;
	return { op, args: [a, b, c] };
}

/**
 * Rebuild a BuiltIn with every operand transformed by `f`, left to right.
 */
export function mapBuiltIn<A, B>(b: BuiltIn<A>, f: (arg: A) => B): BuiltIn<B> {
	switch (b.op) {
	case "vempty":
		return { op: b.op, args: [] };
	case "not":
	case "vlen":
		return { op: b.op, args: [f(b.args[0])] };
	case "vslice": {
		const first = f(b.args[0]);
		const second = f(b.args[1]);
		return { op: b.op, args: [first, second, f(b.args[2])] };
	}
	default: {
		const left = f(b.args[0]);
		return { op: b.op, args: [left, f(b.args[1])] };
	}
	}
}
