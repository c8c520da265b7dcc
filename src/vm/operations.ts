// SPDX-License-Identifier: MIT
// mil Stack Operations
// Handlers for every instruction that only touches the operand stack

import { MilError, exhaustive } from "../errors.js";
import type { BinaryOp, BuiltInOp, TernaryOp, UnaryOp, Value } from "../types.js";
import { U256_MAX, U256_MODULUS, bytesVal, intVal, isBytes, isInt } from "../types.js";
import { DIGEST_LENGTH, SCHEME_ED25519, digest, verifyEd25519 } from "./crypto.js";

//==============================================================================
// Operand Stack
//==============================================================================

export class OperandStack {
	readonly values: Value[] = [];

	push(v: Value): void {
		this.values.push(v);
	}

	pop(): Value {
		const v = this.values.pop();
		if (v === undefined) throw MilError.malformedProgram("stack underflow");
		return v;
	}

	popInt(op: string): bigint {
		const v = this.pop();
		if (!isInt(v)) throw MilError.typeMismatch(op, "int");
		return v.value;
	}

	popBytes(op: string): Uint8Array {
		const v = this.pop();
		if (!isBytes(v)) throw MilError.typeMismatch(op, "bytes");
		return v.value;
	}
}

//==============================================================================
// Arithmetic and Logic
//==============================================================================

const wrap = (n: bigint): bigint => ((n % U256_MODULUS) + U256_MODULUS) % U256_MODULUS;

function arith(op: "add" | "sub" | "mul" | "div" | "rem" | "and" | "or" | "xor", a: bigint, b: bigint): bigint {
	switch (op) {
	case "add": return wrap(a + b);
	case "sub": return wrap(a - b);
	case "mul": return wrap(a * b);
	case "div":
		if (b === 0n) throw MilError.divisionByZero();
		return a / b;
	case "rem":
		if (b === 0n) throw MilError.divisionByZero();
		return a % b;
	case "and": return a & b;
	case "or": return a | b;
	case "xor": return a ^ b;
	default: return exhaustive(op);
	}
}

//==============================================================================
// Byte Strings
//==============================================================================

function checkedIndex(index: bigint, length: number): number {
	if (index >= BigInt(length)) throw MilError.indexOutOfRange(index, length);
	return Number(index);
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
	const out = new Uint8Array(a.length + b.length);
	out.set(a, 0);
	out.set(b, a.length);
	return out;
}

function binary(op: BinaryOp, stack: OperandStack): Value {
	switch (op) {
	case "vref": {
		const index = stack.popInt(op);
		const vec = stack.popBytes(op);
		return intVal(vec[checkedIndex(index, vec.length)] ?? 0);
	}
	case "vpush": {
		const item = stack.popInt(op);
		const vec = stack.popBytes(op);
		if (item > 0xffn) throw MilError.typeMismatch(op, "int");
		return bytesVal(concat(vec, Uint8Array.of(Number(item))));
	}
	case "vappend": {
		const right = stack.popBytes(op);
		const left = stack.popBytes(op);
		return bytesVal(concat(left, right));
	}
	default: {
		const right = stack.popInt(op);
		const left = stack.popInt(op);
		return intVal(arith(op, left, right));
	}
	}
}

function unary(op: UnaryOp, stack: OperandStack): Value {
	switch (op) {
	case "not":
		return intVal(stack.popInt(op) ^ U256_MAX);
	case "vlen":
		return intVal(stack.popBytes(op).length);
	default:
		return exhaustive(op);
	}
}

function ternary(op: TernaryOp, stack: OperandStack): Value {
	const end = stack.popInt(op);
	const start = stack.popInt(op);
	const vec = stack.popBytes(op);
	if (start > end) throw MilError.indexOutOfRange(start, vec.length);
	if (end > BigInt(vec.length)) throw MilError.indexOutOfRange(end, vec.length);
	return bytesVal(vec.slice(Number(start), Number(end)));
}

/**
 * Execute one operand-free instruction. Binary operators find their right
 * operand on top of the stack.
 */
export function applyBuiltIn(op: BuiltInOp, stack: OperandStack): void {
	switch (op) {
	case "vempty":
		stack.push(bytesVal([]));
		return;
	case "not":
	case "vlen":
		stack.push(unary(op, stack));
		return;
	case "vslice":
		stack.push(ternary(op, stack));
		return;
	default:
		stack.push(binary(op, stack));
	}
}

//==============================================================================
// Cryptography
//==============================================================================

/** Big-endian 32-byte encoding of an integer, as hashed by `hash`. */
export function intToBytes(n: bigint): Uint8Array {
	const out = new Uint8Array(DIGEST_LENGTH);
	let rest = n;
	for (let i = DIGEST_LENGTH - 1; i >= 0; i--) {
		out[i] = Number(rest & 0xffn);
		rest >>= 8n;
	}
	return out;
}

export function applyHash(param: number, stack: OperandStack): void {
	const v = stack.pop();
	const data = isInt(v) ? intToBytes(v.value) : v.value;
	stack.push(bytesVal(digest(data, param)));
}

/**
 * Pops signature, key and message. A signature that does not verify pushes
 * 0; it is a result, not a fault.
 */
export function applySigEok(param: number, stack: OperandStack): void {
	const signature = stack.popBytes("sigeok");
	const key = stack.popBytes("sigeok");
	const message = stack.popBytes("sigeok");
	if (param !== SCHEME_ED25519) {
		throw MilError.malformedProgram(`unknown signature scheme ${param}`);
	}
	stack.push(intVal(verifyEd25519(message, key, signature) ? 1 : 0));
}
