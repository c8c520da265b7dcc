// SPDX-License-Identifier: MIT
// mil Bytecode Encoder
// Serializes lowered expressions to the flat binary program format

import { ErrorCodes, MilError, exhaustive } from "../errors.js";
import type { Instruction, MelExpr } from "../types.js";
import { U256_MAX } from "../types.js";
import { emit } from "./flatten.js";
import { BYTES_LITERAL_MAX, INT_WIDTH, OPCODES, U16_MAX } from "./opcodes.js";

function pushU16(out: number[], value: number, what: string): void {
	if (!Number.isInteger(value) || value < 0 || value > U16_MAX) {
		throw MilError.operandOverflow("encode", what, value, U16_MAX);
	}
	out.push(value >> 8, value & 0xff);
}

function pushInt(out: number[], value: bigint): void {
	if (value < 0n || value > U256_MAX) {
		throw new MilError(ErrorCodes.OperandOverflow, "encode", `Integer literal ${String(value)} is outside the 256-bit range`);
	}
	for (let shift = BigInt((INT_WIDTH - 1) * 8); shift >= 0n; shift -= 8n) {
		out.push(Number((value >> shift) & 0xffn));
	}
}

function pushBytes(out: number[], value: Uint8Array): void {
	if (value.length > BYTES_LITERAL_MAX) {
		throw MilError.operandOverflow("encode", "Byte literal length", value.length, BYTES_LITERAL_MAX);
	}
	out.push(value.length, ...value);
}

/**
 * Append the binary form of one instruction: its tag, then its operand.
 */
export function encodeInstruction(ins: Instruction, out: number[]): void {
	out.push(OPCODES[ins.op].tag);
	switch (ins.op) {
	case "load":
	case "store":
		pushU16(out, ins.slot, "Heap slot");
		return;
	case "jmp":
	case "bez":
	case "bnz":
		pushU16(out, ins.offset, "Jump offset");
		return;
	case "loop":
		pushU16(out, ins.count, "Loop count");
		pushU16(out, ins.length, "Loop body length");
		return;
	case "hash":
	case "sigeok":
		pushU16(out, ins.param, "Parameter");
		return;
	case "pushi":
		pushInt(out, ins.value);
		return;
	case "pushb":
		pushBytes(out, ins.value);
		return;
	case "add": case "sub": case "mul": case "div": case "rem":
	case "and": case "or": case "xor": case "not":
	case "vempty": case "vlen": case "vref": case "vpush": case "vappend": case "vslice":
		return;
	default:
		exhaustive(ins);
	}
}

/** Encode a flat instruction sequence. */
export function encodeInstructions(instructions: Iterable<Instruction>): Uint8Array {
	const out: number[] = [];
	for (const ins of instructions) encodeInstruction(ins, out);
	return Uint8Array.from(out);
}

/**
 * Encode a lowered expression. Throws MilError (OperandOverflow) when an
 * operand does not fit its encoding.
 */
export function encode(expr: MelExpr): Uint8Array {
	const out: number[] = [];
	emit(expr, (ins) => {
		encodeInstruction(ins, out);
	});
	return Uint8Array.from(out);
}
