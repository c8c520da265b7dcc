// SPDX-License-Identifier: MIT
// mil Formatting
// Human-readable renderings used by traces, the CLI and error messages

import { exhaustive } from "./errors.js";
import type { Instruction, Value } from "./types.js";

export function toHex(bytes: Uint8Array): string {
	return Buffer.from(bytes).toString("hex");
}

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

/**
 * Parse a hex string (optionally `0x`-prefixed) into bytes, or undefined when
 * it is not an even-length hex string.
 */
export function fromHex(hex: string): Uint8Array | undefined {
	const digits = hex.startsWith("0x") ? hex.slice(2) : hex;
	if (!HEX_PATTERN.test(digits)) return undefined;
	return Uint8Array.from(Buffer.from(digits, "hex"));
}

export function formatValue(v: Value): string {
	return v.kind === "int" ? v.value.toString() : "0x" + toHex(v.value);
}

export function formatStack(stack: readonly Value[]): string {
	return "[" + stack.map(formatValue).join(", ") + "]";
}

export function formatInstruction(ins: Instruction): string {
	switch (ins.op) {
	case "load":
	case "store":
		return `${ins.op} ${ins.slot}`;
	case "jmp":
	case "bez":
	case "bnz":
		return `${ins.op} +${ins.offset}`;
	case "loop":
		return `loop ${ins.count} x ${ins.length}`;
	case "hash":
	case "sigeok":
		return `${ins.op} ${ins.param}`;
	case "pushi":
		return `pushi ${ins.value.toString()}`;
	case "pushb":
		return `pushb 0x${toHex(ins.value)}`;
	case "add": case "sub": case "mul": case "div": case "rem":
	case "and": case "or": case "xor": case "not":
	case "vempty": case "vlen": case "vref": case "vpush": case "vappend": case "vslice":
		return ins.op;
	default:
		return exhaustive(ins);
	}
}

/** One instruction per line, prefixed with its index. */
export function formatDisassembly(instructions: readonly Instruction[]): string {
	const width = String(Math.max(instructions.length - 1, 0)).length;
	return instructions
		.map((ins, i) => String(i).padStart(width, " ") + "  " + formatInstruction(ins))
		.join("\n");
}

/**
 * JSON rendering of any pipeline tree. Integers print as decimal strings and
 * byte strings as 0x-prefixed hex.
 */
export function formatTree(tree: unknown): string {
	return JSON.stringify(
		tree,
		(_key, value: unknown) => {
			if (typeof value === "bigint") return value.toString();
			if (value instanceof Uint8Array) return "0x" + toHex(value);
			return value;
		},
		2,
	);
}
