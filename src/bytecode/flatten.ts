// SPDX-License-Identifier: MIT
// mil Instruction Emission
// The single structural recursion over MelExpr. Both the instruction counter
// and the encoder are driven by emit(), so a node's count is by construction
// the number of instructions it encodes to.

import { exhaustive } from "../errors.js";
import type { Instruction, MelExpr } from "../types.js";

export type InstructionSink = (ins: Instruction) => void;

/**
 * Emit the primitive instructions of `expr` in execution order.
 *
 * - leaves (literal, load, store, vempty, jumps) emit one instruction
 * - operators emit their operands, then themselves
 * - loop emits its header, with the body length fixed at lowering, before the body
 * - hash and sigeok emit their sub-programs, then themselves
 */
export function emit(expr: MelExpr, sink: InstructionSink): void {
	switch (expr.kind) {
	case "value":
		if (expr.value.kind === "int") {
			sink({ op: "pushi", value: expr.value.value });
		} else {
			sink({ op: "pushb", value: expr.value.value });
		}
		return;
	case "builtin":
		for (const arg of expr.builtin.args) emit(arg, sink);
		sink({ op: expr.builtin.op });
		return;
	case "load":
	case "store":
		sink({ op: expr.kind, slot: expr.slot });
		return;
	case "jump":
		sink({ op: expr.op, offset: expr.offset });
		return;
	case "seq":
		for (const e of expr.exprs) emit(e, sink);
		return;
	case "loop":
		sink({ op: "loop", count: expr.count, length: expr.length });
		emit(expr.body, sink);
		return;
	case "hash":
		emit(expr.body, sink);
		sink({ op: "hash", param: expr.param });
		return;
	case "sigeok":
		emit(expr.message, sink);
		emit(expr.key, sink);
		emit(expr.signature, sink);
		sink({ op: "sigeok", param: expr.param });
		return;
	default:
		exhaustive(expr);
	}
}

/** Number of primitive instructions `expr` expands to. */
export function countInstructions(expr: MelExpr): number {
	let count = 0;
	emit(expr, () => {
		count++;
	});
	return count;
}

/** The instruction sequence of `expr`, in execution order. */
export function flatten(expr: MelExpr): Instruction[] {
	const out: Instruction[] = [];
	emit(expr, (ins) => {
		out.push(ins);
	});
	return out;
}
