// SPDX-License-Identifier: MIT
// mil Memory Allocation and Lowering
// Assigns heap slots to variable identifiers and linearizes control flow into
// relative jumps.

import { mapBuiltIn } from "../builtins.js";
import { countInstructions } from "../bytecode/flatten.js";
import { U16_MAX } from "../bytecode/opcodes.js";
import { MilError, exhaustive } from "../errors.js";
import { FIRST_FREE_SLOT, RESERVED_BINDINGS } from "../reserved.js";
import type { HeapPos, JumpOp, MelExpr, UnrolledExpr, VarId } from "../types.js";

const jump = (op: JumpOp, offset: number): MelExpr => {
	if (offset > U16_MAX) {
		throw MilError.operandOverflow("lower", "Jump offset", offset, U16_MAX);
	}
	return { kind: "jump", op, offset };
};

/**
 * Identifier -> heap slot map for one compilation. Entries are only ever
 * added; a slot handed out once is never handed out again.
 */
export class MemoryMap {
	private readonly slots = new Map<VarId, HeapPos>();
	private nextSlot: HeapPos = FIRST_FREE_SLOT;

	constructor() {
		for (const reserved of RESERVED_BINDINGS) {
			this.slots.set(reserved.id, reserved.slot);
		}
	}

	/** Number of heap slots in use, reserved slots included. */
	get size(): number {
		return this.nextSlot;
	}

	/** The slot of an identifier, if it has one. */
	lookup(id: VarId): HeapPos | undefined {
		return this.slots.get(id);
	}

	private slotOf(id: VarId): HeapPos {
		const slot = this.slots.get(id);
		if (slot === undefined) throw MilError.unboundVariable(id);
		return slot;
	}

	private allocate(id: VarId): HeapPos {
		if (this.slots.has(id)) throw MilError.duplicateBinding(id);
		const slot = this.nextSlot;
		if (slot > U16_MAX) throw MilError.operandOverflow("lower", "Heap slot", slot, U16_MAX);
		this.nextSlot++;
		this.slots.set(id, slot);
		return slot;
	}

	/**
	 * Translate an unrolled expression into lowered instructions.
	 *
	 * Throws MilError: UnboundVariable and DuplicateBinding are internal
	 * faults (a malformed unrolled tree), OperandOverflow a program too large
	 * for its operands.
	 */
	toMelExpr(expr: UnrolledExpr): MelExpr {
		switch (expr.kind) {
		case "value":
			return expr;
		case "builtin":
			return { kind: "builtin", builtin: mapBuiltIn(expr.builtin, (e) => this.toMelExpr(e)) };
		// A variable by itself is the value at its heap slot
		case "var":
			return { kind: "load", slot: this.slotOf(expr.id) };
		case "set": {
			const body = this.toMelExpr(expr.value);
			return { kind: "seq", exprs: [body, { kind: "store", slot: this.slotOf(expr.id) }] };
		}
		case "let":
			return this.lowerLet(expr.bindings, expr.body);
		case "if":
			return this.lowerIf(expr.cond, expr.then, expr.else);
		case "loop": {
			const body = this.toMelExpr(expr.body);
			const length = countInstructions(body);
			if (length > U16_MAX) throw MilError.operandOverflow("lower", "Loop body length", length, U16_MAX);
			return { kind: "loop", count: expr.count, length, body };
		}
		case "hash":
			return { kind: "hash", param: expr.param, body: this.toMelExpr(expr.body) };
		case "sigeok": {
			const message = this.toMelExpr(expr.message);
			const key = this.toMelExpr(expr.key);
			return { kind: "sigeok", param: expr.param, message, key, signature: this.toMelExpr(expr.signature) };
		}
		default:
			return exhaustive(expr);
		}
	}

	private lowerLet(
		bindings: readonly [VarId, UnrolledExpr][],
		body: readonly UnrolledExpr[],
	): MelExpr {
		const exprs: MelExpr[] = [];
		for (const [id, value] of bindings) {
			const slot = this.allocate(id);
			exprs.push(this.toMelExpr(value), { kind: "store", slot });
		}
		// Body results are sequenced as-is; nothing is dropped from the stack
		for (const e of body) exprs.push(this.toMelExpr(e));
		return { kind: "seq", exprs };
	}

	/**
	 * [cond] [bez |then|+1] [then] [jmp |else|] [else]
	 *
	 * The +1 skips the trailing jmp when the condition is zero.
	 */
	private lowerIf(cond: UnrolledExpr, onTrue: UnrolledExpr, onFalse: UnrolledExpr): MelExpr {
		const melCond = this.toMelExpr(cond);
		const melTrue = this.toMelExpr(onTrue);
		const melFalse = this.toMelExpr(onFalse);
		return {
			kind: "seq",
			exprs: [
				melCond,
				jump("bez", countInstructions(melTrue) + 1),
				melTrue,
				jump("jmp", countInstructions(melFalse)),
				melFalse,
			],
		};
	}
}

/** Lower an unrolled expression with a fresh memory map. */
export function lower(expr: UnrolledExpr): MelExpr {
	return new MemoryMap().toMelExpr(expr);
}
