// SPDX-License-Identifier: MIT
// mil Opcode Table
// One entry per instruction: its tag byte and operand layout. Shared by the
// encoder and the decoder.

import type { Opcode } from "../types.js";

/** Operand layout following the tag byte. */
export type OperandShape =
	| "none"
	| "slot"   // u16 heap slot
	| "offset" // u16 relative jump
	| "param"  // u16 hash/sigeok parameter
	| "loop"   // u16 count, u16 body length
	| "int"    // 32-byte big-endian integer
	| "bytes"; // u8 length prefix, then payload

export interface OpcodeInfo {
	tag: number;
	operand: OperandShape;
}

export const OPCODES: Readonly<Record<Opcode, OpcodeInfo>> = {
	add: { tag: 0x10, operand: "none" },
	sub: { tag: 0x11, operand: "none" },
	mul: { tag: 0x12, operand: "none" },
	div: { tag: 0x13, operand: "none" },
	rem: { tag: 0x14, operand: "none" },

	and: { tag: 0x20, operand: "none" },
	or: { tag: 0x21, operand: "none" },
	xor: { tag: 0x22, operand: "none" },
	not: { tag: 0x23, operand: "none" },

	hash: { tag: 0x30, operand: "param" },
	sigeok: { tag: 0x31, operand: "param" },

	load: { tag: 0x40, operand: "slot" },
	store: { tag: 0x41, operand: "slot" },

	vref: { tag: 0x50, operand: "none" },
	vappend: { tag: 0x51, operand: "none" },
	vempty: { tag: 0x52, operand: "none" },
	vlen: { tag: 0x53, operand: "none" },
	vslice: { tag: 0x54, operand: "none" },
	vpush: { tag: 0x55, operand: "none" },

	jmp: { tag: 0xa0, operand: "offset" },
	bez: { tag: 0xa1, operand: "offset" },
	bnz: { tag: 0xa2, operand: "offset" },
	loop: { tag: 0xb0, operand: "loop" },

	pushb: { tag: 0xf0, operand: "bytes" },
	pushi: { tag: 0xf1, operand: "int" },
};

/** Largest value of a u16 operand. */
export const U16_MAX = 0xffff;

/** Largest payload of a pushb literal. */
export const BYTES_LITERAL_MAX = 0xff;

/** Width in bytes of a pushi payload. */
export const INT_WIDTH = 32;

function isOpcode(name: string): name is Opcode {
	return Object.hasOwn(OPCODES, name);
}

const byTag = new Map<number, Opcode>();
for (const [name, info] of Object.entries(OPCODES)) {
	if (isOpcode(name)) byTag.set(info.tag, name);
}

export function opcodeFromTag(tag: number): Opcode | undefined {
	return byTag.get(tag);
}
