// SPDX-License-Identifier: MIT
// mil Bytecode Decoder
// Inverts the encoder. Decoding either yields every instruction or fails;
// it never returns a partial program.

import { MilError, attempt, exhaustive, type Result } from "../errors.js";
import type { Instruction } from "../types.js";
import { INT_WIDTH, opcodeFromTag } from "./opcodes.js";

class Reader {
	private pos = 0;

	constructor(private readonly bytes: Uint8Array) {}

	get offset(): number {
		return this.pos;
	}

	get done(): boolean {
		return this.pos >= this.bytes.length;
	}

	get remaining(): number {
		return this.bytes.length - this.pos;
	}

	u8(): number {
		const b = this.bytes[this.pos];
		if (b === undefined) throw MilError.truncatedInput(this.pos);
		this.pos++;
		return b;
	}

	u16(): number {
		const hi = this.u8();
		return (hi << 8) | this.u8();
	}

	take(length: number): Uint8Array {
		const chunk = this.bytes.slice(this.pos, this.pos + length);
		this.pos += length;
		return chunk;
	}
}

function readInt(reader: Reader): bigint {
	if (reader.remaining < INT_WIDTH) throw MilError.truncatedInput(reader.offset);
	let value = 0n;
	for (const b of reader.take(INT_WIDTH)) {
		value = (value << 8n) | BigInt(b);
	}
	return value;
}

function readBytes(reader: Reader): Uint8Array {
	const start = reader.offset;
	const length = reader.u8();
	if (length > reader.remaining) throw MilError.malformedLiteral(start, length);
	return reader.take(length);
}

function readInstruction(reader: Reader): Instruction {
	const start = reader.offset;
	const tag = reader.u8();
	const op = opcodeFromTag(tag);
	if (op === undefined) throw MilError.unknownOpcode(tag, start);
	switch (op) {
	case "load":
	case "store":
		return { op, slot: reader.u16() };
	case "jmp":
	case "bez":
	case "bnz":
		return { op, offset: reader.u16() };
	case "loop": {
		const count = reader.u16();
		return { op, count, length: reader.u16() };
	}
	case "hash":
	case "sigeok":
		return { op, param: reader.u16() };
	case "pushi":
		return { op, value: readInt(reader) };
	case "pushb":
		return { op, value: readBytes(reader) };
	case "add": case "sub": case "mul": case "div": case "rem":
	case "and": case "or": case "xor": case "not":
	case "vempty": case "vlen": case "vref": case "vpush": case "vappend": case "vslice":
		return { op };
	default:
		return exhaustive(op);
	}
}

/**
 * Decode a binary program into its instruction sequence, reporting the fault
 * (TruncatedInput, UnknownOpcode, MalformedLiteral) on failure.
 */
export function disassemble(bytes: Uint8Array): Result<Instruction[]> {
	return attempt(() => {
		const reader = new Reader(bytes);
		const instructions: Instruction[] = [];
		while (!reader.done) {
			instructions.push(readInstruction(reader));
		}
		return instructions;
	});
}

/** Decode a binary program, or undefined when the bytes are not a valid program. */
export function decode(bytes: Uint8Array): Instruction[] | undefined {
	const result = disassemble(bytes);
	return result.success ? result.value : undefined;
}
