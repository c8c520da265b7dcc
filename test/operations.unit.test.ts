// SPDX-License-Identifier: MIT
// mil Stack Operations - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { createHash, generateKeyPairSync, sign } from "node:crypto";

import { MilError } from "../src/errors.js";
import { U256_MAX, bytesVal, intVal, type BuiltInOp, type Value } from "../src/types.js";
import {
	OperandStack,
	applyBuiltIn,
	applyHash,
	applySigEok,
	intToBytes,
} from "../src/vm/operations.js";

/** Push `inputs` in order, apply `op`, and return the resulting stack. */
function run(op: BuiltInOp, ...inputs: Value[]): Value[] {
	const stack = new OperandStack();
	for (const v of inputs) stack.push(v);
	applyBuiltIn(op, stack);
	return stack.values;
}

function fault(fn: () => unknown): MilError {
	try {
		fn();
	} catch (e) {
		if (e instanceof MilError) return e;
		throw e;
	}
	return assert.fail("expected a fault");
}

const bytes = (...xs: number[]): Value => bytesVal(xs);

//==============================================================================
// Operand Stack
//==============================================================================

describe("OperandStack", () => {
	it("pops in reverse push order", () => {
		const stack = new OperandStack();
		stack.push(intVal(1));
		stack.push(intVal(2));
		assert.deepStrictEqual(stack.pop(), intVal(2));
		assert.deepStrictEqual(stack.values, [intVal(1)]);
	});

	it("underflow is a MalformedProgram fault", () => {
		const err = fault(() => new OperandStack().pop());
		assert.equal(err.code, "MalformedProgram");
		assert.equal(err.message, "Malformed program: stack underflow");
	});

	it("typed pops reject the other kind", () => {
		const stack = new OperandStack();
		stack.push(bytes(1));
		assert.equal(fault(() => stack.popInt("add")).message, "Type mismatch: add expects int");
	});
});

//==============================================================================
// Arithmetic
//==============================================================================

describe("applyBuiltIn - arithmetic", () => {
	it("the right operand is on top of the stack", () => {
		assert.deepStrictEqual(run("sub", intVal(5), intVal(3)), [intVal(2)]);
		assert.deepStrictEqual(run("div", intVal(7), intVal(2)), [intVal(3)]);
		assert.deepStrictEqual(run("rem", intVal(7), intVal(3)), [intVal(1)]);
	});

	it("wraps modulo 2^256", () => {
		assert.deepStrictEqual(run("add", intVal(U256_MAX), intVal(1)), [intVal(0)]);
		assert.deepStrictEqual(run("sub", intVal(0), intVal(1)), [intVal(U256_MAX)]);
		assert.deepStrictEqual(run("mul", intVal(1n << 255n), intVal(2)), [intVal(0)]);
	});

	it("division and remainder by zero fault", () => {
		assert.equal(fault(() => run("div", intVal(1), intVal(0))).code, "DivisionByZero");
		assert.equal(fault(() => run("rem", intVal(1), intVal(0))).code, "DivisionByZero");
	});

	it("bitwise operators", () => {
		assert.deepStrictEqual(run("and", intVal(0b1100), intVal(0b1010)), [intVal(0b1000)]);
		assert.deepStrictEqual(run("or", intVal(0b1100), intVal(0b1010)), [intVal(0b1110)]);
		assert.deepStrictEqual(run("xor", intVal(0b1100), intVal(0b1010)), [intVal(0b0110)]);
		assert.deepStrictEqual(run("not", intVal(0)), [intVal(U256_MAX)]);
	});

	it("arithmetic on a byte string is a TypeMismatch", () => {
		assert.equal(fault(() => run("add", bytes(1), intVal(1))).code, "TypeMismatch");
	});
});

//==============================================================================
// Byte Strings
//==============================================================================

describe("applyBuiltIn - byte strings", () => {
	it("vempty and vlen", () => {
		assert.deepStrictEqual(run("vempty"), [bytes()]);
		assert.deepStrictEqual(run("vlen", bytes(1, 2, 3)), [intVal(3)]);
	});

	it("vref reads one byte as an integer", () => {
		assert.deepStrictEqual(run("vref", bytes(10, 20, 30), intVal(1)), [intVal(20)]);
	});

	it("vref past the end is IndexOutOfRange", () => {
		const err = fault(() => run("vref", bytes(1, 2, 3), intVal(5)));
		assert.equal(err.code, "IndexOutOfRange");
		assert.equal(err.message, "Index 5 out of range for length 3");
	});

	it("vpush appends one byte", () => {
		assert.deepStrictEqual(run("vpush", bytes(1), intVal(2)), [bytes(1, 2)]);
		assert.equal(fault(() => run("vpush", bytes(), intVal(256))).code, "TypeMismatch");
	});

	it("vappend keeps the left operand first", () => {
		assert.deepStrictEqual(run("vappend", bytes(1), bytes(2, 3)), [bytes(1, 2, 3)]);
	});

	it("vslice takes [start, end)", () => {
		assert.deepStrictEqual(run("vslice", bytes(1, 2, 3, 4), intVal(1), intVal(3)), [bytes(2, 3)]);
		assert.deepStrictEqual(run("vslice", bytes(1, 2), intVal(2), intVal(2)), [bytes()]);
	});

	it("vslice out of bounds is IndexOutOfRange", () => {
		assert.equal(fault(() => run("vslice", bytes(1, 2), intVal(1), intVal(3))).code, "IndexOutOfRange");
		assert.equal(fault(() => run("vslice", bytes(1, 2), intVal(2), intVal(1))).code, "IndexOutOfRange");
	});
});

//==============================================================================
// Cryptography
//==============================================================================

const sha256 = (data: Uint8Array): Uint8Array => Uint8Array.from(createHash("sha256").update(data).digest());

describe("applyHash", () => {
	it("hashes integers as 32 big-endian bytes", () => {
		assert.deepStrictEqual(intToBytes(258n).slice(30), Uint8Array.from([1, 2]));
		const stack = new OperandStack();
		stack.push(intVal(258));
		applyHash(0, stack);
		assert.deepStrictEqual(stack.values, [bytesVal(sha256(intToBytes(258n)))]);
	});

	it("hashes byte strings directly", () => {
		const stack = new OperandStack();
		stack.push(bytes(1, 2, 3));
		applyHash(0, stack);
		assert.deepStrictEqual(stack.values, [bytesVal(sha256(Uint8Array.from([1, 2, 3])))]);
	});

	it("truncates to the requested length", () => {
		const stack = new OperandStack();
		stack.push(bytes(1, 2, 3));
		applyHash(4, stack);
		assert.deepStrictEqual(stack.values, [bytesVal(sha256(Uint8Array.from([1, 2, 3])).slice(0, 4))]);
	});
});

describe("applySigEok", () => {
	const { publicKey, privateKey } = generateKeyPairSync("ed25519");
	const rawKey = Uint8Array.from(publicKey.export({ format: "der", type: "spki" }).subarray(12));
	const message = Uint8Array.from([0xaa, 0xbb]);
	const signature = Uint8Array.from(sign(null, message, privateKey));

	function check(param: number, sig: Uint8Array): Value[] {
		const stack = new OperandStack();
		stack.push(bytesVal(message));
		stack.push(bytesVal(rawKey));
		stack.push(bytesVal(sig));
		applySigEok(param, stack);
		return stack.values;
	}

	it("pushes 1 for a valid signature", () => {
		assert.deepStrictEqual(check(0, signature), [intVal(1)]);
	});

	it("pushes 0 for a signature that does not verify", () => {
		const forged = Uint8Array.from(signature);
		forged[0] = (forged[0] ?? 0) ^ 0xff;
		assert.deepStrictEqual(check(0, forged), [intVal(0)]);
		assert.deepStrictEqual(check(0, Uint8Array.from([1, 2, 3])), [intVal(0)]);
	});

	it("an unknown scheme is a MalformedProgram fault", () => {
		const err = fault(() => check(1, signature));
		assert.equal(err.code, "MalformedProgram");
		assert.equal(err.message, "Malformed program: unknown signature scheme 1");
	});
});
