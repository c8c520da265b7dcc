// SPDX-License-Identifier: MIT
// mil Document Validator - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { bytesVal, intVal } from "../src/types.js";
import { validateFixtures, validateProgram } from "../src/validator.js";

//==============================================================================
// Test Fixtures
//==============================================================================

const incDoc = {
	version: "1.0.0",
	defs: [
		{
			name: "inc",
			params: ["x"],
			body: {
				kind: "builtin",
				builtin: { op: "add", args: [{ kind: "var", name: "x" }, { kind: "value", value: { kind: "int", value: 1 } }] },
			},
		},
	],
	expr: { kind: "app", name: "inc", args: [{ kind: "value", value: { kind: "int", value: "41" } }] },
};

//==============================================================================
// Programs
//==============================================================================

describe("validateProgram", () => {
	it("accepts a well-formed document and builds runtime values", () => {
		const result = validateProgram(incDoc);
		assert.equal(result.valid, true);
		assert.deepStrictEqual(result.errors, []);
		assert.deepStrictEqual(result.value?.expr, {
			kind: "app",
			name: "inc",
			args: [{ kind: "value", value: intVal(41) }],
		});
		assert.deepStrictEqual(result.value?.defs[0]?.body, {
			kind: "builtin",
			builtin: { op: "add", args: [{ kind: "var", name: "x" }, { kind: "value", value: intVal(1) }] },
		});
	});

	it("defs default to empty", () => {
		const result = validateProgram({ expr: { kind: "value", value: { kind: "bytes", value: "0x0aff" } } });
		assert.equal(result.valid, true);
		assert.deepStrictEqual(result.value, {
			defs: [],
			expr: { kind: "value", value: bytesVal([0x0a, 0xff]) },
		});
	});

	it("accepts every expression form", () => {
		const ref = (name: string): unknown => ({ kind: "var", name });
		const result = validateProgram({
			expr: {
				kind: "let",
				bindings: [["x", { kind: "value", value: { kind: "int", value: 0 } }]],
				body: [
					{ kind: "set", name: "x", value: ref("tx-hash") },
					{ kind: "if", cond: ref("x"), then: ref("x"), else: ref("x") },
					{ kind: "loop", count: 2, body: ref("x") },
					{ kind: "hash", param: 0, body: ref("x") },
					{ kind: "sigeok", param: 0, message: ref("x"), key: ref("x"), signature: ref("tx-sig") },
					{ kind: "builtin", builtin: { op: "vempty", args: [] } },
				],
			},
		});
		assert.deepStrictEqual(result.errors, []);
		assert.equal(result.valid, true);
	});

	it("rejects a document without an expression", () => {
		const result = validateProgram({ defs: [] });
		assert.equal(result.valid, false);
		assert.ok(result.errors.some((e) => e.path === "expr"));
	});

	it("rejects an invalid version", () => {
		const result = validateProgram({ ...incDoc, version: "one" });
		assert.equal(result.valid, false);
		assert.ok(result.errors.some((e) => e.path === "version"));
	});

	it("rejects integers beyond 256 bits", () => {
		const huge = (1n << 256n).toString();
		const result = validateProgram({ expr: { kind: "value", value: { kind: "int", value: huge } } });
		assert.equal(result.valid, false);
	});

	it("rejects loop counts that do not fit 16 bits", () => {
		const result = validateProgram({
			expr: { kind: "loop", count: 65536, body: { kind: "value", value: { kind: "int", value: 1 } } },
		});
		assert.equal(result.valid, false);
	});

	it("reports a document too deep to check instead of crashing", () => {
		let expr: unknown = { kind: "value", value: { kind: "int", value: 0 } };
		for (let i = 0; i < 100_000; i++) {
			expr = { kind: "builtin", builtin: { op: "not", args: [expr] } };
		}
		const result = validateProgram({ expr });
		assert.equal(result.valid, false);
		assert.deepStrictEqual(result.errors, [{ path: "$", message: "Document nests too deeply" }]);
	});

	it("reports duplicate function names", () => {
		const result = validateProgram({ ...incDoc, defs: [incDoc.defs[0], incDoc.defs[0]] });
		assert.equal(result.valid, false);
		assert.deepStrictEqual(result.errors.map((e) => e.path), ["defs.1.name"]);
	});

	it("reports duplicate parameter names", () => {
		const result = validateProgram({
			defs: [{ name: "f", params: ["a", "a"], body: { kind: "var", name: "a" } }],
			expr: { kind: "app", name: "f", args: [] },
		});
		assert.deepStrictEqual(result.errors.map((e) => e.path), ["defs.0.params.1"]);
	});
});

//==============================================================================
// Fixtures
//==============================================================================

describe("validateFixtures", () => {
	it("decodes hashes and signatures from hex", () => {
		const result = validateFixtures([
			{ label: "first", hash: "0x00ff", signatures: ["0x0102"] },
			{ hash: "0x" },
		]);
		assert.equal(result.valid, true);
		const [first, second] = result.value ?? [];
		assert.equal(first?.label, "first");
		assert.deepStrictEqual(first?.hash, Uint8Array.from([0x00, 0xff]));
		assert.deepStrictEqual(first?.signatures, [Uint8Array.from([0x01, 0x02])]);
		assert.equal(second?.label, undefined);
		assert.deepStrictEqual(second?.signatures, []);
	});

	it("rejects hashes that are not hex", () => {
		const result = validateFixtures([{ hash: "deadbeef" }]);
		assert.equal(result.valid, false);
		assert.deepStrictEqual(result.errors.map((e) => e.path), ["0.hash"]);
	});

	it("rejects a file that is not a list", () => {
		assert.equal(validateFixtures({ hash: "0x00" }).valid, false);
	});
});
