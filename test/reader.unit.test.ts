// SPDX-License-Identifier: MIT
// mil S-expression Reader - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { MilError } from "../src/errors.js";
import { MAX_NESTING, readAll, type SExpr } from "../src/parser/reader.js";

/** Drop positions so trees can be compared structurally. */
function strip(s: SExpr): unknown {
	if (s.kind === "list") return s.items.map(strip);
	if (s.kind === "string") return { string: s.text };
	return s.text;
}

function parseErrorMessage(source: string): string {
	try {
		readAll(source);
	} catch (e) {
		if (e instanceof MilError) return e.message;
		throw e;
	}
	return assert.fail("expected a parse error");
}

describe("readAll", () => {
	it("reads nested lists of atoms", () => {
		const forms = readAll("(+ 1 (* 2 3))");
		assert.deepStrictEqual(forms.map(strip), [["+", "1", ["*", "2", "3"]]]);
	});

	it("reads several top-level forms", () => {
		const forms = readAll("(fn f (x) x)\n(f 1)");
		assert.deepStrictEqual(forms.map(strip), [["fn", "f", ["x"], "x"], ["f", "1"]]);
	});

	it("skips comments and whitespace", () => {
		const forms = readAll("; header\n(+ 1 ; inline\n\t2)\n; trailer");
		assert.deepStrictEqual(forms.map(strip), [["+", "1", "2"]]);
	});

	it("reads strings with escapes", () => {
		const forms = readAll("\"a\\\"b\\nc\"");
		assert.deepStrictEqual(forms.map(strip), [{ string: "a\"b\nc" }]);
	});

	it("records the line and column of each form", () => {
		const [form] = readAll("\n  (f\n   x)");
		assert.ok(form !== undefined && form.kind === "list");
		assert.deepStrictEqual(form.pos, { line: 2, column: 3 });
		assert.deepStrictEqual(form.items[1]?.pos, { line: 3, column: 4 });
	});

	it("returns nothing for an empty source", () => {
		assert.deepStrictEqual(readAll("  ; only a comment"), []);
	});
});

describe("readAll errors", () => {
	it("reports an unclosed list at its opening parenthesis", () => {
		assert.equal(parseErrorMessage("(+ 1"), "Parse error at 1:1: unclosed '('");
	});

	it("reports a stray closing parenthesis", () => {
		assert.equal(parseErrorMessage("1\n  )"), "Parse error at 2:3: unexpected ')'");
	});

	it("reports an unterminated string at its opening quote", () => {
		assert.equal(parseErrorMessage("(f \"abc)"), "Parse error at 1:4: unterminated string");
	});

	it("rejects lists nested deeper than the limit at the first parenthesis past it", () => {
		const source = "(not ".repeat(20_000) + "0" + ")".repeat(20_000);
		assert.equal(parseErrorMessage(source), "Parse error at 1:5001: lists nest deeper than 1000 levels");
	});

	it("accepts nesting up to the limit", () => {
		const source = "(".repeat(MAX_NESTING) + ")".repeat(MAX_NESTING);
		assert.equal(readAll(source).length, 1);
	});
});
