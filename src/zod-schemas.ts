// SPDX-License-Identifier: MIT
// mil Zod Schemas
// JSON forms of the surface program and of batch transaction fixtures.
//
// Recursive schemas are annotated with the hand-written interfaces from
// types.ts: z.union typed as z.ZodType would otherwise erase them to unknown.
// Values are written as JSON-safe strings and transformed to runtime values.

import { z } from "zod/v4";
import type {
	AppExpr,
	BuiltIn,
	BuiltInExpr,
	Expr,
	FnDef,
	HashExpr,
	IfExpr,
	LetExpr,
	LoopExpr,
	SetExpr,
	SigEokExpr,
	Value,
} from "./types.js";
import { U256_MAX, bytesVal, intVal } from "./types.js";

//==============================================================================
// Primitives
//==============================================================================

/** Semantic version pattern */
const SemVer = z.string().regex(/^\d+\.\d+\.\d+(-[a-zA-Z0-9.]+)?$/);

/** 0x-prefixed, even-length hex */
export const HexSchema = z.string().regex(/^0x(?:[0-9a-fA-F]{2})*$/, "expected 0x-prefixed hex bytes");

const hexToBytes = (hex: string): Uint8Array => Uint8Array.from(Buffer.from(hex.slice(2), "hex"));

const U16 = z.number().int().min(0).max(0xffff);

const DecimalU256 = z.string()
	.regex(/^[0-9]+$/, "expected a decimal integer")
	.refine((s) => BigInt(s) <= U256_MAX, "integer exceeds 256 bits");

//==============================================================================
// Values
//==============================================================================

export const IntValueSchema = z.object({
	kind: z.literal("int"),
	value: z.union([DecimalU256, z.number().int().min(0)]),
}).transform((v) => intVal(BigInt(v.value)));

export const BytesValueSchema = z.object({
	kind: z.literal("bytes"),
	value: HexSchema,
}).transform((v) => bytesVal(hexToBytes(v.value)));

export const ValueSchema: z.ZodType<Value> = z.union([IntValueSchema, BytesValueSchema]);

//==============================================================================
// Built-in Operators
//==============================================================================

export const BuiltInSchema: z.ZodType<BuiltIn<Expr>> = z.union([
	z.object({
		op: z.enum(["add", "sub", "mul", "div", "rem", "and", "or", "xor", "vref", "vpush", "vappend"]),
		get args() { return z.tuple([ExprSchema, ExprSchema]); },
	}),
	z.object({
		op: z.enum(["not", "vlen"]),
		get args() { return z.tuple([ExprSchema]); },
	}),
	z.object({
		op: z.literal("vslice"),
		get args() { return z.tuple([ExprSchema, ExprSchema, ExprSchema]); },
	}),
	z.object({
		op: z.literal("vempty"),
		args: z.tuple([]),
	}),
]).meta({ id: "BuiltIn", title: "Built-in Operator", description: "Operator application with a fixed number of operands" });

//==============================================================================
// Expressions
//==============================================================================

export const ValueExprSchema = z.object({
	kind: z.literal("value"),
	value: ValueSchema,
}).meta({ id: "ValueExpr", title: "Literal", description: "Integer or byte-string literal" });

export const VarExprSchema = z.object({
	kind: z.literal("var"),
	name: z.string().min(1),
}).meta({ id: "VarExpr", title: "Variable", description: "Read of a bound name" });

export const BuiltInExprSchema: z.ZodType<BuiltInExpr<Expr>> = z.object({
	kind: z.literal("builtin"),
	get builtin() { return BuiltInSchema; },
});

export const AppExprSchema: z.ZodType<AppExpr> = z.object({
	kind: z.literal("app"),
	name: z.string().min(1),
	get args() { return z.array(ExprSchema); },
}).meta({ id: "AppExpr", title: "Function Call", description: "Application of a user-defined function" });

export const SetExprSchema: z.ZodType<SetExpr> = z.object({
	kind: z.literal("set"),
	name: z.string().min(1),
	get value() { return ExprSchema; },
}).meta({ id: "SetExpr", title: "Assignment", description: "Store a value into an existing binding" });

export const LetExprSchema: z.ZodType<LetExpr> = z.object({
	kind: z.literal("let"),
	get bindings() { return z.array(z.tuple([z.string().min(1), ExprSchema])); },
	get body() { return z.array(ExprSchema).min(1); },
}).meta({ id: "LetExpr", title: "Let", description: "Sequential bindings scoped over a body" });

export const IfExprSchema: z.ZodType<IfExpr<Expr>> = z.object({
	kind: z.literal("if"),
	get cond() { return ExprSchema; },
	get then() { return ExprSchema; },
	get else() { return ExprSchema; },
}).meta({ id: "IfExpr", title: "If", description: "Two-way branch on a zero / nonzero condition" });

export const LoopExprSchema: z.ZodType<LoopExpr<Expr>> = z.object({
	kind: z.literal("loop"),
	count: U16,
	get body() { return ExprSchema; },
}).meta({ id: "LoopExpr", title: "Loop", description: "Run a body a fixed number of times" });

export const HashExprSchema: z.ZodType<HashExpr<Expr>> = z.object({
	kind: z.literal("hash"),
	param: U16,
	get body() { return ExprSchema; },
}).meta({ id: "HashExpr", title: "Hash", description: "Digest of a body's value" });

export const SigEokExprSchema: z.ZodType<SigEokExpr<Expr>> = z.object({
	kind: z.literal("sigeok"),
	param: U16,
	get message() { return ExprSchema; },
	get key() { return ExprSchema; },
	get signature() { return ExprSchema; },
}).meta({ id: "SigEokExpr", title: "Signature Check", description: "Verify a signature over a message" });

/** Union of all 10 expression variants. Uses z.union (not discriminatedUnion) due to recursion. */
export const ExprSchema: z.ZodType<Expr> = z.union([
	ValueExprSchema,
	BuiltInExprSchema,
	AppExprSchema,
	SetExprSchema,
	VarExprSchema,
	LetExprSchema,
	IfExprSchema,
	LoopExprSchema,
	HashExprSchema,
	SigEokExprSchema,
]);

//==============================================================================
// Documents
//==============================================================================

export const FnDefSchema: z.ZodType<FnDef> = z.object({
	name: z.string().min(1),
	params: z.array(z.string().min(1)),
	body: ExprSchema,
}).meta({ id: "FnDef", title: "Function Definition", description: "Named, parameterized template inlined at each call" });

export const ProgramDocumentSchema = z.object({
	version: SemVer.optional(),
	defs: z.array(FnDefSchema).default([]),
	expr: ExprSchema,
}).meta({ id: "ProgramDocument", title: "mil Program", description: "Function definitions and the covenant expression" });

export const TransactionFixtureSchema = z.object({
	label: z.string().optional(),
	hash: HexSchema.transform(hexToBytes),
	signatures: z.array(HexSchema.transform(hexToBytes)).default([]),
});

export const FixtureFileSchema = z.array(TransactionFixtureSchema);

export type TransactionFixture = z.output<typeof TransactionFixtureSchema>;
