// SPDX-License-Identifier: MIT
// mil Core Types
// Values, the generic built-in shape and the three expression trees:
// surface (Expr) -> unrolled (UnrolledExpr) -> lowered (MelExpr)

//==============================================================================
// Values
//==============================================================================

export interface IntVal {
	kind: "int";
	value: bigint;
}

export interface BytesVal {
	kind: "bytes";
	value: Uint8Array;
}

/** The only runtime data type: a 256-bit unsigned integer or a byte string. */
export type Value = IntVal | BytesVal;

/** 2^256, the modulus of all integer arithmetic. */
export const U256_MODULUS = 1n << 256n;
export const U256_MAX = U256_MODULUS - 1n;

export const intVal = (value: bigint | number): IntVal => ({
	kind: "int",
	value: BigInt(value),
});

export const bytesVal = (value: Uint8Array | readonly number[]): BytesVal => ({
	kind: "bytes",
	value: Uint8Array.from(value),
});

export const isInt = (v: Value): v is IntVal => v.kind === "int";
export const isBytes = (v: Value): v is BytesVal => v.kind === "bytes";

//==============================================================================
// Generic Built-in Operators
//==============================================================================

export type BinaryOp =
	| "add" | "sub" | "mul" | "div" | "rem"
	| "and" | "or" | "xor"
	| "vref" | "vpush" | "vappend";

export type UnaryOp = "not" | "vlen";

export type TernaryOp = "vslice";

export type BuiltInOp = BinaryOp | UnaryOp | TernaryOp | "vempty";

/**
 * Built-in operator application, generic over its operand type. The same
 * shape is instantiated with Expr, UnrolledExpr and MelExpr operands.
 */
export type BuiltIn<E> =
	| { op: BinaryOp; args: [E, E] }
	| { op: UnaryOp; args: [E] }
	| { op: TernaryOp; args: [E, E, E] }
	| { op: "vempty"; args: [] };

//==============================================================================
// Surface Expressions
//==============================================================================

export interface ValueExpr { kind: "value"; value: Value }
export interface BuiltInExpr<E> { kind: "builtin"; builtin: BuiltIn<E> }
export interface AppExpr { kind: "app"; name: string; args: Expr[] }
export interface SetExpr { kind: "set"; name: string; value: Expr }
export interface VarExpr { kind: "var"; name: string }
export interface LetExpr { kind: "let"; bindings: [string, Expr][]; body: Expr[] }
export interface IfExpr<E> { kind: "if"; cond: E; then: E; else: E }
export interface LoopExpr<E> { kind: "loop"; count: number; body: E }
export interface HashExpr<E> { kind: "hash"; param: number; body: E }
export interface SigEokExpr<E> {
	kind: "sigeok";
	param: number;
	message: E;
	key: E;
	signature: E;
}

/** Node of the user-facing tree, as produced by the reader or a JSON document. */
export type Expr =
	| ValueExpr
	| BuiltInExpr<Expr>
	| AppExpr
	| SetExpr
	| VarExpr
	| LetExpr
	| IfExpr<Expr>
	| LoopExpr<Expr>
	| HashExpr<Expr>
	| SigEokExpr<Expr>;

export interface FnDef {
	name: string;
	params: string[];
	body: Expr;
}

export interface Program {
	defs: FnDef[];
	expr: Expr;
}

//==============================================================================
// Unrolled Expressions
//==============================================================================

/** Globally unique identifier of one binding occurrence. */
export type VarId = number;

/** Function-free tree in which variables carry identifiers instead of names. */
export type UnrolledExpr =
	| ValueExpr
	| BuiltInExpr<UnrolledExpr>
	| { kind: "set"; id: VarId; value: UnrolledExpr }
	| { kind: "var"; id: VarId }
	| { kind: "let"; bindings: [VarId, UnrolledExpr][]; body: UnrolledExpr[] }
	| IfExpr<UnrolledExpr>
	| LoopExpr<UnrolledExpr>
	| HashExpr<UnrolledExpr>
	| SigEokExpr<UnrolledExpr>;

//==============================================================================
// Lowered Expressions
//==============================================================================

/** An index into the machine heap. */
export type HeapPos = number;

export type JumpOp = "jmp" | "bez" | "bnz";

/** A lowered loop; `length` is the instruction count of `body`. */
export interface MelLoop extends LoopExpr<MelExpr> {
	length: number;
}

/**
 * The flat, machine-shaped tree. Variables are heap slots and control flow is
 * expressed with relative jumps counted in instructions.
 */
export type MelExpr =
	| ValueExpr
	| BuiltInExpr<MelExpr>
	| { kind: "load"; slot: HeapPos }
	| { kind: "store"; slot: HeapPos }
	| { kind: "jump"; op: JumpOp; offset: number }
	| { kind: "seq"; exprs: MelExpr[] }
	| MelLoop
	| HashExpr<MelExpr>
	| SigEokExpr<MelExpr>;

//==============================================================================
// Instructions
//==============================================================================

/** One primitive machine operation, as emitted by the encoder. */
export type Instruction =
	| { op: BuiltInOp }
	| { op: "load" | "store"; slot: HeapPos }
	| { op: JumpOp; offset: number }
	| { op: "loop"; count: number; length: number }
	| { op: "hash" | "sigeok"; param: number }
	| { op: "pushi"; value: bigint }
	| { op: "pushb"; value: Uint8Array };

export type Opcode = Instruction["op"];
