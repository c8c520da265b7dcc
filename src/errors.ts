// SPDX-License-Identifier: MIT
// mil Error Types
// Fault domain for every pipeline stage: parse, expand, lower, encode, decode, execute

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Surface input
	ParseError: "ParseError",
	ValidationError: "ValidationError",

	// Expansion faults
	UndefinedFunction: "UndefinedFunction",
	ArityMismatch: "ArityMismatch",
	UnboundSymbol: "UnboundSymbol",
	DuplicateFunction: "DuplicateFunction",
	RecursionLimit: "RecursionLimit",

	// Lowering faults
	UnboundVariable: "UnboundVariable",
	DuplicateBinding: "DuplicateBinding",
	OperandOverflow: "OperandOverflow",

	// Decode faults
	TruncatedInput: "TruncatedInput",
	UnknownOpcode: "UnknownOpcode",
	MalformedLiteral: "MalformedLiteral",

	// Execution faults
	DivisionByZero: "DivisionByZero",
	IndexOutOfRange: "IndexOutOfRange",
	MalformedProgram: "MalformedProgram",
	TypeMismatch: "TypeMismatch",

	// Host policy
	ProgramTooLarge: "ProgramTooLarge",
	NestingTooDeep: "NestingTooDeep",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type Stage = "parse" | "expand" | "lower" | "encode" | "decode" | "execute" | "load";

//==============================================================================
// mil Error Class
//==============================================================================

export class MilError extends Error {
	readonly code: ErrorCode;
	readonly stage: Stage;
	/** True when the fault exposes a bug in an upstream stage rather than in the user's program. */
	readonly internal: boolean;

	constructor(code: ErrorCode, stage: Stage, message: string, internal = false) {
		super(message);
		this.name = "MilError";
		this.code = code;
		this.stage = stage;
		this.internal = internal;
	}

	static parse(message: string, line: number, column: number): MilError {
		return new MilError(
			ErrorCodes.ParseError,
			"parse",
			`Parse error at ${line}:${column}: ${message}`,
		);
	}

	static validation(errors: ValidationError[]): MilError {
		const details = errors.map((e) => e.path + ": " + e.message).join("; ");
		return new MilError(ErrorCodes.ValidationError, "parse", "Invalid document: " + details);
	}

	static undefinedFunction(name: string): MilError {
		return new MilError(
			ErrorCodes.UndefinedFunction,
			"expand",
			"Undefined function: " + name,
		);
	}

	static arityMismatch(name: string, expected: number, got: number): MilError {
		return new MilError(
			ErrorCodes.ArityMismatch,
			"expand",
			`Arity mismatch: ${name} expects ${expected} arguments, got ${got}`,
		);
	}

	static unboundSymbol(name: string): MilError {
		return new MilError(ErrorCodes.UnboundSymbol, "expand", "Unbound symbol: " + name);
	}

	static duplicateFunction(name: string): MilError {
		return new MilError(
			ErrorCodes.DuplicateFunction,
			"expand",
			"Function defined more than once: " + name,
		);
	}

	static recursionLimit(name: string, depth: number): MilError {
		return new MilError(
			ErrorCodes.RecursionLimit,
			"expand",
			`Inlining ${name} exceeded the maximum depth of ${depth}`,
		);
	}

	static unboundVariable(id: number): MilError {
		return new MilError(
			ErrorCodes.UnboundVariable,
			"lower",
			`No heap slot for variable #${id}`,
			true,
		);
	}

	static duplicateBinding(id: number): MilError {
		return new MilError(
			ErrorCodes.DuplicateBinding,
			"lower",
			`Variable #${id} is bound more than once`,
			true,
		);
	}

	static operandOverflow(stage: Stage, what: string, value: number | bigint, max: number): MilError {
		return new MilError(
			ErrorCodes.OperandOverflow,
			stage,
			`${what} ${String(value)} does not fit its operand (max ${max})`,
		);
	}

	static truncatedInput(offset: number): MilError {
		return new MilError(
			ErrorCodes.TruncatedInput,
			"decode",
			`Input ends inside an instruction at byte ${offset}`,
		);
	}

	static unknownOpcode(tag: number, offset: number): MilError {
		return new MilError(
			ErrorCodes.UnknownOpcode,
			"decode",
			`Unknown opcode 0x${tag.toString(16).padStart(2, "0")} at byte ${offset}`,
		);
	}

	static malformedLiteral(offset: number, length: number): MilError {
		return new MilError(
			ErrorCodes.MalformedLiteral,
			"decode",
			`Byte literal at ${offset} declares ${length} bytes past the end of input`,
		);
	}

	static divisionByZero(): MilError {
		return new MilError(ErrorCodes.DivisionByZero, "execute", "Division by zero");
	}

	static indexOutOfRange(index: bigint, length: number): MilError {
		return new MilError(
			ErrorCodes.IndexOutOfRange,
			"execute",
			`Index ${String(index)} out of range for length ${length}`,
		);
	}

	static malformedProgram(message: string): MilError {
		return new MilError(ErrorCodes.MalformedProgram, "execute", "Malformed program: " + message);
	}

	static typeMismatch(op: string, expected: "int" | "bytes"): MilError {
		return new MilError(
			ErrorCodes.TypeMismatch,
			"execute",
			`Type mismatch: ${op} expects ${expected}`,
		);
	}

	static programTooLarge(count: number, limit: number): MilError {
		return new MilError(
			ErrorCodes.ProgramTooLarge,
			"load",
			`Program has ${count} instructions, limit is ${limit}`,
		);
	}

	static nestingTooDeep(stage: Stage): MilError {
		return new MilError(
			ErrorCodes.NestingTooDeep,
			stage,
			`Program nests too deeply to ${stage}`,
		);
	}
}

//==============================================================================
// Result Types
//==============================================================================

/**
 * Outcome of a fallible stage. Stages throw MilError internally and the
 * public entry points hand back one of these instead.
 */
export type Result<T, E = MilError> =
	| { success: true; value: T }
	| { success: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ success: true, value });
export const fail = <E>(error: E): Result<never, E> => ({ success: false, error });

/** The engine ran out of call stack, as recursive passes do on very deep trees. */
export function isStackOverflow(e: unknown): e is RangeError {
	return e instanceof RangeError && /call stack/i.test(e.message);
}

/**
 * Run a recursive pass, reporting call stack exhaustion as NestingTooDeep
 * at `stage`.
 */
export function withStage<T>(stage: Stage, fn: () => T): T {
	try {
		return fn();
	} catch (e) {
		if (isStackOverflow(e)) throw MilError.nestingTooDeep(stage);
		throw e;
	}
}

/**
 * Run a stage and capture any MilError it throws. Anything else is a genuine
 * crash and is rethrown.
 */
export function attempt<T>(fn: () => T): Result<T> {
	try {
		return ok(fn());
	} catch (e) {
		if (e instanceof MilError) return fail(e);
		throw e;
	}
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
	value?: unknown;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationError[],
): ValidationResult<T> {
	return { valid: false, errors };
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 *
 * @example
 * switch (expr.kind) {
 *   case "value": return ...;
 *   case "var": return ...;
 *   default:
 *     exhaustive(expr); // Type error if a kind is missing
 * }
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
