// SPDX-License-Identifier: MIT
// mil - covenant language and bytecode machine
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	BinaryOp, BuiltIn, BuiltInOp, TernaryOp, UnaryOp,
	Expr, FnDef, Program,
	UnrolledExpr, VarId,
	MelExpr, MelLoop, HeapPos, JumpOp,
	Instruction, Opcode,
	Value, IntVal, BytesVal,
} from "./types.js";

export type { ErrorCode, Stage, Result, ValidationError, ValidationResult } from "./errors.js";

//==============================================================================
// Values
//==============================================================================

export { U256_MAX, U256_MODULUS, bytesVal, intVal, isBytes, isInt } from "./types.js";

//==============================================================================
// Error Codes
//==============================================================================

export { ErrorCodes, MilError, attempt } from "./errors.js";

//==============================================================================
// Surface Syntax and Validation
//==============================================================================

export { readAll, type SExpr } from "./parser/reader.js";
export { parseExpr, parseProgram } from "./parser/syntax.js";
export { validateFixtures, validateProgram } from "./validator.js";
export { ProgramDocumentSchema, FixtureFileSchema, type TransactionFixture } from "./zod-schemas.js";

//==============================================================================
// Compilation Stages
//==============================================================================

export { DEFAULT_MAX_INLINE_DEPTH, expandProgram, type ExpandOptions } from "./expansion.js";
export { MemoryMap, lower } from "./lower/memory-map.js";
export { countInstructions, flatten } from "./bytecode/flatten.js";
export { encode, encodeInstructions } from "./bytecode/encode.js";
export { decode, disassemble } from "./bytecode/decode.js";
export { staticCost } from "./bytecode/cost.js";
export { OPCODES } from "./bytecode/opcodes.js";
export { RESERVED_BINDINGS } from "./reserved.js";

export {
	compile, compileSource, loadCovenant,
	type CompileOptions, type CompiledCovenant, type LoadOptions,
} from "./compiler.js";

//==============================================================================
// Execution
//==============================================================================

export { createEnv, type ExecutionEnv, type Transaction } from "./vm/context.js";
export { execute, isAuthorized, type ExecuteOptions, type ExecutionResult } from "./vm/machine.js";
export { covenantHash, digest, verifyEd25519 } from "./vm/crypto.js";
export { runBatch, type BatchEntry, type BatchOptions, type LabeledTransaction } from "./batch.js";

//==============================================================================
// Formatting
//==============================================================================

export { formatDisassembly, formatInstruction, formatStack, formatTree, formatValue, fromHex, toHex } from "./format.js";

//==============================================================================
// CLI Utilities
//==============================================================================

export { loadFixtures, loadProgram, parseArgs, readTextFile, type Options } from "./cli-utils.js";
