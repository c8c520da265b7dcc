// SPDX-License-Identifier: MIT
// mil Document Validator
// Two-phase validation: Zod safeParse for structure, then semantic checks.

import type { z } from "zod/v4";
import {
	invalidResult,
	isStackOverflow,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "./errors.js";
import type { FnDef, Program } from "./types.js";
import {
	FixtureFileSchema,
	ProgramDocumentSchema,
	type TransactionFixture,
} from "./zod-schemas.js";

//==============================================================================
// Zod-to-ValidationError Conversion
//==============================================================================

function zodToValidationErrors(error: z.ZodError): ValidationError[] {
	return error.issues.map(issue => ({
		path: issue.path.map(String).join(".") || "$",
		message: issue.message,
	}));
}

//==============================================================================
// Semantic Checks
//==============================================================================

function checkDefinitions(defs: readonly FnDef[]): ValidationError[] {
	const errors: ValidationError[] = [];
	const seen = new Set<string>();
	defs.forEach((def, i) => {
		if (seen.has(def.name)) {
			errors.push({ path: `defs.${i}.name`, message: "Duplicate function name", value: def.name });
		}
		seen.add(def.name);

		const params = new Set<string>();
		def.params.forEach((param, j) => {
			if (params.has(param)) {
				errors.push({ path: `defs.${i}.params.${j}`, message: "Duplicate parameter name", value: param });
			}
			params.add(param);
		});
	});
	return errors;
}

// The schema recurses once per nested expression
function parseDocument(doc: unknown): ReturnType<typeof ProgramDocumentSchema.safeParse> | null {
	try {
		return ProgramDocumentSchema.safeParse(doc);
	} catch (e) {
		if (isStackOverflow(e)) return null;
		throw e;
	}
}

//==============================================================================
// Public Validators
//==============================================================================

/**
 * Validate the JSON form of a program (function definitions + expression).
 */
export function validateProgram(doc: unknown): ValidationResult<Program> {
	// Phase 1: Structural validation via Zod
	const parsed = parseDocument(doc);
	if (parsed === null) {
		return invalidResult<Program>([{ path: "$", message: "Document nests too deeply" }]);
	}
	if (!parsed.success) {
		return invalidResult<Program>(zodToValidationErrors(parsed.error));
	}

	// Phase 2: Semantic validation on typed data
	const errors = checkDefinitions(parsed.data.defs);
	if (errors.length > 0) {
		return invalidResult<Program>(errors);
	}
	return validResult({ defs: parsed.data.defs, expr: parsed.data.expr });
}

/**
 * Validate a batch fixture file: a list of transactions to run a covenant
 * against.
 */
export function validateFixtures(doc: unknown): ValidationResult<TransactionFixture[]> {
	const parsed = FixtureFileSchema.safeParse(doc);
	if (!parsed.success) {
		return invalidResult<TransactionFixture[]>(zodToValidationErrors(parsed.error));
	}
	return validResult(parsed.data);
}
