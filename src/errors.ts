// SPDX-License-Identifier: MIT
// MetaIR Error Types
// Internal-consistency failures raised by node construction and analyses

import type { ExprType } from "./types.js";
import { formatType } from "./types.js";

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Construction errors
	InvariantViolation: "InvariantViolation",
	TypeMismatch: "TypeMismatch",

	// Dispatch errors
	UnhandledKind: "UnhandledKind",

	// Analysis errors
	ReturnTypeConflict: "ReturnTypeConflict",

	// Validation errors
	ValidationError: "ValidationError",
	ObjectFileError: "ObjectFileError",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

//==============================================================================
// MetaIR Error Class
//==============================================================================

export class MetaIRError extends Error {
	readonly code: ErrorCode;
	readonly meta?: Map<string, string>;

	constructor(code: ErrorCode, message: string, meta?: Map<string, string>) {
		super(message);
		this.name = "MetaIRError";
		this.code = code;
		if (meta !== undefined) this.meta = meta;
	}

	/**
	 * Create an InvariantViolation
	 */
	static invariant(message: string): MetaIRError {
		return new MetaIRError(ErrorCodes.InvariantViolation, message);
	}

	/**
	 * Create a TypeMismatch for an operand whose type breaks a node invariant
	 */
	static typeMismatch(
		expected: ExprType | string,
		got: ExprType,
		context: string,
	): MetaIRError {
		const want = typeof expected === "string" ? expected : formatType(expected);
		return new MetaIRError(
			ErrorCodes.TypeMismatch,
			"Type mismatch (" + context + "): expected " + want + ", got " + formatType(got),
			new Map([
				["expected", want],
				["got", formatType(got)],
			]),
		);
	}

	/**
	 * Create an UnhandledKind error for a dispatcher that fell through
	 */
	static unhandledKind(category: string, kind: string): MetaIRError {
		return new MetaIRError(
			ErrorCodes.UnhandledKind,
			"Unhandled " + category + " kind: " + kind,
		);
	}

	static returnTypeConflict(first: ExprType, second: ExprType): MetaIRError {
		return new MetaIRError(
			ErrorCodes.ReturnTypeConflict,
			"Branches return different types: " + formatType(first) + " and " + formatType(second),
		);
	}

	/**
	 * Create a ValidationError
	 */
	static validation(
		path: string,
		message: string,
		value?: unknown,
	): MetaIRError {
		return new MetaIRError(
			ErrorCodes.ValidationError,
			"Validation error at " +
				path +
				": " +
				message +
				(value !== undefined ? " (value: " + JSON.stringify(value) + ")" : ""),
		);
	}

	static objectFile(message: string): MetaIRError {
		return new MetaIRError(ErrorCodes.ObjectFileError, "Invalid object file: " + message);
	}
}

/**
 * Assert a node invariant. Narrows `condition` on success.
 */
export function invariant(condition: boolean, message: string): asserts condition {
	if (!condition) {
		throw MetaIRError.invariant(message);
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

export type ValidationResult<T> =
	| { valid: true; errors: ValidationError[]; value: T }
	| { valid: false; errors: ValidationError[] };

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

/**
 * Combine multiple validation results.
 */
export function combineResults<T>(
	results: ValidationResult<T>[],
): ValidationResult<T[]> {
	const values: T[] = [];
	const errors: ValidationError[] = [];
	for (const r of results) {
		if (r.valid) values.push(r.value);
		else errors.push(...r.errors);
	}
	if (errors.length > 0) {
		return invalidResult(errors);
	}
	return validResult(values);
}

/**
 * Unwrap a result, throwing its first error as a ValidationError.
 */
export function unwrapResult<T>(result: ValidationResult<T>): T {
	if (result.valid) return result.value;
	const first = result.errors[0];
	throw MetaIRError.validation(
		first?.path ?? "$",
		first?.message ?? "invalid value",
		first?.value,
	);
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
 *   case "varRef": return ...;
 *   case "match": return ...;
 *   default:
 *     exhaustive(expr); // Type error if a kind is missing
 * }
 */
export function exhaustive(value: never): never {
	const node: unknown = value;
	const kind = typeof node === "object" && node !== null && "kind" in node
		? String(node.kind)
		: String(node);
	throw MetaIRError.unhandledKind("node", kind);
}
