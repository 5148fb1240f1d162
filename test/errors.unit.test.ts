import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	combineResults,
	ErrorCodes,
	exhaustive,
	invalidResult,
	invariant,
	MetaIRError,
	unwrapResult,
	validResult,
} from "../src/errors.js";
import { intType, listType } from "../src/types.js";

describe("MetaIRError", () => {
	it("constructor sets code, message and name", () => {
		const err = new MetaIRError(ErrorCodes.InvariantViolation, "broken");
		assert.equal(err.code, "InvariantViolation");
		assert.equal(err.message, "broken");
		assert.equal(err.name, "MetaIRError");
		assert.equal(err.meta, undefined);
		assert.ok(err instanceof Error);
	});

	it("typeMismatch formats both types and keeps them in meta", () => {
		const err = MetaIRError.typeMismatch(intType, listType(intType), "sum");
		assert.equal(err.code, "TypeMismatch");
		assert.equal(err.message, "Type mismatch (sum): expected int, got List[int]");
		assert.equal(err.meta?.get("expected"), "int");
		assert.equal(err.meta?.get("got"), "List[int]");
	});

	it("typeMismatch accepts a description of the expected type", () => {
		const err = MetaIRError.typeMismatch("List[...]", intType, "in");
		assert.equal(err.message, "Type mismatch (in): expected List[...], got int");
	});

	it("returnTypeConflict names both types", () => {
		const err = MetaIRError.returnTypeConflict(intType, listType(intType));
		assert.equal(err.code, "ReturnTypeConflict");
		assert.equal(err.message, "Branches return different types: int and List[int]");
	});

	it("validation includes the path and value", () => {
		const err = MetaIRError.validation("logLevel", "bad level", "loud");
		assert.equal(err.code, "ValidationError");
		assert.equal(err.message, "Validation error at logLevel: bad level (value: \"loud\")");
	});

	it("objectFile prefixes its message", () => {
		assert.equal(MetaIRError.objectFile("no module named m").message, "Invalid object file: no module named m");
	});
});

describe("invariant", () => {
	it("passes on true", () => {
		invariant(true, "never shown");
	});

	it("throws an InvariantViolation on false", () => {
		assert.throws(
			() => { invariant(false, "names must be unique"); },
			(err: unknown) => err instanceof MetaIRError &&
				err.code === ErrorCodes.InvariantViolation &&
				err.message === "names must be unique",
		);
	});
});

describe("validation results", () => {
	it("combineResults collects values when all are valid", () => {
		const combined = combineResults([validResult(1), validResult(2)]);
		assert.deepEqual(combined, { valid: true, errors: [], value: [1, 2] });
	});

	it("combineResults collects every error", () => {
		const combined = combineResults<number>([
			validResult(1),
			invalidResult([{ path: "a", message: "bad a" }]),
			invalidResult([{ path: "b", message: "bad b" }]),
		]);
		assert.equal(combined.valid, false);
		assert.deepEqual(combined.errors.map((e) => e.path), ["a", "b"]);
	});

	it("unwrapResult throws the first error", () => {
		assert.equal(unwrapResult(validResult("ok")), "ok");
		assert.throws(
			() => unwrapResult(invalidResult([{ path: "x", message: "missing" }])),
			/Validation error at x: missing/,
		);
	});
});

describe("exhaustive", () => {
	it("throws UnhandledKind with the node kind", () => {
		const bogus: unknown = { kind: "mystery" };
		assert.throws(
			() => exhaustive(bogus as never),
			/Unhandled node kind: mystery/,
		);
	});
});
