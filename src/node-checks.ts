// SPDX-License-Identifier: MIT
// MetaIR Node Checks
// Operand checks shared by the node constructors of both IR stages

import { MetaIRError } from "./errors.js";
import type {
	CustomType,
	ExprType,
	FunctionType,
	ListType,
	ParameterPackType,
	SetType,
} from "./types.js";
import { typeEqual } from "./types.js";

interface Typed {
	readonly exprType: ExprType;
}

/** Freeze a freshly built node and hand it back with its own type. */
export function frozen<T extends object>(value: T): T {
	Object.freeze(value);
	return value;
}

/** Copy an array field into a frozen list, so callers cannot change a node after construction. */
export function frozenList<T>(items: readonly T[]): readonly T[] {
	return Object.freeze([...items]);
}

export function expectType(operand: Typed, expected: ExprType, context: string): void {
	if (!typeEqual(operand.exprType, expected)) {
		throw MetaIRError.typeMismatch(expected, operand.exprType, context);
	}
}

export function expectSameType(lhs: Typed, rhs: Typed, context: string): void {
	expectType(rhs, lhs.exprType, context);
}

export function expectListType(operand: Typed, context: string): ListType {
	const t = operand.exprType;
	if (t.kind !== "list") throw MetaIRError.typeMismatch("List[...]", t, context);
	return t;
}

export function expectSetType(operand: Typed, context: string): SetType {
	const t = operand.exprType;
	if (t.kind !== "set") throw MetaIRError.typeMismatch("Set[...]", t, context);
	return t;
}

export function expectFunctionType(operand: Typed, context: string): FunctionType {
	const t = operand.exprType;
	if (t.kind !== "function") throw MetaIRError.typeMismatch("Callable[...]", t, context);
	return t;
}

export function expectCustomType(operand: Typed, context: string): CustomType {
	const t = operand.exprType;
	if (t.kind !== "custom") throw MetaIRError.typeMismatch("a custom type", t, context);
	return t;
}

export function expectPackType(operand: Typed, context: string): ParameterPackType {
	const t = operand.exprType;
	if (t.kind !== "parameterPack") throw MetaIRError.typeMismatch("Sequence[...]", t, context);
	return t;
}

export function expectNotFunction(operand: Typed, context: string): void {
	if (operand.exprType.kind === "function") {
		throw MetaIRError.typeMismatch("a non-function type", operand.exprType, context);
	}
}

export function expectNonEmptyName(name: string, context: string): void {
	if (name.length === 0) {
		throw MetaIRError.invariant(context + ": name cannot be empty");
	}
}

export const INT_COMPARISON_OPS = ["<", ">", "<=", ">="] as const;
export type IntComparisonOp = (typeof INT_COMPARISON_OPS)[number];

export const INT_BINARY_OPS = ["+", "-", "*", "//", "%"] as const;
export type IntBinaryOp = (typeof INT_BINARY_OPS)[number];

export function isIntComparisonOp(op: string): op is IntComparisonOp {
	return INT_COMPARISON_OPS.some((candidate) => candidate === op);
}

export function isIntBinaryOp(op: string): op is IntBinaryOp {
	return INT_BINARY_OPS.some((candidate) => candidate === op);
}

/** Set equality over name lists, ignoring order and duplicates */
export function sameNameSet(a: readonly string[], b: readonly string[]): boolean {
	const left = new Set(a);
	const right = new Set(b);
	return left.size === right.size && [...left].every((name) => right.has(name));
}
