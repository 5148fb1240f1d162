// SPDX-License-Identifier: MIT
// MetaIR Type System
// Expression types shared by both IR stages

import { exhaustive, invariant } from "./errors.js";
import type { SourceBranch } from "./source-branch.js";

//==============================================================================
// Expression Types
//==============================================================================

export interface BoolType {
	readonly kind: "bool";
}

/** Type of expressions that never produce a value (e.g. a raise) */
export interface BottomType {
	readonly kind: "bottom";
}

export interface IntType {
	readonly kind: "int";
}

/** A type-valued expression, i.e. a type of the target language */
export interface TypeType {
	readonly kind: "type";
}

/** Either an error value or nothing; the side channel of fallible operations */
export interface ErrorOrVoidType {
	readonly kind: "errorOrVoid";
}

export interface FunctionType {
	readonly kind: "function";
	readonly argTypes: readonly ExprType[];
	readonly returns: ExprType;
	readonly argNames?: readonly string[];
}

export interface ListType {
	readonly kind: "list";
	readonly elemType: ExprType;
}

export interface SetType {
	readonly kind: "set";
	readonly elemType: ExprType;
}

export type PackElemType = BoolType | IntType | TypeType | ErrorOrVoidType;

export interface ParameterPackType {
	readonly kind: "parameterPack";
	readonly elemType: PackElemType;
}

export interface CustomTypeArgDecl {
	readonly name: string;
	readonly exprType: ExprType;
}

export interface CustomType {
	readonly kind: "custom";
	readonly name: string;
	readonly argTypes: readonly CustomTypeArgDecl[];
	readonly isExceptionClass: boolean;
	readonly exceptionMessage?: string;
	readonly constructorSourceBranches: readonly SourceBranch[];
}

export type ExprType =
	| BoolType
	| BottomType
	| IntType
	| TypeType
	| ErrorOrVoidType
	| FunctionType
	| ListType
	| SetType
	| ParameterPackType
	| CustomType;

export type ExprTypeKind = ExprType["kind"];

//==============================================================================
// Constructors
//==============================================================================

export const boolType: BoolType = Object.freeze({ kind: "bool" });
export const bottomType: BottomType = Object.freeze({ kind: "bottom" });
export const intType: IntType = Object.freeze({ kind: "int" });
export const typeType: TypeType = Object.freeze({ kind: "type" });
export const errorOrVoidType: ErrorOrVoidType = Object.freeze({ kind: "errorOrVoid" });

export function functionType(
	argTypes: readonly ExprType[],
	returns: ExprType,
	argNames?: readonly string[],
): FunctionType {
	if (argNames === undefined) {
		return Object.freeze({ kind: "function", argTypes: Object.freeze([...argTypes]), returns });
	}
	invariant(
		argNames.length === argTypes.length,
		"Function type has " + String(argTypes.length) + " argument types but " +
			String(argNames.length) + " argument names",
	);
	return Object.freeze({
		kind: "function",
		argTypes: Object.freeze([...argTypes]),
		returns,
		argNames: Object.freeze([...argNames]),
	});
}

export function listType(elemType: ExprType): ListType {
	invariant(elemType.kind !== "function", "List elements cannot be functions: " + formatType(elemType));
	return Object.freeze({ kind: "list", elemType });
}

export function setType(elemType: ExprType): SetType {
	invariant(elemType.kind !== "function", "Set elements cannot be functions: " + formatType(elemType));
	return Object.freeze({ kind: "set", elemType });
}

export function isPackElemType(t: ExprType): t is PackElemType {
	return t.kind === "bool" || t.kind === "int" || t.kind === "type" || t.kind === "errorOrVoid";
}

export function parameterPackType(elemType: ExprType): ParameterPackType {
	invariant(
		isPackElemType(elemType),
		"Parameter pack elements must be bool, int, Type or ErrorOrVoid: " + formatType(elemType),
	);
	return Object.freeze({ kind: "parameterPack", elemType });
}

export interface CustomTypeOptions {
	isExceptionClass?: boolean;
	exceptionMessage?: string;
	constructorSourceBranches?: readonly SourceBranch[];
}

export function customType(
	name: string,
	argTypes: readonly CustomTypeArgDecl[],
	options: CustomTypeOptions = {},
): CustomType {
	const isExceptionClass = options.isExceptionClass ?? false;
	const constructorSourceBranches = Object.freeze([...(options.constructorSourceBranches ?? [])]);
	const frozenArgTypes = Object.freeze([...argTypes]);
	invariant(name.length > 0, "Custom type name cannot be empty");
	invariant(
		(options.exceptionMessage !== undefined) === isExceptionClass,
		"Custom type " + name + ": an exception message is required exactly when it is an exception class",
	);
	if (options.exceptionMessage === undefined) {
		return Object.freeze({ kind: "custom", name, argTypes: frozenArgTypes, isExceptionClass, constructorSourceBranches });
	}
	return Object.freeze({
		kind: "custom",
		name,
		argTypes: frozenArgTypes,
		isExceptionClass,
		exceptionMessage: options.exceptionMessage,
		constructorSourceBranches,
	});
}

export function customTypeArg(name: string, exprType: ExprType): CustomTypeArgDecl {
	return Object.freeze({ name, exprType });
}

//==============================================================================
// Equality
//==============================================================================

function typeListEqual(a: readonly ExprType[], b: readonly ExprType[]): boolean {
	if (a.length !== b.length) return false;
	return a.every((t, i) => {
		const other = b[i];
		return other !== undefined && typeEqual(t, other);
	});
}

function customEqual(a: CustomType, b: CustomType): boolean {
	if (a.name !== b.name || a.isExceptionClass !== b.isExceptionClass) return false;
	if (a.exceptionMessage !== b.exceptionMessage) return false;
	if (a.argTypes.length !== b.argTypes.length) return false;
	return a.argTypes.every((arg, i) => {
		const other = b.argTypes[i];
		return other?.name === arg.name && typeEqual(arg.exprType, other.exprType);
	});
}

/**
 * Structural type equality. Function argument names are documentation and do
 * not take part; custom types ignore their constructor source branches.
 */
export function typeEqual(a: ExprType, b: ExprType): boolean {
	switch (a.kind) {
	case "bool":
	case "bottom":
	case "int":
	case "type":
	case "errorOrVoid":
		return a.kind === b.kind;
	case "function":
		return b.kind === "function" &&
			typeListEqual(a.argTypes, b.argTypes) &&
			typeEqual(a.returns, b.returns);
	case "list":
		return b.kind === "list" && typeEqual(a.elemType, b.elemType);
	case "set":
		return b.kind === "set" && typeEqual(a.elemType, b.elemType);
	case "parameterPack":
		return b.kind === "parameterPack" && typeEqual(a.elemType, b.elemType);
	case "custom":
		return b.kind === "custom" && customEqual(a, b);
	default:
		return exhaustive(a);
	}
}

//==============================================================================
// Formatting
//==============================================================================

export function formatType(t: ExprType): string {
	switch (t.kind) {
	case "bool":
		return "bool";
	case "bottom":
		return "BottomType";
	case "int":
		return "int";
	case "type":
		return "Type";
	case "errorOrVoid":
		return "ErrorOrVoid";
	case "function":
		return "Callable[[" + t.argTypes.map(formatType).join(", ") + "], " + formatType(t.returns) + "]";
	case "list":
		return "List[" + formatType(t.elemType) + "]";
	case "set":
		return "Set[" + formatType(t.elemType) + "]";
	case "parameterPack":
		return "Sequence[" + formatType(t.elemType) + "]";
	case "custom":
		return t.name;
	default:
		return exhaustive(t);
	}
}
