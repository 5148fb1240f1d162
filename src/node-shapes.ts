// SPDX-License-Identifier: MIT
// MetaIR Node Shapes
// Type-building nodes, generic over what their children may be. IR-A uses
// them for both expressions and patterns; IR-B for nested expressions.

import { expectNonEmptyName, expectType, frozen } from "./node-checks.js";
import type { ExprType, TypeType } from "./types.js";
import { listType, typeType } from "./types.js";

//==============================================================================
// Shapes
//==============================================================================

export interface AtomicTypeNode<K extends string> {
	readonly kind: K;
	readonly exprType: TypeType;
	/** Spelling of the type in the target language, e.g. `int` or `std::vector` */
	readonly cppType: string;
}

export interface TypeWrapperNode<K extends string, C> {
	readonly kind: K;
	readonly exprType: TypeType;
	readonly typeExpr: C;
}

export interface FunctionTypeNode<K extends string, C> {
	readonly kind: K;
	readonly exprType: TypeType;
	readonly returnTypeExpr: C;
	/** A `List[Type]`-typed child holding the argument types */
	readonly argListExpr: C;
}

/** Type constructors that wrap a single type */
export type TypeWrapperOp = "pointer" | "reference" | "rvalue_reference" | "const" | "array";

interface Typed {
	readonly exprType: ExprType;
}

//==============================================================================
// Builders
//==============================================================================

export function makeAtomicType<K extends string>(kind: K, cppType: string): AtomicTypeNode<K> {
	expectNonEmptyName(cppType, kind);
	return frozen({ kind, exprType: typeType, cppType });
}

export function makeTypeWrapper<K extends string, C extends Typed>(
	kind: K,
	typeExpr: C,
): TypeWrapperNode<K, C> {
	expectType(typeExpr, typeType, kind);
	return frozen({ kind, exprType: typeType, typeExpr });
}

export function makeFunctionType<K extends string, C extends Typed>(
	kind: K,
	returnTypeExpr: C,
	argListExpr: C,
): FunctionTypeNode<K, C> {
	expectType(returnTypeExpr, typeType, kind + " return type");
	expectType(argListExpr, listType(typeType), kind + " argument list");
	return frozen({ kind, exprType: typeType, returnTypeExpr, argListExpr });
}
