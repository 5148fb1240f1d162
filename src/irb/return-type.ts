// SPDX-License-Identifier: MIT
// MetaIR IR-B Return Type
// Whether a statement list always leaves through return or raise, and the
// type it returns when that is known

import { exhaustive, invariant, MetaIRError } from "../errors.js";
import { type ExprType, typeEqual } from "../types.js";
import type * as ir from "./nodes.js";

export interface ReturnTypeInfo {
	readonly exprType?: ExprType;
	readonly alwaysReturns: boolean;
}

export interface ReturnTypeOptions {
	/**
	 * Reject a return or raise anywhere but in last position. Only the last
	 * statement is inspected, so an earlier terminator would go unnoticed.
	 */
	verifyTerminatorPosition?: boolean;
}

const NO_RETURN: ReturnTypeInfo = Object.freeze({ alwaysReturns: false });

//==============================================================================
// Merge
//==============================================================================

function info(exprType: ExprType | undefined, alwaysReturns: boolean): ReturnTypeInfo {
	return exprType === undefined ? { alwaysReturns } : { exprType, alwaysReturns };
}

/**
 * Join two branches: both must terminate for the join to, and a type known on
 * either side is the type of the join. Two known types must agree.
 */
export function mergeReturnTypes(a: ReturnTypeInfo, b: ReturnTypeInfo): ReturnTypeInfo {
	if (a.exprType !== undefined && b.exprType !== undefined && !typeEqual(a.exprType, b.exprType)) {
		throw MetaIRError.returnTypeConflict(a.exprType, b.exprType);
	}
	return info(a.exprType ?? b.exprType, a.alwaysReturns && b.alwaysReturns);
}

//==============================================================================
// Analysis
//==============================================================================

function analyze(stmts: readonly ir.Stmt[]): ReturnTypeInfo {
	const last = stmts[stmts.length - 1];
	if (last === undefined) return NO_RETURN;
	switch (last.kind) {
	case "return": return info(last.expr.exprType, true);
	case "raise": return info(undefined, true);
	case "if": return mergeReturnTypes(analyze(last.ifStmts), analyze(last.elseStmts));
	case "tryExcept": return mergeReturnTypes(analyze(last.tryBody), analyze(last.exceptBody));
	case "pass":
	case "assert":
	case "assignment":
	case "unpackingAssignment":
		return NO_RETURN;
	default: return exhaustive(last);
	}
}

function verifyTerminators(stmts: readonly ir.Stmt[]): void {
	stmts.forEach((stmt, i) => {
		switch (stmt.kind) {
		case "return":
		case "raise":
			invariant(i === stmts.length - 1, "Unreachable statements after " + stmt.kind);
			return;
		case "if":
			verifyTerminators(stmt.ifStmts);
			verifyTerminators(stmt.elseStmts);
			return;
		case "tryExcept":
			verifyTerminators(stmt.tryBody);
			verifyTerminators(stmt.exceptBody);
			return;
		case "pass":
		case "assert":
		case "assignment":
		case "unpackingAssignment":
			return;
		default: exhaustive(stmt);
		}
	});
}

export function getReturnType(stmts: readonly ir.Stmt[], options: ReturnTypeOptions = {}): ReturnTypeInfo {
	if (options.verifyTerminatorPosition === true) verifyTerminators(stmts);
	return analyze(stmts);
}
