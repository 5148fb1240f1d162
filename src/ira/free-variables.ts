// SPDX-License-Identifier: MIT
// MetaIR IR-A Free Variables
// Names a statement list or expression reads from an enclosing scope

import { Visitor } from "./visitor.js";
import type * as ir from "./nodes.js";

export type FreeVariable = ir.VarReference | ir.VarReferencePattern;

//==============================================================================
// Scoped Collection
//==============================================================================

class FreeVariablesVisitor extends Visitor {
	/** Innermost scope last. The outermost scope is never popped. */
	private readonly scopes: Set<string>[];
	readonly freeVarsByName = new Map<string, FreeVariable>();

	constructor(boundNames: Iterable<string>) {
		super();
		this.scopes = [new Set(boundNames)];
	}

	private bind(name: string): void {
		this.scopes[this.scopes.length - 1]?.add(name);
	}

	private isBound(name: string): boolean {
		return this.scopes.some((scope) => scope.has(name));
	}

	/** Names bound here are visible to `body` only; the pop survives a throw. */
	private withScope(names: Iterable<string>, body: () => void): void {
		this.scopes.push(new Set(names));
		try {
			body();
		} finally {
			this.scopes.pop();
		}
	}

	private record(ref: FreeVariable): void {
		if (!ref.isGlobalFunction && !this.isBound(ref.name)) {
			this.freeVarsByName.set(ref.name, ref);
		}
	}

	override visitFunctionDefn(defn: ir.FunctionDefn): void {
		this.withScope(defn.args.map((arg) => arg.name), () => {
			this.visitStmts(defn.body);
		});
	}

	// Bindings from an assignment stay visible to the statements after it
	override visitAssignment(stmt: ir.Assignment): void {
		this.visitExpr(stmt.rhs);
		this.bind(stmt.lhs.name);
		if (stmt.lhs2 !== undefined) this.bind(stmt.lhs2.name);
	}

	override visitUnpackingAssignment(stmt: ir.UnpackingAssignment): void {
		this.visitExpr(stmt.rhs);
		for (const lhs of stmt.lhsList) this.bind(lhs.name);
	}

	override visitMatchExpr(expr: ir.MatchExpr): void {
		for (const matched of expr.matchedVars) this.visitExpr(matched);
		for (const matchCase of expr.matchCases) {
			const names = [...matchCase.matchedVarNames, ...matchCase.matchedVariadicVarNames];
			this.withScope(names, () => {
				this.visitMatchCase(matchCase);
			});
		}
	}

	override visitListComprehensionExpr(expr: ir.ListComprehensionExpr): void {
		this.visitExpr(expr.listVar);
		this.withScope([expr.loopVar.name], () => {
			this.visitExpr(expr.resultElemExpr);
		});
	}

	override visitVarReference(expr: ir.VarReference): void {
		this.record(expr);
	}

	override visitVarReferencePattern(pattern: ir.VarReferencePattern): void {
		this.record(pattern);
	}

	sortedResult(): FreeVariable[] {
		return [...this.freeVarsByName.values()].sort((a, b) => compareNames(a.name, b.name));
	}
}

function compareNames(a: string, b: string): number {
	if (a < b) return -1;
	return a > b ? 1 : 0;
}

//==============================================================================
// Entry Points
//==============================================================================

/**
 * Free variables of a statement list, one per name, ordered by name.
 * References to global functions are never free.
 */
export function getUniqueFreeVariablesInStmts(
	stmts: readonly ir.Stmt[],
	boundNames: Iterable<string> = [],
): FreeVariable[] {
	const visitor = new FreeVariablesVisitor(boundNames);
	visitor.visitStmts(stmts);
	return visitor.sortedResult();
}

export function getUniqueFreeVariablesInExpr(expr: ir.Expr): FreeVariable[] {
	const visitor = new FreeVariablesVisitor([]);
	visitor.visitExpr(expr);
	return visitor.sortedResult();
}

/** Free variables of a function body, with its arguments bound. */
export function getUniqueFreeVariablesInFunctionDefn(defn: ir.FunctionDefn): FreeVariable[] {
	const visitor = new FreeVariablesVisitor([]);
	visitor.visitFunctionDefn(defn);
	return visitor.sortedResult();
}
