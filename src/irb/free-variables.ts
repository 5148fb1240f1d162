// SPDX-License-Identifier: MIT
// MetaIR IR-B Free Variables
// Names an expression or statement list reads from an enclosing scope

import { Visitor } from "./visitor.js";
import type * as ir from "./nodes.js";

class FreeVariablesVisitor extends Visitor {
	private readonly scopes: Set<string>[];
	readonly freeVars = new Map<string, ir.VarReference>();

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

	private withScope(names: Iterable<string>, body: () => void): void {
		this.scopes.push(new Set(names));
		try {
			body();
		} finally {
			this.scopes.pop();
		}
	}

	override visitFunctionDefn(defn: ir.FunctionDefn): void {
		this.withScope(defn.args.map((arg) => arg.name), () => {
			this.visitStmts(defn.body);
		});
	}

	override visitAssignment(stmt: ir.Assignment): void {
		this.visitExpr(stmt.rhs);
		this.bind(stmt.lhs.name);
	}

	override visitUnpackingAssignment(stmt: ir.UnpackingAssignment): void {
		this.visitExpr(stmt.rhs);
		for (const lhs of stmt.lhsList) this.bind(lhs.name);
	}

	override visitTryExcept(stmt: ir.TryExcept): void {
		this.visitStmts(stmt.tryBody);
		this.withScope([stmt.caughtExceptionName], () => {
			this.visitStmts(stmt.exceptBody);
		});
	}

	override visitMatchExpr(expr: ir.MatchExpr): void {
		for (const matched of expr.matchedExprs) this.visitExpr(matched);
		for (const matchCase of expr.matchCases) {
			this.withScope([...matchCase.matchedVarNames, ...matchCase.matchedVariadicVarNames], () => {
				this.visitMatchCase(matchCase);
			});
		}
	}

	override visitListComprehension(expr: ir.ListComprehension): void {
		this.visitExpr(expr.listExpr);
		this.withScope([expr.loopVar.name], () => {
			this.visitExpr(expr.resultElemExpr);
		});
	}

	override visitSetComprehension(expr: ir.SetComprehension): void {
		this.visitExpr(expr.setExpr);
		this.withScope([expr.loopVar.name], () => {
			this.visitExpr(expr.resultElemExpr);
		});
	}

	override visitVarReference(expr: ir.VarReference): void {
		if (!expr.isGlobalFunction && !this.isBound(expr.name) && !this.freeVars.has(expr.name)) {
			this.freeVars.set(expr.name, expr);
		}
	}
}

//==============================================================================
// Entry Points
//==============================================================================

/** Free variables by name. The first reference to a name wins. */
export function getFreeVariables(expr: ir.Expr): Map<string, ir.VarReference> {
	const visitor = new FreeVariablesVisitor([]);
	visitor.visitExpr(expr);
	return visitor.freeVars;
}

export function getFreeVariablesInStmts(
	stmts: readonly ir.Stmt[],
	boundNames: Iterable<string> = [],
): Map<string, ir.VarReference> {
	const visitor = new FreeVariablesVisitor(boundNames);
	visitor.visitStmts(stmts);
	return visitor.freeVars;
}

export function getFreeVariablesInFunctionDefn(defn: ir.FunctionDefn): Map<string, ir.VarReference> {
	const visitor = new FreeVariablesVisitor([]);
	visitor.visitFunctionDefn(defn);
	return visitor.freeVars;
}
