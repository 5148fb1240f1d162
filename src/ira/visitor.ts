// SPDX-License-Identifier: MIT
// MetaIR IR-A Visitor
// Read-only traversal. Each dispatcher switches over a closed node union and
// ends in exhaustive(), so adding a node kind without a handler is a compile
// error. Leaf handlers do nothing; composite handlers visit their children.

import { exhaustive } from "../errors.js";
import type { CustomType } from "../types.js";
import type * as ir from "./nodes.js";

export class Visitor {
	//==========================================================================
	// Dispatchers
	//==========================================================================

	visitExpr(expr: ir.Expr): void {
		switch (expr.kind) {
		case "varRef": this.visitVarReference(expr); return;
		case "match": this.visitMatchExpr(expr); return;
		case "boolLiteral": this.visitBoolLiteral(expr); return;
		case "intLiteral": this.visitIntLiteral(expr); return;
		case "atomicType": this.visitAtomicTypeLiteral(expr); return;
		case "pointerType": this.visitPointerTypeExpr(expr); return;
		case "referenceType": this.visitReferenceTypeExpr(expr); return;
		case "rvalueReferenceType": this.visitRvalueReferenceTypeExpr(expr); return;
		case "constType": this.visitConstTypeExpr(expr); return;
		case "arrayType": this.visitArrayTypeExpr(expr); return;
		case "functionTypeExpr": this.visitFunctionTypeExpr(expr); return;
		case "parameterPackExpansion": this.visitParameterPackExpansion(expr); return;
		case "templateInstantiation": this.visitTemplateInstantiationExpr(expr); return;
		case "templateMemberAccess": this.visitTemplateMemberAccessExpr(expr); return;
		case "list": this.visitListExpr(expr); return;
		case "addToSet": this.visitAddToSetExpr(expr); return;
		case "setToList": this.visitSetToListExpr(expr); return;
		case "listToSet": this.visitListToSetExpr(expr); return;
		case "functionCall": this.visitFunctionCall(expr); return;
		case "equality": this.visitEqualityComparison(expr); return;
		case "setEquality": this.visitSetEqualityComparison(expr); return;
		case "isInList": this.visitIsInListExpr(expr); return;
		case "attributeAccess": this.visitAttributeAccessExpr(expr); return;
		case "not": this.visitNotExpr(expr); return;
		case "unaryMinus": this.visitUnaryMinusExpr(expr); return;
		case "intListSum": this.visitIntListSumExpr(expr); return;
		case "boolListAll": this.visitBoolListAllExpr(expr); return;
		case "boolListAny": this.visitBoolListAnyExpr(expr); return;
		case "intComparison": this.visitIntComparisonExpr(expr); return;
		case "intBinaryOp": this.visitIntBinaryOpExpr(expr); return;
		case "listConcat": this.visitListConcatExpr(expr); return;
		case "isInstance": this.visitIsInstanceExpr(expr); return;
		case "safeUncheckedCast": this.visitSafeUncheckedCast(expr); return;
		case "listComprehension": this.visitListComprehensionExpr(expr); return;
		default: exhaustive(expr);
		}
	}

	visitPattern(pattern: ir.PatternExpr): void {
		switch (pattern.kind) {
		case "varRefPattern": this.visitVarReferencePattern(pattern); return;
		case "atomicTypePattern": this.visitAtomicTypePattern(pattern); return;
		case "pointerTypePattern": this.visitPointerTypePattern(pattern); return;
		case "referenceTypePattern": this.visitReferenceTypePattern(pattern); return;
		case "rvalueReferenceTypePattern": this.visitRvalueReferenceTypePattern(pattern); return;
		case "constTypePattern": this.visitConstTypePattern(pattern); return;
		case "arrayTypePattern": this.visitArrayTypePattern(pattern); return;
		case "functionTypePattern": this.visitFunctionTypePattern(pattern); return;
		case "templateInstantiationPattern": this.visitTemplateInstantiationPattern(pattern); return;
		case "listPattern": this.visitListPattern(pattern); return;
		default: exhaustive(pattern);
		}
	}

	visitStmt(stmt: ir.Stmt): void {
		switch (stmt.kind) {
		case "pass": this.visitPassStmt(stmt); return;
		case "assert": this.visitAssert(stmt); return;
		case "assignment": this.visitAssignment(stmt); return;
		case "unpackingAssignment": this.visitUnpackingAssignment(stmt); return;
		case "return": this.visitReturnStmt(stmt); return;
		case "if": this.visitIfStmt(stmt); return;
		case "checkIfError": this.visitCheckIfError(stmt); return;
		default: exhaustive(stmt);
		}
	}

	visitModuleElem(elem: ir.ModuleElem): void {
		switch (elem.kind) {
		case "functionDefn": this.visitFunctionDefn(elem); return;
		case "custom": this.visitCustomType(elem); return;
		case "checkIfErrorDefn": this.visitCheckIfErrorDefn(elem); return;
		case "assignment":
		case "assert":
		case "checkIfError":
		case "pass":
			this.visitStmt(elem);
			return;
		default: exhaustive(elem);
		}
	}

	//==========================================================================
	// Containers
	//==========================================================================

	visitModule(module: ir.Module): void {
		for (const elem of module.body) this.visitModuleElem(elem);
	}

	visitFunctionDefn(defn: ir.FunctionDefn): void {
		this.visitStmts(defn.body);
	}

	visitStmts(stmts: readonly ir.Stmt[]): void {
		for (const stmt of stmts) this.visitStmt(stmt);
	}

	visitCustomType(_type: CustomType): void {
		// leaf
	}

	visitCheckIfErrorDefn(_defn: ir.CheckIfErrorDefn): void {
		// leaf
	}

	//==========================================================================
	// Statements
	//==========================================================================

	visitPassStmt(_stmt: ir.PassStmt): void {
		// leaf
	}

	visitAssert(stmt: ir.AssertStmt): void {
		this.visitExpr(stmt.varExpr);
	}

	visitAssignment(stmt: ir.Assignment): void {
		this.visitExpr(stmt.rhs);
		this.visitExpr(stmt.lhs);
		if (stmt.lhs2 !== undefined) this.visitExpr(stmt.lhs2);
	}

	visitUnpackingAssignment(stmt: ir.UnpackingAssignment): void {
		this.visitExpr(stmt.rhs);
		for (const lhs of stmt.lhsList) this.visitExpr(lhs);
	}

	visitReturnStmt(stmt: ir.ReturnStmt): void {
		if (stmt.result !== undefined) this.visitExpr(stmt.result);
		if (stmt.error !== undefined) this.visitExpr(stmt.error);
	}

	visitIfStmt(stmt: ir.IfStmt): void {
		this.visitExpr(stmt.cond);
		this.visitStmts(stmt.ifStmts);
		this.visitStmts(stmt.elseStmts);
	}

	visitCheckIfError(stmt: ir.CheckIfError): void {
		this.visitExpr(stmt.varExpr);
	}

	//==========================================================================
	// Expressions
	//==========================================================================

	visitVarReference(_expr: ir.VarReference): void {
		// leaf
	}

	visitMatchExpr(expr: ir.MatchExpr): void {
		for (const matched of expr.matchedVars) this.visitExpr(matched);
		for (const matchCase of expr.matchCases) this.visitMatchCase(matchCase);
	}

	visitMatchCase(matchCase: ir.MatchCase): void {
		for (const pattern of matchCase.typePatterns) this.visitPattern(pattern);
		this.visitExpr(matchCase.expr);
	}

	visitBoolLiteral(_expr: ir.BoolLiteral): void {
		// leaf
	}

	visitIntLiteral(_expr: ir.IntLiteral): void {
		// leaf
	}

	visitAtomicTypeLiteral(_expr: ir.AtomicTypeLiteral): void {
		// leaf
	}

	visitPointerTypeExpr(expr: ir.PointerTypeExpr): void {
		this.visitExpr(expr.typeExpr);
	}

	visitReferenceTypeExpr(expr: ir.ReferenceTypeExpr): void {
		this.visitExpr(expr.typeExpr);
	}

	visitRvalueReferenceTypeExpr(expr: ir.RvalueReferenceTypeExpr): void {
		this.visitExpr(expr.typeExpr);
	}

	visitConstTypeExpr(expr: ir.ConstTypeExpr): void {
		this.visitExpr(expr.typeExpr);
	}

	visitArrayTypeExpr(expr: ir.ArrayTypeExpr): void {
		this.visitExpr(expr.typeExpr);
	}

	visitFunctionTypeExpr(expr: ir.FunctionTypeExpr): void {
		this.visitExpr(expr.returnTypeExpr);
		this.visitExpr(expr.argListExpr);
	}

	visitParameterPackExpansion(expr: ir.ParameterPackExpansion): void {
		this.visitExpr(expr.expr);
	}

	visitTemplateInstantiationExpr(expr: ir.TemplateInstantiationExpr): void {
		this.visitExpr(expr.argListExpr);
	}

	visitTemplateMemberAccessExpr(expr: ir.TemplateMemberAccessExpr): void {
		this.visitExpr(expr.classTypeExpr);
		this.visitExpr(expr.argListExpr);
	}

	visitListExpr(expr: ir.ListExpr): void {
		for (const elem of expr.elems) this.visitExpr(elem);
	}

	visitAddToSetExpr(expr: ir.AddToSetExpr): void {
		this.visitExpr(expr.setExpr);
		this.visitExpr(expr.elemExpr);
	}

	visitSetToListExpr(expr: ir.SetToListExpr): void {
		this.visitExpr(expr.varExpr);
	}

	visitListToSetExpr(expr: ir.ListToSetExpr): void {
		this.visitExpr(expr.varExpr);
	}

	visitFunctionCall(expr: ir.FunctionCall): void {
		this.visitExpr(expr.fun);
		for (const arg of expr.args) this.visitExpr(arg);
	}

	visitEqualityComparison(expr: ir.EqualityComparison): void {
		this.visitExpr(expr.lhs);
		this.visitExpr(expr.rhs);
	}

	visitSetEqualityComparison(expr: ir.SetEqualityComparison): void {
		this.visitExpr(expr.lhs);
		this.visitExpr(expr.rhs);
	}

	visitIsInListExpr(expr: ir.IsInListExpr): void {
		this.visitExpr(expr.lhs);
		this.visitExpr(expr.rhs);
	}

	visitAttributeAccessExpr(expr: ir.AttributeAccessExpr): void {
		this.visitExpr(expr.varExpr);
	}

	visitNotExpr(expr: ir.NotExpr): void {
		this.visitExpr(expr.varExpr);
	}

	visitUnaryMinusExpr(expr: ir.UnaryMinusExpr): void {
		this.visitExpr(expr.varExpr);
	}

	visitIntListSumExpr(expr: ir.IntListSumExpr): void {
		this.visitExpr(expr.varExpr);
	}

	visitBoolListAllExpr(expr: ir.BoolListAllExpr): void {
		this.visitExpr(expr.varExpr);
	}

	visitBoolListAnyExpr(expr: ir.BoolListAnyExpr): void {
		this.visitExpr(expr.varExpr);
	}

	visitIntComparisonExpr(expr: ir.IntComparisonExpr): void {
		this.visitExpr(expr.lhs);
		this.visitExpr(expr.rhs);
	}

	visitIntBinaryOpExpr(expr: ir.IntBinaryOpExpr): void {
		this.visitExpr(expr.lhs);
		this.visitExpr(expr.rhs);
	}

	visitListConcatExpr(expr: ir.ListConcatExpr): void {
		this.visitExpr(expr.lhs);
		this.visitExpr(expr.rhs);
	}

	visitIsInstanceExpr(expr: ir.IsInstanceExpr): void {
		this.visitExpr(expr.varExpr);
	}

	visitSafeUncheckedCast(expr: ir.SafeUncheckedCast): void {
		this.visitExpr(expr.varExpr);
	}

	visitListComprehensionExpr(expr: ir.ListComprehensionExpr): void {
		this.visitExpr(expr.listVar);
		this.visitExpr(expr.loopVar);
		this.visitExpr(expr.resultElemExpr);
	}

	//==========================================================================
	// Patterns
	//==========================================================================

	visitVarReferencePattern(_pattern: ir.VarReferencePattern): void {
		// leaf
	}

	visitAtomicTypePattern(_pattern: ir.AtomicTypePattern): void {
		// leaf
	}

	visitPointerTypePattern(pattern: ir.PointerTypePattern): void {
		this.visitPattern(pattern.typeExpr);
	}

	visitReferenceTypePattern(pattern: ir.ReferenceTypePattern): void {
		this.visitPattern(pattern.typeExpr);
	}

	visitRvalueReferenceTypePattern(pattern: ir.RvalueReferenceTypePattern): void {
		this.visitPattern(pattern.typeExpr);
	}

	visitConstTypePattern(pattern: ir.ConstTypePattern): void {
		this.visitPattern(pattern.typeExpr);
	}

	visitArrayTypePattern(pattern: ir.ArrayTypePattern): void {
		this.visitPattern(pattern.typeExpr);
	}

	visitFunctionTypePattern(pattern: ir.FunctionTypePattern): void {
		this.visitPattern(pattern.returnTypeExpr);
		this.visitPattern(pattern.argListExpr);
	}

	visitTemplateInstantiationPattern(pattern: ir.TemplateInstantiationPattern): void {
		for (const arg of pattern.argExprs) this.visitPattern(arg);
		if (pattern.listExtractionArgExpr !== undefined) this.visitPattern(pattern.listExtractionArgExpr);
	}

	visitListPattern(pattern: ir.ListPattern): void {
		for (const elem of pattern.elems) this.visitPattern(elem);
		if (pattern.listExtractionExpr !== undefined) this.visitPattern(pattern.listExtractionExpr);
	}
}
