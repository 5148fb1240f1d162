// SPDX-License-Identifier: MIT
// MetaIR IR-B Visitor
// Read-only traversal over nested IR-B trees, one handler per node kind

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
		case "templateInstantiation": this.visitTemplateInstantiationExpr(expr); return;
		case "templateMemberAccess": this.visitTemplateMemberAccessExpr(expr); return;
		case "list": this.visitListExpr(expr); return;
		case "set": this.visitSetExpr(expr); return;
		case "intListSum": this.visitIntListSumExpr(expr); return;
		case "intSetSum": this.visitIntSetSumExpr(expr); return;
		case "boolListAll": this.visitBoolListAllExpr(expr); return;
		case "boolSetAll": this.visitBoolSetAllExpr(expr); return;
		case "boolListAny": this.visitBoolListAnyExpr(expr); return;
		case "boolSetAny": this.visitBoolSetAnyExpr(expr); return;
		case "functionCall": this.visitFunctionCall(expr); return;
		case "equality": this.visitEqualityComparison(expr); return;
		case "in": this.visitInExpr(expr); return;
		case "attributeAccess": this.visitAttributeAccessExpr(expr); return;
		case "and": this.visitAndExpr(expr); return;
		case "or": this.visitOrExpr(expr); return;
		case "not": this.visitNotExpr(expr); return;
		case "intUnaryMinus": this.visitIntUnaryMinusExpr(expr); return;
		case "intComparison": this.visitIntComparisonExpr(expr); return;
		case "intBinaryOp": this.visitIntBinaryOpExpr(expr); return;
		case "listConcat": this.visitListConcatExpr(expr); return;
		case "listComprehension": this.visitListComprehension(expr); return;
		case "setComprehension": this.visitSetComprehension(expr); return;
		default: exhaustive(expr);
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
		case "raise": this.visitRaiseStmt(stmt); return;
		case "tryExcept": this.visitTryExcept(stmt); return;
		default: exhaustive(stmt);
		}
	}

	visitModuleElem(elem: ir.ModuleElem): void {
		switch (elem.kind) {
		case "functionDefn": this.visitFunctionDefn(elem); return;
		case "custom": this.visitCustomType(elem); return;
		case "assert":
		case "pass":
			this.visitStmt(elem);
			return;
		default: exhaustive(elem);
		}
	}

	//==========================================================================
	// Containers
	//==========================================================================

	/** Custom types first, then functions, assertions and top-level passes. */
	visitModule(module: ir.Module): void {
		for (const type of module.customTypes) this.visitCustomType(type);
		for (const defn of module.functionDefns) this.visitFunctionDefn(defn);
		for (const stmt of module.assertions) this.visitStmt(stmt);
		for (const stmt of module.passStmts) this.visitStmt(stmt);
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

	//==========================================================================
	// Statements
	//==========================================================================

	visitPassStmt(_stmt: ir.PassStmt): void {
		// leaf
	}

	visitAssert(stmt: ir.AssertStmt): void {
		this.visitExpr(stmt.expr);
	}

	visitAssignment(stmt: ir.Assignment): void {
		this.visitExpr(stmt.rhs);
		this.visitExpr(stmt.lhs);
	}

	visitUnpackingAssignment(stmt: ir.UnpackingAssignment): void {
		this.visitExpr(stmt.rhs);
		for (const lhs of stmt.lhsList) this.visitExpr(lhs);
	}

	visitReturnStmt(stmt: ir.ReturnStmt): void {
		this.visitExpr(stmt.expr);
	}

	visitIfStmt(stmt: ir.IfStmt): void {
		this.visitExpr(stmt.condExpr);
		this.visitStmts(stmt.ifStmts);
		this.visitStmts(stmt.elseStmts);
	}

	visitRaiseStmt(stmt: ir.RaiseStmt): void {
		this.visitExpr(stmt.expr);
	}

	visitTryExcept(stmt: ir.TryExcept): void {
		this.visitStmts(stmt.tryBody);
		this.visitStmts(stmt.exceptBody);
	}

	//==========================================================================
	// Expressions
	//==========================================================================

	visitVarReference(_expr: ir.VarReference): void {
		// leaf
	}

	visitMatchExpr(expr: ir.MatchExpr): void {
		for (const matched of expr.matchedExprs) this.visitExpr(matched);
		for (const matchCase of expr.matchCases) this.visitMatchCase(matchCase);
	}

	visitMatchCase(matchCase: ir.MatchCase): void {
		for (const pattern of matchCase.typePatterns) this.visitExpr(pattern);
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

	visitTemplateInstantiationExpr(expr: ir.TemplateInstantiationExpr): void {
		this.visitExpr(expr.argListExpr);
	}

	visitTemplateMemberAccessExpr(expr: ir.TemplateMemberAccessExpr): void {
		this.visitExpr(expr.classTypeExpr);
		this.visitExpr(expr.argListExpr);
	}

	visitListExpr(expr: ir.ListExpr): void {
		for (const elem of expr.elemExprs) this.visitExpr(elem);
		if (expr.listExtractionExpr !== undefined) this.visitExpr(expr.listExtractionExpr);
	}

	visitSetExpr(expr: ir.SetExpr): void {
		for (const elem of expr.elemExprs) this.visitExpr(elem);
	}

	visitIntListSumExpr(expr: ir.IntListSumExpr): void {
		this.visitExpr(expr.listExpr);
	}

	visitIntSetSumExpr(expr: ir.IntSetSumExpr): void {
		this.visitExpr(expr.setExpr);
	}

	visitBoolListAllExpr(expr: ir.BoolListAllExpr): void {
		this.visitExpr(expr.listExpr);
	}

	visitBoolSetAllExpr(expr: ir.BoolSetAllExpr): void {
		this.visitExpr(expr.setExpr);
	}

	visitBoolListAnyExpr(expr: ir.BoolListAnyExpr): void {
		this.visitExpr(expr.listExpr);
	}

	visitBoolSetAnyExpr(expr: ir.BoolSetAnyExpr): void {
		this.visitExpr(expr.setExpr);
	}

	visitFunctionCall(expr: ir.FunctionCall): void {
		this.visitExpr(expr.funExpr);
		for (const arg of expr.args) this.visitExpr(arg);
	}

	visitEqualityComparison(expr: ir.EqualityComparison): void {
		this.visitExpr(expr.lhs);
		this.visitExpr(expr.rhs);
	}

	visitInExpr(expr: ir.InExpr): void {
		this.visitExpr(expr.lhs);
		this.visitExpr(expr.rhs);
	}

	visitAttributeAccessExpr(expr: ir.AttributeAccessExpr): void {
		this.visitExpr(expr.expr);
	}

	visitAndExpr(expr: ir.AndExpr): void {
		this.visitExpr(expr.lhs);
		this.visitExpr(expr.rhs);
	}

	visitOrExpr(expr: ir.OrExpr): void {
		this.visitExpr(expr.lhs);
		this.visitExpr(expr.rhs);
	}

	visitNotExpr(expr: ir.NotExpr): void {
		this.visitExpr(expr.expr);
	}

	visitIntUnaryMinusExpr(expr: ir.IntUnaryMinusExpr): void {
		this.visitExpr(expr.expr);
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

	visitListComprehension(expr: ir.ListComprehension): void {
		this.visitExpr(expr.listExpr);
		this.visitExpr(expr.loopVar);
		this.visitExpr(expr.resultElemExpr);
	}

	visitSetComprehension(expr: ir.SetComprehension): void {
		this.visitExpr(expr.setExpr);
		this.visitExpr(expr.loopVar);
		this.visitExpr(expr.resultElemExpr);
	}
}
