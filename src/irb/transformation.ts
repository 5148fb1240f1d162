// SPDX-License-Identifier: MIT
// MetaIR IR-B Transformation
// Rewriting traversal. Each method returns the replacement node; composites
// rebuild through the node constructors so every rewrite is re-validated.
// The base class is the identity transformation.

import { exhaustive } from "../errors.js";
import type { CustomType } from "../types.js";
import * as ir from "./nodes.js";

export class Transformation {
	//==========================================================================
	// Dispatchers
	//==========================================================================

	transformExpr(expr: ir.Expr): ir.Expr {
		switch (expr.kind) {
		case "varRef": return this.transformVarReference(expr);
		case "match": return this.transformMatchExpr(expr);
		case "boolLiteral": return this.transformBoolLiteral(expr);
		case "intLiteral": return this.transformIntLiteral(expr);
		case "atomicType": return this.transformAtomicTypeLiteral(expr);
		case "pointerType": return this.transformPointerTypeExpr(expr);
		case "referenceType": return this.transformReferenceTypeExpr(expr);
		case "rvalueReferenceType": return this.transformRvalueReferenceTypeExpr(expr);
		case "constType": return this.transformConstTypeExpr(expr);
		case "arrayType": return this.transformArrayTypeExpr(expr);
		case "functionTypeExpr": return this.transformFunctionTypeExpr(expr);
		case "templateInstantiation": return this.transformTemplateInstantiationExpr(expr);
		case "templateMemberAccess": return this.transformTemplateMemberAccessExpr(expr);
		case "list": return this.transformListExpr(expr);
		case "set": return this.transformSetExpr(expr);
		case "intListSum": return this.transformIntListSumExpr(expr);
		case "intSetSum": return this.transformIntSetSumExpr(expr);
		case "boolListAll": return this.transformBoolListAllExpr(expr);
		case "boolSetAll": return this.transformBoolSetAllExpr(expr);
		case "boolListAny": return this.transformBoolListAnyExpr(expr);
		case "boolSetAny": return this.transformBoolSetAnyExpr(expr);
		case "functionCall": return this.transformFunctionCall(expr);
		case "equality": return this.transformEqualityComparison(expr);
		case "in": return this.transformInExpr(expr);
		case "attributeAccess": return this.transformAttributeAccessExpr(expr);
		case "and": return this.transformAndExpr(expr);
		case "or": return this.transformOrExpr(expr);
		case "not": return this.transformNotExpr(expr);
		case "intUnaryMinus": return this.transformIntUnaryMinusExpr(expr);
		case "intComparison": return this.transformIntComparisonExpr(expr);
		case "intBinaryOp": return this.transformIntBinaryOpExpr(expr);
		case "listConcat": return this.transformListConcatExpr(expr);
		case "listComprehension": return this.transformListComprehension(expr);
		case "setComprehension": return this.transformSetComprehension(expr);
		default: return exhaustive(expr);
		}
	}

	transformStmt(stmt: ir.Stmt): ir.Stmt {
		switch (stmt.kind) {
		case "pass": return this.transformPassStmt(stmt);
		case "assert": return this.transformAssert(stmt);
		case "assignment": return this.transformAssignment(stmt);
		case "unpackingAssignment": return this.transformUnpackingAssignment(stmt);
		case "return": return this.transformReturnStmt(stmt);
		case "if": return this.transformIfStmt(stmt);
		case "raise": return this.transformRaiseStmt(stmt);
		case "tryExcept": return this.transformTryExcept(stmt);
		default: return exhaustive(stmt);
		}
	}

	//==========================================================================
	// Containers
	//==========================================================================

	/**
	 * Module-level assertions go straight to transformAssert and top-level
	 * passes to transformPassStmt; neither passes through transformStmt, so an
	 * override of transformStmt only sees statements inside function bodies.
	 */
	transformModule(module: ir.Module): ir.Module {
		return ir.module({
			functionDefns: module.functionDefns.map((defn) => this.transformFunctionDefn(defn)),
			assertions: module.assertions.map((stmt) => this.transformAssert(stmt)),
			customTypes: module.customTypes.map((type) => this.transformCustomType(type)),
			publicNames: module.publicNames,
			passStmts: module.passStmts.map((stmt) => this.transformPassStmt(stmt)),
		});
	}

	transformFunctionDefn(defn: ir.FunctionDefn): ir.FunctionDefn {
		return ir.functionDefn(defn.name, defn.args, this.transformStmts(defn.body), defn.returnType);
	}

	transformStmts(stmts: readonly ir.Stmt[]): ir.Stmt[] {
		return stmts.map((stmt) => this.transformStmt(stmt));
	}

	transformCustomType(type: CustomType): CustomType {
		return type;
	}

	//==========================================================================
	// Statements
	//==========================================================================

	transformPassStmt(stmt: ir.PassStmt): ir.PassStmt {
		return stmt;
	}

	transformAssert(stmt: ir.AssertStmt): ir.AssertStmt {
		return ir.assertStmt(this.transformExpr(stmt.expr), stmt.message, stmt.sourceBranch);
	}

	transformAssignment(stmt: ir.Assignment): ir.Stmt {
		return ir.assignment(
			this.transformVarReference(stmt.lhs),
			this.transformExpr(stmt.rhs),
			stmt.sourceBranch,
		);
	}

	transformUnpackingAssignment(stmt: ir.UnpackingAssignment): ir.Stmt {
		return ir.unpackingAssignment(
			stmt.lhsList.map((lhs) => this.transformVarReference(lhs)),
			this.transformExpr(stmt.rhs),
			stmt.errorMessage,
			stmt.sourceBranch,
		);
	}

	transformReturnStmt(stmt: ir.ReturnStmt): ir.Stmt {
		return ir.returnStmt(this.transformExpr(stmt.expr), stmt.sourceBranch);
	}

	transformIfStmt(stmt: ir.IfStmt): ir.Stmt {
		return ir.ifStmt(
			this.transformExpr(stmt.condExpr),
			this.transformStmts(stmt.ifStmts),
			this.transformStmts(stmt.elseStmts),
		);
	}

	transformRaiseStmt(stmt: ir.RaiseStmt): ir.Stmt {
		return ir.raiseStmt(this.transformExpr(stmt.expr), stmt.sourceBranch);
	}

	transformTryExcept(stmt: ir.TryExcept): ir.Stmt {
		return ir.tryExcept(
			this.transformStmts(stmt.tryBody),
			stmt.caughtExceptionType,
			stmt.caughtExceptionName,
			this.transformStmts(stmt.exceptBody),
			stmt,
		);
	}

	//==========================================================================
	// Expressions
	//==========================================================================

	transformVarReference(expr: ir.VarReference): ir.VarReference {
		return expr;
	}

	transformMatchExpr(expr: ir.MatchExpr): ir.Expr {
		return ir.matchExpr(
			expr.matchedExprs.map((matched) => this.transformExpr(matched)),
			expr.matchCases.map((matchCase) => this.transformMatchCase(matchCase)),
		);
	}

	/** Patterns are matched structurally and stay as they are. */
	transformMatchCase(matchCase: ir.MatchCase): ir.MatchCase {
		return ir.matchCase(
			matchCase.typePatterns,
			matchCase.matchedVarNames,
			matchCase.matchedVariadicVarNames,
			this.transformExpr(matchCase.expr),
			matchCase,
		);
	}

	transformBoolLiteral(expr: ir.BoolLiteral): ir.Expr {
		return expr;
	}

	transformIntLiteral(expr: ir.IntLiteral): ir.Expr {
		return expr;
	}

	transformAtomicTypeLiteral(expr: ir.AtomicTypeLiteral): ir.Expr {
		return expr;
	}

	transformPointerTypeExpr(expr: ir.PointerTypeExpr): ir.Expr {
		return ir.pointerTypeExpr(this.transformExpr(expr.typeExpr));
	}

	transformReferenceTypeExpr(expr: ir.ReferenceTypeExpr): ir.Expr {
		return ir.referenceTypeExpr(this.transformExpr(expr.typeExpr));
	}

	transformRvalueReferenceTypeExpr(expr: ir.RvalueReferenceTypeExpr): ir.Expr {
		return ir.rvalueReferenceTypeExpr(this.transformExpr(expr.typeExpr));
	}

	transformConstTypeExpr(expr: ir.ConstTypeExpr): ir.Expr {
		return ir.constTypeExpr(this.transformExpr(expr.typeExpr));
	}

	transformArrayTypeExpr(expr: ir.ArrayTypeExpr): ir.Expr {
		return ir.arrayTypeExpr(this.transformExpr(expr.typeExpr));
	}

	transformFunctionTypeExpr(expr: ir.FunctionTypeExpr): ir.Expr {
		return ir.functionTypeExpr(
			this.transformExpr(expr.returnTypeExpr),
			this.transformExpr(expr.argListExpr),
		);
	}

	transformTemplateInstantiationExpr(expr: ir.TemplateInstantiationExpr): ir.Expr {
		return ir.templateInstantiationExpr(expr.templateName, this.transformExpr(expr.argListExpr));
	}

	transformTemplateMemberAccessExpr(expr: ir.TemplateMemberAccessExpr): ir.Expr {
		return ir.templateMemberAccessExpr(
			this.transformExpr(expr.classTypeExpr),
			expr.memberName,
			this.transformExpr(expr.argListExpr),
		);
	}

	transformListExpr(expr: ir.ListExpr): ir.Expr {
		const tail = expr.listExtractionExpr;
		return ir.listExpr(
			expr.elemType,
			expr.elemExprs.map((elem) => this.transformExpr(elem)),
			tail !== undefined ? this.transformVarReference(tail) : undefined,
		);
	}

	transformSetExpr(expr: ir.SetExpr): ir.Expr {
		return ir.setExpr(expr.elemType, expr.elemExprs.map((elem) => this.transformExpr(elem)));
	}

	transformIntListSumExpr(expr: ir.IntListSumExpr): ir.Expr {
		return ir.intListSumExpr(this.transformExpr(expr.listExpr));
	}

	transformIntSetSumExpr(expr: ir.IntSetSumExpr): ir.Expr {
		return ir.intSetSumExpr(this.transformExpr(expr.setExpr));
	}

	transformBoolListAllExpr(expr: ir.BoolListAllExpr): ir.Expr {
		return ir.boolListAllExpr(this.transformExpr(expr.listExpr));
	}

	transformBoolSetAllExpr(expr: ir.BoolSetAllExpr): ir.Expr {
		return ir.boolSetAllExpr(this.transformExpr(expr.setExpr));
	}

	transformBoolListAnyExpr(expr: ir.BoolListAnyExpr): ir.Expr {
		return ir.boolListAnyExpr(this.transformExpr(expr.listExpr));
	}

	transformBoolSetAnyExpr(expr: ir.BoolSetAnyExpr): ir.Expr {
		return ir.boolSetAnyExpr(this.transformExpr(expr.setExpr));
	}

	transformFunctionCall(expr: ir.FunctionCall): ir.Expr {
		return ir.functionCall(
			this.transformExpr(expr.funExpr),
			expr.args.map((arg) => this.transformExpr(arg)),
			expr.mayThrow,
		);
	}

	transformEqualityComparison(expr: ir.EqualityComparison): ir.Expr {
		return ir.equalityComparison(this.transformExpr(expr.lhs), this.transformExpr(expr.rhs));
	}

	transformInExpr(expr: ir.InExpr): ir.Expr {
		return ir.inExpr(this.transformExpr(expr.lhs), this.transformExpr(expr.rhs));
	}

	transformAttributeAccessExpr(expr: ir.AttributeAccessExpr): ir.Expr {
		return ir.attributeAccessExpr(this.transformExpr(expr.expr), expr.attributeName, expr.exprType);
	}

	transformAndExpr(expr: ir.AndExpr): ir.Expr {
		return ir.andExpr(this.transformExpr(expr.lhs), this.transformExpr(expr.rhs));
	}

	transformOrExpr(expr: ir.OrExpr): ir.Expr {
		return ir.orExpr(this.transformExpr(expr.lhs), this.transformExpr(expr.rhs));
	}

	transformNotExpr(expr: ir.NotExpr): ir.Expr {
		return ir.notExpr(this.transformExpr(expr.expr));
	}

	transformIntUnaryMinusExpr(expr: ir.IntUnaryMinusExpr): ir.Expr {
		return ir.intUnaryMinusExpr(this.transformExpr(expr.expr));
	}

	transformIntComparisonExpr(expr: ir.IntComparisonExpr): ir.Expr {
		return ir.intComparisonExpr(this.transformExpr(expr.lhs), expr.op, this.transformExpr(expr.rhs));
	}

	transformIntBinaryOpExpr(expr: ir.IntBinaryOpExpr): ir.Expr {
		return ir.intBinaryOpExpr(this.transformExpr(expr.lhs), expr.op, this.transformExpr(expr.rhs));
	}

	transformListConcatExpr(expr: ir.ListConcatExpr): ir.Expr {
		return ir.listConcatExpr(this.transformExpr(expr.lhs), this.transformExpr(expr.rhs));
	}

	transformListComprehension(expr: ir.ListComprehension): ir.Expr {
		return ir.listComprehension(
			this.transformExpr(expr.listExpr),
			this.transformVarReference(expr.loopVar),
			this.transformExpr(expr.resultElemExpr),
			expr,
		);
	}

	transformSetComprehension(expr: ir.SetComprehension): ir.Expr {
		return ir.setComprehension(
			this.transformExpr(expr.setExpr),
			this.transformVarReference(expr.loopVar),
			this.transformExpr(expr.resultElemExpr),
			expr,
		);
	}
}
