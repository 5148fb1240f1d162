import { describe, it } from "node:test";
import assert from "node:assert/strict";

import * as ir from "../../src/ira/nodes.js";
import { Visitor } from "../../src/ira/visitor.js";
import {
	boolType,
	customType,
	type CustomType,
	errorOrVoidType,
	functionType,
	intType,
	listType,
	parameterPackType,
	typeType,
} from "../../src/types.js";

class RecordingVisitor extends Visitor {
	readonly seen: string[] = [];

	override visitExpr(expr: ir.Expr): void {
		this.seen.push(expr.kind === "varRef" ? "varRef:" + expr.name : expr.kind);
		super.visitExpr(expr);
	}

	override visitPattern(pattern: ir.PatternExpr): void {
		this.seen.push(pattern.kind);
		super.visitPattern(pattern);
	}

	override visitStmt(stmt: ir.Stmt): void {
		this.seen.push(stmt.kind);
		super.visitStmt(stmt);
	}
}

const x = ir.varRef(intType, "x");
const y = ir.varRef(intType, "y");
const c = ir.varRef(boolType, "c");
const t = ir.varRef(typeType, "T");
const g = ir.varRef(functionType([intType], intType), "g", { isGlobalFunction: true });

describe("IR-A Visitor", () => {
	it("visits statements and their operands in order", () => {
		const body = [
			ir.assignment(y, ir.functionCall(g, [x])),
			ir.ifStmt(c, [ir.returnStmt(y)], [ir.returnStmt(x)]),
		];
		const visitor = new RecordingVisitor();
		visitor.visitStmts(body);
		assert.deepEqual(visitor.seen, [
			"assignment", "functionCall", "varRef:g", "varRef:x", "varRef:y",
			"if", "varRef:c", "return", "varRef:y", "return", "varRef:x",
		]);
	});

	it("visits assignment rhs before both targets", () => {
		const err = ir.varRef(errorOrVoidType, "err");
		const visitor = new RecordingVisitor();
		visitor.visitStmt(ir.assignment(y, ir.functionCall(g, [x]), err));
		assert.deepEqual(visitor.seen, ["assignment", "functionCall", "varRef:g", "varRef:x", "varRef:y", "varRef:err"]);
	});

	it("visits match values, then each case's patterns and result", () => {
		const h = ir.varRef(functionType([typeType], typeType), "h", { isGlobalFunction: true });
		const rest = ir.varRefPattern(listType(typeType), "Rest");
		const m = ir.matchExpr([t], [
			ir.matchCase([ir.pointerTypePattern(ir.varRefPattern(typeType, "U"))], ["U"], [], ir.functionCall(h, [t])),
			ir.matchCase([ir.templateInstantiationPattern("tuple", [], rest)], [], ["Rest"], ir.functionCall(h, [t])),
		]);
		const visitor = new RecordingVisitor();
		visitor.visitExpr(m);
		assert.deepEqual(visitor.seen, [
			"match", "varRef:T",
			"pointerTypePattern", "varRefPattern", "functionCall", "varRef:h", "varRef:T",
			"templateInstantiationPattern", "varRefPattern", "functionCall", "varRef:h", "varRef:T",
		]);
	});

	it("visits module elements in order and skips leaf definitions' insides", () => {
		const e = customType("E", [], { isExceptionClass: true, exceptionMessage: "bad" });
		const m = ir.module([
			e,
			ir.checkIfErrorDefn([{ errorType: e, message: "bad" }]),
			ir.functionDefn("f", [ir.functionArgDecl(intType, "x")], [ir.returnStmt(x)], intType),
			ir.passStmt,
		], ["f"]);
		const visitor = new RecordingVisitor();
		visitor.visitModule(m);
		assert.deepEqual(visitor.seen, ["return", "varRef:x", "pass"]);
	});

	it("dispatches to per-kind handlers", () => {
		class CountSums extends Visitor {
			sums = 0;
			override visitIntListSumExpr(expr: ir.IntListSumExpr): void {
				this.sums++;
				super.visitIntListSumExpr(expr);
			}
		}
		const xs = ir.varRef(listType(intType), "xs");
		const visitor = new CountSums();
		visitor.visitStmts([
			ir.assignment(x, ir.intListSumExpr(xs)),
			ir.assignment(y, ir.intListSumExpr(xs)),
		]);
		assert.equal(visitor.sums, 2);
	});
});

/** Records which per-kind handler ran, without descending into children. */
class HandlerLog extends Visitor {
	readonly calls: string[] = [];

	override visitFunctionDefn(_defn: ir.FunctionDefn): void { this.calls.push("visitFunctionDefn"); }
	override visitCustomType(_type: CustomType): void { this.calls.push("visitCustomType"); }
	override visitCheckIfErrorDefn(_defn: ir.CheckIfErrorDefn): void { this.calls.push("visitCheckIfErrorDefn"); }

	override visitPassStmt(_stmt: ir.PassStmt): void { this.calls.push("visitPassStmt"); }
	override visitAssert(_stmt: ir.AssertStmt): void { this.calls.push("visitAssert"); }
	override visitAssignment(_stmt: ir.Assignment): void { this.calls.push("visitAssignment"); }
	override visitUnpackingAssignment(_stmt: ir.UnpackingAssignment): void { this.calls.push("visitUnpackingAssignment"); }
	override visitReturnStmt(_stmt: ir.ReturnStmt): void { this.calls.push("visitReturnStmt"); }
	override visitIfStmt(_stmt: ir.IfStmt): void { this.calls.push("visitIfStmt"); }
	override visitCheckIfError(_stmt: ir.CheckIfError): void { this.calls.push("visitCheckIfError"); }

	override visitVarReference(_expr: ir.VarReference): void { this.calls.push("visitVarReference"); }
	override visitMatchExpr(_expr: ir.MatchExpr): void { this.calls.push("visitMatchExpr"); }
	override visitBoolLiteral(_expr: ir.BoolLiteral): void { this.calls.push("visitBoolLiteral"); }
	override visitIntLiteral(_expr: ir.IntLiteral): void { this.calls.push("visitIntLiteral"); }
	override visitAtomicTypeLiteral(_expr: ir.AtomicTypeLiteral): void { this.calls.push("visitAtomicTypeLiteral"); }
	override visitPointerTypeExpr(_expr: ir.PointerTypeExpr): void { this.calls.push("visitPointerTypeExpr"); }
	override visitReferenceTypeExpr(_expr: ir.ReferenceTypeExpr): void { this.calls.push("visitReferenceTypeExpr"); }
	override visitRvalueReferenceTypeExpr(_expr: ir.RvalueReferenceTypeExpr): void {
		this.calls.push("visitRvalueReferenceTypeExpr");
	}
	override visitConstTypeExpr(_expr: ir.ConstTypeExpr): void { this.calls.push("visitConstTypeExpr"); }
	override visitArrayTypeExpr(_expr: ir.ArrayTypeExpr): void { this.calls.push("visitArrayTypeExpr"); }
	override visitFunctionTypeExpr(_expr: ir.FunctionTypeExpr): void { this.calls.push("visitFunctionTypeExpr"); }
	override visitParameterPackExpansion(_expr: ir.ParameterPackExpansion): void {
		this.calls.push("visitParameterPackExpansion");
	}
	override visitTemplateInstantiationExpr(_expr: ir.TemplateInstantiationExpr): void {
		this.calls.push("visitTemplateInstantiationExpr");
	}
	override visitTemplateMemberAccessExpr(_expr: ir.TemplateMemberAccessExpr): void {
		this.calls.push("visitTemplateMemberAccessExpr");
	}
	override visitListExpr(_expr: ir.ListExpr): void { this.calls.push("visitListExpr"); }
	override visitAddToSetExpr(_expr: ir.AddToSetExpr): void { this.calls.push("visitAddToSetExpr"); }
	override visitSetToListExpr(_expr: ir.SetToListExpr): void { this.calls.push("visitSetToListExpr"); }
	override visitListToSetExpr(_expr: ir.ListToSetExpr): void { this.calls.push("visitListToSetExpr"); }
	override visitFunctionCall(_expr: ir.FunctionCall): void { this.calls.push("visitFunctionCall"); }
	override visitEqualityComparison(_expr: ir.EqualityComparison): void { this.calls.push("visitEqualityComparison"); }
	override visitSetEqualityComparison(_expr: ir.SetEqualityComparison): void {
		this.calls.push("visitSetEqualityComparison");
	}
	override visitIsInListExpr(_expr: ir.IsInListExpr): void { this.calls.push("visitIsInListExpr"); }
	override visitAttributeAccessExpr(_expr: ir.AttributeAccessExpr): void { this.calls.push("visitAttributeAccessExpr"); }
	override visitNotExpr(_expr: ir.NotExpr): void { this.calls.push("visitNotExpr"); }
	override visitUnaryMinusExpr(_expr: ir.UnaryMinusExpr): void { this.calls.push("visitUnaryMinusExpr"); }
	override visitIntListSumExpr(_expr: ir.IntListSumExpr): void { this.calls.push("visitIntListSumExpr"); }
	override visitBoolListAllExpr(_expr: ir.BoolListAllExpr): void { this.calls.push("visitBoolListAllExpr"); }
	override visitBoolListAnyExpr(_expr: ir.BoolListAnyExpr): void { this.calls.push("visitBoolListAnyExpr"); }
	override visitIntComparisonExpr(_expr: ir.IntComparisonExpr): void { this.calls.push("visitIntComparisonExpr"); }
	override visitIntBinaryOpExpr(_expr: ir.IntBinaryOpExpr): void { this.calls.push("visitIntBinaryOpExpr"); }
	override visitListConcatExpr(_expr: ir.ListConcatExpr): void { this.calls.push("visitListConcatExpr"); }
	override visitIsInstanceExpr(_expr: ir.IsInstanceExpr): void { this.calls.push("visitIsInstanceExpr"); }
	override visitSafeUncheckedCast(_expr: ir.SafeUncheckedCast): void { this.calls.push("visitSafeUncheckedCast"); }
	override visitListComprehensionExpr(_expr: ir.ListComprehensionExpr): void {
		this.calls.push("visitListComprehensionExpr");
	}

	override visitVarReferencePattern(_pattern: ir.VarReferencePattern): void { this.calls.push("visitVarReferencePattern"); }
	override visitAtomicTypePattern(_pattern: ir.AtomicTypePattern): void { this.calls.push("visitAtomicTypePattern"); }
	override visitPointerTypePattern(_pattern: ir.PointerTypePattern): void { this.calls.push("visitPointerTypePattern"); }
	override visitReferenceTypePattern(_pattern: ir.ReferenceTypePattern): void {
		this.calls.push("visitReferenceTypePattern");
	}
	override visitRvalueReferenceTypePattern(_pattern: ir.RvalueReferenceTypePattern): void {
		this.calls.push("visitRvalueReferenceTypePattern");
	}
	override visitConstTypePattern(_pattern: ir.ConstTypePattern): void { this.calls.push("visitConstTypePattern"); }
	override visitArrayTypePattern(_pattern: ir.ArrayTypePattern): void { this.calls.push("visitArrayTypePattern"); }
	override visitFunctionTypePattern(_pattern: ir.FunctionTypePattern): void { this.calls.push("visitFunctionTypePattern"); }
	override visitTemplateInstantiationPattern(_pattern: ir.TemplateInstantiationPattern): void {
		this.calls.push("visitTemplateInstantiationPattern");
	}
	override visitListPattern(_pattern: ir.ListPattern): void { this.calls.push("visitListPattern"); }
}

type ByKind<T extends { readonly kind: string }> = { [K in T["kind"]]: Extract<T, { kind: K }> };

describe("IR-A Visitor dispatch", () => {
	const xs = ir.varRef(listType(intType), "xs");
	const bs = ir.varRef(listType(boolType), "bs");
	const ts = ir.varRef(listType(typeType), "Ts");
	const err = ir.varRef(errorOrVoidType, "err");
	const e = customType("E", [], { isExceptionClass: true, exceptionMessage: "bad" });
	const h = ir.varRef(functionType([typeType], typeType), "h", { isGlobalFunction: true });
	const u = ir.varRefPattern(typeType, "U");

	const exprs: ByKind<ir.Expr> = {
		varRef: x,
		match: ir.matchExpr([t], [ir.matchCase([ir.atomicTypePattern("int")], [], [], ir.functionCall(h, [t]))]),
		boolLiteral: ir.boolLiteral(true),
		intLiteral: ir.intLiteral(1),
		atomicType: ir.atomicTypeLiteral("int"),
		pointerType: ir.pointerTypeExpr(t),
		referenceType: ir.referenceTypeExpr(t),
		rvalueReferenceType: ir.rvalueReferenceTypeExpr(t),
		constType: ir.constTypeExpr(t),
		arrayType: ir.arrayTypeExpr(t),
		functionTypeExpr: ir.functionTypeExpr(t, ts),
		parameterPackExpansion: ir.parameterPackExpansion(ir.varRef(parameterPackType(typeType), "Args")),
		templateInstantiation: ir.templateInstantiationExpr("tuple", ts),
		templateMemberAccess: ir.templateMemberAccessExpr(t, "type", ts),
		list: ir.listExpr(intType, [x]),
		addToSet: ir.addToSetExpr(xs, x),
		setToList: ir.setToListExpr(xs),
		listToSet: ir.listToSetExpr(xs),
		functionCall: ir.functionCall(g, [x]),
		equality: ir.equalityComparison(x, y),
		setEquality: ir.setEqualityComparison(xs, xs),
		isInList: ir.isInListExpr(x, xs),
		attributeAccess: ir.attributeAccessExpr(t, "type", typeType),
		not: ir.notExpr(c),
		unaryMinus: ir.unaryMinusExpr(x),
		intListSum: ir.intListSumExpr(xs),
		boolListAll: ir.boolListAllExpr(bs),
		boolListAny: ir.boolListAnyExpr(bs),
		intComparison: ir.intComparisonExpr(x, "<", y),
		intBinaryOp: ir.intBinaryOpExpr(x, "+", y),
		listConcat: ir.listConcatExpr(xs, xs),
		isInstance: ir.isInstanceExpr(err, e),
		safeUncheckedCast: ir.safeUncheckedCast(err, e),
		listComprehension: ir.listComprehensionExpr(xs, x, ir.functionCall(g, [x])),
	};

	const exprHandlers: Record<ir.Expr["kind"], string> = {
		varRef: "visitVarReference",
		match: "visitMatchExpr",
		boolLiteral: "visitBoolLiteral",
		intLiteral: "visitIntLiteral",
		atomicType: "visitAtomicTypeLiteral",
		pointerType: "visitPointerTypeExpr",
		referenceType: "visitReferenceTypeExpr",
		rvalueReferenceType: "visitRvalueReferenceTypeExpr",
		constType: "visitConstTypeExpr",
		arrayType: "visitArrayTypeExpr",
		functionTypeExpr: "visitFunctionTypeExpr",
		parameterPackExpansion: "visitParameterPackExpansion",
		templateInstantiation: "visitTemplateInstantiationExpr",
		templateMemberAccess: "visitTemplateMemberAccessExpr",
		list: "visitListExpr",
		addToSet: "visitAddToSetExpr",
		setToList: "visitSetToListExpr",
		listToSet: "visitListToSetExpr",
		functionCall: "visitFunctionCall",
		equality: "visitEqualityComparison",
		setEquality: "visitSetEqualityComparison",
		isInList: "visitIsInListExpr",
		attributeAccess: "visitAttributeAccessExpr",
		not: "visitNotExpr",
		unaryMinus: "visitUnaryMinusExpr",
		intListSum: "visitIntListSumExpr",
		boolListAll: "visitBoolListAllExpr",
		boolListAny: "visitBoolListAnyExpr",
		intComparison: "visitIntComparisonExpr",
		intBinaryOp: "visitIntBinaryOpExpr",
		listConcat: "visitListConcatExpr",
		isInstance: "visitIsInstanceExpr",
		safeUncheckedCast: "visitSafeUncheckedCast",
		listComprehension: "visitListComprehensionExpr",
	};

	const patterns: ByKind<ir.PatternExpr> = {
		varRefPattern: u,
		atomicTypePattern: ir.atomicTypePattern("int"),
		pointerTypePattern: ir.pointerTypePattern(u),
		referenceTypePattern: ir.referenceTypePattern(u),
		rvalueReferenceTypePattern: ir.rvalueReferenceTypePattern(u),
		constTypePattern: ir.constTypePattern(u),
		arrayTypePattern: ir.arrayTypePattern(u),
		functionTypePattern: ir.functionTypePattern(u, ir.varRefPattern(listType(typeType), "Args")),
		templateInstantiationPattern: ir.templateInstantiationPattern("tuple", [u]),
		listPattern: ir.listPattern(typeType, [u]),
	};

	const patternHandlers: Record<ir.PatternExpr["kind"], string> = {
		varRefPattern: "visitVarReferencePattern",
		atomicTypePattern: "visitAtomicTypePattern",
		pointerTypePattern: "visitPointerTypePattern",
		referenceTypePattern: "visitReferenceTypePattern",
		rvalueReferenceTypePattern: "visitRvalueReferenceTypePattern",
		constTypePattern: "visitConstTypePattern",
		arrayTypePattern: "visitArrayTypePattern",
		functionTypePattern: "visitFunctionTypePattern",
		templateInstantiationPattern: "visitTemplateInstantiationPattern",
		listPattern: "visitListPattern",
	};

	const stmts: ByKind<ir.Stmt> = {
		pass: ir.passStmt,
		assert: ir.assertStmt(c, "c must hold"),
		assignment: ir.assignment(y, x),
		unpackingAssignment: ir.unpackingAssignment([x], xs, "wrong length"),
		return: ir.returnStmt(x),
		if: ir.ifStmt(c, [ir.passStmt]),
		checkIfError: ir.checkIfError(err),
	};

	const stmtHandlers: Record<ir.Stmt["kind"], string> = {
		pass: "visitPassStmt",
		assert: "visitAssert",
		assignment: "visitAssignment",
		unpackingAssignment: "visitUnpackingAssignment",
		return: "visitReturnStmt",
		if: "visitIfStmt",
		checkIfError: "visitCheckIfError",
	};

	const elems: ByKind<ir.ModuleElem> = {
		functionDefn: ir.functionDefn("f", [], [ir.returnStmt(x)], intType),
		custom: e,
		checkIfErrorDefn: ir.checkIfErrorDefn([{ errorType: e, message: "bad" }]),
		assignment: stmts.assignment,
		assert: stmts.assert,
		checkIfError: stmts.checkIfError,
		pass: ir.passStmt,
	};

	const elemHandlers: Record<ir.ModuleElem["kind"], string> = {
		functionDefn: "visitFunctionDefn",
		custom: "visitCustomType",
		checkIfErrorDefn: "visitCheckIfErrorDefn",
		assignment: "visitAssignment",
		assert: "visitAssert",
		checkIfError: "visitCheckIfError",
		pass: "visitPassStmt",
	};

	it("sends every expression kind to its own handler once", () => {
		for (const expr of Object.values(exprs)) {
			const visitor = new HandlerLog();
			visitor.visitExpr(expr);
			assert.deepEqual(visitor.calls, [exprHandlers[expr.kind]], expr.kind);
		}
	});

	it("sends every pattern kind to its own handler once", () => {
		for (const pattern of Object.values(patterns)) {
			const visitor = new HandlerLog();
			visitor.visitPattern(pattern);
			assert.deepEqual(visitor.calls, [patternHandlers[pattern.kind]], pattern.kind);
		}
	});

	it("sends every statement kind to its own handler once", () => {
		for (const stmt of Object.values(stmts)) {
			const visitor = new HandlerLog();
			visitor.visitStmt(stmt);
			assert.deepEqual(visitor.calls, [stmtHandlers[stmt.kind]], stmt.kind);
		}
	});

	it("sends every module element kind to its own handler once", () => {
		for (const elem of Object.values(elems)) {
			const visitor = new HandlerLog();
			visitor.visitModuleElem(elem);
			assert.deepEqual(visitor.calls, [elemHandlers[elem.kind]], elem.kind);
		}
	});
});
