import { describe, it } from "node:test";
import assert from "node:assert/strict";

import * as ir from "../../src/ira/nodes.js";
import { loadConfig } from "../../src/config.js";
import { exprToString, moduleToString, patternToString, stmtsToString } from "../../src/ira/render.js";
import {
	boolType,
	customType,
	customTypeArg,
	errorOrVoidType,
	functionType,
	intType,
	listType,
	typeType,
} from "../../src/types.js";

const x = ir.varRef(intType, "x");
const y = ir.varRef(intType, "y");
const c = ir.varRef(boolType, "c");
const tv = ir.varRef(typeType, "T");
const ts = ir.varRef(listType(typeType), "Ts");
const xs = ir.varRef(listType(intType), "xs");
const err = ir.varRef(errorOrVoidType, "err");
const g = ir.varRef(functionType([intType], intType), "g", { isGlobalFunction: true });
const exc = customType("BadValue", [], { isExceptionClass: true, exceptionMessage: "bad value" });

describe("IR-A exprToString", () => {
	it("renders literals and type expressions", () => {
		assert.equal(exprToString(ir.boolLiteral(true)), "True");
		assert.equal(exprToString(ir.intLiteral(-7)), "-7");
		assert.equal(exprToString(ir.atomicTypeLiteral("int")), "Type('int')");
		assert.equal(exprToString(ir.pointerTypeExpr(tv)), "Type.pointer(T)");
		assert.equal(exprToString(ir.rvalueReferenceTypeExpr(tv)), "Type.rvalue_reference(T)");
		assert.equal(exprToString(ir.functionTypeExpr(tv, ts)), "Type.function(T, Ts)");
		assert.equal(
			exprToString(ir.templateInstantiationExpr("std::vector", ts)),
			"Type.template_instantiation('std::vector', Ts)",
		);
		assert.equal(
			exprToString(ir.templateMemberAccessExpr(tv, "type", ts)),
			"Type.template_member(T, 'type', Ts)",
		);
	});

	it("renders operators and calls", () => {
		assert.equal(exprToString(ir.functionCall(g, [x])), "g(x)");
		assert.equal(exprToString(ir.intBinaryOpExpr(x, "%", y)), "x % y");
		assert.equal(exprToString(ir.intComparisonExpr(x, ">=", y)), "x >= y");
		assert.equal(exprToString(ir.notExpr(c)), "not c");
		assert.equal(exprToString(ir.unaryMinusExpr(x)), "-x");
		assert.equal(exprToString(ir.isInListExpr(x, xs)), "x in xs");
		assert.equal(exprToString(ir.intListSumExpr(xs)), "sum(xs)");
		assert.equal(exprToString(ir.listExpr(intType, [x, y])), "[x, y]");
		assert.equal(exprToString(ir.listConcatExpr(xs, xs)), "xs + xs");
	});

	it("renders error handling expressions", () => {
		assert.equal(exprToString(ir.isInstanceExpr(err, exc)), "isinstance(err, BadValue)");
		assert.equal(exprToString(ir.safeUncheckedCast(err, exc)), "err  # type: BadValue");
	});

	it("renders list comprehensions", () => {
		assert.equal(exprToString(ir.listComprehensionExpr(xs, x, ir.functionCall(g, [x]))), "[g(x) for x in xs]");
	});
});

describe("IR-A patternToString", () => {
	it("renders list extraction tails with a star", () => {
		const rest = ir.varRefPattern(listType(typeType), "Rest");
		const p = ir.templateInstantiationPattern("std::tuple", [ir.varRefPattern(typeType, "U")], rest);
		assert.equal(patternToString(p), "Type.template_instantiation('std::tuple', [U, *Rest])");
	});
});

describe("IR-A statements", () => {
	it("renders a match assignment over several lines", () => {
		const r = ir.varRef(typeType, "R");
		const h = ir.varRef(functionType([typeType], typeType), "h", { isGlobalFunction: true });
		const u = ir.varRef(typeType, "U");
		const m = ir.matchExpr([tv], [
			ir.matchCase([ir.pointerTypePattern(ir.varRefPattern(typeType, "U"))], ["U"], [], ir.functionCall(h, [u])),
			ir.matchCase([ir.atomicTypePattern("int")], [], [], ir.functionCall(h, [tv])),
		]);
		assert.equal(
			stmtsToString([ir.assignment(r, m)]),
			"R = match(T)({\n" +
			"  lambda U:\n" +
			"    Type.pointer(U):\n" +
			"      h(U),\n" +
			"  lambda:\n" +
			"    Type('int'):\n" +
			"      h(T),\n" +
			"})\n",
		);
	});

	it("annotates operands when verbose", () => {
		assert.equal(
			stmtsToString([ir.assignment(y, ir.functionCall(g, [x]))], { verbose: true }),
			"y = g(x)  # lhs: y: int; rhs: int\n",
		);
		assert.equal(stmtsToString([ir.assertStmt(c, "c must hold")], { verbose: true }), "assert c  # c: bool\n");
	});

	it("takes the verbose flag from a pipeline configuration", () => {
		const stmts = [ir.assertStmt(c, "c must hold")];
		assert.equal(stmtsToString(stmts, loadConfig({ verbose: true })), "assert c  # c: bool\n");
		assert.equal(moduleToString(ir.module(stmts, []), loadConfig({ verbose: true })), "assert c  # c: bool\n");
		assert.equal(stmtsToString(stmts, loadConfig()), "assert c\n");
	});

	it("renders unpacking, error checks and pass", () => {
		assert.equal(
			stmtsToString([
				ir.unpackingAssignment([x, y], xs, "expected two"),
				ir.checkIfError(err),
				ir.passStmt,
			]),
			"[x, y] = xs\ncheck_if_error(err)\npass\n",
		);
	});
});

describe("IR-A moduleToString", () => {
	it("renders functions with description and branches", () => {
		const defn = ir.functionDefn("f", [ir.functionArgDecl(intType, "x")], [
			ir.assignment(y, ir.functionCall(g, [x])),
			ir.ifStmt(c, [ir.returnStmt(y)], [ir.returnStmt(undefined, err)]),
		], intType, "adds one");
		assert.equal(
			moduleToString(ir.module([defn], ["f"])),
			"# adds one\n" +
			"def f(x: int) -> int:\n" +
			"  y = g(x)\n" +
			"  if c:\n" +
			"    return y, None\n" +
			"  else:\n" +
			"    return None, err\n" +
			"\n",
		);
	});

	it("renders custom types and the error checker", () => {
		const point = customType("Point", [customTypeArg("x", intType), customTypeArg("y", intType)]);
		const m = ir.module([point, exc, ir.checkIfErrorDefn([{ errorType: exc, message: "bad value" }])], []);
		assert.equal(
			moduleToString(m),
			"class Point:\n" +
			"  def __init__(x: int, y: int):\n" +
			"    self.x = x\n" +
			"    self.y = y\n" +
			"\n" +
			"class BadValue(Exception):\n" +
			"  def __init__():\n" +
			"    self.message = 'bad value'\n" +
			"\n" +
			"def check_if_error(x):\n" +
			"  if isinstance(x, BadValue):\n" +
			"    ... # builtin\n" +
			"\n",
		);
	});

	it("is a pure function of the tree", () => {
		const m = ir.module([ir.functionDefn("k", [], [ir.returnStmt(x)], intType)], ["k"]);
		assert.equal(moduleToString(m), moduleToString(m));
		assert.equal(moduleToString(m), "def k() -> int:\n  return x, None\n\n");
	});
});
