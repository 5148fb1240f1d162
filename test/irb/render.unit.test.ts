import { describe, it } from "node:test";
import assert from "node:assert/strict";

import * as ir from "../../src/irb/nodes.js";
import { loadConfig } from "../../src/config.js";
import { exprToString, moduleToString, stmtsToString } from "../../src/irb/render.js";
import { sourceBranch } from "../../src/source-branch.js";
import { boolType, customType, functionType, intType, listType, setType, typeType } from "../../src/types.js";

const branch = sourceBranch("m.py", 1, 2);
const loop = { loopBodyStartBranch: branch, loopExitBranch: branch };
const x = ir.varRef(intType, "x");
const y = ir.varRef(intType, "y");
const c = ir.varRef(boolType, "c");
const tv = ir.varRef(typeType, "T");
const xs = ir.varRef(listType(intType), "xs");
const s = ir.varRef(setType(intType), "s");
const rest = ir.varRef(listType(typeType), "Rest");
const g = ir.varRef(functionType([intType], intType), "g", { isGlobalFunction: true });
const bad = customType("Bad", [], { isExceptionClass: true, exceptionMessage: "bad" });

describe("IR-B exprToString", () => {
	it("parenthesizes compound operands", () => {
		assert.equal(exprToString(ir.andExpr(ir.inExpr(x, xs), ir.notExpr(c))), "(x in xs) and (not c)");
		assert.equal(exprToString(ir.intBinaryOpExpr(x, "+", ir.intUnaryMinusExpr(y))), "x + (-y)");
		assert.equal(exprToString(ir.intComparisonExpr(x, "<", y)), "x < y");
	});

	it("renders calls, attributes and literals", () => {
		assert.equal(exprToString(ir.functionCall(g, [x], false)), "g(x)");
		assert.equal(exprToString(ir.attributeAccessExpr(tv, "type", typeType)), "T.type");
		assert.equal(exprToString(ir.boolLiteral(false)), "False");
		assert.equal(exprToString(ir.atomicTypeLiteral("int")), "Type('int')");
	});

	it("renders sets and their aggregates", () => {
		assert.equal(exprToString(ir.setExpr(intType, [])), "set()");
		assert.equal(exprToString(ir.setExpr(intType, [x, y])), "{x, y}");
		assert.equal(exprToString(ir.intSetSumExpr(s)), "sum(s)");
		assert.equal(exprToString(ir.boolSetAllExpr(ir.setExpr(boolType, [c]))), "all({c})");
	});

	it("renders list tails with a star", () => {
		assert.equal(
			exprToString(ir.templateInstantiationExpr("std::tuple", ir.listExpr(typeType, [tv], rest))),
			"Type.template_instantiation('std::tuple', [T, *Rest])",
		);
	});

	it("renders comprehensions", () => {
		assert.equal(exprToString(ir.listComprehension(xs, x, ir.intUnaryMinusExpr(x), loop)), "[-x for x in xs]");
		assert.equal(exprToString(ir.setComprehension(s, x, ir.functionCall(g, [x], false), loop)), "{g(x) for x in s}");
	});

	it("renders a match on one line", () => {
		const u = ir.varRef(typeType, "U");
		const h = ir.varRef(functionType([typeType], typeType), "h", { isGlobalFunction: true });
		const branches = { matchCaseStartBranch: branch, matchCaseEndBranch: branch };
		const m = ir.matchExpr([tv], [
			ir.matchCase([ir.pointerTypeExpr(u)], ["U"], [], ir.functionCall(h, [u], false), branches),
			ir.matchCase([ir.atomicTypeLiteral("int")], [], [], ir.atomicTypeLiteral("long"), branches),
		]);
		assert.equal(
			exprToString(m),
			"match(T)({lambda U: Type.pointer(U) -> h(U); lambda: Type('int') -> Type('long')})",
		);
	});

	it("stars variadic names in a match case", () => {
		const branches = { matchCaseStartBranch: branch, matchCaseEndBranch: branch };
		const m = ir.matchExpr([tv], [
			ir.matchCase([ir.templateInstantiationExpr("std::tuple", rest)], [], ["Rest"], ir.boolLiteral(true), branches),
		]);
		assert.equal(exprToString(m), "match(T)({lambda *Rest: Type.template_instantiation('std::tuple', Rest) -> True})");
	});
});

describe("IR-B statements", () => {
	it("renders simple statements and if blocks", () => {
		const e = ir.varRef(bad, "e");
		assert.equal(
			stmtsToString([
				ir.assignment(y, ir.functionCall(g, [x], false), branch),
				ir.unpackingAssignment([x, y], xs, "expected two", branch),
				ir.assertStmt(c, "c's fine", branch),
				ir.ifStmt(c, [], [ir.returnStmt(x, branch)]),
				ir.raiseStmt(e, branch),
			]),
			"y = g(x)\n" +
			"[x, y] = xs\n" +
			"assert c, 'c\\'s fine'\n" +
			"if c:\n" +
			"  pass\n" +
			"else:\n" +
			"  return x\n" +
			"raise e\n",
		);
	});

	it("annotates source branches when verbose", () => {
		const e = ir.varRef(bad, "e");
		const stmt = ir.tryExcept(
			[ir.returnStmt(x, sourceBranch("m.py", 4, -1))],
			bad,
			"e",
			[ir.raiseStmt(e, sourceBranch("m.py", 6, -1))],
			{ tryBranch: sourceBranch("m.py", 3, 4), exceptBranch: sourceBranch("m.py", 5, 6) },
		);
		assert.equal(
			stmtsToString([stmt], { verbose: true }),
			"try:  # m.py:3->4\n" +
			"  return x  # m.py:4->-1\n" +
			"except Bad as e:  # m.py:5->6\n" +
			"  raise e  # m.py:6->-1\n",
		);
	});
});

describe("IR-B moduleToString", () => {
	it("renders custom types, functions, assertions and passes in order", () => {
		const m = ir.module({
			passStmts: [ir.passStmt(branch)],
			assertions: [ir.assertStmt(c, "ok", branch)],
			functionDefns: [ir.functionDefn("f", [ir.functionArgDecl(intType, "x")], [ir.returnStmt(x, branch)], intType)],
			customTypes: [bad],
			publicNames: ["f"],
		});
		assert.equal(
			moduleToString(m),
			"class Bad(Exception):\n" +
			"  def __init__():\n" +
			"    self.message = 'bad'\n" +
			"\n" +
			"def f(x: int) -> int:\n" +
			"  return x\n" +
			"\n" +
			"assert c, 'ok'\n" +
			"pass\n",
		);
	});

	it("takes the verbose flag from a pipeline configuration", () => {
		const m = ir.module({
			functionDefns: [ir.functionDefn("f", [], [ir.returnStmt(x, branch)], intType)],
			passStmts: [ir.passStmt(branch)],
		});
		assert.equal(
			moduleToString(m, loadConfig({ verbose: true })),
			"def f() -> int:\n" +
			"  return x  # m.py:1->2\n" +
			"\n" +
			"pass  # m.py:1->2\n",
		);
		assert.equal(moduleToString(m, loadConfig()), "def f() -> int:\n  return x\n\npass\n");
	});
});
