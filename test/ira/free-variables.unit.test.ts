import { describe, it } from "node:test";
import assert from "node:assert/strict";

import * as ir from "../../src/ira/nodes.js";
import {
	getUniqueFreeVariablesInExpr,
	getUniqueFreeVariablesInFunctionDefn,
	getUniqueFreeVariablesInStmts,
} from "../../src/ira/free-variables.js";
import { functionType, intType, listType, typeType } from "../../src/types.js";

const x = ir.varRef(intType, "x");
const y = ir.varRef(intType, "y");
const z = ir.varRef(intType, "z");
const t = ir.varRef(intType, "t");

function names(vars: readonly { name: string }[]): string[] {
	return vars.map((v) => v.name);
}

function sampleFunction(gIsGlobal: boolean): ir.FunctionDefn {
	const g = ir.varRef(functionType([intType], intType), "g", { isGlobalFunction: gIsGlobal });
	return ir.functionDefn("f", [ir.functionArgDecl(intType, "x")], [
		ir.assignment(y, ir.functionCall(g, [x])),
		ir.assignment(t, ir.intBinaryOpExpr(y, "+", z)),
		ir.returnStmt(t),
	], intType);
}

describe("IR-A free variables", () => {
	it("excludes arguments, assigned names and global functions", () => {
		assert.deepEqual(names(getUniqueFreeVariablesInFunctionDefn(sampleFunction(true))), ["z"]);
	});

	it("includes callees that are not global functions", () => {
		assert.deepEqual(names(getUniqueFreeVariablesInFunctionDefn(sampleFunction(false))), ["g", "z"]);
	});

	it("treats arguments as free when looking at the body alone", () => {
		assert.deepEqual(names(getUniqueFreeVariablesInStmts(sampleFunction(true).body)), ["x", "z"]);
	});

	it("honours caller-supplied bound names", () => {
		assert.deepEqual(names(getUniqueFreeVariablesInStmts(sampleFunction(true).body, ["x", "z"])), []);
	});

	it("does not let a name assigned later bind an earlier use", () => {
		const stmts = [
			ir.assignment(t, ir.intBinaryOpExpr(y, "+", x)),
			ir.assignment(y, x),
		];
		assert.deepEqual(names(getUniqueFreeVariablesInStmts(stmts)), ["x", "y"]);
	});

	it("returns one entry per name, sorted", () => {
		const expr = ir.intBinaryOpExpr(z, "*", x);
		const stmts = [ir.assignment(t, expr), ir.assignment(y, ir.intBinaryOpExpr(x, "-", z))];
		assert.deepEqual(names(getUniqueFreeVariablesInStmts(stmts)), ["x", "z"]);
	});

	it("scopes match case names to their case", () => {
		const tv = ir.varRef(typeType, "T");
		const u = ir.varRef(typeType, "U");
		const h = ir.varRef(functionType([typeType, typeType], typeType), "h", { isGlobalFunction: true });
		const m = ir.matchExpr([tv], [
			ir.matchCase([ir.pointerTypePattern(ir.varRefPattern(typeType, "U"))], ["U"], [], ir.functionCall(h, [u, tv])),
			ir.matchCase([ir.atomicTypePattern("int")], [], [], ir.functionCall(h, [u, u])),
		]);
		// U is bound in the first case only; T is the matched value
		assert.deepEqual(names(getUniqueFreeVariablesInExpr(m)), ["T", "U"]);
	});

	it("scopes a comprehension's loop variable to its body", () => {
		const xs = ir.varRef(listType(intType), "xs");
		const k = ir.varRef(functionType([intType], intType), "k");
		const comp = ir.listComprehensionExpr(xs, x, ir.functionCall(k, [x]));
		assert.deepEqual(names(getUniqueFreeVariablesInExpr(comp)), ["k", "xs"]);
	});
});
