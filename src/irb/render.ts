// SPDX-License-Identifier: MIT
// MetaIR IR-B Rendering
// Deterministic textual form of IR-B trees. Expressions render on one line;
// compound operands are parenthesized.

import type { PipelineConfig } from "../config.js";
import { exhaustive } from "../errors.js";
import { endLine, quote, writeCustomType } from "../render-shared.js";
import { formatSourceBranch } from "../source-branch.js";
import { formatType } from "../types.js";
import { Writer } from "../writer.js";
import type * as ir from "./nodes.js";

/**
 * Rendering reads the `verbose` flag of the pipeline configuration, so a
 * `PipelineConfig` can be passed as is. Verbose output appends source branches as trailing comments.
 */
export type RenderOptions = Partial<Pick<PipelineConfig, "verbose">>;

//==============================================================================
// Expressions
//==============================================================================

/** Kinds that bind looser than a call or attribute access */
const COMPOUND_KINDS: ReadonlySet<ir.ExprKind> = new Set<ir.ExprKind>([
	"equality",
	"in",
	"and",
	"or",
	"not",
	"intUnaryMinus",
	"intComparison",
	"intBinaryOp",
	"listConcat",
]);

function operand(expr: ir.Expr): string {
	const text = exprToString(expr);
	return COMPOUND_KINDS.has(expr.kind) ? "(" + text + ")" : text;
}

function joined(exprs: readonly ir.Expr[]): string {
	return exprs.map(exprToString).join(", ");
}

function binary(lhs: ir.Expr, op: string, rhs: ir.Expr): string {
	return operand(lhs) + " " + op + " " + operand(rhs);
}

function matchCaseToString(matchCase: ir.MatchCase): string {
	const bound = [
		...matchCase.matchedVarNames,
		...matchCase.matchedVariadicVarNames.map((name) => "*" + name),
	];
	const lambda = bound.length > 0 ? "lambda " + bound.join(", ") : "lambda";
	return lambda + ": " + joined(matchCase.typePatterns) + " -> " + exprToString(matchCase.expr);
}

export function exprToString(expr: ir.Expr): string {
	switch (expr.kind) {
	case "varRef": return expr.name;
	case "match":
		return "match(" + joined(expr.matchedExprs) + ")({" +
			expr.matchCases.map(matchCaseToString).join("; ") + "})";
	case "boolLiteral": return expr.value ? "True" : "False";
	case "intLiteral": return String(expr.value);
	case "atomicType": return "Type(" + quote(expr.cppType) + ")";
	case "pointerType": return "Type.pointer(" + exprToString(expr.typeExpr) + ")";
	case "referenceType": return "Type.reference(" + exprToString(expr.typeExpr) + ")";
	case "rvalueReferenceType": return "Type.rvalue_reference(" + exprToString(expr.typeExpr) + ")";
	case "constType": return "Type.const(" + exprToString(expr.typeExpr) + ")";
	case "arrayType": return "Type.array(" + exprToString(expr.typeExpr) + ")";
	case "functionTypeExpr":
		return "Type.function(" + exprToString(expr.returnTypeExpr) + ", " + exprToString(expr.argListExpr) + ")";
	case "templateInstantiation":
		return "Type.template_instantiation(" + quote(expr.templateName) + ", " + exprToString(expr.argListExpr) + ")";
	case "templateMemberAccess":
		return "Type.template_member(" + exprToString(expr.classTypeExpr) + ", " + quote(expr.memberName) + ", " +
			exprToString(expr.argListExpr) + ")";
	case "list": {
		const elems = expr.elemExprs.map(exprToString);
		if (expr.listExtractionExpr !== undefined) elems.push("*" + expr.listExtractionExpr.name);
		return "[" + elems.join(", ") + "]";
	}
	case "set": return expr.elemExprs.length > 0 ? "{" + joined(expr.elemExprs) + "}" : "set()";
	case "intListSum": return "sum(" + exprToString(expr.listExpr) + ")";
	case "intSetSum": return "sum(" + exprToString(expr.setExpr) + ")";
	case "boolListAll": return "all(" + exprToString(expr.listExpr) + ")";
	case "boolSetAll": return "all(" + exprToString(expr.setExpr) + ")";
	case "boolListAny": return "any(" + exprToString(expr.listExpr) + ")";
	case "boolSetAny": return "any(" + exprToString(expr.setExpr) + ")";
	case "functionCall": return operand(expr.funExpr) + "(" + joined(expr.args) + ")";
	case "equality": return binary(expr.lhs, "==", expr.rhs);
	case "in": return binary(expr.lhs, "in", expr.rhs);
	case "attributeAccess": return operand(expr.expr) + "." + expr.attributeName;
	case "and": return binary(expr.lhs, "and", expr.rhs);
	case "or": return binary(expr.lhs, "or", expr.rhs);
	case "not": return "not " + operand(expr.expr);
	case "intUnaryMinus": return "-" + operand(expr.expr);
	case "intComparison":
	case "intBinaryOp":
		return binary(expr.lhs, expr.op, expr.rhs);
	case "listConcat": return binary(expr.lhs, "+", expr.rhs);
	case "listComprehension":
		return "[" + exprToString(expr.resultElemExpr) + " for " + expr.loopVar.name + " in " +
			exprToString(expr.listExpr) + "]";
	case "setComprehension":
		return "{" + exprToString(expr.resultElemExpr) + " for " + expr.loopVar.name + " in " +
			exprToString(expr.setExpr) + "}";
	default: return exhaustive(expr);
	}
}

//==============================================================================
// Statements
//==============================================================================

function writeBlock(writer: Writer, stmts: readonly ir.Stmt[], verbose: boolean): void {
	writer.indent(() => {
		for (const stmt of stmts) writeStmt(writer, stmt, verbose);
		if (stmts.length === 0) writer.writeln("pass");
	});
}

export function writeStmt(writer: Writer, stmt: ir.Stmt, verbose = false): void {
	switch (stmt.kind) {
	case "pass":
		writer.write("pass");
		endLine(writer, verbose, () => formatSourceBranch(stmt.sourceBranch));
		return;
	case "assert":
		writer.write("assert " + exprToString(stmt.expr) + ", " + quote(stmt.message));
		endLine(writer, verbose, () => formatSourceBranch(stmt.sourceBranch));
		return;
	case "assignment":
		writer.write(stmt.lhs.name + " = " + exprToString(stmt.rhs));
		endLine(writer, verbose, () => formatSourceBranch(stmt.sourceBranch));
		return;
	case "unpackingAssignment":
		writer.write("[" + stmt.lhsList.map((lhs) => lhs.name).join(", ") + "] = " + exprToString(stmt.rhs));
		endLine(writer, verbose, () => formatSourceBranch(stmt.sourceBranch));
		return;
	case "return":
		writer.write("return " + exprToString(stmt.expr));
		endLine(writer, verbose, () => formatSourceBranch(stmt.sourceBranch));
		return;
	case "if":
		writer.writeln("if " + exprToString(stmt.condExpr) + ":");
		writeBlock(writer, stmt.ifStmts, verbose);
		if (stmt.elseStmts.length > 0) {
			writer.writeln("else:");
			writeBlock(writer, stmt.elseStmts, verbose);
		}
		return;
	case "raise":
		writer.write("raise " + exprToString(stmt.expr));
		endLine(writer, verbose, () => formatSourceBranch(stmt.sourceBranch));
		return;
	case "tryExcept":
		writer.write("try:");
		endLine(writer, verbose, () => formatSourceBranch(stmt.tryBranch));
		writeBlock(writer, stmt.tryBody, verbose);
		writer.write("except " + stmt.caughtExceptionType.name + " as " + stmt.caughtExceptionName + ":");
		endLine(writer, verbose, () => formatSourceBranch(stmt.exceptBranch));
		writeBlock(writer, stmt.exceptBody, verbose);
		return;
	default:
		exhaustive(stmt);
	}
}

//==============================================================================
// Module Level
//==============================================================================

function writeFunctionDefn(writer: Writer, defn: ir.FunctionDefn, verbose: boolean): void {
	const args = defn.args.map((arg) => arg.name + ": " + formatType(arg.exprType)).join(", ");
	writer.writeln("def " + defn.name + "(" + args + ") -> " + formatType(defn.returnType) + ":");
	writer.indent(() => {
		for (const stmt of defn.body) writeStmt(writer, stmt, verbose);
	});
	writer.writeln();
}

export function writeModuleElem(writer: Writer, elem: ir.ModuleElem, verbose = false): void {
	switch (elem.kind) {
	case "functionDefn":
		writeFunctionDefn(writer, elem, verbose);
		return;
	case "custom":
		writeCustomType(writer, elem);
		return;
	case "assert":
	case "pass":
		writeStmt(writer, elem, verbose);
		return;
	default:
		exhaustive(elem);
	}
}

/** Custom types, then functions, then top-level assertions and passes. */
export function moduleToString(module: ir.Module, options: RenderOptions = {}): string {
	const verbose = options.verbose ?? false;
	const writer = new Writer();
	const elems: ir.ModuleElem[] = [
		...module.customTypes,
		...module.functionDefns,
		...module.assertions,
		...module.passStmts,
	];
	for (const elem of elems) writeModuleElem(writer, elem, verbose);
	return writer.toString();
}

export function stmtsToString(stmts: readonly ir.Stmt[], options: RenderOptions = {}): string {
	const writer = new Writer();
	for (const stmt of stmts) writeStmt(writer, stmt, options.verbose ?? false);
	return writer.toString();
}
