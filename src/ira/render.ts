// SPDX-License-Identifier: MIT
// MetaIR IR-A Rendering
// Deterministic textual form of IR-A trees, for debugging and test expectations

import type { PipelineConfig } from "../config.js";
import { exhaustive } from "../errors.js";
import type { TypeWrapperOp } from "../node-shapes.js";
import { endLine, quote, writeCustomType } from "../render-shared.js";
import { formatType } from "../types.js";
import { Writer } from "../writer.js";
import type * as ir from "./nodes.js";

/**
 * Rendering reads the `verbose` flag of the pipeline configuration, so a
 * `PipelineConfig` can be passed as is. Verbose output appends operand types as trailing comments.
 */
export type RenderOptions = Partial<Pick<PipelineConfig, "verbose">>;

const TYPE_WRAPPER_NAMES = {
	pointerType: "pointer",
	referenceType: "reference",
	rvalueReferenceType: "rvalue_reference",
	constType: "const",
	arrayType: "array",
	pointerTypePattern: "pointer",
	referenceTypePattern: "reference",
	rvalueReferenceTypePattern: "rvalue_reference",
	constTypePattern: "const",
	arrayTypePattern: "array",
} as const satisfies Record<string, TypeWrapperOp>;

function describeRef(ref: ir.VarReference): string {
	const flags = [
		...(ref.isGlobalFunction ? ["global"] : []),
		...(ref.isFunctionThatMayThrow ? ["may throw"] : []),
	];
	const suffix = flags.length > 0 ? " (" + flags.join(", ") + ")" : "";
	return ref.name + ": " + formatType(ref.exprType) + suffix;
}

//==============================================================================
// Expressions
//==============================================================================

function names(refs: readonly ir.VarReference[]): string {
	return refs.map((ref) => ref.name).join(", ");
}

/**
 * Textual form of an expression. Every kind is a single line except match,
 * whose rendering spans several and ends in a newline.
 */
export function exprToString(expr: ir.Expr): string {
	switch (expr.kind) {
	case "match": {
		const writer = new Writer();
		writeMatchExpr(writer, expr);
		return writer.toString();
	}
	case "varRef": return expr.name;
	case "boolLiteral": return expr.value ? "True" : "False";
	case "intLiteral": return String(expr.value);
	case "atomicType": return "Type(" + quote(expr.cppType) + ")";
	case "pointerType":
	case "referenceType":
	case "rvalueReferenceType":
	case "constType":
	case "arrayType":
		return "Type." + TYPE_WRAPPER_NAMES[expr.kind] + "(" + expr.typeExpr.name + ")";
	case "functionTypeExpr":
		return "Type.function(" + expr.returnTypeExpr.name + ", " + expr.argListExpr.name + ")";
	case "parameterPackExpansion": return "*(" + expr.expr.name + ")";
	case "templateInstantiation":
		return "Type.template_instantiation(" + quote(expr.templateName) + ", " + expr.argListExpr.name + ")";
	case "templateMemberAccess":
		return "Type.template_member(" + expr.classTypeExpr.name + ", " + quote(expr.memberName) + ", " +
			expr.argListExpr.name + ")";
	case "list": return "[" + names(expr.elems) + "]";
	case "addToSet": return "add_to_set(" + expr.setExpr.name + ", " + expr.elemExpr.name + ")";
	case "setToList": return "set_to_list(" + expr.varExpr.name + ")";
	case "listToSet": return "list_to_set(" + expr.varExpr.name + ")";
	case "functionCall": return expr.fun.name + "(" + names(expr.args) + ")";
	case "equality": return expr.lhs.name + " == " + expr.rhs.name;
	case "setEquality": return "set_equals(" + expr.lhs.name + ", " + expr.rhs.name + ")";
	case "isInList": return expr.lhs.name + " in " + expr.rhs.name;
	case "attributeAccess": return expr.varExpr.name + "." + expr.attributeName;
	case "not": return "not " + expr.varExpr.name;
	case "unaryMinus": return "-" + expr.varExpr.name;
	case "intListSum": return "sum(" + expr.varExpr.name + ")";
	case "boolListAll": return "all(" + expr.varExpr.name + ")";
	case "boolListAny": return "any(" + expr.varExpr.name + ")";
	case "intComparison":
	case "intBinaryOp":
		return expr.lhs.name + " " + expr.op + " " + expr.rhs.name;
	case "listConcat": return expr.lhs.name + " + " + expr.rhs.name;
	case "isInstance": return "isinstance(" + expr.varExpr.name + ", " + expr.checkedType.name + ")";
	case "safeUncheckedCast": return expr.varExpr.name + "  # type: " + expr.exprType.name;
	case "listComprehension":
		return "[" + exprToString(expr.resultElemExpr) + " for " + expr.loopVar.name + " in " +
			expr.listVar.name + "]";
	default: return exhaustive(expr);
	}
}

export function patternToString(pattern: ir.PatternExpr): string {
	switch (pattern.kind) {
	case "varRefPattern": return pattern.name;
	case "atomicTypePattern": return "Type(" + quote(pattern.cppType) + ")";
	case "pointerTypePattern":
	case "referenceTypePattern":
	case "rvalueReferenceTypePattern":
	case "constTypePattern":
	case "arrayTypePattern":
		return "Type." + TYPE_WRAPPER_NAMES[pattern.kind] + "(" + patternToString(pattern.typeExpr) + ")";
	case "functionTypePattern":
		return "Type.function(" + patternToString(pattern.returnTypeExpr) + ", " +
			patternToString(pattern.argListExpr) + ")";
	case "templateInstantiationPattern":
		return "Type.template_instantiation(" + quote(pattern.templateName) + ", " +
			patternListToString(pattern.argExprs, pattern.listExtractionArgExpr) + ")";
	case "listPattern":
		return patternListToString(pattern.elems, pattern.listExtractionExpr);
	default: return exhaustive(pattern);
	}
}

function patternListToString(elems: readonly ir.PatternExpr[], tail?: ir.VarReferencePattern): string {
	const parts = elems.map(patternToString);
	if (tail !== undefined) parts.push("*" + tail.name);
	return "[" + parts.join(", ") + "]";
}

function writeMatchExpr(writer: Writer, expr: ir.MatchExpr): void {
	writer.writeln("match(" + names(expr.matchedVars) + ")({");
	writer.indent(() => {
		for (const matchCase of expr.matchCases) {
			const bound = [
				...matchCase.matchedVarNames,
				...matchCase.matchedVariadicVarNames.map((name) => "*" + name),
			];
			writer.writeln((bound.length > 0 ? "lambda " + bound.join(", ") : "lambda") + ":");
			writer.indent(() => {
				writer.writeln(matchCase.typePatterns.map(patternToString).join(", ") + ":");
				writer.indent(() => {
					writer.writeln(exprToString(matchCase.expr) + ",");
				});
			});
		}
	});
	writer.writeln("})");
}

//==============================================================================
// Statements
//==============================================================================

export function writeStmt(writer: Writer, stmt: ir.Stmt, verbose = false): void {
	switch (stmt.kind) {
	case "pass":
		writer.writeln("pass");
		return;
	case "assert":
		writer.write("assert " + stmt.varExpr.name);
		endLine(writer, verbose, () => describeRef(stmt.varExpr));
		return;
	case "assignment":
		writeAssignment(writer, stmt, verbose);
		return;
	case "unpackingAssignment":
		writer.write("[" + names(stmt.lhsList) + "] = " + stmt.rhs.name);
		endLine(writer, verbose, () => "rhs: " + describeRef(stmt.rhs));
		return;
	case "return":
		writer.write("return " + (stmt.result?.name ?? "None") + ", " + (stmt.error?.name ?? "None"));
		endLine(writer, verbose, () =>
			"result: " + (stmt.result !== undefined ? describeRef(stmt.result) : "") +
			", error: " + (stmt.error !== undefined ? describeRef(stmt.error) : ""));
		return;
	case "if":
		writer.write("if " + stmt.cond.name + ":");
		endLine(writer, verbose, () => describeRef(stmt.cond));
		writer.indent(() => {
			for (const inner of stmt.ifStmts) writeStmt(writer, inner, verbose);
			if (stmt.ifStmts.length === 0) writer.writeln("pass");
		});
		if (stmt.elseStmts.length > 0) {
			writer.writeln("else:");
			writer.indent(() => {
				for (const inner of stmt.elseStmts) writeStmt(writer, inner, verbose);
			});
		}
		return;
	case "checkIfError":
		writer.write("check_if_error(" + stmt.varExpr.name + ")");
		endLine(writer, verbose, () => describeRef(stmt.varExpr));
		return;
	default:
		exhaustive(stmt);
	}
}

function writeAssignment(writer: Writer, stmt: ir.Assignment, verbose: boolean): void {
	writer.write(stmt.lhs.name);
	if (stmt.lhs2 !== undefined) writer.write(", " + stmt.lhs2.name);
	writer.write(" = ");
	if (stmt.rhs.kind === "match") {
		writeMatchExpr(writer, stmt.rhs);
		return;
	}
	writer.write(exprToString(stmt.rhs));
	endLine(writer, verbose, () => "lhs: " + describeRef(stmt.lhs) + "; rhs: " + formatType(stmt.rhs.exprType));
}

//==============================================================================
// Module Level
//==============================================================================

export function writeModuleElem(writer: Writer, elem: ir.ModuleElem, verbose = false): void {
	switch (elem.kind) {
	case "functionDefn":
		if (elem.description.length > 0) writer.writeln("# " + elem.description);
		writer.writeln(
			"def " + elem.name + "(" +
				elem.args.map((arg) => arg.name + ": " + formatType(arg.exprType)).join(", ") +
				") -> " + formatType(elem.returnType) + ":",
		);
		writer.indent(() => {
			for (const stmt of elem.body) writeStmt(writer, stmt, verbose);
		});
		writer.writeln();
		return;
	case "custom":
		writeCustomType(writer, elem);
		return;
	case "checkIfErrorDefn":
		writer.writeln("def check_if_error(x):");
		writer.indent(() => {
			for (const { errorType } of elem.errorTypesAndMessages) {
				writer.writeln("if isinstance(x, " + errorType.name + "):");
				writer.indent(() => {
					writer.writeln("... # builtin");
				});
			}
			if (elem.errorTypesAndMessages.length === 0) writer.writeln("... # builtin");
		});
		writer.writeln();
		return;
	case "assignment":
	case "assert":
	case "checkIfError":
	case "pass":
		writeStmt(writer, elem, verbose);
		return;
	default:
		exhaustive(elem);
	}
}

/** Concatenation of the renderings of the module's elements, in order. */
export function moduleToString(module: ir.Module, options: RenderOptions = {}): string {
	const writer = new Writer();
	for (const elem of module.body) writeModuleElem(writer, elem, options.verbose ?? false);
	return writer.toString();
}

export function stmtsToString(stmts: readonly ir.Stmt[], options: RenderOptions = {}): string {
	const writer = new Writer();
	for (const stmt of stmts) writeStmt(writer, stmt, options.verbose ?? false);
	return writer.toString();
}
