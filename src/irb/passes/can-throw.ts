// SPDX-License-Identifier: MIT
// MetaIR Can-Throw Recalculation
// Clears "may throw" marks on references to, and calls of, functions that
// provably never raise. Mutually recursive functions are decided together.

import { MetaIRError } from "../../errors.js";
import type { ObjectFile } from "../../object-file.js";
import * as ir from "../nodes.js";
import { Transformation } from "../transformation.js";
import { Visitor } from "../visitor.js";
import { stronglyConnectedComponents } from "./call-graph.js";

//==============================================================================
// Per-Function Facts
//==============================================================================

class GlobalReferenceCollector extends Visitor {
	readonly local = new Set<string>();
	readonly external: ir.VarReference[] = [];

	override visitVarReference(expr: ir.VarReference): void {
		if (!expr.isGlobalFunction) return;
		if (expr.sourceModule === undefined) this.local.add(expr.name);
		else this.external.push(expr);
	}
}

class ThrowSiteFinder extends Visitor {
	containsRaise = false;
	referencesThrowingFunction = false;

	override visitRaiseStmt(stmt: ir.RaiseStmt): void {
		this.containsRaise = true;
		super.visitRaiseStmt(stmt);
	}

	override visitVarReference(expr: ir.VarReference): void {
		if (expr.isFunctionThatMayThrow) this.referencesThrowingFunction = true;
	}
}

function findThrowSites(defn: ir.FunctionDefn): ThrowSiteFinder {
	const finder = new ThrowSiteFinder();
	finder.visitFunctionDefn(defn);
	return finder;
}

export function functionContainsRaise(defn: ir.FunctionDefn): boolean {
	return findThrowSites(defn).containsRaise;
}

/** Raises directly, or references a function still marked as throwing. */
export function functionMayThrow(defn: ir.FunctionDefn): boolean {
	const sites = findThrowSites(defn);
	return sites.containsRaise || sites.referencesThrowingFunction;
}

//==============================================================================
// External Functions
//==============================================================================

/**
 * Whether a public function of an imported module can throw. Public custom
 * types are constructors and never throw.
 */
export function externalFunctionCanThrow(file: ObjectFile, moduleName: string, name: string): boolean {
	const summary = file.modules[moduleName];
	if (summary === undefined) {
		throw MetaIRError.objectFile("no module named " + moduleName);
	}
	if (!summary.publicNames.includes(name)) {
		throw MetaIRError.objectFile(moduleName + " has no public name " + name);
	}
	return summary.functions.some((fn) => fn.name === name && fn.canThrow);
}

/** Without an object file, an imported function keeps the mark it came with. */
function resolveExternal(ref: ir.VarReference, objectFile: ObjectFile | undefined): boolean {
	if (ref.sourceModule === undefined || objectFile === undefined) return ref.isFunctionThatMayThrow;
	return externalFunctionCanThrow(objectFile, ref.sourceModule, ref.name);
}

//==============================================================================
// Analysis
//==============================================================================

/**
 * Can-throw status of every function the module defines. A function throws
 * when it raises, calls an imported function that throws, or calls a local
 * function that throws.
 */
export function computeFunctionCanThrow(
	module: ir.Module,
	objectFile?: ObjectFile,
): Map<string, boolean> {
	const defined = new Set(module.functionDefns.map((defn) => defn.name));
	const graph = new Map<string, Set<string>>();
	const seeds = new Set<string>();

	for (const defn of module.functionDefns) {
		const refs = new GlobalReferenceCollector();
		refs.visitFunctionDefn(defn);
		graph.set(defn.name, new Set([...refs.local].filter((name) => defined.has(name))));
		const callsThrowingImport = refs.external.some((ref) => resolveExternal(ref, objectFile));
		if (callsThrowingImport || functionContainsRaise(defn)) seeds.add(defn.name);
	}

	const canThrow = new Map<string, boolean>();
	// Callee components come first, so their status is final when read
	for (const component of stronglyConnectedComponents(graph)) {
		const throws = component.some((name) =>
			seeds.has(name) ||
			[...(graph.get(name) ?? [])].some((callee) => canThrow.get(callee) === true));
		for (const name of component) canThrow.set(name, throws);
	}
	return canThrow;
}

//==============================================================================
// Rewrite
//==============================================================================

class ApplyCanThrowInfo extends Transformation {
	constructor(
		private readonly localCanThrow: ReadonlyMap<string, boolean>,
		private readonly objectFile: ObjectFile | undefined,
	) {
		super();
	}

	private canThrow(ref: ir.VarReference): boolean {
		if (ref.sourceModule !== undefined) return resolveExternal(ref, this.objectFile);
		return this.localCanThrow.get(ref.name) ?? ref.isFunctionThatMayThrow;
	}

	override transformVarReference(expr: ir.VarReference): ir.VarReference {
		if (!expr.isGlobalFunction || !expr.isFunctionThatMayThrow || this.canThrow(expr)) return expr;
		return ir.varRef(expr.exprType, expr.name, {
			isGlobalFunction: true,
			isFunctionThatMayThrow: false,
			sourceModule: expr.sourceModule,
		});
	}

	override transformFunctionCall(expr: ir.FunctionCall): ir.Expr {
		const funExpr = this.transformExpr(expr.funExpr);
		const provablySafe = funExpr.kind === "varRef" && funExpr.isGlobalFunction && !this.canThrow(funExpr);
		return ir.functionCall(
			funExpr,
			expr.args.map((arg) => this.transformExpr(arg)),
			expr.mayThrow && !provablySafe,
		);
	}
}

export function recalculateFunctionCanThrowInfo(module: ir.Module, objectFile?: ObjectFile): ir.Module {
	if (module.functionDefns.length === 0) return module;
	const canThrow = computeFunctionCanThrow(module, objectFile);
	return new ApplyCanThrowInfo(canThrow, objectFile).transformModule(module);
}
