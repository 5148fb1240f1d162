// SPDX-License-Identifier: MIT
// MetaIR IR-A
// A-normal-form stage: nodes, traversal, free variables, rendering

export * from "./nodes.js";
export { Visitor } from "./visitor.js";
export type { FreeVariable } from "./free-variables.js";
export {
	getUniqueFreeVariablesInExpr,
	getUniqueFreeVariablesInFunctionDefn,
	getUniqueFreeVariablesInStmts,
} from "./free-variables.js";
export type { RenderOptions } from "./render.js";
export { exprToString, moduleToString, patternToString, stmtsToString, writeModuleElem, writeStmt } from "./render.js";
