// SPDX-License-Identifier: MIT
// MetaIR IR-B
// Nested-expression stage: nodes, traversal, rewriting, analyses, passes

export * from "./nodes.js";
export { Visitor } from "./visitor.js";
export { Transformation } from "./transformation.js";
export { getFreeVariables, getFreeVariablesInFunctionDefn, getFreeVariablesInStmts } from "./free-variables.js";
export type { ReturnTypeInfo, ReturnTypeOptions } from "./return-type.js";
export { getReturnType, mergeReturnTypes } from "./return-type.js";
export { checkPublicNames, definedNames } from "./module-checks.js";
export {
	computeFunctionCanThrow,
	externalFunctionCanThrow,
	functionContainsRaise,
	functionMayThrow,
	recalculateFunctionCanThrowInfo,
} from "./passes/can-throw.js";
export { stronglyConnectedComponents } from "./passes/call-graph.js";
export type { Graph } from "./passes/call-graph.js";
export type { RenderOptions } from "./render.js";
export { exprToString, moduleToString, stmtsToString, writeModuleElem, writeStmt } from "./render.js";
