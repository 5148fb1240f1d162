// SPDX-License-Identifier: MIT
// MetaIR IR-A Nodes
// A-normal-form trees: every expression operand is a variable reference.
// Each constructor checks its operands and derives the node type before
// building the frozen node, so an ill-typed tree cannot be represented.

import { invariant, MetaIRError } from "../errors.js";
import {
	expectCustomType,
	expectFunctionType,
	expectListType,
	expectNonEmptyName,
	expectNotFunction,
	expectPackType,
	expectSameType,
	expectType,
	frozen,
	frozenList,
	type IntBinaryOp,
	type IntComparisonOp,
	isIntBinaryOp,
	isIntComparisonOp,
	sameNameSet,
} from "../node-checks.js";
import {
	type AtomicTypeNode,
	type FunctionTypeNode,
	makeAtomicType,
	makeFunctionType,
	makeTypeWrapper,
	type TypeWrapperNode,
} from "../node-shapes.js";
import type {
	BoolType,
	CustomType,
	ExprType,
	IntType,
	ListType,
	PackElemType,
	TypeType,
} from "../types.js";
import {
	boolType,
	errorOrVoidType,
	intType,
	listType,
	typeEqual,
	typeType,
} from "../types.js";

//==============================================================================
// Shared Node Shapes
//==============================================================================
// Expressions and patterns have the same structure for type-building nodes;
// they differ only in what their children may be (see node-shapes.ts).

export interface VarRefNode<K extends string> {
	readonly kind: K;
	readonly exprType: ExprType;
	readonly name: string;
	readonly isGlobalFunction: boolean;
	readonly isFunctionThatMayThrow: boolean;
}

export interface VarRefFlags {
	isGlobalFunction?: boolean;
	isFunctionThatMayThrow?: boolean;
}

//==============================================================================
// Expressions
//==============================================================================

export type VarReference = VarRefNode<"varRef">;

export interface MatchCase {
	readonly typePatterns: readonly PatternExpr[];
	readonly matchedVarNames: readonly string[];
	readonly matchedVariadicVarNames: readonly string[];
	readonly expr: FunctionCall;
}

export interface MatchExpr {
	readonly kind: "match";
	readonly exprType: ExprType;
	readonly matchedVars: readonly VarReference[];
	readonly matchCases: readonly MatchCase[];
}

export interface BoolLiteral {
	readonly kind: "boolLiteral";
	readonly exprType: BoolType;
	readonly value: boolean;
}

export interface IntLiteral {
	readonly kind: "intLiteral";
	readonly exprType: IntType;
	readonly value: number;
}

export type AtomicTypeLiteral = AtomicTypeNode<"atomicType">;
export type PointerTypeExpr = TypeWrapperNode<"pointerType", VarReference>;
export type ReferenceTypeExpr = TypeWrapperNode<"referenceType", VarReference>;
export type RvalueReferenceTypeExpr = TypeWrapperNode<"rvalueReferenceType", VarReference>;
export type ConstTypeExpr = TypeWrapperNode<"constType", VarReference>;
export type ArrayTypeExpr = TypeWrapperNode<"arrayType", VarReference>;
export type FunctionTypeExpr = FunctionTypeNode<"functionTypeExpr", VarReference>;

export interface ParameterPackExpansion {
	readonly kind: "parameterPackExpansion";
	readonly exprType: PackElemType;
	readonly expr: VarReference;
}

/** E.g. template `std::vector` applied to the list `[int]` is `std::vector<int>` */
export interface TemplateInstantiationExpr {
	readonly kind: "templateInstantiation";
	readonly exprType: TypeType;
	readonly templateName: string;
	readonly argListExpr: VarReference;
}

/** E.g. member `bar` of class `foo` applied to `[int]` is `foo::bar<int>` */
export interface TemplateMemberAccessExpr {
	readonly kind: "templateMemberAccess";
	readonly exprType: TypeType;
	readonly classTypeExpr: VarReference;
	readonly memberName: string;
	readonly argListExpr: VarReference;
}

export interface ListExpr {
	readonly kind: "list";
	readonly exprType: ListType;
	readonly elemType: ExprType;
	readonly elems: readonly VarReference[];
}

/** Sets are represented as duplicate-free lists at this stage */
export interface AddToSetExpr {
	readonly kind: "addToSet";
	readonly exprType: ListType;
	readonly setExpr: VarReference;
	readonly elemExpr: VarReference;
}

export interface SetToListExpr {
	readonly kind: "setToList";
	readonly exprType: ListType;
	readonly varExpr: VarReference;
}

export interface ListToSetExpr {
	readonly kind: "listToSet";
	readonly exprType: ListType;
	readonly varExpr: VarReference;
}

export interface FunctionCall {
	readonly kind: "functionCall";
	readonly exprType: ExprType;
	readonly fun: VarReference;
	readonly args: readonly VarReference[];
}

export interface EqualityComparison {
	readonly kind: "equality";
	readonly exprType: BoolType;
	readonly lhs: VarReference;
	readonly rhs: VarReference;
}

export interface SetEqualityComparison {
	readonly kind: "setEquality";
	readonly exprType: BoolType;
	readonly lhs: VarReference;
	readonly rhs: VarReference;
}

export interface IsInListExpr {
	readonly kind: "isInList";
	readonly exprType: BoolType;
	readonly lhs: VarReference;
	readonly rhs: VarReference;
}

export interface AttributeAccessExpr {
	readonly kind: "attributeAccess";
	readonly exprType: ExprType;
	readonly varExpr: VarReference;
	readonly attributeName: string;
}

export interface NotExpr {
	readonly kind: "not";
	readonly exprType: BoolType;
	readonly varExpr: VarReference;
}

export interface UnaryMinusExpr {
	readonly kind: "unaryMinus";
	readonly exprType: IntType;
	readonly varExpr: VarReference;
}

export interface IntListSumExpr {
	readonly kind: "intListSum";
	readonly exprType: IntType;
	readonly varExpr: VarReference;
}

export interface BoolListAllExpr {
	readonly kind: "boolListAll";
	readonly exprType: BoolType;
	readonly varExpr: VarReference;
}

export interface BoolListAnyExpr {
	readonly kind: "boolListAny";
	readonly exprType: BoolType;
	readonly varExpr: VarReference;
}

export interface IntComparisonExpr {
	readonly kind: "intComparison";
	readonly exprType: BoolType;
	readonly lhs: VarReference;
	readonly op: IntComparisonOp;
	readonly rhs: VarReference;
}

export interface IntBinaryOpExpr {
	readonly kind: "intBinaryOp";
	readonly exprType: IntType;
	readonly lhs: VarReference;
	readonly op: IntBinaryOp;
	readonly rhs: VarReference;
}

export interface ListConcatExpr {
	readonly kind: "listConcat";
	readonly exprType: ListType;
	readonly lhs: VarReference;
	readonly rhs: VarReference;
}

export interface IsInstanceExpr {
	readonly kind: "isInstance";
	readonly exprType: BoolType;
	readonly varExpr: VarReference;
	readonly checkedType: CustomType;
}

/** Reinterprets an error-or-void value already known to hold the given error */
export interface SafeUncheckedCast {
	readonly kind: "safeUncheckedCast";
	readonly exprType: CustomType;
	readonly varExpr: VarReference;
}

export interface ListComprehensionExpr {
	readonly kind: "listComprehension";
	readonly exprType: ListType;
	readonly listVar: VarReference;
	readonly loopVar: VarReference;
	readonly resultElemExpr: FunctionCall;
}

export type Expr =
	| VarReference
	| MatchExpr
	| BoolLiteral
	| IntLiteral
	| AtomicTypeLiteral
	| PointerTypeExpr
	| ReferenceTypeExpr
	| RvalueReferenceTypeExpr
	| ConstTypeExpr
	| ArrayTypeExpr
	| FunctionTypeExpr
	| ParameterPackExpansion
	| TemplateInstantiationExpr
	| TemplateMemberAccessExpr
	| ListExpr
	| AddToSetExpr
	| SetToListExpr
	| ListToSetExpr
	| FunctionCall
	| EqualityComparison
	| SetEqualityComparison
	| IsInListExpr
	| AttributeAccessExpr
	| NotExpr
	| UnaryMinusExpr
	| IntListSumExpr
	| BoolListAllExpr
	| BoolListAnyExpr
	| IntComparisonExpr
	| IntBinaryOpExpr
	| ListConcatExpr
	| IsInstanceExpr
	| SafeUncheckedCast
	| ListComprehensionExpr;

export type ExprKind = Expr["kind"];

//==============================================================================
// Patterns
//==============================================================================

export type VarReferencePattern = VarRefNode<"varRefPattern">;
export type AtomicTypePattern = AtomicTypeNode<"atomicTypePattern">;
export type PointerTypePattern = TypeWrapperNode<"pointerTypePattern", PatternExpr>;
export type ReferenceTypePattern = TypeWrapperNode<"referenceTypePattern", PatternExpr>;
export type RvalueReferenceTypePattern = TypeWrapperNode<"rvalueReferenceTypePattern", PatternExpr>;
export type ConstTypePattern = TypeWrapperNode<"constTypePattern", PatternExpr>;
export type ArrayTypePattern = TypeWrapperNode<"arrayTypePattern", PatternExpr>;
export type FunctionTypePattern = FunctionTypeNode<"functionTypePattern", PatternExpr>;

export interface TemplateInstantiationPattern {
	readonly kind: "templateInstantiationPattern";
	readonly exprType: TypeType;
	readonly templateName: string;
	readonly argExprs: readonly PatternExpr[];
	/** Binds the remaining template arguments, if any */
	readonly listExtractionArgExpr?: VarReferencePattern;
}

export interface ListPattern {
	readonly kind: "listPattern";
	readonly exprType: ListType;
	readonly elemType: ExprType;
	readonly elems: readonly PatternExpr[];
	readonly listExtractionExpr?: VarReferencePattern;
}

export type PatternExpr =
	| VarReferencePattern
	| AtomicTypePattern
	| PointerTypePattern
	| ReferenceTypePattern
	| RvalueReferenceTypePattern
	| ConstTypePattern
	| ArrayTypePattern
	| FunctionTypePattern
	| TemplateInstantiationPattern
	| ListPattern;

export type PatternKind = PatternExpr["kind"];

//==============================================================================
// Statements
//==============================================================================

export interface PassStmt {
	readonly kind: "pass";
}

export interface AssertStmt {
	readonly kind: "assert";
	readonly varExpr: VarReference;
	readonly message: string;
}

export interface Assignment {
	readonly kind: "assignment";
	readonly lhs: VarReference;
	readonly rhs: Expr;
	/** Receives the error-or-void side channel of a fallible right-hand side */
	readonly lhs2?: VarReference;
}

export interface UnpackingAssignment {
	readonly kind: "unpackingAssignment";
	readonly lhsList: readonly VarReference[];
	readonly rhs: VarReference;
	readonly errorMessage: string;
}

export interface ReturnStmt {
	readonly kind: "return";
	readonly result?: VarReference;
	readonly error?: VarReference;
}

export interface IfStmt {
	readonly kind: "if";
	readonly cond: VarReference;
	readonly ifStmts: readonly Stmt[];
	readonly elseStmts: readonly Stmt[];
}

/** Propagates the error held by an error-or-void variable, if any */
export interface CheckIfError {
	readonly kind: "checkIfError";
	readonly varExpr: VarReference;
}

export type Stmt =
	| PassStmt
	| AssertStmt
	| Assignment
	| UnpackingAssignment
	| ReturnStmt
	| IfStmt
	| CheckIfError;

export type StmtKind = Stmt["kind"];

//==============================================================================
// Module Level
//==============================================================================

export interface FunctionArgDecl {
	readonly exprType: ExprType;
	readonly name: string;
}

export interface FunctionDefn {
	readonly kind: "functionDefn";
	readonly name: string;
	readonly description: string;
	readonly args: readonly FunctionArgDecl[];
	readonly body: readonly Stmt[];
	readonly returnType: ExprType;
}

export interface ErrorTypeAndMessage {
	readonly errorType: CustomType;
	readonly message: string;
}

export interface CheckIfErrorDefn {
	readonly kind: "checkIfErrorDefn";
	readonly errorTypesAndMessages: readonly ErrorTypeAndMessage[];
}

export type ModuleElem =
	| FunctionDefn
	| Assignment
	| AssertStmt
	| CustomType
	| CheckIfErrorDefn
	| CheckIfError
	| PassStmt;

export type ModuleElemKind = ModuleElem["kind"];

export interface Module {
	readonly body: readonly ModuleElem[];
	readonly publicNames: ReadonlySet<string>;
}

//==============================================================================
// Shared Constructors
//==============================================================================

function makeVarRef<K extends string>(
	kind: K,
	exprType: ExprType,
	name: string,
	flags: VarRefFlags,
): VarRefNode<K> {
	expectNonEmptyName(name, kind);
	return frozen({
		kind,
		exprType,
		name,
		isGlobalFunction: flags.isGlobalFunction ?? false,
		isFunctionThatMayThrow: flags.isFunctionThatMayThrow ?? false,
	});
}

//==============================================================================
// Expression Constructors
//==============================================================================

export function varRef(exprType: ExprType, name: string, flags: VarRefFlags = {}): VarReference {
	return makeVarRef("varRef", exprType, name, flags);
}

export function boolLiteral(value: boolean): BoolLiteral {
	return frozen({ kind: "boolLiteral", exprType: boolType, value });
}

export function intLiteral(value: number): IntLiteral {
	invariant(Number.isInteger(value), "Int literal must be an integer: " + String(value));
	return frozen({ kind: "intLiteral", exprType: intType, value });
}

export function atomicTypeLiteral(cppType: string): AtomicTypeLiteral {
	return makeAtomicType("atomicType", cppType);
}

export const pointerTypeExpr = (typeExpr: VarReference): PointerTypeExpr =>
	makeTypeWrapper("pointerType", typeExpr);
export const referenceTypeExpr = (typeExpr: VarReference): ReferenceTypeExpr =>
	makeTypeWrapper("referenceType", typeExpr);
export const rvalueReferenceTypeExpr = (typeExpr: VarReference): RvalueReferenceTypeExpr =>
	makeTypeWrapper("rvalueReferenceType", typeExpr);
export const constTypeExpr = (typeExpr: VarReference): ConstTypeExpr =>
	makeTypeWrapper("constType", typeExpr);
export const arrayTypeExpr = (typeExpr: VarReference): ArrayTypeExpr =>
	makeTypeWrapper("arrayType", typeExpr);

export function functionTypeExpr(returnTypeExpr: VarReference, argListExpr: VarReference): FunctionTypeExpr {
	return makeFunctionType("functionTypeExpr", returnTypeExpr, argListExpr);
}

export function parameterPackExpansion(expr: VarReference): ParameterPackExpansion {
	const packType = expectPackType(expr, "parameterPackExpansion");
	return frozen({ kind: "parameterPackExpansion", exprType: packType.elemType, expr });
}

export function templateInstantiationExpr(
	templateName: string,
	argListExpr: VarReference,
): TemplateInstantiationExpr {
	expectType(argListExpr, listType(typeType), "templateInstantiation arguments");
	return frozen({ kind: "templateInstantiation", exprType: typeType, templateName, argListExpr });
}

export function templateMemberAccessExpr(
	classTypeExpr: VarReference,
	memberName: string,
	argListExpr: VarReference,
): TemplateMemberAccessExpr {
	expectType(classTypeExpr, typeType, "templateMemberAccess class");
	expectType(argListExpr, listType(typeType), "templateMemberAccess arguments");
	return frozen({
		kind: "templateMemberAccess",
		exprType: typeType,
		classTypeExpr,
		memberName,
		argListExpr,
	});
}

export function listExpr(elemType: ExprType, elems: readonly VarReference[]): ListExpr {
	const exprType = listType(elemType);
	for (const elem of elems) expectType(elem, elemType, "list element");
	return frozen({ kind: "list", exprType, elemType, elems: frozenList(elems) });
}

export function addToSetExpr(setExpr: VarReference, elemExpr: VarReference): AddToSetExpr {
	const setType = expectListType(setExpr, "addToSet set");
	expectType(elemExpr, setType.elemType, "addToSet element");
	return frozen({ kind: "addToSet", exprType: setType, setExpr, elemExpr });
}

export function setToListExpr(varExpr: VarReference): SetToListExpr {
	const exprType = expectListType(varExpr, "setToList");
	return frozen({ kind: "setToList", exprType, varExpr });
}

export function listToSetExpr(varExpr: VarReference): ListToSetExpr {
	const exprType = expectListType(varExpr, "listToSet");
	return frozen({ kind: "listToSet", exprType, varExpr });
}

export function functionCall(fun: VarReference, args: readonly VarReference[]): FunctionCall {
	const funType = expectFunctionType(fun, "functionCall callee");
	invariant(args.length > 0, "Call to " + fun.name + " must pass at least one argument");
	invariant(
		args.length === funType.argTypes.length,
		"Call to " + fun.name + " passes " + String(args.length) + " arguments, expected " +
			String(funType.argTypes.length),
	);
	funType.argTypes.forEach((argType, i) => {
		const arg = args[i];
		if (arg !== undefined) expectType(arg, argType, "argument " + String(i) + " of " + fun.name);
	});
	return frozen({ kind: "functionCall", exprType: funType.returns, fun, args: frozenList(args) });
}

export function equalityComparison(lhs: VarReference, rhs: VarReference): EqualityComparison {
	expectNotFunction(lhs, "equality");
	const errorVsType = typeEqual(lhs.exprType, errorOrVoidType) && typeEqual(rhs.exprType, typeType);
	if (!errorVsType) expectSameType(lhs, rhs, "equality");
	return frozen({ kind: "equality", exprType: boolType, lhs, rhs });
}

export function setEqualityComparison(lhs: VarReference, rhs: VarReference): SetEqualityComparison {
	expectListType(lhs, "setEquality");
	expectSameType(lhs, rhs, "setEquality");
	return frozen({ kind: "setEquality", exprType: boolType, lhs, rhs });
}

export function isInListExpr(lhs: VarReference, rhs: VarReference): IsInListExpr {
	const container = expectListType(rhs, "isInList container");
	expectType(lhs, container.elemType, "isInList element");
	return frozen({ kind: "isInList", exprType: boolType, lhs, rhs });
}

export function attributeAccessExpr(
	varExpr: VarReference,
	attributeName: string,
	exprType: ExprType,
): AttributeAccessExpr {
	const base = varExpr.exprType;
	if (base.kind !== "type" && base.kind !== "custom") {
		throw MetaIRError.typeMismatch("Type or a custom type", base, "attributeAccess");
	}
	return frozen({ kind: "attributeAccess", exprType, varExpr, attributeName });
}

export function notExpr(varExpr: VarReference): NotExpr {
	expectType(varExpr, boolType, "not");
	return frozen({ kind: "not", exprType: boolType, varExpr });
}

export function unaryMinusExpr(varExpr: VarReference): UnaryMinusExpr {
	expectType(varExpr, intType, "unaryMinus");
	return frozen({ kind: "unaryMinus", exprType: intType, varExpr });
}

export function intListSumExpr(varExpr: VarReference): IntListSumExpr {
	expectType(varExpr, listType(intType), "sum");
	return frozen({ kind: "intListSum", exprType: intType, varExpr });
}

export function boolListAllExpr(varExpr: VarReference): BoolListAllExpr {
	expectType(varExpr, listType(boolType), "all");
	return frozen({ kind: "boolListAll", exprType: boolType, varExpr });
}

export function boolListAnyExpr(varExpr: VarReference): BoolListAnyExpr {
	expectType(varExpr, listType(boolType), "any");
	return frozen({ kind: "boolListAny", exprType: boolType, varExpr });
}

export function intComparisonExpr(lhs: VarReference, op: string, rhs: VarReference): IntComparisonExpr {
	expectType(lhs, intType, "intComparison lhs");
	expectType(rhs, intType, "intComparison rhs");
	invariant(isIntComparisonOp(op), "Unknown int comparison operator: " + op);
	return frozen({ kind: "intComparison", exprType: boolType, lhs, op, rhs });
}

export function intBinaryOpExpr(lhs: VarReference, op: string, rhs: VarReference): IntBinaryOpExpr {
	expectType(lhs, intType, "intBinaryOp lhs");
	expectType(rhs, intType, "intBinaryOp rhs");
	invariant(isIntBinaryOp(op), "Unknown int binary operator: " + op);
	return frozen({ kind: "intBinaryOp", exprType: intType, lhs, op, rhs });
}

export function listConcatExpr(lhs: VarReference, rhs: VarReference): ListConcatExpr {
	const exprType = expectListType(lhs, "listConcat");
	expectSameType(lhs, rhs, "listConcat");
	return frozen({ kind: "listConcat", exprType, lhs, rhs });
}

export function isInstanceExpr(varExpr: VarReference, checkedType: CustomType): IsInstanceExpr {
	return frozen({ kind: "isInstance", exprType: boolType, varExpr, checkedType });
}

export function safeUncheckedCast(varExpr: VarReference, targetType: ExprType): SafeUncheckedCast {
	expectType(varExpr, errorOrVoidType, "safeUncheckedCast source");
	const exprType = expectCustomType({ exprType: targetType }, "safeUncheckedCast target");
	return frozen({ kind: "safeUncheckedCast", exprType, varExpr });
}

export function listComprehensionExpr(
	listVar: VarReference,
	loopVar: VarReference,
	resultElemExpr: FunctionCall,
): ListComprehensionExpr {
	const source = expectListType(listVar, "listComprehension source");
	expectType(loopVar, source.elemType, "listComprehension loop variable");
	return frozen({
		kind: "listComprehension",
		exprType: listType(resultElemExpr.exprType),
		listVar,
		loopVar,
		resultElemExpr,
	});
}

//==============================================================================
// Match
//==============================================================================

export function matchCase(
	typePatterns: readonly PatternExpr[],
	matchedVarNames: readonly string[],
	matchedVariadicVarNames: readonly string[],
	expr: FunctionCall,
): MatchCase {
	return frozen({
		typePatterns: frozenList(typePatterns),
		matchedVarNames: frozenList(matchedVarNames),
		matchedVariadicVarNames: frozenList(matchedVariadicVarNames),
		expr,
	});
}

/**
 * A case is the main definition when its patterns are nothing but bindings of
 * exactly the names the case binds. This IR-A rule compares the set of pattern
 * variable names with the set of bound names; IR-B uses a per-pattern check
 * instead (see irb/nodes.ts).
 */
export function isMainDefinition(matchCase: MatchCase): boolean {
	const patternNames: string[] = [];
	for (const pattern of matchCase.typePatterns) {
		if (pattern.kind !== "varRefPattern") return false;
		patternNames.push(pattern.name);
	}
	return sameNameSet(
		patternNames,
		[...matchCase.matchedVarNames, ...matchCase.matchedVariadicVarNames],
	);
}

export function matchExpr(matchedVars: readonly VarReference[], matchCases: readonly MatchCase[]): MatchExpr {
	invariant(matchedVars.length > 0, "Match must match at least one value");
	const first = matchCases[0];
	invariant(first !== undefined, "Match must have at least one case");
	for (const c of matchCases) {
		invariant(
			c.typePatterns.length === matchedVars.length,
			"Match case has " + String(c.typePatterns.length) + " patterns for " +
				String(matchedVars.length) + " matched values",
		);
		expectType(c.expr, first.expr.exprType, "match case result");
	}
	const mainDefinitions = matchCases.filter(isMainDefinition).length;
	invariant(mainDefinitions <= 1, "Match has " + String(mainDefinitions) + " main definitions");
	return frozen({
		kind: "match",
		exprType: first.expr.exprType,
		matchedVars: frozenList(matchedVars),
		matchCases: frozenList(matchCases),
	});
}

//==============================================================================
// Pattern Constructors
//==============================================================================

export function varRefPattern(exprType: ExprType, name: string, flags: VarRefFlags = {}): VarReferencePattern {
	return makeVarRef("varRefPattern", exprType, name, flags);
}

export function atomicTypePattern(cppType: string): AtomicTypePattern {
	return makeAtomicType("atomicTypePattern", cppType);
}

export const pointerTypePattern = (typeExpr: PatternExpr): PointerTypePattern =>
	makeTypeWrapper("pointerTypePattern", typeExpr);
export const referenceTypePattern = (typeExpr: PatternExpr): ReferenceTypePattern =>
	makeTypeWrapper("referenceTypePattern", typeExpr);
export const rvalueReferenceTypePattern = (typeExpr: PatternExpr): RvalueReferenceTypePattern =>
	makeTypeWrapper("rvalueReferenceTypePattern", typeExpr);
export const constTypePattern = (typeExpr: PatternExpr): ConstTypePattern =>
	makeTypeWrapper("constTypePattern", typeExpr);
export const arrayTypePattern = (typeExpr: PatternExpr): ArrayTypePattern =>
	makeTypeWrapper("arrayTypePattern", typeExpr);

export function functionTypePattern(returnTypeExpr: PatternExpr, argListExpr: PatternExpr): FunctionTypePattern {
	return makeFunctionType("functionTypePattern", returnTypeExpr, argListExpr);
}

export function templateInstantiationPattern(
	templateName: string,
	argExprs: readonly PatternExpr[],
	listExtractionArgExpr?: VarReferencePattern,
): TemplateInstantiationPattern {
	for (const arg of argExprs) expectType(arg, typeType, "templateInstantiationPattern argument");
	if (listExtractionArgExpr === undefined) {
		return frozen({
			kind: "templateInstantiationPattern",
			exprType: typeType,
			templateName,
			argExprs: frozenList(argExprs),
		});
	}
	expectType(listExtractionArgExpr, listType(typeType), "templateInstantiationPattern tail");
	return frozen({
		kind: "templateInstantiationPattern",
		exprType: typeType,
		templateName,
		argExprs: frozenList(argExprs),
		listExtractionArgExpr,
	});
}

export function listPattern(
	elemType: ExprType,
	elems: readonly PatternExpr[],
	listExtractionExpr?: VarReferencePattern,
): ListPattern {
	const exprType = listType(elemType);
	for (const elem of elems) expectType(elem, elemType, "listPattern element");
	if (listExtractionExpr === undefined) {
		return frozen({ kind: "listPattern", exprType, elemType, elems: frozenList(elems) });
	}
	expectType(listExtractionExpr, exprType, "listPattern tail");
	return frozen({ kind: "listPattern", exprType, elemType, elems: frozenList(elems), listExtractionExpr });
}

//==============================================================================
// Statement Constructors
//==============================================================================

export const passStmt: PassStmt = frozen({ kind: "pass" });

export function assertStmt(varExpr: VarReference, message: string): AssertStmt {
	expectType(varExpr, boolType, "assert");
	return frozen({ kind: "assert", varExpr, message });
}

export function assignment(lhs: VarReference, rhs: Expr, lhs2?: VarReference): Assignment {
	expectSameType(lhs, rhs, "assignment of " + lhs.name);
	if (lhs2 === undefined) {
		return frozen({ kind: "assignment", lhs, rhs });
	}
	expectType(lhs2, errorOrVoidType, "assignment error target");
	invariant(
		rhs.kind === "match" || rhs.kind === "functionCall" || rhs.kind === "listComprehension",
		"Only match, call and comprehension results may carry an error target, got " + rhs.kind,
	);
	return frozen({ kind: "assignment", lhs, rhs, lhs2 });
}

export function unpackingAssignment(
	lhsList: readonly VarReference[],
	rhs: VarReference,
	errorMessage: string,
): UnpackingAssignment {
	const source = expectListType(rhs, "unpackingAssignment source");
	invariant(lhsList.length > 0, "Unpacking assignment needs at least one target");
	for (const lhs of lhsList) expectType(lhs, source.elemType, "unpackingAssignment target " + lhs.name);
	return frozen({ kind: "unpackingAssignment", lhsList: frozenList(lhsList), rhs, errorMessage });
}

export function returnStmt(result?: VarReference, error?: VarReference): ReturnStmt {
	invariant(result !== undefined || error !== undefined, "Return needs a result or an error");
	if (error !== undefined) expectType(error, errorOrVoidType, "return error");
	return frozen({
		kind: "return",
		...(result !== undefined ? { result } : {}),
		...(error !== undefined ? { error } : {}),
	});
}

export function ifStmt(cond: VarReference, ifStmts: readonly Stmt[], elseStmts: readonly Stmt[] = []): IfStmt {
	expectType(cond, boolType, "if condition");
	return frozen({ kind: "if", cond, ifStmts: frozenList(ifStmts), elseStmts: frozenList(elseStmts) });
}

export function checkIfError(varExpr: VarReference): CheckIfError {
	expectType(varExpr, errorOrVoidType, "checkIfError");
	return frozen({ kind: "checkIfError", varExpr });
}

//==============================================================================
// Module-Level Constructors
//==============================================================================

export function functionArgDecl(exprType: ExprType, name = ""): FunctionArgDecl {
	return frozen({ exprType, name });
}

export function functionDefn(
	name: string,
	args: readonly FunctionArgDecl[],
	body: readonly Stmt[],
	returnType: ExprType,
	description = "",
): FunctionDefn {
	expectNonEmptyName(name, "functionDefn");
	invariant(body.length > 0, "Function " + name + " has an empty body");
	return frozen({
		kind: "functionDefn",
		name,
		description,
		args: frozenList(args),
		body: frozenList(body),
		returnType,
	});
}

export function checkIfErrorDefn(errorTypesAndMessages: readonly ErrorTypeAndMessage[]): CheckIfErrorDefn {
	return frozen({ kind: "checkIfErrorDefn", errorTypesAndMessages: frozenList(errorTypesAndMessages) });
}

export function module(body: readonly ModuleElem[], publicNames: Iterable<string>): Module {
	return frozen({ body: frozenList(body), publicNames: new Set(publicNames) });
}

