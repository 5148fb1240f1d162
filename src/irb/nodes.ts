// SPDX-License-Identifier: MIT
// MetaIR IR-B Nodes
// Nested expression trees closer to the emission target: adds sets, boolean
// short-circuit operators, exceptions and source-branch coverage tokens.

import { invariant, MetaIRError } from "../errors.js";
import {
	expectCustomType,
	expectFunctionType,
	expectListType,
	expectNonEmptyName,
	expectNotFunction,
	expectSameType,
	expectSetType,
	expectType,
	frozen,
	frozenList,
	type IntBinaryOp,
	type IntComparisonOp,
	isIntBinaryOp,
	isIntComparisonOp,
} from "../node-checks.js";
import {
	type AtomicTypeNode,
	type FunctionTypeNode,
	makeAtomicType,
	makeFunctionType,
	makeTypeWrapper,
	type TypeWrapperNode,
} from "../node-shapes.js";
import type { SourceBranch } from "../source-branch.js";
import type {
	BoolType,
	CustomType,
	ExprType,
	IntType,
	ListType,
	SetType,
	TypeType,
} from "../types.js";
import {
	boolType,
	errorOrVoidType,
	intType,
	listType,
	setType,
	typeEqual,
	typeType,
} from "../types.js";

//==============================================================================
// Expressions
//==============================================================================

export interface VarReference {
	readonly kind: "varRef";
	readonly exprType: ExprType;
	readonly name: string;
	readonly isGlobalFunction: boolean;
	readonly isFunctionThatMayThrow: boolean;
	/** Module that defines the referenced function, when it is imported */
	readonly sourceModule?: string;
}

export interface MatchCase {
	readonly typePatterns: readonly Expr[];
	readonly matchedVarNames: readonly string[];
	readonly matchedVariadicVarNames: readonly string[];
	readonly expr: Expr;
	readonly matchCaseStartBranch: SourceBranch;
	readonly matchCaseEndBranch: SourceBranch;
}

export interface MatchExpr {
	readonly kind: "match";
	readonly exprType: ExprType;
	readonly matchedExprs: readonly Expr[];
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
export type PointerTypeExpr = TypeWrapperNode<"pointerType", Expr>;
export type ReferenceTypeExpr = TypeWrapperNode<"referenceType", Expr>;
export type RvalueReferenceTypeExpr = TypeWrapperNode<"rvalueReferenceType", Expr>;
export type ConstTypeExpr = TypeWrapperNode<"constType", Expr>;
export type ArrayTypeExpr = TypeWrapperNode<"arrayType", Expr>;
export type FunctionTypeExpr = FunctionTypeNode<"functionTypeExpr", Expr>;

export interface TemplateInstantiationExpr {
	readonly kind: "templateInstantiation";
	readonly exprType: TypeType;
	readonly templateName: string;
	readonly argListExpr: Expr;
}

export interface TemplateMemberAccessExpr {
	readonly kind: "templateMemberAccess";
	readonly exprType: TypeType;
	readonly classTypeExpr: Expr;
	readonly memberName: string;
	readonly argListExpr: Expr;
}

export interface ListExpr {
	readonly kind: "list";
	readonly exprType: ListType;
	readonly elemType: ExprType;
	readonly elemExprs: readonly Expr[];
	/** In a match pattern, binds the remaining elements */
	readonly listExtractionExpr?: VarReference;
}

export interface SetExpr {
	readonly kind: "set";
	readonly exprType: SetType;
	readonly elemType: ExprType;
	readonly elemExprs: readonly Expr[];
}

export interface ListAggregateExpr<K extends string, T extends ExprType> {
	readonly kind: K;
	readonly exprType: T;
	readonly listExpr: Expr;
}

export interface SetAggregateExpr<K extends string, T extends ExprType> {
	readonly kind: K;
	readonly exprType: T;
	readonly setExpr: Expr;
}

export type IntListSumExpr = ListAggregateExpr<"intListSum", IntType>;
export type IntSetSumExpr = SetAggregateExpr<"intSetSum", IntType>;
export type BoolListAllExpr = ListAggregateExpr<"boolListAll", BoolType>;
export type BoolSetAllExpr = SetAggregateExpr<"boolSetAll", BoolType>;
export type BoolListAnyExpr = ListAggregateExpr<"boolListAny", BoolType>;
export type BoolSetAnyExpr = SetAggregateExpr<"boolSetAny", BoolType>;

export interface FunctionCall {
	readonly kind: "functionCall";
	readonly exprType: ExprType;
	readonly funExpr: Expr;
	readonly args: readonly Expr[];
	readonly mayThrow: boolean;
}

export interface BinaryNode<K extends string, T extends ExprType> {
	readonly kind: K;
	readonly exprType: T;
	readonly lhs: Expr;
	readonly rhs: Expr;
}

export type EqualityComparison = BinaryNode<"equality", BoolType>;
/** Membership in a list or a set */
export type InExpr = BinaryNode<"in", BoolType>;
export type AndExpr = BinaryNode<"and", BoolType>;
export type OrExpr = BinaryNode<"or", BoolType>;
export type ListConcatExpr = BinaryNode<"listConcat", ListType>;

export interface AttributeAccessExpr {
	readonly kind: "attributeAccess";
	readonly exprType: ExprType;
	readonly expr: Expr;
	readonly attributeName: string;
}

export interface NotExpr {
	readonly kind: "not";
	readonly exprType: BoolType;
	readonly expr: Expr;
}

export interface IntUnaryMinusExpr {
	readonly kind: "intUnaryMinus";
	readonly exprType: IntType;
	readonly expr: Expr;
}

export interface IntComparisonExpr extends BinaryNode<"intComparison", BoolType> {
	readonly op: IntComparisonOp;
}

export interface IntBinaryOpExpr extends BinaryNode<"intBinaryOp", IntType> {
	readonly op: IntBinaryOp;
}

export interface ListComprehension {
	readonly kind: "listComprehension";
	readonly exprType: ListType;
	readonly listExpr: Expr;
	readonly loopVar: VarReference;
	readonly resultElemExpr: Expr;
	readonly loopBodyStartBranch: SourceBranch;
	readonly loopExitBranch: SourceBranch;
}

export interface SetComprehension {
	readonly kind: "setComprehension";
	readonly exprType: SetType;
	readonly setExpr: Expr;
	readonly loopVar: VarReference;
	readonly resultElemExpr: Expr;
	readonly loopBodyStartBranch: SourceBranch;
	readonly loopExitBranch: SourceBranch;
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
	| TemplateInstantiationExpr
	| TemplateMemberAccessExpr
	| ListExpr
	| SetExpr
	| IntListSumExpr
	| IntSetSumExpr
	| BoolListAllExpr
	| BoolSetAllExpr
	| BoolListAnyExpr
	| BoolSetAnyExpr
	| FunctionCall
	| EqualityComparison
	| InExpr
	| AttributeAccessExpr
	| AndExpr
	| OrExpr
	| NotExpr
	| IntUnaryMinusExpr
	| IntComparisonExpr
	| IntBinaryOpExpr
	| ListConcatExpr
	| ListComprehension
	| SetComprehension;

export type ExprKind = Expr["kind"];

//==============================================================================
// Statements
//==============================================================================

export interface PassStmt {
	readonly kind: "pass";
	readonly sourceBranch: SourceBranch;
}

export interface AssertStmt {
	readonly kind: "assert";
	readonly expr: Expr;
	readonly message: string;
	readonly sourceBranch: SourceBranch;
}

export interface Assignment {
	readonly kind: "assignment";
	readonly lhs: VarReference;
	readonly rhs: Expr;
	readonly sourceBranch: SourceBranch;
}

export interface UnpackingAssignment {
	readonly kind: "unpackingAssignment";
	readonly lhsList: readonly VarReference[];
	readonly rhs: Expr;
	readonly errorMessage: string;
	readonly sourceBranch: SourceBranch;
}

export interface ReturnStmt {
	readonly kind: "return";
	readonly expr: Expr;
	readonly sourceBranch: SourceBranch;
}

export interface IfStmt {
	readonly kind: "if";
	readonly condExpr: Expr;
	readonly ifStmts: readonly Stmt[];
	readonly elseStmts: readonly Stmt[];
}

export interface RaiseStmt {
	readonly kind: "raise";
	readonly expr: Expr;
	readonly sourceBranch: SourceBranch;
}

export interface TryExcept {
	readonly kind: "tryExcept";
	readonly tryBody: readonly Stmt[];
	readonly caughtExceptionType: CustomType;
	readonly caughtExceptionName: string;
	readonly exceptBody: readonly Stmt[];
	readonly tryBranch: SourceBranch;
	readonly exceptBranch: SourceBranch;
}

export type Stmt =
	| PassStmt
	| AssertStmt
	| Assignment
	| UnpackingAssignment
	| ReturnStmt
	| IfStmt
	| RaiseStmt
	| TryExcept;

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
	readonly args: readonly FunctionArgDecl[];
	readonly body: readonly Stmt[];
	readonly returnType: ExprType;
}

export type ModuleElem = FunctionDefn | AssertStmt | CustomType | PassStmt;

export type ModuleElemKind = ModuleElem["kind"];

export interface Module {
	readonly functionDefns: readonly FunctionDefn[];
	readonly assertions: readonly AssertStmt[];
	readonly customTypes: readonly CustomType[];
	readonly publicNames: ReadonlySet<string>;
	readonly passStmts: readonly PassStmt[];
}

//==============================================================================
// Expression Constructors
//==============================================================================

export interface VarRefOptions {
	isGlobalFunction?: boolean;
	isFunctionThatMayThrow?: boolean;
	sourceModule?: string;
}

export function varRef(exprType: ExprType, name: string, options: VarRefOptions = {}): VarReference {
	expectNonEmptyName(name, "varRef");
	const base = {
		kind: "varRef" as const,
		exprType,
		name,
		isGlobalFunction: options.isGlobalFunction ?? false,
		isFunctionThatMayThrow: options.isFunctionThatMayThrow ?? false,
	};
	if (options.sourceModule === undefined) return frozen(base);
	invariant(base.isGlobalFunction, "Only global functions can come from another module: " + name);
	return frozen({ ...base, sourceModule: options.sourceModule });
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

export const pointerTypeExpr = (typeExpr: Expr): PointerTypeExpr =>
	makeTypeWrapper("pointerType", typeExpr);
export const referenceTypeExpr = (typeExpr: Expr): ReferenceTypeExpr =>
	makeTypeWrapper("referenceType", typeExpr);
export const rvalueReferenceTypeExpr = (typeExpr: Expr): RvalueReferenceTypeExpr =>
	makeTypeWrapper("rvalueReferenceType", typeExpr);
export const constTypeExpr = (typeExpr: Expr): ConstTypeExpr =>
	makeTypeWrapper("constType", typeExpr);
export const arrayTypeExpr = (typeExpr: Expr): ArrayTypeExpr =>
	makeTypeWrapper("arrayType", typeExpr);

export function functionTypeExpr(returnTypeExpr: Expr, argListExpr: Expr): FunctionTypeExpr {
	return makeFunctionType("functionTypeExpr", returnTypeExpr, argListExpr);
}

export function templateInstantiationExpr(templateName: string, argListExpr: Expr): TemplateInstantiationExpr {
	expectType(argListExpr, listType(typeType), "templateInstantiation arguments");
	return frozen({ kind: "templateInstantiation", exprType: typeType, templateName, argListExpr });
}

export function templateMemberAccessExpr(
	classTypeExpr: Expr,
	memberName: string,
	argListExpr: Expr,
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

export function listExpr(
	elemType: ExprType,
	elemExprs: readonly Expr[],
	listExtractionExpr?: VarReference,
): ListExpr {
	const exprType = listType(elemType);
	for (const elem of elemExprs) expectType(elem, elemType, "list element");
	if (listExtractionExpr === undefined) {
		return frozen({ kind: "list", exprType, elemType, elemExprs: frozenList(elemExprs) });
	}
	expectType(listExtractionExpr, exprType, "list extraction");
	return frozen({ kind: "list", exprType, elemType, elemExprs: frozenList(elemExprs), listExtractionExpr });
}

export function setExpr(elemType: ExprType, elemExprs: readonly Expr[]): SetExpr {
	const exprType = setType(elemType);
	for (const elem of elemExprs) expectType(elem, elemType, "set element");
	return frozen({ kind: "set", exprType, elemType, elemExprs: frozenList(elemExprs) });
}

export function intListSumExpr(listExpr: Expr): IntListSumExpr {
	expectType(listExpr, listType(intType), "sum");
	return frozen({ kind: "intListSum", exprType: intType, listExpr });
}

export function intSetSumExpr(setExpr: Expr): IntSetSumExpr {
	expectType(setExpr, setType(intType), "sum");
	return frozen({ kind: "intSetSum", exprType: intType, setExpr });
}

export function boolListAllExpr(listExpr: Expr): BoolListAllExpr {
	expectType(listExpr, listType(boolType), "all");
	return frozen({ kind: "boolListAll", exprType: boolType, listExpr });
}

export function boolSetAllExpr(setExpr: Expr): BoolSetAllExpr {
	expectType(setExpr, setType(boolType), "all");
	return frozen({ kind: "boolSetAll", exprType: boolType, setExpr });
}

export function boolListAnyExpr(listExpr: Expr): BoolListAnyExpr {
	expectType(listExpr, listType(boolType), "any");
	return frozen({ kind: "boolListAny", exprType: boolType, listExpr });
}

export function boolSetAnyExpr(setExpr: Expr): BoolSetAnyExpr {
	expectType(setExpr, setType(boolType), "any");
	return frozen({ kind: "boolSetAny", exprType: boolType, setExpr });
}

export function functionCall(funExpr: Expr, args: readonly Expr[], mayThrow: boolean): FunctionCall {
	const funType = expectFunctionType(funExpr, "functionCall callee");
	invariant(
		args.length === funType.argTypes.length,
		"Call passes " + String(args.length) + " arguments, expected " + String(funType.argTypes.length),
	);
	funType.argTypes.forEach((argType, i) => {
		const arg = args[i];
		if (arg !== undefined) expectType(arg, argType, "call argument " + String(i));
	});
	return frozen({ kind: "functionCall", exprType: funType.returns, funExpr, args: frozenList(args), mayThrow });
}

export function equalityComparison(lhs: Expr, rhs: Expr): EqualityComparison {
	expectNotFunction(lhs, "equality");
	const errorVsType = typeEqual(lhs.exprType, errorOrVoidType) && typeEqual(rhs.exprType, typeType);
	if (!errorVsType) expectSameType(lhs, rhs, "equality");
	return frozen({ kind: "equality", exprType: boolType, lhs, rhs });
}

export function inExpr(lhs: Expr, rhs: Expr): InExpr {
	const container = rhs.exprType;
	if (container.kind !== "list" && container.kind !== "set") {
		throw MetaIRError.typeMismatch("List[...] or Set[...]", container, "in container");
	}
	expectType(lhs, container.elemType, "in element");
	return frozen({ kind: "in", exprType: boolType, lhs, rhs });
}

export function attributeAccessExpr(expr: Expr, attributeName: string, exprType: ExprType): AttributeAccessExpr {
	const base = expr.exprType;
	if (base.kind !== "type" && base.kind !== "custom") {
		throw MetaIRError.typeMismatch("Type or a custom type", base, "attributeAccess");
	}
	return frozen({ kind: "attributeAccess", exprType, expr, attributeName });
}

export function andExpr(lhs: Expr, rhs: Expr): AndExpr {
	expectType(lhs, boolType, "and lhs");
	expectType(rhs, boolType, "and rhs");
	return frozen({ kind: "and", exprType: boolType, lhs, rhs });
}

export function orExpr(lhs: Expr, rhs: Expr): OrExpr {
	expectType(lhs, boolType, "or lhs");
	expectType(rhs, boolType, "or rhs");
	return frozen({ kind: "or", exprType: boolType, lhs, rhs });
}

export function notExpr(expr: Expr): NotExpr {
	expectType(expr, boolType, "not");
	return frozen({ kind: "not", exprType: boolType, expr });
}

export function intUnaryMinusExpr(expr: Expr): IntUnaryMinusExpr {
	expectType(expr, intType, "unary minus");
	return frozen({ kind: "intUnaryMinus", exprType: intType, expr });
}

export function intComparisonExpr(lhs: Expr, op: string, rhs: Expr): IntComparisonExpr {
	expectType(lhs, intType, "intComparison lhs");
	expectType(rhs, intType, "intComparison rhs");
	invariant(isIntComparisonOp(op), "Unknown int comparison operator: " + op);
	return frozen({ kind: "intComparison", exprType: boolType, lhs, op, rhs });
}

export function intBinaryOpExpr(lhs: Expr, op: string, rhs: Expr): IntBinaryOpExpr {
	expectType(lhs, intType, "intBinaryOp lhs");
	expectType(rhs, intType, "intBinaryOp rhs");
	invariant(isIntBinaryOp(op), "Unknown int binary operator: " + op);
	return frozen({ kind: "intBinaryOp", exprType: intType, lhs, op, rhs });
}

export function listConcatExpr(lhs: Expr, rhs: Expr): ListConcatExpr {
	const exprType = expectListType(lhs, "listConcat");
	expectSameType(lhs, rhs, "listConcat");
	return frozen({ kind: "listConcat", exprType, lhs, rhs });
}

export interface LoopBranches {
	loopBodyStartBranch: SourceBranch;
	loopExitBranch: SourceBranch;
}

export function listComprehension(
	listExpr: Expr,
	loopVar: VarReference,
	resultElemExpr: Expr,
	branches: LoopBranches,
): ListComprehension {
	const source = expectListType(listExpr, "listComprehension source");
	expectType(loopVar, source.elemType, "listComprehension loop variable");
	return frozen({
		kind: "listComprehension",
		exprType: listType(resultElemExpr.exprType),
		listExpr,
		loopVar,
		resultElemExpr,
		loopBodyStartBranch: branches.loopBodyStartBranch,
		loopExitBranch: branches.loopExitBranch,
	});
}

export function setComprehension(
	setExpr: Expr,
	loopVar: VarReference,
	resultElemExpr: Expr,
	branches: LoopBranches,
): SetComprehension {
	const source = expectSetType(setExpr, "setComprehension source");
	expectType(loopVar, source.elemType, "setComprehension loop variable");
	return frozen({
		kind: "setComprehension",
		exprType: setType(resultElemExpr.exprType),
		setExpr,
		loopVar,
		resultElemExpr,
		loopBodyStartBranch: branches.loopBodyStartBranch,
		loopExitBranch: branches.loopExitBranch,
	});
}

//==============================================================================
// Match
//==============================================================================

export interface MatchCaseBranches {
	matchCaseStartBranch: SourceBranch;
	matchCaseEndBranch: SourceBranch;
}

export function matchCase(
	typePatterns: readonly Expr[],
	matchedVarNames: readonly string[],
	matchedVariadicVarNames: readonly string[],
	expr: Expr,
	branches: MatchCaseBranches,
): MatchCase {
	return frozen({
		typePatterns: frozenList(typePatterns),
		matchedVarNames: frozenList(matchedVarNames),
		matchedVariadicVarNames: frozenList(matchedVariadicVarNames),
		expr,
		matchCaseStartBranch: branches.matchCaseStartBranch,
		matchCaseEndBranch: branches.matchCaseEndBranch,
	});
}

/**
 * A case is the main definition when every pattern is a bare reference to one
 * of the names the case binds. Unlike IR-A (see ira/nodes.ts), which compares
 * the set of pattern names with the set of bound names, this checks each
 * pattern on its own.
 */
export function isMainDefinition(matchCase: MatchCase): boolean {
	const bound = new Set(matchCase.matchedVarNames);
	return matchCase.typePatterns.every((pattern) => pattern.kind === "varRef" && bound.has(pattern.name));
}

export function matchExpr(matchedExprs: readonly Expr[], matchCases: readonly MatchCase[]): MatchExpr {
	invariant(matchedExprs.length > 0, "Match must match at least one value");
	const first = matchCases[0];
	invariant(first !== undefined, "Match must have at least one case");
	for (const c of matchCases) {
		invariant(
			c.typePatterns.length === matchedExprs.length,
			"Match case has " + String(c.typePatterns.length) + " patterns for " +
				String(matchedExprs.length) + " matched values",
		);
		expectType(c.expr, first.expr.exprType, "match case result");
	}
	const mainDefinitions = matchCases.filter(isMainDefinition).length;
	invariant(mainDefinitions <= 1, "Match has " + String(mainDefinitions) + " main definitions");
	return frozen({
		kind: "match",
		exprType: first.expr.exprType,
		matchedExprs: frozenList(matchedExprs),
		matchCases: frozenList(matchCases),
	});
}

//==============================================================================
// Statement Constructors
//==============================================================================

export function passStmt(sourceBranch: SourceBranch): PassStmt {
	return frozen({ kind: "pass", sourceBranch });
}

export function assertStmt(expr: Expr, message: string, sourceBranch: SourceBranch): AssertStmt {
	expectType(expr, boolType, "assert");
	return frozen({ kind: "assert", expr, message, sourceBranch });
}

export function assignment(lhs: VarReference, rhs: Expr, sourceBranch: SourceBranch): Assignment {
	expectSameType(lhs, rhs, "assignment of " + lhs.name);
	return frozen({ kind: "assignment", lhs, rhs, sourceBranch });
}

export function unpackingAssignment(
	lhsList: readonly VarReference[],
	rhs: Expr,
	errorMessage: string,
	sourceBranch: SourceBranch,
): UnpackingAssignment {
	const source = expectListType(rhs, "unpackingAssignment source");
	invariant(lhsList.length > 0, "Unpacking assignment needs at least one target");
	for (const lhs of lhsList) expectType(lhs, source.elemType, "unpackingAssignment target " + lhs.name);
	return frozen({ kind: "unpackingAssignment", lhsList: frozenList(lhsList), rhs, errorMessage, sourceBranch });
}

export function returnStmt(expr: Expr, sourceBranch: SourceBranch): ReturnStmt {
	return frozen({ kind: "return", expr, sourceBranch });
}

export function ifStmt(condExpr: Expr, ifStmts: readonly Stmt[], elseStmts: readonly Stmt[] = []): IfStmt {
	expectType(condExpr, boolType, "if condition");
	return frozen({ kind: "if", condExpr, ifStmts: frozenList(ifStmts), elseStmts: frozenList(elseStmts) });
}

export function raiseStmt(expr: Expr, sourceBranch: SourceBranch): RaiseStmt {
	const raised = expectCustomType(expr, "raise");
	invariant(raised.isExceptionClass, "Only exception classes can be raised, got " + raised.name);
	return frozen({ kind: "raise", expr, sourceBranch });
}

export interface TryExceptBranches {
	tryBranch: SourceBranch;
	exceptBranch: SourceBranch;
}

export function tryExcept(
	tryBody: readonly Stmt[],
	caughtExceptionType: CustomType,
	caughtExceptionName: string,
	exceptBody: readonly Stmt[],
	branches: TryExceptBranches,
): TryExcept {
	invariant(caughtExceptionType.isExceptionClass, "Only exception classes can be caught, got " + caughtExceptionType.name);
	expectNonEmptyName(caughtExceptionName, "tryExcept");
	return frozen({
		kind: "tryExcept",
		tryBody: frozenList(tryBody),
		caughtExceptionType,
		caughtExceptionName,
		exceptBody: frozenList(exceptBody),
		tryBranch: branches.tryBranch,
		exceptBranch: branches.exceptBranch,
	});
}

//==============================================================================
// Module-Level Constructors
//==============================================================================

export function functionArgDecl(exprType: ExprType, name: string): FunctionArgDecl {
	expectNonEmptyName(name, "functionArgDecl");
	return frozen({ exprType, name });
}

export function functionDefn(
	name: string,
	args: readonly FunctionArgDecl[],
	body: readonly Stmt[],
	returnType: ExprType,
): FunctionDefn {
	expectNonEmptyName(name, "functionDefn");
	invariant(body.length > 0, "Function " + name + " has an empty body");
	return frozen({ kind: "functionDefn", name, args: frozenList(args), body: frozenList(body), returnType });
}

export interface ModuleParts {
	functionDefns?: readonly FunctionDefn[];
	assertions?: readonly AssertStmt[];
	customTypes?: readonly CustomType[];
	publicNames?: Iterable<string>;
	passStmts?: readonly PassStmt[];
}

export function module(parts: ModuleParts): Module {
	return frozen({
		functionDefns: frozenList(parts.functionDefns ?? []),
		assertions: frozenList(parts.assertions ?? []),
		customTypes: frozenList(parts.customTypes ?? []),
		publicNames: new Set(parts.publicNames ?? []),
		passStmts: frozenList(parts.passStmts ?? []),
	});
}
