// SPDX-License-Identifier: MIT
// MetaIR - Typed intermediate representations for a metaprogramming compiler
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	BoolType, BottomType, CustomType, CustomTypeArgDecl, ErrorOrVoidType, ExprType,
	FunctionType, IntType, ListType, PackElemType, ParameterPackType, SetType, TypeType,
} from "./types.js";

export {
	boolType, bottomType, customType, customTypeArg, errorOrVoidType, formatType,
	functionType, intType, isPackElemType, listType, parameterPackType, setType,
	typeEqual, typeType,
} from "./types.js";

export type { SourceBranch } from "./source-branch.js";
export { formatSourceBranch, sourceBranch } from "./source-branch.js";

//==============================================================================
// Errors
//==============================================================================

export type { ErrorCode, ValidationError, ValidationResult } from "./errors.js";

export {
	combineResults, ErrorCodes, exhaustive, invalidResult, invariant, MetaIRError,
	unwrapResult, validResult,
} from "./errors.js";

//==============================================================================
// Configuration and Logging
//==============================================================================

export type { LogLevel, PipelineConfig } from "./config.js";

export {
	configFromEnv, defaultConfig, loadConfig, LogLevelSchema, parseConfig,
	PipelineConfigSchema,
} from "./config.js";

export type { LogSink, Logger } from "./logging.js";
export { createLogger, isLevelEnabled } from "./logging.js";

export { Writer } from "./writer.js";

//==============================================================================
// IR Stages
//==============================================================================

export * as ira from "./ira/index.js";
export * as irb from "./irb/index.js";

//==============================================================================
// Object Files and Pipeline
//==============================================================================

export type { FunctionSummary, ModuleSummary, ObjectFile } from "./object-file.js";

export {
	addModule, decodeObjectFile, emptyObjectFile, encodeObjectFile, loadObjectFile,
	mergeObjectFiles, ObjectFileSchema, summarizeModule,
} from "./object-file.js";

export type { OptimizeOptions, Pass } from "./pipeline.js";

export {
	canThrowPass, optimizeModule, pipelineLogger, returnTypeCheckPass, runPasses,
} from "./pipeline.js";
