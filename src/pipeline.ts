// SPDX-License-Identifier: MIT
// MetaIR Pass Pipeline
// Ordered module-to-module passes over IR-B, with debug logging per pass

import { defaultConfig, type PipelineConfig } from "./config.js";
import { MetaIRError } from "./errors.js";
import type * as irb from "./irb/nodes.js";
import { recalculateFunctionCanThrowInfo } from "./irb/passes/can-throw.js";
import { getReturnType } from "./irb/return-type.js";
import { createLogger, type Logger } from "./logging.js";
import type { ObjectFile } from "./object-file.js";
import { typeEqual } from "./types.js";

export interface Pass {
	readonly name: string;
	run(module: irb.Module): irb.Module;
}

//==============================================================================
// Passes
//==============================================================================

/**
 * Check each function body against its declared return type. Bodies that
 * only raise carry no type and are accepted.
 */
export function returnTypeCheckPass(config: PipelineConfig): Pass {
	return {
		name: "check-return-types",
		run(module) {
			for (const defn of module.functionDefns) {
				const info = getReturnType(defn.body, {
					verifyTerminatorPosition: config.verifyTerminatorPosition,
				});
				if (info.exprType !== undefined && !typeEqual(info.exprType, defn.returnType)) {
					throw MetaIRError.typeMismatch(defn.returnType, info.exprType, `return type of ${defn.name}`);
				}
			}
			return module;
		},
	};
}

export function canThrowPass(objectFile?: ObjectFile): Pass {
	return {
		name: "recalculate-can-throw",
		run: (module) => recalculateFunctionCanThrowInfo(module, objectFile),
	};
}

//==============================================================================
// Running
//==============================================================================

export function pipelineLogger(config: PipelineConfig): Logger {
	return createLogger("Pipeline", config.logLevel);
}

/**
 * Run passes in order, each on the previous one's output. Errors propagate
 * unchanged; nothing is retried.
 */
export function runPasses(
	module: irb.Module,
	passes: readonly Pass[],
	config: PipelineConfig = defaultConfig,
	logger: Logger = pipelineLogger(config),
): irb.Module {
	let current = module;
	for (const pass of passes) {
		logger.debug(`Running ${pass.name} on ${String(current.functionDefns.length)} functions`);
		current = pass.run(current);
		logger.debug(`Finished ${pass.name}`);
	}
	return current;
}

export interface OptimizeOptions {
	/** Summaries of the modules this one imports from */
	objectFile?: ObjectFile;
	config?: PipelineConfig;
	logger?: Logger;
}

export function optimizeModule(module: irb.Module, options: OptimizeOptions = {}): irb.Module {
	const config = options.config ?? defaultConfig;
	const logger = options.logger ?? pipelineLogger(config);
	if (module.functionDefns.length === 0) {
		logger.info("Module defines no functions, nothing to optimize");
		return module;
	}
	if (options.objectFile === undefined) {
		logger.info("No object file given, imported functions keep their can-throw marks");
	}
	return runPasses(
		module,
		[returnTypeCheckPass(config), canThrowPass(options.objectFile)],
		config,
		logger,
	);
}

