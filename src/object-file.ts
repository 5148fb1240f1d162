// SPDX-License-Identifier: MIT
// MetaIR Object Files
// JSON summaries of compiled modules, read back when compiling their importers

import { z } from "zod/v4";
import { zodToValidationErrors } from "./config.js";
import {
	invalidResult,
	unwrapResult,
	type ValidationResult,
	validResult,
} from "./errors.js";
import type * as irb from "./irb/nodes.js";
import { functionMayThrow } from "./irb/passes/can-throw.js";

//==============================================================================
// Schema
//==============================================================================

export const OBJECT_FILE_VERSION = 1;

export const FunctionSummarySchema = z.object({
	name: z.string().min(1),
	canThrow: z.boolean(),
});

export const ModuleSummarySchema = z.object({
	publicNames: z.array(z.string().min(1)),
	functions: z.array(FunctionSummarySchema),
});

export const ObjectFileSchema = z.object({
	version: z.literal(OBJECT_FILE_VERSION),
	modules: z.record(z.string().min(1), ModuleSummarySchema),
});

export type FunctionSummary = z.infer<typeof FunctionSummarySchema>;
export type ModuleSummary = z.infer<typeof ModuleSummarySchema>;
export type ObjectFile = z.infer<typeof ObjectFileSchema>;

export const emptyObjectFile: ObjectFile = Object.freeze({ version: OBJECT_FILE_VERSION, modules: {} });

//==============================================================================
// Building
//==============================================================================

/** Public names and the can-throw status of every public function. */
export function summarizeModule(module: irb.Module): ModuleSummary {
	return {
		publicNames: [...module.publicNames].sort(),
		functions: module.functionDefns
			.filter((defn) => module.publicNames.has(defn.name))
			.map((defn) => ({ name: defn.name, canThrow: functionMayThrow(defn) })),
	};
}

export function addModule(file: ObjectFile, name: string, module: irb.Module): ObjectFile {
	return { version: file.version, modules: { ...file.modules, [name]: summarizeModule(module) } };
}

/** Later files win when two describe the same module. */
export function mergeObjectFiles(files: readonly ObjectFile[]): ObjectFile {
	const modules: Record<string, ModuleSummary> = {};
	for (const file of files) Object.assign(modules, file.modules);
	return { version: OBJECT_FILE_VERSION, modules };
}

//==============================================================================
// Encoding
//==============================================================================

export function encodeObjectFile(file: ObjectFile): string {
	return JSON.stringify(file, null, "\t") + "\n";
}

export function decodeObjectFile(text: string): ValidationResult<ObjectFile> {
	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (e) {
		const message = e instanceof Error ? e.message : String(e);
		return invalidResult([{ path: "$", message: "Not valid JSON: " + message }]);
	}
	const parsed = ObjectFileSchema.safeParse(raw);
	if (!parsed.success) {
		return invalidResult(zodToValidationErrors(parsed.error));
	}
	return validResult(parsed.data);
}

/** Decode an object file, throwing a ValidationError on bad input. */
export function loadObjectFile(text: string): ObjectFile {
	return unwrapResult(decodeObjectFile(text));
}
