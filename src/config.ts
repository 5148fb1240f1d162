// SPDX-License-Identifier: MIT
// MetaIR Pipeline Configuration
// Two-phase loading: Zod safeParse for structure, then conversion to ValidationResult

import { z } from "zod/v4";
import {
	invalidResult,
	unwrapResult,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "./errors.js";

//==============================================================================
// Schema
//==============================================================================

export const LogLevelSchema = z.enum(["silent", "error", "warn", "info", "debug"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const PipelineConfigSchema = z.object({
	logLevel: LogLevelSchema.default("warn"),
	/** Append node annotations (types, source branches) to rendered IR */
	verbose: z.boolean().default(false),
	/** Reject return/raise statements that are not last in their sequence */
	verifyTerminatorPosition: z.boolean().default(false),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

//==============================================================================
// Zod-to-ValidationError Conversion
//==============================================================================

export function zodToValidationErrors(error: z.ZodError): ValidationError[] {
	return error.issues.map(issue => ({
		path: issue.path.map(String).join(".") || "$",
		message: issue.message,
	}));
}

//==============================================================================
// Loading
//==============================================================================

export function parseConfig(raw: unknown): ValidationResult<PipelineConfig> {
	const parsed = PipelineConfigSchema.safeParse(raw);
	if (!parsed.success) {
		return invalidResult<PipelineConfig>(zodToValidationErrors(parsed.error));
	}
	return validResult(parsed.data);
}

/**
 * Parse a configuration object, throwing a ValidationError on bad input.
 */
export function loadConfig(raw: unknown = {}): PipelineConfig {
	return unwrapResult(parseConfig(raw));
}

export const defaultConfig: PipelineConfig = loadConfig();

const TRUTHY = new Set(["1", "true", "yes", "on"]);
const FALSY = new Set(["0", "false", "no", "off", ""]);

function envFlag(name: string, value: string | undefined): boolean | string | undefined {
	if (value === undefined) return undefined;
	const normalized = value.trim().toLowerCase();
	if (TRUTHY.has(normalized)) return true;
	if (FALSY.has(normalized)) return false;
	// Left as a string so the schema reports it against the right key
	return name + "=" + value;
}

/**
 * Read configuration from environment variables:
 * METAIR_LOG_LEVEL, METAIR_VERBOSE and METAIR_VERIFY_TERMINATORS.
 */
export function configFromEnv(
	env: Record<string, string | undefined> = process.env,
): ValidationResult<PipelineConfig> {
	return parseConfig({
		logLevel: env.METAIR_LOG_LEVEL,
		verbose: envFlag("METAIR_VERBOSE", env.METAIR_VERBOSE),
		verifyTerminatorPosition: envFlag("METAIR_VERIFY_TERMINATORS", env.METAIR_VERIFY_TERMINATORS),
	});
}
