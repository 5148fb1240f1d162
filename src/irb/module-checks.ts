// SPDX-License-Identifier: MIT
// MetaIR IR-B Module Checks
// Recoverable module-level consistency checks

import { invalidResult, validResult, type ValidationError, type ValidationResult } from "../errors.js";
import type * as ir from "./nodes.js";

/** Names a module defines at its top level */
export function definedNames(module: ir.Module): Set<string> {
	return new Set([
		...module.functionDefns.map((defn) => defn.name),
		...module.customTypes.map((type) => type.name),
	]);
}

/**
 * Every public name must be a function or custom type the module defines.
 * Undefined names are reported in sorted order.
 */
export function checkPublicNames(module: ir.Module): ValidationResult<ir.Module> {
	const defined = definedNames(module);
	const errors: ValidationError[] = [...module.publicNames]
		.filter((name) => !defined.has(name))
		.sort()
		.map((name) => ({
			path: "publicNames." + name,
			message: "Public name is not defined in the module",
			value: name,
		}));
	return errors.length > 0 ? invalidResult(errors) : validResult(module);
}
