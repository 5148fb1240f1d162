// SPDX-License-Identifier: MIT
// MetaIR Shared Rendering
// Pieces of the textual form common to both IR stages

import type { CustomType } from "./types.js";
import { formatType } from "./types.js";
import type { Writer } from "./writer.js";

/** Single-quoted literal, as names and C++ types appear in rendered IR */
export function quote(text: string): string {
	return "'" + text.replace(/\\/g, "\\\\").replace(/'/g, "\\'") + "'";
}

export function writeCustomType(writer: Writer, type: CustomType): void {
	writer.writeln("class " + type.name + (type.isExceptionClass ? "(Exception)" : "") + ":");
	writer.indent(() => {
		const params = type.argTypes.map((arg) => arg.name + ": " + formatType(arg.exprType));
		writer.writeln("def __init__(" + params.join(", ") + "):");
		writer.indent(() => {
			for (const arg of type.argTypes) {
				writer.writeln("self." + arg.name + " = " + arg.name);
			}
			if (type.exceptionMessage !== undefined) {
				writer.writeln("self.message = " + quote(type.exceptionMessage));
			}
			if (type.argTypes.length === 0 && type.exceptionMessage === undefined) {
				writer.writeln("pass");
			}
		});
	});
	writer.writeln();
}

/** End the current line, with a trailing annotation when verbose */
export function endLine(writer: Writer, verbose: boolean, annotation: () => string): void {
	if (verbose) {
		writer.writeln("  # " + annotation());
	} else {
		writer.writeln();
	}
}
