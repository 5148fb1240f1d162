// SPDX-License-Identifier: MIT
// MetaIR Writer
// Indentation-aware text sink used by the textual renderings of both IR stages

const INDENT = "  ";

export class Writer {
	private readonly lines: string[] = [];
	private currentIndent = "";
	private pending = "";

	/** Append text to the current line */
	write(text: string): void {
		this.pending += text;
	}

	/** Append text and terminate the current line */
	writeln(text = ""): void {
		const line = this.pending + text;
		this.lines.push(line.length > 0 ? this.currentIndent + line : "");
		this.pending = "";
	}

	/** Run `body` with one more level of indentation */
	indent(body: () => void): void {
		const saved = this.currentIndent;
		this.currentIndent = saved + INDENT;
		try {
			body();
		} finally {
			this.currentIndent = saved;
		}
	}

	toString(): string {
		const tail = this.pending.length > 0 ? [this.currentIndent + this.pending] : [];
		return [...this.lines, ...tail].map((line) => line + "\n").join("");
	}
}
