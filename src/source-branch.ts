// SPDX-License-Identifier: MIT
// MetaIR Source Branches
// Coverage tokens attached to statements and match cases. Carried, never read.

export interface SourceBranch {
	readonly fileName: string;
	/** Line the branch starts from; -1 for function entry */
	readonly sourceLine: number;
	/** Line the branch jumps to; -1 for function exit */
	readonly destLine: number;
}

export function sourceBranch(
	fileName: string,
	sourceLine: number,
	destLine: number,
): SourceBranch {
	return Object.freeze({ fileName, sourceLine, destLine });
}

export function formatSourceBranch(branch: SourceBranch): string {
	return branch.fileName + ":" + String(branch.sourceLine) + "->" + String(branch.destLine);
}
