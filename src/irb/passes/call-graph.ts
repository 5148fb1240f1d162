// SPDX-License-Identifier: MIT
// MetaIR Call Graph
// Strongly connected components of a directed graph (Tarjan)

export type Graph = ReadonlyMap<string, ReadonlySet<string>>;

interface NodeState {
	index: number;
	lowlink: number;
	onStack: boolean;
}

/**
 * Components come out in reverse topological order: every component is
 * listed after all the components it has edges into. Edges to nodes that are
 * not keys of the graph are ignored.
 */
export function stronglyConnectedComponents(graph: Graph): string[][] {
	const states = new Map<string, NodeState>();
	const stack: string[] = [];
	const components: string[][] = [];
	let nextIndex = 0;

	function strongConnect(v: string): NodeState {
		const state: NodeState = { index: nextIndex, lowlink: nextIndex, onStack: true };
		nextIndex++;
		states.set(v, state);
		stack.push(v);

		for (const w of graph.get(v) ?? []) {
			if (!graph.has(w)) continue;
			const seen = states.get(w);
			if (seen === undefined) {
				const child = strongConnect(w);
				state.lowlink = Math.min(state.lowlink, child.lowlink);
			} else if (seen.onStack) {
				state.lowlink = Math.min(state.lowlink, seen.index);
			}
		}

		if (state.lowlink === state.index) {
			const component: string[] = [];
			for (let w = stack.pop(); w !== undefined; w = stack.pop()) {
				const popped = states.get(w);
				if (popped !== undefined) popped.onStack = false;
				component.push(w);
				if (w === v) break;
			}
			components.push(component);
		}
		return state;
	}

	for (const v of graph.keys()) {
		if (!states.has(v)) strongConnect(v);
	}
	return components;
}
