/**
 * Zero-argument predicate gating a transition.
 * Evaluated at decision time, it may read mutable automaton fields, but should not mutate them.
 */
export type Guard = () => boolean;

/** A single directed edge with its guard. */
export type Edge = {
	from: number;
	to: number;
	guard: Guard;
};

const edgeKey = (from: number, to: number) => `${from}->${to}`;

/**
 * Ordered map from a directed edge `(from, to)` to its guard.
 *
 * Link order is preserved and is what makes the engine's first-match-wins
 * tie-break deterministic. Relinking an existing pair replaces its guard but keeps
 * its original position.
 */
export class TransitionTable {
	#edges = new Map<string, Edge>();

	/** Per-source index derived from `#edges`, rebuilt lazily after a change. */
	#bySource: Map<number, number[]> | null = null;

	link(from: number, to: number, guard: Guard): void {
		this.#edges.set(edgeKey(from, to), { from, to, guard });
		this.#bySource = null;
	}

	has(from: number, to: number): boolean {
		return this.#edges.has(edgeKey(from, to));
	}

	guardOf(from: number, to: number): Guard | undefined {
		return this.#edges.get(edgeKey(from, to))?.guard;
	}

	/** Target ids reachable from `id`, in link order. */
	edgesFrom(id: number): number[] {
		if (!this.#bySource) {
			this.#bySource = new Map();
			for (const { from, to } of this.#edges.values()) {
				const targets = this.#bySource.get(from);
				if (targets) targets.push(to);
				else this.#bySource.set(from, [to]);
			}
		}
		return [...(this.#bySource.get(id) ?? [])];
	}

	/** All edges in link order. */
	edges(): Edge[] {
		return [...this.#edges.values()];
	}

	get size(): number {
		return this.#edges.size;
	}
}
