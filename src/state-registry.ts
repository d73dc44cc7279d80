import { StateNotFoundError } from "./errors.ts";

/**
 * Holds the states of one automaton, indexed by their numeric id.
 *
 * Registering a state whose id is already present silently replaces the previous one.
 * Enumeration via `all()` is always ordered by id, regardless of insertion order.
 *
 * @template TState - State type, identified by its `id`
 */
export class StateRegistry<TState extends { id: number }> {
	#states = new Map<number, TState>();

	/** Inserts the state, or overwrites the one registered under the same id. */
	register(state: TState): void {
		this.#states.set(state.id, state);
	}

	/**
	 * Returns the state registered under `id`.
	 * @throws StateNotFoundError if no such state exists
	 */
	get(id: number): TState {
		const state = this.#states.get(id);
		if (state === undefined) {
			throw new StateNotFoundError(id);
		}
		return state;
	}

	has(id: number): boolean {
		return this.#states.has(id);
	}

	get size(): number {
		return this.#states.size;
	}

	/**
	 * Returns a lazy, restartable sequence of all states sorted by id.
	 * Every iteration takes a fresh ordering, so states registered in between are included.
	 *
	 * @example
	 * ```typescript
	 * const all = registry.all();
	 * [...all].map((s) => s.id); // [0, 1, 2]
	 * [...all].map((s) => s.id); // [0, 1, 2] again
	 * ```
	 */
	all(): Iterable<TState> {
		const states = this.#states;
		return {
			*[Symbol.iterator]() {
				const ids = [...states.keys()].sort((a, b) => a - b);
				for (const id of ids) {
					const state = states.get(id);
					if (state !== undefined) yield state;
				}
			},
		};
	}

	/** Sorted list of registered ids. */
	ids(): number[] {
		return [...this.#states.keys()].sort((a, b) => a - b);
	}
}
