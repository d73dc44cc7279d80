import { DFA, type DFAState } from "../../src/dfa.ts";

export const PARITY = {
	START: 0,
	CHECK: 1,
	EVEN: 2,
	ODD: 3,
	DONE: 4,
} as const;

export interface ParityState extends DFAState {
	label: string;
	visits: number;
}

/**
 * START -> CHECK -+- [even] -> EVEN -+-> DONE
 *                 +- [odd]  -> ODD  -+
 */
export class ParityDFA extends DFA<ParityState> {
	value = 0;

	/** Labels of entered states, in order. */
	entered: string[] = [];

	#enter(): void {
		const state = this.currentState;
		state.visits += 1;
		this.entered.push(state.label);
	}

	protected defineStates(): void {
		const labels = ["start", "check", "even", "odd", "done"];
		labels.forEach((label, id) => {
			this.addState({ id, label, visits: 0, behavior: () => this.#enter() });
		});
	}

	protected defineTransitions(): void {
		this.addTransition(PARITY.START, PARITY.CHECK);
		this.addTransition(PARITY.CHECK, PARITY.EVEN, () => this.value % 2 === 0);
		this.addTransition(PARITY.CHECK, PARITY.ODD, () => this.value % 2 !== 0);
		this.addTransition(PARITY.EVEN, PARITY.DONE);
		this.addTransition(PARITY.ODD, PARITY.DONE);
	}
}
