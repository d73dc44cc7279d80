/**
 * @module
 *
 * A typed, synchronous deterministic finite automaton (DFA) engine.
 *
 * States are identified by non-negative integers and carry a behavior routine run on
 * every move into them. Directed edges carry boolean guards. The automaton's states
 * and current position can be persisted and restored; guards and behaviors are never
 * persisted, they are re-derived from the automaton's own definitions on load.
 *
 * @example Basic usage
 * ```typescript
 * import { DFA, type DFAState } from "dfa-engine";
 *
 * class Parity extends DFA<DFAState> {
 *   value = 0;
 *   protected defineStates() {
 *     for (const id of [0, 1, 2]) this.addState({ id, behavior: () => {} });
 *   }
 *   protected defineTransitions() {
 *     this.addTransition(0, 1, () => this.value % 2 === 0);
 *     this.addTransition(0, 2, () => this.value % 2 !== 0);
 *   }
 * }
 *
 * const dfa = new Parity().startFrom(0);
 * dfa.value = 7;
 * dfa.step(); // → state 2
 * ```
 *
 * @example Persistence
 * ```typescript
 * await dfa.save("/tmp/parity.json");
 * const restored = await Parity.load("/tmp/parity.json");
 * ```
 */

export * from "./dfa.ts";
export * from "./errors.ts";
export * from "./persistence.ts";
export * from "./state-registry.ts";
export * from "./transition-table.ts";
