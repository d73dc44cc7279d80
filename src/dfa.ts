import { createPubSub } from "@marianmeres/pubsub";
import {
	GraphMismatchError,
	InvalidStateIdError,
	NoLegalMoveError,
	NoOutgoingTransitionError,
	NotStartedError,
	StepLimitExceededError,
	UnknownStateError,
} from "./errors.ts";
import {
	assertSupportedFormat,
	decodeDocument,
	encodeDocument,
	readDocument,
	toPersistedState,
	writeDocument,
	type DFADocument,
	type DFAFormat,
} from "./persistence.ts";
import { StateRegistry } from "./state-registry.ts";
import { TransitionTable, type Edge, type Guard } from "./transition-table.ts";

/**
 * Where the automaton writes its debug trace and warnings.
 * `console` satisfies it, and so does a @marianmeres/clog instance.
 */
export interface Logger {
	debug: (...args: unknown[]) => void;
	log: (...args: unknown[]) => void;
	warn: (...args: unknown[]) => void;
	error: (...args: unknown[]) => void;
}

const defaultLogger: Logger = {
	debug: (...args) => console.debug(...args),
	log: (...args) => console.log(...args),
	warn: (...args) => console.warn(...args),
	error: (...args) => console.error(...args),
};

/** Side effect executed when the automaton moves into a state. */
export type Behavior = () => void;

/**
 * Base shape of every state. Concrete automatons extend it with their own
 * payload fields, which are the only part of a state that gets persisted.
 */
export interface DFAState {
	id: number;
	behavior: Behavior;
}

export type DFAOptions = {
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Custom logger implementing Logger interface (default: console) */
	logger?: Logger;
};

export type LoadOptions = DFAOptions & {
	/** Document encoding (default: "json") */
	format?: DFAFormat;
};

/** Published data sent to subscribers. Both ids are null before `startFrom()`. */
export type PublishedState = {
	current: number | null;
	previous: number | null;
};

export type Unsubscriber = () => void;

/** Constructor signature `load()` and `deserialize()` need to build a fresh instance. */
export type DFAConstructor<TDFA> = new (options?: DFAOptions) => TDFA;

/**
 * A deterministic finite automaton over numerically identified states.
 *
 * Concrete automatons extend this class and implement two definition routines which
 * the constructor calls once, in this order:
 * 1. `defineStates()` - registers every state via `addState()`
 * 2. `defineTransitions()` - links states via `addTransition()`
 *
 * Both run inside the base constructor, before the subclass field initializers,
 * so they must not read subclass fields directly. Guards and behaviors are closures
 * and may read them lazily.
 *
 * Execution is synchronous. When several guards from the current state hold at once,
 * `step()` takes the first one in definition order.
 *
 * @template TState - State type, including its payload fields
 *
 * @example
 * ```typescript
 * interface Light extends DFAState { label: string }
 *
 * class Switch extends DFA<Light> {
 *   powered = false;
 *   protected defineStates() {
 *     this.addState({ id: 0, label: "off", behavior: () => {} });
 *     this.addState({ id: 1, label: "on", behavior: () => console.log("on") });
 *   }
 *   protected defineTransitions() {
 *     this.addTransition(0, 1, () => this.powered);
 *     this.addTransition(1, 0, () => !this.powered);
 *   }
 * }
 *
 * const sw = new Switch();
 * sw.startFrom(0);
 * sw.powered = true;
 * sw.step(); // true, now in state 1
 * ```
 */
export abstract class DFA<TState extends DFAState = DFAState> {
	#registry = new StateRegistry<TState>();

	#transitions = new TransitionTable();

	#currentId: number | null = null;

	#previousId: number | null = null;

	/** Internal pub sub */
	#pubsub = createPubSub();

	#logger: Logger;

	#debug: boolean;

	constructor(options: DFAOptions = {}) {
		this.#debug = options.debug ?? false;
		this.#logger = options.logger ?? defaultLogger;
		this.defineStates();
		this.defineTransitions();
		// prettier-ignore
		this.#debugLog(`DFA created with ${this.#registry.size} states and ${this.#transitions.size} transitions`);
	}

	/** Registers all states. Called once by the constructor. */
	protected abstract defineStates(): void;

	/** Links the already registered states. Called once by the constructor, after `defineStates()`. */
	protected abstract defineTransitions(): void;

	#debugLog(...args: unknown[]): void {
		if (this.#debug) {
			this.#logger.debug("[DFA]", ...args);
		}
	}

	get debug(): boolean {
		return this.#debug;
	}

	get logger(): Logger {
		return this.#logger;
	}

	/** Current state id, or `null` before `startFrom()`. */
	get currentId(): number | null {
		return this.#currentId;
	}

	/**
	 * The current state object.
	 * @throws NotStartedError before `startFrom()`
	 */
	get currentState(): TState {
		return this.#registry.get(this.#requireCurrent("read the current state"));
	}

	/** All states ordered by id. Restartable. */
	get states(): Iterable<TState> {
		return this.#registry.all();
	}

	/**
	 * Returns the state registered under `id`.
	 * @throws StateNotFoundError
	 */
	getState(id: number): TState {
		return this.#registry.get(id);
	}

	/** All transitions in definition order. */
	get transitions(): Edge[] {
		return this.#transitions.edges();
	}

	is(id: number | TState): boolean {
		return this.#currentId !== null && this.#currentId === idOf(id);
	}

	#requireCurrent(operation: string): number {
		if (this.#currentId === null) {
			throw new NotStartedError(operation);
		}
		return this.#currentId;
	}

	#notify() {
		this.#pubsub.publish("change", this.#getNotifyData());
	}

	#getNotifyData(): PublishedState {
		return { current: this.#currentId, previous: this.#previousId };
	}

	/**
	 * Registers a state, overwriting any state with the same id.
	 * In the two argument form, `id` is assigned to the state first.
	 *
	 * @throws InvalidStateIdError if the id is not a non-negative integer
	 */
	protected addState(state: TState): TState;
	protected addState(id: number, state: TState): TState;
	protected addState(idOrState: number | TState, maybeState?: TState): TState {
		let state: TState;
		if (typeof idOrState === "number") {
			if (!maybeState) {
				throw new TypeError("addState(id, state) requires a state");
			}
			assertStateId(idOrState);
			state = maybeState;
			state.id = idOrState;
		} else {
			state = idOrState;
			assertStateId(state.id);
		}
		this.#registry.register(state);
		this.#debugLog(`state ${state.id} registered`);
		return state;
	}

	/**
	 * Links `from` to `to`, replacing the guard of an existing identical link.
	 * Without a guard the transition is unconditional.
	 *
	 * @throws UnknownStateError if either end is not registered
	 */
	protected addTransition(
		from: number | TState,
		to: number | TState,
		guard: Guard = () => true
	): void {
		const fromId = idOf(from);
		const toId = idOf(to);
		for (const id of [fromId, toId]) {
			if (!this.#registry.has(id)) {
				throw new UnknownStateError(id, `transition ${fromId} -> ${toId}`);
			}
		}
		this.#transitions.link(fromId, toId, guard);
		this.#debugLog(`transition ${fromId} -> ${toId} linked`);
	}

	/**
	 * Sets the current state. No behavior is invoked, entering the start state
	 * is not a move. Subscribers are notified.
	 *
	 * @throws UnknownStateError if `id` is not registered
	 */
	startFrom(id: number | TState): this {
		const startId = idOf(id);
		if (!this.#registry.has(startId)) {
			throw new UnknownStateError(startId, "startFrom");
		}
		this.#debugLog(`startFrom(${startId})`);
		this.#previousId = null;
		this.#currentId = startId;
		this.#notify();
		return this;
	}

	/**
	 * Checks whether a transition from the current state to `id` exists and its
	 * guard currently holds. Does not modify the automaton. Errors thrown by the
	 * guard propagate unchanged.
	 *
	 * @throws NotStartedError before `startFrom()`
	 */
	canMoveTo(id: number | TState): boolean {
		const current = this.#requireCurrent("check a move");
		const toId = idOf(id);
		const guard = this.#transitions.guardOf(current, toId);
		const result = guard !== undefined && guard();
		this.#debugLog(`canMoveTo(${toId}) from ${current} -> ${result}`);
		return result;
	}

	/**
	 * Moves to `id` if `canMoveTo(id)` holds, then invokes the behavior of the new
	 * state exactly once and notifies subscribers.
	 *
	 * @returns `true` on success, `false` (without any change) otherwise
	 * @throws NotStartedError before `startFrom()`
	 *
	 * @example
	 * ```typescript
	 * if (!dfa.moveTo(2)) {
	 *   console.log("not allowed right now");
	 * }
	 * ```
	 */
	moveTo(id: number | TState): boolean {
		if (!this.canMoveTo(id)) {
			return false;
		}
		this.#advance(idOf(id));
		return true;
	}

	/** Performs an already checked move: the guard is not evaluated again. */
	#advance(toId: number): void {
		this.#debugLog(`move: ${this.#currentId} -> ${toId}`);
		this.#previousId = this.#currentId;
		this.#currentId = toId;
		this.#registry.get(toId).behavior();
		this.#notify();
	}

	/**
	 * Target ids reachable from `from` (default: the current state), in
	 * definition order. Guards are not evaluated.
	 *
	 * @throws NotStartedError if `from` is omitted before `startFrom()`
	 */
	nextCandidates(from?: number | TState): number[] {
		const fromId =
			from === undefined ? this.#requireCurrent("list candidates") : idOf(from);
		return this.#transitions.edgesFrom(fromId);
	}

	/**
	 * Takes the first outgoing transition (in definition order) whose guard holds.
	 *
	 * A position without any legal move is a normal outcome and returns `false`.
	 * In assert mode it throws instead.
	 *
	 * @param assert - If true, throws when no move is possible (default: false)
	 * @returns `true` if a move was made
	 * @throws NoOutgoingTransitionError in assert mode, when the current state has no outgoing edge
	 * @throws NoLegalMoveError in assert mode, when no candidate guard holds
	 */
	step(assert = false): boolean {
		const current = this.#requireCurrent("step");
		const candidates = this.nextCandidates();
		this.#debugLog(`step() from ${current}, candidates [${candidates}]`);

		if (!candidates.length) {
			if (assert) throw new NoOutgoingTransitionError(current);
			return false;
		}

		for (const candidate of candidates) {
			if (this.canMoveTo(candidate)) {
				this.#advance(candidate);
				return true;
			}
		}

		this.#debugLog(`step() from ${current} failed: no guard holds`);
		if (assert) throw new NoLegalMoveError(current, candidates);
		return false;
	}

	/**
	 * Steps until the current state is `target`.
	 *
	 * @returns The number of moves made (0 if already there)
	 * @throws NoOutgoingTransitionError | NoLegalMoveError if stuck before reaching `target`
	 * @throws StepLimitExceededError after `maxSteps` moves
	 */
	runUntil(target: number | TState, maxSteps = 1000): number {
		const targetId = idOf(target);
		if (!this.#registry.has(targetId)) {
			throw new UnknownStateError(targetId, "runUntil");
		}
		this.#requireCurrent("run");
		let moves = 0;
		while (this.#currentId !== targetId) {
			if (moves >= maxSteps) {
				throw new StepLimitExceededError(targetId, maxSteps);
			}
			this.step(true);
			moves++;
		}
		return moves;
	}

	/**
	 * Subscribes to position changes. The callback is invoked immediately with the
	 * present position and after every `startFrom()` and successful move (once the
	 * entered state's behavior has run).
	 *
	 * @returns Unsubscriber function to stop receiving updates
	 */
	subscribe(cb: (data: PublishedState) => void): Unsubscriber {
		this.#debugLog("subscribe() called");
		const unsub = this.#pubsub.subscribe("change", cb);
		cb(this.#getNotifyData());
		return unsub;
	}

	/**
	 * Mermaid stateDiagram-v2 rendering of the graph. States are named `s<id>`;
	 * the current state, if any, is marked as the diagram's entry point.
	 *
	 * @example
	 * ```typescript
	 * console.log(dfa.toMermaid());
	 * // stateDiagram-v2
	 * //     [*] --> s0
	 * //     s0 --> s1
	 * ```
	 */
	toMermaid(): string {
		let mermaid = "stateDiagram-v2\n";
		if (this.#currentId !== null) {
			mermaid += `    [*] --> s${this.#currentId}\n`;
		}
		const linked = new Set<number>();
		for (const { from, to } of this.#transitions.edges()) {
			linked.add(from).add(to);
			mermaid += `    s${from} --> s${to}\n`;
		}
		// isolated states
		for (const id of this.#registry.ids()) {
			if (!linked.has(id) && id !== this.#currentId) {
				mermaid += `    s${id}\n`;
			}
		}
		return mermaid;
	}

	/** The persisted form: ordered state payloads and the current id. */
	toDocument(): DFADocument {
		return {
			states: [...this.#registry.all()].map(toPersistedState),
			current_id: this.#currentId,
		};
	}

	/**
	 * Encodes the automaton's states and current position.
	 * @throws UnsupportedFormatError | SerializationFailureError
	 */
	serialize(format: DFAFormat = "json"): string {
		return encodeDocument(this.toDocument(), format);
	}

	/**
	 * Writes the encoded automaton to a file.
	 * @throws UnsupportedFormatError | SerializationFailureError
	 */
	async save(path: string, format: DFAFormat = "json"): Promise<void> {
		this.#debugLog(`save("${path}")`);
		// encoded up front, a failure leaves the previous file untouched
		const text = this.serialize(format);
		await writeDocument(path, text);
	}

	/**
	 * Restores an automaton from an encoded document. Must be called on the concrete
	 * subclass (`MyDfa.deserialize(text)`): a fresh instance runs its own definitions,
	 * so transitions, guards and behaviors are those of a natively built automaton,
	 * while the payload fields and the current position come from the document.
	 *
	 * Persisted states the fresh instance does not define are dropped with a warning.
	 *
	 * @throws GraphMismatchError if the persisted current id is not defined anymore
	 * @throws UnsupportedFormatError | SerializationFailureError
	 */
	static deserialize<TDFA extends DFA<DFAState>>(
		this: DFAConstructor<TDFA>,
		text: string,
		options: LoadOptions = {}
	): TDFA {
		const { format = "json", ...dfaOptions } = options;
		return DFA.#revive(this, decodeDocument(text, format), dfaOptions);
	}

	/**
	 * Reads and restores an automaton from a file. See `deserialize()`.
	 *
	 * @example
	 * ```typescript
	 * await dfa.save("/tmp/dfa.json");
	 * const restored = await MyDfa.load("/tmp/dfa.json");
	 * restored.currentId === dfa.currentId; // true
	 * ```
	 */
	static async load<TDFA extends DFA<DFAState>>(
		this: DFAConstructor<TDFA>,
		path: string,
		options: LoadOptions = {}
	): Promise<TDFA> {
		const { format = "json", ...dfaOptions } = options;
		assertSupportedFormat(format);
		const text = await readDocument(path);
		return DFA.#revive(this, decodeDocument(text, format), dfaOptions);
	}

	static #revive<TDFA extends DFA<DFAState>>(
		ctor: DFAConstructor<TDFA>,
		document: DFADocument,
		options: DFAOptions
	): TDFA {
		const dfa = new ctor(options);
		dfa.#restore(document);
		return dfa;
	}

	#restore(document: DFADocument): void {
		const current = document.current_id;
		if (current !== null && !this.#registry.has(current)) {
			throw new GraphMismatchError(current, this.#registry.ids());
		}

		for (const persisted of document.states) {
			if (!this.#registry.has(persisted.id)) {
				// prettier-ignore
				this.#logger.warn(`[DFA] Dropping persisted state ${persisted.id}: not defined by the automaton`);
				continue;
			}
			const { behavior: _behavior, ...fields } = persisted;
			Object.assign(this.#registry.get(persisted.id), fields);
		}

		this.#previousId = null;
		this.#currentId = current;
		// prettier-ignore
		this.#debugLog(`restored ${document.states.length} states, current ${current}`);
	}
}

function assertStateId(id: number): void {
	if (!Number.isInteger(id) || id < 0) {
		throw new InvalidStateIdError(id);
	}
}

function idOf(state: number | { id: number }): number {
	return typeof state === "number" ? state : state.id;
}
