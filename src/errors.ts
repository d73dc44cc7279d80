/**
 * Error taxonomy of the DFA engine.
 *
 * Every structural failure is reported as a subclass of `DFAError` carrying a stable
 * string `code`. Errors thrown by caller supplied guards and behaviors are never
 * wrapped and reach the caller unmodified.
 */
export class DFAError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		public readonly details?: Record<string, unknown>,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = this.constructor.name;
	}
}

/** Registry lookup of an id that was never registered. */
export class StateNotFoundError extends DFAError {
	constructor(id: number) {
		super(`State ${id} not found`, "STATE_NOT_FOUND", { id });
	}
}

/** Reference to an unregistered id while starting or defining transitions. */
export class UnknownStateError extends DFAError {
	constructor(id: number, context: string) {
		super(`Unknown state ${id} (${context})`, "UNKNOWN_STATE", { id, context });
	}
}

export class InvalidStateIdError extends DFAError {
	constructor(id: unknown) {
		// prettier-ignore
		super(`Invalid state id "${String(id)}": must be a non-negative integer`, "INVALID_STATE_ID", { id });
	}
}

/** An execution operation was called before `startFrom()`. */
export class NotStartedError extends DFAError {
	constructor(operation: string) {
		// prettier-ignore
		super(`Cannot ${operation}: automaton has no current state (call startFrom() first)`, "NOT_STARTED", { operation });
	}
}

export class NoOutgoingTransitionError extends DFAError {
	constructor(from: number) {
		super(`No outgoing transition from state ${from}`, "NO_OUTGOING_TRANSITION", {
			from,
		});
	}
}

/** Outgoing edges exist, but none of their guards currently holds. */
export class NoLegalMoveError extends DFAError {
	constructor(from: number, candidates: number[]) {
		// prettier-ignore
		super(`No legal move from state ${from} (candidates: ${candidates.join(", ")})`, "NO_LEGAL_MOVE", { from, candidates });
	}
}

export class StepLimitExceededError extends DFAError {
	constructor(target: number, maxSteps: number) {
		// prettier-ignore
		super(`State ${target} not reached within ${maxSteps} steps`, "STEP_LIMIT_EXCEEDED", { target, maxSteps });
	}
}

/**
 * The persisted current id does not exist among the states of the freshly
 * defined graph (the definition changed between save and load).
 */
export class GraphMismatchError extends DFAError {
	constructor(currentId: number, definedIds: number[]) {
		// prettier-ignore
		super(`Persisted current state ${currentId} is not defined by the automaton (defined: ${definedIds.join(", ")})`, "GRAPH_MISMATCH", { currentId, definedIds });
	}
}

export class UnsupportedFormatError extends DFAError {
	constructor(format: string) {
		super(`Unsupported format "${format}"`, "UNSUPPORTED_FORMAT", { format });
	}
}

/** I/O, parse or encoding failure while reading or writing a document. */
export class SerializationFailureError extends DFAError {
	constructor(message: string, cause?: unknown) {
		super(message, "SERIALIZATION_FAILURE", undefined, { cause });
	}
}
