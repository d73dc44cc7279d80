import type { Logger } from "../../src/dfa.ts";

type Level = "debug" | "log" | "warn" | "error";

/** Logger recording every call's arguments per level. */
export const createLogger = () => {
	const calls: Record<Level, unknown[][]> = {
		debug: [],
		log: [],
		warn: [],
		error: [],
	};
	const logger: Logger = {
		debug: (...args) => calls.debug.push(args),
		log: (...args) => calls.log.push(args),
		warn: (...args) => calls.warn.push(args),
		error: (...args) => calls.error.push(args),
	};
	return { calls, logger };
};
