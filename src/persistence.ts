import { open, rename, rm, type FileHandle } from "node:fs/promises";
import { z } from "zod";
import {
	SerializationFailureError,
	UnsupportedFormatError,
} from "./errors.ts";

/** Supported document encodings. */
export type DFAFormat = "json";

export const SUPPORTED_FORMATS: readonly DFAFormat[] = ["json"];

/** A persisted state: its id plus every non-executable payload field. */
export type PersistedState = { id: number } & Record<string, unknown>;

/**
 * The persisted form of an automaton.
 * Contains no transitions and no behaviors, those are re-derived on load.
 */
export type DFADocument = {
	states: PersistedState[];
	current_id: number | null;
};

/** A value JSON carries unchanged: no NaN, Infinity, undefined, Date, bigint... */
export type JsonValue =
	| string
	| number
	| boolean
	| null
	| JsonValue[]
	| { [key: string]: JsonValue };

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
	z.union([
		z.string(),
		z.number().finite(),
		z.boolean(),
		z.null(),
		z.array(jsonValueSchema),
		z.record(jsonValueSchema),
	])
);

const documentSchema = z.object({
	states: z.array(
		z.object({ id: z.number().int().nonnegative() }).catchall(jsonValueSchema)
	),
	current_id: z.number().int().nonnegative().nullable(),
});

/** Path and message of the first issue, e.g. `"states.0.amount": Invalid input`. */
function describeIssue(error: z.ZodError): string {
	const issue = error.issues[0];
	const where = issue?.path.join(".") || "(root)";
	return `"${where}": ${issue?.message ?? "unknown issue"}`;
}

/**
 * Throws `UnsupportedFormatError` unless `format` is one of `SUPPORTED_FORMATS`.
 * Accepts any string, as untyped callers may pass anything.
 */
export function assertSupportedFormat(
	format: string
): asserts format is DFAFormat {
	if (!SUPPORTED_FORMATS.some((f) => f === format)) {
		throw new UnsupportedFormatError(format);
	}
}

/**
 * Copies the data fields of a state. The `behavior` routine and any other
 * function valued field are left out. `id` always comes first.
 */
export function toPersistedState(state: { id: number }): PersistedState {
	const fields: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(state)) {
		if (key === "behavior" || typeof value === "function") continue;
		fields[key] = value;
	}
	return { id: state.id, ...fields };
}

/**
 * Encodes a document. Payload values that would not come back identical after
 * decoding are rejected.
 * @throws SerializationFailureError
 */
export function encodeDocument(document: DFADocument, format: DFAFormat): string {
	assertSupportedFormat(format);
	const checked = documentSchema.safeParse(document);
	if (!checked.success) {
		throw new SerializationFailureError(
			`Unable to encode document, unsupported value at ${describeIssue(checked.error)}`,
			checked.error
		);
	}
	try {
		return JSON.stringify(document, null, "\t");
	} catch (e) {
		throw new SerializationFailureError(
			`Unable to encode document: ${errorMessage(e)}`,
			e
		);
	}
}

/**
 * Parses and validates a document.
 * @throws SerializationFailureError if the text is not a valid document
 */
export function decodeDocument(text: string, format: DFAFormat): DFADocument {
	assertSupportedFormat(format);
	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (e) {
		throw new SerializationFailureError(
			`Unable to parse document: ${errorMessage(e)}`,
			e
		);
	}
	const parsed = documentSchema.safeParse(raw);
	if (!parsed.success) {
		throw new SerializationFailureError(
			`Invalid document at ${describeIssue(parsed.error)}`,
			parsed.error
		);
	}
	return parsed.data;
}

/**
 * Writes `text` to a sibling temporary file, then renames it over `path`, so an
 * existing document is only replaced by a complete one. The handle is closed on
 * every exit path and the temporary file removed on failure.
 */
export async function writeDocument(path: string, text: string): Promise<void> {
	const tmp = `${path}.${process.pid}.tmp`;
	let handle: FileHandle | undefined;
	try {
		handle = await open(tmp, "w");
		await handle.writeFile(text, "utf8");
		await handle.close();
		handle = undefined;
		await rename(tmp, path);
	} catch (e) {
		await handle?.close();
		await rm(tmp, { force: true });
		throw new SerializationFailureError(
			`Unable to write "${path}": ${errorMessage(e)}`,
			e
		);
	}
}

export async function readDocument(path: string): Promise<string> {
	let handle: FileHandle | undefined;
	try {
		handle = await open(path, "r");
		return await handle.readFile("utf8");
	} catch (e) {
		throw new SerializationFailureError(
			`Unable to read "${path}": ${errorMessage(e)}`,
			e
		);
	} finally {
		await handle?.close();
	}
}

function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}
