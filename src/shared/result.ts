/**
 * Result<T, E> — explicit error handling for pool operations.
 *
 * Engine operations never throw across their public boundary. Fallible
 * operations return Result and callers narrow on `ok`.
 */

/** Discriminated union for fallible operations -- `ok: true` carries a value, `ok: false` carries an error. */
export type Result<T, E = Error> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

// ── Factories ────────────────────────────────────────────────────────

/** Create a successful Result wrapping the given value. */
export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

/** Create a failed Result wrapping the given error. */
export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

/** Extract the success value or throw the error. Use at system boundaries only. */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (result.ok) return result.value;
	throw result.error instanceof Error ? result.error : new Error(String(result.error));
}

// ── Try wrapper for boundary code ────────────────────────────────────

/**
 * Run an async body and convert anything it throws with `classify`.
 * The body's own `err` results pass through untouched.
 */
export async function tryCatchAsync<T, E>(
	fn: () => Promise<Result<T, E>>,
	classify: (thrown: unknown) => E,
): Promise<Result<T, E>> {
	try {
		return await fn();
	} catch (e) {
		return err(classify(e));
	}
}

/** Synchronous counterpart of {@link tryCatchAsync} for plain values. */
export function tryCatch<T, E>(fn: () => T, classify: (thrown: unknown) => E): Result<T, E> {
	try {
		return ok(fn());
	} catch (e) {
		return err(classify(e));
	}
}
