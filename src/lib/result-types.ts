/**
 * Result Type Utilities
 *
 * Re-exports the neverthrow Result/ResultAsync types used across the pipeline
 * so that every step reports failures as values instead of exceptions.
 */

import {
	Result as NeverthrowResult,
	ResultAsync,
	ok as neverthrowOk,
	err as neverthrowErr,
	okAsync,
	errAsync,
} from 'neverthrow';

export type Result<T, E> = NeverthrowResult<T, E>;
export { ResultAsync, okAsync, errAsync };
export const ok = neverthrowOk;
export const err = neverthrowErr;

/**
 * Execute a synchronous function and wrap result in Result type
 *
 * @param fn - Synchronous function to execute
 * @param errorHandler - Function to convert errors to type E
 */
export function trySync<T, E>(
	fn: () => T,
	errorHandler: (error: unknown) => E
): Result<T, E> {
	try {
		return ok(fn());
	} catch (error) {
		return err(errorHandler(error));
	}
}

/**
 * Wrap a promise-returning function as a ResultAsync
 *
 * The function is invoked lazily so synchronous throws are captured too.
 */
export function tryAsync<T, E>(
	fn: () => Promise<T>,
	errorHandler: (error: unknown) => E
): ResultAsync<T, E> {
	return ResultAsync.fromPromise(
		Promise.resolve().then(fn),
		errorHandler
	);
}

/**
 * Describe an unknown thrown value
 */
export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * String `code` carried by a thrown value (Node and opossum errors), if any
 */
export function errorCode(error: unknown): string | undefined {
	if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
		return error.code;
	}
	return undefined;
}

/**
 * Narrow an unknown thrown value to an Error instance when possible
 */
export function asError(error: unknown): Error | undefined {
	return error instanceof Error ? error : undefined;
}
