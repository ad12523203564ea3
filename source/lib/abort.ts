/**
 * Abort utilities for cooperative cancellation.
 */

function normalizeReason(reason: unknown): string {
	if (reason instanceof Error) {
		return reason.message || 'Cancelled';
	}
	if (typeof reason === 'string' && reason.trim().length > 0) {
		return reason;
	}
	if (reason === undefined || reason === null) {
		return 'Cancelled';
	}
	return String(reason);
}

export function getAbortReason(signal?: AbortSignal): string {
	return normalizeReason(signal?.reason);
}

export function createAbortError(reason?: unknown): Error {
	const error = new Error(normalizeReason(reason));
	error.name = 'AbortError';
	return error;
}

/**
 * Throw an AbortError if the signal has fired.
 * Called between files, never inside a file's delete-then-upsert pair.
 */
export function throwIfAborted(signal?: AbortSignal, context?: string): void {
	if (!signal?.aborted) {
		return;
	}
	const reason = getAbortReason(signal);
	const message = context ? `${context}: ${reason}` : reason;
	throw createAbortError(message);
}

export function isAbortError(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}
	const code = 'code' in error ? error.code : undefined;
	return (
		error.name === 'AbortError' ||
		error.name === 'TimeoutError' ||
		code === 'ABORT_ERR' ||
		code === 'ERR_ABORTED'
	);
}
