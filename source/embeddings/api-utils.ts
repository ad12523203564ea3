/**
 * Shared utilities for API-based embedding providers:
 * retry classification, exponential backoff and batching.
 */

import {isAbortError, throwIfAborted} from '../lib/abort.js';
import {ProviderHttpError} from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Max concurrent API requests */
export const CONCURRENCY = 5;

/** Max retry attempts */
export const MAX_RETRIES = 5;

/** Initial backoff (ms) */
export const INITIAL_BACKOFF_MS = 1000;

/** Maximum backoff (ms) */
export const MAX_BACKOFF_MS = 60000;

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Sleep for a specified duration.
 */
export function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Check if an error is a rate limit error (429 or quota exceeded).
 */
export function isRateLimitError(error: unknown): boolean {
	if (error instanceof ProviderHttpError) {
		return error.status === 429;
	}
	if (error instanceof Error) {
		const msg = error.message.toLowerCase();
		return msg.includes('429') || msg.includes('rate limit') || msg.includes('quota');
	}
	return false;
}

/**
 * Timeouts and dropped connections.
 * fetch() reports network failures as a TypeError("fetch failed").
 */
export function isTransientNetworkError(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}
	if (error.name === 'TimeoutError') {
		return true;
	}
	if (error instanceof TypeError && error.message === 'fetch failed') {
		return true;
	}
	const code = 'code' in error ? error.code : undefined;
	return (
		code === 'ECONNRESET' ||
		code === 'ETIMEDOUT' ||
		code === 'ECONNREFUSED' ||
		code === 'EAI_AGAIN'
	);
}

/**
 * Check if an error should trigger a retry.
 */
export function isRetriableError(error: unknown): boolean {
	if (error instanceof ProviderHttpError) {
		return error.status === 408 || error.status === 429 || error.status >= 500;
	}
	if (isAbortError(error) && !isTransientNetworkError(error)) {
		return false;
	}
	return isRateLimitError(error) || isTransientNetworkError(error);
}

export interface RetryOptions {
	maxRetries?: number;
	initialBackoffMs?: number;
	maxBackoffMs?: number;
	signal?: AbortSignal;
	/** Called before each backoff sleep */
	onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

/**
 * Execute an async function with exponential backoff retry on retriable errors.
 * The last error is rethrown once retries run out or on a non-retriable error.
 */
export async function withRetry<T>(
	fn: () => Promise<T>,
	options: RetryOptions = {},
): Promise<T> {
	const maxRetries = options.maxRetries ?? MAX_RETRIES;
	const maxBackoffMs = options.maxBackoffMs ?? MAX_BACKOFF_MS;
	let backoffMs = options.initialBackoffMs ?? INITIAL_BACKOFF_MS;
	let attempt = 0;

	while (true) {
		throwIfAborted(options.signal);
		try {
			return await fn();
		} catch (error) {
			if (options.signal?.aborted || !isRetriableError(error) || attempt >= maxRetries) {
				throw error;
			}
			attempt++;
			options.onRetry?.(attempt, backoffMs, error);
			await sleep(backoffMs);
			backoffMs = Math.min(backoffMs * 2, maxBackoffMs);
		}
	}
}

/**
 * Split an array into batches of a specified size.
 */
export function chunk<T>(array: T[], size: number): T[][] {
	const batches: T[][] = [];
	for (let i = 0; i < array.length; i += size) {
		batches.push(array.slice(i, i + size));
	}
	return batches;
}
