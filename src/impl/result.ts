/**
 * Tagged results and the error registry.
 *
 * Errors that cross a component boundary lose their structure, so a failed
 * call returns an opaque handle instead; the registry maps the handle back
 * to the original error and its detail.
 */

import {errorMessage, errorProperty, isDatabaseError} from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Opaque reference to an error held by an ErrorRegistry.
 * Handles are created only by a registry.
 */
export class ErrorHandle {
	readonly id: number;

	constructor(id: number) {
		this.id = id;
		Object.freeze(this);
	}
}

export type Result<T> = {ok: true; value: T} | {ok: false; error: ErrorHandle};

export interface ErrorDetail {
	/** DatabaseError code, or "GenericJs" for anything else. */
	kind: string;
	message: string;
	/** Native backend code, when the adapter reported one. */
	backendCode?: string;
	error: unknown;
}

// ============================================================================
// Constructors
// ============================================================================

export function ok<T>(value: T): Result<T> {
	return {ok: true, value};
}

export function err<T>(error: ErrorHandle): Result<T> {
	return {ok: false, error};
}

// ============================================================================
// Registry
// ============================================================================

export class ErrorRegistry {
	#nextId = 1;
	#errors = new Map<number, ErrorDetail>();

	/**
	 * Store an error and return a handle to it.
	 */
	register(error: unknown): ErrorHandle {
		const id = this.#nextId++;
		this.#errors.set(id, describeError(error));
		return new ErrorHandle(id);
	}

	/**
	 * Look up an error without removing it.
	 */
	peek(handle: ErrorHandle): ErrorDetail | undefined {
		return this.#errors.get(handle.id);
	}

	/**
	 * Look up an error and remove it from the registry.
	 */
	consume(handle: ErrorHandle): ErrorDetail | undefined {
		const detail = this.#errors.get(handle.id);
		this.#errors.delete(handle.id);
		return detail;
	}

	/** Number of errors not yet consumed. */
	get size(): number {
		return this.#errors.size;
	}
}

/**
 * Return the value of a result, or throw the error it refers to.
 * The registry entry is consumed either way.
 */
export function unwrap<T>(result: Result<T>, registry: ErrorRegistry): T {
	if (result.ok) {
		return result.value;
	}
	const detail = registry.consume(result.error);
	if (!detail) {
		throw new Error(`Unknown error handle ${result.error.id}`);
	}
	throw detail.error;
}

// ============================================================================
// Helpers
// ============================================================================

function describeError(error: unknown): ErrorDetail {
	return {
		kind: isDatabaseError(error) ? error.code : "GenericJs",
		message: errorMessage(error),
		backendCode: errorProperty(error, "backendCode"),
		error,
	};
}
