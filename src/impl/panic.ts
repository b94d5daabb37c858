/**
 * Panic bridge.
 *
 * The compiled compiler/interpreter module reports fatal aborts by calling
 * `set_message` on a registry object it finds on globalThis. The bridge
 * routes that call to its current handler, which either raises a PanicError
 * (default) or records the message for a scoped guard.
 *
 * The handler slot has depth one. Guards restore the previous handler on
 * every exit path.
 */

import {PanicError} from "./errors.js";
import {Mutex} from "./mutex.js";

// ============================================================================
// Types
// ============================================================================

export type PanicHandler = (message: string) => void;

/**
 * The object a foreign module calls into when it aborts.
 */
export interface PanicRegistry {
	set_message(message: string): void;
}

export const PANIC_REGISTRY_KEY = "SLUICE_PANIC_REGISTRY";

// ============================================================================
// Bridge
// ============================================================================

export class PanicBridge {
	readonly module: string;
	#handler: PanicHandler;
	#mutex = new Mutex();

	constructor(module: string = "query compiler") {
		this.module = module;
		this.#handler = this.#raise;
	}

	/**
	 * Deliver an abort message to the current handler.
	 */
	report(message: string): void {
		this.#handler(message);
	}

	/**
	 * Install the handler that raises a PanicError on any abort.
	 */
	setupDefaultPanicHandler(): void {
		this.#handler = this.#raise;
	}

	/**
	 * Run fn with a capturing handler in place.
	 *
	 * An ordinary error thrown by fn propagates unchanged once the previous
	 * handler is restored. If fn returns normally but an abort was reported
	 * while it ran, a PanicError is raised after restoration.
	 */
	withLocalPanicHandler<T>(fn: () => T): T {
		const previous = this.#handler;
		let panic: string | undefined;
		this.#handler = (message) => {
			panic = message;
		};

		let result: T;
		try {
			result = fn();
		} finally {
			this.#handler = previous;
		}

		if (panic !== undefined) {
			throw new PanicError(this.module, panic);
		}
		return result;
	}

	/**
	 * Async form of withLocalPanicHandler. Guarded regions are serialized,
	 * so two callers never swap the slot under each other. Async guards
	 * must not be nested on the same bridge.
	 */
	async withLocalPanicHandlerAsync<T>(fn: () => Promise<T>): Promise<T> {
		return this.#mutex.runExclusive(async () => {
			const previous = this.#handler;
			let panic: string | undefined;
			this.#handler = (message) => {
				panic = message;
			};

			let result: T;
			try {
				result = await fn();
			} finally {
				this.#handler = previous;
			}

			if (panic !== undefined) {
				throw new PanicError(this.module, panic);
			}
			return result;
		});
	}

	/**
	 * The registry object handed to the foreign module.
	 */
	get registry(): PanicRegistry {
		return {
			set_message: (message: string) => this.report(message),
		};
	}

	#raise: PanicHandler = (message) => {
		throw new PanicError(this.module, message);
	};
}

// ============================================================================
// Process-wide Default
// ============================================================================

const defaultBridge = new PanicBridge();

export function getDefaultPanicBridge(): PanicBridge {
	return defaultBridge;
}

/**
 * Expose a bridge's registry on globalThis, where the foreign module
 * looks it up.
 */
export function installPanicRegistry(
	bridge: PanicBridge = defaultBridge,
	key: string = PANIC_REGISTRY_KEY,
): void {
	Reflect.set(globalThis, key, bridge.registry);
}

/**
 * Install the raising handler on the default bridge and expose it to the
 * foreign module.
 */
export function setupDefaultPanicHandler(): void {
	defaultBridge.setupDefaultPanicHandler();
	installPanicRegistry(defaultBridge);
}

export function withLocalPanicHandler<T>(fn: () => T): T {
	return defaultBridge.withLocalPanicHandler(fn);
}
