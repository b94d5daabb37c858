/**
 * Recording and replay of query results.
 *
 * A recorder sits in front of a live adapter and stores every read outcome
 * under a key built from the SQL with its arguments inlined. A replayer
 * answers the same reads from that store without any backend, which makes
 * benchmarks deterministic and I/O free.
 *
 * Only reads are recorded. Writes, scripts and transactions fail fast in
 * both modes.
 */

import type {
	AdapterDescriptor,
	Provider,
	ResultSet,
	SqlQuery,
} from "./adapter.js";
import type {ErrorCapturingDriverAdapter} from "./error-capturing.js";
import {NotRecordedError, UnsupportedCapabilityError} from "./errors.js";
import {ErrorRegistry, err, ok, type Result} from "./result.js";
import {placeholder, stringifyArg} from "./sql.js";

// ============================================================================
// Store
// ============================================================================

export type RecordedOutcome =
	| {ok: true; value: ResultSet}
	| {ok: false; error: unknown};

export class Recordings {
	readonly descriptor: AdapterDescriptor;
	#entries = new Map<string, RecordedOutcome>();

	constructor(descriptor: AdapterDescriptor) {
		this.descriptor = descriptor;
	}

	get(key: string): RecordedOutcome | undefined {
		return this.#entries.get(key);
	}

	set(key: string, outcome: RecordedOutcome): void {
		this.#entries.set(key, outcome);
	}

	has(key: string): boolean {
		return this.#entries.has(key);
	}

	keys(): string[] {
		return Array.from(this.#entries.keys());
	}

	get size(): number {
		return this.#entries.size;
	}
}

export function createRecordings(descriptor: AdapterDescriptor): Recordings {
	return new Recordings({
		provider: descriptor.provider,
		adapterName: descriptor.adapterName,
		capabilities: descriptor.capabilities,
	});
}

/**
 * Key of a query: the SQL with each placeholder replaced, in ascending
 * order, by its JSON-encoded argument.
 *
 * Replacement is textual and hits the first occurrence of each token, so
 * `$1` also matches the prefix of `$10`, and argument text that looks like
 * a later placeholder is substituted again.
 */
export function queryKey(provider: Provider, query: SqlQuery): string {
	let key = query.sql;
	query.args.forEach((arg, i) => {
		const value = stringifyArg(arg);
		// A function replacement keeps `$&` and friends in the value literal
		key = key.replace(placeholder(i + 1, provider), () => value);
	});
	return key;
}

// ============================================================================
// Modes
// ============================================================================

function writeUnsupported(
	registry: ErrorRegistry,
	capability: string,
): Result<never> {
	return err(
		registry.register(
			new UnsupportedCapabilityError(
				capability,
				`${capability} is not available while recording or replaying`,
			),
		),
	);
}

/**
 * Record every read made through a live adapter.
 * Failed reads are stored too, and replay as the same error.
 */
export function recordAdapter(
	adapter: ErrorCapturingDriverAdapter,
	recordings: Recordings,
): ErrorCapturingDriverAdapter {
	const registry = adapter.errorRegistry;
	const recorder: ErrorCapturingDriverAdapter = {
		provider: adapter.provider,
		adapterName: adapter.adapterName,
		capabilities: adapter.capabilities,
		errorRegistry: registry,
		async queryRaw(query) {
			const result = await adapter.queryRaw(query);
			const key = queryKey(adapter.provider, query);
			if (result.ok) {
				recordings.set(key, {ok: true, value: result.value});
			} else {
				recordings.set(key, {ok: false, error: registry.peek(result.error)?.error});
			}
			return result;
		},
		executeRaw: async () => writeUnsupported(registry, "executeRaw"),
		transactionContext: async () =>
			writeUnsupported(registry, "transactionContext"),
		executeScript: async () => writeUnsupported(registry, "executeScript"),
		dispose: () => adapter.dispose(),
	};

	const getConnectionInfo = adapter.getConnectionInfo?.bind(adapter);
	if (getConnectionInfo) {
		recorder.getConnectionInfo = getConnectionInfo;
	}
	return recorder;
}

/**
 * Answer reads from recordings alone. Nothing reaches a backend.
 */
export function replayAdapter(
	recordings: Recordings,
	registry: ErrorRegistry = new ErrorRegistry(),
): ErrorCapturingDriverAdapter {
	const {provider, adapterName, capabilities} = recordings.descriptor;
	return {
		provider,
		adapterName,
		capabilities,
		errorRegistry: registry,
		async queryRaw(query) {
			const key = queryKey(provider, query);
			const outcome = recordings.get(key);
			if (!outcome) {
				return err(registry.register(new NotRecordedError(key)));
			}
			return outcome.ok ? ok(outcome.value) : err(registry.register(outcome.error));
		},
		executeRaw: async () => writeUnsupported(registry, "executeRaw"),
		transactionContext: async () =>
			writeUnsupported(registry, "transactionContext"),
		executeScript: async () => writeUnsupported(registry, "executeScript"),
		dispose: async () => ok(undefined),
	};
}
