/**
 * Error-capturing adapter.
 *
 * Decorates a DriverAdapter so that every fallible call resolves to a
 * Result instead of rejecting. Thrown errors are stored in an ErrorRegistry
 * and replaced by a handle.
 */

import type {
	AdapterCapabilities,
	AdapterName,
	ConnectionInfo,
	DriverAdapter,
	IsolationLevel,
	Provider,
	Queryable,
	ResultSet,
	SqlQuery,
	Transaction,
	TransactionContext,
} from "./adapter.js";
import {ErrorRegistry, err, ok, type Result} from "./result.js";

// ============================================================================
// Types
// ============================================================================

export interface CapturedQueryable {
	readonly provider: Provider;
	readonly adapterName: AdapterName;
	readonly capabilities?: AdapterCapabilities;
	queryRaw(query: SqlQuery): Promise<Result<ResultSet>>;
	executeRaw(query: SqlQuery): Promise<Result<number>>;
}

export interface CapturedTransaction extends CapturedQueryable {
	readonly isolationLevel?: IsolationLevel;
	commit(): Promise<Result<void>>;
	rollback(): Promise<Result<void>>;
}

export interface CapturedTransactionContext extends CapturedQueryable {
	startTransaction(
		isolationLevel?: IsolationLevel,
	): Promise<Result<CapturedTransaction>>;
}

export interface ErrorCapturingDriverAdapter extends CapturedQueryable {
	readonly errorRegistry: ErrorRegistry;
	transactionContext(): Promise<Result<CapturedTransactionContext>>;
	executeScript(script: string): Promise<Result<void>>;
	/** Present only when the wrapped adapter reports connection info. */
	getConnectionInfo?(): Result<ConnectionInfo>;
	dispose(): Promise<Result<void>>;
}

// ============================================================================
// Wrapping
// ============================================================================

/**
 * Wrap an adapter for its whole lifetime.
 */
export function bindAdapter(
	adapter: DriverAdapter,
	registry: ErrorRegistry = new ErrorRegistry(),
): ErrorCapturingDriverAdapter {
	const capture = createCapture(registry);
	const getConnectionInfo = adapter.getConnectionInfo?.bind(adapter);

	const bound: ErrorCapturingDriverAdapter = {
		...bindQueryable(adapter, capture),
		errorRegistry: registry,
		transactionContext: () =>
			capture(async () => {
				const context = await adapter.transactionContext();
				return bindTransactionContext(context, capture);
			}),
		executeScript: (script) => capture(() => adapter.executeScript(script)),
		dispose: () => capture(() => adapter.dispose()),
	};

	if (getConnectionInfo) {
		bound.getConnectionInfo = () => captureSync(registry, getConnectionInfo);
	}

	return bound;
}

type Capture = <T>(fn: () => Promise<T>) => Promise<Result<T>>;

function createCapture(registry: ErrorRegistry): Capture {
	return async <T>(fn: () => Promise<T>): Promise<Result<T>> => {
		try {
			return ok(await fn());
		} catch (error) {
			return err(registry.register(error));
		}
	};
}

function captureSync<T>(registry: ErrorRegistry, fn: () => T): Result<T> {
	try {
		return ok(fn());
	} catch (error) {
		return err(registry.register(error));
	}
}

function bindQueryable(
	queryable: Queryable,
	capture: Capture,
): CapturedQueryable {
	return {
		provider: queryable.provider,
		adapterName: queryable.adapterName,
		capabilities: queryable.capabilities,
		queryRaw: (query) => capture(() => queryable.queryRaw(query)),
		executeRaw: (query) => capture(() => queryable.executeRaw(query)),
	};
}

function bindTransactionContext(
	context: TransactionContext,
	capture: Capture,
): CapturedTransactionContext {
	return {
		...bindQueryable(context, capture),
		startTransaction: (isolationLevel) =>
			capture(async () => {
				const tx = await context.startTransaction(isolationLevel);
				return bindTransaction(tx, capture);
			}),
	};
}

function bindTransaction(
	tx: Transaction,
	capture: Capture,
): CapturedTransaction {
	return {
		...bindQueryable(tx, capture),
		isolationLevel: tx.isolationLevel,
		commit: () => capture(() => tx.commit()),
		rollback: () => capture(() => tx.rollback()),
	};
}
