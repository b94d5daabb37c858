/**
 * Interactive transaction manager.
 *
 * Owns every open transaction and is the only component that mutates
 * transaction state. Callers refer to transactions by id.
 */

import {randomUUID} from "node:crypto";
import type {IsolationLevel} from "./adapter.js";
import {
	DEFAULT_TRANSACTION_TIMEOUTS,
	type TransactionTimeouts,
} from "./config.js";
import type {
	CapturedQueryable,
	CapturedTransaction,
	ErrorCapturingDriverAdapter,
} from "./error-capturing.js";
import {
	TransactionClosedError,
	TransactionError,
	TransactionNotFoundError,
	errorMessage,
} from "./errors.js";
import {componentLogger, type Logger} from "./logger.js";
import {err, unwrap, type ErrorHandle} from "./result.js";

// ============================================================================
// Types
// ============================================================================

export type TxStatus = "open" | "committed" | "rolled-back";

export interface TxInfo {
	id: string;
	isolationLevel?: IsolationLevel;
	status: TxStatus;
}

export interface StartTransactionOptions {
	isolationLevel?: IsolationLevel;
	/** Overrides the manager's default maxWait (ms). */
	maxWait?: number;
	/** Overrides the manager's default timeout (ms). */
	timeout?: number;
}

export interface TransactionManagerOptions {
	timeouts?: Partial<TransactionTimeouts>;
	logger?: Logger;
}

type ClosedStatus = "committed" | "rolled-back" | "timed-out";

interface OpenTransaction {
	info: TxInfo;
	transaction: CapturedTransaction;
	timer: ReturnType<typeof setTimeout>;
}

/** How many closed ids are remembered for "already closed" errors. */
const CLOSED_HISTORY = 100;

// ============================================================================
// Manager
// ============================================================================

export class TransactionManager {
	#adapter: ErrorCapturingDriverAdapter;
	#timeouts: TransactionTimeouts;
	#logger: Logger;
	#open = new Map<string, OpenTransaction>();
	#closed = new Map<string, ClosedStatus>();

	constructor(
		adapter: ErrorCapturingDriverAdapter,
		options: TransactionManagerOptions = {},
	) {
		this.#adapter = adapter;
		this.#timeouts = {...DEFAULT_TRANSACTION_TIMEOUTS, ...options.timeouts};
		this.#logger = componentLogger("transaction-manager", options.logger);
	}

	/** Number of open transactions. */
	get size(): number {
		return this.#open.size;
	}

	/**
	 * Start a transaction and return its info.
	 *
	 * Rejects with TransactionError if the backend cannot start one within
	 * maxWait. An open transaction is rolled back once `timeout` elapses.
	 */
	async startTransaction(
		options: StartTransactionOptions = {},
	): Promise<TxInfo> {
		const maxWait = options.maxWait ?? this.#timeouts.maxWait;
		const timeout = options.timeout ?? this.#timeouts.timeout;

		const transaction = await this.#withMaxWait(
			this.#begin(options.isolationLevel),
			maxWait,
		);

		const info: TxInfo = {
			id: randomUUID(),
			isolationLevel: options.isolationLevel,
			status: "open",
		};
		const timer = setTimeout(() => {
			void this.#expire(info.id, timeout);
		}, timeout);
		timer.unref();

		this.#open.set(info.id, {info, transaction, timer});
		this.#logger.debug(
			{txId: info.id, isolationLevel: info.isolationLevel},
			"transaction started",
		);
		return {...info};
	}

	/**
	 * Look up the queryable of an open transaction.
	 *
	 * The queryable stays bound to this transaction: once it commits, rolls
	 * back or times out, its calls fail with TransactionClosedError.
	 *
	 * @param action Label of the operation, used in error messages.
	 */
	async getTransaction(
		txInfoOrId: TxInfo | string,
		action: string,
	): Promise<CapturedQueryable> {
		const id = typeof txInfoOrId === "string" ? txInfoOrId : txInfoOrId.id;
		return this.#guard(this.#lookup(id, action));
	}

	/**
	 * Commit an open transaction. When the commit fails the transaction is
	 * rolled back, and the commit error is rethrown.
	 */
	async commitTransaction(id: string): Promise<void> {
		const entry = this.#take(id, "commit");
		const result = await entry.transaction.commit();
		if (!result.ok) {
			this.#close(entry, "rolled-back");
			const rollback = await entry.transaction.rollback();
			if (!rollback.ok) {
				this.#logFailure(id, "rollback after failed commit", rollback.error);
			}
			unwrap(result, this.#adapter.errorRegistry);
		}
		this.#close(entry, "committed");
		this.#logger.debug({txId: id}, "transaction committed");
	}

	async rollbackTransaction(id: string): Promise<void> {
		const entry = this.#take(id, "rollback");
		const result = await entry.transaction.rollback();
		this.#close(entry, "rolled-back");
		unwrap(result, this.#adapter.errorRegistry);
		this.#logger.debug({txId: id}, "transaction rolled back");
	}

	/**
	 * Roll back every open transaction. Failures are logged.
	 */
	async closeAll(): Promise<void> {
		const entries = Array.from(this.#open.values());
		for (const entry of entries) {
			this.#open.delete(entry.info.id);
			this.#close(entry, "rolled-back");
			const result = await entry.transaction.rollback();
			if (!result.ok) {
				this.#logFailure(entry.info.id, "rollback on close", result.error);
			}
		}
	}

	// ==========================================================================
	// Internals
	// ==========================================================================

	async #begin(isolationLevel?: IsolationLevel): Promise<CapturedTransaction> {
		const registry = this.#adapter.errorRegistry;
		const context = unwrap(await this.#adapter.transactionContext(), registry);
		return unwrap(await context.startTransaction(isolationLevel), registry);
	}

	async #withMaxWait(
		pending: Promise<CapturedTransaction>,
		maxWait: number,
	): Promise<CapturedTransaction> {
		let timer: ReturnType<typeof setTimeout> | undefined;
		let expired = false;
		const deadline = new Promise<never>((_resolve, reject) => {
			timer = setTimeout(() => {
				expired = true;
				reject(
					new TransactionError(
						`Unable to start a transaction in the given time (${maxWait} ms)`,
					),
				);
			}, maxWait);
		});

		try {
			return await Promise.race([pending, deadline]);
		} catch (error) {
			if (expired) {
				// The backend may still hand us a transaction; nobody owns it.
				void pending.then(
					(transaction) => this.#discard(transaction),
					(lateError: unknown) =>
						this.#logger.debug(
							{err: lateError},
							"late transaction start failed",
						),
				);
			}
			throw error;
		} finally {
			clearTimeout(timer);
		}
	}

	async #discard(transaction: CapturedTransaction): Promise<void> {
		const result = await transaction.rollback();
		if (!result.ok) {
			this.#logFailure("(unassigned)", "rollback of late transaction", result.error);
		}
	}

	async #expire(id: string, timeout: number): Promise<void> {
		const entry = this.#open.get(id);
		if (!entry) return;
		this.#open.delete(id);
		this.#close(entry, "timed-out");
		this.#logger.warn({txId: id, timeout}, "transaction timed out");
		const result = await entry.transaction.rollback();
		if (!result.ok) {
			this.#logFailure(id, "rollback after timeout", result.error);
		}
	}

	#guard(entry: OpenTransaction): CapturedQueryable {
		const {info, transaction} = entry;
		const registry = this.#adapter.errorRegistry;
		const closed = (action: string) => {
			const status = this.#closed.get(info.id) ?? "rolled-back";
			return err<never>(
				registry.register(new TransactionClosedError(info.id, status, action)),
			);
		};
		return {
			provider: transaction.provider,
			adapterName: transaction.adapterName,
			capabilities: transaction.capabilities,
			queryRaw: async (query) =>
				this.#open.get(info.id) === entry
					? transaction.queryRaw(query)
					: closed("query"),
			executeRaw: async (query) =>
				this.#open.get(info.id) === entry
					? transaction.executeRaw(query)
					: closed("execute"),
		};
	}

	#lookup(id: string, action: string): OpenTransaction {
		const entry = this.#open.get(id);
		if (entry) return entry;
		const closed = this.#closed.get(id);
		if (closed) {
			throw new TransactionClosedError(id, closed, action);
		}
		throw new TransactionNotFoundError(id);
	}

	#take(id: string, action: string): OpenTransaction {
		const entry = this.#lookup(id, action);
		this.#open.delete(id);
		clearTimeout(entry.timer);
		return entry;
	}

	#close(entry: OpenTransaction, status: ClosedStatus): void {
		clearTimeout(entry.timer);
		entry.info.status = status === "committed" ? "committed" : "rolled-back";
		this.#closed.set(entry.info.id, status);
		if (this.#closed.size > CLOSED_HISTORY) {
			const oldest = this.#closed.keys().next();
			if (!oldest.done) this.#closed.delete(oldest.value);
		}
	}

	#logFailure(
		id: string,
		operation: string,
		handle: ErrorHandle,
	): void {
		const detail = this.#adapter.errorRegistry.consume(handle);
		this.#logger.error(
			{txId: id, err: detail?.error, kind: detail?.kind},
			`${operation} failed: ${detail ? errorMessage(detail.error) : "unknown error"}`,
		);
	}
}
