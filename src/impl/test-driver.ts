/**
 * Test adapter for exercising the pipeline without a real database.
 *
 * Answers queries from a callback and records every call in `log`, so tests
 * can assert on the exact sequence of statements and transaction commands.
 */

import type {
	AdapterName,
	ConnectionInfo,
	DriverAdapter,
	IsolationLevel,
	Provider,
	ResultSet,
	SqlQuery,
	Transaction,
	TransactionContext,
} from "./adapter.js";
import {emptyResultSet} from "./sql.js";

// ============================================================================
// Types
// ============================================================================

export interface TestAdapterOptions {
	provider?: Provider;
	adapterName?: AdapterName;
	/** Result of queryRaw; may throw to simulate a backend error. */
	respond?: (query: SqlQuery) => ResultSet;
	/** Result of executeRaw; may throw. */
	affected?: (query: SqlQuery) => number;
	/** When given, the adapter reports connection info. */
	connectionInfo?: ConnectionInfo;
	/**
	 * Milliseconds a query or execute waits before it runs and is logged,
	 * so tests can make queries finish out of order.
	 */
	delay?: (query: SqlQuery) => number;
	/** Milliseconds startTransaction() waits before beginning. */
	startDelay?: number;
	failStart?: unknown;
	failCommit?: unknown;
	failRollback?: unknown;
}

// ============================================================================
// Adapter
// ============================================================================

export class TestAdapter implements DriverAdapter {
	readonly provider: Provider;
	readonly adapterName: AdapterName;
	readonly log: string[] = [];
	getConnectionInfo?: () => ConnectionInfo;
	#options: TestAdapterOptions;
	#nextTx = 1;

	constructor(options: TestAdapterOptions = {}) {
		this.provider = options.provider ?? "sqlite";
		this.adapterName = options.adapterName ?? "better-sqlite3";
		this.#options = options;
		const info = options.connectionInfo;
		if (info) {
			this.getConnectionInfo = () => info;
		}
	}

	async queryRaw(query: SqlQuery): Promise<ResultSet> {
		return this.#query("query", query);
	}

	async executeRaw(query: SqlQuery): Promise<number> {
		return this.#execute("execute", query);
	}

	async executeScript(script: string): Promise<void> {
		this.log.push(`script: ${script}`);
	}

	async transactionContext(): Promise<TransactionContext> {
		return {
			provider: this.provider,
			adapterName: this.adapterName,
			queryRaw: (query) => this.queryRaw(query),
			executeRaw: (query) => this.executeRaw(query),
			startTransaction: (isolationLevel) => this.#start(isolationLevel),
		};
	}

	async dispose(): Promise<void> {
		this.log.push("dispose");
	}

	async #start(isolationLevel?: IsolationLevel): Promise<Transaction> {
		const options = this.#options;
		if (options.startDelay) {
			await new Promise((resolve) => setTimeout(resolve, options.startDelay));
		}
		const name = `tx${this.#nextTx++}`;
		if (options.failStart !== undefined) {
			this.log.push(`${name} BEGIN failed`);
			throw options.failStart;
		}
		this.log.push(
			isolationLevel ? `${name} BEGIN ${isolationLevel}` : `${name} BEGIN`,
		);

		return {
			provider: this.provider,
			adapterName: this.adapterName,
			isolationLevel,
			queryRaw: async (query) => this.#query(`${name} query`, query),
			executeRaw: async (query) => this.#execute(`${name} execute`, query),
			commit: async () => {
				this.log.push(`${name} COMMIT`);
				if (options.failCommit !== undefined) throw options.failCommit;
			},
			rollback: async () => {
				this.log.push(`${name} ROLLBACK`);
				if (options.failRollback !== undefined) throw options.failRollback;
			},
		};
	}

	async #wait(query: SqlQuery): Promise<void> {
		const ms = this.#options.delay?.(query) ?? 0;
		if (ms > 0) {
			await new Promise((resolve) => setTimeout(resolve, ms));
		}
	}

	async #query(label: string, query: SqlQuery): Promise<ResultSet> {
		await this.#wait(query);
		this.log.push(`${label}: ${query.sql}`);
		return this.#options.respond ? this.#options.respond(query) : emptyResultSet();
	}

	async #execute(label: string, query: SqlQuery): Promise<number> {
		await this.#wait(query);
		this.log.push(`${label}: ${query.sql}`);
		return this.#options.affected ? this.#options.affected(query) : 0;
	}
}
