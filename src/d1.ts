/**
 * Cloudflare D1 adapter
 *
 * Provides a DriverAdapter over a D1 database binding. D1 is reached only
 * through its binding, so this adapter takes the binding object instead of
 * a URL and needs no library of its own.
 */

import type {
	AdapterCapabilities,
	ConnectionInfo,
	DriverAdapter,
	IsolationLevel,
	ResultSet,
	SqlQuery,
	Transaction,
	TransactionContext,
} from "./impl/adapter.js";
import {convertSQLiteError} from "./impl/backend-errors.js";
import type {
	D1DatabaseLike,
	D1PreparedStatement,
	D1Result,
} from "./impl/config.js";
import {componentLogger, type Logger} from "./impl/logger.js";
import {
	SQLITE_MAX_BIND_VALUES,
	checkIsolationLevel,
	inferColumnTypes,
	splitStatements,
	toSQLiteArgs,
} from "./impl/sql.js";

export type {D1DatabaseLike, D1PreparedStatement, D1Result};

const SUPPORTED_ISOLATION_LEVELS: readonly IsolationLevel[] = ["Serializable"];

function isRow(value: unknown): value is unknown[] {
	return Array.isArray(value);
}

/**
 * Options for the D1 adapter.
 */
export interface D1Options {
	capabilities?: AdapterCapabilities;
	logger?: Logger;
}

/**
 * SQLite adapter over a Cloudflare D1 binding.
 *
 * D1 has no interactive transactions. startTransaction() logs a warning
 * and returns a pass-through transaction: its queries run immediately and
 * its commit and rollback do nothing.
 *
 * @example
 * import D1Adapter from "sluice/d1";
 *
 * export default {
 *   async fetch(request, env) {
 *     const adapter = new D1Adapter(env.DB);
 *   },
 * };
 */
export default class D1Adapter implements DriverAdapter, TransactionContext {
	readonly provider = "sqlite";
	readonly adapterName = "d1";
	readonly capabilities: AdapterCapabilities;
	#db: D1DatabaseLike;
	#logger: Logger;

	constructor(binding: D1DatabaseLike, options: D1Options = {}) {
		this.#db = binding;
		this.capabilities = options.capabilities ?? {};
		this.#logger = componentLogger("d1", options.logger);
	}

	#handleError(error: unknown, sql?: string): never {
		throw convertSQLiteError(error, sql);
	}

	#prepare(query: SqlQuery): D1PreparedStatement {
		return this.#db.prepare(query.sql).bind(...toSQLiteArgs(query.args));
	}

	async queryRaw(query: SqlQuery): Promise<ResultSet> {
		try {
			const [columnNames, ...rest] = await this.#prepare(query).raw({
				columnNames: true,
			});
			const rows = rest.filter(isRow);
			return {
				columnNames,
				columnTypes: inferColumnTypes(columnNames.length, rows),
				rows,
			};
		} catch (error) {
			return this.#handleError(error, query.sql);
		}
	}

	async executeRaw(query: SqlQuery): Promise<number> {
		try {
			const result = await this.#prepare(query).run();
			return result.meta?.changes ?? 0;
		} catch (error) {
			return this.#handleError(error, query.sql);
		}
	}

	/**
	 * Run several statements in one D1 batch, which D1 applies atomically.
	 * An empty batch resolves to [] without reaching D1, which rejects
	 * zero-length batches.
	 */
	async batch(queries: SqlQuery[]): Promise<D1Result[]> {
		if (queries.length === 0) {
			return [];
		}
		try {
			return await this.#db.batch(queries.map((query) => this.#prepare(query)));
		} catch (error) {
			return this.#handleError(error);
		}
	}

	async executeScript(script: string): Promise<void> {
		await this.batch(splitStatements(script).map((sql) => ({sql, args: []})));
	}

	async transactionContext(): Promise<TransactionContext> {
		return this;
	}

	async startTransaction(
		isolationLevel?: IsolationLevel,
	): Promise<Transaction> {
		checkIsolationLevel(
			isolationLevel,
			SUPPORTED_ISOLATION_LEVELS,
			this.adapterName,
		);
		this.#logger.warn(
			"D1 does not support transactions; queries will run without atomicity",
		);
		return {
			provider: this.provider,
			adapterName: this.adapterName,
			capabilities: this.capabilities,
			isolationLevel,
			queryRaw: (query) => this.queryRaw(query),
			executeRaw: (query) => this.executeRaw(query),
			commit: async () => {},
			rollback: async () => {},
		};
	}

	getConnectionInfo(): ConnectionInfo {
		return {
			maxBindValues: SQLITE_MAX_BIND_VALUES,
			supportsRelationJoins: this.capabilities.relationJoins ?? false,
		};
	}

	async dispose(): Promise<void> {
		// The binding belongs to the runtime
	}
}
