/**
 * better-sqlite3 adapter
 *
 * Provides a DriverAdapter for better-sqlite3 (Node.js).
 * The connection is persistent - call dispose() when done.
 *
 * Requires: better-sqlite3
 */

import Database from "better-sqlite3";
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
import {TransactionError} from "./impl/errors.js";
import {componentLogger, type Logger} from "./impl/logger.js";
import {Mutex} from "./impl/mutex.js";
import {
	SQLITE_MAX_BIND_VALUES,
	checkIsolationLevel,
	resolveColumnTypes,
	sqliteColumnType,
	toSQLiteArgs,
} from "./impl/sql.js";

const SUPPORTED_ISOLATION_LEVELS: readonly IsolationLevel[] = ["Serializable"];

function isRow(value: unknown): value is unknown[] {
	return Array.isArray(value);
}

/**
 * Options for the better-sqlite3 adapter.
 */
export interface SQLiteOptions {
	capabilities?: AdapterCapabilities;
	logger?: Logger;
}

/**
 * SQLite adapter using better-sqlite3.
 *
 * One connection serves every caller, so transactions are serialized:
 * a second startTransaction() waits until the first commits or rolls back.
 *
 * @example
 * import SQLiteAdapter from "sluice/sqlite";
 *
 * const adapter = new SQLiteAdapter("file:app.db");
 */
export default class SQLiteAdapter implements DriverAdapter, TransactionContext {
	readonly provider = "sqlite";
	readonly adapterName = "better-sqlite3";
	readonly capabilities: AdapterCapabilities;
	#db: Database.Database;
	#mutex = new Mutex();
	#logger: Logger;

	constructor(url: string, options: SQLiteOptions = {}) {
		// Handle file: prefix
		const path = url.startsWith("file:") ? url.slice(5) : url;
		this.#db = new Database(path);

		if (path !== ":memory:") {
			// Enable WAL mode for better concurrency
			this.#db.pragma("journal_mode = WAL");
		}

		// Enable foreign key constraints
		this.#db.pragma("foreign_keys = ON");

		this.capabilities = options.capabilities ?? {};
		this.#logger = componentLogger("better-sqlite3", options.logger);
	}

	/**
	 * Convert SQLite errors into the DatabaseError hierarchy.
	 */
	#handleError(error: unknown, sql?: string): never {
		throw convertSQLiteError(error, sql);
	}

	#rollbackOpenTransaction(): void {
		try {
			this.#db.exec("ROLLBACK");
		} catch (error) {
			this.#logger.error({err: error}, "rollback after failed commit failed");
		}
	}

	async queryRaw(query: SqlQuery): Promise<ResultSet> {
		try {
			const statement = this.#db.prepare(query.sql);
			const args = toSQLiteArgs(query.args);
			if (!statement.reader) {
				const result = statement.run(...args);
				return {
					columnNames: [],
					columnTypes: [],
					rows: [],
					lastInsertId: String(result.lastInsertRowid),
				};
			}

			const columns = statement.columns();
			const rows = statement.raw(true).all(...args).filter(isRow);
			return {
				columnNames: columns.map((column) => column.name),
				columnTypes: resolveColumnTypes(
					columns.map((column) => sqliteColumnType(column.type)),
					rows,
				),
				rows,
			};
		} catch (error) {
			return this.#handleError(error, query.sql);
		}
	}

	async executeRaw(query: SqlQuery): Promise<number> {
		try {
			const result = this.#db
				.prepare(query.sql)
				.run(...toSQLiteArgs(query.args));
			return result.changes;
		} catch (error) {
			return this.#handleError(error, query.sql);
		}
	}

	async executeScript(script: string): Promise<void> {
		try {
			this.#db.exec(script);
		} catch (error) {
			this.#handleError(error);
		}
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
		const release = await this.#mutex.acquire();
		try {
			this.#db.exec("BEGIN");
		} catch (error) {
			release();
			return this.#handleError(error, "BEGIN");
		}

		let ended = false;
		const end = async (statement: "COMMIT" | "ROLLBACK"): Promise<void> => {
			if (ended) {
				// The connection may already belong to another transaction
				if (statement === "ROLLBACK") return;
				throw new TransactionError("Transaction has already ended");
			}
			ended = true;
			try {
				this.#db.exec(statement);
			} catch (error) {
				// A failed COMMIT (such as a deferred foreign key violation)
				// leaves the transaction open on the shared connection.
				if (this.#db.inTransaction) this.#rollbackOpenTransaction();
				this.#handleError(error, statement);
			} finally {
				release();
			}
		};

		// better-sqlite3 uses a single connection, so the transaction runs
		// its queries through the adapter itself.
		return {
			provider: this.provider,
			adapterName: this.adapterName,
			capabilities: this.capabilities,
			isolationLevel,
			queryRaw: (query) => this.queryRaw(query),
			executeRaw: (query) => this.executeRaw(query),
			commit: () => end("COMMIT"),
			rollback: () => end("ROLLBACK"),
		};
	}

	getConnectionInfo(): ConnectionInfo {
		return {
			maxBindValues: SQLITE_MAX_BIND_VALUES,
			supportsRelationJoins: this.capabilities.relationJoins ?? false,
		};
	}

	async dispose(): Promise<void> {
		this.#db.close();
		this.#logger.debug("sqlite database closed");
	}
}
