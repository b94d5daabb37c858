/**
 * libSQL adapter
 *
 * Provides a DriverAdapter for @libsql/client: local SQLite files, or
 * remote libSQL servers and their embedded replicas.
 *
 * Requires: @libsql/client
 */

import {
	createClient,
	type Client,
	type InStatement,
	type InValue,
	type ResultSet as LibSQLResultSet,
	type Transaction as LibSQLTransaction,
} from "@libsql/client";
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
} from "./impl/sql.js";

const SUPPORTED_ISOLATION_LEVELS: readonly IsolationLevel[] = ["Serializable"];

function toInValue(value: unknown): InValue {
	if (value === null || value === undefined) return null;
	if (
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "bigint" ||
		typeof value === "boolean" ||
		value instanceof Date ||
		value instanceof Uint8Array ||
		value instanceof ArrayBuffer
	) {
		return value;
	}
	return JSON.stringify(value);
}

function toResultSet(result: LibSQLResultSet): ResultSet {
	const rows = result.rows.map((row) =>
		result.columns.map((_name, i) => {
			const value = row[i];
			// Convert ArrayBuffer to Uint8Array for BLOB data
			return value instanceof ArrayBuffer ? new Uint8Array(value) : value;
		}),
	);
	return {
		columnNames: result.columns,
		columnTypes: resolveColumnTypes(
			result.columns.map((_name, i) => sqliteColumnType(result.columnTypes[i])),
			rows,
		),
		rows,
		lastInsertId:
			result.lastInsertRowid === undefined
				? undefined
				: String(result.lastInsertRowid),
	};
}

/** The client or a transaction. */
interface Executor {
	execute(statement: InStatement): Promise<LibSQLResultSet>;
}

async function run(executor: Executor, query: SqlQuery): Promise<LibSQLResultSet> {
	try {
		return await executor.execute({
			sql: query.sql,
			args: query.args.map(toInValue),
		});
	} catch (error) {
		throw convertSQLiteError(error, query.sql);
	}
}

/**
 * Options for the libSQL adapter.
 */
export interface LibSQLOptions {
	/** Auth token for remote databases */
	authToken?: string;
	capabilities?: AdapterCapabilities;
	logger?: Logger;
}

/**
 * SQLite adapter using libSQL.
 *
 * Transactions are serialized through a mutex so two never interleave
 * on the client.
 *
 * @example
 * import LibSQLAdapter from "sluice/libsql";
 *
 * const adapter = new LibSQLAdapter("libsql://my-db.example.io", {
 *   authToken: process.env.DATABASE_AUTH_TOKEN,
 * });
 */
export default class LibSQLAdapter implements DriverAdapter, TransactionContext {
	readonly provider = "sqlite";
	readonly adapterName = "libsql";
	readonly capabilities: AdapterCapabilities;
	#client: Client;
	#mutex = new Mutex();
	#logger: Logger;

	constructor(url: string, options: LibSQLOptions = {}) {
		this.#client = createClient({url, authToken: options.authToken});
		this.capabilities = options.capabilities ?? {};
		this.#logger = componentLogger("libsql", options.logger);
	}

	async queryRaw(query: SqlQuery): Promise<ResultSet> {
		return toResultSet(await run(this.#client, query));
	}

	async executeRaw(query: SqlQuery): Promise<number> {
		return (await run(this.#client, query)).rowsAffected;
	}

	async executeScript(script: string): Promise<void> {
		try {
			await this.#client.executeMultiple(script);
		} catch (error) {
			throw convertSQLiteError(error);
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
		let tx: LibSQLTransaction;
		try {
			tx = await this.#client.transaction("write");
		} catch (error) {
			release();
			throw convertSQLiteError(error, "BEGIN");
		}
		return new LibSQLTransactionHandle(
			tx,
			release,
			this.capabilities,
			isolationLevel,
		);
	}

	getConnectionInfo(): ConnectionInfo {
		return {
			maxBindValues: SQLITE_MAX_BIND_VALUES,
			supportsRelationJoins: this.capabilities.relationJoins ?? false,
		};
	}

	async dispose(): Promise<void> {
		this.#client.close();
		this.#logger.debug("libsql client closed");
	}
}

class LibSQLTransactionHandle implements Transaction {
	readonly provider = "sqlite";
	readonly adapterName = "libsql";
	readonly capabilities: AdapterCapabilities;
	readonly isolationLevel?: IsolationLevel;
	#tx: LibSQLTransaction;
	#release: () => void;
	#ended = false;

	constructor(
		tx: LibSQLTransaction,
		release: () => void,
		capabilities: AdapterCapabilities,
		isolationLevel?: IsolationLevel,
	) {
		this.#tx = tx;
		this.#release = release;
		this.capabilities = capabilities;
		this.isolationLevel = isolationLevel;
	}

	async queryRaw(query: SqlQuery): Promise<ResultSet> {
		return toResultSet(await run(this.#tx, query));
	}

	async executeRaw(query: SqlQuery): Promise<number> {
		return (await run(this.#tx, query)).rowsAffected;
	}

	async commit(): Promise<void> {
		if (this.#ended) {
			throw new TransactionError("Transaction has already ended");
		}
		this.#ended = true;
		try {
			await this.#tx.commit();
		} catch (error) {
			throw convertSQLiteError(error, "COMMIT");
		} finally {
			this.#tx.close();
			this.#release();
		}
	}

	async rollback(): Promise<void> {
		if (this.#ended) return;
		this.#ended = true;
		try {
			await this.#tx.rollback();
		} catch (error) {
			throw convertSQLiteError(error, "ROLLBACK");
		} finally {
			this.#tx.close();
			this.#release();
		}
	}
}
