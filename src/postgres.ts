/**
 * postgres.js adapter
 *
 * Provides a DriverAdapter for postgres.js.
 * Uses connection pooling - call dispose() when done to end all connections.
 * Each transaction runs on its own reserved connection.
 *
 * Requires: postgres
 */

import postgres from "postgres";
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
import {convertPostgresError} from "./impl/backend-errors.js";
import {TransactionError} from "./impl/errors.js";
import {componentLogger, type Logger} from "./impl/logger.js";
import {
	checkIsolationLevel,
	isolationLevelSQL,
	postgresColumnType,
	takeSchemaParam,
} from "./impl/sql.js";

const SUPPORTED_ISOLATION_LEVELS: readonly IsolationLevel[] = [
	"ReadUncommitted",
	"ReadCommitted",
	"RepeatableRead",
	"Serializable",
];

type PostgresParam =
	| string
	| number
	| boolean
	| Date
	| Uint8Array
	| null
	| PostgresParam[];

/**
 * Convert an argument to a value postgres.js serializes itself.
 * Bigints travel as text, objects as JSON text.
 */
function toParam(value: unknown): PostgresParam {
	if (value === null || value === undefined) return null;
	if (
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "boolean" ||
		value instanceof Date ||
		value instanceof Uint8Array
	) {
		return value;
	}
	if (typeof value === "bigint") return value.toString();
	if (Array.isArray(value)) return value.map(toParam);
	return JSON.stringify(value);
}

function handleError(error: unknown, sql?: string): never {
	throw convertPostgresError(error, sql);
}

async function runQuery(sql: postgres.Sql, query: SqlQuery): Promise<ResultSet> {
	try {
		const result = await sql.unsafe(query.sql, query.args.map(toParam));
		const columns = result.columns ?? [];
		const columnNames = columns.map((column) => column.name);
		return {
			columnNames,
			columnTypes: columns.map((column) => postgresColumnType(column.type)),
			rows: result.map((row) => columnNames.map((name) => row[name])),
		};
	} catch (error) {
		return handleError(error, query.sql);
	}
}

async function runExecute(sql: postgres.Sql, query: SqlQuery): Promise<number> {
	try {
		const result = await sql.unsafe(query.sql, query.args.map(toParam));
		return result.count;
	} catch (error) {
		return handleError(error, query.sql);
	}
}

/**
 * Options for the postgres adapter.
 */
export interface PostgresOptions {
	/** Maximum number of connections in the pool (default: 10) */
	max?: number;
	/** Idle timeout in seconds before closing connections (default: 30) */
	idleTimeout?: number;
	/** Connection timeout in seconds (default: 30) */
	connectTimeout?: number;
	capabilities?: AdapterCapabilities;
	logger?: Logger;
}

/**
 * PostgreSQL adapter using postgres.js.
 *
 * The `schema` URL parameter names the schema reported to the compiler
 * (default "public").
 *
 * @example
 * import PostgresAdapter from "sluice/postgres";
 * import {bindAdapter} from "sluice";
 *
 * const adapter = bindAdapter(
 *   new PostgresAdapter("postgresql://localhost/mydb?schema=app"),
 * );
 *
 * // When done:
 * await adapter.dispose();
 */
export default class PostgresAdapter implements DriverAdapter {
	readonly provider = "postgres";
	readonly adapterName = "postgres";
	readonly capabilities: AdapterCapabilities;
	#sql: postgres.Sql;
	#schemaName: string;
	#logger: Logger;

	constructor(url: string, options: PostgresOptions = {}) {
		const {url: connectionUrl, schema} = takeSchemaParam(url);
		this.#sql = postgres(connectionUrl, {
			max: options.max ?? 10,
			idle_timeout: options.idleTimeout ?? 30,
			connect_timeout: options.connectTimeout ?? 30,
			onnotice: () => {}, // Suppress PostgreSQL NOTICE messages
		});
		this.#schemaName = schema;
		this.capabilities = options.capabilities ?? {};
		this.#logger = componentLogger("postgres", options.logger);
	}

	queryRaw(query: SqlQuery): Promise<ResultSet> {
		return runQuery(this.#sql, query);
	}

	executeRaw(query: SqlQuery): Promise<number> {
		return runExecute(this.#sql, query);
	}

	async executeScript(script: string): Promise<void> {
		try {
			// Without parameters postgres.js uses the simple protocol, which
			// accepts several statements
			await this.#sql.unsafe(script);
		} catch (error) {
			handleError(error);
		}
	}

	async transactionContext(): Promise<TransactionContext> {
		try {
			const reserved = await this.#sql.reserve();
			return new PostgresTransactionContext(reserved, this.capabilities);
		} catch (error) {
			return handleError(error);
		}
	}

	getConnectionInfo(): ConnectionInfo {
		return {
			schemaName: this.#schemaName,
			supportsRelationJoins: this.capabilities.relationJoins ?? false,
		};
	}

	async dispose(): Promise<void> {
		await this.#sql.end();
		this.#logger.debug("postgres pool closed");
	}
}

class PostgresTransactionContext implements TransactionContext {
	readonly provider = "postgres";
	readonly adapterName = "postgres";
	readonly capabilities: AdapterCapabilities;
	#sql: postgres.ReservedSql;

	constructor(sql: postgres.ReservedSql, capabilities: AdapterCapabilities) {
		this.#sql = sql;
		this.capabilities = capabilities;
	}

	queryRaw(query: SqlQuery): Promise<ResultSet> {
		return runQuery(this.#sql, query);
	}

	executeRaw(query: SqlQuery): Promise<number> {
		return runExecute(this.#sql, query);
	}

	async startTransaction(
		isolationLevel?: IsolationLevel,
	): Promise<Transaction> {
		try {
			checkIsolationLevel(
				isolationLevel,
				SUPPORTED_ISOLATION_LEVELS,
				this.adapterName,
			);
			await this.#sql.unsafe(
				isolationLevel
					? `BEGIN ISOLATION LEVEL ${isolationLevelSQL(isolationLevel)}`
					: "BEGIN",
			);
		} catch (error) {
			this.#sql.release();
			return handleError(error);
		}
		return new PostgresTransaction(this.#sql, this.capabilities, isolationLevel);
	}
}

class PostgresTransaction implements Transaction {
	readonly provider = "postgres";
	readonly adapterName = "postgres";
	readonly capabilities: AdapterCapabilities;
	readonly isolationLevel?: IsolationLevel;
	#sql: postgres.ReservedSql;
	#ended = false;

	constructor(
		sql: postgres.ReservedSql,
		capabilities: AdapterCapabilities,
		isolationLevel?: IsolationLevel,
	) {
		this.#sql = sql;
		this.capabilities = capabilities;
		this.isolationLevel = isolationLevel;
	}

	queryRaw(query: SqlQuery): Promise<ResultSet> {
		return runQuery(this.#sql, query);
	}

	executeRaw(query: SqlQuery): Promise<number> {
		return runExecute(this.#sql, query);
	}

	commit(): Promise<void> {
		return this.#end("COMMIT");
	}

	rollback(): Promise<void> {
		return this.#end("ROLLBACK");
	}

	async #end(statement: "COMMIT" | "ROLLBACK"): Promise<void> {
		if (this.#ended) {
			if (statement === "ROLLBACK") return;
			throw new TransactionError("Transaction has already ended");
		}
		this.#ended = true;
		try {
			await this.#sql.unsafe(statement);
		} catch (error) {
			handleError(error, statement);
		} finally {
			this.#sql.release();
		}
	}
}
