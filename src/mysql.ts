/**
 * mysql2 adapter
 *
 * Provides a DriverAdapter for mysql2.
 * Uses connection pooling - call dispose() when done to end all connections.
 *
 * Requires: mysql2
 */

import mysql from "mysql2/promise";
import type {
	AdapterCapabilities,
	DriverAdapter,
	IsolationLevel,
	ResultSet,
	SqlQuery,
	Transaction,
	TransactionContext,
} from "./impl/adapter.js";
import {convertMySQLError} from "./impl/backend-errors.js";
import {TransactionError} from "./impl/errors.js";
import {componentLogger, type Logger} from "./impl/logger.js";
import {
	checkIsolationLevel,
	isolationLevelSQL,
	mysqlColumnType,
	splitStatements,
} from "./impl/sql.js";

const SUPPORTED_ISOLATION_LEVELS: readonly IsolationLevel[] = [
	"ReadUncommitted",
	"ReadCommitted",
	"RepeatableRead",
	"Serializable",
];

type MySQLParam = string | number | boolean | Date | Uint8Array | null;

/**
 * Convert an argument for the prepared statement protocol, which rejects
 * undefined. Bigints travel as text, objects as JSON text.
 */
function toParam(value: unknown): MySQLParam {
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
	return JSON.stringify(value);
}

type Execute = (
	options: mysql.QueryOptions,
	values: MySQLParam[],
) => Promise<[unknown, mysql.FieldPacket[]]>;

function isRow(value: unknown): value is unknown[] {
	return Array.isArray(value);
}

function readNumber(value: unknown, key: string): number | undefined {
	if (value && typeof value === "object") {
		const property: unknown = Reflect.get(value, key);
		if (typeof property === "number") return property;
	}
	return undefined;
}

function handleError(error: unknown, sql?: string): never {
	throw convertMySQLError(error, sql);
}

async function runQuery(execute: Execute, query: SqlQuery): Promise<ResultSet> {
	try {
		const [result, fields] = await execute(
			{sql: query.sql, rowsAsArray: true},
			query.args.map(toParam),
		);
		if (!Array.isArray(result)) {
			// Statements without a result set answer with a header
			const insertId = readNumber(result, "insertId");
			return {
				columnNames: [],
				columnTypes: [],
				rows: [],
				lastInsertId: insertId ? String(insertId) : undefined,
			};
		}
		return {
			columnNames: fields.map((field) => field.name),
			columnTypes: fields.map((field) =>
				mysqlColumnType(
					readNumber(field, "columnType") ?? readNumber(field, "type") ?? -1,
					readNumber(field, "characterSet"),
				),
			),
			rows: result.filter(isRow),
		};
	} catch (error) {
		return handleError(error, query.sql);
	}
}

async function runExecute(execute: Execute, query: SqlQuery): Promise<number> {
	try {
		const [result] = await execute({sql: query.sql}, query.args.map(toParam));
		return readNumber(result, "affectedRows") ?? 0;
	} catch (error) {
		return handleError(error, query.sql);
	}
}

/**
 * Options for the mysql adapter.
 */
export interface MySQLOptions {
	/** Maximum number of connections in the pool (default: 10) */
	connectionLimit?: number;
	/** Idle timeout in milliseconds (default: 60000) */
	idleTimeout?: number;
	/** Connection timeout in milliseconds (default: 10000) */
	connectTimeout?: number;
	capabilities?: AdapterCapabilities;
	logger?: Logger;
}

/**
 * MySQL adapter using mysql2.
 *
 * @example
 * import MySQLAdapter from "sluice/mysql";
 *
 * const adapter = new MySQLAdapter("mysql://localhost/mydb");
 *
 * // When done:
 * await adapter.dispose();
 */
export default class MySQLAdapter implements DriverAdapter {
	readonly provider = "mysql";
	readonly adapterName = "mysql2";
	readonly capabilities: AdapterCapabilities;
	#pool: mysql.Pool;
	#logger: Logger;

	constructor(url: string, options: MySQLOptions = {}) {
		this.#pool = mysql.createPool({
			uri: url,
			connectionLimit: options.connectionLimit ?? 10,
			idleTimeout: options.idleTimeout ?? 60000,
			connectTimeout: options.connectTimeout ?? 10000,
		});
		this.capabilities = options.capabilities ?? {};
		this.#logger = componentLogger("mysql2", options.logger);
	}

	#execute: Execute = (options, values) => this.#pool.execute(options, values);

	queryRaw(query: SqlQuery): Promise<ResultSet> {
		return runQuery(this.#execute, query);
	}

	executeRaw(query: SqlQuery): Promise<number> {
		return runExecute(this.#execute, query);
	}

	async executeScript(script: string): Promise<void> {
		// Scripts run statement by statement; multipleStatements stays off
		const connection = await this.#pool.getConnection();
		try {
			for (const statement of splitStatements(script)) {
				await connection.query(statement);
			}
		} catch (error) {
			handleError(error);
		} finally {
			connection.release();
		}
	}

	async transactionContext(): Promise<TransactionContext> {
		try {
			const connection = await this.#pool.getConnection();
			return new MySQLTransactionContext(connection, this.capabilities);
		} catch (error) {
			return handleError(error);
		}
	}

	async dispose(): Promise<void> {
		await this.#pool.end();
		this.#logger.debug("mysql pool closed");
	}
}

/**
 * Queries on one checked-out connection.
 */
class MySQLConnectionQueryable {
	readonly provider = "mysql";
	readonly adapterName = "mysql2";
	readonly capabilities: AdapterCapabilities;
	protected connection: mysql.PoolConnection;

	constructor(
		connection: mysql.PoolConnection,
		capabilities: AdapterCapabilities,
	) {
		this.connection = connection;
		this.capabilities = capabilities;
	}

	protected execute: Execute = (options, values) =>
		this.connection.execute(options, values);

	queryRaw(query: SqlQuery): Promise<ResultSet> {
		return runQuery(this.execute, query);
	}

	executeRaw(query: SqlQuery): Promise<number> {
		return runExecute(this.execute, query);
	}
}

class MySQLTransactionContext
	extends MySQLConnectionQueryable
	implements TransactionContext
{
	async startTransaction(
		isolationLevel?: IsolationLevel,
	): Promise<Transaction> {
		try {
			checkIsolationLevel(
				isolationLevel,
				SUPPORTED_ISOLATION_LEVELS,
				this.adapterName,
			);
			// The level applies to the next transaction, so it is set first.
			// Use query() not execute() - transaction commands aren't
			// supported in prepared statement protocol
			if (isolationLevel) {
				await this.connection.query(
					`SET TRANSACTION ISOLATION LEVEL ${isolationLevelSQL(isolationLevel)}`,
				);
			}
			await this.connection.query("START TRANSACTION");
		} catch (error) {
			this.connection.release();
			return handleError(error);
		}
		return new MySQLTransaction(
			this.connection,
			this.capabilities,
			isolationLevel,
		);
	}
}

class MySQLTransaction extends MySQLConnectionQueryable implements Transaction {
	readonly isolationLevel?: IsolationLevel;
	#ended = false;

	constructor(
		connection: mysql.PoolConnection,
		capabilities: AdapterCapabilities,
		isolationLevel?: IsolationLevel,
	) {
		super(connection, capabilities);
		this.isolationLevel = isolationLevel;
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
			await this.connection.query(statement);
		} catch (error) {
			handleError(error, statement);
		} finally {
			this.connection.release();
		}
	}
}
