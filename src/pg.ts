/**
 * node-postgres adapter
 *
 * Provides a DriverAdapter for pg. Connects over TCP, or over a Unix
 * socket when the connection string names a socket directory
 * (`postgresql://user@/db?host=/var/run/postgresql`).
 *
 * Requires: pg
 */

import pg from "pg";
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

function handleError(error: unknown, sql?: string): never {
	throw convertPostgresError(error, sql);
}

function arrayQuery(query: SqlQuery): pg.QueryArrayConfig {
	return {text: query.sql, values: query.args, rowMode: "array"};
}

function toResultSet(result: pg.QueryArrayResult<unknown[]>): ResultSet {
	return {
		columnNames: result.fields.map((field) => field.name),
		columnTypes: result.fields.map((field) =>
			postgresColumnType(field.dataTypeID),
		),
		rows: result.rows,
	};
}

/**
 * Options for the pg adapter.
 */
export interface PgOptions {
	/** Maximum number of clients in the pool (default: 10) */
	max?: number;
	capabilities?: AdapterCapabilities;
	logger?: Logger;
}

/**
 * PostgreSQL adapter using node-postgres.
 *
 * @example
 * import PgAdapter from "sluice/pg";
 *
 * const adapter = new PgAdapter(
 *   "postgresql://app@/mydb?host=/var/run/postgresql",
 * );
 */
export default class PgAdapter implements DriverAdapter {
	readonly provider = "postgres";
	readonly adapterName = "pg";
	readonly capabilities: AdapterCapabilities;
	#pool: pg.Pool;
	#schemaName: string;
	#logger: Logger;

	constructor(url: string, options: PgOptions = {}) {
		const {url: connectionString, schema} = takeSchemaParam(url);
		this.#pool = new pg.Pool({connectionString, max: options.max ?? 10});
		this.#schemaName = schema;
		this.capabilities = options.capabilities ?? {};
		this.#logger = componentLogger("pg", options.logger);

		// An idle client losing its connection must not crash the process
		this.#pool.on("error", (error) => {
			this.#logger.error({err: error}, "idle pg client error");
		});
	}

	async queryRaw(query: SqlQuery): Promise<ResultSet> {
		try {
			return toResultSet(await this.#pool.query<unknown[]>(arrayQuery(query)));
		} catch (error) {
			return handleError(error, query.sql);
		}
	}

	async executeRaw(query: SqlQuery): Promise<number> {
		try {
			const result = await this.#pool.query(arrayQuery(query));
			return result.rowCount ?? 0;
		} catch (error) {
			return handleError(error, query.sql);
		}
	}

	async executeScript(script: string): Promise<void> {
		try {
			await this.#pool.query(script);
		} catch (error) {
			handleError(error);
		}
	}

	async transactionContext(): Promise<TransactionContext> {
		try {
			const client = await this.#pool.connect();
			return new PgTransactionContext(client, this.capabilities);
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
		await this.#pool.end();
		this.#logger.debug("pg pool closed");
	}
}

/**
 * Queries on one checked-out client.
 */
class PgClientQueryable {
	readonly provider = "postgres";
	readonly adapterName = "pg";
	readonly capabilities: AdapterCapabilities;
	protected client: pg.PoolClient;

	constructor(client: pg.PoolClient, capabilities: AdapterCapabilities) {
		this.client = client;
		this.capabilities = capabilities;
	}

	async queryRaw(query: SqlQuery): Promise<ResultSet> {
		try {
			return toResultSet(await this.client.query<unknown[]>(arrayQuery(query)));
		} catch (error) {
			return handleError(error, query.sql);
		}
	}

	async executeRaw(query: SqlQuery): Promise<number> {
		try {
			const result = await this.client.query(arrayQuery(query));
			return result.rowCount ?? 0;
		} catch (error) {
			return handleError(error, query.sql);
		}
	}
}

class PgTransactionContext
	extends PgClientQueryable
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
			await this.client.query(
				isolationLevel
					? `BEGIN ISOLATION LEVEL ${isolationLevelSQL(isolationLevel)}`
					: "BEGIN",
			);
		} catch (error) {
			this.client.release();
			return handleError(error);
		}
		return new PgTransaction(this.client, this.capabilities, isolationLevel);
	}
}

class PgTransaction extends PgClientQueryable implements Transaction {
	readonly isolationLevel?: IsolationLevel;
	#ended = false;

	constructor(
		client: pg.PoolClient,
		capabilities: AdapterCapabilities,
		isolationLevel?: IsolationLevel,
	) {
		super(client, capabilities);
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
			await this.client.query(statement);
		} catch (error) {
			handleError(error, statement);
		} finally {
			this.client.release();
		}
	}
}
