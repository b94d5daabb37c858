/**
 * PlanetScale adapter
 *
 * Provides a DriverAdapter for @planetscale/database, the edge MySQL
 * client that talks to PlanetScale over HTTP.
 *
 * Requires: @planetscale/database
 */

import {
	Client,
	type ExecutedQuery,
	type Transaction as PlanetScaleTransaction,
} from "@planetscale/database";
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
	splitStatements,
	vitessColumnType,
} from "./impl/sql.js";

// The client opens its transaction before any statement of ours runs, so
// only the server default level can be honored.
const SUPPORTED_ISOLATION_LEVELS: readonly IsolationLevel[] = [
	"RepeatableRead",
];

function isRow(value: unknown): value is unknown[] {
	return Array.isArray(value);
}

function toArgs(args: unknown[]): unknown[] {
	return args.map((value) => {
		if (value === undefined) return null;
		return typeof value === "bigint" ? value.toString() : value;
	});
}

function toResultSet(result: ExecutedQuery<unknown>): ResultSet {
	const rows: unknown[] = result.rows;
	const fields = result.fields ?? [];
	return {
		columnNames: fields.map((field) => field.name),
		columnTypes: fields.map((field) => vitessColumnType(field.type)),
		rows: rows.filter(isRow),
		lastInsertId:
			result.insertId && result.insertId !== "0" ? result.insertId : undefined,
	};
}

/** The client or a transaction. */
interface Executor {
	execute(
		query: string,
		args?: unknown[],
		options?: {as: "array"},
	): Promise<ExecutedQuery<unknown>>;
}

async function run(
	executor: Executor,
	query: SqlQuery,
): Promise<ExecutedQuery<unknown>> {
	try {
		return await executor.execute(query.sql, toArgs(query.args), {as: "array"});
	} catch (error) {
		throw convertMySQLError(error, query.sql);
	}
}

interface Deferred<T> {
	promise: Promise<T>;
	resolve(value: T): void;
	reject(error: unknown): void;
}

function createDeferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => {};
	let reject: (error: unknown) => void = () => {};
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return {promise, resolve, reject};
}

/** Thrown inside the client's transaction callback to make it roll back. */
class RollbackSignal extends Error {
	constructor() {
		super("rollback requested");
		this.name = "RollbackSignal";
	}
}

/**
 * Options for the PlanetScale adapter.
 */
export interface PlanetScaleOptions {
	capabilities?: AdapterCapabilities;
	logger?: Logger;
}

/**
 * MySQL-compatible adapter over PlanetScale's HTTP API.
 *
 * The client only offers callback transactions. startTransaction() opens
 * one on a fresh connection and keeps its callback pending until the
 * returned handle is committed or rolled back.
 *
 * @example
 * import PlanetScaleAdapter from "sluice/planetscale";
 *
 * const adapter = new PlanetScaleAdapter(process.env.DATABASE_URL);
 */
export default class PlanetScaleAdapter
	implements DriverAdapter, TransactionContext
{
	readonly provider = "mysql";
	readonly adapterName = "planetscale";
	readonly capabilities: AdapterCapabilities;
	#client: Client;
	#logger: Logger;

	constructor(url: string, options: PlanetScaleOptions = {}) {
		this.#client = new Client({url});
		this.capabilities = options.capabilities ?? {};
		this.#logger = componentLogger("planetscale", options.logger);
	}

	async queryRaw(query: SqlQuery): Promise<ResultSet> {
		return toResultSet(await run(this.#client, query));
	}

	async executeRaw(query: SqlQuery): Promise<number> {
		return (await run(this.#client, query)).rowsAffected;
	}

	async executeScript(script: string): Promise<void> {
		for (const sql of splitStatements(script)) {
			await run(this.#client, {sql, args: []});
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

		const started = createDeferred<PlanetScaleTransaction>();
		const finished = createDeferred<"commit" | "rollback">();

		// Settles with the error that ended the transaction, if any. Never
		// rejects.
		const outcome = this.#client
			.connection()
			.transaction(async (tx) => {
				started.resolve(tx);
				if ((await finished.promise) === "rollback") {
					throw new RollbackSignal();
				}
			})
			.then(
				() => undefined,
				(error: unknown) => {
					started.reject(error);
					return error instanceof RollbackSignal ? undefined : error;
				},
			);

		let tx: PlanetScaleTransaction;
		try {
			tx = await started.promise;
		} catch (error) {
			throw convertMySQLError(error, "BEGIN");
		}

		let ended = false;
		const end = async (action: "commit" | "rollback"): Promise<void> => {
			if (ended) {
				if (action === "rollback") return;
				throw new TransactionError("Transaction has already ended");
			}
			ended = true;
			finished.resolve(action);
			const error = await outcome;
			if (error !== undefined) {
				throw convertMySQLError(error, action.toUpperCase());
			}
		};

		this.#logger.debug("planetscale transaction opened");
		return {
			provider: this.provider,
			adapterName: this.adapterName,
			capabilities: this.capabilities,
			isolationLevel,
			queryRaw: async (query) => toResultSet(await run(tx, query)),
			executeRaw: async (query) => (await run(tx, query)).rowsAffected,
			commit: () => end("commit"),
			rollback: () => end("rollback"),
		};
	}

	async dispose(): Promise<void> {
		// Stateless over HTTP
	}
}
