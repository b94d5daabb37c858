/**
 * Driver adapter interface.
 *
 * A driver adapter is the uniform capability surface over one concrete
 * backend connection. Adapters take SQL already rendered with the backend's
 * native placeholders; they never build SQL themselves.
 */

// ============================================================================
// Providers
// ============================================================================

export const PROVIDERS = ["postgres", "mysql", "sqlite", "sqlserver"] as const;

export type Provider = (typeof PROVIDERS)[number];

/**
 * Every adapter the factory knows how to build.
 * Adding a backend means adding a name here and a case in createAdapter().
 */
export const ADAPTER_NAMES = [
	"postgres",
	"pg",
	"better-sqlite3",
	"libsql",
	"d1",
	"mysql2",
	"planetscale",
	"mssql",
] as const;

export type AdapterName = (typeof ADAPTER_NAMES)[number];

export interface AdapterCapabilities {
	/** Whether the compiler may emit relation joins for this backend. */
	relationJoins?: boolean;
}

export interface AdapterDescriptor {
	readonly provider: Provider;
	readonly adapterName: AdapterName;
	readonly capabilities?: AdapterCapabilities;
}

// ============================================================================
// Queries and Results
// ============================================================================

export interface SqlQuery {
	sql: string;
	args: unknown[];
}

export type ColumnType =
	| "int32"
	| "int64"
	| "float"
	| "double"
	| "numeric"
	| "boolean"
	| "character"
	| "text"
	| "date"
	| "time"
	| "datetime"
	| "json"
	| "enum"
	| "bytes"
	| "uuid"
	| "unknown";

export interface ResultSet {
	columnNames: string[];
	columnTypes: ColumnType[];
	rows: unknown[][];
	/** Last inserted row id, where the backend reports one. */
	lastInsertId?: string;
}

export interface ConnectionInfo {
	schemaName?: string;
	maxBindValues?: number;
	supportsRelationJoins: boolean;
}

export const ISOLATION_LEVELS = [
	"ReadUncommitted",
	"ReadCommitted",
	"RepeatableRead",
	"Snapshot",
	"Serializable",
] as const;

export type IsolationLevel = (typeof ISOLATION_LEVELS)[number];

// ============================================================================
// Capability Interfaces
// ============================================================================

/**
 * Anything capable of executing raw SQL: the ambient connection or a
 * transaction-scoped handle.
 */
export interface Queryable extends AdapterDescriptor {
	/**
	 * Execute a query and return its rows.
	 */
	queryRaw(query: SqlQuery): Promise<ResultSet>;

	/**
	 * Execute a statement and return the number of affected rows.
	 */
	executeRaw(query: SqlQuery): Promise<number>;
}

/**
 * A transaction bound to one connection.
 */
export interface Transaction extends Queryable {
	readonly isolationLevel?: IsolationLevel;
	commit(): Promise<void>;
	rollback(): Promise<void>;
}

/**
 * A connection reserved for starting a transaction.
 */
export interface TransactionContext extends Queryable {
	startTransaction(isolationLevel?: IsolationLevel): Promise<Transaction>;
}

export interface DriverAdapter extends Queryable {
	/**
	 * Acquire a context from which a transaction can be started.
	 */
	transactionContext(): Promise<TransactionContext>;

	/**
	 * Execute a multi-statement script (no parameters, no results).
	 */
	executeScript(script: string): Promise<void>;

	/**
	 * Optional: connection details the compiler needs.
	 */
	getConnectionInfo?(): ConnectionInfo;

	/**
	 * Close the underlying connection or pool.
	 */
	dispose(): Promise<void>;
}
