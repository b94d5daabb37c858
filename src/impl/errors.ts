/**
 * Structured error types for query execution.
 *
 * All errors raised by adapters, the transaction manager and the pipeline
 * extend DatabaseError, which includes an error code for programmatic
 * error handling.
 */

// ============================================================================
// Error Codes
// ============================================================================

export type DatabaseErrorCode =
	| "QUERY_ERROR"
	| "CONSTRAINT_VIOLATION"
	| "CONNECTION_ERROR"
	| "TRANSACTION_ERROR"
	| "TRANSACTION_NOT_FOUND"
	| "TRANSACTION_CLOSED"
	| "INVALID_ISOLATION_LEVEL"
	| "UNSUPPORTED_CAPABILITY"
	| "NOT_RECORDED"
	| "PANIC"
	| "CONFIGURATION_ERROR"
	| "INVALID_REQUEST";

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base error class for all database errors.
 *
 * Includes an error code for programmatic handling.
 */
export class DatabaseError extends Error {
	readonly code: DatabaseErrorCode;

	constructor(
		code: DatabaseErrorCode,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "DatabaseError";
		this.code = code;

		// Maintains proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}
}

// ============================================================================
// Backend Errors
// ============================================================================

/**
 * Thrown when a raw query or statement fails inside the backend.
 */
export class QueryError extends DatabaseError {
	readonly sql?: string;
	/** Native code reported by the backend (SQLSTATE, errno, SQLITE_*). */
	readonly backendCode?: string;

	constructor(
		message: string,
		details: {sql?: string; backendCode?: string} = {},
		options?: ErrorOptions,
	) {
		super("QUERY_ERROR", message, options);
		this.name = "QueryError";
		this.sql = details.sql;
		this.backendCode = details.backendCode;
	}
}

export type ConstraintKind =
	| "unique"
	| "foreign_key"
	| "check"
	| "not_null"
	| "unknown";

/**
 * Thrown when a database constraint is violated.
 *
 * Constraint violations are detected at the database level and converted
 * from driver-specific errors into this normalized format.
 *
 * **Transaction behavior**: This error is thrown immediately and does NOT
 * auto-rollback. The pipeline rolls back transactional batches itself.
 */
export class ConstraintViolationError extends DatabaseError {
	readonly kind: ConstraintKind;
	readonly constraint?: string;
	readonly table?: string;
	readonly column?: string;
	readonly backendCode?: string;

	constructor(
		message: string,
		details: {
			kind: ConstraintKind;
			constraint?: string;
			table?: string;
			column?: string;
			backendCode?: string;
		},
		options?: ErrorOptions,
	) {
		super("CONSTRAINT_VIOLATION", message, options);
		this.name = "ConstraintViolationError";
		this.kind = details.kind;
		this.constraint = details.constraint;
		this.table = details.table;
		this.column = details.column;
		this.backendCode = details.backendCode;
	}
}

/**
 * Thrown when database connection fails.
 */
export class ConnectionError extends DatabaseError {
	constructor(message: string, options?: ErrorOptions) {
		super("CONNECTION_ERROR", message, options);
		this.name = "ConnectionError";
	}
}

// ============================================================================
// Transaction Errors
// ============================================================================

/**
 * Thrown when a transaction fails to start, commit or roll back.
 */
export class TransactionError extends DatabaseError {
	constructor(message: string, options?: ErrorOptions) {
		super("TRANSACTION_ERROR", message, options);
		this.name = "TransactionError";
	}
}

/**
 * Thrown when a transaction id is looked up that was never started.
 */
export class TransactionNotFoundError extends DatabaseError {
	readonly transactionId: string;

	constructor(transactionId: string, options?: ErrorOptions) {
		super(
			"TRANSACTION_NOT_FOUND",
			`No transaction with id ${transactionId} found. Please call startTx first.`,
			options,
		);
		this.name = "TransactionNotFoundError";
		this.transactionId = transactionId;
	}
}

/**
 * Thrown when an operation targets a transaction that already ended.
 */
export class TransactionClosedError extends DatabaseError {
	readonly transactionId: string;
	readonly status: "committed" | "rolled-back" | "timed-out";

	constructor(
		transactionId: string,
		status: "committed" | "rolled-back" | "timed-out",
		action: string,
		options?: ErrorOptions,
	) {
		super(
			"TRANSACTION_CLOSED",
			`Transaction ${transactionId} is already closed (${status}): a ${action} cannot be executed on it.`,
			options,
		);
		this.name = "TransactionClosedError";
		this.transactionId = transactionId;
		this.status = status;
	}
}

/**
 * Thrown when a backend does not support the requested isolation level.
 */
export class InvalidIsolationLevelError extends DatabaseError {
	readonly isolationLevel: string;

	constructor(isolationLevel: string, adapterName: string) {
		super(
			"INVALID_ISOLATION_LEVEL",
			`Isolation level ${isolationLevel} is not supported by the ${adapterName} adapter`,
		);
		this.name = "InvalidIsolationLevelError";
		this.isolationLevel = isolationLevel;
	}
}

// ============================================================================
// Capability and Mode Errors
// ============================================================================

/**
 * Thrown when an operation is not available on the current adapter or mode.
 */
export class UnsupportedCapabilityError extends DatabaseError {
	readonly capability: string;

	constructor(capability: string, message: string) {
		super("UNSUPPORTED_CAPABILITY", message);
		this.name = "UnsupportedCapabilityError";
		this.capability = capability;
	}
}

/**
 * Thrown by the replayer when a query has no recorded result.
 */
export class NotRecordedError extends DatabaseError {
	readonly key: string;

	constructor(key: string) {
		super("NOT_RECORDED", `Query not recorded: ${key}`);
		this.name = "NotRecordedError";
		this.key = key;
	}
}

/**
 * A fatal abort raised inside the compiler or interpreter module,
 * converted into an ordinary error.
 */
export class PanicError extends DatabaseError {
	readonly module: string;
	readonly detail: string;

	constructor(module: string, detail: string) {
		super("PANIC", `Panic in ${module}: ${detail}`);
		this.name = "PanicError";
		this.module = module;
		this.detail = detail;
	}
}

// ============================================================================
// Input Errors
// ============================================================================

/**
 * Thrown when adapter or environment configuration is invalid.
 */
export class ConfigurationError extends DatabaseError {
	readonly issues: string[];

	constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
		super("CONFIGURATION_ERROR", message, options);
		this.name = "ConfigurationError";
		this.issues = issues;
	}
}

/**
 * Thrown when a pipeline request does not match the query envelope.
 */
export class InvalidRequestError extends DatabaseError {
	readonly issues: string[];

	constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
		super("INVALID_REQUEST", message, options);
		this.name = "InvalidRequestError";
		this.issues = issues;
	}
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if an error is a DatabaseError.
 */
export function isDatabaseError(error: unknown): error is DatabaseError {
	return error instanceof DatabaseError;
}

/**
 * Check if an error has a specific error code.
 */
export function hasErrorCode(
	error: unknown,
	code: DatabaseErrorCode,
): error is DatabaseError {
	return isDatabaseError(error) && error.code === code;
}

/**
 * Read a string-valued property off an unknown error object.
 * Driver errors carry their details as loosely typed own properties.
 */
export function errorProperty(error: unknown, key: string): string | undefined {
	if (error && typeof error === "object" && key in error) {
		const value: unknown = Reflect.get(error, key);
		if (typeof value === "string") return value;
		if (typeof value === "number") return String(value);
	}
	return undefined;
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
