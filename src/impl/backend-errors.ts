/**
 * Conversion of native driver errors into the DatabaseError hierarchy.
 *
 * Constraint violations are recognized by backend code; connection
 * failures become ConnectionError; everything else is a QueryError that
 * keeps the native code.
 */

import {
	ConnectionError,
	ConstraintViolationError,
	DatabaseError,
	QueryError,
	errorMessage,
	errorProperty,
	isDatabaseError,
	type ConstraintKind,
} from "./errors.js";

const NETWORK_CODES = new Set([
	"ECONNREFUSED",
	"ECONNRESET",
	"ENOTFOUND",
	"ETIMEDOUT",
	"EHOSTUNREACH",
	"EPIPE",
]);

function queryError(
	error: unknown,
	sql?: string,
	backendCode?: string,
): QueryError {
	return new QueryError(errorMessage(error), {sql, backendCode}, {cause: error});
}

// ============================================================================
// PostgreSQL
// ============================================================================

const POSTGRES_CONSTRAINTS: Record<string, ConstraintKind> = {
	"23505": "unique",
	"23503": "foreign_key",
	"23514": "check",
	"23502": "not_null",
};

/**
 * Convert a postgres.js or node-postgres error.
 * postgres.js names its detail fields `*_name`; node-postgres does not.
 */
export function convertPostgresError(error: unknown, sql?: string): DatabaseError {
	if (isDatabaseError(error)) return error;
	const code = errorProperty(error, "code");
	if (code === undefined) return queryError(error, sql);

	const kind = POSTGRES_CONSTRAINTS[code];
	if (kind) {
		return new ConstraintViolationError(
			errorMessage(error),
			{
				kind,
				constraint:
					errorProperty(error, "constraint_name") ??
					errorProperty(error, "constraint"),
				table:
					errorProperty(error, "table_name") ?? errorProperty(error, "table"),
				column:
					errorProperty(error, "column_name") ?? errorProperty(error, "column"),
				backendCode: code,
			},
			{cause: error},
		);
	}

	// Class 08: connection exception
	if (code.startsWith("08") || NETWORK_CODES.has(code)) {
		return new ConnectionError(errorMessage(error), {cause: error});
	}
	return queryError(error, sql, code);
}

// ============================================================================
// MySQL
// ============================================================================

const MYSQL_CONSTRAINTS: Record<string, ConstraintKind> = {
	// ER_DUP_ENTRY
	"1062": "unique",
	// ER_ROW_IS_REFERENCED_2
	"1451": "foreign_key",
	// ER_NO_REFERENCED_ROW_2
	"1452": "foreign_key",
	// ER_BAD_NULL_ERROR
	"1048": "not_null",
	// ER_CHECK_CONSTRAINT_VIOLATED
	"3819": "check",
};

/**
 * Convert a mysql2 error, or an error carrying its errno in the message
 * as the edge MySQL client reports it ("... (errno 1062) ...").
 */
export function convertMySQLError(error: unknown, sql?: string): DatabaseError {
	if (isDatabaseError(error)) return error;
	const message = errorMessage(error);
	const errno =
		errorProperty(error, "errno") ?? /\berrno (\d+)/.exec(message)?.[1];
	const code = errorProperty(error, "code");

	const kind = errno === undefined ? undefined : MYSQL_CONSTRAINTS[errno];
	if (kind) {
		let constraint: string | undefined;
		let table: string | undefined;
		if (kind === "unique") {
			constraint = /for key '([^']+)'/i.exec(message)?.[1];
			const parts = constraint?.split(".");
			if (parts && parts.length > 1) table = parts[0];
		} else if (kind === "foreign_key") {
			constraint = /CONSTRAINT `([^`]+)`/i.exec(message)?.[1];
			table = /`([^`]+)`\.`([^`]+)`/.exec(message)?.[2];
		}
		const column =
			kind === "not_null" ? /Column '([^']+)'/i.exec(message)?.[1] : undefined;
		return new ConstraintViolationError(
			message,
			{kind, constraint, table, column, backendCode: errno},
			{cause: error},
		);
	}

	if (
		code !== undefined &&
		(NETWORK_CODES.has(code) || code === "PROTOCOL_CONNECTION_LOST")
	) {
		return new ConnectionError(message, {cause: error});
	}
	return queryError(error, sql, errno ?? code);
}

// ============================================================================
// SQLite
// ============================================================================

/**
 * Convert a better-sqlite3, libSQL or D1 error. D1 reports only a message
 * ("UNIQUE constraint failed: users.email: SQLITE_CONSTRAINT").
 */
export function convertSQLiteError(error: unknown, sql?: string): DatabaseError {
	if (isDatabaseError(error)) return error;
	const message = errorMessage(error);
	const code = errorProperty(error, "code");

	const isConstraint =
		code?.startsWith("SQLITE_CONSTRAINT") || /constraint failed/i.test(message);
	if (isConstraint) {
		// Example: "UNIQUE constraint failed: users.email"
		const match = /constraint failed: (\w+)\.(\w+)/i.exec(message);
		const table = match?.[1];
		const column = match?.[2];

		let kind: ConstraintKind = "unknown";
		if (
			code === "SQLITE_CONSTRAINT_UNIQUE" ||
			code === "SQLITE_CONSTRAINT_PRIMARYKEY" ||
			message.includes("UNIQUE")
		) {
			kind = "unique";
		} else if (
			code === "SQLITE_CONSTRAINT_FOREIGNKEY" ||
			message.includes("FOREIGN KEY")
		) {
			kind = "foreign_key";
		} else if (
			code === "SQLITE_CONSTRAINT_NOTNULL" ||
			message.includes("NOT NULL")
		) {
			kind = "not_null";
		} else if (code === "SQLITE_CONSTRAINT_CHECK" || message.includes("CHECK")) {
			kind = "check";
		}

		return new ConstraintViolationError(
			message,
			{
				kind,
				constraint: match ? `${table}.${column}` : undefined,
				table,
				column,
				backendCode: code ?? "SQLITE_CONSTRAINT",
			},
			{cause: error},
		);
	}

	if (
		code === "SQLITE_CANTOPEN" ||
		(code !== undefined && NETWORK_CODES.has(code))
	) {
		return new ConnectionError(message, {cause: error});
	}
	return queryError(error, sql, code);
}

// ============================================================================
// SQL Server
// ============================================================================

const MSSQL_CONSTRAINTS: Record<string, ConstraintKind> = {
	"2627": "unique",
	"2601": "unique",
	"515": "not_null",
};

/**
 * Convert a tedious error. SQL Server reports foreign key and check
 * violations under the same number (547).
 */
export function convertMSSQLError(error: unknown, sql?: string): DatabaseError {
	if (isDatabaseError(error)) return error;
	const message = errorMessage(error);
	const number = errorProperty(error, "number");

	let kind = number === undefined ? undefined : MSSQL_CONSTRAINTS[number];
	if (number === "547") {
		kind = message.includes("FOREIGN KEY") ? "foreign_key" : "check";
	}
	if (kind) {
		return new ConstraintViolationError(
			message,
			{
				kind,
				constraint: /constraint ["']([^"']+)["']/i.exec(message)?.[1],
				table: /(?:object|table) ["']([^"']+)["']/i.exec(message)?.[1],
				column: /column ["']([^"']+)["']/i.exec(message)?.[1],
				backendCode: number,
			},
			{cause: error},
		);
	}

	const code = errorProperty(error, "code");
	if (errorProperty(error, "name") === "ConnectionError" || code === "ESOCKET") {
		return new ConnectionError(message, {cause: error});
	}
	return queryError(error, sql, number ?? code);
}
