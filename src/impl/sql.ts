/**
 * SQL utilities shared by all adapters.
 *
 * This is the single source of truth for provider-specific SQL details:
 * - Placeholder syntax
 * - Isolation level statements
 * - Result set shaping and column types
 * - Script splitting
 */

import type {
	AdapterName,
	ColumnType,
	IsolationLevel,
	Provider,
	ResultSet,
} from "./adapter.js";
import {InvalidIsolationLevelError} from "./errors.js";

// ============================================================================
// Placeholders
// ============================================================================

/**
 * Get placeholder syntax based on provider.
 * PostgreSQL uses $1, $2, etc. SQL Server uses @P1, @P2. MySQL/SQLite use ?.
 */
export function placeholder(index: number, provider: Provider): string {
	switch (provider) {
		case "postgres":
			return `$${index}`;
		case "sqlserver":
			return `@P${index}`;
		case "mysql":
		case "sqlite":
			return "?";
	}
}

// ============================================================================
// Isolation Levels
// ============================================================================

const ISOLATION_LEVEL_SQL: Record<IsolationLevel, string> = {
	ReadUncommitted: "READ UNCOMMITTED",
	ReadCommitted: "READ COMMITTED",
	RepeatableRead: "REPEATABLE READ",
	Snapshot: "SNAPSHOT",
	Serializable: "SERIALIZABLE",
};

/**
 * The SQL keyword form of an isolation level.
 */
export function isolationLevelSQL(level: IsolationLevel): string {
	return ISOLATION_LEVEL_SQL[level];
}

/**
 * Throw InvalidIsolationLevelError unless the level is absent or supported.
 */
export function checkIsolationLevel(
	level: IsolationLevel | undefined,
	supported: readonly IsolationLevel[],
	adapterName: AdapterName,
): void {
	if (level !== undefined && !supported.includes(level)) {
		throw new InvalidIsolationLevelError(level, adapterName);
	}
}

// ============================================================================
// Result Sets
// ============================================================================

/**
 * Infer a column type from a JS value, for backends that report none.
 */
export function inferColumnType(value: unknown): ColumnType {
	switch (typeof value) {
		case "bigint":
			return "int64";
		case "boolean":
			return "boolean";
		case "number":
			return Number.isInteger(value) ? "int32" : "double";
		case "string":
			return "text";
		case "object":
			if (value instanceof Date) return "datetime";
			if (value instanceof Uint8Array || value instanceof ArrayBuffer) {
				return "bytes";
			}
			return value === null ? "unknown" : "json";
		default:
			return "unknown";
	}
}

/**
 * Infer each column's type from the first non-null value in that column.
 */
export function inferColumnTypes(
	columnCount: number,
	rows: unknown[][],
): ColumnType[] {
	const types: ColumnType[] = [];
	for (let i = 0; i < columnCount; i++) {
		let type: ColumnType = "unknown";
		for (const row of rows) {
			const value = row[i];
			if (value !== null && value !== undefined) {
				type = inferColumnType(value);
				break;
			}
		}
		types.push(type);
	}
	return types;
}

/**
 * Convert an array of row objects into a ResultSet.
 * Column names come from `columnNames` when the driver reports them,
 * so empty results still carry their columns.
 */
export function rowsToResultSet(
	rows: Array<Record<string, unknown>>,
	columnNames?: string[],
	columnTypes?: ColumnType[],
): ResultSet {
	const names = columnNames ?? (rows.length > 0 ? Object.keys(rows[0]) : []);
	const values = rows.map((row) => names.map((name) => row[name]));
	return {
		columnNames: names,
		columnTypes: columnTypes ?? inferColumnTypes(names.length, values),
		rows: values,
	};
}

export function emptyResultSet(): ResultSet {
	return {columnNames: [], columnTypes: [], rows: []};
}

// ============================================================================
// Column Types
// ============================================================================

const POSTGRES_TYPE_OIDS: Record<number, ColumnType> = {
	16: "boolean",
	17: "bytes",
	18: "character",
	20: "int64",
	21: "int32",
	23: "int32",
	25: "text",
	114: "json",
	700: "float",
	701: "double",
	1042: "character",
	1043: "text",
	1082: "date",
	1083: "time",
	1114: "datetime",
	1184: "datetime",
	1266: "time",
	1700: "numeric",
	2950: "uuid",
	3802: "json",
};

/**
 * Column type of a PostgreSQL type OID.
 */
export function postgresColumnType(oid: number): ColumnType {
	return POSTGRES_TYPE_OIDS[oid] ?? "unknown";
}

const MYSQL_TYPE_CODES: Record<number, ColumnType> = {
	0: "numeric",
	1: "int32",
	2: "int32",
	3: "int32",
	4: "float",
	5: "double",
	7: "datetime",
	8: "int64",
	9: "int32",
	10: "date",
	11: "time",
	12: "datetime",
	13: "int32",
	15: "text",
	16: "bytes",
	245: "json",
	246: "numeric",
	247: "enum",
	253: "text",
	254: "text",
};

/** Character set number MySQL reports for binary columns. */
const MYSQL_BINARY_CHARSET = 63;

/**
 * Column type of a MySQL protocol type code. BLOB codes carry both text
 * and binary columns; the character set tells them apart.
 */
export function mysqlColumnType(code: number, characterSet?: number): ColumnType {
	if (code >= 249 && code <= 252) {
		return characterSet === MYSQL_BINARY_CHARSET ? "bytes" : "text";
	}
	return MYSQL_TYPE_CODES[code] ?? "unknown";
}

const VITESS_TYPES: Record<string, ColumnType> = {
	INT8: "int32",
	UINT8: "int32",
	INT16: "int32",
	UINT16: "int32",
	INT24: "int32",
	UINT24: "int32",
	INT32: "int32",
	UINT32: "int64",
	INT64: "int64",
	UINT64: "int64",
	YEAR: "int32",
	FLOAT32: "float",
	FLOAT64: "double",
	DECIMAL: "numeric",
	TIMESTAMP: "datetime",
	DATETIME: "datetime",
	DATE: "date",
	TIME: "time",
	CHAR: "character",
	VARCHAR: "text",
	TEXT: "text",
	BLOB: "bytes",
	VARBINARY: "bytes",
	BINARY: "bytes",
	BIT: "bytes",
	JSON: "json",
	ENUM: "enum",
	SET: "text",
};

/**
 * Column type of a Vitess field type name, as the edge MySQL client
 * reports it.
 */
export function vitessColumnType(type: string): ColumnType {
	return VITESS_TYPES[type] ?? "unknown";
}

/**
 * Column type of a SQLite declared type, or undefined when the column
 * has no declared type (expressions) or an unrecognized one.
 */
export function sqliteColumnType(
	declared: string | null | undefined,
): ColumnType | undefined {
	if (!declared) return undefined;
	const type = declared.toUpperCase();
	if (type.includes("BIGINT")) return "int64";
	if (type.includes("INT")) return "int32";
	if (type.includes("BOOL")) return "boolean";
	if (type.includes("DATETIME") || type.includes("TIMESTAMP")) {
		return "datetime";
	}
	if (type.includes("DATE")) return "date";
	if (type.includes("TIME")) return "time";
	if (type.includes("CHAR") || type.includes("CLOB") || type.includes("TEXT")) {
		return "text";
	}
	if (type.includes("BLOB")) return "bytes";
	if (type.includes("REAL") || type.includes("FLOA") || type.includes("DOUB")) {
		return "double";
	}
	if (type.includes("DECIMAL") || type.includes("NUMERIC")) return "numeric";
	if (type.includes("JSON")) return "json";
	return undefined;
}

/**
 * Use declared column types where known, falling back to the values.
 */
export function resolveColumnTypes(
	declared: Array<ColumnType | undefined>,
	rows: unknown[][],
): ColumnType[] {
	const inferred = inferColumnTypes(declared.length, rows);
	return declared.map((type, i) => type ?? inferred[i]);
}

const MSSQL_TYPES: Record<string, ColumnType> = {
	TinyInt: "int32",
	SmallInt: "int32",
	Int: "int32",
	BigInt: "int64",
	Real: "float",
	Float: "double",
	Decimal: "numeric",
	Numeric: "numeric",
	Money: "numeric",
	SmallMoney: "numeric",
	Bit: "boolean",
	Char: "character",
	NChar: "character",
	VarChar: "text",
	NVarChar: "text",
	Text: "text",
	NText: "text",
	Xml: "text",
	Date: "date",
	Time: "time",
	DateTime: "datetime",
	DateTime2: "datetime",
	DateTimeOffset: "datetime",
	SmallDateTime: "datetime",
	UniqueIdentifier: "uuid",
	Binary: "bytes",
	VarBinary: "bytes",
	Image: "bytes",
};

/**
 * Column type of a tedious data type name. Nullable variants ("IntN",
 * "DateTimeN") map like their base type.
 */
export function mssqlColumnType(name: string): ColumnType {
	const base =
		name.endsWith("N") && !(name in MSSQL_TYPES) ? name.slice(0, -1) : name;
	return MSSQL_TYPES[base] ?? "unknown";
}

/** SQLite's default SQLITE_MAX_VARIABLE_NUMBER before 3.32. */
export const SQLITE_MAX_BIND_VALUES = 999;

/** SQL Server's limit of 2100 parameters, less headroom for the driver. */
export const MSSQL_MAX_BIND_VALUES = 2098;

// ============================================================================
// Connection URLs
// ============================================================================

/**
 * Remove the `schema` parameter from a PostgreSQL connection URL, which
 * drivers would otherwise send to the server as a runtime parameter.
 */
export function takeSchemaParam(url: string): {url: string; schema: string} {
	let parsed: URL;
	try {
		parsed = new URL(url);
	} catch {
		return {url, schema: "public"};
	}
	const schema = parsed.searchParams.get("schema") ?? "public";
	if (!parsed.searchParams.has("schema")) return {url, schema};
	parsed.searchParams.delete("schema");
	return {url: parsed.toString(), schema};
}

// ============================================================================
// Arguments
// ============================================================================

/**
 * Convert arguments for SQLite drivers, which reject booleans.
 */
export function toSQLiteArgs(args: unknown[]): unknown[] {
	return args.map((value) =>
		typeof value === "boolean" ? (value ? 1 : 0) : value,
	);
}

/**
 * JSON text of an argument; bigints become decimal strings.
 */
export function stringifyArg(value: unknown): string {
	const json = JSON.stringify(value, (_key, inner: unknown) =>
		typeof inner === "bigint" ? inner.toString() : inner,
	);
	// JSON.stringify(undefined) has no JSON text
	return json ?? "null";
}

// ============================================================================
// Scripts
// ============================================================================

/**
 * Split a script into statements on semicolons outside quotes and comments.
 */
export function splitStatements(script: string): string[] {
	const statements: string[] = [];
	let current = "";
	let quote: string | null = null;
	let lineComment = false;

	for (let i = 0; i < script.length; i++) {
		const char = script[i];
		const next = script[i + 1];

		if (lineComment) {
			if (char === "\n") lineComment = false;
			current += char;
			continue;
		}

		if (quote) {
			current += char;
			if (char === quote) quote = null;
			continue;
		}

		if (char === "'" || char === '"' || char === "`") {
			quote = char;
			current += char;
		} else if (char === "-" && next === "-") {
			lineComment = true;
			current += char;
		} else if (char === ";") {
			if (current.trim()) statements.push(current.trim());
			current = "";
		} else {
			current += char;
		}
	}

	if (current.trim()) statements.push(current.trim());
	return statements;
}
