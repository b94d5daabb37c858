/**
 * Adapter factory.
 *
 * Builds a driver adapter from a validated configuration. Driver modules
 * are imported on demand so only the chosen backend's library is loaded.
 */

import type {DriverAdapter} from "./adapter.js";
import {parseAdapterConfig} from "./config.js";
import {
	bindAdapter,
	type ErrorCapturingDriverAdapter,
} from "./error-capturing.js";
import {componentLogger, type Logger} from "./logger.js";
import type {ErrorRegistry} from "./result.js";

export interface CreateAdapterOptions {
	logger?: Logger;
}

function assertNever(value: never): never {
	throw new Error(`Unhandled adapter config: ${JSON.stringify(value)}`);
}

/**
 * Create the driver adapter named by `config.adapter`.
 *
 * Accepts unvalidated input; it is checked with the adapter config schema
 * first.
 */
export async function createAdapter(
	input: unknown,
	options: CreateAdapterOptions = {},
): Promise<DriverAdapter> {
	const config = parseAdapterConfig(input);
	const logger = options.logger;
	const capabilities = {relationJoins: config.relationJoins};
	componentLogger("factory", logger).debug(
		{adapter: config.adapter},
		"creating driver adapter",
	);

	switch (config.adapter) {
		case "postgres": {
			const {default: PostgresAdapter} = await import("../postgres.js");
			return new PostgresAdapter(config.url, {
				max: config.max,
				idleTimeout: config.idleTimeout,
				connectTimeout: config.connectTimeout,
				capabilities,
				logger,
			});
		}
		case "pg": {
			const {default: PgAdapter} = await import("../pg.js");
			return new PgAdapter(config.url, {max: config.max, capabilities, logger});
		}
		case "better-sqlite3": {
			const {default: SQLiteAdapter} = await import("../sqlite.js");
			return new SQLiteAdapter(config.url, {capabilities, logger});
		}
		case "libsql": {
			const {default: LibSQLAdapter} = await import("../libsql.js");
			return new LibSQLAdapter(config.url, {
				authToken: config.authToken,
				capabilities,
				logger,
			});
		}
		case "d1": {
			const {default: D1Adapter} = await import("../d1.js");
			return new D1Adapter(config.binding, {capabilities, logger});
		}
		case "mysql2": {
			const {default: MySQLAdapter} = await import("../mysql.js");
			return new MySQLAdapter(config.url, {
				connectionLimit: config.connectionLimit,
				idleTimeout: config.idleTimeout,
				connectTimeout: config.connectTimeout,
				capabilities,
				logger,
			});
		}
		case "planetscale": {
			const {default: PlanetScaleAdapter} = await import("../planetscale.js");
			return new PlanetScaleAdapter(config.url, {capabilities, logger});
		}
		case "mssql": {
			const {default: MSSQLAdapter} = await import("../mssql.js");
			return new MSSQLAdapter(config.url, {capabilities, logger});
		}
		default:
			return assertNever(config);
	}
}

/**
 * Create an adapter and wrap it in the error-capturing layer.
 */
export async function createBoundAdapter(
	input: unknown,
	options: CreateAdapterOptions & {registry?: ErrorRegistry} = {},
): Promise<ErrorCapturingDriverAdapter> {
	return bindAdapter(await createAdapter(input, options), options.registry);
}
