import {describe, expect, test} from "./node-test-utils.js";
import {
	DEFAULT_TRANSACTION_TIMEOUTS,
	loadConfigFromEnv,
	parseAdapterConfig,
	type D1DatabaseLike,
} from "./config.js";
import {ConfigurationError} from "./errors.js";

function configError(fn: () => unknown): ConfigurationError {
	try {
		fn();
	} catch (error) {
		if (error instanceof ConfigurationError) return error;
		throw error;
	}
	throw new Error("Expected a ConfigurationError");
}

const binding: D1DatabaseLike = {
	prepare: () => {
		throw new Error("not used");
	},
	batch: async () => [],
	exec: async () => undefined,
};

describe("parseAdapterConfig", () => {
	test("accepts a postgres config", () => {
		expect(
			parseAdapterConfig({
				adapter: "postgres",
				url: "postgresql://localhost/app",
				max: 5,
				relationJoins: true,
			}),
		).toEqual({
			adapter: "postgres",
			url: "postgresql://localhost/app",
			max: 5,
			relationJoins: true,
		});
	});

	test("accepts a D1 binding", () => {
		const config = parseAdapterConfig({adapter: "d1", binding});
		expect(config.adapter).toBe("d1");
		if (config.adapter === "d1") {
			expect(config.binding).toBe(binding);
		}
	});

	test("reports missing fields by path", () => {
		const error = configError(() => parseAdapterConfig({adapter: "mysql2"}));
		expect(error.message).toBe("Invalid adapter configuration: url: Required");
		expect(error.issues).toEqual(["url: Required"]);
		expect(error.code).toBe("CONFIGURATION_ERROR");
	});

	test("rejects an object that is not a D1 binding", () => {
		const error = configError(() =>
			parseAdapterConfig({adapter: "d1", binding: {}}),
		);
		expect(error.issues).toEqual(["binding: Expected a D1 database binding"]);
	});

	test("rejects unknown adapters", () => {
		const error = configError(() =>
			parseAdapterConfig({adapter: "oracle", url: "x"}),
		);
		expect(error.issues).toHaveLength(1);
		expect(error.issues[0]).toMatch(/^adapter: /);
	});

	test("rejects a non-positive pool size", () => {
		const error = configError(() =>
			parseAdapterConfig({adapter: "pg", url: "postgresql://x/y", max: 0}),
		);
		expect(error.issues).toHaveLength(1);
		expect(error.issues[0]).toMatch(/^max: /);
	});
});

describe("loadConfigFromEnv", () => {
	test("builds an adapter config with default timeouts", () => {
		expect(
			loadConfigFromEnv({
				SLUICE_ADAPTER: "postgres",
				DATABASE_URL: "postgresql://localhost/app",
			}),
		).toEqual({
			adapter: {adapter: "postgres", url: "postgresql://localhost/app"},
			logLevel: "info",
			transaction: DEFAULT_TRANSACTION_TIMEOUTS,
		});
	});

	test("passes the auth token to libsql and reads overrides", () => {
		const config = loadConfigFromEnv({
			SLUICE_ADAPTER: "libsql",
			DATABASE_URL: "libsql://db.example.test",
			DATABASE_AUTH_TOKEN: "test-secret",
			LOG_LEVEL: "debug",
			SLUICE_TX_MAX_WAIT: "500",
			SLUICE_TX_TIMEOUT: "10000",
		});
		expect(config.adapter).toEqual({
			adapter: "libsql",
			url: "libsql://db.example.test",
			authToken: "test-secret",
		});
		expect(config.logLevel).toBe("debug");
		expect(config.transaction).toEqual({maxWait: 500, timeout: 10000});
	});

	test("reports missing variables", () => {
		const error = configError(() =>
			loadConfigFromEnv({SLUICE_ADAPTER: "pg"}),
		);
		expect(error.message).toBe(
			"Invalid environment configuration: DATABASE_URL: Required",
		);
	});

	test("D1 cannot be configured from the environment", () => {
		const error = configError(() =>
			loadConfigFromEnv({SLUICE_ADAPTER: "d1", DATABASE_URL: "x"}),
		);
		expect(error.issues[0]).toMatch(/^SLUICE_ADAPTER: /);
	});

	test("rejects a timeout that is not a number", () => {
		const error = configError(() =>
			loadConfigFromEnv({
				SLUICE_ADAPTER: "pg",
				DATABASE_URL: "postgresql://x/y",
				SLUICE_TX_TIMEOUT: "soon",
			}),
		);
		expect(error.issues[0]).toMatch(/^SLUICE_TX_TIMEOUT: /);
	});
});
