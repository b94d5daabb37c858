/**
 * The query pipeline end to end over better-sqlite3, with a small compiler
 * and interpreter standing in for the engine.
 */

import {z} from "zod";
import {afterEach, beforeEach, describe, expect, test} from "../src/impl/node-test-utils.js";
import SQLiteAdapter from "../src/sqlite.js";
import type {
	QueryCompiler,
	QueryInterpreterFactory,
} from "../src/impl/engine.js";
import {
	bindAdapter,
	type ErrorCapturingDriverAdapter,
} from "../src/impl/error-capturing.js";
import {
	ConstraintViolationError,
	NotRecordedError,
	UnsupportedCapabilityError,
} from "../src/impl/errors.js";
import {createLogger} from "../src/impl/logger.js";
import {PanicBridge} from "../src/impl/panic.js";
import {QueryPipeline, QueryRequestSchema} from "../src/impl/pipeline.js";
import {createRecordings, recordAdapter, replayAdapter} from "../src/impl/recording.js";
import {unwrap} from "../src/impl/result.js";
import {TransactionManager} from "../src/impl/transaction-manager.js";

const logger = createLogger({level: "silent"});

// ============================================================================
// Engine
// ============================================================================

const PlanSchema = z.object({
	kind: z.enum(["query", "execute"]),
	sql: z.string(),
	args: z.array(z.unknown()),
	single: z.boolean(),
});

type Plan = z.infer<typeof PlanSchema>;

const DataSchema = z.record(z.unknown());

const compiler: QueryCompiler = {
	compile(request) {
		const query = QueryRequestSchema.parse(JSON.parse(request));
		const table = `"${query.modelName ?? ""}"`;
		let plan: Plan;
		switch (query.action) {
			case "createOne": {
				const data = DataSchema.parse(query.query.arguments?.data);
				const columns = Object.keys(data);
				plan = {
					kind: "query",
					sql: `INSERT INTO ${table} (${columns.join(", ")}) VALUES (${columns.map(() => "?").join(", ")}) RETURNING id`,
					args: Object.values(data),
					single: true,
				};
				break;
			}
			case "findMany":
				plan = {
					kind: "query",
					sql: `SELECT id, email FROM ${table} ORDER BY id`,
					args: [],
					single: false,
				};
				break;
			case "deleteMany":
				plan = {kind: "execute", sql: `DELETE FROM ${table}`, args: [], single: false};
				break;
			default:
				throw new Error(`Unknown action ${query.action}`);
		}
		return JSON.stringify(plan);
	},
};

function interpreterFactory(
	adapter: ErrorCapturingDriverAdapter,
): QueryInterpreterFactory {
	const registry = adapter.errorRegistry;
	return (options) => ({
		async run(input, queryable) {
			const plan = PlanSchema.parse(input);
			const query = {sql: plan.sql, args: plan.args};
			const started = Date.now();
			let result: unknown;
			if (plan.kind === "execute") {
				result = unwrap(await queryable.executeRaw(query), registry);
			} else {
				const resultSet = unwrap(await queryable.queryRaw(query), registry);
				const records = resultSet.rows.map((row) =>
					Object.fromEntries(
						resultSet.columnNames.map((name, i) => [name, row[i]]),
					),
				);
				result = plan.single ? (records[0] ?? null) : records;
			}
			options.onQuery({
				timestamp: new Date(started),
				query: plan.sql,
				params: plan.args,
				duration: Date.now() - started,
			});
			return result;
		},
	});
}

function createPipeline(adapter: ErrorCapturingDriverAdapter): QueryPipeline {
	return new QueryPipeline({
		adapter,
		compiler,
		interpreterFactory: interpreterFactory(adapter),
		transactionManager: new TransactionManager(adapter, {logger}),
		panicBridge: new PanicBridge(),
		logger,
	});
}

function createUser(email: string) {
	return {
		modelName: "User",
		action: "createOne",
		query: {arguments: {data: {email}}, selection: {id: true}},
	};
}

const findUsers = {modelName: "User", action: "findMany", query: {}};
const deleteUsers = {modelName: "User", action: "deleteMany", query: {}};

// ============================================================================
// Tests
// ============================================================================

let driver: SQLiteAdapter;
let adapter: ErrorCapturingDriverAdapter;

beforeEach(async () => {
	driver = new SQLiteAdapter(":memory:", {logger});
	await driver.executeScript(
		'CREATE TABLE "User" (id INTEGER PRIMARY KEY, email TEXT NOT NULL UNIQUE);',
	);
	adapter = bindAdapter(driver);
});

afterEach(async () => {
	await driver.dispose();
});

describe("QueryPipeline over SQLite", () => {
	test("creates and reads records", async () => {
		const pipeline = createPipeline(adapter);

		expect(await pipeline.run(JSON.stringify(createUser("ada@example.com")))).toBe(
			'{"data":{"createOneUser":{"id":1}}}',
		);
		expect(await pipeline.run(createUser("bob@example.com"))).toBe(
			'{"data":{"createOneUser":{"id":2}}}',
		);
		expect(await pipeline.run(findUsers)).toBe(
			'{"data":{"findManyUser":[{"id":1,"email":"ada@example.com"},{"id":2,"email":"bob@example.com"}]}}',
		);
		expect(await pipeline.run(deleteUsers)).toBe(
			'{"data":{"deleteManyUser":{"count":2}}}',
		);
		expect(pipeline.queryLogs).toHaveLength(4);
	});

	test("a failing transactional batch leaves nothing behind", async () => {
		const pipeline = createPipeline(adapter);

		await expect(
			pipeline.run({
				batch: [createUser("ada@example.com"), createUser("ada@example.com")],
				transaction: {},
			}),
		).rejects.toThrow(ConstraintViolationError);

		expect(await pipeline.run(findUsers)).toBe('{"data":{"findManyUser":[]}}');
	});

	test("a transactional batch commits every item", async () => {
		const pipeline = createPipeline(adapter);
		expect(
			await pipeline.run({
				batch: [createUser("ada@example.com"), findUsers],
				transaction: {isolationLevel: "Serializable"},
			}),
		).toBe(
			'{"batchResult":[{"data":{"createOneUser":{"id":1}}},{"data":{"findManyUser":[{"id":1,"email":"ada@example.com"}]}}]}',
		);
	});

	test("interactive transactions roll back on request", async () => {
		const pipeline = createPipeline(adapter);
		const manager = pipeline.transactionManager;

		const info = await manager.startTransaction();
		expect(await pipeline.run(createUser("ada@example.com"), info.id)).toBe(
			'{"data":{"createOneUser":{"id":1}}}',
		);
		await manager.rollbackTransaction(info.id);

		expect(await pipeline.run(findUsers)).toBe('{"data":{"findManyUser":[]}}');
	});
});

describe("Recording and replay through the pipeline", () => {
	test("replay answers with the recorded response", async () => {
		await driver.executeScript(
			"INSERT INTO \"User\" (email) VALUES ('ada@example.com'), ('bob@example.com');",
		);
		const recordings = createRecordings(adapter);
		const recorded = await createPipeline(recordAdapter(adapter, recordings)).run(
			findUsers,
		);

		// Nothing reaches SQLite from here on
		await driver.executeScript('DELETE FROM "User";');

		const replay = createPipeline(replayAdapter(recordings));
		expect(await replay.run(findUsers)).toBe(recorded);
		expect(recorded).toBe(
			'{"data":{"findManyUser":[{"id":1,"email":"ada@example.com"},{"id":2,"email":"bob@example.com"}]}}',
		);
	});

	test("replay refuses reads it never saw and every write", async () => {
		const recordings = createRecordings(adapter);
		const replay = createPipeline(replayAdapter(recordings));

		await expect(replay.run(findUsers)).rejects.toThrow(NotRecordedError);
		await expect(replay.run(deleteUsers)).rejects.toThrow(
			UnsupportedCapabilityError,
		);
	});
});
