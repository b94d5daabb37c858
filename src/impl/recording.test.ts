import {describe, expect, test} from "./node-test-utils.js";
import type {ResultSet, SqlQuery} from "./adapter.js";
import {bindAdapter} from "./error-capturing.js";
import {
	NotRecordedError,
	QueryError,
	UnsupportedCapabilityError,
} from "./errors.js";
import {
	createRecordings,
	queryKey,
	recordAdapter,
	replayAdapter,
} from "./recording.js";
import {unwrap} from "./result.js";
import {TestAdapter} from "./test-driver.js";

const tableMissing = new QueryError("no such table: gone", {
	sql: "SELECT * FROM gone",
});

function respond(query: SqlQuery): ResultSet {
	if (query.sql.includes("gone")) throw tableMissing;
	return {
		columnNames: ["id", "name"],
		columnTypes: ["int32", "text"],
		rows: [[query.args[0], "Ada"]],
	};
}

describe("queryKey", () => {
	test("inlines postgres placeholders in order", () => {
		expect(
			queryKey("postgres", {
				sql: "SELECT * FROM t WHERE a = $1 AND b = $2",
				args: [1, "x"],
			}),
		).toBe('SELECT * FROM t WHERE a = 1 AND b = "x"');
	});

	test("inlines question marks one at a time", () => {
		expect(
			queryKey("sqlite", {
				sql: "SELECT * FROM t WHERE a = ? AND b = ?",
				args: [true, null],
			}),
		).toBe("SELECT * FROM t WHERE a = true AND b = null");
	});

	test("inlines SQL Server placeholders", () => {
		expect(
			queryKey("sqlserver", {sql: "SELECT @P1, @P2", args: [10n, [1, 2]]}),
		).toBe('SELECT "10", [1,2]');
	});

	test("keeps replacement patterns in values literal", () => {
		expect(queryKey("postgres", {sql: "SELECT $1", args: ["$&"]})).toBe(
			'SELECT "$&"',
		);
	});

	test("replaces the first textual occurrence", () => {
		expect(queryKey("postgres", {sql: "SELECT $10, $1", args: ["a"]})).toBe(
			'SELECT "a"0, $1',
		);
	});

	test("leaves SQL without arguments unchanged", () => {
		expect(queryKey("mysql", {sql: "SELECT 1", args: []})).toBe("SELECT 1");
	});
});

describe("Recording and replay", () => {
	test("replay answers recorded reads with identical results", async () => {
		const inner = new TestAdapter({respond});
		const live = bindAdapter(inner);
		const recordings = createRecordings(live);
		const recorder = recordAdapter(live, recordings);

		const query = {sql: "SELECT id, name FROM users WHERE id = ?", args: [7]};
		const recorded = await recorder.queryRaw(query);
		expect(recordings.keys()).toEqual([
			"SELECT id, name FROM users WHERE id = 7",
		]);

		const replayer = replayAdapter(recordings);
		const replayed = await replayer.queryRaw(query);
		expect(replayed).toEqual(recorded);
		expect(JSON.stringify(replayed)).toBe(JSON.stringify(recorded));
		expect(inner.log).toEqual(["query: SELECT id, name FROM users WHERE id = ?"]);
	});

	test("replay keeps the recorded descriptor", () => {
		const live = bindAdapter(
			new TestAdapter({provider: "postgres", adapterName: "postgres"}),
		);
		const replayer = replayAdapter(createRecordings(live));
		expect(replayer.provider).toBe("postgres");
		expect(replayer.adapterName).toBe("postgres");
	});

	test("a failed read replays as the same error", async () => {
		const live = bindAdapter(new TestAdapter({respond}));
		const recordings = createRecordings(live);
		const recorder = recordAdapter(live, recordings);
		const query = {sql: "SELECT * FROM gone", args: []};

		const recorded = await recorder.queryRaw(query);
		expect(recorded.ok).toBe(false);
		expect(recordings.get("SELECT * FROM gone")).toEqual({
			ok: false,
			error: tableMissing,
		});

		const replayer = replayAdapter(recordings);
		const replayed = await replayer.queryRaw(query);
		let caught: unknown;
		try {
			unwrap(replayed, replayer.errorRegistry);
		} catch (error) {
			caught = error;
		}
		expect(caught).toBe(tableMissing);
	});

	test("an unrecorded read fails with its key", async () => {
		const replayer = replayAdapter(
			createRecordings({provider: "sqlite", adapterName: "better-sqlite3"}),
		);
		const result = await replayer.queryRaw({sql: "SELECT ?", args: ["x"]});

		let caught: unknown;
		try {
			unwrap(result, replayer.errorRegistry);
		} catch (error) {
			caught = error;
		}
		expect(caught).toBeInstanceOf(NotRecordedError);
		expect(caught instanceof Error ? caught.message : "").toBe(
			'Query not recorded: SELECT "x"',
		);
	});

	test("writes, scripts and transactions are refused in both modes", async () => {
		const inner = new TestAdapter({respond});
		const live = bindAdapter(inner);
		const recordings = createRecordings(live);

		for (const adapter of [
			recordAdapter(live, recordings),
			replayAdapter(recordings),
		]) {
			const write = await adapter.executeRaw({sql: "DELETE FROM t", args: []});
			const script = await adapter.executeScript("DROP TABLE t");
			const context = await adapter.transactionContext();

			for (const result of [write, script, context]) {
				expect(result.ok).toBe(false);
				if (!result.ok) {
					const detail = adapter.errorRegistry.peek(result.error);
					expect(detail?.error).toBeInstanceOf(UnsupportedCapabilityError);
				}
			}
			if (!write.ok) {
				expect(adapter.errorRegistry.peek(write.error)?.message).toBe(
					"executeRaw is not available while recording or replaying",
				);
			}
		}

		expect(inner.log).toEqual([]);
		expect(recordings.size).toBe(0);
	});

	test("the recorder passes connection info through", () => {
		const live = bindAdapter(
			new TestAdapter({connectionInfo: {supportsRelationJoins: true}}),
		);
		const recorder = recordAdapter(live, createRecordings(live));
		expect(recorder.getConnectionInfo?.()).toEqual({
			ok: true,
			value: {supportsRelationJoins: true},
		});
	});
});
