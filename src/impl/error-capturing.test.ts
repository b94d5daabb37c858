import {describe, expect, test} from "./node-test-utils.js";
import {bindAdapter} from "./error-capturing.js";
import {ConstraintViolationError, QueryError} from "./errors.js";
import {ErrorRegistry, unwrap} from "./result.js";
import {TestAdapter} from "./test-driver.js";

const ROWS = {
	columnNames: ["id"],
	columnTypes: ["int32" as const],
	rows: [[1], [2]],
};

describe("bindAdapter", () => {
	test("passes successful results through", async () => {
		const adapter = bindAdapter(new TestAdapter({respond: () => ROWS}));
		const result = await adapter.queryRaw({sql: "SELECT id FROM t", args: []});
		expect(result).toEqual({ok: true, value: ROWS});
	});

	test("copies the descriptor of the wrapped adapter", () => {
		const adapter = bindAdapter(
			new TestAdapter({provider: "postgres", adapterName: "pg"}),
		);
		expect(adapter.provider).toBe("postgres");
		expect(adapter.adapterName).toBe("pg");
	});

	test("turns a thrown error into a handle", async () => {
		const error = new QueryError("no such table: t");
		const adapter = bindAdapter(
			new TestAdapter({
				respond: () => {
					throw error;
				},
			}),
		);

		const result = await adapter.queryRaw({sql: "SELECT 1 FROM t", args: []});
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(adapter.errorRegistry.peek(result.error)?.error).toBe(error);
			expect(adapter.errorRegistry.peek(result.error)?.kind).toBe(
				"QUERY_ERROR",
			);
		}
	});

	test("unwrap rethrows the original error", async () => {
		const error = new ConstraintViolationError("dup", {kind: "unique"});
		const adapter = bindAdapter(
			new TestAdapter({
				affected: () => {
					throw error;
				},
			}),
		);
		const result = await adapter.executeRaw({sql: "INSERT", args: []});

		let caught: unknown;
		try {
			unwrap(result, adapter.errorRegistry);
		} catch (e) {
			caught = e;
		}
		expect(caught).toBe(error);
	});

	test("uses the registry it is given", async () => {
		const registry = new ErrorRegistry();
		const adapter = bindAdapter(
			new TestAdapter({
				respond: () => {
					throw new Error("down");
				},
			}),
			registry,
		);
		await adapter.queryRaw({sql: "SELECT 1", args: []});
		expect(adapter.errorRegistry).toBe(registry);
		expect(registry.size).toBe(1);
	});

	test("wraps transactions and their commands", async () => {
		const inner = new TestAdapter({failCommit: new Error("commit failed")});
		const adapter = bindAdapter(inner);

		const context = unwrap(
			await adapter.transactionContext(),
			adapter.errorRegistry,
		);
		const tx = unwrap(
			await context.startTransaction("Serializable"),
			adapter.errorRegistry,
		);
		expect(tx.isolationLevel).toBe("Serializable");

		const queried = await tx.queryRaw({sql: "SELECT 1", args: []});
		expect(queried.ok).toBe(true);

		const committed = await tx.commit();
		expect(committed.ok).toBe(false);
		expect(inner.log).toEqual([
			"tx1 BEGIN Serializable",
			"tx1 query: SELECT 1",
			"tx1 COMMIT",
		]);
	});

	test("getConnectionInfo is present only when the adapter has it", () => {
		expect(bindAdapter(new TestAdapter()).getConnectionInfo).toBeUndefined();

		const adapter = bindAdapter(
			new TestAdapter({
				connectionInfo: {schemaName: "app", supportsRelationJoins: true},
			}),
		);
		expect(adapter.getConnectionInfo?.()).toEqual({
			ok: true,
			value: {schemaName: "app", supportsRelationJoins: true},
		});
	});

	test("dispose and executeScript resolve to results", async () => {
		const inner = new TestAdapter();
		const adapter = bindAdapter(inner);
		expect(await adapter.executeScript("CREATE TABLE t (id INTEGER)")).toEqual({
			ok: true,
			value: undefined,
		});
		expect(await adapter.dispose()).toEqual({ok: true, value: undefined});
		expect(inner.log).toEqual(["script: CREATE TABLE t (id INTEGER)", "dispose"]);
	});
});
