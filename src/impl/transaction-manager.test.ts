import {describe, expect, rejection, test} from "./node-test-utils.js";
import {bindAdapter} from "./error-capturing.js";
import {
	TransactionClosedError,
	TransactionError,
	TransactionNotFoundError,
} from "./errors.js";
import {createLogger} from "./logger.js";
import {unwrap} from "./result.js";
import {TestAdapter, type TestAdapterOptions} from "./test-driver.js";
import {TransactionManager} from "./transaction-manager.js";
import type {TransactionTimeouts} from "./config.js";

const logger = createLogger({level: "silent"});

function setup(
	options: TestAdapterOptions = {},
	timeouts?: Partial<TransactionTimeouts>,
	lines?: string[],
) {
	const inner = new TestAdapter(options);
	const adapter = bindAdapter(inner);
	const manager = new TransactionManager(adapter, {
		timeouts,
		logger: lines
			? createLogger({
					level: "error",
					destination: {write: (line: string) => void lines.push(line)},
				})
			: logger,
	});
	return {inner, adapter, manager};
}

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("TransactionManager", () => {
	test("start, query and commit", async () => {
		const {inner, manager} = setup();
		const info = await manager.startTransaction();
		expect(info.status).toBe("open");
		expect(manager.size).toBe(1);

		const tx = await manager.getTransaction(info.id, "query");
		await tx.queryRaw({sql: "SELECT 1", args: []});
		await manager.commitTransaction(info.id);

		expect(manager.size).toBe(0);
		expect(inner.log).toEqual(["tx1 BEGIN", "tx1 query: SELECT 1", "tx1 COMMIT"]);
	});

	test("passes the isolation level to the backend", async () => {
		const {inner, manager} = setup();
		const info = await manager.startTransaction({isolationLevel: "Serializable"});
		expect(info.isolationLevel).toBe("Serializable");
		await manager.rollbackTransaction(info.id);
		expect(inner.log).toEqual(["tx1 BEGIN Serializable", "tx1 ROLLBACK"]);
	});

	test("ids are unique", async () => {
		const {manager} = setup();
		const a = await manager.startTransaction();
		const b = await manager.startTransaction();
		expect(a.id).not.toBe(b.id);
		await manager.closeAll();
	});

	test("unknown ids are reported as not found", async () => {
		const {manager} = setup();
		const error = await rejection(manager.getTransaction("missing", "query"));
		expect(error).toBeInstanceOf(TransactionNotFoundError);
		expect(error instanceof Error ? error.message : "").toBe(
			"No transaction with id missing found. Please call startTx first.",
		);
	});

	test("operations on a committed transaction fail as closed", async () => {
		const {manager} = setup();
		const info = await manager.startTransaction();
		await manager.commitTransaction(info.id);

		const error = await rejection(manager.getTransaction(info, "query"));
		expect(error).toBeInstanceOf(TransactionClosedError);
		expect(error instanceof Error ? error.message : "").toBe(
			`Transaction ${info.id} is already closed (committed): a query cannot be executed on it.`,
		);
		await expect(manager.rollbackTransaction(info.id)).rejects.toThrow(
			TransactionClosedError,
		);
	});

	test("commit after rollback fails as closed", async () => {
		const {manager} = setup();
		const info = await manager.startTransaction();
		await manager.rollbackTransaction(info.id);
		await expect(manager.commitTransaction(info.id)).rejects.toThrow(
			"already closed (rolled-back)",
		);
	});

	test("a failed commit rolls back, closes the transaction and rethrows", async () => {
		const failure = new Error("serialization failure");
		const {inner, manager} = setup({failCommit: failure});
		const info = await manager.startTransaction();

		const error = await rejection(manager.commitTransaction(info.id));
		expect(error).toBe(failure);
		expect(inner.log).toEqual(["tx1 BEGIN", "tx1 COMMIT", "tx1 ROLLBACK"]);
		expect(manager.size).toBe(0);
		await expect(manager.getTransaction(info.id, "query")).rejects.toThrow(
			"already closed (rolled-back)",
		);
	});

	test("a failed rollback after a failed commit is logged and the commit error wins", async () => {
		const failure = new Error("serialization failure");
		const lines: string[] = [];
		const {manager} = setup(
			{failCommit: failure, failRollback: new Error("connection lost")},
			undefined,
			lines,
		);
		const info = await manager.startTransaction();

		expect(await rejection(manager.commitTransaction(info.id))).toBe(failure);
		expect(lines).toHaveLength(1);
		const entry: unknown = JSON.parse(lines[0]);
		expect(
			entry !== null && typeof entry === "object" ? Reflect.get(entry, "msg") : undefined,
		).toBe("rollback after failed commit failed: connection lost");
	});

	test("a queryable handed out earlier refuses work after the transaction times out", async () => {
		const {inner, adapter, manager} = setup({}, {timeout: 10});
		const info = await manager.startTransaction();
		const tx = await manager.getTransaction(info.id, "query");

		await sleep(50);
		const result = await tx.executeRaw({sql: "DELETE FROM users", args: []});
		expect(result.ok).toBe(false);
		expect(() => unwrap(result, adapter.errorRegistry)).toThrow(
			`Transaction ${info.id} is already closed (timed-out): a execute cannot be executed on it.`,
		);
		expect(inner.log).toEqual(["tx1 BEGIN", "tx1 ROLLBACK"]);
	});

	test("a queryable handed out earlier refuses work after commit", async () => {
		const {inner, adapter, manager} = setup();
		const info = await manager.startTransaction();
		const tx = await manager.getTransaction(info, "query");
		await manager.commitTransaction(info.id);

		const result = await tx.queryRaw({sql: "SELECT 1", args: []});
		expect(() => unwrap(result, adapter.errorRegistry)).toThrow(
			TransactionClosedError,
		);
		expect(inner.log).toEqual(["tx1 BEGIN", "tx1 COMMIT"]);
	});

	test("a backend start failure is rethrown unchanged", async () => {
		const failure = new Error("too many connections");
		const {manager} = setup({failStart: failure});
		expect(await rejection(manager.startTransaction())).toBe(failure);
		expect(manager.size).toBe(0);
	});

	test("a start slower than maxWait fails and the late transaction is rolled back", async () => {
		const {inner, manager} = setup({startDelay: 40});
		await expect(manager.startTransaction({maxWait: 5})).rejects.toThrow(
			TransactionError,
		);
		await expect(manager.startTransaction({maxWait: 5})).rejects.toThrow(
			"Unable to start a transaction in the given time (5 ms)",
		);

		await sleep(100);
		expect(manager.size).toBe(0);
		expect(inner.log).toEqual([
			"tx1 BEGIN",
			"tx1 ROLLBACK",
			"tx2 BEGIN",
			"tx2 ROLLBACK",
		]);
	});

	test("an expired transaction is rolled back and reported as timed out", async () => {
		const {inner, manager} = setup({}, {timeout: 10});
		const info = await manager.startTransaction();

		await sleep(50);
		expect(manager.size).toBe(0);
		expect(inner.log).toEqual(["tx1 BEGIN", "tx1 ROLLBACK"]);
		await expect(manager.getTransaction(info.id, "query")).rejects.toThrow(
			"already closed (timed-out)",
		);
	});

	test("closeAll rolls back every open transaction", async () => {
		const {inner, manager} = setup();
		await manager.startTransaction();
		await manager.startTransaction();
		await manager.closeAll();

		expect(manager.size).toBe(0);
		expect(inner.log).toEqual([
			"tx1 BEGIN",
			"tx2 BEGIN",
			"tx1 ROLLBACK",
			"tx2 ROLLBACK",
		]);
	});

	test("closeAll logs rollback failures instead of throwing", async () => {
		const {manager} = setup({failRollback: new Error("connection lost")});
		await manager.startTransaction();
		await manager.closeAll();
		expect(manager.size).toBe(0);
	});
});
