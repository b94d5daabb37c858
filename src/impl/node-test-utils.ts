/**
 * expect-style test utilities for Node's built-in test runner.
 *
 * Provides the describe, test, expect API the test suites are written
 * against, on top of node:test and node:assert.
 */

import {afterEach, beforeEach, describe, test} from "node:test";
import assert from "node:assert";

export {afterEach, beforeEach, describe, test};

type ErrorClass = new (...args: never[]) => Error;

/**
 * A string matches a substring of the message, a RegExp matches the
 * message, a class matches by instanceof.
 */
export type ErrorMatcher = string | RegExp | ErrorClass;

function messageOf(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function matchError(error: unknown, expected?: ErrorMatcher): void {
	if (expected === undefined) return;
	if (typeof expected === "string") {
		assert.ok(
			messageOf(error).includes(expected),
			`Expected error message to include "${expected}", got "${messageOf(error)}"`,
		);
	} else if (expected instanceof RegExp) {
		assert.match(messageOf(error), expected);
	} else {
		assert.ok(
			error instanceof expected,
			`Expected ${expected.name}, got ${String(error)}`,
		);
	}
}

// expect API
export function expect<T>(actual: T) {
	return {
		toBe(expected: T) {
			assert.strictEqual(actual, expected);
		},
		toEqual(expected: unknown) {
			assert.deepStrictEqual(actual, expected);
		},
		toBeNull() {
			assert.strictEqual(actual, null);
		},
		toBeUndefined() {
			assert.strictEqual(actual, undefined);
		},
		toBeTruthy() {
			assert.ok(actual);
		},
		toBeFalsy() {
			assert.ok(!actual);
		},
		toBeGreaterThan(expected: number) {
			assert.ok(typeof actual === "number" && actual > expected);
		},
		toBeLessThan(expected: number) {
			assert.ok(typeof actual === "number" && actual < expected);
		},
		toHaveLength(expected: number) {
			assert.ok(Array.isArray(actual) || typeof actual === "string");
			assert.strictEqual(actual.length, expected);
		},
		toBeInstanceOf(expected: new (...args: never[]) => object) {
			assert.ok(actual instanceof expected);
		},
		toContain(expected: unknown) {
			if (Array.isArray(actual)) {
				assert.ok(actual.includes(expected));
			} else if (typeof actual === "string" && typeof expected === "string") {
				assert.ok(
					actual.includes(expected),
					`Expected "${actual}" to contain "${expected}"`,
				);
			} else {
				throw new Error("toContain expects an array or string");
			}
		},
		toMatch(expected: RegExp) {
			assert.ok(typeof actual === "string");
			assert.match(actual, expected);
		},
		toThrow(expected?: ErrorMatcher) {
			if (typeof actual !== "function") {
				throw new Error("toThrow expects a function");
			}
			let thrown = false;
			try {
				actual();
			} catch (error) {
				thrown = true;
				matchError(error, expected);
			}
			assert.ok(thrown, "Expected function to throw");
		},
		not: {
			toBe(expected: T) {
				assert.notStrictEqual(actual, expected);
			},
			toEqual(expected: unknown) {
				assert.notDeepStrictEqual(actual, expected);
			},
			toBeNull() {
				assert.notStrictEqual(actual, null);
			},
			toBeUndefined() {
				assert.notStrictEqual(actual, undefined);
			},
		},
		rejects: {
			async toThrow(expected?: ErrorMatcher) {
				if (!(actual instanceof Promise)) {
					throw new Error("rejects.toThrow expects a Promise");
				}
				let thrown = false;
				try {
					await actual;
				} catch (error) {
					thrown = true;
					matchError(error, expected);
				}
				assert.ok(thrown, "Expected promise to reject");
			},
		},
	};
}

/**
 * The error a promise rejects with. Fails if it resolves.
 */
export async function rejection(promise: Promise<unknown>): Promise<unknown> {
	try {
		await promise;
	} catch (error) {
		return error;
	}
	throw new assert.AssertionError({message: "Expected promise to reject"});
}
