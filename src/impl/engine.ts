/**
 * Contracts of the query compiler and plan interpreter.
 *
 * Both live outside this package (typically a compiled foreign module);
 * the pipeline only consumes these shapes.
 */

import type {ConnectionInfo, Provider} from "./adapter.js";
import type {CapturedQueryable} from "./error-capturing.js";
import type {TransactionManager} from "./transaction-manager.js";

// ============================================================================
// Compiler
// ============================================================================

export interface QueryCompilerOptions {
	datamodel: string;
	provider: Provider;
	connectionInfo: ConnectionInfo;
}

export interface QueryCompiler {
	/**
	 * Compile a serialized query into a serialized plan. May abort through
	 * the panic registry.
	 */
	compile(request: string): string;
}

export type QueryCompilerFactory = (
	options: QueryCompilerOptions,
) => QueryCompiler;

// ============================================================================
// Interpreter
// ============================================================================

/**
 * A query the interpreter sent to the database.
 */
export interface QueryEvent {
	timestamp: Date;
	query: string;
	params: unknown[];
	/** Milliseconds. */
	duration: number;
}

export type InterpreterTransactionManager =
	| {enabled: true; manager: TransactionManager}
	| {enabled: false};

export interface QueryInterpreterOptions {
	transactionManager: InterpreterTransactionManager;
	placeholderValues: Record<string, unknown>;
	onQuery: (event: QueryEvent) => void;
}

export interface QueryInterpreter {
	/**
	 * Execute a plan. Resolves to an affected-row count for writes without a
	 * selection, or to the selected records.
	 */
	run(plan: unknown, queryable: CapturedQueryable): Promise<unknown>;
}

export type QueryInterpreterFactory = (
	options: QueryInterpreterOptions,
) => QueryInterpreter;
