/**
 * Query pipeline.
 *
 * Turns a single query or a batch into a serialized response: resolves the
 * queryable, compiles under a panic guard, runs the plan through the
 * interpreter and shapes the result. Batches run either independently
 * against the ambient adapter or in order inside one transaction.
 */

import {z} from "zod";
import {ISOLATION_LEVELS, type ConnectionInfo} from "./adapter.js";
import type {
	QueryCompiler,
	QueryCompilerFactory,
	QueryInterpreterFactory,
} from "./engine.js";
import type {
	CapturedQueryable,
	ErrorCapturingDriverAdapter,
} from "./error-capturing.js";
import {InvalidRequestError, errorMessage} from "./errors.js";
import {componentLogger, type Logger} from "./logger.js";
import {getDefaultPanicBridge, type PanicBridge} from "./panic.js";
import {unwrap} from "./result.js";
import {
	TransactionManager,
	type TransactionManagerOptions,
} from "./transaction-manager.js";

// ============================================================================
// Request Envelopes
// ============================================================================

export const QueryRequestSchema = z.object({
	modelName: z.string().optional(),
	action: z.string().min(1),
	query: z
		.object({
			arguments: z.record(z.unknown()).optional(),
			selection: z.record(z.unknown()).optional(),
		})
		.passthrough(),
});

export const BatchRequestSchema = z.object({
	batch: z.array(QueryRequestSchema),
	transaction: z
		.object({
			isolationLevel: z.enum(ISOLATION_LEVELS).optional(),
		})
		.optional(),
});

export const PipelineRequestSchema = z.union([
	BatchRequestSchema,
	QueryRequestSchema,
]);

export type QueryRequest = z.infer<typeof QueryRequestSchema>;
export type BatchRequest = z.infer<typeof BatchRequestSchema>;
export type PipelineRequest = z.infer<typeof PipelineRequestSchema>;

export interface QueryResponse {
	data: Record<string, unknown>;
}

export interface BatchResponse {
	batchResult: QueryResponse[];
}

// ============================================================================
// Options
// ============================================================================

export interface QueryPipelineOptions {
	adapter: ErrorCapturingDriverAdapter;
	compiler: QueryCompiler;
	interpreterFactory: QueryInterpreterFactory;
	transactionManager: TransactionManager;
	/** Guards compilation (default: the process-wide bridge). */
	panicBridge?: PanicBridge;
	placeholderValues?: Record<string, unknown>;
	/** Receives one JSON line per interpreter query event. */
	queryLogs?: string[];
	logger?: Logger;
}

export interface CreateQueryPipelineOptions
	extends Omit<QueryPipelineOptions, "compiler" | "transactionManager"> {
	datamodel: string;
	compilerFactory: QueryCompilerFactory;
	transactionManager?: TransactionManager;
	transactionOptions?: TransactionManagerOptions;
}

// ============================================================================
// Pipeline
// ============================================================================

export class QueryPipeline {
	#adapter: ErrorCapturingDriverAdapter;
	#compiler: QueryCompiler;
	#interpreterFactory: QueryInterpreterFactory;
	#transactionManager: TransactionManager;
	#panicBridge: PanicBridge;
	#placeholderValues: Record<string, unknown>;
	#queryLogs: string[];
	#logger: Logger;

	constructor(options: QueryPipelineOptions) {
		this.#adapter = options.adapter;
		this.#compiler = options.compiler;
		this.#interpreterFactory = options.interpreterFactory;
		this.#transactionManager = options.transactionManager;
		this.#panicBridge = options.panicBridge ?? getDefaultPanicBridge();
		this.#placeholderValues = options.placeholderValues ?? {};
		this.#queryLogs = options.queryLogs ?? [];
		this.#logger = componentLogger("pipeline", options.logger);
	}

	/**
	 * Query log lines appended so far (JSON-stringified query events).
	 */
	get queryLogs(): readonly string[] {
		return this.#queryLogs;
	}

	get transactionManager(): TransactionManager {
		return this.#transactionManager;
	}

	/**
	 * Execute a query or batch and return the serialized response.
	 *
	 * @param txId Run inside this open transaction.
	 */
	async run(request: string | unknown, txId?: string): Promise<string> {
		const parsed = parseRequest(request);
		if ("batch" in parsed) {
			return serializeResponse(await this.#runBatch(parsed, txId));
		}
		return serializeResponse(await this.#runSingle(parsed, txId));
	}

	// ==========================================================================
	// Single Queries
	// ==========================================================================

	async #runSingle(query: QueryRequest, txId?: string): Promise<QueryResponse> {
		const queryable = txId !== undefined
			? await this.#transactionManager.getTransaction(txId, query.action)
			: this.#adapter;
		return this.#execute(query, queryable, txId === undefined);
	}

	/**
	 * Compile and run one query against a queryable.
	 *
	 * @param allowTransaction Whether the interpreter may open its own
	 * implicit transaction. False for queries already inside one.
	 */
	async #execute(
		query: QueryRequest,
		queryable: CapturedQueryable,
		allowTransaction: boolean,
	): Promise<QueryResponse> {
		const plan = this.#compile(query);
		const interpreter = this.#interpreterFactory({
			transactionManager: allowTransaction
				? {enabled: true, manager: this.#transactionManager}
				: {enabled: false},
			placeholderValues: this.#placeholderValues,
			onQuery: (event) => {
				this.#queryLogs.push(JSON.stringify(event));
			},
		});
		const result = await interpreter.run(plan, queryable);
		return {data: {[resultKey(query)]: shapeResult(result)}};
	}

	#compile(query: QueryRequest): unknown {
		const serialized = JSON.stringify(query);
		const plan = this.#panicBridge.withLocalPanicHandler(() =>
			this.#compiler.compile(serialized),
		);
		return JSON.parse(plan);
	}

	// ==========================================================================
	// Batches
	// ==========================================================================

	async #runBatch(batch: BatchRequest, txId?: string): Promise<BatchResponse> {
		if (txId !== undefined) {
			const queryable = await this.#transactionManager.getTransaction(
				txId,
				"batch query",
			);
			return {batchResult: await this.#runSequential(batch.batch, queryable)};
		}
		if (batch.transaction) {
			return {batchResult: await this.#runTransactional(batch)};
		}
		return {batchResult: await this.#runIndependent(batch.batch)};
	}

	/**
	 * Every item runs against the ambient adapter at once. A failure fails
	 * the call but does not undo siblings that already ran.
	 */
	async #runIndependent(items: QueryRequest[]): Promise<QueryResponse[]> {
		return Promise.all(
			items.map((item) => this.#execute(item, this.#adapter, true)),
		);
	}

	async #runSequential(
		items: QueryRequest[],
		queryable: CapturedQueryable,
	): Promise<QueryResponse[]> {
		const results: QueryResponse[] = [];
		for (const item of items) {
			results.push(await this.#execute(item, queryable, false));
		}
		return results;
	}

	async #runTransactional(batch: BatchRequest): Promise<QueryResponse[]> {
		const manager = this.#transactionManager;
		const txInfo = await manager.startTransaction({
			isolationLevel: batch.transaction?.isolationLevel,
		});

		let results: QueryResponse[];
		try {
			const queryable = await manager.getTransaction(txInfo, "batch query");
			results = await this.#runSequential(batch.batch, queryable);
		} catch (error) {
			try {
				await manager.rollbackTransaction(txInfo.id);
			} catch (rollbackError) {
				this.#logger.error(
					{txId: txInfo.id, err: rollbackError},
					`rollback after failed batch failed: ${errorMessage(rollbackError)}`,
				);
			}
			throw error;
		}

		await manager.commitTransaction(txInfo.id);
		return results;
	}
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Build a pipeline: reads connection info, constructs the compiler under
 * a panic guard and a transaction manager when none is given.
 */
export function createQueryPipeline(
	options: CreateQueryPipelineOptions,
): QueryPipeline {
	const {adapter} = options;
	const panicBridge = options.panicBridge ?? getDefaultPanicBridge();
	const connectionInfo = readConnectionInfo(adapter);
	const compiler = panicBridge.withLocalPanicHandler(() =>
		options.compilerFactory({
			datamodel: options.datamodel,
			provider: adapter.provider,
			connectionInfo,
		}),
	);
	const transactionManager =
		options.transactionManager ??
		new TransactionManager(adapter, {
			logger: options.logger,
			...options.transactionOptions,
		});

	return new QueryPipeline({
		...options,
		compiler,
		transactionManager,
		panicBridge,
	});
}

function readConnectionInfo(
	adapter: ErrorCapturingDriverAdapter,
): ConnectionInfo {
	if (adapter.getConnectionInfo) {
		return unwrap(adapter.getConnectionInfo(), adapter.errorRegistry);
	}
	return {supportsRelationJoins: adapter.capabilities?.relationJoins ?? false};
}

// ============================================================================
// Shaping
// ============================================================================

/**
 * Validate a request given as JSON text or as an object.
 */
export function parseRequest(request: string | unknown): PipelineRequest {
	let input: unknown = request;
	if (typeof request === "string") {
		try {
			input = JSON.parse(request);
		} catch (error) {
			throw new InvalidRequestError(
				`Request is not valid JSON: ${errorMessage(error)}`,
				[],
				{cause: error},
			);
		}
	}

	const result = PipelineRequestSchema.safeParse(input);
	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
		);
		throw new InvalidRequestError(
			`Invalid query request: ${issues.join("; ")}`,
			issues,
		);
	}
	return result.data;
}

/**
 * Response key: the action followed by the model name, if any.
 */
export function resultKey(query: Pick<QueryRequest, "action" | "modelName">): string {
	return query.modelName ? `${query.action}${query.modelName}` : query.action;
}

/**
 * Numeric interpreter results become `{count}`; others pass through.
 */
export function shapeResult(result: unknown): unknown {
	return typeof result === "number" ? {count: result} : result;
}

/**
 * JSON text of a response. Bigints become decimal strings and byte arrays
 * base64 strings.
 */
export function serializeResponse(response: unknown): string {
	return JSON.stringify(response, function (this: unknown, key, value: unknown) {
		const original: unknown =
			this !== null && typeof this === "object" ? Reflect.get(this, key) : value;
		if (typeof original === "bigint") return original.toString();
		if (original instanceof Uint8Array) {
			return Buffer.from(original).toString("base64");
		}
		return value;
	});
}
