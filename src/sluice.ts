/**
 * sluice - Query execution over interchangeable SQL drivers
 *
 * Compile a query request, run the plan on a driver adapter, get JSON.
 */

// ============================================================================
// Driver Adapter Contract
// ============================================================================

export {
	PROVIDERS,
	ADAPTER_NAMES,
	ISOLATION_LEVELS,
	type Provider,
	type AdapterName,
	type AdapterCapabilities,
	type AdapterDescriptor,
	type SqlQuery,
	type ColumnType,
	type ResultSet,
	type ConnectionInfo,
	type IsolationLevel,
	type Queryable,
	type Transaction,
	type TransactionContext,
	type DriverAdapter,
} from "./impl/adapter.js";

// ============================================================================
// Results and Error Capture
// ============================================================================

export {
	ErrorHandle,
	ErrorRegistry,
	ok,
	err,
	unwrap,
	type Result,
	type ErrorDetail,
} from "./impl/result.js";

export {
	bindAdapter,
	type CapturedQueryable,
	type CapturedTransaction,
	type CapturedTransactionContext,
	type ErrorCapturingDriverAdapter,
} from "./impl/error-capturing.js";

// ============================================================================
// Panics
// ============================================================================

export {
	PanicBridge,
	PANIC_REGISTRY_KEY,
	getDefaultPanicBridge,
	installPanicRegistry,
	setupDefaultPanicHandler,
	withLocalPanicHandler,
	type PanicHandler,
	type PanicRegistry,
} from "./impl/panic.js";

// ============================================================================
// Pipeline
// ============================================================================

export {
	QueryPipeline,
	createQueryPipeline,
	parseRequest,
	resultKey,
	shapeResult,
	serializeResponse,
	QueryRequestSchema,
	BatchRequestSchema,
	PipelineRequestSchema,
	type QueryRequest,
	type BatchRequest,
	type PipelineRequest,
	type QueryResponse,
	type BatchResponse,
	type QueryPipelineOptions,
	type CreateQueryPipelineOptions,
} from "./impl/pipeline.js";

export type {
	QueryCompiler,
	QueryCompilerOptions,
	QueryCompilerFactory,
	QueryEvent,
	QueryInterpreter,
	QueryInterpreterOptions,
	QueryInterpreterFactory,
	InterpreterTransactionManager,
} from "./impl/engine.js";

export {
	TransactionManager,
	type TxStatus,
	type TxInfo,
	type StartTransactionOptions,
	type TransactionManagerOptions,
} from "./impl/transaction-manager.js";

// ============================================================================
// Recording
// ============================================================================

export {
	Recordings,
	createRecordings,
	queryKey,
	recordAdapter,
	replayAdapter,
	type RecordedOutcome,
} from "./impl/recording.js";

// ============================================================================
// Configuration
// ============================================================================

export {
	AdapterConfigSchema,
	DEFAULT_TRANSACTION_TIMEOUTS,
	parseAdapterConfig,
	loadConfigFromEnv,
	type AdapterConfig,
	type EnvConfig,
	type TransactionTimeouts,
	type D1DatabaseLike,
} from "./impl/config.js";

export {
	createAdapter,
	createBoundAdapter,
	type CreateAdapterOptions,
} from "./impl/factory.js";

export {
	createLogger,
	getRootLogger,
	type Logger,
	type LogLevel,
	type LoggerOptions,
} from "./impl/logger.js";

// ============================================================================
// Errors
// ============================================================================

export {
	DatabaseError,
	QueryError,
	ConstraintViolationError,
	ConnectionError,
	TransactionError,
	TransactionNotFoundError,
	TransactionClosedError,
	InvalidIsolationLevelError,
	UnsupportedCapabilityError,
	NotRecordedError,
	PanicError,
	ConfigurationError,
	InvalidRequestError,
	isDatabaseError,
	hasErrorCode,
	type DatabaseErrorCode,
	type ConstraintKind,
} from "./impl/errors.js";
