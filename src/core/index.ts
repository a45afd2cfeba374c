/**
 * @module core
 * @description Core framework for running kinematic simulations
 *
 * The foundational layer the kinematic models and the demo task build upon.
 *
 * ## Modules
 * - `config`: Simulation configuration, defaults and validation
 * - `runner`: Tick-driven animation loop
 * - `logging`: Frame/run structured logging
 * - `errors`: Unified error types and codes
 */

// ==================== Config ====================

export type {
    ProfileKind,
    SimulationConfig,
    SimulationConfigInput,
    ValidationResult,
} from './config';

export {
    DEFAULT_SIMULATION_CONFIG,
    validateSimulationConfig,
    resolveSimulationConfig,
} from './config';

// ==================== Runner ====================

export type {
    RunnerConfig,
    TickContext,
    CoreRunResult,
    RunResult,
} from './runner';

export {
    Runner,
    stepCore,
} from './runner';

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    FrameLogEntry,
    RunLogEntry,
    LogEntry,
    Logger,
    LoggerConfig,
} from './logging';

export {
    LOG_SCHEMA_VERSION,
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
} from './logging';

// ==================== Errors ====================

export {
    ErrorCodes,
    OmniError,
    InvalidConfigurationError,
    DimensionError,
    ValidationError,
    isOmniError,
    hasErrorCode,
    wrapError,
} from './errors';

export type {
    ErrorCode,
} from './errors';
