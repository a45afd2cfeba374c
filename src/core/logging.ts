/**
 * @module core/logging
 * @description Structured logging for simulation runs
 *
 * Provides frame-level and run-level log entries with a fixed, versioned field schema.
 *
 * Browser-compatible: ConsoleLogger, MemoryLogger and MultiLogger work in all environments.
 */

import type { BodyVelocity, RobotPose, SimulationStatus } from '../models/robotics/omni/types';

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Robot configuration label, e.g. `3-wheel` */
    label: string;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * Frame-level log entry
 */
export interface FrameLogEntry extends BaseLogEntry {
    logType: 'frame';
    frame: number;
    /** Simulated time (s) */
    time: number;
    status: SimulationStatus;
    pose: RobotPose;
    velocity: BodyVelocity;
    wheelVelocities: number[];
}

/**
 * Run-level summary log entry
 */
export interface RunLogEntry extends BaseLogEntry {
    logType: 'run';
    wheelCount: number;
    /** Frames ticked, paused or not */
    totalFrames: number;
    /** Frames in which the pose advanced */
    runningFrames: number;
    finalPose: RobotPose;
    /** Largest |ω| seen on any wheel (rad/s) */
    peakWheelVelocity: number;
}

/**
 * Union of all log entry types
 */
export type LogEntry = FrameLogEntry | RunLogEntry;

type EntryInput<T extends LogEntry> = Omit<T, 'logType' | 'schemaVersion' | 'timestamp'>;

/**
 * Logger interface
 */
export interface Logger {
    /** Log one frame */
    logFrame(entry: EntryInput<FrameLogEntry>): void;
    /** Log a run summary */
    logRun(entry: EntryInput<RunLogEntry>): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Console verbosity (console logger only) */
    level?: LogLevel;
    /** Schema version */
    schemaVersion?: string;
    /** Whether to keep frame-level logs (can be verbose) */
    logFrames?: boolean;
}

// ==================== Constants ====================

export const LOG_SCHEMA_VERSION = '1.0.0';

function formatVector(values: readonly number[], digits = 2): string {
    return `[${values.map(v => v.toFixed(digits)).join(', ')}]`;
}

// ==================== Console Logger ====================

/**
 * Console Logger: Print to console
 * Frames are printed at `debug`, run summaries at `info` and below.
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        this.level = typeof levelOrConfig === 'string' ? levelOrConfig : levelOrConfig.level ?? 'info';
    }

    logFrame(entry: EntryInput<FrameLogEntry>): void {
        if (this.level === 'debug') {
            const { x, y, heading } = entry.pose;
            console.log(
                `[FRAME] ${entry.label} F${entry.frame}${entry.status === 'paused' ? ' (paused)' : ''}: ` +
                `pose=(${x.toFixed(3)}, ${y.toFixed(3)}, ${heading.toFixed(3)}) ` +
                `ω=${formatVector(entry.wheelVelocities)}`
            );
        }
    }

    logRun(entry: EntryInput<RunLogEntry>): void {
        if (this.level === 'debug' || this.level === 'info') {
            const { x, y, heading } = entry.finalPose;
            console.log(
                `[RUN] ${entry.label}: frames=${entry.totalFrames}, running=${entry.runningFrames}, ` +
                `pose=(${x.toFixed(3)}, ${y.toFixed(3)}, ${heading.toFixed(3)}), ` +
                `peak|ω|=${entry.peakWheelVelocity.toFixed(2)}`
            );
        }
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: Store logs in memory
 * Useful for testing and for renderers that replay a run.
 */
export class MemoryLogger implements Logger {
    private config: { schemaVersion: string; logFrames: boolean };
    public frames: FrameLogEntry[] = [];
    public runs: RunLogEntry[] = [];

    constructor(config: LoggerConfig = {}) {
        this.config = {
            schemaVersion: config.schemaVersion ?? LOG_SCHEMA_VERSION,
            logFrames: config.logFrames ?? true,
        };
    }

    private createBaseEntry(): Pick<BaseLogEntry, 'schemaVersion' | 'timestamp'> {
        return {
            schemaVersion: this.config.schemaVersion,
            timestamp: Date.now(),
        };
    }

    logFrame(entry: EntryInput<FrameLogEntry>): void {
        if (!this.config.logFrames) return;
        this.frames.push({
            ...this.createBaseEntry(),
            logType: 'frame',
            ...entry,
        });
    }

    logRun(entry: EntryInput<RunLogEntry>): void {
        this.runs.push({
            ...this.createBaseEntry(),
            logType: 'run',
            ...entry,
        });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.frames, ...this.runs];
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.frames = [];
        this.runs = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Multi-Logger ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    logFrame(entry: EntryInput<FrameLogEntry>): void {
        for (const logger of this.loggers) {
            logger.logFrame(entry);
        }
    }

    logRun(entry: EntryInput<RunLogEntry>): void {
        for (const logger of this.loggers) {
            logger.logRun(entry);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format
 */
export function createLogger(
    format: 'console' | 'memory',
    config: LoggerConfig = {}
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
    }
}
