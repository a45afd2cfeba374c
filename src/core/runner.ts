/**
 * @module core/runner
 * @description Tick-driven animation runner
 *
 * Drives one or more independent robot cores frame by frame: each tick sets the velocity
 * command from the core's profile, advances its state and samples a frame snapshot.
 * The runner owns the frame counter only; every pose stays inside its SimulationState.
 */

import type { RobotCore } from '../models/robotics/omni/core';
import type { FrameSnapshot, RobotPose, SimulationStatus } from '../models/robotics/omni/types';
import { infNorm } from '../models/numeric/math/linear-algebra';
import type { Logger } from './logging';
import { ValidationError } from './errors';

// ==================== Configuration ====================

/**
 * Runner configuration
 */
export interface RunnerConfig {
    /** Robots to drive (each keeps its own state) */
    cores: RobotCore[];
    /** Timestep per frame (s) */
    dt: number;
    /** Frames for `run()`; `Infinity` runs until `stop()` (default) */
    frames?: number;
    /** Wall-clock delay between frames in `run()` (ms, default 0) */
    intervalMs?: number;
    /** Logger(s) for output */
    loggers?: Logger[];
    /** Called with every tick's snapshots, e.g. by a renderer */
    onFrame?: (snapshots: FrameSnapshot[]) => void;
}

/**
 * Everything one core needs for a single tick
 */
export interface TickContext {
    frame: number;
    dt: number;
    /** Simulated time before this tick (s) */
    elapsed: number;
}

/**
 * Per-core run summary
 */
export interface CoreRunResult {
    label: string;
    wheelCount: number;
    totalFrames: number;
    runningFrames: number;
    finalPose: RobotPose;
    peakWheelVelocity: number;
}

/**
 * Run result (all cores)
 */
export interface RunResult {
    totalFrames: number;
    /** Ended by `stop()` before reaching `frames` */
    stopped: boolean;
    cores: CoreRunResult[];
}

interface CoreStats {
    runningFrames: number;
    elapsed: number;
    peakWheelVelocity: number;
}

// ==================== Tick ====================

/**
 * Advance one core by one frame and sample it
 */
export function stepCore(core: RobotCore, context: TickContext): { snapshot: FrameSnapshot; advanced: boolean } {
    core.state.setVelocity(core.profile.velocityAt(context.frame, core.state.currentPose()));
    const advanced = core.state.tick(context.dt);
    const time = advanced ? context.elapsed + context.dt : context.elapsed;
    return { snapshot: core.sampler.sample(context.frame, time), advanced };
}

function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

// ==================== Runner Class ====================

/**
 * Animation runner
 *
 * Orchestrates the loop: profile → advance → sample → log
 */
export class Runner {
    private config: Required<Omit<RunnerConfig, 'onFrame'>> & Pick<RunnerConfig, 'onFrame'>;
    private stats: CoreStats[];
    private currentFrame: number = 0;
    private active: boolean = false;
    private stopRequested: boolean = false;

    constructor(config: RunnerConfig) {
        this.config = {
            frames: Infinity,
            intervalMs: 0,
            loggers: [],
            ...config,
        };

        if (this.config.cores.length === 0) {
            throw new ValidationError('Runner needs at least one robot core');
        }
        if (!Number.isFinite(this.config.dt) || this.config.dt <= 0) {
            throw new ValidationError(`dt must be a positive number (got ${this.config.dt})`);
        }
        const { frames } = this.config;
        if (frames !== Infinity && !(Number.isInteger(frames) && frames > 0)) {
            throw new ValidationError(`frames must be a positive integer or Infinity (got ${frames})`);
        }
        if (!Number.isFinite(this.config.intervalMs) || this.config.intervalMs < 0) {
            throw new ValidationError(`intervalMs must be a non-negative number (got ${this.config.intervalMs})`);
        }

        this.stats = this.config.cores.map(() => ({ runningFrames: 0, elapsed: 0, peakWheelVelocity: 0 }));
    }

    get frame(): number {
        return this.currentFrame;
    }

    get isActive(): boolean {
        return this.active;
    }

    get cores(): readonly RobotCore[] {
        return this.config.cores;
    }

    /**
     * Tick every core once. The frame counter advances even while cores are paused.
     */
    step(): FrameSnapshot[] {
        const frame = this.currentFrame;
        const snapshots = this.config.cores.map((core, i) => {
            const stats = this.stats[i];
            const { snapshot, advanced } = stepCore(core, { frame, dt: this.config.dt, elapsed: stats.elapsed });

            if (advanced) {
                stats.runningFrames++;
                stats.elapsed = snapshot.time;
            }
            stats.peakWheelVelocity = Math.max(stats.peakWheelVelocity, infNorm(snapshot.wheelVelocities));

            for (const logger of this.config.loggers) {
                logger.logFrame({
                    label: snapshot.label,
                    frame: snapshot.frame,
                    time: snapshot.time,
                    status: snapshot.status,
                    pose: { ...snapshot.pose },
                    velocity: { ...snapshot.velocity },
                    wheelVelocities: [...snapshot.wheelVelocities],
                });
            }
            return snapshot;
        });

        this.currentFrame++;
        this.config.onFrame?.(snapshots);
        return snapshots;
    }

    /**
     * Run `count` frames synchronously, without pacing
     */
    runFrames(count: number): RunResult {
        if (!Number.isInteger(count) || count < 0) {
            throw new ValidationError(`count must be a non-negative integer (got ${count})`);
        }
        for (let i = 0; i < count; i++) {
            this.step();
        }
        return this.finish(false);
    }

    /**
     * Run until `frames` is reached or `stop()` is called, waiting `intervalMs` between frames
     */
    async run(): Promise<RunResult> {
        if (this.active) {
            throw new ValidationError('Runner is already running');
        }
        this.active = true;
        this.stopRequested = false;

        try {
            while (!this.stopRequested && this.currentFrame < this.config.frames) {
                this.step();
                if (this.currentFrame < this.config.frames) {
                    await delay(this.config.intervalMs);
                }
            }
        } finally {
            this.active = false;
        }

        return this.finish(this.currentFrame < this.config.frames);
    }

    /**
     * Ask a running `run()` to end after the current frame
     */
    stop(): void {
        this.stopRequested = true;
    }

    pauseAll(): void {
        for (const core of this.config.cores) core.state.pause();
    }

    resumeAll(): void {
        for (const core of this.config.cores) core.state.resume();
    }

    /**
     * Pause everything if any core is running, otherwise resume everything
     */
    toggleAll(): SimulationStatus {
        const anyRunning = this.config.cores.some(core => core.state.status === 'running');
        if (anyRunning) {
            this.pauseAll();
            return 'paused';
        }
        this.resumeAll();
        return 'running';
    }

    /**
     * Frame counter and statistics back to zero, every core back to the origin
     */
    reset(): void {
        this.currentFrame = 0;
        this.stats = this.config.cores.map(() => ({ runningFrames: 0, elapsed: 0, peakWheelVelocity: 0 }));
        for (const core of this.config.cores) core.state.reset();
    }

    private finish(stopped: boolean): RunResult {
        const cores = this.config.cores.map((core, i): CoreRunResult => ({
            label: core.label,
            wheelCount: core.geometry.wheelCount,
            totalFrames: this.currentFrame,
            runningFrames: this.stats[i].runningFrames,
            finalPose: { ...core.state.currentPose() },
            peakWheelVelocity: this.stats[i].peakWheelVelocity,
        }));

        for (const logger of this.config.loggers) {
            for (const result of cores) {
                logger.logRun(result);
            }
            logger.flush();
        }

        return { totalFrames: this.currentFrame, stopped, cores };
    }
}
