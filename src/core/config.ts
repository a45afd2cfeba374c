/**
 * @module core/config
 * @description Simulation configuration: defaults, validation and resolution
 *
 * Configuration is validated once, up front. `resolveSimulationConfig` either returns a complete
 * config or throws `InvalidConfigurationError` listing every problem, so no loop ever starts on
 * bad input.
 */

import type { IntegrationFrame, WheelCount } from '../models/robotics/omni/types';
import { InvalidConfigurationError } from './errors';

// ==================== Types ====================

/**
 * Velocity profile kind
 * - `sweep`: direction turns one degree per frame, speed oscillates
 * - `constant`: fixed `velocity` + `omega`
 */
export type ProfileKind = 'sweep' | 'constant';

/**
 * Complete simulation configuration
 */
export interface SimulationConfig {
    /** Wheel layout for a single-robot run */
    wheelCount: WheelCount;
    /** Angular velocity command (rad/s) */
    omega: number;
    /** Run a 3-wheel and a 4-wheel robot side by side */
    bothConfigurations: boolean;
    /** Wheel radius (m) */
    wheelRadius: number;
    /** Robot center to wheel distance (m) */
    centerDistance: number;
    /** First wheel angle (radians); layout default when omitted */
    phaseOffset?: number;
    /** Timestep per frame (s) */
    dt: number;
    /** Frames to run; `Infinity` loops until stopped */
    frames: number;
    /** Wall-clock delay between frames (ms) */
    intervalMs: number;
    profile: ProfileKind;
    /** Translational command for the constant profile (m/s) */
    velocity: { vx: number; vy: number };
    /** Peak driving speed for the sweep profile (m/s) */
    peakSpeed: number;
    integrationFrame: IntegrationFrame;
}

/**
 * Partial configuration as supplied by a caller or the CLI
 */
export interface SimulationConfigInput extends Partial<Omit<SimulationConfig, 'wheelCount' | 'velocity'>> {
    wheelCount?: number;
    velocity?: Partial<SimulationConfig['velocity']>;
}

/**
 * Validation result
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

// ==================== Defaults ====================

/**
 * Default configuration (robot constants of the reference platform)
 */
export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
    wheelCount: 3,
    omega: 0,
    bothConfigurations: false,
    wheelRadius: 0.148,
    centerDistance: 0.195,
    dt: 0.05,
    frames: 720,
    intervalMs: 50,
    profile: 'sweep',
    velocity: { vx: 0, vy: 0 },
    peakSpeed: 1,
    integrationFrame: 'world',
};

const PROFILE_KINDS: readonly string[] = ['sweep', 'constant'];
const INTEGRATION_FRAMES: readonly string[] = ['world', 'body'];

// ==================== Validation ====================

/**
 * Field-by-field merge; an explicit `undefined` keeps the default
 */
function mergeWithDefaults(input: SimulationConfigInput): Omit<SimulationConfig, 'wheelCount'> & { wheelCount: number } {
    const defaults = DEFAULT_SIMULATION_CONFIG;
    return {
        wheelCount: input.wheelCount ?? defaults.wheelCount,
        omega: input.omega ?? defaults.omega,
        bothConfigurations: input.bothConfigurations ?? defaults.bothConfigurations,
        wheelRadius: input.wheelRadius ?? defaults.wheelRadius,
        centerDistance: input.centerDistance ?? defaults.centerDistance,
        ...(input.phaseOffset !== undefined && { phaseOffset: input.phaseOffset }),
        dt: input.dt ?? defaults.dt,
        frames: input.frames ?? defaults.frames,
        intervalMs: input.intervalMs ?? defaults.intervalMs,
        profile: input.profile ?? defaults.profile,
        velocity: {
            vx: input.velocity?.vx ?? defaults.velocity.vx,
            vy: input.velocity?.vy ?? defaults.velocity.vy,
        },
        peakSpeed: input.peakSpeed ?? defaults.peakSpeed,
        integrationFrame: input.integrationFrame ?? defaults.integrationFrame,
    };
}

function isPositive(value: number): boolean {
    return Number.isFinite(value) && value > 0;
}

/**
 * Validate a (partial) configuration against the defaults
 */
export function validateSimulationConfig(input: SimulationConfigInput): ValidationResult {
    const config = mergeWithDefaults(input);
    const errors: string[] = [];
    const warnings: string[] = [];

    if (config.wheelCount !== 3 && config.wheelCount !== 4) {
        errors.push(`wheelCount must be 3 or 4 (got ${config.wheelCount})`);
    }
    if (!Number.isFinite(config.omega)) {
        errors.push(`omega must be a finite number (got ${config.omega})`);
    }
    if (!isPositive(config.wheelRadius)) {
        errors.push(`wheelRadius must be a positive number (got ${config.wheelRadius})`);
    }
    if (!isPositive(config.centerDistance)) {
        errors.push(`centerDistance must be a positive number (got ${config.centerDistance})`);
    }
    if (config.phaseOffset !== undefined && !Number.isFinite(config.phaseOffset)) {
        errors.push(`phaseOffset must be a finite number (got ${config.phaseOffset})`);
    }
    if (!isPositive(config.dt)) {
        errors.push(`dt must be a positive number (got ${config.dt})`);
    }
    if (config.frames !== Infinity && !(Number.isInteger(config.frames) && config.frames > 0)) {
        errors.push(`frames must be a positive integer or Infinity (got ${config.frames})`);
    }
    if (!Number.isFinite(config.intervalMs) || config.intervalMs < 0) {
        errors.push(`intervalMs must be a non-negative number (got ${config.intervalMs})`);
    }
    if (!PROFILE_KINDS.includes(config.profile)) {
        errors.push(`profile must be one of ${PROFILE_KINDS.join(', ')} (got ${config.profile})`);
    }
    if (!Number.isFinite(config.velocity.vx) || !Number.isFinite(config.velocity.vy)) {
        errors.push(`velocity components must be finite (got vx=${config.velocity.vx}, vy=${config.velocity.vy})`);
    }
    if (!Number.isFinite(config.peakSpeed) || config.peakSpeed < 0) {
        errors.push(`peakSpeed must be a non-negative number (got ${config.peakSpeed})`);
    }
    if (!INTEGRATION_FRAMES.includes(config.integrationFrame)) {
        errors.push(
            `integrationFrame must be one of ${INTEGRATION_FRAMES.join(', ')} (got ${config.integrationFrame})`
        );
    }

    if (config.bothConfigurations && input.wheelCount !== undefined) {
        warnings.push('wheelCount is ignored when bothConfigurations is set');
    }
    if (config.bothConfigurations && input.phaseOffset !== undefined) {
        warnings.push('phaseOffset is ignored when bothConfigurations is set');
    }
    if (config.profile === 'sweep' && input.velocity !== undefined) {
        warnings.push('velocity is ignored by the sweep profile');
    }

    return { valid: errors.length === 0, errors, warnings };
}

/**
 * Merge defaults and validate; throws `InvalidConfigurationError` on any error
 */
export function resolveSimulationConfig(input: SimulationConfigInput = {}): SimulationConfig {
    const result = validateSimulationConfig(input);
    if (!result.valid) {
        throw new InvalidConfigurationError(`Invalid configuration: ${result.errors.join('; ')}`, result.errors);
    }

    const merged = mergeWithDefaults(input);
    return {
        ...merged,
        wheelCount: merged.wheelCount === 4 ? 4 : 3,
    };
}
