import type { SimulationConfig } from '../../../core/config'
import { GeometryModel } from './geometry'
import { buildJacobian } from './jacobian'
import { constantProfile, sweepProfile, type VelocityProfile } from './profile'
import { FrameSampler } from './sampler'
import { SimulationState } from './state'
import type { GeometryParams, IntegrationFrame, JacobianMatrix, WheelCount } from './types'

/**
 * One independent robot: geometry, Jacobian, state and sampler.
 *
 * Cores never share mutable state; a side-by-side comparison is two cores.
 */
export interface RobotCore {
    readonly label: string;
    readonly geometry: GeometryModel;
    readonly jacobian: JacobianMatrix;
    readonly state: SimulationState;
    readonly sampler: FrameSampler;
    readonly profile: VelocityProfile;
}

export interface RobotCoreOptions {
    geometry: GeometryParams;
    /** Defaults to `<n>-wheel` */
    label?: string;
    /** Defaults to a constant zero command */
    profile?: VelocityProfile;
    integrationFrame?: IntegrationFrame;
}

/**
 * Build geometry → Jacobian → state → sampler.
 *
 * Throws `InvalidConfigurationError` from the geometry step before anything else is built.
 */
export function createRobotCore(options: RobotCoreOptions): RobotCore {
    const geometry = new GeometryModel(options.geometry);
    const jacobian = buildJacobian(geometry);
    const profile = options.profile ?? constantProfile({ vx: 0, vy: 0, omega: 0 });
    const state = new SimulationState({ integrationFrame: options.integrationFrame });
    state.setVelocity(profile.velocityAt(0, state.currentPose()));
    const label = options.label ?? `${geometry.wheelCount}-wheel`;

    return {
        label,
        geometry,
        jacobian,
        state,
        sampler: new FrameSampler(geometry, jacobian, state, label),
        profile,
    };
}

/**
 * Velocity profile described by a resolved configuration
 */
export function profileFromConfig(config: SimulationConfig): VelocityProfile {
    switch (config.profile) {
        case 'constant':
            return constantProfile({ ...config.velocity, omega: config.omega });
        case 'sweep':
            return sweepProfile({ omega: config.omega, peakSpeed: config.peakSpeed });
    }
}

/**
 * One core for the configured layout, or an independent 3-wheel and 4-wheel pair
 * when `bothConfigurations` is set.
 */
export function createCoresFromConfig(config: SimulationConfig): RobotCore[] {
    const build = (wheelCount: WheelCount, phaseOffset?: number): RobotCore =>
        createRobotCore({
            geometry: {
                wheelCount,
                wheelRadius: config.wheelRadius,
                centerDistance: config.centerDistance,
                phaseOffset,
            },
            profile: profileFromConfig(config),
            integrationFrame: config.integrationFrame,
        });

    if (config.bothConfigurations) {
        return [build(3), build(4)];
    }
    return [build(config.wheelCount, config.phaseOffset)];
}
