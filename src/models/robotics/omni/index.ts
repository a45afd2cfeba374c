/**
 * @module omni
 * @description Omnidirectional drive kinematics
 *
 * Provides the kinematic transform engine for 3- and 4-wheel omni robots:
 * - Wheel geometry and mount angles
 * - Jacobian construction (body velocity → wheel angular velocity)
 * - Forward kinematics solver
 * - Euler pose integration with pause/resume
 * - Per-tick frame snapshots and velocity profiles
 */

export * from './types'
export * from './utils'
export * from './geometry'
export * from './jacobian'
export * from './solver'
export * from './state'
export * from './sampler'
export * from './profile'
export * from './core'
