/**
 * @module src/models
 * @description Kinematic models
 *
 * Organized into logical categories:
 * - robotics/: Omnidirectional drive kinematics
 * - numeric/: Linear algebra helpers
 */

export * as robotics from './robotics';

// Numerical Methods
export * as numeric from './numeric';
