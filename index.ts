/**
 * @packageDocumentation
 * @module omnikin
 *
 * omnikin: Jacobian kinematics for omnidirectional wheeled robots
 *
 * Turns body-frame velocity commands (vx, vy, ω) into per-wheel angular velocities for
 * 3- and 4-wheel omni layouts, and integrates the robot pose over a tick-driven animation.
 *
 * ## Modules (Default Export)
 * - `core` - Config, runner, logging, errors
 * - `omni` - Geometry, Jacobian, solver, simulation state, frame sampler, profiles
 * - `numeric` - Linear algebra helpers
 * - `render` - Glyph geometry and info text for snapshots
 * - `tasks` - Terminal demo (Node.js only)
 *
 * ## Usage Example
 * ```typescript
 * import { omni } from 'omnikin';
 *
 * const geometry = new omni.GeometryModel({ wheelCount: 3, wheelRadius: 0.05, centerDistance: 0.2 });
 * const jacobian = omni.buildJacobian(geometry);
 * const wheelVelocities = omni.solveWheelVelocities(jacobian, { vx: 1, vy: 0, omega: 0 });
 * ```
 *
 * @license MIT
 */

// ==================== Core Framework ====================
export * as core from './src/core';

// ==================== Kinematics ====================
export * as omni from './src/models/robotics/omni';

// ==================== Numerical Methods ====================
export * as numeric from './src/models/numeric';

// ==================== Render Geometry ====================
export * as render from './src/extras/render';

// ==================== Tasks ====================
export * as tasks from './src/tasks';

// ==================== Version ====================
export const VERSION = '0.1.0';
