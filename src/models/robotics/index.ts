/**
 * @module src/models/robotics
 * @description Robotics: omnidirectional drive kinematics
 *
 * Contains:
 * - Omni: wheel geometry, Jacobian, forward kinematics, pose integration, frame sampling
 */

import * as omni from './omni';

// Re-export as namespace
export { omni };
