/**
 * Omnidirectional drive type definitions
 */

/**
 * Supported wheel layouts
 */
export type WheelCount = 3 | 4;

/**
 * Planar point (m)
 */
export interface Point2D {
    x: number;
    y: number;
}

/**
 * Pose (position + orientation)
 */
export interface RobotPose {
    x: number;
    y: number;
    heading: number;  // Heading angle (radians)
}

/**
 * Commanded body-frame velocity
 */
export interface BodyVelocity {
    vx: number;     // Forward velocity (m/s)
    vy: number;     // Lateral velocity (m/s)
    omega: number;  // Angular velocity (rad/s)
}

/**
 * Per-wheel angular velocities (rad/s), one entry per wheel
 */
export type WheelVelocityVector = number[];

/**
 * One Jacobian row: coefficients for [vx, vy, omega]
 */
export type JacobianRow = readonly [number, number, number];

/**
 * Body velocity → wheel angular velocity map, `wheelCount` rows by 3 columns
 */
export interface JacobianMatrix {
    readonly wheelCount: number;
    readonly rows: readonly JacobianRow[];
}

/**
 * Geometry construction parameters
 */
export interface GeometryParams {
    wheelCount: number;
    /** Wheel radius (m) */
    wheelRadius: number;
    /** Distance from robot center to each wheel (m) */
    centerDistance: number;
    /** Angle of the first wheel (radians); defaults per layout */
    phaseOffset?: number;
    /** Explicit mount angles (radians); overrides `phaseOffset` */
    wheelAngles?: readonly number[];
}

/**
 * How `advance` maps the body velocity onto the pose
 * - `world`: velocity integrated as-is (heading does not rotate translation)
 * - `body`: velocity rotated by the current heading first
 */
export type IntegrationFrame = 'world' | 'body';

/**
 * Pause state machine
 */
export type SimulationStatus = 'running' | 'paused';

/**
 * Per-tick output consumed by a renderer
 */
export interface FrameSnapshot {
    /** Configuration label, e.g. `3-wheel` */
    label: string;
    /** Frame index */
    frame: number;
    /** Simulated time (s) */
    time: number;
    status: SimulationStatus;
    pose: Readonly<RobotPose>;
    velocity: Readonly<BodyVelocity>;
    /** World-frame wheel centers */
    wheelPositions: Point2D[];
    wheelVelocities: WheelVelocityVector;
}
