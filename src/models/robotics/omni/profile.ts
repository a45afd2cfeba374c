import { ValidationError } from '../../../core/errors'
import type { BodyVelocity, RobotPose } from './types'
import { degToRad, radToDeg, wrapDegrees } from './utils'

/**
 * What the driver is asking for, as shown in the info box
 */
export interface DriveIntent {
    /** Driving speed (m/s) */
    speed: number;
    /** Driving direction (degrees, [0, 360)) */
    direction: number;
    /** Robot orientation (degrees, [0, 360)) */
    orientation: number;
}

/**
 * Per-frame source of body-velocity commands.
 *
 * The orientation always comes from the pose the state integrated; a profile never
 * tracks its own heading.
 */
export interface VelocityProfile {
    readonly name: string;
    velocityAt(frame: number, pose: Readonly<RobotPose>): BodyVelocity;
    driveAt(frame: number, pose: Readonly<RobotPose>): DriveIntent;
}

function orientationOf(pose: Readonly<RobotPose>): number {
    return wrapDegrees(radToDeg(pose.heading));
}

/**
 * Speed / driving angle / orientation → body-frame velocity.
 *
 * The heading-relative components are rotated 90° so that a driving angle equal to the
 * orientation maps onto +vy.
 */
export function convertToBodyFrame(
    speed: number,
    angleDeg: number,
    orientationDeg: number
): { vx: number; vy: number } {
    const relative = degToRad(angleDeg) - degToRad(orientationDeg);
    const forward = speed * Math.cos(relative);
    const lateral = speed * Math.sin(relative);
    return { vx: -lateral, vy: forward };
}

/**
 * Same command every frame
 */
export function constantProfile(velocity: BodyVelocity): VelocityProfile {
    const command: BodyVelocity = Object.freeze({ ...velocity });
    return {
        name: 'constant',
        velocityAt: () => ({ ...command }),
        driveAt: (_frame, pose) => ({
            speed: Math.hypot(command.vx, command.vy),
            direction: wrapDegrees(radToDeg(Math.atan2(command.vy, command.vx))),
            orientation: orientationOf(pose),
        }),
    };
}

/**
 * Sweep options
 */
export interface SweepProfileOptions {
    /** Angular velocity command (rad/s) */
    omega: number;
    /** Peak driving speed (m/s), default 1 */
    peakSpeed?: number;
}

/**
 * Demo sweep: the driving direction turns one degree per frame while the speed
 * oscillates between 0 and `peakSpeed`.
 *
 *   speed(f)     = peak · ½ (1 + sin f°)
 *   direction(f) = f mod 360
 *
 * The command is expressed relative to the pose heading, so the world-frame driving
 * direction follows the sweep while the robot turns at `omega`.
 */
export function sweepProfile(options: SweepProfileOptions): VelocityProfile {
    const peakSpeed = options.peakSpeed ?? 1;
    if (!Number.isFinite(options.omega)) {
        throw new ValidationError(`omega must be finite (got ${options.omega})`);
    }
    if (!Number.isFinite(peakSpeed) || peakSpeed < 0) {
        throw new ValidationError(`peakSpeed must be a finite non-negative number (got ${peakSpeed})`);
    }

    const drive = (frame: number, pose: Readonly<RobotPose>): DriveIntent => ({
        speed: peakSpeed * 0.5 * (1 + Math.sin(degToRad(frame))),
        direction: wrapDegrees(frame),
        orientation: orientationOf(pose),
    });

    return {
        name: 'sweep',
        velocityAt: (frame, pose) => {
            const { speed, direction, orientation } = drive(frame, pose);
            const { vx, vy } = convertToBodyFrame(speed, direction, orientation);
            return { vx, vy, omega: options.omega };
        },
        driveAt: drive,
    };
}
