import { ValidationError } from '../../../core/errors'
import { rotate2 } from '../../numeric/math/linear-algebra'
import type { BodyVelocity, IntegrationFrame, RobotPose, SimulationStatus } from './types'

/**
 * Simulation state options
 */
export interface SimulationStateOptions {
    /** Initial velocity command (defaults to zero) */
    velocity?: BodyVelocity;
    /** Integration frame (defaults to `world`) */
    integrationFrame?: IntegrationFrame;
}

const ZERO_VELOCITY: BodyVelocity = { vx: 0, vy: 0, omega: 0 };

/**
 * Robot pose, velocity command and the Running/Paused state machine.
 *
 * The pose is private; callers only ever see frozen snapshots. Velocity updates are
 * accepted in both states and never cause a transition.
 */
export class SimulationState {
    private pose: RobotPose = { x: 0, y: 0, heading: 0 };
    private command: BodyVelocity;
    private state: SimulationStatus = 'running';
    private readonly frame: IntegrationFrame;

    constructor(options: SimulationStateOptions = {}) {
        this.command = { ...(options.velocity ?? ZERO_VELOCITY) };
        this.frame = options.integrationFrame ?? 'world';
    }

    get status(): SimulationStatus {
        return this.state;
    }

    get isPaused(): boolean {
        return this.state === 'paused';
    }

    get integrationFrame(): IntegrationFrame {
        return this.frame;
    }

    /**
     * Current velocity command (copy)
     */
    get velocity(): Readonly<BodyVelocity> {
        return Object.freeze({ ...this.command });
    }

    currentPose(): Readonly<RobotPose> {
        return Object.freeze({ ...this.pose });
    }

    setVelocity(velocity: BodyVelocity): void {
        this.command = { vx: velocity.vx, vy: velocity.vy, omega: velocity.omega };
    }

    pause(): void {
        this.state = 'paused';
    }

    resume(): void {
        this.state = 'running';
    }

    /**
     * Flip Running ↔ Paused, returns the new status
     */
    toggle(): SimulationStatus {
        this.state = this.state === 'running' ? 'paused' : 'running';
        return this.state;
    }

    /**
     * Forward-Euler step over `dt` seconds. No-op while paused.
     *
     * @returns whether the pose moved
     */
    advance(velocity: BodyVelocity, dt: number): boolean {
        if (!Number.isFinite(dt) || dt < 0) {
            throw new ValidationError(`dt must be a finite non-negative number (got ${dt})`, { dt });
        }
        if (this.state === 'paused') {
            return false;
        }

        let dx = velocity.vx * dt;
        let dy = velocity.vy * dt;
        if (this.frame === 'body') {
            [dx, dy] = rotate2([dx, dy], this.pose.heading);
        }

        this.pose = {
            x: this.pose.x + dx,
            y: this.pose.y + dy,
            heading: this.pose.heading + velocity.omega * dt,
        };
        return true;
    }

    /**
     * Advance with the current velocity command
     */
    tick(dt: number): boolean {
        return this.advance(this.command, dt);
    }

    /**
     * Back to the origin and Running; the velocity command is kept
     */
    reset(): void {
        this.pose = { x: 0, y: 0, heading: 0 };
        this.state = 'running';
    }
}
