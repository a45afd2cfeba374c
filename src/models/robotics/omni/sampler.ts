import { rotate2 } from '../../numeric/math/linear-algebra'
import type { GeometryModel } from './geometry'
import { solveWheelVelocities } from './solver'
import type { SimulationState } from './state'
import type { FrameSnapshot, JacobianMatrix, Point2D } from './types'

/**
 * Builds the per-tick render snapshot for one robot.
 *
 * Reads the geometry, Jacobian and state it was given; never mutates them.
 */
export class FrameSampler {
    constructor(
        private readonly geometry: GeometryModel,
        private readonly jacobian: JacobianMatrix,
        private readonly state: SimulationState,
        readonly label: string
    ) {}

    /**
     * Wheel centers in the world frame: pose + offsets rotated by heading
     */
    worldWheelPositions(): Point2D[] {
        const pose = this.state.currentPose()
        return this.geometry.wheelPositions().map(offset => {
            const [x, y] = rotate2([offset.x, offset.y], pose.heading)
            return { x: pose.x + x, y: pose.y + y }
        })
    }

    sample(frame: number, time: number): FrameSnapshot {
        const velocity = this.state.velocity
        return {
            label: this.label,
            frame,
            time,
            status: this.state.status,
            pose: this.state.currentPose(),
            velocity,
            wheelPositions: this.worldWheelPositions(),
            wheelVelocities: solveWheelVelocities(this.jacobian, velocity),
        }
    }
}
