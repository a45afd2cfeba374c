import { DimensionError } from '../../../core/errors'
import { mulMatVec } from '../../numeric/math/linear-algebra'
import type { BodyVelocity, JacobianMatrix, WheelVelocityVector } from './types'

/**
 * Body velocity as the column vector [vx, vy, ω]
 */
export function velocityVector(v: BodyVelocity): [number, number, number] {
    return [v.vx, v.vy, v.omega]
}

/**
 * Forward kinematics: Ω = J · [vx, vy, ω]ᵀ
 *
 * Throws `DimensionError` if the matrix is not `wheelCount` × 3.
 */
export function solveWheelVelocities(jacobian: JacobianMatrix, velocity: BodyVelocity): WheelVelocityVector {
    if (jacobian.rows.length !== jacobian.wheelCount) {
        throw new DimensionError(
            `Jacobian declares ${jacobian.wheelCount} wheels but has ${jacobian.rows.length} rows`,
            jacobian.wheelCount,
            jacobian.rows.length
        )
    }
    return mulMatVec(jacobian.rows, velocityVector(velocity))
}
