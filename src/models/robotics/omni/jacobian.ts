import type { GeometryModel } from './geometry'
import type { JacobianMatrix, JacobianRow } from './types'

/**
 * Build the Jacobian mapping body velocity [vx, vy, ω] to wheel angular velocity.
 *
 * Row i is the rolling constraint of wheel i: the body velocity projected onto the
 * wheel's mount direction plus the tangential term from ω, over the wheel radius.
 *
 *   J[i] = [cos(θ_i) / r, sin(θ_i) / r, L / r]
 */
export function buildJacobian(geometry: GeometryModel): JacobianMatrix {
    const r = geometry.wheelRadius
    const L = geometry.centerDistance

    const rows = geometry.wheelAngles.map(
        (angle): JacobianRow => Object.freeze([Math.cos(angle) / r, Math.sin(angle) / r, L / r] as const)
    )

    return Object.freeze({
        wheelCount: geometry.wheelCount,
        rows: Object.freeze(rows),
    })
}

/**
 * Copy a Jacobian into plain nested arrays (for printing or serialization)
 */
export function jacobianToArray(jacobian: JacobianMatrix): number[][] {
    return jacobian.rows.map(row => [...row])
}
