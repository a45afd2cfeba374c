import { InvalidConfigurationError } from '../../../core/errors'
import type { GeometryParams, Point2D, WheelCount } from './types'
import { degToRad } from './utils'

/**
 * Default angle of the first wheel per layout: 60°/180°/300° and 45°/135°/225°/315°
 */
export const DEFAULT_PHASE_OFFSET: Record<WheelCount, number> = {
    3: degToRad(60),
    4: degToRad(45),
}

/**
 * Check that a wheel count is one of the supported layouts
 */
export function isWheelCount(value: number): value is WheelCount {
    return value === 3 || value === 4
}

/**
 * Evenly spaced mount angles, `2π / wheelCount` apart, starting at `phaseOffset`
 */
export function evenlySpacedAngles(wheelCount: number, phaseOffset: number): number[] {
    const spacing = (2 * Math.PI) / wheelCount
    return Array.from({ length: wheelCount }, (_, i) => phaseOffset + i * spacing)
}

/**
 * Robot physical layout: wheel radius, center distance and wheel mount angles.
 *
 * Immutable once constructed. Construction throws `InvalidConfigurationError`
 * instead of producing a partial model.
 */
export class GeometryModel {
    readonly wheelCount: WheelCount
    readonly wheelRadius: number
    readonly centerDistance: number
    readonly wheelAngles: readonly number[]

    constructor(params: GeometryParams) {
        const errors = validateGeometryParams(params)
        if (errors.length > 0) {
            throw new InvalidConfigurationError(`Invalid robot geometry: ${errors.join('; ')}`, errors)
        }
        // validateGeometryParams rejected any other count
        const wheelCount: WheelCount = params.wheelCount === 4 ? 4 : 3

        this.wheelCount = wheelCount
        this.wheelRadius = params.wheelRadius
        this.centerDistance = params.centerDistance
        this.wheelAngles = Object.freeze(
            params.wheelAngles
                ? [...params.wheelAngles]
                : evenlySpacedAngles(wheelCount, params.phaseOffset ?? DEFAULT_PHASE_OFFSET[wheelCount])
        )
        Object.freeze(this)
    }

    /**
     * Wheel centers relative to the robot center: (L cos θ, L sin θ)
     */
    wheelPositions(): Point2D[] {
        return this.wheelAngles.map(angle => ({
            x: this.centerDistance * Math.cos(angle),
            y: this.centerDistance * Math.sin(angle),
        }))
    }
}

/**
 * Collect every problem with a set of geometry parameters
 */
export function validateGeometryParams(params: GeometryParams): string[] {
    const errors: string[] = []

    if (!isWheelCount(params.wheelCount)) {
        errors.push(`wheelCount must be 3 or 4 (got ${params.wheelCount})`)
    }
    if (!Number.isFinite(params.wheelRadius) || params.wheelRadius <= 0) {
        errors.push(`wheelRadius must be a positive number (got ${params.wheelRadius})`)
    }
    if (!Number.isFinite(params.centerDistance) || params.centerDistance <= 0) {
        errors.push(`centerDistance must be a positive number (got ${params.centerDistance})`)
    }
    if (params.phaseOffset !== undefined && !Number.isFinite(params.phaseOffset)) {
        errors.push(`phaseOffset must be finite (got ${params.phaseOffset})`)
    }
    if (params.wheelAngles !== undefined) {
        if (params.wheelAngles.length !== params.wheelCount) {
            errors.push(
                `wheelAngles must have ${params.wheelCount} entries (got ${params.wheelAngles.length})`
            )
        }
        if (params.wheelAngles.some(angle => !Number.isFinite(angle))) {
            errors.push('wheelAngles must all be finite')
        }
    }

    return errors
}
