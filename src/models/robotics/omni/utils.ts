/**
 * Omni module utility functions
 */

/**
 * Degrees → radians
 */
export function degToRad(degrees: number): number {
    return (degrees * Math.PI) / 180;
}

/**
 * Radians → degrees
 */
export function radToDeg(radians: number): number {
    return (radians * 180) / Math.PI;
}

/**
 * Wrap degrees into [0, 360)
 */
export function wrapDegrees(degrees: number): number {
    const wrapped = degrees % 360;
    return wrapped < 0 ? wrapped + 360 : wrapped;
}
