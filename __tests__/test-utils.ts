/**
 * Test Utilities for omnikin
 * Provides common helpers for numerical testing
 */

import type { BodyVelocity } from '../src/models/robotics/omni/types';

/**
 * Check if two numbers are approximately equal
 */
export function isClose(a: number, b: number, rtol = 1e-5, atol = 1e-8): boolean {
    return Math.abs(a - b) <= atol + rtol * Math.abs(b);
}

/**
 * Check if two arrays are approximately equal element-wise
 */
export function arraysClose(
    a: readonly number[],
    b: readonly number[],
    rtol = 1e-5,
    atol = 1e-8
): boolean {
    if (a.length !== b.length) return false;
    return a.every((val, i) => isClose(val, b[i], rtol, atol));
}

/**
 * Degrees → radians
 */
export function deg(degrees: number): number {
    return (degrees * Math.PI) / 180;
}

/**
 * Body velocity shorthand
 */
export function velocity(vx: number, vy: number, omega: number): BodyVelocity {
    return { vx, vy, omega };
}

/**
 * Angle between consecutive points around the origin, wrapped to [0, 2π)
 */
export function angularGap(a: { x: number; y: number }, b: { x: number; y: number }): number {
    const gap = Math.atan2(b.y, b.x) - Math.atan2(a.y, a.x);
    return ((gap % (2 * Math.PI)) + 2 * Math.PI) % (2 * Math.PI);
}
