/**
 * @module math/linear-algebra
 * @description Lightweight linear algebra utilities for the kinematics core.
 * Provides the vector and matrix operations the Jacobian pipeline needs, without external dependencies.
 */

import { DimensionError } from '../../../core/errors';

// ==================== Vector Operations ====================

/**
 * Compute the dot product of two vectors
 */
export function dot(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
        throw new DimensionError(
            `Cannot take dot product of vectors with lengths ${a.length} and ${b.length}`,
            a.length,
            b.length
        );
    }
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        sum += a[i] * b[i];
    }
    return sum;
}

/**
 * Compute the infinity norm (max absolute value) of a vector
 */
export function infNorm(v: readonly number[]): number {
    let maxVal = 0;
    for (let i = 0; i < v.length; i++) {
        const absVal = Math.abs(v[i]);
        if (absVal > maxVal) maxVal = absVal;
    }
    return maxVal;
}

// ==================== 2D Operations ====================

export type Vec2 = [number, number];

/**
 * Rotate a 2D vector counter-clockwise by `angle` radians
 */
export function rotate2(v: readonly [number, number], angle: number): Vec2 {
    const c = Math.cos(angle);
    const s = Math.sin(angle);
    return [c * v[0] - s * v[1], s * v[0] + c * v[1]];
}

// ==================== Matrix Operations ====================

/**
 * Matrix-vector multiplication: M * v
 *
 * Every row must have exactly `v.length` columns.
 */
export function mulMatVec(M: readonly (readonly number[])[], v: readonly number[]): number[] {
    const result: number[] = new Array(M.length);
    for (let i = 0; i < M.length; i++) {
        const row = M[i];
        if (row.length !== v.length) {
            throw new DimensionError(
                `Row ${i} has ${row.length} columns, vector has ${v.length} entries`,
                v.length,
                row.length
            );
        }
        let sum = 0;
        for (let j = 0; j < row.length; j++) {
            sum += row[j] * v[j];
        }
        result[i] = sum;
    }
    return result;
}
