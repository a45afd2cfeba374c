/**
 * Jacobian Builder Tests
 * Row structure, the standard 90°/210°/330° layout, determinism
 */

import { describe, it, expect } from 'vitest';
import { GeometryModel } from '../src/models/robotics/omni/geometry';
import { buildJacobian, jacobianToArray } from '../src/models/robotics/omni/jacobian';
import { deg } from './test-utils';

const TOL = 1e-9;

describe('buildJacobian', () => {
    for (const wheelCount of [3, 4] as const) {
        it(`should build [cos θ/r, sin θ/r, L/r] rows for ${wheelCount} wheels`, () => {
            const geometry = new GeometryModel({ wheelCount, wheelRadius: 0.148, centerDistance: 0.195, phaseOffset: 0.4 });
            const J = buildJacobian(geometry);

            expect(J.wheelCount).toBe(wheelCount);
            expect(J.rows).toHaveLength(wheelCount);
            J.rows.forEach((row, i) => {
                const theta = geometry.wheelAngles[i];
                expect(row).toHaveLength(3);
                expect(Math.abs(row[0] - Math.cos(theta) / 0.148)).toBeLessThan(TOL);
                expect(Math.abs(row[1] - Math.sin(theta) / 0.148)).toBeLessThan(TOL);
                expect(Math.abs(row[2] - 0.195 / 0.148)).toBeLessThan(TOL);
            });
        });
    }

    it('should match hand-computed values for the 90°/210°/330° layout', () => {
        const geometry = new GeometryModel({
            wheelCount: 3,
            wheelRadius: 0.05,
            centerDistance: 0.2,
            wheelAngles: [deg(90), deg(210), deg(330)],
        });
        const J = jacobianToArray(buildJacobian(geometry));
        const s = 10 * Math.sqrt(3); // (√3/2) / 0.05

        const expected = [
            [0, 20, 4],
            [-s, -10, 4],
            [s, -10, 4],
        ];
        J.forEach((row, i) => {
            row.forEach((value, j) => {
                expect(Math.abs(value - expected[i][j])).toBeLessThan(TOL);
            });
        });
    });

    it('should produce identical matrices when built twice', () => {
        const geometry = new GeometryModel({ wheelCount: 4, wheelRadius: 0.05, centerDistance: 0.2 });
        const first = buildJacobian(geometry);
        const second = buildJacobian(geometry);

        expect(second).not.toBe(first);
        first.rows.forEach((row, i) => {
            row.forEach((value, j) => {
                expect(Object.is(value, second.rows[i][j])).toBe(true);
            });
        });
    });

    it('should be frozen', () => {
        const J = buildJacobian(new GeometryModel({ wheelCount: 3, wheelRadius: 0.05, centerDistance: 0.2 }));

        expect(Object.isFrozen(J)).toBe(true);
        expect(Object.isFrozen(J.rows)).toBe(true);
        expect(Object.isFrozen(J.rows[0])).toBe(true);
    });

    it('jacobianToArray should return mutable copies', () => {
        const J = buildJacobian(new GeometryModel({ wheelCount: 3, wheelRadius: 0.05, centerDistance: 0.2 }));
        const copy = jacobianToArray(J);
        copy[0][2] = 0;

        expect(J.rows[0][2]).toBeCloseTo(4, 12);
    });
});
