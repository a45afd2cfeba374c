/**
 * Geometry Model Tests
 * Wheel layouts, positions and construction-time validation
 */

import { describe, it, expect } from 'vitest';
import {
    GeometryModel,
    DEFAULT_PHASE_OFFSET,
    evenlySpacedAngles,
    isWheelCount,
    validateGeometryParams,
} from '../src/models/robotics/omni/geometry';
import { InvalidConfigurationError, ErrorCodes, hasErrorCode } from '../src/core/errors';
import { isClose, arraysClose, deg, angularGap } from './test-utils';

describe('GeometryModel', () => {
    describe('default layouts', () => {
        it('should mount three wheels at 60°, 180°, 300°', () => {
            const geometry = new GeometryModel({ wheelCount: 3, wheelRadius: 0.148, centerDistance: 0.195 });

            expect(geometry.wheelCount).toBe(3);
            expect(arraysClose([...geometry.wheelAngles], [deg(60), deg(180), deg(300)], 1e-12, 1e-12)).toBe(true);
        });

        it('should mount four wheels at 45°, 135°, 225°, 315°', () => {
            const geometry = new GeometryModel({ wheelCount: 4, wheelRadius: 0.148, centerDistance: 0.195 });

            expect(geometry.wheelCount).toBe(4);
            expect(arraysClose(
                [...geometry.wheelAngles],
                [deg(45), deg(135), deg(225), deg(315)],
                1e-12,
                1e-12
            )).toBe(true);
        });

        it('should expose the default phase offsets', () => {
            expect(isClose(DEFAULT_PHASE_OFFSET[3], Math.PI / 3, 1e-12)).toBe(true);
            expect(isClose(DEFAULT_PHASE_OFFSET[4], Math.PI / 4, 1e-12)).toBe(true);
        });
    });

    describe('wheelPositions', () => {
        const phases = [0, 0.3, -1.2, Math.PI, deg(90)];

        for (const wheelCount of [3, 4] as const) {
            for (const phaseOffset of phases) {
                it(`should place ${wheelCount} wheels on the circle with even spacing (phase ${phaseOffset.toFixed(3)})`, () => {
                    const geometry = new GeometryModel({ wheelCount, wheelRadius: 0.05, centerDistance: 0.2, phaseOffset });
                    const positions = geometry.wheelPositions();

                    expect(positions).toHaveLength(wheelCount);
                    for (const p of positions) {
                        expect(isClose(Math.hypot(p.x, p.y), 0.2, 1e-12)).toBe(true);
                    }
                    for (let i = 0; i < wheelCount; i++) {
                        const gap = angularGap(positions[i], positions[(i + 1) % wheelCount]);
                        expect(isClose(gap, (2 * Math.PI) / wheelCount, 1e-9)).toBe(true);
                    }
                });
            }
        }

        it('should compute (L cos θ, L sin θ) per wheel', () => {
            const geometry = new GeometryModel({
                wheelCount: 3,
                wheelRadius: 0.05,
                centerDistance: 0.2,
                wheelAngles: [deg(90), deg(210), deg(330)],
            });
            const [a, b, c] = geometry.wheelPositions();

            expect(a.x).toBeCloseTo(0, 12);
            expect(a.y).toBeCloseTo(0.2, 12);
            expect(b.x).toBeCloseTo(-0.2 * Math.sqrt(3) / 2, 12);
            expect(b.y).toBeCloseTo(-0.1, 12);
            expect(c.x).toBeCloseTo(0.2 * Math.sqrt(3) / 2, 12);
            expect(c.y).toBeCloseTo(-0.1, 12);
        });

        it('should return fresh arrays on every call', () => {
            const geometry = new GeometryModel({ wheelCount: 4, wheelRadius: 0.05, centerDistance: 0.2 });
            const first = geometry.wheelPositions();
            first[0].x = 99;

            expect(geometry.wheelPositions()[0].x).not.toBe(99);
        });
    });

    describe('immutability', () => {
        it('should freeze the model and its angles', () => {
            const geometry = new GeometryModel({ wheelCount: 3, wheelRadius: 0.05, centerDistance: 0.2 });

            expect(Object.isFrozen(geometry)).toBe(true);
            expect(Object.isFrozen(geometry.wheelAngles)).toBe(true);
        });

        it('should copy explicit angles instead of keeping the caller array', () => {
            const angles = [0, 2, 4];
            const geometry = new GeometryModel({ wheelCount: 3, wheelRadius: 0.05, centerDistance: 0.2, wheelAngles: angles });
            angles[0] = 1;

            expect(geometry.wheelAngles[0]).toBe(0);
        });
    });

    describe('validation', () => {
        it.each([2, 5, 0, 3.5])('should reject wheel count %s', wheelCount => {
            expect(() => new GeometryModel({ wheelCount, wheelRadius: 0.05, centerDistance: 0.2 }))
                .toThrow(InvalidConfigurationError);
        });

        it.each([0, -0.1, NaN, Infinity])('should reject wheel radius %s', wheelRadius => {
            expect(() => new GeometryModel({ wheelCount: 3, wheelRadius, centerDistance: 0.2 }))
                .toThrow(InvalidConfigurationError);
        });

        it.each([0, -1, NaN])('should reject center distance %s', centerDistance => {
            expect(() => new GeometryModel({ wheelCount: 4, wheelRadius: 0.05, centerDistance }))
                .toThrow(InvalidConfigurationError);
        });

        it('should reject explicit angles of the wrong length', () => {
            expect(() => new GeometryModel({
                wheelCount: 4,
                wheelRadius: 0.05,
                centerDistance: 0.2,
                wheelAngles: [0, 1, 2],
            })).toThrow('wheelAngles must have 4 entries (got 3)');
        });

        it('should reject a non-finite phase offset', () => {
            expect(() => new GeometryModel({ wheelCount: 3, wheelRadius: 0.05, centerDistance: 0.2, phaseOffset: NaN }))
                .toThrow(InvalidConfigurationError);
        });

        it('should report every problem at once with the INVALID_CONFIGURATION code', () => {
            let caught: unknown;
            try {
                new GeometryModel({ wheelCount: 5, wheelRadius: 0, centerDistance: -1 });
            } catch (error) {
                caught = error;
            }

            expect(caught).toBeInstanceOf(InvalidConfigurationError);
            expect(hasErrorCode(caught, ErrorCodes.INVALID_CONFIGURATION)).toBe(true);
            if (caught instanceof InvalidConfigurationError) {
                expect(caught.errors).toEqual([
                    'wheelCount must be 3 or 4 (got 5)',
                    'wheelRadius must be a positive number (got 0)',
                    'centerDistance must be a positive number (got -1)',
                ]);
            }
        });

        it('should return no errors for valid parameters', () => {
            expect(validateGeometryParams({ wheelCount: 3, wheelRadius: 0.05, centerDistance: 0.2 })).toEqual([]);
        });
    });
});

describe('Geometry helpers', () => {
    it('isWheelCount should accept only 3 and 4', () => {
        expect(isWheelCount(3)).toBe(true);
        expect(isWheelCount(4)).toBe(true);
        expect(isWheelCount(2)).toBe(false);
        expect(isWheelCount(6)).toBe(false);
    });

    it('evenlySpacedAngles should start at the phase offset', () => {
        const angles = evenlySpacedAngles(4, 0.5);

        expect(angles).toHaveLength(4);
        expect(angles[0]).toBe(0.5);
        expect(isClose(angles[3], 0.5 + 1.5 * Math.PI, 1e-12)).toBe(true);
    });
});
