/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import {
    DEFAULT_SIMULATION_CONFIG,
    resolveSimulationConfig,
    validateSimulationConfig,
} from '../src/core/config';
import { InvalidConfigurationError } from '../src/core/errors';

describe('Simulation Configuration', () => {
    describe('resolveSimulationConfig', () => {
        it('should return the defaults for an empty input', () => {
            expect(resolveSimulationConfig()).toEqual(DEFAULT_SIMULATION_CONFIG);
            expect(resolveSimulationConfig({})).toEqual(DEFAULT_SIMULATION_CONFIG);
        });

        it('should carry the reference robot constants', () => {
            const config = resolveSimulationConfig();

            expect(config.wheelRadius).toBe(0.148);
            expect(config.centerDistance).toBe(0.195);
            expect(config.frames).toBe(720);
            expect(config.intervalMs).toBe(50);
            expect(config.dt).toBe(0.05);
        });

        it('should merge partial velocity with the default', () => {
            const config = resolveSimulationConfig({ profile: 'constant', velocity: { vx: 0.3 } });

            expect(config.velocity).toEqual({ vx: 0.3, vy: 0 });
        });

        it('should narrow a valid wheel count', () => {
            expect(resolveSimulationConfig({ wheelCount: 4 }).wheelCount).toBe(4);
        });

        it('should keep defaults for fields passed as undefined', () => {
            const config = resolveSimulationConfig({ omega: undefined, dt: undefined, velocity: { vx: undefined, vy: 0.2 } });

            expect(config.omega).toBe(0);
            expect(config.dt).toBe(0.05);
            expect(config.velocity).toEqual({ vx: 0, vy: 0.2 });
            expect('phaseOffset' in config).toBe(false);
        });

        it('should accept an endless run', () => {
            expect(resolveSimulationConfig({ frames: Infinity }).frames).toBe(Infinity);
        });

        it('should throw with every error listed', () => {
            let caught: unknown;
            try {
                resolveSimulationConfig({ wheelCount: 5, dt: 0 });
            } catch (error) {
                caught = error;
            }

            expect(caught).toBeInstanceOf(InvalidConfigurationError);
            if (caught instanceof InvalidConfigurationError) {
                expect(caught.errors).toEqual([
                    'wheelCount must be 3 or 4 (got 5)',
                    'dt must be a positive number (got 0)',
                ]);
                expect(caught.message).toBe(
                    'Invalid configuration: wheelCount must be 3 or 4 (got 5); dt must be a positive number (got 0)'
                );
            }
        });
    });

    describe('validateSimulationConfig', () => {
        it('should accept the defaults without warnings', () => {
            expect(validateSimulationConfig({})).toEqual({ valid: true, errors: [], warnings: [] });
        });

        it.each([
            { input: { wheelRadius: 0 }, message: 'wheelRadius must be a positive number (got 0)' },
            { input: { centerDistance: -1 }, message: 'centerDistance must be a positive number (got -1)' },
            { input: { omega: NaN }, message: 'omega must be a finite number (got NaN)' },
            { input: { frames: 2.5 }, message: 'frames must be a positive integer or Infinity (got 2.5)' },
            { input: { intervalMs: -5 }, message: 'intervalMs must be a non-negative number (got -5)' },
            { input: { peakSpeed: -1 }, message: 'peakSpeed must be a non-negative number (got -1)' },
            { input: { phaseOffset: Infinity }, message: 'phaseOffset must be a finite number (got Infinity)' },
        ])('should report "$message"', ({ input, message }) => {
            const result = validateSimulationConfig(input);

            expect(result.valid).toBe(false);
            expect(result.errors).toEqual([message]);
        });

        it('should warn about settings that have no effect', () => {
            const result = validateSimulationConfig({
                bothConfigurations: true,
                wheelCount: 4,
                phaseOffset: 0,
                velocity: { vx: 1 },
            });

            expect(result.valid).toBe(true);
            expect(result.warnings).toEqual([
                'wheelCount is ignored when bothConfigurations is set',
                'phaseOffset is ignored when bothConfigurations is set',
                'velocity is ignored by the sweep profile',
            ]);
        });

        it('should not warn about velocity on the constant profile', () => {
            const result = validateSimulationConfig({ profile: 'constant', velocity: { vy: 1 } });

            expect(result.warnings).toEqual([]);
        });
    });
});
