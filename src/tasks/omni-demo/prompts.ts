/**
 * @module tasks/omni-demo/prompts
 * @description Interactive startup questions
 *
 * Questions are asked through an injected `Ask` function so the flow can run against
 * readline in the CLI and against canned answers in tests. The kinematics core never
 * waits on a user; it only receives the resolved config.
 */

import * as readline from 'readline';
import { DEFAULT_SIMULATION_CONFIG, type SimulationConfigInput } from '../../core/config';

export type Ask = (question: string) => Promise<string>;

export interface PromptResult {
    config: SimulationConfigInput;
    /** Set when an answer was rejected and defaults were used */
    warning?: string;
}

export const INVALID_INPUT_WARNING = 'Invalid input. Using default values.';

function isYes(answer: string): boolean {
    return answer.trim().toLowerCase() === 'y';
}

/**
 * Parse an omega answer; empty means the default, anything non-numeric is rejected
 */
export function parseOmega(answer: string, fallback: number): number | undefined {
    const trimmed = answer.trim();
    if (trimmed === '') return fallback;
    const value = Number(trimmed);
    return Number.isFinite(value) ? value : undefined;
}

/**
 * Ask for side-by-side mode, omega, and (single robot only) the wheel count.
 *
 * An invalid omega restores both the default omega and single-robot mode.
 */
export async function promptForConfig(ask: Ask, defaultOmega: number = DEFAULT_SIMULATION_CONFIG.omega): Promise<PromptResult> {
    let bothConfigurations = isYes(await ask('Plot both 3-wheel and 4-wheel configurations? (y/n, default n): '));
    let omega = parseOmega(await ask(`Enter the omega value (default ${defaultOmega}): `), defaultOmega);
    let warning: string | undefined;

    if (omega === undefined) {
        warning = INVALID_INPUT_WARNING;
        omega = defaultOmega;
        bothConfigurations = false;
    }

    if (bothConfigurations) {
        return { config: { bothConfigurations, omega }, warning };
    }

    const useFourWheels = isYes(await ask('Use 4 wheels? (y/n, default n): '));
    return {
        config: { bothConfigurations, omega, wheelCount: useFourWheels ? 4 : 3 },
        warning,
    };
}

/**
 * `Ask` backed by a readline interface; call `close()` once the questions are done
 */
export function createReadlineAsk(
    input: NodeJS.ReadableStream,
    output: NodeJS.WritableStream
): { ask: Ask; close: () => void } {
    const rl = readline.createInterface({ input, output });
    return {
        ask: question => new Promise(resolve => rl.question(question, resolve)),
        close: () => rl.close(),
    };
}
