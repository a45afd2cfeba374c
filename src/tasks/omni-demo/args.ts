/**
 * @module tasks/omni-demo/args
 * @description Command-line flag parsing for the omni demo
 */

import type { ProfileKind, SimulationConfigInput } from '../../core/config';
import { ValidationError } from '../../core/errors';

export interface CliArgs {
    /** Settings given on the command line */
    config: SimulationConfigInput;
    /** Ask interactively (no settings flags and no `--no-prompt`) */
    prompt: boolean;
    verbose: boolean;
    help: boolean;
}

function toNumber(flag: string, value: string | undefined): number {
    if (value === undefined) {
        throw new ValidationError(`Missing value for ${flag}`);
    }
    if (/^(inf|infinity)$/i.test(value)) {
        return Infinity;
    }
    return Number(value);
}

function toProfile(value: string | undefined): ProfileKind {
    if (value === 'sweep' || value === 'constant') {
        return value;
    }
    throw new ValidationError(`--profile must be sweep or constant (got ${value ?? 'nothing'})`);
}

/**
 * Parse flags (without the node/script prefix).
 * Numbers are passed through as given; range checks happen in `resolveSimulationConfig`.
 */
export function parseArgs(argv: string[]): CliArgs {
    const args: CliArgs = {
        config: {},
        prompt: true,
        verbose: false,
        help: false,
    };
    let hasSettings = false;
    const velocity: { vx?: number; vy?: number } = {};

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        switch (arg) {
            case '--help':
            case '-h':
                args.help = true;
                break;
            case '--verbose':
            case '-v':
                args.verbose = true;
                break;
            case '--no-prompt':
                args.prompt = false;
                break;
            case '--both':
            case '-b':
                args.config.bothConfigurations = true;
                hasSettings = true;
                break;
            case '--body-frame':
                args.config.integrationFrame = 'body';
                hasSettings = true;
                break;
            case '--wheels':
            case '-w':
                args.config.wheelCount = toNumber(arg, argv[++i]);
                hasSettings = true;
                break;
            case '--omega':
            case '-o':
                args.config.omega = toNumber(arg, argv[++i]);
                hasSettings = true;
                break;
            case '--frames':
            case '-f':
                args.config.frames = toNumber(arg, argv[++i]);
                hasSettings = true;
                break;
            case '--interval':
            case '-i':
                args.config.intervalMs = toNumber(arg, argv[++i]);
                hasSettings = true;
                break;
            case '--dt':
                args.config.dt = toNumber(arg, argv[++i]);
                hasSettings = true;
                break;
            case '--profile':
            case '-p':
                args.config.profile = toProfile(argv[++i]);
                hasSettings = true;
                break;
            case '--vx':
                velocity.vx = toNumber(arg, argv[++i]);
                hasSettings = true;
                break;
            case '--vy':
                velocity.vy = toNumber(arg, argv[++i]);
                hasSettings = true;
                break;
            default:
                throw new ValidationError(`Unknown option: ${arg}`);
        }
    }

    if (velocity.vx !== undefined || velocity.vy !== undefined) {
        args.config.velocity = velocity;
    }
    if (hasSettings) {
        args.prompt = false;
    }
    return args;
}

export const HELP_TEXT = `
Omni Demo - Jacobian kinematics of a 3- or 4-wheel omnidirectional robot

Usage:
  npx tsx src/tasks/omni-demo/cli.ts [options]

Options:
  -h, --help          Show this help message
  -w, --wheels N      Wheel count, 3 or 4 (default: 3)
  -b, --both          Run 3-wheel and 4-wheel robots side by side
  -o, --omega N       Angular velocity command in rad/s (default: 0)
  -f, --frames N      Frames to run, or "inf" (default: 720)
  -i, --interval MS   Delay between frames (default: 50)
      --dt S          Timestep per frame (default: 0.05)
  -p, --profile P     sweep | constant (default: sweep)
      --vx N, --vy N  Body velocity for the constant profile (m/s)
      --body-frame    Rotate body velocity by heading when integrating
      --no-prompt     Use defaults instead of asking
  -v, --verbose       Log every frame

Keys while running:
  space  pause / resume
  q      quit

Examples:
  npx tsx src/tasks/omni-demo/cli.ts
  npx tsx src/tasks/omni-demo/cli.ts --both --omega 0.5
  npx tsx src/tasks/omni-demo/cli.ts -w 4 -p constant --vx 0.3 -f 100
`;
