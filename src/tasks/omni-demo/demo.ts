/**
 * @module tasks/omni-demo/demo
 * @description Terminal rendition of the omni kinematics animation
 *
 * Resolves the config (rejecting it before any frame runs), builds one core per robot,
 * and drives them with the paced runner while printing the info box for every robot.
 */

import { resolveSimulationConfig, type SimulationConfigInput } from '../../core/config';
import { ConsoleLogger, type Logger } from '../../core/logging';
import { Runner, type RunResult } from '../../core/runner';
import { createCoresFromConfig, type RobotCore } from '../../models/robotics/omni/core';
import type { FrameSnapshot } from '../../models/robotics/omni/types';
import { renderTextFrame } from '../../extras/render/info';
import { attachKeyboard } from './keyboard';

export interface DemoOptions {
    config?: SimulationConfigInput;
    /** Log every frame to the console */
    verbose?: boolean;
    /** Print the info box every N frames (default 20); 0 disables */
    renderEvery?: number;
    /** Text sink (default console.log) */
    output?: (text: string) => void;
    /** Replaces the default console logger */
    loggers?: Logger[];
    /** Keyboard for pause/resume/quit (a TTY in the CLI) */
    keyboard?: NodeJS.ReadStream;
}

/**
 * Info box of every robot, one block per core
 */
export function renderSnapshots(cores: readonly RobotCore[], snapshots: FrameSnapshot[]): string {
    return snapshots
        .map((snapshot, i) => {
            const core = cores[i];
            const drive = core.profile.driveAt(snapshot.frame, snapshot.pose);
            return renderTextFrame(snapshot, drive, core.geometry.wheelCount);
        })
        .join('\n\n');
}

/**
 * Run the demo to completion (or until quit)
 */
export async function runDemo(options: DemoOptions = {}): Promise<RunResult> {
    const config = resolveSimulationConfig(options.config);
    const cores = createCoresFromConfig(config);
    const output = options.output ?? ((text: string) => console.log(text));
    const renderEvery = options.renderEvery ?? 20;

    const runner = new Runner({
        cores,
        dt: config.dt,
        frames: config.frames,
        intervalMs: config.intervalMs,
        loggers: options.loggers ?? [new ConsoleLogger(options.verbose ? 'debug' : 'info')],
        onFrame: snapshots => {
            if (renderEvery > 0 && snapshots[0].frame % renderEvery === 0) {
                output(renderSnapshots(cores, snapshots));
            }
        },
    });

    const detach = options.keyboard
        ? attachKeyboard(options.keyboard, {
            onToggle: () => output(runner.toggleAll() === 'paused' ? '[PAUSED]' : '[RESUMED]'),
            onQuit: () => runner.stop(),
        })
        : undefined;

    try {
        return await runner.run();
    } finally {
        detach?.();
    }
}
