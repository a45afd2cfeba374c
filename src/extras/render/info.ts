/**
 * @module extras/render/info
 * @description Text shown next to a robot: title, drive state and wheel velocities
 */

import type { DriveIntent } from '../../models/robotics/omni/profile';
import type { FrameSnapshot } from '../../models/robotics/omni/types';

/**
 * Panel title for a wheel layout
 */
export function configurationTitle(wheelCount: number): string {
    return `Jacobian Omnidirectional - ${wheelCount} Wheels`;
}

/**
 * Info box lines for one frame
 */
export function formatInfoBox(snapshot: FrameSnapshot, drive: DriveIntent): string[] {
    const omegas = snapshot.wheelVelocities.map(v => v.toFixed(1)).join(', ');
    return [
        `robot orient.=${drive.orientation.toFixed(1)}°`,
        `driving dir=${drive.direction.toFixed(1)}°`,
        `driving speed (m/s) =${drive.speed.toFixed(1)}`,
        `ω (rad/s) = [${omegas}]`,
    ];
}

/**
 * Title, info box and status as a single text block (terminal rendering)
 */
export function renderTextFrame(snapshot: FrameSnapshot, drive: DriveIntent, wheelCount: number): string {
    const header = `${configurationTitle(wheelCount)}  [frame ${snapshot.frame}${snapshot.status === 'paused' ? ', paused' : ''}]`;
    return [header, ...formatInfoBox(snapshot, drive).map(line => `  ${line}`)].join('\n');
}
