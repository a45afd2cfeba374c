/**
 * @module extras/render/glyphs
 * @description Drawable geometry for one frame: robot body, wheel rectangles, velocity arrows
 *
 * Pure geometry in world coordinates (meters, degrees for rotations). A renderer only has to
 * draw what these functions return.
 */

import type { GeometryModel } from '../../models/robotics/omni/geometry';
import type { DriveIntent } from '../../models/robotics/omni/profile';
import type { FrameSnapshot, Point2D } from '../../models/robotics/omni/types';
import { degToRad, radToDeg } from '../../models/robotics/omni/utils';

// ==================== Types ====================

export interface Arrow {
    start: Point2D;
    /** Displacement from start to tip */
    vector: Point2D;
}

export interface WheelGlyph {
    index: number;
    /** Wheel center, also where the index label goes */
    center: Point2D;
    /** Rectangle corner the rotation is applied around */
    anchor: Point2D;
    /** Along the rolling direction (m) */
    length: number;
    /** Across the rolling direction (m) */
    width: number;
    /** Rectangle rotation (degrees) */
    rotation: number;
    /** Present only when |ω| reaches the arrow threshold */
    arrow?: Arrow;
}

export interface BodyGlyph {
    center: Point2D;
    radius: number;
    /** Point on the rim in the heading direction */
    forwardMarker: Point2D;
    /** Present only when the driving speed exceeds 0.01 m/s */
    speedArrow?: Arrow;
}

export interface GlyphOptions {
    /** Physical wheel width (m), default 0.044 */
    wheelWidth?: number;
    /** |ω| drawn at full arrow length (rad/s), default 6 */
    maxVelocity?: number;
    /** Smallest |ω| that gets an arrow (rad/s), default 0.1 */
    arrowThreshold?: number;
}

const DEFAULT_GLYPH_OPTIONS: Required<GlyphOptions> = {
    wheelWidth: 0.044,
    maxVelocity: 6,
    arrowThreshold: 0.1,
};

/** Gap between wheel rectangle and its arrow (m) */
const ARROW_GAP = 0.01;

// ==================== Glyphs ====================

/**
 * Wheel rectangles and velocity arrows for a snapshot.
 *
 * The arrow runs along the wheel's rolling direction, sized |ω| / maxVelocity of
 * 0.3 × wheel radius; positive ω points clockwise from the mount angle.
 */
export function wheelGlyphs(
    snapshot: FrameSnapshot,
    geometry: GeometryModel,
    options: GlyphOptions = {}
): WheelGlyph[] {
    const { wheelWidth, maxVelocity, arrowThreshold } = { ...DEFAULT_GLYPH_OPTIONS, ...options };
    const R = geometry.wheelRadius;

    return geometry.wheelAngles.map((mountAngle, index) => {
        const angle = mountAngle + snapshot.pose.heading;
        const radial = { x: Math.cos(angle), y: Math.sin(angle) };
        const rolling = { x: Math.cos(angle + Math.PI / 2), y: Math.sin(angle + Math.PI / 2) };
        const center = snapshot.wheelPositions[index];

        const offset = (across: number, along: number): Point2D => ({
            x: center.x + across * radial.x - along * rolling.x,
            y: center.y + across * radial.y - along * rolling.y,
        });

        const glyph: WheelGlyph = {
            index,
            center,
            anchor: offset(wheelWidth / 2, R / 2),
            length: R,
            width: wheelWidth,
            rotation: radToDeg(angle + Math.PI / 2),
        };

        const omega = snapshot.wheelVelocities[index];
        if (Math.abs(omega) >= arrowThreshold) {
            const gap = offset(wheelWidth / 2 + ARROW_GAP, R / 2 + ARROW_GAP);
            const start = { x: gap.x + (R / 2) * rolling.x, y: gap.y + (R / 2) * rolling.y };
            const length = (Math.abs(omega) / maxVelocity) * R * 0.3;
            const sign = omega < 0 ? 1 : -1;
            glyph.arrow = {
                start,
                vector: { x: sign * length * rolling.x, y: sign * length * rolling.y },
            };
        }

        return glyph;
    });
}

/**
 * Robot body disc, forward marker and driving-speed arrow
 */
export function bodyGlyph(snapshot: FrameSnapshot, geometry: GeometryModel, drive: DriveIntent): BodyGlyph {
    const L = geometry.centerDistance;
    const { x, y, heading } = snapshot.pose;

    const glyph: BodyGlyph = {
        center: { x, y },
        radius: L,
        forwardMarker: { x: x + L * Math.cos(heading), y: y + L * Math.sin(heading) },
    };

    if (drive.speed > 0.01) {
        const length = L * 0.9 * drive.speed;
        const direction = degToRad(drive.direction);
        glyph.speedArrow = {
            start: { x, y },
            vector: { x: length * Math.cos(direction), y: length * Math.sin(direction) },
        };
    }

    return glyph;
}
