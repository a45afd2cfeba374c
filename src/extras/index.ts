/**
 * @module src/extras
 * @description Optional modules built on the kinematics core
 *
 * Contains:
 * - render/: Wheel/body glyph geometry and info text for frame snapshots
 */

export * as render from './render';
