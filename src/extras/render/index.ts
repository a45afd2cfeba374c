/**
 * @module extras/render
 * @description Render geometry and text for frame snapshots
 */

export * from './glyphs';
export * from './info';
