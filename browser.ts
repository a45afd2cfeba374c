/**
 * @packageDocumentation
 * @module omnikin/browser
 *
 * Browser-compatible entry point for omnikin.
 *
 * Excludes the terminal demo task (readline, process.stdin), so it bundles cleanly
 * with Vite, Webpack and other browser bundlers.
 *
 * ## Usage Example
 * ```typescript
 * import { core, omni, render } from 'omnikin/browser';
 *
 * const config = core.resolveSimulationConfig({ bothConfigurations: true });
 * const runner = new core.Runner({ cores: omni.createCoresFromConfig(config), dt: config.dt });
 * const [left, right] = runner.step();
 * ```
 *
 * @license MIT
 */

export * as core from './src/core';
export * as omni from './src/models/robotics/omni';
export * as numeric from './src/models/numeric';
export * as render from './src/extras/render';

// ==================== Version ====================
export const VERSION = '0.1.0';
