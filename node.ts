/**
 * @packageDocumentation
 * @module omnikin/node
 *
 * Node.js entry point for omnikin.
 *
 * Includes everything in the default entry, including the terminal demo task
 * (readline prompts and keyboard pause/resume).
 *
 * ## Usage Example
 * ```typescript
 * import { tasks } from 'omnikin/node';
 *
 * const result = await tasks.omniDemo.runDemo({
 *   config: { bothConfigurations: true, omega: 0.5, frames: 200 },
 * });
 * ```
 *
 * @license MIT
 */

// Re-export everything from the main index
export * from './index';
