/**
 * @module tasks
 * @description Runnable tasks (Node.js only)
 *
 * - omni-demo: terminal animation with prompts and pause/resume keys
 */

export * as omniDemo from './omni-demo';
