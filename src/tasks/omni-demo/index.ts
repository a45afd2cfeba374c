/**
 * @module tasks/omni-demo
 * @description Terminal demo of omnidirectional kinematics
 *
 * Entry point: `npx tsx src/tasks/omni-demo/cli.ts`
 */

export * from './args';
export * from './prompts';
export * from './keyboard';
export * from './demo';
