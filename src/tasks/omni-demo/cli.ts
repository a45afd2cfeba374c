#!/usr/bin/env npx tsx
/**
 * @module tasks/omni-demo/cli
 * @description Command-line interface for the omni kinematics demo
 *
 * Usage:
 *   npx tsx src/tasks/omni-demo/cli.ts
 *   npx tsx src/tasks/omni-demo/cli.ts --both --omega 0.5
 *   npm run demo
 */

import { validateSimulationConfig } from '../../core/config';
import { parseArgs, HELP_TEXT } from './args';
import { runDemo } from './demo';
import { createReadlineAsk, promptForConfig } from './prompts';

// ==================== Main ====================

async function main(): Promise<void> {
    const args = parseArgs(process.argv.slice(2));

    if (args.help) {
        console.log(HELP_TEXT);
        return;
    }

    let config = args.config;
    if (args.prompt && process.stdin.isTTY) {
        const { ask, close } = createReadlineAsk(process.stdin, process.stdout);
        try {
            const answers = await promptForConfig(ask);
            if (answers.warning) console.log(answers.warning);
            config = answers.config;
        } finally {
            close();
        }
    }

    for (const warning of validateSimulationConfig(config).warnings) {
        console.log(`[WARN] ${warning}`);
    }

    console.log('');
    console.log('============================================================');
    console.log('     OMNIKIN - Jacobian Omnidirectional Demo (CLI)         ');
    console.log('     space: pause/resume   q: quit                         ');
    console.log('============================================================');
    console.log('');

    const result = await runDemo({
        config,
        verbose: args.verbose,
        keyboard: process.stdin.isTTY ? process.stdin : undefined,
    });

    console.log('');
    console.log(`[OK] ${result.stopped ? 'Stopped' : 'Finished'} after ${result.totalFrames} frames`);
    console.log('');
}

main().catch((error: unknown) => {
    console.error('');
    console.error('[FAILED] Demo failed:');
    console.error(`  ${error instanceof Error ? error.message : String(error)}`);
    console.error('');
    process.exit(1);
});
