#!/usr/bin/env node

import { runCli } from './cli/index.js';

async function main(): Promise<void> {
    const exitCode = await runCli(process.argv.slice(2));
    process.exit(exitCode);
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
