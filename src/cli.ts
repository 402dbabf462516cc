#!/usr/bin/env node
import { createProcessIO, runCli } from './cli/run.js';

async function main(): Promise<void> {
    const code = await runCli(process.argv.slice(2), createProcessIO());
    process.exit(code);
}

main().catch((e: unknown) => {
    console.error('error:', e instanceof Error ? e.message : String(e));
    process.exit(1);
});
