#!/usr/bin/env node
import { createCLI } from './cli-lib';

const cli = createCLI();
cli.parse(process.argv, { run: false });

Promise.resolve(cli.runMatchedCommand()).catch((err: unknown) => {
    console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
});
