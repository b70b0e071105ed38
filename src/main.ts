#!/usr/bin/env node
import { run } from './cli.js';
import logger from './log.js';

async function main() {
  process.exitCode = await run(process.argv.slice(2));
}

main().catch((e) => {
  logger.err(e, 'nvr crashed');
  process.exit(1);
});
