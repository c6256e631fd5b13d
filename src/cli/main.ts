#!/usr/bin/env node
/**
 * stubweave CLI binary entry point.
 */

import { run } from './index';

async function main(): Promise<void> {
  const exitCode = await run();
  process.exit(exitCode);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(2);
});
