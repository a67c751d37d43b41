#!/usr/bin/env node

import { runCli } from './cliOptions.js';

async function main() {
  process.on('unhandledRejection', (err) => {
    // eslint-disable-next-line no-console
    console.error('[aot-image] unhandledRejection', err);
    process.exit(1);
  });

  const code = await runCli(process.argv.slice(2));
  process.exit(code);
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('[aot-image] fatal', err);
  process.exit(1);
});
