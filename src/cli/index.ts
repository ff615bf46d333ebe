#!/usr/bin/env node
// render-notify entry point. Invoked once per finished render job; sets the
// exit code from the run outcome and never lets an exception reach the host.

import { createProgram } from './program.js';

const program = createProgram((outcome) => {
  process.exitCode = outcome.exitCode;
});

try {
  await program.parseAsync(process.argv);
} catch (err) {
  console.error('Fatal error:', err instanceof Error ? err.message : err);
  process.exitCode = 1;
}
