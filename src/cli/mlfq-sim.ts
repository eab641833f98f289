#!/usr/bin/env node

/**
 * MLFQ Simulator CLI
 *
 * Usage:
 *   mlfq-sim                                   # Run the default scenario
 *   mlfq-sim --scenario path/to/scenario.yaml  # Run a scenario file
 *   mlfq-sim --json                            # Machine-readable result
 */

import { run } from './run.js';

process.exitCode = run(process.argv.slice(2), {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
});
