#!/usr/bin/env node
import { runCli } from '../lib/cli';
import { EXIT_STARTUP_FAILED } from '../lib/monitor';

// First SIGINT/SIGTERM ends the loop at the next boundary; a second one exits
// immediately and the exit hook releases the lock.
const SIGNAL_NUMBERS = { SIGHUP: 1, SIGINT: 2, SIGTERM: 15 } as const;

const controller = new AbortController();
for (const signal of ['SIGINT', 'SIGTERM', 'SIGHUP'] as const) {
  process.on(signal, () => {
    if (controller.signal.aborted) {
      process.exit(128 + SIGNAL_NUMBERS[signal]);
    }
    controller.abort();
  });
}

runCli(process.argv.slice(2), { signal: controller.signal }).then(
  code => process.exit(code),
  (error: unknown) => {
    process.stderr.write(`idle-monitor: ${String(error)}\n`);
    process.exit(EXIT_STARTUP_FAILED);
  },
);
