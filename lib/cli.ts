import { parseArgs } from 'node:util';

import { loadConfig } from './config';
import { MonitorError, errorMessage } from './errors';
import { EXIT_OK, EXIT_STARTUP_FAILED, MonitorOverrides, runMonitor } from './monitor';

export const USAGE = `Usage: idle-monitor [--config <file>] [--once] [--dry-run]

  --config <file>  JSON configuration file (default: $IDLE_MONITOR_CONFIG)
  --once           Sample once and exit; the idle clock persists between runs
  --dry-run        Log the shutdown instead of powering off
`;

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  /** Ends the monitor loop at the next iteration boundary. */
  signal?: AbortSignal;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  overrides?: MonitorOverrides;
}

/**
 * Parses the command line, runs the monitor and resolves with the process exit
 * code. Bad flags, invalid configuration and other startup failures map to
 * `EXIT_STARTUP_FAILED` with one line on stderr.
 */
export const runCli = async (argv: string[], options: CliOptions = {}): Promise<number> => {
  const stdout = options.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = options.stderr ?? ((text: string) => process.stderr.write(text));

  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        config: { type: 'string', short: 'c' },
        once: { type: 'boolean', default: false },
        'dry-run': { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });

    if (values.help) {
      stdout(USAGE);
      return EXIT_OK;
    }

    const config = loadConfig({
      configPath: values.config,
      env: options.env,
      overrides: values['dry-run'] ? { dryRun: true } : {},
    });

    const result = await runMonitor(config, {
      once: values.once,
      signal: options.signal,
      overrides: options.overrides,
    });
    return result.exitCode;
  } catch (error) {
    const code = error instanceof MonitorError ? ` [${error.code}]` : '';
    stderr(`idle-monitor: ${errorMessage(error)}${code}\n`);
    return EXIT_STARTUP_FAILED;
  }
};
