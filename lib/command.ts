import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

/** Runs a program without a shell and resolves with its stdout. */
export type CommandRunner = (command: string, args: readonly string[], timeoutMs?: number) => Promise<string>;

export const runCommand: CommandRunner = async (command, args, timeoutMs = 5000) => {
  const { stdout } = await execFileAsync(command, [...args], { timeout: timeoutMs, encoding: 'utf8' });
  return stdout;
};
