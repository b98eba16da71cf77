import { CommandRunner, runCommand } from '../command';
import { errnoCode } from '../errors';
import { ActivitySignal, SignalResult } from './types';

/**
 * Interactive login sessions as listed by `who`. A safety net so the host is
 * not powered off under an operator's shell.
 */
export class LoginSessionsSignal implements ActivitySignal {
  readonly kind = 'login-sessions' as const;

  constructor(private readonly run: CommandRunner = runCommand) {}

  async sample(): Promise<SignalResult> {
    let output: string;
    try {
      output = await this.run('who', []);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return { kind: this.kind, active: false, reason: 'who not available' };
      }
      throw error;
    }

    const sessions = output.split('\n').filter(line => line.trim() !== '');
    return {
      kind: this.kind,
      active: sessions.length > 0,
      reason: `${sessions.length} login sessions`,
    };
  }
}
