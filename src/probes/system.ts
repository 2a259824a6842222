import type { ProbeSet } from '../checks/types.js';
import type { CommandExecutor } from '../runner/executor-interface.js';
import { PASSED, failed, shellQuote } from './outcome.js';

const SECONDS_PER_DAY = 86400;

export function certificateCommand(path: string, windowDays: number): string {
  return `openssl x509 -checkend ${windowDays * SECONDS_PER_DAY} -noout -in ${shellQuote(path)}`;
}

export function systemProbes(executor: CommandExecutor): Pick<ProbeSet, 'ntpSync' | 'certificateExpiry'> {
  return {
    async ntpSync() {
      const result = await executor.exec('ntpstat');
      if (result.exitCode === 0) return PASSED;
      return failed(`Clock is not synchronized (ntpstat exit code ${result.exitCode})`);
    },

    async certificateExpiry(paths, windowDays) {
      const expiring: string[] = [];
      const unreadable: string[] = [];

      for (const path of paths) {
        const result = await executor.exec(certificateCommand(path, windowDays));
        if (result.exitCode === 0) continue;
        // openssl exits 1 both for "will expire" and for load errors.
        if (result.stdout.includes('will expire')) {
          expiring.push(path);
        } else {
          unreadable.push(path);
        }
      }

      const problems: string[] = [];
      if (expiring.length > 0) {
        problems.push(`Certificates expiring within ${windowDays} days: ${expiring.join(', ')}`);
      }
      if (unreadable.length > 0) {
        problems.push(`Certificates not readable: ${unreadable.join(', ')}`);
      }

      if (problems.length === 0) return PASSED;
      return failed(problems.join('; '));
    },
  };
}
