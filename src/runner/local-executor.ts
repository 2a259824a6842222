import { spawn } from 'child_process';
import type { CommandExecutor, CommandResult } from './executor-interface.js';

export const COMMAND_TIMEOUT_MS = 30000;

export class LocalExecutor implements CommandExecutor {
  constructor(private readonly timeoutMs: number = COMMAND_TIMEOUT_MS) {}

  exec(command: string): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const proc = spawn('sh', ['-c', command], {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      const timeout = setTimeout(() => {
        proc.kill();
        reject(new Error(`Command timed out after ${this.timeoutMs}ms: ${command}`));
      }, this.timeoutMs);

      proc.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('error', (err) => {
        clearTimeout(timeout);
        reject(err);
      });

      proc.on('close', (code) => {
        clearTimeout(timeout);
        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          // Killed by a signal: report as a failure rather than success.
          exitCode: code ?? 1,
        });
      });
    });
  }
}
