import type { ProbeOutcome } from '../checks/types.js';
import type { CommandExecutor, CommandResult } from '../runner/executor-interface.js';

export const PASSED: ProbeOutcome = Object.freeze({ passed: true });

export function failed(message: string): ProbeOutcome {
  return { passed: false, message };
}

export function commandFailed(what: string, result: CommandResult): ProbeOutcome {
  const detail = result.stderr || result.stdout;
  return failed(`${what} failed with exit code ${result.exitCode}${detail ? `: ${detail}` : ''}`);
}

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function outputLines(output: string): string[] {
  return output
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

export function columns(line: string): string[] {
  return line.trim().split(/\s+/);
}

export async function serviceActive(executor: CommandExecutor, unit: string): Promise<ProbeOutcome> {
  const result = await executor.exec(`systemctl is-active ${unit}`);
  if (result.exitCode === 0) return PASSED;
  return failed(`Service ${unit} is not active (${result.stdout || 'unknown'})`);
}
