import type { CommandExecutor, CommandResult } from '../../src/runner/executor-interface.js';

// Answers commands by prefix; anything unexpected rejects so probes report it.
export class FakeExecutor implements CommandExecutor {
  readonly commands: string[] = [];
  private responses: Array<{ prefix: string; result: CommandResult | Error }> = [];

  on(prefix: string, result: Partial<CommandResult>): this {
    this.responses.push({ prefix, result: { stdout: '', stderr: '', exitCode: 0, ...result } });
    return this;
  }

  fail(prefix: string, error: Error): this {
    this.responses.push({ prefix, result: error });
    return this;
  }

  async exec(command: string): Promise<CommandResult> {
    this.commands.push(command);
    const match = this.responses.find(r => command.startsWith(r.prefix));
    if (!match) {
      throw new Error(`Unexpected command: ${command}`);
    }
    if (match.result instanceof Error) {
      throw match.result;
    }
    return match.result;
  }
}
