import type { CommandRunner, ShellCommandResult } from "../../src/infrastructure/ShellCommandExecutor.js";

export interface MockShellInvocation {
  program: string;
  args: string[];
}

type ResponseFactory = () => ShellCommandResult | Promise<ShellCommandResult>;

type Response = ShellCommandResult | ResponseFactory;

export class MockShellExecutor implements CommandRunner {
  private readonly responses = new Map<string, Response>();
  private readonly invocations: MockShellInvocation[] = [];

  when(program: string, response: Response) {
    this.responses.set(program, response);
    return this;
  }

  async run(program: string, args: readonly string[]): Promise<ShellCommandResult> {
    this.invocations.push({ program, args: [...args] });
    const response = this.responses.get(program);
    if (!response) {
      return MockShellExecutor.exit(0);
    }
    return typeof response === "function" ? await response() : response;
  }

  calls() {
    return [...this.invocations];
  }

  static exit(code: number, signal: NodeJS.Signals | null = null): ShellCommandResult {
    return { code, signal };
  }
}
