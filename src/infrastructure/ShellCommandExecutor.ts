import { ExecutionFailedError } from "../lib/errors.js";
import { formatPlan } from "../lib/translate.js";

export interface ShellCommandResult {
  code: number;
  signal: NodeJS.Signals | null;
}

export interface CommandRunner {
  run(program: string, args: readonly string[]): Promise<ShellCommandResult>;
}

/** Spawns a program with the caller's stdio and waits for it to exit. */
export class ShellCommandExecutor implements CommandRunner {
  async run(program: string, args: readonly string[]): Promise<ShellCommandResult> {
    const { spawn } = await import("node:child_process");
    return new Promise((resolve, reject) => {
      const child = spawn(program, [...args], { stdio: "inherit" });
      child.once("error", error => {
        reject(new ExecutionFailedError(formatPlan({ program, args: [...args] }), error));
      });
      child.once("close", (code, signal) => {
        // killed by a signal: no exit code to forward
        resolve({ code: code ?? 1, signal });
      });
    });
  }
}
