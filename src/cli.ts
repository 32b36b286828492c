#!/usr/bin/env node
import os from "node:os";
import { stdin, stdout } from "node:process";
import { LoggingService } from "./infrastructure/LoggingService.js";
import { ShellCommandExecutor } from "./infrastructure/ShellCommandExecutor.js";
import { buildProgram } from "./program.js";

const program = buildProgram({
  env: process.env,
  homeDir: os.homedir(),
  input: stdin,
  output: stdout,
  runner: new ShellCommandExecutor(),
  setExitCode: code => {
    process.exitCode = code;
  },
});

program.parseAsync().catch(error => {
  new LoggingService().failure(error);
  process.exitCode = 1;
});
