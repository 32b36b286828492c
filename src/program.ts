import { Command } from "commander";
import { InitCoordinator } from "./application/InitCoordinator.js";
import { TranslateCoordinator } from "./application/TranslateCoordinator.js";
import { WizardCoordinator } from "./application/WizardCoordinator.js";
import { ConfigStore, resolveConfigRoot } from "./infrastructure/ConfigStore.js";
import { LoggingService, type LogSink } from "./infrastructure/LoggingService.js";
import type { CommandRunner } from "./infrastructure/ShellCommandExecutor.js";
import { TerminalWizardIO, type KeyboardInput, type ScreenOutput } from "./infrastructure/TerminalWizardIO.js";

export const USAGE = "Usage: semantic [init | translate <command> ...]";

/** Everything the commands touch outside the process. */
export interface CliContext {
  env: NodeJS.ProcessEnv;
  homeDir: string;
  input: KeyboardInput;
  output: ScreenOutput;
  runner: CommandRunner;
  sink?: LogSink;
  setExitCode(code: number): void;
}

export function buildProgram(context: CliContext) {
  const program = new Command();

  const services = () => {
    const verbose = Boolean(program.opts<{ verbose?: boolean }>().verbose) || context.env.SEMANTIC_VERBOSE === "1";
    const logger = new LoggingService(verbose, context.sink);
    const config = new ConfigStore(resolveConfigRoot(context.env, context.homeDir));
    return { logger, config };
  };

  program
    .name("semantic")
    .description("Semantic aliases for shell commands and paths: set up once, translate on every call.")
    .version("0.1.0")
    .option("--verbose", "Print debug output (config path, resolved commands)")
    .enablePositionalOptions()
    .allowExcessArguments(true)
    .action(async (_options: unknown, command: Command) => {
      const { logger, config } = services();
      const [unknown] = command.args;
      if (unknown !== undefined) {
        logger.error(`Unknown command: ${unknown}`);
        logger.error(USAGE);
        context.setExitCode(1);
        return;
      }

      if (!context.input.isTTY) {
        logger.error("The setup wizard needs an interactive terminal.");
        logger.hint("Run `semantic` directly in a terminal, or use `semantic init` / `semantic translate`.");
        context.setExitCode(1);
        return;
      }

      const io = new TerminalWizardIO(context.input, context.output, config.configPath);
      await new WizardCoordinator(config, config.configPath, logger).orchestrateWizard(io);
    });

  program.command("init")
    .description("Print shell integration code (eval it from your shell profile)")
    .action(async () => {
      const { logger, config } = services();
      const coordinator = new InitCoordinator(config, logger, text => context.output.write(text));
      context.setExitCode(await coordinator.orchestrateInit(context.env));
    });

  program.command("translate")
    .description("Resolve a semantic command and run the real one")
    .argument("[command]", "semantic command token")
    .argument("[args...]", "arguments for the real command; path aliases are rewritten")
    .helpOption(false)
    .allowUnknownOption()
    .passThroughOptions()
    .action(async (token: string | undefined, args: string[]) => {
      const { logger, config } = services();
      const coordinator = new TranslateCoordinator(config, context.runner, logger);
      context.setExitCode(await coordinator.orchestrateTranslate(token, args));
    });

  return program;
}
