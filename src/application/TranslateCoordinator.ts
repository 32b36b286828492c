import type { ConfigSource } from "../infrastructure/ConfigStore.js";
import type { CommandRunner } from "../infrastructure/ShellCommandExecutor.js";
import { LoggingService } from "../infrastructure/LoggingService.js";
import { ConfigMalformedError, ConfigUnreadableError } from "../lib/errors.js";
import { formatPlan, translate } from "../lib/translate.js";

export const TRANSLATE_USAGE = "Usage: semantic translate <command> [args...]";

export class TranslateCoordinator {
  constructor(
    private readonly config: ConfigSource,
    private readonly shell: CommandRunner,
    private readonly logger: LoggingService
  ) {}

  /** Resolves and runs one semantic command; resolves to the exit code to forward. */
  async orchestrateTranslate(token: string | undefined, args: readonly string[]): Promise<number> {
    if (!token) {
      this.logger.error(TRANSLATE_USAGE);
      return 1;
    }

    try {
      const store = await this.config.load();
      this.logger.log(`loaded ${this.config.configPath}`);
      const plan = translate(store, token, args);
      this.logger.log(`${token} → ${formatPlan(plan)}`);
      const result = await this.shell.run(plan.program, plan.args);
      if (result.signal) {
        this.logger.log(`${plan.program} terminated by ${result.signal}`);
      }
      return result.code;
    } catch (error) {
      const loadFailed = error instanceof ConfigUnreadableError || error instanceof ConfigMalformedError;
      this.logger.failure(error, loadFailed ? "Failed to load config" : undefined);
      return 1;
    }
  }
}
