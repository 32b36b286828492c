import type { MappingStore } from "../domain/MappingStore.js";
import type { ConfigSource } from "../infrastructure/ConfigStore.js";
import { LoggingService } from "../infrastructure/LoggingService.js";
import { effectiveShell, generateInit } from "../lib/shellInit.js";

export class InitCoordinator {
  constructor(
    private readonly config: ConfigSource,
    private readonly logger: LoggingService,
    private readonly write: (text: string) => void
  ) {}

  async orchestrateInit(env: NodeJS.ProcessEnv): Promise<number> {
    let store: MappingStore;
    try {
      store = await this.config.load();
    } catch (error) {
      this.logger.failure(error, "Failed to load config");
      return 1;
    }
    const shell = effectiveShell(store, env);
    this.logger.log(`generating init for ${shell}`);
    this.write(generateInit(store, shell));
    return 0;
  }
}
